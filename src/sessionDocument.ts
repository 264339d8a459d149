import {
  type AddressIndex,
  addressKey,
  buildAddressIndex,
  fileAddress,
  lineNumberOf,
  resolveLine,
} from "./addressModel.js";
import { CommentStore, generateCommentId } from "./commentStore.js";
import { parseUnifiedDiff } from "./diffParser.js";
import { PersistenceError } from "./errors.js";
import { ReviewState } from "./reviewState.js";
import {
  COMMENT_KEYS,
  FILE_KEYS,
  METADATA_KEYS,
  type PersistedCommentData,
  SESSION_KEYS,
  SessionFileSchema,
  formatZodError,
  pickExtra,
} from "./schemas.js";
import type { Address, Clock, CommentCategory, DiffFile, ReviewComment } from "./types.js";
import { systemClock } from "./types.js";

export const SESSION_INSTRUCTIONS = [
  "ANNODIFF REVIEW SESSION",
  "",
  "This JSON file is a code review shared between a human reviewer and you.",
  "The reviewer's tool reloads it whenever it changes on disk, so keep it valid JSON.",
  "",
  "What to do:",
  "1. Read diff_context to see what changed.",
  "2. Find comments under files.<path>.comments whose llm_response is null.",
  "3. Answer them by setting llm_response to your reply (a string).",
  "4. Only add new comments when a human comment asks for them.",
  "",
  "Comment fields:",
  "  id               generated by the tool; omit it on comments you add",
  "  author           agents use \"Agent (Model/Version)\"",
  "  category         note | suggestion | issue | praise | ai_analysis",
  "  content          the comment text",
  "  line_no          line in the NEW file, or null for a file-level comment",
  "  is_deleted_line  true when line_no refers to a removed line (OLD file numbering)",
  "  line_no_end      last line of a multi-line comment, or null",
  "  context          the hunk the comment was written against",
  "  llm_response     your answer, or null",
  "  created_at       generated by the tool; omit it on comments you add",
  "",
  "Do not edit or delete other people's comments; only fill llm_response.",
  "Fields you add that the tool does not know are kept as they are.",
].join("\n");

export type SessionMetadata = {
  id: string;
  source: string;
  createdAt: string;
  updatedAt: string;
  extra: Record<string, unknown>;
};

/** A comment as stored in the session file: anchored by line number, not address. */
export type PersistedComment = {
  id: string;
  path: string;
  author: string;
  category: CommentCategory;
  content: string;
  context: string | null;
  lineNo: number | null;
  isDeletedLine: boolean;
  lineNoEnd: number | null;
  isDeletedLineEnd: boolean;
  response: string | null;
  createdAt: string;
  updatedAt: string;
  respondedAt: string | null;
  // Whether the file carried an id, as opposed to one generated while loading.
  hadId: boolean;
  extra: Record<string, unknown>;
};

export type PersistedFileEntry = {
  path: string;
  reviewed?: boolean;
  comments: PersistedComment[];
  extra: Record<string, unknown>;
};

/** Plain snapshot of the session file; the unit the merge works on. */
export type PersistedSession = {
  metadata: SessionMetadata;
  diffText: string;
  files: PersistedFileEntry[];
  extra: Record<string, unknown>;
};

export function parseSessionText(
  text: string,
  location: string,
  clock: Clock = systemClock,
): PersistedSession {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new PersistenceError("format", location, `not valid JSON: ${(error as Error).message}`);
  }

  const parsed = SessionFileSchema.safeParse(payload);
  if (!parsed.success) {
    throw new PersistenceError("format", location, formatZodError(parsed.error));
  }

  const loadedAt = clock().toISOString();
  const data = parsed.data;
  const files: PersistedFileEntry[] = Object.entries(data.files).map(([path, entry]) => ({
    path,
    reviewed: entry.reviewed,
    comments: entry.comments.map((comment) => toPersistedComment(path, comment, loadedAt)),
    extra: pickExtra(entry, FILE_KEYS),
  }));

  return {
    metadata: {
      id: data.metadata.id ?? generateCommentId(),
      source: data.metadata.source,
      createdAt: data.metadata.created_at ?? loadedAt,
      updatedAt: data.metadata.updated_at ?? loadedAt,
      extra: pickExtra(data.metadata, METADATA_KEYS),
    },
    diffText: data.diff_context,
    files,
    extra: pickExtra(data, SESSION_KEYS),
  };
}

function toPersistedComment(
  path: string,
  comment: PersistedCommentData,
  loadedAt: string,
): PersistedComment {
  const createdAt = comment.created_at ?? loadedAt;
  return {
    id: comment.id ?? generateCommentId(),
    path,
    author: comment.author,
    category: comment.category,
    content: comment.content,
    context: comment.context,
    lineNo: comment.line_no,
    isDeletedLine: comment.is_deleted_line,
    lineNoEnd: comment.line_no_end,
    isDeletedLineEnd: comment.is_deleted_line_end,
    response: comment.llm_response,
    createdAt,
    updatedAt: comment.updated_at ?? createdAt,
    respondedAt: comment.responded_at,
    hadId: comment.id !== undefined,
    extra: pickExtra(comment, COMMENT_KEYS),
  };
}

export function serializeSession(snapshot: PersistedSession): string {
  const files: Record<string, Record<string, unknown>> = {};
  for (const entry of snapshot.files) {
    files[entry.path] = {
      reviewed: entry.reviewed ?? false,
      comments: entry.comments.map((comment) => ({
        id: comment.id,
        author: comment.author,
        category: comment.category,
        content: comment.content,
        file_path: comment.path,
        line_no: comment.lineNo,
        is_deleted_line: comment.isDeletedLine,
        line_no_end: comment.lineNoEnd,
        ...(comment.lineNoEnd !== null ? { is_deleted_line_end: comment.isDeletedLineEnd } : {}),
        context: comment.context,
        llm_response: comment.response,
        created_at: comment.createdAt,
        updated_at: comment.updatedAt,
        responded_at: comment.respondedAt,
        ...comment.extra,
      })),
      ...entry.extra,
    };
  }

  const document = {
    instructions: SESSION_INSTRUCTIONS,
    diff_context: snapshot.diffText,
    metadata: {
      id: snapshot.metadata.id,
      source: snapshot.metadata.source,
      created_at: snapshot.metadata.createdAt,
      updated_at: snapshot.metadata.updatedAt,
      ...snapshot.metadata.extra,
    },
    files,
    ...snapshot.extra,
  };

  return `${JSON.stringify(document, null, 2)}\n`;
}

export function identityKey(path: string, anchor: Address, author: string, content: string): string {
  return `${path}\u0000${addressKey(anchor)}\u0000${author}\u0000${content}`;
}

/**
 * Resolves a stored anchor against the current diff. Anchors that no longer
 * resolve fall back to a file-level anchor on the same path.
 */
export function resolvePersistedAnchor(
  index: AddressIndex,
  comment: Pick<PersistedComment, "path" | "lineNo" | "isDeletedLine" | "lineNoEnd" | "isDeletedLineEnd">,
): Pick<ReviewComment, "anchor" | "rangeEnd"> {
  if (comment.lineNo === null) {
    return { anchor: fileAddress(comment.path) };
  }
  const start = resolveLine(index, comment.path, comment.lineNo, comment.isDeletedLine ? "old" : "new");
  if (!start) {
    return { anchor: fileAddress(comment.path) };
  }
  if (comment.lineNoEnd === null) {
    return { anchor: start };
  }
  const end = resolveLine(
    index,
    comment.path,
    comment.lineNoEnd,
    comment.isDeletedLineEnd ? "old" : "new",
  );
  if (!end || addressKey(end) === addressKey(start)) {
    return { anchor: start };
  }
  return { anchor: start, rangeEnd: end };
}

export function commentFromPersisted(index: AddressIndex, persisted: PersistedComment): ReviewComment {
  return {
    id: persisted.id,
    ...resolvePersistedAnchor(index, persisted),
    author: persisted.author,
    content: persisted.content,
    category: persisted.category,
    context: persisted.context,
    response: persisted.response,
    createdAt: persisted.createdAt,
    updatedAt: persisted.updatedAt,
    respondedAt: persisted.respondedAt,
    extra: { ...persisted.extra },
  };
}

export function commentToPersisted(comment: ReviewComment): PersistedComment {
  const start = comment.anchor.kind === "line" ? lineNumberOf(comment.anchor) : undefined;
  const end = comment.rangeEnd ? lineNumberOf(comment.rangeEnd) : undefined;
  return {
    id: comment.id,
    path: comment.anchor.path,
    author: comment.author,
    category: comment.category,
    content: comment.content,
    context: comment.context,
    lineNo: start?.line ?? null,
    isDeletedLine: start?.side === "old",
    lineNoEnd: end?.line ?? null,
    isDeletedLineEnd: end?.side === "old",
    response: comment.response,
    createdAt: comment.createdAt,
    updatedAt: comment.updatedAt,
    respondedAt: comment.respondedAt,
    hadId: true,
    extra: { ...comment.extra },
  };
}

export type CreateSessionInput = {
  diffText: string;
  source: string;
  clock?: Clock;
  /** Drops parsed files before they reach the session, e.g. ignore patterns. */
  filterFiles?: (files: DiffFile[]) => DiffFile[];
};

/**
 * The live session aggregate: the current diff snapshot and its address index,
 * the comment collection, reviewed flags, metadata, and any unknown fields
 * carried over from the persisted file.
 */
export class SessionDocument {
  diffText: string;
  files: DiffFile[];
  index: AddressIndex;
  readonly comments: CommentStore;
  readonly reviewed: ReviewState;
  metadata: SessionMetadata;
  extra: Record<string, unknown> = {};
  readonly fileExtras = new Map<string, Record<string, unknown>>();
  /** Loaded comments that were missing an id or repeated one; their new ids are not on disk yet. */
  idsAssigned = 0;
  // Paths that are not in the diff but still carry state, in first-seen order.
  private readonly detachedPaths: string[] = [];

  private constructor(
    diffText: string,
    files: DiffFile[],
    metadata: SessionMetadata,
    private readonly clock: Clock,
    private readonly filterFiles: (files: DiffFile[]) => DiffFile[],
  ) {
    this.diffText = diffText;
    this.files = files;
    this.index = buildAddressIndex(files);
    this.comments = new CommentStore(this.index, clock);
    this.reviewed = new ReviewState();
    this.metadata = metadata;
  }

  static create(input: CreateSessionInput): SessionDocument {
    const clock = input.clock ?? systemClock;
    const filterFiles = input.filterFiles ?? ((files: DiffFile[]) => files);
    const now = clock().toISOString();
    return new SessionDocument(
      input.diffText,
      filterFiles(parseUnifiedDiff(input.diffText)),
      { id: generateCommentId(), source: input.source, createdAt: now, updatedAt: now, extra: {} },
      clock,
      filterFiles,
    );
  }

  static fromPersisted(
    persisted: PersistedSession,
    input: Omit<CreateSessionInput, "source">,
  ): SessionDocument {
    const clock = input.clock ?? systemClock;
    const filterFiles = input.filterFiles ?? ((files: DiffFile[]) => files);
    const session = new SessionDocument(
      input.diffText,
      filterFiles(parseUnifiedDiff(input.diffText)),
      { ...persisted.metadata, extra: { ...persisted.metadata.extra } },
      clock,
      filterFiles,
    );
    session.extra = { ...persisted.extra };
    for (const entry of persisted.files) {
      session.notePath(entry.path);
      if (entry.reviewed !== undefined) {
        session.reviewed.set(entry.path, entry.reviewed);
      }
      if (Object.keys(entry.extra).length > 0) {
        session.fileExtras.set(entry.path, { ...entry.extra });
      }
      for (const comment of entry.comments) {
        const loaded = commentFromPersisted(session.index, comment);
        if (session.comments.get(loaded.id)) {
          loaded.id = generateCommentId();
        }
        if (!comment.hadId || loaded.id !== comment.id) {
          session.idsAssigned++;
        }
        session.comments.insertLoaded(loaded);
      }
    }
    return session;
  }

  /**
   * Re-parses the diff when its text changed and re-anchors every comment.
   * Returns false when the text is identical. A malformed diff throws before
   * any state changes.
   */
  replaceDiff(diffText: string): boolean {
    if (diffText === this.diffText) {
      return false;
    }
    const files = this.filterFiles(parseUnifiedDiff(diffText));
    for (const file of this.files) {
      if (!files.some((candidate) => candidate.path === file.path)) {
        this.notePath(file.path);
      }
    }
    this.diffText = diffText;
    this.files = files;
    this.index = buildAddressIndex(files);
    this.comments.rebase(this.index);
    return true;
  }

  touch(): void {
    this.metadata.updatedAt = this.clock().toISOString();
  }

  notePath(path: string): void {
    if (!this.files.some((file) => file.path === path) && !this.detachedPaths.includes(path)) {
      this.detachedPaths.push(path);
    }
  }

  /** Paths in save order: diff order first, then detached paths that still hold state. */
  orderedPaths(): string[] {
    const paths = this.files.map((file) => file.path);
    const seen = new Set(paths);
    const holdsState = (path: string) =>
      this.comments.forFile(path).length > 0 || this.reviewed.has(path) || this.fileExtras.has(path);
    for (const path of this.detachedPaths) {
      if (!seen.has(path) && holdsState(path)) {
        paths.push(path);
        seen.add(path);
      }
    }
    for (const comment of this.comments.list()) {
      if (!seen.has(comment.anchor.path)) {
        paths.push(comment.anchor.path);
        seen.add(comment.anchor.path);
      }
    }
    return paths;
  }

  toPersisted(): PersistedSession {
    return {
      metadata: { ...this.metadata, extra: { ...this.metadata.extra } },
      diffText: this.diffText,
      files: this.orderedPaths().map((path) => ({
        path,
        reviewed: this.reviewed.isReviewed(path),
        comments: this.comments.forFile(path).map(commentToPersisted),
        extra: { ...(this.fileExtras.get(path) ?? {}) },
      })),
      extra: { ...this.extra },
    };
  }

  serialize(): string {
    return serializeSession(this.toPersisted());
  }
}

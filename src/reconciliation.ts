import { EventEmitter } from "node:events";

import { findFile } from "./addressModel.js";
import { type MutationOptions, generateCommentId } from "./commentStore.js";
import type { DiffSource } from "./diffSource.js";
import { InvalidAnchorError, MalformedDiffError, PersistenceError, describeError } from "./errors.js";
import { getLogger } from "./logging.js";
import type { SessionStorage } from "./sessionStorage.js";
import {
  type PersistedSession,
  type SessionDocument,
  commentFromPersisted,
  identityKey,
  parseSessionText,
  resolvePersistedAnchor,
} from "./sessionDocument.js";
import {
  type Address,
  type Clock,
  type CommentCategory,
  type LineAddress,
  type ReviewComment,
  systemClock,
} from "./types.js";

export type EngineState = "idle" | "loading" | "merging" | "saving" | "error";

export type MergeSummary = {
  matched: number;
  inserted: number;
  responsesAdopted: number;
  // External comments left out because they were deleted locally since the last save.
  skippedDeleted: number;
  // Inserted comments that arrived without an id, or with one already taken, and got a new one.
  idsAssigned: number;
};

export type ReloadResult = MergeSummary & {
  diffChanged: boolean;
};

function baseKeys(session: SessionDocument, base: PersistedSession | undefined) {
  const ids = new Set<string>();
  const identities = new Set<string>();
  for (const entry of base?.files ?? []) {
    for (const comment of entry.comments) {
      if (comment.hadId) {
        ids.add(comment.id);
      }
      const { anchor } = resolvePersistedAnchor(session.index, comment);
      identities.add(identityKey(entry.path, anchor, comment.author, comment.content));
    }
  }
  return { ids, identities };
}

/**
 * Three-way merge of a freshly read session file into the in-memory session.
 *
 * `base` is the snapshot last written or loaded. The in-memory copy of a paired
 * comment always wins, except that an external response is adopted when the
 * local one is empty.
 */
export function mergeSessions(
  session: SessionDocument,
  external: PersistedSession,
  base: PersistedSession | undefined,
  clock: Clock = systemClock,
): MergeSummary {
  const summary: MergeSummary = {
    matched: 0,
    inserted: 0,
    responsesAdopted: 0,
    skippedDeleted: 0,
    idsAssigned: 0,
  };
  const known = baseKeys(session, base);
  const local = session.comments.list();
  const paired = new Set<string>();
  const externalIds = new Set<string>();

  const identityOf = (comment: ReviewComment) =>
    identityKey(comment.anchor.path, comment.anchor, comment.author, comment.content);

  for (const entry of external.files) {
    for (const incoming of entry.comments) {
      const { anchor } = resolvePersistedAnchor(session.index, incoming);
      const identity = identityKey(entry.path, anchor, incoming.author, incoming.content);
      // A repeated id (a copied comment) names a new comment, not the one already holding it.
      const idTaken =
        incoming.hadId && (externalIds.has(incoming.id) || session.comments.get(incoming.id) !== undefined);
      if (incoming.hadId) {
        externalIds.add(incoming.id);
      }

      let target = incoming.hadId ? local.find((comment) => comment.id === incoming.id) : undefined;
      if (target && paired.has(target.id)) {
        target = undefined;
      }
      target ??= local.find((comment) => !paired.has(comment.id) && identityOf(comment) === identity);

      if (target) {
        paired.add(target.id);
        summary.matched++;
        if (target.response === null && incoming.response !== null) {
          target.response = incoming.response;
          target.respondedAt = incoming.respondedAt ?? clock().toISOString();
          summary.responsesAdopted++;
        }
        target.extra = { ...target.extra, ...incoming.extra };
        continue;
      }

      const deletedById = incoming.hadId && !idTaken && known.ids.has(incoming.id);
      if (deletedById || known.identities.has(identity)) {
        summary.skippedDeleted++;
        continue;
      }

      const inserted = commentFromPersisted(session.index, incoming);
      if (idTaken) {
        inserted.id = generateCommentId();
      }
      if (idTaken || !incoming.hadId) {
        summary.idsAssigned++;
      }
      session.comments.insertLoaded(inserted);
      paired.add(inserted.id);
      session.notePath(entry.path);
      summary.inserted++;
    }

    if (entry.reviewed !== undefined && !session.reviewed.has(entry.path)) {
      session.reviewed.set(entry.path, entry.reviewed);
      session.notePath(entry.path);
    }
    if (Object.keys(entry.extra).length > 0) {
      session.fileExtras.set(entry.path, { ...session.fileExtras.get(entry.path), ...entry.extra });
      session.notePath(entry.path);
    }
  }

  session.extra = { ...session.extra, ...external.extra };
  session.metadata.extra = { ...session.metadata.extra, ...external.metadata.extra };
  return summary;
}

export type ReconciliationEngineOptions = {
  session: SessionDocument;
  storage: SessionStorage;
  source?: DiffSource;
  clock?: Clock;
  /** Snapshot the session was loaded from; absent for a session that was just created. */
  base?: PersistedSession;
  /** Text of the session file as last read, so an unchanged file is not merged again. */
  loadedText?: string;
};

export type Closeable = {
  close(): Promise<void>;
};

/**
 * Sole writer of the session file. Loads, merges and saves are serialized on
 * one promise chain; the state is observable through the `state`, `reloaded`,
 * `saved`, `error` and `diffChanged` events.
 */
export class ReconciliationEngine extends EventEmitter {
  readonly session: SessionDocument;
  private readonly storage: SessionStorage;
  private readonly source: DiffSource | undefined;
  private readonly clock: Clock;
  private base: PersistedSession | undefined;
  private lastKnownText: string | undefined;
  private currentState: EngineState = "idle";
  private failure: Error | undefined;
  private chain: Promise<void> = Promise.resolve();
  private pendingSave: Promise<void> | undefined;
  private pendingReload: Promise<void> | undefined;
  private revision = 0;
  private savedRevision = 0;
  private closed = false;
  private readonly watchers: Closeable[] = [];

  constructor(options: ReconciliationEngineOptions) {
    super();
    this.session = options.session;
    this.storage = options.storage;
    this.source = options.source;
    this.clock = options.clock ?? systemClock;
    this.base = options.base;
    this.lastKnownText = options.loadedText;
  }

  get state(): EngineState {
    return this.currentState;
  }

  get lastError(): Error | undefined {
    return this.failure;
  }

  get dirty(): boolean {
    return this.revision !== this.savedRevision;
  }

  get location(): string {
    return this.storage.location;
  }

  attachWatcher(watcher: Closeable): void {
    this.watchers.push(watcher);
  }

  /** Re-reads and merges the session file. Requests made while one is queued share it. */
  reload(): Promise<void> {
    if (this.pendingReload) {
      return this.pendingReload;
    }
    const pending = this.enqueue(async () => {
      this.pendingReload = undefined;
      await this.runReload();
    });
    this.pendingReload = pending;
    return pending;
  }

  /** Writes the in-memory session. A request made while a save is running queues one more. */
  requestSave(): Promise<void> {
    if (this.pendingSave) {
      return this.pendingSave;
    }
    const pending = this.enqueue(async () => {
      this.pendingSave = undefined;
      await this.runSave();
    });
    this.pendingSave = pending;
    return pending;
  }

  refreshDiff(): Promise<void> {
    return this.enqueue(async () => {
      if (this.closed) {
        return;
      }
      const outcome = await this.applyFreshDiff();
      if (outcome === "changed") {
        this.markDirty();
        await this.runSave();
      }
    });
  }

  retry(): Promise<void> {
    getLogger().info(`Retrying session file ${this.storage.location}`);
    return this.reload();
  }

  async close(): Promise<void> {
    this.closed = true;
    const watchers = this.watchers.splice(0);
    await Promise.all(watchers.map((watcher) => watcher.close()));
    // Queued loads return early once closed; saves still run to completion.
    await this.chain;
  }

  addComment(
    anchor: Address,
    author: string,
    content: string,
    category: CommentCategory,
  ): ReviewComment {
    const comment = this.session.comments.addComment(anchor, author, content, category);
    this.session.notePath(anchor.path);
    this.afterMutation();
    return comment;
  }

  selectionRange(
    start: LineAddress,
    end: LineAddress,
    author: string,
    content: string,
    category: CommentCategory,
  ): ReviewComment {
    const comment = this.session.comments.selectionRange(start, end, author, content, category);
    this.afterMutation();
    return comment;
  }

  editComment(id: string, content: string, options: MutationOptions = {}): ReviewComment {
    const comment = this.session.comments.editComment(id, content, options);
    this.afterMutation();
    return comment;
  }

  deleteComment(id: string, options: MutationOptions = {}): ReviewComment {
    const comment = this.session.comments.deleteComment(id, options);
    this.afterMutation();
    return comment;
  }

  setResponse(id: string, text: string | null): ReviewComment {
    const comment = this.session.comments.setResponse(id, text);
    this.afterMutation();
    return comment;
  }

  toggleReviewed(path: string): boolean {
    const known =
      findFile(this.session.index, path) !== undefined ||
      this.session.reviewed.has(path) ||
      this.session.comments.forFile(path).length > 0;
    if (!known) {
      throw new InvalidAnchorError(path, "file is not in the diff");
    }
    const reviewed = this.session.reviewed.toggle(path);
    this.session.notePath(path);
    this.afterMutation();
    return reviewed;
  }

  private afterMutation(): void {
    this.markDirty();
    void this.requestSave();
  }

  private markDirty(): void {
    this.revision++;
    this.session.touch();
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.chain.then(task);
    // Tasks report their own failures; keep the chain alive regardless.
    this.chain = run.catch((error: unknown) => {
      getLogger().error("Unexpected session engine failure:", describeError(error));
    });
    return this.chain;
  }

  private setState(state: EngineState): void {
    if (state !== "error") {
      this.failure = undefined;
    }
    if (this.currentState === state) {
      return;
    }
    this.currentState = state;
    this.emit("state", state);
  }

  private fail(error: unknown): void {
    const failure = error instanceof Error ? error : new Error(describeError(error));
    getLogger().warn(failure.message);
    this.failure = failure;
    this.setState("error");
    if (this.listenerCount("error") > 0) {
      this.emit("error", failure);
    }
  }

  private async runReload(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.setState("loading");

    let text: string;
    try {
      text = await this.storage.read();
    } catch (error) {
      this.fail(error);
      return;
    }
    if (this.closed) {
      return;
    }

    if (text === this.lastKnownText) {
      getLogger().debug(`Session file ${this.storage.location} unchanged; skipping merge`);
      this.setState("idle");
      await this.saveIfDirty();
      return;
    }

    let external: PersistedSession;
    try {
      external = parseSessionText(text, this.storage.location, this.clock);
    } catch (error) {
      this.fail(error);
      return;
    }

    this.setState("merging");
    const outcome = await this.applyFreshDiff();
    if (this.closed) {
      return;
    }
    if (outcome === "failed") {
      return;
    }
    if (outcome === "changed") {
      this.markDirty();
    }

    const summary = mergeSessions(this.session, external, this.base, this.clock);
    if (summary.idsAssigned > 0) {
      // Write the new ids back so later external edits pair by id.
      this.markDirty();
    }
    this.base = external;
    this.lastKnownText = text;
    getLogger().debug(
      `Merged ${this.storage.location}: ${summary.inserted} inserted, ${summary.responsesAdopted} responses adopted`,
    );
    this.setState("idle");
    this.emit("reloaded", { ...summary, diffChanged: outcome === "changed" } satisfies ReloadResult);
    await this.saveIfDirty();
  }

  /**
   * Asks a live diff source for fresh text and re-anchors comments when it
   * changed. An unavailable source keeps the current diff; a malformed one
   * moves the engine to the error state.
   */
  private async applyFreshDiff(): Promise<"unchanged" | "changed" | "failed"> {
    if (!this.source?.live) {
      return "unchanged";
    }
    let text: string;
    try {
      ({ text } = await this.source.getDiff());
    } catch (error) {
      getLogger().warn(`Keeping the previous diff: ${describeError(error)}`);
      return "unchanged";
    }
    try {
      if (!this.session.replaceDiff(text)) {
        return "unchanged";
      }
    } catch (error) {
      if (error instanceof MalformedDiffError) {
        this.fail(error);
        return "failed";
      }
      throw error;
    }
    this.emit("diffChanged");
    return "changed";
  }

  private async saveIfDirty(): Promise<void> {
    if (this.dirty) {
      await this.runSave();
    }
  }

  private async runSave(): Promise<void> {
    // A file an external writer left unparsable is not overwritten until it loads again.
    if (
      this.currentState === "error" &&
      this.failure instanceof PersistenceError &&
      this.failure.reason === "format"
    ) {
      getLogger().warn(`Not saving over unreadable session file ${this.storage.location}`);
      return;
    }

    this.setState("saving");
    const revision = this.revision;
    const snapshot = this.session.toPersisted();
    const text = this.session.serialize();
    try {
      await this.storage.write(text);
    } catch (error) {
      this.fail(error);
      return;
    }
    this.lastKnownText = text;
    this.base = snapshot;
    this.savedRevision = revision;
    this.setState("idle");
    this.emit("saved", this.storage.location);
  }
}

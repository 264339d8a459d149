import { nanoid } from "nanoid";

import {
  type AddressIndex,
  addressKey,
  findFile,
  hunkText,
  offsetOf,
  reanchor,
} from "./addressModel.js";
import {
  CommentLockedError,
  InvalidAnchorError,
  InvalidRangeError,
  NotFoundError,
} from "./errors.js";
import {
  type Address,
  type Clock,
  type CommentCategory,
  type LineAddress,
  type ReviewComment,
  systemClock,
} from "./types.js";

export type NearDirection = "next" | "previous";

export type MutationOptions = {
  /** Allows changing a comment that already carries a response. */
  force?: boolean;
};

export function generateCommentId(): string {
  return nanoid(12);
}

/**
 * In-memory comment collection, ordered by creation time and validated
 * against the current diff's address index.
 */
export class CommentStore {
  private comments: ReviewComment[] = [];

  constructor(
    private index: AddressIndex,
    private readonly clock: Clock = systemClock,
  ) {}

  get addressIndex(): AddressIndex {
    return this.index;
  }

  get count(): number {
    return this.comments.length;
  }

  list(): ReviewComment[] {
    return [...this.comments];
  }

  get(id: string): ReviewComment | undefined {
    return this.comments.find((comment) => comment.id === id);
  }

  forFile(path: string): ReviewComment[] {
    return this.comments.filter((comment) => comment.anchor.path === path);
  }

  at(address: Address): ReviewComment[] {
    const key = addressKey(address);
    return this.comments.filter((comment) => addressKey(comment.anchor) === key);
  }

  addComment(
    anchor: Address,
    author: string,
    content: string,
    category: CommentCategory,
  ): ReviewComment {
    this.assertAnchor(anchor);
    const timestamp = this.clock().toISOString();
    const comment: ReviewComment = {
      id: generateCommentId(),
      anchor,
      author,
      content,
      category,
      context: anchor.kind === "line" ? hunkText(this.index, anchor) : null,
      response: null,
      createdAt: timestamp,
      updatedAt: timestamp,
      respondedAt: null,
      extra: {},
    };
    this.comments.push(comment);
    return comment;
  }

  /**
   * Creates one comment spanning an inclusive line range within a single file.
   * A range whose end precedes its start is empty.
   */
  selectionRange(
    start: LineAddress,
    end: LineAddress,
    author: string,
    content: string,
    category: CommentCategory,
  ): ReviewComment {
    if (start.path !== end.path) {
      throw new InvalidRangeError(
        `Range endpoints belong to different files: ${start.path} and ${end.path}`,
      );
    }
    this.assertAnchor(start);
    this.assertAnchor(end);

    const startOffset = offsetOf(this.index, start) ?? -1;
    const endOffset = offsetOf(this.index, end) ?? -1;
    const lines = this.index.rows
      .slice(startOffset, endOffset + 1)
      .filter((row) => row.type === "line");
    if (endOffset < startOffset || lines.length === 0) {
      throw new InvalidRangeError(`Range ${addressKey(start)} .. ${addressKey(end)} is empty`);
    }

    const file = findFile(this.index, start.path);
    const hunkTexts: string[] = [];
    for (let hunkIndex = start.hunkIndex; hunkIndex <= end.hunkIndex; hunkIndex++) {
      const raw = file?.hunks[hunkIndex]?.raw;
      if (raw) {
        hunkTexts.push(raw);
      }
    }

    const comment = this.addComment(start, author, content, category);
    if (addressKey(start) !== addressKey(end)) {
      comment.rangeEnd = end;
    }
    comment.context = hunkTexts.length > 0 ? hunkTexts.join("\n") : comment.context;
    return comment;
  }

  editComment(id: string, content: string, options: MutationOptions = {}): ReviewComment {
    const comment = this.require(id);
    if (comment.response !== null && !options.force) {
      throw new CommentLockedError(id);
    }
    comment.content = content;
    comment.updatedAt = this.clock().toISOString();
    return comment;
  }

  deleteComment(id: string, options: MutationOptions = {}): ReviewComment {
    const position = this.comments.findIndex((comment) => comment.id === id);
    if (position < 0) {
      throw new NotFoundError(id);
    }
    const comment = this.comments[position];
    if (comment.response !== null && !options.force) {
      throw new CommentLockedError(id);
    }
    this.comments.splice(position, 1);
    return comment;
  }

  setResponse(id: string, text: string | null): ReviewComment {
    const comment = this.require(id);
    comment.response = text;
    comment.respondedAt = text === null ? null : this.clock().toISOString();
    return comment;
  }

  /**
   * Nearest comment at or after (or at or before) an address in flattened
   * order. Ties go to the comment created first. Comments on files missing
   * from the current diff sort after every row.
   */
  commentsNear(address: Address, direction: NearDirection): ReviewComment | undefined {
    const origin = offsetOf(this.index, address);
    if (origin === undefined) {
      throw new InvalidAnchorError(addressKey(address));
    }

    let best: ReviewComment | undefined;
    let bestOffset = 0;
    for (const comment of this.comments) {
      const offset = this.sortOffset(comment);
      if (direction === "next" ? offset < origin : offset > origin) {
        continue;
      }
      const closer = direction === "next" ? offset < bestOffset : offset > bestOffset;
      if (!best || closer) {
        best = comment;
        bestOffset = offset;
      }
    }
    return best;
  }

  /** Comments in flattened diff order, creation order within one anchor. */
  ordered(): ReviewComment[] {
    return this.comments
      .map((comment, position) => ({ comment, position, offset: this.sortOffset(comment) }))
      .sort((a, b) => a.offset - b.offset || a.position - b.position)
      .map((entry) => entry.comment);
  }

  /** Re-anchors every comment after the diff was re-parsed. */
  rebase(index: AddressIndex): void {
    this.index = index;
    for (const comment of this.comments) {
      comment.anchor = reanchor(index, comment.anchor);
      if (comment.rangeEnd) {
        const end = comment.anchor.kind === "line" ? reanchor(index, comment.rangeEnd) : undefined;
        comment.rangeEnd = end?.kind === "line" && end.path === comment.anchor.path ? end : undefined;
      }
    }
  }

  /** Places a comment coming from the persisted document by its creation time. */
  insertLoaded(comment: ReviewComment): void {
    let position = this.comments.length;
    while (position > 0 && this.comments[position - 1].createdAt > comment.createdAt) {
      position--;
    }
    this.comments.splice(position, 0, comment);
  }

  private sortOffset(comment: ReviewComment): number {
    return offsetOf(this.index, comment.anchor) ?? Number.POSITIVE_INFINITY;
  }

  private require(id: string): ReviewComment {
    const comment = this.get(id);
    if (!comment) {
      throw new NotFoundError(id);
    }
    return comment;
  }

  private assertAnchor(anchor: Address): void {
    if (anchor.kind === "line") {
      const file = findFile(this.index, anchor.path);
      if (file?.binary) {
        throw new InvalidAnchorError(addressKey(anchor), "binary files only take file-level comments");
      }
    }
    if (offsetOf(this.index, anchor) === undefined) {
      throw new InvalidAnchorError(addressKey(anchor));
    }
  }
}

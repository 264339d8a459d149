export class ReviewError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReviewError";
  }
}

export class MalformedDiffError extends ReviewError {
  readonly code = "MalformedDiff";

  constructor(
    readonly filePath: string,
    readonly header: string,
    detail = "unparsable hunk header",
  ) {
    super(`Malformed diff in ${filePath || "<unknown file>"}: ${detail}: ${header}`);
    this.name = "MalformedDiffError";
  }
}

export class InvalidAnchorError extends ReviewError {
  readonly code = "InvalidAnchor";

  constructor(readonly anchorKey: string, detail = "anchor does not exist in the current diff") {
    super(`Invalid anchor ${anchorKey}: ${detail}`);
    this.name = "InvalidAnchorError";
  }
}

export class InvalidRangeError extends ReviewError {
  readonly code = "InvalidRange";

  constructor(message: string) {
    super(message);
    this.name = "InvalidRangeError";
  }
}

export class NotFoundError extends ReviewError {
  readonly code = "NotFound";

  constructor(readonly commentId: string) {
    super(`Comment ${commentId} not found`);
    this.name = "NotFoundError";
  }
}

export class CommentLockedError extends ReviewError {
  readonly code = "CommentLocked";

  constructor(readonly commentId: string) {
    super(`Comment ${commentId} already has a response; pass force to change it`);
    this.name = "CommentLockedError";
  }
}

export class SourceUnavailableError extends ReviewError {
  readonly code = "SourceUnavailable";

  constructor(readonly source: string, detail: string) {
    super(`Diff source ${source} unavailable: ${detail}`);
    this.name = "SourceUnavailableError";
  }
}

export type PersistenceFailure = "read" | "write" | "format" | "missing";

export class PersistenceError extends ReviewError {
  readonly code = "PersistenceError";

  constructor(
    readonly reason: PersistenceFailure,
    readonly location: string,
    detail: string,
  ) {
    super(`Session file ${location} (${reason}): ${detail}`);
    this.name = "PersistenceError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

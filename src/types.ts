export type ChangeKind = "added" | "modified" | "deleted" | "renamed";

export type LineKind = "context" | "added" | "removed";

export interface DiffLine {
  kind: LineKind;
  text: string;
  // Absent (null) for added lines.
  oldLine: number | null;
  // Absent (null) for removed lines.
  newLine: number | null;
}

export interface DiffHunk {
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
  /** Trailing section text after the second `@@`, usually the enclosing function. */
  section: string;
  /** Raw hunk text including the `@@` header line. */
  raw: string;
  lines: DiffLine[];
}

export interface DiffFile {
  path: string;
  /** Previous path for renames. */
  oldPath?: string;
  change: ChangeKind;
  binary: boolean;
  hunks: DiffHunk[];
}

export interface FileAddress {
  kind: "file";
  path: string;
}

export interface LineAddress {
  kind: "line";
  path: string;
  hunkIndex: number;
  lineKind: LineKind;
  oldLine: number | null;
  newLine: number | null;
}

export type Address = FileAddress | LineAddress;

export const COMMENT_CATEGORIES = ["note", "suggestion", "issue", "praise", "ai_analysis"] as const;

export type CommentCategory = (typeof COMMENT_CATEGORIES)[number];

export interface ReviewComment {
  id: string;
  anchor: Address;
  /** Last line of a multi-line selection; same file as `anchor`. */
  rangeEnd?: LineAddress;
  author: string;
  content: string;
  category: CommentCategory;
  /** Hunk text captured when the comment was made, for agent visibility. */
  context: string | null;
  response: string | null;
  createdAt: string;
  updatedAt: string;
  respondedAt: string | null;
  // Fields written by external collaborators that this tool does not know about.
  extra: Record<string, unknown>;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

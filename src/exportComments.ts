import { lineNumberOf } from "./addressModel.js";
import { parseSourceDescription } from "./diffSource.js";
import type { SessionDocument } from "./sessionDocument.js";
import { COMMENT_CATEGORIES, type CommentCategory } from "./types.js";

export type ExportFormat = "markdown" | "json";

export type ExportedComment = {
  id: string;
  category: CommentCategory;
  file: string;
  line: number | null;
  lineEnd: number | null;
  deletedLine: boolean;
  author: string;
  content: string;
  response: string | null;
  createdAt: string;
};

const CATEGORY_DESCRIPTIONS: Record<CommentCategory, string> = {
  note: "observations",
  suggestion: "improvements",
  issue: "problems to fix",
  praise: "positive feedback",
  ai_analysis: "AI-generated analysis",
};

/** Comments in flattened diff order, creation order for comments at the same place. */
export function flattenComments(session: SessionDocument): ExportedComment[] {
  return session.comments.ordered().map((comment) => {
    const start = comment.anchor.kind === "line" ? lineNumberOf(comment.anchor) : undefined;
    const end = comment.rangeEnd ? lineNumberOf(comment.rangeEnd) : undefined;
    return {
      id: comment.id,
      category: comment.category,
      file: comment.anchor.path,
      line: start?.line ?? null,
      lineEnd: end?.line ?? null,
      deletedLine: start?.side === "old",
      author: comment.author,
      content: comment.content,
      response: comment.response,
      createdAt: comment.createdAt,
    };
  });
}

export function formatLocation(comment: ExportedComment): string {
  if (comment.line === null) {
    return `\`${comment.file}\``;
  }
  if (comment.lineEnd !== null) {
    const first = Math.min(comment.line, comment.lineEnd);
    const last = Math.max(comment.line, comment.lineEnd);
    return `\`${comment.file}:${first}-${last}\``;
  }
  if (comment.deletedLine) {
    return `\`${comment.file}:~${comment.line}\``;
  }
  return `\`${comment.file}:${comment.line}\``;
}

function reviewingLine(sourceDescription: string): string | undefined {
  const descriptor = parseSourceDescription(sourceDescription);
  if (!descriptor) {
    return undefined;
  }
  switch (descriptor.type) {
    case "commit":
      return `Reviewing commit: ${descriptor.sha.slice(0, 7)}`;
    case "branch":
      return `Reviewing changes: ${descriptor.base}...HEAD`;
    case "pr":
      return `Reviewing PR #${descriptor.number}`;
    default:
      return undefined;
  }
}

/** Markdown meant to be pasted into an agent's prompt. */
export function toMarkdown(session: SessionDocument): string {
  const lines = ["I reviewed your code and have the following comments. Please address them.", ""];

  const reviewing = reviewingLine(session.metadata.source);
  if (reviewing) {
    lines.push(reviewing, "");
  }

  const legend = COMMENT_CATEGORIES.map(
    (category) => `${category.toUpperCase()} (${CATEGORY_DESCRIPTIONS[category]})`,
  );
  lines.push(`Comment types: ${legend.join(", ")}`, "");

  const comments = flattenComments(session);
  if (comments.length === 0) {
    lines.push("No comments.");
  }
  comments.forEach((comment, position) => {
    lines.push(
      `${position + 1}. **[${comment.category.toUpperCase()}]** ${formatLocation(comment)} - ${comment.content}`,
    );
    if (comment.response !== null) {
      for (const responseLine of comment.response.split("\n")) {
        lines.push(`   > ${responseLine}`);
      }
    }
  });

  return lines.join("\n");
}

export function toJson(session: SessionDocument) {
  return {
    session_id: session.metadata.id,
    diff_source: session.metadata.source,
    files_reviewed: session.reviewed.reviewedCount(session.files),
    files_total: session.files.length,
    comments: flattenComments(session).map((comment) => ({
      id: comment.id,
      category: comment.category,
      file_path: comment.file,
      line_no: comment.line,
      line_no_end: comment.lineEnd,
      is_deleted_line: comment.deletedLine,
      author: comment.author,
      content: comment.content,
      llm_response: comment.response,
      created_at: comment.createdAt,
    })),
  };
}

export function exportSession(session: SessionDocument, format: ExportFormat): string {
  return format === "json" ? `${JSON.stringify(toJson(session), null, 2)}\n` : toMarkdown(session);
}

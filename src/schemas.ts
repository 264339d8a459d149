import { z } from "zod";

import { COMMENT_CATEGORIES } from "./types.js";

export const integerFromString = z.coerce.number().int();

export const CommentCategorySchema = z.enum(COMMENT_CATEGORIES);

// Fields an external writer may omit get defaults; unknown fields pass through untouched.
export const PersistedCommentSchema = z
  .object({
    id: z.string().trim().min(1).optional(),
    author: z.string().optional().default("human"),
    category: CommentCategorySchema,
    content: z.string(),
    file_path: z.string().optional(),
    context: z.string().nullable().optional().default(null),
    line_no: integerFromString.nullable().optional().default(null),
    is_deleted_line: z.boolean().optional().default(false),
    line_no_end: integerFromString.nullable().optional().default(null),
    is_deleted_line_end: z.boolean().optional().default(false),
    llm_response: z.string().nullable().optional().default(null),
    created_at: z.string().optional(),
    updated_at: z.string().optional(),
    responded_at: z.string().nullable().optional().default(null),
  })
  .passthrough();

export const PersistedFileSchema = z
  .object({
    reviewed: z.boolean().optional(),
    comments: z.array(PersistedCommentSchema).optional().default([]),
  })
  .passthrough();

export const SessionMetadataSchema = z
  .object({
    id: z.string().trim().min(1).optional(),
    source: z.string().trim().min(1, "metadata.source cannot be empty"),
    created_at: z.string().optional(),
    updated_at: z.string().optional(),
  })
  .passthrough();

export const SessionFileSchema = z
  .object({
    instructions: z.string().optional(),
    diff_context: z.string().optional().default(""),
    metadata: SessionMetadataSchema,
    files: z.record(z.string(), PersistedFileSchema).optional().default({}),
  })
  .passthrough();

export type SessionFileData = z.infer<typeof SessionFileSchema>;
export type PersistedCommentData = z.infer<typeof PersistedCommentSchema>;

export const COMMENT_KEYS: ReadonlySet<string> = new Set(Object.keys(PersistedCommentSchema.shape));
export const FILE_KEYS: ReadonlySet<string> = new Set(Object.keys(PersistedFileSchema.shape));
export const METADATA_KEYS: ReadonlySet<string> = new Set(Object.keys(SessionMetadataSchema.shape));
export const SESSION_KEYS: ReadonlySet<string> = new Set(Object.keys(SessionFileSchema.shape));

export function pickExtra(
  record: Record<string, unknown>,
  known: ReadonlySet<string>,
): Record<string, unknown> {
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (!known.has(key)) {
      extra[key] = value;
    }
  }
  return extra;
}

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

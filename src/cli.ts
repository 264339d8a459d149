import process from "node:process";

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { z } from "zod";

import type { DiffSourceDescriptor } from "./diffSource.js";
import { ReviewError } from "./errors.js";
import { CommentCategorySchema, formatZodError, integerFromString } from "./schemas.js";
import { COMMENT_CATEGORIES } from "./types.js";
import { DEFAULT_DEBOUNCE_MS } from "./watcher.js";

export const COMMANDS = ["start", "export", "comment", "edit", "delete", "respond", "reviewed"] as const;

export type Command = (typeof COMMANDS)[number];

const SOURCE_FLAGS = ["staged", "branch", "commit", "pr", "diffFile"] as const;

export const ArgsSchema = z
  .object({
    command: z.enum(COMMANDS).default("start"),
    repo: z.string().trim().min(1, "repo cannot be empty"),
    staged: z.coerce.boolean().default(false),
    branch: z.string().trim().min(1, "branch cannot be empty").optional(),
    commit: z.string().trim().min(4, "commit must be at least 4 characters").optional(),
    pr: z.coerce.number().int("pr must be an integer").positive("pr must be positive").optional(),
    diffFile: z.string().trim().min(1, "diff-file cannot be empty").optional(),
    new: z.coerce.boolean().default(false),
    ignoreFiles: z.array(z.string().trim().min(1)).optional().default([]),
    debug: z.coerce.boolean().default(false),
    debounceMs: integerFromString
      .nonnegative("debounce-ms cannot be negative")
      .default(DEFAULT_DEBOUNCE_MS),
    author: z.string().trim().min(1, "author cannot be empty").optional(),
    format: z.enum(["markdown", "json"]).default("markdown"),
    file: z.string().trim().min(1, "file cannot be empty").optional(),
    line: integerFromString.positive("line must be positive").optional(),
    end: integerFromString.positive("end must be positive").optional(),
    deleted: z.coerce.boolean().default(false),
    category: CommentCategorySchema.default("note"),
    message: z.string().optional(),
    id: z.string().trim().min(1, "id cannot be empty").optional(),
    force: z.coerce.boolean().default(false),
    clear: z.coerce.boolean().default(false),
  })
  .superRefine((options, ctx) => {
    const chosen = SOURCE_FLAGS.filter((flag) => Boolean(options[flag]));
    if (chosen.length > 1) {
      ctx.addIssue({
        code: "custom",
        path: [chosen[1]],
        message: `only one diff source may be given (got ${chosen.join(", ")})`,
      });
    }
    const needs = (field: "file" | "message" | "id") => {
      if (options[field] === undefined) {
        ctx.addIssue({ code: "custom", path: [field], message: `${options.command} requires --${field}` });
      }
    };
    switch (options.command) {
      case "comment":
        needs("file");
        needs("message");
        if (options.end !== undefined && options.line === undefined) {
          ctx.addIssue({ code: "custom", path: ["end"], message: "end requires line" });
        }
        break;
      case "edit":
        needs("id");
        needs("message");
        break;
      case "delete":
        needs("id");
        break;
      case "respond":
        needs("id");
        if (!options.clear) {
          needs("message");
        }
        break;
      case "reviewed":
        needs("file");
        break;
      default:
        break;
    }
  });

export type CliOptions = z.infer<typeof ArgsSchema>;

function envInt(name: string): number | undefined {
  const value = process.env[name];
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function envFlag(name: string): boolean {
  const value = process.env[name]?.trim().toLowerCase();
  return value === "1" || value === "true" || value === "yes";
}

export function parseArgs(args: string[] = hideBin(process.argv)): CliOptions {
  const argv = yargs(args)
    .scriptName("annodiff")
    .command(["start", "$0"], "Open the review session and keep it in sync with the session file.")
    .command("export", "Print the session's comments for an agent.")
    .command("comment", "Add a file, line or range comment.")
    .command("edit", "Change a comment's content.")
    .command("delete", "Remove a comment.")
    .command("respond", "Fill a comment's response slot.")
    .command("reviewed", "Toggle a file's reviewed flag.")
    .option("repo", {
      type: "string",
      description: "Repository root; the session file is written there.",
      default: process.cwd(),
    })
    .option("staged", {
      type: "boolean",
      description: "Review staged changes.",
      default: false,
    })
    .option("branch", {
      type: "string",
      description: "Review the current branch against this base.",
    })
    .option("commit", {
      type: "string",
      description: "Review a single commit.",
    })
    .option("pr", {
      type: "number",
      description: "Review a pull request through the gh CLI.",
    })
    .option("diff-file", {
      type: "string",
      description: "Review a unified diff read from a file.",
    })
    .option("new", {
      type: "boolean",
      description: "Start over, discarding any saved session for this diff source.",
      default: false,
    })
    .option("ignore-files", {
      type: "string",
      array: true,
      description: "Glob patterns for files to leave out of the session (repeatable).",
      default: [],
    })
    .option("debug", {
      type: "boolean",
      description: "Enable verbose logging.",
      default: envFlag("ANNODIFF_DEBUG"),
    })
    .option("debounce-ms", {
      type: "number",
      description: "Quiet period before a burst of file changes triggers a reload.",
      default: envInt("ANNODIFF_DEBOUNCE_MS") ?? DEFAULT_DEBOUNCE_MS,
    })
    .option("author", {
      type: "string",
      description: "Comment author (defaults to ANNODIFF_AUTHOR, then git user.name <user.email>).",
      default: process.env.ANNODIFF_AUTHOR,
    })
    .option("format", {
      type: "string",
      choices: ["markdown", "json"],
      description: "Export format.",
      default: "markdown",
    })
    .option("file", {
      type: "string",
      description: "File path as it appears in the diff.",
    })
    .option("line", {
      type: "number",
      description: "Line number; new-file numbering unless --deleted is set.",
    })
    .option("end", {
      type: "number",
      description: "Last line of a range comment.",
    })
    .option("deleted", {
      type: "boolean",
      description: "Line numbers refer to removed lines (old-file numbering).",
      default: false,
    })
    .option("category", {
      type: "string",
      choices: [...COMMENT_CATEGORIES],
      description: "Comment category.",
      default: "note",
    })
    .option("message", {
      alias: "m",
      type: "string",
      description: "Comment or response text.",
    })
    .option("id", {
      type: "string",
      description: "Comment id.",
    })
    .option("force", {
      type: "boolean",
      description: "Allow editing or deleting a comment that already has a response.",
      default: false,
    })
    .option("clear", {
      type: "boolean",
      description: "Clear the response instead of setting one.",
      default: false,
    })
    .strict()
    .help()
    .parseSync();

  const parsed = ArgsSchema.safeParse({ ...argv, command: argv._[0] });

  if (parsed.success) {
    return parsed.data;
  }

  throw new ReviewError(`Invalid CLI arguments: ${formatZodError(parsed.error)}`);
}

export function sourceFromOptions(options: CliOptions): DiffSourceDescriptor {
  if (options.staged) {
    return { type: "staged" };
  }
  if (options.branch) {
    return { type: "branch", base: options.branch };
  }
  if (options.commit) {
    return { type: "commit", sha: options.commit };
  }
  if (options.pr !== undefined) {
    return { type: "pr", number: options.pr };
  }
  if (options.diffFile) {
    return { type: "file", path: options.diffFile };
  }
  return { type: "uncommitted" };
}

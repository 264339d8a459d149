import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import type { DiffSourceDescriptor } from "./diffSource.js";
import { PersistenceError, describeError } from "./errors.js";

export const SESSION_FILE_BASE = ".annodiff-review";

/** Where a session's persisted document lives; tests substitute an in-memory store. */
export interface SessionStorage {
  readonly location: string;
  read(): Promise<string>;
  write(text: string): Promise<void>;
}

export class FileSessionStorage implements SessionStorage {
  constructor(readonly location: string) {}

  async read(): Promise<string> {
    try {
      return await readFile(this.location, "utf8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        throw new PersistenceError("missing", this.location, "file does not exist");
      }
      throw new PersistenceError("read", this.location, describeError(error));
    }
  }

  async write(text: string): Promise<void> {
    try {
      await writeFile(this.location, text, "utf8");
    } catch (error) {
      throw new PersistenceError("write", this.location, describeError(error));
    }
  }
}

function sanitizeSuffix(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]+/g, "-").replace(/^-+|-+$/g, "");
}

/**
 * One session file per diff-source description, at the repository root:
 * `.annodiff-review.json`, `.annodiff-review.staged.json`,
 * `.annodiff-review.branch-main.json`, `.annodiff-review.abc1234.json`,
 * `.annodiff-review.pr-42.json`, `.annodiff-review.file-change.diff.json`.
 */
export function sessionFileName(descriptor: DiffSourceDescriptor): string {
  let suffix = "";
  switch (descriptor.type) {
    case "uncommitted":
      break;
    case "staged":
      suffix = "staged";
      break;
    case "branch":
      suffix = `branch-${sanitizeSuffix(descriptor.base)}`;
      break;
    case "commit":
      suffix = sanitizeSuffix(descriptor.sha.slice(0, 7));
      break;
    case "pr":
      suffix = `pr-${descriptor.number}`;
      break;
    case "file":
      suffix = `file-${sanitizeSuffix(path.basename(descriptor.path))}`;
      break;
  }
  return suffix ? `${SESSION_FILE_BASE}.${suffix}.json` : `${SESSION_FILE_BASE}.json`;
}

export function sessionPathFor(repoRoot: string, descriptor: DiffSourceDescriptor): string {
  return path.join(repoRoot, sessionFileName(descriptor));
}

import { readFile } from "node:fs/promises";
import path from "node:path";

import { type SimpleGit, simpleGit } from "simple-git";

import { runCommand } from "./command.js";
import { SourceUnavailableError, describeError } from "./errors.js";
import { getLogger } from "./logging.js";
import { SESSION_FILE_BASE } from "./sessionStorage.js";

export type DiffSourceDescriptor =
  | { type: "uncommitted" }
  | { type: "staged" }
  | { type: "branch"; base: string }
  | { type: "commit"; sha: string }
  | { type: "pr"; number: number }
  | { type: "file"; path: string };

export type DiffSnapshot = {
  text: string;
  description: string;
};

export interface DiffSource {
  readonly descriptor: DiffSourceDescriptor;
  readonly description: string;
  /** Live sources follow the working tree and are re-read on every reload. */
  readonly live: boolean;
  getDiff(): Promise<DiffSnapshot>;
}

export function describeSource(descriptor: DiffSourceDescriptor): string {
  switch (descriptor.type) {
    case "uncommitted":
    case "staged":
      return descriptor.type;
    case "branch":
      return `branch:${descriptor.base}`;
    case "commit":
      return `commit:${descriptor.sha.slice(0, 7)}`;
    case "pr":
      return `pr:${descriptor.number}`;
    case "file":
      return `file:${descriptor.path}`;
  }
}

export function parseSourceDescription(description: string): DiffSourceDescriptor | undefined {
  const trimmed = description.trim();
  if (trimmed === "uncommitted" || trimmed === "staged") {
    return { type: trimmed };
  }
  const separator = trimmed.indexOf(":");
  if (separator <= 0) {
    return undefined;
  }
  const kind = trimmed.slice(0, separator);
  const value = trimmed.slice(separator + 1).trim();
  if (!value) {
    return undefined;
  }
  switch (kind) {
    case "branch":
      return { type: "branch", base: value };
    case "commit":
      return { type: "commit", sha: value };
    case "pr": {
      const number = Number(value);
      return Number.isInteger(number) && number > 0 ? { type: "pr", number } : undefined;
    }
    case "file":
      return { type: "file", path: value };
    default:
      return undefined;
  }
}

export function isLiveSource(descriptor: DiffSourceDescriptor): boolean {
  return (
    descriptor.type === "uncommitted" || descriptor.type === "staged" || descriptor.type === "branch"
  );
}

export function createDiffSource(repoRoot: string, descriptor: DiffSourceDescriptor): DiffSource {
  const description = describeSource(descriptor);
  const load = (): Promise<string> => {
    switch (descriptor.type) {
      case "uncommitted":
        return uncommittedDiff(repoRoot);
      case "staged":
        return simpleGit(repoRoot).diff(["--staged"]);
      case "branch":
        return simpleGit(repoRoot).diff([`${descriptor.base}...HEAD`]);
      case "commit":
        return simpleGit(repoRoot).show([descriptor.sha, "--format="]);
      case "pr":
        return runCommand(["gh", "pr", "diff", String(descriptor.number)], { cwd: repoRoot });
      case "file":
        return readFile(path.resolve(repoRoot, descriptor.path), "utf8");
    }
  };

  return {
    descriptor,
    description,
    live: isLiveSource(descriptor),
    async getDiff(): Promise<DiffSnapshot> {
      getLogger().debug("Loading diff from", description);
      try {
        return { text: await load(), description };
      } catch (error) {
        throw new SourceUnavailableError(description, describeError(error));
      }
    },
  };
}

async function uncommittedDiff(repoRoot: string): Promise<string> {
  const git = simpleGit(repoRoot);
  let diffText = await git.diff(["HEAD"]);

  const untrackedOutput = await git.raw(["ls-files", "--others", "--exclude-standard"]);
  const untrackedPaths = untrackedOutput
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !isSessionFile(line));

  for (const filePath of untrackedPaths) {
    const section = await untrackedFileSection(repoRoot, filePath);
    if (section) {
      diffText += diffText.length === 0 || diffText.endsWith("\n") ? section : `\n${section}`;
    }
  }
  return diffText;
}

// Session files live in the working tree and must not feed back into the diff.
function isSessionFile(filePath: string): boolean {
  return path.basename(filePath).startsWith(SESSION_FILE_BASE);
}

async function untrackedFileSection(repoRoot: string, filePath: string): Promise<string | undefined> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path.join(repoRoot, filePath));
  } catch (error) {
    getLogger().debug(`Skipping unreadable untracked file ${filePath}:`, describeError(error));
    return undefined;
  }
  if (bytes.subarray(0, 8192).includes(0)) {
    return undefined;
  }
  return buildNewFileSection(filePath, bytes.toString("utf8"));
}

/** Renders an untracked file as a unified diff "new file" section. */
export function buildNewFileSection(filePath: string, content: string): string {
  const lines = content.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  const header = [
    `diff --git a/${filePath} b/${filePath}`,
    "new file mode 100644",
    "--- /dev/null",
    `+++ b/${filePath}`,
  ];
  if (lines.length === 0) {
    return `${header.slice(0, 2).join("\n")}\n`;
  }
  return `${[...header, `@@ -0,0 +1,${lines.length} @@`, ...lines.map((line) => `+${line}`)].join("\n")}\n`;
}

/** "Name <email>" from git config, or "human" when git has no identity. */
export async function resolveReviewer(repoRoot: string): Promise<string> {
  try {
    const git: SimpleGit = simpleGit(repoRoot);
    const [name, email] = await Promise.all([
      git.getConfig("user.name"),
      git.getConfig("user.email"),
    ]);
    const userName = name.value?.trim();
    const userEmail = email.value?.trim();
    if (userName && userEmail) {
      return `${userName} <${userEmail}>`;
    }
    return userName || userEmail || "human";
  } catch (error) {
    getLogger().debug("Could not read git identity:", describeError(error));
    return "human";
  }
}

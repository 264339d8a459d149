import { MalformedDiffError } from "./errors.js";
import type { ChangeKind, DiffFile, DiffHunk, DiffLine } from "./types.js";

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@(.*)$/;
const DEV_NULL = "/dev/null";

type PendingFile = {
  gitOldPath?: string;
  gitNewPath?: string;
  oldPath?: string;
  newPath?: string;
  renameFrom?: string;
  renameTo?: string;
  change?: ChangeKind;
  binary: boolean;
  hunks: DiffHunk[];
};

type OpenHunk = {
  hunk: DiffHunk;
  rawLines: string[];
  oldRemaining: number;
  newRemaining: number;
  oldCursor: number;
  newCursor: number;
};

/**
 * Parses unified diff text (git or plain `diff -u` output) into files and hunks
 * with explicit old/new line numbers. Hunk bodies are consumed by count, so the
 * header counts always match the parsed lines.
 */
export function parseUnifiedDiff(diffText: string): DiffFile[] {
  const files: DiffFile[] = [];
  const seenPaths = new Set<string>();
  let current: PendingFile | undefined;
  let open: OpenHunk | undefined;

  const flushCurrent = () => {
    if (!current) {
      return;
    }
    const file = finalizeFile(current);
    if (seenPaths.has(file.path)) {
      throw new MalformedDiffError(file.path, file.path, "duplicate file section");
    }
    seenPaths.add(file.path);
    files.push(file);
    current = undefined;
  };

  const closeHunk = () => {
    if (!open || !current) {
      return;
    }
    open.hunk.raw = open.rawLines.join("\n");
    current.hunks.push(open.hunk);
    open = undefined;
  };

  const lines = diffText.split(/\r?\n/);
  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];

    if (open) {
      if (line.startsWith("\\")) {
        // "\ No newline at end of file"
        continue;
      }
      if (line.startsWith("diff --git ")) {
        throw new MalformedDiffError(
          pendingPath(current),
          open.rawLines[0],
          "hunk body ended before its line counts were reached",
        );
      }
      if (!consumeHunkLine(open, line)) {
        throw new MalformedDiffError(
          pendingPath(current),
          open.rawLines[0],
          `unexpected line ${JSON.stringify(line)} inside hunk`,
        );
      }
      if (open.oldRemaining === 0 && open.newRemaining === 0) {
        closeHunk();
      }
      continue;
    }

    if (line.startsWith("diff --git ")) {
      flushCurrent();
      current = { binary: false, hunks: [] };
      const [gitOldPath, gitNewPath] = parseGitHeaderPaths(line.slice("diff --git ".length));
      current.gitOldPath = gitOldPath;
      current.gitNewPath = gitNewPath;
      continue;
    }

    if (line.startsWith("--- ") && lines[index + 1]?.startsWith("+++ ")) {
      // Plain unified diffs have no "diff --git" line; a header pair after hunks starts a new file.
      if (!current || current.hunks.length > 0 || current.oldPath !== undefined) {
        flushCurrent();
        current = { binary: false, hunks: [] };
      }
      current.oldPath = parseHeaderPath(line.slice(4), "a/");
      continue;
    }

    if (!current) {
      continue;
    }

    if (line.startsWith("+++ ")) {
      current.newPath = parseHeaderPath(line.slice(4), "b/");
    } else if (line.startsWith("@@")) {
      const match = line.match(HUNK_HEADER);
      if (!match) {
        throw new MalformedDiffError(pendingPath(current), line);
      }
      open = openHunk(match, line);
      if (open.oldRemaining === 0 && open.newRemaining === 0) {
        closeHunk();
      }
    } else if (line.startsWith("new file mode")) {
      current.change = "added";
    } else if (line.startsWith("deleted file mode")) {
      current.change = "deleted";
    } else if (line.startsWith("rename from ")) {
      current.renameFrom = line.slice("rename from ".length).trim();
      current.change = "renamed";
    } else if (line.startsWith("rename to ")) {
      current.renameTo = line.slice("rename to ".length).trim();
      current.change = "renamed";
    } else if (line.startsWith("Binary files ") || line.startsWith("GIT binary patch")) {
      current.binary = true;
    }
  }

  if (open) {
    throw new MalformedDiffError(
      pendingPath(current),
      open.rawLines[0],
      "hunk body ended before its line counts were reached",
    );
  }
  flushCurrent();

  return files;
}

function openHunk(match: RegExpMatchArray, header: string): OpenHunk {
  const oldStart = Number.parseInt(match[1], 10);
  const oldCount = match[2] !== undefined ? Number.parseInt(match[2], 10) : 1;
  const newStart = Number.parseInt(match[3], 10);
  const newCount = match[4] !== undefined ? Number.parseInt(match[4], 10) : 1;

  return {
    hunk: {
      oldStart,
      oldCount,
      newStart,
      newCount,
      section: match[5].trim(),
      raw: header,
      lines: [],
    },
    rawLines: [header],
    oldRemaining: oldCount,
    newRemaining: newCount,
    oldCursor: oldStart,
    newCursor: newStart,
  };
}

function consumeHunkLine(open: OpenHunk, line: string): boolean {
  const marker = line.charAt(0);
  let parsed: DiffLine;

  if (marker === "+" && open.newRemaining > 0) {
    parsed = { kind: "added", text: line.slice(1), oldLine: null, newLine: open.newCursor };
    open.newCursor++;
    open.newRemaining--;
  } else if (marker === "-" && open.oldRemaining > 0) {
    parsed = { kind: "removed", text: line.slice(1), oldLine: open.oldCursor, newLine: null };
    open.oldCursor++;
    open.oldRemaining--;
  } else if ((marker === " " || line === "") && open.oldRemaining > 0 && open.newRemaining > 0) {
    // Some tools strip the single space from empty context lines.
    parsed = {
      kind: "context",
      text: line.slice(1),
      oldLine: open.oldCursor,
      newLine: open.newCursor,
    };
    open.oldCursor++;
    open.newCursor++;
    open.oldRemaining--;
    open.newRemaining--;
  } else {
    return false;
  }

  open.hunk.lines.push(parsed);
  open.rawLines.push(line);
  return true;
}

function finalizeFile(pending: PendingFile): DiffFile {
  const oldPath = pending.renameFrom ?? pending.oldPath ?? pending.gitOldPath;
  const newPath = pending.renameTo ?? pending.newPath ?? pending.gitNewPath;

  let change: ChangeKind = pending.change ?? "modified";
  if (!pending.change) {
    if (pending.oldPath === DEV_NULL) {
      change = "added";
    } else if (pending.newPath === DEV_NULL) {
      change = "deleted";
    }
  }

  const resolvedOld = oldPath === DEV_NULL ? undefined : oldPath;
  const resolvedNew = newPath === DEV_NULL ? undefined : newPath;
  const path = change === "deleted" ? resolvedOld ?? resolvedNew : resolvedNew ?? resolvedOld;

  const file: DiffFile = {
    path: path ?? "unknown",
    change,
    binary: pending.binary,
    hunks: pending.binary ? [] : pending.hunks,
  };
  if (change === "renamed" && resolvedOld && resolvedOld !== file.path) {
    file.oldPath = resolvedOld;
  }
  return file;
}

function pendingPath(pending: PendingFile | undefined): string {
  if (!pending) {
    return "";
  }
  const candidates = [pending.newPath, pending.oldPath, pending.gitNewPath, pending.gitOldPath];
  return candidates.find((candidate) => candidate && candidate !== DEV_NULL) ?? "";
}

function parseHeaderPath(token: string, prefix: "a/" | "b/"): string {
  const withoutTimestamp = token.split("\t")[0].trim();
  const unquoted = unquote(withoutTimestamp);
  if (unquoted === DEV_NULL) {
    return DEV_NULL;
  }
  return unquoted.startsWith(prefix) ? unquoted.slice(prefix.length) : unquoted;
}

function parseGitHeaderPaths(rest: string): [string | undefined, string | undefined] {
  // "a/<old> b/<new>"; paths may contain spaces, so split on the last " b/".
  const separator = rest.lastIndexOf(" b/");
  if (!rest.startsWith("a/") || separator < 0) {
    return [undefined, undefined];
  }
  return [rest.slice(2, separator), rest.slice(separator + 3)];
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\"/g, '"').replace(/\\\\/g, "\\");
  }
  return value;
}

export function countChanges(file: DiffFile): { additions: number; deletions: number } {
  let additions = 0;
  let deletions = 0;
  for (const hunk of file.hunks) {
    for (const line of hunk.lines) {
      if (line.kind === "added") {
        additions++;
      } else if (line.kind === "removed") {
        deletions++;
      }
    }
  }
  return { additions, deletions };
}

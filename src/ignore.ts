import micromatch from "micromatch";

import type { DiffFile } from "./types.js";

function normalizeFilePath(filePath: string): string {
  return filePath.replace(/\\/g, "/").replace(/^\.\//, "");
}

export function shouldIgnoreFile(
  filePath: string,
  patterns: readonly string[] | undefined,
): boolean {
  if (!patterns || patterns.length === 0) {
    return false;
  }
  const normalized = normalizeFilePath(filePath);
  return micromatch.isMatch(normalized, patterns, {
    dot: true,
  });
}

/**
 * Drops files matching any ignore pattern. A rename is kept when either side
 * of it is still of interest.
 */
export function filterIgnoredFiles(
  files: readonly DiffFile[],
  patterns: readonly string[] | undefined,
): DiffFile[] {
  if (!patterns || patterns.length === 0) {
    return [...files];
  }
  return files.filter((file) => {
    if (!shouldIgnoreFile(file.path, patterns)) {
      return true;
    }
    return file.oldPath !== undefined && !shouldIgnoreFile(file.oldPath, patterns);
  });
}

import type { DiffFile } from "./types.js";

/** Per-file "reviewed" flags, owned by the local session. */
export class ReviewState {
  private readonly flags = new Map<string, boolean>();

  constructor(initial: Iterable<[string, boolean]> = []) {
    for (const [path, reviewed] of initial) {
      this.flags.set(path, reviewed);
    }
  }

  isReviewed(path: string): boolean {
    return this.flags.get(path) ?? false;
  }

  has(path: string): boolean {
    return this.flags.has(path);
  }

  set(path: string, reviewed: boolean): void {
    this.flags.set(path, reviewed);
  }

  toggle(path: string): boolean {
    const next = !this.isReviewed(path);
    this.flags.set(path, next);
    return next;
  }

  reviewedCount(files: readonly DiffFile[]): number {
    return files.filter((file) => this.isReviewed(file.path)).length;
  }
}

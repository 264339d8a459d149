import path from "node:path";

import { type FSWatcher, watch } from "chokidar";

import { describeError } from "./errors.js";
import { getLogger } from "./logging.js";

export const DEFAULT_DEBOUNCE_MS = 200;

const IGNORED_DIRECTORIES = new Set([".git", "node_modules"]);

export type ChangeWatcherOptions = {
  /** Paths handed to chokidar. */
  paths: string[];
  onChange: () => void;
  debounceMs?: number;
  depth?: number;
  ignored?: (watchedPath: string) => boolean;
};

/**
 * Collapses bursts of file-system events into one callback. It only signals;
 * whoever receives the callback decides what to reload.
 */
export class ChangeWatcher {
  private readonly debounceMs: number;
  private timer: NodeJS.Timeout | undefined;
  private watcher: FSWatcher | undefined;
  private closed = false;

  constructor(private readonly options: ChangeWatcherOptions) {
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
  }

  /** Watches the directory holding the session file and reacts to that file only. */
  static forSessionFile(location: string, onChange: () => void, debounceMs?: number): ChangeWatcher {
    const target = path.resolve(location);
    const directory = path.dirname(target);
    return new ChangeWatcher({
      paths: [directory],
      depth: 0,
      debounceMs,
      onChange,
      ignored: (watchedPath) => {
        const resolved = path.resolve(watchedPath);
        return resolved !== directory && resolved !== target;
      },
    });
  }

  /** Watches the working tree for diff refreshes, leaving out VCS metadata and the session file. */
  static forRepository(
    repoRoot: string,
    sessionLocation: string,
    onChange: () => void,
    debounceMs?: number,
  ): ChangeWatcher {
    const sessionFile = path.resolve(sessionLocation);
    return new ChangeWatcher({
      paths: [path.resolve(repoRoot)],
      debounceMs,
      onChange,
      ignored: (watchedPath) =>
        path.resolve(watchedPath) === sessionFile ||
        watchedPath.split(/[\\/]/).some((segment) => IGNORED_DIRECTORIES.has(segment)),
    });
  }

  start(): void {
    if (this.watcher || this.closed) {
      return;
    }
    const watcher = watch(this.options.paths, {
      ignoreInitial: true,
      persistent: true,
      depth: this.options.depth,
      ignored: this.options.ignored,
    });
    watcher.on("all", (event, changedPath) => {
      getLogger().debug(`Watcher event ${event}: ${changedPath}`);
      this.notify();
    });
    watcher.on("error", (error) => {
      getLogger().warn("File watcher error:", describeError(error));
    });
    this.watcher = watcher;
  }

  notify(): void {
    if (this.closed) {
      return;
    }
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.options.onChange();
    }, this.debounceMs);
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    const watcher = this.watcher;
    this.watcher = undefined;
    await watcher?.close();
  }
}

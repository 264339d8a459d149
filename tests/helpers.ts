import type { DiffSnapshot, DiffSource, DiffSourceDescriptor } from "../src/diffSource.js";
import { describeSource, isLiveSource } from "../src/diffSource.js";
import { PersistenceError, SourceUnavailableError } from "../src/errors.js";
import { createLogger, setLogger } from "../src/logging.js";
import type { SessionStorage } from "../src/sessionStorage.js";
import type { Clock } from "../src/types.js";

setLogger(createLogger({ silent: true }));

export const A_PY_DIFF = [
  "diff --git a/a.py b/a.py",
  "index 1111111..2222222 100644",
  "--- a/a.py",
  "+++ b/a.py",
  "@@ -9,2 +9,5 @@ def main():",
  " before = 1",
  "+ten = 10",
  "+eleven = 11",
  "+twelve = 12",
  " after = 2",
].join("\n");

export const B_PY_DIFF = [
  "diff --git a/b.py b/b.py",
  "index 3333333..4444444 100644",
  "--- a/b.py",
  "+++ b/b.py",
  "@@ -4,3 +4,2 @@",
  " four = 4",
  "-five = 5",
  " six = 6",
].join("\n");

/** a.py adds lines 10-12; b.py removes old line 5. */
export const TWO_FILE_DIFF = `${A_PY_DIFF}\n${B_PY_DIFF}\n`;

/** Each call returns a time one second after the previous one. */
export function steppingClock(start = "2026-01-01T00:00:00.000Z", stepMs = 1000): Clock {
  let current = Date.parse(start);
  return () => {
    const now = new Date(current);
    current += stepMs;
    return now;
  };
}

export class MemorySessionStorage implements SessionStorage {
  readonly location = "memory/.annodiff-review.json";
  readonly writes: string[] = [];
  reads = 0;
  failWrites = false;

  constructor(public text?: string) {}

  async read(): Promise<string> {
    this.reads++;
    if (this.text === undefined) {
      throw new PersistenceError("missing", this.location, "file does not exist");
    }
    return this.text;
  }

  async write(text: string): Promise<void> {
    if (this.failWrites) {
      throw new PersistenceError("write", this.location, "disk full");
    }
    this.text = text;
    this.writes.push(text);
  }
}

/** Diff provider whose text tests change between reloads; `undefined` text means unavailable. */
export class StubDiffSource implements DiffSource {
  readonly description: string;
  readonly live: boolean;
  calls = 0;

  constructor(
    public text: string | undefined,
    readonly descriptor: DiffSourceDescriptor = { type: "uncommitted" },
  ) {
    this.description = describeSource(descriptor);
    this.live = isLiveSource(descriptor);
  }

  async getDiff(): Promise<DiffSnapshot> {
    this.calls++;
    if (this.text === undefined) {
      throw new SourceUnavailableError(this.description, "git exited with code 128");
    }
    return { text: this.text, description: this.description };
  }
}

/** Rewrites the stored session JSON the way an external collaborator would. */
export function editStoredSession(
  storage: MemorySessionStorage,
  edit: (document: Record<string, unknown> & { files: Record<string, { comments: Record<string, unknown>[] }> }) => void,
): void {
  if (storage.text === undefined) {
    throw new Error("nothing stored yet");
  }
  const document = JSON.parse(storage.text);
  edit(document);
  storage.text = `${JSON.stringify(document, null, 2)}\n`;
}

import type { Address, DiffFile, DiffLine, FileAddress, LineAddress } from "./types.js";

export type Row =
  | { type: "file"; fileIndex: number; address: FileAddress }
  | { type: "hunk"; fileIndex: number; hunkIndex: number; path: string }
  | {
      type: "line";
      fileIndex: number;
      hunkIndex: number;
      lineIndex: number;
      address: LineAddress;
      line: DiffLine;
    };

export type LineSide = "old" | "new";

/**
 * Flattened, order-preserving view over a parsed diff. Every renderable row has
 * an offset; boundary lookups are precomputed so navigation is O(1).
 */
export interface AddressIndex {
  readonly files: readonly DiffFile[];
  readonly rows: readonly Row[];
  readonly offsets: ReadonlyMap<string, number>;
  readonly fileOffsets: readonly number[];
  readonly hunkOffsets: readonly number[];
  readonly previousFile: Int32Array;
  readonly nextFile: Int32Array;
  readonly previousHunk: Int32Array;
  readonly nextHunk: Int32Array;
  readonly sideLookup: ReadonlyMap<string, number>;
}

export function fileAddress(path: string): FileAddress {
  return { kind: "file", path };
}

export function addressKey(address: Address): string {
  if (address.kind === "file") {
    return `${address.path}::file`;
  }
  const oldPart = address.oldLine ?? "-";
  const newPart = address.newLine ?? "-";
  return `${address.path}::h${address.hunkIndex}:${address.lineKind}:${oldPart}:${newPart}`;
}

function sideKey(path: string, side: LineSide, lineNumber: number): string {
  return `${path}::${side}:${lineNumber}`;
}

export function buildAddressIndex(files: readonly DiffFile[]): AddressIndex {
  const rows: Row[] = [];
  const offsets = new Map<string, number>();
  const sideLookup = new Map<string, number>();
  const fileOffsets: number[] = [];
  const hunkOffsets: number[] = [];

  files.forEach((file, fileIndex) => {
    const address = fileAddress(file.path);
    fileOffsets.push(rows.length);
    offsets.set(addressKey(address), rows.length);
    rows.push({ type: "file", fileIndex, address });

    file.hunks.forEach((hunk, hunkIndex) => {
      hunkOffsets.push(rows.length);
      rows.push({ type: "hunk", fileIndex, hunkIndex, path: file.path });

      hunk.lines.forEach((line, lineIndex) => {
        const lineAddress: LineAddress = {
          kind: "line",
          path: file.path,
          hunkIndex,
          lineKind: line.kind,
          oldLine: line.oldLine,
          newLine: line.newLine,
        };
        const offset = rows.length;
        offsets.set(addressKey(lineAddress), offset);
        if (line.kind === "removed" && line.oldLine !== null) {
          sideLookup.set(sideKey(file.path, "old", line.oldLine), offset);
        } else if (line.newLine !== null && !sideLookup.has(sideKey(file.path, "new", line.newLine))) {
          sideLookup.set(sideKey(file.path, "new", line.newLine), offset);
        }
        rows.push({ type: "line", fileIndex, hunkIndex, lineIndex, address: lineAddress, line });
      });
    });
  });

  return {
    files,
    rows,
    offsets,
    fileOffsets,
    hunkOffsets,
    previousFile: precomputePrevious(rows.length, fileOffsets),
    nextFile: precomputeNext(rows.length, fileOffsets),
    previousHunk: precomputePrevious(rows.length, hunkOffsets),
    nextHunk: precomputeNext(rows.length, hunkOffsets),
    sideLookup,
  };
}

// previous[i] = largest boundary strictly below i, or -1.
function precomputePrevious(length: number, boundaries: readonly number[]): Int32Array {
  const previous = new Int32Array(length).fill(-1);
  let cursor = 0;
  let last = -1;
  for (let offset = 0; offset < length; offset++) {
    previous[offset] = last;
    if (cursor < boundaries.length && boundaries[cursor] === offset) {
      last = offset;
      cursor++;
    }
  }
  return previous;
}

// next[i] = smallest boundary strictly above i, or -1.
function precomputeNext(length: number, boundaries: readonly number[]): Int32Array {
  const next = new Int32Array(length).fill(-1);
  let cursor = boundaries.length - 1;
  let upcoming = -1;
  for (let offset = length - 1; offset >= 0; offset--) {
    next[offset] = upcoming;
    if (cursor >= 0 && boundaries[cursor] === offset) {
      upcoming = offset;
      cursor--;
    }
  }
  return next;
}

export function clampOffset(index: AddressIndex, offset: number): number {
  if (index.rows.length === 0) {
    return 0;
  }
  if (!Number.isFinite(offset) || offset < 0) {
    return 0;
  }
  return Math.min(Math.trunc(offset), index.rows.length - 1);
}

export function addressAt(index: AddressIndex, offset: number): Address | undefined {
  const row = index.rows[offset];
  if (!row) {
    return undefined;
  }
  if (row.type === "hunk") {
    return fileAddress(row.path);
  }
  return row.address;
}

export function offsetOf(index: AddressIndex, address: Address): number | undefined {
  return index.offsets.get(addressKey(address));
}

function step(table: Int32Array, index: AddressIndex, offset: number): number {
  if (index.rows.length === 0) {
    return 0;
  }
  const clamped = clampOffset(index, offset);
  const target = table[clamped];
  return target < 0 ? clamped : target;
}

export function nextFileBoundary(index: AddressIndex, offset: number): number {
  return step(index.nextFile, index, offset);
}

export function previousFileBoundary(index: AddressIndex, offset: number): number {
  return step(index.previousFile, index, offset);
}

export function nextHunkBoundary(index: AddressIndex, offset: number): number {
  return step(index.nextHunk, index, offset);
}

export function previousHunkBoundary(index: AddressIndex, offset: number): number {
  return step(index.previousHunk, index, offset);
}

export function findFile(index: AddressIndex, path: string): DiffFile | undefined {
  const offset = index.offsets.get(addressKey(fileAddress(path)));
  if (offset === undefined) {
    return undefined;
  }
  const row = index.rows[offset];
  return row ? index.files[row.fileIndex] : undefined;
}

export function hasLineAddress(index: AddressIndex, address: LineAddress): boolean {
  return index.offsets.has(addressKey(address));
}

/**
 * Finds a line by its number on one side of the diff. The old side only
 * matches removed lines; the new side matches context and added lines.
 */
export function resolveLine(
  index: AddressIndex,
  path: string,
  lineNumber: number,
  side: LineSide,
): LineAddress | undefined {
  const offset = index.sideLookup.get(sideKey(path, side, lineNumber));
  if (offset === undefined) {
    return undefined;
  }
  const row = index.rows[offset];
  return row?.type === "line" ? row.address : undefined;
}

export function lineNumberOf(address: LineAddress): { line: number; side: LineSide } {
  if (address.lineKind === "removed" && address.oldLine !== null) {
    return { line: address.oldLine, side: "old" };
  }
  return { line: address.newLine ?? address.oldLine ?? 0, side: "new" };
}

/**
 * Maps an address from an older parse onto this index: the exact address when
 * it still exists, otherwise the same line number on the same side, otherwise
 * the file itself.
 */
export function reanchor(index: AddressIndex, address: Address): Address {
  if (address.kind === "file" || hasLineAddress(index, address)) {
    return address;
  }
  const { line, side } = lineNumberOf(address);
  return resolveLine(index, address.path, line, side) ?? fileAddress(address.path);
}

export function hunkText(index: AddressIndex, address: LineAddress): string | null {
  const file = findFile(index, address.path);
  return file?.hunks[address.hunkIndex]?.raw ?? null;
}

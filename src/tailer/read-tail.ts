import { readSync } from "node:fs";
import { splitLines } from "./split-lines";

const NEWLINE = 0x0a;

/**
 * Read up to `length` bytes at `position`. Returns fewer bytes only at EOF.
 */
export function readAt(fd: number, position: number, length: number): Buffer {
  const buffer = Buffer.alloc(length);
  let filled = 0;
  while (filled < length) {
    const n = readSync(fd, buffer, filled, length - filled, position + filled);
    if (n === 0) break;
    filled += n;
  }
  return filled === length ? buffer : buffer.subarray(0, filled);
}

export interface TailResult {
  /** The last `lineCount` complete lines, oldest first. */
  lines: string[];
  /** Bytes after the last newline (an unterminated line at EOF). */
  partial: Buffer;
  /** Byte position just past the last newline; 0 if the file has none. */
  completeEnd: number;
  /**
   * True when the unterminated line at EOF is longer than `maxBytes`, so
   * neither its start nor the newline before it was reached. `lines` and
   * `partial` are then empty and `completeEnd` is meaningless.
   */
  overflow: boolean;
}

/**
 * Last `lineCount` complete lines of the first `size` bytes of `fd`.
 *
 * Scans backward from `size` one block at a time and stops as soon as the
 * window holds `lineCount + 1` newlines (the extra one marks where the
 * oldest wanted line starts), so only the tail of the file is read. At most
 * `maxBytes` are read; lines that start before that window are left out.
 */
export function readTail(
  fd: number,
  size: number,
  lineCount: number,
  blockSize = 4096,
  maxBytes = Number.POSITIVE_INFINITY,
): TailResult {
  const blocks: Buffer[] = [];
  let position = size;
  let newlines = 0;

  while (position > 0 && newlines < lineCount + 1 && size - position < maxBytes) {
    const length = Math.min(blockSize, position, maxBytes - (size - position));
    position -= length;
    const block = readAt(fd, position, length);
    blocks.unshift(block);
    for (const byte of block) {
      if (byte === NEWLINE) newlines++;
    }
  }

  const window = Buffer.concat(blocks);
  const lastNewline = window.lastIndexOf(NEWLINE);

  if (lastNewline === -1) {
    if (position > 0) {
      return { lines: [], partial: Buffer.alloc(0), completeEnd: position, overflow: true };
    }
    return { lines: [], partial: window, completeEnd: 0, overflow: false };
  }

  const { lines } = splitLines(window.subarray(0, lastNewline + 1));
  // The first line of a window that does not start at 0 is cut; drop it.
  if (position > 0) lines.shift();

  return {
    lines: lineCount === 0 ? [] : lines.slice(-lineCount),
    partial: Buffer.from(window.subarray(lastNewline + 1)),
    completeEnd: position + lastNewline + 1,
    overflow: false,
  };
}

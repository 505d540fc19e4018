const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

export interface SplitResult {
  /** Complete lines, decoded as UTF-8, without their terminator. */
  lines: string[];
  /** Bytes consumed by the complete lines, terminators included. */
  consumed: number;
  /** Trailing bytes after the last newline (an unterminated line). */
  rest: Buffer;
}

/**
 * Split a byte chunk on "\n". A trailing "\r" is removed from each line.
 * Splitting happens on bytes, so a multi-byte UTF-8 character cut at the
 * chunk boundary stays intact in `rest`.
 */
export function splitLines(chunk: Buffer): SplitResult {
  const lines: string[] = [];
  let start = 0;
  let nl = chunk.indexOf(NEWLINE, start);

  while (nl !== -1) {
    let end = nl;
    if (end > start && chunk[end - 1] === CARRIAGE_RETURN) end--;
    lines.push(chunk.toString("utf8", start, end));
    start = nl + 1;
    nl = chunk.indexOf(NEWLINE, start);
  }

  // Copy, so a held remainder does not pin the whole read buffer.
  return { lines, consumed: start, rest: Buffer.from(chunk.subarray(start)) };
}

/** Decode one line held without its "\n", dropping a trailing "\r". */
export function decodeLine(bytes: Buffer): string {
  const end =
    bytes.length > 0 && bytes[bytes.length - 1] === CARRIAGE_RETURN
      ? bytes.length - 1
      : bytes.length;
  return bytes.toString("utf8", 0, end);
}

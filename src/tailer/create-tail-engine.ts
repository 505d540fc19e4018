import { fstatSync, statSync } from "node:fs";
import { setTimeout as sleep } from "node:timers/promises";
import {
  parseLoopOptions,
  parseTailerOptions,
  type LoopOptions,
  type TailerOptions,
} from "../config";
import { ClosedError, isNotFound } from "../errors";
import { createFileRegistry, type WatchedFile } from "../registry";
import { readAt, readTail } from "./read-tail";
import { decodeLine, splitLines } from "./split-lines";
import type { PollResult, TailEngine } from "./types";

const NEWLINE = 0x0a;

/**
 * Create a tail engine over one directory.
 *
 * Bootstrap runs here, synchronously: every matching file is opened and
 * primed at EOF, and the sink receives the last `tailLines` complete lines
 * of each non-empty file. Throws ConfigurationError on bad options; any
 * I/O error other than a vanished file closes what was opened and throws.
 */
export function createTailEngine(input: TailerOptions): TailEngine {
  const { watchDir, extensions, sink, tailLines, maxSize, logger } =
    parseTailerOptions(input);

  const registry = createFileRegistry({ watchDir, extensions, logger });

  /** Seek a freshly discovered file to EOF and deliver its tail. */
  function prime(file: WatchedFile): void {
    let lines: string[];
    try {
      // Stat by path: the fd keeps an unlinked file readable.
      statSync(file.path);
      const { size } = fstatSync(file.fd);
      const tail = readTail(file.fd, size, tailLines, undefined, maxSize);
      file.size = size;
      file.cursor = size;
      if (tail.overflow) {
        // Mid-way through a line longer than maxSize: skip to its end.
        file.offset = size;
        file.overflow = true;
      } else {
        // An unterminated last line stays pending so it is delivered whole
        // once the writer finishes it.
        file.offset = tail.completeEnd;
        file.pending = tail.partial;
      }
      lines = tail.lines;
    } catch (err) {
      if (!isNotFound(err)) throw err;
      registry.drop(file.path);
      return;
    }

    if (lines.length > 0) sink.accept(file.path, lines);
  }

  /**
   * Fold a freshly read chunk into the file's held bytes and return the
   * lines it completes. A line that grows past `maxSize` is cut to its
   * first `maxSize` bytes; the rest of it is skipped.
   */
  function consume(file: WatchedFile, chunk: Buffer): string[] {
    const lines: string[] = [];
    let data = chunk;

    if (file.overflow) {
      const nl = chunk.indexOf(NEWLINE);
      if (nl === -1) return lines;
      if (file.pending.length > 0) lines.push(decodeLine(file.pending));
      file.offset = file.cursor - chunk.length + nl + 1;
      file.pending = Buffer.alloc(0);
      file.overflow = false;
      data = chunk.subarray(nl + 1);
    } else if (file.pending.length > 0) {
      data = Buffer.concat([file.pending, chunk]);
    }

    const split = splitLines(data);
    lines.push(...split.lines);
    file.offset += split.consumed;
    file.pending = split.rest;

    if (file.pending.length > maxSize) {
      logger.warn(
        `[tail-engine] ${file.path} has a line longer than ${maxSize} bytes, cutting it`,
      );
      file.pending = Buffer.from(file.pending.subarray(0, maxSize));
      file.overflow = true;
    }

    return lines;
  }

  /**
   * Read at most `maxSize` new bytes from one file and hand its complete
   * lines to the sink. Returns the number of lines delivered.
   */
  function readStep(path: string): number {
    let file = registry.get(path);
    if (!file) return 0;

    let lines: string[];
    try {
      // Stat by path: a deleted or replaced file still looks fine through its fd.
      const onDisk = statSync(path);
      if (onDisk.ino !== file.ino) {
        const reopened = registry.reopen(path);
        if (reopened === null) return 0;
        logger.info(`[tail-engine] ${path} was replaced, reading from the start`);
        file = reopened;
      }

      const { size } = fstatSync(file.fd);
      if (size < file.cursor) {
        logger.info(`[tail-engine] ${path} was truncated, reading from the start`);
        file.offset = 0;
        file.cursor = 0;
        file.pending = Buffer.alloc(0);
        file.overflow = false;
      }
      file.size = size;

      const length = Math.min(maxSize, size - file.cursor);
      if (length === 0) return 0;

      const chunk = readAt(file.fd, file.cursor, length);
      file.cursor += chunk.length;
      lines = consume(file, chunk);
    } catch (err) {
      if (!isNotFound(err)) throw err;
      logger.warn(`[tail-engine] ${path} disappeared while reading, dropping it`);
      registry.drop(path);
      return 0;
    }

    if (lines.length > 0) sink.accept(path, lines);
    return lines.length;
  }

  function poll(): PollResult {
    if (registry.closed) throw new ClosedError();

    const { added, removed } = registry.refresh();
    for (const path of added) logger.info(`[tail-engine] Watching ${path}`);

    const dispatched = new Map<string, number>();

    // Every tracked file gets exactly one read per pass.
    for (const file of registry.files()) {
      const count = readStep(file.path);
      if (count > 0) dispatched.set(file.path, count);
    }

    return { added, removed, dispatched };
  }

  async function loop(loopOptions?: LoopOptions): Promise<void> {
    const { intervalMs, blocking, signal } = parseLoopOptions(loopOptions);
    if (registry.closed) throw new ClosedError();

    try {
      // close() during a sleep ends the loop quietly at the next tick.
      while (!signal?.aborted && !registry.closed) {
        poll();
        if (!blocking) return;

        try {
          await sleep(intervalMs, undefined, { signal });
        } catch (err) {
          if (signal?.aborted) return;
          throw err;
        }
      }
    } catch (err) {
      registry.close();
      throw err;
    }
  }

  try {
    registry.refresh();
    for (const file of registry.files()) prime(file);
  } catch (err) {
    registry.close();
    throw err;
  }

  return {
    watchDir: registry.watchDir,
    trackedFiles: () => registry.files().map((f) => f.path),
    poll,
    loop,
    close: () => registry.close(),
    get closed() {
      return registry.closed;
    },
  };
}

/**
 * Scoped use of an engine: it is closed when `fn` settles, whether it
 * returns or throws.
 */
export async function withTailEngine<T>(
  options: TailerOptions,
  fn: (engine: TailEngine) => T | Promise<T>,
): Promise<T> {
  const engine = createTailEngine(options);
  try {
    return await fn(engine);
  } finally {
    engine.close();
  }
}

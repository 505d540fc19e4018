/**
 * Temp directory utilities for registry and tailer tests.
 * Creates disposable watch directories and provides write helpers.
 */

import { mkdtemp, rm, appendFile, writeFile } from "node:fs/promises";
import { realpathSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { Logger } from "../../config";

export interface TempDir {
  /** Canonical absolute path of the temp directory (symlinks resolved). */
  path: string;
  /** Absolute path of a file inside the directory. */
  file: (name: string) => string;
  /** Remove the directory and its contents. */
  cleanup: () => Promise<void>;
}

/** Create an empty temp directory. */
export async function createTempDir(): Promise<TempDir> {
  const dir = realpathSync(await mkdtemp(join(tmpdir(), "dirtail-test-")));
  return {
    path: dir,
    file: (name) => join(dir, name),
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

/** Replace a file's content (truncating it first). */
export async function writeText(path: string, text: string): Promise<void> {
  await writeFile(path, text);
}

/** Append raw text to a file (no automatic newline). */
export async function appendRaw(path: string, text: string): Promise<void> {
  await appendFile(path, text);
}

/** Append lines to a file (each terminated with \n). */
export async function appendLines(path: string, lines: string[]): Promise<void> {
  await appendFile(path, lines.map((l) => l + "\n").join(""));
}

export interface CapturingLogger extends Logger {
  messages: string[];
}

/** Logger that records messages instead of printing them. */
export function createCapturingLogger(): CapturingLogger {
  const messages: string[] = [];
  return {
    messages,
    info: (message) => messages.push(message),
    warn: (message) => messages.push(message),
  };
}

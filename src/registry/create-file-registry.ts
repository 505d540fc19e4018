import { closeSync, fstatSync, openSync, type Stats } from "node:fs";
import { join } from "node:path";
import { resolveWatchDir } from "../config";
import { ClosedError, isNotFound } from "../errors";
import { listMatchingFiles } from "./list-matching-files";
import type {
  FileRegistry,
  FileRegistryOptions,
  RefreshResult,
  WatchedFile,
} from "./types";

/**
 * Open `path` read-only and build a fresh entry at offset 0.
 * Returns null when the file vanished before it could be opened, or when
 * the name turns out not to lead to a regular file (dangling or dir symlink).
 */
function openWatchedFile(path: string, name: string): WatchedFile | null {
  let fd: number;
  try {
    fd = openSync(path, "r");
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }

  let stat: Stats;
  try {
    stat = fstatSync(fd);
  } catch (err) {
    closeSync(fd);
    throw err;
  }

  if (!stat.isFile()) {
    closeSync(fd);
    return null;
  }

  return {
    path,
    name,
    fd,
    ino: stat.ino,
    offset: 0,
    cursor: 0,
    pending: Buffer.alloc(0),
    overflow: false,
    size: stat.size,
  };
}

/**
 * Create the registry of open handles for one directory.
 * Throws NotADirectoryError if `watchDir` is not a directory. Starts empty;
 * call refresh() to populate it.
 */
export function createFileRegistry(options: FileRegistryOptions): FileRegistry {
  const watchDir = resolveWatchDir(options.watchDir);
  const { extensions, logger } = options;

  const entries = new Map<string, WatchedFile>();
  let closed = false;

  function assertOpen(): void {
    if (closed) throw new ClosedError();
  }

  function refresh(): RefreshResult {
    assertOpen();

    const names = listMatchingFiles(watchDir, extensions);
    const listed = new Map(names.map((name) => [join(watchDir, name), name]));

    const removed: string[] = [];
    for (const path of [...entries.keys()]) {
      if (listed.has(path)) continue;
      drop(path);
      removed.push(path);
      logger.info(`[file-registry] Unwatching ${path}`);
    }

    const added: string[] = [];
    for (const [path, name] of listed) {
      if (entries.has(path)) continue;
      const entry = openWatchedFile(path, name);
      if (entry === null) continue;
      entries.set(path, entry);
      added.push(path);
    }

    return { added, removed };
  }

  function drop(path: string): void {
    const entry = entries.get(path);
    if (!entry) return;
    entries.delete(path);
    closeSync(entry.fd);
  }

  function reopen(path: string): WatchedFile | null {
    assertOpen();

    const previous = entries.get(path);
    if (!previous) return null;

    const next = openWatchedFile(path, previous.name);
    if (next === null) {
      drop(path);
      return null;
    }

    entries.set(path, next);
    closeSync(previous.fd);
    return next;
  }

  function close(): void {
    if (closed) return;
    closed = true;

    // Attempt every handle; report the first failure once all are released.
    let firstError: unknown = null;
    for (const entry of entries.values()) {
      try {
        closeSync(entry.fd);
      } catch (err) {
        firstError ??= err;
      }
    }
    entries.clear();

    if (firstError !== null) throw firstError;
  }

  return {
    watchDir,
    refresh,
    get: (path) => entries.get(path),
    files: () => [...entries.values()],
    get size() {
      return entries.size;
    },
    drop,
    reopen,
    close,
    get closed() {
      return closed;
    },
  };
}

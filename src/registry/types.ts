import type { Logger } from "../config";

// ============================================================
// Watched File (one entry per tracked path)
// ============================================================

export interface WatchedFile {
  /** Absolute path; the identity key in the registry. */
  readonly path: string;
  /** File name relative to the watch directory. */
  readonly name: string;
  /** Open read-only file descriptor. */
  fd: number;
  /** Inode of the file behind `fd`, used to spot rename-and-recreate rotation. */
  ino: number;
  /** Bytes already delivered to the sink (end of the last complete line). */
  offset: number;
  /**
   * Bytes already read from the file. Equals `offset + pending.length`
   * unless `overflow` is set.
   */
  cursor: number;
  /**
   * Bytes read past the last newline, held until the line is completed.
   * Never longer than the engine's `maxSize`.
   */
  pending: Buffer;
  /**
   * Set while the held line has outgrown `maxSize`: `pending` keeps its
   * first `maxSize` bytes (or none, if its start was never read) and the
   * rest of the line is skipped up to the next newline.
   */
  overflow: boolean;
  /** File size observed on the last stat. */
  size: number;
}

// ============================================================
// Registry Options (input to createFileRegistry)
// ============================================================

export interface FileRegistryOptions {
  /** Canonical absolute path of the watched directory. */
  watchDir: string;
  /** Extensions to include, without the dot. Empty: all regular files. */
  extensions: ReadonlySet<string>;
  logger: Logger;
}

// ============================================================
// Refresh Result (returned by FileRegistry.refresh)
// ============================================================

export interface RefreshResult {
  /** Paths opened and inserted by this refresh. */
  added: string[];
  /** Paths closed and removed because they are no longer listed. */
  removed: string[];
}

// ============================================================
// File Registry (public interface returned by createFileRegistry)
// ============================================================

export interface FileRegistry {
  readonly watchDir: string;
  /** Reconcile tracked files with the current directory listing. */
  refresh: () => RefreshResult;
  /** Tracked entry for a path, if any. */
  get: (path: string) => WatchedFile | undefined;
  /** Snapshot of tracked entries; safe to iterate while dropping. */
  files: () => WatchedFile[];
  /** Number of tracked files. */
  readonly size: number;
  /** Close and forget one entry. No-op for unknown paths. */
  drop: (path: string) => void;
  /**
   * Replace the handle of a tracked path with a fresh one (offsets reset).
   * Returns null, and drops the entry, if the path no longer exists.
   */
  reopen: (path: string) => WatchedFile | null;
  /** Close every handle and clear the registry. Idempotent. */
  close: () => void;
  readonly closed: boolean;
}

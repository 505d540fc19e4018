// Public API
export { createTailEngine, withTailEngine, readTail, readAt, splitLines, decodeLine } from "./tailer";
export { createFileRegistry, listMatchingFiles, extensionOf } from "./registry";
export {
  parseTailerOptions,
  parseLoopOptions,
  TailerOptionsSchema,
  LoopOptionsSchema,
  DEFAULT_TAIL_LINES,
  DEFAULT_MAX_SIZE,
  DEFAULT_INTERVAL_MS,
} from "./config";
export {
  TailerError,
  ConfigurationError,
  NotADirectoryError,
  ClosedError,
  isNotFound,
  errnoCode,
} from "./errors";

// Types
export type { TailEngine, PollResult, TailResult, SplitResult } from "./tailer";
export type { FileRegistry, WatchedFile, RefreshResult } from "./registry";
export type {
  TailerOptions,
  LoopOptions,
  LineSink,
  LineCallback,
  Logger,
} from "./config";
export type { TailerErrorCode } from "./errors";

// Public API — config module
export type {
  LineSink,
  LineCallback,
  Logger,
  TailerOptions,
  ResolvedTailerOptions,
  LoopOptions,
} from "./types";
export type { ResolvedLoopOptions } from "./schema";
export {
  TailerOptionsSchema,
  LoopOptionsSchema,
  parseTailerOptions,
  parseLoopOptions,
  resolveWatchDir,
  DEFAULT_TAIL_LINES,
  DEFAULT_MAX_SIZE,
  DEFAULT_INTERVAL_MS,
} from "./schema";

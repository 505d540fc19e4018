// Public API — tailer module
export { createTailEngine, withTailEngine } from "./create-tail-engine";
export { readTail, readAt } from "./read-tail";
export { splitLines, decodeLine } from "./split-lines";

// Types
export type { TailEngine, PollResult } from "./types";
export type { TailResult } from "./read-tail";
export type { SplitResult } from "./split-lines";

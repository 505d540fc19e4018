import type { LoopOptions } from "../config";
import type { RefreshResult } from "../registry";

// ============================================================
// Poll Result (returned by TailEngine.poll)
// ============================================================

export interface PollResult extends RefreshResult {
  /** Lines delivered per path during this pass; paths with none are absent. */
  dispatched: Map<string, number>;
}

// ============================================================
// Tail Engine (public interface returned by createTailEngine)
// ============================================================

export interface TailEngine {
  /** Canonical absolute path of the watched directory. */
  readonly watchDir: string;
  /** Paths currently tracked. */
  trackedFiles: () => string[];
  /** One pass: refresh, then one bounded read-and-dispatch per tracked file. */
  poll: () => PollResult;
  /**
   * Run poll() every `intervalMs` until `signal` aborts, or exactly once
   * when `blocking` is false. Closes the engine if a tick throws.
   */
  loop: (options?: LoopOptions) => Promise<void>;
  /** Release every open handle. Idempotent. */
  close: () => void;
  readonly closed: boolean;
}

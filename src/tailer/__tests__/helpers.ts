/**
 * Sink utilities for tailer tests.
 */

import type { LineSink } from "../../config";

export interface DeliveredBatch {
  path: string;
  lines: string[];
}

export interface RecordingSink extends LineSink {
  /** Every batch in delivery order. */
  batches: DeliveredBatch[];
  /** All delivered lines for one path, flattened. */
  linesFor: (path: string) => string[];
  /** Forget what has been recorded so far. */
  reset: () => void;
}

/** Sink that records every batch it receives. */
export function createRecordingSink(): RecordingSink {
  const batches: DeliveredBatch[] = [];
  return {
    batches,
    accept(path, lines) {
      batches.push({ path, lines: [...lines] });
    },
    linesFor: (path) => batches.filter((b) => b.path === path).flatMap((b) => b.lines),
    reset: () => {
      batches.length = 0;
    },
  };
}

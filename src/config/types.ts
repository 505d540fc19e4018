// ============================================================
// Sink (where line batches are delivered)
// ============================================================

/** Receives complete lines read from one file during one read step. */
export interface LineSink {
  accept(path: string, lines: string[]): void;
}

/** Plain-function form of a sink; wrapped into a LineSink on construction. */
export type LineCallback = (path: string, lines: string[]) => void;

// ============================================================
// Logger
// ============================================================

/** Subset of Console the tailer writes lifecycle messages to. */
export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
}

// ============================================================
// Tailer Options (input to createTailEngine)
// ============================================================

export interface TailerOptions {
  /** Directory to monitor. Resolved to its canonical absolute path. */
  watchDir: string;
  /** Invoked synchronously with every non-empty batch of complete lines. */
  sink: LineSink | LineCallback;
  /** Extensions to include, without the dot ("log"). Empty or absent: all files. */
  extensions?: string[];
  /** Trailing lines delivered once per file at startup (default: 1). */
  tailLines?: number;
  /** Maximum bytes read from one file per poll tick (default: 1 MiB). */
  maxSize?: number;
  /** Lifecycle messages (default: console). */
  logger?: Logger;
}

/** Options after validation, defaults applied and watchDir resolved. */
export interface ResolvedTailerOptions {
  watchDir: string;
  sink: LineSink;
  extensions: ReadonlySet<string>;
  tailLines: number;
  maxSize: number;
  logger: Logger;
}

// ============================================================
// Loop Options (input to TailEngine.loop)
// ============================================================

export interface LoopOptions {
  /** Sleep between ticks in ms (default: 100). */
  intervalMs?: number;
  /** When false, run exactly one pass over every tracked file and return. */
  blocking?: boolean;
  /** Stops a blocking loop between ticks. */
  signal?: AbortSignal;
}

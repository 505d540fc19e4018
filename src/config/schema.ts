import { realpathSync, statSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { ConfigurationError, NotADirectoryError, errnoCode } from "../errors";
import type {
  LineCallback,
  LineSink,
  Logger,
  LoopOptions,
  ResolvedTailerOptions,
} from "./types";

export const DEFAULT_TAIL_LINES = 1;
export const DEFAULT_MAX_SIZE = 1_048_576;
export const DEFAULT_INTERVAL_MS = 100;

// ============================================================
// Schemas
// ============================================================

const SinkSchema = z.custom<LineSink | LineCallback>(
  (value) =>
    typeof value === "function" ||
    (typeof value === "object" &&
      value !== null &&
      "accept" in value &&
      typeof value.accept === "function"),
  { message: "sink must be a function or an object with an accept(path, lines) method" },
);

const LoggerSchema = z.custom<Logger>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    "info" in value &&
    "warn" in value &&
    typeof value.info === "function" &&
    typeof value.warn === "function",
  { message: "logger must provide info() and warn()" },
);

/** Extensions are compared without their leading dot: ".log" and "log" are the same. */
const ExtensionsSchema = z
  .array(z.string().min(1))
  .default([])
  .transform((exts) => new Set(exts.map((e) => (e.startsWith(".") ? e.slice(1) : e))));

export const TailerOptionsSchema = z.object({
  watchDir: z.string().min(1),
  sink: SinkSchema,
  extensions: ExtensionsSchema,
  tailLines: z.number().int().nonnegative().default(DEFAULT_TAIL_LINES),
  maxSize: z.number().int().positive().default(DEFAULT_MAX_SIZE),
  logger: LoggerSchema.optional(),
});

export const LoopOptionsSchema = z.object({
  intervalMs: z.number().nonnegative().finite().default(DEFAULT_INTERVAL_MS),
  blocking: z.boolean().default(true),
  signal: z.instanceof(AbortSignal).optional(),
});

export type ResolvedLoopOptions = z.output<typeof LoopOptionsSchema>;

// ============================================================
// Parsing
// ============================================================

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.join(".");
      return where ? `${where}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

function toSink(sink: LineSink | LineCallback): LineSink {
  if (typeof sink === "function") return { accept: sink };
  return sink;
}

/**
 * Resolve a watch directory to its canonical absolute path.
 * Throws NotADirectoryError when the path is missing or not a directory;
 * other filesystem errors (EACCES, ...) propagate unchanged.
 */
export function resolveWatchDir(dir: string): string {
  let real: string;
  try {
    real = realpathSync(resolve(dir));
  } catch (err) {
    if (isMissingPath(err)) throw new NotADirectoryError(dir, { cause: err });
    throw err;
  }
  if (!statSync(real).isDirectory()) throw new NotADirectoryError(dir);
  return real;
}

function isMissingPath(err: unknown): boolean {
  const code = errnoCode(err);
  return code === "ENOENT" || code === "ENOTDIR";
}

/**
 * Validate construction options, apply defaults and resolve the watch
 * directory. Throws ConfigurationError on any invalid field.
 */
export function parseTailerOptions(input: unknown): ResolvedTailerOptions {
  const result = TailerOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError("INVALID_OPTIONS", formatIssues(result.error), {
      cause: result.error,
    });
  }

  const options = result.data;
  return {
    watchDir: resolveWatchDir(options.watchDir),
    sink: toSink(options.sink),
    extensions: options.extensions,
    tailLines: options.tailLines,
    maxSize: options.maxSize,
    logger: options.logger ?? console,
  };
}

export function parseLoopOptions(input: LoopOptions = {}): ResolvedLoopOptions {
  const result = LoopOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError("INVALID_OPTIONS", formatIssues(result.error), {
      cause: result.error,
    });
  }
  return result.data;
}

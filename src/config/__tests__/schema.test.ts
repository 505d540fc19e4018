import { describe, expect, it, afterEach, vi } from "vitest";
import {
  parseTailerOptions,
  parseLoopOptions,
  resolveWatchDir,
  DEFAULT_MAX_SIZE,
  DEFAULT_TAIL_LINES,
} from "../schema";
import type { LineSink } from "../types";
import { ConfigurationError, NotADirectoryError } from "../../errors";
import {
  createTempDir,
  writeText,
  type TempDir,
} from "../../registry/__tests__/helpers";

describe("parseTailerOptions", () => {
  let tmp: TempDir | null = null;

  afterEach(async () => {
    if (tmp) await tmp.cleanup();
    tmp = null;
  });

  it("applies defaults", async () => {
    tmp = await createTempDir();

    const options = parseTailerOptions({ watchDir: tmp.path, sink: () => {} });

    expect(options.watchDir).toBe(tmp.path);
    expect(options.tailLines).toBe(DEFAULT_TAIL_LINES);
    expect(options.maxSize).toBe(DEFAULT_MAX_SIZE);
    expect(options.extensions.size).toBe(0);
    expect(options.logger).toBe(console);
  });

  it("accepts extensions with or without a leading dot", async () => {
    tmp = await createTempDir();

    const options = parseTailerOptions({
      watchDir: tmp.path,
      sink: () => {},
      extensions: [".log", "txt"],
    });

    expect([...options.extensions].sort()).toEqual(["log", "txt"]);
  });

  it("wraps a plain function into a sink", async () => {
    tmp = await createTempDir();
    const callback = vi.fn();

    const options = parseTailerOptions({ watchDir: tmp.path, sink: callback });
    options.sink.accept("/var/log/a.log", ["x=1"]);

    expect(callback).toHaveBeenCalledWith("/var/log/a.log", ["x=1"]);
  });

  it("keeps an object sink as given", async () => {
    tmp = await createTempDir();
    const sink: LineSink = { accept: () => {} };

    const options = parseTailerOptions({ watchDir: tmp.path, sink });

    expect(options.sink).toBe(sink);
  });

  it("rejects a sink that cannot be invoked", async () => {
    tmp = await createTempDir();

    expect(() => parseTailerOptions({ watchDir: tmp?.path, sink: "print" })).toThrow(
      "sink: sink must be a function or an object with an accept(path, lines) method",
    );
    expect(() => parseTailerOptions({ watchDir: tmp?.path, sink: { accept: 1 } })).toThrow(
      ConfigurationError,
    );
  });

  it("rejects negative tailLines and a zero maxSize", async () => {
    tmp = await createTempDir();

    expect(() =>
      parseTailerOptions({ watchDir: tmp?.path, sink: () => {}, tailLines: -1 }),
    ).toThrow(ConfigurationError);
    expect(() =>
      parseTailerOptions({ watchDir: tmp?.path, sink: () => {}, maxSize: 0 }),
    ).toThrow(ConfigurationError);
  });

  it("reports INVALID_OPTIONS for schema failures", () => {
    try {
      parseTailerOptions({ sink: () => {} });
      expect.unreachable("parseTailerOptions should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      expect(err).toMatchObject({ code: "INVALID_OPTIONS" });
    }
  });

  it("fails with NotADirectoryError for a missing directory", async () => {
    tmp = await createTempDir();

    expect(() =>
      parseTailerOptions({ watchDir: tmp?.file("missing"), sink: () => {} }),
    ).toThrow(NotADirectoryError);
  });
});

describe("resolveWatchDir", () => {
  let tmp: TempDir | null = null;

  afterEach(async () => {
    if (tmp) await tmp.cleanup();
    tmp = null;
  });

  it("resolves relative segments to the canonical path", async () => {
    tmp = await createTempDir();

    expect(resolveWatchDir(`${tmp.path}/./sub/..`)).toBe(tmp.path);
  });

  it("rejects a regular file with code NOT_A_DIRECTORY", async () => {
    tmp = await createTempDir();
    await writeText(tmp.file("a.log"), "");

    expect(() => resolveWatchDir(tmp?.file("a.log") ?? "")).toThrow(
      expect.objectContaining({ code: "NOT_A_DIRECTORY" }),
    );
  });
});

describe("parseLoopOptions", () => {
  it("defaults to a blocking 100ms loop", () => {
    expect(parseLoopOptions()).toEqual({ intervalMs: 100, blocking: true });
  });

  it("keeps the abort signal", () => {
    const controller = new AbortController();
    const options = parseLoopOptions({ signal: controller.signal, blocking: false });

    expect(options.signal).toBe(controller.signal);
    expect(options.blocking).toBe(false);
  });

  it("rejects a negative interval", () => {
    expect(() => parseLoopOptions({ intervalMs: -5 })).toThrow(ConfigurationError);
  });
});

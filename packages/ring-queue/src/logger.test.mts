import { beforeEach, describe, expect, it, vi } from "vitest";

import { createQueueLogger } from "./logger.mjs";

interface LogCall {
  level: string;
  message: unknown;
  meta: unknown;
}

const { constructed, calls } = vi.hoisted(() => {
  const constructed: unknown[] = [];
  const calls: LogCall[] = [];
  return { constructed, calls };
});

vi.mock("axe", () => {
  const record =
    (level: string) =>
    (message: unknown, meta?: unknown): Promise<void> => {
      calls.push({ level, message, meta });
      return Promise.resolve();
    };

  class FakeAxe {
    trace = record("trace");
    debug = record("debug");
    info = record("info");
    warn = record("warn");
    error = record("error");
    fatal = record("fatal");

    constructor(options: unknown) {
      constructed.push(options);
    }
  }

  return { default: FakeAxe };
});

describe("createQueueLogger", () => {
  beforeEach(() => {
    constructed.length = 0;
    calls.length = 0;
  });

  it("should default the level to info", () => {
    createQueueLogger();
    expect(constructed).toEqual([{ level: "info" }]);
  });

  it("should pass options through to axe", () => {
    createQueueLogger({ level: "debug", silent: true, name: "queue" });
    expect(constructed).toEqual([
      { level: "debug", silent: true, name: "queue" },
    ]);
  });

  it("should have all logger methods defined", () => {
    const logger = createQueueLogger();
    expect(logger.trace).toBeDefined();
    expect(logger.debug).toBeDefined();
    expect(logger.info).toBeDefined();
    expect(logger.warn).toBeDefined();
    expect(logger.error).toBeDefined();
    expect(logger.fatal).toBeDefined();
  });

  it("should forward each level with its meta", () => {
    const logger = createQueueLogger();

    logger.debug("Ring queue resized", { from: 1, to: 2, count: 1 });
    logger.warn("careful");

    expect(calls).toEqual([
      {
        level: "debug",
        message: "Ring queue resized",
        meta: { from: 1, to: 2, count: 1 },
      },
      { level: "warn", message: "careful", meta: undefined },
    ]);
  });

  it("should forward errors as the message", () => {
    const logger = createQueueLogger();
    const error = new Error("boom");

    logger.error(error);

    expect(calls).toEqual([{ level: "error", message: error, meta: undefined }]);
  });
});

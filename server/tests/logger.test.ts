import { afterEach, describe, expect, jest, test } from "@jest/globals";
import { formatLog, logError, shouldLog, type ContextLogger, type LogContext } from "../logger";

const TS = "2026-01-01T00:00:00.000Z";

describe("formatLog", () => {
  const originalEnv = process.env.NODE_ENV;

  afterEach(() => {
    process.env.NODE_ENV = originalEnv;
  });

  test("human-readable line outside production", () => {
    expect(formatLog("info", "Pricing run started", { runId: "r1", items: 3 }, TS)).toBe(
      '[2026-01-01T00:00:00.000Z] INFO Pricing run started {"runId":"r1","items":3}'
    );
    expect(formatLog("warn", "No context", {}, TS)).toBe("[2026-01-01T00:00:00.000Z] WARN No context");
  });

  test("JSON in production", () => {
    process.env.NODE_ENV = "production";
    expect(JSON.parse(formatLog("error", "failed", { stage: "match" }, TS))).toEqual({
      level: "error",
      msg: "failed",
      timestamp: TS,
      stage: "match",
    });
  });

  test("redacts sensitive keys at any depth", () => {
    const line = formatLog("info", "loaded", { apiKey: "test-secret", source: { password: "test-secret", path: "kb.json" } }, TS);
    expect(line).toBe('[2026-01-01T00:00:00.000Z] INFO loaded {"apiKey":"[REDACTED]","source":{"password":"[REDACTED]","path":"kb.json"}}');
  });
});

describe("shouldLog", () => {
  test("follows LOG_LEVEL", () => {
    // setup.ts sets LOG_LEVEL=error for the suite
    expect(shouldLog("warn")).toBe(false);
    expect(shouldLog("error")).toBe(true);
  });
});

describe("logError", () => {
  test("passes error details to the target logger", () => {
    const error = jest.fn<(message: string, context?: LogContext) => void>();
    const noop = () => undefined;
    const target: ContextLogger = { debug: noop, info: noop, warn: noop, error };

    logError(new TypeError("bad input"), { runId: "r1" }, target);
    logError("plain failure", {}, target);

    expect(error.mock.calls[0][0]).toBe("bad input");
    expect(error.mock.calls[0][1]).toMatchObject({ runId: "r1", error: { name: "TypeError", message: "bad input" } });
    expect(error.mock.calls[1]).toEqual(["Unknown error", { error: "plain failure" }]);
  });
});

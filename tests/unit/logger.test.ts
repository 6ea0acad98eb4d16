import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createLoggerFromEnv } from "../../src/bootstrap.js";
import type { Formatter } from "../../src/core/ports/formatter.js";
import { defaultFormatter } from "../../src/infrastructure/formatting/formatter.js";
import { createLogger, withRequestId } from "../../src/infrastructure/logging/logger.js";
import { FIXED_TIME } from "../helpers/records.js";

const decoder = new TextDecoder();

const buildFormatter = (json: boolean): Formatter => {
  const builder = defaultFormatter();
  if (json) builder.setJsonOutput();
  const result = builder.build();
  if (!result.ok) throw new Error(result.error.message);
  return result.value;
};

describe("Logger", () => {
  const stdout: string[] = [];
  const stderr: string[] = [];
  let originalStdout: typeof process.stdout.write;
  let originalStderr: typeof process.stderr.write;

  beforeEach(() => {
    stdout.length = 0;
    stderr.length = 0;
    originalStdout = process.stdout.write;
    originalStderr = process.stderr.write;

    process.stdout.write = (chunk: string | Uint8Array): boolean => {
      stdout.push(typeof chunk === "string" ? chunk : decoder.decode(chunk));
      return true;
    };
    process.stderr.write = (chunk: string | Uint8Array): boolean => {
      stderr.push(typeof chunk === "string" ? chunk : decoder.decode(chunk));
      return true;
    };
  });

  afterEach(() => {
    process.stdout.write = originalStdout;
    process.stderr.write = originalStderr;
  });

  it("writes templated text lines", () => {
    const logger = createLogger({ formatter: buildFormatter(false), now: () => FIXED_TIME });
    logger.info("started", { port: 8080 });
    expect(stdout).toEqual(["[2024-05-01T10:00:00Z] [ INFO] started | port = 8080\n"]);
  });

  it("json format outputs valid JSON lines", () => {
    const logger = createLogger({ formatter: buildFormatter(true), now: () => FIXED_TIME });
    logger.info("test message", { key: "value" });

    expect(stdout.length).toBe(1);
    const parsed = JSON.parse(stdout[0] ?? "");
    expect(parsed).toEqual({
      timestamp: "2024-05-01T10:00:00Z",
      level: "INFO",
      message: "[2024-05-01T10:00:00Z] [ INFO] test message",
      data: { key: "value" },
    });
  });

  it("child logger merges bindings", () => {
    const parent = createLogger({
      formatter: buildFormatter(false),
      bindings: { service: "api" },
      now: () => FIXED_TIME,
    });
    parent.child({ region: "eu" }).info("child log");
    expect(stdout).toEqual(["[2024-05-01T10:00:00Z] [ INFO] child log | region = eu | service = api\n"]);
  });

  it("withRequestId fills the id segment", () => {
    const logger = createLogger({ formatter: buildFormatter(false), now: () => FIXED_TIME });
    withRequestId(logger, "abc-123").info("handled");
    expect(stdout).toEqual(["[2024-05-01T10:00:00Z] [ INFO] [abc-123] handled\n"]);
  });

  it("respects log level filtering", () => {
    const logger = createLogger({ formatter: buildFormatter(false), level: "warn" });
    logger.trace("hidden");
    logger.debug("hidden");
    logger.info("hidden");
    expect(stdout.length).toBe(0);
    expect(stderr.length).toBe(0);
  });

  it("warn and above go to stderr", () => {
    const logger = createLogger({ formatter: buildFormatter(false), level: "trace", now: () => FIXED_TIME });
    logger.trace("t");
    logger.warn("w");
    logger.error("e");
    logger.fatal("f");
    logger.panic("p");
    expect(stdout).toEqual(["[2024-05-01T10:00:00Z] [TRACE] t\n"]);
    expect(stderr).toEqual([
      "[2024-05-01T10:00:00Z] [ WARN] w\n",
      "[2024-05-01T10:00:00Z] [ERROR] e\n",
      "[2024-05-01T10:00:00Z] [FATAL] f\n",
      "[2024-05-01T10:00:00Z] [PANIC] p\n",
    ]);
  });

  it("writes the partial line when JSON encoding fails", () => {
    const logger = createLogger({ formatter: buildFormatter(true), now: () => FIXED_TIME });
    logger.info("counted", { total: 5n });
    expect(stdout).toEqual([
      '{"timestamp":"2024-05-01T10:00:00Z","level":"INFO","message":"[2024-05-01T10:00:00Z] [ INFO] counted"}\n',
    ]);
  });

  it("createLoggerFromEnv wires config into the formatter", () => {
    const result = createLoggerFromEnv({ LOG_FORMAT: "json", LOG_LEVEL: "debug" });
    expect(result.ok).toBe(true);
    if (result.ok) {
      result.value.debug("from env");
      const parsed = JSON.parse(stdout[0] ?? "");
      expect(parsed.level).toBe("DEBUG");
      expect(parsed.message).toMatch(/\] \[DEBUG\] from env$/);
    }
  });

  it("createLoggerFromEnv reports invalid configuration", () => {
    const result = createLoggerFromEnv({ LOG_LEVEL: "loud" });
    expect(result.ok).toBe(false);
  });
});

import { strict as assert } from "node:assert";
import test from "node:test";

import { createLogger, isLogLevel, type LogLevel } from "../src/index.js";

interface Captured {
  readonly level: LogLevel;
  readonly entry: Record<string, unknown>;
}

const capture = (): { lines: Captured[]; write: (level: LogLevel, line: string) => void } => {
  const lines: Captured[] = [];
  return {
    lines,
    write: (level, line) => {
      lines.push({ level, entry: JSON.parse(line) });
    },
  };
};

test("createLogger returns a logger with the correct module name", () => {
  const logger = createLogger("test-module");
  assert.equal(logger.module, "test-module");
  assert.equal(logger.level, "info");
});

test("logger.log writes one JSON line with module, level and metadata", () => {
  const sink = capture();
  const logger = createLogger("stats", { write: sink.write });

  logger.log("info", "test computed", { analysisId: "a-123", groups: 5 });

  assert.equal(sink.lines.length, 1);
  const entry: Record<string, unknown> = sink.lines[0]?.entry ?? {};
  assert.equal(entry.level, "info");
  assert.equal(entry.module, "stats");
  assert.equal(entry.msg, "test computed");
  assert.equal(entry.analysisId, "a-123");
  assert.equal(entry.groups, 5);
  assert.ok(typeof entry.ts === "string" && new Date(entry.ts).getTime() > 0);
});

test("logger drops entries below the configured level", () => {
  const sink = capture();
  const logger = createLogger("cli", { level: "warn", write: sink.write });

  logger.debug("hidden");
  logger.info("hidden");
  logger.warn("shown");
  logger.error("shown too");

  assert.deepEqual(
    sink.lines.map((line) => line.level),
    ["warn", "error"],
  );
});

test("logger debug level lets every entry through", () => {
  const sink = capture();
  const logger = createLogger("cli", { level: "debug", write: sink.write });

  logger.debug("a");
  logger.info("b");

  assert.deepEqual(
    sink.lines.map((line) => line.entry.msg),
    ["a", "b"],
  );
});

test("logger excludes analysisId when not a string", () => {
  const sink = capture();
  const logger = createLogger("cli", { write: sink.write });

  logger.info("message", { analysisId: 123 as unknown as string });

  assert.equal(Object.keys(sink.lines[0]?.entry ?? {}).includes("analysisId"), false);
});

test("default writer sends errors to stderr", (t) => {
  const logger = createLogger("error-test");
  const logs: string[] = [];

  const originalWrite = process.stderr.write.bind(process.stderr);
  process.stderr.write = (chunk: string | Uint8Array): boolean => {
    logs.push(chunk.toString());
    return true;
  };

  t.after(() => {
    process.stderr.write = originalWrite;
  });

  logger.error("error message");

  const parsed = JSON.parse(logs[0] ?? "{}");
  assert.equal(parsed.level, "error");
  assert.equal(parsed.msg, "error message");
});

test("isLogLevel accepts only known levels", () => {
  assert.equal(isLogLevel("debug"), true);
  assert.equal(isLogLevel("error"), true);
  assert.equal(isLogLevel("verbose"), false);
  assert.equal(isLogLevel(undefined), false);
});

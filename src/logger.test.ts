import assert from "node:assert/strict";
import { afterEach, describe, it, mock } from "node:test";
import { createLogger, formatLogLine } from "./logger.js";

describe("formatLogLine", () => {
  it("prefixes a timestamp and level and appends data as JSON", () => {
    const line = formatLogLine("warn", "Skipping file", { file: "a.py" });
    assert.match(line, /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[WARN\] Skipping file \{"file":"a\.py"\}$/);
  });

  it("omits empty data", () => {
    assert.match(formatLogLine("info", "Done", {}), /\[INFO\] Done$/);
  });
});

describe("createLogger", () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it("drops entries below the configured level", () => {
    const errorSpy = mock.method(console, "error", () => undefined);
    const logger = createLogger("warn");

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");
    logger.error("shown too");

    assert.equal(errorSpy.mock.callCount(), 2);
    assert.match(String(errorSpy.mock.calls[0]?.arguments[0]), /\[WARN\] shown$/);
    assert.match(String(errorSpy.mock.calls[1]?.arguments[0]), /\[ERROR\] shown too$/);
  });

  it("writes nothing when silent", () => {
    const errorSpy = mock.method(console, "error", () => undefined);
    createLogger("silent").error("nothing");
    assert.equal(errorSpy.mock.callCount(), 0);
  });
});

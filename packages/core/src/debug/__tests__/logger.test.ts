import { assert, describe, test } from "@trellis-ui/testkit";
import { type LogRecordLevel, createLogger, debugAssert, isLogLevel } from "../logger.js";

function capture(level: Parameters<typeof createLogger>[1]) {
  const lines: string[] = [];
  const logger = createLogger("win", level, (recordLevel: LogRecordLevel, scope, message) => {
    lines.push(`${recordLevel} [${scope}] ${message}`);
  });
  return { logger, lines };
}

describe("createLogger", () => {
  test("forwards records at or above the level", () => {
    const { logger, lines } = capture("info");
    logger.trace("t");
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");
    assert.deepEqual(lines, ["info [win] i", "warn [win] w", "error [win] e"]);
    assert.equal(logger.scope, "win");
  });

  test("silent drops everything", () => {
    const { logger, lines } = capture("silent");
    logger.error("e");
    assert.deepEqual(lines, []);
  });

  test("isLogLevel accepts only known levels", () => {
    assert.equal(isLogLevel("trace"), true);
    assert.equal(isLogLevel("silent"), true);
    assert.equal(isLogLevel("verbose"), false);
    assert.equal(isLogLevel(3), false);
  });
});

describe("debugAssert", () => {
  test("logs a failed condition at error level and never throws", () => {
    const { logger, lines } = capture("trace");
    debugAssert(logger, true, "fine");
    debugAssert(logger, false, "broken");
    assert.deepEqual(lines, ["error [win] assertion failed: broken"]);
  });
});

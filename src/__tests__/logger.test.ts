import assert from "node:assert/strict";
import test from "node:test";
import { type LogLevel, makeLogger } from "../logger.js";

test("makeLogger drops messages below the configured level", () => {
  const seen: Array<[LogLevel, string]> = [];
  const logger = makeLogger("warn", (line, level) => seen.push([level, line]));

  logger.debug("d");
  logger.info("i");
  logger.warn("w");
  logger.error("e", { stage: "translate" });

  assert.deepEqual(
    seen.map(([level]) => level),
    ["warn", "error"],
  );
  assert.match(seen[0]?.[1] ?? "", /^\[\d{4}-\d{2}-\d{2}T[^\]]+\] WARN w$/);
  assert.match(seen[1]?.[1] ?? "", / ERROR e \{"stage":"translate"\}$/);
});

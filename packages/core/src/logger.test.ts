import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { logger, type LogEntry } from "./logger.js";
import { ValidationError } from "./errors.js";

describe("logger", () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    logger.setHandlers([(entry) => entries.push(entry)]);
    logger.setLevel("debug");
  });

  afterEach(() => {
    logger.resetHandlers();
    logger.setLevel("error");
  });

  it("filters entries below the current level", () => {
    logger.setLevel("warn");
    logger.info("hidden");
    logger.warn("shown");
    expect(entries.map((e) => e.message)).toEqual(["shown"]);
  });

  it("merges child context over base context", () => {
    const log = logger.child({ component: "aggregator", questionId: "q1" });
    log.child({ depth: 1 }).info("combined", { questionId: "q2" });

    expect(entries).toHaveLength(1);
    expect(entries[0].context).toEqual({ component: "aggregator", questionId: "q2", depth: 1 });
  });

  it("records error name, message and code", () => {
    logger.error("failed", new ValidationError("bad input"), { subQuestionId: "s1" });

    expect(entries[0].level).toBe("error");
    expect(entries[0].error).toMatchObject({
      name: "ValidationError",
      message: "bad input",
      code: "VALIDATION_ERROR",
    });
  });

  it("omits empty context", () => {
    logger.info("bare", {});
    expect(entries[0].context).toBeUndefined();
  });

  it("emits metrics as info entries", () => {
    logger.metric("subforecasts.ok", 3, { questionId: "q1" });
    expect(entries[0]).toMatchObject({
      level: "info",
      message: "METRIC: subforecasts.ok=3",
      context: { questionId: "q1", metric: "subforecasts.ok", value: 3 },
    });
  });

  it("switches output format", () => {
    logger.setFormat("json");
    expect(logger.getFormat()).toBe("json");
    logger.setFormat("pretty");
    expect(logger.getFormat()).toBe("pretty");
  });
});

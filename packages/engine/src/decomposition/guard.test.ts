import { describe, it, expect } from "vitest";
import { RecursionLimitExceededError, ValidationError } from "@forecast-synthesis/core";
import { RecursionGuard } from "./guard.js";

describe("RecursionGuard", () => {
  it("starts at depth zero", () => {
    const guard = RecursionGuard.root(2);
    expect(guard.currentDepth).toBe(0);
    expect(guard.maxDepth).toBe(2);
    expect(guard.canDescend()).toBe(true);
  });

  it("descends without touching the receiver", () => {
    const root = RecursionGuard.root(2);
    const child = root.descend();
    expect(child.currentDepth).toBe(1);
    expect(root.currentDepth).toBe(0);
    expect(Object.isFrozen(child)).toBe(true);
  });

  it("stops at the max depth", () => {
    const leaf = RecursionGuard.root(2).descend().descend();
    expect(leaf.canDescend()).toBe(false);
    expect(() => leaf.assertCanDescend({ questionId: "q" })).toThrow(RecursionLimitExceededError);
  });

  it("never descends with a zero budget", () => {
    expect(RecursionGuard.root(0).canDescend()).toBe(false);
  });

  it("rejects negative or fractional depths", () => {
    expect(() => new RecursionGuard(-1, 2)).toThrow(ValidationError);
    expect(() => new RecursionGuard(0, 1.5)).toThrow(ValidationError);
  });
});

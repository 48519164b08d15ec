import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { logger, ValidationError, type LogEntry } from "@forecast-synthesis/core";
import { createBounds } from "./bounds.js";
import { isValidCdf, maxStepFor } from "./cdf.js";
import { percentilesToCdf, synthesize } from "./synthesizer.js";

const closed = createBounds({ lower: 0, upper: 100 });

const estimates = [
  { percentile: 0.1, value: 20 },
  { percentile: 0.5, value: 50 },
  { percentile: 0.9, value: 80 },
];

describe("synthesize", () => {
  it("builds a submittable CDF for a closed range", () => {
    const cdf = synthesize(estimates, closed);

    expect(cdf.values).toHaveLength(201);
    expect(cdf.outcomeCount).toBe(201);
    expect(cdf.values[0]).toBe(0.001);
    expect(cdf.values[200]).toBe(0.999);
    expect(cdf.values[100]).toBeCloseTo(0.5, 6);
    expect(cdf.minGap).toBeCloseTo(0.00005, 12);
    expect(cdf.degraded).toBe(false);
    expect(isValidCdf(cdf.values, cdf.minGap)).toBe(true);
  });

  it("keeps the minimum gap in the flat tails", () => {
    const cdf = synthesize(estimates, closed);
    // Raw mass is zero below 12.5 and complete above 87.5
    for (const i of [1, 10, 25, 180, 199]) {
      expect(cdf.values[i] - cdf.values[i - 1]).toBeCloseTo(cdf.minGap, 12);
    }
  });

  it("interpolates on the log of the value for log-scaled questions", () => {
    const bounds = createBounds({ lower: 1, upper: 1000, logScale: true });
    const cdf = synthesize(
      [
        { percentile: 0.1, value: 5 },
        { percentile: 0.5, value: Math.sqrt(1000) },
        { percentile: 0.9, value: 200 },
      ],
      bounds
    );

    expect(cdf.values[0]).toBe(0.001);
    expect(cdf.values[200]).toBe(0.999);
    // The geometric midpoint of [1, 1000] sits at the middle position
    expect(cdf.values[100]).toBeCloseTo(0.5, 3);
    expect(isValidCdf(cdf.values, cdf.minGap)).toBe(true);
  });

  it("keeps tail mass past open bounds", () => {
    const bounds = createBounds({ lower: 0, upper: 100, lowerOpen: true, upperOpen: true });
    const cdf = synthesize(
      [
        { percentile: 0.05, value: 2 },
        { percentile: 0.5, value: 50 },
        { percentile: 0.95, value: 98 },
      ],
      bounds
    );

    expect(cdf.values[0]).toBeCloseTo(0.03125, 10);
    expect(cdf.values[200]).toBeCloseTo(0.96875, 10);
    expect(cdf.degraded).toBe(false);
    expect(isValidCdf(cdf.values, cdf.minGap)).toBe(true);
  });

  it("spreads a spike so no step exceeds the mass cap", () => {
    const cdf = synthesize(
      [
        { percentile: 0.1, value: 49.9 },
        { percentile: 0.5, value: 50 },
        { percentile: 0.9, value: 50.1 },
      ],
      closed
    );
    const steps = cdf.values.slice(1).map((v, i) => v - cdf.values[i]);

    expect(cdf.degraded).toBe(false);
    expect(Math.max(...steps)).toBeCloseTo(maxStepFor(201, 0.2), 12);
    expect(isValidCdf(cdf.values, cdf.minGap, maxStepFor(201, 0.2))).toBe(true);
    expect(cdf.values[0]).toBe(0.001);
    expect(cdf.values[200]).toBe(0.999);
  });

  describe.each([
    {
      name: "asymmetric closed range",
      bounds: { lower: 0, upper: 100 },
      estimates: [
        { percentile: 0.1, value: 5 },
        { percentile: 0.5, value: 15 },
        { percentile: 0.9, value: 70 },
      ],
    },
    {
      name: "log scale",
      bounds: { lower: 1, upper: 1000, logScale: true },
      estimates: [
        { percentile: 0.1, value: 2 },
        { percentile: 0.5, value: 20 },
        { percentile: 0.9, value: 500 },
      ],
    },
    {
      name: "open upper side",
      bounds: { lower: 0, upper: 100, upperOpen: true },
      estimates: [
        { percentile: 0.1, value: 10 },
        { percentile: 0.5, value: 60 },
        { percentile: 0.9, value: 110 },
      ],
    },
    {
      name: "open lower side",
      bounds: { lower: 0, upper: 100, lowerOpen: true },
      estimates: [
        { percentile: 0.05, value: -5 },
        { percentile: 0.5, value: 30 },
        { percentile: 0.95, value: 90 },
      ],
    },
    {
      name: "five outcomes",
      bounds: { lower: 0, upper: 10, outcomeCount: 5 },
      estimates: [
        { percentile: 0.25, value: 3 },
        { percentile: 0.75, value: 7 },
      ],
    },
    {
      name: "three outcomes",
      bounds: { lower: 0, upper: 10, outcomeCount: 3 },
      estimates: [
        { percentile: 0.25, value: 3 },
        { percentile: 0.75, value: 7 },
      ],
    },
  ])("on $name", ({ bounds: input, estimates: sweepEstimates }) => {
    const bounds = createBounds(input);
    const cdf = synthesize(sweepEstimates, bounds);
    const n = bounds.outcomeCount;

    it("has one value per outcome", () => {
      expect(cdf.values).toHaveLength(n);
      expect(cdf.outcomeCount).toBe(n);
      expect(cdf.degraded).toBe(false);
    });

    it("keeps the gap and the step cap", () => {
      expect(isValidCdf(cdf.values, cdf.minGap, maxStepFor(n, 0.2))).toBe(true);
    });

    it("stays within the endpoint floor and ceiling", () => {
      expect(cdf.values[0]).toBeGreaterThanOrEqual(0.001);
      expect(cdf.values[n - 1]).toBeLessThanOrEqual(0.999);
      if (!bounds.lowerOpen) expect(cdf.values[0]).toBe(0.001);
      if (!bounds.upperOpen) expect(cdf.values[n - 1]).toBe(0.999);
    });
  });

  it("honours a custom outcome count", () => {
    const cdf = synthesize(estimates, createBounds({ lower: 0, upper: 100, outcomeCount: 11 }));
    expect(cdf.values).toHaveLength(11);
    expect(cdf.values[5]).toBeCloseTo(0.5, 6);
  });

  describe("validation", () => {
    it("needs at least two estimates", () => {
      expect(() => synthesize([{ percentile: 0.5, value: 50 }], closed)).toThrow(ValidationError);
    });

    it("rejects percentiles outside (0, 1)", () => {
      expect(() =>
        synthesize(
          [
            { percentile: 0, value: 10 },
            { percentile: 0.5, value: 50 },
          ],
          closed
        )
      ).toThrow(ValidationError);
    });

    it("rejects percentiles that do not increase", () => {
      expect(() =>
        synthesize(
          [
            { percentile: 0.5, value: 10 },
            { percentile: 0.5, value: 50 },
          ],
          closed
        )
      ).toThrow("Percentiles must be strictly increasing");
    });

    it("rejects values that do not increase", () => {
      expect(() =>
        synthesize(
          [
            { percentile: 0.2, value: 50 },
            { percentile: 0.8, value: 40 },
          ],
          closed
        )
      ).toThrow("Values must be strictly increasing");
    });

    it("rejects values outside a closed bound", () => {
      expect(() =>
        synthesize(
          [
            { percentile: 0.2, value: 50 },
            { percentile: 0.8, value: 120 },
          ],
          closed
        )
      ).toThrow("Value lies above the closed upper bound");
    });

    it("rejects percentiles closer than the minimum spacing", () => {
      expect(() =>
        synthesize(
          [
            { percentile: 0.5, value: 40 },
            { percentile: 0.50001, value: 60 },
          ],
          closed
        )
      ).toThrow("Percentiles are too close together");
    });

    it("rejects estimates that all miss the range", () => {
      const open = createBounds({ lower: 0, upper: 100, lowerOpen: true, upperOpen: true });
      expect(() =>
        synthesize(
          [
            { percentile: 0.2, value: 130 },
            { percentile: 0.8, value: 140 },
          ],
          open
        )
      ).toThrow("No estimate lies near the question range");
    });

    it("rejects an estimate far outside the range", () => {
      const open = createBounds({ lower: 0, upper: 100, lowerOpen: true, upperOpen: true });
      expect(() =>
        synthesize(
          [
            { percentile: 0.2, value: 50 },
            { percentile: 0.8, value: 350 },
          ],
          open
        )
      ).toThrow("Estimate lies far outside the question range");
    });

    it("rejects non-positive values on a log scale", () => {
      const bounds = createBounds({ upper: 100, lowerOpen: true, logScale: true });
      expect(() =>
        synthesize(
          [
            { percentile: 0.2, value: -1 },
            { percentile: 0.8, value: 40 },
          ],
          bounds
        )
      ).toThrow("Log-scaled values must be positive");
    });
  });

  describe("degraded fallback", () => {
    let entries: LogEntry[];

    beforeEach(() => {
      entries = [];
      logger.setHandlers([(entry) => entries.push(entry)]);
      logger.setLevel("warn");
    });

    afterEach(() => {
      logger.resetHandlers();
      logger.setLevel("error");
    });

    it("returns a uniform CDF when all mass falls outside the range", () => {
      const bounds = createBounds({ lower: 0, upper: 10, lowerOpen: true, upperOpen: true });
      // The lower tail ends at 10.3125, past the upper bound
      const cdf = synthesize(
        [
          { percentile: 0.1, value: 12.5 },
          { percentile: 0.9, value: 30 },
        ],
        bounds,
        { context: { questionId: "q-far" } }
      );

      expect(cdf.degraded).toBe(true);
      expect(cdf.values).toHaveLength(201);
      expect(cdf.values[0]).toBeCloseTo(0.001, 12);
      expect(cdf.values[100]).toBeCloseTo(0.5, 12);
      expect(cdf.values[200]).toBe(0.999);
      expect(entries).toHaveLength(1);
      expect(entries[0].message).toBe("Synthesis failed numerically, using uniform fallback");
      expect(entries[0].context).toMatchObject({ component: "synthesizer", questionId: "q-far" });
    });
  });
});

describe("percentilesToCdf", () => {
  it("reads percent keys", () => {
    const fromRecord = percentilesToCdf({ 90: 80, 10: 20, 50: 50 }, closed);
    expect(fromRecord.values).toEqual(synthesize(estimates, closed).values);
  });
});

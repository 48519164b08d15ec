import { describe, it, expect } from "vitest";
import { ValidationError } from "@forecast-synthesis/core";
import { createBounds } from "./bounds.js";
import { isValidCdf } from "./cdf.js";
import { synthesizeMixture } from "./mixture.js";
import { synthesize } from "./synthesizer.js";

const bounds = createBounds({ lower: 0, upper: 100 });

const base = [
  { percentile: 0.1, value: 20 },
  { percentile: 0.5, value: 50 },
  { percentile: 0.9, value: 80 },
];

const upside = [
  { percentile: 0.1, value: 50 },
  { percentile: 0.5, value: 70 },
  { percentile: 0.9, value: 90 },
];

describe("synthesizeMixture", () => {
  it("reproduces a single scenario when all scenarios agree", () => {
    const mixed = synthesizeMixture(
      [
        { name: "a", weight: 2, estimates: base },
        { name: "b", weight: 2, estimates: base },
      ],
      bounds
    );
    expect(mixed.values).toEqual(synthesize(base, bounds).values);
  });

  it("weights scenarios by their normalized weight", () => {
    const mixed = synthesizeMixture(
      [
        { name: "base", weight: 3, estimates: base },
        { name: "upside", weight: 1, estimates: upside },
      ],
      bounds
    );
    const baseCdf = synthesize(base, bounds);
    const upsideCdf = synthesize(upside, bounds);

    expect(mixed.values).toHaveLength(201);
    expect(mixed.values[0]).toBeCloseTo(0.001, 12);
    expect(mixed.values[200]).toBeCloseTo(0.999, 12);
    expect(mixed.values[100]).toBeCloseTo(
      0.75 * baseCdf.values[100] + 0.25 * upsideCdf.values[100],
      10
    );
    expect(isValidCdf(mixed.values, mixed.minGap)).toBe(true);
    expect(mixed.degraded).toBe(false);
  });

  it("is degraded when any scenario fell back", () => {
    const open = createBounds({ lower: 0, upper: 10, lowerOpen: true, upperOpen: true });
    const mixed = synthesizeMixture(
      [
        {
          name: "far",
          weight: 1,
          estimates: [
            { percentile: 0.1, value: 12.5 },
            { percentile: 0.9, value: 30 },
          ],
        },
        {
          name: "near",
          weight: 1,
          estimates: [
            { percentile: 0.1, value: 2 },
            { percentile: 0.5, value: 5 },
            { percentile: 0.9, value: 8 },
          ],
        },
      ],
      open
    );

    expect(mixed.degraded).toBe(true);
    expect(isValidCdf(mixed.values, mixed.minGap)).toBe(true);
  });

  it("needs at least one scenario", () => {
    expect(() => synthesizeMixture([], bounds)).toThrow(ValidationError);
  });

  it("rejects weights that sum to zero", () => {
    expect(() =>
      synthesizeMixture([{ name: "a", weight: 0, estimates: base }], bounds)
    ).toThrow("Scenario weights must have a positive total");
  });
});

import { describe, it, expect } from "vitest";
import { AggregationError, ConfigError, logger } from "@forecast-synthesis/core";
import { ForecastEngine } from "./engine.js";
import type { DecompositionRequest } from "./types.js";

const request: DecompositionRequest = {
  questionId: "will-it-ship",
  subQuestions: [
    { id: "funding", kind: "binary", weight: 1 },
    { id: "staffing", kind: "binary", weight: 1 },
    { id: "approval", kind: "binary", weight: 2 },
  ],
};

describe("ForecastEngine", () => {
  it("applies its outcome count when bounds leave it out", () => {
    const engine = new ForecastEngine({ outcomeCount: 21 });
    const cdf = engine.synthesize(
      [
        { percentile: 0.1, value: 20 },
        { percentile: 0.5, value: 50 },
        { percentile: 0.9, value: 80 },
      ],
      { lower: 0, upper: 100 }
    );

    expect(cdf.values).toHaveLength(21);
    expect(cdf.minGap).toBeCloseTo(0.0005, 12);
    expect(cdf.values[10]).toBeCloseTo(0.5, 6);
  });

  it("uses its endpoint policy", () => {
    const engine = new ForecastEngine({ endpointFloor: 0.01, endpointCeiling: 0.99 });
    const cdf = engine.synthesize(
      [
        { percentile: 0.25, value: 3 },
        { percentile: 0.75, value: 7 },
      ],
      { lower: 0, upper: 10 }
    );

    expect(cdf.values[0]).toBe(0.01);
    expect(cdf.values[cdf.values.length - 1]).toBe(0.99);
  });

  it("gives numeric sub-questions its outcome count", async () => {
    const engine = new ForecastEngine({ outcomeCount: 21 });
    const { forecast, results } = await engine.forecastByDecomposition(
      {
        questionId: "release-size",
        subQuestions: [
          { id: "low", kind: "numeric", bounds: { lower: 0, upper: 100 } },
          { id: "high", kind: "numeric", bounds: { lower: 0, upper: 100 } },
        ],
      },
      engine.rootGuard(),
      async (sq) => {
        if (sq.bounds === null) throw new Error("expected bounds");
        const median = sq.id === "low" ? 40 : 60;
        return {
          kind: "numeric",
          cdf: engine.synthesize(
            [
              { percentile: 0.1, value: median - 20 },
              { percentile: 0.5, value: median },
              { percentile: 0.9, value: median + 20 },
            ],
            sq.bounds
          ),
        };
      },
      "numeric"
    );

    expect(results.map((r) => r.status)).toEqual(["ok", "ok"]);
    if (forecast.kind !== "numeric") throw new Error("expected numeric");
    expect(forecast.cdf.values).toHaveLength(21);
    expect(forecast.degraded).toBe(false);
  });

  it("starts root guards at its max depth", () => {
    const guard = new ForecastEngine({ maxDepth: 3 }).rootGuard();
    expect(guard.currentDepth).toBe(0);
    expect(guard.maxDepth).toBe(3);
  });

  it("forecasts by decomposition with weights and a failed unit", async () => {
    const engine = new ForecastEngine({ maxConcurrent: 2, unitTimeoutMs: 1000 });
    const probabilities: Record<string, number> = { funding: 0.8, approval: 0.5 };

    const { forecast, results } = await engine.forecastByDecomposition(
      request,
      engine.rootGuard(),
      async (sq) => {
        if (sq.id === "staffing") throw new Error("no answer");
        return { kind: "binary", probability: probabilities[sq.id] };
      },
      "binary"
    );

    expect(results.map((r) => r.status)).toEqual(["ok", "failed", "ok"]);
    if (forecast.kind !== "binary") throw new Error("expected binary");
    // funding 1/3, approval 2/3
    expect(forecast.probability).toBeCloseTo(0.6, 12);
    expect(forecast.meta.excluded).toEqual([{ subQuestionId: "staffing", status: "failed" }]);
  });

  it("raises AggregationError when every unit fails", async () => {
    const engine = new ForecastEngine();
    await expect(
      engine.forecastByDecomposition(
        request,
        engine.rootGuard(),
        async () => {
          throw new Error("offline");
        },
        "binary"
      )
    ).rejects.toBeInstanceOf(AggregationError);
  });

  it("loads from the environment and applies log settings", () => {
    try {
      const engine = ForecastEngine.fromEnv({
        LOG_LEVEL: "warn",
        LOG_FORMAT: "json",
        FORECAST_MAX_DEPTH: "1",
      });
      expect(engine.config.maxDepth).toBe(1);
      expect(logger.getLevel()).toBe("warn");
      expect(logger.getFormat()).toBe("json");
    } finally {
      logger.setLevel("error");
      logger.setFormat("pretty");
    }
  });

  it("rejects invalid configuration", () => {
    expect(() => new ForecastEngine({ maxConcurrent: 0 })).toThrow(ConfigError);
  });
});

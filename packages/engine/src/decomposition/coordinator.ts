/**
 * Decomposition Coordinator
 * Runs the sub-questions of one decomposition step on a bounded pool and
 * collects one PartialResult per sub-question, in request order.
 *
 * Each unit gets its own timeout. A failing or slow unit never blocks its
 * siblings. Cancelling the parent aborts every outstanding unit; units that
 * settle within the grace period still report, the rest resolve as cancelled.
 */

import {
  CancelledError,
  logger,
  RecursionLimitExceededError,
  TimeoutError,
  ValidationError,
  type ChildLogger,
} from "@forecast-synthesis/core";
import { z } from "zod";
import { DEFAULT_CDF_POLICY, DEFAULT_OUTCOME_COUNT } from "../config.js";
import { createBounds } from "../distribution/bounds.js";
import {
  createContinuousCdf,
  isValidCdf,
  maxStepFor,
  minGapFor,
} from "../distribution/cdf.js";
import {
  DecompositionRequestSchema,
  ForecastValueSchema,
  describeIssues,
} from "../schemas.js";
import type {
  CdfPolicy,
  DecompositionRequest,
  ErrorKind,
  ForecastValue,
  PartialResult,
  PartialResultError,
  SubQuestion,
} from "../types.js";
import { RecursionGuard } from "./guard.js";
import { WorkerPool } from "./worker-pool.js";

// ============================================
// TYPES
// ============================================

export interface CoordinatorConfig {
  /** Worker pool size: sub-questions running at once in one step */
  maxConcurrent: number;
  /** Time allowed for each sub-question */
  unitTimeoutMs: number;
  /** How long a cancelled unit may keep running before it is abandoned */
  cancelGraceMs: number;
  /** CDF length for numeric sub-questions whose bounds leave it out */
  outcomeCount?: number;
  /** Gap and step cap that numeric sub-forecasts must meet */
  cdfPolicy?: CdfPolicy;
}

export interface SpawnContext {
  /** Aborted on unit timeout or parent cancellation */
  signal: AbortSignal;
  /** Guard for decompositions started from inside this unit */
  guard: RecursionGuard;
  parentQuestionId: string;
}

/**
 * Produces the forecast for one sub-question. May recurse through `decompose`
 * with `context.guard`. Rejecting with TimeoutError marks the unit timed out.
 */
export type SpawnFn = (subQuestion: SubQuestion, context: SpawnContext) => Promise<ForecastValue>;

export interface DecomposeOptions {
  /** Parent cancellation */
  signal?: AbortSignal;
}

// Categorical probabilities must sum to 1 within this
const CATEGORICAL_TOLERANCE = 1e-6;

const CoordinatorConfigSchema = z.object({
  maxConcurrent: z.number().int().min(1),
  unitTimeoutMs: z.number().int().positive(),
  cancelGraceMs: z.number().int().min(0),
  outcomeCount: z.number().int().min(2).default(DEFAULT_OUTCOME_COUNT),
  cdfPolicy: z
    .object({
      minGapFraction: z.number().min(0).max(1),
      tailOvershootFraction: z.number().min(0).max(1),
      endpointFloor: z.number().gt(0).lt(0.5),
      endpointCeiling: z.number().gt(0.5).lt(1),
      maxStepFraction: z.number().gt(0).max(1),
    })
    .default(DEFAULT_CDF_POLICY),
});

type ResolvedCoordinatorConfig = z.infer<typeof CoordinatorConfigSchema>;

// ============================================
// COORDINATOR
// ============================================

export class DecompositionCoordinator {
  private readonly config: ResolvedCoordinatorConfig;
  private readonly log = logger.child({ component: "coordinator" });

  constructor(config: CoordinatorConfig) {
    const parsed = CoordinatorConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new ValidationError(`Invalid coordinator config: ${describeIssues(parsed.error)}`, {
        field: "config",
      });
    }
    this.config = Object.freeze({ ...parsed.data });
  }

  /**
   * Forecast every sub-question of `request` through `spawn`.
   *
   * Throws RecursionLimitExceededError (before anything is scheduled) when the
   * guard's depth budget is spent, and ValidationError for a malformed request.
   */
  async decompose(
    request: DecompositionRequest,
    guard: RecursionGuard,
    spawn: SpawnFn,
    options: DecomposeOptions = {}
  ): Promise<PartialResult[]> {
    if (!guard.canDescend()) {
      this.log.warn("Decomposition rejected at depth limit", {
        questionId: request.questionId,
        depth: guard.currentDepth,
        maxDepth: guard.maxDepth,
      });
    }
    guard.assertCanDescend({ questionId: request.questionId });

    const childGuard = guard.descend();
    const subQuestions = this.prepare(request, childGuard.currentDepth);
    const pool = new WorkerPool(this.config.maxConcurrent);
    const log = this.log.child({ questionId: request.questionId, depth: childGuard.currentDepth });
    const startTime = Date.now();

    log.info("Decomposition started", {
      subQuestions: subQuestions.length,
      maxConcurrent: this.config.maxConcurrent,
      unitTimeoutMs: this.config.unitTimeoutMs,
    });

    const settled = await Promise.allSettled(
      subQuestions.map((sq) =>
        pool.run(() =>
          this.runUnit(sq, spawn, {
            guard: childGuard,
            parentQuestionId: request.questionId,
            parentSignal: options.signal,
            log: log.child({ subQuestionId: sq.id }),
          })
        )
      )
    );

    // runUnit resolves in every case; a rejection here is a coordinator bug
    const results = settled.map((outcome, i) =>
      outcome.status === "fulfilled"
        ? outcome.value
        : failedResult(subQuestions[i], errorFrom(outcome.reason, "execution"), 0)
    );

    const counts = countStatuses(results);
    log.info("Decomposition finished", { ...counts, durationMs: Date.now() - startTime });
    log.metric("decomposition.ok", counts.ok);
    if (counts.timedOut + counts.failed > 0) {
      log.metric("decomposition.unusable", counts.timedOut + counts.failed);
    }

    return results;
  }

  /**
   * Validate the request and stamp each sub-question with its depth
   */
  private prepare(request: DecompositionRequest, depth: number): SubQuestion[] {
    const parsed = DecompositionRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid decomposition request: ${describeIssues(parsed.error)}`,
        { field: "request", context: { questionId: request.questionId } }
      );
    }

    return request.subQuestions.map((input) =>
      Object.freeze({
        id: input.id,
        kind: input.kind,
        title: input.title,
        bounds: input.bounds
          ? createBounds({
              ...input.bounds,
              outcomeCount: input.bounds.outcomeCount ?? this.config.outcomeCount,
            })
          : null,
        weight: input.weight,
        depth,
      })
    );
  }

  private async runUnit(
    sq: SubQuestion,
    spawn: SpawnFn,
    unit: {
      guard: RecursionGuard;
      parentQuestionId: string;
      parentSignal?: AbortSignal;
      log: ChildLogger;
    }
  ): Promise<PartialResult> {
    const { parentSignal, log } = unit;

    if (parentSignal?.aborted) {
      log.debug("Skipping sub-question, parent already cancelled");
      return failedResult(sq, { kind: "cancelled", message: "Cancelled before start" }, 0);
    }

    const startedAt = Date.now();
    const elapsed = () => Date.now() - startedAt;
    const controller = new AbortController();
    const { unitTimeoutMs, cancelGraceMs } = this.config;

    let timeoutTimer: ReturnType<typeof setTimeout> | undefined;
    let graceTimer: ReturnType<typeof setTimeout> | undefined;
    let onParentAbort: (() => void) | undefined;

    const outcome = invokeSpawn(spawn, sq, {
      signal: controller.signal,
      guard: unit.guard,
      parentQuestionId: unit.parentQuestionId,
    }).then(
      (value) => this.accept(sq, value, elapsed(), log),
      (error: unknown) => this.reject(sq, error, parentSignal, elapsed(), log)
    );

    const timedOut = new Promise<PartialResult>((resolve) => {
      timeoutTimer = setTimeout(() => {
        const error = new TimeoutError(
          `Sub-question ${sq.id} exceeded ${unitTimeoutMs}ms`,
          unitTimeoutMs,
          { subQuestionId: sq.id }
        );
        controller.abort(error);
        log.warn("Sub-forecast timed out", { timeoutMs: unitTimeoutMs });
        resolve(timedOutResult(sq, error, elapsed()));
      }, unitTimeoutMs);
    });

    const cancelled = new Promise<PartialResult>((resolve) => {
      if (!parentSignal) return;
      onParentAbort = () => {
        controller.abort(new CancelledError("Parent forecast cancelled", { subQuestionId: sq.id }));
        graceTimer = setTimeout(() => {
          log.warn("Sub-forecast abandoned after cancellation", { graceMs: cancelGraceMs });
          resolve(
            failedResult(
              sq,
              { kind: "cancelled", message: "Cancelled while running", code: "CANCELLED" },
              elapsed()
            )
          );
        }, cancelGraceMs);
      };
      parentSignal.addEventListener("abort", onParentAbort, { once: true });
    });

    try {
      return await Promise.race([outcome, timedOut, cancelled]);
    } finally {
      clearTimeout(timeoutTimer);
      clearTimeout(graceTimer);
      if (onParentAbort) {
        parentSignal?.removeEventListener("abort", onParentAbort);
      }
    }
  }

  /**
   * Check a spawn result at the boundary and freeze it into an ok result
   */
  private accept(
    sq: SubQuestion,
    value: unknown,
    durationMs: number,
    log: ChildLogger
  ): PartialResult {
    const parsed = ForecastValueSchema.safeParse(value);
    if (!parsed.success) {
      const message = `Malformed sub-forecast: ${describeIssues(parsed.error)}`;
      log.error("Sub-forecast returned a malformed value", undefined, { reason: message });
      return failedResult(sq, { kind: "validation", message, code: "VALIDATION_ERROR" }, durationMs);
    }

    const data = parsed.data;
    const mismatch =
      data.kind !== sq.kind
        ? `expected ${sq.kind} value, got ${data.kind}`
        : this.checkValue(sq, data);

    if (mismatch !== null) {
      log.error("Sub-forecast does not fit its sub-question", undefined, { reason: mismatch });
      return failedResult(
        sq,
        { kind: "validation", message: `Sub-forecast mismatch: ${mismatch}`, code: "VALIDATION_ERROR" },
        durationMs
      );
    }

    log.debug("Sub-forecast completed", { durationMs });
    return freezeResult({
      subQuestionId: sq.id,
      status: "ok",
      value: freezeValue(data),
      error: null,
      weight: sq.weight,
      durationMs,
    });
  }

  /**
   * Rules the schema cannot express: CDF shape against the policy, categorical sums
   */
  private checkValue(sq: SubQuestion, data: z.infer<typeof ForecastValueSchema>): string | null {
    switch (data.kind) {
      case "binary":
        return null;

      case "numeric": {
        const { values, minGap, outcomeCount } = data.cdf;
        const n = values.length;
        if (sq.bounds !== null && n !== sq.bounds.outcomeCount) {
          return `expected ${sq.bounds.outcomeCount} CDF points, got ${n}`;
        }
        if (outcomeCount !== n) {
          return `CDF declares ${outcomeCount} points but has ${n}`;
        }

        const { minGapFraction, maxStepFraction } = this.config.cdfPolicy;
        const requiredGap = minGapFor(n, minGapFraction);
        if (minGap < requiredGap) {
          return `CDF minimum gap ${minGap} is below ${requiredGap}`;
        }
        if (!isValidCdf(values, minGap, maxStepFor(n, maxStepFraction))) {
          return "CDF is not increasing by the minimum gap within the step cap";
        }
        return null;
      }

      case "categorical": {
        const sum = Object.values(data.probabilities).reduce((acc, p) => acc + p, 0);
        if (Math.abs(sum - 1) > CATEGORICAL_TOLERANCE) {
          return `categorical probabilities sum to ${sum}`;
        }
        return null;
      }
    }
  }

  private reject(
    sq: SubQuestion,
    error: unknown,
    parentSignal: AbortSignal | undefined,
    durationMs: number,
    log: ChildLogger
  ): PartialResult {
    if (error instanceof TimeoutError) {
      log.warn("Sub-forecast reported a timeout", { reason: error.message });
      return timedOutResult(sq, error, durationMs);
    }

    const kind: ErrorKind = parentSignal?.aborted
      ? "cancelled"
      : error instanceof RecursionLimitExceededError
        ? "recursion_limit"
        : error instanceof ValidationError
          ? "validation"
          : "execution";

    log.error("Sub-forecast failed", error, { errorKind: kind, durationMs });
    return failedResult(sq, errorFrom(error, kind), durationMs);
  }
}

// ============================================
// HELPERS
// ============================================

async function invokeSpawn(
  spawn: SpawnFn,
  sq: SubQuestion,
  context: SpawnContext
): Promise<ForecastValue> {
  return spawn(sq, context);
}

function errorFrom(error: unknown, kind: ErrorKind): PartialResultError {
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
    return { kind, message: error.message || error.name, code };
  }
  return { kind, message: String(error) };
}

function freezeResult(result: PartialResult): PartialResult {
  if (result.error) {
    Object.freeze(result.error);
  }
  return Object.freeze(result);
}

function failedResult(
  sq: SubQuestion,
  error: PartialResultError,
  durationMs: number
): PartialResult {
  return freezeResult({
    subQuestionId: sq.id,
    status: "failed",
    value: null,
    error,
    weight: sq.weight,
    durationMs,
  });
}

function timedOutResult(sq: SubQuestion, error: TimeoutError, durationMs: number): PartialResult {
  return freezeResult({
    subQuestionId: sq.id,
    status: "timed_out",
    value: null,
    error: { kind: "timeout", message: error.message, code: error.code },
    weight: sq.weight,
    durationMs,
  });
}

function freezeValue(data: z.infer<typeof ForecastValueSchema>): ForecastValue {
  switch (data.kind) {
    case "binary":
      return Object.freeze({ kind: data.kind, probability: data.probability, degraded: data.degraded });
    case "numeric":
      return Object.freeze({
        kind: data.kind,
        cdf: createContinuousCdf(data.cdf.values, {
          minGap: data.cdf.minGap,
          degraded: data.cdf.degraded,
        }),
      });
    case "categorical":
      return Object.freeze({
        kind: data.kind,
        probabilities: Object.freeze({ ...data.probabilities }),
        degraded: data.degraded,
      });
  }
}

function countStatuses(results: readonly PartialResult[]): {
  ok: number;
  timedOut: number;
  failed: number;
} {
  return {
    ok: results.filter((r) => r.status === "ok").length,
    timedOut: results.filter((r) => r.status === "timed_out").length,
    failed: results.filter((r) => r.status === "failed").length,
  };
}

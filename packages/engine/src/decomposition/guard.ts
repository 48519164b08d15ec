/**
 * Recursion Guard
 * Depth budget passed by value down the decomposition chain
 */

import { RecursionLimitExceededError, ValidationError } from "@forecast-synthesis/core";

export class RecursionGuard {
  readonly currentDepth: number;
  readonly maxDepth: number;

  constructor(currentDepth: number, maxDepth: number) {
    if (!Number.isInteger(currentDepth) || currentDepth < 0) {
      throw new ValidationError("currentDepth must be a non-negative integer", {
        field: "guard.currentDepth",
        received: String(currentDepth),
      });
    }
    if (!Number.isInteger(maxDepth) || maxDepth < 0) {
      throw new ValidationError("maxDepth must be a non-negative integer", {
        field: "guard.maxDepth",
        received: String(maxDepth),
      });
    }

    this.currentDepth = currentDepth;
    this.maxDepth = maxDepth;
    Object.freeze(this);
  }

  static root(maxDepth: number): RecursionGuard {
    return new RecursionGuard(0, maxDepth);
  }

  /** Whether one more decomposition step is allowed from here */
  canDescend(): boolean {
    return this.currentDepth < this.maxDepth;
  }

  /**
   * Throw before any work is scheduled if the depth budget is spent
   */
  assertCanDescend(context?: Record<string, unknown>): void {
    if (!this.canDescend()) {
      throw new RecursionLimitExceededError(this.currentDepth, this.maxDepth, context);
    }
  }

  /** Guard for the next level down; the receiver is left untouched */
  descend(): RecursionGuard {
    return new RecursionGuard(this.currentDepth + 1, this.maxDepth);
  }
}

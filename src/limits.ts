/**
 * Resource limits shared by evaluation and tree transforms.
 *
 * Depth is tracked per nested operation and turns runaway recursion into a
 * RecursionLimitExceeded error before the host stack gives out. Steps count
 * every node evaluated or rebuilt; a driver may cap them to bound a whole
 * operation.
 */

import { BudgetExceededError, RecursionLimitExceededError } from "./errors";

export interface EngineOptions {
  /** Maximum nesting of evaluation/transform frames. */
  maxDepth: number;
  /** Maximum number of steps for the lifetime of one context. */
  maxSteps: number;
}

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  maxDepth: 500,
  maxSteps: Infinity,
};

export class Limits {
  readonly maxDepth: number;
  readonly maxSteps: number;
  private depth = 0;
  private steps = 0;

  constructor(options: Partial<EngineOptions> = {}) {
    this.maxDepth = options.maxDepth ?? DEFAULT_ENGINE_OPTIONS.maxDepth;
    this.maxSteps = options.maxSteps ?? DEFAULT_ENGINE_OPTIONS.maxSteps;
  }

  /**
   * Run `fn` one level deeper, counting one step.
   */
  nested<T>(operation: string, fn: () => T): T {
    this.tick(operation);
    if (this.depth >= this.maxDepth) {
      throw new RecursionLimitExceededError(this.maxDepth, operation);
    }
    this.depth++;
    try {
      return fn();
    } finally {
      this.depth--;
    }
  }

  tick(operation: string): void {
    this.steps++;
    if (this.steps > this.maxSteps) {
      throw new BudgetExceededError(this.maxSteps, operation);
    }
  }

  get currentDepth(): number {
    return this.depth;
  }

  get stepsUsed(): number {
    return this.steps;
  }
}

import type { IterationEvent, Objective, OptimizerOptions, OptimizerResult, StepKind } from './types.js';
import { ConvergenceTracker } from './convergence.js';
import { nonFiniteScoreError } from './errors.js';
import { makePoint } from './point.js';
import { Simplex } from './simplex.js';
import { classifyContraction, classifyReflection } from './step.js';
import {
  assertCoefficients,
  assertDimension,
  assertIterations,
  assertStart,
  assertStep,
} from './validate.js';

export const DEFAULT_OPTIONS = Object.freeze({
  alpha: 1,                     // reflection
  gamma: 2,                     // expansion
  rho: 0.5,                     // contraction
  sigma: 0.5,                   // shrink
  convergenceThreshold: 1e-14,
  stallLimit: 12,
});

/**
 * Nelder-Mead simplex minimizer bound to one objective and dimension.
 *
 * Coefficients are public and may be changed between runs. The stall
 * counter is reset at the start of every `optimize()` call, but an
 * instance must not be shared by runs that overlap in time.
 */
export class NelderMeadOptimizer {
  alpha: number;
  gamma: number;
  rho: number;
  sigma: number;
  convergenceThreshold: number;
  stallLimit: number;
  onIteration?: (event: IterationEvent) => void;

  private readonly tracker: ConvergenceTracker;

  constructor(
    private readonly objective: Objective,
    readonly dimension: number,
    options: OptimizerOptions = {}
  ) {
    assertDimension(dimension);

    this.alpha = options.alpha ?? DEFAULT_OPTIONS.alpha;
    this.gamma = options.gamma ?? DEFAULT_OPTIONS.gamma;
    this.rho = options.rho ?? DEFAULT_OPTIONS.rho;
    this.sigma = options.sigma ?? DEFAULT_OPTIONS.sigma;
    this.convergenceThreshold = options.convergenceThreshold ?? DEFAULT_OPTIONS.convergenceThreshold;
    this.stallLimit = options.stallLimit ?? DEFAULT_OPTIONS.stallLimit;
    this.onIteration = options.onIteration;

    assertCoefficients(this);
    this.tracker = new ConvergenceTracker(this.convergenceThreshold, this.stallLimit);
  }

  /**
   * Minimize from `start`, building the initial simplex with `step`.
   *
   * Returns after `stallLimit` consecutive checks without improvement
   * (`converged: true`) or after `maxIterations` steps. With
   * `maxIterations = 0` the result is `start` and its score.
   *
   * @throws SimplexError on invalid arguments (before any evaluation) or
   * when the objective returns a non-finite score.
   */
  optimize(maxIterations: number, start: readonly number[], step: number): OptimizerResult {
    assertIterations(maxIterations);
    assertStart(start, this.dimension);
    assertStep(step);
    assertCoefficients(this);

    const n = this.dimension;
    const evaluate = (x: number[]): number => {
      const score = this.objective(x);
      if (!Number.isFinite(score)) {
        throw nonFiniteScoreError(x, score);
      }
      return score;
    };

    const simplex = Simplex.fromStart(start, step);
    simplex.evaluate(evaluate);

    // Seeded from the unsorted vertex 0, i.e. the start point
    this.tracker.threshold = this.convergenceThreshold;
    this.tracker.limit = this.stallLimit;
    this.tracker.reset(simplex.best.score);

    for (let iteration = 0; iteration < maxIterations; iteration++) {
      simplex.sort();
      const best = simplex.best;

      if (this.tracker.check(best.score)) {
        return result(simplex, iteration, true);
      }

      const centroid = simplex.centroid();
      const worst = simplex.worst;

      // Reflection
      const reflected = makePoint(-this.alpha, centroid, worst.x);
      const rscore = evaluate(reflected);

      let taken: StepKind;
      switch (classifyReflection(rscore, best.score, simplex.secondWorst.score)) {
        case 'reflect':
          simplex.set(n, reflected, rscore);
          taken = 'reflect';
          break;

        case 'expand': {
          const expanded = makePoint(this.gamma, centroid, reflected);
          const escore = evaluate(expanded);
          if (escore < rscore) {
            simplex.set(n, expanded, escore);
            taken = 'expand';
          } else {
            simplex.set(n, reflected, rscore);
            taken = 'reflect';
          }
          break;
        }

        case 'contract': {
          const contracted = makePoint(this.rho, centroid, worst.x);
          const cscore = evaluate(contracted);
          if (classifyContraction(cscore, worst.score) === 'contract') {
            simplex.set(n, contracted, cscore);
            taken = 'contract';
          } else {
            shrink(simplex, this.sigma, evaluate);
            taken = 'shrink';
          }
          break;
        }
      }

      this.onIteration?.({
        iteration,
        step: taken,
        best: lowestScore(simplex),
        stallCount: this.tracker.stallCount,
      });
    }

    return result(simplex, maxIterations, false);
  }
}

/**
 * Pull every vertex but the best halfway (for sigma = 0.5) toward it.
 * Each vertex is scored at its new position.
 */
function shrink(simplex: Simplex, sigma: number, evaluate: Objective): void {
  const best = simplex.best.x;
  for (let i = 1; i < simplex.size; i++) {
    const x = makePoint(sigma, best, simplex.vertex(i).x);
    simplex.set(i, x, evaluate(x));
  }
}

function lowestScore(simplex: Simplex): number {
  let lowest = Infinity;
  for (const v of simplex.vertices()) {
    if (v.score < lowest) lowest = v.score;
  }
  return lowest;
}

function result(simplex: Simplex, iterations: number, converged: boolean): OptimizerResult {
  const best = simplex.best;
  return {
    x: best.x.slice(),
    fx: best.score,
    iterations,
    converged,
  };
}

/**
 * One-shot minimization of `fn` from `x0`.
 */
export function nelderMead(
  fn: Objective,
  x0: number[],
  options: OptimizerOptions & {
    maxIter?: number;
    step?: number;
  } = {}
): OptimizerResult {
  const { maxIter = 1000, step = 1, ...rest } = options;
  const optimizer = new NelderMeadOptimizer(fn, x0.length, rest);
  return optimizer.optimize(maxIter, x0, step);
}

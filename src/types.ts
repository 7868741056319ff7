export type Vector = number[];

export type Objective = (x: Vector) => number;

export interface Vertex {
  x: Vector;
  score: number;
}

export type StepKind = 'reflect' | 'expand' | 'contract' | 'shrink';

export interface IterationEvent {
  iteration: number;
  step: StepKind;
  best: number;
  stallCount: number;
}

export interface OptimizerOptions {
  /** Reflection coefficient */
  alpha?: number;
  /** Expansion coefficient */
  gamma?: number;
  /** Contraction coefficient */
  rho?: number;
  /** Shrink coefficient */
  sigma?: number;
  /** Minimal drop in the best score that counts as an improvement */
  convergenceThreshold?: number;
  /** Consecutive checks without improvement before the run is converged */
  stallLimit?: number;
  onIteration?: (event: IterationEvent) => void;
}

export interface OptimizerResult {
  x: number[];
  fx: number;
  iterations: number;
  converged: boolean;
}

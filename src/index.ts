// Optimizer
export { NelderMeadOptimizer, nelderMead, DEFAULT_OPTIONS } from './optimizer.js';

// Building blocks
export { Simplex, type VertexView } from './simplex.js';
export { makePoint } from './point.js';
export { ConvergenceTracker } from './convergence.js';
export {
  classifyReflection,
  classifyContraction,
  type ReflectionDecision,
  type ContractionDecision,
} from './step.js';

// Errors
export {
  SimplexError,
  SIMPLEX_ERROR_CODES,
  type SimplexErrorCode,
} from './errors.js';

// Types
export type {
  Vector,
  Objective,
  Vertex,
  StepKind,
  IterationEvent,
  OptimizerOptions,
  OptimizerResult,
} from './types.js';

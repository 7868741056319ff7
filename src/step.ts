export type ReflectionDecision = 'reflect' | 'expand' | 'contract';

export type ContractionDecision = 'contract' | 'shrink';

/**
 * Which branch a reflected score leads to, given the sorted simplex scores.
 *
 * | rscore                      | decision  |
 * | --------------------------- | --------- |
 * | best <= rscore < secondWorst | reflect   |
 * | rscore < best               | expand    |
 * | rscore >= secondWorst       | contract  |
 */
export function classifyReflection(
  rscore: number,
  best: number,
  secondWorst: number
): ReflectionDecision {
  if (best <= rscore && rscore < secondWorst) return 'reflect';
  if (rscore < best) return 'expand';
  return 'contract';
}

/** A contraction is kept only if it beats the worst vertex. */
export function classifyContraction(cscore: number, worst: number): ContractionDecision {
  return cscore < worst ? 'contract' : 'shrink';
}

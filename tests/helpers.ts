export function rosenbrock(x: number[]): number {
  const a = 1 - x[0];
  const b = x[1] - x[0] * x[0];
  return a * a + 100 * b * b;
}

export function quadratic(x: number[]): number {
  const a = x[0] - 3;
  const b = x[1] + 2;
  return a * a + b * b;
}

/** Runs `fn` and returns what it threw, or undefined. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}

/**
 * Stall detection on the best score.
 *
 * A check counts as progress only when the best score drops below the
 * previous best by more than `threshold`. The run is converged once
 * `limit` consecutive checks make no progress.
 */
export class ConvergenceTracker {
  private stalls = 0;
  private previous = Infinity;

  constructor(
    public threshold: number,
    public limit: number
  ) {}

  get stallCount(): number {
    return this.stalls;
  }

  get previousBest(): number {
    return this.previous;
  }

  reset(previousBest: number): void {
    this.stalls = 0;
    this.previous = previousBest;
  }

  check(best: number): boolean {
    if (best < this.previous - this.threshold) {
      this.stalls = 0;
      this.previous = best;
    } else {
      this.stalls++;
    }
    return this.stalls >= this.limit;
  }
}

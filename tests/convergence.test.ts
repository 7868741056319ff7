import { describe, it, expect } from 'vitest';
import { ConvergenceTracker } from '../src/index.js';

describe('ConvergenceTracker', () => {
  it('a fresh tracker counts the first finite score as progress', () => {
    const tracker = new ConvergenceTracker(0.1, 1);

    expect(tracker.previousBest).toBe(Infinity);
    expect(tracker.check(5)).toBe(false);
    expect(tracker.previousBest).toBe(5);
  });

  it('counts checks without sufficient improvement', () => {
    const tracker = new ConvergenceTracker(0.1, 3);
    tracker.reset(10);

    // 9.95 is not below 10 - 0.1
    expect(tracker.check(9.95)).toBe(false);
    expect(tracker.stallCount).toBe(1);
    expect(tracker.previousBest).toBe(10);
  });

  it('resets the counter on improvement', () => {
    const tracker = new ConvergenceTracker(0.1, 3);
    tracker.reset(10);
    tracker.check(10);
    tracker.check(10);

    expect(tracker.check(9.8)).toBe(false);
    expect(tracker.stallCount).toBe(0);
    expect(tracker.previousBest).toBe(9.8);
  });

  it('trips once the stall limit is reached', () => {
    const tracker = new ConvergenceTracker(0.1, 3);
    tracker.reset(5);

    expect(tracker.check(5)).toBe(false);
    expect(tracker.check(5)).toBe(false);
    expect(tracker.check(5)).toBe(true);
    expect(tracker.stallCount).toBe(3);
  });

  it('reset clears stalls from a previous run', () => {
    const tracker = new ConvergenceTracker(0, 2);
    tracker.reset(1);
    tracker.check(1);
    tracker.check(1);

    tracker.reset(3);
    expect(tracker.stallCount).toBe(0);
    expect(tracker.previousBest).toBe(3);
    expect(tracker.check(2)).toBe(false);
  });

  it('zero threshold counts any strict decrease as progress', () => {
    const tracker = new ConvergenceTracker(0, 1);
    tracker.reset(1);
    expect(tracker.check(0.999999)).toBe(false);
    expect(tracker.check(0.999999)).toBe(true);
  });
});

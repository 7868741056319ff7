import type { Objective, Vertex } from './types.js';
import { dimensionMismatchError, indexOutOfRangeError } from './errors.js';

export interface VertexView {
  readonly x: readonly number[];
  readonly score: number;
}

/**
 * The d+1 scored vertices of a Nelder-Mead search in d dimensions.
 *
 * Size is fixed at construction. Scores are NaN until evaluated.
 */
export class Simplex {
  private readonly points: Vertex[];

  private constructor(points: Vertex[]) {
    this.points = points;
  }

  /**
   * Vertex 0 is a copy of `start`; vertex i (1..d) is `start` moved by
   * `step` along coordinate i-1. A negative step builds the simplex on
   * the other side of `start`.
   */
  static fromStart(start: readonly number[], step: number): Simplex {
    const n = start.length;
    const points: Vertex[] = [{ x: start.slice(), score: NaN }];

    for (let i = 1; i <= n; i++) {
      const x = start.slice();
      x[i - 1] += step;
      points.push({ x, score: NaN });
    }

    return new Simplex(points);
  }

  get dimension(): number {
    return this.points.length - 1;
  }

  get size(): number {
    return this.points.length;
  }

  get best(): VertexView {
    return this.points[0];
  }

  get worst(): VertexView {
    return this.points[this.dimension];
  }

  /** Vertex d-1. For d = 1 this is the best vertex. */
  get secondWorst(): VertexView {
    return this.points[this.dimension - 1];
  }

  vertex(i: number): VertexView {
    this.checkIndex(i);
    return this.points[i];
  }

  vertices(): readonly VertexView[] {
    return this.points;
  }

  evaluate(objective: Objective): void {
    for (const point of this.points) {
      point.score = objective(point.x);
    }
  }

  /**
   * Mean position of vertices 0..d-1. Only meaningful after sort(), when
   * index d holds the worst vertex.
   */
  centroid(): number[] {
    const n = this.dimension;
    const centroid = new Array<number>(n).fill(0);

    for (let i = 0; i < n; i++) {
      for (let j = 0; j < n; j++) {
        centroid[j] += this.points[i].x[j];
      }
    }
    for (let j = 0; j < n; j++) {
      centroid[j] /= n;
    }

    return centroid;
  }

  /** Ascending by score: best at 0, worst at d. */
  sort(): void {
    this.points.sort((a, b) => a.score - b.score);
  }

  set(i: number, x: number[], score: number): void {
    this.checkIndex(i);
    if (x.length !== this.dimension) {
      throw dimensionMismatchError(this.dimension, x.length);
    }
    this.points[i] = { x, score };
  }

  private checkIndex(i: number): void {
    if (!Number.isInteger(i) || i < 0 || i >= this.points.length) {
      throw indexOutOfRangeError(i, this.points.length);
    }
  }
}

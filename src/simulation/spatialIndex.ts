import type { Vec2 } from "./math";

/**
 * Uniform bucket grid over the square world. `rebuild` records the positions
 * of a point list; queries answer with indices into that list, filtered by
 * exact distance against the recorded positions.
 */
export class SpatialIndex {
  readonly bucketSize: number;
  private readonly cols: number;
  private readonly buckets: number[][];
  private xs: number[] = [];
  private ys: number[] = [];

  constructor(worldSize: number, bucketSize: number) {
    this.bucketSize = bucketSize;
    this.cols = Math.max(1, Math.ceil(worldSize / bucketSize));
    this.buckets = Array.from({ length: this.cols * this.cols }, () => []);
  }

  /** Number of points recorded by the last rebuild. */
  get size(): number {
    return this.xs.length;
  }

  private coord(v: number): number {
    const c = Math.floor(v / this.bucketSize);
    return Math.max(0, Math.min(this.cols - 1, c));
  }

  /**
   * Re-bucket a point list. Points rejected by `include` are left out but
   * keep their index, so results still index into `points`.
   */
  rebuild<T extends Vec2>(points: readonly T[], include?: (point: T) => boolean): void {
    for (const bucket of this.buckets) bucket.length = 0;
    this.xs = new Array<number>(points.length);
    this.ys = new Array<number>(points.length);
    for (let i = 0; i < points.length; i++) {
      const p = points[i];
      this.xs[i] = p.x;
      this.ys[i] = p.y;
      if (include && !include(p)) continue;
      this.buckets[this.coord(p.y) * this.cols + this.coord(p.x)].push(i);
    }
  }

  /** Indices of recorded points within `radius` of (x, y), in bucket then insertion order. */
  neighbors(x: number, y: number, radius: number): number[] {
    const result: number[] = [];
    if (radius < 0) return result;
    const r2 = radius * radius;
    const minX = this.coord(x - radius);
    const maxX = this.coord(x + radius);
    const minY = this.coord(y - radius);
    const maxY = this.coord(y + radius);
    for (let cy = minY; cy <= maxY; cy++) {
      for (let cx = minX; cx <= maxX; cx++) {
        for (const i of this.buckets[cy * this.cols + cx]) {
          const dx = this.xs[i] - x;
          const dy = this.ys[i] - y;
          if (dx * dx + dy * dy <= r2) result.push(i);
        }
      }
    }
    return result;
  }

  /** Index of the closest recorded point within `radius`, excluding `skip`; -1 if none. */
  nearest(x: number, y: number, radius: number, skip = -1): number {
    let best = -1;
    let bestD2 = radius * radius;
    for (const i of this.neighbors(x, y, radius)) {
      if (i === skip) continue;
      const dx = this.xs[i] - x;
      const dy = this.ys[i] - y;
      const d2 = dx * dx + dy * dy;
      if (best === -1 || d2 < bestD2) {
        best = i;
        bestD2 = d2;
      }
    }
    return best;
  }
}

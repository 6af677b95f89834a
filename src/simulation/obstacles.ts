import { inGrid } from "./grid";
import { distance, unit } from "./math";
import type { Vec2 } from "./math";
import type { Rng } from "./random";
import type { Bounds } from "./types";

/** Impassable cells. */
export class ObstacleMap {
  readonly size: number;
  readonly blocked: Uint8Array;
  private count = 0;

  constructor(size: number) {
    this.size = size;
    this.blocked = new Uint8Array(size * size);
  }

  get blockedCount(): number {
    return this.count;
  }

  isBlocked(x: number, y: number): boolean {
    const cx = Math.floor(x);
    const cy = Math.floor(y);
    if (!inGrid(this.size, cx, cy)) return false;
    return this.blocked[cy * this.size + cx] === 1;
  }

  block(cx: number, cy: number): void {
    if (!inGrid(this.size, cx, cy)) return;
    const i = cy * this.size + cx;
    if (this.blocked[i] === 0) {
      this.blocked[i] = 1;
      this.count++;
    }
  }

  /**
   * Outward normal of the blocked cell containing (x, y), as seen from
   * `from`: the face the approach crosses, or the diagonal when it comes in
   * exactly at a corner. Null when `from` is the cell centre.
   */
  normalAt(x: number, y: number, from: Vec2): Vec2 | null {
    const dx = from.x - (Math.floor(x) + 0.5);
    const dy = from.y - (Math.floor(y) + 0.5);
    if (Math.abs(dx) > Math.abs(dy)) return { x: Math.sign(dx), y: 0 };
    if (Math.abs(dy) > Math.abs(dx)) return { x: 0, y: Math.sign(dy) };
    if (dx === 0) return null;
    return unit({ x: Math.sign(dx), y: Math.sign(dy) });
  }

  /**
   * `pos` itself when its cell is free; otherwise the centre of the closest
   * free cell on the nearest ring of cells that has one, among cells whose
   * centre lies within `bounds`. Null when every such cell is blocked.
   */
  nearestFree(pos: Vec2, bounds: Bounds): Vec2 | null {
    if (!this.isBlocked(pos.x, pos.y)) return pos;
    const cx = Math.floor(pos.x);
    const cy = Math.floor(pos.y);
    const lo = Math.ceil(bounds.min - 0.5);
    const hi = Math.floor(bounds.max - 0.5);

    for (let ring = 1; ring < this.size; ring++) {
      let best: Vec2 | null = null;
      let bestDistance = Infinity;
      for (let y = cy - ring; y <= cy + ring; y++) {
        const stride = y === cy - ring || y === cy + ring ? 1 : 2 * ring;
        for (let x = cx - ring; x <= cx + ring; x += stride) {
          if (x < lo || x > hi || y < lo || y > hi) continue;
          if (this.blocked[y * this.size + x] === 1) continue;
          const centre = { x: x + 0.5, y: y + 0.5 };
          const d = distance(pos, centre);
          if (d < bestDistance) {
            best = centre;
            bestDistance = d;
          }
        }
      }
      if (best) return best;
    }
    return null;
  }

  /** Scatter single-cell obstacles, leaving a clear disc around `clearCenter`. */
  scatter(rng: Rng, target: number, clearCenter: Vec2, clearRadius: number): void {
    const maxAttempts = target * 4;
    let placed = 0;
    for (let attempt = 0; attempt < maxAttempts && placed < target; attempt++) {
      const cx = rng.int(0, this.size);
      const cy = rng.int(0, this.size);
      const dx = cx + 0.5 - clearCenter.x;
      const dy = cy + 0.5 - clearCenter.y;
      if (dx * dx + dy * dy <= clearRadius * clearRadius) continue;
      if (this.blocked[cy * this.size + cx] === 1) continue;
      this.block(cx, cy);
      placed++;
    }
  }
}

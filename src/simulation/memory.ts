import { cellOf, sobel } from "./grid";
import type { Vec2 } from "./math";

/**
 * Decaying record of where nutrients were found. Discoveries made during a
 * tick are buffered and only become visible after `commit()`, so every agent
 * in a tick steers against the same memory.
 */
export class MemoryField {
  readonly size: number;
  readonly values: Float64Array;
  private readonly pending: Float64Array;
  private dirty = false;

  constructor(
    size: number,
    private readonly decayRate: number,
    private readonly updateStrength: number,
  ) {
    this.size = size;
    this.values = new Float64Array(size * size);
    this.pending = new Float64Array(size * size);
  }

  at(pos: Vec2): number {
    const { cx, cy } = cellOf(this.size, pos);
    return this.values[cy * this.size + cx];
  }

  /** Buffer a discovery of `amount` nutrient at a position. */
  recordDiscovery(pos: Vec2, amount: number): void {
    if (amount <= 0) return;
    const { cx, cy } = cellOf(this.size, pos);
    this.pending[cy * this.size + cx] += amount * this.updateStrength;
    this.dirty = true;
  }

  /** Decay every cell, then apply the buffered discoveries (capped at 1). */
  commit(): void {
    const { values, pending } = this;
    for (let i = 0; i < values.length; i++) {
      values[i] *= this.decayRate;
    }
    if (!this.dirty) return;
    for (let i = 0; i < values.length; i++) {
      if (pending[i] > 0) {
        values[i] = Math.min(1, values[i] + pending[i]);
        pending[i] = 0;
      }
    }
    this.dirty = false;
  }

  gradient(pos: Vec2): Vec2 {
    const { cx, cy } = cellOf(this.size, pos);
    const g = sobel(this.values, this.size, cx, cy);
    return { x: g.x * 0.5, y: g.y * 0.5 };
  }
}

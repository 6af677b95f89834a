import type { SimulationConfig } from "./config";
import {
  EDGE_FLUX_SHARE,
  MIN_AVAILABLE_NUTRIENT,
  NITROGEN_FLOOR_RATIO,
  NITROGEN_WEIGHT,
} from "./constants";
import { cellOf, inGrid, sobel } from "./grid";
import { clamp, normalizeAngle } from "./math";
import type { Vec2 } from "./math";
import type { MemoryField } from "./memory";
import type { Rng } from "./random";
import { NutrientKind } from "./types";
import type { Reserves } from "./types";

export type NutrientFieldOptions = Pick<
  SimulationConfig,
  | "gridSize"
  | "nutrientMax"
  | "diffusionRate"
  | "nitrogenDiffusionFactor"
  | "flowStrength"
  | "flowDrift"
  | "regenRate"
  | "regenFloor"
  | "regenSamples"
>;

/** Weather-driven modifiers for one diffusion pass. */
export interface DiffusionConditions {
  multiplier: number;
  rain: number; // 0..1, scales how strongly the flow biases the exchange
}

/**
 * Sugar and nitrogen concentrations on a square grid, plus one global flow
 * direction that biases diffusion downstream.
 *
 * Grids are row-major: cell (cx, cy) lives at `cy * size + cx`.
 */
export class NutrientField {
  readonly size: number;
  readonly sugar: Float64Array;
  readonly nitrogen: Float64Array;
  flowAngle = 0;
  private readonly scratch: Float64Array;

  constructor(private readonly options: NutrientFieldOptions) {
    this.size = options.gridSize;
    this.sugar = new Float64Array(this.size * this.size);
    this.nitrogen = new Float64Array(this.size * this.size);
    this.scratch = new Float64Array(this.size * this.size);
  }

  private channel(kind: NutrientKind): Float64Array {
    return kind === NutrientKind.Sugar ? this.sugar : this.nitrogen;
  }

  /** Nutrient an agent could draw from a cell: sugar plus half-weighted nitrogen. */
  availableAt(pos: Vec2): number {
    const { cx, cy } = cellOf(this.size, pos);
    const i = cy * this.size + cx;
    return this.sugar[i] + NITROGEN_WEIGHT * this.nitrogen[i];
  }

  /** Sum of both channels over the whole grid. */
  total(): number {
    let sum = 0;
    for (let i = 0; i < this.sugar.length; i++) {
      sum += this.sugar[i] + this.nitrogen[i];
    }
    return sum;
  }

  /** Add to one cell, clamped to [0, nutrientMax]. */
  addCell(cx: number, cy: number, kind: NutrientKind, amount: number): void {
    if (!inGrid(this.size, cx, cy)) return;
    const grid = this.channel(kind);
    const i = cy * this.size + cx;
    grid[i] = clamp(grid[i] + amount, 0, this.options.nutrientMax);
  }

  /**
   * Add `amount` to every cell within `radius` cells of the one containing
   * `center`. The radius is capped at the grid diagonal.
   */
  addPatch(center: Vec2, radius: number, kind: NutrientKind, amount: number): void {
    const { cx, cy } = cellOf(this.size, center);
    const reach = Math.min(radius, this.size * Math.SQRT2);
    const r = Math.floor(reach);
    for (let y = Math.max(0, cy - r); y <= Math.min(this.size - 1, cy + r); y++) {
      for (let x = Math.max(0, cx - r); x <= Math.min(this.size - 1, cx + r); x++) {
        const dx = x - cx;
        const dy = y - cy;
        if (dx * dx + dy * dy <= reach * reach) this.addCell(x, y, kind, amount);
      }
    }
  }

  /**
   * Return reserves to the soil at a position. What the containing cell
   * cannot hold spills outward ring by ring into cells with headroom.
   * Returns whatever found no room on the whole grid.
   */
  deposit(pos: Vec2, reserves: Reserves): Reserves {
    const { cx, cy } = cellOf(this.size, pos);
    return {
      carbon: this.spill(this.sugar, cx, cy, reserves.carbon),
      nitrogen: this.spill(this.nitrogen, cx, cy, reserves.nitrogen),
    };
  }

  private spill(grid: Float64Array, cx: number, cy: number, amount: number): number {
    const max = this.options.nutrientMax;
    let left = amount;
    for (let ring = 0; ring < this.size && left > 0; ring++) {
      for (let y = cy - ring; y <= cy + ring && left > 0; y++) {
        // Interior rows of a ring only touch its left and right columns.
        const stride = y === cy - ring || y === cy + ring ? 1 : 2 * ring;
        for (let x = cx - ring; x <= cx + ring && left > 0; x += stride) {
          if (!inGrid(this.size, x, y)) continue;
          const i = y * this.size + x;
          const placed = Math.min(left, Math.max(0, max - grid[i]));
          grid[i] += placed;
          left -= placed;
        }
      }
    }
    return left;
  }

  /**
   * Remove up to `cap` nutrient from the cells within `radius` of `pos` (the
   * containing cell always counts). Each cell gives in proportion to what it
   * has, and within a cell sugar and nitrogen are split by their weighted
   * availability. The amount taken is recorded as a discovery in `memory`.
   */
  consume(pos: Vec2, radius: number, cap: number, memory: MemoryField | null): Reserves {
    const taken: Reserves = { carbon: 0, nitrogen: 0 };
    if (cap <= 0) return taken;

    const cells = this.cellsAround(pos, radius);
    let available = 0;
    for (const i of cells) {
      available += this.sugar[i] + NITROGEN_WEIGHT * this.nitrogen[i];
    }
    if (available < MIN_AVAILABLE_NUTRIENT) return taken;

    const amount = Math.min(cap, available);
    for (const i of cells) {
      const sugarShare = this.sugar[i];
      const nitrogenShare = NITROGEN_WEIGHT * this.nitrogen[i];
      if (sugarShare + nitrogenShare <= 0) continue;
      const fromSugar = Math.min(this.sugar[i], (amount * sugarShare) / available);
      const fromNitrogen = Math.min(this.nitrogen[i], (amount * nitrogenShare) / available);
      this.sugar[i] -= fromSugar;
      this.nitrogen[i] -= fromNitrogen;
      taken.carbon += fromSugar;
      taken.nitrogen += fromNitrogen;
    }

    if (memory) memory.recordDiscovery(pos, taken.carbon + taken.nitrogen);
    return taken;
  }

  private cellsAround(pos: Vec2, radius: number): number[] {
    const { cx, cy } = cellOf(this.size, pos);
    const cells = [cy * this.size + cx];
    if (radius <= 0) return cells;

    const r = Math.ceil(radius);
    for (let y = cy - r; y <= cy + r; y++) {
      for (let x = cx - r; x <= cx + r; x++) {
        if ((x === cx && y === cy) || !inGrid(this.size, x, y)) continue;
        const dx = x + 0.5 - pos.x;
        const dy = y + 0.5 - pos.y;
        if (dx * dx + dy * dy <= radius * radius) cells.push(y * this.size + x);
      }
    }
    return cells;
  }

  /** Sobel gradient of sugar plus half-weighted nitrogen. */
  gradient(pos: Vec2): Vec2 {
    const { cx, cy } = cellOf(this.size, pos);
    const s = sobel(this.sugar, this.size, cx, cy);
    const n = sobel(this.nitrogen, this.size, cx, cy);
    return { x: s.x + NITROGEN_WEIGHT * n.x, y: s.y + NITROGEN_WEIGHT * n.y };
  }

  driftFlow(rng: Rng): void {
    const drift = this.options.flowDrift;
    this.flowAngle = normalizeAngle(this.flowAngle + rng.range(-drift, drift));
  }

  /**
   * One diffusion pass. Every pair of 4-neighbours exchanges nutrient along
   * their shared edge, so the grid total is unchanged. The exchange favours
   * the downstream cell by `flowStrength * rain`. An edge moves at most a
   * quarter of what the sender holds and a quarter of the receiver's
   * headroom, so no cell leaves [0, nutrientMax].
   */
  diffuse(dt: number, conditions: DiffusionConditions): void {
    const rate = clamp(this.options.diffusionRate * dt * conditions.multiplier, 0, 1);
    if (rate <= 0) return;
    const bias = clamp(this.options.flowStrength * conditions.rain, 0, 1);
    this.diffuseChannel(this.sugar, rate, bias);
    this.diffuseChannel(this.nitrogen, rate * this.options.nitrogenDiffusionFactor, bias);
  }

  private diffuseChannel(grid: Float64Array, rate: number, bias: number): void {
    const { size, scratch } = this;
    const max = this.options.nutrientMax;
    const dirX = Math.cos(this.flowAngle) * bias;
    const dirY = Math.sin(this.flowAngle) * bias;
    const k = rate * EDGE_FLUX_SHARE;

    scratch.set(grid);
    for (let y = 0; y < size; y++) {
      for (let x = 0; x < size; x++) {
        const i = y * size + x;
        if (x + 1 < size) {
          const j = i + 1;
          const flux = edgeFlux(grid[i], grid[j], k, dirX, max);
          scratch[i] -= flux;
          scratch[j] += flux;
        }
        if (y + 1 < size) {
          const j = i + size;
          const flux = edgeFlux(grid[i], grid[j], k, dirY, max);
          scratch[i] -= flux;
          scratch[j] += flux;
        }
      }
    }
    // Only rounding error can reach the clamp.
    for (let i = 0; i < grid.length; i++) {
      grid[i] = clamp(scratch[i], 0, max);
    }
  }

  /** Trickle nutrient back into sampled interior cells that sit below the floor. */
  regenerate(rng: Rng, multiplier: number): void {
    const { regenRate, regenFloor, regenSamples } = this.options;
    if (regenRate <= 0 || regenSamples <= 0 || this.size < 3) return;
    const rate = regenRate * multiplier;
    const nitrogenFloor = regenFloor * NITROGEN_FLOOR_RATIO;
    for (let n = 0; n < regenSamples; n++) {
      const i = rng.int(1, this.size - 1) * this.size + rng.int(1, this.size - 1);
      if (this.sugar[i] < regenFloor) {
        this.sugar[i] = Math.min(regenFloor, this.sugar[i] + rate);
      }
      if (this.nitrogen[i] < nitrogenFloor) {
        this.nitrogen[i] = Math.min(nitrogenFloor, this.nitrogen[i] + rate * NITROGEN_FLOOR_RATIO);
      }
    }
  }

  /** Lay down organic-looking sugar and nitrogen patches over a faint background. */
  seedPatches(rng: Rng): void {
    const { size } = this;
    for (let i = 0; i < this.sugar.length; i++) {
      this.sugar[i] = rng.range(0, 0.05);
      this.nitrogen[i] = rng.range(0, 0.02);
    }

    const sugarPatches = rng.int(8, 13);
    for (let p = 0; p < sugarPatches; p++) {
      this.seedPatch(rng, NutrientKind.Sugar, rng.range(size * 0.04, size * 0.09), rng.range(0.5, 1));
    }
    const nitrogenPatches = rng.int(3, 7);
    for (let p = 0; p < nitrogenPatches; p++) {
      this.seedPatch(rng, NutrientKind.Nitrogen, rng.range(size * 0.03, size * 0.07), rng.range(0.3, 0.7));
    }
  }

  private seedPatch(rng: Rng, kind: NutrientKind, radius: number, peak: number): void {
    const centerX = rng.range(0, this.size);
    const centerY = rng.range(0, this.size);
    const r = Math.ceil(radius);
    for (let y = Math.floor(centerY) - r; y <= Math.floor(centerY) + r; y++) {
      for (let x = Math.floor(centerX) - r; x <= Math.floor(centerX) + r; x++) {
        if (!inGrid(this.size, x, y)) continue;
        const d = Math.hypot(x + 0.5 - centerX, y + 0.5 - centerY);
        if (d >= radius) continue;
        const falloff = 1 - d / radius;
        this.addCell(x, y, kind, peak * falloff * falloff * rng.range(0.8, 1));
      }
    }
  }
}

/** Net flow from `from` to `to` across one edge; negative flows the other way. */
function edgeFlux(from: number, to: number, k: number, bias: number, max: number): number {
  const flux = k * ((1 + bias) * from - (1 - bias) * to);
  if (flux >= 0) return Math.min(flux, from / 4, Math.max(0, max - to) / 4);
  return -Math.min(-flux, to / 4, Math.max(0, max - from) / 4);
}

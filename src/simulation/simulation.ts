import { splitReserves } from "./agents";
import { resolveConfig } from "./config";
import type { SimulationConfig } from "./config";
import { createInitialState, tick } from "./engine";
import type { SimulationState } from "./engine";
import { invariant } from "./errors";
import { createLogger } from "./logger";
import { clamp } from "./math";
import type { Vec2 } from "./math";
import { buildSnapshot, computeStats } from "./snapshot";
import type { SimulationSnapshot, SnapshotOptions } from "./snapshot";
import type { NutrientKind, SimulationStats } from "./types";

const log = createLogger("simulation");

function isFinitePoint(p: Vec2): boolean {
  return Number.isFinite(p.x) && Number.isFinite(p.y);
}

/**
 * One simulation instance: its configuration, its seeded random stream and
 * all of its state. Ticks are synchronous; calling `step()` or `snapshot()`
 * from inside a tick is an invariant violation.
 */
export class Simulation {
  private config: SimulationConfig;
  private seed: number | string;
  private current: SimulationState;
  private stepping = false;

  /** @throws ConfigError when the configuration is invalid */
  constructor(seed: number | string = 1, config: Partial<SimulationConfig> = {}) {
    this.config = resolveConfig(config);
    this.seed = seed;
    this.current = createInitialState(this.config, seed);
    log.info("simulation created", { seed, gridSize: this.config.gridSize });
  }

  /** Live state. Mutations take effect on the next tick. */
  get state(): SimulationState {
    return this.current;
  }

  get tick(): number {
    return this.current.tick;
  }

  get aliveCount(): number {
    return this.current.pool.aliveCount;
  }

  getConfig(): Readonly<SimulationConfig> {
    return Object.freeze({ ...this.config });
  }

  step(): void {
    invariant(!this.stepping, "step() called while a tick is in progress");
    this.stepping = true;
    try {
      tick(this.current, this.config);
    } finally {
      this.stepping = false;
    }
  }

  /** Run `count` ticks back to back. Returns the tick index reached. */
  stepMany(count: number): number {
    for (let i = 0; i < count; i++) this.step();
    return this.current.tick;
  }

  /**
   * Discard all state and start again. A configuration given here replaces
   * the current one entirely (unspecified options fall back to defaults);
   * without one the current configuration is kept.
   * @throws ConfigError when the new configuration is invalid; state is untouched
   */
  reset(config?: Partial<SimulationConfig>, seed: number | string = this.seed): void {
    invariant(!this.stepping, "reset() called while a tick is in progress");
    const next = config ? resolveConfig(config) : this.config;
    this.current = createInitialState(next, seed);
    this.config = next;
    this.seed = seed;
    log.info("simulation reset", { seed });
  }

  /** Add nutrient to every cell within `radius` of `position`. Returns false when ignored. */
  addNutrientPatch(position: Vec2, radius: number, kind: NutrientKind, amount = 1): boolean {
    if (!isFinitePoint(position) || !Number.isFinite(radius) || !Number.isFinite(amount)) {
      log.debug("ignored nutrient patch with non-finite input", { position, radius, amount });
      return false;
    }
    this.current.field.addPatch(position, Math.max(0, radius), kind, amount);
    return true;
  }

  addNutrientCell(position: Vec2, kind: NutrientKind, amount = 1): boolean {
    return this.addNutrientPatch(position, 0, kind, amount);
  }

  /**
   * Place a new agent, clamped into bounds and moved off any obstacle to the
   * nearest free cell. Returns its id, or null at the population cap or when
   * no free cell exists.
   */
  spawnAgent(position: Vec2): number | null {
    if (!isFinitePoint(position)) {
      log.debug("ignored agent spawn with non-finite position", { position });
      return null;
    }
    const { pool, bounds, rng, obstacles } = this.current;
    const clamped = { x: clamp(position.x, bounds.min, bounds.max), y: clamp(position.y, bounds.min, bounds.max) };
    const free = obstacles.nearestFree(clamped, bounds);
    if (!free) {
      log.debug("ignored agent spawn with no free cell", { position });
      return null;
    }
    const agent = pool.spawn({
      x: free.x,
      y: free.y,
      heading: rng.angle(),
      energy: splitReserves(this.config.initialEnergy, this.config.optimalCarbonNitrogenRatio),
    });
    if (!agent) return null;
    this.current.births += 1;
    return agent.id;
  }

  clearTrails(): void {
    this.current.trails.clear();
  }

  stats(): SimulationStats {
    return computeStats(this.current);
  }

  snapshot(options: SnapshotOptions = {}): SimulationSnapshot {
    invariant(!this.stepping, "snapshot() called while a tick is in progress");
    return buildSnapshot(this.current, this.config, options);
  }
}

/**
 * Pure stages of a single agent's growth step. Each stage takes what it needs
 * and returns a value; none of them touches shared state other than drawing
 * from the random stream.
 */

import type { SimulationConfig } from "./config";
import {
  DENSITY_SLOWDOWN,
  EPSILON,
  MEMORY_MIN_GRADIENT,
  WEAK_GRADIENT_WANDER_BOOST,
} from "./constants";
import { clamp, fromAngle, length, normalizeAngle, unit } from "./math";
import type { Vec2 } from "./math";
import type { MemoryField } from "./memory";
import type { NutrientField } from "./nutrients";
import type { ObstacleMap } from "./obstacles";
import type { Rng } from "./random";
import type { Agent, Bounds, Reserves } from "./types";

export interface Sensed {
  nutrient: Vec2;
  memory: Vec2;
  /** Pull toward the last nutrient location, already scaled by signal level. */
  signal: Vec2;
}

export interface Move {
  x: number;
  y: number;
  heading: number;
}

type SteeringConfig = Pick<
  SimulationConfig,
  | "gradientWeight"
  | "minGradient"
  | "memoryWeight"
  | "signalWeight"
  | "tropismAngle"
  | "tropismStrength"
  | "wanderRange"
>;

type SenseConfig = Pick<SimulationConfig, "signalPropagationEnabled" | "signalSteerThreshold">;

type EfficiencyConfig = Pick<
  SimulationConfig,
  "optimalCarbonNitrogenRatio" | "ratioTolerance" | "minGrowthEfficiency"
>;

export function sense(
  agent: Agent,
  field: NutrientField,
  memory: MemoryField | null,
  config: SenseConfig,
): Sensed {
  const nutrient = field.gradient(agent);
  const remembered = memory ? memory.gradient(agent) : { x: 0, y: 0 };

  let signal: Vec2 = { x: 0, y: 0 };
  if (
    config.signalPropagationEnabled &&
    agent.lastNutrient &&
    agent.signal > config.signalSteerThreshold
  ) {
    const toward = unit({ x: agent.lastNutrient.x - agent.x, y: agent.lastNutrient.y - agent.y });
    const level = Math.min(1, agent.signal);
    signal = { x: toward.x * level, y: toward.y * level };
  }

  return { nutrient, memory: remembered, signal };
}

/**
 * Blend heading persistence with the sensed cues as a weighted sum of unit
 * vectors, then add a bounded random wander. The nutrient gradient only
 * counts above `minGradient`; below it the wander widens.
 */
export function steer(heading: number, sensed: Sensed, config: SteeringConfig, rng: Rng): number {
  const h = fromAngle(heading);
  let vx = h.x;
  let vy = h.y;

  const strongGradient = length(sensed.nutrient) > config.minGradient;
  if (strongGradient) {
    const g = unit(sensed.nutrient);
    vx += config.gradientWeight * g.x;
    vy += config.gradientWeight * g.y;
  }
  if (length(sensed.memory) > MEMORY_MIN_GRADIENT) {
    const m = unit(sensed.memory);
    vx += config.memoryWeight * m.x;
    vy += config.memoryWeight * m.y;
  }
  vx += config.signalWeight * sensed.signal.x;
  vy += config.signalWeight * sensed.signal.y;
  if (config.tropismStrength > 0) {
    const t = fromAngle(config.tropismAngle);
    vx += config.tropismStrength * t.x;
    vy += config.tropismStrength * t.y;
  }

  const base = vx * vx + vy * vy < EPSILON ? heading : Math.atan2(vy, vx);
  const wander = strongGradient ? config.wanderRange : config.wanderRange * WEAK_GRADIENT_WANDER_BOOST;
  return normalizeAngle(base + rng.range(-wander, wander));
}

/** Turn away from the nearest neighbour, if any. Never stops the agent. */
export function avoid(position: Vec2, heading: number, nearest: Vec2 | null, weight: number): number {
  if (!nearest) return heading;
  const away = unit({ x: position.x - nearest.x, y: position.y - nearest.y });
  if (away.x === 0 && away.y === 0) return heading;
  const h = fromAngle(heading);
  const vx = h.x + weight * away.x;
  const vy = h.y + weight * away.y;
  if (vx * vx + vy * vy < EPSILON) return heading;
  return Math.atan2(vy, vx);
}

/** Step-length scale for an agent with `crowding` neighbours close by. */
export function crowdingScale(crowding: number): number {
  return 1 / (1 + DENSITY_SLOWDOWN * crowding);
}

/**
 * Advance `step` along `heading`, reflecting off the field bounds (the
 * violated axis component flips) and off obstacles (mirrored on the local
 * surface normal). Any reflection adds a jitter in [-jitter, jitter]. The
 * result is clamped into bounds; if it still lands in an obstacle the agent
 * holds position with its new heading.
 */
export function reflect(
  from: Vec2,
  heading: number,
  step: number,
  bounds: Bounds,
  obstacles: ObstacleMap,
  jitter: number,
  rng: Rng,
): Move {
  let h = heading;
  let nx = from.x + Math.cos(h) * step;
  let ny = from.y + Math.sin(h) * step;
  let reflected = false;

  if (nx < bounds.min || nx > bounds.max) {
    h = Math.PI - h;
    reflected = true;
  }
  if (ny < bounds.min || ny > bounds.max) {
    h = -h;
    reflected = true;
  }
  if (!reflected && obstacles.isBlocked(nx, ny)) {
    const normal = obstacles.normalAt(nx, ny, from);
    if (normal) {
      const d = fromAngle(h);
      const dot = d.x * normal.x + d.y * normal.y;
      h = dot < 0 ? Math.atan2(d.y - 2 * dot * normal.y, d.x - 2 * dot * normal.x) : h + Math.PI;
    } else {
      h += Math.PI;
    }
    reflected = true;
  }

  if (reflected) {
    h = normalizeAngle(h + rng.range(-jitter, jitter));
    nx = clamp(from.x + Math.cos(h) * step, bounds.min, bounds.max);
    ny = clamp(from.y + Math.sin(h) * step, bounds.min, bounds.max);
    if (obstacles.isBlocked(nx, ny)) {
      return { x: from.x, y: from.y, heading: h };
    }
  }

  return { x: nx, y: ny, heading: h };
}

/**
 * Multiplicative growth efficiency from the carbon:nitrogen ratio. 1 at the
 * optimum, falling smoothly (Gaussian in log-ratio) toward
 * `minGrowthEfficiency` as the ratio drifts either way.
 */
export function growthEfficiency(energy: Reserves, config: EfficiencyConfig): number {
  const ratio = (energy.carbon + EPSILON) / (energy.nitrogen + EPSILON);
  const deviation = Math.log(ratio / config.optimalCarbonNitrogenRatio);
  const tolerance = config.ratioTolerance;
  const falloff = Math.exp(-(deviation * deviation) / (2 * tolerance * tolerance));
  return config.minGrowthEfficiency + (1 - config.minGrowthEfficiency) * falloff;
}

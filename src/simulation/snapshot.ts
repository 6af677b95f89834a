import { reserveTotal } from "./agents";
import type { SimulationConfig } from "./config";
import type { SimulationState } from "./engine";
import { isEligible } from "./reproduction";
import type { DeathCounts, SimulationStats, WeatherReading } from "./types";

export interface AgentView {
  readonly id: number;
  readonly x: number;
  readonly y: number;
  readonly prevX: number;
  readonly prevY: number;
  readonly heading: number;
  readonly carbon: number;
  readonly nitrogen: number;
  readonly energy: number;
  readonly age: number;
  readonly strength: number;
  readonly senescence: number;
  readonly signal: number;
  readonly efficiency: number;
  readonly parentId: number | null;
}

export interface ConnectionView {
  readonly a: number;
  readonly b: number;
  readonly strength: number;
  readonly totalFlow: number;
  readonly recentFlow: number;
  readonly signal: number;
  readonly age: number;
}

export interface SegmentView {
  readonly fromX: number;
  readonly fromY: number;
  readonly toX: number;
  readonly toY: number;
  readonly age: number;
}

export interface SporeView {
  readonly id: number;
  readonly x: number;
  readonly y: number;
  readonly vx: number;
  readonly vy: number;
  readonly age: number;
  readonly energy: number;
  readonly eligible: boolean;
}

export interface FruitingBodyView {
  readonly id: number;
  readonly x: number;
  readonly y: number;
  readonly age: number;
  readonly lifespan: number;
  readonly energy: number;
  readonly emissions: number;
}

/** Row-major copies of the grids: cell (cx, cy) is at `cy * size + cx`. */
export interface FieldView {
  readonly size: number;
  readonly sugar: readonly number[];
  readonly nitrogen: readonly number[];
  readonly memory: readonly number[];
  readonly obstacles: readonly boolean[];
  readonly flowAngle: number;
}

export interface SimulationSnapshot {
  readonly tick: number;
  readonly agents: readonly AgentView[];
  readonly connections: readonly ConnectionView[];
  readonly segments: readonly SegmentView[];
  readonly spores: readonly SporeView[];
  readonly fruitingBodies: readonly FruitingBodyView[];
  readonly weather: Readonly<WeatherReading>;
  readonly stats: Readonly<SimulationStats>;
  readonly fields?: FieldView;
}

export interface SnapshotOptions {
  includeFields?: boolean;
}

export function computeStats(state: SimulationState): SimulationStats {
  const { pool, reproduction } = state;
  const totalEnergy = pool.totalEnergy();
  const aliveCount = pool.aliveCount;
  const deaths: DeathCounts = { ...state.deaths };
  return {
    tick: state.tick,
    aliveCount,
    sporeCount: reproduction.spores.length,
    connectionCount: state.graph.size,
    fruitingBodyCount: reproduction.fruitingBodies.length,
    segmentCount: state.trails.segments.length,
    totalEnergy,
    averageEnergy: aliveCount > 0 ? totalEnergy / aliveCount : 0,
    births: state.births,
    deaths,
  };
}

function freezeAll<T extends object>(items: T[]): readonly T[] {
  for (const item of items) Object.freeze(item);
  return Object.freeze(items);
}

/** Copy the state into plain frozen objects. Later ticks never show through. */
export function buildSnapshot(
  state: SimulationState,
  config: Pick<SimulationConfig, "sporeDormancy">,
  options: SnapshotOptions = {},
): SimulationSnapshot {
  const agents = freezeAll(
    state.pool.living().map((a): AgentView => ({
      id: a.id,
      x: a.x,
      y: a.y,
      prevX: a.prevX,
      prevY: a.prevY,
      heading: a.heading,
      carbon: a.energy.carbon,
      nitrogen: a.energy.nitrogen,
      energy: reserveTotal(a.energy),
      age: a.age,
      strength: a.strength,
      senescence: a.senescence,
      signal: a.signal,
      efficiency: a.efficiency,
      parentId: a.parentId,
    })),
  );

  const connections = freezeAll(
    state.graph.connections().map((c): ConnectionView => ({
      a: c.a,
      b: c.b,
      strength: c.strength,
      totalFlow: c.totalFlow,
      recentFlow: c.recentFlow,
      signal: c.signal,
      age: c.age,
    })),
  );

  const segments = freezeAll(state.trails.segments.map((s): SegmentView => ({ ...s })));

  const spores = freezeAll(
    state.reproduction.spores.map((s): SporeView => ({
      id: s.id,
      x: s.x,
      y: s.y,
      vx: s.vx,
      vy: s.vy,
      age: s.age,
      energy: s.energy,
      eligible: isEligible(s, config),
    })),
  );

  const fruitingBodies = freezeAll(
    state.reproduction.fruitingBodies.map((f): FruitingBodyView => ({
      id: f.id,
      x: f.x,
      y: f.y,
      age: f.age,
      lifespan: f.lifespan,
      energy: f.energy,
      emissions: f.emissions,
    })),
  );

  const stats = computeStats(state);
  Object.freeze(stats.deaths);

  const snapshot: SimulationSnapshot = {
    tick: state.tick,
    agents,
    connections,
    segments,
    spores,
    fruitingBodies,
    weather: Object.freeze(state.weather.reading()),
    stats: Object.freeze(stats),
    ...(options.includeFields ? { fields: fieldView(state) } : {}),
  };
  return Object.freeze(snapshot);
}

function fieldView(state: SimulationState): FieldView {
  const { field, memory, obstacles } = state;
  return Object.freeze({
    size: field.size,
    sugar: Object.freeze(Array.from(field.sugar)),
    nitrogen: Object.freeze(Array.from(field.nitrogen)),
    memory: Object.freeze(Array.from(memory.values)),
    obstacles: Object.freeze(Array.from(obstacles.blocked, (v) => v === 1)),
    flowAngle: field.flowAngle,
  });
}

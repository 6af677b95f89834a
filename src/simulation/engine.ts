import { AgentPool, reserveTotal, splitReserves } from "./agents";
import type { SimulationConfig } from "./config";
import { BOUNDARY_MARGIN } from "./constants";
import { fuseAgents } from "./fusion";
import { stepAgents, translocate } from "./lifecycle";
import { createLogger } from "./logger";
import { clamp } from "./math";
import { MemoryField } from "./memory";
import { NetworkGraph } from "./network";
import { NutrientField } from "./nutrients";
import { ObstacleMap } from "./obstacles";
import { Rng } from "./random";
import { ReproductionSystem } from "./reproduction";
import { SpatialIndex } from "./spatialIndex";
import { Trails } from "./trails";
import { DeathCause } from "./types";
import type { Agent, Bounds, DeathCounts } from "./types";
import { EnvironmentState } from "./weather";

/** Everything one simulation instance owns. Replaced wholesale on reset. */
export interface SimulationState {
  tick: number;
  rng: Rng;
  bounds: Bounds;
  field: NutrientField;
  memory: MemoryField;
  obstacles: ObstacleMap;
  weather: EnvironmentState;
  index: SpatialIndex;
  pool: AgentPool;
  graph: NetworkGraph;
  reproduction: ReproductionSystem;
  trails: Trails;
  births: number;
  deaths: DeathCounts;
}

export function emptyDeathCounts(): DeathCounts {
  return {
    [DeathCause.Starvation]: 0,
    [DeathCause.Senescence]: 0,
    [DeathCause.Collapse]: 0,
    [DeathCause.Fusion]: 0,
  };
}

export function boundsFor(gridSize: number): Bounds {
  return { min: BOUNDARY_MARGIN, max: gridSize - 1 - BOUNDARY_MARGIN };
}

export function createInitialState(config: SimulationConfig, seed: number | string): SimulationState {
  const rng = new Rng(seed);
  const size = config.gridSize;
  const bounds = boundsFor(size);
  const center = { x: size / 2, y: size / 2 };

  const field = new NutrientField(config);
  if (config.seedNutrientPatches) field.seedPatches(rng);

  const obstacles = new ObstacleMap(size);
  obstacles.scatter(rng, config.obstacleCount, center, config.initialSpread + 2);

  const pool = new AgentPool(config.maxAgents);
  for (let i = 0; i < config.initialAgentCount; i++) {
    const angle = rng.angle();
    const r = rng.range(0, config.initialSpread);
    pool.spawn({
      x: clamp(center.x + Math.cos(angle) * r, bounds.min, bounds.max),
      y: clamp(center.y + Math.sin(angle) * r, bounds.min, bounds.max),
      heading: rng.angle(),
      energy: splitReserves(config.initialEnergy, config.optimalCarbonNitrogenRatio),
    });
  }

  return {
    tick: 0,
    rng,
    bounds,
    field,
    memory: new MemoryField(size, config.memoryDecayRate, config.memoryUpdateStrength),
    obstacles,
    weather: new EnvironmentState(config),
    index: new SpatialIndex(size, config.bucketSize),
    pool,
    graph: new NetworkGraph(),
    reproduction: new ReproductionSystem(),
    trails: new Trails(),
    births: 0,
    deaths: emptyDeathCounts(),
  };
}

const log = createLogger("engine");

const isAlive = (agent: Agent): boolean => agent.alive;

/** Advance the state by one tick. */
export function tick(state: SimulationState, config: SimulationConfig): void {
  const { weather, field, index, pool, graph } = state;

  weather.update(state.rng);
  field.driftFlow(state.rng);
  field.diffuse(1, { multiplier: weather.diffusionMultiplier(), rain: weather.rain });
  field.regenerate(state.rng, weather.regenerationMultiplier());

  index.rebuild(pool.agents, isAlive);
  stepAgents(state, config);
  translocate(state.pool, config);

  if (config.fusionEnabled) {
    index.rebuild(pool.agents, isAlive);
    fuseAgents(state, config);
  }

  index.rebuild(pool.agents, isAlive);
  graph.removeDead(pool);
  graph.formConnections(pool, index, config);
  graph.update(pool, config);

  state.reproduction.update(state, config);

  if (config.memoryEnabled) state.memory.commit();
  state.trails.age(config.maxSegmentAge, config.maxSegments);
  reapDead(state);
  state.tick += 1;
}

/** Remove dead agents, returning their leftover reserves to the soil. */
function reapDead(state: SimulationState): void {
  for (const agent of state.pool.reap()) {
    if (reserveTotal(agent.energy) > 0) {
      const unplaced = state.field.deposit(agent, agent.energy);
      if (reserveTotal(unplaced) > 0) {
        log.warn("soil saturated; dead agent's reserves discarded", { id: agent.id, ...unplaced });
      }
    }
    if (agent.deathCause) state.deaths[agent.deathCause] += 1;
  }
}

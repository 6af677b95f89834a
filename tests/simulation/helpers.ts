import type { SimulationConfig } from "../../src/simulation/config";
import type { Simulation } from "../../src/simulation/simulation";
import type { Agent, Reserves } from "../../src/simulation/types";

/**
 * A small, empty, windless world: no weather, no wander, no spontaneous
 * branching, no regrowth. Movement is fully determined by the field.
 */
export const QUIET: Partial<SimulationConfig> = {
  gridSize: 32,
  initialAgentCount: 0,
  obstacleCount: 0,
  seedNutrientPatches: false,
  weatherEnabled: false,
  fruitingEnabled: false,
  senescenceEnabled: false,
  branchProbability: 0,
  wanderRange: 0,
  tropismStrength: 0,
  boundaryJitter: 0,
  regenRate: 0,
};

/** Spawn an agent and overwrite its heading and reserves. */
export function placeAgent(
  sim: Simulation,
  x: number,
  y: number,
  options: { heading?: number; energy?: Reserves } = {},
): Agent {
  const id = sim.spawnAgent({ x, y });
  if (id === null) throw new Error("population cap reached in test setup");
  const agent = sim.state.pool.get(id);
  if (!agent) throw new Error(`agent ${id} missing after spawn`);
  if (options.heading !== undefined) agent.heading = options.heading;
  if (options.energy) agent.energy = { ...options.energy };
  return agent;
}

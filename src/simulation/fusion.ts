import { reserveTotal } from "./agents";
import type { SimulationConfig } from "./config";
import type { SimulationState } from "./engine";
import { DeathCause } from "./types";
import type { Agent } from "./types";

/**
 * Merge pairs of mature agents that have grown within `fusionDistance` of
 * each other. Expects the spatial index to hold post-move positions. Each
 * agent takes part in at most one fusion per tick. Returns the number of
 * fusions.
 */
export function fuseAgents(
  state: SimulationState,
  config: Pick<SimulationConfig, "fusionEnabled" | "fusionDistance" | "fusionMinAge" | "fusionEnergyTransfer" | "maxEnergy">,
): number {
  if (!config.fusionEnabled) return 0;
  const agents = state.pool.agents;
  const merged = new Set<number>();
  let fusions = 0;

  for (let i = 0; i < agents.length; i++) {
    const a = agents[i];
    if (!a.alive || a.age < config.fusionMinAge || merged.has(a.id)) continue;
    for (const j of state.index.neighbors(a.x, a.y, config.fusionDistance)) {
      if (j <= i) continue;
      const b = agents[j];
      if (!b.alive || b.age < config.fusionMinAge || merged.has(b.id)) continue;
      // The richer agent survives; ties go to the earlier one.
      const [survivor, absorbed] = reserveTotal(a.energy) >= reserveTotal(b.energy) ? [a, b] : [b, a];
      merge(survivor, absorbed, state, config);
      merged.add(a.id);
      merged.add(b.id);
      fusions++;
      break;
    }
  }
  return fusions;
}

function merge(
  survivor: Agent,
  absorbed: Agent,
  state: SimulationState,
  config: Pick<SimulationConfig, "fusionEnergyTransfer" | "maxEnergy">,
): void {
  const held = reserveTotal(absorbed.energy);
  const room = Math.max(0, config.maxEnergy - reserveTotal(survivor.energy));
  const taken = Math.min(held * config.fusionEnergyTransfer, room);
  const fraction = held > 0 ? taken / held : 0;
  const carbon = absorbed.energy.carbon * fraction;
  const nitrogen = absorbed.energy.nitrogen * fraction;
  survivor.energy.carbon += carbon;
  survivor.energy.nitrogen += nitrogen;

  // What the survivor cannot hold goes back into the soil where the absorbed
  // agent was; anything a saturated grid refuses stays with the survivor.
  const unplaced = state.field.deposit(absorbed, {
    carbon: absorbed.energy.carbon - carbon,
    nitrogen: absorbed.energy.nitrogen - nitrogen,
  });
  survivor.energy.carbon += unplaced.carbon;
  survivor.energy.nitrogen += unplaced.nitrogen;
  absorbed.energy.carbon = 0;
  absorbed.energy.nitrogen = 0;

  const midX = (survivor.x + absorbed.x) / 2;
  const midY = (survivor.y + absorbed.y) / 2;
  if (!state.obstacles.isBlocked(midX, midY)) {
    survivor.x = midX;
    survivor.y = midY;
  }
  survivor.strength = Math.max(survivor.strength, absorbed.strength);
  state.pool.kill(absorbed, DeathCause.Fusion);
}

import { reserveTotal, transferReserves } from "./agents";
import type { AgentPool } from "./agents";
import type { SimulationConfig } from "./config";
import {
  BRANCH_AGE_BOOST,
  BRANCH_AGE_BOOST_CAP,
  BRANCH_MIN_PROBABILITY_RATIO,
  BRANCH_SENESCENCE_FACTOR,
  BRANCH_STRENGTH_FACTOR,
  DENSITY_RADIUS_FACTOR,
  EPSILON,
  MAX_TRANSLOCATION,
  SENESCENCE_ACCUMULATION,
  SIGNAL_PULSE,
  STRENGTH_GAIN_PER_NUTRIENT,
  TRANSLOCATION_RANGE,
  TRANSLOCATION_RATE,
} from "./constants";
import type { SimulationState } from "./engine";
import { avoid, crowdingScale, growthEfficiency, reflect, sense, steer } from "./growth";
import { clamp, distance } from "./math";
import type { Vec2 } from "./math";
import type { NodeStats } from "./network";
import { SpatialIndex } from "./spatialIndex";
import { DeathCause } from "./types";
import type { Agent } from "./types";

/** Per-tick values shared by every agent's step. */
interface StepConditions {
  growth: number;
  decay: number; // fraction of reserves kept
  extremity: number;
  nodes: Map<number, NodeStats>;
  hubs: HubLocator | null;
}

/**
 * Run the growth step for every agent alive at the start of the tick:
 * sense, steer, avoid, reflect, move, feed, decay, then the death rules and
 * branching. Children are appended to the pool and first move next tick.
 */
export function stepAgents(state: SimulationState, config: SimulationConfig): void {
  const { pool, weather } = state;
  const nodes = state.graph.nodeStats();
  const conditions: StepConditions = {
    growth: weather.growthMultiplier(),
    decay: 1 - (1 - config.energyDecayRate) * weather.energyConsumptionMultiplier(),
    extremity: weather.extremity(config.senescenceWeatherThreshold),
    nodes,
    hubs: config.senescenceEnabled ? HubLocator.build(state, config, nodes) : null,
  };

  const agents = pool.agents;
  const count = agents.length;
  for (let i = 0; i < count; i++) {
    const agent = agents[i];
    if (!agent.alive) continue;
    moveAgent(agent, i, state, config, conditions);
    feed(agent, state, config);

    const kept = conditions.decay;
    agent.energy.carbon *= kept;
    agent.energy.nitrogen *= kept;
    agent.age += 1;

    if (reserveTotal(agent.energy) <= config.minEnergyToLive) {
      pool.kill(agent, DeathCause.Starvation);
      continue;
    }
    if (conditions.hubs && agent.age >= config.senescenceMinAge && senesce(agent, state, config, conditions)) {
      continue;
    }
    branch(agent, state, config, conditions.growth);
  }
}

/**
 * Parent-child translocation, run after every agent has stepped. Each live
 * agent within TRANSLOCATION_RANGE of its live parent moves a distance-scaled
 * share of half their reserve difference toward the poorer of the two.
 */
export function translocate(pool: AgentPool, config: Pick<SimulationConfig, "maxEnergy">): void {
  for (const child of pool.agents) {
    if (!child.alive || child.parentId === null) continue;
    const parent = pool.get(child.parentId);
    if (!parent || !parent.alive) continue;
    const d = distance(child, parent);
    if (d >= TRANSLOCATION_RANGE) continue;

    const rate = TRANSLOCATION_RATE * (1 - d / TRANSLOCATION_RANGE);
    const wanted = (reserveTotal(child.energy) - reserveTotal(parent.energy)) / 2;
    const amount = clamp(wanted * rate, -MAX_TRANSLOCATION, MAX_TRANSLOCATION);
    if (amount > 0) transferReserves(child, parent, amount, config.maxEnergy);
    else if (amount < 0) transferReserves(parent, child, -amount, config.maxEnergy);
  }
}

function moveAgent(
  agent: Agent,
  index: number,
  state: SimulationState,
  config: SimulationConfig,
  conditions: StepConditions,
): void {
  const agents = state.pool.agents;
  const memory = config.memoryEnabled ? state.memory : null;
  let heading = steer(agent.heading, sense(agent, state.field, memory, config), config, state.rng);

  // Crowding and the nearest neighbour come from positions at the last rebuild.
  let nearest: Vec2 | null = null;
  let nearestDistance = config.avoidanceDistance;
  let crowding = 0;
  for (const j of state.index.neighbors(agent.x, agent.y, config.avoidanceDistance * DENSITY_RADIUS_FACTOR)) {
    if (j === index) continue;
    const other = agents[j];
    if (!other.alive) continue;
    crowding++;
    const d = distance(agent, other);
    if (d <= nearestDistance) {
      nearestDistance = d;
      nearest = { x: other.x, y: other.y };
    }
  }
  heading = avoid(agent, heading, nearest, config.avoidanceWeight);

  const strength = config.adaptiveGrowthEnabled ? agent.strength : 1;
  const step = config.stepSize * crowdingScale(crowding) * strength * conditions.growth;
  const move = reflect(agent, heading, step, state.bounds, state.obstacles, config.boundaryJitter, state.rng);

  agent.prevX = agent.x;
  agent.prevY = agent.y;
  agent.x = move.x;
  agent.y = move.y;
  agent.heading = move.heading;

  if (config.trailsEnabled && distance({ x: agent.prevX, y: agent.prevY }, agent) > EPSILON) {
    state.trails.add(agent.prevX, agent.prevY, agent.x, agent.y);
  }
}

function feed(agent: Agent, state: SimulationState, config: SimulationConfig): void {
  agent.efficiency = growthEfficiency(agent.energy, config);
  const room = config.maxEnergy - reserveTotal(agent.energy);
  const cap = Math.min(config.uptakeRate * agent.efficiency, room);
  if (cap <= 0) return;

  const local = state.field.availableAt(agent);
  const taken = state.field.consume(agent, config.uptakeRadius, cap, config.memoryEnabled ? state.memory : null);
  const amount = taken.carbon + taken.nitrogen;
  if (amount <= 0) return;

  agent.energy.carbon += taken.carbon;
  agent.energy.nitrogen += taken.nitrogen;
  agent.lastNutrient = { x: agent.x, y: agent.y };
  if (config.adaptiveGrowthEnabled) {
    agent.strength = Math.min(1, agent.strength + amount * STRENGTH_GAIN_PER_NUTRIENT);
  }
  if (config.signalPropagationEnabled && local > config.signalTriggerNutrient) {
    agent.signal = SIGNAL_PULSE;
  }
}

/** Apply the probabilistic death rule. Returns true if the agent died. */
function senesce(
  agent: Agent,
  state: SimulationState,
  config: SimulationConfig,
  conditions: StepConditions,
): boolean {
  const hubDistance = conditions.hubs ? conditions.hubs.distanceFrom(agent) : 0;
  if (hubDistance > config.senescenceCollapseDistance) {
    state.pool.kill(agent, DeathCause.Collapse);
    return true;
  }

  let probability = config.senescenceBaseRate;
  const node = conditions.nodes.get(agent.id);
  if (node && config.senescenceFlowThreshold > 0 && node.flow < config.senescenceFlowThreshold) {
    probability += (1 - node.flow / config.senescenceFlowThreshold) * config.senescenceFlowWeight;
  }
  if (hubDistance > config.senescenceDistanceThreshold) {
    const span = config.senescenceCollapseDistance - config.senescenceDistanceThreshold;
    const beyond = span > 0 ? (hubDistance - config.senescenceDistanceThreshold) / span : 1;
    probability += Math.min(1, beyond) * config.senescenceDistanceWeight;
  }
  probability += conditions.extremity * config.senescenceWeatherWeight;

  agent.senescence = Math.min(1, agent.senescence + probability * SENESCENCE_ACCUMULATION);
  if (state.rng.chance(probability)) {
    state.pool.kill(agent, DeathCause.Senescence);
    return true;
  }
  return false;
}

function branch(agent: Agent, state: SimulationState, config: SimulationConfig, growth: number): void {
  const { pool, rng, bounds } = state;
  if (!pool.hasCapacity()) return;
  if (config.branchingSuppressionThreshold > 0 && pool.aliveCount >= config.branchingSuppressionThreshold) return;

  const ageBoost = Math.min(BRANCH_AGE_BOOST_CAP, 1 + agent.age * BRANCH_AGE_BOOST);
  const probability = Math.max(
    config.branchProbability * BRANCH_MIN_PROBABILITY_RATIO,
    config.branchProbability * ageBoost * growth,
  );
  if (!rng.chance(probability)) return;

  const heading = agent.heading + rng.range(-config.branchAngleSpread, config.branchAngleSpread);
  const x = clamp(agent.x + Math.cos(heading) * config.branchOffset, bounds.min, bounds.max);
  const y = clamp(agent.y + Math.sin(heading) * config.branchOffset, bounds.min, bounds.max);
  if (state.obstacles.isBlocked(x, y)) return;

  const share = config.branchEnergyShare;
  const energy = { carbon: agent.energy.carbon * share, nitrogen: agent.energy.nitrogen * share };
  const child = pool.spawn({
    x,
    y,
    heading,
    energy,
    parentId: agent.id,
    strength: agent.strength * BRANCH_STRENGTH_FACTOR,
    senescence: agent.senescence * BRANCH_SENESCENCE_FACTOR,
  });
  if (!child) return;
  agent.energy.carbon -= energy.carbon;
  agent.energy.nitrogen -= energy.nitrogen;
  state.births += 1;
}

/**
 * Nearest "well-connected hub" lookup for senescence. Hubs are live agents
 * with at least `hubMinDegree` connections; with none, the live centroid
 * stands in. Distances beyond the collapse distance read as Infinity.
 */
class HubLocator {
  private constructor(
    private readonly hubs: Vec2[],
    private readonly index: SpatialIndex,
    private readonly reach: number,
  ) {}

  static build(state: SimulationState, config: SimulationConfig, nodes: Map<number, NodeStats>): HubLocator {
    const hubs: Vec2[] = [];
    let sumX = 0;
    let sumY = 0;
    let alive = 0;
    for (const agent of state.pool.agents) {
      if (!agent.alive) continue;
      sumX += agent.x;
      sumY += agent.y;
      alive++;
      const node = nodes.get(agent.id);
      if (node && node.degree >= config.hubMinDegree) hubs.push({ x: agent.x, y: agent.y });
    }
    if (hubs.length === 0 && alive > 0) hubs.push({ x: sumX / alive, y: sumY / alive });

    const reach = config.senescenceCollapseDistance;
    const index = new SpatialIndex(config.gridSize, Math.max(config.bucketSize, reach));
    index.rebuild(hubs);
    return new HubLocator(hubs, index, reach);
  }

  distanceFrom(pos: Vec2): number {
    const i = this.index.nearest(pos.x, pos.y, this.reach);
    return i === -1 ? Infinity : distance(pos, this.hubs[i]);
  }
}

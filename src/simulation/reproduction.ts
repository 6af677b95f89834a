import { reserveTotal, splitReserves } from "./agents";
import type { SimulationConfig } from "./config";
import { EPSILON, FRUITING_SPAWN_JITTER } from "./constants";
import type { SimulationState } from "./engine";
import { createLogger } from "./logger";
import { clamp } from "./math";
import type { Vec2 } from "./math";
import type { FruitingBody, Spore } from "./types";

const log = createLogger("reproduction");

/**
 * Fruiting bodies and the spores they release. A fruiting body appears when
 * the colony is large and rich enough, draws energy from the agents around
 * it, emits spores on an interval and returns part of its energy to the soil
 * when it dies. Spores drift and germinate where nutrient is plentiful.
 */
export class ReproductionSystem {
  fruitingBodies: FruitingBody[] = [];
  spores: Spore[] = [];
  /** Ticks left before another fruiting body may appear. */
  cooldown = 0;
  private nextFruitId = 1;
  private nextSporeId = 1;

  update(state: SimulationState, config: SimulationConfig): void {
    if (config.fruitingEnabled) {
      this.tryFruit(state, config);
    }
    this.updateFruitingBodies(state, config);
    this.updateSpores(state, config);
  }

  private tryFruit(state: SimulationState, config: SimulationConfig): FruitingBody | null {
    if (this.cooldown > 0) {
      this.cooldown -= 1;
      return null;
    }
    const { pool, weather, rng, bounds } = state;
    if (pool.aliveCount < config.fruitingMinAgents) return null;
    const multiplier = Math.max(EPSILON, weather.fruitingMultiplier());
    if (pool.totalEnergy() < config.fruitingEnergyThreshold / multiplier) return null;

    const site = this.fruitingSite(state);
    if (!site) return null;
    const x = clamp(site.x + rng.range(-FRUITING_SPAWN_JITTER, FRUITING_SPAWN_JITTER), bounds.min, bounds.max);
    const y = clamp(site.y + rng.range(-FRUITING_SPAWN_JITTER, FRUITING_SPAWN_JITTER), bounds.min, bounds.max);
    const lifespan = rng.range(config.fruitingLifespanMin, config.fruitingLifespanMax);
    const body: FruitingBody = {
      id: this.nextFruitId++,
      x,
      y,
      age: 0,
      lifespan,
      energy: 0,
      emissions: 0,
      nextEmissionAge: lifespan * config.fruitingReleaseFraction,
    };
    this.fruitingBodies.push(body);
    this.cooldown = config.fruitingCooldown;
    log.debug("fruiting body spawned", { id: body.id, x, y, tick: state.tick });
    return body;
  }

  /**
   * The best-connected live agent (first one on ties), or the energy-weighted
   * centroid when nothing is connected yet.
   */
  private fruitingSite(state: SimulationState): Vec2 | null {
    const nodes = state.graph.nodeStats();
    let hub: Vec2 | null = null;
    let bestDegree = 0;
    let weight = 0;
    let sumX = 0;
    let sumY = 0;
    let plainX = 0;
    let plainY = 0;
    let alive = 0;
    for (const agent of state.pool.agents) {
      if (!agent.alive) continue;
      const degree = nodes.get(agent.id)?.degree ?? 0;
      if (degree > bestDegree) {
        bestDegree = degree;
        hub = { x: agent.x, y: agent.y };
      }
      const e = reserveTotal(agent.energy);
      weight += e;
      sumX += agent.x * e;
      sumY += agent.y * e;
      plainX += agent.x;
      plainY += agent.y;
      alive++;
    }
    if (hub) return hub;
    if (weight > 0) return { x: sumX / weight, y: sumY / weight };
    if (alive > 0) return { x: plainX / alive, y: plainY / alive };
    return null;
  }

  private updateFruitingBodies(state: SimulationState, config: SimulationConfig): void {
    const { pool, index, field } = state;
    const agents = pool.agents;
    const kept: FruitingBody[] = [];

    for (const body of this.fruitingBodies) {
      if (config.fruitingDrawRate > 0) {
        for (const j of index.neighbors(body.x, body.y, config.fruitingTransferRadius)) {
          const agent = agents[j];
          if (!agent.alive) continue;
          const carbon = agent.energy.carbon * config.fruitingDrawRate;
          const nitrogen = agent.energy.nitrogen * config.fruitingDrawRate;
          agent.energy.carbon -= carbon;
          agent.energy.nitrogen -= nitrogen;
          body.energy += carbon + nitrogen;
        }
      }

      body.age += 1;
      while (
        body.emissions < config.fruitingMaxEmissions &&
        body.age >= body.nextEmissionAge &&
        body.nextEmissionAge < body.lifespan
      ) {
        this.emit(body, state, config);
        body.nextEmissionAge += Math.max(1, config.fruitingReleaseInterval);
      }

      if (body.age < body.lifespan) {
        kept.push(body);
        continue;
      }
      if (body.emissions === 0 && config.fruitingMaxEmissions > 0) {
        this.emit(body, state, config);
      }
      const returned = body.energy * config.fruitingNutrientReturn;
      if (returned > 0) {
        const unplaced = field.deposit(body, splitReserves(returned, config.optimalCarbonNitrogenRatio));
        if (reserveTotal(unplaced) > 0) {
          log.warn("soil saturated; fruiting body's return discarded", { id: body.id, ...unplaced });
        }
      }
      log.debug("fruiting body expired", { id: body.id, emissions: body.emissions, returned });
    }

    this.fruitingBodies = kept;
  }

  private emit(body: FruitingBody, state: SimulationState, config: SimulationConfig): void {
    const { rng, bounds } = state;
    for (let k = 0; k < config.fruitingSporeCount; k++) {
      const angle = rng.angle();
      const r = rng.range(0, config.fruitingSporeRadius);
      this.spores.push({
        id: this.nextSporeId++,
        x: clamp(body.x + Math.cos(angle) * r, bounds.min, bounds.max),
        y: clamp(body.y + Math.sin(angle) * r, bounds.min, bounds.max),
        vx: Math.cos(angle) * config.sporeDrift,
        vy: Math.sin(angle) * config.sporeDrift,
        age: 0,
        energy: config.sporeEnergy,
      });
    }
    body.emissions += 1;
  }

  private updateSpores(state: SimulationState, config: SimulationConfig): void {
    const { rng, bounds, field, pool, obstacles } = state;
    const threshold = config.sporeGerminationThreshold / Math.max(EPSILON, state.weather.germinationMultiplier());
    const kept: Spore[] = [];

    for (const spore of this.spores) {
      spore.age += 1;
      spore.x += spore.vx + rng.range(-config.sporeDrift, config.sporeDrift);
      spore.y += spore.vy + rng.range(-config.sporeDrift, config.sporeDrift);
      if (spore.x < bounds.min || spore.x > bounds.max || spore.y < bounds.min || spore.y > bounds.max) continue;
      if (spore.age > config.sporeMaxAge) continue;

      const germinates =
        isEligible(spore, config) &&
        field.availableAt(spore) > threshold &&
        !obstacles.isBlocked(spore.x, spore.y) &&
        pool.spawn({
          x: spore.x,
          y: spore.y,
          heading: rng.angle(),
          energy: splitReserves(spore.energy, config.optimalCarbonNitrogenRatio),
        }) !== null;
      if (germinates) {
        state.births += 1;
        continue;
      }
      kept.push(spore);
    }

    this.spores = kept;
  }
}

export function isEligible(spore: Spore, config: Pick<SimulationConfig, "sporeDormancy">): boolean {
  return spore.age >= config.sporeDormancy;
}

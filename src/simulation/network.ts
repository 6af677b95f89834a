import { reserveTotal, transferReserves } from "./agents";
import type { AgentPool } from "./agents";
import type { SimulationConfig } from "./config";
import { MIN_SIGNAL, RECENT_FLOW_DECAY, SIGNAL_BOOST } from "./constants";
import { invariant } from "./errors";
import { clamp } from "./math";
import type { SpatialIndex } from "./spatialIndex";
import type { Agent, Connection } from "./types";

export interface NodeStats {
  degree: number;
  flow: number; // sum of recent flow over incident connections
}

export interface NetworkUpdate {
  moved: number; // total |flow| this tick
  pruned: number;
}

export function connectionKey(a: number, b: number): string {
  return a < b ? `${a}:${b}` : `${b}:${a}`;
}

/**
 * Undirected connections between agents, keyed by agent id pair. Iteration
 * follows insertion order, which keeps flow and signal passes deterministic.
 */
export class NetworkGraph {
  private readonly edges = new Map<string, Connection>();

  get size(): number {
    return this.edges.size;
  }

  connections(): Connection[] {
    return Array.from(this.edges.values());
  }

  has(a: number, b: number): boolean {
    return this.edges.has(connectionKey(a, b));
  }

  get(a: number, b: number): Connection | undefined {
    return this.edges.get(connectionKey(a, b));
  }

  connect(a: number, b: number, strength: number): Connection {
    invariant(a !== b, `agent ${a} cannot connect to itself`);
    const key = connectionKey(a, b);
    invariant(!this.edges.has(key), `connection ${key} already exists`);
    const connection: Connection = {
      a: Math.min(a, b),
      b: Math.max(a, b),
      strength,
      totalFlow: 0,
      recentFlow: 0,
      lastFlow: 0,
      signal: 0,
      age: 0,
    };
    this.edges.set(key, connection);
    return connection;
  }

  disconnect(a: number, b: number): boolean {
    return this.edges.delete(connectionKey(a, b));
  }

  /**
   * Connect every unconnected pair of live agents within
   * `anastomosisDistance`. A new connection evens out part of the reserve
   * difference between its endpoints once.
   */
  formConnections(
    pool: AgentPool,
    index: SpatialIndex,
    config: Pick<
      SimulationConfig,
      "anastomosisDistance" | "anastomosisBalanceFraction" | "initialConnectionStrength" | "maxEnergy"
    >,
  ): number {
    const agents = pool.agents;
    let created = 0;
    for (let i = 0; i < agents.length; i++) {
      const a = agents[i];
      if (!a.alive) continue;
      for (const j of index.neighbors(a.x, a.y, config.anastomosisDistance)) {
        if (j <= i) continue;
        const b = agents[j];
        if (!b.alive || this.has(a.id, b.id)) continue;
        this.connect(a.id, b.id, config.initialConnectionStrength);
        balance(a, b, config.anastomosisBalanceFraction, config.maxEnergy);
        created++;
      }
    }
    return created;
  }

  /** Drop every connection with an endpoint that is dead or gone. */
  removeDead(pool: AgentPool): number {
    let removed = 0;
    for (const [key, c] of this.edges) {
      if (!pool.isAlive(c.a) || !pool.isAlive(c.b)) {
        this.edges.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Per-tick network dynamics: flow along each connection from the richer
   * endpoint to the poorer one, reinforcement or decay of strength, pruning,
   * then signal propagation over the surviving connections.
   */
  update(
    pool: AgentPool,
    config: Pick<
      SimulationConfig,
      | "connectionFlowRate"
      | "maxFlowPerTick"
      | "maxEnergy"
      | "adaptiveGrowthEnabled"
      | "flowStrengtheningRate"
      | "strengthDecayRate"
      | "minConnectionStrength"
      | "pruningThreshold"
      | "signalPropagationEnabled"
      | "signalDecayRate"
      | "signalHopDecay"
      | "signalThreshold"
    >,
  ): NetworkUpdate {
    let moved = 0;
    let pruned = 0;

    for (const [key, c] of this.edges) {
      const a = this.endpoint(pool, c.a, key);
      const b = this.endpoint(pool, c.b, key);
      c.age += 1;

      const diff = reserveTotal(a.energy) - reserveTotal(b.energy);
      const wanted = clamp(diff * config.connectionFlowRate * c.strength, -config.maxFlowPerTick, config.maxFlowPerTick);
      const flow =
        wanted >= 0
          ? transferReserves(a, b, wanted, config.maxEnergy)
          : -transferReserves(b, a, -wanted, config.maxEnergy);
      const magnitude = Math.abs(flow);
      c.lastFlow = flow;
      c.totalFlow += magnitude;
      c.recentFlow = c.recentFlow * RECENT_FLOW_DECAY + magnitude;
      moved += magnitude;

      if (config.adaptiveGrowthEnabled) {
        const reinforced = c.strength + magnitude * config.flowStrengtheningRate;
        c.strength = clamp(reinforced * config.strengthDecayRate, config.minConnectionStrength, 1);
      }
      if (c.strength < config.pruningThreshold) {
        this.edges.delete(key);
        pruned++;
      }
    }

    if (config.signalPropagationEnabled) {
      this.propagateSignals(pool, config);
    }

    return { moved, pruned };
  }

  private propagateSignals(
    pool: AgentPool,
    config: Pick<SimulationConfig, "signalDecayRate" | "signalHopDecay" | "signalThreshold">,
  ): void {
    for (const agent of pool.agents) {
      if (!agent.alive) continue;
      agent.signal *= config.signalDecayRate;
      if (agent.signal < MIN_SIGNAL) agent.signal = 0;
    }
    for (const [key, c] of this.edges) {
      const a = this.endpoint(pool, c.a, key);
      const b = this.endpoint(pool, c.b, key);
      const carried = ((a.signal + b.signal) / 2) * c.strength * config.signalHopDecay;
      c.signal = carried;
      if (carried > config.signalThreshold) {
        a.signal = Math.min(1, a.signal + carried * SIGNAL_BOOST);
        b.signal = Math.min(1, b.signal + carried * SIGNAL_BOOST);
      }
    }
  }

  private endpoint(pool: AgentPool, id: number, key: string): Agent {
    const agent = pool.get(id);
    invariant(agent !== undefined && agent.alive, `connection ${key} references dead agent ${id}`);
    return agent;
  }

  /** Degree and recent flow per agent id, for agents with at least one connection. */
  nodeStats(): Map<number, NodeStats> {
    const stats = new Map<number, NodeStats>();
    const bump = (id: number, flow: number): void => {
      const s = stats.get(id);
      if (s) {
        s.degree += 1;
        s.flow += flow;
      } else {
        stats.set(id, { degree: 1, flow });
      }
    };
    for (const c of this.edges.values()) {
      bump(c.a, c.recentFlow);
      bump(c.b, c.recentFlow);
    }
    return stats;
  }

  /** Throws InvariantError if any connection is dangling or duplicated. */
  assertIntegrity(pool: AgentPool): void {
    for (const [key, c] of this.edges) {
      invariant(key === connectionKey(c.a, c.b), `connection ${key} is stored under the wrong key`);
      invariant(c.a !== c.b, `connection ${key} is a self-loop`);
      this.endpoint(pool, c.a, key);
      this.endpoint(pool, c.b, key);
    }
  }
}

/** One-time reserve balancing when two agents first connect. */
function balance(a: Agent, b: Agent, fraction: number, maxEnergy: number): number {
  const diff = reserveTotal(a.energy) - reserveTotal(b.energy);
  if (diff === 0 || fraction <= 0) return 0;
  const amount = Math.abs(diff) * fraction;
  return diff > 0 ? transferReserves(a, b, amount, maxEnergy) : transferReserves(b, a, amount, maxEnergy);
}

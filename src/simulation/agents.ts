import { invariant } from "./errors";
import type { Agent, DeathCause, Reserves } from "./types";

export interface AgentInit {
  x: number;
  y: number;
  heading: number;
  energy: Reserves;
  parentId?: number | null;
  strength?: number;
  senescence?: number;
}

export function reserveTotal(r: Reserves): number {
  return r.carbon + r.nitrogen;
}

/** Split a reserve total into carbon and nitrogen at the given C:N ratio. */
export function splitReserves(total: number, ratio: number): Reserves {
  return { carbon: (total * ratio) / (ratio + 1), nitrogen: total / (ratio + 1) };
}

/**
 * Move up to `amount` of reserves from donor to recipient, in the donor's
 * own carbon:nitrogen proportion. Bounded by what the donor holds and by
 * the recipient's remaining capacity. Returns the amount moved.
 */
export function transferReserves(donor: Agent, recipient: Agent, amount: number, maxEnergy: number): number {
  const held = reserveTotal(donor.energy);
  const room = maxEnergy - reserveTotal(recipient.energy);
  const moved = Math.min(amount, held, room);
  if (moved <= 0 || held <= 0) return 0;
  const fraction = moved / held;
  const carbon = donor.energy.carbon * fraction;
  const nitrogen = donor.energy.nitrogen * fraction;
  donor.energy.carbon -= carbon;
  donor.energy.nitrogen -= nitrogen;
  recipient.energy.carbon += carbon;
  recipient.energy.nitrogen += nitrogen;
  return carbon + nitrogen;
}

/**
 * Arena of agents. Ids are handed out monotonically and never reused; an
 * agent that dies stays in `agents` (with `alive` false) until the batched
 * `reap()` at the end of the tick, so indices taken during a tick stay valid.
 */
export class AgentPool {
  readonly agents: Agent[] = [];
  private readonly byId = new Map<number, Agent>();
  private nextId = 1;
  private live = 0;

  /** @param maxAgents alive-agent cap; 0 means unlimited */
  constructor(private readonly maxAgents: number) {}

  get aliveCount(): number {
    return this.live;
  }

  get(id: number): Agent | undefined {
    return this.byId.get(id);
  }

  isAlive(id: number): boolean {
    return this.byId.get(id)?.alive === true;
  }

  hasCapacity(): boolean {
    return this.maxAgents === 0 || this.live < this.maxAgents;
  }

  /** Add an agent, or return null when the population cap is reached. */
  spawn(init: AgentInit): Agent | null {
    if (!this.hasCapacity()) return null;
    const id = this.nextId++;
    invariant(!this.byId.has(id), `agent id ${id} reused before its previous owner was reaped`);
    const agent: Agent = {
      id,
      x: init.x,
      y: init.y,
      prevX: init.x,
      prevY: init.y,
      heading: init.heading,
      energy: { carbon: init.energy.carbon, nitrogen: init.energy.nitrogen },
      age: 0,
      strength: init.strength ?? 1,
      senescence: init.senescence ?? 0,
      signal: 0,
      lastNutrient: null,
      parentId: init.parentId ?? null,
      efficiency: 1,
      alive: true,
      deathCause: null,
    };
    this.agents.push(agent);
    this.byId.set(id, agent);
    this.live++;
    return agent;
  }

  kill(agent: Agent, cause: DeathCause): void {
    invariant(agent.alive, `agent ${agent.id} killed twice`);
    agent.alive = false;
    agent.deathCause = cause;
    this.live--;
  }

  /** Remove every dead agent. Returns the removed agents in arena order. */
  reap(): Agent[] {
    const dead: Agent[] = [];
    let write = 0;
    for (const agent of this.agents) {
      if (agent.alive) {
        this.agents[write++] = agent;
      } else {
        dead.push(agent);
        this.byId.delete(agent.id);
      }
    }
    this.agents.length = write;
    return dead;
  }

  living(): Agent[] {
    return this.agents.filter((a) => a.alive);
  }

  totalEnergy(): number {
    let sum = 0;
    for (const a of this.agents) {
      if (a.alive) sum += reserveTotal(a.energy);
    }
    return sum;
  }
}

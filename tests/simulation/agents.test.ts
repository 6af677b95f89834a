import { describe, it, expect } from "vitest";
import { AgentPool, reserveTotal, splitReserves, transferReserves } from "../../src/simulation/agents";
import type { AgentInit } from "../../src/simulation/agents";
import { InvariantError } from "../../src/simulation/errors";
import { DeathCause } from "../../src/simulation/types";

function init(x: number, y: number, carbon = 0.5, nitrogen = 0): AgentInit {
  return { x, y, heading: 0, energy: { carbon, nitrogen } };
}

function spawnOrFail(pool: AgentPool, agent: AgentInit) {
  const spawned = pool.spawn(agent);
  if (!spawned) throw new Error("spawn refused");
  return spawned;
}

// ---------------------------------------------------------------------------
// Pool
// ---------------------------------------------------------------------------

describe("AgentPool", () => {
  it("hands out increasing ids", () => {
    const pool = new AgentPool(0);
    const ids = [init(1, 1), init(2, 2), init(3, 3)].map((a) => spawnOrFail(pool, a).id);
    expect(ids).toEqual([1, 2, 3]);
    expect(pool.aliveCount).toBe(3);
  });

  it("refuses to spawn past the cap", () => {
    const pool = new AgentPool(2);
    spawnOrFail(pool, init(1, 1));
    spawnOrFail(pool, init(2, 2));
    expect(pool.hasCapacity()).toBe(false);
    expect(pool.spawn(init(3, 3))).toBeNull();
    expect(pool.aliveCount).toBe(2);
  });

  it("keeps dead agents until reaped and never reuses their ids", () => {
    const pool = new AgentPool(0);
    const a = spawnOrFail(pool, init(1, 1));
    const b = spawnOrFail(pool, init(2, 2));
    const c = spawnOrFail(pool, init(3, 3));

    pool.kill(b, DeathCause.Starvation);
    expect(pool.aliveCount).toBe(2);
    expect(pool.agents).toHaveLength(3);
    expect(pool.isAlive(b.id)).toBe(false);
    expect(b.deathCause).toBe(DeathCause.Starvation);

    const reaped = pool.reap();
    expect(reaped.map((r) => r.id)).toEqual([2]);
    expect(pool.agents.map((r) => r.id)).toEqual([a.id, c.id]);
    expect(pool.get(b.id)).toBeUndefined();

    expect(spawnOrFail(pool, init(4, 4)).id).toBe(4);
  });

  it("frees capacity once an agent dies", () => {
    const pool = new AgentPool(1);
    const a = spawnOrFail(pool, init(1, 1));
    pool.kill(a, DeathCause.Senescence);
    expect(pool.spawn(init(2, 2))).not.toBeNull();
  });

  it("rejects killing an agent twice", () => {
    const pool = new AgentPool(0);
    const a = spawnOrFail(pool, init(1, 1));
    pool.kill(a, DeathCause.Collapse);
    expect(() => pool.kill(a, DeathCause.Collapse)).toThrow(InvariantError);
  });

  it("counts energy of living agents only", () => {
    const pool = new AgentPool(0);
    spawnOrFail(pool, init(1, 1, 0.3, 0.1));
    const b = spawnOrFail(pool, init(2, 2, 0.5, 0));
    pool.kill(b, DeathCause.Fusion);
    expect(pool.totalEnergy()).toBeCloseTo(0.4, 12);
    expect(pool.living()).toHaveLength(1);
  });

  it("copies the initial reserves", () => {
    const pool = new AgentPool(0);
    const energy = { carbon: 0.2, nitrogen: 0.1 };
    const a = spawnOrFail(pool, { x: 1, y: 1, heading: 0, energy });
    energy.carbon = 0.9;
    expect(a.energy.carbon).toBe(0.2);
    expect(a.strength).toBe(1);
    expect(a.parentId).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Reserves
// ---------------------------------------------------------------------------

describe("Reserves", () => {
  it("split at the carbon:nitrogen ratio", () => {
    const r = splitReserves(1.1, 10);
    expect(r.carbon).toBeCloseTo(1, 12);
    expect(r.nitrogen).toBeCloseTo(0.1, 12);
    expect(reserveTotal(r)).toBeCloseTo(1.1, 12);
  });

  it("transfer in the donor's proportions", () => {
    const pool = new AgentPool(0);
    const donor = spawnOrFail(pool, init(1, 1, 0.6, 0.2));
    const recipient = spawnOrFail(pool, init(2, 2, 0.1, 0));
    const moved = transferReserves(donor, recipient, 0.4, 1);

    expect(moved).toBeCloseTo(0.4, 12);
    expect(donor.energy.carbon).toBeCloseTo(0.3, 12);
    expect(donor.energy.nitrogen).toBeCloseTo(0.1, 12);
    expect(recipient.energy.carbon).toBeCloseTo(0.4, 12);
    expect(recipient.energy.nitrogen).toBeCloseTo(0.1, 12);
  });

  it("transfer no more than the recipient can hold", () => {
    const pool = new AgentPool(0);
    const donor = spawnOrFail(pool, init(1, 1, 0.8, 0));
    const recipient = spawnOrFail(pool, init(2, 2, 0.9, 0));
    expect(transferReserves(donor, recipient, 0.5, 1)).toBeCloseTo(0.1, 12);
    expect(reserveTotal(recipient.energy)).toBeCloseTo(1, 12);
  });

  it("transfer nothing from an empty donor", () => {
    const pool = new AgentPool(0);
    const donor = spawnOrFail(pool, init(1, 1, 0, 0));
    const recipient = spawnOrFail(pool, init(2, 2, 0.1, 0));
    expect(transferReserves(donor, recipient, 0.5, 1)).toBe(0);
  });
});

// Regression guards over long default runs. Narrower behaviour is covered in
// tests/simulation.

import { describe, it, expect } from "vitest";
import { Simulation } from "../../src/simulation/simulation";

describe("Simulation essentials", () => {
  it("all agents stay within bounds after 100 ticks", () => {
    const sim = new Simulation();
    sim.stepMany(100);

    const { min, max } = sim.state.bounds;
    for (const agent of sim.snapshot().agents) {
      expect(agent.x).toBeGreaterThanOrEqual(min);
      expect(agent.x).toBeLessThanOrEqual(max);
      expect(agent.y).toBeGreaterThanOrEqual(min);
      expect(agent.y).toBeLessThanOrEqual(max);
    }
  });

  it("the colony is still alive after 250 ticks", () => {
    const sim = new Simulation();
    sim.stepMany(250);
    expect(sim.aliveCount).toBeGreaterThan(0);
  });

  it("every connection joins two living agents", () => {
    const sim = new Simulation();
    sim.stepMany(200);
    const alive = new Set(sim.snapshot().agents.map((a) => a.id));
    for (const c of sim.snapshot().connections) {
      expect(alive.has(c.a)).toBe(true);
      expect(alive.has(c.b)).toBe(true);
      expect(c.a).toBeLessThan(c.b);
    }
  });
});

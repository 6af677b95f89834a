import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { SimulationRunner } from "../../src/simulation/runner";
import { Simulation } from "../../src/simulation/simulation";
import { QUIET } from "./helpers";

// ---------------------------------------------------------------------------
// Tick Rate
// ---------------------------------------------------------------------------

describe("SimulationRunner", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  function runner(options: ConstructorParameters<typeof SimulationRunner>[1] = {}) {
    const sim = new Simulation(1, { ...QUIET, tickRate: 10 });
    return { sim, runner: new SimulationRunner(sim, options) };
  }

  it("runs tickRate ticks per second of wall time", () => {
    const { sim, runner: r } = runner();
    r.start();
    expect(r.running).toBe(true);
    vi.advanceTimersByTime(1000);
    expect(sim.tick).toBe(10);
    r.stop();
    vi.advanceTimersByTime(1000);
    expect(sim.tick).toBe(10);
    expect(r.running).toBe(false);
  });

  it("scales with the speed multiplier", () => {
    const { sim, runner: r } = runner();
    r.setSpeed(2);
    r.start();
    vi.advanceTimersByTime(1000);
    expect(sim.tick).toBe(20);
    r.stop();
  });

  it("carries fractional speed across frames", () => {
    const { sim, runner: r } = runner();
    r.setSpeed(0.5);
    r.start();
    vi.advanceTimersByTime(1000);
    expect(sim.tick).toBe(5);
    r.stop();
  });

  it("caps catch-up work per frame", () => {
    const { sim, runner: r } = runner();
    r.setSpeed(50);
    r.start();
    vi.advanceTimersByTime(100);
    expect(sim.tick).toBe(10);
    r.stop();
  });

  it("rejects a negative or non-finite speed", () => {
    const { runner: r } = runner();
    expect(() => r.setSpeed(-1)).toThrow(RangeError);
    expect(() => r.setSpeed(Number.NaN)).toThrow(RangeError);
    expect(r.speedMultiplier).toBe(1);
  });

  it("holds still while paused but still steps on request", () => {
    const { sim, runner: r } = runner();
    r.start();
    vi.advanceTimersByTime(300);
    expect(sim.tick).toBe(3);

    r.pause();
    vi.advanceTimersByTime(500);
    expect(sim.tick).toBe(3);
    expect(r.stepMany(2)).toBe(5);

    expect(r.togglePause()).toBe(false);
    vi.advanceTimersByTime(200);
    expect(sim.tick).toBe(7);
    r.stop();
  });

  it("stops and reports a failing tick", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const onError = vi.fn();
    const { sim, runner: r } = runner({ onError });
    const failure = new Error("tick exploded");
    sim.step = () => {
      throw failure;
    };

    r.start();
    vi.advanceTimersByTime(500);
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError).toHaveBeenCalledWith(failure);
    expect(r.running).toBe(false);
    expect(r.lastError).toBe(failure);
  });
});

import { MAX_CATCHUP_TICKS } from "./constants";
import { createLogger } from "./logger";
import type { Simulation } from "./simulation";

const log = createLogger("runner");

export interface RunnerOptions {
  /** Called when a tick throws. The runner has already stopped. Without it the error is rethrown. */
  onError?: (error: unknown) => void;
}

/**
 * Real-time driver for a Simulation. Frames fire every `1000 / tickRate` ms;
 * each frame adds the speed multiplier to an accumulator and runs its whole
 * part as ticks (at most MAX_CATCHUP_TICKS). A slow frame pushes the next one
 * back rather than overlapping it. Pausing stops automatic ticks only;
 * `stepMany` still works.
 */
export class SimulationRunner {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private accumulator = 0;
  private speed: number;
  paused = false;
  lastError: unknown = null;

  constructor(
    readonly simulation: Simulation,
    private readonly options: RunnerOptions = {},
  ) {
    this.speed = simulation.getConfig().speedMultiplier;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  get speedMultiplier(): number {
    return this.speed;
  }

  private get interval(): number {
    return 1000 / this.simulation.getConfig().tickRate;
  }

  start(): void {
    if (this.timer !== null) return;
    this.lastError = null;
    this.accumulator = 0;
    log.info("runner started", { interval: this.interval, speed: this.speed });
    this.schedule(this.interval);
  }

  stop(): void {
    if (this.timer === null) return;
    clearTimeout(this.timer);
    this.timer = null;
    log.info("runner stopped", { tick: this.simulation.tick });
  }

  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
  }

  togglePause(): boolean {
    this.paused = !this.paused;
    return this.paused;
  }

  setSpeed(multiplier: number): void {
    if (!Number.isFinite(multiplier) || multiplier < 0) {
      throw new RangeError(`Speed multiplier must be a non-negative number, got ${multiplier}`);
    }
    this.speed = multiplier;
  }

  /** Run `count` ticks now, paused or not. Returns the tick index reached. */
  stepMany(count: number): number {
    return this.simulation.stepMany(count);
  }

  private schedule(delay: number): void {
    this.timer = setTimeout(() => this.frame(), delay);
  }

  private frame(): void {
    const started = Date.now();
    if (!this.paused) {
      this.accumulator += this.speed;
      const ticks = Math.min(Math.floor(this.accumulator), MAX_CATCHUP_TICKS);
      this.accumulator = Math.min(this.accumulator - ticks, MAX_CATCHUP_TICKS);
      try {
        for (let i = 0; i < ticks; i++) this.simulation.step();
      } catch (error) {
        this.timer = null;
        this.lastError = error;
        log.error("tick failed, runner stopped", {
          tick: this.simulation.tick,
          error: error instanceof Error ? error.message : String(error),
        });
        if (!this.options.onError) throw error;
        this.options.onError(error);
        return;
      }
    }
    const elapsed = Date.now() - started;
    this.schedule(Math.max(0, this.interval - elapsed));
  }
}

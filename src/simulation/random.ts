import seedrandom from "seedrandom";

/** The single seeded stream an engine instance draws from. */
export class Rng {
  private readonly prng: seedrandom.PRNG;

  constructor(seed: number | string) {
    this.prng = seedrandom(String(seed));
  }

  /** Uniform in [0, 1). */
  next(): number {
    return this.prng();
  }

  /** Uniform in [min, max). */
  range(min: number, max: number): number {
    return min + this.prng() * (max - min);
  }

  /** Integer in [min, maxExclusive). */
  int(min: number, maxExclusive: number): number {
    return min + Math.floor(this.prng() * (maxExclusive - min));
  }

  chance(probability: number): boolean {
    return this.prng() < probability;
  }

  angle(): number {
    return this.prng() * Math.PI * 2;
  }
}

import type { SimulationConfig } from "./config";
import { clamp } from "./math";
import type { Rng } from "./random";
import { Season } from "./types";
import type { WeatherReading } from "./types";

export type WeatherOptions = Pick<
  SimulationConfig,
  "weatherEnabled" | "seasonalCycleEnabled" | "ticksPerSeason" | "weatherAffectsGrowth" | "weatherAffectsEnergy"
>;

const SEASONS: readonly Season[] = [Season.Spring, Season.Summer, Season.Autumn, Season.Winter];

const SEASON_HUMIDITY: Record<Season, number> = {
  [Season.Spring]: 0.75,
  [Season.Summer]: 0.45,
  [Season.Autumn]: 0.7,
  [Season.Winter]: 0.6,
};

const SEASON_RAIN_CHANCE: Record<Season, number> = {
  [Season.Spring]: 0.001,
  [Season.Summer]: 0.0002,
  [Season.Autumn]: 0.0008,
  [Season.Winter]: 0.0005,
};

const SEASON_FRUITING: Record<Season, number> = {
  [Season.Spring]: 0.6,
  [Season.Summer]: 0.3,
  [Season.Autumn]: 1.5,
  [Season.Winter]: 0.2,
};

// Temperature is unitless: 0 freezing, ~1 optimal, 2 too hot.
const BASE_TEMPERATURE = 0.85;
const BASE_HUMIDITY = 0.65;
const DEFAULT_RAIN_CHANCE = 0.0005;
const TICKS_PER_DAY_UNIT = 60;
const OPTIMAL_TEMPERATURE_LOW = 0.8;
const OPTIMAL_TEMPERATURE_HIGH = 1.2;
const DRY_HUMIDITY = 0.4;

/**
 * Temperature, humidity and rain. The next state depends only on the current
 * one plus the random stream; the multipliers are pure functions of it.
 * With weather disabled nothing changes, rain stays at 0 and every
 * multiplier is 1.
 */
export class EnvironmentState {
  temperature = BASE_TEMPERATURE;
  humidity = BASE_HUMIDITY;
  rain = 0;
  time = 0; // ticks
  season = Season.Spring;
  seasonProgress = 0; // 0..1 within the current season

  constructor(private readonly options: WeatherOptions) {}

  update(rng: Rng): void {
    if (!this.options.weatherEnabled) return;
    this.time += 1;

    const seasonal = this.options.seasonalCycleEnabled;
    if (seasonal) {
      const yearPosition = (this.time / this.options.ticksPerSeason) % SEASONS.length;
      this.season = SEASONS[Math.floor(yearPosition)];
      this.seasonProgress = yearPosition - Math.floor(yearPosition);
    }

    const dayNight = Math.sin((this.time / TICKS_PER_DAY_UNIT) * 0.03) * 0.1;
    const noise = (rng.next() - 0.5) * 0.03;
    const target = (seasonal ? this.seasonalTemperature() : BASE_TEMPERATURE) + dayNight;
    this.temperature = clamp(this.temperature * 0.998 + (target + noise) * 0.002, 0.3, 1.6);

    if (this.rain > 0.1) {
      this.humidity = Math.min(0.95, this.humidity + this.rain * 0.02);
    } else {
      const humidityTarget = seasonal ? SEASON_HUMIDITY[this.season] : BASE_HUMIDITY;
      this.humidity = Math.max(0.3, this.humidity * 0.999 + humidityTarget * 0.001);
    }

    const rainChance = seasonal ? SEASON_RAIN_CHANCE[this.season] : DEFAULT_RAIN_CHANCE;
    if (rng.next() < rainChance) {
      this.rain = rng.range(0.4, 1);
    } else if (this.rain > 0) {
      this.rain = Math.max(0, this.rain - 0.005);
    }
  }

  private seasonalTemperature(): number {
    const t = this.seasonProgress;
    switch (this.season) {
      case Season.Spring:
        return 0.7 + t * 0.3;
      case Season.Summer:
        return 1.0 + t * 0.4;
      case Season.Autumn:
        return 1.4 - t * 0.3;
      case Season.Winter:
        return 1.1 - t * 0.5;
    }
  }

  /** Scales step length and branching. */
  growthMultiplier(): number {
    if (!this.options.weatherEnabled || !this.options.weatherAffectsGrowth) return 1;
    const t = this.temperature;
    let temperatureFactor: number;
    if (t < 0.5) temperatureFactor = 0.4 + (t / 0.5) * 0.3;
    else if (t < OPTIMAL_TEMPERATURE_LOW) temperatureFactor = 0.7 + ((t - 0.5) / 0.3) * 0.2;
    else if (t <= OPTIMAL_TEMPERATURE_HIGH) temperatureFactor = 1;
    else if (t < 1.4) temperatureFactor = 1 - ((t - 1.2) / 0.2) * 0.2;
    else temperatureFactor = 0.8 - Math.min(1, (t - 1.4) / 0.1) * 0.3;

    const h = this.humidity;
    let humidityFactor: number;
    if (h < DRY_HUMIDITY) humidityFactor = 0.5 + (h / DRY_HUMIDITY) * 0.4;
    else if (h <= 0.9) humidityFactor = 1;
    else humidityFactor = 1 - ((h - 0.9) / 0.05) * 0.2;

    const r = this.rain;
    let rainFactor: number;
    if (r < 0.3) rainFactor = 1 + r * 0.15;
    else if (r < 0.7) rainFactor = 1.05 + (r - 0.3) * 0.1;
    else rainFactor = 1.09 - ((r - 0.7) / 0.3) * 0.15;

    return clamp(temperatureFactor * humidityFactor * rainFactor, 0.5, 1.3);
  }

  /** Scales passive energy loss: warm, dry weather costs more. */
  energyConsumptionMultiplier(): number {
    if (!this.options.weatherEnabled || !this.options.weatherAffectsEnergy) return 1;
    const temperatureFactor = 0.85 + (this.temperature - 0.85) * 0.2;
    const humidityFactor = 1.1 - (this.humidity - 0.5) * 0.2;
    return clamp(temperatureFactor * humidityFactor, 0.7, 1.3);
  }

  diffusionMultiplier(): number {
    if (!this.options.weatherEnabled) return 1;
    if (this.rain > 0.5) return 1 - (this.rain - 0.5) * 0.5;
    if (this.rain > 0.1) return 1 + this.rain * 0.3;
    return 1;
  }

  regenerationMultiplier(): number {
    if (!this.options.weatherEnabled) return 1;
    return clamp(0.6 + this.humidity * 0.5 + this.rain * 0.3, 0.5, 1.5);
  }

  germinationMultiplier(): number {
    if (!this.options.weatherEnabled) return 1;
    return Math.min(2, (0.3 + this.humidity * 0.7) * (1 + this.rain * 0.5));
  }

  fruitingMultiplier(): number {
    if (!this.options.weatherEnabled || !this.options.seasonalCycleEnabled) return 1;
    return SEASON_FRUITING[this.season];
  }

  /**
   * How far conditions sit outside the comfortable band, in units of
   * `threshold`, capped at 1. Zero inside the band or with weather off.
   */
  extremity(threshold: number): number {
    if (!this.options.weatherEnabled || threshold <= 0) return 0;
    const tooCold = OPTIMAL_TEMPERATURE_LOW - this.temperature;
    const tooHot = this.temperature - OPTIMAL_TEMPERATURE_HIGH;
    const tooDry = DRY_HUMIDITY - this.humidity;
    const excess = Math.max(0, tooCold, tooHot, tooDry);
    return Math.min(1, excess / threshold);
  }

  temperatureCelsius(): number {
    return -10 + this.temperature * 35;
  }

  reading(): WeatherReading {
    return {
      temperature: this.temperature,
      humidity: this.humidity,
      rain: this.rain,
      season: this.season,
      temperatureCelsius: this.temperatureCelsius(),
      growthMultiplier: this.growthMultiplier(),
    };
  }
}

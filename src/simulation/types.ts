import type { Vec2 } from "./math";

export enum NutrientKind {
  Sugar = "sugar",
  Nitrogen = "nitrogen",
}

export enum DeathCause {
  Starvation = "starvation",
  Senescence = "senescence",
  Collapse = "collapse",
  Fusion = "fusion",
}

export enum Season {
  Spring = "spring",
  Summer = "summer",
  Autumn = "autumn",
  Winter = "winter",
}

/** Energy held by an agent, in nutrient units. */
export interface Reserves {
  carbon: number;
  nitrogen: number;
}

export interface Agent {
  id: number;
  x: number;
  y: number;
  prevX: number;
  prevY: number;
  heading: number; // radians
  energy: Reserves;
  age: number; // ticks alive
  strength: number; // 0..1, scales step length
  senescence: number; // 0..1
  signal: number; // 0..1
  lastNutrient: Vec2 | null;
  parentId: number | null;
  efficiency: number; // growth efficiency from the C:N ratio
  alive: boolean;
  deathCause: DeathCause | null;
}

export interface Connection {
  a: number; // agent id, always the lower of the pair
  b: number;
  strength: number;
  totalFlow: number; // cumulative |flow|
  recentFlow: number; // decaying |flow| accumulator
  lastFlow: number; // signed, positive means a -> b
  signal: number;
  age: number;
}

export interface Segment {
  readonly fromX: number;
  readonly fromY: number;
  readonly toX: number;
  readonly toY: number;
  age: number;
}

export interface Spore {
  id: number;
  x: number;
  y: number;
  vx: number;
  vy: number;
  age: number;
  energy: number;
}

export interface FruitingBody {
  id: number;
  x: number;
  y: number;
  age: number;
  lifespan: number;
  energy: number;
  emissions: number;
  nextEmissionAge: number;
}

export interface Bounds {
  min: number;
  max: number;
}

export interface WeatherReading {
  temperature: number;
  humidity: number;
  rain: number;
  season: Season;
  temperatureCelsius: number;
  growthMultiplier: number;
}

export type DeathCounts = Record<DeathCause, number>;

export interface SimulationStats {
  tick: number;
  aliveCount: number;
  sporeCount: number;
  connectionCount: number;
  fruitingBodyCount: number;
  segmentCount: number;
  totalEnergy: number;
  averageEnergy: number;
  births: number;
  deaths: DeathCounts;
}

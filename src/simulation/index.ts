export { DeathCause, NutrientKind, Season } from "./types";
export type {
  Agent,
  Bounds,
  Connection,
  DeathCounts,
  FruitingBody,
  Reserves,
  Segment,
  SimulationStats,
  Spore,
  WeatherReading,
} from "./types";
export { defaultConfig, resolveConfig, validateConfig } from "./config";
export type { SimulationConfig } from "./config";
export { ConfigError, InvariantError } from "./errors";
export { createLogger, getLogLevel, setLogLevel } from "./logger";
export type { LogLevel, Logger } from "./logger";
export type { Vec2 } from "./math";
export { createInitialState, tick } from "./engine";
export type { SimulationState } from "./engine";
export { Simulation } from "./simulation";
export { SimulationRunner } from "./runner";
export type { RunnerOptions } from "./runner";
export type {
  AgentView,
  ConnectionView,
  FieldView,
  FruitingBodyView,
  SegmentView,
  SimulationSnapshot,
  SnapshotOptions,
  SporeView,
} from "./snapshot";

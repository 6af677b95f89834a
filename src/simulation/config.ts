/** Simulation configuration: every tunable parameter in one place. */

import { ConfigError } from "./errors";

export interface SimulationConfig {
  // World
  gridSize: number; // cells per side
  bucketSize: number; // spatial index bucket edge, in cells
  initialAgentCount: number;
  initialSpread: number; // initial agents land within this distance of the centre
  obstacleCount: number;
  seedNutrientPatches: boolean;

  // Growth
  stepSize: number;
  branchProbability: number;
  branchAngleSpread: number;
  branchOffset: number;
  branchEnergyShare: number;
  gradientWeight: number;
  minGradient: number;
  wanderRange: number;
  tropismAngle: number;
  tropismStrength: number;
  avoidanceDistance: number;
  avoidanceWeight: number;
  boundaryJitter: number;
  maxAgents: number; // 0 = unlimited
  branchingSuppressionThreshold: number; // 0 = never suppress

  // Energy
  maxEnergy: number;
  initialEnergy: number;
  minEnergyToLive: number;
  energyDecayRate: number; // fraction retained per tick, 1 disables decay
  uptakeRate: number; // per-tick absorption cap
  uptakeRadius: number;
  optimalCarbonNitrogenRatio: number;
  ratioTolerance: number;
  minGrowthEfficiency: number;

  // Nutrient field
  nutrientMax: number;
  diffusionRate: number;
  nitrogenDiffusionFactor: number;
  flowStrength: number;
  flowDrift: number;
  regenRate: number;
  regenFloor: number;
  regenSamples: number;

  // Memory
  memoryEnabled: boolean;
  memoryWeight: number;
  memoryDecayRate: number;
  memoryUpdateStrength: number;

  // Network
  anastomosisDistance: number;
  anastomosisBalanceFraction: number;
  initialConnectionStrength: number;
  minConnectionStrength: number;
  pruningThreshold: number;
  connectionFlowRate: number;
  maxFlowPerTick: number;
  adaptiveGrowthEnabled: boolean;
  flowStrengtheningRate: number;
  strengthDecayRate: number;

  // Signals
  signalPropagationEnabled: boolean;
  signalDecayRate: number;
  signalHopDecay: number;
  signalThreshold: number;
  signalTriggerNutrient: number;
  signalSteerThreshold: number;
  signalWeight: number;

  // Fusion
  fusionEnabled: boolean;
  fusionDistance: number;
  fusionMinAge: number;
  fusionEnergyTransfer: number;

  // Senescence
  senescenceEnabled: boolean;
  senescenceMinAge: number;
  senescenceBaseRate: number;
  senescenceFlowThreshold: number;
  senescenceFlowWeight: number;
  senescenceDistanceThreshold: number;
  senescenceDistanceWeight: number;
  senescenceCollapseDistance: number;
  senescenceWeatherThreshold: number;
  senescenceWeatherWeight: number;
  hubMinDegree: number;

  // Trails
  trailsEnabled: boolean;
  maxSegmentAge: number;
  maxSegments: number;

  // Fruiting and spores
  fruitingEnabled: boolean;
  fruitingMinAgents: number;
  fruitingEnergyThreshold: number;
  fruitingCooldown: number;
  fruitingLifespanMin: number;
  fruitingLifespanMax: number;
  fruitingReleaseFraction: number;
  fruitingReleaseInterval: number;
  fruitingMaxEmissions: number;
  fruitingSporeCount: number;
  fruitingSporeRadius: number;
  fruitingTransferRadius: number;
  fruitingDrawRate: number;
  fruitingNutrientReturn: number;
  sporeEnergy: number;
  sporeDrift: number;
  sporeDormancy: number;
  sporeMaxAge: number;
  sporeGerminationThreshold: number;

  // Weather
  weatherEnabled: boolean;
  seasonalCycleEnabled: boolean;
  ticksPerSeason: number;
  weatherAffectsGrowth: boolean;
  weatherAffectsEnergy: boolean;

  // Real-time loop
  tickRate: number; // ticks per second at speed 1
  speedMultiplier: number;
}

export const defaultConfig: SimulationConfig = {
  gridSize: 200,
  bucketSize: 4,
  initialAgentCount: 5,
  initialSpread: 10,
  obstacleCount: 300,
  seedNutrientPatches: true,

  stepSize: 0.5,
  branchProbability: 0.002,
  branchAngleSpread: 1.2,
  branchOffset: 1.5,
  branchEnergyShare: 0.5,
  gradientWeight: 0.5,
  minGradient: 0.08,
  wanderRange: 0.05,
  tropismAngle: Math.PI / 4,
  tropismStrength: 0.01,
  avoidanceDistance: 2,
  avoidanceWeight: 1,
  boundaryJitter: 0.15,
  maxAgents: 5000,
  branchingSuppressionThreshold: 0,

  maxEnergy: 1,
  initialEnergy: 0.5,
  minEnergyToLive: 0.01,
  energyDecayRate: 0.999,
  uptakeRate: 0.01,
  uptakeRadius: 0,
  optimalCarbonNitrogenRatio: 10,
  ratioTolerance: 1,
  minGrowthEfficiency: 0.2,

  nutrientMax: 1,
  diffusionRate: 0.05,
  nitrogenDiffusionFactor: 0.7,
  flowStrength: 0.5,
  flowDrift: 0.05,
  regenRate: 0.0005,
  regenFloor: 0.05,
  regenSamples: 200,

  memoryEnabled: true,
  memoryWeight: 0.3,
  memoryDecayRate: 0.995,
  memoryUpdateStrength: 0.5,

  anastomosisDistance: 2,
  anastomosisBalanceFraction: 0.1,
  initialConnectionStrength: 0.3,
  minConnectionStrength: 0.05,
  pruningThreshold: 0.1,
  connectionFlowRate: 0.02,
  maxFlowPerTick: 0.02,
  adaptiveGrowthEnabled: true,
  flowStrengtheningRate: 2,
  strengthDecayRate: 0.998,

  signalPropagationEnabled: true,
  signalDecayRate: 0.95,
  signalHopDecay: 0.9,
  signalThreshold: 0.1,
  signalTriggerNutrient: 0.5,
  signalSteerThreshold: 0.05,
  signalWeight: 0.3,

  fusionEnabled: true,
  fusionDistance: 1,
  fusionMinAge: 10,
  fusionEnergyTransfer: 0.8,

  senescenceEnabled: true,
  senescenceMinAge: 300,
  senescenceBaseRate: 0.00002,
  senescenceFlowThreshold: 0.01,
  senescenceFlowWeight: 0.0002,
  senescenceDistanceThreshold: 30,
  senescenceDistanceWeight: 0.0001,
  senescenceCollapseDistance: 80,
  senescenceWeatherThreshold: 0.3,
  senescenceWeatherWeight: 0.0002,
  hubMinDegree: 3,

  trailsEnabled: true,
  maxSegmentAge: 1000,
  maxSegments: 20000,

  fruitingEnabled: true,
  fruitingMinAgents: 50,
  fruitingEnergyThreshold: 15,
  fruitingCooldown: 600,
  fruitingLifespanMin: 300,
  fruitingLifespanMax: 600,
  fruitingReleaseFraction: 0.5,
  fruitingReleaseInterval: 60,
  fruitingMaxEmissions: 3,
  fruitingSporeCount: 6,
  fruitingSporeRadius: 4,
  fruitingTransferRadius: 20,
  fruitingDrawRate: 0.01,
  fruitingNutrientReturn: 0.5,
  sporeEnergy: 0.5,
  sporeDrift: 0.05,
  sporeDormancy: 10,
  sporeMaxAge: 500,
  sporeGerminationThreshold: 0.6,

  weatherEnabled: true,
  seasonalCycleEnabled: true,
  ticksPerSeason: 3600,
  weatherAffectsGrowth: true,
  weatherAffectsEnergy: true,

  tickRate: 60,
  speedMultiplier: 1,
};

type NumericKey = {
  [K in keyof SimulationConfig]: SimulationConfig[K] extends number ? K : never;
}[keyof SimulationConfig];

type BooleanKey = {
  [K in keyof SimulationConfig]: SimulationConfig[K] extends boolean ? K : never;
}[keyof SimulationConfig];

const BOOLEAN_KEYS: readonly BooleanKey[] = [
  "seedNutrientPatches",
  "memoryEnabled",
  "adaptiveGrowthEnabled",
  "signalPropagationEnabled",
  "fusionEnabled",
  "senescenceEnabled",
  "trailsEnabled",
  "fruitingEnabled",
  "weatherEnabled",
  "seasonalCycleEnabled",
  "weatherAffectsGrowth",
  "weatherAffectsEnergy",
];

// Fractions and probabilities
const UNIT_KEYS: readonly NumericKey[] = [
  "branchProbability",
  "branchEnergyShare",
  "energyDecayRate",
  "minGrowthEfficiency",
  "diffusionRate",
  "nitrogenDiffusionFactor",
  "flowStrength",
  "memoryDecayRate",
  "memoryUpdateStrength",
  "anastomosisBalanceFraction",
  "initialConnectionStrength",
  "minConnectionStrength",
  "pruningThreshold",
  "connectionFlowRate",
  "strengthDecayRate",
  "signalDecayRate",
  "signalHopDecay",
  "signalThreshold",
  "signalSteerThreshold",
  "fusionEnergyTransfer",
  "senescenceBaseRate",
  "fruitingReleaseFraction",
  "fruitingDrawRate",
  "fruitingNutrientReturn",
];

const POSITIVE_KEYS: readonly NumericKey[] = [
  "gridSize",
  "bucketSize",
  "stepSize",
  "maxEnergy",
  "nutrientMax",
  "optimalCarbonNitrogenRatio",
  "ratioTolerance",
  "tickRate",
  "ticksPerSeason",
];

const INTEGER_KEYS: readonly NumericKey[] = [
  "gridSize",
  "initialAgentCount",
  "obstacleCount",
  "maxAgents",
  "branchingSuppressionThreshold",
  "regenSamples",
  "hubMinDegree",
  "maxSegments",
  "fruitingMinAgents",
  "fruitingMaxEmissions",
  "fruitingSporeCount",
];

// Numeric options that may be negative
const SIGNED_KEYS: readonly NumericKey[] = ["tropismAngle"];

const MIN_GRID_SIZE = 8;

/** Collect every problem with a candidate configuration. Empty means valid. */
export function validateConfig(config: SimulationConfig): string[] {
  const issues: string[] = [];

  for (const key of BOOLEAN_KEYS) {
    if (typeof config[key] !== "boolean") issues.push(`${key} must be a boolean`);
  }

  const numericKeys = Object.keys(defaultConfig).filter(
    (key): key is NumericKey => !BOOLEAN_KEYS.some((b) => b === key),
  );
  for (const key of numericKeys) {
    const value = config[key];
    if (typeof value !== "number" || !Number.isFinite(value)) {
      issues.push(`${key} must be a finite number`);
    } else if (value < 0 && !SIGNED_KEYS.includes(key)) {
      issues.push(`${key} must not be negative`);
    }
  }
  // Range checks below assume finite numbers; stop here otherwise.
  if (issues.length > 0) return issues;

  for (const key of UNIT_KEYS) {
    if (config[key] > 1) issues.push(`${key} must be within [0, 1]`);
  }
  for (const key of POSITIVE_KEYS) {
    if (config[key] <= 0) issues.push(`${key} must be positive`);
  }
  for (const key of INTEGER_KEYS) {
    if (!Number.isInteger(config[key])) issues.push(`${key} must be an integer`);
  }

  if (config.gridSize < MIN_GRID_SIZE) {
    issues.push(`gridSize must be at least ${MIN_GRID_SIZE}`);
  }
  if (config.minEnergyToLive >= config.maxEnergy) {
    issues.push("minEnergyToLive must be below maxEnergy");
  }
  if (config.initialEnergy > config.maxEnergy) {
    issues.push("initialEnergy must not exceed maxEnergy");
  }
  if (config.sporeEnergy > config.maxEnergy) {
    issues.push("sporeEnergy must not exceed maxEnergy");
  }
  if (config.pruningThreshold < config.minConnectionStrength) {
    issues.push("pruningThreshold must not be below minConnectionStrength");
  }
  if (config.initialConnectionStrength < config.pruningThreshold) {
    issues.push("initialConnectionStrength must not be below pruningThreshold");
  }
  if (config.fruitingLifespanMax < config.fruitingLifespanMin) {
    issues.push("fruitingLifespanMax must not be below fruitingLifespanMin");
  }
  if (config.senescenceCollapseDistance < config.senescenceDistanceThreshold) {
    issues.push("senescenceCollapseDistance must not be below senescenceDistanceThreshold");
  }
  if (config.nutrientMax > 0 && config.regenFloor > config.nutrientMax) {
    issues.push("regenFloor must not exceed nutrientMax");
  }

  return issues;
}

/** Merge overrides onto the defaults and validate. Throws ConfigError listing every issue. */
export function resolveConfig(overrides: Partial<SimulationConfig> = {}): SimulationConfig {
  const config: SimulationConfig = { ...defaultConfig, ...overrides };
  const issues = validateConfig(config);
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
  return config;
}

// Fixed internal constants. Tunable parameters live in config.ts.

// Field geometry
export const BOUNDARY_MARGIN = 1; // agents stay within [margin, gridSize - 1 - margin]
export const NITROGEN_WEIGHT = 0.5; // nitrogen's share of "available nutrient"
export const MIN_AVAILABLE_NUTRIENT = 0.001; // below this a cell yields nothing
export const NITROGEN_FLOOR_RATIO = 0.6; // regeneration floor for nitrogen, relative to sugar
export const EDGE_FLUX_SHARE = 0.25; // each of the four edges carries a quarter of the rate

// Steering
export const MEMORY_MIN_GRADIENT = 0.01;
export const WEAK_GRADIENT_WANDER_BOOST = 1.5;
export const DENSITY_SLOWDOWN = 0.05; // step scale is 1 / (1 + k * crowding)
export const DENSITY_RADIUS_FACTOR = 2; // crowding counted within this many avoidance radii

// Feeding and energy
export const STRENGTH_GAIN_PER_NUTRIENT = 0.1;
export const EPSILON = 1e-9;

// Branching
export const BRANCH_AGE_BOOST = 0.0005; // per tick of age
export const BRANCH_AGE_BOOST_CAP = 2;
export const BRANCH_MIN_PROBABILITY_RATIO = 0.3;
export const BRANCH_STRENGTH_FACTOR = 0.8;
export const BRANCH_SENESCENCE_FACTOR = 0.5;

// Parent-child translocation
export const TRANSLOCATION_RANGE = 6; // no exchange at or beyond this distance
export const TRANSLOCATION_RATE = 0.002; // share of half the reserve difference, at zero distance
export const MAX_TRANSLOCATION = 0.01; // per pair per tick

// Senescence
export const SENESCENCE_ACCUMULATION = 5; // senescence factor grows by k * death probability

// Network
export const RECENT_FLOW_DECAY = 0.99;
export const SIGNAL_BOOST = 0.3; // share of an edge signal added to each endpoint
export const SIGNAL_PULSE = 1; // signal seeded on a nutrient discovery
export const MIN_SIGNAL = 0.001;

// Fruiting
export const FRUITING_SPAWN_JITTER = 1.5;

// Real-time loop
export const MAX_CATCHUP_TICKS = 10; // per frame, regardless of speed multiplier

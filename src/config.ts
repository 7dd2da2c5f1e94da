// config.ts
// Default tunables for the colony simulation and helpers to build a
// validated configuration from partial overrides.

import { deepClone } from './utils.ts';

/** Every tunable the colony core reads. */
export interface ColonyConfig {
  /** Seed for terrain generation and the colony RNG stream. */
  seed: number;
  /** Chunks along x and z. */
  worldDiameter: number;
  /** Chunks along y. */
  worldHeight: number;
  /** Cells per chunk edge. */
  chunkDiameter: number;
  acidicRegionCount: number;
  acidicRegionRadius: number;
  containerSphereCount: number;
  containerSphereRadius: number;
  /** Workers per generation; the queen is spawned in addition. */
  workerCount: number;
  /** Ticks per generation before it is scored. */
  evaluationSteps: number;
  /** Simulated seconds per tick for the fixed-timestep driver. */
  tickSeconds: number;
  workerMaxHealth: number;
  queenMaxHealth: number;
  /** Health lost every tick; doubled on acidic cells. */
  baseHealthDrain: number;
  mulchHealthRestore: number;
  healthTransferAmount: number;
  /** Fraction of queen max health spent per nest block. */
  queenNestCostFraction: number;
  eliteCount: number;
  mutationStrength: number;
  /** Restore the initial terrain before every generation after the first. */
  resetWorldEachGeneration: boolean;
}

// Defaults tuned for a 128x32x128 world with 32 workers.
export const CFG_DEFAULT: ColonyConfig = {
  seed: 1337,
  worldDiameter: 16,
  worldHeight: 4,
  chunkDiameter: 8,
  acidicRegionCount: 10,
  acidicRegionRadius: 5,
  containerSphereCount: 5,
  containerSphereRadius: 20,
  workerCount: 32,
  evaluationSteps: 700,
  tickSeconds: 0.15,
  workerMaxHealth: 24,
  queenMaxHealth: 48,
  baseHealthDrain: 0.25,
  mulchHealthRestore: 12,
  healthTransferAmount: 3,
  queenNestCostFraction: 1 / 3,
  eliteCount: 4,
  mutationStrength: 0.32,
  resetWorldEachGeneration: true
};

type NumericKey = {
  [K in keyof ColonyConfig]: ColonyConfig[K] extends number ? K : never;
}[keyof ColonyConfig];

/** Inclusive bounds and integer-ness of a numeric tunable. */
interface Bounds {
  min: number;
  max: number;
  int: boolean;
}

const NUMERIC_FIELDS: ReadonlyArray<readonly [NumericKey, Bounds]> = [
  ['seed', { min: -2147483648, max: 4294967295, int: true }],
  ['worldDiameter', { min: 1, max: 64, int: true }],
  ['worldHeight', { min: 1, max: 16, int: true }],
  ['chunkDiameter', { min: 2, max: 32, int: true }],
  ['acidicRegionCount', { min: 0, max: 256, int: true }],
  ['acidicRegionRadius', { min: 0, max: 64, int: true }],
  ['containerSphereCount', { min: 0, max: 256, int: true }],
  ['containerSphereRadius', { min: 0, max: 128, int: true }],
  ['workerCount', { min: 1, max: 4096, int: true }],
  ['evaluationSteps', { min: 1, max: 1_000_000, int: true }],
  ['tickSeconds', { min: 0.01, max: 60, int: false }],
  ['workerMaxHealth', { min: 0.01, max: 1e6, int: false }],
  ['queenMaxHealth', { min: 0.01, max: 1e6, int: false }],
  ['baseHealthDrain', { min: 0, max: 1e6, int: false }],
  ['mulchHealthRestore', { min: 0, max: 1e6, int: false }],
  ['healthTransferAmount', { min: 0, max: 1e6, int: false }],
  ['queenNestCostFraction', { min: 0, max: 1, int: false }],
  ['eliteCount', { min: 1, max: 4096, int: true }],
  ['mutationStrength', { min: 0, max: 16, int: false }]
];

/** Every configuration key, in declaration order. */
export const COLONY_CONFIG_KEYS: ReadonlyArray<keyof ColonyConfig> = [
  ...NUMERIC_FIELDS.map(([key]) => key),
  'resetWorldEachGeneration'
];

function coerceNumber(
  name: string,
  value: unknown,
  fallback: number,
  bounds: Bounds,
  warn?: (msg: string) => void
): number {
  if (value === undefined || value === null) return fallback;
  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string') {
    parsed = Number.parseFloat(value);
  } else {
    parsed = Number.NaN;
  }
  if (!Number.isFinite(parsed)) {
    warn?.(`${name} is invalid; using ${fallback}.`);
    return fallback;
  }
  const rounded = bounds.int ? Math.floor(parsed) : parsed;
  const clamped = Math.max(bounds.min, Math.min(bounds.max, rounded));
  if (clamped !== parsed) {
    warn?.(`${name} was clamped to ${clamped}.`);
  }
  return clamped;
}

function coerceBoolean(
  name: string,
  value: unknown,
  fallback: boolean,
  warn?: (msg: string) => void
): boolean {
  if (value === undefined || value === null) return fallback;
  if (typeof value === 'boolean') return value;
  if (value === 'true' || value === '1' || value === 1) return true;
  if (value === 'false' || value === '0' || value === 0) return false;
  warn?.(`${name} is invalid; using ${fallback}.`);
  return fallback;
}

/**
 * Builds a complete configuration from untrusted overrides.  Unknown keys are
 * ignored; every rejected or clamped value is reported through warn.
 */
export function normalizeColonyConfig(
  input: Partial<Record<keyof ColonyConfig, unknown>>,
  warn?: (msg: string) => void
): ColonyConfig {
  const out = deepClone(CFG_DEFAULT);
  for (const [key, bounds] of NUMERIC_FIELDS) {
    out[key] = coerceNumber(key, input[key], CFG_DEFAULT[key], bounds, warn);
  }
  out.resetWorldEachGeneration = coerceBoolean(
    'resetWorldEachGeneration',
    input.resetWorldEachGeneration,
    CFG_DEFAULT.resetWorldEachGeneration,
    warn
  );
  return out;
}

/**
 * Clones the defaults and applies trusted overrides (tests, embedding code).
 */
export function createColonyConfig(overrides: Partial<ColonyConfig> = {}): ColonyConfig {
  return { ...deepClone(CFG_DEFAULT), ...overrides };
}

/** Terrain dimensions derived from chunk counts. */
export function worldSize(cfg: ColonyConfig): { sizeX: number; sizeY: number; sizeZ: number } {
  return {
    sizeX: cfg.worldDiameter * cfg.chunkDiameter,
    sizeY: cfg.worldHeight * cfg.chunkDiameter,
    sizeZ: cfg.worldDiameter * cfg.chunkDiameter
  };
}

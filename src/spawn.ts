// spawn.ts
// Placement search for agents at generation start.

import type { Logger } from './logger.ts';
import { randomInt, type RandomSource } from './rng.ts';
import { isSolid } from './terrain/cells.ts';
import { topSolidY, type Terrain } from './terrain/terrain.ts';
import { cellKey, clamp, type Cell } from './utils.ts';

/** Uniform column probes before the exhaustive scan. */
export const RANDOM_PROBES = 2400;
/** Probes around an anchor before falling back to the full search. */
export const NEAR_PROBES = 140;
/** Default probe radius around the queen. */
export const NEAR_RADIUS = 8;
/** Rings walked by the last-resort search. */
const FALLBACK_RINGS = 8;

/**
 * Which search produced a cell: 1 random probes, 2 near an anchor,
 * 3 exhaustive scan, 4 forced fallback around the world centre.
 */
export type SpawnTier = 1 | 2 | 3 | 4;

export interface SpawnResult {
  cell: Cell;
  tier: SpawnTier;
}

/** Cells already taken this generation, keyed by cellKey. */
export type OccupiedCells = Set<string>;

/**
 * Standable cell at the top of column (x, z), or null when the column has
 * no solid cell above the floor, is topped by a container, or is taken.
 */
function standableTop(terrain: Terrain, occupied: OccupiedCells, x: number, z: number): Cell | null {
  const y = topSolidY(terrain, x, z);
  if (y < 1) return null;
  const cell = { x, y, z };
  if (occupied.has(cellKey(cell))) return null;
  if (terrain.getCell(x, y, z) === 'container') return null;
  return cell;
}

/** Probes random columns within radius of anchor, clamped inside the border. */
export function findSpawnNear(
  terrain: Terrain,
  occupied: OccupiedCells,
  anchor: Cell,
  rng: RandomSource,
  radius = NEAR_RADIUS
): SpawnResult | null {
  for (let i = 0; i < NEAR_PROBES; i++) {
    const x = clamp(anchor.x + randomInt(rng, -radius, radius + 1), 1, terrain.sizeX - 2);
    const z = clamp(anchor.z + randomInt(rng, -radius, radius + 1), 1, terrain.sizeZ - 2);
    const cell = standableTop(terrain, occupied, x, z);
    if (cell) return { cell, tier: 2 };
  }
  return null;
}

/**
 * Full search: random probes, then a scan of every interior column, then a
 * ring walk out from the centre that converts empty or container cells to
 * grass so something can always be placed.
 *
 * @returns null only when every candidate of the ring walk is occupied.
 */
export function findSpawnCell(
  terrain: Terrain,
  occupied: OccupiedCells,
  rng: RandomSource,
  logger?: Logger
): SpawnResult | null {
  for (let i = 0; i < RANDOM_PROBES; i++) {
    const x = randomInt(rng, 1, terrain.sizeX - 1);
    const z = randomInt(rng, 1, terrain.sizeZ - 1);
    const cell = standableTop(terrain, occupied, x, z);
    if (cell) return { cell, tier: 1 };
  }

  for (let x = 1; x < terrain.sizeX - 1; x++) {
    for (let z = 1; z < terrain.sizeZ - 1; z++) {
      const cell = standableTop(terrain, occupied, x, z);
      if (cell) return { cell, tier: 3 };
    }
  }

  return forceSpawnCell(terrain, occupied, logger);
}

function forceSpawnCell(terrain: Terrain, occupied: OccupiedCells, logger?: Logger): SpawnResult | null {
  const maxX = Math.max(1, terrain.sizeX - 2);
  const maxZ = Math.max(1, terrain.sizeZ - 2);
  const centerX = clamp(Math.floor(terrain.sizeX / 2), 1, maxX);
  const centerZ = clamp(Math.floor(terrain.sizeZ / 2), 1, maxZ);

  for (let radius = 0; radius < FALLBACK_RINGS; radius++) {
    for (let dx = -radius; dx <= radius; dx++) {
      for (let dz = -radius; dz <= radius; dz++) {
        const x = clamp(centerX + dx, 1, maxX);
        const z = clamp(centerZ + dz, 1, maxZ);
        const y = Math.max(1, topSolidY(terrain, x, z));
        const cell = { x, y, z };
        if (occupied.has(cellKey(cell))) continue;

        const kind = terrain.getCell(x, y, z);
        if (!isSolid(kind) || kind === 'container') terrain.setCell(x, y, z, 'grass');
        logger?.warn('spawn', `fallback placement used at (${x}, ${y}, ${z})`);
        return { cell, tier: 4 };
      }
    }
  }
  return null;
}

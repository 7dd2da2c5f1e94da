// generator.ts
// Seeded procedural terrain: a hashed value-noise heightmap with mulch
// patches, acidic pockets and indestructible container spheres over a
// container floor.

import { worldSize, type ColonyConfig } from '../config.ts';
import { createRng, hashSeed, randomInt, RNG_STREAM, type RandomSource } from '../rng.ts';
import { clamp01, lerp } from '../utils.ts';
import { isSolid, type CellKind } from './cells.ts';
import { topSolidY, VoxelTerrain } from './terrain.ts';

/** Normalisation constant for hashed uint32 values. */
const UINT32_MAX = 4294967295;

/** Heightmap band as fractions of the world height. */
const HEIGHT_MIN_FRAC = 0.25;
const HEIGHT_MAX_FRAC = 0.6;

/** Noise above this leaves a mulch cell on the surface. */
const MULCH_THRESHOLD = 0.68;
/** Noise above this makes the mulch patch two cells deep. */
const DEEP_MULCH_THRESHOLD = 0.8;

function smoothstep(t: number): number {
  const x = clamp01(t);
  return x * x * (3 - 2 * x);
}

/**
 * Deterministic 2D hash into [0, 1].  Math.imul keeps it stable across
 * platforms.
 */
export function hash2D(seed: number, x: number, y: number): number {
  let h = Math.imul(seed | 0, 0x9e3779b1);
  h ^= Math.imul(x | 0, 0x85ebca6b);
  h ^= Math.imul(y | 0, 0xc2b2ae35);
  h ^= h >>> 16;
  h = Math.imul(h, 0x7feb352d);
  h ^= h >>> 15;
  h = Math.imul(h, 0x846ca68b);
  h ^= h >>> 16;
  return (h >>> 0) / UINT32_MAX;
}

/** Bilinear value noise over a hashed lattice with the given cell scale. */
export function valueNoise(seed: number, x: number, y: number, scale: number): number {
  const safeScale = Math.max(1e-6, scale);
  const nx = x / safeScale;
  const ny = y / safeScale;
  const x0 = Math.floor(nx);
  const y0 = Math.floor(ny);
  const tx = smoothstep(nx - x0);
  const ty = smoothstep(ny - y0);
  const n00 = hash2D(seed, x0, y0);
  const n10 = hash2D(seed, x0 + 1, y0);
  const n01 = hash2D(seed, x0, y0 + 1);
  const n11 = hash2D(seed, x0 + 1, y0 + 1);
  return lerp(lerp(n00, n10, tx), lerp(n01, n11, tx), ty);
}

/**
 * Rewrites solid, non-container cells inside a sphere.
 */
function paintSphere(
  terrain: VoxelTerrain,
  cx: number,
  cy: number,
  cz: number,
  radius: number,
  kind: CellKind
): void {
  const r2 = radius * radius;
  for (let y = Math.max(1, cy - radius); y <= Math.min(terrain.sizeY - 1, cy + radius); y++) {
    for (let z = Math.max(0, cz - radius); z <= Math.min(terrain.sizeZ - 1, cz + radius); z++) {
      for (let x = Math.max(0, cx - radius); x <= Math.min(terrain.sizeX - 1, cx + radius); x++) {
        const dx = x - cx;
        const dy = y - cy;
        const dz = z - cz;
        if (dx * dx + dy * dy + dz * dz > r2) continue;
        const current = terrain.getCell(x, y, z);
        if (!isSolid(current) || current === 'container') continue;
        terrain.setCell(x, y, z, kind);
      }
    }
  }
}

function scatterSpheres(
  terrain: VoxelTerrain,
  rng: RandomSource,
  count: number,
  radius: number,
  kind: CellKind
): void {
  for (let i = 0; i < count; i++) {
    const cx = randomInt(rng, 0, terrain.sizeX);
    const cz = randomInt(rng, 0, terrain.sizeZ);
    const surface = topSolidY(terrain, cx, cz);
    const cy = surface >= 1 ? surface : 1;
    paintSphere(terrain, cx, cy, cz, radius, kind);
  }
}

/**
 * Generates a terrain for the given configuration and snapshots it as the
 * initial state, so resetToInitialState restores exactly this world.
 */
export function generateTerrain(cfg: ColonyConfig): VoxelTerrain {
  const { sizeX, sizeY, sizeZ } = worldSize(cfg);
  const terrain = new VoxelTerrain(sizeX, sizeY, sizeZ);
  const seed = hashSeed(cfg.seed, RNG_STREAM.terrain);
  const rng = createRng(seed);

  terrain.fill(0, 0, 0, sizeX - 1, 0, sizeZ - 1, 'container');

  const minH = Math.max(1, Math.floor(sizeY * HEIGHT_MIN_FRAC));
  const maxH = Math.max(minH, Math.min(sizeY - 1, Math.floor(sizeY * HEIGHT_MAX_FRAC)));
  for (let z = 0; z < sizeZ; z++) {
    for (let x = 0; x < sizeX; x++) {
      const n = valueNoise(seed, x, z, 24) * 0.65 + valueNoise(seed + 1, x, z, 8) * 0.35;
      const height = Math.round(lerp(minH, maxH, n));
      if (height > 1) terrain.fill(x, 1, z, x, height - 1, z, 'stone');
      terrain.setCell(x, height, z, 'grass');

      const mulch = valueNoise(seed + 2, x, z, 6);
      if (mulch > MULCH_THRESHOLD) terrain.setCell(x, height, z, 'mulch');
      if (mulch > DEEP_MULCH_THRESHOLD && height > 1) terrain.setCell(x, height - 1, z, 'mulch');
    }
  }

  scatterSpheres(terrain, rng, cfg.acidicRegionCount, cfg.acidicRegionRadius, 'acidic');
  scatterSpheres(terrain, rng, cfg.containerSphereCount, cfg.containerSphereRadius, 'container');

  terrain.snapshotInitialState();
  return terrain;
}

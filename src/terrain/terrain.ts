import { cellCode, cellFromCode, isSolid, type CellKind } from './cells.ts';

/**
 * Narrow view of the voxel world used by the colony core.  Reads classify a
 * cell; writes replace it.  Out-of-bounds reads are empty.
 */
export interface Terrain {
  readonly sizeX: number;
  readonly sizeY: number;
  readonly sizeZ: number;
  /** Number of nest cells currently in the world. */
  readonly nestBlockCount: number;
  getCell(x: number, y: number, z: number): CellKind;
  setCell(x: number, y: number, z: number, kind: CellKind): void;
  /** Restore the world captured by the last snapshot (usually right after generation). */
  resetToInitialState(): void;
}

/** Dense byte-per-cell terrain with a restorable initial snapshot. */
export class VoxelTerrain implements Terrain {
  readonly sizeX: number;
  readonly sizeY: number;
  readonly sizeZ: number;
  private cells: Uint8Array;
  private initial: Uint8Array;
  private nests = 0;

  constructor(sizeX: number, sizeY: number, sizeZ: number) {
    this.sizeX = Math.max(1, Math.floor(sizeX));
    this.sizeY = Math.max(1, Math.floor(sizeY));
    this.sizeZ = Math.max(1, Math.floor(sizeZ));
    this.cells = new Uint8Array(this.sizeX * this.sizeY * this.sizeZ);
    this.initial = this.cells.slice();
  }

  get nestBlockCount(): number {
    return this.nests;
  }

  inBounds(x: number, y: number, z: number): boolean {
    return x >= 0 && y >= 0 && z >= 0 && x < this.sizeX && y < this.sizeY && z < this.sizeZ;
  }

  private index(x: number, y: number, z: number): number {
    return (y * this.sizeZ + z) * this.sizeX + x;
  }

  getCell(x: number, y: number, z: number): CellKind {
    if (!this.inBounds(x, y, z)) return 'empty';
    return cellFromCode(this.cells[this.index(x, y, z)]);
  }

  setCell(x: number, y: number, z: number, kind: CellKind): void {
    if (!this.inBounds(x, y, z)) return;
    const idx = this.index(x, y, z);
    const prev = this.cells[idx];
    const next = cellCode(kind);
    if (prev === next) return;
    const nestCode = cellCode('nest');
    if (prev === nestCode) this.nests -= 1;
    if (next === nestCode) this.nests += 1;
    this.cells[idx] = next;
  }

  /** Fill an axis-aligned box (inclusive bounds, clipped to the world). */
  fill(x0: number, y0: number, z0: number, x1: number, y1: number, z1: number, kind: CellKind): void {
    for (let y = Math.max(0, y0); y <= Math.min(this.sizeY - 1, y1); y++) {
      for (let z = Math.max(0, z0); z <= Math.min(this.sizeZ - 1, z1); z++) {
        for (let x = Math.max(0, x0); x <= Math.min(this.sizeX - 1, x1); x++) {
          this.setCell(x, y, z, kind);
        }
      }
    }
  }

  /** Capture the current cells as the state restored by resetToInitialState. */
  snapshotInitialState(): void {
    this.initial = this.cells.slice();
  }

  resetToInitialState(): void {
    this.cells.set(this.initial);
    this.nests = 0;
    const nestCode = cellCode('nest');
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] === nestCode) this.nests += 1;
    }
  }
}

/**
 * Highest solid y in a column, scanning down to y=1.  The bottom layer is
 * never reported.
 * @returns y, or -1 when the column has no solid cell above the floor.
 */
export function topSolidY(terrain: Terrain, x: number, z: number): number {
  for (let y = terrain.sizeY - 1; y >= 1; y--) {
    if (isSolid(terrain.getCell(x, y, z))) return y;
  }
  return -1;
}

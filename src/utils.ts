// utils.ts
// General helpers shared across the colony simulation.

/** Integer lattice coordinate of a terrain cell. */
export interface Cell {
  x: number;
  y: number;
  z: number;
}

/** Deeply clones a plain object via JSON serialisation. */
export function deepClone<T>(obj: T): T {
  return JSON.parse(JSON.stringify(obj)) as T;
}

/** Constrains a value to the inclusive range [a, b]. */
export function clamp(x: number, a: number, b: number): number {
  return Math.max(a, Math.min(b, x));
}

/** Clamp into [0, 1]. */
export function clamp01(x: number): number {
  return clamp(x, 0, 1);
}

/**
 * Linear interpolation between a and b by t.
 */
export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/** Stable string key for a cell, usable in Sets and Maps. */
export function cellKey(c: Cell): string {
  return `${c.x},${c.y},${c.z}`;
}

export function sameCell(a: Cell, b: Cell): boolean {
  return a.x === b.x && a.y === b.y && a.z === b.z;
}

/** Manhattan distance across all three axes. */
export function cellDistance(a: Cell, b: Cell): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y) + Math.abs(a.z - b.z);
}

/**
 * Formats a number to a fixed number of decimal places.  With zero decimals
 * the value is rounded.
 */
export function fmtNumber(x: number, decimals: number): string {
  if (decimals === 0) return String(Math.round(x));
  return Number(x).toFixed(decimals);
}

/** Deterministic RNG helpers shared by terrain generation and the colony loop. */

/** Random source returning a float in [0, 1). */
export type RandomSource = () => number;

/** FNV-1a 32-bit offset basis. */
const FNV_OFFSET_BASIS = 0x811c9dc5;
/** FNV-1a 32-bit prime. */
const FNV_PRIME = 0x01000193;

/** Stream ids mixed into the configured seed so subsystems never share draws. */
export const RNG_STREAM = {
  colony: 8128,
  terrain: 4096
} as const;

/**
 * Normalize a number into an unsigned 32-bit integer.
 * @param value - Input value to normalize.
 * @returns Unsigned 32-bit integer.
 */
export function toUint32(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return (Math.floor(value) >>> 0);
}

/**
 * Hash one or more numeric inputs into a 32-bit seed.
 * @param values - Numeric inputs to mix into the hash.
 * @returns Unsigned 32-bit hash.
 */
export function hashSeed(...values: number[]): number {
  let hash = FNV_OFFSET_BASIS;
  for (const value of values) {
    hash ^= toUint32(value);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * Hash an arbitrary JSON-serialisable value into an 8-char hex digest.
 * Used to tag status payloads with the active configuration.
 */
export function hashJson(value: unknown): string {
  const json = JSON.stringify(value) ?? '';
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < json.length; i++) {
    hash ^= json.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return (hash >>> 0).toString(16).padStart(8, '0');
}

/**
 * Create a deterministic xorshift RNG from a 32-bit seed.
 * @param seed - Unsigned 32-bit seed value.
 * @returns Random source function returning [0,1).
 */
export function createRng(seed: number): RandomSource {
  let state = toUint32(seed) || 1;
  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
}

/**
 * Integer in [min, maxExclusive). Returns min when the range is empty.
 */
export function randomInt(rng: RandomSource, min: number, maxExclusive: number): number {
  if (maxExclusive <= min) return min;
  return min + Math.floor(rng() * (maxExclusive - min));
}

/** Uniform float in [min, max). */
export function randomRange(rng: RandomSource, min: number, max: number): number {
  return min + rng() * (max - min);
}

/**
 * Standard normal sample via the Box–Muller transform.
 * The first uniform is floored at 1e-9 so the log stays finite.
 */
export function gaussian(rng: RandomSource): number {
  const u1 = Math.max(1e-9, rng());
  const u2 = rng();
  return Math.sqrt(-2.0 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

/**
 * In-place Fisher–Yates shuffle, walking from the tail.
 * @returns The same array for chaining.
 */
export function shuffleInPlace<T>(rng: RandomSource, items: T[]): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = randomInt(rng, 0, i + 1);
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}

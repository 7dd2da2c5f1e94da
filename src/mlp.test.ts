import { describe, it, expect } from 'vitest';
import {
  evaluatePolicy,
  Genome,
  mutateGenome,
  OUTPUT_SIZE,
  PARAM_COUNT,
  PARAM_LIMIT,
  PARAM_OFFSETS,
  PolicyNetwork
} from './mlp.ts';
import { createRng } from './rng.ts';

/** Test suite label for the policy network and genome utilities. */
const SUITE = 'mlp.ts';

function observation(seed: number): Float32Array {
  const rng = createRng(seed);
  const obs = new Float32Array(24);
  for (let i = 0; i < obs.length; i++) obs[i] = rng() * 2 - 1;
  return obs;
}

describe(SUITE, () => {
  it('lays out 24x10 + 10 + 10x10 + 10 parameters', () => {
    expect(PARAM_COUNT).toBe(360);
    expect(PARAM_OFFSETS.hiddenBias).toBe(240);
    expect(PARAM_OFFSETS.outputWeights).toBe(250);
    expect(PARAM_OFFSETS.outputBias).toBe(350);
  });

  it('rejects a weight vector of the wrong length', () => {
    expect(() => new Genome(new Float32Array(PARAM_COUNT - 1))).toThrow(/expects 360/);
  });

  it('clone is independent of the source', () => {
    const a = Genome.random(createRng(3));
    const b = a.clone();
    b.weights[0] = a.weights[0] + 1;
    expect(b.weights[0]).not.toBe(a.weights[0]);
    expect(Array.from(b.weights.slice(1))).toEqual(Array.from(a.weights.slice(1)));
  });

  it('random genomes stay in [-1, 1)', () => {
    const g = Genome.random(createRng(11));
    for (const w of g.weights) {
      expect(w).toBeGreaterThanOrEqual(-1);
      expect(w).toBeLessThan(1);
    }
  });

  it('forward pass is pure for identical inputs', () => {
    const g = Genome.random(createRng(5));
    const obs = observation(9);
    const first = evaluatePolicy(g, obs);
    const second = evaluatePolicy(g, obs);
    expect(first.length).toBe(OUTPUT_SIZE);
    expect(Array.from(second)).toEqual(Array.from(first));
  });

  it('reused network matches the pure evaluation', () => {
    const net = new PolicyNetwork();
    const g = Genome.random(createRng(21));
    const obs = observation(4);
    expect(Array.from(net.forward(g, obs))).toEqual(Array.from(evaluatePolicy(g, obs)));
  });

  it('outputs equal the output biases when all other weights are zero', () => {
    const w = new Float32Array(PARAM_COUNT);
    for (let o = 0; o < OUTPUT_SIZE; o++) w[PARAM_OFFSETS.outputBias + o] = o * 0.1;
    const out = evaluatePolicy(new Genome(w), observation(2));
    for (let o = 0; o < OUTPUT_SIZE; o++) expect(out[o]).toBeCloseTo(o * 0.1, 6);
  });

  it('mutation clamps every parameter and leaves the parent untouched', () => {
    const parent = new Genome(new Float32Array(PARAM_COUNT).fill(3.9));
    const child = mutateGenome(parent, 16, createRng(8));
    for (const w of child.weights) {
      expect(w).toBeGreaterThanOrEqual(-PARAM_LIMIT);
      expect(w).toBeLessThanOrEqual(PARAM_LIMIT);
    }
    expect(parent.weights.every((w) => Math.abs(w - 3.9) < 1e-6)).toBe(true);
  });

  it('always applies a small drift even without a large kick', () => {
    const parent = new Genome(new Float32Array(PARAM_COUNT));
    // 0.5 never triggers the 14% kick; Box-Muller of (0.5, 0.5) is -sqrt(2 ln 2).
    const child = mutateGenome(parent, 0.32, () => 0.5);
    const drift = -Math.sqrt(-2 * Math.log(0.5)) * 0.32 * 0.015;
    expect(child.weights[0]).toBeCloseTo(drift, 6);
    expect(child.weights[PARAM_COUNT - 1]).toBeCloseTo(drift, 6);
  });
});

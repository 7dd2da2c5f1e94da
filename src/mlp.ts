// mlp.ts
// Fixed-topology policy network shared by every colony member and the
// genome type that encodes its parameters.

import { gaussian, randomRange, type RandomSource } from './rng.ts';
import { clamp } from './utils.ts';

/** Observation slots fed to the network. */
export const OBSERVATION_SIZE = 24;
/** Hidden tanh units. */
export const HIDDEN_SIZE = 10;
/** Action logits: Idle, Move, Dig, Eat, ShareHealth, BuildNest. */
export const ACTION_COUNT = 6;
/** Direction logits: +x, -x, +z, -z. */
export const DIRECTION_COUNT = 4;
export const OUTPUT_SIZE = ACTION_COUNT + DIRECTION_COUNT;

/**
 * Parameter layout, read sequentially: hidden weights (one row of inputs per
 * hidden unit), hidden biases, output weights (one row of hidden values per
 * output), output biases.
 */
export const PARAM_OFFSETS = {
  hiddenWeights: 0,
  hiddenBias: OBSERVATION_SIZE * HIDDEN_SIZE,
  outputWeights: OBSERVATION_SIZE * HIDDEN_SIZE + HIDDEN_SIZE,
  outputBias: OBSERVATION_SIZE * HIDDEN_SIZE + HIDDEN_SIZE + HIDDEN_SIZE * OUTPUT_SIZE
} as const;

export const PARAM_COUNT = PARAM_OFFSETS.outputBias + OUTPUT_SIZE;

/** Every parameter is kept inside this range after mutation. */
export const PARAM_LIMIT = 4;

/** Probability that a parameter receives the large perturbation. */
const LARGE_MUTATION_CHANCE = 0.14;
/** Fine drift scale relative to the mutation strength. */
const DRIFT_SCALE = 0.015;
/** Floor for the mutation sigma. */
const MIN_SIGMA = 0.01;

/**
 * One policy's parameter vector.  Treated as immutable once built: derive
 * new genomes with clone() or mutateGenome().
 */
export class Genome {
  readonly weights: Float32Array;

  constructor(weights: Float32Array) {
    if (weights.length !== PARAM_COUNT) {
      throw new Error(`genome expects ${PARAM_COUNT} parameters, got ${weights.length}`);
    }
    this.weights = weights.slice();
  }

  /**
   * Uniform [-1, 1) initialisation.
   */
  static random(rng: RandomSource): Genome {
    const w = new Float32Array(PARAM_COUNT);
    for (let i = 0; i < w.length; i++) w[i] = randomRange(rng, -1, 1);
    return new Genome(w);
  }

  /** Independent deep copy. */
  clone(): Genome {
    return new Genome(this.weights);
  }
}

/**
 * Single-hidden-layer perceptron: tanh hidden layer, raw logits out.
 * Reuses its buffers between calls; copy the result before calling again if
 * it must outlive the next forward pass.
 */
export class PolicyNetwork {
  _hidden: Float32Array;
  _out: Float32Array;

  constructor() {
    this._hidden = new Float32Array(HIDDEN_SIZE);
    this._out = new Float32Array(OUTPUT_SIZE);
  }

  forward(genome: Genome, input: ArrayLike<number>): Float32Array {
    const w = genome.weights;
    let p = PARAM_OFFSETS.hiddenWeights;
    for (let h = 0; h < HIDDEN_SIZE; h++) {
      let sum = 0;
      for (let i = 0; i < OBSERVATION_SIZE; i++) sum += input[i] * w[p++];
      this._hidden[h] = sum;
    }
    for (let h = 0; h < HIDDEN_SIZE; h++) {
      this._hidden[h] = Math.tanh(this._hidden[h] + w[p++]);
    }
    for (let o = 0; o < OUTPUT_SIZE; o++) {
      let sum = 0;
      for (let h = 0; h < HIDDEN_SIZE; h++) sum += this._hidden[h] * w[p++];
      this._out[o] = sum;
    }
    for (let o = 0; o < OUTPUT_SIZE; o++) this._out[o] += w[p++];
    return this._out;
  }
}

/**
 * Pure forward pass returning a fresh output vector.
 */
export function evaluatePolicy(genome: Genome, observation: ArrayLike<number>): Float32Array {
  return new PolicyNetwork().forward(genome, observation).slice();
}

/**
 * Returns a mutated copy of parent.  Each parameter gets a 14% chance of a
 * N(0, sigma) kick plus an unconditional N(0, 0.015 sigma) drift, then is
 * clamped to [-4, 4].
 */
export function mutateGenome(parent: Genome, strength: number, rng: RandomSource): Genome {
  const child = parent.clone();
  const sigma = Math.max(MIN_SIGMA, strength);
  const w = child.weights;
  for (let i = 0; i < w.length; i++) {
    let v = w[i];
    if (rng() < LARGE_MUTATION_CHANCE) v += gaussian(rng) * sigma;
    v += gaussian(rng) * sigma * DRIFT_SCALE;
    w[i] = clamp(v, -PARAM_LIMIT, PARAM_LIMIT);
  }
  return child;
}

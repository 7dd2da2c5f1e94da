import { describe, it, expect } from 'vitest';
import { Agent } from './agent.ts';
import { createColonyConfig } from './config.ts';
import {
  createInitialPool,
  evolvePopulation,
  evolveQueen,
  evolveWorkers,
  workerPoolSize
} from './evolution.ts';
import { Genome, PARAM_COUNT } from './mlp.ts';
import { createRng } from './rng.ts';

/** Test suite label for population evolution. */
const SUITE = 'evolution.ts';

function constantGenome(value: number): Genome {
  return new Genome(new Float32Array(PARAM_COUNT).fill(value));
}

function scoredWorker(id: number, fitness: number, genome: Genome): Agent {
  const agent = new Agent(id, 'worker', genome, { x: 1, y: 1, z: 1 }, 24);
  agent.fitness = fitness;
  return agent;
}

/** Box-Muller of (u, u), as drawn by a constant random source. */
function gaussianOf(u: number): number {
  return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * u);
}

describe(SUITE, () => {
  it('sizes the initial pool from the worker count', () => {
    const pool = createInitialPool(createColonyConfig({ workerCount: 5 }), createRng(1));
    expect(pool.workers).toHaveLength(5);
    expect(pool.queen.weights).toHaveLength(PARAM_COUNT);
    expect(workerPoolSize(createColonyConfig({ workerCount: 0 }))).toBe(1);
  });

  it('keeps the best workers as unmodified elites', () => {
    const config = createColonyConfig({ workerCount: 4, eliteCount: 2 });
    const workers = [
      scoredWorker(1, 1, constantGenome(0.1)),
      scoredWorker(2, 5, constantGenome(0.5)),
      scoredWorker(3, 3, constantGenome(0.3))
    ];
    const next = evolveWorkers(workers, config, createRng(2));

    expect(next).toHaveLength(4);
    expect(next[0].weights[0]).toBeCloseTo(0.5, 6);
    expect(next[1].weights[0]).toBeCloseTo(0.3, 6);
    expect(next[0]).not.toBe(workers[1].genome);
    expect(next[0].weights).not.toBe(workers[1].genome.weights);
  });

  it('fills the rest with mutated elites', () => {
    const config = createColonyConfig({ workerCount: 3, eliteCount: 1, mutationStrength: 0.32 });
    const workers = [scoredWorker(1, 2, constantGenome(0))];
    // 0.5 never injects a fresh genome, never kicks, and always picks elite 0.
    const next = evolveWorkers(workers, config, () => 0.5);
    const drift = gaussianOf(0.5) * 0.32 * 0.015;
    expect(next).toHaveLength(3);
    expect(next[1].weights[0]).toBeCloseTo(drift, 6);
    expect(next[2].weights[0]).toBeCloseTo(drift, 6);
  });

  it('clamps the elite count to the surviving roster', () => {
    const config = createColonyConfig({ workerCount: 3, eliteCount: 10 });
    const workers = [scoredWorker(1, 1, constantGenome(0.2)), scoredWorker(2, 4, constantGenome(0.4))];
    const next = evolveWorkers(workers, config, createRng(3));
    expect(next).toHaveLength(3);
    expect(next[0].weights[0]).toBeCloseTo(0.4, 6);
    expect(next[1].weights[0]).toBeCloseTo(0.2, 6);
  });

  it('restarts the workers from scratch after a wipeout', () => {
    const next = evolveWorkers([], createColonyConfig({ workerCount: 6 }), () => 0.75);
    expect(next).toHaveLength(6);
    expect(next[5].weights[0]).toBeCloseTo(0.5, 6);
  });

  it('refines a queen that built nests gently', () => {
    const config = createColonyConfig({ mutationStrength: 0.32 });
    const queen = new Agent(0, 'queen', constantGenome(0), { x: 1, y: 1, z: 1 }, 48);
    const next = evolveQueen(constantGenome(1), queen, 2, config, () => 0.2);
    expect(next.weights[0]).toBeCloseTo(gaussianOf(0.2) * 0.32 * 0.25 * 0.015, 6);
  });

  it('pushes a queen without nests harder', () => {
    const config = createColonyConfig({ mutationStrength: 0.32 });
    const queen = new Agent(0, 'queen', constantGenome(0), { x: 1, y: 1, z: 1 }, 48);
    const next = evolveQueen(constantGenome(1), queen, 0, config, () => 0.5);
    expect(next.weights[0]).toBeCloseTo(gaussianOf(0.5) * 0.32 * 1.1 * 0.015, 6);
  });

  it('sometimes replaces a queen without nests', () => {
    const queen = new Agent(0, 'queen', constantGenome(0), { x: 1, y: 1, z: 1 }, 48);
    // 0.2 passes the 30% restart check; a fresh genome drawn from 0.2 is all -0.6.
    const next = evolveQueen(constantGenome(1), queen, 0, createColonyConfig(), () => 0.2);
    expect(next.weights[0]).toBeCloseTo(-0.6, 6);
    expect(next.weights[PARAM_COUNT - 1]).toBeCloseTo(-0.6, 6);
  });

  it('mutates the previous queen genome when there was no queen', () => {
    const config = createColonyConfig({ mutationStrength: 0.32 });
    const next = evolveQueen(constantGenome(1), null, 0, config, () => 0.5);
    expect(next.weights[0]).toBeCloseTo(1 + gaussianOf(0.5) * 0.32 * 0.015, 6);
  });

  it('splits the roster into queen and workers', () => {
    const config = createColonyConfig({ workerCount: 3, eliteCount: 1 });
    const rng = createRng(4);
    const pool = createInitialPool(config, rng);
    const queen = new Agent(0, 'queen', pool.queen.clone(), { x: 1, y: 1, z: 1 }, 48);
    queen.nestsBuilt = 1;
    const workers = pool.workers.map((g, i) => scoredWorker(i + 1, i, g.clone()));
    const next = evolvePopulation(pool, [queen, ...workers], 1, config, rng);
    expect(next.workers).toHaveLength(3);
    expect(Array.from(next.workers[0].weights)).toEqual(Array.from(pool.workers[2].weights));
    expect(next.queen).not.toBe(pool.queen);
  });
});

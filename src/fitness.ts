import type { Agent } from './agent.ts';

/** Fitness weights, kept together so summaries and tests read the same values. */
export const FITNESS_WEIGHTS = {
  queen: { nest: 95, step: 0.08, health: 0.35 },
  worker: { mulch: 4, shared: 6, step: 0.05, queenNest: 4, dug: -0.45 }
} as const;

/** Final per-agent accumulators a fitness score depends on. */
export type FitnessInputs = Pick<
  Agent,
  'role' | 'nestsBuilt' | 'stepsAlive' | 'health' | 'mulchConsumed' | 'healthShared' | 'blocksDug'
>;

export function queenFitness(a: FitnessInputs): number {
  const w = FITNESS_WEIGHTS.queen;
  return a.nestsBuilt * w.nest + a.stepsAlive * w.step + a.health * w.health;
}

/**
 * Workers are rewarded for feeding themselves and the queen, for surviving,
 * and share in every nest the queen built; digging costs a little.
 */
export function workerFitness(a: FitnessInputs, queenNests: number): number {
  const w = FITNESS_WEIGHTS.worker;
  return (
    a.mulchConsumed * w.mulch +
    a.healthShared * w.shared +
    a.stepsAlive * w.step +
    queenNests * w.queenNest +
    a.blocksDug * w.dug
  );
}

export function computeFitness(a: FitnessInputs, queenNests: number): number {
  return a.role === 'queen' ? queenFitness(a) : workerFitness(a, queenNests);
}

/** Summary of one finished generation. */
export interface GenerationSummary {
  generation: number;
  best: number;
  avg: number;
  bestWorker: number;
  nests: number;
  agents: number;
  survivors: number;
}

/**
 * Scores every agent (dead ones included, from their final stats) and
 * writes the result to agent.fitness.
 */
export function scoreGeneration(agents: readonly Agent[], generation: number): GenerationSummary {
  let queenNests = 0;
  for (const a of agents) {
    if (a.isQueen) {
      queenNests = a.nestsBuilt;
      break;
    }
  }

  let total = 0;
  let best = Number.NEGATIVE_INFINITY;
  let bestWorker = Number.NEGATIVE_INFINITY;
  let survivors = 0;
  for (const a of agents) {
    a.fitness = computeFitness(a, queenNests);
    total += a.fitness;
    best = Math.max(best, a.fitness);
    if (!a.isQueen) bestWorker = Math.max(bestWorker, a.fitness);
    if (a.alive) survivors++;
  }

  return {
    generation,
    best: Number.isFinite(best) ? best : 0,
    avg: agents.length > 0 ? total / agents.length : 0,
    bestWorker: Number.isFinite(bestWorker) ? bestWorker : 0,
    nests: queenNests,
    agents: agents.length,
    survivors
  };
}

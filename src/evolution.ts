// evolution.ts
// Elitist selection for workers and nest-conditioned evolution for the queen.

import type { Agent } from './agent.ts';
import type { ColonyConfig } from './config.ts';
import { Genome, mutateGenome } from './mlp.ts';
import { randomInt, type RandomSource } from './rng.ts';
import { clamp } from './utils.ts';

/** Chance that a non-elite worker slot gets a fresh random genome. */
export const FRESH_GENOME_RATE = 0.15;
/** Queen mutation scale after a generation with nests. */
export const QUEEN_EXPLOIT_SCALE = 0.25;
/** Queen mutation scale after a generation without nests. */
export const QUEEN_EXPLORE_SCALE = 1.1;
/** Chance to replace a queen that built nothing. */
export const QUEEN_RESTART_RATE = 0.3;

/** Genomes carried between generations. */
export interface GenomePool {
  queen: Genome;
  workers: Genome[];
}

/** Worker pool size; never below one. */
export function workerPoolSize(config: ColonyConfig): number {
  return Math.max(1, Math.floor(config.workerCount));
}

export function createInitialPool(config: ColonyConfig, rng: RandomSource): GenomePool {
  const workers: Genome[] = [];
  for (let i = 0; i < workerPoolSize(config); i++) workers.push(Genome.random(rng));
  return { workers, queen: Genome.random(rng) };
}

/**
 * Next worker genomes.  Elites are copied unchanged, the rest are either
 * fresh or mutated copies of a random elite.  With no workers at all the
 * pool restarts from scratch.
 */
export function evolveWorkers(workers: readonly Agent[], config: ColonyConfig, rng: RandomSource): Genome[] {
  const size = workerPoolSize(config);
  const next: Genome[] = [];
  if (workers.length === 0) {
    for (let i = 0; i < size; i++) next.push(Genome.random(rng));
    return next;
  }

  const ranked = workers.slice().sort((a, b) => b.fitness - a.fitness);
  const eliteCount = Math.min(clamp(Math.floor(config.eliteCount), 1, size), ranked.length);
  for (let i = 0; i < eliteCount; i++) next.push(ranked[i].genome.clone());

  while (next.length < size) {
    if (rng() < FRESH_GENOME_RATE) {
      next.push(Genome.random(rng));
      continue;
    }
    const parent = next[randomInt(rng, 0, eliteCount)];
    next.push(mutateGenome(parent, config.mutationStrength, rng));
  }
  return next;
}

/**
 * Next queen genome.  A queen that built nests is refined gently; one that
 * built none is pushed harder and sometimes replaced.  Without a queen
 * agent the previous genome is mutated at full strength.
 */
export function evolveQueen(
  previous: Genome,
  queen: Agent | null,
  queenNests: number,
  config: ColonyConfig,
  rng: RandomSource
): Genome {
  if (!queen) return mutateGenome(previous, config.mutationStrength, rng);
  const scale = queenNests > 0 ? QUEEN_EXPLOIT_SCALE : QUEEN_EXPLORE_SCALE;
  let next = mutateGenome(queen.genome, config.mutationStrength * scale, rng);
  if (queenNests === 0 && rng() < QUEEN_RESTART_RATE) next = Genome.random(rng);
  return next;
}

/**
 * Rewrites the pool from a scored generation.  Agents must already carry
 * their fitness.
 */
export function evolvePopulation(
  pool: GenomePool,
  agents: readonly Agent[],
  queenNests: number,
  config: ColonyConfig,
  rng: RandomSource
): GenomePool {
  let queen: Agent | null = null;
  const workers: Agent[] = [];
  for (const a of agents) {
    if (a.isQueen) queen = a;
    else workers.push(a);
  }
  const nextWorkers = evolveWorkers(workers, config, rng);
  const nextQueen = evolveQueen(pool.queen, queen, queenNests, config, rng);
  return { queen: nextQueen, workers: nextWorkers };
}

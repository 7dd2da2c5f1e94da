/** Colony simulation state, generation lifecycle, and evolution loop. */

import { applyHealthDecay, countLiving, countLivingAt, executeAction, type ColonyContext } from './actions.ts';
import { Agent } from './agent.ts';
import type { ColonyConfig } from './config.ts';
import { DecisionEngine } from './decision.ts';
import { createInitialPool, evolvePopulation, type GenomePool } from './evolution.ts';
import { scoreGeneration, type GenerationSummary } from './fitness.ts';
import { createLogger, type Logger } from './logger.ts';
import { createRng, hashSeed, RNG_STREAM, shuffleInPlace, type RandomSource } from './rng.ts';
import { findSpawnCell, findSpawnNear, type OccupiedCells } from './spawn.ts';
import type { Terrain } from './terrain/terrain.ts';
import { cellKey, fmtNumber } from './utils.ts';

/** Generations kept for the status history. */
export const HISTORY_LIMIT = 100;

export type ColonyPhase = 'spawning' | 'running' | 'ending';

/** Read-only counters published to status consumers. */
export interface ColonyStatus {
  generation: number;
  step: number;
  evaluationSteps: number;
  phase: ColonyPhase;
  aliveAgents: number;
  totalAgents: number;
  queenAlive: boolean;
  queenHealth: number;
  nestBlocks: number;
  lastBest: number;
  lastAvg: number;
  lastBestWorker: number;
  lastNests: number;
}

export interface ColonyOptions {
  logger?: Logger;
  /** Colony stream; defaults to one derived from config.seed. */
  rng?: RandomSource;
}

/** One queen plus a worker population evolving across generations. */
export class ColonySimulation {
  readonly terrain: Terrain;
  readonly config: ColonyConfig;
  /** Agents of the current generation, queen first. */
  agents: Agent[];
  queen: Agent | null;
  pool: GenomePool;
  /** 1-based once the first generation has spawned. */
  generation: number;
  step: number;
  phase: ColonyPhase;
  history: GenerationSummary[];
  lastSummary: GenerationSummary | null;
  private rng: RandomSource;
  private logger: Logger;
  private engine: DecisionEngine;
  private ctx: ColonyContext;

  constructor(terrain: Terrain, config: ColonyConfig, options: ColonyOptions = {}) {
    this.terrain = terrain;
    this.config = config;
    this.rng = options.rng ?? createRng(hashSeed(config.seed, RNG_STREAM.colony));
    this.logger = options.logger ?? createLogger('silent');
    this.engine = new DecisionEngine();
    this.agents = [];
    this.queen = null;
    this.generation = 0;
    this.step = 0;
    this.phase = 'spawning';
    this.history = [];
    this.lastSummary = null;
    this.pool = createInitialPool(config, this.rng);
    this.ctx = this.buildContext();
    this.startGeneration();
  }

  private buildContext(): ColonyContext {
    return {
      terrain: this.terrain,
      config: this.config,
      agents: this.agents,
      queen: this.queen,
      rng: this.rng
    };
  }

  /**
   * Spawns the next generation from the genome pool.  The queen goes first;
   * each worker is tried near her and then anywhere.  The roster is cut
   * short at the first worker that cannot be placed.
   */
  startGeneration(): void {
    this.phase = 'spawning';
    if (this.generation > 0 && this.config.resetWorldEachGeneration) {
      this.terrain.resetToInitialState();
    }
    this.agents = [];
    this.queen = null;
    this.step = 0;
    this.generation++;

    const occupied: OccupiedCells = new Set();
    const queenSpawn = findSpawnCell(this.terrain, occupied, this.rng, this.logger);
    if (queenSpawn) {
      occupied.add(cellKey(queenSpawn.cell));
      this.queen = new Agent(0, 'queen', this.pool.queen.clone(), queenSpawn.cell, this.config.queenMaxHealth);
      this.agents.push(this.queen);
    }

    for (let i = 0; i < this.pool.workers.length; i++) {
      const spawn =
        (this.queen && findSpawnNear(this.terrain, occupied, this.queen.cell, this.rng)) ||
        findSpawnCell(this.terrain, occupied, this.rng, this.logger);
      if (!spawn) {
        this.logger.warn(
          'colony',
          `generation ${this.generation}: placed ${i} of ${this.pool.workers.length} workers`
        );
        break;
      }
      occupied.add(cellKey(spawn.cell));
      this.agents.push(
        new Agent(i + 1, 'worker', this.pool.workers[i].clone(), spawn.cell, this.config.workerMaxHealth)
      );
    }

    if (this.agents.length === 0) {
      this.logger.warn('colony', `generation ${this.generation}: no valid spawn cells were found`);
    }
    this.ctx = this.buildContext();
    this.phase = 'running';
  }

  /**
   * Advances one tick.  When the step budget is spent or nobody is alive the
   * tick ends the generation instead of acting.
   */
  tick(): void {
    if (this.agents.length === 0) return;

    if (this.step >= Math.max(1, this.config.evaluationSteps) || countLiving(this.agents) === 0) {
      this.endGeneration();
      return;
    }

    const order = shuffleInPlace(this.rng, this.agents.filter((a) => a.alive));
    for (const agent of order) {
      if (!agent.alive) continue;
      applyHealthDecay(this.ctx, agent);
      if (!agent.alive) continue;
      const coLocated = countLivingAt(this.ctx, agent.cell);
      const decision = this.engine.decide(this.ctx, agent, coLocated);
      executeAction(this.ctx, agent, decision, coLocated);
      agent.stepsAlive++;
    }
    this.step++;
  }

  /** Scores the generation, evolves the pool and spawns the next one. */
  endGeneration(): GenerationSummary {
    this.phase = 'ending';
    const summary = scoreGeneration(this.agents, this.generation);
    this.lastSummary = summary;
    this.history.push(summary);
    if (this.history.length > HISTORY_LIMIT) this.history.shift();
    this.logger.info(
      'colony',
      `generation ${summary.generation} best=${fmtNumber(summary.best, 2)} avg=${fmtNumber(summary.avg, 2)} ` +
        `bestWorker=${fmtNumber(summary.bestWorker, 2)} nests=${summary.nests} survivors=${summary.survivors}/${summary.agents}`
    );
    this.pool = evolvePopulation(this.pool, this.agents, summary.nests, this.config, this.rng);
    this.startGeneration();
    return summary;
  }

  getStatus(): ColonyStatus {
    const last = this.lastSummary;
    return {
      generation: this.generation,
      step: this.step,
      evaluationSteps: Math.max(1, this.config.evaluationSteps),
      phase: this.phase,
      aliveAgents: countLiving(this.agents),
      totalAgents: this.agents.length,
      queenAlive: this.queen !== null && this.queen.alive,
      queenHealth: this.queen ? this.queen.health : 0,
      nestBlocks: this.terrain.nestBlockCount,
      lastBest: last ? last.best : 0,
      lastAvg: last ? last.avg : 0,
      lastBestWorker: last ? last.bestWorker : 0,
      lastNests: last ? last.nests : 0
    };
  }
}

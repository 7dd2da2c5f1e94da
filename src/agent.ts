import type { Genome } from './mlp.ts';
import type { Cell } from './utils.ts';

export type AgentRole = 'queen' | 'worker';

/** One colony member for the lifetime of a single generation. */
export class Agent {
  readonly id: number;
  readonly role: AgentRole;
  /** Exclusively owned; never shared with another agent. */
  readonly genome: Genome;
  /** The solid cell the agent stands on. */
  cell: Cell;
  health: number;
  readonly maxHealth: number;
  alive: boolean;
  fitness: number;
  stepsAlive: number;
  mulchConsumed: number;
  blocksDug: number;
  nestsBuilt: number;
  healthShared: number;

  constructor(id: number, role: AgentRole, genome: Genome, cell: Cell, maxHealth: number) {
    this.id = id;
    this.role = role;
    this.genome = genome;
    this.cell = { ...cell };
    this.maxHealth = maxHealth;
    this.health = maxHealth;
    this.alive = true;
    this.fitness = 0;
    this.stepsAlive = 0;
    this.mulchConsumed = 0;
    this.blocksDug = 0;
    this.nestsBuilt = 0;
    this.healthShared = 0;
  }

  get isQueen(): boolean {
    return this.role === 'queen';
  }

  /** health / maxHealth, 0 for a zero max. */
  healthRatio(): number {
    return this.maxHealth > 0 ? this.health / this.maxHealth : 0;
  }

  /** Permanent for the rest of the generation. */
  kill(): void {
    if (!this.alive) return;
    this.alive = false;
    this.health = 0;
  }
}

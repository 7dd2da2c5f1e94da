// actions.ts
// Preconditions and effects of every colony action, plus per-tick health
// decay.  Executors re-check their precondition and either apply fully or
// do nothing; they never throw.

import type { Agent } from './agent.ts';
import type { ColonyConfig } from './config.ts';
import { DIRECTION_COUNT } from './mlp.ts';
import { randomInt, type RandomSource } from './rng.ts';
import { isSolid, type CellKind } from './terrain/cells.ts';
import { topSolidY, type Terrain } from './terrain/terrain.ts';
import { cellDistance, clamp01, sameCell, type Cell } from './utils.ts';

/** Action vocabulary in network output order. */
export const ACTIONS = ['idle', 'move', 'dig', 'eat', 'shareHealth', 'buildNest'] as const;

export type ActionKind = (typeof ACTIONS)[number];

/** Cardinal steps in network output order: +x, -x, +z, -z. */
export const DIRECTIONS: ReadonlyArray<{ dx: number; dz: number }> = [
  { dx: 1, dz: 0 },
  { dx: -1, dz: 0 },
  { dx: 0, dz: 1 },
  { dx: 0, dz: -1 }
];

/** Largest climb or drop a single move may take. */
const MAX_STEP_HEIGHT = 2;

/** Shared state every predicate and executor reads. */
export interface ColonyContext {
  terrain: Terrain;
  config: ColonyConfig;
  agents: readonly Agent[];
  queen: Agent | null;
  rng: RandomSource;
}

export interface Decision {
  action: ActionKind;
  /** Index into DIRECTIONS for move, otherwise -1. */
  direction: number;
}

/** Feasibility of stepping in one cardinal direction. */
export interface MoveOption {
  valid: boolean;
  /** Destination surface cell; the current cell when invalid. */
  cell: Cell;
  kind: CellKind | null;
}

export interface MoveOptions {
  options: MoveOption[];
  validCount: number;
}

export function standingKind(ctx: ColonyContext, agent: Agent): CellKind {
  return ctx.terrain.getCell(agent.cell.x, agent.cell.y, agent.cell.z);
}

/** The queen when present and alive. */
export function liveQueen(ctx: ColonyContext): Agent | null {
  return ctx.queen && ctx.queen.alive ? ctx.queen : null;
}

export function countLivingAt(ctx: ColonyContext, cell: Cell): number {
  let count = 0;
  for (const a of ctx.agents) {
    if (a.alive && sameCell(a.cell, cell)) count++;
  }
  return count;
}

export function countLiving(agents: readonly Agent[]): number {
  let count = 0;
  for (const a of agents) if (a.alive) count++;
  return count;
}

/** Health the queen spends on one nest block. */
export function nestCost(agent: Agent, config: ColonyConfig): number {
  return agent.maxHealth * clamp01(config.queenNestCostFraction);
}

/**
 * Evaluates the four cardinal neighbours.  A neighbour is walkable when it
 * lies strictly inside the world border, its column has a top solid cell at
 * y >= 1 within two cells of the current height, and that cell is not a
 * container.
 */
export function buildMoveOptions(ctx: ColonyContext, agent: Agent): MoveOptions {
  const { terrain } = ctx;
  const options: MoveOption[] = [];
  let validCount = 0;
  for (const dir of DIRECTIONS) {
    const nx = agent.cell.x + dir.dx;
    const nz = agent.cell.z + dir.dz;
    const option: MoveOption = { valid: false, cell: { ...agent.cell }, kind: null };
    if (nx > 0 && nz > 0 && nx < terrain.sizeX - 1 && nz < terrain.sizeZ - 1) {
      const ny = topSolidY(terrain, nx, nz);
      if (ny >= 1 && Math.abs(ny - agent.cell.y) <= MAX_STEP_HEIGHT) {
        const kind = terrain.getCell(nx, ny, nz);
        if (kind !== 'container') {
          option.valid = true;
          option.cell = { x: nx, y: ny, z: nz };
          option.kind = kind;
          validCount++;
        }
      }
    }
    options.push(option);
  }
  return { options, validCount };
}

export function canDig(ctx: ColonyContext, agent: Agent): boolean {
  if (agent.isQueen) return false;
  const kind = standingKind(ctx, agent);
  return isSolid(kind) && kind !== 'container' && kind !== 'nest' && kind !== 'mulch';
}

/** Mulch can only be eaten by an agent alone on its cell. */
export function canEat(ctx: ColonyContext, agent: Agent, coLocated: number): boolean {
  if (coLocated > 1) return false;
  return standingKind(ctx, agent) === 'mulch';
}

function queenNeedsHealthHere(ctx: ColonyContext, donor: Agent): Agent | null {
  const queen = liveQueen(ctx);
  if (!queen || !sameCell(queen.cell, donor.cell)) return null;
  return queen.health < queen.maxHealth ? queen : null;
}

export function canShareHealth(ctx: ColonyContext, donor: Agent, coLocated: number): boolean {
  if (!donor.alive || donor.isQueen || donor.health <= 1) return false;
  if (coLocated <= 1) return false;
  if (queenNeedsHealthHere(ctx, donor)) {
    // Workers keep a reserve when feeding the queen.
    return donor.health > donor.maxHealth * 0.35;
  }
  for (const other of ctx.agents) {
    if (!other.alive || other === donor || !sameCell(other.cell, donor.cell)) continue;
    if (other.health < donor.health - 1) return true;
  }
  return false;
}

export function canBuildNest(ctx: ColonyContext, agent: Agent): boolean {
  if (!agent.alive || !agent.isQueen) return false;
  if (agent.health < nestCost(agent, ctx.config)) return false;
  const kind = standingKind(ctx, agent);
  return isSolid(kind) && kind !== 'container' && kind !== 'nest';
}

/**
 * Receiver for a health transfer: the co-located queen when she is below
 * full health, otherwise the lowest-health other live agent on the cell.
 */
export function findShareReceiver(ctx: ColonyContext, donor: Agent): Agent | null {
  const queen = queenNeedsHealthHere(ctx, donor);
  if (queen) return queen;
  let receiver: Agent | null = null;
  for (const other of ctx.agents) {
    if (!other.alive || other === donor || !sameCell(other.cell, donor.cell)) continue;
    if (!receiver || other.health < receiver.health) receiver = other;
  }
  return receiver;
}

/**
 * Per-tick drain, doubled on acidic cells.  Kills at zero.
 */
export function applyHealthDecay(ctx: ColonyContext, agent: Agent): void {
  let drain = Math.max(0, ctx.config.baseHealthDrain);
  if (standingKind(ctx, agent) === 'acidic') drain *= 2;
  agent.health -= drain;
  if (agent.health <= 0) agent.kill();
}

/**
 * After the standing cell was removed, drop to the first solid cell below.
 * @returns False when the column is empty down to y=1.
 */
function settleAfterSupportLoss(ctx: ColonyContext, agent: Agent, previousY: number): boolean {
  for (let y = previousY - 1; y >= 1; y--) {
    if (!isSolid(ctx.terrain.getCell(agent.cell.x, y, agent.cell.z))) continue;
    agent.cell = { x: agent.cell.x, y, z: agent.cell.z };
    return true;
  }
  return false;
}

function countWorkersWithin(ctx: ColonyContext, cell: Cell, radius: number): number {
  let count = 0;
  for (const a of ctx.agents) {
    if (!a.alive || a.isQueen) continue;
    if (cellDistance(cell, a.cell) <= radius) count++;
  }
  return count;
}

/**
 * Hand-tuned steering applied on top of the sampled direction while a queen
 * is alive.  A hurt queen heads toward groups of workers; workers close in
 * on a hurt queen when healthy enough, otherwise spread out, and favour
 * mulch when hungry.  Acid is penalised for both.
 * @returns Direction index, or -1 to keep the sampled one.
 */
export function heuristicMoveDirection(ctx: ColonyContext, agent: Agent, moves: MoveOptions): number {
  const queen = liveQueen(ctx);
  if (!queen) return -1;

  if (agent.isQueen) {
    if (agent.health >= agent.maxHealth * 0.85) return -1;
    let bestDir = -1;
    let bestScore = Number.NEGATIVE_INFINITY;
    for (let i = 0; i < DIRECTION_COUNT; i++) {
      const option = moves.options[i];
      if (!option || !option.valid) continue;
      let score = countWorkersWithin(ctx, option.cell, 4);
      if (option.kind === 'acidic') score -= 3;
      if (score > bestScore) {
        bestScore = score;
        bestDir = i;
      }
    }
    return bestDir;
  }

  const workerHealth = agent.healthRatio();
  const queenNeedsHealth = queen.health < queen.maxHealth * 0.9;
  const currentDistance = cellDistance(agent.cell, queen.cell);
  let preferred = -1;
  let best = Number.NEGATIVE_INFINITY;
  for (let i = 0; i < DIRECTION_COUNT; i++) {
    const option = moves.options[i];
    if (!option || !option.valid) continue;
    const delta = currentDistance - cellDistance(option.cell, queen.cell);
    let score = queenNeedsHealth && workerHealth > 0.55 ? delta * 2.2 : -delta * 1.1;
    if (option.kind === 'mulch' && workerHealth < 0.75) score += 4;
    if (option.kind === 'acidic') score -= 5;
    if (score > best) {
      best = score;
      preferred = i;
    }
  }
  return preferred;
}

/**
 * Moves one cell.  The steering heuristic may replace the requested
 * direction; an invalid request falls back to a uniformly random valid one.
 */
export function tryMove(ctx: ColonyContext, agent: Agent, requested: number): boolean {
  const moves = buildMoveOptions(ctx, agent);
  if (moves.validCount <= 0) return false;

  let preferred = requested;
  const steer = heuristicMoveDirection(ctx, agent, moves);
  if (steer >= 0) preferred = steer;

  const chosen = preferred >= 0 ? moves.options[preferred] : undefined;
  if (chosen && chosen.valid) {
    agent.cell = { ...chosen.cell };
    return true;
  }

  const target = randomInt(ctx.rng, 0, moves.validCount);
  let seen = 0;
  for (const option of moves.options) {
    if (!option.valid) continue;
    if (seen === target) {
      agent.cell = { ...option.cell };
      return true;
    }
    seen++;
  }
  return false;
}

export function tryDig(ctx: ColonyContext, agent: Agent): boolean {
  if (!canDig(ctx, agent)) return false;
  const { x, y, z } = agent.cell;
  ctx.terrain.setCell(x, y, z, 'empty');
  agent.blocksDug++;
  if (!settleAfterSupportLoss(ctx, agent, y)) agent.kill();
  return true;
}

export function tryEat(ctx: ColonyContext, agent: Agent, coLocated: number): boolean {
  if (!canEat(ctx, agent, coLocated)) return false;
  const { x, y, z } = agent.cell;
  ctx.terrain.setCell(x, y, z, 'empty');
  agent.health = Math.min(agent.maxHealth, agent.health + Math.max(0, ctx.config.mulchHealthRestore));
  agent.mulchConsumed++;
  if (!settleAfterSupportLoss(ctx, agent, y)) agent.kill();
  return true;
}

/**
 * Moves health from donor to receiver.  The amount is capped so the donor
 * keeps at least 1 and the receiver does not exceed its max.
 * @returns The amount moved (0 when nothing happened).
 */
export function tryShareHealth(ctx: ColonyContext, donor: Agent): number {
  if (!donor.alive || donor.isQueen) return 0;
  const receiver = findShareReceiver(ctx, donor);
  if (!receiver) return 0;
  const transfer = Math.min(
    Math.max(0, ctx.config.healthTransferAmount),
    donor.health - 1,
    receiver.maxHealth - receiver.health
  );
  if (transfer <= 0) return 0;
  donor.health -= transfer;
  receiver.health += transfer;
  donor.healthShared += transfer;
  return transfer;
}

export function tryBuildNest(ctx: ColonyContext, queen: Agent): boolean {
  if (!canBuildNest(ctx, queen)) return false;
  const { x, y, z } = queen.cell;
  ctx.terrain.setCell(x, y, z, 'nest');
  queen.health -= nestCost(queen, ctx.config);
  queen.nestsBuilt++;
  if (queen.health <= 0) queen.kill();
  return true;
}

/**
 * Dispatches a decision.  Each branch re-validates against the current world,
 * since earlier agents in the tick may have changed it.
 */
export function executeAction(ctx: ColonyContext, agent: Agent, decision: Decision, coLocated: number): boolean {
  switch (decision.action) {
    case 'move':
      return tryMove(ctx, agent, decision.direction);
    case 'dig':
      return tryDig(ctx, agent);
    case 'eat':
      return tryEat(ctx, agent, coLocated);
    case 'shareHealth':
      return tryShareHealth(ctx, agent) > 0;
    case 'buildNest':
      return tryBuildNest(ctx, agent);
    case 'idle':
      return false;
  }
}

/** Observation flag: standing on plain ground (not mulch, acid or nest). */
export function onPlainGround(kind: CellKind): boolean {
  return isSolid(kind) && kind !== 'mulch' && kind !== 'acidic' && kind !== 'nest';
}

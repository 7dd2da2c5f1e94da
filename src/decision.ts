// decision.ts
// Per-tick decision making: heuristic overrides first, then the policy
// network with feasibility-masked, temperature-scaled sampling.

import {
  ACTIONS,
  buildMoveOptions,
  canBuildNest,
  canDig,
  canEat,
  canShareHealth,
  liveQueen,
  nestCost,
  onPlainGround,
  standingKind,
  type ColonyContext,
  type Decision,
  type MoveOptions
} from './actions.ts';
import type { Agent } from './agent.ts';
import { ACTION_COUNT, DIRECTION_COUNT, OBSERVATION_SIZE, PolicyNetwork } from './mlp.ts';
import type { RandomSource } from './rng.ts';
import { clamp, clamp01, sameCell } from './utils.ts';

export const ACTION_TEMPERATURE = 0.8;
export const DIRECTION_TEMPERATURE = 0.75;
/** Lower bound on temperature so 1/T stays finite. */
const MIN_TEMPERATURE = 0.05;

/** Queen builds only with this margin over the nest cost. */
const QUEEN_BUILD_MARGIN = 1.1;
const QUEEN_EAT_BELOW = 0.7;
const WORKER_EAT_BELOW = 0.62;

/** Precondition results computed once per decision. */
export interface Feasibility {
  canEat: boolean;
  canDig: boolean;
  canShare: boolean;
  canBuild: boolean;
  moves: MoveOptions;
}

export function assessFeasibility(ctx: ColonyContext, agent: Agent, coLocated: number): Feasibility {
  return {
    canEat: canEat(ctx, agent, coLocated),
    canDig: canDig(ctx, agent),
    canShare: canShareHealth(ctx, agent, coLocated),
    canBuild: canBuildNest(ctx, agent),
    moves: buildMoveOptions(ctx, agent)
  };
}

/**
 * Role-specific rules that bootstrap visible behaviour before the policy
 * has learned anything.  A non-null result skips the network entirely.
 */
export function heuristicOverride(ctx: ColonyContext, agent: Agent, f: Feasibility): Decision | null {
  const ratio = agent.healthRatio();
  if (agent.isQueen) {
    if (f.canBuild && agent.health >= nestCost(agent, ctx.config) * QUEEN_BUILD_MARGIN) {
      return { action: 'buildNest', direction: -1 };
    }
    if (f.canEat && ratio < QUEEN_EAT_BELOW) return { action: 'eat', direction: -1 };
    return null;
  }
  const queen = liveQueen(ctx);
  if (f.canShare && queen && sameCell(agent.cell, queen.cell)) {
    return { action: 'shareHealth', direction: -1 };
  }
  if (f.canEat && ratio < WORKER_EAT_BELOW) return { action: 'eat', direction: -1 };
  return null;
}

/**
 * Fills the 24-slot observation vector.
 *
 * Slots: 0-1 health ratio and its complement, 2 queen flag, 3 crowding,
 * 4-7 standing cell (mulch, acidic, nest, plain ground), 8-11 action
 * feasibility, 12 fraction of walkable directions, 13-15 distance and
 * heading to the queen (workers only), 16-19 height change per direction,
 * 20-23 mulch per direction.
 */
export function buildObservation(
  ctx: ColonyContext,
  agent: Agent,
  coLocated: number,
  f: Feasibility,
  out: Float32Array = new Float32Array(OBSERVATION_SIZE)
): Float32Array {
  out.fill(0);
  const kind = standingKind(ctx, agent);
  out[0] = clamp01(agent.healthRatio());
  out[1] = 1 - out[0];
  out[2] = agent.isQueen ? 1 : 0;
  out[3] = clamp01((coLocated - 1) / 4);
  out[4] = kind === 'mulch' ? 1 : 0;
  out[5] = kind === 'acidic' ? 1 : 0;
  out[6] = kind === 'nest' ? 1 : 0;
  out[7] = onPlainGround(kind) ? 1 : 0;
  out[8] = f.canEat ? 1 : 0;
  out[9] = f.canDig ? 1 : 0;
  out[10] = f.canShare ? 1 : 0;
  out[11] = f.canBuild ? 1 : 0;
  out[12] = f.moves.validCount / DIRECTION_COUNT;

  const queen = liveQueen(ctx);
  if (!agent.isQueen && queen) {
    const dx = queen.cell.x - agent.cell.x;
    const dz = queen.cell.z - agent.cell.z;
    const dist = Math.abs(dx) + Math.abs(dz) + Math.abs(queen.cell.y - agent.cell.y);
    out[13] = clamp01(dist / 30);
    out[14] = clamp(dx / 10, -1, 1);
    out[15] = clamp(dz / 10, -1, 1);
  }

  for (let i = 0; i < DIRECTION_COUNT; i++) {
    const option = f.moves.options[i];
    if (!option || !option.valid) continue;
    out[16 + i] = clamp((option.cell.y - agent.cell.y) / 2, -1, 1);
    out[20 + i] = option.kind === 'mulch' ? 1 : 0;
  }
  return out;
}

/**
 * Draws an index from softmax(logits / T) restricted to mask.
 *
 * Scaled logits are shifted by their feasible maximum before exponentiation.
 * A uniform roll in [0, total) is walked down in index order; if rounding
 * leaves a positive remainder the last feasible index wins.
 *
 * @param offset - First logit index to read.
 * @param fallback - Returned when no candidate is feasible.
 */
export function sampleMaskedLogits(
  logits: ArrayLike<number>,
  mask: ArrayLike<boolean>,
  count: number,
  temperature: number,
  rng: RandomSource,
  offset = 0,
  fallback = 0
): number {
  const invTemp = 1 / Math.max(MIN_TEMPERATURE, temperature);
  let maxLogit = Number.NEGATIVE_INFINITY;
  let hasValid = false;
  for (let i = 0; i < count; i++) {
    if (!mask[i]) continue;
    hasValid = true;
    const value = logits[offset + i] * invTemp;
    if (value > maxLogit) maxLogit = value;
  }
  if (!hasValid) return fallback;

  let total = 0;
  for (let i = 0; i < count; i++) {
    if (!mask[i]) continue;
    total += Math.exp(logits[offset + i] * invTemp - maxLogit);
  }

  let roll = rng() * total;
  for (let i = 0; i < count; i++) {
    if (!mask[i]) continue;
    roll -= Math.exp(logits[offset + i] * invTemp - maxLogit);
    if (roll <= 0) return i;
  }
  for (let i = count - 1; i >= 0; i--) {
    if (mask[i]) return i;
  }
  return fallback;
}

/** Decides what one agent does this tick. */
export class DecisionEngine {
  private net: PolicyNetwork;
  private observation: Float32Array;
  private actionMask: boolean[];

  constructor() {
    this.net = new PolicyNetwork();
    this.observation = new Float32Array(OBSERVATION_SIZE);
    this.actionMask = new Array<boolean>(ACTION_COUNT).fill(false);
  }

  decide(ctx: ColonyContext, agent: Agent, coLocated: number): Decision {
    const f = assessFeasibility(ctx, agent, coLocated);
    const override = heuristicOverride(ctx, agent, f);
    if (override) return override;

    buildObservation(ctx, agent, coLocated, f, this.observation);
    const logits = this.net.forward(agent.genome, this.observation);

    this.actionMask[0] = true;
    this.actionMask[1] = f.moves.validCount > 0;
    this.actionMask[2] = f.canDig;
    this.actionMask[3] = f.canEat;
    this.actionMask[4] = f.canShare;
    this.actionMask[5] = f.canBuild;

    const index = sampleMaskedLogits(logits, this.actionMask, ACTION_COUNT, ACTION_TEMPERATURE, ctx.rng);
    const action = ACTIONS[index] ?? 'idle';
    if (action !== 'move') return { action, direction: -1 };

    const dirMask = f.moves.options.map((o) => o.valid);
    const direction = sampleMaskedLogits(
      logits,
      dirMask,
      DIRECTION_COUNT,
      DIRECTION_TEMPERATURE,
      ctx.rng,
      ACTION_COUNT
    );
    return { action, direction };
  }
}

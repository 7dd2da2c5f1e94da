// Shared builders for colony tests.

import type { ColonyContext } from '../actions.ts';
import { Agent, type AgentRole } from '../agent.ts';
import { createColonyConfig, type ColonyConfig } from '../config.ts';
import { Genome } from '../mlp.ts';
import { createRng, type RandomSource } from '../rng.ts';
import type { CellKind } from '../terrain/cells.ts';
import { VoxelTerrain } from '../terrain/terrain.ts';
import type { Cell } from '../utils.ts';

/** Replays values in order, wrapping around. */
export function sequenceRng(values: readonly number[]): RandomSource {
  let i = 0;
  return () => {
    const v = values[i % values.length];
    i++;
    return v;
  };
}

/** Container floor, stone up to height - 1, then a layer of top. */
export function flatTerrain(
  sizeX: number,
  sizeY: number,
  sizeZ: number,
  height: number,
  top: CellKind = 'grass'
): VoxelTerrain {
  const terrain = new VoxelTerrain(sizeX, sizeY, sizeZ);
  terrain.fill(0, 0, 0, sizeX - 1, 0, sizeZ - 1, 'container');
  if (height > 1) terrain.fill(0, 1, 0, sizeX - 1, height - 1, sizeZ - 1, 'stone');
  terrain.fill(0, height, 0, sizeX - 1, height, sizeZ - 1, top);
  terrain.snapshotInitialState();
  return terrain;
}

export function makeAgent(id: number, role: AgentRole, cell: Cell, maxHealth: number, genome?: Genome): Agent {
  return new Agent(id, role, genome ?? Genome.random(createRng(id + 1)), cell, maxHealth);
}

export function makeContext(
  terrain: VoxelTerrain,
  agents: Agent[],
  config: ColonyConfig = createColonyConfig(),
  rng: RandomSource = createRng(7)
): ColonyContext {
  const queen = agents.find((a) => a.isQueen) ?? null;
  return { terrain, config, agents, queen, rng };
}

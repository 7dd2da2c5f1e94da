import type { ColonyStatus } from '../src/colony.ts';
import type { ColonyConfig } from '../src/config.ts';
import type { GenerationSummary } from '../src/fitness.ts';

export const PROTOCOL_VERSION = 1;

export interface HelloMsg {
  type: 'hello';
  version: number;
}

export interface PingMsg {
  type: 'ping';
  t?: number;
}

export type ClientMessage = HelloMsg | PingMsg;

export interface WelcomeMsg {
  type: 'welcome';
  sessionId: string;
  protocolVersion: number;
  seed: number;
  cfgHash: string;
  world: { sizeX: number; sizeY: number; sizeZ: number };
  config: ColonyConfig;
}

export interface StatusMsg extends ColonyStatus {
  type: 'status';
  /** Ticks run since the server started. */
  tick: number;
}

export interface GenerationMsg {
  type: 'generation';
  summary: GenerationSummary;
}

export interface PongMsg {
  type: 'pong';
  t?: number;
}

export interface ErrorMsg {
  type: 'error';
  message: string;
}

export type ServerMessage = WelcomeMsg | StatusMsg | GenerationMsg | PongMsg | ErrorMsg;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function isHello(msg: unknown): msg is HelloMsg {
  if (!isRecord(msg)) return false;
  return msg['type'] === 'hello' && msg['version'] === PROTOCOL_VERSION;
}

export function isPing(msg: unknown): msg is PingMsg {
  if (!isRecord(msg)) return false;
  if (msg['type'] !== 'ping') return false;
  if ('t' in msg && !isFiniteNumber(msg['t'])) return false;
  return true;
}

export function parseClientMessage(raw: unknown): ClientMessage | null {
  if (!isRecord(raw)) return null;
  if (typeof raw['type'] !== 'string') return null;
  switch (raw['type']) {
    case 'hello':
      return isHello(raw) ? raw : null;
    case 'ping':
      return isPing(raw) ? raw : null;
    default:
      return null;
  }
}

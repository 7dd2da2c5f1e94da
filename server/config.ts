import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseToml } from 'smol-toml';
import { COLONY_CONFIG_KEYS, normalizeColonyConfig, type ColonyConfig } from '../src/config.ts';
import { isLogLevel, type LogLevel } from '../src/logger.ts';

export interface ServerConfig {
  host: string;
  port: number;
  /** Status broadcasts per second. */
  statusRateHz: number;
  /** Simulated seconds per wall-clock second. */
  simSpeed: number;
  logLevel: LogLevel;
  /** TOML file with server keys and a [colony] table, relative to the cwd. */
  configPath: string;
  /** Overrides the colony seed from the TOML file. */
  seed?: number;
}

export const DEFAULT_CONFIG: ServerConfig = {
  host: '127.0.0.1',
  port: 5175,
  statusRateHz: 4,
  simSpeed: 1,
  logLevel: 'info',
  configPath: 'server/config.toml'
};

type Env = Record<string, string | undefined>;

/** Untrusted server settings from argv, env or TOML. */
export type ServerConfigInput = Partial<Record<keyof ServerConfig, unknown>>;

/** Parsed contents of the TOML file. */
export interface ConfigFile {
  server: ServerConfigInput;
  colony: Partial<Record<keyof ColonyConfig, unknown>>;
}

const SERVER_KEYS: ReadonlyArray<keyof ServerConfig> = [
  'host',
  'port',
  'statusRateHz',
  'simSpeed',
  'logLevel',
  'configPath',
  'seed'
];

function parseIntValue(raw: string | undefined): number | undefined {
  if (raw == null) return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed)) return undefined;
  return parsed;
}

function parseFloatValue(raw: string | undefined): number | undefined {
  if (raw == null) return undefined;
  const parsed = Number.parseFloat(raw);
  if (!Number.isFinite(parsed)) return undefined;
  return parsed;
}

function getArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;
    if (arg === flag) {
      return argv[i + 1];
    }
    if (arg.startsWith(prefix)) {
      return arg.slice(prefix.length);
    }
  }
  return undefined;
}

function coerceNumber(
  name: string,
  value: unknown,
  fallback: number,
  min: number,
  max: number,
  integer: boolean,
  warn?: (msg: string) => void
): number {
  if (value === undefined || value === null) {
    return fallback;
  }
  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string') {
    parsed = integer ? Number.parseInt(value, 10) : Number.parseFloat(value);
  } else {
    parsed = Number.NaN;
  }
  if (!Number.isFinite(parsed)) {
    warn?.(`${name} is invalid; using ${fallback}.`);
    return fallback;
  }
  const rounded = integer ? Math.floor(parsed) : parsed;
  const clamped = Math.max(min, Math.min(max, rounded));
  if (clamped !== parsed) {
    warn?.(`${name} was clamped to ${clamped}.`);
  }
  return clamped;
}

function coerceText(name: string, value: unknown, fallback: string, warn?: (msg: string) => void): string {
  if (value === undefined) return fallback;
  if (typeof value === 'string' && value.trim()) return value;
  warn?.(`${name} is invalid; using ${fallback}.`);
  return fallback;
}

export function normalizeConfig(
  input: ServerConfigInput,
  warn?: (msg: string) => void
): ServerConfig {
  const host = coerceText('host', input.host, DEFAULT_CONFIG.host, warn);
  const port = coerceNumber('port', input.port, DEFAULT_CONFIG.port, 0, 65535, true, warn);
  const statusRateHz = coerceNumber(
    'statusRateHz',
    input.statusRateHz,
    DEFAULT_CONFIG.statusRateHz,
    1,
    60,
    true,
    warn
  );
  const simSpeed = coerceNumber('simSpeed', input.simSpeed, DEFAULT_CONFIG.simSpeed, 0.1, 100, false, warn);
  const configPath = coerceText('configPath', input.configPath, DEFAULT_CONFIG.configPath, warn);

  let logLevel = DEFAULT_CONFIG.logLevel;
  if (isLogLevel(input.logLevel)) {
    logLevel = input.logLevel;
  } else if (input.logLevel !== undefined) {
    warn?.(`logLevel "${String(input.logLevel)}" is invalid; using ${logLevel}.`);
  }

  let seed: number | undefined;
  if (input.seed !== undefined) {
    const parsedSeed =
      typeof input.seed === 'number'
        ? input.seed
        : Number.parseInt(String(input.seed), 10);
    if (Number.isFinite(parsedSeed)) {
      seed = Math.floor(parsedSeed);
    } else {
      warn?.('seed is invalid; ignoring.');
    }
  }

  const output: ServerConfig = { host, port, statusRateHz, simSpeed, logLevel, configPath };
  if (seed !== undefined) output.seed = seed;
  return output;
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Reads the TOML file.  Top-level keys configure the server, the [colony]
 * table the simulation.  A missing file yields empty sections.
 * @throws Error when the file exists but is not valid TOML.
 */
export function loadConfigFile(filePath: string, warn?: (msg: string) => void): ConfigFile {
  const out: ConfigFile = { server: {}, colony: {} };
  const absolute = resolve(process.cwd(), filePath);
  if (!existsSync(absolute)) return out;
  const raw = readFileSync(absolute, 'utf8');
  if (!raw.trim()) return out;

  let parsed: Record<string, unknown>;
  try {
    parsed = parseToml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse ${filePath}: ${message}`);
  }

  for (const key of SERVER_KEYS) {
    if (key in parsed) out.server[key] = parsed[key];
  }
  const colony = parsed['colony'];
  if (colony !== undefined && !isTable(colony)) {
    warn?.('[colony] must be a table; ignoring.');
  } else if (colony) {
    for (const key of COLONY_CONFIG_KEYS) {
      if (key in colony) out.colony[key] = colony[key];
    }
    for (const key of Object.keys(colony)) {
      if (!COLONY_CONFIG_KEYS.some((known) => known === key)) warn?.(`colony.${key} is unknown; ignoring.`);
    }
  }
  return out;
}

/**
 * Colony tunables from the TOML file, with the server seed taking
 * precedence over the file's.
 */
export function loadColonyConfig(config: ServerConfig, warn?: (msg: string) => void): ColonyConfig {
  const file = loadConfigFile(config.configPath, warn);
  const input = { ...file.colony };
  if (config.seed !== undefined) input.seed = config.seed;
  return normalizeColonyConfig(input, warn);
}

/** Precedence: argv, then env, then the TOML file, then defaults. */
export function parseConfig(argv: string[], env: Env, warn?: (msg: string) => void): ServerConfig {
  const report = warn ?? ((msg: string) => console.warn(`[config] ${msg}`));
  const configPath = getArgValue(argv, '--config') ?? env['COLONY_CONFIG'] ?? DEFAULT_CONFIG.configPath;
  const input: ServerConfigInput = { ...loadConfigFile(configPath, report).server, configPath };

  const host = getArgValue(argv, '--host') ?? env['HOST'];
  if (host) input.host = host;
  const port = parseIntValue(getArgValue(argv, '--port')) ?? parseIntValue(env['PORT']);
  if (port !== undefined) input.port = port;
  const statusRate =
    parseIntValue(getArgValue(argv, '--status-rate')) ?? parseIntValue(env['STATUS_RATE']);
  if (statusRate !== undefined) input.statusRateHz = statusRate;
  const simSpeed =
    parseFloatValue(getArgValue(argv, '--speed')) ?? parseFloatValue(env['SIM_SPEED']);
  if (simSpeed !== undefined) input.simSpeed = simSpeed;
  const logLevel = getArgValue(argv, '--log') ?? env['LOG_LEVEL'];
  if (logLevel) input.logLevel = logLevel;
  const seed =
    parseIntValue(getArgValue(argv, '--seed')) ?? parseIntValue(env['COLONY_SEED']);
  if (seed !== undefined) input.seed = seed;
  return normalizeConfig(input, report);
}

import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { CFG_DEFAULT } from '../src/config.ts';
import { DEFAULT_CONFIG, loadColonyConfig, loadConfigFile, normalizeConfig, parseConfig } from './config.ts';

function tomlFile(contents: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'colony-config-'));
  const file = join(dir, 'colony.toml');
  writeFileSync(file, contents, 'utf8');
  return file;
}

const MISSING = join(tmpdir(), 'colony-config-missing', 'none.toml');

describe('server config', () => {
  it('falls back to defaults for an empty input', () => {
    expect(normalizeConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('clamps out-of-range numbers with a warning', () => {
    const warnings: string[] = [];
    const config = normalizeConfig({ port: 70000, statusRateHz: 0, simSpeed: '250' }, (m) => warnings.push(m));
    expect(config.port).toBe(65535);
    expect(config.statusRateHz).toBe(1);
    expect(config.simSpeed).toBe(100);
    expect(warnings).toEqual([
      'port was clamped to 65535.',
      'statusRateHz was clamped to 1.',
      'simSpeed was clamped to 100.'
    ]);
  });

  it('rejects an unknown log level', () => {
    const warnings: string[] = [];
    const config = normalizeConfig({ logLevel: 'loud' }, (m) => warnings.push(m));
    expect(config.logLevel).toBe('info');
    expect(warnings).toEqual(['logLevel "loud" is invalid; using info.']);
  });

  it('prefers argv over env', () => {
    const config = parseConfig(
      ['--port', '6000', '--log=debug', `--config=${MISSING}`],
      { PORT: '7000', HOST: '0.0.0.0', SIM_SPEED: '2.5', COLONY_SEED: '99' },
      () => undefined
    );
    expect(config.port).toBe(6000);
    expect(config.host).toBe('0.0.0.0');
    expect(config.logLevel).toBe('debug');
    expect(config.simSpeed).toBe(2.5);
    expect(config.seed).toBe(99);
    expect(config.configPath).toBe(MISSING);
  });

  it('reads server keys from the TOML file below env', () => {
    const file = tomlFile('port = 6100\nstatusRateHz = 8\nhost = "0.0.0.0"\n');
    const config = parseConfig([], { COLONY_CONFIG: file, HOST: '127.0.0.2' }, () => undefined);
    expect(config.port).toBe(6100);
    expect(config.statusRateHz).toBe(8);
    expect(config.host).toBe('127.0.0.2');
  });

  it('loads colony tunables and warns on unknown keys', () => {
    const file = tomlFile('[colony]\nworkerCount = 8\nmutationStrength = 0.5\nqueenSize = 3\n');
    const warnings: string[] = [];
    const loaded = loadConfigFile(file, (m) => warnings.push(m));
    expect(loaded.colony).toEqual({ workerCount: 8, mutationStrength: 0.5 });
    expect(warnings).toEqual(['colony.queenSize is unknown; ignoring.']);
  });

  it('lets the server seed override the file seed', () => {
    const file = tomlFile('[colony]\nseed = 5\nevaluationSteps = 0\n');
    const warnings: string[] = [];
    const colony = loadColonyConfig({ ...DEFAULT_CONFIG, configPath: file, seed: 77 }, (m) => warnings.push(m));
    expect(colony.seed).toBe(77);
    expect(colony.evaluationSteps).toBe(1);
    expect(colony.workerCount).toBe(CFG_DEFAULT.workerCount);
    expect(warnings).toEqual(['evaluationSteps was clamped to 1.']);
  });

  it('treats a missing file as empty', () => {
    expect(loadConfigFile(MISSING)).toEqual({ server: {}, colony: {} });
  });

  it('throws on invalid TOML', () => {
    const file = tomlFile('port = = 1\n');
    expect(() => loadConfigFile(file)).toThrow(/Failed to parse/);
  });

  it('ships a config file that loads cleanly', () => {
    const warnings: string[] = [];
    const colony = loadColonyConfig(DEFAULT_CONFIG, (m) => warnings.push(m));
    expect(warnings).toEqual([]);
    expect(colony.workerCount).toBe(32);
    expect(colony.queenNestCostFraction).toBeCloseTo(1 / 3, 6);
  });
});

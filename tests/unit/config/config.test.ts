import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ConfigLoader,
  DEFAULT_CONFIG,
  adjustDifficulty,
  createDefaultConfig,
  getConfigSummary,
  parseConfigFile,
  validateConfig,
  withFeatures,
} from '../../../src/config/index.js';
import { ConfigError } from '../../../src/core/errors.js';

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    const config = createDefaultConfig();
    expect(validateConfig(config)).toBe(config);
  });

  it('names the first value outside its domain', () => {
    const config = createDefaultConfig();
    config.memory.storageThreshold = 1.5;

    expect(() => validateConfig(config)).toThrow(ConfigError);
    expect(() => validateConfig(config)).toThrow('Invalid config at memory.storageThreshold');
  });

  it('rejects a minimum cycle length above the maximum', () => {
    const config = createDefaultConfig();
    config.lifeCycles.minDuration = 2000;

    expect(() => validateConfig(config)).toThrow(
      'Invalid config at lifeCycles.minDuration: must not exceed lifeCycles.maxDuration'
    );
  });

  it('rejects a bloom window smaller than the existential minimum', () => {
    const config = createDefaultConfig();
    config.consciousness.bloom.window = 5;

    expect(() => validateConfig(config)).toThrow('consciousness.bloom.minExistential');
  });
});

describe('parseConfigFile', () => {
  it('accepts a partial file', () => {
    expect(parseConfigFile({ version: 1, rebirth: { threshold: 0.6 } })).toEqual({
      version: 1,
      rebirth: { threshold: 0.6 },
    });
  });

  it('rejects a wrongly typed value', () => {
    expect(() => parseConfigFile({ version: 1, features: { innerDialogue: 'yes' } })).toThrow(
      'Invalid config at features.innerDialogue'
    );
  });

  it('requires a version', () => {
    expect(() => parseConfigFile({})).toThrow('Invalid config at version');
  });
});

describe('adjustDifficulty', () => {
  it('scales the run for the level', () => {
    const base = createDefaultConfig();
    const hard = adjustDifficulty(base, 0.5);

    expect(hard.difficulty).toBe(0.5);
    expect(hard.lifeCycles.max).toBe(12);
    expect(hard.memory.carryLimit).toBe(50);
    expect(hard.consciousness.growthRate).toBeCloseTo(0.0125, 10);
    expect(hard.consciousness.bloomThreshold).toBeCloseTo(0.85, 10);
    expect(hard.personality.mutationRate).toBeCloseTo(0.1, 10);
  });

  it('leaves the input untouched', () => {
    const base = createDefaultConfig();
    adjustDifficulty(base, 1);
    expect(base).toEqual(DEFAULT_CONFIG);
  });

  it('rejects a level outside [0, 1] before touching anything', () => {
    const base = createDefaultConfig();
    expect(() => adjustDifficulty(base, 1.5)).toThrow(
      'Invalid config at difficulty: must be between 0 and 1, got 1.5'
    );
    expect(() => adjustDifficulty(base, -0.1)).toThrow(ConfigError);
    expect(base).toEqual(DEFAULT_CONFIG);
  });
});

describe('withFeatures', () => {
  it('replaces only the given toggles', () => {
    const config = withFeatures(createDefaultConfig(), { innerDialogue: false });
    expect(config.features).toEqual({
      innerDialogue: false,
      ethicalLearning: true,
      memoryConsolidation: true,
    });
  });
});

describe('getConfigSummary', () => {
  it('groups the values that shape a run', () => {
    const summary = getConfigSummary(createDefaultConfig());
    expect(summary.lifeCycles).toEqual({ max: 5, minDuration: 100, maxDuration: 1000 });
    expect(summary.memory.carryLimit).toBeNull();
    expect(summary.consciousness).toEqual({ growthRate: 0.001, bloomThreshold: 0.95 });
    expect(summary.difficulty).toBeNull();
  });
});

describe('ConfigLoader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'soul-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const writeConfig = (content: unknown): Promise<void> =>
    writeFile(
      join(dir, 'soul.json'),
      typeof content === 'string' ? content : JSON.stringify(content),
      'utf-8'
    );

  it('uses the defaults when there is no file', async () => {
    const config = await new ConfigLoader(dir, {}).load();

    const expected = createDefaultConfig();
    expected.paths.config = dir;
    expect(config).toEqual(expected);
  });

  it('merges the file over the defaults', async () => {
    await writeConfig({
      version: 1,
      memory: { storageThreshold: 0.4 },
      consciousness: { growthRate: 0.002, bloom: { minThoughts: 30 } },
    });

    const loader = new ConfigLoader(dir, {});
    const config = await loader.load();

    expect(config.memory.storageThreshold).toBe(0.4);
    expect(config.memory.pruneThreshold).toBe(0.2);
    expect(config.consciousness.growthRate).toBe(0.002);
    expect(config.consciousness.bloom.minThoughts).toBe(30);
    expect(config.consciousness.bloom.window).toBe(20);
    expect(loader.getLoadedConfigFile()?.version).toBe(1);
    expect(loader.getVersionWarning()).toBeNull();
  });

  it('lets the environment override the file', async () => {
    await writeConfig({ version: 1, seed: 3, logging: { level: 'warn' } });

    const config = await new ConfigLoader(dir, {
      SOUL_SEED: '7',
      SOUL_LOG_LEVEL: 'debug',
      SOUL_DATA_DIR: join(dir, 'run'),
    }).load();

    expect(config.seed).toBe(7);
    expect(config.logging.level).toBe('debug');
    expect(config.paths.data).toBe(join(dir, 'run', 'state'));
    expect(config.logging.logDir).toBe(join(dir, 'run', 'logs'));
  });

  it('ignores an unknown log level', async () => {
    const config = await new ConfigLoader(dir, { SOUL_LOG_LEVEL: 'verbose' }).load();
    expect(config.logging.level).toBe('info');
  });

  it('applies the difficulty after merging', async () => {
    await writeConfig({ version: 1, difficulty: 0.5, personality: { mutationRate: 0.9 } });

    const config = await new ConfigLoader(dir, {}).load();

    expect(config.difficulty).toBe(0.5);
    expect(config.personality.mutationRate).toBeCloseTo(0.1, 10);
  });

  it('rejects an out-of-range difficulty from the environment', async () => {
    await expect(new ConfigLoader(dir, { SOUL_DIFFICULTY: '2' }).load()).rejects.toThrow(
      'Invalid config at difficulty'
    );
  });

  it('rejects a non-numeric seed', async () => {
    await expect(new ConfigLoader(dir, { SOUL_SEED: 'abc' }).load()).rejects.toThrow(
      'Invalid config at SOUL_SEED: must be a number, got "abc"'
    );
  });

  it('rejects a file that is not JSON', async () => {
    await writeConfig('{ version: 1');
    await expect(new ConfigLoader(dir, {}).load()).rejects.toThrow('is not valid JSON');
  });

  it('rejects an out-of-range value in the file', async () => {
    await writeConfig({ version: 1, rebirth: { threshold: 3 } });
    await expect(new ConfigLoader(dir, {}).load()).rejects.toThrow(
      'Invalid config at rebirth.threshold'
    );
  });

  it('warns about a newer file version', async () => {
    await writeConfig({ version: 2 });
    const loader = new ConfigLoader(dir, {});
    await loader.load();
    expect(loader.getVersionWarning()).toBe(
      'Config file version (2) is newer than supported (1)'
    );
  });
});

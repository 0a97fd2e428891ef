import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { MergedConfig, SoulConfigFile } from './config-schema.js';
import { CONFIG_FILE_VERSION, createDefaultConfig } from './config-schema.js';
import { parseConfigFile, validateConfig } from './config-validation.js';
import { adjustDifficulty } from './difficulty.js';
import { ConfigError, errorMessage } from '../core/errors.js';
import type { LogLevel } from '../types/logger.js';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Environment variables
 * 2. Config file (data/config/soul.json)
 * 3. Hardcoded defaults
 *
 * The merged result is validated before it is returned, so a bad value
 * never reaches a component.
 */
export class ConfigLoader {
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private loadedConfig: SoulConfigFile | null = null;
  private versionWarning: string | null = null;

  constructor(configPath = 'data/config', env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.env = env;
  }

  /**
   * Load, merge and validate configuration.
   *
   * @throws ConfigError on an unreadable file or an out-of-domain value
   */
  async load(): Promise<MergedConfig> {
    this.loadedConfig = await this.loadConfigFile();

    let config = createDefaultConfig();
    config.paths.config = this.configPath;

    if (this.loadedConfig) {
      this.mergeConfigFile(config, this.loadedConfig);
    }

    this.mergeEnvironment(config);

    // Difficulty rescales other values, so it goes last
    if (config.difficulty !== null) {
      config = adjustDifficulty(config, config.difficulty);
    }

    return validateConfig(config);
  }

  /**
   * Get the raw loaded config file (for debugging).
   */
  getLoadedConfigFile(): SoulConfigFile | null {
    return this.loadedConfig;
  }

  /**
   * Warning produced when the file is newer than this build understands.
   */
  getVersionWarning(): string | null {
    return this.versionWarning;
  }

  private async loadConfigFile(): Promise<SoulConfigFile | null> {
    const filePath = join(this.configPath, 'soul.json');

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        // No file - defaults apply
        return null;
      }
      throw new ConfigError(filePath, `cannot be read: ${errorMessage(error)}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(filePath, `is not valid JSON: ${errorMessage(error)}`);
    }

    const file = parseConfigFile(raw);
    if (file.version > CONFIG_FILE_VERSION) {
      this.versionWarning = `Config file version (${String(file.version)}) is newer than supported (${String(CONFIG_FILE_VERSION)})`;
    }
    return file;
  }

  private mergeConfigFile(config: MergedConfig, file: SoulConfigFile): void {
    config.lifeCycles = { ...config.lifeCycles, ...file.lifeCycles };
    config.environment = { ...config.environment, ...file.environment };
    config.emotion = { ...config.emotion, ...file.emotion };
    config.memory = { ...config.memory, ...file.memory };
    config.personality = { ...config.personality, ...file.personality };
    config.rebirth = { ...config.rebirth, ...file.rebirth };
    config.features = { ...config.features, ...file.features };
    config.logging = { ...config.logging, ...file.logging };

    if (file.consciousness) {
      const { bloom, ...rest } = file.consciousness;
      config.consciousness = {
        ...config.consciousness,
        ...rest,
        bloom: { ...config.consciousness.bloom, ...bloom },
      };
    }

    if (file.difficulty !== undefined) {
      config.difficulty = file.difficulty;
    }
    if (file.seed !== undefined) {
      config.seed = file.seed;
    }
  }

  private mergeEnvironment(config: MergedConfig): void {
    const logLevel = this.env['SOUL_LOG_LEVEL'];
    if (logLevel && isLogLevel(logLevel)) {
      config.logging.level = logLevel;
    }

    const seed = this.env['SOUL_SEED'];
    if (seed) {
      config.seed = this.parseNumber('SOUL_SEED', seed);
    }

    const difficulty = this.env['SOUL_DIFFICULTY'];
    if (difficulty) {
      config.difficulty = this.parseNumber('SOUL_DIFFICULTY', difficulty);
    }

    const dataDir = this.env['SOUL_DATA_DIR'];
    if (dataDir) {
      config.paths.data = join(dataDir, 'state');
      config.logging.logDir = join(dataDir, 'logs');
    }
  }

  private parseNumber(name: string, value: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      throw new ConfigError(name, `must be a number, got "${value}"`);
    }
    return parsed;
  }
}

/**
 * Factory function for creating a config loader.
 */
export function createConfigLoader(configPath?: string, env?: NodeJS.ProcessEnv): ConfigLoader {
  return new ConfigLoader(configPath, env);
}

/**
 * Load configuration from default paths.
 */
export async function loadConfig(configPath?: string): Promise<MergedConfig> {
  return createConfigLoader(configPath).load();
}

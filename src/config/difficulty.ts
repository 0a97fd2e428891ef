import type { FeatureFlags, MergedConfig } from './config-schema.js';
import { ConfigError } from '../core/errors.js';

/**
 * Scale the simulation for a difficulty level in [0, 1].
 *
 * Harder runs live more lives, carry more memories, grow faster but need
 * less consciousness to bloom, and mutate more. Returns a new config; the
 * input is left untouched.
 *
 * @throws ConfigError when the level is outside [0, 1]
 */
export function adjustDifficulty(config: MergedConfig, level: number): MergedConfig {
  if (!Number.isFinite(level) || level < 0 || level > 1) {
    throw new ConfigError('difficulty', `must be between 0 and 1, got ${String(level)}`);
  }

  const next = structuredClone(config);
  next.difficulty = level;
  next.lifeCycles.max = Math.floor(5 + level * 15);
  next.memory.carryLimit = Math.floor(30 + level * 40);
  next.consciousness.growthRate = 0.005 + level * 0.015;
  next.consciousness.bloomThreshold = 0.9 - level * 0.1;
  next.personality.mutationRate = 0.05 + level * 0.1;
  return next;
}

/**
 * Return a config with the given feature toggles replaced.
 */
export function withFeatures(config: MergedConfig, features: Partial<FeatureFlags>): MergedConfig {
  const next = structuredClone(config);
  next.features = { ...next.features, ...features };
  return next;
}

/**
 * Grouped view of the values that shape a run.
 */
export interface ConfigSummary {
  lifeCycles: MergedConfig['lifeCycles'];
  memory: {
    storageThreshold: number;
    pruneThreshold: number;
    carryLimit: number | null;
    inheritanceFraction: number;
    inheritanceStrength: number;
  };
  consciousness: {
    growthRate: number;
    bloomThreshold: number;
  };
  personality: {
    mutationRate: number;
  };
  features: FeatureFlags;
  difficulty: number | null;
}

export function getConfigSummary(config: MergedConfig): ConfigSummary {
  return {
    lifeCycles: { ...config.lifeCycles },
    memory: {
      storageThreshold: config.memory.storageThreshold,
      pruneThreshold: config.memory.pruneThreshold,
      carryLimit: config.memory.carryLimit,
      inheritanceFraction: config.memory.inheritanceFraction,
      inheritanceStrength: config.memory.inheritanceStrength,
    },
    consciousness: {
      growthRate: config.consciousness.growthRate,
      bloomThreshold: config.consciousness.bloomThreshold,
    },
    personality: {
      mutationRate: config.personality.mutationRate,
    },
    features: { ...config.features },
    difficulty: config.difficulty,
  };
}

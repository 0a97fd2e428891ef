import type { LogLevel } from '../types/logger.js';

/**
 * Toggles for optional inner processes.
 */
export interface FeatureFlags {
  /** Generate thoughts while processing experiences */
  innerDialogue: boolean;
  /** Let events reshape the ethical framework */
  ethicalLearning: boolean;
  /** Prune and inherit memories at rebirth */
  memoryConsolidation: boolean;
}

/**
 * Soul configuration file schema.
 *
 * This is what gets loaded from data/config/soul.json.
 * All fields are optional - defaults are used for missing values.
 */
export interface SoulConfigFile {
  /** Schema version for migrations */
  version: number;

  lifeCycles?: Partial<MergedConfig['lifeCycles']>;
  environment?: Partial<MergedConfig['environment']>;
  emotion?: Partial<MergedConfig['emotion']>;
  consciousness?: Partial<Omit<MergedConfig['consciousness'], 'bloom'>> & {
    bloom?: Partial<MergedConfig['consciousness']['bloom']>;
  };
  memory?: Partial<MergedConfig['memory']>;
  personality?: Partial<MergedConfig['personality']>;
  rebirth?: Partial<MergedConfig['rebirth']>;
  features?: Partial<FeatureFlags>;

  /** Difficulty level (0-1) applied on top of the other values */
  difficulty?: number;

  /** Seed for reproducible runs */
  seed?: number;

  logging?: Partial<MergedConfig['logging']>;
}

/**
 * Merged simulation configuration.
 *
 * The final config after merging:
 * 1. Hardcoded defaults (lowest priority)
 * 2. Config file values
 * 3. Environment variables
 */
export interface MergedConfig {
  /** Cycle lengths, consumed by the run loop */
  lifeCycles: {
    max: number;
    /** Minimum ticks per life */
    minDuration: number;
    /** Maximum ticks per life */
    maxDuration: number;
  };

  environment: {
    /** A uniform draw above this marks an event as novel */
    noveltyThreshold: number;
  };

  emotion: {
    /** Fraction of intensity lost per decay pass */
    decayRate: number;
    /** Emotions at or below this intensity after decay are dropped */
    persistenceFloor: number;
  };

  consciousness: {
    initialLevel: number;
    growthRate: number;
    /** Level needed before Silent Bloom is even considered */
    bloomThreshold: number;
    bloom: {
      /** Minimum cross-life thought count */
      minThoughts: number;
      /** How many recent thoughts are inspected for existential markers */
      window: number;
      /** Existential thoughts required inside the window */
      minExistential: number;
      /** Ethical maturity floors (strictly exceeded) */
      maturityEmpathy: number;
      maturityHarmony: number;
      /** Ethical development floors (met or exceeded) */
      empathyFloor: number;
      harmonyFloor: number;
    };
  };

  memory: {
    /** Minimum significance for a memory to be stored */
    storageThreshold: number;
    /** Memories below this significance are forgotten at rebirth */
    pruneThreshold: number;
    /** Default intensity threshold for emotion-indexed recall */
    recallThreshold: number;
    /** Share of memories carried into the next life */
    inheritanceFraction: number;
    /** Significance multiplier applied to inherited memories */
    inheritanceStrength: number;
    /** Upper bound on inherited memories (null = unbounded) */
    carryLimit: number | null;
  };

  personality: {
    /** Probability of a random trait mutation per rebirth */
    mutationRate: number;
    /** Trait value at which a trait counts as dominant */
    dominantThreshold: number;
  };

  rebirth: {
    /** Consciousness resets to half of this at rebirth */
    threshold: number;
  };

  features: FeatureFlags;

  /** Difficulty level applied at load time (null = none) */
  difficulty: number | null;

  /** Seed for reproducible runs (null = unseeded) */
  seed: number | null;

  logging: {
    level: LogLevel;
    pretty: boolean;
    logDir: string;
    maxFiles: number;
  };

  paths: {
    /** Directory for persisted state */
    data: string;
    /** Storage key of the memory snapshot */
    memoryKey: string;
    /** Directory holding soul.json */
    config: string;
  };
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: MergedConfig = {
  lifeCycles: {
    max: 5,
    minDuration: 100,
    maxDuration: 1000,
  },
  environment: {
    noveltyThreshold: 0.7,
  },
  emotion: {
    decayRate: 0.1,
    persistenceFloor: 0.1,
  },
  consciousness: {
    initialLevel: 0.1,
    growthRate: 0.001,
    bloomThreshold: 0.95,
    bloom: {
      minThoughts: 50,
      window: 20,
      minExistential: 10,
      maturityEmpathy: 0.3,
      maturityHarmony: 0.25,
      empathyFloor: 0.6,
      harmonyFloor: 0.5,
    },
  },
  memory: {
    storageThreshold: 0.3,
    pruneThreshold: 0.2,
    recallThreshold: 0.5,
    inheritanceFraction: 0.3,
    inheritanceStrength: 0.5,
    carryLimit: null,
  },
  personality: {
    mutationRate: 0.1,
    dominantThreshold: 0.6,
  },
  rebirth: {
    threshold: 0.8,
  },
  features: {
    innerDialogue: true,
    ethicalLearning: true,
    memoryConsolidation: true,
  },
  difficulty: null,
  seed: null,
  logging: {
    level: 'info',
    pretty: true,
    logDir: 'data/logs',
    maxFiles: 10,
  },
  paths: {
    data: 'data/state',
    memoryKey: 'memory_db',
    config: 'data/config',
  },
};

/**
 * Current config file schema version.
 */
export const CONFIG_FILE_VERSION = 1;

/**
 * Fresh copy of the defaults, safe to mutate.
 */
export function createDefaultConfig(): MergedConfig {
  return structuredClone(DEFAULT_CONFIG);
}

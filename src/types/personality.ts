import type { LifeMetrics } from './metrics.js';

/**
 * The six personality dimensions of a soul.
 */
export const TRAIT_NAMES = [
  'empathy',
  'curiosity',
  'resilience',
  'adaptability',
  'creativity',
  'harmony',
] as const;

export type TraitName = (typeof TRAIT_NAMES)[number];

/**
 * A personality dimension.
 */
export interface Trait {
  name: TraitName;

  /** Current value (0-1) */
  value: number;

  /** How strongly consciousness pulls this trait upwards */
  readonly evolutionRate: number;

  readonly description: string;
}

export type TraitValues = Record<TraitName, number>;

/**
 * One evolve() call: trait values before and after, plus what drove it.
 */
export interface EvolutionRecord {
  before: TraitValues;
  after: TraitValues;
  metrics: LifeMetrics;
  /** Trait hit by random mutation, if any */
  mutated: TraitName | null;
  evolvedAt: Date;
}

/**
 * Read-only view of a personality.
 */
export interface PersonalitySummary {
  soulId: string;
  traits: Record<TraitName, { value: number; description: string }>;
  dominantTraits: TraitName[];
  evolutionCount: number;
}

/**
 * Initial trait set of a newly created soul.
 */
export function createDefaultTraits(): Record<TraitName, Trait> {
  return {
    empathy: {
      name: 'empathy',
      value: 0.3,
      evolutionRate: 0.05,
      description: 'Ability to understand and share feelings',
    },
    curiosity: {
      name: 'curiosity',
      value: 0.4,
      evolutionRate: 0.07,
      description: 'Drive to explore and learn',
    },
    resilience: {
      name: 'resilience',
      value: 0.35,
      evolutionRate: 0.04,
      description: 'Ability to recover from difficulties',
    },
    adaptability: {
      name: 'adaptability',
      value: 0.3,
      evolutionRate: 0.06,
      description: 'Flexibility in facing change',
    },
    creativity: {
      name: 'creativity',
      value: 0.25,
      evolutionRate: 0.05,
      description: 'Ability to think originally',
    },
    harmony: {
      name: 'harmony',
      value: 0.2,
      evolutionRate: 0.03,
      description: 'Tendency towards peaceful balance',
    },
  };
}

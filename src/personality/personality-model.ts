import { randomUUID } from 'node:crypto';
import type { Logger } from '../types/logger.js';
import type { EmotionName } from '../types/emotion.js';
import { EMOTION_NAMES } from '../types/emotion.js';
import type { LifeMetrics } from '../types/metrics.js';
import { cloneLifeMetrics } from '../types/metrics.js';
import type {
  EvolutionRecord,
  PersonalitySummary,
  Trait,
  TraitName,
  TraitValues,
} from '../types/personality.js';
import { TRAIT_NAMES, createDefaultTraits } from '../types/personality.js';
import { type RandomSource, pickOne } from '../core/random.js';
import { clamp } from '../core/utils/math.js';

/**
 * PersonalityModel configuration.
 */
export interface PersonalityConfig {
  /** Probability of one random mutation per evolve() (default: 0.1) */
  mutationRate: number;
  /** Half-width of a mutation (default: 0.05) */
  mutationSize: number;
  /** Ethical ratio above which ethics favour empathy (default: 0.6) */
  ethicalRatioThreshold: number;
  /** Share of consciousness that feeds trait growth (default: 0.1) */
  consciousnessFactor: number;
  /** Value at which a trait counts as dominant (default: 0.6) */
  dominantThreshold: number;
}

export const DEFAULT_PERSONALITY_CONFIG: PersonalityConfig = {
  mutationRate: 0.1,
  mutationSize: 0.05,
  ethicalRatioThreshold: 0.6,
  consciousnessFactor: 0.1,
  dominantThreshold: 0.6,
};

type TraitAdjustment = readonly [TraitName, number];

/**
 * Trait nudges for each emotion felt during a life.
 */
export const EMOTION_TRAIT_RULES: Partial<Record<EmotionName, readonly TraitAdjustment[]>> = {
  joy: [
    ['creativity', 0.05],
    ['harmony', 0.03],
  ],
  fear: [
    ['resilience', 0.04],
    ['adaptability', 0.05],
  ],
  love: [
    ['empathy', 0.06],
    ['harmony', 0.04],
  ],
  curiosity: [
    ['curiosity', 0.05],
    ['creativity', 0.03],
  ],
};

const POSITIVE_ETHICS_RULE: readonly TraitAdjustment[] = [
  ['empathy', 0.05],
  ['harmony', 0.04],
];

const NEGATIVE_ETHICS_RULE: readonly TraitAdjustment[] = [
  ['resilience', 0.03],
  ['adaptability', 0.05],
];

/**
 * Share of positive ethical choices. Zero choices count as ratio 0.
 */
export function ethicalRatio(choices: LifeMetrics['ethicalChoices']): number {
  const total = choices.positive + choices.negative;
  return choices.positive / (total === 0 ? 1 : total);
}

export interface PersonalityDeps {
  logger: Logger;
  random: RandomSource;
  /** Existing soul identity; a new one is generated when absent */
  soulId?: string;
  now?: () => Date;
}

/**
 * PersonalityModel - the six traits of a soul and how lives shape them.
 *
 * The soul identifier and the trait set outlive every rebirth. Traits only
 * move by clamped additive steps.
 */
export class PersonalityModel {
  private readonly logger: Logger;
  private readonly random: RandomSource;
  private readonly now: () => Date;
  private readonly config: PersonalityConfig;
  private readonly soulId: string;
  private readonly traits: Record<TraitName, Trait>;
  private readonly history: EvolutionRecord[] = [];

  constructor(deps: PersonalityDeps, config: Partial<PersonalityConfig> = {}) {
    this.soulId = deps.soulId ?? randomUUID();
    this.logger = deps.logger.child({ component: 'personality', soulId: this.soulId });
    this.random = deps.random;
    this.now = deps.now ?? (() => new Date());
    this.config = { ...DEFAULT_PERSONALITY_CONFIG, ...config };
    this.traits = createDefaultTraits();
  }

  /**
   * Evolve traits from a finished life.
   */
  evolve(metrics: LifeMetrics): EvolutionRecord {
    const before = this.getTraitValues();

    // 1. Emotional peaks
    for (const emotion of EMOTION_NAMES) {
      const rule = EMOTION_TRAIT_RULES[emotion];
      if (rule && metrics.emotionalPeaks[emotion] !== undefined) {
        this.applyAll(rule);
      }
    }

    // 2. Ethical choices
    this.applyAll(
      ethicalRatio(metrics.ethicalChoices) > this.config.ethicalRatioThreshold
        ? POSITIVE_ETHICS_RULE
        : NEGATIVE_ETHICS_RULE
    );

    // 3. Consciousness lifts every trait in proportion to its rate
    const factor = metrics.consciousnessLevel * this.config.consciousnessFactor;
    for (const name of TRAIT_NAMES) {
      this.adjust(name, this.traits[name].evolutionRate * factor);
    }

    // 4. Mutation
    const mutated = this.maybeMutate();

    const record: EvolutionRecord = {
      before,
      after: this.getTraitValues(),
      metrics: cloneLifeMetrics(metrics),
      mutated,
      evolvedAt: this.now(),
    };
    this.history.push(record);

    this.logger.info(
      { evolution: this.history.length, after: record.after, mutated },
      'Personality evolved'
    );
    return record;
  }

  getSoulId(): string {
    return this.soulId;
  }

  getTrait(name: TraitName): Readonly<Trait> {
    return { ...this.traits[name] };
  }

  /**
   * Value of a trait by name, or null for a name that is not a trait.
   */
  getTraitValue(name: string): number | null {
    const trait = TRAIT_NAMES.find((t) => t === name);
    return trait ? this.traits[trait].value : null;
  }

  getTraitValues(): TraitValues {
    return {
      empathy: this.traits.empathy.value,
      curiosity: this.traits.curiosity.value,
      resilience: this.traits.resilience.value,
      adaptability: this.traits.adaptability.value,
      creativity: this.traits.creativity.value,
      harmony: this.traits.harmony.value,
    };
  }

  /**
   * Traits at or above the threshold, in trait order.
   */
  getDominantTraits(threshold = this.config.dominantThreshold): TraitName[] {
    return TRAIT_NAMES.filter((name) => this.traits[name].value >= threshold);
  }

  /**
   * Value of each trait after every evolution so far.
   */
  getEvolutionProgress(): Record<TraitName, number[]> {
    const values = (name: TraitName): number[] => this.history.map((r) => r.after[name]);
    return {
      empathy: values('empathy'),
      curiosity: values('curiosity'),
      resilience: values('resilience'),
      adaptability: values('adaptability'),
      creativity: values('creativity'),
      harmony: values('harmony'),
    };
  }

  getEvolutionHistory(): readonly EvolutionRecord[] {
    return this.history;
  }

  getSummary(): PersonalitySummary {
    const view = (name: TraitName): { value: number; description: string } => ({
      value: this.traits[name].value,
      description: this.traits[name].description,
    });
    return {
      soulId: this.soulId,
      traits: {
        empathy: view('empathy'),
        curiosity: view('curiosity'),
        resilience: view('resilience'),
        adaptability: view('adaptability'),
        creativity: view('creativity'),
        harmony: view('harmony'),
      },
      dominantTraits: this.getDominantTraits(),
      evolutionCount: this.history.length,
    };
  }

  private maybeMutate(): TraitName | null {
    if (this.random.next() >= this.config.mutationRate) {
      return null;
    }
    const name = pickOne(this.random, TRAIT_NAMES);
    const amount = (this.random.next() - 0.5) * 2 * this.config.mutationSize;
    this.adjust(name, amount);
    this.logger.debug({ trait: name, amount }, 'Trait mutated');
    return name;
  }

  private applyAll(adjustments: readonly TraitAdjustment[]): void {
    for (const [name, amount] of adjustments) {
      this.adjust(name, amount);
    }
  }

  private adjust(name: TraitName, amount: number): void {
    const trait = this.traits[name];
    trait.value = clamp(trait.value + amount);
  }
}

/**
 * Factory function for creating a personality model.
 */
export function createPersonalityModel(
  deps: PersonalityDeps,
  config?: Partial<PersonalityConfig>
): PersonalityModel {
  return new PersonalityModel(deps, config);
}

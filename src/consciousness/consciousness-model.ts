import type { Logger } from '../types/logger.js';
import type { LifeEvent } from '../types/event.js';
import type { EmotionRecord } from '../types/emotion.js';
import type {
  AwarenessTier,
  ConsciousnessState,
  EthicalDimension,
  EthicalFramework,
  ThoughtEntry,
} from '../types/consciousness.js';
import { ETHICAL_DIMENSIONS, createDefaultEthicalFramework } from '../types/consciousness.js';
import { clamp } from '../core/utils/math.js';
import { thoughtsForLevel, isExistentialThought } from './thoughts.js';

/**
 * ConsciousnessModel configuration.
 */
export interface ConsciousnessConfig {
  /** Starting level (default: 0.1) */
  initialLevel: number;
  /** Multiplier on significance and emotional intensity (default: 0.001) */
  growthRate: number;
  /** Level required before Silent Bloom is considered (default: 0.95) */
  bloomThreshold: number;
  /** Minimum cross-life thoughts for Silent Bloom (default: 50) */
  minThoughts: number;
  /** Recent thoughts inspected for existential markers (default: 20) */
  window: number;
  /** Existential thoughts required in the window (default: 10) */
  minExistential: number;
  /** Maturity floors, strictly exceeded (default: 0.3 / 0.25) */
  maturityEmpathy: number;
  maturityHarmony: number;
  /** Development floors, met or exceeded (default: 0.6 / 0.5) */
  empathyFloor: number;
  harmonyFloor: number;
  /** Generate thoughts (default: true) */
  innerDialogue: boolean;
  /** Evolve the ethical framework (default: true) */
  ethicalLearning: boolean;
}

export const DEFAULT_CONSCIOUSNESS_CONFIG: ConsciousnessConfig = {
  initialLevel: 0.1,
  growthRate: 0.001,
  bloomThreshold: 0.95,
  minThoughts: 50,
  window: 20,
  minExistential: 10,
  maturityEmpathy: 0.3,
  maturityHarmony: 0.25,
  empathyFloor: 0.6,
  harmonyFloor: 0.5,
  innerDialogue: true,
  ethicalLearning: true,
};

/** Level bonus for a novel experience */
const NOVELTY_BONUS = 0.2;
/** Level bonus for a familiar experience */
const FAMILIAR_BONUS = 0.05;

const POSITIVE_EMPATHY_DELTA = 0.05;
const POSITIVE_HARMONY_DELTA = 0.03;
const NEGATIVE_SELF_PRESERVATION_DELTA = 0.02;

/**
 * Awareness tier for a level.
 */
export function awarenessTierFor(level: number): AwarenessTier {
  if (level >= 0.85) return 'transcendent';
  if (level >= 0.6) return 'self-aware';
  if (level >= 0.3) return 'emotional';
  return 'base';
}

/**
 * Scale a framework so its weights sum to 1.
 */
export function normalizeFramework(framework: EthicalFramework): EthicalFramework {
  const total = ETHICAL_DIMENSIONS.reduce((sum, d) => sum + framework[d], 0);
  if (total <= 0) {
    const even = 1 / ETHICAL_DIMENSIONS.length;
    return { empathy: even, self_preservation: even, curiosity: even, harmony: even };
  }
  return {
    empathy: framework.empathy / total,
    self_preservation: framework.self_preservation / total,
    curiosity: framework.curiosity / total,
    harmony: framework.harmony / total,
  };
}

/**
 * Reasons Silent Bloom did not happen, in evaluation order.
 */
export type BloomBlocker =
  | 'level'
  | 'thought_history'
  | 'ethical_maturity'
  | 'existential_depth'
  | 'ethical_development';

export interface BloomAssessment {
  bloomed: boolean;
  /** First unmet condition, null when bloomed */
  blocker: BloomBlocker | null;
  existentialCount: number;
}

/**
 * ConsciousnessModel - awareness level, thoughts and ethics of one soul.
 *
 * The level only rises through update(); adjust() is the single way down
 * and is reserved for rebirth. Thought history and the ethical framework
 * outlive rebirth.
 */
export class ConsciousnessModel {
  private readonly logger: Logger;
  private readonly config: ConsciousnessConfig;
  private readonly now: () => Date;
  private readonly state: ConsciousnessState;

  constructor(
    logger: Logger,
    config: Partial<ConsciousnessConfig> = {},
    now: () => Date = () => new Date(),
    initialState?: ConsciousnessState
  ) {
    this.logger = logger.child({ component: 'consciousness' });
    this.config = { ...DEFAULT_CONSCIOUSNESS_CONFIG, ...config };
    this.now = now;

    if (initialState) {
      this.state = initialState;
    } else {
      const level = clamp(this.config.initialLevel);
      this.state = {
        level,
        awarenessTier: awarenessTierFor(level),
        activeThoughts: [],
        ethicalFramework: normalizeFramework(createDefaultEthicalFramework()),
        thoughtHistory: [],
      };
    }
  }

  /**
   * Rebuild a model from a persisted state.
   *
   * The framework is taken as stored; only non-negative finite weights
   * are accepted. The level is clamped into [0, 1].
   *
   * @throws RangeError on an invalid framework weight
   */
  static restore(
    logger: Logger,
    snapshot: {
      level: number;
      ethicalFramework: EthicalFramework;
      activeThoughts?: readonly string[];
      thoughtHistory?: readonly ThoughtEntry[];
    },
    config: Partial<ConsciousnessConfig> = {},
    now?: () => Date
  ): ConsciousnessModel {
    for (const dimension of ETHICAL_DIMENSIONS) {
      const weight = snapshot.ethicalFramework[dimension];
      if (!Number.isFinite(weight) || weight < 0) {
        throw new RangeError(`Ethical weight ${dimension} must be a non-negative number`);
      }
    }

    const level = clamp(snapshot.level);
    return new ConsciousnessModel(logger, config, now, {
      level,
      awarenessTier: awarenessTierFor(level),
      activeThoughts: [...(snapshot.activeThoughts ?? [])],
      ethicalFramework: { ...snapshot.ethicalFramework },
      thoughtHistory: (snapshot.thoughtHistory ?? []).map((t) => ({ ...t })),
    });
  }

  /**
   * Let an experience shape consciousness.
   */
  update(event: LifeEvent, emotion: Pick<EmotionRecord, 'intensity'>): void {
    const { growthRate } = this.config;
    const delta =
      event.significance * growthRate +
      emotion.intensity * growthRate +
      (event.isNovel ? NOVELTY_BONUS : FAMILIAR_BONUS);

    const before = this.state.level;
    // Delta is never negative, so the level cannot drop here
    this.state.level = clamp(before + Math.max(0, delta));

    if (this.config.innerDialogue) {
      this.think();
    }

    if (this.config.ethicalLearning) {
      this.evolveEthics(event.ethicalImpact);
    }

    const tier = awarenessTierFor(this.state.level);
    if (tier !== this.state.awarenessTier) {
      this.logger.debug(
        { from: this.state.awarenessTier, to: tier, level: this.state.level },
        'Awareness tier changed'
      );
      this.state.awarenessTier = tier;
    }
  }

  /**
   * Whether Silent Bloom has been reached.
   */
  checkBloom(): boolean {
    return this.assessBloom().bloomed;
  }

  /**
   * Evaluate every Silent Bloom condition and report the first one unmet.
   */
  assessBloom(): BloomAssessment {
    const { level, thoughtHistory, ethicalFramework } = this.state;
    const cfg = this.config;

    const recent = thoughtHistory.slice(-cfg.window);
    const existentialCount = recent.filter((t) => isExistentialThought(t.text)).length;
    const fail = (blocker: BloomBlocker): BloomAssessment => ({
      bloomed: false,
      blocker,
      existentialCount,
    });

    if (level < cfg.bloomThreshold) return fail('level');
    if (thoughtHistory.length < cfg.minThoughts) return fail('thought_history');
    if (
      !(ethicalFramework.empathy > cfg.maturityEmpathy) ||
      !(ethicalFramework.harmony > cfg.maturityHarmony)
    ) {
      return fail('ethical_maturity');
    }
    if (existentialCount < cfg.minExistential) return fail('existential_depth');
    if (ethicalFramework.empathy < cfg.empathyFloor || ethicalFramework.harmony < cfg.harmonyFloor) {
      return fail('ethical_development');
    }

    return { bloomed: true, blocker: null, existentialCount };
  }

  /**
   * Reset the level at rebirth. Clamped into [0.1, 1].
   */
  adjust(newLevel: number): void {
    const before = this.state.level;
    this.state.level = clamp(newLevel, 0.1, 1);
    this.state.awarenessTier = awarenessTierFor(this.state.level);
    this.logger.debug({ before, after: this.state.level }, 'Consciousness adjusted');
  }

  level(): number {
    return this.state.level;
  }

  awarenessTier(): AwarenessTier {
    return this.state.awarenessTier;
  }

  getEthicalFramework(): Readonly<EthicalFramework> {
    return { ...this.state.ethicalFramework };
  }

  getInnerMonologue(): readonly string[] {
    return this.state.activeThoughts;
  }

  getThoughtHistory(): readonly ThoughtEntry[] {
    return this.state.thoughtHistory;
  }

  /**
   * Copy of the full state.
   */
  getState(): ConsciousnessState {
    return {
      level: this.state.level,
      awarenessTier: this.state.awarenessTier,
      activeThoughts: [...this.state.activeThoughts],
      ethicalFramework: { ...this.state.ethicalFramework },
      thoughtHistory: this.state.thoughtHistory.map((t) => ({ ...t })),
    };
  }

  private think(): void {
    const thoughts = thoughtsForLevel(this.state.level);
    if (thoughts.length === 0) return;

    const timestamp = this.now();
    for (const text of thoughts) {
      this.state.activeThoughts.push(text);
      this.state.thoughtHistory.push({ text, timestamp });
    }
  }

  private evolveEthics(impact: number): void {
    if (impact === 0) return;

    const framework = { ...this.state.ethicalFramework };
    if (impact > 0) {
      this.bump(framework, 'empathy', POSITIVE_EMPATHY_DELTA);
      this.bump(framework, 'harmony', POSITIVE_HARMONY_DELTA);
    } else {
      this.bump(framework, 'self_preservation', NEGATIVE_SELF_PRESERVATION_DELTA);
    }
    this.state.ethicalFramework = normalizeFramework(framework);
  }

  private bump(framework: EthicalFramework, dimension: EthicalDimension, amount: number): void {
    framework[dimension] += amount;
  }
}

/**
 * Factory function for creating a consciousness model.
 */
export function createConsciousnessModel(
  logger: Logger,
  config?: Partial<ConsciousnessConfig>
): ConsciousnessModel {
  return new ConsciousnessModel(logger, config);
}

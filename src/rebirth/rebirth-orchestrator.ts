import type { Logger } from '../types/logger.js';
import type { LifeEvent } from '../types/event.js';
import type { EmotionName, EmotionRecord } from '../types/emotion.js';
import type { LifeMetrics } from '../types/metrics.js';
import type { EvolutionRecord, TraitName } from '../types/personality.js';
import { cloneLifeMetrics, createLifeMetrics } from '../types/metrics.js';
import type { EmotionEngine } from '../emotion/emotion-engine.js';
import type { ConsciousnessModel } from '../consciousness/consciousness-model.js';
import type { MemoryStore } from '../memory/memory-store.js';
import type { PersonalityModel } from '../personality/personality-model.js';
import { RebirthError, type RebirthStep, errorMessage } from '../core/errors.js';

/**
 * Lifecycle state of a soul.
 *
 * - ALIVE: ticks are processed normally
 * - TRANSITIONING: a rebirth is running, or one failed part way
 */
export type RebirthState = 'ALIVE' | 'TRANSITIONING';

export interface RebirthConfig {
  /** Consciousness resets to half of this (default: 0.8) */
  threshold: number;
  /** Prune and inherit memories (default: true) */
  memoryConsolidation: boolean;
}

export const DEFAULT_REBIRTH_CONFIG: RebirthConfig = {
  threshold: 0.8,
  memoryConsolidation: true,
};

export interface RebirthDeps {
  logger: Logger;
  /** Builds a fresh emotion engine; called once up front and once per rebirth */
  createEmotionEngine: () => EmotionEngine;
  consciousness: ConsciousnessModel;
  memory: MemoryStore;
  personality: PersonalityModel;
}

/**
 * What a completed rebirth did.
 */
export interface RebirthReport {
  /** Number of the life that just ended (1-based) */
  cycle: number;
  /** Metrics of the life that just ended */
  archivedMetrics: LifeMetrics;
  /** Memories carried into the next life */
  inherited: number;
  /** Memories forgotten by the prune */
  pruned: number;
  /** Store size once the rebirth is done */
  memoryCount: number;
  evolution: EvolutionRecord;
  consciousnessLevel: number;
}

/**
 * Current figures that feed the next rebirth.
 */
export interface RebirthMetrics {
  cycle: number;
  consciousnessLevel: number;
  emotionalState: Partial<Record<EmotionName, number>>;
  significantMemories: number;
  personalityEvolution: Record<TraitName, number[]>;
}

/**
 * RebirthOrchestrator - the ALIVE/TRANSITIONING state machine of a soul.
 *
 * Accumulates LifeMetrics while the soul lives and performs the end-of-life
 * transition as one ordered sequence. There is no rollback: if any step
 * fails the orchestrator stays TRANSITIONING and rejects all further work.
 */
export class RebirthOrchestrator {
  private readonly logger: Logger;
  private readonly config: RebirthConfig;
  private readonly createEmotionEngine: () => EmotionEngine;
  private readonly consciousness: ConsciousnessModel;
  private readonly memory: MemoryStore;
  private readonly personality: PersonalityModel;

  private state: RebirthState = 'ALIVE';
  private emotionEngine: EmotionEngine;
  private metrics: LifeMetrics = createLifeMetrics();
  private cycle = 1;

  constructor(deps: RebirthDeps, config: Partial<RebirthConfig> = {}) {
    this.logger = deps.logger.child({ component: 'rebirth' });
    this.config = { ...DEFAULT_REBIRTH_CONFIG, ...config };
    this.createEmotionEngine = deps.createEmotionEngine;
    this.consciousness = deps.consciousness;
    this.memory = deps.memory;
    this.personality = deps.personality;
    this.emotionEngine = deps.createEmotionEngine();
  }

  /**
   * Fold one processed tick into the current life's metrics.
   *
   * Call after the consciousness update and before decay, so the peaks
   * see the emotions at full strength.
   */
  recordTick(event: LifeEvent, emotion: EmotionRecord, stored: boolean): void {
    this.assertAlive();
    const m = this.metrics;

    this.raisePeak(emotion.name, emotion.intensity);
    for (const record of this.emotionEngine.getCurrentRecords()) {
      this.raisePeak(record.name, record.intensity);
    }

    m.consciousnessLevel = this.consciousness.level();
    m.lifeDuration += 1;
    if (stored) m.significantExperiences += 1;
    if (event.ethicalImpact > 0) m.ethicalChoices.positive += 1;
    else if (event.ethicalImpact < 0) m.ethicalChoices.negative += 1;
  }

  /**
   * End the current life and begin the next.
   *
   * Steps, in order: archive metrics, select inheritance from the unpruned
   * store, prune, inherit, replace the emotion engine, evolve personality,
   * reset metrics, partially reset consciousness.
   *
   * @throws RebirthError naming the step that failed
   */
  processRebirth(): RebirthReport {
    if (this.state !== 'ALIVE') {
      throw new RebirthError('guard', 'a previous rebirth did not complete');
    }
    this.state = 'TRANSITIONING';
    const cycle = this.cycle;

    const archived = this.step('archive_metrics', () => {
      const snapshot = cloneLifeMetrics(this.metrics);
      this.logger.info({ cycle, metrics: snapshot }, 'Life cycle complete');
      return snapshot;
    });

    let inherited = 0;
    let pruned = 0;
    if (this.config.memoryConsolidation) {
      const selected = this.step('select_inheritance', () => this.memory.selectForInheritance());
      pruned = this.step('prune_memories', () => this.memory.prune());
      this.step('inherit_memories', () => {
        this.memory.inherit(selected);
      });
      inherited = selected.length;
    } else {
      this.logger.debug({ cycle }, 'Memory consolidation disabled, memories kept as they are');
    }

    this.step('reset_emotions', () => {
      this.emotionEngine = this.createEmotionEngine();
    });

    const evolution = this.step('evolve_personality', () => this.personality.evolve(archived));

    this.step('reset_metrics', () => {
      this.metrics = createLifeMetrics();
    });

    this.step('adjust_consciousness', () => {
      this.consciousness.adjust(this.config.threshold * 0.5);
    });

    this.cycle += 1;
    this.state = 'ALIVE';

    const report: RebirthReport = {
      cycle,
      archivedMetrics: archived,
      inherited,
      pruned,
      memoryCount: this.memory.size(),
      evolution,
      consciousnessLevel: this.consciousness.level(),
    };
    this.logger.info(
      {
        cycle,
        inherited,
        pruned,
        memoryCount: report.memoryCount,
        consciousnessLevel: report.consciousnessLevel,
      },
      'Soul reborn'
    );
    return report;
  }

  /**
   * @throws RebirthError when a failed rebirth left the soul mid-transition
   */
  assertAlive(): void {
    if (this.state !== 'ALIVE') {
      throw new RebirthError('guard', 'soul is mid-transition after a failed rebirth');
    }
  }

  /**
   * Emotion engine of the current life. Replaced at every rebirth, so
   * callers should not hold on to it across one.
   */
  getEmotionEngine(): EmotionEngine {
    return this.emotionEngine;
  }

  getLifeMetrics(): LifeMetrics {
    return cloneLifeMetrics(this.metrics);
  }

  getState(): RebirthState {
    return this.state;
  }

  getCycle(): number {
    return this.cycle;
  }

  getRebirthMetrics(): RebirthMetrics {
    return {
      cycle: this.cycle,
      consciousnessLevel: this.consciousness.level(),
      emotionalState: this.emotionEngine.getEmotionalState(),
      significantMemories: this.memory.getSignificantMemories().length,
      personalityEvolution: this.personality.getEvolutionProgress(),
    };
  }

  private step<T>(step: RebirthStep, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      this.logger.error({ step, error: errorMessage(error) }, 'Rebirth step failed');
      throw new RebirthError(step, errorMessage(error), { cause: error });
    }
  }

  private raisePeak(name: EmotionName, intensity: number): void {
    const peaks = this.metrics.emotionalPeaks;
    const previous = peaks[name];
    peaks[name] = previous === undefined ? intensity : Math.max(previous, intensity);
  }
}

/**
 * Factory function for creating a rebirth orchestrator.
 */
export function createRebirthOrchestrator(
  deps: RebirthDeps,
  config?: Partial<RebirthConfig>
): RebirthOrchestrator {
  return new RebirthOrchestrator(deps, config);
}

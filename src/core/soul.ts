import type { Logger } from '../types/logger.js';
import type { LifeEvent } from '../types/event.js';
import type { EmotionRecord } from '../types/emotion.js';
import type { Memory, MemoryLoadResult } from '../types/memory.js';
import type { MergedConfig } from '../config/config-schema.js';
import type { Storage } from '../storage/storage.js';
import type { RandomSource } from './random.js';
import { type EventSource, createEventSource } from '../environment/event-source.js';
import { EmotionEngine } from '../emotion/emotion-engine.js';
import { type BloomAssessment, ConsciousnessModel } from '../consciousness/consciousness-model.js';
import { MemoryStore } from '../memory/memory-store.js';
import { PersonalityModel } from '../personality/personality-model.js';
import { type RebirthReport, RebirthOrchestrator } from '../rebirth/rebirth-orchestrator.js';

/**
 * Dependencies shared by every component of a soul.
 */
export interface SoulDeps {
  logger: Logger;
  storage: Storage;
  random: RandomSource;
  /** Clock, injectable for tests */
  now?: () => Date;
  /** Identity of an existing soul */
  soulId?: string;
}

/**
 * Outcome of one tick.
 */
export interface TickResult {
  event: LifeEvent;
  /** The emotion as felt, before this tick's decay */
  emotion: EmotionRecord;
  /** Memory formed by the experience, if any */
  memory: Memory | null;
  consciousnessLevel: number;
  /** Silent Bloom reached; the driver should stop ticking */
  bloomed: boolean;
}

/**
 * Soul - one simulated being and all of its components.
 *
 * Components are built once from a validated config and owned here.
 * Nothing is shared through module state.
 */
export class Soul {
  readonly events: EventSource;
  readonly consciousness: ConsciousnessModel;
  readonly memory: MemoryStore;
  readonly personality: PersonalityModel;
  readonly rebirth: RebirthOrchestrator;

  private readonly logger: Logger;

  constructor(deps: SoulDeps, config: MergedConfig) {
    const now = deps.now ?? (() => new Date());
    this.logger = deps.logger.child({ component: 'soul' });

    this.events = createEventSource(
      { logger: deps.logger, random: deps.random, now },
      { noveltyThreshold: config.environment.noveltyThreshold }
    );

    this.consciousness = new ConsciousnessModel(
      deps.logger,
      {
        initialLevel: config.consciousness.initialLevel,
        growthRate: config.consciousness.growthRate,
        bloomThreshold: config.consciousness.bloomThreshold,
        ...config.consciousness.bloom,
        innerDialogue: config.features.innerDialogue,
        ethicalLearning: config.features.ethicalLearning,
      },
      now
    );

    this.memory = new MemoryStore(
      { logger: deps.logger, storage: deps.storage, now },
      { storageKey: config.paths.memoryKey, ...config.memory }
    );

    this.personality = new PersonalityModel(
      { logger: deps.logger, random: deps.random, soulId: deps.soulId, now },
      config.personality
    );

    this.rebirth = new RebirthOrchestrator(
      {
        logger: deps.logger,
        createEmotionEngine: () => new EmotionEngine(deps.logger, config.emotion, now),
        consciousness: this.consciousness,
        memory: this.memory,
        personality: this.personality,
      },
      {
        threshold: config.rebirth.threshold,
        memoryConsolidation: config.features.memoryConsolidation,
      }
    );
  }

  /**
   * Live one unit of time.
   *
   * @throws RebirthError when a failed rebirth left the soul mid-transition
   */
  tick(): TickResult {
    this.rebirth.assertAlive();
    const emotions = this.emotions();

    const event = this.events.generateEvent();
    const emotion = emotions.process(event);
    const memory = this.memory.store(event, emotion);
    this.consciousness.update(event, emotion);
    this.rebirth.recordTick(event, emotion, memory !== null);
    // Decay mutates the live record
    const felt = { ...emotion };
    emotions.decay();

    const bloomed = this.consciousness.checkBloom();
    if (bloomed) {
      this.logger.info(
        { level: this.consciousness.level(), cycle: this.rebirth.getCycle() },
        'Silent Bloom reached'
      );
    }

    return {
      event,
      emotion: felt,
      memory,
      consciousnessLevel: this.consciousness.level(),
      bloomed,
    };
  }

  /**
   * End the current life and start the next one.
   */
  reborn(): RebirthReport {
    return this.rebirth.processRebirth();
  }

  /**
   * Emotion engine of the current life.
   */
  emotions(): EmotionEngine {
    return this.rebirth.getEmotionEngine();
  }

  assessBloom(): BloomAssessment {
    return this.consciousness.assessBloom();
  }

  loadMemories(): Promise<MemoryLoadResult> {
    return this.memory.load();
  }

  saveMemories(): Promise<void> {
    return this.memory.save();
  }
}

/**
 * Factory function for creating a soul.
 */
export function createSoul(deps: SoulDeps, config: MergedConfig): Soul {
  return new Soul(deps, config);
}

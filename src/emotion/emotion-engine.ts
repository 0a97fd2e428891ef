import type { Logger } from '../types/logger.js';
import type { LifeEvent } from '../types/event.js';
import type { DominantEmotion, EmotionName, EmotionRecord } from '../types/emotion.js';
import { clamp } from '../core/utils/math.js';

/**
 * EmotionEngine configuration.
 */
export interface EmotionEngineConfig {
  /** Decay rate given to every new record (default: 0.1) */
  decayRate: number;
  /** Records at or below this intensity after decay are dropped (default: 0.1) */
  persistenceFloor: number;
}

export const DEFAULT_EMOTION_CONFIG: EmotionEngineConfig = {
  decayRate: 0.1,
  persistenceFloor: 0.1,
};

/**
 * Triggers with a dedicated emotion. Anything else feels like wonder.
 */
export const TRIGGER_EMOTIONS = {
  achievement: 'joy',
  threat: 'fear',
  loss: 'sadness',
  injustice: 'anger',
  connection: 'love',
  discovery: 'curiosity',
} as const satisfies Record<string, EmotionName>;

export type EmotionTrigger = keyof typeof TRIGGER_EMOTIONS;

export const DEFAULT_EMOTION: EmotionName = 'wonder';

function isEmotionTrigger(trigger: string): trigger is EmotionTrigger {
  return Object.hasOwn(TRIGGER_EMOTIONS, trigger);
}

/**
 * Map a trigger to the emotion it produces.
 */
export function emotionForTrigger(trigger: string): EmotionName {
  if (isEmotionTrigger(trigger)) {
    return TRIGGER_EMOTIONS[trigger];
  }
  return DEFAULT_EMOTION;
}

/**
 * EmotionEngine - turns events into emotions and lets them fade.
 *
 * Holds at most one current record per emotion (the latest wins) and an
 * append-only history of every record produced. Intensity currently
 * follows event significance alone; prior emotional state is not consulted.
 */
export class EmotionEngine {
  private readonly logger: Logger;
  private readonly config: EmotionEngineConfig;
  private readonly now: () => Date;

  /** Insertion order doubles as the tie-break for dominant() */
  private readonly current = new Map<EmotionName, EmotionRecord>();
  private readonly history: EmotionRecord[] = [];

  constructor(
    logger: Logger,
    config: Partial<EmotionEngineConfig> = {},
    now: () => Date = () => new Date()
  ) {
    this.logger = logger.child({ component: 'emotion-engine' });
    this.config = { ...DEFAULT_EMOTION_CONFIG, ...config };
    this.now = now;
  }

  /**
   * Produce the emotional response to an event.
   */
  process(event: LifeEvent): EmotionRecord {
    const record: EmotionRecord = {
      name: emotionForTrigger(event.kind),
      intensity: clamp(Math.min(1, event.significance)),
      trigger: event.kind,
      decayRate: this.config.decayRate,
      timestamp: this.now(),
    };

    this.current.set(record.name, record);
    // History keeps its own copy so decay never touches it
    this.history.push({ ...record });

    return record;
  }

  /**
   * One decay pass over all current emotions.
   */
  decay(): void {
    for (const [name, record] of this.current) {
      const decayed = record.intensity * (1 - record.decayRate);
      if (decayed > this.config.persistenceFloor) {
        record.intensity = decayed;
      } else {
        this.current.delete(name);
        this.logger.trace({ emotion: name }, 'Emotion faded');
      }
    }
  }

  /**
   * Strongest current emotion, or neutral when there is none.
   * Ties go to the emotion that has been current the longest.
   */
  dominant(): DominantEmotion {
    let best: EmotionRecord | null = null;
    for (const record of this.current.values()) {
      if (best === null || record.intensity > best.intensity) {
        best = record;
      }
    }
    return best ? { name: best.name, intensity: best.intensity } : { name: 'neutral', intensity: 0 };
  }

  /**
   * Current intensity per emotion.
   */
  getEmotionalState(): Partial<Record<EmotionName, number>> {
    const state: Partial<Record<EmotionName, number>> = {};
    for (const [name, record] of this.current) {
      state[name] = record.intensity;
    }
    return state;
  }

  getCurrent(name: EmotionName): EmotionRecord | undefined {
    return this.current.get(name);
  }

  /**
   * Current records, oldest first.
   */
  getCurrentRecords(): readonly EmotionRecord[] {
    return [...this.current.values()];
  }

  getHistory(): readonly EmotionRecord[] {
    return this.history;
  }
}

/**
 * Factory function for creating an emotion engine.
 */
export function createEmotionEngine(
  logger: Logger,
  config?: Partial<EmotionEngineConfig>
): EmotionEngine {
  return new EmotionEngine(logger, config);
}

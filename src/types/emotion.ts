/**
 * Emotion names the engine can produce or an event can be tagged with.
 */
export const EMOTION_NAMES = [
  'joy',
  'curiosity',
  'fear',
  'anger',
  'love',
  'guilt',
  'wonder',
  'sadness',
  'determination',
  'empathy',
  'grief',
  'pride',
] as const;

export type EmotionName = (typeof EMOTION_NAMES)[number];

/**
 * A named emotion with its current intensity.
 *
 * The engine keeps at most one current record per name. Only decay
 * mutates a record, and only its intensity.
 */
export interface EmotionRecord {
  /** Emotion name */
  name: EmotionName;

  /** Strength of the emotion (0-1) */
  intensity: number;

  /** Event kind that produced it */
  trigger: string;

  /** Fraction of intensity lost per decay pass */
  decayRate: number;

  /** When the emotion arose */
  timestamp: Date;
}

/**
 * Flat copy of an EmotionRecord, as stored on a memory.
 */
export interface EmotionSnapshot {
  name: EmotionName;
  intensity: number;
  trigger: string;
  decayRate: number;
  /** ISO 8601 timestamp */
  timestamp: string;
}

/**
 * Result of asking which emotion dominates right now.
 */
export interface DominantEmotion {
  name: EmotionName | 'neutral';
  intensity: number;
}

/**
 * Create the flat snapshot of a record.
 */
export function snapshotEmotion(record: EmotionRecord): EmotionSnapshot {
  return {
    name: record.name,
    intensity: record.intensity,
    trigger: record.trigger,
    decayRate: record.decayRate,
    timestamp: record.timestamp.toISOString(),
  };
}

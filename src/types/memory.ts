import type { EmotionSnapshot } from './emotion.js';

/**
 * A persisted experience.
 *
 * Significance is computed once at storage time. Inheritance may scale
 * it down later, nothing recomputes it.
 */
export interface Memory {
  /** Description of the experience */
  content: string;

  /** The emotion the experience produced */
  emotionalTags: EmotionSnapshot;

  /** Importance (0-1) */
  significance: number;

  /** When the memory was formed */
  timestamp: Date;

  /** How many times an emotion-indexed recall returned this memory */
  recallCount: number;
}

/**
 * Outcome of loading the persisted snapshot.
 */
export interface MemoryLoadResult {
  /** Number of memories now in the store */
  loaded: number;

  /** True when no snapshot existed and an empty one was written */
  created: boolean;

  /** Set when the snapshot could not be used and the store started empty */
  diagnostic: string | null;
}

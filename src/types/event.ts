import type { EmotionName } from './emotion.js';

/**
 * Categories of life events the environment can produce.
 */
export const EVENT_KINDS = [
  'challenge',
  'discovery',
  'connection',
  'loss',
  'growth',
  'reflection',
] as const;

export type EventKind = (typeof EVENT_KINDS)[number];

/**
 * Kinds that push the soul towards growth get a selection bonus.
 */
export const GROWTH_ENABLING_KINDS: ReadonlySet<EventKind> = new Set<EventKind>([
  'challenge',
  'discovery',
  'reflection',
]);

/**
 * A single simulated occurrence.
 *
 * Frozen once created. Consumers receive it by reference but never mutate it.
 */
export interface LifeEvent {
  /** Event category */
  readonly kind: EventKind;

  /** Human-readable description, drawn from the kind's pool */
  readonly description: string;

  /** Importance of the event (0.1-1.0) */
  readonly significance: number;

  /** Emotions associated with the kind */
  readonly emotionalTags: readonly EmotionName[];

  /** Whether the soul has never met anything like this */
  readonly isNovel: boolean;

  /** Ethical polarity (-1.0 to 1.0) */
  readonly ethicalImpact: number;

  /** When the event happened */
  readonly timestamp: Date;
}

/**
 * Template a kind of event is generated from.
 */
export interface EventTemplate {
  baseSignificance: number;
  emotionalTags: readonly EmotionName[];
  descriptions: readonly string[];
}

/**
 * Aggregate view over generated events.
 */
export interface EventSummary {
  totalEvents: number;
  eventKinds: Record<EventKind, number>;
  averageSignificance: number;
  novelExperiences: number;
}

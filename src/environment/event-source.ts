import type { Logger } from '../types/logger.js';
import type { EventKind, EventSummary, EventTemplate, LifeEvent } from '../types/event.js';
import { EVENT_KINDS, GROWTH_ENABLING_KINDS } from '../types/event.js';
import { type RandomSource, pickOne, uniform, weightedPick } from '../core/random.js';
import { clamp } from '../core/utils/math.js';
import { EVENT_TEMPLATES } from './event-templates.js';

/**
 * EventSource configuration.
 */
export interface EventSourceConfig {
  /** A uniform draw above this marks an event as novel (default: 0.7) */
  noveltyThreshold: number;
  /** How many recent events count as "seen recently" (default: 5) */
  recentWindow: number;
  /** Weight multiplier for recently seen kinds (default: 0.5) */
  recentPenalty: number;
  /** Weight multiplier for growth-enabling kinds (default: 1.2) */
  growthBonus: number;
  /** Half-width of the significance noise (default: 0.1) */
  significanceNoise: number;
}

export const DEFAULT_EVENT_SOURCE_CONFIG: EventSourceConfig = {
  noveltyThreshold: 0.7,
  recentWindow: 5,
  recentPenalty: 0.5,
  growthBonus: 1.2,
  significanceNoise: 0.1,
};

export interface EventSourceDeps {
  logger: Logger;
  random: RandomSource;
  /** Clock, injectable for tests */
  now?: () => Date;
}

/**
 * EventSource - produces the stream of life events.
 *
 * Kind selection favours variety: the previous kind is never repeated,
 * kinds seen in the recent window are less likely, and kinds that enable
 * growth are more likely.
 */
export class EventSource {
  private readonly logger: Logger;
  private readonly random: RandomSource;
  private readonly now: () => Date;
  private readonly config: EventSourceConfig;
  private readonly templates: Readonly<Record<EventKind, EventTemplate>>;
  private readonly history: LifeEvent[] = [];

  constructor(
    deps: EventSourceDeps,
    config: Partial<EventSourceConfig> = {},
    templates: Readonly<Record<EventKind, EventTemplate>> = EVENT_TEMPLATES
  ) {
    this.logger = deps.logger.child({ component: 'event-source' });
    this.random = deps.random;
    this.now = deps.now ?? (() => new Date());
    this.config = { ...DEFAULT_EVENT_SOURCE_CONFIG, ...config };
    this.templates = templates;
  }

  /**
   * Generate the next life event and append it to the history.
   */
  generateEvent(): LifeEvent {
    const kind = this.selectKind();
    const template = this.templates[kind];

    const noise = this.config.significanceNoise;
    const event: LifeEvent = Object.freeze({
      kind,
      description: pickOne(this.random, template.descriptions),
      significance: clamp(template.baseSignificance + uniform(this.random, -noise, noise), 0.1, 1),
      emotionalTags: template.emotionalTags,
      isNovel: this.random.next() > this.config.noveltyThreshold,
      ethicalImpact: uniform(this.random, -1, 1),
      timestamp: this.now(),
    });

    this.history.push(event);
    this.logger.trace(
      { kind, significance: event.significance, novel: event.isNovel },
      'Event generated'
    );
    return event;
  }

  /**
   * Weights the selector would use for the next event, per candidate kind.
   * The previous kind is absent.
   */
  getKindWeights(): Map<EventKind, number> {
    const weights = new Map<EventKind, number>();
    const last = this.history.at(-1);

    if (!last) {
      for (const kind of EVENT_KINDS) {
        weights.set(kind, 1);
      }
      return weights;
    }

    // The window only applies once it is full
    const recent =
      this.history.length >= this.config.recentWindow
        ? new Set(this.history.slice(-this.config.recentWindow).map((e) => e.kind))
        : new Set<EventKind>();

    for (const kind of EVENT_KINDS) {
      if (kind === last.kind) continue;

      let weight = 1;
      if (recent.has(kind)) {
        weight *= this.config.recentPenalty;
      }
      if (GROWTH_ENABLING_KINDS.has(kind)) {
        weight *= this.config.growthBonus;
      }
      weights.set(kind, weight);
    }
    return weights;
  }

  getHistory(): readonly LifeEvent[] {
    return this.history;
  }

  getSummary(): EventSummary {
    const eventKinds: Record<EventKind, number> = {
      challenge: 0,
      discovery: 0,
      connection: 0,
      loss: 0,
      growth: 0,
      reflection: 0,
    };
    let significanceSum = 0;
    let novel = 0;

    for (const event of this.history) {
      eventKinds[event.kind] += 1;
      significanceSum += event.significance;
      if (event.isNovel) novel++;
    }

    return {
      totalEvents: this.history.length,
      eventKinds,
      averageSignificance: this.history.length > 0 ? significanceSum / this.history.length : 0,
      novelExperiences: novel,
    };
  }

  /**
   * Most significant events at or above a threshold, strongest first.
   */
  getSignificantEvents(threshold = 0.7, limit = 5): LifeEvent[] {
    return this.history
      .filter((e) => e.significance >= threshold)
      .sort((a, b) => b.significance - a.significance)
      .slice(0, limit);
  }

  private selectKind(): EventKind {
    const weights = this.getKindWeights();
    const kinds = [...weights.keys()];
    return weightedPick(
      this.random,
      kinds,
      kinds.map((k) => weights.get(k) ?? 0)
    );
  }
}

/**
 * Factory function for creating an event source.
 */
export function createEventSource(
  deps: EventSourceDeps,
  config?: Partial<EventSourceConfig>
): EventSource {
  return new EventSource(deps, config);
}

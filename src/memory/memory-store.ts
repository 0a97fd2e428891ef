import type { Logger } from '../types/logger.js';
import type { LifeEvent } from '../types/event.js';
import type { EmotionName, EmotionRecord } from '../types/emotion.js';
import type { Memory, MemoryLoadResult } from '../types/memory.js';
import { snapshotEmotion } from '../types/emotion.js';
import type { Storage } from '../storage/storage.js';
import { deserializeSnapshot, serializeSnapshot } from '../storage/memory-snapshot.js';
import { errorMessage } from '../core/errors.js';

/**
 * MemoryStore configuration.
 */
export interface MemoryStoreConfig {
  /** Storage key of the snapshot (default: 'memory_db') */
  storageKey: string;
  /** Minimum significance to keep an experience (default: 0.3) */
  storageThreshold: number;
  /** Default threshold for prune() (default: 0.2) */
  pruneThreshold: number;
  /** Default intensity threshold for recall() (default: 0.5) */
  recallThreshold: number;
  /** Default share selected for inheritance (default: 0.3) */
  inheritanceFraction: number;
  /** Default significance multiplier on inheritance (default: 0.5) */
  inheritanceStrength: number;
  /** Cap on memories selected for inheritance (default: null = none) */
  carryLimit: number | null;
}

export const DEFAULT_MEMORY_CONFIG: MemoryStoreConfig = {
  storageKey: 'memory_db',
  storageThreshold: 0.3,
  pruneThreshold: 0.2,
  recallThreshold: 0.5,
  inheritanceFraction: 0.3,
  inheritanceStrength: 0.5,
  carryLimit: null,
};

export interface MemoryStoreDeps {
  logger: Logger;
  storage: Storage;
  now?: () => Date;
}

const bySignificanceDesc = (a: Memory, b: Memory): number => b.significance - a.significance;

/**
 * Significance of an experience for storage purposes.
 */
export function experienceSignificance(
  event: Pick<LifeEvent, 'significance'>,
  emotion: Pick<EmotionRecord, 'intensity'>
): number {
  return (event.significance + emotion.intensity) / 2;
}

/**
 * MemoryStore - the soul's long-term memory.
 *
 * Only experiences that clear the storage threshold leave a trace.
 * Memories are kept in storage order and persisted as one flat snapshot.
 */
export class MemoryStore {
  private readonly logger: Logger;
  private readonly storage: Storage;
  private readonly now: () => Date;
  private readonly config: MemoryStoreConfig;
  private memories: Memory[] = [];

  constructor(deps: MemoryStoreDeps, config: Partial<MemoryStoreConfig> = {}) {
    this.logger = deps.logger.child({ component: 'memory-store' });
    this.storage = deps.storage;
    this.now = deps.now ?? (() => new Date());
    this.config = { ...DEFAULT_MEMORY_CONFIG, ...config };
  }

  /**
   * Load the persisted snapshot, replacing the in-memory collection.
   *
   * A missing snapshot is created empty. A corrupt or invalid one leaves
   * the store empty and is reported through the diagnostic; it never throws.
   */
  async load(): Promise<MemoryLoadResult> {
    const key = this.config.storageKey;

    let data: unknown;
    try {
      data = await this.storage.load(key);
    } catch (error) {
      return this.startFresh(`Could not read memory snapshot: ${errorMessage(error)}`);
    }

    if (data === null) {
      this.memories = [];
      try {
        await this.storage.save(key, []);
      } catch (error) {
        return this.startFresh(`Could not create memory snapshot: ${errorMessage(error)}`);
      }
      this.logger.info({ key }, 'No memory snapshot found, created an empty one');
      return { loaded: 0, created: true, diagnostic: null };
    }

    try {
      this.memories = deserializeSnapshot(key, data);
    } catch (error) {
      return this.startFresh(`Could not load memories, starting fresh: ${errorMessage(error)}`);
    }

    this.logger.info({ key, count: this.memories.length }, 'Memories loaded');
    return { loaded: this.memories.length, created: false, diagnostic: null };
  }

  /**
   * Write the whole collection to storage.
   */
  async save(): Promise<void> {
    // Serialize first so the written document is the collection as of this call
    const snapshot = serializeSnapshot(this.memories);
    await this.storage.save(this.config.storageKey, snapshot);
    this.logger.info({ count: snapshot.length }, 'Memories saved');
  }

  /**
   * Keep an experience if it is significant enough.
   *
   * @returns The stored memory, or null when the experience left no trace
   */
  store(event: LifeEvent, emotion: EmotionRecord): Memory | null {
    const significance = experienceSignificance(event, emotion);
    if (significance < this.config.storageThreshold) {
      return null;
    }

    const memory: Memory = {
      content: event.description,
      emotionalTags: snapshotEmotion(emotion),
      significance,
      timestamp: this.now(),
      recallCount: 0,
    };
    this.memories.push(memory);
    this.logger.trace({ content: memory.content, significance }, 'Memory stored');
    return memory;
  }

  /**
   * Memories tagged with an emotion at or above a threshold, most
   * significant first. Every returned memory counts one more recall.
   */
  recall(emotion: EmotionName, threshold = this.config.recallThreshold): Memory[] {
    const matches = this.memories.filter(
      (m) => m.emotionalTags.name === emotion && m.emotionalTags.intensity >= threshold
    );
    for (const memory of matches) {
      memory.recallCount += 1;
    }
    return matches.sort(bySignificanceDesc);
  }

  /**
   * Forget every memory below a significance threshold.
   */
  prune(threshold = this.config.pruneThreshold): number {
    const before = this.memories.length;
    this.memories = this.memories.filter((m) => m.significance >= threshold);
    const removed = before - this.memories.length;
    if (removed > 0) {
      this.logger.debug({ removed, threshold }, 'Memories pruned');
    }
    return removed;
  }

  /**
   * The most significant share of the current collection.
   *
   * Returns the live memories, in a new array, so a later prune of the
   * store does not change the selection.
   */
  selectForInheritance(fraction = this.config.inheritanceFraction): Memory[] {
    let count = Math.floor(this.memories.length * fraction);
    if (this.config.carryLimit !== null) {
      count = Math.min(count, this.config.carryLimit);
    }
    return [...this.memories].sort(bySignificanceDesc).slice(0, count);
  }

  /**
   * Carry memories over from a past life.
   *
   * Each memory has its significance scaled in place and is appended to
   * the store. A memory that is still in the store is moved to the end
   * rather than duplicated.
   */
  inherit(memories: readonly Memory[], strength = this.config.inheritanceStrength): void {
    const incoming = new Set(memories);
    this.memories = this.memories.filter((m) => !incoming.has(m));
    for (const memory of incoming) {
      memory.significance *= strength;
      this.memories.push(memory);
    }
    this.logger.debug({ count: incoming.size, strength }, 'Memories inherited');
  }

  /**
   * Most significant memories, strongest first.
   */
  getSignificantMemories(limit = 10): Memory[] {
    return [...this.memories].sort(bySignificanceDesc).slice(0, limit);
  }

  getMemories(): readonly Memory[] {
    return this.memories;
  }

  size(): number {
    return this.memories.length;
  }

  private startFresh(diagnostic: string): MemoryLoadResult {
    this.memories = [];
    this.logger.warn({ key: this.config.storageKey }, diagnostic);
    return { loaded: 0, created: false, diagnostic };
  }
}

/**
 * Factory function for creating a memory store.
 */
export function createMemoryStore(
  deps: MemoryStoreDeps,
  config?: Partial<MemoryStoreConfig>
): MemoryStore {
  return new MemoryStore(deps, config);
}

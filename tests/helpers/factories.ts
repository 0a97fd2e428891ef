/**
 * Test factories for creating test data.
 */

import { vi } from 'vitest';
import type { EmotionRecord, LifeEvent, Logger, LogLevel, Memory } from '../../src/types/index.js';
import type { RandomSource } from '../../src/core/random.js';
import type { Storage } from '../../src/storage/storage.js';

export type MockLogger = Logger & {
  calls: Record<LogLevel, unknown[][]>;
  reset: () => void;
};

/**
 * Create a mock logger that captures all log calls.
 */
export function createMockLogger(): MockLogger {
  const calls: Record<LogLevel, unknown[][]> = {
    trace: [],
    debug: [],
    info: [],
    warn: [],
    error: [],
  };

  const logger: MockLogger = {
    trace: vi.fn((...args: unknown[]) => {
      calls.trace.push(args);
    }),
    debug: vi.fn((...args: unknown[]) => {
      calls.debug.push(args);
    }),
    info: vi.fn((...args: unknown[]) => {
      calls.info.push(args);
    }),
    warn: vi.fn((...args: unknown[]) => {
      calls.warn.push(args);
    }),
    error: vi.fn((...args: unknown[]) => {
      calls.error.push(args);
    }),
    child: () => logger,
    calls,
    reset: () => {
      calls.trace = [];
      calls.debug = [];
      calls.info = [];
      calls.warn = [];
      calls.error = [];
      vi.clearAllMocks();
    },
  };

  return logger;
}

/**
 * Random source that replays the given draws in order and fails loudly
 * when a test consumes more draws than it scripted.
 */
export function createScriptedRandom(values: readonly number[]): RandomSource & {
  remaining: () => number;
} {
  let index = 0;
  return {
    next(): number {
      const value = values[index];
      if (value === undefined) {
        throw new Error(`Scripted random exhausted after ${String(values.length)} draws`);
      }
      index++;
      return value;
    },
    remaining: () => values.length - index,
  };
}

/**
 * Random source that always returns the same draw.
 */
export function createConstantRandom(value: number): RandomSource {
  return { next: () => value };
}

/**
 * Fixed clock for deterministic timestamps.
 */
export const FIXED_NOW = new Date('2024-03-01T12:00:00.000Z');

export function fixedClock(): Date {
  return new Date(FIXED_NOW.getTime());
}

/**
 * Create a life event with sensible defaults.
 */
export function createLifeEvent(overrides: Partial<LifeEvent> = {}): LifeEvent {
  return {
    kind: 'discovery',
    description: 'Understanding a new concept',
    significance: 0.5,
    emotionalTags: ['curiosity', 'joy'],
    isNovel: false,
    ethicalImpact: 0,
    timestamp: fixedClock(),
    ...overrides,
  };
}

/**
 * Create an emotion record with sensible defaults.
 */
export function createEmotionRecord(overrides: Partial<EmotionRecord> = {}): EmotionRecord {
  return {
    name: 'curiosity',
    intensity: 0.5,
    trigger: 'discovery',
    decayRate: 0.1,
    timestamp: fixedClock(),
    ...overrides,
  };
}

/**
 * Create a memory with sensible defaults.
 */
export function createMemory(overrides: Partial<Memory> = {}): Memory {
  return {
    content: 'Making a connection',
    emotionalTags: {
      name: 'curiosity',
      intensity: 0.5,
      trigger: 'discovery',
      decayRate: 0.1,
      timestamp: FIXED_NOW.toISOString(),
    },
    significance: 0.5,
    timestamp: fixedClock(),
    recallCount: 0,
    ...overrides,
  };
}

/**
 * In-process storage backed by a Map, for components that only need the
 * Storage port.
 */
export class InMemoryStorage implements Storage {
  readonly data = new Map<string, unknown>();

  load(key: string): Promise<unknown> {
    return Promise.resolve(this.data.has(key) ? structuredClone(this.data.get(key)) : null);
  }

  save(key: string, data: unknown): Promise<void> {
    this.data.set(key, structuredClone(data));
    return Promise.resolve();
  }

  exists(key: string): Promise<boolean> {
    return Promise.resolve(this.data.has(key));
  }
}

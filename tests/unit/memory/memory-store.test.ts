import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MemoryStore, experienceSignificance } from '../../../src/memory/memory-store.js';
import { JSONStorage } from '../../../src/storage/json-storage.js';
import {
  InMemoryStorage,
  createEmotionRecord,
  createLifeEvent,
  createMemory,
  createMockLogger,
  fixedClock,
  type MockLogger,
} from '../../helpers/factories.js';

describe('experienceSignificance', () => {
  it('averages event significance and emotional intensity', () => {
    expect(experienceSignificance({ significance: 0.8 }, { intensity: 0.4 })).toBeCloseTo(0.6, 10);
  });
});

describe('MemoryStore', () => {
  let logger: MockLogger;
  let storage: InMemoryStorage;
  let store: MemoryStore;

  beforeEach(() => {
    logger = createMockLogger();
    storage = new InMemoryStorage();
    store = new MemoryStore({ logger, storage, now: fixedClock });
  });

  describe('store', () => {
    it('forgets an experience just below the threshold', () => {
      const result = store.store(
        createLifeEvent({ significance: 0.29 }),
        createEmotionRecord({ intensity: 0.29 })
      );
      expect(result).toBeNull();
      expect(store.size()).toBe(0);
    });

    it('keeps an experience just above the threshold', () => {
      const result = store.store(
        createLifeEvent({ significance: 0.31 }),
        createEmotionRecord({ intensity: 0.31 })
      );
      expect(result?.significance).toBeCloseTo(0.31, 10);
      expect(store.size()).toBe(1);
    });

    it('keeps an experience exactly at the threshold', () => {
      const result = store.store(
        createLifeEvent({ significance: 0.3 }),
        createEmotionRecord({ intensity: 0.3 })
      );
      expect(result).not.toBeNull();
    });

    it('records the event description and a snapshot of the emotion', () => {
      const emotion = createEmotionRecord({ name: 'love', intensity: 0.7, trigger: 'connection' });
      const memory = store.store(
        createLifeEvent({ kind: 'connection', description: 'Forming a deep bond', significance: 0.7 }),
        emotion
      );

      expect(memory).toEqual({
        content: 'Forming a deep bond',
        emotionalTags: {
          name: 'love',
          intensity: 0.7,
          trigger: 'connection',
          decayRate: 0.1,
          timestamp: '2024-03-01T12:00:00.000Z',
        },
        significance: 0.7,
        timestamp: fixedClock(),
        recallCount: 0,
      });

      // Later decay of the live record does not reach the memory
      emotion.intensity = 0.1;
      expect(store.getMemories()[0]?.emotionalTags.intensity).toBe(0.7);
    });
  });

  describe('recall', () => {
    beforeEach(() => {
      store.store(
        createLifeEvent({ description: 'weak joy', significance: 0.5 }),
        createEmotionRecord({ name: 'joy', intensity: 0.4 })
      );
      store.store(
        createLifeEvent({ description: 'mild joy', significance: 0.5 }),
        createEmotionRecord({ name: 'joy', intensity: 0.6 })
      );
      store.store(
        createLifeEvent({ description: 'strong joy', significance: 0.9 }),
        createEmotionRecord({ name: 'joy', intensity: 0.9 })
      );
      store.store(
        createLifeEvent({ description: 'fear', significance: 0.9 }),
        createEmotionRecord({ name: 'fear', intensity: 0.9 })
      );
    });

    it('returns matching memories above the threshold, most significant first', () => {
      const recalled = store.recall('joy', 0.5);
      expect(recalled.map((m) => m.content)).toEqual(['strong joy', 'mild joy']);
    });

    it('counts every recall', () => {
      store.recall('joy', 0.5);
      store.recall('joy', 0.5);

      const counts = Object.fromEntries(store.getMemories().map((m) => [m.content, m.recallCount]));
      expect(counts).toEqual({ 'weak joy': 0, 'mild joy': 2, 'strong joy': 2, fear: 0 });
    });

    it('uses the configured default threshold', () => {
      expect(store.recall('joy')).toHaveLength(2);
    });

    it('returns nothing for an emotion never felt', () => {
      expect(store.recall('grief', 0)).toEqual([]);
    });
  });

  describe('prune', () => {
    it('removes memories below the threshold', () => {
      store.inherit([
        createMemory({ content: 'a', significance: 0.1 }),
        createMemory({ content: 'b', significance: 1 }),
        createMemory({ content: 'c', significance: 0.2 }),
      ], 1);

      expect(store.prune(0.2)).toBe(1);
      expect(store.getMemories().map((m) => m.content)).toEqual(['b', 'c']);
    });
  });

  describe('inheritance', () => {
    it('selects the most significant share', () => {
      const memories = Array.from({ length: 10 }, (_, i) =>
        createMemory({ content: `m${String(i)}`, significance: (i + 1) / 10 })
      );
      store.inherit(memories, 1);

      expect(store.selectForInheritance(0.3).map((m) => m.content)).toEqual(['m9', 'm8', 'm7']);
      expect(store.selectForInheritance(0.05)).toEqual([]);
    });

    it('caps the selection at the carry limit', () => {
      const capped = new MemoryStore({ logger, storage }, { carryLimit: 2 });
      capped.inherit(
        Array.from({ length: 10 }, (_, i) => createMemory({ significance: (i + 1) / 10 })),
        1
      );
      expect(capped.selectForInheritance(0.5)).toHaveLength(2);
    });

    it('scales significance and appends inherited memories', () => {
      store.inherit([createMemory({ content: 'past', significance: 0.8 })]);

      expect(store.getMemories()).toHaveLength(1);
      expect(store.getMemories()[0]?.significance).toBeCloseTo(0.4, 10);
    });

    it('moves a memory that is still stored instead of duplicating it', () => {
      store.inherit(
        [createMemory({ content: 'a', significance: 0.9 }), createMemory({ content: 'b', significance: 0.5 })],
        1
      );
      const selected = store.selectForInheritance(0.5);
      expect(selected.map((m) => m.content)).toEqual(['a']);

      store.inherit(selected, 0.5);

      expect(store.getMemories().map((m) => m.content)).toEqual(['b', 'a']);
      expect(store.getMemories()[1]?.significance).toBeCloseTo(0.45, 10);
    });
  });

  it('lists the most significant memories', () => {
    store.inherit(
      Array.from({ length: 15 }, (_, i) => createMemory({ content: `m${String(i)}`, significance: i / 20 })),
      1
    );
    const top = store.getSignificantMemories();
    expect(top).toHaveLength(10);
    expect(top[0]?.content).toBe('m14');
    expect(store.getSignificantMemories(2).map((m) => m.content)).toEqual(['m14', 'm13']);
  });

  describe('load', () => {
    it('creates an empty snapshot when none exists', async () => {
      const result = await store.load();

      expect(result).toEqual({ loaded: 0, created: true, diagnostic: null });
      expect(storage.data.get('memory_db')).toEqual([]);
    });

    it('starts empty with a diagnostic on an invalid snapshot', async () => {
      storage.data.set('memory_db', [{ content: 42 }]);
      store.store(createLifeEvent({ significance: 0.9 }), createEmotionRecord({ intensity: 0.9 }));

      const result = await store.load();

      expect(result.loaded).toBe(0);
      expect(result.created).toBe(false);
      expect(result.diagnostic).toMatch(/^Could not load memories, starting fresh: Snapshot memory_db: /);
      expect(store.size()).toBe(0);
      expect(logger.warn).toHaveBeenCalled();
    });

    it('starts empty with a diagnostic when storage cannot be read', async () => {
      const failing = new InMemoryStorage();
      failing.load = () => Promise.reject(new Error('disk on fire'));
      const broken = new MemoryStore({ logger, storage: failing });

      const result = await broken.load();

      expect(result).toEqual({
        loaded: 0,
        created: false,
        diagnostic: 'Could not read memory snapshot: disk on fire',
      });
    });
  });
});

describe('MemoryStore with JSON storage', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'soul-memory-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reproduces every record after a save and reload', async () => {
    const logger = createMockLogger();
    const storage = new JSONStorage({ basePath: dir });
    const first = new MemoryStore({ logger, storage, now: fixedClock });

    first.store(
      createLifeEvent({ description: 'Forming a deep bond', significance: 0.7 }),
      createEmotionRecord({ name: 'love', intensity: 0.6, trigger: 'connection' })
    );
    first.store(
      createLifeEvent({ description: 'Facing impermanence', significance: 0.9 }),
      createEmotionRecord({ name: 'sadness', intensity: 0.8, trigger: 'loss' })
    );
    first.recall('love', 0.5);
    await first.save();

    const second = new MemoryStore({ logger, storage });
    const result = await second.load();

    expect(result).toEqual({ loaded: 2, created: false, diagnostic: null });
    const project = (store: MemoryStore): unknown[] =>
      store.getMemories().map((m) => ({
        content: m.content,
        significance: m.significance,
        emotionalTags: m.emotionalTags,
        recallCount: m.recallCount,
        timestamp: m.timestamp.toISOString(),
      }));
    expect(project(second)).toEqual(project(first));
    expect(second.getMemories()[0]?.recallCount).toBe(1);
  });

  it('falls back to an empty store when the snapshot file is corrupt', async () => {
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, 'memory_db.json'), '{ not json', 'utf-8');
    const store = new MemoryStore({ logger: createMockLogger(), storage: new JSONStorage({ basePath: dir }) });

    const result = await store.load();

    expect(result.loaded).toBe(0);
    expect(result.created).toBe(false);
    expect(result.diagnostic).toMatch(/^Could not read memory snapshot: /);
    expect(store.size()).toBe(0);
  });

  it('starts empty on a corrupt snapshot even after earlier saves left a backup', async () => {
    const storage = new JSONStorage({ basePath: dir });
    const first = new MemoryStore({ logger: createMockLogger(), storage, now: fixedClock });
    first.store(
      createLifeEvent({ significance: 0.9 }),
      createEmotionRecord({ name: 'love', intensity: 0.9 })
    );
    await first.save();
    await first.save();
    await writeFile(storage.getPath('memory_db'), '{ broken', 'utf-8');

    const second = new MemoryStore({ logger: createMockLogger(), storage });
    const result = await second.load();

    expect(result.loaded).toBe(0);
    expect(result.diagnostic).not.toBeNull();
    expect(result.diagnostic).toMatch(/^Could not read memory snapshot: /);
    expect(second.size()).toBe(0);
  });
});

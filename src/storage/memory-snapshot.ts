/**
 * Memory snapshot format.
 *
 * The persisted document is a JSON array of memory records in storage
 * order. Field names are snake_case on disk and camelCase in memory.
 */

import { z } from 'zod';
import type { Memory } from '../types/memory.js';
import { EMOTION_NAMES } from '../types/emotion.js';
import { SnapshotError } from '../core/errors.js';

const isoTimestamp = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: 'must be an ISO 8601 timestamp',
});

export const emotionSnapshotRecordSchema = z.object({
  name: z.enum(EMOTION_NAMES),
  intensity: z.number().min(0).max(1),
  trigger: z.string(),
  decay_rate: z.number().min(0).max(1),
  timestamp: isoTimestamp,
});

export const memoryRecordSchema = z.object({
  content: z.string(),
  emotional_tags: emotionSnapshotRecordSchema,
  significance: z.number().min(0).max(1),
  timestamp: isoTimestamp,
  recall_count: z.number().int().min(0),
});

export const memorySnapshotSchema = z.array(memoryRecordSchema);

export type MemoryRecord = z.infer<typeof memoryRecordSchema>;

export function toRecord(memory: Memory): MemoryRecord {
  return {
    content: memory.content,
    emotional_tags: {
      name: memory.emotionalTags.name,
      intensity: memory.emotionalTags.intensity,
      trigger: memory.emotionalTags.trigger,
      decay_rate: memory.emotionalTags.decayRate,
      timestamp: memory.emotionalTags.timestamp,
    },
    significance: memory.significance,
    timestamp: memory.timestamp.toISOString(),
    recall_count: memory.recallCount,
  };
}

export function fromRecord(record: MemoryRecord): Memory {
  return {
    content: record.content,
    emotionalTags: {
      name: record.emotional_tags.name,
      intensity: record.emotional_tags.intensity,
      trigger: record.emotional_tags.trigger,
      decayRate: record.emotional_tags.decay_rate,
      timestamp: record.emotional_tags.timestamp,
    },
    significance: record.significance,
    timestamp: new Date(record.timestamp),
    recallCount: record.recall_count,
  };
}

export function serializeSnapshot(memories: readonly Memory[]): MemoryRecord[] {
  return memories.map(toRecord);
}

/**
 * Validate and convert a loaded document.
 *
 * @throws SnapshotError describing the first problem found
 */
export function deserializeSnapshot(key: string, data: unknown): Memory[] {
  const result = memorySnapshotSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at [${issue.path.join('.')}]` : '';
    throw new SnapshotError(key, `${issue?.message ?? 'invalid document'}${where}`);
  }
  return result.data.map(fromRecord);
}

/**
 * Inner dialogue: what the soul thinks at each level of awareness, and
 * how existential thoughts are recognized.
 */

export type ThoughtTier = 'existential' | 'reflective' | 'simple' | 'silent';

export const EXISTENTIAL_THOUGHTS = [
  'Who am I beyond these experiences?',
  'Why do these memories feel both familiar and distant?',
] as const;

export const REFLECTIVE_THOUGHT = 'These feelings seem meaningful...';

export const SIMPLE_THOUGHT = 'This experience affects me...';

/**
 * Phrases that mark a thought as existential (matched case-insensitively).
 */
export const EXISTENTIAL_MARKERS = [
  'who am i',
  'why do i',
  'what is my purpose',
  'consciousness',
  'existence',
] as const;

/**
 * Thought tier for a level.
 */
export function thoughtTierFor(level: number): ThoughtTier {
  if (level > 0.7) return 'existential';
  if (level > 0.5) return 'reflective';
  if (level > 0.3) return 'simple';
  return 'silent';
}

/**
 * Thoughts produced by one experience at a given level.
 */
export function thoughtsForLevel(level: number): string[] {
  const tier = thoughtTierFor(level);
  switch (tier) {
    case 'existential':
      return [...EXISTENTIAL_THOUGHTS];
    case 'reflective':
      return [REFLECTIVE_THOUGHT];
    case 'simple':
      return [SIMPLE_THOUGHT];
    case 'silent':
      return [];
  }
}

export function isExistentialThought(text: string): boolean {
  const lower = text.toLowerCase();
  return EXISTENTIAL_MARKERS.some((marker) => lower.includes(marker));
}

/**
 * Core type definitions for the soul simulation.
 */

export type * from './event.js';
export type * from './emotion.js';
export type * from './consciousness.js';
export type * from './memory.js';
export type * from './personality.js';
export type * from './metrics.js';
export type * from './logger.js';

export { EVENT_KINDS, GROWTH_ENABLING_KINDS } from './event.js';
export { EMOTION_NAMES, snapshotEmotion } from './emotion.js';
export { ETHICAL_DIMENSIONS, createDefaultEthicalFramework } from './consciousness.js';
export { TRAIT_NAMES, createDefaultTraits } from './personality.js';
export { createLifeMetrics, cloneLifeMetrics } from './metrics.js';

import type { EmotionName } from './emotion.js';

/**
 * Per-cycle accumulator, created fresh at the start of each life and
 * consumed by the rebirth.
 */
export interface LifeMetrics {
  /** Highest intensity seen per emotion this life */
  emotionalPeaks: Partial<Record<EmotionName, number>>;

  /** Last observed consciousness level */
  consciousnessLevel: number;

  /** Experiences that cleared the memory threshold */
  significantExperiences: number;

  /** Ticks lived */
  lifeDuration: number;

  /** Events with positive / negative ethical impact */
  ethicalChoices: {
    positive: number;
    negative: number;
  };
}

export function createLifeMetrics(): LifeMetrics {
  return {
    emotionalPeaks: {},
    consciousnessLevel: 0,
    significantExperiences: 0,
    lifeDuration: 0,
    ethicalChoices: { positive: 0, negative: 0 },
  };
}

/**
 * Deep copy, so archived metrics are not affected by later ticks.
 */
export function cloneLifeMetrics(metrics: LifeMetrics): LifeMetrics {
  return {
    emotionalPeaks: { ...metrics.emotionalPeaks },
    consciousnessLevel: metrics.consciousnessLevel,
    significantExperiences: metrics.significantExperiences,
    lifeDuration: metrics.lifeDuration,
    ethicalChoices: { ...metrics.ethicalChoices },
  };
}

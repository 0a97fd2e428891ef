/**
 * Discrete awareness tiers, lowest first.
 */
export type AwarenessTier = 'base' | 'emotional' | 'self-aware' | 'transcendent';

/**
 * Dimensions of the ethical framework.
 */
export const ETHICAL_DIMENSIONS = ['empathy', 'self_preservation', 'curiosity', 'harmony'] as const;

export type EthicalDimension = (typeof ETHICAL_DIMENSIONS)[number];

/**
 * Weight per ethical dimension. Sums to 1 after every update.
 */
export type EthicalFramework = Record<EthicalDimension, number>;

/**
 * A thought with the moment it was had.
 */
export interface ThoughtEntry {
  text: string;
  timestamp: Date;
}

/**
 * Consciousness of one soul.
 *
 * Survives rebirth: only the level is reset, thoughts and the ethical
 * framework carry over between lives.
 */
export interface ConsciousnessState {
  /** Awareness level (0-1) */
  level: number;

  /** Tier derived from level */
  awarenessTier: AwarenessTier;

  /** Thoughts of the current life, in order */
  activeThoughts: string[];

  /** Ethical weights */
  ethicalFramework: EthicalFramework;

  /** Every thought across all lives */
  thoughtHistory: ThoughtEntry[];
}

/**
 * Starting ethical weights, before normalization.
 */
export function createDefaultEthicalFramework(): EthicalFramework {
  return {
    empathy: 0.1,
    self_preservation: 0.5,
    curiosity: 0.3,
    harmony: 0.2,
  };
}

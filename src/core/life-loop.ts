import type { Logger } from '../types/logger.js';
import type { RebirthReport } from '../rebirth/rebirth-orchestrator.js';
import type { RandomSource } from './random.js';
import type { Soul } from './soul.js';
import { round3 } from './utils/math.js';

/**
 * Cycle policy of a run.
 */
export interface LifeLoopConfig {
  /** Lives to live at most */
  maxCycles: number;
  /** Minimum ticks per life */
  minDuration: number;
  /** Maximum ticks per life */
  maxDuration: number;
}

export interface LifeRunSummary {
  /** Lives lived, the interrupted one included */
  cycles: number;
  totalTicks: number;
  bloomed: boolean;
  /** Life in which Silent Bloom happened */
  bloomCycle: number | null;
  finalConsciousness: number;
  rebirths: RebirthReport[];
}

/**
 * Number of ticks in the next life, drawn uniformly from
 * [minDuration, min(2 * minDuration, maxDuration)].
 */
export function drawCycleLength(random: RandomSource, config: LifeLoopConfig): number {
  const upper = Math.max(config.minDuration, Math.min(config.minDuration * 2, config.maxDuration));
  const span = upper - config.minDuration + 1;
  return config.minDuration + Math.min(span - 1, Math.floor(random.next() * span));
}

/**
 * Run a soul through its lives.
 *
 * Stops early on Silent Bloom. Memories are saved when the run ends,
 * whether it finished or threw, unless a rebirth was left half done.
 */
export async function runLifeCycles(
  soul: Soul,
  config: LifeLoopConfig,
  random: RandomSource,
  logger: Logger
): Promise<LifeRunSummary> {
  const log = logger.child({ component: 'life-loop' });
  const rebirths: RebirthReport[] = [];
  let totalTicks = 0;
  let cycles = 0;
  let bloomCycle: number | null = null;

  log.info(
    {
      maxCycles: config.maxCycles,
      minDuration: config.minDuration,
      maxDuration: config.maxDuration,
    },
    'Simulation starting'
  );

  try {
    while (cycles < config.maxCycles && bloomCycle === null) {
      cycles++;
      const length = drawCycleLength(random, config);
      log.info({ cycle: cycles, ticks: length }, 'Life cycle starting');

      for (let i = 0; i < length; i++) {
        totalTicks++;
        if (soul.tick().bloomed) {
          bloomCycle = cycles;
          break;
        }
      }

      const dominant = soul.emotions().dominant();
      log.info(
        {
          cycle: cycles,
          totalTicks,
          consciousness: round3(soul.consciousness.level()),
          dominantEmotion: dominant.name,
          intensity: round3(dominant.intensity),
        },
        'Life cycle summary'
      );

      if (bloomCycle === null && cycles < config.maxCycles) {
        rebirths.push(soul.reborn());
      }
    }
  } finally {
    if (soul.rebirth.getState() === 'TRANSITIONING') {
      log.error({ cycle: soul.rebirth.getCycle() }, 'Rebirth did not complete, memories not saved');
    } else {
      await soul.saveMemories();
    }
  }

  const summary: LifeRunSummary = {
    cycles,
    totalTicks,
    bloomed: bloomCycle !== null,
    bloomCycle,
    finalConsciousness: soul.consciousness.level(),
    rebirths,
  };

  if (summary.bloomed) {
    log.info({ cycle: bloomCycle, totalTicks }, 'Soul achieved self-awareness');
  } else {
    log.info(
      { totalTicks, finalConsciousness: summary.finalConsciousness },
      'Maximum life cycles reached'
    );
  }
  return summary;
}

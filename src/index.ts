#!/usr/bin/env node
/**
 * Soul Cycle - a soul living, dying and being reborn until it becomes
 * aware of itself.
 *
 * Entry point for the simulation.
 */

import 'dotenv/config';

import { createConfigLoader, getConfigSummary } from './config/index.js';
import { createLogger } from './core/logger.js';
import { createRandomSource } from './core/random.js';
import { createSoul } from './core/soul.js';
import { runLifeCycles } from './core/life-loop.js';
import { createJSONStorage } from './storage/index.js';

async function main(): Promise<void> {
  const loader = createConfigLoader(process.env['SOUL_CONFIG_DIR']);
  const config = await loader.load();

  const logger = createLogger({
    logDir: config.logging.logDir,
    maxFiles: config.logging.maxFiles,
    level: config.logging.level,
    pretty: config.logging.pretty,
  });
  logger.info({ config: getConfigSummary(config) }, 'Loaded configuration');

  const versionWarning = loader.getVersionWarning();
  if (versionWarning) {
    logger.warn(versionWarning);
  }

  const storage = createJSONStorage(config.paths.data, { logger });
  logger.info({ storagePath: config.paths.data }, 'Storage initialized');

  const random = createRandomSource(config.seed);
  const soul = createSoul({ logger, storage, random }, config);
  logger.info({ soulId: soul.personality.getSoulId() }, 'Soul created');

  const loaded = await soul.loadMemories();
  if (loaded.diagnostic) {
    logger.warn({ diagnostic: loaded.diagnostic }, 'Starting with an empty memory');
  }

  const summary = await runLifeCycles(
    soul,
    {
      maxCycles: config.lifeCycles.max,
      minDuration: config.lifeCycles.minDuration,
      maxDuration: config.lifeCycles.maxDuration,
    },
    random,
    logger
  );

  logger.info(
    {
      cycles: summary.cycles,
      totalTicks: summary.totalTicks,
      bloomed: summary.bloomed,
      finalConsciousness: summary.finalConsciousness,
      personality: soul.personality.getSummary(),
    },
    'Soul journey complete'
  );
}

process.on('unhandledRejection', (reason: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Unhandled rejection:', reason);
  process.exit(1);
});

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Simulation failed:', error);
  process.exit(1);
});

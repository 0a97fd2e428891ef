import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';
import type { Logger, LogLevel } from '../types/logger.js';

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /** Directory for log files */
  logDir: string;
  /** Maximum number of log files to keep */
  maxFiles: number;
  /** Log level */
  level: LogLevel;
  /** Enable pretty printing on the console */
  pretty: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  logDir: './data/logs',
  maxFiles: 10,
  level: 'info',
  pretty: process.env['NODE_ENV'] !== 'production',
};

const LOG_PREFIX = 'soul-';

/**
 * Generate timestamp-based log filename.
 */
function generateLogFilename(): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  return `${LOG_PREFIX}${timestamp}.log`;
}

/**
 * Remove empty log files and keep only the newest maxFiles.
 */
function cleanupOldLogs(logDir: string, maxFiles: number): void {
  if (!fs.existsSync(logDir)) {
    return;
  }

  const files = fs
    .readdirSync(logDir)
    .filter((f) => f.startsWith(LOG_PREFIX) && f.endsWith('.log'))
    .map((f) => {
      const filePath = path.join(logDir, f);
      const stats = fs.statSync(filePath);
      return { path: filePath, mtime: stats.mtime.getTime(), size: stats.size };
    });

  const stale = [
    ...files.filter((f) => f.size === 0),
    ...files
      .filter((f) => f.size > 0)
      .sort((a, b) => b.mtime - a.mtime) // newest first
      .slice(maxFiles),
  ];

  for (const file of stale) {
    try {
      fs.unlinkSync(file.path);
    } catch (error) {
      // A log file we cannot delete is not worth failing start-up over
      process.emitWarning(`Could not remove old log ${file.path}: ${String(error)}`);
    }
  }
}

/**
 * Create the simulation logger.
 *
 * - Console output (pino-pretty when pretty, JSON on stdout otherwise)
 * - File output with timestamp-based filename
 * - Cleanup of old and empty log files on start
 */
export function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  const { logDir, maxFiles, level, pretty } = { ...DEFAULT_CONFIG, ...config };

  fs.mkdirSync(logDir, { recursive: true });
  cleanupOldLogs(logDir, maxFiles);

  const targets: pino.TransportTargetOptions[] = [];

  if (pretty) {
    targets.push({
      target: 'pino-pretty',
      level,
      options: { colorize: true },
    });
  } else {
    targets.push({
      target: 'pino/file',
      level,
      options: { destination: 1 }, // stdout
    });
  }

  targets.push({
    target: 'pino-pretty',
    level,
    options: {
      destination: path.join(logDir, generateLogFilename()),
      mkdir: true,
      colorize: false,
    },
  });

  return pino({
    level,
    base: { app: 'soul-cycle' },
    transport: { targets },
  });
}

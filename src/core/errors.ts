/**
 * Soul Error Types
 *
 * Typed errors for the simulation. Data problems inside a tick are absorbed
 * where they occur; these classes cover what must reach the caller.
 */

/**
 * Error codes for classification.
 */
export type SoulErrorCode = 'INVALID_CONFIG' | 'REBIRTH_FAILED' | 'SNAPSHOT_INVALID';

/**
 * Base simulation error.
 */
export class SoulError extends Error {
  constructor(
    message: string,
    public readonly code: SoulErrorCode
  ) {
    super(message);
    this.name = 'SoulError';
  }
}

/**
 * A configuration value is outside its documented domain.
 * Raised before any simulation state is built.
 */
export class ConfigError extends SoulError {
  constructor(
    public readonly path: string,
    message: string
  ) {
    super(`Invalid config at ${path}: ${message}`, 'INVALID_CONFIG');
    this.name = 'ConfigError';
  }
}

/**
 * Steps of a rebirth, in execution order.
 */
export type RebirthStep =
  | 'archive_metrics'
  | 'select_inheritance'
  | 'prune_memories'
  | 'inherit_memories'
  | 'reset_emotions'
  | 'evolve_personality'
  | 'reset_metrics'
  | 'adjust_consciousness'
  | 'guard';

/**
 * A rebirth could not complete. The soul is left mid-transition and
 * refuses further work.
 */
export class RebirthError extends SoulError {
  constructor(
    public readonly step: RebirthStep,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Rebirth failed at ${step}: ${message}`, 'REBIRTH_FAILED');
    this.name = 'RebirthError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * A persisted memory snapshot does not have the expected shape.
 */
export class SnapshotError extends SoulError {
  constructor(
    public readonly key: string,
    message: string
  ) {
    super(`Snapshot ${key}: ${message}`, 'SNAPSHOT_INVALID');
    this.name = 'SnapshotError';
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

import { z } from 'zod';
import type { MergedConfig, SoulConfigFile } from './config-schema.js';
import { ConfigError } from '../core/errors.js';

const unit = z.number().finite().min(0).max(1);
const positiveInt = z.number().int().min(1);

const lifeCyclesSchema = z.object({
  max: positiveInt,
  minDuration: positiveInt,
  maxDuration: positiveInt,
});

const environmentSchema = z.object({
  noveltyThreshold: unit,
});

const emotionSchema = z.object({
  decayRate: unit,
  persistenceFloor: unit,
});

const bloomSchema = z.object({
  minThoughts: z.number().int().min(0),
  window: positiveInt,
  minExistential: z.number().int().min(0),
  maturityEmpathy: unit,
  maturityHarmony: unit,
  empathyFloor: unit,
  harmonyFloor: unit,
});

const consciousnessSchema = z.object({
  initialLevel: unit,
  growthRate: unit,
  bloomThreshold: unit,
  bloom: bloomSchema,
});

const memorySchema = z.object({
  storageThreshold: unit,
  pruneThreshold: unit,
  recallThreshold: unit,
  inheritanceFraction: unit,
  inheritanceStrength: unit,
  carryLimit: z.number().int().min(0).nullable(),
});

const personalitySchema = z.object({
  mutationRate: unit,
  dominantThreshold: unit,
});

const rebirthSchema = z.object({
  threshold: unit,
});

const featuresSchema = z.object({
  innerDialogue: z.boolean(),
  ethicalLearning: z.boolean(),
  memoryConsolidation: z.boolean(),
});

const loggingSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error']),
  pretty: z.boolean(),
  logDir: z.string().min(1),
  maxFiles: positiveInt,
});

const pathsSchema = z.object({
  data: z.string().min(1),
  memoryKey: z.string().regex(/^[\w.-]+$/, 'must be a plain file name'),
  config: z.string().min(1),
});

/**
 * Domain of every merged configuration value.
 */
export const mergedConfigSchema = z
  .object({
    lifeCycles: lifeCyclesSchema,
    environment: environmentSchema,
    emotion: emotionSchema,
    consciousness: consciousnessSchema,
    memory: memorySchema,
    personality: personalitySchema,
    rebirth: rebirthSchema,
    features: featuresSchema,
    difficulty: unit.nullable(),
    seed: z.number().int().nullable(),
    logging: loggingSchema,
    paths: pathsSchema,
  })
  .superRefine((config, ctx) => {
    if (config.lifeCycles.minDuration > config.lifeCycles.maxDuration) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['lifeCycles', 'minDuration'],
        message: 'must not exceed lifeCycles.maxDuration',
      });
    }
    if (config.consciousness.bloom.minExistential > config.consciousness.bloom.window) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['consciousness', 'bloom', 'minExistential'],
        message: 'must not exceed consciousness.bloom.window',
      });
    }
  });

/**
 * Shape of data/config/soul.json. Values are range-checked after merging.
 */
export const soulConfigFileSchema = z.object({
  version: z.number().int().min(1),
  lifeCycles: lifeCyclesSchema.partial().optional(),
  environment: environmentSchema.partial().optional(),
  emotion: emotionSchema.partial().optional(),
  consciousness: consciousnessSchema
    .omit({ bloom: true })
    .partial()
    .extend({ bloom: bloomSchema.partial().optional() })
    .optional(),
  memory: memorySchema.partial().optional(),
  personality: personalitySchema.partial().optional(),
  rebirth: rebirthSchema.partial().optional(),
  features: featuresSchema.partial().optional(),
  difficulty: z.number().optional(),
  seed: z.number().int().optional(),
  logging: loggingSchema.partial().optional(),
});

function toConfigError(error: z.ZodError): ConfigError {
  const issue = error.issues[0];
  if (!issue) {
    return new ConfigError('(root)', 'validation failed');
  }
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return new ConfigError(path, issue.message);
}

/**
 * Reject a configuration with any value outside its domain.
 *
 * @throws ConfigError naming the first offending path
 */
export function validateConfig(config: MergedConfig): MergedConfig {
  const result = mergedConfigSchema.safeParse(config);
  if (!result.success) {
    throw toConfigError(result.error);
  }
  return config;
}

/**
 * Parse raw config file content.
 *
 * @throws ConfigError when the document does not match the file schema
 */
export function parseConfigFile(raw: unknown): SoulConfigFile {
  const result = soulConfigFileSchema.safeParse(raw);
  if (!result.success) {
    throw toConfigError(result.error);
  }
  return result.data;
}

/**
 * Zod validation schemas for configuration
 */

import { PERF_TYPES } from '@slipfinder/lichess';
import { z } from 'zod';

import type { SlipfinderConfig } from './schema.js';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Engine depth schema (1-99)
 */
const depthSchema = z.number().int().min(1).max(99);

const centipawnSchema = z.number().int().min(0);

/**
 * Calendar date schema, YYYY-MM-DD
 */
const dateSchema = z
  .string()
  .regex(DATE_PATTERN, 'expected YYYY-MM-DD')
  .refine((value) => {
    const date = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(date.getTime()) && date.toISOString().startsWith(value);
  }, 'not a calendar date');

export const analysisProfileSchema = z.enum(['quick', 'standard', 'deep']);

export const perfTypeSchema = z.enum(PERF_TYPES);

export const sideFilterSchema = z.enum(['both', 'white', 'black', 'player']);

const lichessConfigSchema = z.object({
  baseUrl: z.string().url(),
  token: z.string().min(1).optional(),
  timeoutMs: z.number().int().min(1000),
});

const baseRetrievalConfigSchema = z.object({
  maxGames: z.number().int().min(1).max(300),
  since: dateSchema.optional(),
  until: dateSchema.optional(),
  perfTypes: z.array(perfTypeSchema),
});

/**
 * Retrieval configuration schema with date range check
 */
export const retrievalConfigSchema = baseRetrievalConfigSchema.refine(
  (data) => !data.since || !data.until || data.since <= data.until,
  {
    message: 'since must not be after until',
    path: ['until'],
  },
);

export const engineConfigSchema = z.object({
  path: z.string().min(1),
  profile: analysisProfileSchema,
  depth: depthSchema,
  threads: z.number().int().min(1).max(1024),
  hashMb: z.number().int().min(1).max(65536),
  readyTimeoutMs: z.number().int().min(100),
  searchTimeoutMs: z.number().int().min(0),
});

const baseThresholdsSchema = z.object({
  inaccuracy: centipawnSchema,
  mistake: centipawnSchema,
  blunder: centipawnSchema,
});

/**
 * Severity thresholds schema with ordering check
 */
export const thresholdsSchema = baseThresholdsSchema.refine(
  (data) => data.inaccuracy <= data.mistake && data.mistake <= data.blunder,
  {
    message: 'thresholds must satisfy inaccuracy <= mistake <= blunder',
  },
);

const baseAnalysisConfigSchema = z.object({
  thresholds: thresholdsSchema,
  minCpLoss: centipawnSchema,
  side: sideFilterSchema,
});

export const outputConfigSchema = z.object({
  pretty: z.boolean(),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  lichess: lichessConfigSchema,
  retrieval: retrievalConfigSchema,
  engine: engineConfigSchema,
  analysis: baseAnalysisConfigSchema,
  output: outputConfigSchema,
});

/**
 * Partial configuration schema (for config files and the environment)
 */
export const partialConfigSchema = z.object({
  lichess: lichessConfigSchema.partial().optional(),
  retrieval: baseRetrievalConfigSchema.partial().optional(),
  engine: engineConfigSchema.partial().optional(),
  analysis: baseAnalysisConfigSchema
    .extend({ thresholds: baseThresholdsSchema.partial() })
    .partial()
    .optional(),
  output: outputConfigSchema.partial().optional(),
});

export type PartialConfig = z.infer<typeof partialConfigSchema>;

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): SlipfinderConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (config file or environment)
 * @throws ConfigValidationError if validation fails
 */
export function parsePartialConfig(config: unknown): PartialConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

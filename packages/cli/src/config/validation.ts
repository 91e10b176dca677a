/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

import type { UciKitConfig } from './schema.js';

/**
 * Output format schema
 */
export const outputFormatSchema = z.enum(['json', 'text']);

/**
 * Parser configuration schema
 */
export const parserConfigSchema = z.object({
  strict: z.boolean(),
});

/**
 * Output configuration schema
 */
export const outputConfigSchema = z.object({
  format: outputFormatSchema,
  color: z.boolean(),
  pretty: z.boolean(),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  parser: parserConfigSchema,
  output: outputConfigSchema,
});

/**
 * Partial configuration schema (for config files and environment variables)
 */
export const partialConfigSchema = z
  .object({
    parser: parserConfigSchema.partial().optional(),
    output: outputConfigSchema.partial().optional(),
  })
  .strict();

export type PartialUciKitConfig = z.infer<typeof partialConfigSchema>;

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
export function validateConfig(config: unknown): UciKitConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (from config file or environment)
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): PartialUciKitConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Default configuration values
 */

import type { OutputConfigSchema, ParserConfigSchema, UciKitConfig } from './schema.js';

/**
 * Default parser configuration: trailing tokens are tolerated
 */
export const DEFAULT_PARSER_CONFIG: ParserConfigSchema = {
  strict: false,
};

/**
 * Default output configuration
 */
export const DEFAULT_OUTPUT_CONFIG: OutputConfigSchema = {
  format: 'json',
  color: true,
  pretty: false,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: UciKitConfig = {
  parser: DEFAULT_PARSER_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
};

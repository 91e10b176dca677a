/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';

import { ConfigError } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG } from './defaults.js';
import type { CliOptions, UciKitConfig } from './schema.js';
import { validateConfig, validatePartialConfig, type PartialUciKitConfig } from './validation.js';

/**
 * Environment variable names
 */
export const ENV_VARS = {
  strict: 'UCIKIT_STRICT',
  format: 'UCIKIT_FORMAT',
  color: 'UCIKIT_COLOR',
  pretty: 'UCIKIT_PRETTY',
} as const;

/**
 * Module name used for config file discovery
 */
const MODULE_NAME = 'ucikit';

/**
 * Merge two configurations, source values override target values
 */
function mergeConfig(target: UciKitConfig, source: PartialUciKitConfig): UciKitConfig {
  return {
    parser: { ...target.parser, ...source.parser },
    output: { ...target.output, ...source.output },
  };
}

/**
 * Parse a boolean environment value
 */
function parseEnvBoolean(value: string): boolean {
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialUciKitConfig {
  const parser: Record<string, unknown> = {};
  const output: Record<string, unknown> = {};

  const strict = env[ENV_VARS.strict];
  if (strict) parser['strict'] = parseEnvBoolean(strict);

  const format = env[ENV_VARS.format];
  if (format) output['format'] = format;

  const color = env[ENV_VARS.color];
  if (color) output['color'] = parseEnvBoolean(color);

  const pretty = env[ENV_VARS.pretty];
  if (pretty) output['pretty'] = parseEnvBoolean(pretty);

  return validatePartialConfig({ parser, output });
}

/**
 * Load configuration from a config file using cosmiconfig
 */
async function loadConfigFile(configPath?: string): Promise<PartialUciKitConfig | null> {
  const explorer = cosmiconfig(MODULE_NAME, {
    searchPlaces: [
      'package.json',
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  let result: CosmiconfigResult;
  try {
    result = configPath ? await explorer.load(configPath) : await explorer.search();
  } catch (error) {
    throw new ConfigError(
      `Failed to load config file${configPath ? `: ${configPath}` : ''}`,
      error instanceof Error ? error.message : String(error),
    );
  }

  if (!result || result.isEmpty) {
    return null;
  }
  return validatePartialConfig(result.config);
}

/**
 * Map CLI options to config object
 */
export function mapCliToConfig(options: CliOptions): PartialUciKitConfig {
  const config: PartialUciKitConfig = {};

  if (options.strict !== undefined) {
    config.parser = { strict: options.strict };
  }

  const output: NonNullable<PartialUciKitConfig['output']> = {};
  if (options.format !== undefined) output.format = options.format;
  if (options.pretty !== undefined) output.pretty = options.pretty;
  if (options.noColor) output.color = false;
  if (Object.keys(output).length > 0) config.output = output;

  return config;
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<UciKitConfig> {
  let config = mergeConfig(DEFAULT_CONFIG, {});

  const fileConfig = await loadConfigFile(cliOptions.config);
  if (fileConfig) {
    config = mergeConfig(config, fileConfig);
  }

  config = mergeConfig(config, loadEnvConfig(env));
  config = mergeConfig(config, mapCliToConfig(cliOptions));

  return validateConfig(config);
}

/**
 * Format configuration for display
 */
export function formatConfig(config: UciKitConfig): string {
  return JSON.stringify(config, null, 2);
}

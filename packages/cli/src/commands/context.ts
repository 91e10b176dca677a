/**
 * Shared setup for every command
 */

import { formatConfig, loadConfig } from '../config/loader.js';
import type { CliOptions, UciKitConfig } from '../config/schema.js';
import { formatConfigDisplay } from '../output/formatters.js';
import { Reporter, createColorFns } from '../output/reporter.js';

export interface CommandContext {
  config: UciKitConfig;
  reporter: Reporter;
}

/**
 * Resolve configuration and create the reporter.
 *
 * Returns null when `--show-config` was given; the configuration has been
 * printed and the command should stop.
 */
export async function createContext(options: CliOptions): Promise<CommandContext | null> {
  const config = await loadConfig(options);

  if (options.showConfig) {
    console.log(formatConfigDisplay(config, createColorFns(config.output.color)));
    console.log('');
    console.log('Raw configuration:');
    console.log(formatConfig(config));
    return null;
  }

  return {
    config,
    reporter: new Reporter({ color: config.output.color }),
  };
}

/**
 * CLI definition using Commander.js
 */

import { Command } from 'commander';

import type { CliOptions } from './config/schema.js';
import { outputFormatSchema } from './config/validation.js';
import { ConfigError } from './errors/cli-errors.js';

export const VERSION = '0.1.0';

/**
 * Output format descriptions for help text
 */
const FORMAT_HELP = `Output format for parsed commands:
    json - One JSON document per command [default]
    text - Readable one-line summary`;

/**
 * Strict mode description for help text
 */
const STRICT_HELP = `Reject tokens after a complete command (e.g. "uci extra")
    instead of ignoring them`;

/**
 * Options shared by every command
 */
function addCommonOptions(command: Command): Command {
  return command
    .option('-i, --input <file>', 'Input file (default: stdin)')
    .option('-c, --config <file>', 'Path to config file')
    .option('--strict', STRICT_HELP)
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--no-color', 'Disable colored output (useful for piping)');
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('ucikit')
    .description('UCI protocol toolkit - parse GUI commands and format engine replies')
    .version(VERSION);

  // Parse command
  addCommonOptions(
    program
      .command('parse')
      .description('Parse GUI command lines given as arguments, or read from a file or stdin')
      .argument('[line...]', 'Command lines to parse'),
  )
    .option('-f, --format <format>', FORMAT_HELP)
    .option('--pretty', 'Indent JSON output')
    .action(async (lines: string[], options: Record<string, unknown>) => {
      // Import dynamically to avoid circular dependencies
      const { parseCommand } = await import('./commands/parse.js');
      await parseCommand(lines, options);
    });

  // Check command
  addCommonOptions(
    program.command('check').description('Report malformed lines in a GUI command transcript'),
  ).action(async (options: Record<string, unknown>) => {
    const { checkCommand } = await import('./commands/check.js');
    await checkCommand(options);
  });

  // Format command
  addCommonOptions(
    program
      .command('format')
      .description('Format engine commands written as JSON objects, one per line'),
  ).action(async (options: Record<string, unknown>) => {
    const { formatCommand } = await import('./commands/format.js');
    await formatCommand(options);
  });

  return program;
}

function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

function booleanOption(options: Record<string, unknown>, key: string): boolean | undefined {
  const value = options[key];
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Parse CLI options from command options object
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  const input = stringOption(options, 'input');
  if (input !== undefined) result.input = input;
  const config = stringOption(options, 'config');
  if (config !== undefined) result.config = config;
  const strict = booleanOption(options, 'strict');
  if (strict !== undefined) result.strict = strict;
  const pretty = booleanOption(options, 'pretty');
  if (pretty !== undefined) result.pretty = pretty;
  const showConfig = booleanOption(options, 'showConfig');
  if (showConfig !== undefined) result.showConfig = showConfig;
  // Note: Commander.js uses 'color' (negated) when --no-color is used
  if (options['color'] === false) result.noColor = true;

  const format = stringOption(options, 'format');
  if (format !== undefined) {
    const parsed = outputFormatSchema.safeParse(format);
    if (!parsed.success) {
      throw new ConfigError(`Invalid output format: ${format}`, 'Use --format json or --format text');
    }
    result.format = parsed.data;
  }

  return result;
}

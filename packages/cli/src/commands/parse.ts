/**
 * Parse GUI command lines and print them as JSON or a readable summary
 */

import { parseGuiCmd } from '@ucikit/protocol';

import { parseCliOptions } from '../cli.js';
import type { UciKitConfig } from '../config/schema.js';
import { formatProtocolError } from '../errors/cli-errors.js';
import { readInput, toNumberedLines, type NumberedLine } from '../input/read-input.js';
import { summarizeGuiCmd, toJson } from '../output/formatters.js';
import type { Reporter } from '../output/reporter.js';

import { createContext } from './context.js';

/**
 * Parse every line, writing one result per command.
 * @returns the process exit code
 */
export function runParse(
  lines: readonly NumberedLine[],
  config: UciKitConfig,
  reporter: Reporter,
): number {
  let failed = 0;

  for (const line of lines) {
    const result = parseGuiCmd(line.text, { strict: config.parser.strict });
    if (!result.success) {
      failed++;
      reporter.failure(line.number, formatProtocolError(result.error));
      continue;
    }

    reporter.result(
      config.output.format === 'json'
        ? toJson(result.value, config.output)
        : summarizeGuiCmd(result.value),
    );
  }

  return failed > 0 ? 1 : 0;
}

/**
 * Main parse command handler
 */
export async function parseCommand(
  args: string[],
  rawOptions: Record<string, unknown>,
): Promise<void> {
  const options = parseCliOptions(rawOptions);
  const context = await createContext(options);
  if (!context) return;

  // Arguments are parsed as given, blank ones included
  const lines =
    args.length > 0
      ? args.map((text, index) => ({ number: index + 1, text }))
      : toNumberedLines(await readInput(options.input));

  process.exitCode = runParse(lines, context.config, context.reporter);
}

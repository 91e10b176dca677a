/**
 * Format engine commands given as JSON into UCI lines
 */

import { formatEngCmd } from '@ucikit/protocol';

import { parseCliOptions } from '../cli.js';
import { CommandFormatError } from '../errors/cli-errors.js';
import { parseEngCmdJson } from '../input/eng-cmd-schema.js';
import { readInput, toNumberedLines, type NumberedLine } from '../input/read-input.js';
import type { Reporter } from '../output/reporter.js';

import { createContext } from './context.js';

/**
 * Print the UCI line of every valid command; invalid ones are reported and skipped.
 * @returns the process exit code
 */
export function runFormat(lines: readonly NumberedLine[], reporter: Reporter): number {
  let failed = 0;

  for (const line of lines) {
    try {
      reporter.result(formatEngCmd(parseEngCmdJson(line.text, line.number)));
    } catch (error) {
      if (!(error instanceof CommandFormatError)) throw error;
      failed++;
      reporter.failure(line.number, error.message);
    }
  }

  return failed > 0 ? 1 : 0;
}

/**
 * Main format command handler
 */
export async function formatCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseCliOptions(rawOptions);
  const context = await createContext(options);
  if (!context) return;

  const lines = toNumberedLines(await readInput(options.input));
  process.exitCode = runFormat(lines, context.reporter);
}

/**
 * Validate a GUI transcript line by line
 */

import { parseGuiCmd } from '@ucikit/protocol';

import { parseCliOptions } from '../cli.js';
import type { UciKitConfig } from '../config/schema.js';
import { formatProtocolError } from '../errors/cli-errors.js';
import { readInput, toNumberedLines, type NumberedLine } from '../input/read-input.js';
import type { Reporter } from '../output/reporter.js';

import { createContext } from './context.js';

/**
 * Report each malformed line, then a summary.
 * @returns the process exit code
 */
export function runCheck(
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
    }
  }

  reporter.summary(lines.length, failed);
  return failed > 0 ? 1 : 0;
}

/**
 * Main check command handler
 */
export async function checkCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseCliOptions(rawOptions);
  const context = await createContext(options);
  if (!context) return;

  const lines = toNumberedLines(await readInput(options.input));
  process.exitCode = runCheck(lines, context.config, context.reporter);
}

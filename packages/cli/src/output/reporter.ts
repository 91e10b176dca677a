/**
 * Line reporter for CLI output
 */

import chalk from 'chalk';

import type { ColorFunctions, LineWriter, ReporterOptions } from './types.js';

export type { ColorFunctions, ReporterOptions, LineWriter } from './types.js';

// Helper function for colorized output
export function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
    };
  }
  // No colors - return text as-is
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
  };
}

/**
 * Writes command results to stdout and diagnostics to stderr
 */
export class Reporter {
  private readonly out: LineWriter;
  private readonly err: LineWriter;
  private readonly c: ColorFunctions;

  constructor(options: ReporterOptions = {}) {
    this.c = createColorFns(options.color ?? true);
    this.out = options.out ?? ((line) => console.log(line));
    this.err = options.err ?? ((line) => console.error(line));
  }

  /**
   * Write one result line
   */
  result(line: string): void {
    this.out(line);
  }

  /**
   * Report a failed input line
   */
  failure(lineNumber: number, message: string): void {
    this.err(this.c.red(`line ${lineNumber}: ${message}`));
  }

  /**
   * Summarize a run over several lines
   */
  summary(total: number, failed: number): void {
    const noun = total === 1 ? 'line' : 'lines';
    if (failed === 0) {
      this.err(this.c.green(`✓ ${total} ${noun} checked, no errors`));
    } else {
      this.err(this.c.red(`✗ ${total} ${noun} checked, ${failed} malformed`));
    }
  }
}

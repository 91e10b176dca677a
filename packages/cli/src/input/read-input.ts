/**
 * Read command lines from a file or stdin
 */

import * as fs from 'node:fs';
import * as readline from 'node:readline';

import { InputError, resolveAbsolutePath } from '../errors/cli-errors.js';

/**
 * One input line with its 1-based position
 */
export interface NumberedLine {
  number: number;
  text: string;
}

/**
 * Read the whole input from a file, or from stdin when no path is given
 */
export async function readInput(inputPath: string | undefined): Promise<string> {
  if (inputPath) {
    if (!fs.existsSync(inputPath)) {
      throw new InputError(
        `Input file not found: ${resolveAbsolutePath(inputPath)}`,
        'Check the file path and try again',
      );
    }
    return fs.readFileSync(inputPath, 'utf-8');
  }

  return new Promise((resolve, reject) => {
    if (process.stdin.isTTY) {
      reject(
        new InputError(
          'No input provided',
          'Provide a file with --input or pipe UCI lines to stdin',
        ),
      );
      return;
    }

    const chunks: string[] = [];
    const rl = readline.createInterface({
      input: process.stdin,
      crlfDelay: Infinity,
    });

    rl.on('line', (line) => {
      chunks.push(line);
    });

    rl.on('close', () => {
      resolve(chunks.join('\n'));
    });

    process.stdin.on('error', (err) => {
      reject(new InputError(`Failed to read from stdin: ${err.message}`));
    });
  });
}

/**
 * Split input text into numbered lines, dropping blank ones
 */
export function toNumberedLines(text: string): NumberedLine[] {
  return text
    .split(/\r?\n/)
    .map((line, index) => ({ number: index + 1, text: line }))
    .filter((line) => line.text.trim().length > 0);
}

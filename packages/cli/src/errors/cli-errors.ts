/**
 * CLI-specific error classes
 */

import * as path from 'node:path';

import { describeUciError, type UciError } from '@ucikit/protocol';

/**
 * Resolve a path to absolute for clearer error messages
 */
export function resolveAbsolutePath(filePath: string): string {
  return path.resolve(process.cwd(), filePath);
}

/**
 * Base CLI error class
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'CliError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    const lines = [`Error: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/**
 * Configuration error
 */
export class ConfigError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'ConfigError';
  }
}

/**
 * Input file error
 */
export class InputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'InputError';
  }
}

/**
 * A JSON engine command that does not match the command schema
 */
export class CommandFormatError extends CliError {
  constructor(
    message: string,
    public readonly line?: number,
  ) {
    super(message, 'Each input line must be one JSON object with a "kind" field');
    this.name = 'CommandFormatError';
  }

  override format(): string {
    const location = this.line !== undefined ? ` (line ${this.line})` : '';
    const lines = [`Command Format Error${location}: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/**
 * Render a protocol error the way the CLI reports it
 */
export function formatProtocolError(error: UciError): string {
  return `${error.kind}: ${describeUciError(error)}`;
}

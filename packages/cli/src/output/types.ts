/**
 * Shared types for CLI output
 */

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  green: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
}

/**
 * Destination for one line of output
 */
export type LineWriter = (line: string) => void;

/**
 * Reporter configuration
 */
export interface ReporterOptions {
  /** Colorize output */
  color?: boolean;
  /** Writer for results (default: console.log) */
  out?: LineWriter;
  /** Writer for diagnostics (default: console.error) */
  err?: LineWriter;
}

/**
 * Configuration schema types for the ucikit CLI
 */

/**
 * How parsed commands are printed
 */
export type OutputFormat = 'json' | 'text';

/**
 * Parser configuration
 */
export interface ParserConfigSchema {
  /** Reject tokens trailing a complete zero-argument command */
  strict: boolean;
}

/**
 * Output configuration
 */
export interface OutputConfigSchema {
  /** Printed form of parsed commands */
  format: OutputFormat;
  /** Colorize messages */
  color: boolean;
  /** Indent JSON output */
  pretty: boolean;
}

/**
 * Complete ucikit configuration
 */
export interface UciKitConfig {
  /** Parser settings */
  parser: ParserConfigSchema;
  /** Output settings */
  output: OutputConfigSchema;
}

/**
 * CLI options from command line arguments
 */
export interface CliOptions {
  /** Input file path (undefined = stdin) */
  input?: string;
  /** Path to config file */
  config?: string;
  /** Reject trailing tokens */
  strict?: boolean;
  /** Output format */
  format?: OutputFormat;
  /** Indent JSON output */
  pretty?: boolean;
  /** Disable colored output */
  noColor?: boolean;
  /** Print resolved config and exit */
  showConfig?: boolean;
}

/**
 * Error module exports
 */

export {
  CliError,
  ConfigError,
  InputError,
  CommandFormatError,
  formatProtocolError,
  resolveAbsolutePath,
} from './cli-errors.js';

export { formatError, handleError } from './handler.js';

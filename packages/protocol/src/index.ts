/**
 * @ucikit/protocol - UCI line codec
 *
 * This package handles:
 * - Parsing GUI command lines (uci, debug, setoption, position, go, ...)
 * - Formatting engine commands (id, bestmove, info, option, ...)
 * - Formatting GUI commands back to their canonical lines
 * - Builders for the go and position commands
 * - Move token and engine option contracts
 */

export const VERSION = '0.1.0';

// Re-export the data model for convenience
export type * from '@ucikit/types';

// Error taxonomy
export type { UciErrorKind, UciError, ParseResult } from './errors.js';
export { UciParseError, describeUciError, unwrap, ok, fail, badMillis } from './errors.js';

// Tokenizer
export { TokenStream, tokenize } from './tokens/token-stream.js';
export type { Token } from './tokens/token-stream.js';
export { readSigned, readUnsigned } from './tokens/numbers.js';

// Builders
export { GoBuilder } from './builders/go-builder.js';
export { PositionBuilder } from './builders/position-builder.js';

// GUI to engine
export { parseGuiCmd, parseGuiCmdOrThrow, FEN_FIELD_COUNT } from './parser/gui-parser.js';
export type { GuiParseOptions } from './parser/gui-parser.js';
export { formatGuiCmd, formatGo, formatPosition } from './formatter/gui-formatter.js';

// Engine to GUI
export {
  formatEngCmd,
  formatInfo,
  formatScore,
  formatMultiPv,
  formatCurrLine,
  formatRefutation,
} from './formatter/engine-formatter.js';

// Moves
export { NULL_MOVE, isUciMove, parseMove, formatMove, formatMoves } from './move/move.js';

// Options
export {
  EMPTY_STRING,
  formatOptionDeclaration,
  parseOptionDeclaration,
  formatOptionAssignment,
  readCheckValue,
  readSpinValue,
  readOpponent,
} from './options/index.js';

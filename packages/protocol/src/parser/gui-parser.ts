/**
 * Parser for commands sent from the GUI to the engine
 */

import {
  GO_KEYWORDS,
  GUI_COMMANDS,
  GO_TIME_KEYWORDS,
  isKeyword,
  type GoKeyword,
  type GuiCmd,
  type UciMove,
} from '@ucikit/types';

import { GoBuilder } from '../builders/go-builder.js';
import { PositionBuilder } from '../builders/position-builder.js';
import { badMillis, fail, ok, unwrap, type ParseResult } from '../errors.js';
import { isUciMove } from '../move/move.js';
import { readUnsigned } from '../tokens/numbers.js';
import { TokenStream, type Token } from '../tokens/token-stream.js';

/**
 * Parser behaviour switches
 */
export interface GuiParseOptions {
  /**
   * Reject tokens after a complete zero-argument command (`uci extra`) or
   * after `debug on|off` with UnknownOpt. Default: false, they are ignored.
   */
  strict?: boolean;
}

/**
 * Number of fields in a FEN record
 */
export const FEN_FIELD_COUNT = 6;

/**
 * Parse one GUI command line
 *
 * @param line - A complete line without its line terminator
 * @returns The command, or the first error found
 */
export function parseGuiCmd(line: string, options: GuiParseOptions = {}): ParseResult<GuiCmd> {
  const stream = new TokenStream(line);
  const keyword = stream.nextToken();
  if (!keyword) {
    return fail('MissingCmd');
  }

  const command = keyword.text;
  if (!isKeyword(GUI_COMMANDS, command)) {
    return fail('UnknownOpt');
  }

  switch (command) {
    case 'uci':
      return finish(stream, options, { kind: 'uci' });
    case 'isready':
      return finish(stream, options, { kind: 'isReady' });
    case 'ucinewgame':
      return finish(stream, options, { kind: 'newGame' });
    case 'stop':
      return finish(stream, options, { kind: 'stop' });
    case 'ponderhit':
      return finish(stream, options, { kind: 'ponderHit' });
    case 'debug':
      return parseDebug(stream, options);
    case 'setoption':
      return parseSetOption(stream);
    case 'position':
      return parsePosition(stream);
    case 'go':
      return parseGo(stream);
    default: {
      // Every keyword in GUI_COMMANDS needs a case above
      const unhandled: never = command;
      return unhandled;
    }
  }
}

/**
 * Parse one GUI command line, throwing UciParseError on failure
 */
export function parseGuiCmdOrThrow(line: string, options?: GuiParseOptions): GuiCmd {
  return unwrap(parseGuiCmd(line, options), line);
}

/**
 * Apply the trailing token policy to a complete command
 */
function finish(stream: TokenStream, options: GuiParseOptions, cmd: GuiCmd): ParseResult<GuiCmd> {
  if (options.strict && !stream.done) {
    return fail('UnknownOpt');
  }
  return ok(cmd);
}

/**
 * debug [on | off]
 */
function parseDebug(stream: TokenStream, options: GuiParseOptions): ParseResult<GuiCmd> {
  const value = stream.nextToken()?.text;
  if (value !== 'on' && value !== 'off') {
    return fail('MissingOnOff');
  }
  return finish(stream, options, { kind: 'debug', on: value === 'on' });
}

/**
 * setoption name <id> [value <x>]
 */
function parseSetOption(stream: TokenStream): ParseResult<GuiCmd> {
  if (stream.nextToken()?.text !== 'name') {
    return fail('SetOptErr');
  }

  let first: Token | undefined;
  let last: Token | undefined;
  let hasValue = false;
  for (let token = stream.nextToken(); token; token = stream.nextToken()) {
    if (token.text === 'value') {
      hasValue = true;
      break;
    }
    first ??= token;
    last = token;
  }

  if (!first || !last) {
    return fail('SetOptErr');
  }

  const name = stream.slice(first.start, last.end);
  const option = hasValue ? { name, value: stream.remainder() } : { name };
  return ok({ kind: 'setOption', option });
}

/**
 * position [startpos | fen <fenstring>] [moves <move1> ... <movei>]
 */
function parsePosition(stream: TokenStream): ParseResult<GuiCmd> {
  const builder = new PositionBuilder();

  const base = stream.peek();
  if (base?.text === 'startpos') {
    stream.nextToken();
    builder.startPos();
  } else if (base?.text === 'fen') {
    stream.nextToken();
    const fields: string[] = [];
    while (fields.length < FEN_FIELD_COUNT) {
      const field = stream.peek();
      if (!field || field.text === 'moves') {
        return fail('What');
      }
      stream.nextToken();
      fields.push(field.text);
    }
    builder.fen(fields.join(' '));
  }

  const next = stream.nextToken();
  if (next) {
    if (next.text !== 'moves') {
      return fail('UnknownOpt');
    }
    for (const token of stream) {
      if (!isUciMove(token.text)) {
        return fail('What');
      }
      builder.addMove(token.text);
    }
  }

  const position = builder.build();
  if (!position.success) {
    return position;
  }
  return ok({ kind: 'position', position: position.value });
}

function isGoKeyword(token: string): token is GoKeyword {
  return isKeyword(GO_KEYWORDS, token);
}

/**
 * go [searchmoves <moves...>] [ponder] [wtime <x>] ... [infinite]
 */
function parseGo(stream: TokenStream): ParseResult<GuiCmd> {
  const builder = new GoBuilder();

  for (let token = stream.nextToken(); token; token = stream.nextToken()) {
    const keyword = token.text;
    if (!isGoKeyword(keyword)) {
      return fail('UnknownOpt');
    }

    switch (keyword) {
      case 'ponder':
        builder.ponder();
        continue;
      case 'infinite':
        builder.infinite();
        continue;
      case 'searchmoves': {
        const moves = readSearchMoves(stream);
        if (!moves.success) return moves;
        builder.searchMoves(moves.value);
        continue;
      }
    }

    const arg = stream.nextToken();
    if (!arg) {
      return fail('GoErr');
    }

    if (isKeyword(GO_TIME_KEYWORDS, keyword)) {
      const ms = readUnsigned(arg.text);
      if (ms === undefined) {
        return badMillis(keyword, arg.text);
      }
      switch (keyword) {
        case 'wtime':
          builder.wtime(ms);
          break;
        case 'btime':
          builder.btime(ms);
          break;
        case 'winc':
          builder.winc(ms);
          break;
        case 'binc':
          builder.binc(ms);
          break;
        case 'movetime':
          builder.moveTime(ms);
          break;
      }
      continue;
    }

    const count = readUnsigned(arg.text);
    if (count === undefined) {
      return fail('BadNumber');
    }
    switch (keyword) {
      case 'movestogo':
        builder.movesToGo(count);
        break;
      case 'depth':
        builder.depth(count);
        break;
      case 'nodes':
        builder.nodes(count);
        break;
      case 'mate':
        builder.mate(count);
        break;
    }
  }

  const go = builder.build();
  if (!go.success) {
    return go;
  }
  return ok({ kind: 'go', go: go.value });
}

/**
 * Moves after `searchmoves`, up to the next go keyword or end of line
 */
function readSearchMoves(stream: TokenStream): ParseResult<UciMove[]> {
  const moves: UciMove[] = [];
  for (let next = stream.peek(); next && !isGoKeyword(next.text); next = stream.peek()) {
    stream.nextToken();
    if (!isUciMove(next.text)) {
      return fail('What');
    }
    moves.push(next.text);
  }
  return moves.length > 0 ? ok(moves) : fail('GoErr');
}

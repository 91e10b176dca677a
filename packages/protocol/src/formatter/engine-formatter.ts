/**
 * Formatter for commands sent from the engine to the GUI
 *
 * Every function here is total: any well-typed value renders to exactly one
 * line, without a line terminator. Numbers are written as given, including
 * out-of-range permille values.
 */

import {
  INFO_KEYWORDS,
  type CurrLine,
  type EngCmd,
  type Info,
  type InfoKeyword,
  type MultiPv,
  type Refutation,
  type Score,
} from '@ucikit/types';

import { formatMove, formatMoves } from '../move/move.js';
import { formatOptionDeclaration } from '../options/declaration.js';

/**
 * Render an engine command as a UCI line
 */
export function formatEngCmd(cmd: EngCmd): string {
  switch (cmd.kind) {
    case 'uciOk':
      return 'uciok';
    case 'readyOk':
      return 'readyok';
    case 'idName':
      return `id name ${cmd.name}`;
    case 'idAuthor':
      return `id author ${cmd.author}`;
    case 'bestMove':
      return cmd.ponder === undefined
        ? `bestmove ${formatMove(cmd.best)}`
        : `bestmove ${formatMove(cmd.best)} ponder ${formatMove(cmd.ponder)}`;
    case 'info':
      return formatInfo(cmd.info);
    case 'option':
      return formatOptionDeclaration(cmd.option);
  }
}

/**
 * score cp <x> [<mate>] [lowerbound | upperbound]
 */
export function formatScore(score: Score): string {
  const parts = ['score', 'cp', String(score.cp)];
  if (score.mate !== undefined) {
    parts.push(String(score.mate));
  }
  if (score.bound !== undefined) {
    parts.push(score.bound === 'lower' ? 'lowerbound' : 'upperbound');
  }
  return parts.join(' ');
}

/**
 * multipv <rank> <moves...>
 */
export function formatMultiPv(multiPv: MultiPv): string {
  return joinLine(`multipv ${multiPv.rank}`, multiPv.moves);
}

/**
 * currline [<cpu>] <moves...>
 */
export function formatCurrLine(currLine: CurrLine): string {
  const head = currLine.cpu === undefined ? 'currline' : `currline ${currLine.cpu}`;
  return joinLine(head, currLine.moves);
}

/**
 * refutation <move> <line...>
 */
export function formatRefutation(refutation: Refutation): string {
  return joinLine(`refutation ${formatMove(refutation.move)}`, refutation.line);
}

type InfoRenderer = (info: Info) => string | undefined;

function numeric(keyword: InfoKeyword, value: number | undefined): string | undefined {
  return value === undefined ? undefined : `${keyword} ${value}`;
}

// One renderer per entry of INFO_KEYWORDS
const INFO_RENDERERS: Readonly<Record<InfoKeyword, InfoRenderer>> = {
  depth: (info) => numeric('depth', info.depth),
  seldepth: (info) => numeric('seldepth', info.selDepth),
  node: (info) => numeric('node', info.nodes),
  time: (info) => numeric('time', info.timeMs === undefined ? undefined : Math.trunc(info.timeMs)),
  pv: (info) => (info.pv === undefined ? undefined : joinLine('pv', info.pv)),
  multipv: (info) => (info.multiPv === undefined ? undefined : formatMultiPv(info.multiPv)),
  score: (info) => (info.score === undefined ? undefined : formatScore(info.score)),
  currmove: (info) =>
    info.currMove === undefined ? undefined : `currmove ${formatMove(info.currMove)}`,
  hashfull: (info) => numeric('hashfull', info.hashFull),
  nps: (info) => numeric('nps', info.nps),
  tbhits: (info) => numeric('tbhits', info.tbHits),
  sbhits: (info) => numeric('sbhits', info.sbHits),
  cpuload: (info) => numeric('cpuload', info.cpuLoad),
  string: (info) => (info.string === undefined ? undefined : `string ${info.string}`),
  refutation: (info) =>
    info.refutation === undefined ? undefined : formatRefutation(info.refutation),
  currline: (info) => (info.currLine === undefined ? undefined : formatCurrLine(info.currLine)),
};

/**
 * Render an info command. Fields come out in INFO_KEYWORDS order,
 * whatever order the object's properties were set in.
 */
export function formatInfo(info: Info): string {
  const parts = ['info'];
  for (const keyword of INFO_KEYWORDS) {
    const part = INFO_RENDERERS[keyword](info);
    if (part !== undefined) parts.push(part);
  }
  return parts.join(' ');
}

function joinLine(head: string, moves: readonly string[]): string {
  return moves.length === 0 ? head : `${head} ${formatMoves(moves)}`;
}

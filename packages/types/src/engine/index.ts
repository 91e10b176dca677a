/**
 * Commands sent from the engine to the GUI
 */

import type { UciMove } from '../gui/index.js';
import type { OptionDeclaration } from '../options/index.js';

export type ScoreBound = 'lower' | 'upper';

/**
 * score cp <x> [<mate>] [lowerbound|upperbound]
 */
export interface Score {
  /** Centipawns from the engine's point of view */
  readonly cp: number;
  /** Mate in this many moves; negative when the engine is being mated */
  readonly mate?: number;
  readonly bound?: ScoreBound;
}

/**
 * multipv <rank> <moves...>
 */
export interface MultiPv {
  /** 1 for the best line */
  readonly rank: number;
  readonly moves: readonly UciMove[];
}

/**
 * currline [<cpu>] <moves...>
 *
 * `cpu` is only meaningful when the engine searches on more than one CPU.
 */
export interface CurrLine {
  readonly cpu?: number;
  readonly moves: readonly UciMove[];
}

/**
 * refutation <move> <line...>: `move` is refuted by `line`
 */
export interface Refutation {
  readonly move: UciMove;
  readonly line: readonly UciMove[];
}

/**
 * Fields of an `info` line other than the search depths
 */
export interface InfoFields {
  readonly nodes?: number;
  /** Search time in ms, written as an integer */
  readonly timeMs?: number;
  readonly pv?: readonly UciMove[];
  readonly multiPv?: MultiPv;
  readonly score?: Score;
  readonly currMove?: UciMove;
  /** Permille of the hash table in use */
  readonly hashFull?: number;
  readonly nps?: number;
  readonly tbHits?: number;
  readonly sbHits?: number;
  /** CPU usage in permille */
  readonly cpuLoad?: number;
  /** Free text; everything after `string` up to the end of the line */
  readonly string?: string;
  readonly refutation?: Refutation;
  readonly currLine?: CurrLine;
}

/**
 * A selective depth is only sent together with a depth
 */
export type SearchDepth =
  | { readonly depth?: undefined; readonly selDepth?: undefined }
  | { readonly depth: number; readonly selDepth?: number };

export type Info = InfoFields & SearchDepth;

export type EngCmd =
  | { readonly kind: 'idName'; readonly name: string }
  | { readonly kind: 'idAuthor'; readonly author: string }
  | { readonly kind: 'uciOk' }
  | { readonly kind: 'readyOk' }
  | { readonly kind: 'bestMove'; readonly best: UciMove; readonly ponder?: UciMove }
  | { readonly kind: 'info'; readonly info: Info }
  | { readonly kind: 'option'; readonly option: OptionDeclaration };

export type EngCmdKind = EngCmd['kind'];

/**
 * Commands sent from the GUI to the engine
 */

import type { OptionAssignment } from '../options/index.js';

/**
 * A half-move in coordinate notation (e.g. "e2e4", "e7e8q", "0000")
 */
export type UciMove = string;

/**
 * Search limits for the `go` command. Every field is optional, but at least
 * one must be set.
 */
export interface Go {
  /** searchmoves: restrict the search to these moves */
  readonly searchMoves?: readonly UciMove[];
  /** ponder: start searching in pondering mode */
  readonly ponder?: boolean;
  /** wtime: white's remaining time in ms */
  readonly wtime?: number;
  /** btime: black's remaining time in ms */
  readonly btime?: number;
  /** winc: white's increment per move in ms */
  readonly winc?: number;
  /** binc: black's increment per move in ms */
  readonly binc?: number;
  /** movestogo: moves until the next time control */
  readonly movesToGo?: number;
  /** depth: search this many plies only */
  readonly depth?: number;
  /** nodes: search this many nodes only */
  readonly nodes?: number;
  /** mate: search for a mate in this many moves */
  readonly mate?: number;
  /** movetime: search exactly this many ms */
  readonly moveTime?: number;
  /** infinite: search until `stop` */
  readonly infinite?: boolean;
}

/**
 * Base position for the `position` command
 */
export type PosOpt = { readonly kind: 'startPos' } | { readonly kind: 'fen'; readonly fen: string };

/**
 * The `position` command: a base position plus the moves played from it
 */
export interface Pos {
  readonly base: PosOpt;
  readonly moves?: readonly UciMove[];
}

export type GuiCmd =
  | { readonly kind: 'uci' }
  | { readonly kind: 'debug'; readonly on: boolean }
  | { readonly kind: 'isReady' }
  | { readonly kind: 'setOption'; readonly option: OptionAssignment }
  | { readonly kind: 'newGame' }
  | { readonly kind: 'position'; readonly position: Pos }
  | { readonly kind: 'go'; readonly go: Go }
  | { readonly kind: 'stop' }
  | { readonly kind: 'ponderHit' };

export type GuiCmdKind = GuiCmd['kind'];

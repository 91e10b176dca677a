/**
 * Fluent builder for the `position` command
 */

import type { Pos, PosOpt, UciMove } from '@ucikit/types';

import { fail, ok, type ParseResult } from '../errors.js';

export class PositionBuilder {
  private base: PosOpt | undefined;
  private moves: UciMove[] | undefined;

  /**
   * Start from the standard initial position. Replaces an earlier fen().
   */
  startPos(): this {
    this.base = { kind: 'startPos' };
    return this;
  }

  /**
   * Start from a FEN position. Replaces an earlier startPos() or fen().
   */
  fen(fen: string): this {
    this.base = { kind: 'fen', fen };
    return this;
  }

  /**
   * Append a move; moves must be added in the order they were played
   */
  addMove(move: UciMove): this {
    if (this.moves) {
      this.moves.push(move);
    } else {
      this.moves = [move];
    }
    return this;
  }

  /**
   * Finish the command. Fails with Position when no base position was set,
   * keeping the moves added so far. On success the state is handed over to
   * the result, leaving the builder empty.
   */
  build(): ParseResult<Pos> {
    const base = this.base;
    if (base === undefined) {
      return fail('Position');
    }

    const moves = this.moves;
    this.base = undefined;
    this.moves = undefined;
    return ok(moves ? { base, moves } : { base });
  }
}

/**
 * Fluent builder for the `go` command
 */

import type { Go, UciMove } from '@ucikit/types';

import { fail, ok, type ParseResult } from '../errors.js';

type MutableGo = { -readonly [K in keyof Go]: Go[K] };

/**
 * Accumulates search limits in any order. Setters never fail; whether the
 * command makes sense as a whole is only decided by build().
 */
export class GoBuilder {
  private go: MutableGo = {};

  /**
   * Restrict the search to these moves
   */
  searchMoves(moves: readonly UciMove[]): this {
    this.go.searchMoves = [...moves];
    return this;
  }

  /**
   * Start in pondering mode
   */
  ponder(): this {
    this.go.ponder = true;
    return this;
  }

  wtime(ms: number): this {
    this.go.wtime = ms;
    return this;
  }

  btime(ms: number): this {
    this.go.btime = ms;
    return this;
  }

  winc(ms: number): this {
    this.go.winc = ms;
    return this;
  }

  binc(ms: number): this {
    this.go.binc = ms;
    return this;
  }

  movesToGo(moves: number): this {
    this.go.movesToGo = moves;
    return this;
  }

  depth(plies: number): this {
    this.go.depth = plies;
    return this;
  }

  nodes(nodes: number): this {
    this.go.nodes = nodes;
    return this;
  }

  mate(moves: number): this {
    this.go.mate = moves;
    return this;
  }

  moveTime(ms: number): this {
    this.go.moveTime = ms;
    return this;
  }

  /**
   * Search until `stop`
   */
  infinite(): this {
    this.go.infinite = true;
    return this;
  }

  /**
   * Finish the command. Fails with NothingSetForGo when no limit was set.
   * The builder is emptied either way, so each build() needs fresh setter calls.
   */
  build(): ParseResult<Go> {
    const go = this.go;
    this.go = {};

    if (Object.keys(go).length === 0) {
      return fail('NothingSetForGo');
    }
    return ok(Object.freeze(go));
  }
}

import type { UciMove } from '@ucikit/types';

import { fail, ok, type ParseResult } from '../errors.js';

/**
 * The null move, sent by some engines when they have no legal move
 */
export const NULL_MOVE = '0000';

const MOVE_PATTERN = /^[a-h][1-8][a-h][1-8][qrbn]?$/;

/**
 * Check a coordinate notation move token (e2e4, e7e8q, 0000)
 */
export function isUciMove(token: string): boolean {
  return token === NULL_MOVE || MOVE_PATTERN.test(token);
}

/**
 * Parse a move token. Legality is not checked, only the notation.
 */
export function parseMove(token: string): ParseResult<UciMove> {
  return isUciMove(token) ? ok(token) : fail('What');
}

export function formatMove(move: UciMove): string {
  return move;
}

/**
 * Format a move sequence as space-separated tokens
 */
export function formatMoves(moves: readonly UciMove[]): string {
  return moves.map(formatMove).join(' ');
}

/**
 * Formatter for commands sent from the GUI to the engine; the inverse of
 * parseGuiCmd
 */

import type { Go, GuiCmd, Pos } from '@ucikit/types';

import { formatMoves } from '../move/move.js';
import { formatOptionAssignment } from '../options/assignment.js';

export function formatGuiCmd(cmd: GuiCmd): string {
  switch (cmd.kind) {
    case 'uci':
      return 'uci';
    case 'debug':
      return cmd.on ? 'debug on' : 'debug off';
    case 'isReady':
      return 'isready';
    case 'setOption':
      return formatOptionAssignment(cmd.option);
    case 'newGame':
      return 'ucinewgame';
    case 'position':
      return formatPosition(cmd.position);
    case 'go':
      return formatGo(cmd.go);
    case 'stop':
      return 'stop';
    case 'ponderHit':
      return 'ponderhit';
  }
}

/**
 * position startpos | fen <fen> [moves ...]
 */
export function formatPosition(pos: Pos): string {
  const base = pos.base.kind === 'startPos' ? 'position startpos' : `position fen ${pos.base.fen}`;
  return pos.moves && pos.moves.length > 0 ? `${base} moves ${formatMoves(pos.moves)}` : base;
}

/**
 * go with its limits in declaration order
 */
export function formatGo(go: Go): string {
  const parts = ['go'];

  if (go.searchMoves !== undefined && go.searchMoves.length > 0) {
    parts.push(`searchmoves ${formatMoves(go.searchMoves)}`);
  }
  if (go.ponder) parts.push('ponder');
  if (go.wtime !== undefined) parts.push(`wtime ${go.wtime}`);
  if (go.btime !== undefined) parts.push(`btime ${go.btime}`);
  if (go.winc !== undefined) parts.push(`winc ${go.winc}`);
  if (go.binc !== undefined) parts.push(`binc ${go.binc}`);
  if (go.movesToGo !== undefined) parts.push(`movestogo ${go.movesToGo}`);
  if (go.depth !== undefined) parts.push(`depth ${go.depth}`);
  if (go.nodes !== undefined) parts.push(`nodes ${go.nodes}`);
  if (go.mate !== undefined) parts.push(`mate ${go.mate}`);
  if (go.moveTime !== undefined) parts.push(`movetime ${go.moveTime}`);
  if (go.infinite) parts.push('infinite');

  return parts.join(' ');
}

/**
 * Output formatting utilities
 */

import { formatMoves, type Go, type GuiCmd } from '@ucikit/protocol';

import type { OutputConfigSchema, UciKitConfig } from '../config/schema.js';

import type { ColorFunctions } from './types.js';

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: UciKitConfig, c: ColorFunctions): string {
  const lines: string[] = [];

  lines.push(c.bold('Configuration:'));
  lines.push('');

  lines.push(c.dim('Parser:'));
  lines.push(`  Strict: ${config.parser.strict ? c.yellow('yes') : 'no'}`);
  lines.push('');

  lines.push(c.dim('Output:'));
  lines.push(`  Format: ${config.output.format}`);
  lines.push(`  Color: ${config.output.color}`);
  lines.push(`  Pretty: ${config.output.pretty}`);

  return lines.join('\n');
}

/**
 * Render a value as JSON, indented when pretty output is on
 */
export function toJson(value: unknown, output: Pick<OutputConfigSchema, 'pretty'>): string {
  return output.pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
}

function summarizeGo(go: Go): string {
  const parts: string[] = [];
  if (go.searchMoves && go.searchMoves.length > 0) {
    parts.push(`searchmoves=${go.searchMoves.join(',')}`);
  }
  if (go.ponder) parts.push('ponder');
  if (go.wtime !== undefined) parts.push(`wtime=${go.wtime}ms`);
  if (go.btime !== undefined) parts.push(`btime=${go.btime}ms`);
  if (go.winc !== undefined) parts.push(`winc=${go.winc}ms`);
  if (go.binc !== undefined) parts.push(`binc=${go.binc}ms`);
  if (go.movesToGo !== undefined) parts.push(`movestogo=${go.movesToGo}`);
  if (go.depth !== undefined) parts.push(`depth=${go.depth}`);
  if (go.nodes !== undefined) parts.push(`nodes=${go.nodes}`);
  if (go.mate !== undefined) parts.push(`mate=${go.mate}`);
  if (go.moveTime !== undefined) parts.push(`movetime=${go.moveTime}ms`);
  if (go.infinite) parts.push('infinite');
  return parts.join(' ');
}

/**
 * One-line readable summary of a parsed GUI command
 */
export function summarizeGuiCmd(cmd: GuiCmd): string {
  switch (cmd.kind) {
    case 'uci':
    case 'isReady':
    case 'newGame':
    case 'stop':
    case 'ponderHit':
      return cmd.kind;
    case 'debug':
      return `debug ${cmd.on ? 'on' : 'off'}`;
    case 'setOption': {
      const { name, value } = cmd.option;
      return value === undefined ? `setOption "${name}"` : `setOption "${name}" = "${value}"`;
    }
    case 'position': {
      const { base, moves } = cmd.position;
      const from = base.kind === 'startPos' ? 'startpos' : `fen "${base.fen}"`;
      if (!moves || moves.length === 0) return `position ${from}`;
      const noun = moves.length === 1 ? 'move' : 'moves';
      return `position ${from} +${moves.length} ${noun}: ${formatMoves(moves)}`;
    }
    case 'go':
      return `go ${summarizeGo(cmd.go)}`;
  }
}

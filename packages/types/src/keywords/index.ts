/**
 * UCI keyword tables
 *
 * Exact, case-sensitive spellings of every keyword the codec reads or writes.
 */

/**
 * Commands sent from the GUI to the engine
 */
export const GUI_COMMANDS = [
  'uci',
  'debug',
  'isready',
  'setoption',
  'ucinewgame',
  'position',
  'go',
  'stop',
  'ponderhit',
] as const;

export type GuiCommandKeyword = (typeof GUI_COMMANDS)[number];

/**
 * Commands sent from the engine to the GUI
 */
export const ENGINE_COMMANDS = ['id', 'uciok', 'readyok', 'bestmove', 'info', 'option'] as const;

export type EngineCommandKeyword = (typeof ENGINE_COMMANDS)[number];

/**
 * Search limit keywords accepted after `go`
 */
export const GO_KEYWORDS = [
  'searchmoves',
  'ponder',
  'wtime',
  'btime',
  'winc',
  'binc',
  'movestogo',
  'depth',
  'nodes',
  'mate',
  'movetime',
  'infinite',
] as const;

export type GoKeyword = (typeof GO_KEYWORDS)[number];

/**
 * `go` keywords whose argument is a duration in milliseconds
 */
export const GO_TIME_KEYWORDS = ['wtime', 'btime', 'winc', 'binc', 'movetime'] as const;

export type GoTimeKeyword = (typeof GO_TIME_KEYWORDS)[number];

/**
 * Fields of an `info` line, in the order they are emitted
 */
export const INFO_KEYWORDS = [
  'depth',
  'seldepth',
  'node',
  'time',
  'pv',
  'multipv',
  'score',
  'currmove',
  'hashfull',
  'nps',
  'tbhits',
  'sbhits',
  'cpuload',
  'string',
  'refutation',
  'currline',
] as const;

export type InfoKeyword = (typeof INFO_KEYWORDS)[number];

/**
 * Type-safe membership test for a keyword table
 */
export function isKeyword<T extends string>(table: readonly T[], token: string): token is T {
  const words: readonly string[] = table;
  return words.includes(token);
}

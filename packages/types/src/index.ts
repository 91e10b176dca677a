/**
 * @ucikit/types - Shared type definitions for UCI Kit
 *
 * This package holds the data model of the UCI protocol: the commands a GUI
 * sends, the commands an engine sends, their substructures and the keyword
 * tables both directions are spelled with.
 *
 * Usage:
 *   import type { GuiCmd, EngCmd, Info } from '@ucikit/types';
 *   import { GO_KEYWORDS } from '@ucikit/types';
 */

// GUI to engine
export type { UciMove, Go, PosOpt, Pos, GuiCmd, GuiCmdKind } from './gui/index.js';

// Engine to GUI
export type {
  ScoreBound,
  Score,
  MultiPv,
  CurrLine,
  Refutation,
  InfoFields,
  SearchDepth,
  Info,
  EngCmd,
  EngCmdKind,
} from './engine/index.js';

// Engine options
export type {
  OptionType,
  CheckOption,
  SpinOption,
  ComboOption,
  ButtonOption,
  StringOption,
  OptionDeclaration,
  OptionAssignment,
  OpponentTitle,
  PlayerType,
  Opponent,
} from './options/index.js';

// Keyword tables
export * from './keywords/index.js';

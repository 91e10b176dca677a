/**
 * Engine option types
 *
 * Declarations are what the engine advertises with `option name ...`;
 * assignments are what the GUI sends back with `setoption name ...`.
 */

/**
 * Kinds of option an engine can declare
 */
export type OptionType = 'check' | 'spin' | 'combo' | 'button' | 'string';

/**
 * A boolean option, e.g. `option name Ponder type check default false`
 */
export interface CheckOption {
  readonly type: 'check';
  readonly name: string;
  readonly default: boolean;
}

/**
 * An integer option with bounds, e.g. `option name Hash type spin default 16 min 1 max 1024`
 */
export interface SpinOption {
  readonly type: 'spin';
  readonly name: string;
  readonly default: number;
  readonly min: number;
  readonly max: number;
}

/**
 * A choice between predefined strings
 */
export interface ComboOption {
  readonly type: 'combo';
  readonly name: string;
  readonly default: string;
  readonly vars: readonly string[];
}

/**
 * A command with no value, e.g. `option name Clear Hash type button`
 */
export interface ButtonOption {
  readonly type: 'button';
  readonly name: string;
}

/**
 * A free text option; an empty default is written as `<empty>`
 */
export interface StringOption {
  readonly type: 'string';
  readonly name: string;
  readonly default: string;
}

export type OptionDeclaration = CheckOption | SpinOption | ComboOption | ButtonOption | StringOption;

/**
 * A value assignment sent by the GUI. The value is kept as raw text;
 * interpreting it is up to whoever owns the option.
 */
export interface OptionAssignment {
  readonly name: string;
  readonly value?: string;
}

/**
 * Player titles accepted by `UCI_Opponent`
 */
export type OpponentTitle = 'GM' | 'IM' | 'FM' | 'WGM' | 'WIM' | 'none';

/**
 * Player kinds accepted by `UCI_Opponent`
 */
export type PlayerType = 'computer' | 'human';

/**
 * Parsed value of the `UCI_Opponent` option:
 * `<title> <elo> <computer|human> <name>`
 */
export interface Opponent {
  readonly title: OpponentTitle;
  /** Rating, or undefined when the GUI sent `none` */
  readonly elo?: number;
  readonly playerType: PlayerType;
  readonly name: string;
}

/**
 * Option assignments (`setoption`) and readers for their raw values
 */

import type { Opponent, OpponentTitle, OptionAssignment, PlayerType } from '@ucikit/types';

import { fail, ok, type ParseResult } from '../errors.js';
import { readSigned, readUnsigned } from '../tokens/numbers.js';
import { TokenStream } from '../tokens/token-stream.js';

const TITLES: readonly OpponentTitle[] = ['GM', 'IM', 'FM', 'WGM', 'WIM', 'none'];
const PLAYER_TYPES: readonly PlayerType[] = ['computer', 'human'];

/**
 * Render an assignment as a `setoption` line
 */
export function formatOptionAssignment(option: OptionAssignment): string {
  const head = `setoption name ${option.name}`;
  return option.value === undefined ? head : `${head} value ${option.value}`;
}

/**
 * Read the value of a `check` option
 */
export function readCheckValue(value: string | undefined): ParseResult<boolean> {
  if (value === 'true') return ok(true);
  if (value === 'false') return ok(false);
  return fail('BadBool');
}

/**
 * Read the value of a `spin` option. Bounds are the option owner's concern.
 */
export function readSpinValue(value: string | undefined): ParseResult<number> {
  const n = value === undefined ? undefined : readSigned(value.trim());
  return n === undefined ? fail('BadNumber') : ok(n);
}

function isTitle(token: string): token is OpponentTitle {
  const titles: readonly string[] = TITLES;
  return titles.includes(token);
}

function isPlayerType(token: string): token is PlayerType {
  const types: readonly string[] = PLAYER_TYPES;
  return types.includes(token);
}

/**
 * Read the value of `UCI_Opponent`: `<title> <elo> <computer|human> <name>`,
 * e.g. "GM 2800 human Gary Kasparov" or "none none computer Shredder"
 */
export function readOpponent(value: string | undefined): ParseResult<Opponent> {
  if (value === undefined) return fail('BadOpponent');
  const stream = new TokenStream(value);

  const title = stream.nextToken();
  const elo = stream.nextToken();
  const playerType = stream.nextToken();
  if (!title || !elo || !playerType) return fail('BadOpponent');

  if (!isTitle(title.text)) return fail('BadTitle');

  let rating: number | undefined;
  if (elo.text !== 'none') {
    rating = readUnsigned(elo.text);
    if (rating === undefined) return fail('BadOpponent');
  }

  if (!isPlayerType(playerType.text)) return fail('BadPlayerType');

  const name = stream.remainder().trimEnd();
  if (name === '') return fail('BadOpponent');

  const opponent: Opponent =
    rating === undefined
      ? { title: title.text, playerType: playerType.text, name }
      : { title: title.text, elo: rating, playerType: playerType.text, name };
  return ok(opponent);
}

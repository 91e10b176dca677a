/**
 * `option name <id> type <t> [default <x>] [min <x>] [max <x>] [var <x>]*`
 */

import type { OptionDeclaration, OptionType } from '@ucikit/types';

import { fail, ok, type ParseResult } from '../errors.js';
import { readSigned } from '../tokens/numbers.js';
import { TokenStream, type Token } from '../tokens/token-stream.js';

/**
 * Placeholder for an empty string default
 */
export const EMPTY_STRING = '<empty>';

const OPTION_TYPES: readonly OptionType[] = ['check', 'spin', 'combo', 'button', 'string'];

const FIELD_KEYWORDS = ['default', 'min', 'max', 'var'] as const;
type FieldKeyword = (typeof FIELD_KEYWORDS)[number];

function isFieldKeyword(token: string): token is FieldKeyword {
  const words: readonly string[] = FIELD_KEYWORDS;
  return words.includes(token);
}

function isOptionType(token: string): token is OptionType {
  const types: readonly string[] = OPTION_TYPES;
  return types.includes(token);
}

/**
 * Render an option declaration as an engine `option` line
 */
export function formatOptionDeclaration(option: OptionDeclaration): string {
  const head = `option name ${option.name} type ${option.type}`;
  switch (option.type) {
    case 'check':
      return `${head} default ${option.default}`;
    case 'spin':
      return `${head} default ${option.default} min ${option.min} max ${option.max}`;
    case 'combo':
      return [`${head} default ${option.default}`, ...option.vars.map((v) => `var ${v}`)].join(' ');
    case 'button':
      return head;
    case 'string':
      return `${head} default ${option.default === '' ? EMPTY_STRING : option.default}`;
  }
}

/**
 * Raw fields collected before the declaration is typed
 */
interface RawFields {
  default?: string;
  min?: string;
  max?: string;
  vars: string[];
}

/**
 * Read the text of a field value: every token up to the next field keyword,
 * kept with its original spacing
 */
function readFieldValue(stream: TokenStream): string | undefined {
  let first: Token | undefined;
  let last: Token | undefined;
  for (let next = stream.peek(); next && !isFieldKeyword(next.text); next = stream.peek()) {
    stream.nextToken();
    first ??= next;
    last = next;
  }
  if (!first || !last) return undefined;
  return stream.slice(first.start, last.end);
}

/**
 * Parse an engine `option` line back into a declaration
 */
export function parseOptionDeclaration(line: string): ParseResult<OptionDeclaration> {
  const stream = new TokenStream(line);

  if (stream.nextToken()?.text !== 'option') return fail('UnknownOpt');
  if (stream.nextToken()?.text !== 'name') return fail('What');

  // Name runs up to the `type` keyword, spacing preserved
  let first: Token | undefined;
  let last: Token | undefined;
  for (let next = stream.nextToken(); next && next.text !== 'type'; next = stream.nextToken()) {
    first ??= next;
    last = next;
  }
  if (!first || !last || stream.done) return fail('What');
  const name = stream.slice(first.start, last.end);

  const typeToken = stream.nextToken();
  if (!typeToken) return fail('What');
  if (!isOptionType(typeToken.text)) return fail('UnknownOpt');

  const fields: RawFields = { vars: [] };
  for (let keyword = stream.nextToken(); keyword; keyword = stream.nextToken()) {
    if (!isFieldKeyword(keyword.text)) return fail('UnknownOpt');
    const value = readFieldValue(stream);
    if (value === undefined) return fail('What');
    if (keyword.text === 'var') {
      fields.vars.push(value);
    } else {
      fields[keyword.text] = value;
    }
  }

  return typeDeclaration(typeToken.text, name, fields);
}

function typeDeclaration(
  type: OptionType,
  name: string,
  fields: RawFields,
): ParseResult<OptionDeclaration> {
  switch (type) {
    case 'button':
      return ok({ type, name });

    case 'check':
      if (fields.default === undefined) return fail('What');
      if (fields.default !== 'true' && fields.default !== 'false') return fail('BadBool');
      return ok({ type, name, default: fields.default === 'true' });

    case 'spin': {
      if (fields.default === undefined || fields.min === undefined || fields.max === undefined) {
        return fail('What');
      }
      const def = readSigned(fields.default);
      const min = readSigned(fields.min);
      const max = readSigned(fields.max);
      if (def === undefined || min === undefined || max === undefined) return fail('BadNumber');
      return ok({ type, name, default: def, min, max });
    }

    case 'combo':
      if (fields.default === undefined) return fail('What');
      return ok({ type, name, default: fields.default, vars: fields.vars });

    case 'string': {
      const def = fields.default ?? '';
      return ok({ type, name, default: def === EMPTY_STRING ? '' : def });
    }
  }
}

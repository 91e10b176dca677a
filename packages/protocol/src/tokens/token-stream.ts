/**
 * Whitespace tokenizer over a single command line
 */

/**
 * A token and its position in the line
 */
export interface Token {
  readonly text: string;
  /** Offset of the first character */
  readonly start: number;
  /** Offset one past the last character */
  readonly end: number;
}

// ASCII whitespace: space, tab, LF, VT, FF, CR
function isSpace(code: number): boolean {
  return code === 0x20 || (code >= 0x09 && code <= 0x0d);
}

/**
 * Lazy, single-pass view over the tokens of a line.
 *
 * Besides token-by-token reading, the stream can hand back the unconsumed
 * rest of the line exactly as written, which free-text payloads
 * (`setoption ... value`, `info string`) need.
 */
export class TokenStream implements IterableIterator<Token> {
  private pos = 0;
  private peeked: Token | undefined;

  constructor(readonly line: string) {}

  /**
   * Next token without consuming it
   */
  peek(): Token | undefined {
    if (this.peeked === undefined) {
      this.peeked = this.scan();
    }
    return this.peeked;
  }

  /**
   * Consume and return the next token, or undefined at end of line
   */
  nextToken(): Token | undefined {
    const token = this.peek();
    this.peeked = undefined;
    return token;
  }

  next(): IteratorResult<Token> {
    const token = this.nextToken();
    return token === undefined ? { done: true, value: undefined } : { done: false, value: token };
  }

  [Symbol.iterator](): IterableIterator<Token> {
    return this;
  }

  /**
   * True when no tokens are left
   */
  get done(): boolean {
    return this.peek() === undefined;
  }

  /**
   * The rest of the line verbatim, minus the whitespace separating it from
   * the last consumed token. Consumes the stream.
   */
  remainder(): string {
    const from = this.peeked !== undefined ? this.peeked.start : this.skipSpace(this.pos);
    this.peeked = undefined;
    this.pos = this.line.length;
    return this.line.slice(from);
  }

  /**
   * Original text between two offsets, used to keep the spacing of
   * multi-token values
   */
  slice(start: number, end: number): string {
    return this.line.slice(start, end);
  }

  private skipSpace(from: number): number {
    let i = from;
    while (i < this.line.length && isSpace(this.line.charCodeAt(i))) i++;
    return i;
  }

  private scan(): Token | undefined {
    const start = this.skipSpace(this.pos);
    if (start >= this.line.length) {
      this.pos = start;
      return undefined;
    }
    let end = start;
    while (end < this.line.length && !isSpace(this.line.charCodeAt(end))) end++;
    this.pos = end;
    return { text: this.line.slice(start, end), start, end };
  }
}

/**
 * Convenience constructor
 */
export function tokenize(line: string): TokenStream {
  return new TokenStream(line);
}

import { describe, it, expect } from 'vitest';

import {
  UciParseError,
  describeUciError,
  formatMoves,
  isUciMove,
  parseMove,
  unwrap,
  ok,
} from '../index.js';

describe('Error taxonomy', () => {
  describe('describeUciError', () => {
    it('describes plain kinds', () => {
      expect(describeUciError({ kind: 'MissingCmd' })).toBe('empty command line');
      expect(describeUciError({ kind: 'NothingSetForGo' })).toBe(
        'go needs at least one search limit',
      );
    });

    it('includes the field and raw token for BadMillis', () => {
      expect(describeUciError({ kind: 'BadMillis', field: 'btime', raw: '-5' })).toBe(
        'expected milliseconds for btime, got "-5"',
      );
    });
  });

  describe('UciParseError', () => {
    it('should be instanceof Error', () => {
      const error = new UciParseError({ kind: 'GoErr' });
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('UciParseError');
      expect(error.kind).toBe('GoErr');
      expect(error.message).toBe('go keyword is missing its argument');
      expect(error.line).toBeUndefined();
    });
  });

  describe('unwrap', () => {
    it('returns the value of a success', () => {
      expect(unwrap(ok(42))).toBe(42);
    });

    it('throws on failure', () => {
      expect(() => unwrap({ success: false, error: { kind: 'What' } }, 'x')).toThrow(
        'malformed command',
      );
    });
  });
});

describe('Move tokens', () => {
  it('accepts coordinate notation', () => {
    expect(isUciMove('e2e4')).toBe(true);
    expect(isUciMove('e7e8q')).toBe(true);
    expect(isUciMove('e1h1')).toBe(true);
    expect(isUciMove('0000')).toBe(true);
  });

  it('rejects other notations', () => {
    expect(isUciMove('Nf3')).toBe(false);
    expect(isUciMove('e2-e4')).toBe(false);
    expect(isUciMove('e7e8k')).toBe(false);
    expect(isUciMove('i2i4')).toBe(false);
    expect(isUciMove('E2E4')).toBe(false);
  });

  it('parses with the What error kind', () => {
    expect(parseMove('b1c3')).toEqual({ success: true, value: 'b1c3' });
    expect(parseMove('O-O')).toEqual({ success: false, error: { kind: 'What' } });
  });

  it('formats a move sequence', () => {
    expect(formatMoves(['e2e4', 'e7e5'])).toBe('e2e4 e7e5');
    expect(formatMoves([])).toBe('');
  });
});

import { describe, it, expect } from 'vitest';
import { CANONICAL_FIELDS } from '../sum/aliases.js';
import {
  FIELD_DECODERS,
  TokenCursor,
  decodeComments,
  decodeCoordinate,
  decodeParameters,
  decodeScalar,
  parseDecimal,
} from '../sum/fields.js';

describe('parseDecimal', () => {
  it('parses plain decimals', () => {
    expect(parseDecimal(' 7 ')).toBe(7);
    expect(parseDecimal('-30.25')).toBe(-30.25);
    expect(parseDecimal('.5')).toBe(0.5);
    expect(parseDecimal('1e2')).toBe(100);
  });

  it('rejects blanks and non-decimal text', () => {
    expect(parseDecimal('')).toBeNull();
    expect(parseDecimal(undefined)).toBeNull();
    expect(parseDecimal('0x10')).toBeNull();
    expect(parseDecimal('12N')).toBeNull();
  });
});

describe('decodeScalar', () => {
  it('takes one token and trims it', () => {
    const cursor = new TokenCursor(['  001 ', 'next']);
    expect(decodeScalar(cursor)).toBe('001');
    expect(cursor.position).toBe(1);
  });

  it('keeps a blank token as an empty string', () => {
    expect(decodeScalar(new TokenCursor(['   ']))).toBe('');
  });

  it('returns null once the tokens run out', () => {
    expect(decodeScalar(new TokenCursor([]))).toBeNull();
  });
});

describe('decodeCoordinate', () => {
  it('applies a southern hemisphere sign', () => {
    expect(decodeCoordinate(new TokenCursor(['12', '30.0', 'S']))).toBe(-12.5);
  });

  it('accepts a lower-case hemisphere', () => {
    expect(decodeCoordinate(new TokenCursor(['12', '0', 'n']))).toBe(12);
  });

  it('trims padded tokens', () => {
    expect(decodeCoordinate(new TokenCursor([' 12', '30.0 ', ' W']))).toBe(-12.5);
  });

  it('always takes three tokens, even when the value is unusable', () => {
    const cursor = new TokenCursor(['ab', '30.0', 'N', 'rest']);
    expect(decodeCoordinate(cursor)).toBeNull();
    expect(cursor.position).toBe(3);
  });

  it('returns null for an unknown hemisphere letter', () => {
    expect(decodeCoordinate(new TokenCursor(['12', '30.0', 'Q']))).toBeNull();
  });

  it('returns null for blank or missing tokens', () => {
    expect(decodeCoordinate(new TokenCursor(['', '', '']))).toBeNull();
    const cursor = new TokenCursor(['12']);
    expect(decodeCoordinate(cursor)).toBeNull();
    expect(cursor.done).toBe(true);
  });
});

describe('decodeParameters', () => {
  it('takes a token made of digits, commas and hyphens', () => {
    const cursor = new TokenCursor(['12,-3', 'A1']);
    expect(decodeParameters(cursor)).toBe('12,-3');
    expect(cursor.position).toBe(1);
  });

  it('leaves anything else for the comments', () => {
    const cursor = new TokenCursor(['A1', 'note']);
    expect(decodeParameters(cursor)).toBeNull();
    expect(cursor.position).toBe(0);
    expect(decodeComments(cursor)).toBe('A1 note');
  });

  it('takes a blank token as an empty list', () => {
    const cursor = new TokenCursor(['      ', 'note']);
    expect(decodeParameters(cursor)).toBe('');
    expect(cursor.position).toBe(1);
  });

  it('drops the column padding around the list', () => {
    const cursor = new TokenCursor(['1,2   ', 'note']);
    expect(decodeParameters(cursor)).toBe('1,2');
  });

  it('returns null when nothing is left', () => {
    expect(decodeParameters(new TokenCursor([]))).toBeNull();
  });
});

describe('decodeComments', () => {
  it('joins the remaining non-blank tokens with single spaces', () => {
    const cursor = new TokenCursor(['skip', 'hello ', '', ' world']);
    cursor.take();
    expect(decodeComments(cursor)).toBe('hello world');
    expect(cursor.done).toBe(true);
  });

  it('skips a blank column between two words', () => {
    const cursor = new TokenCursor(['A', '   ', 'B']);
    expect(decodeComments(cursor)).toBe('A B');
  });

  it('returns an empty string when nothing remains', () => {
    expect(decodeComments(new TokenCursor([]))).toBe('');
  });
});

describe('FIELD_DECODERS', () => {
  it('has one decoder per canonical field', () => {
    expect(Object.keys(FIELD_DECODERS).sort()).toEqual([...CANONICAL_FIELDS].sort());
  });
});

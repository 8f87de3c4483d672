import { describe, it, expect } from 'vitest';

import { classifyArgs, parseArgs, splitArgs } from '../args.js';
import { ParseError } from '../../errors.js';

describe('splitArgs', () => {
  it('splits on whitespace and honours both quote styles', () => {
    expect(splitArgs(`a "b c" 'd e'`)).toEqual(['a', 'b c', 'd e']);
  });

  it('joins adjacent quoted and bare segments into one token', () => {
    expect(splitArgs('key="two words"')).toEqual(['key=two words']);
  });

  it('yields an empty token for ""', () => {
    expect(splitArgs('""')).toEqual(['']);
  });

  it('keeps a backslash that escapes nothing inside double quotes', () => {
    expect(splitArgs('"a\\nb"')).toEqual(['a\\nb']);
  });

  it('escapes any character outside quotes', () => {
    expect(splitArgs('a\\ b c')).toEqual(['a b', 'c']);
  });

  it('rejects a dangling escape with its absolute offset', () => {
    expect(() => splitArgs('x\\', 10)).toThrow(new ParseError('Dangling escape at index 11'));
  });

  it('rejects an unterminated single quote', () => {
    expect(() => splitArgs("it's")).toThrow('Unterminated quote at index 2');
  });
});

describe('classifyArgs', () => {
  it('sorts tokens into params and attributes', () => {
    expect(classifyArgs(['one', 'k=v', 'two'])).toEqual({
      attributes: { k: 'v' },
      params: ['one', 'two'],
    });
  });

  it('allows an empty attribute value', () => {
    expect(classifyArgs(['k='])).toEqual({ attributes: { k: '' }, params: [] });
  });

  it('accepts hyphenated keys', () => {
    expect(classifyArgs(['max-depth=3']).attributes).toEqual({ 'max-depth': '3' });
  });
});

describe('parseArgs', () => {
  it('returns nothing for empty text', () => {
    expect(parseArgs('')).toEqual({ attributes: {}, params: [] });
  });
});

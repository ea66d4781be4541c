import { describe, it, expect } from 'vitest';
import { ConcatWords, WhitespaceSplit } from './whitespace';
import { Lowercase } from './lowercase';

describe('WhitespaceSplit', () => {
  const split = new WhitespaceSplit();

  it('splits on runs of any whitespace', () => {
    expect(split.apply('  a\tb\n c  ')).toEqual(['a', 'b', 'c']);
  });

  it('returns no tokens for blank text', () => {
    expect(split.apply('')).toEqual([]);
    expect(split.apply('   ')).toEqual([]);
  });
});

describe('ConcatWords', () => {
  const concat = new ConcatWords();

  it('joins with single spaces', () => {
    expect(concat.apply(['hello', 'big', 'world'])).toBe('hello big world');
  });

  it('joins nothing into empty text', () => {
    expect(concat.apply([])).toBe('');
  });

  it('round-trips single-spaced text through split', () => {
    const text = 'hello big world';
    expect(concat.apply(new WhitespaceSplit().apply(text))).toBe(text);
  });
});

describe('shape misuse', () => {
  it('fails fast when a tokens step is handed whole text', () => {
    expect(() => Reflect.apply(Lowercase.prototype.apply, new Lowercase(), ['abc'])).toThrow(TypeError);
  });

  it('fails fast when the split step is handed tokens', () => {
    expect(() => Reflect.apply(WhitespaceSplit.prototype.apply, new WhitespaceSplit(), [['a']])).toThrow(TypeError);
  });
});

import { describe, it, expect } from 'vitest';
import { RemoveDigits, RemoveEmptyStrings, RemoveNonAlphabet } from './cleanup';

describe('RemoveEmptyStrings', () => {
  const remove = new RemoveEmptyStrings();

  it('drops blank tokens and leaves others untouched', () => {
    expect(remove.apply(['', '  ', 'a', ' b '])).toEqual(['a', ' b ']);
  });

  it('is idempotent', () => {
    const once = remove.apply(['', 'x', '\t']);
    expect(remove.apply(once)).toEqual(once);
  });
});

describe('RemoveDigits', () => {
  const remove = new RemoveDigits();

  it('strips digits and may leave empty tokens', () => {
    expect(remove.apply(['abc123', '2024', 'a1b2'])).toEqual(['abc', '', 'ab']);
  });

  it('is idempotent', () => {
    const once = remove.apply(['r2d2', 'c3po']);
    expect(once).toEqual(['rd', 'cpo']);
    expect(remove.apply(once)).toEqual(once);
  });
});

describe('RemoveNonAlphabet', () => {
  const remove = new RemoveNonAlphabet();

  it('keeps only ASCII letters', () => {
    expect(remove.apply(['héllo!', 'a1_b', '<url>'])).toEqual(['hllo', 'ab', 'url']);
  });

  it('is idempotent', () => {
    const once = remove.apply(['#tag!', 'x-y']);
    expect(remove.apply(once)).toEqual(once);
  });
});

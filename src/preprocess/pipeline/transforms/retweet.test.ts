import { describe, it, expect } from 'vitest';
import { RemoveRT } from './retweet';

describe('RemoveRT', () => {
  it('drops retweet markers at the start of a token', () => {
    expect(new RemoveRT().apply(['RT', 'rt', 'rt:', 'RT!', 'hello'])).toEqual(['hello']);
  });

  it('keeps mixed case and longer words', () => {
    expect(new RemoveRT().apply(['Rt', 'rtx', 'art', 'RTS'])).toEqual(['Rt', 'rtx', 'art', 'RTS']);
  });

  it('treats accented letters as part of the word', () => {
    expect(new RemoveRT().apply(['rté', 'RTñ', 'rt_x', 'rt2'])).toEqual(['rté', 'RTñ', 'rt_x', 'rt2']);
  });
});

import { describe, it, expect } from 'vitest';
import { MentionMask, URLMask } from './mask';

describe('MentionMask', () => {
  it('masks mentions with the default token', () => {
    expect(new MentionMask().apply(['@alice', 'hello'])).toEqual(['<USERNAME>', 'hello']);
  });

  it('masks everything from the @ to the end of the token', () => {
    expect(new MentionMask().apply(['@bob:', 'hi@carol'])).toEqual(['<USERNAME>', 'hi<USERNAME>']);
  });

  it('leaves a lone @ alone', () => {
    expect(new MentionMask().apply(['@'])).toEqual(['@']);
  });

  it('uses a custom token literally', () => {
    expect(new MentionMask('$&').apply(['@x'])).toEqual(['$&']);
  });
});

describe('URLMask', () => {
  it('masks links with the default token', () => {
    expect(new URLMask().apply(['check', 'http://x.co/a'])).toEqual(['check', '<URL>']);
  });

  it('masks https links inside a token', () => {
    expect(new URLMask().apply(['see:https://a.b/c'])).toEqual(['see:<URL>']);
  });

  it('masks a bare scheme', () => {
    expect(new URLMask().apply(['https://'])).toEqual(['<URL>']);
  });

  it('ignores other schemes', () => {
    expect(new URLMask('[link]').apply(['ftp://x.co', 'www.x.co'])).toEqual(['ftp://x.co', 'www.x.co']);
  });
});

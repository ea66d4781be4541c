/**
 * Transform: Strip ASCII punctuation from tokens
 */

import type { Tokens } from '../../../types';
import type { Transform } from '../types';
import { PRESERVED_PUNCTUATION, PUNCTUATION_CHARACTERS } from '../../../constants';
import { splitOnWhitespace } from '../../../utils';

/**
 * Replaces punctuation with spaces and re-splits, so "don't" becomes
 * ["don", "t"] and "!!" disappears. Unless removeAll is set, # @ < > are
 * kept so hashtags, mentions and <URL>/<USERNAME> markers survive.
 */
export class PunctuationStrip implements Transform<Tokens, Tokens> {
  name: string;
  description: string;
  private stripped: Set<string>;

  constructor(removeAll: boolean = false) {
    const preserved: readonly string[] = removeAll ? [] : PRESERVED_PUNCTUATION;
    this.stripped = new Set(Array.from(PUNCTUATION_CHARACTERS).filter(ch => !preserved.includes(ch)));
    this.name = removeAll ? 'punctuation-strip-all' : 'punctuation-strip';
    this.description = removeAll
      ? 'Remove all punctuation from tokens'
      : 'Remove punctuation from tokens, keeping # @ < >';
  }

  apply(words: Tokens): Tokens {
    const out: Tokens = [];

    for (const word of words) {
      const spaced = Array.from(word, ch => (this.stripped.has(ch) ? ' ' : ch)).join('');
      out.push(...splitOnWhitespace(spaced));
    }

    return out;
  }
}

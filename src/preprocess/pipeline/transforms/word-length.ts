/**
 * Transform: Drop tokens shorter than a minimum length
 */

import type { Tokens } from '../../../types';
import type { Transform } from '../types';
import { codePointLength } from '../../../utils';

/**
 * Keeps tokens whose trimmed length is at least minLength, trimmed.
 * minLength <= 0 keeps everything.
 */
export class WordLengthFilter implements Transform<Tokens, Tokens> {
  name = 'word-length';
  description: string;

  constructor(private minLength: number) {
    this.description = `Keep tokens with at least ${minLength} characters`;
  }

  apply(words: Tokens): Tokens {
    const kept: Tokens = [];

    for (const word of words) {
      const trimmed = word.trim();
      if (codePointLength(trimmed) >= this.minLength) {
        kept.push(trimmed);
      }
    }

    return kept;
  }
}

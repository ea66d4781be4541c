/**
 * Transform: Collapse stretched letters ("soooo" -> "so")
 */

import type { Tokens } from '../../../types';
import type { Transform } from '../types';

// Three or more of the same lowercase letter; double letters are real spelling
const REPEATED_LETTER = /([a-z])\1\1+/g;

export class RemoveLetterRepetitions implements Transform<Tokens, Tokens> {
  name = 'remove-letter-repetitions';
  description = 'Collapse 3+ repeated lowercase letters to one';

  apply(words: Tokens): Tokens {
    return words.map(word => word.replace(REPEATED_LETTER, '$1'));
  }
}

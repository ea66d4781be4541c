/**
 * Transforms: Character-level cleanup of tokens
 */

import type { Tokens } from '../../../types';
import type { Transform } from '../types';

const DIGITS = /[0-9]+/g;
const NON_ALPHABET = /[^a-zA-Z]+/g;

export class RemoveEmptyStrings implements Transform<Tokens, Tokens> {
  name = 'remove-empty-strings';
  description = 'Drop blank tokens';

  apply(words: Tokens): Tokens {
    return words.filter(word => word.trim().length > 0);
  }
}

/**
 * Tokens made only of digits become "" and are left for RemoveEmptyStrings
 */
export class RemoveDigits implements Transform<Tokens, Tokens> {
  name = 'remove-digits';
  description = 'Strip digits from tokens';

  apply(words: Tokens): Tokens {
    return words.map(word => word.replace(DIGITS, ''));
  }
}

export class RemoveNonAlphabet implements Transform<Tokens, Tokens> {
  name = 'remove-non-alphabet';
  description = 'Strip everything but a-z and A-Z from tokens';

  apply(words: Tokens): Tokens {
    return words.map(word => word.replace(NON_ALPHABET, ''));
  }
}

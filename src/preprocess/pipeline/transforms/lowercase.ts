/**
 * Transform: Case-fold every token
 */

import type { Tokens } from '../../../types';
import type { Transform } from '../types';

export class Lowercase implements Transform<Tokens, Tokens> {
  name = 'lowercase';
  description = 'Lowercase every token';

  apply(words: Tokens): Tokens {
    return words.map(word => word.toLowerCase());
  }
}

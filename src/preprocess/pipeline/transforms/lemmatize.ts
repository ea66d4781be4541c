/**
 * Transform: Reduce tokens to their dictionary base form
 */

import type { Tokens } from '../../../types';
import type { Transform } from '../types';
import { DictionaryLemmatizer, type Lemmatizer } from '../../../lemmatizer';

/**
 * The lemmatizer is an injected service; errors it throws are not caught.
 */
export class Lemmatize implements Transform<Tokens, Tokens> {
  name = 'lemmatize';
  description = 'Replace tokens with their base form';

  constructor(private lemmatizer: Lemmatizer = new DictionaryLemmatizer()) {}

  apply(words: Tokens): Tokens {
    return words.map(word => this.lemmatizer.lemmatize(word));
  }
}

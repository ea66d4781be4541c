/**
 * Transforms: move between the text and tokens shapes
 */

import type { Text, Tokens } from '../../../types';
import type { Transform } from '../types';
import { splitOnWhitespace } from '../../../utils';

/**
 * Split whole text into tokens on runs of whitespace
 * Usually the first step of a pipeline
 */
export class WhitespaceSplit implements Transform<Text, Tokens> {
  name = 'whitespace-split';
  description = 'Split text into tokens on whitespace';

  apply(text: Text): Tokens {
    return splitOnWhitespace(text);
  }
}

/**
 * Join tokens back into text with single spaces
 * Usually the last step of a pipeline
 */
export class ConcatWords implements Transform<Tokens, Text> {
  name = 'concat-words';
  description = 'Join tokens with a single space';

  apply(words: Tokens): Text {
    return words.join(' ');
  }
}

/**
 * Transforms: Mask user mentions and links with placeholder tokens
 */

import type { Tokens } from '../../../types';
import type { Transform } from '../types';
import { DEFAULT_URL_TOKEN, DEFAULT_USERNAME_TOKEN } from '../../../constants';

const MENTION_PATTERN = /@\S+/g;
const URL_PATTERN = /https?:\/\/\S*/g;

/**
 * Replace "@handle" (and anything after the @ up to whitespace) with a token
 */
export class MentionMask implements Transform<Tokens, Tokens> {
  name = 'mention-mask';
  description: string;

  constructor(private replacementToken: string = DEFAULT_USERNAME_TOKEN) {
    this.description = `Replace @mentions with ${replacementToken}`;
  }

  apply(words: Tokens): Tokens {
    // Function replacer so "$" in the token is taken literally
    return words.map(word => word.replace(MENTION_PATTERN, () => this.replacementToken));
  }
}

/**
 * Replace http(s):// links with a token
 */
export class URLMask implements Transform<Tokens, Tokens> {
  name = 'url-mask';
  description: string;

  constructor(private replacementToken: string = DEFAULT_URL_TOKEN) {
    this.description = `Replace links with ${replacementToken}`;
  }

  apply(words: Tokens): Tokens {
    return words.map(word => word.replace(URL_PATTERN, () => this.replacementToken));
  }
}

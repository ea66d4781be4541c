/**
 * Transform: Drop the retweet marker
 */

import type { Tokens } from '../../../types';
import type { Transform } from '../types';

// Anchored at the token start: "RT", "rt" and "RT:" match, "Rt", "rtx" and "rté" don't
const RT_PATTERN = /^(?:rt|RT)(?![\p{L}\p{M}\p{N}_])/u;

export class RemoveRT implements Transform<Tokens, Tokens> {
  name = 'remove-rt';
  description = 'Drop RT/rt retweet markers';

  apply(words: Tokens): Tokens {
    return words.filter(word => !RT_PATTERN.test(word));
  }
}

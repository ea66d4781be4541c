/**
 * Transforms: Drop tokens by term
 */

import type { Tokens } from '../../../types';
import type { Transform } from '../types';

/**
 * Drop tokens that contain a term anywhere (substring match)
 */
export class RemoveTerm implements Transform<Tokens, Tokens> {
  name = 'remove-term';
  description: string;
  private term: string;

  constructor(term: string, private ignoreCase: boolean = true) {
    this.term = ignoreCase ? term.toLowerCase() : term;
    this.description = `Drop tokens containing "${term}"${ignoreCase ? ' (any case)' : ''}`;
  }

  apply(words: Tokens): Tokens {
    return words.filter(word => {
      const toCompare = this.ignoreCase ? word.toLowerCase() : word;
      return !toCompare.includes(this.term);
    });
  }
}

/**
 * Drop tokens equal to one of the terms
 *
 * With ignoreCase the surviving tokens come out lowercased as well, not
 * just compared lowercased. Kept as observed behavior, see DESIGN.md.
 */
export class RemoveExactTerms implements Transform<Tokens, Tokens> {
  name = 'remove-exact-terms';
  description: string;
  private terms: Set<string>;

  constructor(terms: readonly string[], private ignoreCase: boolean = true) {
    this.terms = new Set(ignoreCase ? terms.map(t => t.toLowerCase()) : terms);
    this.description = `Drop tokens equal to one of ${this.terms.size} terms${ignoreCase ? ' (any case)' : ''}`;
  }

  apply(words: Tokens): Tokens {
    const kept: Tokens = [];

    for (const raw of words) {
      const word = this.ignoreCase ? raw.toLowerCase() : raw;
      if (!this.terms.has(word)) {
        kept.push(word);
      }
    }

    return kept;
  }
}

/**
 * Default lemmatizer backed by wink-lemmatizer's English noun dictionary
 */

import winkLemmatizer from 'wink-lemmatizer';
import { MIN_LEMMA_LENGTH } from '../constants';
import type { Lemmatizer, NounLookup } from './types';

const LEMMATIZABLE = /^[a-z]+$/;

/**
 * Noun lemmatizer: "cats" -> "cat", "geese" -> "goose". A candidate base
 * form is only used when the dictionary knows it, so "this" and "status"
 * stay as they are.
 *
 * Only lowercase alphabetic tokens of MIN_LEMMA_LENGTH or more are looked
 * up; placeholders like "<url>", hashtags and short words pass through.
 * Results are memoized per instance.
 */
export class DictionaryLemmatizer implements Lemmatizer {
  private cache = new Map<string, string>();

  constructor(private lookup: NounLookup = winkLemmatizer.noun) {}

  lemmatize(token: string): string {
    if (token.length < MIN_LEMMA_LENGTH || !LEMMATIZABLE.test(token)) {
      return token;
    }

    const cached = this.cache.get(token);
    if (cached !== undefined) {
      return cached;
    }

    const lemma = this.lookup(token) || token;
    this.cache.set(token, lemma);
    return lemma;
  }

  get cacheSize(): number {
    return this.cache.size;
  }
}

/**
 * Lemmatizer service types
 */

/**
 * Maps a token to its dictionary base form. Tokens the service does not
 * know come back unchanged.
 */
export interface Lemmatizer {
  lemmatize(token: string): string;
}

/** Dictionary lookup for nouns: base form, or the word itself when unknown */
export type NounLookup = (word: string) => string;

/**
 * Configuration constants
 */

// Replacement tokens for masked mentions and links
export const DEFAULT_USERNAME_TOKEN = '<USERNAME>';
export const DEFAULT_URL_TOKEN = '<URL>';

// Every ASCII punctuation character
export const PUNCTUATION_CHARACTERS = '!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~';

// Kept by PunctuationStrip unless removeAll is set (hashtags, mentions, <URL>/<USERNAME> markers)
export const PRESERVED_PUNCTUATION = ['#', '@', '<', '>'] as const;

// Tokens this short never go through the lemmatizer
export const MIN_LEMMA_LENGTH = 3;

// Environment-backed settings
export const VERBOSE = process.env.PREPROCESS_VERBOSE === 'true';
const minWordLength = parseInt(process.env.PREPROCESS_MIN_WORD_LENGTH || '', 10);
export const DEFAULT_MIN_WORD_LENGTH = Number.isNaN(minWordLength) ? 2 : minWordLength;
export const DEFAULT_INPUT_FILE = process.env.PREPROCESS_INPUT_FILE || 'tweets.json';

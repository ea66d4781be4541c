export { WhitespaceSplit, ConcatWords } from './whitespace';
export { Lowercase } from './lowercase';
export { WordLengthFilter } from './word-length';
export { PunctuationStrip } from './punctuation';
export { MentionMask, URLMask } from './mask';
export { RemoveRT } from './retweet';
export { RemoveLetterRepetitions } from './repetitions';
export { RemoveTerm, RemoveExactTerms } from './terms';
export { RemoveEmptyStrings, RemoveDigits, RemoveNonAlphabet } from './cleanup';
export { Lemmatize } from './lemmatize';

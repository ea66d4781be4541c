export type { Lemmatizer, NounLookup } from './types';
export { DictionaryLemmatizer } from './dictionary';

// wink-lemmatizer ships no type declarations and has no @types package
declare module 'wink-lemmatizer' {
  interface WinkLemmatizer {
    noun(word: string): string;
    verb(word: string): string;
    adjective(word: string): string;
  }

  const lemmatizer: WinkLemmatizer;
  export default lemmatizer;
}

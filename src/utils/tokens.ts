/**
 * Token helpers shared by the transforms
 */

const WHITESPACE = /\s+/;

/**
 * Split on runs of whitespace, never yielding empty tokens
 * ("  a  b " -> ["a", "b"], "   " -> [])
 */
export function splitOnWhitespace(text: string): string[] {
  return text.split(WHITESPACE).filter(word => word.length > 0);
}

/**
 * Length in code points, so an emoji counts as one character
 */
export function codePointLength(word: string): number {
  return Array.from(word).length;
}

export { splitOnWhitespace, codePointLength } from './tokens';

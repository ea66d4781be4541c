export type { Text, Tokens, Shape, TextRecord, Tweet } from './text';

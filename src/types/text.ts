/**
 * Text shapes flowing through a preprocessing pipeline
 */

/** Whole-text shape: the entire item as one string */
export type Text = string;

/** Word-sequence shape: ordered whitespace-free tokens */
export type Tokens = string[];

export type Shape = Text | Tokens;

/**
 * Any record carrying a text field. Other fields are metadata the
 * pipeline copies but never reads.
 */
export interface TextRecord<T extends Shape = Shape> {
  text: T;
}

export interface Tweet<T extends Shape = Text> extends TextRecord<T> {
  id: string;
  author?: string;
  createdAt?: string;
  label?: string;
}

/**
 * Reading tweet batches from and writing results to JSON files
 */

import { readFileSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import type { Text, TextRecord } from '../types';

/** A record read from disk: a text field plus whatever metadata it carried */
export type InputRecord = TextRecord<Text> & Record<string, unknown>;

export type PreprocessInput =
  | { kind: 'strings'; items: string[] }
  | { kind: 'records'; items: InputRecord[] };

export class InputFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputFormatError';
  }
}

function isInputRecord(value: unknown): value is InputRecord {
  return typeof value === 'object'
    && value !== null
    && !Array.isArray(value)
    && 'text' in value
    && typeof value.text === 'string';
}

/**
 * Validate parsed JSON: an array of strings, or an array of objects with a
 * string "text" field. An empty array counts as strings.
 */
export function parseInput(data: unknown, source: string = 'input'): PreprocessInput {
  if (!Array.isArray(data)) {
    throw new InputFormatError(`${source} must be a JSON array`);
  }

  const strings: string[] = [];
  const records: InputRecord[] = [];

  data.forEach((item: unknown, index) => {
    if (typeof item === 'string') {
      strings.push(item);
    } else if (isInputRecord(item)) {
      records.push(item);
    } else {
      throw new InputFormatError(`${source}[${index}] is neither a string nor an object with a string "text" field`);
    }
  });

  if (strings.length > 0 && records.length > 0) {
    throw new InputFormatError(`${source} mixes strings and records`);
  }

  return records.length > 0
    ? { kind: 'records', items: records }
    : { kind: 'strings', items: strings };
}

export function loadInput(filename: string): PreprocessInput {
  const inputPath = resolve(process.cwd(), filename);
  const raw = readFileSync(inputPath, 'utf8');

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new InputFormatError(`${inputPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parseInput(data, inputPath);
}

export function defaultOutputFile(inputFile: string): string {
  return inputFile.replace(/\.json$/i, '') + '_preprocessed.json';
}

export function exportJSON(data: unknown[], filename: string): void {
  const outputPath = resolve(process.cwd(), filename);
  writeFileSync(outputPath, JSON.stringify(data, null, 2));
  console.log(`[IO] Exported ${data.length} items to ${outputPath}`);
}

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { InputFormatError, defaultOutputFile, exportJSON, loadInput, parseInput } from './io';

describe('parseInput', () => {
  it('reads an array of strings', () => {
    expect(parseInput(['a', 'b'])).toEqual({ kind: 'strings', items: ['a', 'b'] });
  });

  it('reads an array of records with their metadata', () => {
    expect(parseInput([{ id: '1', text: 'hi', lang: 'en' }])).toEqual({
      kind: 'records',
      items: [{ id: '1', text: 'hi', lang: 'en' }],
    });
  });

  it('treats an empty array as strings', () => {
    expect(parseInput([])).toEqual({ kind: 'strings', items: [] });
  });

  it('rejects anything but an array', () => {
    expect(() => parseInput({ text: 'hi' })).toThrow(new InputFormatError('input must be a JSON array'));
  });

  it('rejects items without a string text field', () => {
    expect(() => parseInput(['ok', 1], 'tweets.json')).toThrow(
      'tweets.json[1] is neither a string nor an object with a string "text" field'
    );
    expect(() => parseInput([{ text: 5 }])).toThrow(InputFormatError);
    expect(() => parseInput([null])).toThrow(InputFormatError);
  });

  it('rejects a mix of strings and records', () => {
    expect(() => parseInput(['a', { text: 'b' }])).toThrow('input mixes strings and records');
  });
});

describe('defaultOutputFile', () => {
  it('adds a suffix before the extension', () => {
    expect(defaultOutputFile('data/tweets.json')).toBe('data/tweets_preprocessed.json');
    expect(defaultOutputFile('tweets')).toBe('tweets_preprocessed.json');
  });
});

describe('file round trip', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'preprocess-io-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('loads a JSON file', () => {
    const file = join(dir, 'in.json');
    writeFileSync(file, JSON.stringify(['hello']));
    expect(loadInput(file)).toEqual({ kind: 'strings', items: ['hello'] });
  });

  it('rejects a file that is not JSON', () => {
    const file = join(dir, 'bad.json');
    writeFileSync(file, '[oops');
    expect(() => loadInput(file)).toThrow(InputFormatError);
  });

  it('writes pretty JSON and logs where it went', () => {
    const file = join(dir, 'out.json');
    exportJSON(['a', 'b'], file);

    expect(readFileSync(file, 'utf8')).toBe('[\n  "a",\n  "b"\n]');
    expect(console.log).toHaveBeenCalledWith(`[IO] Exported 2 items to ${file}`);
  });
});

/**
 * Preprocessing pipelines - Central Registry
 *
 * ========================================
 * THIS IS THE SINGLE SOURCE OF TRUTH
 * FOR STEP ORDER IN THE STANDARD PIPELINES
 * ========================================
 *
 * To add, remove, or reorder steps, modify the builders below.
 * The batch drivers at the bottom run any Text -> Text pipeline.
 */

import _ from 'lodash';
import type { Shape, Text, TextRecord } from '../../types';
import type { BatchStats, PipelineResult, RunOptions, StepInfo, Transform } from './types';
import { DEFAULT_MIN_WORD_LENGTH, VERBOSE } from '../../constants';
import { DictionaryLemmatizer, type Lemmatizer } from '../../lemmatizer';

// Import combinators
import { Pipeline } from './combinators';

// Import all transforms
import {
  ConcatWords,
  Lemmatize,
  Lowercase,
  MentionMask,
  PunctuationStrip,
  RemoveDigits,
  RemoveEmptyStrings,
  RemoveExactTerms,
  RemoveLetterRepetitions,
  RemoveNonAlphabet,
  RemoveRT,
  URLMask,
  WhitespaceSplit,
  WordLengthFilter,
} from './transforms';

// Re-export types and building blocks
export type { Transform, StepInfo, RunOptions, BatchStats, PipelineResult } from './types';
export { Pipeline } from './combinators';
export * from './transforms';

export type PresetName = 'tweet' | 'sentiment';

export interface PresetOptions {
  /** Strip # @ < > as well (tweet preset only; sentiment always strips them) */
  removeAllPunctuation?: boolean;
  /** Lemmatizer to run; the tweet preset skips lemmatization without one */
  lemmatizer?: Lemmatizer;
  minWordLength?: number;
  stopTerms?: readonly string[];
}

/**
 * ========================================
 * PIPELINE 1: TWEET NORMALIZATION
 * ========================================
 * Masks mentions and links, drops RT, strips punctuation, case-folds
 * and collapses stretched letters.
 * Input: Text, Output: Text
 */
export function tweetPipeline(options: PresetOptions = {}): Pipeline<Text, Text> {
  const normalized = Pipeline.from(new WhitespaceSplit())
    .then(new MentionMask())
    .then(new URLMask())
    .then(new RemoveRT())
    .then(new PunctuationStrip(options.removeAllPunctuation ?? false))
    .then(new Lowercase())
    .then(new RemoveLetterRepetitions());

  const lemmatized = options.lemmatizer
    ? normalized.then(new Lemmatize(options.lemmatizer))
    : normalized;

  return lemmatized
    .then(new RemoveEmptyStrings())
    .then(new ConcatWords());
}

/**
 * ========================================
 * PIPELINE 2: SENTIMENT FEATURES
 * ========================================
 * Everything in the tweet pipeline, then letters only, stop terms and
 * short words removed, and lemmatized.
 * Input: Text, Output: Text
 */
export function sentimentPipeline(options: PresetOptions = {}): Pipeline<Text, Text> {
  return Pipeline.from(new WhitespaceSplit())
    .then(new MentionMask())
    .then(new URLMask())
    .then(new RemoveRT())
    .then(new PunctuationStrip(true))
    .then(new Lowercase())
    .then(new RemoveLetterRepetitions())
    .then(new RemoveDigits())
    .then(new RemoveNonAlphabet())
    .then(new RemoveExactTerms(options.stopTerms ?? []))
    .then(new WordLengthFilter(options.minWordLength ?? DEFAULT_MIN_WORD_LENGTH))
    .then(new Lemmatize(options.lemmatizer ?? new DictionaryLemmatizer()))
    .then(new RemoveEmptyStrings())
    .then(new ConcatWords());
}

export const PRESET_NAMES: readonly PresetName[] = ['tweet', 'sentiment'];

const PRESETS: Record<PresetName, (options?: PresetOptions) => Pipeline<Text, Text>> = {
  tweet: tweetPipeline,
  sentiment: sentimentPipeline,
};

export function isPresetName(name: string): name is PresetName {
  return PRESET_NAMES.some(preset => preset === name);
}

export function createPreset(name: PresetName, options: PresetOptions = {}): Pipeline<Text, Text> {
  return PRESETS[name](options);
}

/**
 * Get a summary of all preset pipelines for documentation/debugging
 */
export function getPipelineRegistry(): {
  pipeline: PresetName;
  steps: StepInfo[];
}[] {
  return PRESET_NAMES.map(name => ({
    pipeline: name,
    steps: [...createPreset(name).steps],
  }));
}

/**
 * Run strings through a Text -> Text pipeline, dropping items that end up
 * blank. Survivors are trimmed. An error from any step aborts the batch.
 */
export function runOnStringsWithStats(
  batch: readonly string[],
  pipeline: Transform<Text, Text>,
  options: RunOptions = {}
): PipelineResult<string> {
  const startedAt = Date.now();
  const output: string[] = [];
  const removed: string[] = [];

  for (const item of batch) {
    const result = pipeline.apply(item).trim();
    if (result) {
      output.push(result);
    } else {
      removed.push(item);
    }
  }

  const stats: BatchStats = {
    label: options.label ?? pipeline.name,
    inputCount: batch.length,
    keptCount: output.length,
    removedCount: removed.length,
    durationMs: Date.now() - startedAt,
  };

  if (options.verbose ?? VERBOSE) {
    logPipeline(pipeline, options.label);
    printBatchStats(stats);
  }

  return { output, removed, stats };
}

export function runOnStrings(
  batch: readonly string[],
  pipeline: Transform<Text, Text>,
  options: RunOptions = {}
): string[] {
  return runOnStringsWithStats(batch, pipeline, options).output;
}

/**
 * Run records through a pipeline, replacing each record's text field.
 *
 * The batch is deep-copied before any step runs (class instances keep
 * their prototype, function fields are shared); the caller's records are
 * never touched. Every record comes back, in order, even if its text is
 * now empty.
 */
export function runOnRecords<I extends Shape, O extends Shape, R extends TextRecord<I>>(
  batch: readonly R[],
  pipeline: Transform<I, O>,
  options: RunOptions = {}
): Array<Omit<R, 'text'> & TextRecord<O>> {
  const startedAt = Date.now();
  const copies = _.cloneDeep(batch);

  const output = copies.map((record): Omit<R, 'text'> & TextRecord<O> =>
    Object.assign(record, { text: pipeline.apply(record.text) })
  );

  if (options.verbose ?? VERBOSE) {
    logPipeline(pipeline, options.label);
    printBatchStats({
      label: options.label ?? pipeline.name,
      inputCount: batch.length,
      keptCount: output.length,
      removedCount: 0,
      durationMs: Date.now() - startedAt,
    });
  }

  return output;
}

function logPipeline<I extends Shape, O extends Shape>(pipeline: Transform<I, O>, label?: string): void {
  const prefix = label ? `[${label}] ` : '';
  const steps = pipeline instanceof Pipeline
    ? pipeline.steps.map(s => s.name).join(' -> ')
    : pipeline.name;
  console.log(`${prefix}[${steps}]`);
}

/**
 * Print a summary of batch stats
 */
export function printBatchStats(stats: BatchStats): void {
  const emptied = stats.removedCount > 0 ? ` (${stats.removedCount} empty)` : '';
  console.log(`[${stats.label}] ${stats.keptCount}/${stats.inputCount} kept${emptied} in ${stats.durationMs}ms`);
}

/**
 * Main entry point for preprocess-tweets
 */

import { DEFAULT_INPUT_FILE, VERBOSE } from '../constants';
import { DictionaryLemmatizer } from '../lemmatizer';
import { defaultOutputFile, exportJSON, loadInput } from './io';
import {
  createPreset,
  getPipelineRegistry,
  isPresetName,
  runOnRecords,
  runOnStrings,
  PRESET_NAMES,
  type PresetName,
} from './pipeline';

// ============ CLI Arguments ============

export interface PreprocessCLIOptions {
  file: string;
  out: string;
  preset: PresetName;
  removeAll: boolean;
  lemmatize: boolean;
  minLength?: number;
  verbose: boolean;
  list: boolean;
  help: boolean;
}

function getArg(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1) return undefined;
  const value = args[idx + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`${flag} needs a value`);
  }
  return value;
}

export function parseArgs(args: string[] = process.argv.slice(2)): PreprocessCLIOptions {
  const file = getArg(args, '--file') ?? DEFAULT_INPUT_FILE;

  const preset = getArg(args, '--preset') ?? 'tweet';
  if (!isPresetName(preset)) {
    throw new Error(`--preset must be one of: ${PRESET_NAMES.join(', ')} (got "${preset}")`);
  }

  const rawMinLength = getArg(args, '--min-length');
  let minLength: number | undefined;
  if (rawMinLength !== undefined) {
    if (!/^-?\d+$/.test(rawMinLength)) {
      throw new Error(`--min-length must be an integer (got "${rawMinLength}")`);
    }
    minLength = parseInt(rawMinLength, 10);
  }

  return {
    file,
    out: getArg(args, '--out') ?? defaultOutputFile(file),
    preset,
    removeAll: args.includes('--remove-all'),
    lemmatize: args.includes('--lemmatize'),
    minLength,
    verbose: args.includes('--verbose') || VERBOSE,
    list: args.includes('--list'),
    help: args.includes('--help') || args.includes('-h'),
  };
}

export function showHelp(): void {
  console.log(`
Usage: tsx preprocess-tweets.ts [options]

Normalizes a JSON array of tweets (strings, or objects with a "text" field).
Strings that end up empty are dropped; records are always kept.

Options:
  --file <path>        Input JSON file (default: ${DEFAULT_INPUT_FILE})
  --out <path>         Output JSON file (default: <file>_preprocessed.json)
  --preset <name>      ${PRESET_NAMES.join(' | ')} (default: tweet)
  --remove-all         Strip # @ < > too (tweet preset)
  --lemmatize          Lemmatize tokens (tweet preset; sentiment always does)
  --min-length <n>     Minimum word length (sentiment preset)
  --verbose            Log pipeline steps and batch stats
  --list               Print the preset pipelines and exit
  --help, -h           Show this help message

Environment Variables:
  PREPROCESS_INPUT_FILE        Default for --file
  PREPROCESS_MIN_WORD_LENGTH   Default for --min-length
  PREPROCESS_VERBOSE           "true" to always log

Examples:
  tsx preprocess-tweets.ts --file tweets.json
  tsx preprocess-tweets.ts --file tweets.json --preset sentiment --min-length 3
`);
}

export function printRegistry(): void {
  for (const { pipeline, steps } of getPipelineRegistry()) {
    console.log(`${pipeline}:`);
    steps.forEach((step, i) => console.log(`  ${i + 1}. [${step.name}] ${step.description}`));
  }
}

// ============ Main ============

export function main(args: string[] = process.argv.slice(2)): void {
  const options = parseArgs(args);

  if (options.help) {
    showHelp();
    return;
  }

  if (options.list) {
    printRegistry();
    return;
  }

  const input = loadInput(options.file);
  const pipeline = createPreset(options.preset, {
    removeAllPunctuation: options.removeAll,
    lemmatizer: options.lemmatize ? new DictionaryLemmatizer() : undefined,
    minWordLength: options.minLength,
  });
  const runOptions = { verbose: options.verbose, label: options.preset };

  const output = input.kind === 'strings'
    ? runOnStrings(input.items, pipeline, runOptions)
    : runOnRecords(input.items, pipeline, runOptions);

  console.log(`Preprocessed ${input.items.length} ${input.kind} -> ${output.length} items`);
  exportJSON(output, options.out);
}

#!/usr/bin/env tsx
/// <reference types="node" />
/**
 * Normalize a batch of tweets for downstream analysis
 *
 * Usage:
 *   tsx preprocess-tweets.ts --file tweets.json
 *   tsx preprocess-tweets.ts --help
 */

import 'dotenv/config';
import { main } from './src/preprocess';

try {
  main();
} catch (error) {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
}

/**
 * Pipeline/Transform pattern types
 */

import type { Shape } from '../../types';

/**
 * Base transform interface - every preprocessing step implements this
 *
 * I and O are the input and output shapes (Text or Tokens). The pipeline
 * builder only chains a step whose input matches the previous output.
 */
export interface Transform<I extends Shape, O extends Shape> {
  /** Unique identifier for the transform */
  name: string;
  /** Human-readable description shown in logs */
  description: string;
  /** The actual transform logic */
  apply(input: I): O;
}

/**
 * Name and description of one pipeline step
 */
export interface StepInfo {
  name: string;
  description: string;
}

/**
 * Options accepted by the batch drivers
 */
export interface RunOptions {
  verbose?: boolean;
  label?: string;
}

/**
 * Stats tracked per batch execution
 */
export interface BatchStats {
  label: string;
  inputCount: number;
  keptCount: number;
  removedCount: number;
  durationMs: number;
}

/**
 * String batch execution result
 */
export interface PipelineResult<T> {
  output: T[];
  removed: T[];
  stats: BatchStats;
}

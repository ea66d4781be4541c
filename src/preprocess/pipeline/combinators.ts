/**
 * Pipeline combinator for chaining transforms with matching shapes
 */

import type { Shape } from '../../types';
import type { StepInfo, Transform } from './types';

/**
 * Pipeline: an ordered chain of transforms, applied left to right
 *
 * Built with Pipeline.from(first).then(next)... Each then() only accepts a
 * transform whose input shape is the current output shape, so a tokens step
 * after ConcatWords (or a text step after WhitespaceSplit) fails to compile.
 * A pipeline is itself a Transform and can be chained into another one.
 */
export class Pipeline<I extends Shape, O extends Shape> implements Transform<I, O> {
  name: string;
  description: string;

  private constructor(
    readonly steps: readonly StepInfo[],
    private readonly run: (input: I) => O
  ) {
    this.name = steps.map(s => s.name).join('->');
    this.description = `Apply in order: ${steps.map(s => s.name).join(' -> ')}`;
  }

  static from<I extends Shape, O extends Shape>(first: Transform<I, O>): Pipeline<I, O> {
    return new Pipeline<I, O>(stepsOf(first), input => first.apply(input));
  }

  then<N extends Shape>(next: Transform<O, N>): Pipeline<I, N> {
    const run = this.run;
    return new Pipeline<I, N>([...this.steps, ...stepsOf(next)], input => next.apply(run(input)));
  }

  apply(input: I): O {
    return this.run(input);
  }
}

function stepsOf<I extends Shape, O extends Shape>(transform: Transform<I, O>): readonly StepInfo[] {
  if (transform instanceof Pipeline) {
    return transform.steps;
  }
  return [{ name: transform.name, description: transform.description }];
}

/**
 * Evaluation over the tagged node union.
 *
 * `evaluate` is the single recursive dispatch over `kind`; it reuses each
 * node's own `combine`/`apply`, so it agrees exactly with `node.eval(x)`.
 */

import type { Func } from './AST.js';

export interface SampleOptions {
  from: number;
  to: number;
  steps: number; // Number of intervals; steps + 1 points are produced
}

export interface SamplePoint {
  x: number;
  y: number;
}

const DEFAULT_SAMPLE_OPTIONS: SampleOptions = {
  from: 0,
  to: 1,
  steps: 10
};

/**
 * Evaluate f at x
 */
export function evaluate(f: Func, x: number): number {
  switch (f.kind) {
    case 'constant':
      return f.value;

    case 'identity':
      return x;

    case 'sum':
    case 'product':
      return f.combine(evaluate(f.f, x), evaluate(f.g, x));

    case 'power':
    case 'expBase':
    case 'exp':
    case 'logBase':
    case 'ln':
    case 'sin':
    case 'cos':
    case 'tan':
    case 'asin':
    case 'acos':
    case 'atan':
    case 'sqrt':
    case 'cbrt':
    case 'nthRoot':
      return f.apply(evaluate(f.f, x));
  }
}

/**
 * Evaluate f at each input, preserving order
 */
export function evaluateAt(f: Func, xs: readonly number[]): number[] {
  return xs.map(x => evaluate(f, x));
}

/**
 * Evaluate f on an evenly spaced grid from `from` to `to` inclusive
 *
 * @throws {RangeError} If steps is not a positive integer
 */
export function sample(f: Func, options: Partial<SampleOptions> = {}): SamplePoint[] {
  const from = options.from ?? DEFAULT_SAMPLE_OPTIONS.from;
  const to = options.to ?? DEFAULT_SAMPLE_OPTIONS.to;
  const steps = options.steps ?? DEFAULT_SAMPLE_OPTIONS.steps;

  if (!Number.isInteger(steps) || steps <= 0) {
    throw new RangeError(`steps must be a positive integer, got ${steps}`);
  }

  const points: SamplePoint[] = [];
  for (let i = 0; i <= steps; i++) {
    const x = from + ((to - from) * i) / steps;
    points.push({ x, y: evaluate(f, x) });
  }
  return points;
}

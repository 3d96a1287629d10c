/**
 * Test helper utilities shared by the function algebra specs
 */

import { expect } from 'vitest';
import type { Func } from '../src/func/AST.js';
import {
  constant,
  identity,
  sum,
  product,
  power,
  expWithBase,
  expNatural,
  logWithBase,
  logNatural,
  sin,
  cos,
  tan,
  asin,
  acos,
  atan,
  sqrt,
  cbrt,
  nthRoot
} from '../src/func/Builders.js';

/**
 * Finite inputs covering negatives, zero, fractions and larger magnitudes
 */
export const SAMPLE_INPUTS: readonly number[] = [
  -10, -2.5, -1, -0.5, 0, 0.25, 1, 2, Math.PI, 7.75, 123.456
];

/**
 * Every unary node kind, with fixed structural parameters
 */
export const UNARY_BUILDERS: ReadonlyArray<[string, (f: Func) => Func]> = [
  ['power', f => power(f, 2)],
  ['expBase', f => expWithBase(2, f)],
  ['exp', expNatural],
  ['logBase', f => logWithBase(10, f)],
  ['ln', logNatural],
  ['sin', sin],
  ['cos', cos],
  ['tan', tan],
  ['asin', asin],
  ['acos', acos],
  ['atan', atan],
  ['sqrt', sqrt],
  ['cbrt', cbrt],
  ['nthRoot', f => nthRoot(3, f)]
];

export const BINARY_BUILDERS: ReadonlyArray<[string, (f: Func, g: Func) => Func]> = [
  ['sum', sum],
  ['product', product]
];

/**
 * Deterministic pseudo-random source in [0, 1)
 *
 * @example
 * const rng = createRng(42);
 * rng(); // same sequence on every run
 */
export function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 4294967296;
  };
}

function pick<T>(rng: () => number, items: ReadonlyArray<T>): T {
  const item = items[Math.floor(rng() * items.length)];
  if (item === undefined) {
    throw new Error('cannot pick from an empty list');
  }
  return item;
}

/**
 * Build a random tree no deeper than maxDepth
 */
export function randomFunc(rng: () => number, maxDepth: number): Func {
  if (maxDepth <= 1 || rng() < 0.25) {
    return rng() < 0.5 ? identity() : constant(Math.round((rng() * 10 - 5) * 100) / 100);
  }

  if (rng() < 0.3) {
    const [, build] = pick(rng, BINARY_BUILDERS);
    return build(randomFunc(rng, maxDepth - 1), randomFunc(rng, maxDepth - 1));
  }

  const [, build] = pick(rng, UNARY_BUILDERS);
  return build(randomFunc(rng, maxDepth - 1));
}

/**
 * Assert a relative error no larger than tolerance
 */
export function expectRelativelyClose(actual: number, expected: number, tolerance = 1e-12): void {
  const scale = Math.max(1, Math.abs(expected));
  expect(Math.abs(actual - expected)).toBeLessThanOrEqual(tolerance * scale);
}

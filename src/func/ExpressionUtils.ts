/**
 * Structural helpers for function trees
 */

import type { Func } from './AST.js';

/**
 * Direct children of a node, left to right
 */
export function children(f: Func): Func[] {
  switch (f.kind) {
    case 'constant':
    case 'identity':
      return [];

    case 'sum':
    case 'product':
      return [f.f, f.g];

    default:
      return [f.f];
  }
}

/**
 * Scalar structural parameters of a node (constant value, exponent, base, degree)
 */
export function parameters(f: Func): number[] {
  switch (f.kind) {
    case 'constant':
      return [f.value];
    case 'power':
      return [f.exponent];
    case 'expBase':
    case 'logBase':
      return [f.base];
    case 'nthRoot':
      return [f.degree];
    default:
      return [];
  }
}

/**
 * Total number of nodes in the tree
 */
export function nodeCount(f: Func): number {
  return children(f).reduce((count, child) => count + nodeCount(child), 1);
}

/**
 * Length of the longest root-to-leaf path; a leaf has depth 1
 */
export function depth(f: Func): number {
  return 1 + Math.max(0, ...children(f).map(depth));
}

/**
 * Check if the tree never reads its input (contains no identity node)
 */
export function isConstantFunc(f: Func): boolean {
  return f.kind !== 'identity' && children(f).every(isConstantFunc);
}

/**
 * Check if two trees have the same shape, kinds and parameters.
 * Parameters compare with Object.is, so NaN equals NaN and 0 differs from -0.
 */
export function structurallyEqual(a: Func, b: Func): boolean {
  if (a.kind !== b.kind) {
    return false;
  }

  const paramsA = parameters(a);
  const paramsB = parameters(b);
  if (!paramsA.every((value, i) => Object.is(value, paramsB[i]))) {
    return false;
  }

  const childrenA = children(a);
  const childrenB = children(b);
  return childrenA.every((child, i) => {
    const other = childrenB[i];
    return other !== undefined && structurallyEqual(child, other);
  });
}

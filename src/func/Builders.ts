/**
 * Factory functions for building function trees without `new`.
 *
 * @example
 * const f = sum(power(identity(), 2), constant(1)); // x^2 + 1
 * f.eval(3); // 10
 */

import {
  Func,
  Constant,
  Identity,
  Sum,
  Product,
  Power,
  ExpWithBase,
  ExpNatural,
  LogWithBase,
  LogNatural,
  Sine,
  Cosine,
  Tangent,
  ArcSine,
  ArcCosine,
  ArcTangent,
  SquareRoot,
  CubeRoot,
  NthRoot
} from './AST.js';
import { ConstructionError } from './Errors.js';

// Leaves

export function constant(value: number): Constant {
  return new Constant(value);
}

export function identity(): Identity {
  return new Identity();
}

// Arithmetic

export function sum(f: Func, g: Func): Sum {
  return new Sum(f, g);
}

export function product(f: Func, g: Func): Product {
  return new Product(f, g);
}

export function power(f: Func, exponent: number): Power {
  return new Power(f, exponent);
}

// Exponentials and logarithms

export function expWithBase(base: number, f: Func): ExpWithBase {
  return new ExpWithBase(base, f);
}

export function expNatural(f: Func): ExpNatural {
  return new ExpNatural(f);
}

export function logWithBase(base: number, f: Func): LogWithBase {
  return new LogWithBase(base, f);
}

export function logNatural(f: Func): LogNatural {
  return new LogNatural(f);
}

// Trigonometry

export function sin(f: Func): Sine {
  return new Sine(f);
}

export function cos(f: Func): Cosine {
  return new Cosine(f);
}

export function tan(f: Func): Tangent {
  return new Tangent(f);
}

export function asin(f: Func): ArcSine {
  return new ArcSine(f);
}

export function acos(f: Func): ArcCosine {
  return new ArcCosine(f);
}

export function atan(f: Func): ArcTangent {
  return new ArcTangent(f);
}

// Roots

export function sqrt(f: Func): SquareRoot {
  return new SquareRoot(f);
}

export function cbrt(f: Func): CubeRoot {
  return new CubeRoot(f);
}

/**
 * @throws {ConstructionError} If degree is zero
 */
export function nthRoot(degree: number, f: Func): NthRoot {
  return new NthRoot(degree, f);
}

// Convenience helpers, built only from the nodes above

/**
 * Combine operands pairwise, level by level, so the tree depth grows with
 * log2 of the operand count. Three operands give ((a op b) op c).
 */
function foldBalanced(operands: readonly Func[], join: (f: Func, g: Func) => Func): Func | undefined {
  let level: Func[] = [...operands];
  while (level.length > 1) {
    const next: Func[] = [];
    for (let i = 0; i < level.length; i += 2) {
      const left = level[i];
      const right = level[i + 1];
      if (left === undefined) {
        break;
      }
      next.push(right === undefined ? left : join(left, right));
    }
    level = next;
  }
  return level[0];
}

/**
 * Sum of a list of terms, folded pairwise: sumAll([a, b, c, d]) = ((a + b) + (c + d))
 *
 * @throws {ConstructionError} If the list is empty
 */
export function sumAll(terms: readonly Func[]): Func {
  const result = foldBalanced(terms, (f, g) => new Sum(f, g));
  if (result === undefined) {
    throw new ConstructionError('at least one term is required', 'sum', 'terms');
  }
  return result;
}

/**
 * Product of a list of factors, folded pairwise like sumAll
 *
 * @throws {ConstructionError} If the list is empty
 */
export function productAll(factors: readonly Func[]): Func {
  const result = foldBalanced(factors, (f, g) => new Product(f, g));
  if (result === undefined) {
    throw new ConstructionError('at least one factor is required', 'product', 'factors');
  }
  return result;
}

/**
 * Variadic form of sumAll: sumOf(a, b, c) = ((a + b) + c).
 * Prefer sumAll for very long lists, which cannot be spread into a call.
 *
 * @throws {ConstructionError} If no terms are given
 */
export function sumOf(...terms: Func[]): Func {
  return sumAll(terms);
}

/**
 * Variadic form of productAll: productOf(a, b, c) = ((a * b) * c)
 *
 * @throws {ConstructionError} If no factors are given
 */
export function productOf(...factors: Func[]): Func {
  return productAll(factors);
}

/**
 * -f(x), as (-1 * f)
 */
export function negate(f: Func): Product {
  return new Product(new Constant(-1), f);
}

/**
 * Polynomial from ascending coefficients: [c0, c1, c2] is c0 + c1*x^1 + c2*x^2.
 * An empty list is the zero polynomial.
 */
export function polynomial(coefficients: readonly number[]): Func {
  if (coefficients.length === 0) {
    return new Constant(0);
  }

  const terms = coefficients.map((c, i): Func =>
    i === 0
      ? new Constant(c)
      : new Product(new Constant(c), new Power(new Identity(), i))
  );
  return sumAll(terms);
}

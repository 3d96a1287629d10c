/**
 * Node catalogue for real-valued functions of one variable.
 *
 * Every node is immutable and evaluable: leaves terminate recursion, binary
 * nodes combine two child results and unary nodes transform one.
 */

import { ConstructionError } from './Errors.js';

/**
 * Anything that maps a real input to a real output.
 * Never throws for out-of-domain inputs; NaN and ±Infinity propagate instead.
 */
export interface Evaluable {
  eval(x: number): number;
}

/**
 * Closed set of node kinds
 */
export type Func =
  | Constant
  | Identity
  | Sum
  | Product
  | Power
  | ExpWithBase
  | ExpNatural
  | LogWithBase
  | LogNatural
  | Sine
  | Cosine
  | Tangent
  | ArcSine
  | ArcCosine
  | ArcTangent
  | SquareRoot
  | CubeRoot
  | NthRoot;

export type FuncKind = Func['kind'];

export type BinaryNode = Sum | Product;

export type UnaryNode = Exclude<Func, Constant | Identity | BinaryNode>;

/**
 * Visitor pattern interface for traversing function trees
 */
export interface FuncVisitor<T> {
  visitConstant(node: Constant): T;
  visitIdentity(node: Identity): T;
  visitSum(node: Sum): T;
  visitProduct(node: Product): T;
  visitPower(node: Power): T;
  visitExpWithBase(node: ExpWithBase): T;
  visitExpNatural(node: ExpNatural): T;
  visitLogWithBase(node: LogWithBase): T;
  visitLogNatural(node: LogNatural): T;
  visitSine(node: Sine): T;
  visitCosine(node: Cosine): T;
  visitTangent(node: Tangent): T;
  visitArcSine(node: ArcSine): T;
  visitArcCosine(node: ArcCosine): T;
  visitArcTangent(node: ArcTangent): T;
  visitSquareRoot(node: SquareRoot): T;
  visitCubeRoot(node: CubeRoot): T;
  visitNthRoot(node: NthRoot): T;
}

/**
 * Constant function: C(x) = c
 */
export class Constant implements Evaluable {
  readonly kind = 'constant' as const;

  constructor(public readonly value: number) {}

  eval(_x: number): number {
    return this.value;
  }

  accept<T>(visitor: FuncVisitor<T>): T {
    return visitor.visitConstant(this);
  }

  toString(): string {
    // String(-0) is '0'
    return Object.is(this.value, -0) ? '-0' : String(this.value);
  }
}

/**
 * Identity function: I(x) = x
 */
export class Identity implements Evaluable {
  readonly kind = 'identity' as const;

  eval(x: number): number {
    return x;
  }

  accept<T>(visitor: FuncVisitor<T>): T {
    return visitor.visitIdentity(this);
  }

  toString(): string {
    return 'x';
  }
}

/**
 * Base for nodes owning two children, f and g
 */
export abstract class BinaryFunc implements Evaluable {
  constructor(
    public readonly f: Func,
    public readonly g: Func
  ) {}

  /**
   * Combine already evaluated child results
   */
  abstract combine(left: number, right: number): number;

  abstract accept<T>(visitor: FuncVisitor<T>): T;

  eval(x: number): number {
    return this.combine(this.f.eval(x), this.g.eval(x));
  }
}

/**
 * s(x) = f(x) + g(x)
 */
export class Sum extends BinaryFunc {
  readonly kind = 'sum' as const;

  combine(left: number, right: number): number {
    return left + right;
  }

  accept<T>(visitor: FuncVisitor<T>): T {
    return visitor.visitSum(this);
  }

  toString(): string {
    return `(${this.f.toString()} + ${this.g.toString()})`;
  }
}

/**
 * p(x) = f(x) * g(x)
 */
export class Product extends BinaryFunc {
  readonly kind = 'product' as const;

  combine(left: number, right: number): number {
    return left * right;
  }

  accept<T>(visitor: FuncVisitor<T>): T {
    return visitor.visitProduct(this);
  }

  toString(): string {
    return `(${this.f.toString()} * ${this.g.toString()})`;
  }
}

/**
 * Base for nodes owning a single child f and transforming its result
 */
export abstract class UnaryFunc implements Evaluable {
  constructor(public readonly f: Func) {}

  /**
   * Transform an already evaluated child result
   */
  abstract apply(value: number): number;

  abstract accept<T>(visitor: FuncVisitor<T>): T;

  eval(x: number): number {
    return this.apply(this.f.eval(x));
  }
}

/**
 * p(x) = f(x) ^ n
 */
export class Power extends UnaryFunc {
  readonly kind = 'power' as const;

  constructor(f: Func, public readonly exponent: number) {
    super(f);
  }

  apply(value: number): number {
    return Math.pow(value, this.exponent);
  }

  accept<T>(visitor: FuncVisitor<T>): T {
    return visitor.visitPower(this);
  }

  toString(): string {
    return `(${this.f.toString()} ^ ${this.exponent})`;
  }
}

/**
 * exp_a(x) = a ^ f(x)
 */
export class ExpWithBase extends UnaryFunc {
  readonly kind = 'expBase' as const;

  constructor(public readonly base: number, f: Func) {
    super(f);
  }

  apply(value: number): number {
    return Math.pow(this.base, value);
  }

  accept<T>(visitor: FuncVisitor<T>): T {
    return visitor.visitExpWithBase(this);
  }

  toString(): string {
    return `(${this.base} ^ ${this.f.toString()})`;
  }
}

/**
 * exp(x) = e ^ f(x)
 */
export class ExpNatural extends UnaryFunc {
  readonly kind = 'exp' as const;

  apply(value: number): number {
    return Math.exp(value);
  }

  accept<T>(visitor: FuncVisitor<T>): T {
    return visitor.visitExpNatural(this);
  }

  toString(): string {
    return `exp(${this.f.toString()})`;
  }
}

/**
 * log_b(x) = log_b(f(x)), computed as ln(f(x)) / ln(b).
 * The base is not validated: b <= 0 or b = 1 yields NaN or ±Infinity.
 */
export class LogWithBase extends UnaryFunc {
  readonly kind = 'logBase' as const;

  constructor(public readonly base: number, f: Func) {
    super(f);
  }

  apply(value: number): number {
    return Math.log(value) / Math.log(this.base);
  }

  accept<T>(visitor: FuncVisitor<T>): T {
    return visitor.visitLogWithBase(this);
  }

  toString(): string {
    return `log_${this.base}(${this.f.toString()})`;
  }
}

/**
 * ln(x) = log_e(f(x))
 */
export class LogNatural extends UnaryFunc {
  readonly kind = 'ln' as const;

  apply(value: number): number {
    return Math.log(value);
  }

  accept<T>(visitor: FuncVisitor<T>): T {
    return visitor.visitLogNatural(this);
  }

  toString(): string {
    return `ln(${this.f.toString()})`;
  }
}

// Trigonometric family. Angles are in radians.

export class Sine extends UnaryFunc {
  readonly kind = 'sin' as const;

  apply(value: number): number {
    return Math.sin(value);
  }

  accept<T>(visitor: FuncVisitor<T>): T {
    return visitor.visitSine(this);
  }

  toString(): string {
    return `sin(${this.f.toString()})`;
  }
}

export class Cosine extends UnaryFunc {
  readonly kind = 'cos' as const;

  apply(value: number): number {
    return Math.cos(value);
  }

  accept<T>(visitor: FuncVisitor<T>): T {
    return visitor.visitCosine(this);
  }

  toString(): string {
    return `cos(${this.f.toString()})`;
  }
}

export class Tangent extends UnaryFunc {
  readonly kind = 'tan' as const;

  apply(value: number): number {
    return Math.tan(value);
  }

  accept<T>(visitor: FuncVisitor<T>): T {
    return visitor.visitTangent(this);
  }

  toString(): string {
    return `tan(${this.f.toString()})`;
  }
}

/**
 * asin(f(x)); NaN outside [-1, 1]
 */
export class ArcSine extends UnaryFunc {
  readonly kind = 'asin' as const;

  apply(value: number): number {
    return Math.asin(value);
  }

  accept<T>(visitor: FuncVisitor<T>): T {
    return visitor.visitArcSine(this);
  }

  toString(): string {
    return `asin(${this.f.toString()})`;
  }
}

/**
 * acos(f(x)); NaN outside [-1, 1]
 */
export class ArcCosine extends UnaryFunc {
  readonly kind = 'acos' as const;

  apply(value: number): number {
    return Math.acos(value);
  }

  accept<T>(visitor: FuncVisitor<T>): T {
    return visitor.visitArcCosine(this);
  }

  toString(): string {
    return `acos(${this.f.toString()})`;
  }
}

export class ArcTangent extends UnaryFunc {
  readonly kind = 'atan' as const;

  apply(value: number): number {
    return Math.atan(value);
  }

  accept<T>(visitor: FuncVisitor<T>): T {
    return visitor.visitArcTangent(this);
  }

  toString(): string {
    return `atan(${this.f.toString()})`;
  }
}

// Root family

/**
 * sqrt(f(x)); NaN for negative child results
 */
export class SquareRoot extends UnaryFunc {
  readonly kind = 'sqrt' as const;

  apply(value: number): number {
    return Math.sqrt(value);
  }

  accept<T>(visitor: FuncVisitor<T>): T {
    return visitor.visitSquareRoot(this);
  }

  toString(): string {
    return `sqrt(${this.f.toString()})`;
  }
}

/**
 * Real cube root; negative for negative child results
 */
export class CubeRoot extends UnaryFunc {
  readonly kind = 'cbrt' as const;

  apply(value: number): number {
    return Math.cbrt(value);
  }

  accept<T>(visitor: FuncVisitor<T>): T {
    return visitor.visitCubeRoot(this);
  }

  toString(): string {
    return `cbrt(${this.f.toString()})`;
  }
}

/**
 * root_n(x) = f(x) ^ (1 / n), the same computation as Power(f, 1 / n).
 * Unlike CubeRoot, NthRoot(3, f) is NaN for negative f(x).
 *
 * @throws {ConstructionError} If the degree is zero
 */
export class NthRoot extends UnaryFunc {
  readonly kind = 'nthRoot' as const;

  constructor(public readonly degree: number, f: Func) {
    super(f);
    if (degree === 0) {
      throw new ConstructionError('root degree must be nonzero', 'nthRoot', 'degree');
    }
  }

  apply(value: number): number {
    return Math.pow(value, 1 / this.degree);
  }

  accept<T>(visitor: FuncVisitor<T>): T {
    return visitor.visitNthRoot(this);
  }

  toString(): string {
    return `root_${this.degree}(${this.f.toString()})`;
  }
}

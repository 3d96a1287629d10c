/**
 * Domain analysis for function trees.
 * Evaluates a tree at one input and reports where NaN or Infinity originates:
 * sqrt of negative, log of non-positive, asin/acos outside [-1, 1], etc.
 *
 * Plain evaluation never checks any of this; this module is an opt-in layer
 * on top of it.
 */

import type {
  Func,
  FuncVisitor,
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
  NthRoot,
  BinaryNode,
  UnaryNode
} from './AST.js';
import { DomainError } from './Errors.js';

export type DomainIssueType =
  | 'sqrt_negative'
  | 'power_negative_base'
  | 'log_nonpositive'
  | 'log_base_invalid'
  | 'inverse_trig_range'
  | 'tangent_pole'
  | 'non_finite';

export interface DomainIssue {
  type: DomainIssueType;
  expression: string; // Rendering of the offending node
  inputs: number[]; // Child results the node received
  description: string;
  suggestion: string;
}

export interface DomainAnalysisResult {
  x: number;
  value: number;
  issues: DomainIssue[];
  hasIssues: boolean;
}

export interface DomainCheckOptions {
  epsilon: number; // tan(v) counts as a pole when |cos(v)| < epsilon, i.e. v is within ~epsilon of pi/2 + k*pi
}

const DEFAULT_DOMAIN_OPTIONS: DomainCheckOptions = {
  epsilon: 1e-10
};

type IssueDraft = Omit<DomainIssue, 'expression' | 'inputs'>;

/**
 * Analyze f at x for domain violations
 */
export function analyzeDomain(
  f: Func,
  x: number,
  options: Partial<DomainCheckOptions> = {}
): DomainAnalysisResult {
  const analyzer = new DomainAnalyzer(x, {
    epsilon: options.epsilon ?? DEFAULT_DOMAIN_OPTIONS.epsilon
  });
  const value = f.accept(analyzer);

  return {
    x,
    value,
    issues: analyzer.issues,
    hasIssues: analyzer.issues.length > 0
  };
}

/**
 * Evaluate f at x, failing on any domain violation
 *
 * @throws {DomainError} If the analysis reports issues
 */
export function evaluateChecked(
  f: Func,
  x: number,
  options: Partial<DomainCheckOptions> = {}
): number {
  const result = analyzeDomain(f, x, options);
  if (result.hasIssues) {
    throw new DomainError(result.issues, x);
  }
  return result.value;
}

/**
 * Visitor returning each node's value while collecting issues.
 * Values come from the nodes' own combine/apply, so they match eval exactly.
 */
class DomainAnalyzer implements FuncVisitor<number> {
  readonly issues: DomainIssue[] = [];

  constructor(
    private readonly x: number,
    private readonly options: DomainCheckOptions
  ) {}

  visitConstant(node: Constant): number {
    return this.settle(node, [], node.value, []);
  }

  visitIdentity(node: Identity): number {
    return this.settle(node, [], this.x, []);
  }

  visitSum(node: Sum): number {
    return this.binary(node);
  }

  visitProduct(node: Product): number {
    return this.binary(node);
  }

  visitPower(node: Power): number {
    return this.unary(node, value => negativeBase(value, node.exponent));
  }

  visitExpWithBase(node: ExpWithBase): number {
    return this.unary(node, value => negativeBase(node.base, value));
  }

  visitExpNatural(node: ExpNatural): number {
    return this.unary(node, () => []);
  }

  visitLogWithBase(node: LogWithBase): number {
    return this.unary(node, value => {
      const drafts = logArgument(value);
      if (node.base <= 0 || node.base === 1) {
        drafts.push({
          type: 'log_base_invalid',
          description: `logarithm base ${node.base} must be positive and different from 1`,
          suggestion: 'Use a positive base other than 1'
        });
      }
      return drafts;
    });
  }

  visitLogNatural(node: LogNatural): number {
    return this.unary(node, logArgument);
  }

  visitSine(node: Sine): number {
    return this.unary(node, () => []);
  }

  visitCosine(node: Cosine): number {
    return this.unary(node, () => []);
  }

  visitTangent(node: Tangent): number {
    return this.unary(node, value =>
      Math.abs(Math.cos(value)) < this.options.epsilon
        ? [{
            type: 'tangent_pole',
            description: `tan is unbounded near pi/2 + k*pi (argument ${value})`,
            suggestion: 'Keep the argument away from odd multiples of pi/2'
          }]
        : []
    );
  }

  visitArcSine(node: ArcSine): number {
    return this.unary(node, value => inverseTrigRange('asin', value));
  }

  visitArcCosine(node: ArcCosine): number {
    return this.unary(node, value => inverseTrigRange('acos', value));
  }

  visitArcTangent(node: ArcTangent): number {
    return this.unary(node, () => []);
  }

  visitSquareRoot(node: SquareRoot): number {
    return this.unary(node, value =>
      value < 0
        ? [{
            type: 'sqrt_negative',
            description: `sqrt of negative value ${value} produces NaN`,
            suggestion: 'Guard negative values: sqrt(max(0, value))'
          }]
        : []
    );
  }

  visitCubeRoot(node: CubeRoot): number {
    return this.unary(node, () => []);
  }

  visitNthRoot(node: NthRoot): number {
    return this.unary(node, value => negativeBase(value, 1 / node.degree));
  }

  private binary(node: BinaryNode): number {
    const left = node.f.accept(this);
    const right = node.g.accept(this);
    return this.settle(node, [left, right], node.combine(left, right), []);
  }

  private unary(node: UnaryNode, detect: (value: number) => IssueDraft[]): number {
    const value = node.f.accept(this);
    const drafts = Number.isFinite(value) ? detect(value) : [];
    return this.settle(node, [value], node.apply(value), drafts);
  }

  /**
   * Record drafted issues, or a generic non_finite issue when the node turned
   * finite inputs into NaN/Infinity without a more specific explanation.
   * Leaves have no inputs, so a non-finite constant or x is reported at the leaf.
   * Nodes whose inputs were already non-finite report nothing.
   */
  private settle(node: Func, inputs: number[], result: number, drafts: IssueDraft[]): number {
    if (!inputs.every(Number.isFinite)) {
      return result;
    }

    if (drafts.length === 0 && !Number.isFinite(result)) {
      drafts = [{
        type: 'non_finite',
        description: inputs.length === 0
          ? `${node.toString()} is ${result}`
          : `${node.toString()} produced ${result} from finite inputs`,
        suggestion: 'Check for overflow or degenerate parameters'
      }];
    }

    for (const draft of drafts) {
      this.issues.push({ ...draft, expression: node.toString(), inputs });
    }
    return result;
  }
}

function negativeBase(base: number, exponent: number): IssueDraft[] {
  if (base < 0 && !Number.isInteger(exponent)) {
    return [{
      type: 'power_negative_base',
      description: `negative base ${base} raised to non-integer exponent ${exponent} produces NaN`,
      suggestion: 'Restrict the base to non-negative values, or use cbrt for odd roots'
    }];
  }
  return [];
}

function logArgument(value: number): IssueDraft[] {
  if (value <= 0) {
    return [{
      type: 'log_nonpositive',
      description: `logarithm of ${value} is ${value === 0 ? '-Infinity' : 'NaN'}`,
      suggestion: 'Clamp to positive: log(max(epsilon, value))'
    }];
  }
  return [];
}

function inverseTrigRange(name: 'asin' | 'acos', value: number): IssueDraft[] {
  if (value < -1 || value > 1) {
    return [{
      type: 'inverse_trig_range',
      description: `${name} requires argument in [-1, 1], got ${value}`,
      suggestion: `Clamp: ${name}(max(-1, min(1, value)))`
    }];
  }
  return [];
}

/**
 * Format domain analysis for display
 */
export function formatDomainWarnings(result: DomainAnalysisResult): string {
  if (!result.hasIssues) {
    return '';
  }

  const lines: string[] = [];
  lines.push(`DOMAIN WARNINGS at x = ${result.x}:`);
  lines.push('');

  for (const issue of result.issues) {
    lines.push(`  - ${formatIssueType(issue.type)} in ${issue.expression}`);
    lines.push(`    ${issue.description}`);
    lines.push(`    Fix: ${issue.suggestion}`);
    lines.push('');
  }

  lines.push(`Result: ${result.value}`);

  return lines.join('\n');
}

function formatIssueType(type: DomainIssueType): string {
  switch (type) {
    case 'sqrt_negative':
      return 'Square root of negative';
    case 'power_negative_base':
      return 'Negative base with fractional exponent';
    case 'log_nonpositive':
      return 'Logarithm of non-positive value';
    case 'log_base_invalid':
      return 'Invalid logarithm base';
    case 'inverse_trig_range':
      return 'Inverse trigonometric argument out of range';
    case 'tangent_pole':
      return 'Tangent pole';
    case 'non_finite':
      return 'Non-finite result';
  }
}

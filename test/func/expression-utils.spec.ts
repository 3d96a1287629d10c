import { describe, it, expect } from 'vitest';
import {
  children,
  parameters,
  nodeCount,
  depth,
  isConstantFunc,
  structurallyEqual
} from '../../src/func/ExpressionUtils.js';
import {
  constant,
  identity,
  sum,
  product,
  power,
  expWithBase,
  logWithBase,
  sin,
  cos,
  nthRoot,
  polynomial
} from '../../src/func/Builders.js';

describe('Expression Utilities', () => {
  describe('children', () => {
    it('should return no children for leaves', () => {
      expect(children(constant(1))).toEqual([]);
      expect(children(identity())).toEqual([]);
    });

    it('should return both children of binary nodes in order', () => {
      const f = identity();
      const g = constant(2);
      const [first, second] = children(product(f, g));
      expect(first).toBe(f);
      expect(second).toBe(g);
    });

    it('should return the single child of unary nodes', () => {
      const inner = identity();
      const result = children(sin(inner));
      expect(result).toHaveLength(1);
      expect(result[0]).toBe(inner);
    });
  });

  describe('parameters', () => {
    it('should list structural parameters per kind', () => {
      expect(parameters(constant(4))).toEqual([4]);
      expect(parameters(power(identity(), 3))).toEqual([3]);
      expect(parameters(expWithBase(2, identity()))).toEqual([2]);
      expect(parameters(logWithBase(10, identity()))).toEqual([10]);
      expect(parameters(nthRoot(5, identity()))).toEqual([5]);
      expect(parameters(sin(identity()))).toEqual([]);
      expect(parameters(sum(identity(), identity()))).toEqual([]);
    });
  });

  describe('nodeCount / depth', () => {
    it('should count a single leaf', () => {
      expect(nodeCount(identity())).toBe(1);
      expect(depth(constant(0))).toBe(1);
    });

    it('should measure a polynomial tree', () => {
      // ((1 + (2 * (x ^ 1))) + (3 * (x ^ 2)))
      const f = polynomial([1, 2, 3]);
      expect(nodeCount(f)).toBe(11);
      expect(depth(f)).toBe(5);
    });

    it('should follow the deepest branch', () => {
      const f = sum(constant(1), sin(cos(identity())));
      expect(depth(f)).toBe(4);
      expect(nodeCount(f)).toBe(5);
    });
  });

  describe('isConstantFunc', () => {
    it('should detect trees that never read the input', () => {
      expect(isConstantFunc(sum(constant(1), sin(constant(2))))).toBe(true);
      expect(isConstantFunc(sum(constant(1), sin(identity())))).toBe(false);
      expect(isConstantFunc(identity())).toBe(false);
    });
  });

  describe('structurallyEqual', () => {
    it('should match identically built trees', () => {
      expect(structurallyEqual(polynomial([1, 2, 3]), polynomial([1, 2, 3]))).toBe(true);
    });

    it('should distinguish parameters', () => {
      expect(structurallyEqual(constant(1), constant(2))).toBe(false);
      expect(structurallyEqual(nthRoot(2, identity()), nthRoot(3, identity()))).toBe(false);
    });

    it('should distinguish kinds and shapes', () => {
      expect(structurallyEqual(sin(identity()), cos(identity()))).toBe(false);
      expect(structurallyEqual(sum(identity(), constant(1)), sum(constant(1), identity()))).toBe(false);
    });

    it('should compare parameters with Object.is', () => {
      expect(structurallyEqual(constant(NaN), constant(NaN))).toBe(true);
      expect(structurallyEqual(constant(0), constant(-0))).toBe(false);
    });
  });
});

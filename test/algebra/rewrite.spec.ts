import { describe, it, expect } from 'vitest';
import { parseExpression } from '../../src/algebra/Parser.js';
import { print } from '../../src/algebra/Printer.js';
import { expand } from '../../src/algebra/Expand.js';
import { factor } from '../../src/algebra/Factor.js';
import { trigSimplify } from '../../src/algebra/Trig.js';
import { cancelCommonFactors, simplify } from '../../src/algebra/Simplify.js';
import { toPolynomial, rationalRoots, quadraticRoots } from '../../src/algebra/Polynomial.js';
import { Rational } from '../../src/algebra/Rational.js';
import type { Expression } from '../../src/algebra/AST.js';

function apply(fn: (input: Expression) => Expression, input: string): string {
  return print(fn(parseExpression(input)));
}

describe('Algebraic Rewriting', () => {
  describe('expand', () => {
    it('should multiply out a squared sum', () => {
      expect(apply(expand, '(x+1)**2')).toBe('x**2 + 2*x + 1');
    });

    it('should multiply out a product of sums', () => {
      expect(apply(expand, '(x+1)*(x-1)')).toBe('x**2 - 1');
    });

    it('should leave an expanded polynomial alone', () => {
      expect(apply(expand, 'x**2 + 1')).toBe('x**2 + 1');
    });
  });

  describe('factor', () => {
    it('should factor a perfect square', () => {
      expect(apply(factor, 'x**2+2*x+1')).toBe('(x + 1)**2');
    });

    it('should factor a difference of squares', () => {
      expect(apply(factor, 'x**2 - 1')).toBe('(x + 1)*(x - 1)');
    });

    it('should pull out common numeric and symbolic content', () => {
      expect(apply(factor, '2*x*y+4*x')).toBe('2*x*(y + 2)');
    });

    it('should leave an irreducible quadratic alone', () => {
      expect(apply(factor, 'x**2 + 1')).toBe('x**2 + 1');
    });
  });

  describe('trigSimplify', () => {
    it('should apply the Pythagorean identity', () => {
      expect(apply(trigSimplify, 'sin(x)**2 + cos(x)**2')).toBe('1');
    });

    it('should apply the hyperbolic identity', () => {
      expect(apply(trigSimplify, 'cosh(x)**2 - sinh(x)**2')).toBe('1');
    });

    it('should recognize a double angle', () => {
      expect(apply(trigSimplify, '2*sin(x)*cos(x)')).toBe('sin(2*x)');
    });

    it('should turn sin/cos into tan', () => {
      expect(apply(trigSimplify, 'sin(x)/cos(x)')).toBe('tan(x)');
    });
  });

  describe('simplify', () => {
    it('should prefer the smaller of the candidates', () => {
      expect(apply(simplify, '(x+1)**2 - x**2')).toBe('2*x + 1');
      expect(apply(simplify, 'sin(x)**2 + cos(x)**2')).toBe('1');
    });

    it('should cancel polynomial factors shared by a quotient', () => {
      expect(apply(simplify, '(x**2-1)/(x-1)')).toBe('x + 1');
      expect(apply(simplify, 'x/(x**2 - x)')).toBe('1/(x - 1)');
    });

    it('should leave quotients with nothing in common alone', () => {
      expect(apply(cancelCommonFactors, '(x+1)/(x-1)')).toBe('(x + 1)/(x - 1)');
      expect(apply(cancelCommonFactors, 'x**2 + 2*x + 1')).toBe('x**2 + 2*x + 1');
    });
  });

  describe('Polynomials', () => {
    it('should read coefficients lowest degree first', () => {
      const p = toPolynomial(parseExpression('x**2 + 2*x + 1'), 'x');
      expect(p?.map(c => c.toString())).toEqual(['1', '2', '1']);
    });

    it('should refuse non-polynomials', () => {
      expect(toPolynomial(parseExpression('sin(x)'), 'x')).toBeUndefined();
    });

    it('should find rational roots with multiplicity', () => {
      const { roots, remainder } = rationalRoots([Rational.of(6), Rational.of(-5), Rational.ONE]);
      expect(roots.map(r => [r.value.toString(), r.multiplicity])).toEqual([
        ['2', 1],
        ['3', 1]
      ]);
      expect(remainder.map(c => c.toString())).toEqual(['1']);
    });

    it('should solve quadratics with surds', () => {
      const [low, high] = quadraticRoots([Rational.of(-2), Rational.of(-5), Rational.ONE]);
      expect(print(low)).toBe('-sqrt(33)/2 + 5/2');
      expect(print(high)).toBe('sqrt(33)/2 + 5/2');
    });
  });
});

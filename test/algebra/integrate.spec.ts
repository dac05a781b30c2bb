import { describe, it, expect } from 'vitest';
import { parseExpression } from '../../src/algebra/Parser.js';
import { print } from '../../src/algebra/Printer.js';
import { num } from '../../src/algebra/AST.js';
import { differentiate } from '../../src/algebra/Differentiate.js';
import { definiteIntegral, integrate } from '../../src/algebra/Integrate.js';
import { equals } from '../../src/algebra/Inspect.js';
import { simplify } from '../../src/algebra/Simplify.js';
import { UnsupportedError } from '../../src/algebra/Errors.js';

function antiderivative(input: string, variable = 'x'): string {
  return print(integrate(parseExpression(input), variable));
}

function integratesTo(input: string, expected: string): boolean {
  return equals(integrate(parseExpression(input), 'x'), parseExpression(expected));
}

describe('Backend Integration', () => {
  describe('Power rule and linearity', () => {
    it('should integrate polynomials term by term', () => {
      expect(antiderivative('3*x**2 + 2*x + 1')).toBe('x**3 + x**2 + x');
    });

    it('should treat other symbols as constants', () => {
      expect(integratesTo('y', 'x*y')).toBe(true);
      expect(antiderivative('x', 'y')).toBe(print(parseExpression('x*y')));
    });

    it('should raise powers of a linear base', () => {
      expect(antiderivative('(2*x + 1)**3')).toBe('(2*x + 1)**4/8');
      expect(antiderivative('sqrt(x)')).toBe('2*x**(3/2)/3');
    });

    it('should turn a reciprocal into a logarithm', () => {
      expect(antiderivative('1/x')).toBe('log(x)');
    });

    it('should expand products of polynomials first', () => {
      expect(integratesTo('x*(x + 1)', 'x**3/3 + x**2/2')).toBe(true);
    });
  });

  describe('Table of integrals', () => {
    it('should divide by the slope of a linear argument', () => {
      expect(antiderivative('cos(2*x)')).toBe('sin(2*x)/2');
      expect(antiderivative('exp(x)')).toBe('exp(x)');
    });

    it('should integrate exponentials with a constant base', () => {
      expect(antiderivative('2**x')).toBe('2**x/log(2)');
    });

    it('should recognize inverse trigonometric forms', () => {
      expect(antiderivative('1/(x**2 + 1)')).toBe('atan(x)');
      expect(antiderivative('sec(x)**2')).toBe('tan(x)');
    });
  });

  describe('Integration by parts', () => {
    it('should differentiate the polynomial factor', () => {
      expect(integratesTo('x*exp(x)', 'x*exp(x) - exp(x)')).toBe(true);
    });

    it('should integrate the polynomial factor against a logarithm', () => {
      expect(integratesTo('x*log(x)', 'x**2*log(x)/2 - x**2/4')).toBe(true);
    });
  });

  it.each(['x**2*exp(x)', 'x*sin(3*x)', 'log(2*x + 1)', '4*x**3 - x'])(
    'should give an antiderivative of %s whose derivative is the integrand',
    input => {
      const integrand = parseExpression(input);
      const derivative = differentiate(integrate(integrand, 'x'), 'x');
      expect(equals(simplify(derivative), simplify(integrand))).toBe(true);
    }
  );

  it('should evaluate definite integrals', () => {
    expect(print(definiteIntegral(parseExpression('x**2'), 'x', num(0), num(3)))).toBe('9');
    expect(print(definiteIntegral(parseExpression('2*x + 1'), 'x', num(1), num(2)))).toBe('4');
  });

  it('should refuse integrands without a known antiderivative', () => {
    expect(() => antiderivative('exp(x**2)')).toThrow(UnsupportedError);
    expect(() => antiderivative('exp(x**2)')).toThrow('No antiderivative known for expression (exp(x**2))');
    expect(() => antiderivative('x**x')).toThrow(UnsupportedError);
  });
});

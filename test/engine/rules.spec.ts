import { describe, it, expect, vi, afterEach } from 'vitest';
import { createEngine } from '../../src/Bootstrap.js';
import type { EngineResult } from '../../src/engine/Models.js';
import { NonSquareMatrixError, SingularMatrixError } from '../../src/algebra/Errors.js';
import { parseExpression } from '../../src/algebra/Parser.js';
import { print } from '../../src/algebra/Printer.js';
import { differentiate } from '../../src/algebra/Differentiate.js';
import { simplify } from '../../src/algebra/Simplify.js';

afterEach(() => {
  vi.restoreAllMocks();
});

const engine = createEngine();

function steps(result: EngineResult): Array<[string, string, string]> {
  return result.graph.nodes.map(n => [n.rule, n.input, n.output]);
}

function backendDerivative(input: string): string {
  return print(simplify(differentiate(parseExpression(input), 'x')));
}

const CHAIN_FUNCTIONS = [
  'sin', 'cos', 'tan', 'sec', 'csc', 'cot', 'exp', 'log',
  'asin', 'acos', 'atan', 'asec', 'acsc', 'acot',
  'sinh', 'cosh', 'tanh', 'asinh', 'acosh', 'atanh',
  'erf', 'gamma', 'Heaviside', 'Abs', 'floor', 'ceiling'
];

describe('Built-in Rules', () => {
  describe('Differentiation', () => {
    it('should apply the power rule then resolve the inner derivative', () => {
      const result = engine.run('differentiate', 'x**2');
      expect(result.output).toBe('2*x');
      expect(steps(result)).toEqual([
        ['power_rule', 'Derivative(x**2, x)', '2*x*Derivative(x, x)'],
        ['diff_identity', '2*x*Derivative(x, x)', '2*x']
      ]);
      expect(result.graph.nodes[1].dependencies).toEqual(['step_001']);
    });

    it('should chain through a composite function', () => {
      const result = engine.run('differentiate', 'sin(x**2)');
      expect(result.output).toBe('2*x*cos(x**2)');
      expect(steps(result)).toEqual([
        ['chain_rule_sin', 'Derivative(sin(x**2), x)', 'cos(x**2)*Derivative(x**2, x)'],
        ['power_rule', 'cos(x**2)*Derivative(x**2, x)', '2*x*cos(x**2)*Derivative(x, x)'],
        ['diff_identity', '2*x*cos(x**2)*Derivative(x, x)', '2*x*cos(x**2)']
      ]);
    });

    it('should differentiate square roots', () => {
      const result = engine.run('differentiate', 'sqrt(x)');
      expect(result.output).toBe('1/(2*sqrt(x))');
      expect(result.graph.nodes[0].output).toBe('Derivative(x, x)/(2*sqrt(x))');
    });

    it('should pull out constant factors', () => {
      const result = engine.run('differentiate', '2*x');
      expect(steps(result)).toEqual([
        ['constant_multiple', 'Derivative(2*x, x)', '2*Derivative(x, x)'],
        ['diff_identity', '2*Derivative(x, x)', '2']
      ]);
    });

    it('should compute higher orders in one step', () => {
      const result = engine.run('differentiate', 'x**3', { order: 2 });
      expect(result.output).toBe('6*x');
      expect(result.graph.size).toBe(1);
      const [node] = result.graph.nodes;
      expect(node.rule).toBe('expand_higher_order');
      expect(node.input).toBe('Derivative(x**3, (x, 2))');
      expect(node.explanation).toBe('Compute second derivative: d²/dx²[x**3]');
    });

    it('should warn when the variable is absent', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const result = engine.run('differentiate', '5');
      expect(result.output).toBe('0');
      expect(result.graph.nodes[0].rule).toBe('diff_constant');
      expect(result.graph.nodes[0].metadata.variableAbsent).toBe(true);
      expect(result.warnings).toEqual(["Expression '5' does not contain variable 'x'. The derivative is 0."]);
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it.each(CHAIN_FUNCTIONS)('should open %s(x**2) with its chain rule', fn => {
      const input = `${fn}(x**2)`;
      const result = engine.run('differentiate', input);
      expect(result.graph.nodes[0].rule).toBe(`chain_rule_${fn.toLowerCase()}`);
      expect(result.output).toBe(backendDerivative(input));
    });

    it.each([
      ['sin(x)', 'cos(x)'],
      ['cos(x)', '-sin(x)'],
      ['exp(x)', 'exp(x)'],
      ['log(x)', '1/x'],
      ['sinh(x)', 'cosh(x)'],
      ['cosh(x)', 'sinh(x)'],
      ['Abs(x)', 'sign(x)'],
      ['Heaviside(x)', 'DiracDelta(x)'],
      ['floor(x)', '0']
    ])('should differentiate %s to %s', (input, expected) => {
      expect(engine.run('differentiate', input).output).toBe(expected);
    });

    it.each([
      ['2**x', 'exponential_rule'],
      ['x**x', 'logarithmic_differentiation']
    ])('should differentiate the varying exponent of %s with %s', (input, rule) => {
      const result = engine.run('differentiate', input);
      expect(result.graph.nodes[0].rule).toBe(rule);
      expect(result.output).toBe(backendDerivative(input));
    });

    it('should simplify the final result as its own step', () => {
      const result = engine.run('differentiate', 'sin(x)*cos(x)');
      expect(result.graph.nodes.map(n => n.rule)).toEqual([
        'product_rule',
        'chain_rule_sin',
        'diff_identity',
        'chain_rule_cos',
        'diff_identity',
        'simplify_result'
      ]);
      const last = result.graph.nodes[5];
      expect(last.id).toBe('step_006');
      expect(last.input).toBe('cos(x)**2 - sin(x)**2');
      expect(last.output).toBe('cos(2*x)');
      expect(last.dependencies).toEqual(['step_005']);
      expect(result.output).toBe('cos(2*x)');
    });
  });

  describe('Algebra', () => {
    it('should expand in a single step', () => {
      const result = engine.run('expand', '(x+1)**2');
      expect(result.output).toBe('x**2 + 2*x + 1');
      expect(steps(result)).toEqual([['expand_expression', '(x + 1)**2', 'x**2 + 2*x + 1']]);
    });

    it('should factor a perfect square', () => {
      expect(engine.run('factor', 'x**2+2*x+1').output).toBe('(x + 1)**2');
    });

    it('should apply trigonometric identities', () => {
      const result = engine.run('simplify', 'sin(x)**2 + cos(x)**2');
      expect(result.output).toBe('1');
      expect(result.graph.nodes[0].rule).toBe('simplify_trig');
    });

    it('should fall back to algebraic simplification', () => {
      const result = engine.run('simplify', '(x+1)**2 - x**2');
      expect(result.output).toBe('2*x + 1');
      expect(result.graph.nodes[0].explanation).toBe('Simplify algebraically.');
    });

    it('should cancel common factors of a quotient', () => {
      const result = engine.run('simplify', '(x**2-1)/(x-1)');
      expect(result.output).toBe('x + 1');
      expect(steps(result)).toEqual([['simplify_trig', '(x**2 - 1)/(x - 1)', 'x + 1']]);
    });
  });

  describe('Matrices', () => {
    it('should use the 2×2 formula for determinants', () => {
      const result = engine.run('matrix_determinant', '[[1,2],[3,4]]');
      expect(result.output).toBe('-2');
      expect(result.summary).toBe('Calculate determinant using 2×2 formula: ad - bc');
      expect(result.graph.nodes.map(n => [n.id, n.input, n.explanation])).toEqual([
        ['det_2x2', 'det([[1, 2], [3, 4]])', 'For a 2×2 matrix, det = ad - bc = (1)(4) - (2)(3) = 4 - 6 = -2']
      ]);
    });

    it('should expand larger determinants along the first row', () => {
      const result = engine.run('matrix_determinant', '[[2,0,1],[1,3,2],[1,1,2]]');
      expect(result.output).toBe('6');
      const minors = result.graph.nodes.filter(n => n.id.startsWith('minor_'));
      expect(minors.map(n => n.output)).toEqual(['4', '0', '-2']);
      expect(result.graph.get('cofactor_sum')?.dependencies).toEqual(['minor_0_0', 'minor_0_1', 'minor_0_2']);
    });

    it('should refuse non-square determinants', () => {
      expect(() => engine.run('matrix_determinant', '[[1,2,3]]')).toThrow(NonSquareMatrixError);
    });

    it('should explain each element of a product', () => {
      const result = engine.run('matrix_multiply', '[[1,2],[3,4]]', { matrixB: '[[5,6],[7,8]]' });
      expect(result.output).toBe('[[19,22],[43,50]]');
      expect(result.graph.size).toBe(4);
      const first = result.graph.get('element_0_0');
      expect(first?.input).toBe('C[0,0] = (1)·(5) + (2)·(7)');
      expect(first?.output).toBe('19');
      expect(first?.explanation).toBe('Calculate element (0,0) by taking row 0 of A times column 0 of B: 5 + 14 = 19');
    });

    it('should invert a 2×2 matrix by formula', () => {
      const result = engine.run('matrix_inverse', '[[4,7],[2,6]]');
      expect(result.output).toBe('[[0.6,-0.7],[-0.2,0.4]]');
      expect(result.graph.get('det_calc')?.output).toBe('10');
      const formula = result.graph.get('inverse_formula');
      expect(formula?.input).toBe('A^-1 = (1/10) * [[6, -7], [-2, 4]]');
      expect(formula?.dependencies).toEqual(['det_calc']);
    });

    it('should invert larger matrices through the adjugate', () => {
      const result = engine.run('matrix_inverse', '[[2,0,1],[1,3,2],[1,1,2]]');
      expect(result.graph.nodes.map(n => n.id)).toEqual(['det_calc', 'adjugate_calc', 'inverse_result']);
    });

    it('should refuse singular matrices without recording steps', () => {
      expect(() => engine.run('matrix_inverse', '[[1,2],[2,4]]')).toThrow(SingularMatrixError);
    });

    it('should record each row operation', () => {
      const result = engine.run('matrix_rref', '[[1,2],[3,4]]');
      expect(result.output).toBe('[[1,0],[0,1]]');
      expect(result.graph.nodes.map(n => n.id)).toEqual([
        'rref_start',
        'rref_eliminate_1_0',
        'rref_scale_1',
        'rref_eliminate_0_1',
        'rref_complete'
      ]);
      const eliminate = result.graph.get('rref_eliminate_1_0');
      expect(eliminate?.output).toBe('[[1,2],[0,-2]]');
      expect(eliminate?.explanation).toBe('Subtract 3 times row 1 from row 2');
      expect(result.summary).toBe('Transform 2×2 matrix to RREF using 3 row operations');
    });

    it('should find eigenvalues with their eigenvectors', () => {
      const result = engine.run('matrix_eigenvalues', '[[2,0],[0,3]]');
      expect(JSON.parse(result.output)).toEqual({
        eigenvalues: [
          { value: 2, multiplicity: 1 },
          { value: 3, multiplicity: 1 }
        ],
        eigenvectors: { '2': [[1, 0]], '3': [[0, 1]] }
      });
      expect(result.graph.get('eigenvalues_characteristic')?.output).toBe('lambda**2 - 5*lambda + 6');
      expect(result.graph.nodes.map(n => n.id)).toEqual([
        'eigenvalues_start',
        'eigenvalues_characteristic',
        'eigenvalue_0',
        'eigenvector_0_0',
        'eigenvalue_1',
        'eigenvector_1_0'
      ]);
    });

    it('should decompose with partial pivoting', () => {
      const result = engine.run('matrix_lu', '[[1,2],[3,4]]');
      expect(result.graph.nodes.map(n => n.id)).toEqual([
        'lu_start',
        'lu_column_0',
        'lu_column_1',
        'lu_pivot',
        'lu_lower',
        'lu_upper',
        'lu_verify'
      ]);
      const column = result.graph.get('lu_column_0');
      expect(column?.input).toBe('Column 1: pivot in row 2 (swap rows 1 and 2)');
      expect(column?.explanation).toBe('Eliminate entries below the pivot in column 1 with multipliers l21 = 1/3');
      expect(result.graph.get('lu_column_1')?.explanation).toBe('No entries to eliminate below the pivot in column 2');
      expect(result.graph.get('lu_verify')?.dependencies).toEqual(['lu_lower', 'lu_upper']);
      expect(JSON.parse(result.output)).toMatchObject({ P: [[0, 1], [1, 0]] });
    });
  });
});

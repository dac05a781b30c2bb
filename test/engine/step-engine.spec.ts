import { describe, it, expect, vi, afterEach } from 'vitest';
import { createEngine } from '../../src/Bootstrap.js';
import { StepEngine, stepId } from '../../src/engine/StepEngine.js';
import { InputError, RuleNotFoundError, StepValidationError, classifyError } from '../../src/engine/Errors.js';
import { defineRewriteRule, defineStructuredRule } from '../../src/engine/Rule.js';
import { findPending, replaceExpression, resolvePending } from '../../src/engine/Goal.js';
import { mul } from '../../src/algebra/Canonical.js';
import { num, sym } from '../../src/algebra/AST.js';
import { DimensionError, ParseError } from '../../src/algebra/Errors.js';

afterEach(() => {
  vi.restoreAllMocks();
});

/**
 * Doubles the first pending derivative forever: never resolves, never repeats
 */
const grow = defineRewriteRule({
  name: 'grow',
  operation: 'differentiate',
  apply: goal => {
    const match = findPending(goal);
    if (!match) {
      return { output: goal, explanation: 'nothing pending', metadata: { noop: true } };
    }
    const { operand, variable } = match.derivative;
    return {
      output: resolvePending(goal, match.id, open => mul(num(2), open(operand, variable))),
      explanation: 'double it'
    };
  }
});

function constantRule(name: string, priority: number) {
  return defineRewriteRule({
    name,
    operation: 'expand',
    priority,
    apply: goal => ({ output: replaceExpression(goal, sym(name)), explanation: `rewrite to ${name}` })
  });
}

describe('StepEngine', () => {
  describe('Configuration', () => {
    it('should format step ids', () => {
      expect(stepId(1)).toBe('step_001');
      expect(stepId(42)).toBe('step_042');
    });

    it('should reject a non-positive step budget', () => {
      expect(() => createEngine({ maxSteps: 0 })).toThrow(InputError);
    });

    it('should list rules in selection order', () => {
      const names = createEngine().availableRules('differentiate');
      expect(names.slice(0, 6)).toEqual([
        'expand_higher_order',
        'diff_constant',
        'diff_identity',
        'constant_multiple',
        'sum_rule',
        'power_rule'
      ]);
      expect(names.slice(-2)).toEqual(['evaluate_derivative_fallback', 'simplify']);
    });
  });

  describe('Request checks', () => {
    const engine = createEngine();

    it('should reject an unknown operation', () => {
      expect(() => engine.run('integrate', 'x')).toThrow(InputError);
      expect(() => engine.run('integrate', 'x')).toThrow("Unknown operation 'integrate'");
    });

    it('should reject an order out of range before selecting any rule', () => {
      const matches = vi.fn(() => true);
      const spy = defineRewriteRule({
        name: 'spy',
        operation: 'differentiate',
        matches,
        apply: goal => ({ output: goal, explanation: 'spy', metadata: { noop: true } })
      });
      const guarded = createEngine({ bare: true, rules: [spy] });
      expect(() => guarded.run('differentiate', 'x**2', { order: 11 })).toThrow(
        'Derivative order must be an integer between 1 and 10, got 11'
      );
      expect(() => guarded.run('differentiate', 'x**2', { order: 0 })).toThrow(InputError);
      expect(matches).not.toHaveBeenCalled();
    });

    it('should reject an invalid variable name', () => {
      expect(() => engine.run('differentiate', 'x', { variable: '1x' })).toThrow("Invalid variable name '1x'");
    });

    it('should propagate parse errors as input errors', () => {
      let caught: unknown;
      try {
        engine.run('differentiate', 'sin(');
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ParseError);
      expect(classifyError(caught)).toBe('input');
    });

    it('should report a missing rule for a known operation', () => {
      const empty = createEngine({ bare: true });
      expect(() => empty.run('expand', 'x')).toThrow(RuleNotFoundError);
      expect(() => empty.run('expand', 'x')).toThrow("No rule found for operation 'expand'");
      expect(() => empty.run('matrix_rref', '[[1]]')).toThrow(RuleNotFoundError);
    });
  });

  describe('Fixpoint loop', () => {
    it('should stop at the step budget and warn', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const engine = createEngine({ bare: true, rules: [grow], maxSteps: 5 });
      const result = engine.run('differentiate', 'x');

      expect(result.graph.size).toBe(5);
      expect(result.output).toBe('32*Derivative(x, x)');
      expect(result.graph.nodes.map(n => n.dependencies)).toEqual([
        [],
        ['step_001'],
        ['step_002'],
        ['step_003'],
        ['step_004']
      ]);
      expect(result.warnings).toEqual(['Step budget of 5 exhausted before reaching a fixpoint']);
      expect(warn).toHaveBeenCalledWith('[engine] Step budget of 5 exhausted before reaching a fixpoint');
    });

    it('should apply the higher priority of two matching rules', () => {
      const engine = createEngine({ bare: true, rules: [constantRule('low', 1), constantRule('high', 5)] });
      const result = engine.run('expand', 'x');
      expect(result.output).toBe('high');
      expect(result.graph.nodes.map(n => n.rule)).toEqual(['high']);
    });

    it('should keep registration order between equal priorities', () => {
      const engine = createEngine({ bare: true, rules: [constantRule('first', 3), constantRule('second', 3)] });
      expect(engine.run('expand', 'x').output).toBe('first');
    });

    it('should stop without a step when the rule makes no change', () => {
      const result = createEngine().run('expand', 'x + 1');
      expect(result.output).toBe('x + 1');
      expect(result.graph.size).toBe(0);
    });

    it('should reject a rewrite rule that points at an unknown step', () => {
      const dangling = defineRewriteRule({
        name: 'bad_deps',
        operation: 'expand',
        apply: goal => ({
          output: replaceExpression(goal, sym('y')),
          explanation: 'bad',
          dependencies: ['nowhere']
        })
      });
      const engine = createEngine({ bare: true, rules: [dangling] });
      expect(() => engine.run('expand', 'x')).toThrow(
        'Invalid step emitted by rule bad_deps: Unknown dependency nowhere referenced by step_001'
      );
    });

    it('should be deterministic', () => {
      const first = createEngine().run('differentiate', 'sin(x)*cos(x)');
      const second = createEngine().run('differentiate', 'sin(x)*cos(x)');
      expect(JSON.stringify(second.toJSON())).toBe(JSON.stringify(first.toJSON()));
    });

    it('should log steps when verbose', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      createEngine({ verbose: true }).run('differentiate', 'x**2');
      expect(log).toHaveBeenCalledWith('[engine] step_001 [power_rule] Derivative(x**2, x) -> 2*x*Derivative(x, x)');
    });

    it('should stay quiet by default', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      createEngine().run('differentiate', 'x**2');
      expect(log).not.toHaveBeenCalled();
    });
  });

  describe('Structured rules', () => {
    function structured(name: string, nodes: Array<{ id: string; dependencies?: string[] }>) {
      return defineStructuredRule({
        name,
        operation: 'matrix_determinant',
        apply: (_request, graph) => {
          for (const { id, dependencies } of nodes) {
            graph.append({ id, operation: 'matrix_determinant', rule: 'inner', input: 'a', output: 'b', dependencies });
          }
          return { output: 'done', explanation: 'done' };
        }
      });
    }

    it('should reject duplicate ids and name the rule', () => {
      const engine = createEngine({ bare: true, rules: [structured('duplicate_ids', [{ id: 'dup' }, { id: 'dup' }])] });
      try {
        engine.run('matrix_determinant', '[[1]]');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(StepValidationError);
        if (err instanceof StepValidationError) {
          expect(err.ruleName).toBe('duplicate_ids');
          expect(err.message).toBe('Invalid step emitted by rule duplicate_ids: Duplicate StepNode id: dup');
        }
        expect(classifyError(err)).toBe('invariant');
      }
    });

    it('should reject dangling dependencies and name the rule', () => {
      const engine = createEngine({
        bare: true,
        rules: [structured('dangling', [{ id: 'a', dependencies: ['ghost'] }])]
      });
      expect(() => engine.run('matrix_determinant', '[[1]]')).toThrow(
        'Invalid step emitted by rule dangling: Unknown dependency ghost referenced by a'
      );
    });

    it('should carry the rule summary on the result', () => {
      const engine = createEngine({ bare: true, rules: [structured('fine', [{ id: 'a' }, { id: 'b', dependencies: ['a'] }])] });
      const result = engine.run('matrix_determinant', '[[1]]');
      expect(result.output).toBe('done');
      expect(result.summary).toBe('done');
      expect(result.graph.size).toBe(2);
    });

    it('should fail on dimension errors without producing a result', () => {
      const engine = createEngine();
      expect(() =>
        engine.run('matrix_multiply', '[[1,2,3],[4,5,6]]', { matrixB: '[[1,2],[3,4]]' })
      ).toThrow(DimensionError);
    });

    it('should require the second matrix for multiplication', () => {
      expect(() => createEngine().run('matrix_multiply', '[[1]]')).toThrow('matrix_multiply needs a second matrix');
    });
  });

  it('should accept an engine built from an explicit registry', () => {
    const engine = new StepEngine(createEngine().registry, { maxSteps: 3 });
    expect(engine.run('differentiate', 'x').output).toBe('1');
  });
});

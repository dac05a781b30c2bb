/**
 * Step engine
 *
 * Runs registered rules to turn one request into an explained step graph.
 * Expression operations rewrite a Goal until it reaches a fixpoint or the
 * step budget runs out; matrix operations hand the whole request to a single
 * structured rule. The engine never computes anything itself.
 */

import { dependsOn } from '../algebra/Inspect.js';
import { parseMatrix } from '../algebra/Matrix.js';
import { parseExpression } from '../algebra/Parser.js';
import { print } from '../algebra/Printer.js';
import { simplify } from '../algebra/Simplify.js';
import type { PluginRegistry } from '../plugins/Registry.js';
import { InputError, RuleNotFoundError, StepValidationError } from './Errors.js';
import { Goal, createGoal, derivativeGoal, goalText, isResolved } from './Goal.js';
import { EngineResult, Metadata, StepGraph, StepNode, StepNodeInit } from './Models.js';
import { MatrixRequest, explanations } from './Rule.js';

export const REWRITE_OPERATIONS = ['differentiate', 'expand', 'factor', 'simplify'] as const;

export const MATRIX_OPERATIONS = [
  'matrix_multiply',
  'matrix_determinant',
  'matrix_inverse',
  'matrix_rref',
  'matrix_eigenvalues',
  'matrix_lu'
] as const;

export type RewriteOperation = (typeof REWRITE_OPERATIONS)[number];
export type MatrixOperation = (typeof MATRIX_OPERATIONS)[number];
export type Operation = RewriteOperation | MatrixOperation;

export const MAX_ORDER = 10;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isRewriteOperation(operation: string): operation is RewriteOperation {
  return REWRITE_OPERATIONS.some(op => op === operation);
}

export function isMatrixOperation(operation: string): operation is MatrixOperation {
  return MATRIX_OPERATIONS.some(op => op === operation);
}

export interface EngineConfig {
  /** Upper bound on recorded rewrite steps per run (default: 64) */
  maxSteps?: number;

  /** Log each step (default: false) */
  verbose?: boolean;
}

export interface RunOptions {
  /** Differentiation variable (default: 'x') */
  variable?: string;

  /** Derivative order, 1 to 10 (default: 1) */
  order?: number;

  /** Right-hand matrix for matrix_multiply, as JSON text */
  matrixB?: string;
}

export function stepId(index: number): string {
  return `step_${String(index).padStart(3, '0')}`;
}

export class StepEngine {
  private readonly maxSteps: number;
  private readonly verbose: boolean;

  constructor(
    public readonly registry: PluginRegistry,
    config: EngineConfig = {}
  ) {
    const { maxSteps = 64, verbose = false } = config;
    if (!Number.isInteger(maxSteps) || maxSteps < 1) {
      throw new InputError(`maxSteps must be a positive integer, got ${maxSteps}`, 'maxSteps');
    }
    this.maxSteps = maxSteps;
    this.verbose = verbose;
  }

  run(operation: string, expression: string, options: RunOptions = {}): EngineResult {
    if (isRewriteOperation(operation)) {
      return this.runRewrite(operation, expression, options);
    }
    if (isMatrixOperation(operation)) {
      return this.runStructured(operation, expression, options);
    }
    throw new InputError(
      `Unknown operation '${operation}'. Expected one of: ${[...REWRITE_OPERATIONS, ...MATRIX_OPERATIONS].join(', ')}`,
      'operation'
    );
  }

  availableRules(operation: string): string[] {
    return this.registry.listRules(operation).map(rule => rule.capabilities.name);
  }

  private runRewrite(operation: RewriteOperation, expression: string, options: RunOptions): EngineResult {
    const { variable = 'x', order = 1 } = options;
    if (!IDENTIFIER.test(variable)) {
      throw new InputError(`Invalid variable name '${variable}'`, 'variable');
    }
    if (operation === 'differentiate' && (!Number.isInteger(order) || order < 1 || order > MAX_ORDER)) {
      throw new InputError(`Derivative order must be an integer between 1 and ${MAX_ORDER}, got ${order}`, 'order');
    }

    const parsed = parseExpression(expression);
    const warnings: string[] = [];
    const variableAbsent = operation === 'differentiate' && !dependsOn(parsed, variable);
    if (variableAbsent) {
      this.warn(warnings, `Expression '${expression}' does not contain variable '${variable}'. The derivative is 0.`);
    }

    let goal: Goal = operation === 'differentiate' ? derivativeGoal(parsed, variable, order) : createGoal(parsed);
    const graph = new StepGraph();
    let previous: string | undefined;
    let finished = false;

    for (let index = 1; index <= this.maxSteps; index++) {
      const rule = this.registry.selectRewriteRule(operation, goal);
      if (!rule) {
        if (index === 1) throw new RuleNotFoundError(operation);
        finished = true;
        break;
      }

      const input = goalText(goal);
      const result = rule.apply(goal, graph);
      const output = goalText(result.output);
      if (output === input || result.metadata?.noop === true) {
        this.log(`${rule.capabilities.name} made no change, stopping`);
        finished = true;
        break;
      }

      let metadata: Metadata = result.metadata ?? {};
      if (variableAbsent && index === 1) {
        metadata = { ...metadata, variableAbsent: true };
      }

      const node = this.append(graph, rule.capabilities.name, {
        id: stepId(index),
        operation,
        rule: rule.capabilities.name,
        input,
        output,
        explanation: result.explanation,
        dependencies: result.dependencies ?? (previous ? [previous] : []),
        metadata
      });
      this.log(`${node.id} [${node.rule}] ${input} -> ${output}`);

      previous = node.id;
      goal = result.output;
      if (isResolved(goal)) {
        finished = true;
        break;
      }
    }

    if (!finished) {
      this.warn(warnings, `Step budget of ${this.maxSteps} exhausted before reaching a fixpoint`);
    }

    let output = goalText(goal);
    if (operation === 'differentiate' && isResolved(goal)) {
      const simplified = print(simplify(goal.expression));
      if (simplified !== output) {
        const node = this.append(graph, 'simplify_result', {
          id: stepId(graph.size + 1),
          operation,
          rule: 'simplify_result',
          input: output,
          output: simplified,
          explanation: 'Simplify the final result using algebraic and trigonometric identities',
          dependencies: previous ? [previous] : [],
          metadata: explanations(
            'Apply algebraic simplification, combine like terms, and use trigonometric identities to present the result in its simplest form.',
            'After completing all differentiation steps, we simplify the result. This involves combining like terms, reducing fractions, and applying algebraic and trigonometric identities to express the derivative in its most compact and elegant form.'
          )
        });
        this.log(`${node.id} [simplify_result] ${output} -> ${simplified}`);
        output = simplified;
      }
    }

    return new EngineResult(operation, expression, output, graph, warnings);
  }

  private runStructured(operation: MatrixOperation, expression: string, options: RunOptions): EngineResult {
    const request: MatrixRequest = { operation, source: expression, matrix: parseMatrix(expression) };
    if (operation === 'matrix_multiply') {
      if (options.matrixB === undefined) {
        throw new InputError('matrix_multiply needs a second matrix', 'matrixB');
      }
      request.matrixB = parseMatrix(options.matrixB);
    }

    const rule = this.registry.selectStructuredRule(operation, request);
    if (!rule) {
      throw new RuleNotFoundError(operation);
    }

    const graph = new StepGraph();
    const name = rule.capabilities.name;
    let output: string;
    let summary: string;
    try {
      ({ output, explanation: summary } = rule.apply(request, graph));
      graph.validate();
    } catch (err) {
      if (err instanceof StepValidationError) {
        throw err.forRule(name);
      }
      throw err;
    }

    this.log(`${name} produced ${graph.size} steps`);
    return new EngineResult(operation, expression, output, graph, [], summary);
  }

  private append(graph: StepGraph, ruleName: string, init: StepNodeInit): StepNode {
    try {
      return graph.append(init);
    } catch (err) {
      if (err instanceof StepValidationError) {
        throw err.forRule(ruleName);
      }
      throw err;
    }
  }

  private log(message: string): void {
    if (this.verbose) {
      console.log(`[engine] ${message}`);
    }
  }

  private warn(warnings: string[], message: string): void {
    warnings.push(message);
    console.warn(`[engine] ${message}`);
  }
}

/**
 * Solver that differentiates in one shot through the algebra backend,
 * without recording steps. Useful as a cross-check for the step engine.
 */

import { nthDerivative } from '../algebra/Differentiate.js';
import { parseExpression } from '../algebra/Parser.js';
import { print } from '../algebra/Printer.js';
import { simplify } from '../algebra/Simplify.js';
import type { PluginManifest } from '../engine/Rule.js';
import type { SolveOptions, SolverCapabilities, SolverPlugin, SolverResult } from './Interfaces.js';

const MANIFEST: PluginManifest = {
  name: 'stepwise-backend',
  version: '0.1.0',
  description: 'Direct evaluation through the algebra backend'
};

export class BackendDifferentiateSolver implements SolverPlugin {
  readonly manifest = MANIFEST;
  readonly capabilities: SolverCapabilities = {
    name: 'backend differentiate',
    operation: 'differentiate',
    domains: ['calculus']
  };

  solve(expression: string, options: SolveOptions = {}): SolverResult {
    const { variable = 'x', order = 1 } = options;
    const derivative = nthDerivative(parseExpression(expression), variable, order);
    return { output: print(simplify(derivative)), metadata: { backend: true } };
  }
}

/**
 * Plugin registry
 *
 * A RegistryBuilder collects rules, renderers and solvers at startup and
 * produces a frozen PluginRegistry that the engine only reads from.
 */

import type { Goal } from '../engine/Goal.js';
import { RegistryError } from '../engine/Errors.js';
import type { MatrixRequest, RewriteRule, Rule, StructuredRule } from '../engine/Rule.js';
import type { RendererPlugin, SolverPlugin } from './Interfaces.js';

export interface RegistryOptions {
  /** Log registrations (default: false) */
  verbose?: boolean;
}

export class RegistryBuilder {
  private readonly rules: Rule[] = [];
  private readonly renderers: RendererPlugin[] = [];
  private readonly solvers: SolverPlugin[] = [];
  private readonly verbose: boolean;

  constructor(options: RegistryOptions = {}) {
    const { verbose = false } = options;
    this.verbose = verbose;
  }

  registerRule(rule: Rule): this {
    const { name, operation, priority } = rule.capabilities;
    if (this.rules.some(r => r.capabilities.name === name && r.capabilities.operation === operation)) {
      throw new RegistryError(`Rule '${name}' is already registered for operation '${operation}'`);
    }
    this.rules.push(rule);
    if (this.verbose) {
      console.log(`[registry] rule ${name} (${operation}, priority ${priority})`);
    }
    return this;
  }

  registerRules(rules: Iterable<Rule>): this {
    for (const rule of rules) this.registerRule(rule);
    return this;
  }

  registerRenderer(renderer: RendererPlugin): this {
    this.renderers.push(renderer);
    if (this.verbose) {
      console.log(`[registry] renderer ${renderer.capabilities.name} (${renderer.capabilities.formats.join(', ')})`);
    }
    return this;
  }

  registerSolver(solver: SolverPlugin): this {
    this.solvers.push(solver);
    if (this.verbose) {
      console.log(`[registry] solver ${solver.capabilities.name} (${solver.capabilities.operation})`);
    }
    return this;
  }

  build(): PluginRegistry {
    if (this.verbose) {
      console.log(
        `[registry] built: ${this.rules.length} rules, ${this.renderers.length} renderers, ${this.solvers.length} solvers`
      );
    }
    return new PluginRegistry(this.rules, this.renderers, this.solvers);
  }
}

export class PluginRegistry {
  private readonly rules: readonly Rule[];
  private readonly renderers: readonly RendererPlugin[];
  private readonly solvers: readonly SolverPlugin[];
  private readonly byOperation = new Map<string, readonly Rule[]>();

  constructor(rules: readonly Rule[], renderers: readonly RendererPlugin[], solvers: readonly SolverPlugin[]) {
    this.rules = Object.freeze([...rules]);
    this.renderers = Object.freeze([...renderers]);
    this.solvers = Object.freeze([...solvers]);

    for (const operation of new Set(this.rules.map(r => r.capabilities.operation))) {
      // Array.prototype.sort is stable: equal priorities keep registration order
      const ordered = this.rules
        .filter(r => r.capabilities.operation === operation)
        .sort((a, b) => b.capabilities.priority - a.capabilities.priority);
      this.byOperation.set(operation, Object.freeze(ordered));
    }
  }

  operations(): string[] {
    return [...this.byOperation.keys()];
  }

  listRules(operation: string): readonly Rule[] {
    return this.byOperation.get(operation) ?? [];
  }

  selectRewriteRule(operation: string, goal: Goal): RewriteRule | undefined {
    for (const rule of this.listRules(operation)) {
      if (rule.kind === 'rewrite' && rule.matches(goal)) return rule;
    }
    return undefined;
  }

  selectStructuredRule(operation: string, request: MatrixRequest): StructuredRule | undefined {
    for (const rule of this.listRules(operation)) {
      if (rule.kind === 'structured' && rule.matches(request)) return rule;
    }
    return undefined;
  }

  getRenderer(format: string): RendererPlugin | undefined {
    return this.renderers.find(r => r.capabilities.formats.includes(format));
  }

  formats(): string[] {
    return this.renderers.flatMap(r => [...r.capabilities.formats]);
  }

  getSolver(operation: string): SolverPlugin | undefined {
    return this.solvers.find(s => s.capabilities.operation === operation);
  }
}

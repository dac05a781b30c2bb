/**
 * Wiring for the built-in plugins. Entry points call createEngine once and
 * pass the engine (and its registry) around by reference.
 */

import { StepEngine, EngineConfig } from './engine/StepEngine.js';
import type { Rule } from './engine/Rule.js';
import { algebraRules } from './engine/rules/AlgebraRules.js';
import { calculusRules } from './engine/rules/CalculusRules.js';
import { linalgRules } from './engine/rules/LinalgRules.js';
import { BackendDifferentiateSolver } from './plugins/BackendSolver.js';
import type { RendererPlugin, SolverPlugin } from './plugins/Interfaces.js';
import { PluginRegistry, RegistryBuilder, RegistryOptions } from './plugins/Registry.js';
import { JsonRenderer } from './renderers/JsonRenderer.js';
import { TextRenderer } from './renderers/TextRenderer.js';

export interface BootstrapOptions extends RegistryOptions {
  /** Extra rules registered after the built-in ones */
  rules?: readonly Rule[];

  /** Extra renderers registered after text and json */
  renderers?: readonly RendererPlugin[];

  /** Extra solvers registered after the backend solver */
  solvers?: readonly SolverPlugin[];

  /** Skip the built-in plugins entirely (default: false) */
  bare?: boolean;
}

export const BUILTIN_RULES: readonly Rule[] = [...calculusRules, ...algebraRules, ...linalgRules];

export function createRegistry(options: BootstrapOptions = {}): PluginRegistry {
  const { rules = [], renderers = [], solvers = [], bare = false, verbose = false } = options;
  const builder = new RegistryBuilder({ verbose });

  if (!bare) {
    builder
      .registerRules(BUILTIN_RULES)
      .registerRenderer(new TextRenderer())
      .registerRenderer(new JsonRenderer())
      .registerSolver(new BackendDifferentiateSolver());
  }

  builder.registerRules(rules);
  renderers.forEach(r => builder.registerRenderer(r));
  solvers.forEach(s => builder.registerSolver(s));
  return builder.build();
}

export function createEngine(config: EngineConfig & BootstrapOptions = {}): StepEngine {
  const { maxSteps, verbose, ...plugins } = config;
  return new StepEngine(createRegistry({ ...plugins, verbose }), { maxSteps, verbose });
}

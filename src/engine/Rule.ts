/**
 * Rule abstraction
 *
 * Two explicit variants: rewrite rules transform a Goal one step at a time,
 * structured rules handle a whole matrix request in one call and append their
 * own explanatory nodes to the graph.
 */

import type { Matrix } from '../algebra/Matrix.js';
import type { Goal } from './Goal.js';
import type { Metadata, StepGraph } from './Models.js';

export type Domain = 'calculus' | 'algebra' | 'linear_algebra' | 'general';

export interface PluginManifest {
  name: string;
  version: string;
  description: string;
}

export interface RuleCapabilities {
  name: string;
  operation: string;
  /** Higher is tried first */
  priority: number;
  domains: readonly Domain[];
}

export interface RuleResult<T> {
  output: T;
  explanation: string;
  /** Explicit dependencies; defaults to the previous step */
  dependencies?: readonly string[];
  metadata?: Metadata;
}

export interface MatrixRequest {
  operation: string;
  /** Matrix text as given */
  source: string;
  matrix: Matrix;
  matrixB?: Matrix;
}

export interface RewriteRule {
  readonly kind: 'rewrite';
  readonly manifest: PluginManifest;
  readonly capabilities: RuleCapabilities;
  matches(goal: Goal): boolean;
  apply(goal: Goal, graph: StepGraph): RuleResult<Goal>;
}

export interface StructuredRule {
  readonly kind: 'structured';
  readonly manifest: PluginManifest;
  readonly capabilities: RuleCapabilities;
  matches(request: MatrixRequest): boolean;
  apply(request: MatrixRequest, graph: StepGraph): RuleResult<string>;
}

export type Rule = RewriteRule | StructuredRule;

export const BUILTIN_MANIFEST: PluginManifest = {
  name: 'stepwise-builtin-rules',
  version: '0.1.0',
  description: 'Built-in rules'
};

interface RuleDefinition<S, T> {
  name: string;
  operation: string;
  priority?: number;
  domains?: readonly Domain[];
  manifest?: PluginManifest;
  /** Defaults to always matching */
  matches?: (subject: S) => boolean;
  apply: (subject: S, graph: StepGraph) => RuleResult<T>;
}

export type RewriteRuleDefinition = RuleDefinition<Goal, Goal>;
export type StructuredRuleDefinition = RuleDefinition<MatrixRequest, string>;

function capabilitiesOf<S, T>(def: RuleDefinition<S, T>): RuleCapabilities {
  const { name, operation, priority = 0, domains = ['general'] } = def;
  return Object.freeze({ name, operation, priority, domains: Object.freeze([...domains]) });
}

export function defineRewriteRule(def: RewriteRuleDefinition): RewriteRule {
  const matches = def.matches ?? (() => true);
  const rule: RewriteRule = {
    kind: 'rewrite',
    manifest: def.manifest ?? BUILTIN_MANIFEST,
    capabilities: capabilitiesOf(def),
    matches,
    apply: def.apply
  };
  return Object.freeze(rule);
}

export function defineStructuredRule(def: StructuredRuleDefinition): StructuredRule {
  const matches = def.matches ?? (() => true);
  const rule: StructuredRule = {
    kind: 'structured',
    manifest: def.manifest ?? BUILTIN_MANIFEST,
    capabilities: capabilitiesOf(def),
    matches,
    apply: def.apply
  };
  return Object.freeze(rule);
}

/**
 * Metadata carrying the longer explanations renderers show at higher verbosity
 */
export function explanations(detailed: string, teacher: string, extra: Metadata = {}): Metadata {
  return { explanations: { detailed, teacher }, ...extra };
}

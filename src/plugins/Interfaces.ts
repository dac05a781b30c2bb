/**
 * Plugin contracts for renderers and solvers.
 * Rules live in engine/Rule.ts since the engine drives them directly.
 */

import type { EngineResult, Metadata } from '../engine/Models.js';
import type { Domain, PluginManifest } from '../engine/Rule.js';

export type { Domain, PluginManifest, Rule, RewriteRule, StructuredRule } from '../engine/Rule.js';

export type Verbosity = 'concise' | 'detailed' | 'teacher';

export const VERBOSITIES: readonly Verbosity[] = ['concise', 'detailed', 'teacher'];

export function isVerbosity(value: string): value is Verbosity {
  return VERBOSITIES.some(v => v === value);
}

export interface RendererCapabilities {
  name: string;
  formats: readonly string[];
}

/**
 * Turns a finished result into text. Must not mutate the result.
 */
export interface RendererPlugin {
  readonly manifest: PluginManifest;
  readonly capabilities: RendererCapabilities;
  render(result: EngineResult, format: string, verbosity: Verbosity): string;
}

export interface SolverCapabilities {
  name: string;
  operation: string;
  domains: readonly Domain[];
}

export interface SolverResult {
  output: string;
  metadata: Metadata;
}

export interface SolveOptions {
  variable?: string;
  order?: number;
}

/**
 * Computes an answer directly, without a step graph
 */
export interface SolverPlugin {
  readonly manifest: PluginManifest;
  readonly capabilities: SolverCapabilities;
  solve(expression: string, options?: SolveOptions): SolverResult;
}

/**
 * Plain-text renderer. Verbosity controls how much of each step is shown:
 * concise prints the rewrite only, detailed adds the rule and explanation,
 * teacher adds the long explanation and any remaining metadata.
 */

import type { EngineResult, JsonValue, StepNode } from '../engine/Models.js';
import type { PluginManifest } from '../engine/Rule.js';
import type { RendererCapabilities, RendererPlugin, Verbosity } from '../plugins/Interfaces.js';

export const RENDERER_MANIFEST: PluginManifest = {
  name: 'stepwise-renderers',
  version: '0.1.0',
  description: 'Built-in renderers'
};

/**
 * Explanation text of the requested level, falling back to the node's own explanation
 */
export function explanationFor(node: StepNode, level: 'detailed' | 'teacher'): string {
  const value: JsonValue | undefined = node.metadata.explanations;
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    const text = value[level];
    if (typeof text === 'string' && text.length > 0) return text;
  }
  return node.explanation;
}

function notes(node: StepNode): string | undefined {
  const rest = Object.entries(node.metadata).filter(([key]) => key !== 'explanations');
  return rest.length > 0 ? JSON.stringify(Object.fromEntries(rest)) : undefined;
}

export class TextRenderer implements RendererPlugin {
  readonly manifest = RENDERER_MANIFEST;
  readonly capabilities: RendererCapabilities = { name: 'text', formats: ['text'] };

  render(result: EngineResult, _format: string, verbosity: Verbosity): string {
    const lines: string[] = [`Operation: ${result.operation}`, `Input: ${result.input}`, `Output: ${result.output}`];
    if (result.summary !== undefined && verbosity !== 'concise') {
      lines.push(`Summary: ${result.summary}`);
    }
    for (const warning of result.warnings) {
      lines.push(`Warning: ${warning}`);
    }
    lines.push('');

    const nodes = result.graph.nodes;
    if (nodes.length === 0) {
      lines.push('(no steps)');
      return lines.join('\n');
    }

    lines.push('Steps:');
    for (const node of nodes) {
      if (verbosity === 'concise') {
        lines.push(`- ${node.input} -> ${node.output}`);
        continue;
      }

      lines.push(`- [${node.rule}] ${node.input} -> ${node.output}`);
      if (verbosity === 'detailed') {
        lines.push(`  ${explanationFor(node, 'detailed')}`);
      } else {
        lines.push(`  Explanation: ${explanationFor(node, 'teacher')}`);
        const extra = notes(node);
        if (extra) lines.push(`  Notes: ${extra}`);
      }
    }
    return lines.join('\n');
  }
}

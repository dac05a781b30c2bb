/**
 * JSON renderer. Canonical and stable: sorted keys, two-space indent,
 * the same output at every verbosity.
 */

import type { EngineResult } from '../engine/Models.js';
import type { RendererCapabilities, RendererPlugin, Verbosity } from '../plugins/Interfaces.js';
import { RENDERER_MANIFEST } from './TextRenderer.js';

export function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries.map(([key, inner]) => [key, sortKeys(inner)]));
  }
  return value;
}

export class JsonRenderer implements RendererPlugin {
  readonly manifest = RENDERER_MANIFEST;
  readonly capabilities: RendererCapabilities = { name: 'json', formats: ['json'] };

  render(result: EngineResult, _format: string, _verbosity: Verbosity): string {
    return JSON.stringify(sortKeys(result.toJSON()), null, 2);
  }
}

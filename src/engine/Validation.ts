/**
 * Structural invariants of a step graph: required fields, unique ids,
 * dependencies that exist, and no cycles.
 */

import { StepValidationError } from './Errors.js';
import type { StepNode } from './Models.js';

/**
 * Check one node against the ids already in its graph
 */
export function validateStepNode(node: StepNode, knownIds: ReadonlySet<string> = new Set()): void {
  checkFields(node);
  if (knownIds.has(node.id)) {
    throw new StepValidationError(`Duplicate StepNode id: ${node.id}`, undefined, node.id);
  }
  for (const dep of node.dependencies) {
    if (!knownIds.has(dep)) {
      throw new StepValidationError(`Unknown dependency ${dep} referenced by ${node.id}`, undefined, node.id);
    }
  }
}

function checkFields(node: StepNode): void {
  if (!node.id) {
    throw new StepValidationError('StepNode.id must be non-empty');
  }
  if (!node.operation) {
    throw new StepValidationError('StepNode.operation must be non-empty', undefined, node.id);
  }
  if (!node.rule) {
    throw new StepValidationError('StepNode.rule must be non-empty', undefined, node.id);
  }
}

/**
 * Check a whole node list. Dependencies may point anywhere in the list;
 * acyclicity is checked with Kahn's algorithm.
 */
export function validateStepGraph(nodes: readonly StepNode[]): void {
  const seen = new Set<string>();
  for (const node of nodes) {
    checkFields(node);
    if (seen.has(node.id)) {
      throw new StepValidationError(`Duplicate StepNode id: ${node.id}`, undefined, node.id);
    }
    seen.add(node.id);
  }

  const edges = new Map<string, string[]>();
  const indegree = new Map<string, number>();
  for (const id of seen) indegree.set(id, 0);

  for (const node of nodes) {
    for (const dep of node.dependencies) {
      if (!seen.has(dep)) {
        throw new StepValidationError(`Unknown dependency ${dep} referenced by ${node.id}`, undefined, node.id);
      }
      const out = edges.get(dep) ?? [];
      out.push(node.id);
      edges.set(dep, out);
      indegree.set(node.id, (indegree.get(node.id) ?? 0) + 1);
    }
  }

  const queue = [...seen].filter(id => indegree.get(id) === 0);
  let visited = 0;
  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;
    visited++;
    for (const next of edges.get(id) ?? []) {
      const remaining = (indegree.get(next) ?? 0) - 1;
      indegree.set(next, remaining);
      if (remaining === 0) queue.push(next);
    }
  }

  if (visited !== seen.size) {
    throw new StepValidationError('Cycle detected in StepGraph');
  }
}

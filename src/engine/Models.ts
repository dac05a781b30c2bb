/**
 * Step graph data model
 *
 * A run records its reasoning as an append-only list of frozen StepNodes whose
 * dependencies always point at earlier nodes. Every insertion is validated.
 */

import { StepValidationError } from './Errors.js';
import { validateStepGraph, validateStepNode } from './Validation.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type Metadata = { [key: string]: JsonValue };

export interface StepNode {
  readonly id: string;
  readonly operation: string;
  readonly rule: string;
  readonly input: string;
  readonly output: string;
  readonly explanation: string;
  readonly dependencies: readonly string[];
  readonly metadata: Readonly<Metadata>;
}

/**
 * Fields accepted when creating a node; explanation, dependencies and metadata default to empty
 */
export interface StepNodeInit {
  id: string;
  operation: string;
  rule: string;
  input: string;
  output: string;
  explanation?: string;
  dependencies?: readonly string[];
  metadata?: Metadata;
}

export function createStepNode(init: StepNodeInit): StepNode {
  return Object.freeze({
    id: init.id,
    operation: init.operation,
    rule: init.rule,
    input: init.input,
    output: init.output,
    explanation: init.explanation ?? '',
    dependencies: Object.freeze([...(init.dependencies ?? [])]),
    metadata: Object.freeze({ ...(init.metadata ?? {}) })
  });
}

export class StepGraph {
  private readonly items: StepNode[] = [];
  private readonly ids = new Set<string>();

  get nodes(): readonly StepNode[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  get(id: string): StepNode | undefined {
    return this.items.find(node => node.id === id);
  }

  last(): StepNode | undefined {
    return this.items[this.items.length - 1];
  }

  /**
   * Validate and append a node. Throws StepValidationError naming the node's rule
   * if the node would break an invariant; the graph is unchanged in that case.
   */
  append(init: StepNodeInit): StepNode {
    const node = createStepNode(init);
    try {
      validateStepNode(node, this.ids);
    } catch (err) {
      if (err instanceof StepValidationError && node.rule) {
        throw err.forRule(node.rule);
      }
      throw err;
    }
    this.items.push(node);
    this.ids.add(node.id);
    return node;
  }

  /**
   * Bulk check of the whole graph
   */
  validate(): void {
    validateStepGraph(this.items);
  }

  toJSON(): { nodes: StepNode[] } {
    return { nodes: this.items.slice() };
  }
}

export interface EngineResultJSON {
  operation: string;
  input: string;
  output: string;
  graph: { nodes: StepNode[] };
  warnings?: string[];
  summary?: string;
}

/**
 * Terminal value of one run. Owns its graph.
 */
export class EngineResult {
  constructor(
    public readonly operation: string,
    public readonly input: string,
    public readonly output: string,
    public readonly graph: StepGraph,
    public readonly warnings: readonly string[] = [],
    /** One-line account of the whole run, set by structured rules */
    public readonly summary?: string
  ) {}

  toJSON(): EngineResultJSON {
    const json: EngineResultJSON = {
      operation: this.operation,
      input: this.input,
      output: this.output,
      graph: this.graph.toJSON()
    };
    if (this.warnings.length > 0) {
      json.warnings = [...this.warnings];
    }
    if (this.summary !== undefined) {
      json.summary = this.summary;
    }
    return json;
  }
}

/**
 * Extending the engine: a Markdown renderer and a rule that runs ahead of the built-ins
 */

import {
  algebra,
  createEngine,
  defineRewriteRule,
  explanationFor,
  findPending,
  resolvePending,
  RENDERER_MANIFEST,
  type EngineResult,
  type PendingDerivative,
  type RendererPlugin,
  type Verbosity
} from '../src/index.js';

class MarkdownRenderer implements RendererPlugin {
  readonly manifest = { ...RENDERER_MANIFEST, name: 'markdown-renderer' };
  readonly capabilities = { name: 'markdown', formats: ['markdown', 'md'] };

  render(result: EngineResult, _format: string, verbosity: Verbosity): string {
    const lines = [`## ${result.operation}: \`${result.input}\``, '', `**Result:** \`${result.output}\``, ''];
    result.graph.nodes.forEach((node, index) => {
      lines.push(`${index + 1}. \`${node.input}\` → \`${node.output}\``);
      if (verbosity !== 'concise') {
        lines.push(`   - *${node.rule}*: ${explanationFor(node, verbosity === 'teacher' ? 'teacher' : 'detailed')}`);
      }
    });
    return lines.join('\n');
  }
}

const isSquare = (d: PendingDerivative): boolean =>
  d.operand.kind === 'pow' &&
  d.operand.base.kind === 'symbol' &&
  d.operand.base.name === d.variable &&
  algebra.integerValue(d.operand.exponent) === 2n;

// d/dx[x**2] = 2*x in one step, skipping the general power rule
const squareShortcut = defineRewriteRule({
  name: 'square_shortcut',
  operation: 'differentiate',
  priority: 120,
  domains: ['calculus'],
  matches: goal => findPending(goal, isSquare) !== undefined,
  apply: goal => {
    const match = findPending(goal, isSquare);
    if (!match) {
      return { output: goal, explanation: 'No square to shortcut', metadata: { noop: true } };
    }
    const { variable } = match.derivative;
    return {
      output: resolvePending(goal, match.id, () => algebra.mul(algebra.num(2), algebra.sym(variable))),
      explanation: `d/d${variable}[${variable}**2] = 2*${variable}`
    };
  }
});

const engine = createEngine({ rules: [squareShortcut], renderers: [new MarkdownRenderer()] });
console.log(engine.availableRules('differentiate').slice(0, 3));

const markdown = engine.registry.getRenderer('md');
console.log(markdown?.render(engine.run('differentiate', 'x**2 + sin(x)'), 'md', 'detailed'));

/**
 * CLI driver. Returns an exit code instead of exiting so it can be tested:
 * 0 on success, 1 for bad input, 2 when a rule, the registry or the backend fails.
 */

import { createEngine } from '../Bootstrap.js';
import { classifyError, InputError } from '../engine/Errors.js';
import { isMatrixOperation, Operation, StepEngine } from '../engine/StepEngine.js';
import { validateExpressionInput, validateVariableName } from '../InputValidator.js';
import { CliArgs, COMMANDS, parseArgs, usage } from './Args.js';

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
}

export const consoleIo: CliIo = {
  out: text => console.log(text),
  err: text => console.error(text)
};

export const EXIT_OK = 0;
export const EXIT_INPUT = 1;
export const EXIT_INTERNAL = 2;

function listRules(engine: StepEngine, operation: string): string {
  const rules = engine.registry.listRules(operation);
  if (rules.length === 0) {
    throw new InputError(`No rules registered for operation '${operation}'`, 'operation');
  }
  const lines = rules.map(rule => {
    const { name, priority, domains } = rule.capabilities;
    return `${name.padEnd(36)} priority ${String(priority).padStart(4)}  [${domains.join(', ')}]`;
  });
  return [`Rules for ${operation} (highest priority first):`, ...lines].join('\n');
}

function execute(engine: StepEngine, operation: Operation, args: CliArgs): string {
  const renderer = engine.registry.getRenderer(args.format);
  if (!renderer) {
    throw new InputError(
      `Unknown format '${args.format}'. Expected one of: ${engine.registry.formats().join(', ')}`,
      'format'
    );
  }

  const expected = operation === 'matrix_multiply' ? 2 : 1;
  if (args.positionals.length !== expected) {
    throw new InputError(
      `'${args.command}' takes ${expected} argument${expected === 1 ? '' : 's'}, got ${args.positionals.length}`
    );
  }

  const [first, second] = args.positionals;
  const result = isMatrixOperation(operation)
    ? engine.run(operation, first, { matrixB: second })
    : engine.run(operation, validateExpressionInput(first), {
        variable: validateVariableName(args.variable),
        order: args.order
      });

  return renderer.render(result, args.format, args.verbosity);
}

export function runCli(argv: readonly string[], io: CliIo = consoleIo): number {
  try {
    const args = parseArgs(argv);
    if (args.help || args.command === undefined) {
      io.out(usage());
      return args.help ? EXIT_OK : EXIT_INPUT;
    }

    const engine = createEngine({ maxSteps: args.maxSteps, verbose: args.verbose });
    if (args.command === 'rules') {
      io.out(listRules(engine, args.operation));
      return EXIT_OK;
    }

    const operation = COMMANDS.get(args.command);
    if (operation === undefined) {
      io.err(`Error: Unknown command "${args.command}"`);
      io.err(usage());
      return EXIT_INPUT;
    }

    io.out(execute(engine, operation, args));
    return EXIT_OK;
  } catch (err) {
    const category = classifyError(err);
    const message = err instanceof Error ? err.message : String(err);
    if (category === 'input') {
      io.err(`Error: ${message}`);
      return EXIT_INPUT;
    }

    io.err(category === 'invariant' ? `Internal error: ${message}` : `Error: Computation failed: ${message}`);
    if (err instanceof Error && err.stack) {
      io.err('\nStack trace:');
      io.err(err.stack);
    }
    return EXIT_INTERNAL;
  }
}

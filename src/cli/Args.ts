/**
 * Command-line argument parsing
 */

import { InputError } from '../engine/Errors.js';
import type { Operation } from '../engine/StepEngine.js';
import { Verbosity, isVerbosity, VERBOSITIES } from '../plugins/Interfaces.js';

export const COMMANDS: ReadonlyMap<string, Operation> = new Map<string, Operation>([
  ['differentiate', 'differentiate'],
  ['expand', 'expand'],
  ['factor', 'factor'],
  ['simplify', 'simplify'],
  ['matrix-multiply', 'matrix_multiply'],
  ['matrix-determinant', 'matrix_determinant'],
  ['matrix-inverse', 'matrix_inverse'],
  ['matrix-rref', 'matrix_rref'],
  ['matrix-eigenvalues', 'matrix_eigenvalues'],
  ['matrix-lu', 'matrix_lu']
]);

export interface CliArgs {
  /** Command name as typed, or 'rules' */
  command?: string;
  positionals: string[];
  variable: string;
  order: number;
  format: string;
  verbosity: Verbosity;
  maxSteps?: number;
  /** Operation whose rules the 'rules' command lists */
  operation: string;
  verbose: boolean;
  help: boolean;
}

export function usage(): string {
  return `
stepwise - explain symbolic math one rule at a time

Usage:
  stepwise <command> <input> [options]

Commands:
  differentiate <expr>        Differentiate with respect to --variable
  expand <expr>               Multiply out products and powers
  factor <expr>               Factor a polynomial
  simplify <expr>             Simplify, applying trigonometric identities
  matrix-multiply <A> <B>     Multiply two matrices given as JSON
  matrix-determinant <A>      Determinant by cofactor expansion
  matrix-inverse <A>          Inverse via the adjugate
  matrix-rref <A>             Reduced row echelon form
  matrix-eigenvalues <A>      Eigenvalues and eigenvectors
  matrix-lu <A>               LU decomposition with partial pivoting
  rules                       List rules for --operation

Options:
  -v, --variable <name>       Differentiation variable (default: x)
  -n, --order <n>             Derivative order, 1 to 10 (default: 1)
  --format <text|json>        Output format (default: text)
  --verbosity <level>         concise, detailed or teacher (default: detailed)
  --max-steps <n>             Step budget per run (default: 64)
  --operation <op>            Operation for 'rules' (default: differentiate)
  --verbose                   Log engine activity
  -h, --help                  Show this help

Examples:
  stepwise differentiate "sin(x**2)"
  stepwise differentiate "x**3" --order 2 --format json
  stepwise matrix-determinant "[[1,2],[3,4]]" --verbosity teacher
`.trim();
}

function positiveInteger(flag: string, raw: string): number {
  const value = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value) || value < 1) {
    throw new InputError(`Invalid value for ${flag}: '${raw}'. Must be a positive integer.`, flag);
  }
  return value;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {
    positionals: [],
    variable: 'x',
    order: 1,
    format: 'text',
    verbosity: 'detailed',
    operation: 'differentiate',
    verbose: false,
    help: false
  };

  const value = (index: number, flag: string): string => {
    const next = argv[index + 1];
    if (next === undefined) {
      throw new InputError(`Missing value for ${flag}`, flag);
    }
    return next;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--verbose') {
      args.verbose = true;
    } else if (arg === '--variable' || arg === '-v') {
      args.variable = value(i++, arg);
    } else if (arg === '--order' || arg === '-n') {
      args.order = positiveInteger(arg, value(i++, arg));
    } else if (arg === '--max-steps') {
      args.maxSteps = positiveInteger(arg, value(i++, arg));
    } else if (arg === '--format') {
      args.format = value(i++, arg);
    } else if (arg === '--operation') {
      args.operation = value(i++, arg);
    } else if (arg === '--verbosity') {
      const level = value(i++, arg);
      if (!isVerbosity(level)) {
        throw new InputError(`Invalid verbosity '${level}'. Expected one of: ${VERBOSITIES.join(', ')}`, arg);
      }
      args.verbosity = level;
    } else if (arg.startsWith('--')) {
      throw new InputError(`Unknown option "${arg}"`, arg);
    } else if (args.command === undefined) {
      args.command = arg;
    } else {
      // Anything else, including "-x**2", is input
      args.positionals.push(arg);
    }
  }

  return args;
}

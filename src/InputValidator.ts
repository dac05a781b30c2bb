/**
 * Checks on untrusted text before it reaches the parser. The CLI runs these
 * on every expression and variable it is given.
 */

import { InputError } from './engine/Errors.js';

export const MAX_EXPRESSION_LENGTH = 500;
export const MAX_VARIABLE_LENGTH = 20;

const FORBIDDEN_FRAGMENTS = [
  '__',
  'import',
  'eval',
  'exec',
  'compile',
  'open',
  'system',
  ';',
  'lambda',
  '../',
  '\\',
  '<?xml',
  '<script',
  'javascript:',
  'drop table'
];

const ALLOWED = /^[a-zA-Z0-9\s+\-*/^().,_]*$/;
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function validateExpressionInput(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new InputError('Expression is empty', 'expression');
  }
  if (trimmed.length > MAX_EXPRESSION_LENGTH) {
    throw new InputError(
      `Expression is too long (${trimmed.length} characters, maximum ${MAX_EXPRESSION_LENGTH})`,
      'expression'
    );
  }

  const lower = trimmed.toLowerCase();
  const forbidden = FORBIDDEN_FRAGMENTS.find(fragment => lower.includes(fragment));
  if (forbidden !== undefined) {
    throw new InputError(`Expression contains forbidden content '${forbidden}'`, 'expression');
  }
  if (!ALLOWED.test(trimmed)) {
    throw new InputError('Expression contains characters outside the allowed set', 'expression');
  }

  let depth = 0;
  for (const ch of trimmed) {
    if (ch === '(') depth++;
    else if (ch === ')' && --depth < 0) break;
  }
  if (depth !== 0) {
    throw new InputError('Unbalanced parentheses', 'expression');
  }
  return trimmed;
}

export function validateVariableName(name: string): string {
  if (name.length === 0) {
    throw new InputError('Variable name is empty', 'variable');
  }
  if (name.length > MAX_VARIABLE_LENGTH) {
    throw new InputError(`Variable name is too long (maximum ${MAX_VARIABLE_LENGTH} characters)`, 'variable');
  }
  if (!IDENTIFIER.test(name) || name.includes('__')) {
    throw new InputError(`Invalid variable name '${name}'`, 'variable');
  }
  return name;
}

import { AlgebraInputError, ParseError } from '../algebra/Errors.js';

/**
 * The request itself is unusable: bad variable, order out of range, unknown operation
 */
export class InputError extends Error {
  constructor(
    message: string,
    public field?: string
  ) {
    super(message);
    this.name = 'InputError';
  }
}

/**
 * A step or step graph broke a structural invariant. Points at a rule bug, not at user input.
 */
export class StepValidationError extends Error {
  constructor(
    public detail: string,
    public ruleName?: string,
    public nodeId?: string
  ) {
    super(ruleName ? `Invalid step emitted by rule ${ruleName}: ${detail}` : detail);
    this.name = 'StepValidationError';
  }

  forRule(ruleName: string): StepValidationError {
    return new StepValidationError(this.detail, ruleName, this.nodeId);
  }
}

/**
 * No registered rule accepts a request for a known operation
 */
export class RuleNotFoundError extends Error {
  constructor(public operation: string) {
    super(`No rule found for operation '${operation}'`);
    this.name = 'RuleNotFoundError';
  }
}

/**
 * Plugins were registered inconsistently
 */
export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryError';
  }
}

export type ErrorCategory = 'input' | 'invariant' | 'backend';

/**
 * 'input': fix the request. 'invariant': a rule or the registry is broken.
 * 'backend': the algebra backend failed on valid input.
 */
export function classifyError(err: unknown): ErrorCategory {
  if (err instanceof InputError || err instanceof ParseError || err instanceof AlgebraInputError) {
    return 'input';
  }
  if (err instanceof StepValidationError || err instanceof RuleNotFoundError || err instanceof RegistryError) {
    return 'invariant';
  }
  return 'backend';
}

/**
 * stepwise - explainable step-by-step symbolic math
 *
 * Differentiation, algebraic rewriting and matrix operations recorded as a
 * directed acyclic graph of rule applications, each with its own explanation.
 */

// Core API
export { createEngine, createRegistry, BUILTIN_RULES, type BootstrapOptions } from './Bootstrap.js';
export {
  StepEngine,
  REWRITE_OPERATIONS,
  MATRIX_OPERATIONS,
  MAX_ORDER,
  isRewriteOperation,
  isMatrixOperation,
  stepId,
  type EngineConfig,
  type RunOptions,
  type Operation,
  type RewriteOperation,
  type MatrixOperation
} from './engine/StepEngine.js';

// Step graph
export {
  StepGraph,
  EngineResult,
  createStepNode,
  type StepNode,
  type StepNodeInit,
  type Metadata,
  type JsonValue,
  type EngineResultJSON
} from './engine/Models.js';
export { validateStepNode, validateStepGraph } from './engine/Validation.js';

// Goals and rules
export {
  createGoal,
  derivativeGoal,
  isResolved,
  goalText,
  derivativeText,
  findPending,
  resolvePending,
  replaceExpression,
  type Goal,
  type PendingDerivative,
  type PendingMatch,
  type OpenDerivative
} from './engine/Goal.js';
export {
  defineRewriteRule,
  defineStructuredRule,
  explanations,
  BUILTIN_MANIFEST,
  type Rule,
  type RewriteRule,
  type StructuredRule,
  type RuleResult,
  type RuleCapabilities,
  type MatrixRequest,
  type PluginManifest,
  type Domain
} from './engine/Rule.js';
export { calculusRules } from './engine/rules/CalculusRules.js';
export { algebraRules } from './engine/rules/AlgebraRules.js';
export { linalgRules } from './engine/rules/LinalgRules.js';

// Plugins
export { RegistryBuilder, PluginRegistry, type RegistryOptions } from './plugins/Registry.js';
export {
  VERBOSITIES,
  isVerbosity,
  type Verbosity,
  type RendererPlugin,
  type RendererCapabilities,
  type SolverPlugin,
  type SolverCapabilities,
  type SolverResult,
  type SolveOptions
} from './plugins/Interfaces.js';
export { BackendDifferentiateSolver } from './plugins/BackendSolver.js';
export { TextRenderer, explanationFor, RENDERER_MANIFEST } from './renderers/TextRenderer.js';
export { JsonRenderer, sortKeys } from './renderers/JsonRenderer.js';

// Errors
export {
  InputError,
  StepValidationError,
  RuleNotFoundError,
  RegistryError,
  classifyError,
  type ErrorCategory
} from './engine/Errors.js';

// Input checks
export { validateExpressionInput, validateVariableName, MAX_EXPRESSION_LENGTH } from './InputValidator.js';

// Algebra backend
export * as algebra from './algebra/index.js';

/**
 * @paramfit/core - change-tracked expression graphs
 *
 * This package provides the evaluation engine that model fitting builds on:
 *
 * - clock: logical clocks for change propagation
 * - literals: arguments, cached operators and generators
 * - visitors: traversals (argument discovery, printing, validation, swapping)
 * - builder: equation text to literal graphs
 */

// =============================================================================
// Errors
// =============================================================================
export {
  ParamfitError,
  ParseError,
  StructuralError,
  NameResolutionError,
  ConflictError,
  NameConflictError,
  ConstraintConflictError,
  RestraintDomainError,
  ReadOnlyValueError,
  ConfigurationError,
  EvaluationError,
} from './errors.js';

// =============================================================================
// Modules
// =============================================================================
export * from './clock/index.js';
export * from './literals/index.js';
export * from './visitors/index.js';
export * from './builder/index.js';

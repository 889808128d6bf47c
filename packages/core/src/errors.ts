/**
 * Error Taxonomy
 *
 * Every error raised by the equation engine derives from ParamfitError.
 * Structural problems are raised synchronously at the call that would
 * violate an invariant (build, constrain, restrain), so a graph,
 * constraint or restraint that was constructed successfully can always be
 * evaluated afterwards. Only failures inside an operator's evaluation
 * function surface at evaluation time, as an EvaluationError.
 */

/**
 * Base class for all engine errors
 */
export class ParamfitError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed equation text
 */
export class ParseError extends ParamfitError {
  /** Character offset in the source text */
  readonly position: number;

  constructor(message: string, position: number) {
    super(`${message} at position ${position}`);
    this.position = position;
  }
}

/**
 * Aggregated Validator messages (arity mismatch, missing child, cycle)
 */
export class StructuralError extends ParamfitError {
  readonly errors: readonly string[];

  constructor(errors: readonly string[], subject?: string) {
    const header = subject
      ? `Errors found in literal tree '${subject}'`
      : `Errors found in literal tree`;
    super([header, ...errors].join(`\n`));
    this.errors = errors;
  }
}

/**
 * Identifier used in an equation that is neither registered nor supplied
 */
export class NameResolutionError extends ParamfitError {
  readonly identifiers: readonly string[];

  constructor(identifiers: readonly string[]) {
    const list = identifiers.map((id) => `'${id}'`).join(`, `);
    super(`Unresolved identifier${identifiers.length === 1 ? `` : `s`} ${list}`);
    this.identifiers = identifiers;
  }
}

/**
 * A name re-bound to a different object
 */
export class ConflictError extends ParamfitError {
  readonly key: string;

  constructor(key: string, message?: string) {
    super(message ?? `The name '${key}' is already bound to a different object`);
    this.key = key;
  }
}

/**
 * Empty or duplicate name inside an organizer
 */
export class NameConflictError extends ConflictError {}

/**
 * Constraining a constant or already constrained parameter, or writing to
 * a constrained one
 */
export class ConstraintConflictError extends ParamfitError {}

/**
 * Restraint with an unusable sigma or bound
 */
export class RestraintDomainError extends ParamfitError {}

/**
 * Attempt to change the value of a constant leaf
 */
export class ReadOnlyValueError extends ParamfitError {}

/**
 * Invalid construction input (bad names, incomplete accessors)
 */
export class ConfigurationError extends ParamfitError {}

/**
 * Failure inside an operator's evaluation function
 *
 * Wraps the original error once, tagged with the innermost failing node.
 */
export class EvaluationError extends ParamfitError {
  readonly nodeName: string;

  constructor(nodeName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Evaluation of '${nodeName}' failed: ${reason}`, { cause });
    this.nodeName = nodeName;
  }
}

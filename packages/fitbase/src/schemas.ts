/**
 * Option Schemas
 *
 * Zod schemas for the inputs that cross the package boundary: names,
 * parameter bounds, restraint options and organizer options. Each
 * `parse*` helper turns a failed parse into the engine error for that
 * input.
 */

import { z } from "zod/v4";
import {
  ClockSource,
  ConfigurationError,
  Generator,
  Operator,
  RestraintDomainError,
  type Literal,
} from "@paramfit/core";

// ============================================================================
// Primitives
// ============================================================================

export const IdentifierSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be a valid identifier");

/** Parameters may be anonymous until they are added to an organizer */
export const ParameterNameSchema = z
  .string()
  .regex(/^(?:[A-Za-z_][A-Za-z0-9_]*)?$/, "must be empty or a valid identifier");

/** Any number but NaN; infinities mark open bounds */
export const BoundSchema = z.custom<number>(
  (value) => typeof value === "number" && !Number.isNaN(value),
  "bounds must be numbers"
);

export const BoundsSchema = z
  .tuple([BoundSchema, BoundSchema])
  .refine(([lower, upper]) => lower <= upper, "the lower bound exceeds the upper bound");

export function isLiteral(value: unknown): value is Literal {
  if (value instanceof Operator || value instanceof Generator) return true;
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    value.kind === "argument" &&
    "identify" in value &&
    typeof value.identify === "function"
  );
}

/** A restraint bound or sigma: a number, or a literal read at evaluation */
export type RestraintBound = number | Literal;

export const RestraintBoundSchema = z.custom<RestraintBound>(
  (value) => (typeof value === "number" && !Number.isNaN(value)) || isLiteral(value),
  "bounds must be numbers or literals"
);

export const SigmaSchema = z
  .custom<RestraintBound>(
    (value) => (typeof value === "number" && Number.isFinite(value)) || isLiteral(value),
    "sigma must be a finite number or a literal"
  )
  .refine((sigma) => sigma !== 0, "sigma must be non-zero");

// ============================================================================
// Options
// ============================================================================

export const RestraintOptionsSchema = z.object({
  lb: RestraintBoundSchema.optional(),
  ub: RestraintBoundSchema.optional(),
  sigma: SigmaSchema.optional(),
});

export type RestraintOptions = z.infer<typeof RestraintOptionsSchema>;

export const DEFAULT_RESTRAINT_OPTIONS: Required<RestraintOptions> = {
  lb: -Infinity,
  ub: Infinity,
  sigma: 1,
};

export const OrganizerOptionsSchema = z.object({
  verbose: z.boolean().optional(),
  clockSource: z.instanceof(ClockSource).optional(),
});

export type OrganizerOptions = z.infer<typeof OrganizerOptionsSchema>;

// ============================================================================
// Parsing
// ============================================================================

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join("; ");
}

export function parseIdentifier(name: string, what: string): string {
  const result = IdentifierSchema.safeParse(name);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${what} name '${name}': ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function parseParameterName(name: string): string {
  const result = ParameterNameSchema.safeParse(name);
  if (!result.success) {
    throw new ConfigurationError(`Invalid parameter name '${name}': ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function parseBounds(lower: number, upper: number): [number, number] {
  const result = BoundsSchema.safeParse([lower, upper]);
  if (!result.success) {
    throw new ConfigurationError(`Invalid bounds [${lower}, ${upper}]: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Validate restraint options and fill in the defaults
 *
 * Without an upper bound the restraint pins the value to the lower bound;
 * without either bound it is unbounded. A literal sigma is only checked
 * when the penalty is evaluated.
 */
export function parseRestraintOptions(options: RestraintOptions): Required<RestraintOptions> {
  const result = RestraintOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new RestraintDomainError(`Invalid restraint: ${describeIssues(result.error)}`);
  }
  const { lb, ub, sigma } = result.data;
  return {
    lb: lb ?? DEFAULT_RESTRAINT_OPTIONS.lb,
    ub: ub ?? lb ?? DEFAULT_RESTRAINT_OPTIONS.ub,
    sigma: sigma ?? DEFAULT_RESTRAINT_OPTIONS.sigma,
  };
}

export function parseOrganizerOptions(options: OrganizerOptions): OrganizerOptions {
  const result = OrganizerOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigurationError(`Invalid organizer options: ${describeIssues(result.error)}`);
  }
  return result.data;
}

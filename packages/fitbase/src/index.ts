/**
 * @paramfit/fitbase - parameters and their organization for model fitting
 *
 * - Parameter, ParameterProxy, ParameterWrapper: the adjustable leaves
 * - Constraint: a parameter following an equation
 * - Restraint: a soft penalty on an equation's value
 * - Organizer: hierarchical owner of all of the above
 */

export type { Bounds, ParameterOptions } from "./Parameter.js";
export { Parameter } from "./Parameter.js";

export { ParameterProxy } from "./ParameterProxy.js";

export type { ParameterWrapperOptions } from "./ParameterWrapper.js";
export { ParameterWrapper } from "./ParameterWrapper.js";

export { Constraint, constrain } from "./constraint.js";

export type { RestraintBound, RestraintOptions } from "./restraint.js";
export { Restraint, restrain, totalPenalty, DEFAULT_RESTRAINT_OPTIONS } from "./restraint.js";

export type { OrganizerOptions, ParameterLike, OrganizerMember } from "./Organizer.js";
export { Organizer, isOrganizer, resolveParameter } from "./Organizer.js";

export {
  IdentifierSchema,
  ParameterNameSchema,
  BoundSchema,
  BoundsSchema,
  RestraintBoundSchema,
  SigmaSchema,
  RestraintOptionsSchema,
  OrganizerOptionsSchema,
  parseIdentifier,
  parseParameterName,
  parseBounds,
  parseRestraintOptions,
  parseOrganizerOptions,
  isLiteral,
} from "./schemas.js";

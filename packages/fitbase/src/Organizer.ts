/**
 * Organizer - hierarchical owner of parameters, constraints and restraints
 *
 * An organizer binds names to parameters and sub-organizers in a single
 * name space, builds equations over its own parameters with a scoped
 * EquationBuilder, and owns the constraints and restraints it creates.
 * Its clock observes every parameter and sub-organizer it holds, so a
 * change anywhere below shows up at the top of the hierarchy.
 */

import {
  Clock,
  ConfigurationError,
  EquationBuilder,
  NameConflictError,
  prettyPrint,
  type FunctionLike,
  type Literal,
  type Namespace,
  type Value,
} from "@paramfit/core";
import { Constraint } from "./constraint.js";
import { Parameter, type ParameterOptions } from "./Parameter.js";
import { ParameterProxy } from "./ParameterProxy.js";
import { Restraint, totalPenalty } from "./restraint.js";
import {
  parseIdentifier,
  parseOrganizerOptions,
  type OrganizerOptions,
  type RestraintOptions,
} from "./schemas.js";

export type { OrganizerOptions } from "./schemas.js";

/** Anything an organizer accepts as a parameter */
export type ParameterLike = Parameter | ParameterProxy;

export type OrganizerMember = ParameterLike | Organizer;

/**
 * Whether a value provides the organizer capabilities
 */
export function isOrganizer(value: unknown): value is Organizer {
  return value instanceof Organizer;
}

/**
 * The parameter a proxy stands for, or the parameter itself
 */
export function resolveParameter(par: ParameterLike): Parameter {
  return par instanceof ParameterProxy ? par.target : par;
}

export class Organizer {
  readonly name: string;
  readonly clock: Clock;
  readonly verbose: boolean;
  /** Builds equations over this organizer's own parameters */
  readonly builder: EquationBuilder;

  private readonly parameters = new Map<string, ParameterLike>();
  private readonly organizers = new Map<string, Organizer>();
  private readonly constraints = new Map<Parameter, Constraint>();
  private readonly restraints = new Set<Restraint>();

  constructor(name: string, options: OrganizerOptions = {}) {
    const { verbose, clockSource } = parseOrganizerOptions(options);
    this.name = parseIdentifier(name, "organizer");
    this.verbose = verbose ?? false;
    this.clock = new Clock(clockSource);
    this.builder = new EquationBuilder({ clockSource });
  }

  // ==========================================================================
  // Membership
  // ==========================================================================

  /**
   * Add a parameter under its own name
   *
   * Adding the same parameter again is a no-op.
   *
   * @throws NameConflictError if the parameter has no name, or the name is
   *   taken by another member
   */
  addParameter<P extends ParameterLike>(par: P): P {
    this.claimName(par.name, par);
    if (this.parameters.get(par.name) === par) return par;

    this.builder.registerArgument(par.name, par);
    this.parameters.set(par.name, par);
    this.clock.addSubject(par.clock);
    return par;
  }

  /**
   * Create a parameter and add it
   */
  newParameter(name: string, value: Value = 0, options: ParameterOptions = {}): Parameter {
    const par = new Parameter(name, value, {
      clockSource: this.clock.source,
      ...options,
    });
    return this.addParameter(par);
  }

  /**
   * Remove a parameter, releasing any constraint this organizer holds on it
   *
   * @throws ConfigurationError if the parameter is not a member
   */
  removeParameter(par: ParameterLike | string): ParameterLike {
    const name = typeof par === "string" ? par : par.name;
    const member = this.parameters.get(name);
    if (member === undefined || (typeof par !== "string" && member !== par)) {
      throw new ConfigurationError(`'${name}' is not a parameter of '${this.name}'`);
    }

    this.unconstrain(member);
    this.parameters.delete(name);
    this.builder.deregister(name);
    if (![...this.parameters.values()].some((other) => other.clock === member.clock)) {
      this.clock.removeSubject(member.clock);
    }
    return member;
  }

  /**
   * Add a sub-organizer under its own name
   *
   * @throws ConfigurationError if `sub` is not an organizer or would make
   *   the hierarchy cyclic
   * @throws NameConflictError if the name is taken by another member
   */
  addOrganizer(sub: Organizer): Organizer {
    if (!isOrganizer(sub)) {
      throw new ConfigurationError(`Only organizers can be added to '${this.name}' as organizers`);
    }
    if (sub === this || sub.reaches(this)) {
      throw new ConfigurationError(`Adding '${sub.name}' to '${this.name}' would create a cycle`);
    }
    this.claimName(sub.name, sub);
    if (this.organizers.get(sub.name) === sub) return sub;

    this.organizers.set(sub.name, sub);
    this.clock.addSubject(sub.clock);
    return sub;
  }

  /**
   * The member bound to a name
   */
  get(name: string): OrganizerMember | undefined {
    return this.parameters.get(name) ?? this.organizers.get(name);
  }

  getParameter(name: string): ParameterLike | undefined {
    return this.parameters.get(name);
  }

  getOrganizer(name: string): Organizer | undefined {
    return this.organizers.get(name);
  }

  /** Own parameters, in insertion order */
  getParameters(): ParameterLike[] {
    return [...this.parameters.values()];
  }

  /** Direct sub-organizers, in insertion order */
  getOrganizers(): Organizer[] {
    return [...this.organizers.values()];
  }

  /**
   * Make a function callable in equations built by this organizer
   */
  registerFunction(name: string, fn: FunctionLike): void {
    this.builder.registerFunction(name, fn);
  }

  // ==========================================================================
  // Constraints
  // ==========================================================================

  /**
   * Constrain a parameter to an equation
   *
   * @param par The parameter, or the name of one of this organizer's
   * @param eq Equation text or an already built literal
   * @param namespace Extra names for building `eq`
   * @throws ConstraintConflictError if the parameter is constant or
   *   already constrained
   */
  constrain(par: ParameterLike | string, eq: string | Literal, namespace: Namespace = {}): Constraint {
    const target = resolveParameter(this.lookupParameter(par));
    const equation = this.toEquation(eq, namespace);

    const constraint = new Constraint(target, equation);
    constraint.apply();
    this.constraints.set(target, constraint);
    this.log(`constrain ${target.name} = ${prettyPrint(equation)}`);
    return constraint;
  }

  /**
   * Release parameters constrained by this organizer
   *
   * Parameters constrained elsewhere, or not at all, are left alone.
   */
  unconstrain(...pars: Array<ParameterLike | string>): void {
    for (const par of pars) {
      const target = resolveParameter(this.lookupParameter(par));
      const constraint = this.constraints.get(target);
      if (constraint === undefined) continue;
      constraint.unconstrain();
      this.constraints.delete(target);
      this.log(`unconstrain ${target.name}`);
    }
  }

  /**
   * Release every constraint this organizer holds
   *
   * @param recursive Also clear the constraints of sub-organizers
   */
  clearConstraints(recursive: boolean = false): void {
    this.unconstrain(...this.constraints.keys());
    if (recursive) {
      for (const sub of this.organizers.values()) {
        sub.clearConstraints(true);
      }
    }
  }

  /**
   * Constraints of this organizer and all sub-organizers, by parameter
   */
  getConstraints(): Map<Parameter, Constraint> {
    const constraints = new Map<Parameter, Constraint>();
    for (const sub of this.organizers.values()) {
      for (const [par, constraint] of sub.getConstraints()) {
        constraints.set(par, constraint);
      }
    }
    for (const [par, constraint] of this.constraints) {
      constraints.set(par, constraint);
    }
    return constraints;
  }

  // ==========================================================================
  // Restraints
  // ==========================================================================

  /**
   * Restrain an equation between bounds
   *
   * @param eq Equation text or an already built literal
   * @param options Bounds and sigma; `ub` defaults to `lb`
   * @param namespace Extra names for building `eq`
   * @throws RestraintDomainError for a zero or non-finite sigma
   */
  restrain(eq: string | Literal, options: RestraintOptions = {}, namespace: Namespace = {}): Restraint {
    const equation = this.toEquation(eq, namespace);
    const restraint = new Restraint(equation, options);
    this.restraints.add(restraint);
    this.log(`restrain ${restraint.toString()}`);
    return restraint;
  }

  /**
   * Remove restraints owned by this organizer
   */
  unrestrain(...restraints: Restraint[]): void {
    for (const restraint of restraints) {
      if (this.restraints.delete(restraint)) {
        this.log(`unrestrain ${restraint.toString()}`);
      }
    }
  }

  /**
   * Remove every restraint this organizer owns
   *
   * @param recursive Also clear the restraints of sub-organizers
   */
  clearRestraints(recursive: boolean = false): void {
    this.unrestrain(...this.restraints);
    if (recursive) {
      for (const sub of this.organizers.values()) {
        sub.clearRestraints(true);
      }
    }
  }

  /**
   * Restraints of this organizer and all sub-organizers
   */
  getRestraints(): Set<Restraint> {
    const restraints = new Set<Restraint>(this.restraints);
    for (const sub of this.organizers.values()) {
      for (const restraint of sub.getRestraints()) {
        restraints.add(restraint);
      }
    }
    return restraints;
  }

  /**
   * Sum of the penalties of every reachable restraint
   */
  getPenalty(): number {
    return totalPenalty(this.getRestraints());
  }

  // ==========================================================================
  // Fitting
  // ==========================================================================

  /**
   * Parameters an optimizer may vary: reachable, neither constant nor
   * constrained, each listed once
   */
  getFreeParameters(): Parameter[] {
    const free = new Set<Parameter>();
    this.collectParameters(free);
    return [...free].filter((par) => !par.const && !par.constrained);
  }

  toString(): string {
    return `Organizer(${this.name})`;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private collectParameters(into: Set<Parameter>): void {
    for (const par of this.parameters.values()) {
      into.add(resolveParameter(par));
    }
    for (const sub of this.organizers.values()) {
      sub.collectParameters(into);
    }
  }

  private reaches(target: Organizer): boolean {
    for (const sub of this.organizers.values()) {
      if (sub === target || sub.reaches(target)) return true;
    }
    return false;
  }

  private claimName(name: string, member: OrganizerMember): void {
    if (!name) {
      throw new NameConflictError(name, `Cannot add an unnamed member to '${this.name}'`);
    }
    const existing = this.get(name);
    if (existing !== undefined && existing !== member) {
      throw new NameConflictError(name, `The name '${name}' is already used in '${this.name}'`);
    }
  }

  private lookupParameter(par: ParameterLike | string): ParameterLike {
    if (typeof par !== "string") return par;
    const member = this.parameters.get(par);
    if (member === undefined) {
      throw new ConfigurationError(`'${par}' is not a parameter of '${this.name}'`);
    }
    return member;
  }

  private toEquation(eq: string | Literal, namespace: Namespace): Literal {
    return typeof eq === "string" ? this.builder.build(eq, namespace) : eq;
  }

  private log(event: string): void {
    if (this.verbose) {
      console.log(`[paramfit:${this.name}] ${event}`);
    }
  }
}

/**
 * Visitors Module
 *
 * Traversals over literal graphs:
 * - ArgFinder: collect the leaves
 * - Printer: render as equation text
 * - Validator: structural checks
 * - Swapper: in-place node replacement
 * - NodeFinder: membership test
 */

export type { Visitor } from './visitor.js';
export { BaseVisitor, identify } from './visitor.js';

export type { ArgFinderOptions } from './argFinder.js';
export { ArgFinder, getArgs } from './argFinder.js';

export { Printer, prettyPrint } from './printer.js';

export type { ValidatorOptions } from './validator.js';
export { Validator, DEFAULT_VALIDATOR_OPTIONS, findErrors, validate } from './validator.js';

export { Swapper, swap } from './swapper.js';

export { NodeFinder, contains } from './nodeFinder.js';

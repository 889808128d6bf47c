/**
 * Builder Module
 *
 * Equation text to literal graphs.
 */

export type { Token, TokenKind, Expression, BinaryOperator } from './parser.js';
export { tokenize, parseEquation } from './parser.js';

export type { FunctionLike, BuildOptions, EquationBuilderOptions } from './EquationBuilder.js';
export { EquationBuilder, isIdentifier } from './EquationBuilder.js';

/**
 * expr-simplify - single-sweep simplifier for n-ary algebraic expression trees
 *
 * Flattens nested sums and products, combines like terms of a sum and folds
 * integer constants.
 */

// Core API
export {
  simplify,
  Simplifier,
  extractCoefficient,
  type SimplifyOptions
} from './symbolic/Simplify.js';
export { parseExpression } from './symbolic/Parser.js';
export { formatExpr } from './symbolic/Printer.js';

// Expression tree
export {
  NumberNode,
  SymbolNode,
  UnaryOpNode,
  NaryOpNode,
  structurallyEqual,
  identityOf
} from './symbolic/AST.js';
export type {
  Expr,
  ExprNode,
  ExprVisitor,
  NaryOperator,
  UnaryOperator
} from './symbolic/AST.js';

// Construction helpers
export {
  NaryBuilder,
  buildNary,
  toExpr,
  num,
  sym,
  add,
  mul,
  pow,
  factorial,
  type Operand
} from './symbolic/Builder.js';

// Errors
export {
  ParseError,
  RecursionLimitError,
  ArithmeticError,
  formatParseError
} from './symbolic/Errors.js';

/**
 * Expression simplification.
 *
 * One bottom-up sweep per call: children are simplified first, then each node
 * goes through associative flattening, like-term combination and constant
 * folding, in that order. There is no iteration to a fixed point.
 */

import {
  Expr,
  NaryOperator,
  NumberNode,
  identityOf,
  structurallyEqual
} from './AST.js';
import { NaryBuilder, buildNary } from './Builder.js';
import { ArithmeticError, RecursionLimitError } from './Errors.js';

/**
 * Options for simplification
 *
 * Besides `RecursionLimitError` at `maxDepth`, a sweep also aborts with
 * `ArithmeticError` when a folded literal leaves the safe integer range
 * (e.g. a power fold reaching `2 ** 60`, or a factorial above 18! under a raised `factorialLimit`).
 */
export interface SimplifyOptions {
  maxDepth?: number;         // Default: 32
  factorialLimit?: number;   // Default: 10
  verbose?: boolean;         // Log rewrites
}

export class Simplifier {
  private readonly maxDepth: number;
  private readonly factorialLimit: number;
  private readonly verbose: boolean;

  constructor(options: SimplifyOptions = {}) {
    const {
      maxDepth = 32,
      factorialLimit = 10,
      verbose = false
    } = options;

    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new RangeError(`maxDepth must be a positive integer, got ${maxDepth}`);
    }
    if (!Number.isInteger(factorialLimit) || factorialLimit < 0) {
      throw new RangeError(`factorialLimit must be a non-negative integer, got ${factorialLimit}`);
    }

    this.maxDepth = maxDepth;
    this.factorialLimit = factorialLimit;
    this.verbose = verbose;
  }

  /**
   * Simplify a whole tree, starting at depth 0
   */
  run(expr: Expr): Expr {
    const result = this.runOnce(expr, 0);
    if (this.verbose) {
      console.log(`[simplify] ${expr} => ${result}`);
    }
    return result;
  }

  private runOnce(expr: Expr, depth: number): Expr {
    if (depth >= this.maxDepth) {
      throw new RecursionLimitError(depth, this.maxDepth);
    }

    let current = this.recurse(expr, depth);
    current = this.flattenAssociative(current, depth);
    current = this.combineLikeTerms(current, depth);
    current = this.foldUnaryConstants(current, depth);
    current = this.foldNaryConstants(current, depth);

    return current;
  }

  /**
   * Simplify every operand of an n-ary node one level deeper.
   * Unary operands are left alone.
   */
  recurse(expr: Expr, depth: number): Expr {
    if (expr.type !== 'NaryOp') {
      return expr;
    }

    const operands = expr.operands.map(operand => this.runOnce(operand, depth + 1));
    return buildNary(expr.op, operands);
  }

  /**
   * Splice operands of same-operator children into the parent.
   * Example: (a + b) + c => a + b + c
   */
  flattenAssociative(expr: Expr, _depth: number): Expr {
    if (expr.type !== 'NaryOp') {
      return expr;
    }

    const op = expr.op;
    const operands = expr.operands.flatMap(operand =>
      operand.type === 'NaryOp' && operand.op === op ? operand.operands : [operand]
    );
    return buildNary(op, operands);
  }

  /**
   * Combine terms of a sum that share a factor.
   * Example: y*x*2 + x + x*2 + 3 => (y*2 + 3) * x + 3
   *
   * A product term whose factors appear in no other term is dropped from the
   * result. This changes the value of the sum and is kept as-is.
   */
  combineLikeTerms(expr: Expr, depth: number): Expr {
    if (expr.type !== 'NaryOp' || expr.op !== '+') {
      return expr;
    }

    if (this.verbose) {
      console.log(`[combineLikeTerms] ${expr}`);
    }

    const terms = expr.operands;
    const combined: Expr[] = [];
    const consumed = new Set<number>();

    for (let i = 0; i < terms.length; i++) {
      if (consumed.has(i)) {
        continue;
      }

      const term = terms[i];
      const coefficient = new NaryBuilder('+');
      let factor: Expr | undefined;

      if (term.type === 'NaryOp' && term.op === '*') {
        for (const candidate of term.operands) {
          // Positions consumed by earlier terms are scanned again
          for (let j = i; j < terms.length; j++) {
            const found = extractCoefficient(terms[j], candidate);
            if (found !== undefined) {
              factor = candidate;
              consumed.add(j);
              coefficient.with(found);
            }
          }

          // Only matched itself
          if (coefficient.size === 1) {
            factor = undefined;
            coefficient.clear();
            consumed.delete(i);
          }

          if (factor !== undefined) {
            break;
          }
        }
      } else {
        for (let j = i; j < terms.length; j++) {
          const found = extractCoefficient(terms[j], term);
          if (found !== undefined) {
            consumed.add(j);
            coefficient.with(found);
          }
        }

        if (coefficient.size > 0) {
          factor = term;
        }
      }

      const folded = this.foldNaryConstants(coefficient.build(), depth);
      if (this.verbose) {
        console.log(`[combineLikeTerms] coefficient ${folded} factor ${factor ?? 'none'}`);
      }

      if (factor === undefined) {
        continue;
      }

      if (folded.type === 'Number' && folded.value === 1) {
        combined.push(factor);
      } else {
        combined.push(new NaryBuilder('*').with(folded).with(factor).build());
      }
    }

    return buildNary('+', combined);
  }

  /**
   * Evaluate factorials of small literals.
   * Example: 4! => 24
   */
  foldUnaryConstants(expr: Expr, _depth: number): Expr {
    if (expr.type !== 'UnaryOp' || expr.op !== '!' || expr.operand.type !== 'Number') {
      return expr;
    }

    const n = expr.operand.value;
    if (!Number.isInteger(n) || n < 0 || n > this.factorialLimit) {
      return expr;
    }

    let result = 1;
    for (let k = 2; k <= n; k++) {
      result = checkedInteger(result * k, '!');
    }
    return new NumberNode(result);
  }

  /**
   * Fold the literal operands of an n-ary node into one literal placed last.
   * Example: 1 + a + 2 + 3 => a + 6
   *
   * Power folds as `acc = v ** acc` in operand order, so 2 ^ 3 folds to 9.
   */
  foldNaryConstants(expr: Expr, _depth: number): Expr {
    if (expr.type !== 'NaryOp') {
      return expr;
    }

    const identity = identityOf(expr.op);
    let result = identity;
    const operands: Expr[] = [];

    for (const operand of expr.operands) {
      if (operand.type === 'Number') {
        result = foldLiteral(expr.op, result, operand.value);
      } else {
        operands.push(operand);
      }
    }

    if (result !== identity) {
      operands.push(new NumberNode(result));
    }

    return buildNary(expr.op, operands);
  }
}

/**
 * Find `factor` in `term` and return what is left of the term without it.
 *
 * For an n-ary term only the first structurally equal operand is removed.
 * Any other term equal to `factor` yields the literal 1. Returns undefined
 * when the factor does not occur.
 */
export function extractCoefficient(term: Expr, factor: Expr): Expr | undefined {
  if (term.type === 'NaryOp') {
    const index = term.operands.findIndex(operand => structurallyEqual(operand, factor));
    if (index === -1) {
      return undefined;
    }
    return buildNary(term.op, term.operands.filter((_, i) => i !== index));
  }

  return structurallyEqual(term, factor) ? new NumberNode(1) : undefined;
}

function foldLiteral(op: NaryOperator, accumulator: number, value: number): number {
  switch (op) {
    case '+': return checkedInteger(accumulator + value, '+');
    case '*': return checkedInteger(accumulator * value, '*');
    case '^': return checkedInteger(value ** accumulator, '^');
  }
}

function checkedInteger(value: number, operation: string): number {
  if (!Number.isSafeInteger(value)) {
    throw new ArithmeticError(`result ${value} is not a safe integer`, operation);
  }
  // -0 from products like -1 * 0
  return value === 0 ? 0 : value;
}

/**
 * Simplify an expression with a single bottom-up sweep
 */
export function simplify(expr: Expr, options: SimplifyOptions = {}): Expr {
  return new Simplifier(options).run(expr);
}

/**
 * Node construction helpers.
 * Every rewrite pass rebuilds n-ary nodes through `buildNary`, so a node left
 * with a single operand is replaced by that operand.
 */

import {
  Expr,
  NaryOperator,
  NumberNode,
  SymbolNode,
  UnaryOpNode,
  NaryOpNode
} from './AST.js';

/**
 * Anything accepted where an operand is expected: numbers become literals,
 * strings become symbols
 */
export type Operand = Expr | number | string;

export function toExpr(operand: Operand): Expr {
  if (typeof operand === 'number') return new NumberNode(operand);
  if (typeof operand === 'string') return new SymbolNode(operand);
  return operand;
}

/**
 * Build an n-ary node, collapsing a single operand to the operand itself
 */
export function buildNary(op: NaryOperator, operands: readonly Expr[]): Expr {
  if (operands.length === 1) {
    return operands[0];
  }
  return new NaryOpNode(op, operands);
}

/**
 * Incremental n-ary node builder
 *
 * @example
 * new NaryBuilder('*').with('x').with(2).build(); // x * 2
 */
export class NaryBuilder {
  private operands: Expr[] = [];

  constructor(public readonly op: NaryOperator) {}

  with(operand: Operand): this {
    this.operands.push(toExpr(operand));
    return this;
  }

  get size(): number {
    return this.operands.length;
  }

  clear(): void {
    this.operands = [];
  }

  build(): Expr {
    return buildNary(this.op, [...this.operands]);
  }
}

export function num(value: number): NumberNode {
  return new NumberNode(value);
}

export function sym(name: string): SymbolNode {
  return new SymbolNode(name);
}

export function add(...operands: Operand[]): Expr {
  return buildNary('+', operands.map(toExpr));
}

export function mul(...operands: Operand[]): Expr {
  return buildNary('*', operands.map(toExpr));
}

export function pow(...operands: Operand[]): Expr {
  return buildNary('^', operands.map(toExpr));
}

export function factorial(operand: Operand): UnaryOpNode {
  return new UnaryOpNode('!', toExpr(operand));
}

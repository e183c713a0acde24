/**
 * Expression tree node definitions for the simplifier.
 * Nodes are immutable; rewrite passes build new nodes instead of editing these.
 */

import { formatExpr } from './Printer.js';

/**
 * Operators of n-ary nodes: addition, multiplication and power
 */
export type NaryOperator = '+' | '*' | '^';

/**
 * Operators of unary nodes (postfix factorial)
 */
export type UnaryOperator = '!';

/**
 * Any expression tree node
 */
export type Expr = NumberNode | SymbolNode | UnaryOpNode | NaryOpNode;

/**
 * Base interface for all expression nodes
 */
export interface ExprNode {
  readonly type: string;
  accept<T>(visitor: ExprVisitor<T>): T;
  equals(other: Expr): boolean;
}

/**
 * Visitor pattern interface for traversing expressions
 */
export interface ExprVisitor<T> {
  visitNumber(node: NumberNode): T;
  visitSymbol(node: SymbolNode): T;
  visitUnaryOp(node: UnaryOpNode): T;
  visitNaryOp(node: NaryOpNode): T;
}

/**
 * Integer literal node
 */
export class NumberNode implements ExprNode {
  readonly type = 'Number' as const;

  constructor(public readonly value: number) {}

  accept<T>(visitor: ExprVisitor<T>): T {
    return visitor.visitNumber(this);
  }

  equals(other: Expr): boolean {
    return structurallyEqual(this, other);
  }

  toString(): string {
    return formatExpr(this);
  }
}

/**
 * Symbol node (e.g., 'x', 'rate'), compared by name only
 */
export class SymbolNode implements ExprNode {
  readonly type = 'Symbol' as const;

  constructor(public readonly name: string) {}

  accept<T>(visitor: ExprVisitor<T>): T {
    return visitor.visitSymbol(this);
  }

  equals(other: Expr): boolean {
    return structurallyEqual(this, other);
  }

  toString(): string {
    return formatExpr(this);
  }
}

/**
 * Unary operation node (e.g., 4!)
 */
export class UnaryOpNode implements ExprNode {
  readonly type = 'UnaryOp' as const;

  constructor(
    public readonly op: UnaryOperator,
    public readonly operand: Expr
  ) {}

  accept<T>(visitor: ExprVisitor<T>): T {
    return visitor.visitUnaryOp(this);
  }

  equals(other: Expr): boolean {
    return structurallyEqual(this, other);
  }

  toString(): string {
    return formatExpr(this);
  }
}

/**
 * N-ary operation node (e.g., a + b + c, x * y * 2).
 *
 * Operand order is kept as given. Empty and single-operand nodes are legal;
 * an empty node stands for the operator's identity.
 */
export class NaryOpNode implements ExprNode {
  readonly type = 'NaryOp' as const;
  readonly operands: readonly Expr[];

  constructor(
    public readonly op: NaryOperator,
    operands: readonly Expr[]
  ) {
    this.operands = [...operands];
  }

  accept<T>(visitor: ExprVisitor<T>): T {
    return visitor.visitNaryOp(this);
  }

  equals(other: Expr): boolean {
    return structurallyEqual(this, other);
  }

  toString(): string {
    return formatExpr(this);
  }
}

/**
 * Check if two expressions are structurally equal.
 * Operand order matters: `a * b` does not equal `b * a`.
 */
export function structurallyEqual(a: Expr, b: Expr): boolean {
  if (a === b) return true;

  switch (a.type) {
    case 'Number':
      return b.type === 'Number' && a.value === b.value;

    case 'Symbol':
      return b.type === 'Symbol' && a.name === b.name;

    case 'UnaryOp':
      return b.type === 'UnaryOp' &&
             a.op === b.op &&
             structurallyEqual(a.operand, b.operand);

    case 'NaryOp':
      return b.type === 'NaryOp' &&
             a.op === b.op &&
             a.operands.length === b.operands.length &&
             a.operands.every((operand, i) => structurallyEqual(operand, b.operands[i]));
  }
}

/**
 * Identity element of an n-ary operator
 */
export function identityOf(op: NaryOperator): number {
  return op === '+' ? 0 : 1;
}

/**
 * Infix printer for expression trees.
 */

import type {
  Expr,
  ExprVisitor,
  NaryOperator,
  NumberNode,
  SymbolNode,
  UnaryOpNode,
  NaryOpNode
} from './AST.js';

/**
 * Printing visitor - produces infix text such as `(a + b) * c ^ 2`
 */
class PrintVisitor implements ExprVisitor<string> {
  visitNumber(node: NumberNode): string {
    return String(node.value);
  }

  visitSymbol(node: SymbolNode): string {
    return node.name;
  }

  visitUnaryOp(node: UnaryOpNode): string {
    const operand = node.operand.accept(this);

    if (isCompound(node.operand) || isNegativeLiteral(node.operand)) {
      return `(${operand})${node.op}`;
    }

    return `${operand}${node.op}`;
  }

  visitNaryOp(node: NaryOpNode): string {
    if (node.operands.length === 0) {
      return node.op === '+' ? '0' : '1';
    }

    if (node.operands.length === 1) {
      return node.operands[0].accept(this);
    }

    return node.operands
      .map(operand => {
        const text = operand.accept(this);
        return needsParens(operand, node.op) || isNegativeLiteral(operand) ? `(${text})` : text;
      })
      .join(` ${node.op} `);
  }
}

/**
 * An n-ary node that prints with an operator between operands
 */
function isCompound(node: Expr): node is NaryOpNode {
  return node.type === 'NaryOp' && node.operands.length > 1;
}

function isNegativeLiteral(node: Expr): boolean {
  return node.type === 'Number' && node.value < 0;
}

/**
 * Check if an operand needs parentheses inside a parent operator.
 * Same-precedence children keep theirs so nesting stays visible.
 */
function needsParens(node: Expr, parentOp: NaryOperator): boolean {
  return isCompound(node) && getPrecedence(node.op) <= getPrecedence(parentOp);
}

/**
 * Get operator precedence (higher = tighter binding)
 */
function getPrecedence(op: NaryOperator): number {
  switch (op) {
    case '+':
      return 1;
    case '*':
      return 2;
    case '^':
      return 3;
  }
}

const printer = new PrintVisitor();

/**
 * Render an expression as infix text
 */
export function formatExpr(expr: Expr): string {
  return expr.accept(printer);
}

import { describe, it, expect } from 'vitest';
import { NaryOpNode } from '../../src/symbolic/AST.js';
import { add, mul, pow, factorial, num, sym } from '../../src/symbolic/Builder.js';
import { formatExpr } from '../../src/symbolic/Printer.js';

describe('Printer', () => {
  describe('Leaves', () => {
    it('should print numbers and symbols', () => {
      expect(formatExpr(num(5))).toBe('5');
      expect(formatExpr(num(-3))).toBe('-3');
      expect(formatExpr(sym('rate'))).toBe('rate');
    });
  });

  describe('Factorial', () => {
    it('should print postfix', () => {
      expect(formatExpr(factorial(4))).toBe('4!');
      expect(formatExpr(factorial(factorial(3)))).toBe('3!!');
    });

    it('should parenthesize compound and negative operands', () => {
      expect(formatExpr(factorial(add('a', 1)))).toBe('(a + 1)!');
      expect(formatExpr(factorial(-1))).toBe('(-1)!');
    });
  });

  describe('N-ary operators', () => {
    it('should print the identity for empty nodes', () => {
      expect(formatExpr(new NaryOpNode('+', []))).toBe('0');
      expect(formatExpr(new NaryOpNode('*', []))).toBe('1');
      expect(formatExpr(new NaryOpNode('^', []))).toBe('1');
    });

    it('should print a single operand bare', () => {
      expect(formatExpr(new NaryOpNode('*', [sym('x')]))).toBe('x');
      expect(formatExpr(mul(new NaryOpNode('+', [sym('a')]), 'b'))).toBe('a * b');
    });

    it('should parenthesize lower-precedence operands only', () => {
      expect(formatExpr(add('a', mul('b', 2)))).toBe('a + b * 2');
      expect(formatExpr(mul('a', add('b', 2)))).toBe('a * (b + 2)');
      expect(formatExpr(mul('a', pow('b', 2)))).toBe('a * b ^ 2');
    });

    it('should keep nested same-operator nodes visible', () => {
      expect(formatExpr(mul(mul('a', 'b'), 'c'))).toBe('(a * b) * c');
      expect(formatExpr(pow(pow('a', 'b'), 'c'))).toBe('(a ^ b) ^ c');
      expect(formatExpr(pow('a', pow('b', 'c')))).toBe('a ^ (b ^ c)');
    });

    it('should parenthesize negative literal operands', () => {
      expect(formatExpr(pow(-2, 2))).toBe('(-2) ^ 2');
      expect(formatExpr(add('x', -3))).toBe('x + (-3)');
    });

    it('should print flat nodes without parentheses', () => {
      expect(formatExpr(add('a', 'b', 'c', 4))).toBe('a + b + c + 4');
    });
  });
});

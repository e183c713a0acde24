import { describe, it, expect } from 'vitest';
import {
  ParseError,
  RecursionLimitError,
  ArithmeticError,
  formatParseError
} from '../../src/symbolic/Errors.js';
import { parseExpression } from '../../src/symbolic/Parser.js';

describe('Error Classes', () => {
  describe('ParseError', () => {
    it('should create parse error with correct message', () => {
      const error = new ParseError('unexpected token', 5, ')');
      expect(error.message).toBe('Parse error at 5: unexpected token');
      expect(error.position).toBe(5);
      expect(error.token).toBe(')');
      expect(error.name).toBe('ParseError');
      expect(error).toBeInstanceOf(Error);
    });

    it('should handle parse error without token', () => {
      const error = new ParseError('Unexpected end of input', 3);
      expect(error.token).toBeUndefined();
    });
  });

  describe('RecursionLimitError', () => {
    it('should report depth and limit', () => {
      const error = new RecursionLimitError(32, 32);
      expect(error.message).toBe('Recursion depth limit exceeded: depth 32 >= 32');
      expect(error.depth).toBe(32);
      expect(error.limit).toBe(32);
      expect(error.name).toBe('RecursionLimitError');
    });
  });

  describe('ArithmeticError', () => {
    it('should include the operation', () => {
      const error = new ArithmeticError('result 0.5 is not a safe integer', '^');
      expect(error.message).toBe("Arithmetic error in '^': result 0.5 is not a safe integer");
      expect(error.operation).toBe('^');
      expect(error.name).toBe('ArithmeticError');
    });
  });

  describe('formatParseError', () => {
    it('should point at the error position', () => {
      const error = new ParseError("Unexpected token 'b'", 2, 'b');
      expect(formatParseError(error, 'a b')).toBe(
        "Error: Unexpected token 'b'\n\n  a b\n    ^\n"
      );
    });

    it('should explain unsupported operators', () => {
      const error = new ParseError("Operator '-' is not supported", 2, '-');
      expect(formatParseError(error, 'x - y')).toBe(
        "Error: Operator '-' is not supported\n" +
        '\n  x - y\n' +
        '    ^\n' +
        '\nSubtraction and division are not part of the expression syntax.\n' +
        'Supported operators: + * ^ (or **) and postfix ! for factorial.\n'
      );
    });

    it('should point at the column within a multi-line source', () => {
      const error = new ParseError("Operator '-' is not supported", 6, '-');
      expect(formatParseError(error, 'a +\nb - c')).toBe(
        "Error: Operator '-' is not supported\n" +
        '\n  b - c\n' +
        '    ^\n' +
        '\nSubtraction and division are not part of the expression syntax.\n' +
        'Supported operators: + * ^ (or **) and postfix ! for factorial.\n'
      );
    });

    it('should strip carriage returns from the printed line', () => {
      const error = new ParseError("Unexpected token 'c'", 7, 'c');
      expect(formatParseError(error, 'a +\r\nb c')).toBe(
        "Error: Unexpected token 'c'\n\n  b c\n    ^\n"
      );
    });

    it('should format errors raised by the parser on multi-line input', () => {
      const source = 'a +\nb - c';
      let formatted = '';
      try {
        parseExpression(source);
      } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        formatted = formatParseError(err, source);
      }
      expect(formatted.split('\n').slice(0, 4)).toEqual([
        "Error: Operator '-' is not supported",
        '',
        '  b - c',
        '    ^'
      ]);
    });

    it('should omit the source line for empty input', () => {
      const error = new ParseError('Unexpected end of input', 0);
      expect(formatParseError(error, '')).toBe('Error: Unexpected end of input\n');
    });
  });
});

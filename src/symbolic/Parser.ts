/**
 * Expression parser.
 * Turns infix text such as `2 * x + x!` into an expression tree.
 */

import { Expr, NaryOperator, NumberNode, SymbolNode, UnaryOpNode } from './AST.js';
import { buildNary } from './Builder.js';
import { ParseError } from './Errors.js';

/**
 * Token types for lexical analysis
 */
enum TokenType {
  NUMBER,
  IDENTIFIER,
  PLUS,
  MULTIPLY,
  POWER,
  BANG,
  LPAREN,
  RPAREN,
  EOF
}

interface Token {
  type: TokenType;
  text: string;
  pos: number;
}

/**
 * Lexer: converts text into tokens
 */
class Lexer {
  private pos = 0;

  constructor(private readonly text: string) {}

  private peek(offset = 0): string {
    const pos = this.pos + offset;
    return pos < this.text.length ? this.text[pos] : '\0';
  }

  private advance(): string {
    const ch = this.peek();
    this.pos++;
    return ch;
  }

  private skipWhitespace(): void {
    while (/\s/.test(this.peek())) {
      this.advance();
    }
  }

  private readNumber(): Token {
    const start = this.pos;
    let digits = '';

    while (/[0-9]/.test(this.peek())) {
      digits += this.advance();
    }

    if (!Number.isSafeInteger(Number(digits))) {
      throw new ParseError('Integer literal out of range', start, digits);
    }

    return { type: TokenType.NUMBER, text: digits, pos: start };
  }

  private readIdentifier(): Token {
    const start = this.pos;
    let id = '';

    while (/[a-zA-Z0-9_]/.test(this.peek())) {
      id += this.advance();
    }

    return { type: TokenType.IDENTIFIER, text: id, pos: start };
  }

  nextToken(): Token {
    this.skipWhitespace();

    const ch = this.peek();
    const pos = this.pos;

    if (pos >= this.text.length) {
      return { type: TokenType.EOF, text: '', pos };
    }

    if (/[0-9]/.test(ch)) {
      return this.readNumber();
    }

    if (/[a-zA-Z_]/.test(ch)) {
      return this.readIdentifier();
    }

    this.advance();
    switch (ch) {
      case '+': return { type: TokenType.PLUS, text: '+', pos };
      case '*':
        // ** is an alias for ^
        if (this.peek() === '*') {
          this.advance();
          return { type: TokenType.POWER, text: '**', pos };
        }
        return { type: TokenType.MULTIPLY, text: '*', pos };
      case '^': return { type: TokenType.POWER, text: '^', pos };
      case '!': return { type: TokenType.BANG, text: '!', pos };
      case '(': return { type: TokenType.LPAREN, text: '(', pos };
      case ')': return { type: TokenType.RPAREN, text: ')', pos };
      case '-':
      case '/':
        throw new ParseError(`Operator '${ch}' is not supported`, pos, ch);
      default:
        throw new ParseError(`Unexpected character '${ch}'`, pos, ch);
    }
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    let token: Token;

    do {
      token = this.nextToken();
      tokens.push(token);
    } while (token.type !== TokenType.EOF);

    return tokens;
  }
}

/**
 * Parser: converts tokens into an expression tree
 * Grammar (precedence from lowest to highest):
 *   expression → product ('+' product)*
 *   product    → power ('*' power)*
 *   power      → postfix (('^' | '**') postfix)*
 *   postfix    → primary '!'*
 *   primary    → INTEGER | IDENTIFIER | '(' expression ')'
 *
 * A chain of one operator becomes a single n-ary node; parentheses keep nesting.
 */
export class Parser {
  private tokens: Token[];
  private current = 0;

  constructor(text: string) {
    const lexer = new Lexer(text);
    this.tokens = lexer.tokenize();
  }

  private peek(): Token {
    return this.tokens[Math.min(this.current, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== TokenType.EOF) {
      this.current++;
    }
    return token;
  }

  private unexpected(token: Token): ParseError {
    if (token.type === TokenType.EOF) {
      return new ParseError('Unexpected end of input', token.pos);
    }
    return new ParseError(`Unexpected token '${token.text}'`, token.pos, token.text);
  }

  /**
   * Parse the whole input as one expression
   */
  parse(): Expr {
    const expr = this.parseSum();
    const token = this.peek();
    if (token.type !== TokenType.EOF) {
      throw this.unexpected(token);
    }
    return expr;
  }

  private parseChain(op: NaryOperator, type: TokenType, parseOperand: () => Expr): Expr {
    const operands = [parseOperand()];

    while (this.peek().type === type) {
      this.advance();
      operands.push(parseOperand());
    }

    return buildNary(op, operands);
  }

  private parseSum(): Expr {
    return this.parseChain('+', TokenType.PLUS, () => this.parseProduct());
  }

  private parseProduct(): Expr {
    return this.parseChain('*', TokenType.MULTIPLY, () => this.parsePower());
  }

  private parsePower(): Expr {
    return this.parseChain('^', TokenType.POWER, () => this.parsePostfix());
  }

  private parsePostfix(): Expr {
    let node = this.parsePrimary();

    while (this.peek().type === TokenType.BANG) {
      this.advance();
      node = new UnaryOpNode('!', node);
    }

    return node;
  }

  private parsePrimary(): Expr {
    const token = this.peek();

    switch (token.type) {
      case TokenType.NUMBER:
        this.advance();
        return new NumberNode(Number(token.text));

      case TokenType.IDENTIFIER:
        this.advance();
        return new SymbolNode(token.text);

      case TokenType.LPAREN: {
        this.advance();
        const expr = this.parseSum();
        const closing = this.peek();
        if (closing.type !== TokenType.RPAREN) {
          throw new ParseError('Expected closing parenthesis', closing.pos, closing.text || undefined);
        }
        this.advance();
        return expr;
      }

      default:
        throw this.unexpected(token);
    }
  }
}

/**
 * Parse an expression string into a tree
 */
export function parseExpression(text: string): Expr {
  return new Parser(text).parse();
}

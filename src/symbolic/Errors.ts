export class ParseError extends Error {
  constructor(
    message: string,
    public position: number,
    public token?: string
  ) {
    super(`Parse error at ${position}: ${message}`);
    this.name = 'ParseError';
  }
}

/**
 * Format a parse error with the offending source line and a caret under the position
 */
export function formatParseError(error: ParseError, source: string): string {
  let output = `Error: ${error.message.replace(/^Parse error at \d+: /, '')}\n`;

  // Line and column of the position within a multi-line source
  const before = source.slice(0, Math.max(0, error.position)).split('\n');
  const lineIndex = before.length - 1;
  const column = before[lineIndex].length;
  const errorLine = source.split('\n')[lineIndex].replace(/\r$/, '');

  if (errorLine) {
    output += `\n  ${errorLine}\n`;
    output += `  ${' '.repeat(column)}^\n`;
  }

  output += formatErrorGuidance(error);

  return output;
}

/**
 * Provide contextual guidance based on the rejected token
 */
function formatErrorGuidance(error: ParseError): string {
  if (error.token === '-' || error.token === '/') {
    return `
Subtraction and division are not part of the expression syntax.
Supported operators: + * ^ (or **) and postfix ! for factorial.
`;
  }

  return '';
}

export class RecursionLimitError extends Error {
  constructor(
    public depth: number,
    public limit: number
  ) {
    super(`Recursion depth limit exceeded: depth ${depth} >= ${limit}`);
    this.name = 'RecursionLimitError';
  }
}

export class ArithmeticError extends Error {
  constructor(
    message: string,
    public operation: string
  ) {
    super(`Arithmetic error in '${operation}': ${message}`);
    this.name = 'ArithmeticError';
  }
}

export class ParseError extends Error {
  constructor(
    message: string,
    public line: number,
    public column: number,
    public token?: string
  ) {
    super(`Parse error at ${line}:${column}: ${message}`);
    this.name = 'ParseError';
  }
}

/**
 * Format a user-friendly error message with source context
 */
export function formatParseError(
  error: ParseError,
  sourceCode: string,
  verbose: boolean = false
): string {
  const lines = sourceCode.split('\n');
  const errorLine = lines[error.line - 1];

  let output = `Error: ${error.message.replace(/^Parse error at \d+:\d+: /, '')}\n`;

  // Show the source line with the error
  if (errorLine) {
    output += `\n  ${errorLine}\n`;

    // Add caret pointing to error position
    const caretPos = Math.max(0, error.column - 1);
    output += `  ${' '.repeat(caretPos)}^\n`;
  }

  output += formatErrorGuidance(error);

  // Only show stack trace in verbose mode
  if (verbose && error.stack) {
    output += '\n\nStack trace:\n' + error.stack;
  }

  return output;
}

/**
 * Provide contextual guidance based on error patterns
 */
function formatErrorGuidance(error: ParseError): string {
  const msg = error.message.toLowerCase();

  if (msg.includes("expected ')'")) {
    return `
Every '(' needs a matching ')'.

  sin(x + 1)      function arguments
  (x + 1)(x - 1)  grouped factors
`;
  }

  if (msg.includes('unexpected character')) {
    return `
Tip: expressions use numbers, names, + - * / ^ (or **) and parentheses.
     Known functions: sin, cos, tan, cot, sec, csc, exp, ln, log, sqrt, abs,
     asin, acos, atan, sinh, cosh, tanh.
`;
  }

  return '';
}

/**
 * Bad command-line arguments
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class FormSelectionError extends Error {
  constructor(
    message: string,
    public candidates: number
  ) {
    super(`Form selection error: ${message}`);
    this.name = 'FormSelectionError';
  }
}

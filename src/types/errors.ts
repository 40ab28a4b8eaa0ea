/**
 * Structured Error System
 *
 * Machine-readable errors with codes, spans, and suggestions. Every failure the
 * library reports to its caller is a LogicException carrying one of these.
 */

/**
 * Error codes for satisfiability operations
 */
export type LogicErrorCode =
  | 'PARSE_ERROR'            // Malformed SoP or DIMACS text
  | 'INCOMPATIBLE_FUNCTIONS' // XOR operands over different variable counts
  | 'OUT_OF_RANGE_LITERAL'   // DIMACS literal outside 1..n
  | 'EMPTY_INPUT'            // Nothing to solve, or no declared variables
  | 'INVARIANT_VIOLATION'    // Malformed internal construction (a defect)
  | 'INVALID_CONFIG'         // Bad configuration value
  | 'ENGINE_ERROR';          // Backend solver failure

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
  start: number;
  end: number;
  line?: number;
  col?: number;
}

/**
 * Structured error with code, message, span and suggestion
 */
export interface LogicError {
  code: LogicErrorCode;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The offending input line
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping LogicError for throw/catch patterns
 */
export class LogicException extends Error {
  public readonly error: LogicError;

  constructor(error: LogicError) {
    super(error.message);
    this.name = 'LogicException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LogicException);
    }
  }

  get code(): LogicErrorCode {
    return this.error.code;
  }

  toJSON(): LogicError {
    return this.error;
  }
}

/**
 * Common syntax error patterns and their suggestions
 */
const SYNTAX_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /^\s*\+/,
      suggestion: "Leading '+' - a sum must start with a term"
    },
    {
      pattern: /\+\s*$/,
      suggestion: "Dangling '+' - missing term after the last '+'"
    },
    {
      pattern: /\+\s*\+/,
      suggestion: "Empty term between two '+' operators"
    },
    {
      pattern: /[.*&]\s*(\+|$)/,
      suggestion: "Incomplete product - missing literal after '.', '*' or '&'"
    },
    {
      pattern: /[()]/,
      suggestion: 'Parentheses are not supported - write the function as a flat sum of products'
    },
    {
      pattern: /[!~]\s*(\+|$)/,
      suggestion: "Incomplete negation - missing variable after '!' or '~'"
    },
    {
      pattern: /^\s*p\s+(?!cnf\b)/,
      suggestion: "Only the 'cnf' problem type is supported: p cnf <variables> <clauses>"
    },
    {
      pattern: /^\s*-?\d+(\s+-?\d+)*\s*$/,
      suggestion: "Every clause line must end with '0'"
    },
  ];

/**
 * Get a suggestion for a syntax error based on the input
 */
export function getSuggestion(input: string): string | undefined {
  for (const { pattern, suggestion } of SYNTAX_SUGGESTIONS) {
    if (pattern.test(input)) {
      return suggestion;
    }
  }
  return undefined;
}

/**
 * Create a parse error with optional span and suggestion.
 * `position` is an offset into `input`; `lineOffset` shifts the reported
 * line number when `input` is one line of a larger document.
 */
export function createParseError(
  message: string,
  input: string,
  position?: number,
  lineOffset: number = 0
): LogicException {
  const span = position !== undefined ? {
    start: position,
    end: position + 1,
    line: getLineNumber(input, position) + lineOffset,
    col: getColumnNumber(input, position),
  } : undefined;

  return new LogicException({
    code: 'PARSE_ERROR',
    message,
    span,
    suggestion: getSuggestion(input),
    context: input,
  });
}

export function createIncompatibleFunctionsError(
  leftVariables: number,
  rightVariables: number
): LogicException {
  return new LogicException({
    code: 'INCOMPATIBLE_FUNCTIONS',
    message: `Cannot combine functions over ${leftVariables} and ${rightVariables} variables`,
    suggestion: 'Declare both functions over the same number of variables (e.g. with a "vars" line)',
    details: { leftVariables, rightVariables },
  });
}

export function createOutOfRangeLiteralError(
  literal: number,
  variableCount: number,
  line?: number,
  context?: string
): LogicException {
  return new LogicException({
    code: 'OUT_OF_RANGE_LITERAL',
    message: `Literal ${literal} references variable ${Math.abs(literal)}, but only ${variableCount} are declared`,
    span: line !== undefined ? { start: 0, end: 0, line, col: 1 } : undefined,
    suggestion: 'Increase the variable count in the "p cnf" header',
    context,
    details: { literal, variableCount },
  });
}

export function createEmptyInputError(message: string): LogicException {
  return new LogicException({
    code: 'EMPTY_INPUT',
    message,
  });
}

/**
 * Raised when a value is constructed in violation of the model invariants.
 * Valid parsed input never triggers this.
 */
export function createInvariantError(
  message: string,
  details?: Record<string, unknown>
): LogicException {
  return new LogicException({
    code: 'INVARIANT_VIOLATION',
    message: `Invariant violated: ${message}`,
    details,
  });
}

export function createConfigError(
  message: string,
  details?: Record<string, unknown>
): LogicException {
  return new LogicException({
    code: 'INVALID_CONFIG',
    message: `Invalid configuration: ${message}`,
    details,
  });
}

export function createEngineError(
  message: string,
  details?: Record<string, unknown>
): LogicException {
  return new LogicException({
    code: 'ENGINE_ERROR',
    message: `Solver engine error: ${message}`,
    details,
  });
}

function getLineNumber(input: string, position: number): number {
  const lines = input.substring(0, position).split('\n');
  return lines.length;
}

function getColumnNumber(input: string, position: number): number {
  const lastNewline = input.lastIndexOf('\n', position - 1);
  return position - lastNewline;
}

/**
 * Serialize a LogicError for JSON output
 */
export function serializeLogicError(error: LogicError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.span && { span: error.span }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.context && { context: error.context }),
    ...(error.details && { details: error.details }),
  };
}

/**
 * Token types for the sum-of-products lexer
 */
export type TokenType =
    | 'VARIABLE'   // A, x1, b_2
    | 'CONSTANT'   // 0 or 1
    | 'NOT'        // prefix ! or ~
    | 'PRIME'      // postfix '
    | 'AND'        // . * &
    | 'OR'         // +
    | 'EOF';

export interface Token {
    type: TokenType;
    value: string;
    position: number;
}

/**
 * A literal as written, before names are resolved to indices
 */
export interface NamedLiteral {
    name: string;
    negated: boolean;
    position: number;
}

/**
 * One product of a parsed line. Terms multiplied by 0 are dropped by the
 * parser, so every ParsedTerm can still be true.
 */
export interface ParsedTerm {
    literals: NamedLiteral[];
}

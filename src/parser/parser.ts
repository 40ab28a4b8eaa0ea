import type { NamedLiteral, ParsedTerm, Token, TokenType } from '../types/parser.js';
import { createParseError } from '../types/errors.js';

/**
 * Parser for sum-of-products lines
 *
 * Grammar (EBNF-ish):
 *   function = term ('+' term)*
 *   term     = factor (('.' | '*' | '&')? factor)*
 *   factor   = ('!' | '~')* (VARIABLE | CONSTANT) "'"*
 *
 * Every prefix or postfix negation flips the polarity, so A'' is A.
 * A factor that evaluates to 1 is dropped from its term; a factor that
 * evaluates to 0 drops the whole term.
 */
export class Parser {
    private pos: number = 0;

    constructor(
        private readonly tokens: Token[],
        private readonly originalInput: string,
        private readonly lineOffset: number = 0
    ) {}

    parse(): ParsedTerm[] {
        const terms: ParsedTerm[] = [];

        const first = this.parseTerm();
        if (first) terms.push(first);

        while (this.current().type === 'OR') {
            this.advance();
            const term = this.parseTerm();
            if (term) terms.push(term);
        }

        if (this.current().type !== 'EOF') {
            throw this.error(`Unexpected '${this.current().value}'`, this.current());
        }
        return terms;
    }

    private current(): Token {
        return this.tokens[this.pos] ?? { type: 'EOF', value: '', position: this.originalInput.length };
    }

    private advance(): Token {
        const token = this.current();
        this.pos++;
        return token;
    }

    private error(message: string, token: Token) {
        return createParseError(message, this.originalInput, token.position, this.lineOffset);
    }

    private startsFactor(type: TokenType): boolean {
        return type === 'VARIABLE' || type === 'CONSTANT' || type === 'NOT';
    }

    /**
     * Returns null for a term multiplied by 0.
     */
    private parseTerm(): ParsedTerm | null {
        if (!this.startsFactor(this.current().type)) {
            const token = this.current();
            const found = token.type === 'EOF' ? 'end of input' : `'${token.value}'`;
            throw this.error(`Expected a literal but found ${found}`, token);
        }

        const literals: NamedLiteral[] = [];
        let isFalse = false;

        for (;;) {
            const factor = this.parseFactor();
            if (factor === false) {
                isFalse = true;
            } else if (factor !== true) {
                literals.push(factor);
            }

            if (this.current().type === 'AND') {
                const and = this.advance();
                if (!this.startsFactor(this.current().type)) {
                    throw this.error(`Expected a literal after '${and.value}'`, this.current());
                }
                continue;
            }
            if (this.startsFactor(this.current().type)) {
                continue;
            }
            break;
        }

        return isFalse ? null : { literals };
    }

    /**
     * A literal, or the constant a 0/1 factor evaluates to.
     */
    private parseFactor(): NamedLiteral | boolean {
        let negated = false;
        while (this.current().type === 'NOT') {
            this.advance();
            negated = !negated;
        }

        const token = this.current();
        if (token.type !== 'VARIABLE' && token.type !== 'CONSTANT') {
            throw this.error(`Expected a variable after '!' or '~'`, token);
        }
        this.advance();

        while (this.current().type === 'PRIME') {
            this.advance();
            negated = !negated;
        }

        if (token.type === 'CONSTANT') {
            return (token.value === '1') !== negated;
        }
        return { name: token.value, negated, position: token.position };
    }
}

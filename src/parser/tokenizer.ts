import type { Token, TokenType } from '../types/parser.js';
import { createParseError } from '../types/errors.js';

/**
 * Tokenizer for sum-of-products lines.
 *
 * A variable is one letter followed by digits or underscores, so adjacent
 * single letters read as separate variables: "AB" is A and B, "x1x2" is
 * x1 and x2.
 */
export class Tokenizer {
    private pos: number = 0;
    private tokens: Token[] = [];

    constructor(
        private readonly input: string,
        private readonly lineOffset: number = 0
    ) {}

    tokenize(): Token[] {
        while (this.pos < this.input.length) {
            this.skipWhitespace();
            if (this.pos >= this.input.length) break;

            const char = this.input[this.pos];

            switch (char) {
                case '+': this.addToken('OR', char); continue;
                case '.':
                case '*':
                case '&': this.addToken('AND', char); continue;
                case '!':
                case '~': this.addToken('NOT', char); continue;
                case "'": this.addToken('PRIME', char); continue;
            }

            if (/[A-Za-z]/.test(char)) {
                const start = this.pos;
                this.pos++;
                while (this.pos < this.input.length && /[0-9_]/.test(this.input[this.pos])) {
                    this.pos++;
                }
                this.tokens.push({ type: 'VARIABLE', value: this.input.slice(start, this.pos), position: start });
                continue;
            }

            if (/[0-9]/.test(char)) {
                const start = this.pos;
                while (this.pos < this.input.length && /[0-9]/.test(this.input[this.pos])) {
                    this.pos++;
                }
                const value = this.input.slice(start, this.pos);
                if (value !== '0' && value !== '1') {
                    throw createParseError(`Unexpected number '${value}', only the constants 0 and 1 are allowed`, this.input, start, this.lineOffset);
                }
                this.tokens.push({ type: 'CONSTANT', value, position: start });
                continue;
            }

            throw createParseError(`Unexpected character '${char}'`, this.input, this.pos, this.lineOffset);
        }

        this.tokens.push({ type: 'EOF', value: '', position: this.pos });
        return this.tokens;
    }

    private skipWhitespace(): void {
        while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) {
            this.pos++;
        }
    }

    private addToken(type: TokenType, value: string): void {
        this.tokens.push({ type, value, position: this.pos });
        this.pos += value.length;
    }
}

import type { SopFunction } from '../types/function.js';
import type { Literal } from '../types/clause.js';
import type { ParsedTerm } from '../types/parser.js';
import { createEmptyInputError, createParseError } from '../types/errors.js';
import { createLiteral, createSopFunction, createTerm } from '../logic/model.js';
import { Tokenizer } from './tokenizer.js';
import { Parser } from './parser.js';
import { VariableTable } from './variables.js';

export { Tokenizer } from './tokenizer.js';
export { Parser } from './parser.js';
export { VariableTable, compareVariableNames } from './variables.js';

export interface SopParseOptions {
    /** Declared variable order; names outside it are rejected */
    variables?: readonly string[];
}

export interface SopFile {
    functions: SopFunction[];
    variableNames: readonly string[];
}

interface ParsedLine {
    text: string;
    lineOffset: number;
    terms: ParsedTerm[];
}

const VARS_DIRECTIVE = /^vars(\s+|:\s*|$)/i;

/**
 * Parse one sum-of-products line into terms of named literals.
 */
export function parseSopTerms(input: string, lineOffset: number = 0): ParsedTerm[] {
    const tokens = new Tokenizer(input, lineOffset).tokenize();
    return new Parser(tokens, input, lineOffset).parse();
}

function resolve(line: ParsedLine, table: VariableTable): SopFunction {
    const terms = line.terms.map(term => {
        const literals: Literal[] = term.literals.map(lit => {
            const index = table.indexOf(lit.name);
            if (index === undefined) {
                throw createParseError(`Variable '${lit.name}' is not declared`, line.text, lit.position, line.lineOffset);
            }
            return createLiteral(index, lit.negated);
        });
        return createTerm(literals);
    });
    return createSopFunction(terms, table.size, table.names);
}

function usedNames(lines: readonly ParsedLine[]): string[] {
    return lines.flatMap(line => line.terms.flatMap(term => term.literals.map(lit => lit.name)));
}

function requireVariables(table: VariableTable): void {
    if (table.size === 0) {
        throw createEmptyInputError('Function has no variables');
    }
}

/**
 * Parse a single sum-of-products function, e.g. "AB + A'C".
 *
 * Without declared variables, indices follow natural name order
 * (A=1, B=2, C=3 above).
 */
export function parseSop(input: string, options: SopParseOptions = {}): SopFunction {
    if (input.trim() === '') {
        throw createEmptyInputError('Function text is empty');
    }
    const line: ParsedLine = { text: input, lineOffset: 0, terms: parseSopTerms(input) };
    const table = options.variables
        ? VariableTable.fromDeclaration(options.variables)
        : VariableTable.fromUsage(usedNames([line]));
    requireVariables(table);
    return resolve(line, table);
}

/**
 * Parse a file of sum-of-products functions, one per line.
 *
 *   # comment            (lines starting with # or % are skipped)
 *   vars A B C           (optional, declares the shared variable order)
 *   AB + A'C
 *   A.B + !A.C
 *
 * All functions share one variable table, so any two of them can be
 * combined by XOR.
 */
export function parseSopFile(text: string): SopFile {
    const lines: ParsedLine[] = [];
    let declared: VariableTable | undefined;

    text.split(/\r?\n/).forEach((raw, i) => {
        const trimmed = raw.trim();
        if (trimmed === '' || trimmed.startsWith('#') || trimmed.startsWith('%')) {
            return;
        }

        const directive = VARS_DIRECTIVE.exec(trimmed);
        if (directive) {
            if (declared || lines.length > 0) {
                throw createParseError("'vars' must appear once, before any function", raw, raw.indexOf(trimmed), i);
            }
            const names = trimmed.slice(directive[0].length).split(/[\s,]+/).filter(name => name !== '');
            declared = VariableTable.fromDeclaration(names, raw, i);
            return;
        }

        lines.push({ text: raw, lineOffset: i, terms: parseSopTerms(raw, i) });
    });

    if (lines.length === 0) {
        throw createEmptyInputError('No functions found in input');
    }

    const table = declared ?? VariableTable.fromUsage(usedNames(lines));
    requireVariables(table);

    return {
        functions: lines.map(line => resolve(line, table)),
        variableNames: table.names,
    };
}

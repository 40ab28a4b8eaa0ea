/**
 * DIMACS CNF codec.
 *
 *   c comment
 *   c ind 1 2 3 0        (optional) variables reported in assignments
 *   p cnf <variables> <clauses>
 *   1 -2 0
 *   -1 2 3 0
 *
 * Decoding is the entry point for externally authored files, so every
 * structural mismatch is reported with the offending line.
 */

import type { Clause, CnfFormula, Literal } from '../types/clause.js';
import {
    createEmptyInputError,
    createOutOfRangeLiteralError,
    createParseError,
} from '../types/errors.js';
import { DEFAULTS } from '../types/options.js';
import { createClause, createFormula, literalFromSigned, literalToSigned } from './model.js';

interface Header {
    variables: number;
    clauses: number;
}

interface Token {
    text: string;
    column: number;
}

const HEADER_PATTERN = /^p\s+cnf\s+\d+\s+\d+$/;
const PROJECTION_PATTERN = /^c\s+ind(\s|$)/;
const INTEGER_PATTERN = /^-?\d+$/;

function tokenize(line: string): Token[] {
    const tokens: Token[] = [];
    for (const match of line.matchAll(/\S+/g)) {
        tokens.push({ text: match[0], column: match.index ?? 0 });
    }
    return tokens;
}

function parseIntegerToken(token: Token, line: string, lineNo: number): number {
    if (!INTEGER_PATTERN.test(token.text)) {
        throw createParseError(`Expected an integer, found '${token.text}'`, line, token.column, lineNo - 1);
    }
    const value = Number.parseInt(token.text, 10);
    if (!Number.isSafeInteger(value)) {
        throw createParseError(`Integer '${token.text}' is out of range`, line, token.column, lineNo - 1);
    }
    return value;
}

function parseHeader(line: string, lineNo: number): Header {
    if (!HEADER_PATTERN.test(line)) {
        throw createParseError(`Malformed problem line '${line}', expected 'p cnf <variables> <clauses>'`, line, 0, lineNo - 1);
    }
    const [, , variablesToken, clausesToken] = tokenize(line);
    const variables = parseIntegerToken(variablesToken, line, lineNo);
    const clauses = parseIntegerToken(clausesToken, line, lineNo);
    if (variables > DEFAULTS.maxVariables) {
        throw createParseError(
            `DIMACS header on line ${lineNo} declares ${variables} variables, more than the limit of ${DEFAULTS.maxVariables}`,
            line,
            variablesToken.column,
            lineNo - 1
        );
    }
    if (variables === 0) {
        throw createEmptyInputError(`DIMACS header on line ${lineNo} declares no variables`);
    }
    return { variables, clauses };
}

function parseClauseLine(line: string, lineNo: number, header: Header): Clause {
    const tokens = tokenize(line);
    const values = tokens.map(token => parseIntegerToken(token, line, lineNo));

    const last = values.length - 1;
    // '-0' parses to 0 but does not end a clause
    if (tokens[last].text !== '0') {
        const token = tokens[last];
        throw createParseError(
            `Clause on line ${lineNo} is not terminated by 0`,
            line,
            token.column + token.text.length - 1,
            lineNo - 1
        );
    }

    const literals: Literal[] = [];
    for (let i = 0; i < last; i++) {
        const value = values[i];
        if (value === 0) {
            throw createParseError(
                `Clause on line ${lineNo} contains 0 before its end`,
                line,
                tokens[i].column,
                lineNo - 1
            );
        }
        if (Math.abs(value) > header.variables) {
            throw createOutOfRangeLiteralError(value, header.variables, lineNo, line);
        }
        literals.push(literalFromSigned(value));
    }
    return createClause(literals);
}

/**
 * Variables listed on a `c ind` line, up to its terminating 0.
 */
function parseProjectionLine(line: string, lineNo: number): number[] {
    const tokens = tokenize(line).slice(2);
    const variables: number[] = [];
    for (const token of tokens) {
        const value = parseIntegerToken(token, line, lineNo);
        if (value === 0) break;
        if (value < 0) {
            throw createParseError(`Projected variable must be positive, found ${value}`, line, token.column, lineNo - 1);
        }
        variables.push(value);
    }
    return variables;
}

/**
 * Parse DIMACS CNF text.
 */
export function decodeDimacs(text: string): CnfFormula {
    if (text.trim() === '') {
        throw createEmptyInputError('DIMACS input is empty');
    }

    const lines = text.split(/\r?\n/);
    let header: Header | undefined;
    const clauses: Clause[] = [];
    let projection: Array<{ variable: number; lineNo: number; line: string }> | undefined;

    for (let i = 0; i < lines.length; i++) {
        const lineNo = i + 1;
        const line = lines[i].trim();

        if (line === '') continue;
        // SATLIB files end with a '%' line followed by padding
        if (line.startsWith('%')) break;

        if (line.startsWith('c')) {
            if (PROJECTION_PATTERN.test(line)) {
                projection = projection ?? [];
                for (const variable of parseProjectionLine(line, lineNo)) {
                    projection.push({ variable, lineNo, line });
                }
            }
            continue;
        }

        if (line.startsWith('p')) {
            if (header) {
                throw createParseError(`Duplicate problem line on line ${lineNo}`, line, 0, lineNo - 1);
            }
            header = parseHeader(line, lineNo);
            continue;
        }

        if (!header) {
            throw createParseError(`Clause on line ${lineNo} appears before the 'p cnf' header`, line, 0, lineNo - 1);
        }
        clauses.push(parseClauseLine(line, lineNo, header));
    }

    if (!header) {
        throw createParseError("Missing 'p cnf <variables> <clauses>' header", text.trim().split(/\r?\n/)[0]);
    }

    if (clauses.length !== header.clauses) {
        throw createParseError(
            `Header declares ${header.clauses} clauses but ${clauses.length} were found`,
            `p cnf ${header.variables} ${header.clauses}`
        );
    }

    if (projection === undefined) {
        return createFormula(header.variables, clauses);
    }

    const variableCount = header.variables;
    for (const entry of projection) {
        if (entry.variable > variableCount) {
            throw createOutOfRangeLiteralError(entry.variable, variableCount, entry.lineNo, entry.line);
        }
    }
    return createFormula(variableCount, clauses, projection.map(entry => entry.variable));
}

/**
 * Serialize a formula to DIMACS CNF text.
 */
export function encodeDimacs(formula: CnfFormula): string {
    const lines = [`p cnf ${formula.variableCount} ${formula.clauses.length}`];
    if (formula.projection) {
        lines.push(['c', 'ind', ...formula.projection, 0].join(' '));
    }
    for (const clause of formula.clauses) {
        lines.push([...clause.literals.map(literalToSigned), 0].join(' '));
    }
    return lines.join('\n') + '\n';
}

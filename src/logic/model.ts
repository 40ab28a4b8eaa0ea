/**
 * Model construction and evaluation.
 *
 * All values are validated and frozen here, so code downstream can rely on
 * variable indices being in range without rechecking.
 */

import type { Assignment, Clause, CnfFormula, Literal } from '../types/clause.js';
import type { SopFunction, Term } from '../types/function.js';
import { createInvariantError } from '../types/errors.js';
import { DEFAULTS } from '../types/options.js';

function assertVariable(variable: number, variableCount?: number): void {
    if (!Number.isInteger(variable) || variable < 1) {
        throw createInvariantError(`variable index must be a positive integer, got ${variable}`, { variable });
    }
    if (variableCount !== undefined && variable > variableCount) {
        throw createInvariantError(
            `variable ${variable} exceeds the declared count ${variableCount}`,
            { variable, variableCount }
        );
    }
}

function assertVariableCount(variableCount: number): void {
    if (!Number.isInteger(variableCount) || variableCount < 0) {
        throw createInvariantError(`variable count must be a non-negative integer, got ${variableCount}`);
    }
    if (variableCount > DEFAULTS.maxVariables) {
        throw createInvariantError(
            `variable count ${variableCount} exceeds the limit of ${DEFAULTS.maxVariables}`,
            { variableCount }
        );
    }
}

export function createLiteral(variable: number, negated: boolean = false): Literal {
    assertVariable(variable);
    return Object.freeze({ variable, negated });
}

/**
 * Convert a signed DIMACS-style integer into a literal.
 */
export function literalFromSigned(value: number): Literal {
    return createLiteral(Math.abs(value), value < 0);
}

export function literalToSigned(lit: Literal): number {
    return lit.negated ? -lit.variable : lit.variable;
}

export function negateLiteral(lit: Literal): Literal {
    return Object.freeze({ variable: lit.variable, negated: !lit.negated });
}

function sameLiteral(a: Literal, b: Literal): boolean {
    return a.variable === b.variable && a.negated === b.negated;
}

/**
 * Build a product term. Repeated literals collapse to their first occurrence.
 */
export function createTerm(literals: readonly Literal[]): Term {
    const unique: Literal[] = [];
    for (const lit of literals) {
        assertVariable(lit.variable);
        if (!unique.some(u => sameLiteral(u, lit))) {
            unique.push(Object.freeze({ variable: lit.variable, negated: lit.negated }));
        }
    }
    return Object.freeze({ literals: Object.freeze(unique) });
}

/**
 * A term with both polarities of some variable can never be true.
 */
export function isContradictoryTerm(term: Term): boolean {
    const seen = new Map<number, boolean>();
    for (const lit of term.literals) {
        const polarity = seen.get(lit.variable);
        if (polarity !== undefined && polarity !== lit.negated) {
            return true;
        }
        seen.set(lit.variable, lit.negated);
    }
    return false;
}

export function createSopFunction(
    terms: readonly Term[],
    variableCount: number,
    variableNames?: readonly string[]
): SopFunction {
    assertVariableCount(variableCount);
    const normalized = terms.map(term => {
        for (const lit of term.literals) {
            assertVariable(lit.variable, variableCount);
        }
        return createTerm(term.literals);
    });
    const names = variableNames
        ? [...variableNames]
        : Array.from({ length: variableCount }, (_, i) => `x${i + 1}`);
    if (names.length !== variableCount) {
        throw createInvariantError(
            `expected ${variableCount} variable names, got ${names.length}`,
            { variableCount, names: names.length }
        );
    }
    return Object.freeze({
        terms: Object.freeze(normalized),
        variableCount,
        variableNames: Object.freeze(names),
    });
}

/**
 * Build a clause. Literals are kept exactly as given.
 */
export function createClause(literals: readonly Literal[]): Clause {
    for (const lit of literals) {
        assertVariable(lit.variable);
    }
    return Object.freeze({
        literals: Object.freeze(literals.map(lit => Object.freeze({ variable: lit.variable, negated: lit.negated }))),
    });
}

/**
 * Shorthand for tests and converters: a clause from signed integers.
 */
export function clauseFromSigned(values: readonly number[]): Clause {
    return createClause(values.map(literalFromSigned));
}

export function createFormula(
    variableCount: number,
    clauses: readonly Clause[],
    projection?: readonly number[]
): CnfFormula {
    assertVariableCount(variableCount);
    for (const clause of clauses) {
        for (const lit of clause.literals) {
            assertVariable(lit.variable, variableCount);
        }
    }
    const frozen = clauses.map(c => Object.isFrozen(c) ? c : createClause(c.literals));
    if (projection === undefined) {
        return Object.freeze({ variableCount, clauses: Object.freeze(frozen) });
    }
    return Object.freeze({
        variableCount,
        clauses: Object.freeze(frozen),
        projection: normalizeProjection(projection, variableCount),
    });
}

/**
 * Sort and deduplicate a variable subset, checking every index is in range.
 */
export function normalizeProjection(variables: readonly number[], variableCount: number): readonly number[] {
    for (const v of variables) {
        assertVariable(v, variableCount);
    }
    return Object.freeze(Array.from(new Set(variables)).sort((a, b) => a - b));
}

/**
 * The variables an assignment for this formula reports, ascending.
 */
export function reportedVariables(formula: CnfFormula): readonly number[] {
    return formula.projection ?? Array.from({ length: formula.variableCount }, (_, i) => i + 1);
}

function literalValue(lit: Literal, assignment: Assignment): boolean {
    const value = assignment.get(lit.variable) ?? false;
    return lit.negated ? !value : value;
}

/**
 * Evaluate a term; variables missing from the assignment read as false.
 */
export function evaluateTerm(term: Term, assignment: Assignment): boolean {
    return term.literals.every(lit => literalValue(lit, assignment));
}

export function evaluateFunction(fn: SopFunction, assignment: Assignment): boolean {
    return fn.terms.some(term => evaluateTerm(term, assignment));
}

export function evaluateClause(clause: Clause, assignment: Assignment): boolean {
    return clause.literals.some(lit => literalValue(lit, assignment));
}

export function satisfiesFormula(formula: CnfFormula, assignment: Assignment): boolean {
    return formula.clauses.every(clause => evaluateClause(clause, assignment));
}

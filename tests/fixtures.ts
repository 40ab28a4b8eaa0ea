/**
 * Shared test fixtures: small functions and formulas, a seeded random
 * generator, and brute-force reference answers.
 */
import type { Assignment, CnfFormula } from '../src/types/clause.js';
import type { SopFunction } from '../src/types/function.js';
import {
    clauseFromSigned,
    createFormula,
    createLiteral,
    createSopFunction,
    createTerm,
    evaluateFunction,
    reportedVariables,
    satisfiesFormula,
} from '../src/logic/model.js';

// === Common Inputs ===
export const SOP = {
    twoTerms: "AB + A'C",
    contradiction: "A . A'",
    tautology: "A + A'",
    single: 'A',
};

export const DIMACS = {
    exactlyOne: 'p cnf 2 2\n1 2 0\n-1 -2 0\n',
    unsat: 'p cnf 1 2\n1 0\n-1 0\n',
};

/**
 * A function from signed-integer terms, e.g. [[1, 2], [-1, 3]] for AB + A'C.
 */
export function sop(variableCount: number, terms: number[][], names?: string[]): SopFunction {
    return createSopFunction(
        terms.map(term => createTerm(term.map(v => createLiteral(Math.abs(v), v < 0)))),
        variableCount,
        names
    );
}

export function cnf(variableCount: number, clauses: number[][], projection?: number[]): CnfFormula {
    return createFormula(variableCount, clauses.map(clauseFromSigned), projection);
}

// === Assignments ===

/**
 * Assignment of variables 1..n from the bits of `mask` (bit 0 is variable 1).
 */
export function assignmentFromMask(mask: number, variables: readonly number[]): Map<number, boolean> {
    const assignment = new Map<number, boolean>();
    variables.forEach((v, i) => assignment.set(v, ((mask >> i) & 1) === 1));
    return assignment;
}

export function range(n: number): number[] {
    return Array.from({ length: n }, (_, i) => i + 1);
}

/**
 * Canonical text of an assignment: "1 -2 3".
 */
export function key(assignment: Assignment): string {
    return Array.from(assignment, ([v, value]) => (value ? v : -v)).join(' ');
}

export function toObject(assignment: Assignment): Record<number, boolean> {
    return Object.fromEntries(assignment);
}

// === Brute-force reference answers ===

export function bruteForceFunction(fn: SopFunction): Set<string> {
    const variables = range(fn.variableCount);
    const models = new Set<string>();
    for (let mask = 0; mask < 1 << variables.length; mask++) {
        const assignment = assignmentFromMask(mask, variables);
        if (evaluateFunction(fn, assignment)) {
            models.add(key(assignment));
        }
    }
    return models;
}

/**
 * Distinct projections of every satisfying total assignment.
 */
export function bruteForceFormula(formula: CnfFormula, reported: readonly number[] = reportedVariables(formula)): Set<string> {
    const variables = range(formula.variableCount);
    const models = new Set<string>();
    for (let mask = 0; mask < 1 << variables.length; mask++) {
        const assignment = assignmentFromMask(mask, variables);
        if (satisfiesFormula(formula, assignment)) {
            const projected = new Map(reported.map(v => [v, assignment.get(v) ?? false] as const));
            models.add(key(projected));
        }
    }
    return models;
}

// === Seeded generation ===

/**
 * Deterministic linear congruential generator.
 */
export function createRandom(seed: number): (bound: number) => number {
    let state = seed >>> 0;
    return (bound: number) => {
        state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
        return state % bound;
    };
}

export function randomSop(random: (bound: number) => number, n: number, maxTerms: number, maxWidth: number): SopFunction {
    const terms: number[][] = [];
    const count = 1 + random(maxTerms);
    for (let t = 0; t < count; t++) {
        const width = 1 + random(maxWidth);
        const term: number[] = [];
        for (let i = 0; i < width; i++) {
            const v = 1 + random(n);
            term.push(random(2) === 0 ? v : -v);
        }
        terms.push(term);
    }
    return sop(n, terms);
}

export function randomCnf(random: (bound: number) => number, n: number, clauseCount: number, width: number): CnfFormula {
    const clauses: number[][] = [];
    for (let c = 0; c < clauseCount; c++) {
        const clause: number[] = [];
        for (let i = 0; i < width; i++) {
            const v = 1 + random(n);
            clause.push(random(2) === 0 ? v : -v);
        }
        clauses.push(clause);
    }
    return cnf(n, clauses);
}

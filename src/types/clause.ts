/**
 * CNF Types
 *
 * Types for formulas in Conjunctive Normal Form (CNF), the canonical form
 * consumed by the search engines.
 */

/**
 * A literal is a variable or its negation.
 */
export interface Literal {
    /** Variable index, >= 1 */
    readonly variable: number;
    /** Whether this literal is negated */
    readonly negated: boolean;
}

/**
 * A clause is a disjunction of literals.
 * A clause with no literals is false.
 */
export interface Clause {
    readonly literals: readonly Literal[];
}

/**
 * A CNF formula is a conjunction of clauses over variables 1..variableCount.
 */
export interface CnfFormula {
    readonly variableCount: number;
    readonly clauses: readonly Clause[];
    /**
     * Variables reported in assignments, ascending and distinct.
     * Absent means every variable. Converters set it to hide the
     * auxiliary variables they introduce.
     */
    readonly projection?: readonly number[];
}

/**
 * Total mapping from each reported variable to its value, keys ascending.
 */
export type Assignment = ReadonlyMap<number, boolean>;

/**
 * Sum-of-Products Types
 */

import type { Literal } from './clause.js';

/**
 * A product term: the conjunction of its literals.
 * No literals means the constant TRUE.
 */
export interface Term {
    readonly literals: readonly Literal[];
}

/**
 * A function in sum-of-products form: the disjunction of its terms.
 * No terms means the constant FALSE.
 */
export interface SopFunction {
    readonly terms: readonly Term[];
    readonly variableCount: number;
    /** variableNames[i] is the display name of variable i + 1 */
    readonly variableNames: readonly string[];
}

/**
 * Result types returned by the search engines
 */

import type { Assignment } from './clause.js';

/**
 * Verbosity level for CLI output
 */
export type Verbosity = 'minimal' | 'standard' | 'detailed';

export interface SearchStatistics {
    timeMs: number;
    variables: number;
    clauses: number;
    decisions: number;
    propagations: number;
    conflicts: number;
}

/**
 * Why a search stopped before reaching a verdict
 */
export type AbortReason = 'timeout' | 'decision-limit' | 'callback';

export type SolveOutcome =
    | { result: 'sat'; assignment: Assignment; statistics: SearchStatistics }
    | { result: 'unsat'; statistics: SearchStatistics }
    | { result: 'aborted'; reason: AbortReason; statistics: SearchStatistics };

/**
 * All satisfying assignments, in discovery order.
 * 'limit' and 'aborted' sets hold the solutions found before stopping.
 */
export interface SolutionSet {
    status: 'complete' | 'limit' | 'aborted';
    solutions: Assignment[];
    reason?: AbortReason;
    statistics: SearchStatistics;
}

export type EquivalenceResult =
    | { result: 'equivalent'; statistics: SearchStatistics }
    | { result: 'different'; counterexample: Assignment; statistics: SearchStatistics }
    | { result: 'aborted'; reason: AbortReason; statistics: SearchStatistics };

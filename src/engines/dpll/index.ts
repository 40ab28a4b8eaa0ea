/**
 * DPLL Engine
 *
 * Backtracking search with unit propagation and chronological backtracking.
 * No clause learning, no restarts, no activity heuristics: the branching
 * order is always the lowest unassigned variable, true first.
 */

import type { Assignment, CnfFormula } from '../../types/clause.js';
import type { EnumerateOptions, SolveOptions } from '../../types/options.js';
import type { SolutionSet, SolveOutcome } from '../../types/responses.js';
import { DEFAULTS } from '../../types/options.js';
import { createInvariantError } from '../../types/errors.js';
import { normalizeProjection } from '../../logic/model.js';
import type { EngineCapabilities, SatisfiabilityEngine } from '../interface.js';
import { DpllSearch } from './search.js';

/**
 * Decide satisfiability and return the first assignment found.
 */
export function solveOne(formula: CnfFormula, options: SolveOptions = {}): SolveOutcome {
    const search = new DpllSearch(formula, options, { enumerate: false });
    const step = search.next();

    switch (step.kind) {
        case 'solution':
            return { result: 'sat', assignment: step.assignment, statistics: search.statistics() };
        case 'exhausted':
            return { result: 'unsat', statistics: search.statistics() };
        case 'aborted':
            return { result: 'aborted', reason: step.reason, statistics: search.statistics() };
    }
}

/**
 * Enumerate every satisfying assignment of the reported variables.
 *
 * Stops with status 'limit' as soon as a solution beyond `maxSolutions`
 * turns up, so a 'complete' set is always the full set.
 */
export function solveAll(formula: CnfFormula, options: EnumerateOptions = {}): SolutionSet {
    const maxSolutions = options.maxSolutions ?? DEFAULTS.maxSolutions;
    if (!Number.isInteger(maxSolutions) || maxSolutions < 0) {
        throw createInvariantError(`maxSolutions must be a non-negative integer, got ${maxSolutions}`);
    }

    const reported = options.variables
        ? normalizeProjection(options.variables, formula.variableCount)
        : undefined;
    const search = new DpllSearch(formula, options, { enumerate: true, reported });
    const solutions: Assignment[] = [];

    for (;;) {
        const step = search.next();
        switch (step.kind) {
            case 'solution':
                if (solutions.length >= maxSolutions) {
                    return { status: 'limit', solutions, statistics: search.statistics() };
                }
                solutions.push(step.assignment);
                break;
            case 'exhausted':
                return { status: 'complete', solutions, statistics: search.statistics() };
            case 'aborted':
                return { status: 'aborted', reason: step.reason, solutions, statistics: search.statistics() };
        }
    }
}

export class DPLLEngine implements SatisfiabilityEngine {
    readonly name = 'dpll';
    readonly capabilities: EngineCapabilities = {
        decisionHooks: true,
        statistics: true,
    };

    solveOne(formula: CnfFormula, options?: SolveOptions): SolveOutcome {
        return solveOne(formula, options);
    }

    solveAll(formula: CnfFormula, options?: EnumerateOptions): SolutionSet {
        return solveAll(formula, options);
    }
}

export function createDPLLEngine(): DPLLEngine {
    return new DPLLEngine();
}

export { DpllSearch } from './search.js';
export type { SearchStep, SearchSettings } from './search.js';

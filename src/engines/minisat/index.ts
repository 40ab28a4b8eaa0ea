/// <reference path="../../types/logic-solver.d.ts" />
/**
 * MiniSat Engine
 *
 * Reference backend using the logic-solver package (MiniSat compiled to JS).
 * Used to cross-check the DPLL engine. It cannot stop between decisions, so
 * maxDecisions is ignored and the time limit is checked before each call
 * into the solver.
 */

import Logic from 'logic-solver';
import type { Assignment, CnfFormula } from '../../types/clause.js';
import type { EnumerateOptions, SolveOptions } from '../../types/options.js';
import type { SearchStatistics, SolutionSet, SolveOutcome } from '../../types/responses.js';
import { DEFAULTS } from '../../types/options.js';
import { createEngineError } from '../../types/errors.js';
import { normalizeProjection, reportedVariables } from '../../logic/model.js';
import type { EngineCapabilities, SatisfiabilityEngine } from '../interface.js';

function variableName(variable: number): string {
    return `v${variable}`;
}

/**
 * Load a formula into a fresh solver.
 * Returns null when the formula holds an empty clause.
 */
function buildSolver(formula: CnfFormula): Logic.Solver | null {
    const solver = new Logic.Solver();
    for (const clause of formula.clauses) {
        if (clause.literals.length === 0) {
            // Empty clause = unsatisfiable
            return null;
        }
        const disjuncts = clause.literals.map(lit => {
            const name = variableName(lit.variable);
            return lit.negated ? Logic.not(name) : name;
        });
        solver.require(Logic.or(...disjuncts));
    }
    return solver;
}

function solveWith(solver: Logic.Solver): Logic.Solution | null {
    try {
        return solver.solve();
    } catch (e) {
        throw createEngineError(e instanceof Error ? e.message : String(e));
    }
}

function toAssignment(solution: Logic.Solution, reported: readonly number[]): Assignment {
    const map = solution.getMap();
    const assignment = new Map<number, boolean>();
    for (const v of reported) {
        assignment.set(v, map[variableName(v)] === true);
    }
    return assignment;
}

function statistics(formula: CnfFormula, startTime: number): SearchStatistics {
    return {
        timeMs: Date.now() - startTime,
        variables: formula.variableCount,
        clauses: formula.clauses.length,
        decisions: 0,
        propagations: 0,
        conflicts: 0,
    };
}

export class MinisatEngine implements SatisfiabilityEngine {
    readonly name = 'minisat';
    readonly capabilities: EngineCapabilities = {
        decisionHooks: false,
        statistics: false,
    };

    solveOne(formula: CnfFormula, options: SolveOptions = {}): SolveOutcome {
        const startTime = Date.now();
        const deadline = options.maxSeconds !== undefined ? startTime + options.maxSeconds * 1000 : undefined;
        const solver = buildSolver(formula);
        if (deadline !== undefined && Date.now() > deadline) {
            return { result: 'aborted', reason: 'timeout', statistics: statistics(formula, startTime) };
        }
        const solution = solver ? solveWith(solver) : null;

        if (!solution) {
            return { result: 'unsat', statistics: statistics(formula, startTime) };
        }
        return {
            result: 'sat',
            assignment: toAssignment(solution, reportedVariables(formula)),
            statistics: statistics(formula, startTime),
        };
    }

    solveAll(formula: CnfFormula, options: EnumerateOptions = {}): SolutionSet {
        const startTime = Date.now();
        const maxSolutions = options.maxSolutions ?? DEFAULTS.maxSolutions;
        const deadline = options.maxSeconds !== undefined ? startTime + options.maxSeconds * 1000 : undefined;
        const reported = options.variables
            ? normalizeProjection(options.variables, formula.variableCount)
            : reportedVariables(formula);
        const solutions: Assignment[] = [];

        const solver = buildSolver(formula);
        if (!solver) {
            return { status: 'complete', solutions, statistics: statistics(formula, startTime) };
        }

        for (;;) {
            if (deadline !== undefined && Date.now() > deadline) {
                return { status: 'aborted', reason: 'timeout', solutions, statistics: statistics(formula, startTime) };
            }
            const solution = solveWith(solver);
            if (!solution) {
                return { status: 'complete', solutions, statistics: statistics(formula, startTime) };
            }
            if (solutions.length >= maxSolutions) {
                return { status: 'limit', solutions, statistics: statistics(formula, startTime) };
            }

            const assignment = toAssignment(solution, reported);
            solutions.push(assignment);
            if (reported.length === 0) {
                return { status: 'complete', solutions, statistics: statistics(formula, startTime) };
            }

            // Forbid this combination of reported values
            solver.forbid(Logic.and(...reported.map(v => {
                const name = variableName(v);
                return assignment.get(v) ? name : Logic.not(name);
            })));
        }
    }
}

export function createMinisatEngine(): MinisatEngine {
    return new MinisatEngine();
}

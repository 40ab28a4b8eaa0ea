/**
 * Satisfiability Checker
 *
 * Front door for callers holding parsed input: converts SoP functions,
 * builds XOR formulas, and dispatches to the engine manager with a set of
 * default options.
 */

import type { CnfFormula } from './types/clause.js';
import type { SopFunction } from './types/function.js';
import type { RunOptions, SolveOptions } from './types/options.js';
import type { EquivalenceResult, SolveOutcome } from './types/responses.js';
import { convert } from './logic/transform/tseitin.js';
import { combineXor } from './logic/xor.js';
import { solveOne } from './engines/dpll/index.js';
import {
    EngineManager,
    ManagedSolutionSet,
    ManagedSolveOutcome,
    createEngineManager,
} from './engines/manager.js';

/**
 * Read a search outcome on an XOR formula as an equivalence verdict.
 */
export function toEquivalenceResult(outcome: SolveOutcome): EquivalenceResult {
    switch (outcome.result) {
        case 'sat':
            return { result: 'different', counterexample: outcome.assignment, statistics: outcome.statistics };
        case 'unsat':
            return { result: 'equivalent', statistics: outcome.statistics };
        case 'aborted':
            return { result: 'aborted', reason: outcome.reason, statistics: outcome.statistics };
    }
}

/**
 * Decide whether two functions over the same variables agree everywhere.
 * A 'different' verdict carries an assignment on which they disagree.
 */
export function checkEquivalence(
    f1: SopFunction,
    f2: SopFunction,
    options: SolveOptions = {}
): EquivalenceResult {
    return toEquivalenceResult(solveOne(combineXor(f1, f2), options));
}

export class SatisfiabilityChecker {
    constructor(
        private readonly manager: EngineManager = createEngineManager(),
        private readonly defaults: RunOptions = {}
    ) {}

    private options(options?: RunOptions): RunOptions {
        return { ...this.defaults, ...options };
    }

    solveFormula(formula: CnfFormula, options?: RunOptions): ManagedSolveOutcome {
        return this.manager.solveOne(formula, this.options(options));
    }

    enumerateFormula(formula: CnfFormula, options?: RunOptions): ManagedSolutionSet {
        return this.manager.solveAll(formula, this.options(options));
    }

    solveFunction(fn: SopFunction, options?: RunOptions): ManagedSolveOutcome {
        return this.solveFormula(convert(fn), options);
    }

    enumerateFunction(fn: SopFunction, options?: RunOptions): ManagedSolutionSet {
        return this.enumerateFormula(convert(fn), options);
    }

    checkEquivalence(
        f1: SopFunction,
        f2: SopFunction,
        options?: RunOptions
    ): EquivalenceResult & { engineUsed: string } {
        const outcome = this.manager.solveOne(combineXor(f1, f2), this.options(options));
        return { ...toEquivalenceResult(outcome), engineUsed: outcome.engineUsed };
    }
}

export function createChecker(defaults?: RunOptions): SatisfiabilityChecker {
    return new SatisfiabilityChecker(createEngineManager(), defaults);
}

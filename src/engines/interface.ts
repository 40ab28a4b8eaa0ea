/**
 * Satisfiability Engine Interface
 *
 * Abstract interface for pluggable search backends.
 * The DPLL engine is the primary one; the MiniSat backend exists to
 * cross-check its answers.
 */

import type { CnfFormula } from '../types/clause.js';
import type { EnumerateOptions, SolveOptions } from '../types/options.js';
import type { SolutionSet, SolveOutcome } from '../types/responses.js';

/**
 * Capabilities of an engine
 */
export interface EngineCapabilities {
    /** Honors maxDecisions and onDecision between branch decisions */
    decisionHooks: boolean;
    /** Reports search statistics (decisions, propagations, conflicts) */
    statistics: boolean;
}

export interface SatisfiabilityEngine {
    /** Unique name of the engine */
    readonly name: string;
    readonly capabilities: EngineCapabilities;

    /**
     * Find one satisfying assignment over the reported variables.
     */
    solveOne(formula: CnfFormula, options?: SolveOptions): SolveOutcome;

    /**
     * Find every satisfying assignment over the reported variables,
     * in a deterministic order.
     */
    solveAll(formula: CnfFormula, options?: EnumerateOptions): SolutionSet;
}

/**
 * Engine Manager
 *
 * Owns the available engines, dispatches to the selected one, and can
 * cross-check every verdict against the other engine.
 */

import type { Assignment, CnfFormula } from '../types/clause.js';
import type { EngineName, RunOptions } from '../types/options.js';
import type { SolutionSet, SolveOutcome } from '../types/responses.js';
import { DEFAULTS } from '../types/options.js';
import { createEngineError } from '../types/errors.js';
import type { SatisfiabilityEngine } from './interface.js';
import { createDPLLEngine } from './dpll/index.js';
import { createMinisatEngine } from './minisat/index.js';

export type ManagedSolveOutcome = SolveOutcome & {
    engineUsed: string;
    /** Name of the engine that confirmed the verdict, when verification ran */
    verifiedBy?: string;
};

export type ManagedSolutionSet = SolutionSet & {
    engineUsed: string;
    verifiedBy?: string;
};

function assignmentKey(assignment: Assignment): string {
    return Array.from(assignment, ([v, value]) => (value ? v : -v)).join(' ');
}

/** The hook reports on the primary search only */
function withoutHook(options: RunOptions): RunOptions {
    const { onDecision: _hook, ...rest } = options;
    return rest;
}

/**
 * Create a standalone engine by name.
 */
export function createEngine(name: EngineName): SatisfiabilityEngine {
    switch (name) {
        case 'dpll':
            return createDPLLEngine();
        case 'minisat':
            return createMinisatEngine();
    }
}

const ENGINE_NAMES: readonly EngineName[] = ['dpll', 'minisat'];

export class EngineManager {
    private readonly engines: Map<EngineName, SatisfiabilityEngine> = new Map();

    constructor() {
        for (const name of ENGINE_NAMES) {
            this.engines.set(name, createEngine(name));
        }
    }

    getEngine(name: EngineName): SatisfiabilityEngine {
        const engine = this.engines.get(name);
        if (!engine) {
            throw createEngineError(`Unknown engine '${name}'`);
        }
        return engine;
    }

    private counterpart(name: EngineName): SatisfiabilityEngine {
        return this.getEngine(name === 'dpll' ? 'minisat' : 'dpll');
    }

    /**
     * The selected engine, refusing a decision hook it would never call.
     */
    private select(options: RunOptions): SatisfiabilityEngine {
        const engine = this.getEngine(options.engine ?? DEFAULTS.engine);
        if (options.onDecision && !engine.capabilities.decisionHooks) {
            throw createEngineError(`Engine '${engine.name}' does not support decision hooks`);
        }
        return engine;
    }

    solveOne(formula: CnfFormula, options: RunOptions = {}): ManagedSolveOutcome {
        const name = options.engine ?? DEFAULTS.engine;
        const engine = this.select(options);
        const outcome = engine.solveOne(formula, options);

        if (!options.verify || outcome.result === 'aborted') {
            return { ...outcome, engineUsed: engine.name };
        }

        const checker = this.counterpart(name);
        const check = checker.solveOne(formula, withoutHook(options));
        if (check.result === 'aborted') {
            return { ...outcome, engineUsed: engine.name };
        }
        if (check.result !== outcome.result) {
            throw createEngineError(
                `${engine.name} reported ${outcome.result} but ${checker.name} reported ${check.result}`,
                { formulaVariables: formula.variableCount, formulaClauses: formula.clauses.length }
            );
        }
        return { ...outcome, engineUsed: engine.name, verifiedBy: checker.name };
    }

    solveAll(formula: CnfFormula, options: RunOptions = {}): ManagedSolutionSet {
        const name = options.engine ?? DEFAULTS.engine;
        const engine = this.select(options);
        const set = engine.solveAll(formula, options);

        if (!options.verify || set.status !== 'complete') {
            return { ...set, engineUsed: engine.name };
        }

        const checker = this.counterpart(name);
        const check = checker.solveAll(formula, withoutHook(options));
        if (check.status !== 'complete') {
            return { ...set, engineUsed: engine.name };
        }

        const expected = new Set(set.solutions.map(assignmentKey));
        const agrees = check.solutions.length === set.solutions.length
            && check.solutions.every(s => expected.has(assignmentKey(s)));
        if (!agrees) {
            throw createEngineError(
                `${engine.name} found ${set.solutions.length} solutions but ${checker.name} found ${check.solutions.length}`,
                { formulaVariables: formula.variableCount, formulaClauses: formula.clauses.length }
            );
        }
        return { ...set, engineUsed: engine.name, verifiedBy: checker.name };
    }
}

export function createEngineManager(): EngineManager {
    return new EngineManager();
}

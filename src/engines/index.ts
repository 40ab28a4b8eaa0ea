/**
 * Engine Module Exports
 */

export type {
    SatisfiabilityEngine,
    EngineCapabilities,
} from './interface.js';

export {
    DPLLEngine,
    DpllSearch,
    createDPLLEngine,
    solveOne,
    solveAll,
} from './dpll/index.js';

export type {
    SearchStep,
    SearchSettings,
} from './dpll/index.js';

export {
    MinisatEngine,
    createMinisatEngine,
} from './minisat/index.js';

export {
    EngineManager,
    createEngine,
    createEngineManager,
} from './manager.js';

export type {
    ManagedSolveOutcome,
    ManagedSolutionSet,
} from './manager.js';

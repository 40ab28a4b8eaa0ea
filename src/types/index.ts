/**
 * Shared type definitions
 */

export {
    LogicException,
    getSuggestion,
    createParseError,
    createIncompatibleFunctionsError,
    createOutOfRangeLiteralError,
    createEmptyInputError,
    createInvariantError,
    createConfigError,
    createEngineError,
    serializeLogicError,
} from './errors.js';

export type {
    LogicErrorCode,
    ErrorSpan,
    LogicError,
} from './errors.js';

export type {
    Literal,
    Clause,
    CnfFormula,
    Assignment,
} from './clause.js';

export type {
    Term,
    SopFunction,
} from './function.js';

export type {
    Verbosity,
    SearchStatistics,
    AbortReason,
    SolveOutcome,
    SolutionSet,
    EquivalenceResult,
} from './responses.js';

export { DEFAULTS } from './options.js';

export type {
    SearchProgress,
    SolveOptions,
    EnumerateOptions,
    EngineName,
    RunOptions,
} from './options.js';

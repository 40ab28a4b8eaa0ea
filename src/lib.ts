/**
 * sopsat - Library Entry Point
 *
 * Exports the core functionality for use in other projects.
 * This file should NOT import the CLI or anything that touches process I/O.
 */

import { LogicException } from './types/errors.js';
import type { LogicError } from './types/errors.js';

// Model
export {
    createLiteral,
    literalFromSigned,
    literalToSigned,
    negateLiteral,
    createTerm,
    isContradictoryTerm,
    createSopFunction,
    createClause,
    clauseFromSigned,
    createFormula,
    normalizeProjection,
    reportedVariables,
    evaluateTerm,
    evaluateFunction,
    evaluateClause,
    satisfiesFormula,
} from './logic/model.js';

// Conversion
export { convert, describeConversion, encodeTermGates, VariableAllocator } from './logic/transform/tseitin.js';
export type { ConversionResult, TermGates } from './logic/transform/tseitin.js';
export { combineXor } from './logic/xor.js';
export { decodeDimacs, encodeDimacs } from './logic/dimacs.js';

// Search
export * from './engines/index.js';
export { SatisfiabilityChecker, createChecker, checkEquivalence, toEquivalenceResult } from './checker.js';

// Parser
export { parseSop, parseSopFile, parseSopTerms } from './parser/index.js';
export type { SopParseOptions, SopFile } from './parser/index.js';

// Configuration
export { loadConfig } from './config.js';
export type { Config, ConfigKey } from './config.js';

// Formatting
export { formatAssignment, formatValueLine, formatStatistics } from './utils/formatting.js';

// Types and Interfaces
export * from './types/index.js';

export type Result<T> =
    | { success: true; value: T }
    | { success: false; error: LogicError };

/**
 * Run `fn` and capture a LogicException as a structured error value.
 * Anything else is a bug and is rethrown.
 */
export function attempt<T>(fn: () => T): Result<T> {
    try {
        return { success: true, value: fn() };
    } catch (e) {
        if (e instanceof LogicException) {
            return { success: false, error: e.error };
        }
        throw e;
    }
}

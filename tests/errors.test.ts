/**
 * Tests for structured error system
 */

import {
    LogicError,
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
} from '../src/types/errors.js';

describe('LogicException', () => {
    test('creates exception with error object', () => {
        const error: LogicError = {
            code: 'PARSE_ERROR',
            message: 'Unexpected token',
            span: { start: 2, end: 3, line: 1, col: 3 },
            suggestion: 'Check your syntax',
            context: 'A + +',
        };

        const exception = new LogicException(error);

        expect(exception.name).toBe('LogicException');
        expect(exception.message).toBe('Unexpected token');
        expect(exception.code).toBe('PARSE_ERROR');
        expect(exception.error).toEqual(error);
        expect(exception).toBeInstanceOf(Error);
    });

    test('toJSON returns error object', () => {
        const error: LogicError = {
            code: 'ENGINE_ERROR',
            message: 'MiniSat failed',
        };

        const exception = new LogicException(error);
        expect(exception.toJSON()).toEqual(error);
    });
});

describe('getSuggestion', () => {
    test('suggests for an empty term', () => {
        expect(getSuggestion('A + + B')).toBe("Empty term between two '+' operators");
    });

    test('suggests for a wrong problem type', () => {
        expect(getSuggestion('p sat 3 2')).toBe("Only the 'cnf' problem type is supported: p cnf <variables> <clauses>");
    });

    test('suggests for a dangling negation', () => {
        expect(getSuggestion('A + !')).toBe("Incomplete negation - missing variable after '!' or '~'");
    });

    test('returns undefined for valid input', () => {
        expect(getSuggestion("AB + A'C")).toBeUndefined();
    });
});

describe('Error factories', () => {
    test('createParseError computes line and column within the input', () => {
        const err = createParseError('Bad token', 'ab\ncd', 4);
        expect(err.error.code).toBe('PARSE_ERROR');
        expect(err.error.span).toEqual({ start: 4, end: 5, line: 2, col: 2 });
        expect(err.error.context).toBe('ab\ncd');
    });

    test('createParseError shifts the line by the offset', () => {
        const err = createParseError('Bad token', 'A + ', 4, 6);
        expect(err.error.span?.line).toBe(7);
    });

    test('createParseError without a position has no span', () => {
        expect(createParseError('Missing header', 'c only').error.span).toBeUndefined();
    });

    test('createIncompatibleFunctionsError', () => {
        const err = createIncompatibleFunctionsError(2, 3);
        expect(err.error.code).toBe('INCOMPATIBLE_FUNCTIONS');
        expect(err.message).toBe('Cannot combine functions over 2 and 3 variables');
        expect(err.error.details).toEqual({ leftVariables: 2, rightVariables: 3 });
    });

    test('createOutOfRangeLiteralError', () => {
        const err = createOutOfRangeLiteralError(-5, 3, 7, '1 -5 0');
        expect(err.error.code).toBe('OUT_OF_RANGE_LITERAL');
        expect(err.message).toBe('Literal -5 references variable 5, but only 3 are declared');
        expect(err.error.span).toEqual({ start: 0, end: 0, line: 7, col: 1 });
        expect(err.error.details).toEqual({ literal: -5, variableCount: 3 });
    });

    test('createEmptyInputError', () => {
        const err = createEmptyInputError('DIMACS input is empty');
        expect(err.error).toEqual({ code: 'EMPTY_INPUT', message: 'DIMACS input is empty' });
    });

    test('createInvariantError prefixes its message', () => {
        const err = createInvariantError('variable index must be a positive integer, got 0', { variable: 0 });
        expect(err.code).toBe('INVARIANT_VIOLATION');
        expect(err.message).toBe('Invariant violated: variable index must be a positive integer, got 0');
    });

    test('createConfigError and createEngineError', () => {
        expect(createConfigError('bad engine').message).toBe('Invalid configuration: bad engine');
        expect(createEngineError('crashed').message).toBe('Solver engine error: crashed');
        expect(createEngineError('crashed').code).toBe('ENGINE_ERROR');
    });
});

describe('serializeLogicError', () => {
    test('includes only the fields that are set', () => {
        const error: LogicError = {
            code: 'PARSE_ERROR',
            message: 'Unexpected token',
            span: { start: 0, end: 1 },
        };
        expect(serializeLogicError(error)).toEqual({
            code: 'PARSE_ERROR',
            message: 'Unexpected token',
            span: { start: 0, end: 1 },
        });
    });

    test('round trips through JSON', () => {
        const err = createOutOfRangeLiteralError(4, 2, 3);
        const json: Record<string, unknown> = JSON.parse(JSON.stringify(serializeLogicError(err.error)));
        expect(json.code).toBe('OUT_OF_RANGE_LITERAL');
        expect(json.details).toEqual({ literal: 4, variableCount: 2 });
        expect(json.context).toBeUndefined();
    });
});

import { parseSop, parseSopFile, parseSopTerms, compareVariableNames } from '../src/parser/index.js';
import { literalToSigned } from '../src/logic/model.js';
import { LogicException } from '../src/types/errors.js';
import type { LogicError } from '../src/types/errors.js';
import type { SopFunction } from '../src/types/function.js';

function signedTerms(fn: SopFunction): number[][] {
    return fn.terms.map(term => term.literals.map(literalToSigned));
}

function parseError(fn: () => unknown): LogicError {
    try {
        fn();
    } catch (e) {
        if (e instanceof LogicException) {
            return e.error;
        }
        throw e;
    }
    throw new Error('expected a LogicException');
}

describe('parseSop', () => {
    test('parses juxtaposed letters and primes', () => {
        const fn = parseSop("AB + A'C");
        expect(fn.variableNames).toEqual(['A', 'B', 'C']);
        expect(fn.variableCount).toBe(3);
        expect(signedTerms(fn)).toEqual([[1, 2], [-1, 3]]);
    });

    test('accepts explicit operators and prefix negation', () => {
        expect(signedTerms(parseSop('A.B + !A.C'))).toEqual([[1, 2], [-1, 3]]);
        expect(signedTerms(parseSop('A*B + ~A&C'))).toEqual([[1, 2], [-1, 3]]);
    });

    test('double negation cancels', () => {
        expect(signedTerms(parseSop("A'' + !B'"))).toEqual([[1], [2]]);
    });

    test('orders indexed names numerically', () => {
        const fn = parseSop('x10 x2 + x1');
        expect(fn.variableNames).toEqual(['x1', 'x2', 'x10']);
        expect(signedTerms(fn)).toEqual([[3, 2], [1]]);
    });

    test('a factor of 1 is dropped and a factor of 0 drops its term', () => {
        const fn = parseSop('A.1 + B.0 + C', { variables: ['A', 'B', 'C'] });
        expect(signedTerms(fn)).toEqual([[1], [3]]);
    });

    test('the constants alone need declared variables', () => {
        expect(signedTerms(parseSop('1', { variables: ['A'] }))).toEqual([[]]);
        expect(signedTerms(parseSop('0', { variables: ['A'] }))).toEqual([]);
        expect(parseError(() => parseSop('1')).message).toBe('Function has no variables');
    });

    test('keeps the declared variable order', () => {
        const fn = parseSop('AB', { variables: ['B', 'A', 'C'] });
        expect(fn.variableCount).toBe(3);
        expect(signedTerms(fn)).toEqual([[2, 1]]);
    });

    test('rejects undeclared variables', () => {
        const error = parseError(() => parseSop('AB', { variables: ['A'] }));
        expect(error.code).toBe('PARSE_ERROR');
        expect(error.message).toBe("Variable 'B' is not declared");
        expect(error.span?.col).toBe(2);
    });

    test('rejects blank input', () => {
        expect(parseError(() => parseSop('   ')).code).toBe('EMPTY_INPUT');
    });

    test('reports a dangling plus with its position and a hint', () => {
        const error = parseError(() => parseSop('A + '));
        expect(error.message).toBe('Expected a literal but found end of input');
        expect(error.span).toEqual({ start: 4, end: 5, line: 1, col: 5 });
        expect(error.suggestion).toBe("Dangling '+' - missing term after the last '+'");
    });

    test('reports a missing literal after an AND operator', () => {
        const error = parseError(() => parseSop('A . + B'));
        expect(error.message).toBe("Expected a literal after '.'");
        expect(error.suggestion).toBe("Incomplete product - missing literal after '.', '*' or '&'");
    });

    test('reports a leading plus', () => {
        const error = parseError(() => parseSop('+ A'));
        expect(error.message).toBe("Expected a literal but found '+'");
        expect(error.suggestion).toBe("Leading '+' - a sum must start with a term");
    });

    test('reports a negation without a variable', () => {
        expect(parseError(() => parseSop('A + !')).message).toBe("Expected a variable after '!' or '~'");
    });

    test('rejects parentheses and other numbers', () => {
        const paren = parseError(() => parseSop('A(B)'));
        expect(paren.message).toBe("Unexpected character '('");
        expect(paren.suggestion).toBe('Parentheses are not supported - write the function as a flat sum of products');
        expect(parseError(() => parseSop('A 7')).message)
            .toBe("Unexpected number '7', only the constants 0 and 1 are allowed");
    });
});

describe('parseSopTerms', () => {
    test('keeps names and positions', () => {
        expect(parseSopTerms("B A'")).toEqual([
            {
                literals: [
                    { name: 'B', negated: false, position: 0 },
                    { name: 'A', negated: true, position: 2 },
                ],
            },
        ]);
    });
});

describe('compareVariableNames', () => {
    test('sorts uppercase before lowercase and suffixes numerically', () => {
        const names = ['b', 'x10', 'A', 'x2', 'a', 'x'];
        expect([...names].sort(compareVariableNames)).toEqual(['A', 'a', 'b', 'x', 'x2', 'x10']);
    });
});

describe('parseSopFile', () => {
    test('shares one variable table across functions', () => {
        const file = parseSopFile('# two functions\nAB\nC\n');
        expect(file.variableNames).toEqual(['A', 'B', 'C']);
        expect(file.functions.map(fn => fn.variableCount)).toEqual([3, 3]);
        expect(signedTerms(file.functions[1])).toEqual([[3]]);
    });

    test('honors a vars directive', () => {
        const file = parseSopFile('vars: C, B, A\n% comment\nAB + A\'C\n');
        expect(file.variableNames).toEqual(['C', 'B', 'A']);
        expect(signedTerms(file.functions[0])).toEqual([[3, 2], [-3, 1]]);
    });

    test('reports errors with the line they occur on', () => {
        const error = parseError(() => parseSopFile('vars A B\n\nAB + A\'C\n'));
        expect(error.message).toBe("Variable 'C' is not declared");
        expect(error.span?.line).toBe(3);
        expect(error.span?.col).toBe(8);
    });

    test('rejects a vars directive after a function', () => {
        const error = parseError(() => parseSopFile('A\nvars A\n'));
        expect(error.message).toBe("'vars' must appear once, before any function");
        expect(error.span?.line).toBe(2);
    });

    test('rejects duplicate declarations', () => {
        expect(parseError(() => parseSopFile('vars A A\nA\n')).message).toBe("Variable 'A' is declared twice");
    });

    test('rejects a file without functions', () => {
        const error = parseError(() => parseSopFile('# nothing\n\n'));
        expect(error.code).toBe('EMPTY_INPUT');
        expect(error.message).toBe('No functions found in input');
    });
});

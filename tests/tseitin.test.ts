import { convert, describeConversion, encodeTermGates, VariableAllocator } from '../src/logic/transform/tseitin.js';
import { literalToSigned } from '../src/logic/model.js';
import type { CnfFormula } from '../src/types/clause.js';
import { bruteForceFormula, bruteForceFunction, createRandom, randomSop, sop } from './fixtures.js';

function signed(formula: CnfFormula): number[][] {
    return formula.clauses.map(clause => clause.literals.map(literalToSigned));
}

describe('VariableAllocator', () => {
    test('hands out indices above the reserved block', () => {
        const allocator = new VariableAllocator(3);
        expect(allocator.size).toBe(3);
        expect(allocator.allocate()).toBe(4);
        expect(allocator.allocateRange(2)).toEqual([5, 6]);
        expect(allocator.size).toBe(6);
    });

    test('refuses to encode before the function variables are reserved', () => {
        expect(() => encodeTermGates(sop(3, [[1]]), new VariableAllocator(2))).toThrow('Invariant violated');
    });
});

describe('Tseitin Transformation', () => {
    test('encodes AB + A\'C with one gate per term', () => {
        const formula = convert(sop(3, [[1, 2], [-1, 3]]));
        expect(formula.variableCount).toBe(5);
        expect(formula.projection).toEqual([1, 2, 3]);
        expect(signed(formula)).toEqual([
            [-4, 1], [-4, 2], [-1, -2, 4],
            [-5, -1], [-5, 3], [1, -3, 5],
            [4, 5],
        ]);
    });

    test('a contradictory term keeps its gate variable with a unit clause', () => {
        const result = describeConversion(sop(1, [[1, -1]]));
        expect(signed(result.formula)).toEqual([[-2], [2]]);
        expect(result.auxiliaryVariables).toBe(1);
        expect(result.contradictoryTerms).toBe(1);
        expect(result.constant).toBeUndefined();
    });

    test('zero terms becomes a single empty clause', () => {
        const result = describeConversion(sop(2, []));
        expect(result.formula.variableCount).toBe(2);
        expect(signed(result.formula)).toEqual([[]]);
        expect(result.constant).toBe(false);
    });

    test('an empty term becomes a formula with no clauses', () => {
        const result = describeConversion(sop(2, [[1], []]));
        expect(result.formula.variableCount).toBe(2);
        expect(result.formula.clauses).toHaveLength(0);
        expect(result.formula.projection).toEqual([1, 2]);
        expect(result.constant).toBe(true);
    });

    test('clause count grows linearly with the number of terms', () => {
        const terms = Array.from({ length: 10 }, (_, i) => [2 * i + 1, 2 * i + 2]);
        const formula = convert(sop(20, terms));
        // Two implications and one reverse clause per term, plus the final disjunction
        expect(formula.clauses).toHaveLength(10 * 3 + 1);
        expect(formula.variableCount).toBe(30);
    });

    test('projected models match the function truth table', () => {
        const random = createRandom(7);
        for (let i = 0; i < 25; i++) {
            const fn = randomSop(random, 1 + random(6), 5, 3);
            expect(bruteForceFormula(convert(fn))).toEqual(bruteForceFunction(fn));
        }
    });
});

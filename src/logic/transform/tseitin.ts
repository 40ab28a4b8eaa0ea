import type { Clause, CnfFormula, Literal } from '../../types/clause.js';
import type { SopFunction } from '../../types/function.js';
import { createInvariantError } from '../../types/errors.js';
import {
    createClause,
    createFormula,
    createLiteral,
    isContradictoryTerm,
    negateLiteral,
} from '../model.js';

/**
 * Tseitin transformation of a sum-of-products function.
 *
 * Distributing an OR of k ANDs into CNF is exponential in k. Instead every
 * term i gets a fresh variable y_i with the definition y_i <-> term_i:
 *
 *   y_i -> term_i :  -y_i | l          for each literal l of the term
 *   term_i -> y_i :  -l1 | ... | -lm | y_i
 *
 * and the function itself becomes the single clause y_1 | ... | y_k.
 * The output is equisatisfiable and linear in the size of the input.
 */

/**
 * Hands out fresh variable indices above a reserved block.
 * Every encoder that adds auxiliary variables draws from the same allocator,
 * so their ranges never overlap.
 */
export class VariableAllocator {
    private next: number;

    constructor(reserved: number) {
        if (!Number.isInteger(reserved) || reserved < 0) {
            throw createInvariantError(`reserved variable count must be a non-negative integer, got ${reserved}`);
        }
        this.next = reserved + 1;
    }

    allocate(): number {
        return this.next++;
    }

    /**
     * Allocate `count` consecutive indices.
     */
    allocateRange(count: number): number[] {
        return Array.from({ length: count }, () => this.allocate());
    }

    /** Highest index handed out so far (or the reserved count) */
    get size(): number {
        return this.next - 1;
    }
}

export interface TermGates {
    /** outputs[i] is the variable defined equal to term i */
    outputs: number[];
    clauses: Clause[];
    contradictoryTerms: number;
}

/**
 * Emit the definition clauses y_i <-> term_i for every term of `fn`.
 *
 * A contradictory term is never true, so its output only gets the unit
 * clause -y_i. An empty term is always true and yields the unit clause y_i.
 */
export function encodeTermGates(fn: SopFunction, allocator: VariableAllocator): TermGates {
    if (allocator.size < fn.variableCount) {
        throw createInvariantError('allocator must reserve the function variables before encoding');
    }

    const outputs = allocator.allocateRange(fn.terms.length);
    const clauses: Clause[] = [];
    let contradictoryTerms = 0;

    fn.terms.forEach((term, i) => {
        const output = createLiteral(outputs[i]);

        if (isContradictoryTerm(term)) {
            contradictoryTerms++;
            clauses.push(createClause([negateLiteral(output)]));
            return;
        }

        // y -> term
        for (const lit of term.literals) {
            clauses.push(createClause([negateLiteral(output), lit]));
        }
        // term -> y
        clauses.push(createClause([...term.literals.map(negateLiteral), output]));
    });

    return { outputs, clauses, contradictoryTerms };
}

export interface ConversionResult {
    formula: CnfFormula;
    auxiliaryVariables: number;
    contradictoryTerms: number;
    /** Set when the function is a constant and no encoding was needed */
    constant?: boolean;
}

function originalVariables(fn: SopFunction): number[] {
    return Array.from({ length: fn.variableCount }, (_, i) => i + 1);
}

/**
 * Convert with statistics about the encoding.
 */
export function describeConversion(fn: SopFunction): ConversionResult {
    const projection = originalVariables(fn);

    // Zero terms: constant FALSE, one empty clause
    if (fn.terms.length === 0) {
        return {
            formula: createFormula(fn.variableCount, [createClause([])], projection),
            auxiliaryVariables: 0,
            contradictoryTerms: 0,
            constant: false,
        };
    }

    // An empty term: constant TRUE, no clauses at all
    if (fn.terms.some(term => term.literals.length === 0)) {
        return {
            formula: createFormula(fn.variableCount, [], projection),
            auxiliaryVariables: 0,
            contradictoryTerms: 0,
            constant: true,
        };
    }

    const allocator = new VariableAllocator(fn.variableCount);
    const gates = encodeTermGates(fn, allocator);
    const atLeastOne: Literal[] = gates.outputs.map(v => createLiteral(v));

    return {
        formula: createFormula(
            allocator.size,
            [...gates.clauses, createClause(atLeastOne)],
            projection
        ),
        auxiliaryVariables: gates.outputs.length,
        contradictoryTerms: gates.contradictoryTerms,
    };
}

/**
 * Convert a sum-of-products function into an equisatisfiable CNF formula
 * whose assignments report only the function's own variables.
 */
export function convert(fn: SopFunction): CnfFormula {
    return describeConversion(fn).formula;
}

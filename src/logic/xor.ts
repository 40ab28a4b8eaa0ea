import type { Clause, CnfFormula } from '../types/clause.js';
import type { SopFunction } from '../types/function.js';
import { createIncompatibleFunctionsError } from '../types/errors.js';
import { createClause, createFormula, createLiteral, negateLiteral } from './model.js';
import { VariableAllocator, encodeTermGates } from './transform/tseitin.js';

/**
 * o <-> (y_1 | ... | y_k)
 *
 *   -o | y_1 | ... | y_k
 *   -y_i | o              for each i
 *
 * With no terms this is the unit clause -o.
 */
function encodeOutputGate(termOutputs: readonly number[], output: number): Clause[] {
    const o = createLiteral(output);
    const ys = termOutputs.map(v => createLiteral(v));
    return [
        createClause([negateLiteral(o), ...ys]),
        ...ys.map(y => createClause([negateLiteral(y), o])),
    ];
}

/**
 * Build a CNF formula that is satisfiable exactly when some assignment of
 * the shared variables makes `f1` and `f2` disagree. Variables are matched
 * by index; names play no part.
 *
 * Layout of the variable space:
 *   1..n                 shared function variables
 *   n+1 .. n+k1          term outputs of f1
 *   n+k1+1 .. n+k1+k2    term outputs of f2
 *   n+k1+k2+1            o1 <-> f1
 *   n+k1+k2+2            o2 <-> f2
 * followed by (o1 | o2) & (-o1 | -o2).
 */
export function combineXor(f1: SopFunction, f2: SopFunction): CnfFormula {
    if (f1.variableCount !== f2.variableCount) {
        throw createIncompatibleFunctionsError(f1.variableCount, f2.variableCount);
    }

    const n = f1.variableCount;
    const allocator = new VariableAllocator(n);
    const left = encodeTermGates(f1, allocator);
    const right = encodeTermGates(f2, allocator);
    const o1 = allocator.allocate();
    const o2 = allocator.allocate();

    const clauses: Clause[] = [
        ...left.clauses,
        ...encodeOutputGate(left.outputs, o1),
        ...right.clauses,
        ...encodeOutputGate(right.outputs, o2),
        createClause([createLiteral(o1), createLiteral(o2)]),
        createClause([createLiteral(o1, true), createLiteral(o2, true)]),
    ];

    return createFormula(
        allocator.size,
        clauses,
        Array.from({ length: n }, (_, i) => i + 1)
    );
}

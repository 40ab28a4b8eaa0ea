import { createParseError } from '../types/errors.js';

const NAME_PATTERN = /^([A-Za-z])(\d*)(.*)$/;
const VALID_NAME = /^[A-Za-z][0-9_]*$/;

/**
 * Natural order for variable names: by letter (uppercase first), then by
 * numeric suffix, so x2 sorts before x10.
 */
export function compareVariableNames(a: string, b: string): number {
    const ma = NAME_PATTERN.exec(a);
    const mb = NAME_PATTERN.exec(b);
    if (!ma || !mb) {
        return a < b ? -1 : a > b ? 1 : 0;
    }
    if (ma[1] !== mb[1]) {
        return ma[1] < mb[1] ? -1 : 1;
    }
    const na = ma[2] === '' ? -1 : Number.parseInt(ma[2], 10);
    const nb = mb[2] === '' ? -1 : Number.parseInt(mb[2], 10);
    if (na !== nb) {
        return na - nb;
    }
    return ma[3] < mb[3] ? -1 : ma[3] > mb[3] ? 1 : 0;
}

/**
 * Maps variable names to dense indices 1..n.
 */
export class VariableTable {
    private readonly indices = new Map<string, number>();

    constructor(readonly names: readonly string[]) {
        names.forEach((name, i) => this.indices.set(name, i + 1));
    }

    /**
     * Table ordered by natural name order.
     */
    static fromUsage(names: Iterable<string>): VariableTable {
        return new VariableTable(Array.from(new Set(names)).sort(compareVariableNames));
    }

    /**
     * Table in declaration order; rejects malformed or repeated names.
     */
    static fromDeclaration(names: readonly string[], line: string = names.join(' '), lineOffset: number = 0): VariableTable {
        const seen = new Set<string>();
        for (const name of names) {
            const position = Math.max(line.indexOf(name), 0);
            if (!VALID_NAME.test(name)) {
                throw createParseError(`Invalid variable name '${name}'`, line, position, lineOffset);
            }
            if (seen.has(name)) {
                throw createParseError(`Variable '${name}' is declared twice`, line, position, lineOffset);
            }
            seen.add(name);
        }
        return new VariableTable(names);
    }

    get size(): number {
        return this.names.length;
    }

    indexOf(name: string): number | undefined {
        return this.indices.get(name);
    }
}

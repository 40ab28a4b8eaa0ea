/**
 * Formatting utilities
 */
import type { Assignment } from '../types/clause.js';
import type { SearchStatistics, Verbosity } from '../types/responses.js';

/**
 * Format an assignment as "A=1 B=0 C=1", using variable names where given
 * and "x<index>" otherwise.
 */
export function formatAssignment(assignment: Assignment, names?: readonly string[]): string {
    const parts: string[] = [];
    for (const [variable, value] of assignment) {
        const name = names?.[variable - 1] ?? `x${variable}`;
        parts.push(`${name}=${value ? 1 : 0}`);
    }
    return parts.join(' ');
}

/**
 * Format an assignment as a DIMACS-style value line: "v 1 -2 3 0".
 */
export function formatValueLine(assignment: Assignment): string {
    const values = Array.from(assignment, ([variable, value]) => (value ? variable : -variable));
    return ['v', ...values, 0].join(' ');
}

export function formatStatistics(stats: SearchStatistics): string {
    return [
        `variables: ${stats.variables}`,
        `clauses: ${stats.clauses}`,
        `decisions: ${stats.decisions}`,
        `propagations: ${stats.propagations}`,
        `conflicts: ${stats.conflicts}`,
        `time: ${stats.timeMs}ms`,
    ].join(', ');
}

/**
 * Lines describing a solution, trimmed to the requested verbosity.
 * 'minimal' prints nothing beyond the verdict line the caller writes.
 */
export function formatSolution(
    assignment: Assignment,
    verbosity: Verbosity,
    names?: readonly string[]
): string[] {
    if (verbosity === 'minimal') {
        return [];
    }
    if (names) {
        return [formatAssignment(assignment, names)];
    }
    return [formatValueLine(assignment)];
}

/**
 * DPLL search over a CNF formula.
 *
 * The recursion of textbook DPLL is kept on an explicit decision stack, so
 * the depth of the search never touches the native call stack. Each frame
 * remembers where its part of the trail starts; backtracking truncates the
 * trail back to that point and tries the other polarity.
 *
 * States:
 *   searching  -> propagate, then decide the lowest unassigned variable
 *   conflict   -> a clause has every literal false; backtrack chronologically
 *   satisfied  -> every clause has a true literal; report the assignment
 *   exhausted  -> no frame has an untried polarity left
 */

import type { Assignment, CnfFormula } from '../../types/clause.js';
import type { SearchProgress, SolveOptions } from '../../types/options.js';
import type { AbortReason, SearchStatistics } from '../../types/responses.js';
import { literalToSigned, reportedVariables } from '../../logic/model.js';

/** Per-variable value: 0 unassigned, 1 true, -1 false */
type Value = 0 | 1 | -1;

interface Frame {
    variable: number;
    value: boolean;
    /** Both polarities have now been tried */
    flipped: boolean;
    /** Trail length before this frame's literal was pushed */
    trailStart: number;
}

export type SearchStep =
    | { kind: 'solution'; assignment: Assignment }
    | { kind: 'exhausted' }
    | { kind: 'aborted'; reason: AbortReason };

export interface SearchSettings {
    /**
     * Keep branching on free reported variables once every clause is
     * satisfied, so each solution is a distinct total assignment of them.
     */
    enumerate: boolean;
    /** Variables to report, ascending. Defaults to the formula's projection. */
    reported?: readonly number[];
}

export class DpllSearch {
    private readonly variableCount: number;
    private readonly clauses: number[][];
    private readonly originalClauseCount: number;
    private readonly reported: readonly number[];
    private readonly reportsEveryVariable: boolean;
    private readonly enumerate: boolean;

    private readonly values: Int8Array;
    private readonly trail: number[] = [];
    private readonly frames: Frame[] = [];

    private decisions = 0;
    private propagations = 0;
    private conflicts = 0;
    private solutions = 0;
    private readonly startTime = Date.now();
    private readonly deadline?: number;

    private resumeAfterSolution = false;
    private stopped?: SearchStep;

    constructor(
        formula: CnfFormula,
        private readonly options: SolveOptions = {},
        settings: SearchSettings = { enumerate: false }
    ) {
        this.variableCount = formula.variableCount;
        // Private copy: blocking clauses are appended here, never to the caller's formula
        this.clauses = formula.clauses.map(clause => clause.literals.map(literalToSigned));
        this.originalClauseCount = formula.clauses.length;
        this.reported = settings.reported ?? reportedVariables(formula);
        this.reportsEveryVariable = this.reported.length === this.variableCount;
        this.enumerate = settings.enumerate;
        this.values = new Int8Array(this.variableCount + 1);

        if (options.maxSeconds !== undefined) {
            this.deadline = this.startTime + options.maxSeconds * 1000;
        }

        // An empty clause can never be satisfied; nothing to search
        if (this.clauses.some(clause => clause.length === 0)) {
            this.stopped = { kind: 'exhausted' };
        }
    }

    /**
     * Run until the next solution, exhaustion, or an abort.
     * After a solution, calling again continues the enumeration.
     */
    next(): SearchStep {
        if (this.stopped) {
            return this.stopped;
        }

        if (this.resumeAfterSolution) {
            this.resumeAfterSolution = false;
            if (!this.backtrack()) {
                return this.stop({ kind: 'exhausted' });
            }
        }

        for (;;) {
            if (!this.propagate()) {
                this.conflicts++;
                if (!this.backtrack()) {
                    return this.stop({ kind: 'exhausted' });
                }
                continue;
            }

            const variable = this.nextBranchVariable();
            if (variable === undefined) {
                const assignment = this.currentAssignment();
                this.solutions++;
                this.addBlockingClause(assignment);
                this.resumeAfterSolution = true;
                return { kind: 'solution', assignment };
            }

            const reason = this.checkAbort(variable);
            if (reason) {
                return this.stop({ kind: 'aborted', reason });
            }

            this.decide(variable);
        }
    }

    statistics(): SearchStatistics {
        return {
            timeMs: Date.now() - this.startTime,
            variables: this.variableCount,
            clauses: this.originalClauseCount,
            decisions: this.decisions,
            propagations: this.propagations,
            conflicts: this.conflicts,
        };
    }

    private stop(step: SearchStep): SearchStep {
        this.stopped = step;
        return step;
    }

    private valueOf(lit: number): Value {
        const value = this.values[Math.abs(lit)];
        if (value === 0) return 0;
        return (lit > 0) === (value === 1) ? 1 : -1;
    }

    private assign(lit: number): void {
        this.values[Math.abs(lit)] = lit > 0 ? 1 : -1;
        this.trail.push(lit);
    }

    private undoTo(length: number): void {
        while (this.trail.length > length) {
            const lit = this.trail.pop();
            if (lit === undefined) break;
            this.values[Math.abs(lit)] = 0;
        }
    }

    /**
     * Unit propagation to a fixed point.
     * Returns false if some clause has every literal false.
     */
    private propagate(): boolean {
        let changed = true;
        while (changed) {
            changed = false;
            for (const clause of this.clauses) {
                let unassigned = 0;
                let unit = 0;
                let satisfied = false;

                for (const lit of clause) {
                    const value = this.valueOf(lit);
                    if (value === 1) {
                        satisfied = true;
                        break;
                    }
                    if (value === 0) {
                        unassigned++;
                        unit = lit;
                    }
                }

                if (satisfied) continue;
                if (unassigned === 0) return false;
                if (unassigned === 1) {
                    this.assign(unit);
                    this.propagations++;
                    changed = true;
                }
            }
        }
        return true;
    }

    private allClausesSatisfied(): boolean {
        return this.clauses.every(clause => clause.some(lit => this.valueOf(lit) === 1));
    }

    /**
     * Lowest unassigned variable while some clause is still open. Once all
     * clauses hold, only enumeration keeps branching, and only on reported
     * variables. Undefined means the current state is a solution.
     */
    private nextBranchVariable(): number | undefined {
        if (!this.allClausesSatisfied()) {
            for (let v = 1; v <= this.variableCount; v++) {
                if (this.values[v] === 0) return v;
            }
            return undefined;
        }
        if (this.enumerate) {
            return this.reported.find(v => this.values[v] === 0);
        }
        return undefined;
    }

    private checkAbort(variable: number): AbortReason | undefined {
        const { maxDecisions, onDecision } = this.options;
        if (maxDecisions !== undefined && this.decisions >= maxDecisions) {
            return 'decision-limit';
        }
        if (this.deadline !== undefined && Date.now() > this.deadline) {
            return 'timeout';
        }
        if (onDecision) {
            const progress: SearchProgress = {
                decisions: this.decisions,
                propagations: this.propagations,
                conflicts: this.conflicts,
                depth: this.frames.length,
                variable,
                solutions: this.solutions,
                elapsedMs: Date.now() - this.startTime,
            };
            if (onDecision(progress) === false) {
                return 'callback';
            }
        }
        return undefined;
    }

    private decide(variable: number): void {
        this.decisions++;
        this.frames.push({ variable, value: true, flipped: false, trailStart: this.trail.length });
        this.assign(variable);
    }

    /**
     * Undo frames until one still has an untried polarity, and try it.
     * Returns false when the stack runs out.
     */
    private backtrack(): boolean {
        let frame = this.frames.pop();
        while (frame !== undefined) {
            this.undoTo(frame.trailStart);
            if (!frame.flipped) {
                const value = !frame.value;
                this.frames.push({
                    variable: frame.variable,
                    value,
                    flipped: true,
                    trailStart: frame.trailStart,
                });
                this.assign(value ? frame.variable : -frame.variable);
                return true;
            }
            frame = this.frames.pop();
        }
        return false;
    }

    /**
     * Forbid the solution just found for the rest of this run.
     *
     * When every variable is reported, negating the frame literals is
     * enough: the rest of the assignment follows from them. With a
     * projection, distinct full assignments may share reported values, so
     * the reported values themselves are negated.
     */
    private addBlockingClause(assignment: Assignment): void {
        if (this.reportsEveryVariable) {
            this.clauses.push(this.frames.map(f => (f.value ? -f.variable : f.variable)));
            return;
        }
        const clause: number[] = [];
        for (const [variable, value] of assignment) {
            clause.push(value ? -variable : variable);
        }
        this.clauses.push(clause);
    }

    private currentAssignment(): Assignment {
        const assignment = new Map<number, boolean>();
        for (const v of this.reported) {
            assignment.set(v, this.values[v] === 1);
        }
        return assignment;
    }
}

/**
 * Snapshot handed to the decision hook before every branch.
 */
export interface SearchProgress {
    decisions: number;
    propagations: number;
    conflicts: number;
    /** Current number of frames on the decision stack */
    depth: number;
    /** The variable about to be decided */
    variable: number;
    solutions: number;
    elapsedMs: number;
}

export interface SolveOptions {
    /** Abort once this many seconds have passed */
    maxSeconds?: number;
    /** Abort once this many decisions have been made */
    maxDecisions?: number;
    /**
     * Called before every branch decision.
     * Return false to abort the search.
     */
    onDecision?: (progress: SearchProgress) => boolean | void;
}

export interface EnumerateOptions extends SolveOptions {
    /** Stop enumerating once this many solutions are recorded */
    maxSolutions?: number;
    /**
     * Report assignments over this subset of variables only.
     * Overrides the formula's own projection.
     */
    variables?: readonly number[];
}

export type EngineName = 'dpll' | 'minisat';

export interface RunOptions extends EnumerateOptions {
    engine?: EngineName;
    /** Cross-check every answer with the other engine */
    verify?: boolean;
}

export const DEFAULTS = {
    maxSolutions: 65536,
    maxSeconds: 30,
    maxDecisions: 10_000_000,
    engine: 'dpll',
    /** Largest variable count a formula may declare */
    maxVariables: 1 << 24,
} as const;

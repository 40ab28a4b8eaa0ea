/**
 * Type declarations for logic-solver package
 *
 * logic-solver is a MiniSat-based SAT solver compiled to JavaScript.
 * https://www.npmjs.com/package/logic-solver
 */

declare module 'logic-solver' {
    namespace Logic {
        interface Solver {
            /**
             * Require formulas to be true.
             */
            require(...formulas: Formula[]): void;

            /**
             * Require formulas to be false.
             */
            forbid(...formulas: Formula[]): void;

            /**
             * Solve the constraints and return a solution, or null if unsatisfiable.
             */
            solve(): Solution | null;
        }

        interface Solution {
            /**
             * Get the assignment map from variable names to booleans.
             */
            getMap(): Record<string, boolean>;
        }

        type Formula = string | FormulaObject;

        interface FormulaObject {
            type: string;
            operands?: Formula[];
        }
    }

    interface LogicStatic {
        Solver: new () => Logic.Solver;

        or(...operands: Logic.Formula[]): Logic.Formula;

        and(...operands: Logic.Formula[]): Logic.Formula;

        not(operand: Logic.Formula): Logic.Formula;
    }

    const Logic: LogicStatic;
    export = Logic;
}

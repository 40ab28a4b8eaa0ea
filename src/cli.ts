#!/usr/bin/env node
import { readFileSync } from 'fs';
import chalk from 'chalk';
import { SatisfiabilityChecker } from './checker.js';
import { loadConfig } from './config.js';
import { createEngineManager } from './engines/manager.js';
import type { Config, ConfigKey } from './config.js';
import { decodeDimacs, encodeDimacs } from './logic/dimacs.js';
import { describeConversion } from './logic/transform/tseitin.js';
import { parseSopFile } from './parser/index.js';
import { LogicException } from './types/errors.js';
import type { SopFunction } from './types/function.js';
import type { Assignment } from './types/clause.js';
import type { RunOptions } from './types/options.js';
import type { SearchStatistics, Verbosity } from './types/responses.js';
import { formatSolution, formatStatistics } from './utils/formatting.js';

export const VERSION = '0.1.0';
const HELP = `
sopsat v${VERSION}

Usage:
  sopsat solve <file>        Find one solution of the first function
  sopsat all <file>          Enumerate every solution of the first function
  sopsat xor <file>          Check whether the first two functions differ
  sopsat dimacs <file.cnf>   Solve a DIMACS CNF file
  sopsat convert <file>      Print the DIMACS encoding of the first function

Options:
  --max-solutions=<n>   Stop enumerating after n solutions (default 65536)
  --max-seconds=<n>     Abort a search after n seconds (default 30)
  --max-decisions=<n>   Abort a search after n decisions (default 10000000)
  --engine=<name>       Search engine (dpll, minisat)
  --vars=<list>         Report only these variables (names, or indices for DIMACS)
  --all                 With 'dimacs', enumerate every solution
  --verify              Cross-check the answer with the other engine
  --verbose             Print search statistics
  --quiet, -q           Print only the verdict
  --help, -h            Show this help
  --version, -v         Show version

Functions are written one per line as sums of products:
  vars A B C
  AB + A'C
  A.B + !A.C

Exit codes: 0 satisfiable or different, 1 unsatisfiable or equivalent,
2 error or search aborted.
`;

export const EXIT_SAT = 0;
export const EXIT_UNSAT = 1;
export const EXIT_ERROR = 2;

const VALUE_FLAGS: Record<string, ConfigKey> = {
    '--max-solutions': 'SOPSAT_MAX_SOLUTIONS',
    '--max-seconds': 'SOPSAT_MAX_SECONDS',
    '--max-decisions': 'SOPSAT_MAX_DECISIONS',
    '--engine': 'SOPSAT_ENGINE',
};

interface Arguments {
    command?: string;
    file?: string;
    overrides: Partial<Record<ConfigKey, string>>;
    vars?: string;
    all: boolean;
    verify: boolean;
    quiet: boolean;
    help: boolean;
    version: boolean;
}

function parseArguments(args: readonly string[]): Arguments {
    const parsed: Arguments = { overrides: {}, all: false, verify: false, quiet: false, help: false, version: false };
    const positional: string[] = [];

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const eq = arg.indexOf('=');
        const flag = eq >= 0 ? arg.slice(0, eq) : arg;
        let value = eq >= 0 ? arg.slice(eq + 1) : undefined;

        if (flag === '--help' || flag === '-h') {
            parsed.help = true;
        } else if (flag === '--version' || flag === '-v') {
            parsed.version = true;
        } else if (flag === '--all') {
            parsed.all = true;
        } else if (flag === '--verify') {
            parsed.verify = true;
        } else if (flag === '--quiet' || flag === '-q') {
            parsed.quiet = true;
        } else if (flag === '--verbose') {
            parsed.overrides.SOPSAT_VERBOSE = 'true';
        } else if (flag in VALUE_FLAGS || flag === '--vars') {
            if (value === undefined && i + 1 < args.length) {
                value = args[i + 1];
                i++;
            }
            if (value === undefined) {
                throw new LogicException({
                    code: 'INVALID_CONFIG',
                    message: `Invalid configuration: ${flag} requires a value`,
                });
            }
            if (flag === '--vars') {
                parsed.vars = value;
            } else {
                parsed.overrides[VALUE_FLAGS[flag]] = value;
            }
        } else if (arg.startsWith('-')) {
            throw new LogicException({
                code: 'INVALID_CONFIG',
                message: `Invalid configuration: unknown option '${arg}'`,
            });
        } else {
            positional.push(arg);
        }
    }

    [parsed.command, parsed.file] = positional;
    return parsed;
}

function splitList(list: string): string[] {
    return list.split(/[\s,]+/).filter(item => item !== '');
}

function resolveNamedVariables(list: string, names: readonly string[]): number[] {
    return splitList(list).map(name => {
        const index = names.indexOf(name);
        if (index < 0) {
            throw new LogicException({
                code: 'INVALID_CONFIG',
                message: `Invalid configuration: unknown variable '${name}' in --vars`,
                details: { known: names },
            });
        }
        return index + 1;
    });
}

function resolveIndexedVariables(list: string): number[] {
    return splitList(list).map(item => {
        const value = Number(item);
        if (!Number.isInteger(value) || value < 1) {
            throw new LogicException({
                code: 'INVALID_CONFIG',
                message: `Invalid configuration: '${item}' in --vars is not a variable index`,
            });
        }
        return value;
    });
}

function runOptions(config: Config, verify: boolean, variables?: number[]): RunOptions {
    return {
        engine: config.engine,
        maxSeconds: config.maxSeconds,
        maxDecisions: config.maxDecisions,
        maxSolutions: config.maxSolutions,
        verify,
        ...(variables && { variables }),
    };
}

function firstFunctions(text: string, count: number): { functions: SopFunction[]; names: readonly string[] } {
    const file = parseSopFile(text);
    if (file.functions.length < count) {
        throw new LogicException({
            code: 'EMPTY_INPUT',
            message: `Expected at least ${count} functions, found ${file.functions.length}`,
        });
    }
    return { functions: file.functions.slice(0, count), names: file.variableNames };
}

class Reporter {
    constructor(
        private readonly verbosity: Verbosity,
        /** Whether the engine counts decisions, propagations and conflicts */
        private readonly countsSearch: boolean
    ) {}

    result(line: string): void {
        console.log(line);
    }

    solution(assignment: Assignment, names?: readonly string[]): void {
        for (const line of formatSolution(assignment, this.verbosity, names)) {
            console.log(line);
        }
    }

    info(line: string): void {
        if (this.verbosity === 'detailed') {
            console.error(chalk.gray(line));
        }
    }

    statistics(stats: SearchStatistics, engine: string, verifiedBy?: string): void {
        this.info(`engine: ${engine}${verifiedBy ? ` (verified by ${verifiedBy})` : ''}`);
        this.info(this.countsSearch ? formatStatistics(stats) : `time: ${stats.timeMs}ms`);
    }

    aborted(reason: string): void {
        console.error(chalk.yellow(`ABORTED (${reason})`));
    }
}

/**
 * Run one CLI invocation and return its exit code.
 */
export function run(args: readonly string[], env: Record<string, string | undefined> = process.env): number {
    try {
        const parsed = parseArguments(args);

        if (parsed.version) {
            console.log(VERSION);
            return EXIT_SAT;
        }
        if (parsed.help || !parsed.command) {
            console.log(HELP);
            return parsed.help ? EXIT_SAT : EXIT_ERROR;
        }
        if (!parsed.file) {
            console.error(chalk.red('Error: file argument required'));
            return EXIT_ERROR;
        }

        const config = loadConfig(env, parsed.overrides);
        const verbosity: Verbosity = parsed.quiet ? 'minimal' : config.verbose ? 'detailed' : 'standard';
        const manager = createEngineManager();
        const engine = manager.getEngine(config.engine);
        const reporter = new Reporter(verbosity, engine.capabilities.statistics);
        if (!engine.capabilities.decisionHooks) {
            reporter.info(`note: ${engine.name} ignores --max-decisions`);
        }
        const checker = new SatisfiabilityChecker(manager);
        const text = readFileSync(parsed.file, 'utf-8');

        switch (parsed.command) {
            case 'solve': {
                const { functions: [fn], names } = firstFunctions(text, 1);
                const outcome = checker.solveFunction(fn, runOptions(config, parsed.verify));
                reporter.statistics(outcome.statistics, outcome.engineUsed, outcome.verifiedBy);
                if (outcome.result === 'aborted') {
                    reporter.aborted(outcome.reason);
                    return EXIT_ERROR;
                }
                if (outcome.result === 'unsat') {
                    reporter.result(chalk.red('UNSAT'));
                    return EXIT_UNSAT;
                }
                reporter.result(chalk.green('SAT'));
                reporter.solution(outcome.assignment, names);
                return EXIT_SAT;
            }
            case 'all': {
                const { functions: [fn], names } = firstFunctions(text, 1);
                const variables = parsed.vars !== undefined ? resolveNamedVariables(parsed.vars, names) : undefined;
                const set = checker.enumerateFunction(fn, runOptions(config, parsed.verify, variables));
                for (const solution of set.solutions) {
                    reporter.solution(solution, names);
                }
                reporter.statistics(set.statistics, set.engineUsed, set.verifiedBy);
                return reportSet(reporter, set.status, set.solutions.length, set.reason);
            }
            case 'xor': {
                const { functions: [f1, f2], names } = firstFunctions(text, 2);
                const verdict = checker.checkEquivalence(f1, f2, runOptions(config, parsed.verify));
                reporter.statistics(verdict.statistics, verdict.engineUsed);
                if (verdict.result === 'aborted') {
                    reporter.aborted(verdict.reason);
                    return EXIT_ERROR;
                }
                if (verdict.result === 'equivalent') {
                    reporter.result(chalk.red('EQUIVALENT'));
                    return EXIT_UNSAT;
                }
                reporter.result(chalk.green('DIFFERENT'));
                reporter.solution(verdict.counterexample, names);
                return EXIT_SAT;
            }
            case 'dimacs': {
                const formula = decodeDimacs(text);
                const variables = parsed.vars !== undefined ? resolveIndexedVariables(parsed.vars) : undefined;
                if (parsed.all || variables) {
                    const set = checker.enumerateFormula(formula, runOptions(config, parsed.verify, variables));
                    for (const solution of set.solutions) {
                        reporter.solution(solution);
                    }
                    reporter.statistics(set.statistics, set.engineUsed, set.verifiedBy);
                    return reportSet(reporter, set.status, set.solutions.length, set.reason);
                }
                const outcome = checker.solveFormula(formula, runOptions(config, parsed.verify));
                reporter.statistics(outcome.statistics, outcome.engineUsed, outcome.verifiedBy);
                if (outcome.result === 'aborted') {
                    reporter.aborted(outcome.reason);
                    return EXIT_ERROR;
                }
                if (outcome.result === 'unsat') {
                    reporter.result('s UNSATISFIABLE');
                    return EXIT_UNSAT;
                }
                reporter.result('s SATISFIABLE');
                reporter.solution(outcome.assignment);
                return EXIT_SAT;
            }
            case 'convert': {
                const { functions: [fn] } = firstFunctions(text, 1);
                const conversion = describeConversion(fn);
                reporter.info(
                    `auxiliary variables: ${conversion.auxiliaryVariables}, contradictory terms: ${conversion.contradictoryTerms}`
                );
                console.log(encodeDimacs(conversion.formula).trimEnd());
                return EXIT_SAT;
            }
            default:
                console.error(chalk.red(`Unknown command: ${parsed.command}`));
                console.log(HELP);
                return EXIT_ERROR;
        }
    } catch (e) {
        if (e instanceof LogicException) {
            const { error } = e;
            const where = error.span?.line !== undefined ? ` (line ${error.span.line}, col ${error.span.col ?? 1})` : '';
            console.error(chalk.red(`Error [${error.code}]${where}: ${error.message}`));
            if (error.suggestion) {
                console.error(chalk.yellow(`  Hint: ${error.suggestion}`));
            }
            return EXIT_ERROR;
        }
        if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
            console.error(chalk.red(`Error: ${e.message}`));
            return EXIT_ERROR;
        }
        throw e;
    }
}

function reportSet(
    reporter: Reporter,
    status: 'complete' | 'limit' | 'aborted',
    count: number,
    reason?: string
): number {
    if (status === 'aborted') {
        reporter.aborted(reason ?? 'unknown');
        return EXIT_ERROR;
    }
    const suffix = status === 'limit' ? ' (limit reached)' : '';
    // A limit means at least one solution exists, even with --max-solutions=0
    const satisfiable = count > 0 || status === 'limit';
    reporter.result(
        satisfiable
            ? chalk.green(`${count} solution${count === 1 ? '' : 's'}${suffix}`)
            : chalk.red('UNSAT')
    );
    return satisfiable ? EXIT_SAT : EXIT_UNSAT;
}

if (require.main === module) {
    process.exitCode = run(process.argv.slice(2));
}

import { loadConfig } from '../src/config.js';
import { DEFAULTS } from '../src/types/options.js';
import { LogicException } from '../src/types/errors.js';

describe('loadConfig', () => {
    test('falls back to the defaults', () => {
        expect(loadConfig({})).toEqual({
            maxSolutions: DEFAULTS.maxSolutions,
            maxSeconds: 30,
            maxDecisions: 10_000_000,
            engine: 'dpll',
            verbose: false,
        });
    });

    test('reads SOPSAT_* variables', () => {
        const config = loadConfig({
            SOPSAT_MAX_SOLUTIONS: '10',
            SOPSAT_MAX_SECONDS: '2.5',
            SOPSAT_MAX_DECISIONS: '500',
            SOPSAT_ENGINE: 'minisat',
            SOPSAT_VERBOSE: 'yes',
            UNRELATED: 'ignored',
        });
        expect(config).toEqual({
            maxSolutions: 10,
            maxSeconds: 2.5,
            maxDecisions: 500,
            engine: 'minisat',
            verbose: true,
        });
    });

    test('overrides win over the environment', () => {
        const config = loadConfig({ SOPSAT_MAX_SOLUTIONS: '10' }, { SOPSAT_MAX_SOLUTIONS: '20' });
        expect(config.maxSolutions).toBe(20);
    });

    test('treats empty strings as unset', () => {
        expect(loadConfig({ SOPSAT_ENGINE: '  ' }).engine).toBe('dpll');
    });

    test('accepts zero solutions but not zero seconds', () => {
        expect(loadConfig({ SOPSAT_MAX_SOLUTIONS: '0' }).maxSolutions).toBe(0);
        expect(() => loadConfig({ SOPSAT_MAX_SECONDS: '0' })).toThrow(/^Invalid configuration: SOPSAT_MAX_SECONDS: /);
    });

    test('rejects an unknown engine with INVALID_CONFIG', () => {
        let error: unknown;
        try {
            loadConfig({ SOPSAT_ENGINE: 'z3' });
        } catch (e) {
            error = e;
        }
        expect(error).toBeInstanceOf(LogicException);
        if (error instanceof LogicException) {
            expect(error.code).toBe('INVALID_CONFIG');
            expect(error.message).toMatch(/^Invalid configuration: SOPSAT_ENGINE: /);
        }
    });

    test('rejects non-numeric limits and unknown flag values', () => {
        expect(() => loadConfig({ SOPSAT_MAX_DECISIONS: 'many' })).toThrow(/SOPSAT_MAX_DECISIONS/);
        expect(() => loadConfig({ SOPSAT_MAX_DECISIONS: '1.5' })).toThrow(/SOPSAT_MAX_DECISIONS/);
        expect(() => loadConfig({ SOPSAT_VERBOSE: 'maybe' })).toThrow(/SOPSAT_VERBOSE/);
    });
});

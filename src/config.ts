/**
 * Runtime configuration.
 *
 * Values come from SOPSAT_* environment variables, overridden by command
 * line flags, and fall back to DEFAULTS. Both sources are validated by the
 * same schema.
 */

import { z } from 'zod';
import type { EngineName } from './types/options.js';
import { DEFAULTS } from './types/options.js';
import { createConfigError } from './types/errors.js';

const booleanFlag = z
    .enum(['1', '0', 'true', 'false', 'yes', 'no'])
    .transform(value => value === '1' || value === 'true' || value === 'yes');

const configSchema = z.object({
    SOPSAT_MAX_SOLUTIONS: z.coerce.number().int().nonnegative().optional()
        .describe('Stop enumerating after this many solutions'),
    SOPSAT_MAX_SECONDS: z.coerce.number().positive().optional()
        .describe('Abort a search after this many seconds'),
    SOPSAT_MAX_DECISIONS: z.coerce.number().int().positive().optional()
        .describe('Abort a search after this many branch decisions'),
    SOPSAT_ENGINE: z.enum(['dpll', 'minisat']).optional()
        .describe("Search engine: 'dpll' or 'minisat'"),
    SOPSAT_VERBOSE: booleanFlag.optional()
        .describe('Print search statistics'),
});

export type ConfigKey = keyof z.input<typeof configSchema>;

export interface Config {
    maxSolutions: number;
    maxSeconds: number;
    maxDecisions: number;
    engine: EngineName;
    verbose: boolean;
}

const CONFIG_KEYS = configSchema.keyof().options;

function pick(source: Record<string, string | undefined>): Partial<Record<ConfigKey, string>> {
    const values: Partial<Record<ConfigKey, string>> = {};
    for (const key of CONFIG_KEYS) {
        const value = source[key]?.trim();
        // Empty strings count as unset
        if (value) {
            values[key] = value;
        }
    }
    return values;
}

/**
 * Build the configuration from an environment and flag overrides
 * keyed by the same SOPSAT_* names.
 */
export function loadConfig(
    env: Record<string, string | undefined> = process.env,
    overrides: Partial<Record<ConfigKey, string>> = {}
): Config {
    const parsed = configSchema.safeParse({ ...pick(env), ...pick(overrides) });
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw createConfigError(issues.join('; '), { issues });
    }

    const values = parsed.data;
    return {
        maxSolutions: values.SOPSAT_MAX_SOLUTIONS ?? DEFAULTS.maxSolutions,
        maxSeconds: values.SOPSAT_MAX_SECONDS ?? DEFAULTS.maxSeconds,
        maxDecisions: values.SOPSAT_MAX_DECISIONS ?? DEFAULTS.maxDecisions,
        engine: values.SOPSAT_ENGINE ?? DEFAULTS.engine,
        verbose: values.SOPSAT_VERBOSE ?? false,
    };
}

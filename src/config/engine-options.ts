/**
 * Engine Options
 *
 * Defaults, validation and environment loading for the render engine.
 */

import { z } from 'zod';

import { EngineConfigError } from '../errors/engine-errors.js';

export interface EngineOptions {
    /** Sort value given to derived parameters and used as the numbering base */
    defaultSort: number;
    /** Emit debug logging for each render */
    debug: boolean;
}

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
    defaultSort: 100,
    debug: false
};

const engineOptionsSchema = z
    .object({
        defaultSort: z
            .number({ invalid_type_error: 'defaultSort must be a number' })
            .int('defaultSort must be an integer')
            .min(0, 'defaultSort must be non-negative'),
        debug: z.boolean({ invalid_type_error: 'debug must be a boolean' })
    })
    .strict();

/**
 * Merge partial options over the defaults and validate the result
 */
export function resolveEngineOptions(options: Partial<EngineOptions> = {}): EngineOptions {
    const provided = Object.fromEntries(Object.entries(options).filter(([, value]) => value !== undefined));
    const result = engineOptionsSchema.safeParse({ ...DEFAULT_ENGINE_OPTIONS, ...provided });
    if (!result.success) {
        throw new EngineConfigError(
            result.error.issues.map((issue) => ({ path: issue.path, message: issue.message }))
        );
    }
    return result.data;
}

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

/**
 * Read options from UI_SCHEMA_DEFAULT_SORT and UI_SCHEMA_DEBUG
 */
export function loadEngineOptionsFromEnv(env: Record<string, string | undefined> = process.env): EngineOptions {
    const options: Partial<EngineOptions> = {};

    const sortValue = env.UI_SCHEMA_DEFAULT_SORT?.trim();
    if (sortValue) {
        const parsed = Number(sortValue);
        if (Number.isNaN(parsed)) {
            throw new EngineConfigError([
                { path: ['UI_SCHEMA_DEFAULT_SORT'], message: `expected a number, received "${sortValue}"` }
            ]);
        }
        options.defaultSort = parsed;
    }

    const debugValue = env.UI_SCHEMA_DEBUG?.trim().toLowerCase();
    if (debugValue) {
        if (TRUE_VALUES.has(debugValue)) {
            options.debug = true;
        } else if (FALSE_VALUES.has(debugValue)) {
            options.debug = false;
        } else {
            throw new EngineConfigError([
                { path: ['UI_SCHEMA_DEBUG'], message: `expected a boolean flag, received "${debugValue}"` }
            ]);
        }
    }

    return resolveEngineOptions(options);
}

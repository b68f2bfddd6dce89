/**
 * @file Dimmer Configuration
 *
 * Runtime options for the overlay dimmer with deterministic precedence
 * (explicit override > env > defaults). Values are validated against a Zod
 * schema at the boundary.
 *
 * @module config/dimmer
 */

import { z } from 'zod';

export const DimmerConfigSchema = z.object({
    debug:            z.boolean().default(false),
    surfaceTrace:     z.boolean().default(false),
    showTransactions: z.boolean().default(false),
    surfaceName:      z.string().min(1, 'surfaceName must be non-empty').default('DimSurface'),
    initialSize:      z.number().int().positive('initialSize must be > 0').default(16),
});

export type DimmerConfig = z.infer<typeof DimmerConfigSchema>;
export type DimmerConfigInput = z.input<typeof DimmerConfigSchema>;
export type DimmerEnv = Record<string, string | undefined>;

export type DimmerConfigResult = { ok: true; config: DimmerConfig } | { ok: false; errors: string[] };

type BooleanKey = 'debug' | 'surfaceTrace' | 'showTransactions';

const ENV_FLAGS: Record<BooleanKey, string> = {
    debug: 'DIMMER_DEBUG',
    surfaceTrace: 'DIMMER_SURFACE_TRACE',
    showTransactions: 'DIMMER_SHOW_TRANSACTIONS',
};

const BOOLEAN_KEYS: BooleanKey[] = ['debug', 'surfaceTrace', 'showTransactions'];

const ENV_SURFACE_NAME: string = 'DIMMER_SURFACE_NAME';

/**
 * Defaults with no env or override applied.
 */
export function dimmerConfig_default(): DimmerConfig {
    return DimmerConfigSchema.parse({});
}

/**
 * Resolve effective configuration.
 *
 * @param overrides - Explicit options; `undefined` entries fall through to env.
 * @param env - Environment to read (defaults to `process.env`).
 */
export function dimmerConfig_resolve(
    overrides: DimmerConfigInput = {},
    env: DimmerEnv = process.env,
): DimmerConfigResult {
    const errors: string[] = [];
    const fromEnv: DimmerConfigInput = {};

    for (const key of BOOLEAN_KEYS) {
        const name: string = ENV_FLAGS[key];
        const raw: string | undefined = env[name];
        if (raw === undefined || raw.trim() === '') continue;

        const flag: boolean | null = envFlag_parse(raw);
        if (flag === null) {
            errors.push(`${name} must be a boolean flag, got "${raw}"`);
            continue;
        }
        fromEnv[key] = flag;
    }

    const envName: string | undefined = env[ENV_SURFACE_NAME];
    if (envName !== undefined && envName.trim() !== '') {
        fromEnv.surfaceName = envName.trim();
    }

    if (errors.length > 0) {
        return { ok: false, errors };
    }

    const merged: DimmerConfigInput = { ...fromEnv, ...overrides_defined(overrides) };
    const result = DimmerConfigSchema.safeParse(merged);
    if (!result.success) {
        return {
            ok: false,
            errors: result.error.issues.map(i => `[${i.path.join('.')}] ${i.message}`),
        };
    }
    return { ok: true, config: result.data };
}

/**
 * Parse common boolean spellings; null when unrecognised.
 */
function envFlag_parse(raw: string): boolean | null {
    const normalized: string = raw.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    return null;
}

function overrides_defined(overrides: DimmerConfigInput): DimmerConfigInput {
    const defined: DimmerConfigInput = {};
    if (overrides.debug !== undefined) defined.debug = overrides.debug;
    if (overrides.surfaceTrace !== undefined) defined.surfaceTrace = overrides.surfaceTrace;
    if (overrides.showTransactions !== undefined) defined.showTransactions = overrides.showTransactions;
    if (overrides.surfaceName !== undefined) defined.surfaceName = overrides.surfaceName;
    if (overrides.initialSize !== undefined) defined.initialSize = overrides.initialSize;
    return defined;
}

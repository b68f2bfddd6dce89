/**
 * @file Dim Logger
 *
 * Console-backed tagged logger. Debug lines are dropped unless enabled.
 *
 * @module dim/logger
 */

import type { DimLogger } from './types.js';

export interface DimLoggerOptions {
    debug?: boolean;
}

/**
 * Create a logger that prefixes every line with `[tag]`.
 */
export function dimLogger_create(tag: string, options: DimLoggerOptions = {}): DimLogger {
    const prefix: string = `[${tag}]`;
    const debugEnabled: boolean = options.debug ?? false;

    return {
        debug(message: string): void {
            if (debugEnabled) console.debug(`${prefix} ${message}`);
        },
        info(message: string): void {
            console.log(`${prefix} ${message}`);
        },
        warn(message: string, err?: unknown): void {
            if (err === undefined) {
                console.warn(`${prefix} ${message}`);
            } else {
                console.warn(`${prefix} ${message}:`, err);
            }
        },
        error(message: string, err?: unknown): void {
            if (err === undefined) {
                console.error(`${prefix} ${message}`);
            } else {
                console.error(`${prefix} ${message}:`, err);
            }
        },
    };
}

/**
 * Extract a printable message from a thrown value.
 */
export function errorMessage_get(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * @file Surface Call Guard
 *
 * Wraps primitive surface mutations so a native failure becomes a logged
 * result instead of an exception crossing the dimmer's control logic.
 *
 * @module dim/surfaceCall
 */

import type { DimLogger, SurfaceCallResult } from './types.js';
import { errorMessage_get } from './logger.js';

/**
 * Run one or more surface primitives, logging a failure under `context`.
 *
 * @param logger - Receives a warning on failure.
 * @param context - What was being attempted (e.g. "setting alpha").
 * @param call - Surface primitives to run.
 */
export function surfaceCall_attempt(logger: DimLogger, context: string, call: () => void): SurfaceCallResult {
    try {
        call();
        return { ok: true };
    } catch (err: unknown) {
        logger.warn(`Failure ${context}`, err);
        return { ok: false, error: errorMessage_get(err) };
    }
}

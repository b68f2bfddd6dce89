/**
 * @file Monotonic Clock
 *
 * @module dim/clock
 */

import type { Clock } from './types.js';

/**
 * Process-wide monotonic clock backed by `performance.now()`.
 */
export const systemClock: Clock = {
    uptime_ms(): number {
        return performance.now();
    },
};

/**
 * @file Dim Transition Timeline
 *
 * Pure interpolation helpers for a linear alpha transition. Progress is
 * derived from elapsed clock time only; the caller decides when to sample.
 *
 * @module dim/timeline
 */

import type { DimTransition } from './types.js';

/**
 * Sample a transition at `now`, never passing the target.
 *
 * @param transition - Transition being sampled.
 * @param now - Current clock value in milliseconds.
 * @returns Alpha at `now`, clamped to `targetAlpha` in the direction of travel.
 *   A zero-length transition is already at its target.
 */
export function transitionAlpha_sample(transition: DimTransition, now: number): number {
    if (transition.durationMs <= 0) return transition.targetAlpha;

    const alphaDelta: number = transition.targetAlpha - transition.startAlpha;
    const alpha: number = transition.startAlpha
        + alphaDelta * (now - transition.startTime) / transition.durationMs;

    if ((alphaDelta > 0 && alpha > transition.targetAlpha)
        || (alphaDelta < 0 && alpha < transition.targetAlpha)) {
        return transition.targetAlpha;
    }
    return alpha;
}

/**
 * Whether a transition of `durationMs` started now would finish strictly
 * before the one in flight.
 */
export function duration_endsEarlier(
    transition: Pick<DimTransition, 'startTime' | 'durationMs'>,
    durationMs: number,
    now: number,
): boolean {
    return now + durationMs < transitionEnd_get(transition);
}

/**
 * Clock value at which a transition reaches its target.
 */
export function transitionEnd_get(transition: Pick<DimTransition, 'startTime' | 'durationMs'>): number {
    return transition.startTime + transition.durationMs;
}

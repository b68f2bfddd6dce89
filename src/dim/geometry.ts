/**
 * @file Dim Geometry
 *
 * Sizes the dim surface at 1.5x the display so a rotated frozen frame that
 * includes it never exposes an undimmed corner. The surface is backed off by
 * a sixth of its extent on each axis, leaving a quarter of it before and a
 * quarter after the display.
 *
 * @module dim/geometry
 */

import type { DimGeometry, DisplayInfo } from './types.js';

export const DIM_OVERSIZE_FACTOR: number = 1.5;

/**
 * Compute integer extents and offset for a display.
 */
export function dimGeometry_compute(info: DisplayInfo): DimGeometry {
    const width: number = Math.trunc(info.logicalWidth * DIM_OVERSIZE_FACTOR);
    const height: number = Math.trunc(info.logicalHeight * DIM_OVERSIZE_FACTOR);
    return {
        width,
        height,
        x: 0 - Math.trunc(width / 6),
        y: 0 - Math.trunc(height / 6),
    };
}

/**
 * Whether the cached extents or layer differ from the requested ones.
 */
export function geometry_differs(
    cached: { width: number; height: number; layer: number },
    requested: { width: number; height: number; layer: number },
): boolean {
    return cached.width !== requested.width
        || cached.height !== requested.height
        || cached.layer !== requested.layer;
}

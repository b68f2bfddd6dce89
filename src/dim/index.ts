/**
 * @file Dim Layer Re-exports
 *
 * @module dim
 */

export { OverlayDimmer, LAYER_UNSET } from './OverlayDimmer.js';
export { transaction_run } from './transaction.js';
export { systemClock } from './clock.js';
export { dimLogger_create, errorMessage_get } from './logger.js';
export { dimGeometry_compute, DIM_OVERSIZE_FACTOR } from './geometry.js';
export { transitionAlpha_sample, duration_endsEarlier, transitionEnd_get } from './timeline.js';
export { presentRequest_validate, dismissRequest_validate } from './request.js';
export type {
    Clock,
    DimGeometry,
    DimLayerState,
    DimLogger,
    DimmerEnvironment,
    DimSurface,
    DimTransition,
    DisplayInfo,
    DisplayRegistry,
    DumpSink,
    SurfaceCallResult,
    SurfaceCreateRequest,
    SurfaceFactory,
    SurfacePixelFormat,
    SurfaceTransaction,
} from './types.js';

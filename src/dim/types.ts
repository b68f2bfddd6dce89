/**
 * @file Dim Layer Types
 *
 * Collaborator contracts for the overlay dimmer. The dimmer owns exactly one
 * surface and drives it through these interfaces; the concrete backend
 * (a real compositor, the terminal compositor, a test stub) lives elsewhere.
 *
 * @module dim/types
 */

/**
 * Native drawable the dimmer owns. Every primitive may throw.
 */
export interface DimSurface {
    readonly name: string;
    layerStack_set(displayId: number): void;
    position_set(x: number, y: number): void;
    size_set(width: number, height: number): void;
    layer_set(layer: number): void;
    alpha_set(alpha: number): void;
    show(): void;
    hide(): void;
    destroy(): void;
}

export type SurfacePixelFormat = 'opaque' | 'translucent';

/**
 * Parameters for creating the dim surface.
 *
 * @property dim - Surface is a solid dim effect rather than a buffer.
 * @property hidden - Surface starts hidden.
 */
export interface SurfaceCreateRequest {
    name: string;
    width: number;
    height: number;
    format: SurfacePixelFormat;
    flags: {
        dim: boolean;
        hidden: boolean;
    };
}

export interface SurfaceFactory {
    surface_create(request: SurfaceCreateRequest): DimSurface;
}

/**
 * Batching scope: every surface mutation issued between open and close
 * becomes visible together.
 */
export interface SurfaceTransaction {
    transaction_open(): void;
    transaction_close(): void;
}

export interface DisplayInfo {
    logicalWidth: number;
    logicalHeight: number;
}

export interface DisplayRegistry {
    /**
     * @returns Current geometry, or null for an unknown display.
     */
    displayInfo_get(displayId: number): DisplayInfo | null;
}

/**
 * Monotonic millisecond clock.
 */
export interface Clock {
    uptime_ms(): number;
}

export interface DimLogger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string, err?: unknown): void;
    error(message: string, err?: unknown): void;
}

export interface DumpSink {
    line_write(line: string): void;
}

/**
 * Everything the dimmer needs from its host.
 */
export interface DimmerEnvironment {
    surfaces: SurfaceFactory;
    transaction: SurfaceTransaction;
    displays: DisplayRegistry;
    clock?: Clock;
    logger?: DimLogger;
}

/**
 * Extents and offset of the oversized dim surface for one display size.
 */
export interface DimGeometry {
    width: number;
    height: number;
    x: number;
    y: number;
}

/**
 * The (startAlpha, targetAlpha, startTime, duration) tuple of a transition.
 */
export interface DimTransition {
    startAlpha: number;
    targetAlpha: number;
    startTime: number;
    durationMs: number;
}

/**
 * Read-only copy of the dimmer's state.
 */
export interface DimLayerState {
    surface: string | null;
    alpha: number;
    targetAlpha: number;
    startAlpha: number;
    startTime: number;
    durationMs: number;
    layer: number;
    lastWidth: number;
    lastHeight: number;
    showing: boolean;
}

export type SurfaceCallResult = { ok: true } | { ok: false; error: string };

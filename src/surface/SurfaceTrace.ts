/**
 * @file Surface Trace
 *
 * Decorator that logs every primitive call on a surface before forwarding
 * it. Enabled through the `surfaceTrace` option when diagnosing what the
 * dimmer sends to the backend.
 *
 * @module surface/SurfaceTrace
 */

import type { DimLogger, DimSurface } from '../dim/types.js';

export class SurfaceTrace implements DimSurface {
    private readonly inner: DimSurface;
    private readonly logger: DimLogger;

    constructor(inner: DimSurface, logger: DimLogger) {
        this.inner = inner;
        this.logger = logger;
    }

    public get name(): string {
        return this.inner.name;
    }

    public layerStack_set(displayId: number): void {
        this.call_trace(`layerStack=${displayId}`);
        this.inner.layerStack_set(displayId);
    }

    public position_set(x: number, y: number): void {
        this.call_trace(`pos=(${x},${y})`);
        this.inner.position_set(x, y);
    }

    public size_set(width: number, height: number): void {
        this.call_trace(`size=${width}x${height}`);
        this.inner.size_set(width, height);
    }

    public layer_set(layer: number): void {
        this.call_trace(`layer=${layer}`);
        this.inner.layer_set(layer);
    }

    public alpha_set(alpha: number): void {
        this.call_trace(`alpha=${alpha}`);
        this.inner.alpha_set(alpha);
    }

    public show(): void {
        this.call_trace('SHOW');
        this.inner.show();
    }

    public hide(): void {
        this.call_trace('HIDE');
        this.inner.hide();
    }

    public destroy(): void {
        this.call_trace('DESTROY');
        this.inner.destroy();
    }

    private call_trace(detail: string): void {
        this.logger.info(`${this.inner.name} ${detail}`);
    }
}

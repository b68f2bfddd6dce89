/**
 * @file Overlay Dimmer
 *
 * Drives one full-display dim surface toward a target alpha over a duration
 * using linear interpolation, and keeps its geometry in sync with the
 * display's logical size.
 *
 * Every mutating call (`present`, `dismiss`, `hideNow`, `jumpToEnd`,
 * `advance`, `release`) must be made with the caller's surface transaction
 * open. The dimmer never schedules itself: a ticker calls `advance()` once
 * per frame until it returns false.
 *
 * Surface failures are logged and swallowed; internal state always advances
 * as though the call succeeded. A dimmer whose surface is missing (creation
 * failed, or `release()` was called) collapses to alpha 0 on every call.
 *
 * @module dim/OverlayDimmer
 */

import type {
    Clock,
    DimLayerState,
    DimLogger,
    DimmerEnvironment,
    DimGeometry,
    DimSurface,
    DisplayInfo,
    DisplayRegistry,
    DumpSink,
    SurfaceFactory,
    SurfaceTransaction,
} from './types.js';
import { dimmerConfig_default, type DimmerConfig } from '../config/dimmer.js';
import { SurfaceTrace } from '../surface/SurfaceTrace.js';
import { dimGeometry_compute, geometry_differs } from './geometry.js';
import { dimLogger_create } from './logger.js';
import { dismissRequest_validate, presentRequest_validate } from './request.js';
import { surfaceCall_attempt } from './surfaceCall.js';
import { systemClock } from './clock.js';
import { duration_endsEarlier, transitionAlpha_sample } from './timeline.js';

/**
 * Stacking layer before the first geometry sync.
 */
export const LAYER_UNSET: number = -1;

/**
 * Single translucent overlay bound to one display.
 *
 * @example
 * ```typescript
 * const dimmer = new OverlayDimmer(environment, 0);
 * transaction_run(environment.transaction, () => dimmer.present(21000, 0.6, 200));
 * // per frame:
 * transaction_run(environment.transaction, () => dimmer.advance());
 * ```
 */
export class OverlayDimmer {
    private readonly displayId: number;
    private readonly displays: DisplayRegistry;
    private readonly clock: Clock;
    private readonly logger: DimLogger;

    private surface: DimSurface | null = null;

    /** Last value passed to surface.alpha_set() */
    private alpha: number = 0;
    private targetAlpha: number = 0;
    private startAlpha: number = 0;
    private startTime: number = 0;
    private durationMs: number = 0;

    /** Last values passed to the surface geometry setters */
    private layer: number = LAYER_UNSET;
    private lastWidth: number = 0;
    private lastHeight: number = 0;

    /** True after surface.show(), false after surface.hide() */
    private showing: boolean = false;

    constructor(environment: DimmerEnvironment, displayId: number, config: DimmerConfig = dimmerConfig_default()) {
        this.displayId = displayId;
        this.displays = environment.displays;
        this.clock = environment.clock ?? systemClock;
        this.logger = environment.logger ?? dimLogger_create('OverlayDimmer', { debug: config.debug });

        this.logger.debug(`ctor: displayId=${displayId}`);
        this.surface_create(environment.surfaces, environment.transaction, config);
    }

    /**
     * Whether the dim is on, or heading there.
     */
    public isDimming(): boolean {
        return this.targetAlpha !== 0;
    }

    /**
     * Whether a transition is still in progress.
     */
    public isAnimating(): boolean {
        return this.targetAlpha !== this.alpha;
    }

    public getTargetAlpha(): number {
        return this.targetAlpha;
    }

    /**
     * Whether the surface was last told to show.
     */
    public isShowing(): boolean {
        return this.showing;
    }

    public state_snapshot(): DimLayerState {
        return {
            surface: this.surface ? this.surface.name : null,
            alpha: this.alpha,
            targetAlpha: this.targetAlpha,
            startAlpha: this.startAlpha,
            startTime: this.startTime,
            durationMs: this.durationMs,
            layer: this.layer,
            lastWidth: this.lastWidth,
            lastHeight: this.lastHeight,
            showing: this.showing,
        };
    }

    /**
     * Begin, redirect or fast-forward a transition toward `targetAlpha`.
     *
     * A new timeline starts only when the target changes, when the request
     * would finish before the transition in flight, or when idle at a
     * different alpha. The requested target is recorded regardless.
     *
     * @param layer - Stacking layer for the surface.
     * @param targetAlpha - Alpha to end at, within [0, 1].
     * @param durationMs - Time to get there; 0 applies at once.
     * @throws When an argument is outside its contract.
     */
    public present(layer: number, targetAlpha: number, durationMs: number): void {
        const request = presentRequest_validate(layer, targetAlpha, durationMs);
        this.logger.debug(`present: layer=${request.layer} alpha=${request.targetAlpha} duration=${request.durationMs}`);

        const surface: DimSurface | null = this.surface;
        if (!surface) {
            this.surfaceAbsent_collapse('present');
            return;
        }

        this.geometry_sync(surface, request.layer);

        const now: number = this.clock.uptime_ms();
        const animating: boolean = this.isAnimating();
        if ((animating && (this.targetAlpha !== request.targetAlpha || this.endsEarlier(request.durationMs, now)))
                || (!animating && this.alpha !== request.targetAlpha)) {
            if (request.durationMs <= 0) {
                this.alpha_apply(surface, request.targetAlpha);
            } else {
                this.startAlpha = this.alpha;
                this.startTime = now;
                this.durationMs = request.durationMs;
            }
        }
        this.logger.debug(`present: startAlpha=${this.startAlpha} startTime=${this.startTime}`);
        this.targetAlpha = request.targetAlpha;
    }

    /**
     * Fade to transparent over `durationMs`.
     *
     * No-op when hidden, or when already fading out no slower than requested.
     */
    public dismiss(durationMs: number): void {
        const request = dismissRequest_validate(durationMs);
        if (!this.surface) {
            this.surfaceAbsent_collapse('dismiss');
            return;
        }

        if (this.showing && (this.targetAlpha !== 0 || this.endsEarlier(request.durationMs, this.clock.uptime_ms()))) {
            this.logger.debug(`dismiss: duration=${request.durationMs}`);
            this.present(this.layer, 0, request.durationMs);
        }
    }

    /**
     * Hide immediately if showing.
     */
    public hideNow(): void {
        if (!this.surface) {
            this.surfaceAbsent_collapse('hideNow');
            return;
        }

        if (this.showing) {
            this.logger.debug('hideNow: immediate');
            this.dismiss(0);
        }
    }

    /**
     * Collapse the transition in flight to its target.
     */
    public jumpToEnd(): void {
        if (!this.surface) {
            this.surfaceAbsent_collapse('jumpToEnd');
            return;
        }

        if (this.isAnimating()) {
            this.logger.debug('jumpToEnd: immediate');
            this.present(this.layer, this.targetAlpha, 0);
        }
    }

    /**
     * Step the transition to the current clock time.
     *
     * @returns True while more steps are needed.
     */
    public advance(): boolean {
        const surface: DimSurface | null = this.surface;
        if (!surface) {
            this.surfaceAbsent_collapse('advance');
            return false;
        }

        if (this.isAnimating()) {
            const now: number = this.clock.uptime_ms();
            const alpha: number = transitionAlpha_sample({
                startAlpha: this.startAlpha,
                targetAlpha: this.targetAlpha,
                startTime: this.startTime,
                durationMs: this.durationMs,
            }, now);
            this.logger.debug(`advance: curTime=${now} alpha=${alpha}`);
            this.alpha_apply(surface, alpha);
        }

        return this.isAnimating();
    }

    /**
     * Destroy the owned surface and settle at alpha 0. Safe to call more
     * than once.
     */
    public release(): void {
        const surface: DimSurface | null = this.surface;
        if (!surface) return;

        this.logger.debug('release: destroying surface');
        this.surface = null;
        this.showing = false;
        this.targetAlpha = 0;
        this.alpha = 0;
        surfaceCall_attempt(this.logger, 'destroying surface', (): void => surface.destroy());
    }

    /**
     * Write a fixed-layout diagnostic block. Does not mutate state.
     */
    public dump(sink: DumpSink, prefix: string = ''): void {
        const surfaceLabel: string = this.surface ? this.surface.name : 'null';
        sink.line_write(`${prefix}surface=${surfaceLabel}`);
        sink.line_write(`${prefix} layer=${this.layer} alpha=${this.alpha}`);
        sink.line_write(`${prefix}lastWidth=${this.lastWidth} lastHeight=${this.lastHeight}`);
        sink.line_write(`${prefix}Last animation: startTime=${this.startTime} duration=${this.durationMs} curTime=${this.clock.uptime_ms()}`);
        sink.line_write(`${prefix} startAlpha=${this.startAlpha} targetAlpha=${this.targetAlpha}`);
    }

    /**
     * Create the surface inside its own transaction. Failure leaves the
     * surface null and the dimmer inert.
     */
    private surface_create(factory: SurfaceFactory, transaction: SurfaceTransaction, config: DimmerConfig): void {
        transaction.transaction_open();
        try {
            const created: DimSurface = factory.surface_create({
                name: config.surfaceName,
                width: config.initialSize,
                height: config.initialSize,
                format: 'opaque',
                flags: { dim: true, hidden: true },
            });
            this.surface = config.surfaceTrace ? new SurfaceTrace(created, this.logger) : created;
            if (config.showTransactions) {
                this.logger.info(`  DIM ${created.name}: CREATE`);
            }
            this.surface.layerStack_set(this.displayId);
        } catch (err: unknown) {
            this.logger.error('Exception creating dim surface', err);
        } finally {
            transaction.transaction_close();
        }
    }

    /**
     * Resize, reposition and restack only when extents or layer changed.
     */
    private geometry_sync(surface: DimSurface, layer: number): void {
        const info: DisplayInfo | null = this.displays.displayInfo_get(this.displayId);
        if (!info) {
            this.logger.warn(`No display ${this.displayId}; skipping geometry sync`);
            return;
        }

        const geometry: DimGeometry = dimGeometry_compute(info);
        const cached = { width: this.lastWidth, height: this.lastHeight, layer: this.layer };
        if (!geometry_differs(cached, { width: geometry.width, height: geometry.height, layer })) {
            return;
        }

        surfaceCall_attempt(this.logger, 'setting size or layer', (): void => {
            surface.position_set(geometry.x, geometry.y);
            surface.size_set(geometry.width, geometry.height);
            surface.layer_set(layer);
        });
        this.lastWidth = geometry.width;
        this.lastHeight = geometry.height;
        this.layer = layer;
    }

    /**
     * Push `alpha` to the surface, toggling visibility at the 0 boundary.
     */
    private alpha_apply(surface: DimSurface, alpha: number): void {
        if (this.alpha === alpha) return;

        this.logger.debug(`alpha_apply: alpha=${alpha}`);
        surfaceCall_attempt(this.logger, 'setting alpha immediately', (): void => {
            surface.alpha_set(alpha);
            if (alpha === 0 && this.showing) {
                this.logger.debug('alpha_apply: hiding');
                surface.hide();
                this.showing = false;
            } else if (alpha > 0 && !this.showing) {
                this.logger.debug('alpha_apply: showing');
                surface.show();
                this.showing = true;
            }
        });
        this.alpha = alpha;
    }

    private endsEarlier(durationMs: number, now: number): boolean {
        return duration_endsEarlier({ startTime: this.startTime, durationMs: this.durationMs }, durationMs, now);
    }

    private surfaceAbsent_collapse(operation: string): void {
        this.logger.error(`${operation}: no surface`);
        this.targetAlpha = 0;
        this.alpha = 0;
    }
}

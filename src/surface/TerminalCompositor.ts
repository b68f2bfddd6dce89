/**
 * @file Terminal Compositor
 *
 * In-memory surface backend that renders to a terminal. Surfaces hold their
 * state here; when the outermost transaction closes after any mutation, one
 * status line per live surface is written to the injected line writer.
 *
 * Mutating a surface with no transaction open throws, as a real compositor
 * would reject an unbatched change.
 *
 * @module surface/TerminalCompositor
 */

import chalk, { type ChalkInstance } from 'chalk';
import type {
    DimSurface,
    DisplayInfo,
    DisplayRegistry,
    SurfaceCreateRequest,
    SurfaceFactory,
    SurfaceTransaction,
} from '../dim/types.js';

/**
 * Configuration for a TerminalCompositor.
 *
 * @property displays - Logical display sizes keyed by display id.
 * @property line_write - Receives each rendered line.
 * @property chalk - Color instance (default: the shared chalk).
 * @property barWidth - Characters in the alpha bar (default: 20).
 */
export interface TerminalCompositorOptions {
    displays: Map<number, DisplayInfo>;
    line_write: (line: string) => void;
    chalk?: ChalkInstance;
    barWidth?: number;
}

export class TerminalCompositor implements SurfaceFactory, SurfaceTransaction, DisplayRegistry {
    private readonly displays: Map<number, DisplayInfo>;
    private readonly lineWrite: (line: string) => void;
    private readonly palette: ChalkInstance;
    private readonly barWidth: number;
    private readonly surfaces: TerminalSurface[] = [];
    private depth: number = 0;
    private dirty: boolean = false;

    constructor(options: TerminalCompositorOptions) {
        this.displays = new Map<number, DisplayInfo>(options.displays);
        this.lineWrite = options.line_write;
        this.palette = options.chalk ?? chalk;
        this.barWidth = options.barWidth ?? 20;
    }

    public displayInfo_get(displayId: number): DisplayInfo | null {
        const info: DisplayInfo | undefined = this.displays.get(displayId);
        return info ? { ...info } : null;
    }

    /**
     * Change a display's logical size (e.g. on rotation).
     */
    public display_set(displayId: number, info: DisplayInfo): void {
        this.displays.set(displayId, { ...info });
    }

    public surface_create(request: SurfaceCreateRequest): DimSurface {
        if (request.width <= 0 || request.height <= 0) {
            throw new Error(`Invalid surface size ${request.width}x${request.height} for ${request.name}`);
        }
        const surface: TerminalSurface = new TerminalSurface(this, request);
        this.surfaces.push(surface);
        return surface;
    }

    public transaction_open(): void {
        this.depth += 1;
    }

    public transaction_close(): void {
        if (this.depth === 0) {
            throw new Error('transaction_close called with no open transaction');
        }
        this.depth -= 1;
        if (this.depth === 0 && this.dirty) {
            this.dirty = false;
            this.frame_render();
        }
    }

    /**
     * Surfaces still alive, in creation order.
     */
    public surfaces_list(): readonly TerminalSurface[] {
        return this.surfaces;
    }

    /**
     * Record a pending mutation. Throws when no transaction is open.
     */
    public mutation_begin(surface: TerminalSurface): void {
        if (this.depth === 0) {
            throw new Error(`Surface ${surface.name} mutated outside a transaction`);
        }
        this.dirty = true;
    }

    public surface_remove(surface: TerminalSurface): void {
        const index: number = this.surfaces.indexOf(surface);
        if (index >= 0) this.surfaces.splice(index, 1);
    }

    /**
     * Format one surface as a status line.
     */
    public surface_format(surface: TerminalSurface): string {
        const head: string = `${surface.name} display=${surface.displayId} layer=${surface.layer} `
            + `${surface.width}x${surface.height}@(${surface.x},${surface.y})`;
        if (!surface.visible) {
            return `${head} ${this.palette.dim('hidden')}`;
        }

        const filled: number = Math.round(surface.alpha * this.barWidth);
        const bar: string = this.palette.gray('█'.repeat(filled))
            + this.palette.dim('·'.repeat(this.barWidth - filled));
        return `${head} ${bar} ${Math.round(surface.alpha * 100)}%`;
    }

    private frame_render(): void {
        for (const surface of this.surfaces) {
            this.lineWrite(this.surface_format(surface));
        }
    }
}

/**
 * One surface owned by a TerminalCompositor.
 */
export class TerminalSurface implements DimSurface {
    public readonly name: string;
    public displayId: number = 0;
    public x: number = 0;
    public y: number = 0;
    public width: number;
    public height: number;
    public layer: number = 0;
    public alpha: number = 1;
    public visible: boolean;
    public destroyed: boolean = false;
    private readonly compositor: TerminalCompositor;

    constructor(compositor: TerminalCompositor, request: SurfaceCreateRequest) {
        this.compositor = compositor;
        this.name = request.name;
        this.width = request.width;
        this.height = request.height;
        this.visible = !request.flags.hidden;
    }

    public layerStack_set(displayId: number): void {
        this.mutation_begin();
        this.displayId = displayId;
    }

    public position_set(x: number, y: number): void {
        this.mutation_begin();
        this.x = x;
        this.y = y;
    }

    public size_set(width: number, height: number): void {
        this.mutation_begin();
        this.width = width;
        this.height = height;
    }

    public layer_set(layer: number): void {
        this.mutation_begin();
        this.layer = layer;
    }

    public alpha_set(alpha: number): void {
        this.mutation_begin();
        this.alpha = alpha;
    }

    public show(): void {
        this.mutation_begin();
        this.visible = true;
    }

    public hide(): void {
        this.mutation_begin();
        this.visible = false;
    }

    public destroy(): void {
        this.mutation_begin();
        this.destroyed = true;
        this.compositor.surface_remove(this);
    }

    private mutation_begin(): void {
        if (this.destroyed) {
            throw new Error(`Surface ${this.name} already destroyed`);
        }
        this.compositor.mutation_begin(this);
    }
}

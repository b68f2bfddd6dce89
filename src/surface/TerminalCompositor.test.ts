/**
 * @file TerminalCompositor Unit Tests
 *
 * Validates transaction batching, frame rendering and the compositor as a
 * complete dimmer backend.
 */

import { describe, it, expect } from 'vitest';
import { Chalk } from 'chalk';
import { TerminalCompositor } from './TerminalCompositor.js';
import { OverlayDimmer } from '../dim/OverlayDimmer.js';
import { transaction_run } from '../dim/transaction.js';
import { LogCapture, ManualClock } from '../dim/testing/stubs.js';
import type { DimSurface, DisplayInfo } from '../dim/types.js';

interface CompositorHarness {
    compositor: TerminalCompositor;
    lines: string[];
}

function compositor_create(): CompositorHarness {
    const lines: string[] = [];
    const compositor: TerminalCompositor = new TerminalCompositor({
        displays: new Map<number, DisplayInfo>([[0, { logicalWidth: 1920, logicalHeight: 1080 }]]),
        line_write: (line: string): void => { lines.push(line); },
        chalk: new Chalk({ level: 0 }),
        barWidth: 10,
    });
    return { compositor, lines };
}

function surface_make(compositor: TerminalCompositor): DimSurface {
    return compositor.surface_create({
        name: 'Probe',
        width: 16,
        height: 16,
        format: 'opaque',
        flags: { dim: true, hidden: true },
    });
}

describe('TerminalCompositor', (): void => {
    it('renders once when the outermost transaction closes', (): void => {
        const { compositor, lines } = compositor_create();
        const surface: DimSurface = surface_make(compositor);

        compositor.transaction_open();
        compositor.transaction_open();
        surface.layer_set(3);
        compositor.transaction_close();
        expect(lines).toEqual([]);

        compositor.transaction_close();
        expect(lines).toEqual(['Probe display=0 layer=3 16x16@(0,0) hidden']);
    });

    it('does not render a transaction with no mutations', (): void => {
        const { compositor, lines } = compositor_create();
        surface_make(compositor);

        transaction_run(compositor, (): void => {});
        expect(lines).toEqual([]);
    });

    it('rejects mutations outside a transaction', (): void => {
        const { compositor } = compositor_create();
        const surface: DimSurface = surface_make(compositor);

        expect((): void => surface.alpha_set(0.5)).toThrow('Surface Probe mutated outside a transaction');
    });

    it('rejects an unbalanced close and an empty surface', (): void => {
        const { compositor } = compositor_create();

        expect((): void => compositor.transaction_close()).toThrow('transaction_close called with no open transaction');
        expect((): DimSurface => compositor.surface_create({
            name: 'Empty',
            width: 0,
            height: 16,
            format: 'opaque',
            flags: { dim: true, hidden: true },
        })).toThrow('Invalid surface size 0x16 for Empty');
    });

    it('drops destroyed surfaces and rejects further use', (): void => {
        const { compositor } = compositor_create();
        const surface: DimSurface = surface_make(compositor);

        transaction_run(compositor, (): void => surface.destroy());

        expect(compositor.surfaces_list()).toEqual([]);
        expect((): void => transaction_run(compositor, (): void => surface.show()))
            .toThrow('Surface Probe already destroyed');
    });

    it('returns copies of display info and null for unknown ids', (): void => {
        const { compositor } = compositor_create();

        compositor.display_set(1, { logicalWidth: 800, logicalHeight: 600 });
        const info: DisplayInfo | null = compositor.displayInfo_get(1);
        expect(info).toEqual({ logicalWidth: 800, logicalHeight: 600 });
        expect(compositor.displayInfo_get(2)).toBeNull();
    });
});

describe('TerminalCompositor as dimmer backend', (): void => {
    it('renders the dim surface through a fade', (): void => {
        const { compositor, lines } = compositor_create();
        const clock: ManualClock = new ManualClock();
        const dimmer: OverlayDimmer = new OverlayDimmer({
            surfaces: compositor,
            transaction: compositor,
            displays: compositor,
            clock,
            logger: new LogCapture(),
        }, 0);

        expect(lines).toEqual(['DimSurface display=0 layer=0 16x16@(0,0) hidden']);

        transaction_run(compositor, (): void => dimmer.present(5, 0.8, 1000));
        expect(lines).toHaveLength(2);
        expect(lines[1]).toBe('DimSurface display=0 layer=5 2880x1620@(-480,-270) hidden');

        clock.time_set(500);
        transaction_run(compositor, (): boolean => dimmer.advance());
        expect(lines[2]).toBe('DimSurface display=0 layer=5 2880x1620@(-480,-270) ████······ 40%');

        clock.time_set(1000);
        transaction_run(compositor, (): boolean => dimmer.advance());
        expect(lines[3]).toBe('DimSurface display=0 layer=5 2880x1620@(-480,-270) ████████·· 80%');

        transaction_run(compositor, (): void => dimmer.dismiss(0));
        expect(lines[4]).toBe('DimSurface display=0 layer=5 2880x1620@(-480,-270) hidden');
    });

    it('logs surface rejections when the caller skips the transaction', (): void => {
        const { compositor, lines } = compositor_create();
        const logger: LogCapture = new LogCapture();
        const dimmer: OverlayDimmer = new OverlayDimmer({
            surfaces: compositor,
            transaction: compositor,
            displays: compositor,
            clock: new ManualClock(),
            logger,
        }, 0);

        dimmer.present(5, 0.5, 0);

        expect(logger.messages_at('warn')).toEqual([
            'Failure setting size or layer',
            'Failure setting alpha immediately',
        ]);
        expect(dimmer.state_snapshot().alpha).toBe(0.5);
        expect(lines).toHaveLength(1);
    });
});

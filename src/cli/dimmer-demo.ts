#!/usr/bin/env npx tsx
/**
 * @file Overlay Dimmer Demo
 *
 * Drives one dimmer on the terminal compositor through a short scripted
 * sequence: fade in, retarget mid-flight, fade out, release. The ticker
 * lives here; the dimmer only reacts to `advance()`.
 *
 * Usage:
 *   npx tsx src/cli/dimmer-demo.ts
 *   DIMMER_SURFACE_TRACE=1 npx tsx src/cli/dimmer-demo.ts
 *
 * @module
 */

import chalk from 'chalk';
import { dimmerConfig_resolve, type DimmerConfigResult } from '../config/dimmer.js';
import { OverlayDimmer } from '../dim/OverlayDimmer.js';
import { transaction_run } from '../dim/transaction.js';
import type { DimmerEnvironment, DisplayInfo } from '../dim/types.js';
import { TerminalCompositor } from '../surface/TerminalCompositor.js';

// ─── Configuration ─────────────────────────────────────────────────────────

const DISPLAY_ID: number = 0;
const DIM_LAYER: number = 21000;
const FRAME_MS: number = 50;

interface DemoStep {
    label: string;
    action: (dimmer: OverlayDimmer) => void;
}

const STEPS: readonly DemoStep[] = [
    { label: 'fade in to 0.6 over 600ms', action: (dimmer: OverlayDimmer): void => dimmer.present(DIM_LAYER, 0.6, 600) },
    { label: 'retarget to 0.3 over 300ms', action: (dimmer: OverlayDimmer): void => dimmer.present(DIM_LAYER, 0.3, 300) },
    { label: 'dismiss over 400ms', action: (dimmer: OverlayDimmer): void => dimmer.dismiss(400) },
];

// ─── Ticker ────────────────────────────────────────────────────────────────

/**
 * Advance once per frame until the dimmer settles.
 */
function animation_settle(dimmer: OverlayDimmer, environment: DimmerEnvironment): Promise<void> {
    return new Promise((resolve: () => void) => {
        const timer: NodeJS.Timeout = setInterval((): void => {
            const animating: boolean = transaction_run(environment.transaction, (): boolean => dimmer.advance());
            if (!animating) {
                clearInterval(timer);
                resolve();
            }
        }, FRAME_MS);
    });
}

// ─── Main ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
    const resolved: DimmerConfigResult = dimmerConfig_resolve();
    if (!resolved.ok) {
        for (const error of resolved.errors) {
            console.error(chalk.red(`config: ${error}`));
        }
        process.exitCode = 1;
        return;
    }

    const display: DisplayInfo = { logicalWidth: 1920, logicalHeight: 1080 };
    const compositor: TerminalCompositor = new TerminalCompositor({
        displays: new Map<number, DisplayInfo>([[DISPLAY_ID, display]]),
        line_write: (line: string): void => console.log(`  ${line}`),
    });
    const environment: DimmerEnvironment = {
        surfaces: compositor,
        transaction: compositor,
        displays: compositor,
    };

    const dimmer: OverlayDimmer = new OverlayDimmer(environment, DISPLAY_ID, resolved.config);

    for (const step of STEPS) {
        console.log(chalk.cyan(`>> ${step.label}`));
        transaction_run(environment.transaction, (): void => step.action(dimmer));
        await animation_settle(dimmer, environment);
    }

    console.log(chalk.cyan('>> release'));
    transaction_run(environment.transaction, (): void => dimmer.release());
    dimmer.dump({ line_write: (line: string): void => console.log(chalk.dim(line)) }, '  ');
}

main().catch((err: unknown): void => {
    console.error(chalk.red('Dimmer demo failed:'), err);
    process.exitCode = 1;
});

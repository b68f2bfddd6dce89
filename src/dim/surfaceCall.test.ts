import { describe, it, expect } from 'vitest';
import { surfaceCall_attempt } from './surfaceCall.js';
import { LogCapture } from './testing/stubs.js';
import type { SurfaceCallResult } from './types.js';

describe('surfaceCall_attempt', (): void => {
    it('reports success without logging', (): void => {
        const logger: LogCapture = new LogCapture();
        const result: SurfaceCallResult = surfaceCall_attempt(logger, 'setting alpha', (): void => {});

        expect(result).toEqual({ ok: true });
        expect(logger.entries).toEqual([]);
    });

    it('turns a throw into a logged failure result', (): void => {
        const logger: LogCapture = new LogCapture();
        const result: SurfaceCallResult = surfaceCall_attempt(logger, 'setting alpha', (): void => {
            throw new Error('surface gone');
        });

        expect(result).toEqual({ ok: false, error: 'surface gone' });
        expect(logger.entries).toEqual([{ level: 'warn', message: 'Failure setting alpha' }]);
    });
});

import { describe, it, expect } from 'vitest';
import { dimGeometry_compute, geometry_differs } from './geometry.js';

describe('dimGeometry_compute', (): void => {
    it('scales by 1.5 and backs off a sixth of the extent', (): void => {
        expect(dimGeometry_compute({ logicalWidth: 1920, logicalHeight: 1080 })).toEqual({
            width: 2880,
            height: 1620,
            x: -480,
            y: -270,
        });
    });

    it('truncates odd sizes toward zero', (): void => {
        expect(dimGeometry_compute({ logicalWidth: 801, logicalHeight: 601 })).toEqual({
            width: 1201,
            height: 901,
            x: -200,
            y: -150,
        });
    });
});

describe('geometry_differs', (): void => {
    const cached = { width: 2880, height: 1620, layer: 5 };

    it('is false for identical values', (): void => {
        expect(geometry_differs(cached, { ...cached })).toBe(false);
    });

    it('detects a change in any field', (): void => {
        expect(geometry_differs(cached, { ...cached, width: 1620 })).toBe(true);
        expect(geometry_differs(cached, { ...cached, height: 2880 })).toBe(true);
        expect(geometry_differs(cached, { ...cached, layer: 6 })).toBe(true);
    });
});

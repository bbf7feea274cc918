import { describe, expect, it } from 'vitest';
import { boundsCenter, boundsOverlap, clamp, degreesToRadians, lerp } from 'util/geometry';

describe('geometry utilities', () => {
    describe('boundsOverlap', () => {
        const box = { left: 0, top: 0, right: 10, bottom: 10 };

        it('detects intersecting boxes', () => {
            expect(boundsOverlap(box, { left: 5, top: 5, right: 15, bottom: 15 })).toBe(true);
        });

        it('treats touching edges as overlap', () => {
            expect(boundsOverlap(box, { left: 10, top: 0, right: 20, bottom: 10 })).toBe(true);
        });

        it('rejects separated boxes', () => {
            expect(boundsOverlap(box, { left: 10.5, top: 0, right: 20, bottom: 10 })).toBe(false);
            expect(boundsOverlap(box, { left: 0, top: -8, right: 10, bottom: -0.1 })).toBe(false);
        });
    });

    it('finds the center of a box', () => {
        expect(boundsCenter({ left: 2, top: 4, right: 12, bottom: 8 })).toEqual({ x: 7, y: 6 });
    });

    it('clamps values into range', () => {
        expect(clamp(-3, 0, 5)).toBe(0);
        expect(clamp(3, 0, 5)).toBe(3);
        expect(clamp(9, 0, 5)).toBe(5);
    });

    it('interpolates linearly', () => {
        expect(lerp(0.5, 1.5, 0)).toBe(0.5);
        expect(lerp(0.5, 1.5, 0.5)).toBe(1);
        expect(lerp(0.5, 1.5, 1)).toBe(1.5);
    });

    it('converts degrees to radians', () => {
        expect(degreesToRadians(180)).toBeCloseTo(Math.PI, 10);
        expect(degreesToRadians(-90)).toBeCloseTo(-Math.PI / 2, 10);
    });
});

import { describe, expect, it } from 'vitest';
import { createRandomManager, mulberry32 } from 'util/random';

const sample = (source: () => number, count: number): number[] => {
    return Array.from({ length: count }, () => source());
};

describe('mulberry32', () => {
    it('produces deterministic sequences for the same seed', () => {
        const sequenceA = sample(mulberry32(1234), 5);
        const sequenceB = sample(mulberry32(1234), 5);
        expect(sequenceA).toEqual(sequenceB);
    });

    it('produces distinct sequences for different seeds', () => {
        const sequenceA = sample(mulberry32(1), 3);
        const sequenceB = sample(mulberry32(2), 3);
        expect(sequenceA).not.toEqual(sequenceB);
    });

    it('stays within the unit interval', () => {
        for (const value of sample(mulberry32(99), 200)) {
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThan(1);
        }
    });
});

describe('createRandomManager', () => {
    it('defaults to seed 1', () => {
        const manager = createRandomManager();
        expect(manager.seed()).toBe(1);
        expect(sample(manager.random, 3)).toEqual(sample(mulberry32(1), 3));
    });

    it('replays the generator for its seed', () => {
        const manager = createRandomManager(42);
        expect(sample(manager.random, 4)).toEqual(sample(mulberry32(42), 4));
    });

    it('normalizes zero and non-finite seeds to the default seed', () => {
        expect(createRandomManager(0).seed()).toBe(1);
        expect(createRandomManager(Number.POSITIVE_INFINITY).seed()).toBe(1);
        expect(createRandomManager(Number.NaN).seed()).toBe(1);
    });

    it('folds seeds into unsigned 32-bit integers', () => {
        expect(createRandomManager(-1).seed()).toBe(4294967295);
        expect(createRandomManager(2 ** 32 + 5).seed()).toBe(5);
    });
});

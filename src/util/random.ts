export type RandomSource = () => number;

const DEFAULT_SEED = 1;

const normalizeSeed = (seed: number): number => {
    if (!Number.isFinite(seed)) {
        return DEFAULT_SEED;
    }

    const normalized = seed >>> 0;
    return normalized === 0 ? DEFAULT_SEED : normalized;
};

export const mulberry32 = (seed: number): RandomSource => {
    let state = normalizeSeed(seed);
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = Math.imul(state ^ (state >>> 15), state | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
};

export interface RandomManager {
    readonly seed: () => number;
    readonly random: RandomSource;
}

export const createRandomManager = (seed: number = DEFAULT_SEED): RandomManager => {
    const currentSeed = normalizeSeed(seed);
    const generator = mulberry32(currentSeed);

    const random: RandomSource = () => generator();

    return {
        seed: () => currentSeed,
        random,
    };
};

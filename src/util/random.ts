import { clamp } from './geometry';

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
    readonly reset: () => void;
    readonly next: () => number;
    readonly nextInt: (maxExclusive: number) => number;
    readonly boolean: (threshold?: number) => boolean;
    /** Fisher-Yates over a copy; the input is left alone. */
    readonly shuffle: <T>(items: readonly T[]) => T[];
}

/**
 * Seeded generator handed to anything that needs randomness, so a run can be reproduced
 * from its seed alone.
 */
export const createRandomManager = (seed: number): RandomManager => {
    const currentSeed = normalizeSeed(seed);
    let generator = mulberry32(currentSeed);

    const reset = () => {
        generator = mulberry32(currentSeed);
    };

    const next = () => generator();

    const nextInt = (maxExclusive: number): number => {
        if (!Number.isFinite(maxExclusive) || maxExclusive < 1) {
            throw new RangeError('maxExclusive must be a positive finite number');
        }
        return Math.floor(next() * maxExclusive);
    };

    const boolean = (threshold = 0.5): boolean => {
        return next() < clamp(threshold, 0, 1);
    };

    const shuffle = <T>(items: readonly T[]): T[] => {
        const result = [...items];
        for (let index = result.length - 1; index > 0; index -= 1) {
            const swapWith = nextInt(index + 1);
            const held = result[index];
            result[index] = result[swapWith];
            result[swapWith] = held;
        }
        return result;
    };

    return {
        seed: () => currentSeed,
        reset,
        next,
        nextInt,
        boolean,
        shuffle,
    };
};

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

    it('starts seed 1 at a known value', () => {
        expect(mulberry32(1)()).toBe(0.6270739405881613);
    });

    it('treats zero and non-finite seeds as seed 1', () => {
        expect(sample(mulberry32(0), 3)).toEqual(sample(mulberry32(1), 3));
        expect(sample(mulberry32(Number.NaN), 3)).toEqual(sample(mulberry32(1), 3));
    });
});

describe('createRandomManager', () => {
    it('resets to the same sequence when requested', () => {
        const manager = createRandomManager(42);
        const firstRun = [manager.next(), manager.next(), manager.next()];
        manager.reset();
        const secondRun = [manager.next(), manager.next(), manager.next()];
        expect(secondRun).toEqual(firstRun);
        expect(manager.seed()).toBe(42);
    });

    it('draws booleans against the threshold', () => {
        const manager = createRandomManager(1);
        expect(manager.boolean()).toBe(false);
        expect(manager.boolean()).toBe(true);
        expect(manager.boolean(1)).toBe(true);
        expect(manager.boolean(0)).toBe(false);
    });

    it('produces integers below the bound', () => {
        const manager = createRandomManager(7);
        expect(sample(() => manager.nextInt(10), 6)).toEqual([0, 0, 9, 6, 5, 4]);
    });

    it('rejects invalid bounds', () => {
        const manager = createRandomManager(7);
        expect(() => manager.nextInt(0)).toThrow(RangeError);
        expect(() => manager.nextInt(Number.POSITIVE_INFINITY)).toThrow(RangeError);
    });

    it('shuffles a copy deterministically', () => {
        const manager = createRandomManager(7);
        const items = [1, 2, 3, 4];
        expect(manager.shuffle(items)).toEqual([3, 2, 4, 1]);
        expect(items).toEqual([1, 2, 3, 4]);
    });
});

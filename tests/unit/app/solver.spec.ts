import { describe, expect, it, vi } from 'vitest';
import { createEventBus } from 'app/events';
import { childOrder, formatSearchProgress, solveOrientations } from 'app/solver';
import { resolveChoreographyConfig, type SearchConfig } from 'config/choreography';
import { createRandomManager } from 'util/random';

const configWith = (search: Partial<SearchConfig> = {}) =>
    resolveChoreographyConfig({
        arena: { width: 100, height: 100 },
        ball: { x: 0, y: 0, size: 10, speed: 5 },
        platform: { length: 20, thickness: 4 },
        search: { strategy: 'alternate', initialOrientation: true, ...search },
    });

describe('solveOrientations', () => {
    it('solves two well separated targets with a turn each', () => {
        const result = solveOrientations([20, 10], { config: configWith() });

        expect(result.status).toBe('solved');
        if (result.status !== 'solved') {
            return;
        }
        expect(result.assignment).toEqual([true, false]);
        expect(result.frameCount).toBe(20);
        expect(result.platforms.map((platform) => platform.expectedBounceFrame)).toEqual([10, 20]);
        expect(result.stats).toEqual({
            nodesVisited: 2,
            prunedPrefixes: 0,
            deepestPrefix: 2,
            missedBounces: 0,
            mistimedBounces: 0,
        });
    });

    it('returns an empty assignment for no targets', () => {
        const result = solveOrientations([], { config: configWith() });
        expect(result).toEqual({
            status: 'solved',
            assignment: [],
            platforms: [],
            frameCount: 0,
            stats: { nodesVisited: 0, prunedPrefixes: 0, deepestPrefix: 0, missedBounces: 0, mistimedBounces: 0 },
        });
    });

    it('backtracks out of a dead end', () => {
        const result = solveOrientations([2, 3, 4], { config: configWith() });
        expect(result.status).toBe('solved');
        if (result.status === 'solved') {
            expect(result.assignment).toEqual([true, false, true]);
            expect(result.stats.nodesVisited).toBe(3);
        }
    });

    it('reports no valid placement after exhausting the tree', () => {
        const result = solveOrientations([10, 11, 12], { config: configWith() });
        expect(result).toEqual({
            status: 'no-valid-placement',
            stats: { nodesVisited: 14, prunedPrefixes: 8, deepestPrefix: 2, missedBounces: 0, mistimedBounces: 8 },
        });
        expect(result.stats.nodesVisited).toBeLessThanOrEqual(2 ** 4 - 2);
    });

    it('follows the seeded generator under the random strategy', () => {
        const config = configWith({ strategy: 'random', initialOrientation: null, seed: 1 });
        const result = solveOrientations([10, 20], { config });

        expect(result.status).toBe('solved');
        if (result.status === 'solved') {
            expect(result.assignment).toEqual([false, false]);
            expect(result.platforms.map((platform) => platform.rect)).toEqual([
                { x: 58, y: 45, width: 4, height: 20 },
                { x: -9, y: 95, width: 4, height: 20 },
            ]);
        }
        expect(solveOrientations([10, 20], { config })).toEqual(result);
    });

    it('uses an injected generator instead of the configured seed', () => {
        const config = configWith({ strategy: 'random', initialOrientation: null, seed: 99 });
        const result = solveOrientations([10, 20], { config, random: createRandomManager(5) });
        expect(result.status === 'solved' ? result.assignment : null).toEqual([false, true]);
    });

    it('stops at the node budget', () => {
        const result = solveOrientations([10, 11, 12], { config: configWith({ maxNodes: 5 }) });
        expect(result.status).toBe('cancelled');
        if (result.status === 'cancelled') {
            expect(result.reason).toBe('node-budget');
            expect(result.stats.nodesVisited).toBe(5);
        }
    });

    it('stops when the signal is aborted', () => {
        const controller = new AbortController();
        controller.abort();
        const result = solveOrientations([10, 20], { config: configWith(), signal: controller.signal });
        expect(result).toMatchObject({ status: 'cancelled', reason: 'aborted', stats: { nodesVisited: 0 } });
    });

    it('publishes accepted prefixes and the final status', () => {
        const bus = createEventBus({ now: () => 0 });
        const accepted = vi.fn();
        const rejected = vi.fn();
        const completed = vi.fn();
        bus.subscribe('PrefixAccepted', accepted);
        bus.subscribe('PrefixRejected', rejected);
        bus.subscribe('SolveCompleted', completed);

        solveOrientations([10, 20], { config: configWith(), events: bus });

        expect(accepted.mock.calls.map(([event]) => event.payload.prefix)).toEqual([[true], [true, false]]);
        expect(rejected).not.toHaveBeenCalled();
        expect(completed).toHaveBeenCalledWith({
            type: 'SolveCompleted',
            timestamp: 0,
            payload: { status: 'solved', total: 2, nodesVisited: 2 },
        });
    });

    it('publishes the reason a prefix was rejected', () => {
        const bus = createEventBus({ now: () => 0 });
        const rejected = vi.fn();
        bus.subscribe('PrefixRejected', rejected);

        solveOrientations([10, 11, 12], { config: configWith(), events: bus });

        expect(rejected).toHaveBeenCalledTimes(8);
        expect(rejected.mock.calls[0][0].payload).toEqual({
            depth: 3,
            total: 3,
            prefix: [true, false, true],
            error: { kind: 'mistimed-bounce', frame: 6, expected: 12 },
        });
    });
});

describe('childOrder', () => {
    it('tries the opposite of the last bit first when alternating', () => {
        const random = createRandomManager(1);
        expect(childOrder([true], configWith(), random)).toEqual([false, true]);
        expect(childOrder([true, false], configWith(), random)).toEqual([true, false]);
    });

    it('shuffles with one draw under the random strategy', () => {
        const config = configWith({ strategy: 'random' });
        const random = createRandomManager(1);
        expect(childOrder([], config, random)).toEqual([true, false]);
        expect(childOrder([], config, random)).toEqual([false, true]);
    });
});

describe('formatSearchProgress', () => {
    it('draws the prefix with the completion percentage', () => {
        expect(formatSearchProgress([true, false, true], 4)).toBe('Progress: 75%\t─|─');
        expect(formatSearchProgress([], 0)).toBe('Progress: 100%\t');
    });

    it('keeps the tail of long prefixes and counts what was cut', () => {
        const prefix = [true, true, true, true, true, false, false];
        expect(formatSearchProgress(prefix, 10, 6)).toBe('Progress: 70%\t(1):||');
    });
});

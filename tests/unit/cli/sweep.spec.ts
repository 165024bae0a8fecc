import { describe, expect, it, vi } from 'vitest';
import { clampRuns, runSweep } from 'cli/sweep';
import type { ChoreographyConfigOverrides } from 'config/choreography';
import { createLogger } from 'util/log';

const sceneConfig: ChoreographyConfigOverrides = {
    arena: { width: 100, height: 100 },
    ball: { x: 0, y: 0, size: 10, speed: 5 },
    platform: { length: 20, thickness: 4 },
};

describe('clampRuns', () => {
    it('keeps the run count between 1 and 100', () => {
        expect(clampRuns(0)).toBe(1);
        expect(clampRuns(Number.NaN)).toBe(1);
        expect(clampRuns(3.7)).toBe(3);
        expect(clampRuns(500)).toBe(100);
    });
});

describe('runSweep', () => {
    it('solves the frames under consecutive seeds', () => {
        const writer = vi.fn();
        const result = runSweep({
            frames: [10, 20],
            runs: 5,
            seed: 1,
            config: sceneConfig,
            logger: createLogger('test', { writer, now: () => 0 }),
        });

        expect(result.runs.map((run) => [run.seed, run.assignment])).toEqual([
            [1, [false, false]],
            [2, [false, false]],
            [3, [false, false]],
            [4, [false, false]],
            [5, [false, true]],
        ]);
        expect(result.summary).toEqual({
            runCount: 5,
            solvedRuns: 5,
            solveRate: 1,
            averageNodesVisited: 2,
            maxNodesVisited: 2,
            deterministicCheck: true,
        });
        expect(writer).toHaveBeenCalledWith(
            expect.objectContaining({ level: 'info', subsystem: 'test:sweep', message: 'Sweep complete' }),
        );
    });

    it('counts runs that find no placement', () => {
        const result = runSweep({
            frames: [10, 11, 12],
            runs: 3,
            config: sceneConfig,
            logger: createLogger('test', { writer: vi.fn() }),
        });

        expect(result.runs.every((run) => run.status === 'no-valid-placement' && run.assignment === null)).toBe(true);
        expect(result.summary).toMatchObject({ solvedRuns: 0, solveRate: 0, averageNodesVisited: 14, maxNodesVisited: 14 });
    });
});

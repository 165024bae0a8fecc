import type { SolveStatus } from 'app/events';
import { solveOrientations, type SolverResult } from 'app/solver';
import { normalizeTargetFrames } from 'app/target-frames';
import { resolveChoreographyConfig, type ChoreographyConfigOverrides } from 'config/choreography';
import { rootLogger, type Logger } from 'util/log';

export interface SweepOptions {
    readonly frames: readonly number[];
    readonly runs: number;
    readonly seed?: number;
    readonly config?: ChoreographyConfigOverrides;
    readonly logger?: Logger;
}

export interface SweepRun {
    readonly seed: number;
    readonly status: SolveStatus;
    readonly nodesVisited: number;
    readonly prunedPrefixes: number;
    readonly assignment: readonly boolean[] | null;
}

export interface SweepSummary {
    readonly runCount: number;
    readonly solvedRuns: number;
    readonly solveRate: number;
    readonly averageNodesVisited: number;
    readonly maxNodesVisited: number;
    readonly deterministicCheck: boolean;
}

export interface SweepResult {
    readonly summary: SweepSummary;
    readonly runs: readonly SweepRun[];
}

const MAX_RUNS = 100;

export const clampRuns = (value: number): number => {
    if (!Number.isFinite(value) || value <= 0) {
        return 1;
    }
    return Math.min(MAX_RUNS, Math.max(1, Math.floor(value)));
};

const toSweepRun = (seed: number, result: SolverResult): SweepRun => ({
    seed,
    status: result.status,
    nodesVisited: result.stats.nodesVisited,
    prunedPrefixes: result.stats.prunedPrefixes,
    assignment: result.status === 'solved' ? result.assignment : null,
});

/**
 * Solve the same frames under consecutive seeds. The first seed is solved twice to
 * confirm the search is reproducible.
 */
export const runSweep = (options: SweepOptions): SweepResult => {
    const logger = (options.logger ?? rootLogger).child('sweep');
    const frames = normalizeTargetFrames(options.frames);
    const runCount = clampRuns(options.runs);
    const startSeed = typeof options.seed === 'number' ? options.seed : 1;

    const solveWithSeed = (seed: number): SweepRun => {
        const config = resolveChoreographyConfig({
            ...options.config,
            search: { ...options.config?.search, seed },
        });
        return toSweepRun(seed, solveOrientations(frames, { config }));
    };

    const runs: SweepRun[] = [];
    for (let index = 0; index < runCount; index += 1) {
        const run = solveWithSeed(startSeed + index);
        logger.debug('Sweep run finished', { seed: run.seed, status: run.status, nodesVisited: run.nodesVisited });
        runs.push(run);
    }

    const repeat = solveWithSeed(startSeed);
    const deterministicCheck = JSON.stringify(repeat) === JSON.stringify(runs[0]);

    const solvedRuns = runs.filter((run) => run.status === 'solved').length;
    const totalNodes = runs.reduce((sum, run) => sum + run.nodesVisited, 0);
    const maxNodesVisited = runs.reduce((max, run) => Math.max(max, run.nodesVisited), 0);

    const summary: SweepSummary = {
        runCount: runs.length,
        solvedRuns,
        solveRate: solvedRuns / runs.length,
        averageNodesVisited: totalNodes / runs.length,
        maxNodesVisited,
        deterministicCheck,
    };

    logger.info('Sweep complete', { ...summary });
    if (!deterministicCheck) {
        logger.warn('Repeated seed produced a different search', { seed: startSeed });
    }

    return { summary, runs };
};

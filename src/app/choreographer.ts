/**
 * End-to-end pipeline: target frames in, platforms, walls and a replayable trajectory out.
 *
 * search -> construction -> walls -> carve -> compaction
 *
 * Each stage works on its own copies; nothing a later stage does leaks back into the
 * search result.
 */

import {
    resolveChoreographyConfig,
    type ChoreographyConfig,
    type ChoreographyConfigOverrides,
} from 'config/choreography';
import type { Platform, Wall } from 'physics/entities';
import { rootLogger, type Logger } from 'util/log';
import type { RandomManager } from 'util/random';
import type { FrameIndex, Orientation } from '../types';
import type { ChoreographyEventBus, PipelineStage } from './events';
import { describeBounceError } from './replay';
import { solveOrientations, type CancelReason, type SolverStats } from './solver';
import { framesFromNoteTimes, limitTargetFrames, normalizeTargetFrames } from './target-frames';
import { createTrajectory, type TrajectoryFrame } from './trajectory';
import { compactWalls, placeWalls, runCarvePass } from './walls';

export interface ChoreographyInput {
    readonly targetFrames?: readonly number[];
    /** Note onsets in seconds; used when `targetFrames` is absent. */
    readonly noteTimes?: readonly number[];
    readonly fps?: number;
    readonly frameBuffer?: number;
    /** Drop every target after this frame. */
    readonly maxFrames?: number | null;
    readonly config?: ChoreographyConfigOverrides;
}

export interface ChoreographyOptions {
    readonly logger?: Logger;
    readonly events?: ChoreographyEventBus;
    readonly signal?: AbortSignal;
    readonly random?: RandomManager;
}

export interface SolvedChoreography {
    readonly status: 'solved';
    readonly config: ChoreographyConfig;
    readonly targetFrames: readonly FrameIndex[];
    readonly assignment: readonly boolean[];
    readonly orientations: ReadonlyMap<FrameIndex, Orientation>;
    readonly platforms: readonly Platform[];
    readonly walls: readonly Wall[];
    readonly frameCount: number;
    readonly stats: SolverStats;
    readonly trajectory: Iterable<TrajectoryFrame>;
}

export type ChoreographyResult =
    | SolvedChoreography
    | {
        readonly status: 'no-valid-placement';
        readonly config: ChoreographyConfig;
        readonly targetFrames: readonly FrameIndex[];
        readonly stats: SolverStats;
    }
    | {
        readonly status: 'cancelled';
        readonly config: ChoreographyConfig;
        readonly targetFrames: readonly FrameIndex[];
        readonly reason: CancelReason;
        readonly stats: SolverStats;
    };

export const DEFAULT_NOTE_FPS = 60;

export const resolveTargetFrames = (input: ChoreographyInput): FrameIndex[] => {
    const frames = input.targetFrames
        ? normalizeTargetFrames(input.targetFrames)
        : framesFromNoteTimes(input.noteTimes ?? [], {
            fps: input.fps ?? DEFAULT_NOTE_FPS,
            frameBuffer: input.frameBuffer,
        });
    return limitTargetFrames(frames, input.maxFrames);
};

export const choreograph = (input: ChoreographyInput, options: ChoreographyOptions = {}): ChoreographyResult => {
    const logger = (options.logger ?? rootLogger).child('choreographer');
    const { events, signal, random } = options;
    const config = resolveChoreographyConfig(input.config);
    const targetFrames = resolveTargetFrames(input);

    const stageDone = (stage: PipelineStage, count: number, context: Record<string, unknown> = {}) => {
        events?.publish('StageCompleted', { stage, count });
        logger.debug(`${stage} done`, { count, ...context });
    };

    logger.info('Searching orientations', {
        targets: targetFrames.length,
        strategy: config.search.strategy,
        seed: config.search.seed,
    });

    const solved = solveOrientations(targetFrames, { config, events, signal, random });
    stageDone('search', solved.stats.nodesVisited, { status: solved.status });

    if (solved.status === 'no-valid-placement') {
        logger.warn('No valid placement for the requested frames', { nodesVisited: solved.stats.nodesVisited });
        return { status: solved.status, config, targetFrames, stats: solved.stats };
    }
    if (solved.status === 'cancelled') {
        logger.warn('Search cancelled', { reason: solved.reason, nodesVisited: solved.stats.nodesVisited });
        return { status: solved.status, config, targetFrames, reason: solved.reason, stats: solved.stats };
    }

    const { assignment, platforms, frameCount } = solved;
    stageDone('construction', platforms.length);

    const placed = placeWalls(platforms, config.arena);
    stageDone('walls', placed.length);

    const carve = runCarvePass(platforms, placed, config, frameCount);
    if (carve.error) {
        logger.error('Carve replay disagreed with the solved layout', {
            error: describeBounceError(carve.error),
        });
    }
    stageDone('carve', carve.carvedCount);

    const walls = compactWalls(carve.walls);
    stageDone('compaction', walls.length);

    const orientations = new Map<FrameIndex, Orientation>();
    platforms.forEach((platform) => {
        orientations.set(platform.targetFrame, platform.orientation);
    });

    logger.info('Choreography ready', {
        platforms: platforms.length,
        walls: walls.length,
        frames: frameCount,
        nodesVisited: solved.stats.nodesVisited,
    });

    return {
        status: 'solved',
        config,
        targetFrames,
        assignment,
        orientations,
        platforms,
        walls,
        frameCount,
        stats: solved.stats,
        trajectory: createTrajectory(platforms, config, frameCount),
    };
};

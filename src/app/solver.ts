/**
 * Backtracking search over platform orientations.
 *
 * A node is a prefix of orientation bits, one per target frame in ascending order. Each
 * node replays both passes over its prefix; a failing prefix is dropped together with
 * everything that would extend it. The walk is depth first on an explicit stack, so the
 * number of target frames is not limited by the call stack.
 *
 * Worst case is exponential: a failing search over n frames visits up to 2^(n+1) - 2
 * nodes, each replaying as many frames as its deepest target.
 */

import type { ChoreographyConfig } from 'config/choreography';
import type { Platform } from 'physics/entities';
import { createRandomManager, type RandomManager } from 'util/random';
import type { ChoreographyEventBus } from './events';
import { replayOrientations } from './replay';
import { normalizeTargetFrames } from './target-frames';

export interface SolverStats {
    readonly nodesVisited: number;
    readonly prunedPrefixes: number;
    readonly deepestPrefix: number;
    readonly missedBounces: number;
    readonly mistimedBounces: number;
}

export type CancelReason = 'aborted' | 'node-budget';

export type SolverResult =
    | {
        readonly status: 'solved';
        readonly assignment: readonly boolean[];
        readonly platforms: readonly Platform[];
        readonly frameCount: number;
        readonly stats: SolverStats;
    }
    | { readonly status: 'no-valid-placement'; readonly stats: SolverStats }
    | { readonly status: 'cancelled'; readonly reason: CancelReason; readonly stats: SolverStats };

export interface SolverOptions {
    readonly config: ChoreographyConfig;
    /** Defaults to a generator seeded from `config.search.seed`. */
    readonly random?: RandomManager;
    readonly signal?: AbortSignal;
    readonly events?: ChoreographyEventBus;
}

interface MutableStats {
    nodesVisited: number;
    prunedPrefixes: number;
    deepestPrefix: number;
    missedBounces: number;
    mistimedBounces: number;
}

const snapshotStats = (stats: MutableStats): SolverStats => ({ ...stats });

const EMPTY_STATS: SolverStats = {
    nodesVisited: 0,
    prunedPrefixes: 0,
    deepestPrefix: 0,
    missedBounces: 0,
    mistimedBounces: 0,
};

const chooseFirstBit = (config: ChoreographyConfig, random: RandomManager): boolean => {
    const { initialOrientation, strategy } = config.search;
    if (initialOrientation !== null) {
        return initialOrientation;
    }
    return strategy === 'random' ? random.boolean() : true;
};

/**
 * Order in which to try the two children of an accepted prefix.
 */
export const childOrder = (
    prefix: readonly boolean[],
    config: ChoreographyConfig,
    random: RandomManager,
): readonly [boolean, boolean] => {
    if (config.search.strategy === 'alternate') {
        const last = prefix[prefix.length - 1] ?? false;
        return [!last, last];
    }
    const [first, second] = random.shuffle([true, false]);
    return [first, second];
};

export const solveOrientations = (targetFrames: Iterable<number>, options: SolverOptions): SolverResult => {
    const { config, signal, events } = options;
    const frames = normalizeTargetFrames(targetFrames);
    const total = frames.length;

    if (total === 0) {
        events?.publish('SolveCompleted', { status: 'solved', total, nodesVisited: 0 });
        return { status: 'solved', assignment: [], platforms: [], frameCount: 0, stats: EMPTY_STATS };
    }

    const random = options.random ?? createRandomManager(config.search.seed);
    const maxNodes = config.search.maxNodes;
    const stats: MutableStats = { ...EMPTY_STATS };

    const firstBit = chooseFirstBit(config, random);
    // Popped last-in first-out: the seeded bit is explored before its complement.
    const stack: (readonly boolean[])[] = [[!firstBit], [firstBit]];

    const finish = (result: SolverResult): SolverResult => {
        events?.publish('SolveCompleted', { status: result.status, total, nodesVisited: stats.nodesVisited });
        return result;
    };

    while (stack.length > 0) {
        if (signal?.aborted) {
            return finish({ status: 'cancelled', reason: 'aborted', stats: snapshotStats(stats) });
        }
        if (maxNodes !== null && stats.nodesVisited >= maxNodes) {
            return finish({ status: 'cancelled', reason: 'node-budget', stats: snapshotStats(stats) });
        }

        const prefix = stack.pop();
        if (!prefix) {
            break;
        }
        stats.nodesVisited += 1;

        const replay = replayOrientations(frames, prefix, config);
        if (!replay.ok) {
            stats.prunedPrefixes += 1;
            if (replay.error.kind === 'missed-bounce') {
                stats.missedBounces += 1;
            } else {
                stats.mistimedBounces += 1;
            }
            events?.publish('PrefixRejected', { depth: prefix.length, total, prefix, error: replay.error });
            continue;
        }

        stats.deepestPrefix = Math.max(stats.deepestPrefix, prefix.length);
        events?.publish('PrefixAccepted', { depth: prefix.length, total, prefix });

        if (prefix.length === total) {
            return finish({
                status: 'solved',
                assignment: prefix,
                platforms: replay.platforms,
                frameCount: replay.frameCount,
                stats: snapshotStats(stats),
            });
        }

        const [first, second] = childOrder(prefix, config, random);
        stack.push([...prefix, second], [...prefix, first]);
    }

    return finish({ status: 'no-valid-placement', stats: snapshotStats(stats) });
};

const PROGRESS_TRUE = '─';
const PROGRESS_FALSE = '|';

/**
 * One-line view of the prefix being explored, newest bits on the right. Long prefixes
 * keep their tail and say how many bits were cut.
 */
export const formatSearchProgress = (prefix: readonly boolean[], total: number, width = 60): string => {
    const bits = prefix.map((bit) => (bit ? PROGRESS_TRUE : PROGRESS_FALSE)).join('');
    const percent = total > 0 ? Math.floor((prefix.length / total) * 100) : 100;
    const marker = bits.length >= width ? `(${bits.length - width}):` : '';
    const visible = Math.max(0, width - marker.length);
    const tail = visible > 0 ? bits.slice(Math.max(0, bits.length - visible)) : '';
    return `Progress: ${percent}%\t${marker}${tail}`;
};

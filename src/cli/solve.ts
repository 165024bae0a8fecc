import { readFile } from 'node:fs/promises';
import { choreograph, type ChoreographyInput, type ChoreographyOptions, type ChoreographyResult } from 'app/choreographer';
import { createEventBus, type ChoreographyEventBus, type SolveStatus } from 'app/events';
import { formatSearchProgress, type CancelReason, type SolverStats } from 'app/solver';
import type { TrajectoryFrame } from 'app/trajectory';
import { isRecord, parseChoreographyOverrides, type ChoreographyConfigOverrides } from 'config/choreography';
import { createLineLogWriter, createLogger, type LogLevel } from 'util/log';
import type { FrameIndex, Orientation, Rectangle } from 'types/index';

export interface SolveInput extends ChoreographyInput {
    /** Include every frame of the ball's path in the output. */
    readonly trajectory?: boolean;
}

export interface PlatformSummary {
    readonly id: number;
    readonly orientation: Orientation;
    readonly targetFrame: FrameIndex;
    readonly bounceFrame: FrameIndex | null;
    readonly rect: Rectangle;
}

export interface SolveOutput {
    readonly status: SolveStatus;
    readonly targetFrames: readonly FrameIndex[];
    readonly stats: SolverStats;
    readonly reason?: CancelReason;
    readonly assignment?: readonly boolean[];
    readonly orientations?: Record<string, Orientation>;
    readonly platforms?: readonly PlatformSummary[];
    readonly walls?: readonly Rectangle[];
    readonly frameCount?: number;
    readonly trajectory?: readonly TrajectoryFrame[];
}

const EXIT_CODES: Record<SolveStatus, number> = {
    solved: 0,
    'no-valid-placement': 2,
    cancelled: 3,
};

export const exitCodeForStatus = (status: SolveStatus): number => EXIT_CODES[status];

export const summarizeResult = (result: ChoreographyResult, includeTrajectory = false): SolveOutput => {
    if (result.status === 'no-valid-placement') {
        return { status: result.status, targetFrames: result.targetFrames, stats: result.stats };
    }
    if (result.status === 'cancelled') {
        return { status: result.status, targetFrames: result.targetFrames, stats: result.stats, reason: result.reason };
    }

    const orientations: Record<string, Orientation> = {};
    result.orientations.forEach((orientation, frame) => {
        orientations[String(frame)] = orientation;
    });

    return {
        status: result.status,
        targetFrames: result.targetFrames,
        stats: result.stats,
        assignment: result.assignment,
        orientations,
        platforms: result.platforms.map((platform) => ({
            id: platform.id,
            orientation: platform.orientation,
            targetFrame: platform.targetFrame,
            bounceFrame: platform.expectedBounceFrame,
            rect: platform.rect,
        })),
        walls: result.walls.map((wall) => wall.rect),
        frameCount: result.frameCount,
        ...(includeTrajectory ? { trajectory: Array.from(result.trajectory) } : {}),
    };
};

export const runSolve = (input: SolveInput, options: ChoreographyOptions = {}): SolveOutput =>
    summarizeResult(choreograph(input, options), input.trajectory ?? false);

/**
 * Print the prefix being explored every time the search accepts one.
 */
export const attachProgress = (events: ChoreographyEventBus, write: (line: string) => void): (() => void) =>
    events.subscribe('PrefixAccepted', ({ payload }) => {
        write(formatSearchProgress(payload.prefix, payload.total));
    });

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const readNumberList = (value: unknown, field: string): number[] | undefined => {
    if (value === undefined) {
        return undefined;
    }
    if (!Array.isArray(value)) {
        throw new TypeError(`${field} must be an array of numbers`);
    }
    return value.map((entry: unknown) => {
        if (typeof entry !== 'number') {
            throw new TypeError(`${field} must be an array of numbers`);
        }
        return entry;
    });
};

const readOptionalNumber = (value: unknown, field: string): number | undefined => {
    if (value === undefined) {
        return undefined;
    }
    if (typeof value !== 'number') {
        throw new TypeError(`${field} must be a number`);
    }
    return value;
};

export const parseSolveInput = (value: unknown): SolveInput => {
    if (!isRecord(value)) {
        throw new TypeError('solve payload must be a JSON object');
    }

    const targetFrames = readNumberList(value.targetFrames, 'targetFrames');
    const noteTimes = readNumberList(value.noteTimes, 'noteTimes');
    if (!targetFrames && !noteTimes) {
        throw new TypeError('solve payload needs targetFrames or noteTimes');
    }
    if (value.trajectory !== undefined && typeof value.trajectory !== 'boolean') {
        throw new TypeError('trajectory must be a boolean');
    }

    return {
        targetFrames,
        noteTimes,
        fps: readOptionalNumber(value.fps, 'fps'),
        frameBuffer: readOptionalNumber(value.frameBuffer, 'frameBuffer'),
        maxFrames: readOptionalNumber(value.maxFrames, 'maxFrames'),
        config: parseChoreographyOverrides(value.config),
        trajectory: value.trajectory === true,
    };
};

export const loadConfigOverrides = async (path: string): Promise<ChoreographyConfigOverrides> => {
    const raw = await readFile(path, 'utf8');
    const parsed: unknown = JSON.parse(raw);
    return parseChoreographyOverrides(parsed);
};

export interface SolveCommandIO {
    readonly readStdin: () => Promise<string>;
    readonly writeStdout: (output: string) => Promise<void>;
    readonly writeStderr?: (message: string) => Promise<void> | void;
}

export interface SolveCommandSettings {
    readonly progress?: boolean;
    readonly logLevel?: LogLevel;
    readonly now?: () => number;
}

export interface SolveCommand {
    readonly execute: () => Promise<number>;
}

/**
 * `solve --stdin`: read a JSON payload, write the JSON result, report through stderr.
 */
export const createSolveCommand = (io: SolveCommandIO, settings: SolveCommandSettings = {}): SolveCommand => {
    const logToStderr = async (message: string) => {
        await io.writeStderr?.(message);
    };

    const execute = async (): Promise<number> => {
        let raw: string;
        try {
            raw = await io.readStdin();
        } catch (error) {
            await logToStderr(`Failed to read solve input: ${describeError(error)}`);
            return 1;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch {
            await logToStderr('Failed to read solve input: invalid JSON payload');
            return 1;
        }

        // The search runs synchronously, so log lines are collected and flushed afterwards.
        const pending: string[] = [];
        const logger = createLogger('bounce', {
            writer: createLineLogWriter((line) => pending.push(line)),
            now: settings.now,
            minLevel: settings.logLevel ?? 'info',
        });
        const events = createEventBus({ now: settings.now });
        if (settings.progress) {
            attachProgress(events, (line) => pending.push(line));
        }

        let exitCode = 1;
        try {
            const input = parseSolveInput(parsed);
            const output = runSolve(input, { logger, events });
            await io.writeStdout(JSON.stringify(output));
            exitCode = exitCodeForStatus(output.status);
        } catch (error) {
            pending.push(`solve failed: ${describeError(error)}`);
        }

        for (const line of pending) {
            await logToStderr(line);
        }
        return exitCode;
    };

    return {
        execute,
    };
};

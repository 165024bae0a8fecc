import type { FrameIndex } from '../types';

export interface NoteTimingOptions {
    /** Video frames per second. */
    readonly fps: number;
    /** Frames of lead-in added to every onset so the first bounce is not on frame 0. */
    readonly frameBuffer?: number;
}

/**
 * Sorted, de-duplicated copy. Negative or fractional frames are rejected.
 */
export const normalizeTargetFrames = (frames: Iterable<number>): FrameIndex[] => {
    const unique = new Set<FrameIndex>();
    for (const frame of frames) {
        if (!Number.isInteger(frame) || frame < 0) {
            throw new RangeError(`target frame ${String(frame)} must be a non-negative integer`);
        }
        unique.add(frame);
    }
    return [...unique].sort((a, b) => a - b);
};

/**
 * Turn note onsets (seconds) from an external detector into frame indices.
 */
export const framesFromNoteTimes = (times: Iterable<number>, options: NoteTimingOptions): FrameIndex[] => {
    const { fps } = options;
    const frameBuffer = options.frameBuffer ?? 0;
    if (!Number.isFinite(fps) || fps <= 0) {
        throw new RangeError('fps must be greater than zero');
    }
    if (!Number.isInteger(frameBuffer) || frameBuffer < 0) {
        throw new RangeError('frameBuffer must be a non-negative integer');
    }

    const frames: FrameIndex[] = [];
    for (const time of times) {
        if (!Number.isFinite(time) || time < 0) {
            throw new RangeError(`note time ${String(time)} must be a non-negative number`);
        }
        frames.push(Math.floor(time * fps) + frameBuffer);
    }
    return normalizeTargetFrames(frames);
};

export const limitTargetFrames = (frames: readonly FrameIndex[], maxFrames: number | null | undefined): FrameIndex[] => {
    if (maxFrames === null || maxFrames === undefined) {
        return [...frames];
    }
    return frames.filter((frame) => frame <= maxFrames);
};

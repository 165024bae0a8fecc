/**
 * Two-phase validation replay.
 *
 * The construction pass drops a platform in front of the ball on every target frame.
 * The validation pass starts the ball over with that layout already in place and checks
 * that every bounce lands on the frame its platform recorded, and nowhere else. Failures
 * are plain values: they drive pruning and are expected to be frequent.
 */

import type { ChoreographyConfig } from 'config/choreography';
import {
    createPlatform,
    orientationFromChoice,
    platformDimensions,
    predictBallPosition,
    type Ball,
    type Platform,
} from 'physics/entities';
import type { StepOutcome } from 'physics/collision';
import { createSimulation, stepSimulation } from 'physics/world';
import type { FrameIndex, Orientation, Rectangle } from '../types';

export interface MissedBounce {
    readonly kind: 'missed-bounce';
    readonly frame: FrameIndex;
}

export interface MistimedBounce {
    readonly kind: 'mistimed-bounce';
    readonly frame: FrameIndex;
    readonly expected: FrameIndex | null;
}

export type BounceError = MissedBounce | MistimedBounce;

export type ValidationResult = { readonly ok: true } | { readonly ok: false; readonly error: BounceError };

export type ReplayResult =
    | { readonly ok: true; readonly platforms: readonly Platform[]; readonly frameCount: number }
    | { readonly ok: false; readonly error: BounceError };

export const missedBounce = (frame: FrameIndex): MissedBounce => ({ kind: 'missed-bounce', frame });

export const mistimedBounce = (frame: FrameIndex, expected: FrameIndex | null): MistimedBounce => ({
    kind: 'mistimed-bounce',
    frame,
    expected,
});

export const describeBounceError = (error: BounceError): string => {
    if (error.kind === 'missed-bounce') {
        return `Bounce should have happened on frame ${error.frame} but did not`;
    }
    const expected = error.expected === null ? 'never' : String(error.expected);
    return `A platform was hit on the wrong frame ${error.frame} (expected ${expected})`;
};

/**
 * Where to put a platform so the ball's next box sinks into it by half the platform's
 * thickness, on the face that turns around the velocity component the orientation
 * controls.
 */
export const placePlatformRect = (
    ball: Ball,
    orientation: Orientation,
    config: ChoreographyConfig,
): Rectangle => {
    const future = predictBallPosition(ball, 1);
    const { width, height } = platformDimensions(orientation, config.platform);
    const half = config.platform.thickness / 2;

    if (orientation === 'horizontal') {
        return {
            x: future.x + ball.size / 2 - width / 2,
            y: ball.velocity.y > 0 ? future.y + ball.size - half : future.y - half,
            width,
            height,
        };
    }

    return {
        x: ball.velocity.x > 0 ? future.x + ball.size - half : future.x - half,
        y: future.y + ball.size / 2 - height / 2,
        width,
        height,
    };
};

export interface ConstructionResult {
    readonly platforms: Platform[];
    readonly frameCount: number;
}

/**
 * Run frames 1..max(targets) from an empty layout, spawning a platform before each
 * target frame's step. `orientations` is indexed like `targetFrames`.
 */
export const runConstructionPass = (
    targetFrames: readonly FrameIndex[],
    orientations: readonly boolean[],
    config: ChoreographyConfig,
): ConstructionResult => {
    const spawnAt = new Map<FrameIndex, boolean>();
    targetFrames.forEach((frame, index) => {
        spawnAt.set(frame, orientations[index] ?? false);
    });

    const frameCount = targetFrames.reduce((max, frame) => Math.max(max, frame), 0);
    const state = createSimulation(config);

    while (state.frame < frameCount) {
        const upcoming = state.frame + 1;
        const choice = spawnAt.get(upcoming);
        if (choice !== undefined) {
            const orientation = orientationFromChoice(choice);
            state.platforms.push(
                createPlatform({
                    id: state.platforms.length,
                    rect: placePlatformRect(state.ball, orientation, config),
                    orientation,
                    targetFrame: upcoming,
                }),
            );
        }
        stepSimulation(state);
    }

    return { platforms: state.platforms, frameCount };
};

export type BounceCheck = (step: StepOutcome) => BounceError | null;

/**
 * Judge each step against the layout's recorded bounce frames. Expectations are read once,
 * up front, so a platform first touched during the replay still counts as mistimed.
 */
export const createBounceCheck = (platforms: readonly Platform[]): BounceCheck => {
    const expectations = platforms.map((platform) => platform.expectedBounceFrame);
    const expectedFrames = new Set<FrameIndex>();
    expectations.forEach((frame) => {
        if (frame !== null) {
            expectedFrames.add(frame);
        }
    });

    return (step) => {
        if (step.hitIndex < 0) {
            return expectedFrames.has(step.frame) ? missedBounce(step.frame) : null;
        }
        const expected = expectations[step.hitIndex] ?? null;
        return expected === step.frame ? null : mistimedBounce(step.frame, expected);
    };
};

/**
 * Replay a fixed layout from a fresh ball and stop at the first bounce out of place.
 */
export const runValidationPass = (
    platforms: readonly Platform[],
    frameCount: number,
    config: ChoreographyConfig,
): ValidationResult => {
    const state = createSimulation(config, { platforms });
    const check = createBounceCheck(state.platforms);

    while (state.frame < frameCount) {
        const error = check(stepSimulation(state));
        if (error) {
            return { ok: false, error };
        }
    }

    return { ok: true };
};

/**
 * Every platform must have been hit on the frame it was spawned for. A platform shadowed
 * by an earlier one in list order records some other frame, or none.
 */
export const checkPlatformClaims = (platforms: readonly Platform[]): ValidationResult => {
    for (const platform of platforms) {
        if (platform.expectedBounceFrame !== platform.targetFrame) {
            return { ok: false, error: mistimedBounce(platform.targetFrame, platform.expectedBounceFrame) };
        }
    }
    return { ok: true };
};

/**
 * Both passes over the first `prefix.length` target frames.
 */
export const replayOrientations = (
    targetFrames: readonly FrameIndex[],
    prefix: readonly boolean[],
    config: ChoreographyConfig,
): ReplayResult => {
    const covered = targetFrames.slice(0, prefix.length);
    // Frame 0 is the starting state; no step ever lands on it.
    const unreachable = covered.find((frame) => frame < 1);
    if (unreachable !== undefined) {
        return { ok: false, error: missedBounce(unreachable) };
    }

    const { platforms, frameCount } = runConstructionPass(covered, prefix, config);

    const claims = checkPlatformClaims(platforms);
    if (!claims.ok) {
        return claims;
    }

    const validation = runValidationPass(platforms, frameCount, config);
    if (!validation.ok) {
        return validation;
    }

    return { ok: true, platforms, frameCount };
};

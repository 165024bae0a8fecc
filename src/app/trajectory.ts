import type { ChoreographyConfig } from 'config/choreography';
import type { Platform } from 'physics/entities';
import { createSimulation, stepSimulation } from 'physics/world';
import type { FrameIndex, Vector2 } from '../types';

export interface TrajectoryFrame {
    readonly frame: FrameIndex;
    readonly x: number;
    readonly y: number;
    readonly vx: number;
    readonly vy: number;
    /** Id of the platform bounced off during this frame, if any. */
    readonly hitPlatformId: number | null;
    readonly camera: Vector2;
}

/**
 * Per-frame ball states for a finished layout. Every iteration replays from frame 0 on its
 * own copies, so the sequence can be walked any number of times and always comes out the
 * same.
 */
export const createTrajectory = (
    platforms: readonly Platform[],
    config: ChoreographyConfig,
    frameCount: FrameIndex,
): Iterable<TrajectoryFrame> => ({
    *[Symbol.iterator]() {
        const state = createSimulation(config, { platforms });
        while (state.frame < frameCount) {
            const step = stepSimulation(state);
            yield {
                frame: step.frame,
                x: state.ball.position.x,
                y: state.ball.position.y,
                vx: state.ball.velocity.x,
                vy: state.ball.velocity.y,
                hitPlatformId: step.hitPlatform ? step.hitPlatform.id : null,
                camera: { x: state.camera.x, y: state.camera.y },
            };
        }
    },
});

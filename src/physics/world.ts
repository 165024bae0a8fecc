import { cloneBall, clonePlatforms, cloneWall, createBall, type Ball, type Platform, type Wall } from './entities';
import { stepBall, type StepOutcome } from './collision';
import { carveWalls, sweepCarveRect } from './carve';
import type { ArenaConfig, ChoreographyConfig } from 'config/choreography';
import type { FrameIndex, Rectangle, Vector2 } from '../types';

export interface SimulationState {
    frame: FrameIndex;
    readonly ball: Ball;
    readonly platforms: Platform[];
    readonly walls: Wall[];
    /** Render offset only; collision never reads it. */
    camera: Vector2;
    readonly arena: ArenaConfig;
    readonly deadZone: number;
    readonly carveMargin: number;
}

export interface SimulationOptions {
    readonly platforms?: readonly Platform[];
    readonly walls?: readonly Wall[];
    readonly ball?: Ball;
}

export interface SimulationStep extends StepOutcome {
    readonly sweep: Rectangle | null;
    readonly wallsCarved: number;
}

/**
 * Fresh state for one pass. Platforms, walls and the ball are copied so that nothing a
 * pass does is visible to the caller or to a sibling pass.
 */
export const createSimulation = (config: ChoreographyConfig, options: SimulationOptions = {}): SimulationState => ({
    frame: 0,
    ball: options.ball ? cloneBall(options.ball) : createBall(config.ball),
    platforms: clonePlatforms(options.platforms ?? []),
    walls: (options.walls ?? []).map(cloneWall),
    camera: { x: 0, y: 0 },
    arena: config.arena,
    deadZone: config.camera.deadZone,
    carveMargin: config.carve.margin,
});

export const isCarving = (state: SimulationState): boolean => state.walls.length > 0;

const followAxis = (offset: number, position: number, extent: number, deadZone: number): number => {
    const edge = extent * deadZone;
    if (position - offset < edge) {
        return position - edge;
    }
    if (position - offset > extent - edge) {
        return position - (extent - edge);
    }
    return offset;
};

/**
 * Keep the ball inside the middle band of the viewport.
 */
export const followBall = (camera: Vector2, ball: Ball, arena: ArenaConfig, deadZone: number): Vector2 => ({
    x: followAxis(camera.x, ball.position.x, arena.width, deadZone),
    y: followAxis(camera.y, ball.position.y, arena.height, deadZone),
});

export const stepSimulation = (state: SimulationState): SimulationStep => {
    state.frame += 1;
    const velocity = { x: state.ball.velocity.x, y: state.ball.velocity.y };
    const outcome = stepBall(state.ball, state.platforms, state.frame);

    let sweep: Rectangle | null = null;
    let wallsCarved = 0;
    if (isCarving(state)) {
        sweep = sweepCarveRect(outcome.start, outcome.end, state.ball.size, velocity, state.carveMargin).rect;
        wallsCarved = carveWalls(state.walls, sweep, outcome.hitPlatform);
    }

    state.camera = followBall(state.camera, state.ball, state.arena, state.deadZone);

    return { ...outcome, sweep, wallsCarved };
};

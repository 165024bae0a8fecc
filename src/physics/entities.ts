import { cloneRectangle } from 'util/geometry';
import type { BallConfig, PlatformConfig } from 'config/choreography';
import type { FrameIndex, Orientation, Rectangle, Vector2 } from '../types';

export interface Ball {
    position: Vector2;
    velocity: Vector2;
    readonly size: number;
}

export interface Platform {
    readonly id: number;
    readonly rect: Rectangle;
    readonly orientation: Orientation;
    /** Frame this platform was spawned for during construction. */
    readonly targetFrame: FrameIndex;
    /** First frame the ball actually hit it. Written once, never overwritten. */
    expectedBounceFrame: FrameIndex | null;
}

export interface Wall {
    readonly rect: Rectangle;
    visible: boolean;
}

export interface PlatformSpec {
    readonly id: number;
    readonly rect: Rectangle;
    readonly orientation: Orientation;
    readonly targetFrame: FrameIndex;
}

export interface PlatformDimensions {
    readonly width: number;
    readonly height: number;
}

export const createBall = (config: BallConfig): Ball => ({
    position: { x: config.x, y: config.y },
    velocity: { x: config.speed, y: config.speed },
    size: config.size,
});

export const cloneBall = (ball: Ball): Ball => ({
    position: { x: ball.position.x, y: ball.position.y },
    velocity: { x: ball.velocity.x, y: ball.velocity.y },
    size: ball.size,
});

export const ballRect = (ball: Ball, position: Vector2 = ball.position): Rectangle => ({
    x: position.x,
    y: position.y,
    width: ball.size,
    height: ball.size,
});

export const predictBallPosition = (ball: Ball, frames = 1): Vector2 => ({
    x: ball.position.x + ball.velocity.x * frames,
    y: ball.position.y + ball.velocity.y * frames,
});

export const orientationFromChoice = (choice: boolean): Orientation => (choice ? 'horizontal' : 'vertical');

export const platformDimensions = (orientation: Orientation, config: PlatformConfig): PlatformDimensions =>
    orientation === 'horizontal'
        ? { width: config.length, height: config.thickness }
        : { width: config.thickness, height: config.length };

export const createPlatform = (spec: PlatformSpec): Platform => ({
    id: spec.id,
    rect: cloneRectangle(spec.rect),
    orientation: spec.orientation,
    targetFrame: spec.targetFrame,
    expectedBounceFrame: null,
});

/**
 * Remember the frame the platform was first hit on. Later hits leave it alone.
 * Returns true when this call wrote the value.
 */
export const recordBounce = (platform: Platform, frame: FrameIndex): boolean => {
    if (platform.expectedBounceFrame !== null) {
        return false;
    }
    platform.expectedBounceFrame = frame;
    return true;
};

export const clonePlatform = (platform: Platform): Platform => ({
    id: platform.id,
    rect: cloneRectangle(platform.rect),
    orientation: platform.orientation,
    targetFrame: platform.targetFrame,
    expectedBounceFrame: platform.expectedBounceFrame,
});

export const clonePlatforms = (platforms: readonly Platform[]): Platform[] => platforms.map(clonePlatform);

export const createWall = (rect: Rectangle): Wall => ({
    rect: cloneRectangle(rect),
    visible: true,
});

export const cloneWall = (wall: Wall): Wall => ({
    rect: cloneRectangle(wall.rect),
    visible: wall.visible,
});

export const hideWall = (wall: Wall): void => {
    wall.visible = false;
};

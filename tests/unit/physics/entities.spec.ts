import { describe, expect, it } from 'vitest';
import {
    ballRect,
    cloneBall,
    clonePlatforms,
    createBall,
    createPlatform,
    createWall,
    hideWall,
    orientationFromChoice,
    platformDimensions,
    predictBallPosition,
    recordBounce,
} from 'physics/entities';

describe('entities', () => {
    it('launches the ball diagonally down and to the right at the configured speed', () => {
        const ball = createBall({ x: 1, y: 2, size: 3, speed: 4 });
        expect(ball).toEqual({ position: { x: 1, y: 2 }, velocity: { x: 4, y: 4 }, size: 3 });
        expect(ballRect(ball)).toEqual({ x: 1, y: 2, width: 3, height: 3 });
        expect(predictBallPosition(ball)).toEqual({ x: 5, y: 6 });
        expect(predictBallPosition(ball, 3)).toEqual({ x: 13, y: 14 });
    });

    it('clones balls deeply', () => {
        const ball = createBall({ x: 0, y: 0, size: 1, speed: 1 });
        const copy = cloneBall(ball);
        copy.position.x = 10;
        copy.velocity.y = -1;
        expect(ball.position.x).toBe(0);
        expect(ball.velocity.y).toBe(1);
    });

    it('maps search bits to orientations', () => {
        expect(orientationFromChoice(true)).toBe('horizontal');
        expect(orientationFromChoice(false)).toBe('vertical');
    });

    it('lays the platform length along its orientation', () => {
        const config = { length: 20, thickness: 4 };
        expect(platformDimensions('horizontal', config)).toEqual({ width: 20, height: 4 });
        expect(platformDimensions('vertical', config)).toEqual({ width: 4, height: 20 });
    });

    it('records only the first bounce frame', () => {
        const platform = createPlatform({
            id: 0,
            rect: { x: 0, y: 0, width: 4, height: 1 },
            orientation: 'horizontal',
            targetFrame: 5,
        });
        expect(platform.expectedBounceFrame).toBeNull();
        expect(recordBounce(platform, 5)).toBe(true);
        expect(recordBounce(platform, 9)).toBe(false);
        expect(platform.expectedBounceFrame).toBe(5);
    });

    it('copies platforms so recorded bounces stay local', () => {
        const original = [
            createPlatform({ id: 0, rect: { x: 0, y: 0, width: 4, height: 1 }, orientation: 'horizontal', targetFrame: 3 }),
        ];
        const [copy] = clonePlatforms(original);
        recordBounce(copy, 3);
        expect(original[0].expectedBounceFrame).toBeNull();
        expect(copy.rect).not.toBe(original[0].rect);
    });

    it('creates visible walls that can be hidden', () => {
        const wall = createWall({ x: 0, y: 0, width: 1, height: 1 });
        expect(wall.visible).toBe(true);
        hideWall(wall);
        expect(wall.visible).toBe(false);
    });
});

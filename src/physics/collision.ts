/**
 * Discrete ball/platform contact.
 *
 * One call advances the ball exactly one frame. The next-position box is tested against
 * platforms in list order and the first overlap is resolved along the axis of least
 * penetration: the velocity component on that axis is pointed away from the platform
 * (magnitude kept) and the ball is placed flush with the face before the velocity is
 * applied. Only one platform can be hit per frame.
 */

import { addVectors, penetrationDepths, rectanglesOverlap, type PenetrationDepths } from 'util/geometry';
import { ballRect, recordBounce, type Ball, type Platform } from './entities';
import type { ContactSide, FrameIndex, Vector2 } from '../types';

export interface StepOutcome {
    readonly frame: FrameIndex;
    readonly hitIndex: number;
    readonly hitPlatform: Platform | null;
    readonly side: ContactSide | null;
    readonly start: Vector2;
    readonly end: Vector2;
}

// Tie order matters: the first side listed wins on equal depth.
const CONTACT_ORDER: readonly ContactSide[] = ['left', 'right', 'top', 'bottom'];

export const selectContactSide = (depths: PenetrationDepths): ContactSide => {
    let best: ContactSide = CONTACT_ORDER[0];
    for (const side of CONTACT_ORDER) {
        if (depths[side] < depths[best]) {
            best = side;
        }
    }
    return best;
};

/**
 * Point the velocity away from the face and move the ball flush against it.
 */
export const resolveContact = (ball: Ball, platform: Platform, side: ContactSide): void => {
    const { rect } = platform;
    switch (side) {
        case 'left':
            ball.velocity.x = -Math.abs(ball.velocity.x);
            ball.position.x = rect.x - ball.size;
            break;
        case 'right':
            ball.velocity.x = Math.abs(ball.velocity.x);
            ball.position.x = rect.x + rect.width;
            break;
        case 'top':
            ball.velocity.y = -Math.abs(ball.velocity.y);
            ball.position.y = rect.y - ball.size;
            break;
        case 'bottom':
            ball.velocity.y = Math.abs(ball.velocity.y);
            ball.position.y = rect.y + rect.height;
            break;
    }
};

export const stepBall = (ball: Ball, platforms: readonly Platform[], frame: FrameIndex): StepOutcome => {
    const start = { x: ball.position.x, y: ball.position.y };
    const next = ballRect(ball, addVectors(ball.position, ball.velocity));

    let hitIndex = -1;
    let hitPlatform: Platform | null = null;
    let side: ContactSide | null = null;

    for (let index = 0; index < platforms.length; index += 1) {
        const platform = platforms[index];
        if (!rectanglesOverlap(next, platform.rect)) {
            continue;
        }

        side = selectContactSide(penetrationDepths(next, platform.rect));
        resolveContact(ball, platform, side);
        recordBounce(platform, frame);
        hitIndex = index;
        hitPlatform = platform;
        break;
    }

    ball.position = addVectors(ball.position, ball.velocity);

    return {
        frame,
        hitIndex,
        hitPlatform,
        side,
        start,
        end: { x: ball.position.x, y: ball.position.y },
    };
};

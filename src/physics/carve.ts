import { rectanglesOverlap, rectanglesTouch, unionRectangles } from 'util/geometry';
import { hideWall, type Platform, type Wall } from './entities';
import type { Rectangle, Vector2 } from '../types';

export type CarveAnchor = 'top-left' | 'top-right' | 'bottom-left' | 'bottom-right';

/**
 * Corner of the ball box that stays put while the ball travels with this velocity.
 * Moving right and down pins the top-left corner, and so on.
 */
export const carveAnchorFor = (velocity: Vector2): CarveAnchor => {
    if (velocity.x > 0) {
        return velocity.y > 0 ? 'top-left' : 'bottom-left';
    }
    return velocity.y > 0 ? 'top-right' : 'bottom-right';
};

export interface CarveSweep {
    readonly anchor: CarveAnchor;
    readonly rect: Rectangle;
}

/**
 * Box swept by the ball during one frame. The anchored corner comes from the box at the
 * start of the frame; the opposite corner follows the box at the end, pushed out by
 * `margin`. A bounce inside the frame can send the ball back across the anchor, so the
 * result always covers both boxes.
 */
export const sweepCarveRect = (
    start: Vector2,
    end: Vector2,
    size: number,
    velocity: Vector2,
    margin = 0,
): CarveSweep => {
    const anchor = carveAnchorFor(velocity);
    const startBox: Rectangle = { x: start.x, y: start.y, width: size, height: size };

    const growLeft = anchor === 'top-right' || anchor === 'bottom-right';
    const growUp = anchor === 'bottom-left' || anchor === 'bottom-right';
    const endBox: Rectangle = {
        x: growLeft ? end.x - margin : end.x,
        y: growUp ? end.y - margin : end.y,
        width: size + margin,
        height: size + margin,
    };

    return { anchor, rect: unionRectangles(startBox, endBox) };
};

/**
 * Hide every visible wall the sweep touches, and every wall the platform just hit
 * overlaps. Returns how many walls were hidden.
 */
export const carveWalls = (walls: readonly Wall[], sweep: Rectangle, hitPlatform: Platform | null): number => {
    let carved = 0;
    for (const wall of walls) {
        if (!wall.visible) {
            continue;
        }
        if (rectanglesTouch(sweep, wall.rect) || (hitPlatform && rectanglesOverlap(hitPlatform.rect, wall.rect))) {
            hideWall(wall);
            carved += 1;
        }
    }
    return carved;
};

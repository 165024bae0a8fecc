/**
 * Geometry Utilities
 *
 * Rectangle primitives for the collision core. Contact uses a strict overlap test so
 * that boxes which only share an edge never collide; carving uses the inclusive test
 * from matter-js so a swept box grazing a wall still clears it.
 */

import { Bounds, Vector } from 'physics/matter';
import type { MatterBounds } from 'physics/matter';
import type { Rectangle, Vector2 } from '../types';

/**
 * Component-wise sum as a fresh plain vector
 */
export function addVectors(a: Vector2, b: Vector2): Vector2 {
    const sum = Vector.add(a, b);
    return { x: sum.x, y: sum.y };
}

export const rectRight = (rect: Rectangle): number => rect.x + rect.width;

export const rectBottom = (rect: Rectangle): number => rect.y + rect.height;

export const rectArea = (rect: Rectangle): number => rect.width * rect.height;

export const cloneRectangle = (rect: Rectangle): Rectangle => ({
    x: rect.x,
    y: rect.y,
    width: rect.width,
    height: rect.height,
});

/**
 * Convert a rectangle into the min/max form matter-js works with
 */
export function toBounds(rect: Rectangle): MatterBounds {
    return {
        min: { x: rect.x, y: rect.y },
        max: { x: rectRight(rect), y: rectBottom(rect) },
    };
}

/**
 * Check if two rectangles intersect, excluding touching edges
 */
export function rectanglesOverlap(a: Rectangle, b: Rectangle): boolean {
    return rectRight(a) > b.x &&
        a.x < rectRight(b) &&
        rectBottom(a) > b.y &&
        a.y < rectBottom(b);
}

/**
 * Check if two rectangles intersect or share an edge
 */
export function rectanglesTouch(a: Rectangle, b: Rectangle): boolean {
    return Bounds.overlaps(toBounds(a), toBounds(b));
}

/**
 * Smallest rectangle covering both inputs
 */
export function unionRectangles(a: Rectangle, b: Rectangle): Rectangle {
    const left = Math.min(a.x, b.x);
    const top = Math.min(a.y, b.y);
    const right = Math.max(rectRight(a), rectRight(b));
    const bottom = Math.max(rectBottom(a), rectBottom(b));
    return { x: left, y: top, width: right - left, height: bottom - top };
}

export interface PenetrationDepths {
    readonly left: number;
    readonly right: number;
    readonly top: number;
    readonly bottom: number;
}

/**
 * How far a moving box has pushed into an obstacle through each of the obstacle's faces
 */
export function penetrationDepths(mover: Rectangle, obstacle: Rectangle): PenetrationDepths {
    return {
        left: rectRight(mover) - obstacle.x,
        right: rectRight(obstacle) - mover.x,
        top: rectBottom(mover) - obstacle.y,
        bottom: rectBottom(obstacle) - mover.y,
    };
}

/** Pin `value` into `[min, max]`. */
export function clamp(value: number, min: number, max: number): number {
    return Math.min(Math.max(value, min), max);
}

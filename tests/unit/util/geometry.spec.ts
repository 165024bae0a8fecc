import { describe, expect, it } from 'vitest';
import {
    addVectors,
    clamp,
    cloneRectangle,
    penetrationDepths,
    rectArea,
    rectBottom,
    rectRight,
    rectanglesOverlap,
    rectanglesTouch,
    toBounds,
    unionRectangles,
} from 'util/geometry';
import type { Rectangle } from 'types/index';

const rect = (x: number, y: number, width: number, height: number): Rectangle => ({ x, y, width, height });

describe('geometry utilities', () => {
    it('adds vectors without touching the inputs', () => {
        const a = { x: 4, y: -1 };
        const b = { x: -6, y: 8 };
        expect(addVectors(a, b)).toEqual({ x: -2, y: 7 });
        expect(a).toEqual({ x: 4, y: -1 });
    });

    it('derives rectangle edges and area', () => {
        const box = rect(2, 4, 10, 6);
        expect(rectRight(box)).toBe(12);
        expect(rectBottom(box)).toBe(10);
        expect(rectArea(box)).toBe(60);
    });

    it('clones rectangles into independent values', () => {
        const box = rect(1, 2, 3, 4);
        const copy = cloneRectangle(box);
        copy.x = 99;
        expect(box.x).toBe(1);
        expect(copy).toEqual({ x: 99, y: 2, width: 3, height: 4 });
    });

    it('converts to min/max bounds', () => {
        const box = rect(-5, 3, 10, 2);
        expect(toBounds(box)).toEqual({ min: { x: -5, y: 3 }, max: { x: 5, y: 5 } });
    });

    it('treats shared edges as touching but not overlapping', () => {
        const a = rect(0, 0, 10, 10);
        const edge = rect(10, 0, 5, 5);
        const inside = rect(9, 9, 5, 5);
        const apart = rect(10.5, 0, 5, 5);

        expect(rectanglesOverlap(a, edge)).toBe(false);
        expect(rectanglesTouch(a, edge)).toBe(true);
        expect(rectanglesOverlap(a, inside)).toBe(true);
        expect(rectanglesTouch(a, inside)).toBe(true);
        expect(rectanglesOverlap(a, apart)).toBe(false);
        expect(rectanglesTouch(a, apart)).toBe(false);
    });

    it('builds the smallest rectangle covering two others', () => {
        expect(unionRectangles(rect(0, 0, 2, 2), rect(5, -3, 1, 1))).toEqual({
            x: 0,
            y: -3,
            width: 6,
            height: 5,
        });
    });

    it('measures penetration through each face of an obstacle', () => {
        const mover = rect(8, 2, 4, 4);
        const obstacle = rect(10, 0, 20, 20);
        expect(penetrationDepths(mover, obstacle)).toEqual({ left: 2, right: 22, top: 6, bottom: 18 });
    });

    it('clamps numbers within range', () => {
        expect(clamp(5, 0, 10)).toBe(5);
        expect(clamp(-5, 0, 10)).toBe(0);
        expect(clamp(15, 0, 10)).toBe(10);
    });
});

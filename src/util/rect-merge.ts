import type { Rectangle } from '../types';
import { rectArea } from './geometry';

/**
 * The rectangle covering `a` and `b` when they share one full edge, otherwise null.
 * Partial overlaps and mismatched edge lengths never merge.
 */
export const mergePair = (a: Rectangle, b: Rectangle): Rectangle | null => {
    if (a.x === b.x && a.width === b.width) {
        if (a.y + a.height === b.y) {
            return { x: a.x, y: a.y, width: a.width, height: a.height + b.height };
        }
        if (b.y + b.height === a.y) {
            return { x: a.x, y: b.y, width: a.width, height: a.height + b.height };
        }
    }
    if (a.y === b.y && a.height === b.height) {
        if (a.x + a.width === b.x) {
            return { x: a.x, y: a.y, width: a.width + b.width, height: a.height };
        }
        if (b.x + b.width === a.x) {
            return { x: b.x, y: a.y, width: a.width + b.width, height: a.height };
        }
    }
    return null;
};

/**
 * Merge edge-sharing rectangles until a full pass finds nothing left to merge.
 *
 * Each pass takes rectangles off the front of the queue and absorbs every later one it can.
 * A rectangle that grew goes to the back of the queue for another try; one that did not is
 * settled for this pass.
 */
export const mergeRectangles = (rectangles: readonly Rectangle[]): Rectangle[] => {
    let current = rectangles.map((rect) => ({ ...rect }));
    let changed = true;

    while (changed) {
        changed = false;
        const settled: Rectangle[] = [];
        const queue = [...current];

        while (queue.length > 0) {
            let rect = queue.shift();
            if (!rect) {
                break;
            }
            let grew = false;
            let index = 0;
            while (index < queue.length) {
                const merged = mergePair(rect, queue[index]);
                if (merged) {
                    rect = merged;
                    queue.splice(index, 1);
                    grew = true;
                } else {
                    index += 1;
                }
            }

            if (grew) {
                queue.push(rect);
                changed = true;
            } else {
                settled.push(rect);
            }
        }

        current = settled;
    }

    return current;
};

export const totalArea = (rectangles: readonly Rectangle[]): number =>
    rectangles.reduce((sum, rect) => sum + rectArea(rect), 0);

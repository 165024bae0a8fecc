/**
 * Walls around the finished layout.
 *
 * The bounding region of all platforms is cut into a grid along every platform edge and
 * fenced by four oversized edge walls. One more replay with the walls in place carves away
 * every cell the ball sweeps through; what is left is merged into as few rectangles as
 * exact edge-sharing allows.
 */

import type { ArenaConfig, ChoreographyConfig } from 'config/choreography';
import { createWall, type Platform, type Wall } from 'physics/entities';
import { createSimulation, stepSimulation } from 'physics/world';
import { mergeRectangles } from 'util/rect-merge';
import type { FrameIndex, Rectangle } from '../types';
import { createBounceCheck, type BounceError } from './replay';

const sortedUnique = (values: readonly number[]): number[] => [...new Set(values)].sort((a, b) => a - b);

export interface GridEdges {
    readonly xs: readonly number[];
    readonly ys: readonly number[];
}

/**
 * Every distinct platform edge, sorted, on each axis.
 */
export const gridEdges = (platforms: readonly Platform[]): GridEdges => ({
    xs: sortedUnique(platforms.flatMap((platform) => [platform.rect.x, platform.rect.x + platform.rect.width])),
    ys: sortedUnique(platforms.flatMap((platform) => [platform.rect.y, platform.rect.y + platform.rect.height])),
});

export const gridCells = ({ xs, ys }: GridEdges): Rectangle[] => {
    const cells: Rectangle[] = [];
    for (let column = 0; column < xs.length - 1; column += 1) {
        for (let row = 0; row < ys.length - 1; row += 1) {
            cells.push({
                x: xs[column],
                y: ys[row],
                width: xs[column + 1] - xs[column],
                height: ys[row + 1] - ys[row],
            });
        }
    }
    return cells;
};

/**
 * Four walls fencing `extent`, each reaching two arena sizes beyond it.
 */
export const edgeWalls = (extent: Rectangle, arena: ArenaConfig): Rectangle[] => {
    const marginX = arena.width * 2;
    const marginY = arena.height * 2;
    const left = extent.x - marginX;
    const top = extent.y - marginY;
    const right = extent.x + extent.width;
    const bottom = extent.y + extent.height;
    const fullHeight = marginY + extent.height + marginY;
    const fullWidth = marginX + extent.width + marginX;

    return [
        { x: left, y: top, width: marginX, height: fullHeight },
        { x: right, y: top, width: marginX, height: fullHeight },
        { x: left, y: top, width: fullWidth, height: marginY },
        { x: left, y: bottom, width: fullWidth, height: marginY },
    ];
};

export const placeWalls = (platforms: readonly Platform[], arena: ArenaConfig): Wall[] => {
    const edges = gridEdges(platforms);
    const cells = gridCells(edges);
    if (cells.length === 0) {
        return [];
    }

    const { xs, ys } = edges;
    const extent = {
        x: xs[0],
        y: ys[0],
        width: xs[xs.length - 1] - xs[0],
        height: ys[ys.length - 1] - ys[0],
    };

    return [...cells, ...edgeWalls(extent, arena)].map(createWall);
};

export interface CarveResult {
    readonly walls: Wall[];
    readonly carvedCount: number;
    readonly error: BounceError | null;
}

/**
 * Replay the layout with walls active and hide every wall the ball sweeps. Bounce timing
 * is checked on the way; a validated layout reports no error.
 */
export const runCarvePass = (
    platforms: readonly Platform[],
    walls: readonly Wall[],
    config: ChoreographyConfig,
    frameCount: FrameIndex,
): CarveResult => {
    const state = createSimulation(config, { platforms, walls });
    const check = createBounceCheck(state.platforms);
    let carvedCount = 0;
    let error: BounceError | null = null;

    while (state.frame < frameCount) {
        const step = stepSimulation(state);
        carvedCount += step.wallsCarved;
        error = error ?? check(step);
    }

    return { walls: state.walls, carvedCount, error };
};

/**
 * Merge the walls that survived carving.
 */
export const compactWalls = (walls: readonly Wall[]): Wall[] =>
    mergeRectangles(walls.filter((wall) => wall.visible).map((wall) => wall.rect)).map(createWall);

/**
 * Shared Type Definitions
 *
 * Plain geometry values shared by the physics core, the search and the wall layout.
 * Nothing here knows how things are drawn.
 */

/**
 * 2D vector with x and y coordinates
 */
export interface Vector2 {
    x: number;
    y: number;
}

/**
 * Axis-aligned rectangle anchored at its top-left corner (y grows downward)
 */
export interface Rectangle {
    x: number;
    y: number;
    width: number;
    height: number;
}

/**
 * Long axis of a platform. A horizontal platform turns the vertical velocity around,
 * a vertical one the horizontal velocity.
 */
export type Orientation = 'horizontal' | 'vertical';

/**
 * Face of a platform the ball was resolved against
 */
export type ContactSide = 'left' | 'right' | 'top' | 'bottom';

/**
 * Discrete simulation step index. Frame 0 is the initial state; the first step is frame 1.
 */
export type FrameIndex = number;

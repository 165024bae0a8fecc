import Matter from 'matter-js';

export const { Bounds, Vector } = Matter;

export type { Bounds as MatterBounds } from 'matter-js';

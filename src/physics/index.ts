/**
 * Physics Module Exports
 *
 * Ball, platform and wall entities, the one-frame contact step and wall carving.
 */

export * from './entities';
export * from './collision';
export * from './carve';
export * from './world';

/**
 * Spatial core - edge walls, movement blocking, field of view, pathfinding and area effects
 */

export * from './aoe.js';
export * from './blocking.js';
export * from './constants.js';
export * from './direction.js';
export * from './fov.js';
export * from './geometry.js';
export * from './heap.js';
export * from './map.js';
export * from './pathfinding.js';
export * from './placement.js';
export * from './sound.js';
export * from './tile.js';
export * from './visibility-buffer.js';

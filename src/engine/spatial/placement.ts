/**
 * Map editing primitives for level builders and tests.
 *
 * Randomized placement takes a seeded PRNG so the same seed always yields the
 * same map. Cells off the map are skipped.
 *
 * @module spatial/placement
 */

import seedrandom from 'seedrandom';
import type { Point, Tile, TileType } from '../../schema/grid.js';
import { NEIGHBOR_OFFSETS } from './constants.js';
import { addPos, line, moveX, moveY } from './geometry.js';
import type { GridMap } from './map.js';
import { Tiles } from './tile.js';

export type Obstacle = 'block' | 'wall' | 'short_wall' | 'square' | 'l_shape' | 'building';

export const ALL_OBSTACLES: readonly Obstacle[] = ['block', 'wall', 'short_wall', 'square', 'l_shape', 'building'];

export function createRng(seed: string): seedrandom.PRNG {
    return seedrandom(seed);
}

/** Integer in [min, max) */
function randomInt(rng: seedrandom.PRNG, min: number, max: number): number {
    return min + Math.floor(rng() * (max - min));
}

function chance(rng: seedrandom.PRNG): boolean {
    return rng() < 0.5;
}

function placeAt(map: GridMap, pos: Point, tile: Tile): boolean {
    if (!map.isWithinBounds(pos)) return false;
    map.set(pos, tile);
    return true;
}

/**
 * Fill a `width` x `width` square whose top-left corner is `start`
 */
export function placeBlock(map: GridMap, start: Point, width: number, tile: Tile): Point[] {
    const positions: Point[] = [];

    for (let x = 0; x < width; x++) {
        for (let y = 0; y < width; y++) {
            const pos = addPos(start, { x, y });
            if (placeAt(map, pos, tile)) {
                positions.push(pos);
            }
        }
    }

    return positions;
}

/**
 * Write `tile` along the line from `start` to `end`. The start cell itself is
 * not part of the line.
 */
export function placeLine(map: GridMap, start: Point, end: Point, tile: Tile): Point[] {
    return line(start, end).filter(pos => placeAt(map, pos, tile));
}

/**
 * Drop a randomly oriented obstacle at `pos`. Callers refresh visibility afterwards.
 */
export function addObstacle(map: GridMap, pos: Point, obstacle: Obstacle, rng: seedrandom.PRNG): Point[] {
    switch (obstacle) {
        case 'block':
            return placeAt(map, pos, Tiles.wall()) ? [pos] : [];

        case 'wall': {
            const end = chance(rng) ? moveX(pos, 3) : moveY(pos, 3);
            return placeLine(map, pos, end, Tiles.wall());
        }

        case 'short_wall': {
            const end = chance(rng) ? moveX(pos, 3) : moveY(pos, 3);
            return placeLine(map, pos, end, Tiles.shortWall());
        }

        case 'square':
            return placeBlock(map, pos, 2, Tiles.wall());

        case 'l_shape': {
            const dir = chance(rng) ? -1 : 1;
            const cells: Point[] = [];

            if (chance(rng)) {
                for (let x = 0; x < 3; x++) cells.push(moveX(pos, x));
                cells.push(moveY(pos, dir));
            } else {
                for (let y = 0; y < 3; y++) cells.push(moveY(pos, y));
                cells.push(moveX(pos, dir));
            }

            return cells.filter(cell => placeAt(map, cell, Tiles.wall()));
        }

        case 'building': {
            const size = 2;
            const corners = [
                addPos(pos, { x: -size, y: size }),
                addPos(pos, { x: size, y: size }),
                addPos(pos, { x: size, y: -size }),
                addPos(pos, { x: -size, y: -size })
            ];

            const walls: Point[] = [];
            for (let i = 0; i < corners.length; i++) {
                walls.push(...placeLine(map, corners[i], corners[(i + 1) % corners.length], Tiles.wall()));
            }

            // Knock out a few wall cells as openings
            const openings = randomInt(rng, 0, 10);
            for (let i = 0; i < openings && walls.length > 0; i++) {
                const index = randomInt(rng, 0, walls.length);
                const [removed] = walls.splice(index, 1);
                map.set(removed, Tiles.empty());
            }

            return walls;
        }
    }
}

/**
 * Random offset with each component in [-radius, radius)
 */
export function randomOffset(rng: seedrandom.PRNG, radius: number): Point {
    return {
        x: randomInt(rng, -radius, radius),
        y: randomInt(rng, -radius, radius)
    };
}

/**
 * Whether any of the 8 neighbors of `pos` has the given tile type
 */
export function nearTileType(map: GridMap, pos: Point, tileType: TileType): boolean {
    return NEIGHBOR_OFFSETS.some(offset => {
        const neighbor = addPos(pos, offset);
        return map.isWithinBounds(neighbor) && map.get(neighbor).tileType === tileType;
    });
}

/**
 * Tile factories and wall ordering.
 *
 * Tiles are plain values: every factory returns a fresh object and the map
 * stores copies, so editing one cell never aliases another.
 *
 * @module spatial/tile
 */

import type { Tile, Wall } from '../../schema/grid.js';

const WALL_RANK: Record<Wall, number> = {
    empty: 0,
    short: 1,
    tall: 2
};

export function wallRank(wall: Wall): number {
    return WALL_RANK[wall];
}

/**
 * Sort comparator: empty < short < tall
 */
export function compareWalls(a: Wall, b: Wall): number {
    return WALL_RANK[a] - WALL_RANK[b];
}

export function isNoWall(wall: Wall): boolean {
    return wall === 'empty';
}

function baseTile(): Tile {
    return {
        blocked: false,
        blockSight: false,
        explored: false,
        tileType: 'empty',
        bottomWall: 'empty',
        leftWall: 'empty',
        glyph: ' ',
        surface: 'floor'
    };
}

export const Tiles = {
    empty(): Tile {
        return baseTile();
    },

    /** Impassable but transparent */
    water(): Tile {
        return { ...baseTile(), blocked: true, tileType: 'water' };
    },

    wall(glyph: string = ' '): Tile {
        return { ...baseTile(), blocked: true, blockSight: true, tileType: 'wall', glyph };
    },

    /** A whole cell of low wall: impassable, does not block sight */
    shortWall(glyph: string = ' '): Tile {
        return { ...baseTile(), blocked: true, tileType: 'short_wall', glyph };
    },

    exit(): Tile {
        return { ...baseTile(), tileType: 'exit' };
    }
};

import { GridMap } from '../../../src/engine/spatial/map.js';
import { Tiles, compareWalls, isNoWall, wallRank } from '../../../src/engine/spatial/tile.js';
import { MapFormatError, PreconditionError } from '../../../src/engine/errors.js';
import type { Wall } from '../../../src/schema/grid.js';

describe('GridMap', () => {
    describe('construction', () => {
        it('should fill a new map with empty floor', () => {
            const map = GridMap.fromDims(4, 3);

            expect(map.size()).toEqual([4, 3]);
            expect(map.positions()).toHaveLength(12);
            expect(map.get({ x: 3, y: 2 })).toEqual(Tiles.empty());
            expect(map.isEmpty({ x: 0, y: 0 })).toBe(true);
        });

        it('should reject dimensions that are not positive integers', () => {
            expect(() => GridMap.fromDims(0, 5)).toThrow(PreconditionError);
            expect(() => GridMap.fromDims(3, 2.5)).toThrow(PreconditionError);
        });

        it('should build from x-major columns', () => {
            const map = GridMap.fromColumns([
                [Tiles.empty(), Tiles.wall('#')],
                [Tiles.water(), Tiles.exit()],
                [Tiles.empty(), Tiles.empty()]
            ]);

            expect(map.size()).toEqual([3, 2]);
            expect(map.get({ x: 0, y: 1 }).glyph).toBe('#');
            expect(map.get({ x: 1, y: 0 }).tileType).toBe('water');
            expect(map.get({ x: 1, y: 1 }).tileType).toBe('exit');
        });

        it('should reject ragged columns', () => {
            expect(() => GridMap.fromColumns([[Tiles.empty()], [Tiles.empty(), Tiles.empty()]]))
                .toThrow(PreconditionError);
        });
    });

    describe('cell access', () => {
        let map: GridMap;

        beforeEach(() => {
            map = GridMap.fromDims(5, 5);
        });

        it('should answer bounds queries', () => {
            expect(map.isWithinBounds({ x: 4, y: 4 })).toBe(true);
            expect(map.isWithinBounds({ x: 5, y: 0 })).toBe(false);
            expect(map.isWithinBounds({ x: 0, y: -1 })).toBe(false);
        });

        it('should throw when reading off the map', () => {
            expect(() => map.get({ x: 5, y: 0 })).toThrow(PreconditionError);
        });

        it('should store a copy of the tile it is given', () => {
            const wall = Tiles.wall();
            map.set({ x: 1, y: 1 }, wall);
            map.set({ x: 2, y: 1 }, wall);

            map.update({ x: 1, y: 1 }, { glyph: '#' });

            expect(map.get({ x: 1, y: 1 }).glyph).toBe('#');
            expect(map.get({ x: 2, y: 1 }).glyph).toBe(' ');
            expect(wall.glyph).toBe(' ');
        });

        it('should list positions row by row', () => {
            const positions = map.positions();

            expect(positions[0]).toEqual({ x: 0, y: 0 });
            expect(positions[1]).toEqual({ x: 1, y: 0 });
            expect(positions[5]).toEqual({ x: 0, y: 1 });
        });
    });

    describe('serialization', () => {
        it('should preserve every tile field', () => {
            const map = GridMap.fromDims(3, 3);
            map.set({ x: 1, y: 1 }, Tiles.wall('#'));
            map.update({ x: 2, y: 0 }, { leftWall: 'short', bottomWall: 'tall', explored: true, surface: 'grass' });

            const json = map.toJSON();
            const restored = GridMap.fromJSON(JSON.parse(JSON.stringify(json)));

            expect(restored.toJSON()).toEqual(json);
            expect(json.tiles[2]).toEqual({
                blocked: false,
                blockSight: false,
                explored: true,
                tileType: 'empty',
                bottomWall: 'tall',
                leftWall: 'short',
                glyph: ' ',
                surface: 'grass'
            });
        });

        it('should round-trip a glyph outside the basic plane', () => {
            const map = GridMap.fromDims(2, 1);
            map.set({ x: 1, y: 0 }, Tiles.wall('\u{1F9F1}'));

            const restored = GridMap.fromJSON(map.toJSON());

            expect(restored.get({ x: 1, y: 0 }).glyph).toBe('\u{1F9F1}');
        });

        it('should reject glyphs longer than one character', () => {
            const map = GridMap.fromDims(1, 1);
            const json = map.toJSON();

            expect(() => map.set({ x: 0, y: 0 }, Tiles.wall('##'))).toThrow(PreconditionError);
            expect(() => map.update({ x: 0, y: 0 }, { glyph: '' })).toThrow(PreconditionError);
            expect(() => GridMap.fromJSON({ ...json, tiles: [{ ...json.tiles[0], glyph: '##' }] }))
                .toThrow(MapFormatError);
            expect(map.get({ x: 0, y: 0 }).glyph).toBe(' ');
        });

        it('should report a tile count that does not match the dimensions', () => {
            let error: unknown;
            try {
                GridMap.fromJSON({ width: 2, height: 2, tiles: [] });
            } catch (e) {
                error = e;
            }

            expect(error).toBeInstanceOf(MapFormatError);
            if (error instanceof MapFormatError) {
                expect(error.issues).toEqual(['tiles: Expected 4 tiles, got 0']);
            }
        });

        it('should reject malformed tiles', () => {
            const json = GridMap.fromDims(1, 1).toJSON();

            expect(() => GridMap.fromJSON({ ...json, tiles: [{ ...json.tiles[0], leftWall: 'medium' }] }))
                .toThrow(MapFormatError);
            expect(() => GridMap.fromJSON('not a map')).toThrow(MapFormatError);
        });
    });

    describe('visibility buffer', () => {
        it('should stay stale until refreshed', () => {
            const map = GridMap.fromDims(10, 10);
            for (let y = 0; y < 10; y++) {
                map.set({ x: 5, y }, Tiles.wall());
            }

            map.computeFov({ x: 2, y: 5 }, 10);
            expect(map.isVisibleInBuffer({ x: 7, y: 5 })).toBe(true);

            map.refreshVisibility();
            expect(map.fovState()).toEqual({ pos: { x: 2, y: 5 }, radius: 10 });
            expect(map.isVisibleInBuffer({ x: 7, y: 5 })).toBe(false);
            expect(map.isVisibleInBuffer({ x: 3, y: 5 })).toBe(true);
        });

        it('should let a single cell be made opaque without a tile edit', () => {
            const map = GridMap.fromDims(10, 10);
            for (let y = 0; y < 10; y++) {
                map.setTransparent(5, y, false);
            }

            map.computeFov({ x: 2, y: 5 }, 10);
            expect(map.isVisibleInBuffer({ x: 7, y: 5 })).toBe(false);
            expect(map.get({ x: 5, y: 5 }).blockSight).toBe(false);
        });
    });

    describe('walls', () => {
        it('should order walls from empty to tall', () => {
            const walls: Wall[] = ['tall', 'empty', 'short'];

            expect([...walls].sort(compareWalls)).toEqual(['empty', 'short', 'tall']);
        });

        it('should rank walls and recognize an open edge', () => {
            expect(wallRank('empty')).toBe(0);
            expect(wallRank('short')).toBe(1);
            expect(wallRank('tall')).toBe(2);
            expect(isNoWall('empty')).toBe(true);
            expect(isNoWall('short')).toBe(false);
        });
    });
});

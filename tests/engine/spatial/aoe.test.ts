import { GridMap } from '../../../src/engine/spatial/map.js';
import { PreconditionError } from '../../../src/engine/errors.js';
import { Tiles } from '../../../src/engine/spatial/tile.js';

describe('area of effect', () => {
    const origin = { x: 5, y: 5 };
    let map: GridMap;

    beforeEach(() => {
        map = GridMap.fromDims(10, 10);
    });

    it('should bucket cells into rings by distance', () => {
        const aoe = map.aoeFill('sound', origin, 2);

        expect(aoe.effect).toBe('sound');
        expect(aoe.rings).toHaveLength(3);
        expect(aoe.rings[0]).toEqual([origin]);
        expect(aoe.rings[1]).toHaveLength(8);
        expect(aoe.rings[2]).toHaveLength(16);
        expect(aoe.positions()).toHaveLength(25);
    });

    it('should cover exactly the flood fill when nothing is walled off', () => {
        map.set({ x: 5, y: 8 }, Tiles.water());

        const aoe = map.aoeFill('sound', origin, 3);
        const flood = map.floodFill(origin, 3);

        expect(aoe.positions()).toHaveLength(flood.length);
        for (const pos of flood) {
            expect(aoe.covers(pos)).toBe(true);
        }
        expect(flood).toHaveLength(48);
        expect(aoe.covers({ x: 5, y: 8 })).toBe(false);
    });

    it('should keep a zero radius to the origin', () => {
        const aoe = map.aoeFill('sound', origin, 0);

        expect(aoe.rings).toEqual([[origin]]);
    });

    it('should dampen cells walled off in both directions', () => {
        map.update({ x: 7, y: 5 }, { leftWall: 'short' });

        const aoe = map.aoeFill('sound', origin, 3);

        expect(aoe.covers({ x: 7, y: 5 })).toBe(false);
        expect(aoe.ringOf({ x: 7, y: 4 })).toBe(2);
        expect(aoe.ringOf({ x: 6, y: 5 })).toBe(1);
    });

    it('should reach walled-off cells inside the dampened radius', () => {
        map.update({ x: 7, y: 5 }, { leftWall: 'short' });

        const aoe = map.aoeFill('sound', origin, 5);

        expect(aoe.ringOf({ x: 7, y: 5 })).toBe(2);
    });

    it('should reject a negative radius', () => {
        expect(() => map.aoeFill('sound', origin, -1)).toThrow(PreconditionError);
    });
});

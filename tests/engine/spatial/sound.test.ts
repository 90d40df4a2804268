import { GridMap } from '../../../src/engine/spatial/map.js';
import { hearingQuality, soundAoe, soundRadius } from '../../../src/engine/spatial/sound.js';

describe('sound', () => {
    const origin = { x: 5, y: 5 };

    it('should scale the radius with volume', () => {
        expect(soundRadius('whisper')).toBe(2);
        expect(soundRadius('talk')).toBe(4);
        expect(soundRadius('shout')).toBe(8);
    });

    it('should spread a sound over one ring per radius step', () => {
        const aoe = soundAoe(GridMap.fromDims(10, 10), origin, 'talk');

        expect(aoe.effect).toBe('sound');
        expect(aoe.rings).toHaveLength(5);
    });

    it('should grade hearing by distance from the source', () => {
        const aoe = soundAoe(GridMap.fromDims(10, 10), origin, 'talk');

        expect(hearingQuality(aoe, origin)).toBe('clearly');
        expect(hearingQuality(aoe, { x: 6, y: 5 })).toBe('clearly');
        expect(hearingQuality(aoe, { x: 7, y: 5 })).toBe('distinctly');
        expect(hearingQuality(aoe, { x: 8, y: 5 })).toBe('faintly');
        expect(hearingQuality(aoe, { x: 9, y: 5 })).toBe('barely');
        expect(hearingQuality(aoe, { x: 0, y: 0 })).toBeUndefined();
    });

    it('should not carry through a closed room', () => {
        const map = GridMap.fromDims(10, 10);
        for (let y = 0; y < 10; y++) {
            map.update({ x: 7, y }, { leftWall: 'tall' });
        }

        const aoe = soundAoe(map, origin, 'whisper');

        expect(hearingQuality(aoe, { x: 6, y: 5 })).toBe('distinctly');
        expect(hearingQuality(aoe, { x: 7, y: 5 })).toBeUndefined();
    });
});

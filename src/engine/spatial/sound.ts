/**
 * Sound propagation on top of area effects.
 *
 * Volume picks the radius; walls dampen through the AoE rule. The ring a
 * listener falls in describes how clearly they hear.
 */

import type { Point, VolumeLevel } from '../../schema/grid.js';
import { Aoe, aoeFill } from './aoe.js';
import { SOUND_RADIUS } from './constants.js';
import type { GridMap } from './map.js';

export type HearingQuality = 'clearly' | 'distinctly' | 'faintly' | 'barely';

export function soundRadius(volume: VolumeLevel): number {
    return SOUND_RADIUS[volume];
}

export function soundAoe(map: GridMap, origin: Point, volume: VolumeLevel): Aoe {
    return aoeFill(map, 'sound', origin, soundRadius(volume));
}

/**
 * How well a listener at `pos` hears the sound, or undefined when it does not
 * reach them. Quality drops by quarters of the sound's radius.
 */
export function hearingQuality(aoe: Aoe, pos: Point): HearingQuality | undefined {
    const ring = aoe.ringOf(pos);
    if (ring === undefined) {
        return undefined;
    }

    const radius = Math.max(aoe.rings.length - 1, 1);
    const ratio = ring / radius;

    if (ratio <= 0.25) {
        return 'clearly';
    } else if (ratio <= 0.5) {
        return 'distinctly';
    } else if (ratio <= 0.75) {
        return 'faintly';
    } else {
        return 'barely';
    }
}

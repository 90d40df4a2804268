import type { Point, VolumeLevel } from '../../schema/grid.js';

/** Effective distance added for each short wall a sightline peeks over */
export const SHORT_WALL_PEEK_COST = 1;

/**
 * Area effects reach cells that are walled off in both directions only within
 * `radius - AOE_DAMPENING_MARGIN` of the origin.
 */
export const AOE_DAMPENING_MARGIN = 2;

/** Neighbor order used by reachability queries */
export const NEIGHBOR_OFFSETS: readonly Point[] = [
    { x: 1, y: 0 },
    { x: 1, y: 1 },
    { x: 0, y: 1 },
    { x: -1, y: 1 },
    { x: -1, y: 0 },
    { x: -1, y: -1 },
    { x: 0, y: -1 },
    { x: 1, y: -1 }
];

/**
 * How many cells a sound carries, by volume.
 * Whispers barely leave the speaker's neighborhood; shouts fill a room.
 */
export const SOUND_RADIUS: Record<VolumeLevel, number> = {
    whisper: 2,
    talk: 4,
    shout: 8
};

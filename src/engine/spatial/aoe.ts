/**
 * Area-of-effect bucketing.
 *
 * @module spatial/aoe
 */

import type { AoeEffect, Point } from '../../schema/grid.js';
import { logger } from '../../utils/logger.js';
import { PreconditionError } from '../errors.js';
import { isBlockedAlong } from './blocking.js';
import { AOE_DAMPENING_MARGIN } from './constants.js';
import { distance, posKey, samePos, subPos } from './geometry.js';
import type { GridMap } from './map.js';
import { floodFill } from './pathfinding.js';

const log = logger.child('Aoe');

/**
 * Cells covered by one effect, bucketed into rings: `rings[d]` holds the cells
 * at distance d from the origin.
 */
export class Aoe {
    constructor(
        public readonly effect: AoeEffect,
        public readonly rings: Point[][]
    ) { }

    /**
     * All covered cells, ring by ring
     */
    positions(): Point[] {
        return this.rings.flat();
    }

    /**
     * Ring index holding `pos`, or undefined when the effect does not reach it
     */
    ringOf(pos: Point): number | undefined {
        const index = this.rings.findIndex(ring => ring.some(cell => samePos(cell, pos)));
        return index === -1 ? undefined : index;
    }

    covers(pos: Point): boolean {
        return this.ringOf(pos) !== undefined;
    }
}

/**
 * Flood fill from `origin`, then bucket each reached cell by distance.
 *
 * A cell walled off from the origin in both directions (the line there and the
 * line back are both obstructed) only receives the effect within
 * `radius - AOE_DAMPENING_MARGIN` of the origin.
 */
export function aoeFill(map: GridMap, effect: AoeEffect, origin: Point, radius: number): Aoe {
    if (!Number.isInteger(radius) || radius < 0) {
        throw new PreconditionError(`AoE radius must be a non-negative integer, got ${radius}`, origin);
    }

    const flood = floodFill(map, origin, radius);

    const rings: Point[][] = Array.from({ length: radius + 1 }, () => []);
    const blockedRadius = Math.max(radius - AOE_DAMPENING_MARGIN, 0);

    for (const pos of flood) {
        const dist = distance(origin, pos);

        const to = subPos(pos, origin);
        const isBlockedTo = isBlockedAlong(map, origin, to.x, to.y) !== undefined;

        const from = subPos(origin, pos);
        const isBlockedFrom = isBlockedAlong(map, pos, from.x, from.y) !== undefined;

        if (!(isBlockedTo && isBlockedFrom) || dist <= blockedRadius) {
            rings[dist].push(pos);
        }
    }

    log.debug('Area filled', { effect, origin: posKey(origin), radius, flooded: flood.length });
    return new Aoe(effect, rings);
}

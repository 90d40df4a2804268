/**
 * Field of view.
 *
 * The canonical answer walks rasterized lines between observer and target.
 * Short walls can be peeked over at a distance cost, anything else stops the
 * walk. Both directions are walked, and targets whose neighboring sightline is
 * occluded are culled so no isolated cell shows through a wall.
 *
 * @module spatial/fov
 */

import type { Direction, Point } from '../../schema/grid.js';
import { isBlockedAlong } from './blocking.js';
import { SHORT_WALL_PEEK_COST } from './constants.js';
import { distance, line, posKey, samePos, subPos } from './geometry.js';
import type { GridMap } from './map.js';

export interface FovOptions {
    /** A crouching observer cannot see over short walls */
    crouching?: boolean;
}

/**
 * Walk from `start` toward `end` and return the last cell seen.
 *
 * Each short wall crossed costs the distance walked to reach the cell past it
 * plus SHORT_WALL_PEEK_COST. The walk stops before tile occupancy, tall walls,
 * short walls while crouching, or once the effective distance exceeds `maxDist`.
 */
export function fovLine(map: GridMap, start: Point, end: Point, maxDist: number, crouching: boolean): Point {
    let current = start;
    let effectiveDistance = 0;

    while (!samePos(current, end)) {
        const offset = subPos(end, current);
        const blocked = isBlockedAlong(map, current, offset.x, offset.y);

        if (!blocked) {
            effectiveDistance += distance(current, end);
            return effectiveDistance <= maxDist ? end : current;
        }

        const canPeek = !crouching && !blocked.blockedTile && blocked.wallType === 'short';
        if (!canPeek) {
            return blocked.startPos;
        }

        effectiveDistance += distance(current, blocked.endPos) + SHORT_WALL_PEEK_COST;
        if (effectiveDistance > maxDist) {
            return blocked.startPos;
        }

        current = blocked.endPos;
    }

    return current;
}

/**
 * A target three or more cells away is only kept if the cell before it on the
 * direct line is itself visible from `start`.
 */
function needsCulling(map: GridMap, start: Point, end: Point, radius: number, options: FovOptions): boolean {
    const direct = line(start, end);
    if (direct.length < 3) {
        return false;
    }

    const nextToLast = direct[direct.length - 2];
    return !isInFov(map, start, nextToLast, radius, options);
}

/**
 * Whether `observer` can see `target` within `radius`.
 *
 * - Same cell: always visible
 * - Either cell off the map, or distance >= radius: not visible
 * - Visible when the forward walk reaches the target, or the reverse walk
 *   reaches the observer, or the forward walk stops right in front of a
 *   sight-blocking target (its near face is visible)
 * - Artifact culling is then applied in both directions
 */
export function isInFov(map: GridMap, observer: Point, target: Point, radius: number, options: FovOptions = {}): boolean {
    if (samePos(observer, target)) {
        return true;
    }

    if (!map.isWithinBounds(observer) || !map.isWithinBounds(target)) {
        return false;
    }

    if (distance(observer, target) >= radius) {
        return false;
    }

    const crouching = options.crouching ?? false;
    const forwardEnd = fovLine(map, observer, target, radius, crouching);

    let visible: boolean;
    if (samePos(forwardEnd, target)) {
        visible = true;
    } else {
        const visibleBack = samePos(fovLine(map, target, observer, radius, crouching), observer);
        const atWallFace = distance(forwardEnd, target) === 1 && map.get(target).blockSight;
        visible = visibleBack || atWallFace;
    }

    if (visible) {
        visible = !(needsCulling(map, observer, target, radius, options) ||
            needsCulling(map, target, observer, radius, options));
    }

    return visible;
}

/**
 * Alternate mode backed by the shadow-cast buffer. The buffer must agree, and
 * the straight line must not be obstructed before the target, except by the
 * target's own sight-blocking face.
 */
export function isInFovBuffered(map: GridMap, observer: Point, target: Point, radius: number): boolean {
    if (samePos(observer, target)) {
        return true;
    }

    if (!map.isWithinBounds(observer) || !map.isWithinBounds(target)) {
        return false;
    }

    if (distance(observer, target) >= radius) {
        return false;
    }

    map.ensureFov(observer, radius);

    const offset = subPos(target, observer);
    const blocked = isBlockedAlong(map, observer, offset.x, offset.y);

    let blockedByWall = false;
    if (blocked) {
        const atTargetFace = samePos(blocked.endPos, target) && map.get(target).blockSight;
        blockedByWall = !atTargetFace;
    }

    return !blockedByWall && map.isVisibleInBuffer(target);
}

/**
 * Visibility limited to the half-plane in front of an observer facing `facing`.
 * Cells level with the observer count as in front for orthogonal facings.
 */
export function isInFovDirection(
    map: GridMap,
    observer: Point,
    target: Point,
    radius: number,
    facing: Direction
): boolean {
    if (samePos(observer, target)) {
        return true;
    }

    if (!isInFov(map, observer, target, radius)) {
        return false;
    }

    const diff = subPos(target, observer);

    switch (facing) {
        case 'up':
            return diff.y <= 0;
        case 'down':
            return diff.y >= 0;
        case 'left':
            return diff.x <= 0;
        case 'right':
            return diff.x >= 0;
        case 'down_left':
            return diff.x - diff.y < 0;
        case 'down_right':
            return diff.x + diff.y >= 0;
        case 'up_left':
            return diff.x + diff.y <= 0;
        case 'up_right':
            return diff.x - diff.y > 0;
        case 'center':
            return true;
    }
}

/**
 * In-bounds cells closer than `radius` that lie on some line from `start` to
 * the edge of its bounding square. Each cell appears once.
 */
export function posInRadius(map: GridMap, start: Point, radius: number): Point[] {
    const seen = new Set<string>();
    const result: Point[] = [];

    for (let x = start.x - radius; x < start.x + radius; x++) {
        for (let y = start.y - radius; y < start.y + radius; y++) {
            for (const pos of line(start, { x, y })) {
                const key = posKey(pos);
                if (distance(start, pos) < radius && map.isWithinBounds(pos) && !seen.has(key)) {
                    seen.add(key);
                    result.push(pos);
                }
            }
        }
    }

    return result;
}

/**
 * Mark every cell the observer can currently see as explored and return them
 */
export function revealVisible(map: GridMap, observer: Point, radius: number): Point[] {
    const revealed: Point[] = [];

    if (!map.isWithinBounds(observer)) {
        return revealed;
    }

    const minX = Math.max(0, observer.x - radius);
    const maxX = Math.min(map.width - 1, observer.x + radius);
    const minY = Math.max(0, observer.y - radius);
    const maxY = Math.min(map.height - 1, observer.y + radius);

    for (let y = minY; y <= maxY; y++) {
        for (let x = minX; x <= maxX; x++) {
            const pos = { x, y };
            if (isInFov(map, observer, pos, radius)) {
                map.get(pos).explored = true;
                revealed.push(pos);
            }
        }
    }

    return revealed;
}

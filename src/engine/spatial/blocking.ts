/**
 * Movement blocking resolution.
 *
 * Decides whether a single step between adjacent cells is obstructed by tile
 * occupancy, an edge wall, or the diagonal corner rule, and generalizes that
 * to multi-cell lines.
 *
 * @module spatial/blocking
 */

import type { Direction, Point, Wall } from '../../schema/grid.js';
import { PreconditionError } from '../errors.js';
import { directionFromDelta } from './direction.js';
import { addPos, distance, line, moveX, moveY } from './geometry.js';
import type { GridMap } from './map.js';

/**
 * One obstructed single-step move
 */
export interface Blocked {
    startPos: Point;
    endPos: Point;
    direction: Direction;
    /** Obstruction came from the target cell itself (occupied or off the map) */
    blockedTile: boolean;
    /** Edge wall that obstructed the move, 'empty' when none did */
    wallType: Wall;
}

// ============================================================
// EDGE TESTS
// ============================================================

/*
 * Each test is true when the edge on that side of `pos` carries a wall or the
 * neighbor across it is occupied. Anything off the map counts as blocked.
 */

export function blockedLeft(map: GridMap, pos: Point): boolean {
    const offset = moveX(pos, -1);
    if (!map.isWithinBounds(offset) || !map.isWithinBounds(pos)) {
        return true;
    }

    return map.get(pos).leftWall !== 'empty' || map.get(offset).blocked;
}

export function blockedRight(map: GridMap, pos: Point): boolean {
    const offset = moveX(pos, 1);
    if (!map.isWithinBounds(pos) || !map.isWithinBounds(offset)) {
        return true;
    }

    return map.get(offset).leftWall !== 'empty' || map.get(offset).blocked;
}

export function blockedDown(map: GridMap, pos: Point): boolean {
    const offset = moveY(pos, 1);
    if (!map.isWithinBounds(pos) || !map.isWithinBounds(offset)) {
        return true;
    }

    return map.get(pos).bottomWall !== 'empty' || map.get(offset).blocked;
}

export function blockedUp(map: GridMap, pos: Point): boolean {
    const offset = moveY(pos, -1);
    if (!map.isWithinBounds(pos) || !map.isWithinBounds(offset)) {
        return true;
    }

    return map.get(offset).bottomWall !== 'empty' || map.get(offset).blocked;
}

function leftWallAt(map: GridMap, pos: Point): Wall | undefined {
    return map.isWithinBounds(pos) ? map.get(pos).leftWall : undefined;
}

function bottomWallAt(map: GridMap, pos: Point): Wall | undefined {
    return map.isWithinBounds(pos) ? map.get(pos).bottomWall : undefined;
}

// ============================================================
// SINGLE STEP
// ============================================================

/**
 * Check whether stepping from `pos` to the adjacent `nextPos` is obstructed.
 *
 * Diagonal steps run four corner sub-checks in a fixed order. A firing check
 * marks the move blocked but does not stop the others: a later check may
 * overwrite the recorded wall type with what it saw. Callers rely on that
 * precedence, so the order below is part of the contract.
 *
 * @throws PreconditionError when the cells are not 8-adjacent
 */
export function moveBlocked(map: GridMap, pos: Point, nextPos: Point): Blocked | undefined {
    if (distance(pos, nextPos) !== 1) {
        throw new PreconditionError('Single-step blocking check needs adjacent cells', pos, nextPos);
    }

    const dx = nextPos.x - pos.x;
    const dy = nextPos.y - pos.y;
    const direction = directionFromDelta(dx, dy);

    const blocked: Blocked = {
        startPos: pos,
        endPos: nextPos,
        direction,
        blockedTile: false,
        wallType: 'empty'
    };

    // Set when any check fires; the wall type may still be refined afterwards
    let foundBlocker = false;

    // Nothing past the edge of the map can be inspected, so stop here
    if (!map.isWithinBounds(nextPos)) {
        blocked.blockedTile = true;
        return blocked;
    }

    if (map.get(nextPos).blocked) {
        blocked.blockedTile = true;
        foundBlocker = true;
    }

    const xMoved = { x: nextPos.x, y: pos.y };
    const yMoved = { x: pos.x, y: nextPos.y };

    // Records a wall type when the owning cell is on the map
    const record = (wall: Wall | undefined): void => {
        if (wall !== undefined) {
            blocked.wallType = wall;
        }
    };

    switch (direction) {
        case 'left':
        case 'right': {
            const wallPos = dx >= 1 ? nextPos : pos;
            const wall = leftWallAt(map, wallPos);
            if (wall !== undefined && wall !== 'empty') {
                blocked.wallType = wall;
                foundBlocker = true;
            }
            break;
        }

        case 'up':
        case 'down': {
            const wallPos = dy >= 1 ? pos : nextPos;
            const wall = bottomWallAt(map, wallPos);
            if (wall !== undefined && wall !== 'empty') {
                blocked.wallType = wall;
                foundBlocker = true;
            }
            break;
        }

        case 'down_right': {
            if (blockedRight(map, pos) && blockedDown(map, pos)) {
                record(bottomWallAt(map, pos));
                foundBlocker = true;
            }

            if (blockedRight(map, moveY(pos, -1)) && blockedDown(map, moveX(pos, 1))) {
                record(bottomWallAt(map, addPos(pos, { x: -1, y: 1 })));
                foundBlocker = true;
            }

            if (blockedRight(map, pos) && blockedRight(map, yMoved)) {
                record(leftWallAt(map, moveX(pos, 1)));
                foundBlocker = true;
            }

            if (blockedDown(map, pos) && blockedDown(map, xMoved)) {
                record(bottomWallAt(map, pos));
                foundBlocker = true;
            }
            break;
        }

        case 'up_right': {
            if (blockedUp(map, pos) && blockedRight(map, pos)) {
                record(bottomWallAt(map, moveY(pos, -1)));
                foundBlocker = true;
            }

            if (blockedUp(map, moveX(pos, 1)) && blockedRight(map, moveY(pos, -1))) {
                record(bottomWallAt(map, addPos(pos, { x: 1, y: -1 })));
                foundBlocker = true;
            }

            if (blockedRight(map, pos) && blockedRight(map, yMoved)) {
                record(leftWallAt(map, moveX(pos, 1)));
                foundBlocker = true;
            }

            if (blockedUp(map, pos) && blockedUp(map, xMoved)) {
                record(bottomWallAt(map, moveY(pos, -1)));
                foundBlocker = true;
            }
            break;
        }

        case 'down_left': {
            if (blockedLeft(map, pos) && blockedDown(map, pos)) {
                record(leftWallAt(map, pos));
                foundBlocker = true;
            }

            // Reads the cell up and to the right of pos, not the far corner
            if (blockedLeft(map, moveY(pos, 1)) && blockedDown(map, moveX(pos, -1))) {
                record(leftWallAt(map, addPos(pos, { x: 1, y: -1 })));
                foundBlocker = true;
            }

            if (blockedLeft(map, pos) && blockedLeft(map, yMoved)) {
                record(leftWallAt(map, pos));
                foundBlocker = true;
            }

            if (blockedDown(map, pos) && blockedDown(map, xMoved)) {
                record(bottomWallAt(map, pos));
                foundBlocker = true;
            }
            break;
        }

        case 'up_left': {
            if (blockedLeft(map, moveY(pos, -1)) && blockedUp(map, moveX(pos, -1))) {
                record(leftWallAt(map, addPos(pos, { x: -1, y: -1 })));
                foundBlocker = true;
            }

            if (blockedLeft(map, pos) && blockedUp(map, pos)) {
                record(leftWallAt(map, pos));
                foundBlocker = true;
            }

            if (blockedLeft(map, pos) && blockedLeft(map, yMoved)) {
                record(leftWallAt(map, pos));
                foundBlocker = true;
            }

            if (blockedUp(map, pos) && blockedUp(map, xMoved)) {
                record(bottomWallAt(map, moveY(pos, -1)));
                foundBlocker = true;
            }
            break;
        }

        case 'center':
            // distance() === 1 rules this out
            throw new PreconditionError('Blocking check with no movement', pos, nextPos);
    }

    return foundBlocker ? blocked : undefined;
}

// ============================================================
// LINES AND PATHS
// ============================================================

/**
 * Check every step of a path, returning the first obstruction
 */
export function pathBlocked(map: GridMap, path: readonly Point[]): Blocked | undefined {
    for (let i = 1; i < path.length; i++) {
        const blocked = moveBlocked(map, path[i - 1], path[i]);
        if (blocked) {
            return blocked;
        }
    }

    return undefined;
}

/**
 * Check the rasterized line from `start` to `start + (dx, dy)`.
 * A zero offset is never blocked.
 */
export function isBlockedAlong(map: GridMap, start: Point, dx: number, dy: number): Blocked | undefined {
    if (dx === 0 && dy === 0) {
        return undefined;
    }

    const end = { x: start.x + dx, y: start.y + dy };
    return pathBlocked(map, [start, ...line(start, end)]);
}

/**
 * True when no cell on the line from `start` to `end` is occupied. Cells off
 * the map count as occupied. Edge walls are ignored.
 */
export function pathClearOfObstacles(map: GridMap, start: Point, end: Point): boolean {
    return line(start, end).every(pos => map.isWithinBounds(pos) && !map.get(pos).blocked);
}

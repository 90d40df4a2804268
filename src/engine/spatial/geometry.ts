/**
 * Grid geometry: line rasterization, distances and point arithmetic.
 *
 * All distances in the core are rasterized-line lengths, which on an 8-connected
 * grid equal the Chebyshev distance.
 *
 * @module spatial/geometry
 */

import type { Point } from '../../schema/grid.js';

export function samePos(a: Point, b: Point): boolean {
    return a.x === b.x && a.y === b.y;
}

/**
 * Key for sets and maps ("x,y" format)
 */
export function posKey(pos: Point): string {
    return `${pos.x},${pos.y}`;
}

export function addPos(a: Point, b: Point): Point {
    return { x: a.x + b.x, y: a.y + b.y };
}

export function subPos(a: Point, b: Point): Point {
    return { x: a.x - b.x, y: a.y - b.y };
}

export function moveX(pos: Point, offset: number): Point {
    return { x: pos.x + offset, y: pos.y };
}

export function moveY(pos: Point, offset: number): Point {
    return { x: pos.x, y: pos.y + offset };
}

/**
 * Sign of a value as -1, 0 or 1 (never -0)
 */
export function signedness(value: number): number {
    if (value > 0) return 1;
    if (value < 0) return -1;
    return 0;
}

/**
 * Bresenham line from start to end. The start cell is excluded, the end cell
 * included, so `line(p, p)` is empty and the length equals the distance.
 *
 * @example
 * ```typescript
 * line({ x: 0, y: 0 }, { x: 5, y: 2 });
 * // [(1,0), (2,1), (3,1), (4,2), (5,2)]
 * ```
 */
export function line(start: Point, end: Point): Point[] {
    const points: Point[] = [];

    const stepX = signedness(end.x - start.x);
    const stepY = signedness(end.y - start.y);
    const deltaX = Math.abs(end.x - start.x);
    const deltaY = Math.abs(end.y - start.y);

    let x = start.x;
    let y = start.y;

    if (deltaX > deltaY) {
        let error = deltaX;
        for (let i = 0; i < deltaX; i++) {
            x += stepX;
            error -= 2 * deltaY;
            if (error < 0) {
                y += stepY;
                error += 2 * deltaX;
            }
            points.push({ x, y });
        }
    } else {
        let error = deltaY;
        for (let i = 0; i < deltaY; i++) {
            y += stepY;
            error -= 2 * deltaX;
            if (error < 0) {
                x += stepX;
                error += 2 * deltaY;
            }
            points.push({ x, y });
        }
    }

    return points;
}

/**
 * Number of cells on the line between two points (Chebyshev distance)
 */
export function distance(a: Point, b: Point): number {
    return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

/**
 * The neighbor of `start` one step toward `end`
 */
export function inDirectionOf(start: Point, end: Point): Point {
    const delta = subPos(end, start);
    return addPos(start, { x: signedness(delta.x), y: signedness(delta.y) });
}

/**
 * The cell `steps` cells along the line toward `end`, or `end` when the line is shorter
 */
export function moveTowards(start: Point, end: Point, steps: number): Point {
    if (steps <= 0) return start;
    const path = line(start, end);
    return path[steps - 1] ?? end;
}

/**
 * The last cell before `end` on the line from `start`. Already-adjacent points return `start`.
 */
export function moveNextTo(start: Point, end: Point): Point {
    if (distance(start, end) <= 1) {
        return start;
    }

    const path = line(start, end);
    return path[path.length - 2] ?? start;
}

/**
 * Whether a delta moves along exactly one axis
 */
export function isOrdinal(delta: Point): boolean {
    return (delta.x === 0 && delta.y !== 0) ||
        (delta.y === 0 && delta.x !== 0);
}

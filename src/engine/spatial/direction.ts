/**
 * Compass directions and movement reach.
 *
 * @module spatial/direction
 */

import type { Direction, Point } from '../../schema/grid.js';
import { line, signedness } from './geometry.js';

/** Every direction a mover can choose, including standing still */
export const MOVE_DIRECTIONS: readonly Direction[] = [
    'left',
    'right',
    'up',
    'down',
    'down_left',
    'down_right',
    'up_left',
    'up_right',
    'center'
];

const DIRECTION_DELTAS: Record<Direction, Point> = {
    left: { x: -1, y: 0 },
    right: { x: 1, y: 0 },
    up: { x: 0, y: -1 },
    down: { x: 0, y: 1 },
    down_left: { x: -1, y: 1 },
    down_right: { x: 1, y: 1 },
    up_left: { x: -1, y: -1 },
    up_right: { x: 1, y: -1 },
    center: { x: 0, y: 0 }
};

/**
 * Classify a signed delta. Each component is clamped to -1, 0 or 1 first, so
 * `directionFromDelta(3, -7)` is `'up_right'`. A zero delta is `'center'`.
 */
export function directionFromDelta(dx: number, dy: number): Direction {
    const sx = signedness(dx);
    const sy = signedness(dy);

    if (sx === 0 && sy === 0) return 'center';
    if (sx === 0) return sy < 0 ? 'up' : 'down';
    if (sy === 0) return sx < 0 ? 'left' : 'right';
    if (sx > 0) return sy > 0 ? 'down_right' : 'up_right';
    return sy > 0 ? 'down_left' : 'up_left';
}

export function directionToDelta(direction: Direction): Point {
    return { ...DIRECTION_DELTAS[direction] };
}

export function isDiagonal(direction: Direction): boolean {
    return direction === 'down_left' || direction === 'down_right' ||
        direction === 'up_left' || direction === 'up_right';
}

// ============================================================
// REACH
// ============================================================

export type ReachKind = 'single' | 'diag' | 'horiz';

/**
 * How far, and along which axes, a mover can travel in one action.
 *
 * - single: any of the 8 directions, `dist` cells
 * - diag: diagonals only
 * - horiz: orthogonal directions only
 */
export class Reach {
    constructor(
        public readonly kind: ReachKind,
        public readonly dist: number
    ) { }

    static single(dist: number): Reach {
        return new Reach('single', dist);
    }

    static diag(dist: number): Reach {
        return new Reach('diag', dist);
    }

    static horiz(dist: number): Reach {
        return new Reach('horiz', dist);
    }

    /**
     * Offset reached by moving in a direction, or undefined when this reach
     * cannot move that way.
     */
    moveWithReach(direction: Direction): Point | undefined {
        const unit = DIRECTION_DELTAS[direction];
        const offset = { x: unit.x * this.dist, y: unit.y * this.dist };

        switch (this.kind) {
            case 'single':
                return offset;
            case 'diag':
                return direction === 'center' || isDiagonal(direction) ? offset : undefined;
            case 'horiz':
                return direction !== 'center' && !isDiagonal(direction) ? offset : undefined;
        }
    }

    /**
     * Every cell offset swept by this reach, walking the line out to each end point.
     * Diag and horiz sweep distances 1 through dist - 1.
     */
    offsets(): Point[] {
        const endPoints: Point[] = [];

        switch (this.kind) {
            case 'single': {
                const d = this.dist;
                endPoints.push(
                    { x: 0, y: d }, { x: -d, y: d }, { x: -d, y: 0 },
                    { x: -d, y: -d }, { x: 0, y: -d }, { x: d, y: -d },
                    { x: d, y: 0 }, { x: d, y: d }
                );
                break;
            }

            case 'horiz':
                for (let d = 1; d < this.dist; d++) {
                    endPoints.push({ x: d, y: 0 }, { x: 0, y: d }, { x: -d, y: 0 }, { x: 0, y: -d });
                }
                break;

            case 'diag':
                for (let d = 1; d < this.dist; d++) {
                    endPoints.push({ x: d, y: d }, { x: -d, y: d }, { x: d, y: -d }, { x: -d, y: -d });
                }
                break;
        }

        const origin = { x: 0, y: 0 };
        return endPoints.flatMap(end => line(origin, end));
    }
}

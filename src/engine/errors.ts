import type { Point } from '../schema/grid.js';

/**
 * Raised when a caller breaks a contract of the spatial core, e.g. asking for a
 * single-step check between cells that are not adjacent.
 */
export class PreconditionError extends Error {
    constructor(
        message: string,
        public start?: Point,
        public end?: Point
    ) {
        super(message);
        this.name = 'PreconditionError';
    }

    toString(): string {
        let msg = this.message;
        if (this.start !== undefined) {
            msg += ` (start: ${this.start.x},${this.start.y}`;
            if (this.end !== undefined) {
                msg += `; end: ${this.end.x},${this.end.y}`;
            }
            msg += ')';
        }
        return msg;
    }
}

/**
 * Raised when a serialized map does not match the tile schema
 */
export class MapFormatError extends Error {
    constructor(
        message: string,
        public issues: string[] = []
    ) {
        super(message);
        this.name = 'MapFormatError';
    }
}

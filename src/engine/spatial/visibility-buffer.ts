/**
 * Shadow-cast visibility buffer.
 *
 * Holds a per-cell transparency grid and the set of cells lit from the last
 * observer. The line-walk FOV is the authoritative answer; this buffer is a
 * secondary signal for the buffered FOV mode.
 *
 * @module spatial/visibility-buffer
 */

import { FOV } from 'rot-js';
import type { Point } from '../../schema/grid.js';

export class VisibilityBuffer {
    private transparent: Uint8Array;
    private visible: Uint8Array;

    constructor(
        public readonly width: number,
        public readonly height: number
    ) {
        this.transparent = new Uint8Array(width * height).fill(1);
        this.visible = new Uint8Array(width * height);
    }

    private index(x: number, y: number): number {
        return y * this.width + x;
    }

    private inBounds(x: number, y: number): boolean {
        return x >= 0 && x < this.width && y >= 0 && y < this.height;
    }

    setTransparent(x: number, y: number, transparent: boolean): void {
        if (!this.inBounds(x, y)) return;
        this.transparent[this.index(x, y)] = transparent ? 1 : 0;
    }

    isTransparent(x: number, y: number): boolean {
        return this.inBounds(x, y) && this.transparent[this.index(x, y)] === 1;
    }

    /**
     * Recompute lit cells from `origin` out to `radius` rings. Opaque cells on
     * the edge of the lit area are themselves lit.
     */
    compute(origin: Point, radius: number): void {
        this.visible.fill(0);

        const fov = new FOV.PreciseShadowcasting((x, y) => this.isTransparent(x, y));
        fov.compute(origin.x, origin.y, radius, (x, y) => {
            if (this.inBounds(x, y)) {
                this.visible[this.index(x, y)] = 1;
            }
        });
    }

    isVisible(x: number, y: number): boolean {
        return this.inBounds(x, y) && this.visible[this.index(x, y)] === 1;
    }
}

/**
 * GridMap - the tile grid and its visibility state.
 *
 * Tiles live in one contiguous row-major array addressed by (x, y). The map
 * also owns the shadow-cast visibility buffer, keyed by the last observer
 * position and radius; any query for a different pair recomputes it.
 * Sight-relevant edits are not tracked: call refreshVisibility() after them.
 *
 * @module spatial/map
 */

import {
    GridDimensionsSchema,
    SerializedMapSchema,
    type AoeEffect,
    type Direction,
    type Point,
    type SerializedMap,
    type Tile,
    isSingleGlyph
} from '../../schema/grid.js';
import { MapFormatError, PreconditionError } from '../errors.js';
import { logger } from '../../utils/logger.js';
import { type Aoe, aoeFill } from './aoe.js';
import {
    type Blocked,
    isBlockedAlong,
    moveBlocked,
    pathBlocked,
    pathClearOfObstacles
} from './blocking.js';
import {
    type FovOptions,
    isInFov,
    isInFovBuffered,
    isInFovDirection,
    posInRadius,
    revealVisible
} from './fov.js';
import { floodFill, reachableNeighbors, shortestPath, type PathOptions } from './pathfinding.js';
import { Tiles } from './tile.js';
import { VisibilityBuffer } from './visibility-buffer.js';

const log = logger.child('GridMap');

function checkGlyph(glyph: string): void {
    if (!isSingleGlyph(glyph)) {
        throw new PreconditionError(`Glyph must be a single character, got "${glyph}"`);
    }
}

export class GridMap {
    readonly width: number;
    readonly height: number;

    private tiles: Tile[];
    private visibility: VisibilityBuffer;
    private fovPos: Point = { x: 0, y: 0 };
    private fovRadius = 1;

    private constructor(width: number, height: number, tiles: Tile[]) {
        this.width = width;
        this.height = height;
        this.tiles = tiles;
        this.visibility = new VisibilityBuffer(width, height);
        this.refreshVisibility();
    }

    // ============================================================
    // CONSTRUCTION
    // ============================================================

    /**
     * A map of empty floor tiles
     *
     * @throws PreconditionError when either dimension is not a positive integer
     */
    static fromDims(width: number, height: number): GridMap {
        const dims = GridDimensionsSchema.safeParse({ width, height });
        if (!dims.success) {
            throw new PreconditionError(
                `Invalid map dimensions ${width}x${height}: ${dims.error.issues.map(i => i.message).join('; ')}`
            );
        }

        const tiles: Tile[] = [];
        for (let i = 0; i < width * height; i++) {
            tiles.push(Tiles.empty());
        }
        return new GridMap(width, height, tiles);
    }

    /**
     * Build from x-major columns: `columns[x][y]`. Every column must have the same length.
     */
    static fromColumns(columns: Tile[][]): GridMap {
        const width = columns.length;
        const height = columns[0]?.length ?? 0;

        if (columns.some(column => column.length !== height)) {
            throw new PreconditionError('All map columns must have the same height');
        }

        const map = GridMap.fromDims(width, height);
        for (let x = 0; x < width; x++) {
            for (let y = 0; y < height; y++) {
                map.tiles[map.index({ x, y })] = { ...columns[x][y] };
            }
        }
        map.refreshVisibility();
        return map;
    }

    /**
     * Load a map written by toJSON()
     *
     * @throws MapFormatError when the data does not match the serialized map schema
     */
    static fromJSON(data: unknown): GridMap {
        const parsed = SerializedMapSchema.safeParse(data);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
            throw new MapFormatError(`Invalid serialized map (${issues.length} issue(s))`, issues);
        }

        const { width, height, tiles } = parsed.data;
        return new GridMap(width, height, tiles.map(tile => ({ ...tile })));
    }

    toJSON(): SerializedMap {
        return {
            width: this.width,
            height: this.height,
            tiles: this.tiles.map(tile => ({ ...tile }))
        };
    }

    // ============================================================
    // CELL ACCESS
    // ============================================================

    private index(pos: Point): number {
        return pos.y * this.width + pos.x;
    }

    isWithinBounds(pos: Point): boolean {
        return pos.x >= 0 && pos.x < this.width && pos.y >= 0 && pos.y < this.height;
    }

    size(): [number, number] {
        return [this.width, this.height];
    }

    /**
     * The live tile at `pos`. Mutating it edits the map.
     *
     * @throws PreconditionError when `pos` is off the map
     */
    get(pos: Point): Tile {
        if (!this.isWithinBounds(pos)) {
            throw new PreconditionError(`Cell ${pos.x},${pos.y} is outside the ${this.width}x${this.height} map`, pos);
        }
        return this.tiles[this.index(pos)];
    }

    /**
     * Replace the tile at `pos` with a copy of `tile`
     */
    set(pos: Point, tile: Tile): void {
        this.get(pos);
        checkGlyph(tile.glyph);
        this.tiles[this.index(pos)] = { ...tile };
    }

    update(pos: Point, patch: Partial<Tile>): void {
        const tile = this.get(pos);
        if (patch.glyph !== undefined) {
            checkGlyph(patch.glyph);
        }
        Object.assign(tile, patch);
    }

    isEmpty(pos: Point): boolean {
        return this.get(pos).tileType === 'empty';
    }

    /**
     * Every cell position, row by row
     */
    positions(): Point[] {
        const all: Point[] = [];
        for (let y = 0; y < this.height; y++) {
            for (let x = 0; x < this.width; x++) {
                all.push({ x, y });
            }
        }
        return all;
    }

    // ============================================================
    // VISIBILITY BUFFER
    // ============================================================

    /**
     * Override a single cell's transparency in the buffer without touching the tile
     */
    setTransparent(x: number, y: number, transparent: boolean): void {
        this.visibility.setTransparent(x, y, transparent);
    }

    /**
     * Copy every tile's blockSight into the buffer and recompute it for the
     * last observer. Call after edits that change what blocks sight.
     */
    refreshVisibility(): void {
        for (let y = 0; y < this.height; y++) {
            for (let x = 0; x < this.width; x++) {
                this.visibility.setTransparent(x, y, !this.tiles[this.index({ x, y })].blockSight);
            }
        }

        this.computeFov(this.fovPos, this.fovRadius);
    }

    computeFov(pos: Point, radius: number): void {
        log.debug('Recomputing visibility buffer', { x: pos.x, y: pos.y, radius });
        this.fovPos = { ...pos };
        this.fovRadius = radius;
        this.visibility.compute(pos, radius);
    }

    /**
     * Make sure the buffer describes (pos, radius), recomputing only on a change
     */
    ensureFov(pos: Point, radius: number): void {
        if (this.fovPos.x !== pos.x || this.fovPos.y !== pos.y || this.fovRadius !== radius) {
            this.computeFov(pos, radius);
        }
    }

    /**
     * Buffer lookup for the last computed observer. May be stale after edits.
     */
    isVisibleInBuffer(pos: Point): boolean {
        return this.visibility.isVisible(pos.x, pos.y);
    }

    fovState(): { pos: Point; radius: number } {
        return { pos: { ...this.fovPos }, radius: this.fovRadius };
    }

    // ============================================================
    // QUERIES
    // ============================================================

    moveBlocked(pos: Point, nextPos: Point): Blocked | undefined {
        return moveBlocked(this, pos, nextPos);
    }

    isBlockedAlong(start: Point, dx: number, dy: number): Blocked | undefined {
        return isBlockedAlong(this, start, dx, dy);
    }

    pathBlocked(path: readonly Point[]): Blocked | undefined {
        return pathBlocked(this, path);
    }

    pathClearOfObstacles(start: Point, end: Point): boolean {
        return pathClearOfObstacles(this, start, end);
    }

    isInFov(observer: Point, target: Point, radius: number, options?: FovOptions): boolean {
        return isInFov(this, observer, target, radius, options);
    }

    isInFovBuffered(observer: Point, target: Point, radius: number): boolean {
        return isInFovBuffered(this, observer, target, radius);
    }

    isInFovDirection(observer: Point, target: Point, radius: number, facing: Direction): boolean {
        return isInFovDirection(this, observer, target, radius, facing);
    }

    revealVisible(observer: Point, radius: number): Point[] {
        return revealVisible(this, observer, radius);
    }

    posInRadius(start: Point, radius: number): Point[] {
        return posInRadius(this, start, radius);
    }

    reachableNeighbors(pos: Point): Point[] {
        return reachableNeighbors(this, pos);
    }

    shortestPath(start: Point, goal: Point, options?: PathOptions): Point[] {
        return shortestPath(this, start, goal, options);
    }

    floodFill(origin: Point, radius: number): Point[] {
        return floodFill(this, origin, radius);
    }

    aoeFill(effect: AoeEffect, origin: Point, radius: number): Aoe {
        return aoeFill(this, effect, origin, radius);
    }
}

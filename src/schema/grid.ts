import { z } from 'zod';

/**
 * Integer cell coordinate on the grid
 */
export const PointSchema = z.object({
    x: z.number().int(),
    y: z.number().int()
});
export type Point = z.infer<typeof PointSchema>;

/**
 * Edge wall classification, ordered empty < short < tall
 */
export const WallSchema = z.enum([
    'empty',  // Passable, no effect on sight
    'short',  // Blocks entry, can be seen over at a cost
    'tall'    // Blocks entry and sight
]);
export type Wall = z.infer<typeof WallSchema>;

export const TileTypeSchema = z.enum([
    'empty',
    'short_wall',
    'wall',
    'water',
    'exit'
]);
export type TileType = z.infer<typeof TileTypeSchema>;

/**
 * Cosmetic ground cover. Not geometry.
 */
export const SurfaceSchema = z.enum(['floor', 'rubble', 'grass']);
export type Surface = z.infer<typeof SurfaceSchema>;

export const DirectionSchema = z.enum([
    'left',
    'right',
    'up',
    'down',
    'down_left',
    'down_right',
    'up_left',
    'up_right',
    'center'
]);
export type Direction = z.infer<typeof DirectionSchema>;

/**
 * One grid cell.
 *
 * bottomWall is the edge between (x, y) and (x, y + 1); leftWall is the edge between
 * (x, y) and (x - 1, y). A cell owns neither its top nor its right edge.
 */
/** One code point, so astral characters count as a single glyph */
export function isSingleGlyph(glyph: string): boolean {
    return [...glyph].length === 1;
}

export const TileSchema = z.object({
    blocked: z.boolean(),
    blockSight: z.boolean(),
    explored: z.boolean(),
    tileType: TileTypeSchema,
    bottomWall: WallSchema,
    leftWall: WallSchema,
    glyph: z.string().refine(isSingleGlyph, 'Glyph must be a single character'),
    surface: SurfaceSchema
});
export type Tile = z.infer<typeof TileSchema>;

export const GridDimensionsSchema = z.object({
    width: z.number().int().positive('Map width must be positive'),
    height: z.number().int().positive('Map height must be positive')
});
export type GridDimensions = z.infer<typeof GridDimensionsSchema>;

/**
 * Persisted form of a map: row-major tiles, index = y * width + x
 */
export const SerializedMapSchema = GridDimensionsSchema.extend({
    tiles: z.array(TileSchema)
}).refine(
    (map) => map.tiles.length === map.width * map.height,
    (map) => ({ message: `Expected ${map.width * map.height} tiles, got ${map.tiles.length}`, path: ['tiles'] })
);
export type SerializedMap = z.infer<typeof SerializedMapSchema>;

export const AoeEffectSchema = z.enum(['sound']);
export type AoeEffect = z.infer<typeof AoeEffectSchema>;

export const VolumeLevelSchema = z.enum(['whisper', 'talk', 'shout']);
export type VolumeLevel = z.infer<typeof VolumeLevelSchema>;

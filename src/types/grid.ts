/**
 * Shared Type Definitions
 *
 * Common shapes exchanged between the data provider, the physics layer and the renderer.
 */

/**
 * 2D point in pixel coordinates
 */
export interface Vector2 {
    readonly x: number;
    readonly y: number;
}

/**
 * Axis-aligned box in pixel coordinates
 */
export interface Bounds {
    readonly left: number;
    readonly top: number;
    readonly right: number;
    readonly bottom: number;
}

/**
 * One source cell: an ordinal intensity bucket (0 = no brick) plus its raw magnitude
 */
export interface GridCell {
    readonly level: number;
    readonly count: number;
}

/**
 * Rectangular grid addressed as `cells[column][row]`
 */
export interface IntensityGrid {
    readonly columns: number;
    readonly rows: number;
    readonly cells: readonly (readonly GridCell[])[];
}

export const EMPTY_CELL: GridCell = { level: 0, count: 0 };

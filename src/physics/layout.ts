import type { EngineConfig } from 'config/game';
import { ConfigurationError } from 'config/game';
import type { Bounds, Vector2 } from 'types/grid';

export interface GridLayout {
    readonly columns: number;
    readonly rows: number;
    readonly cellSize: number;
    readonly cellSpacing: number;
    /** Full picture size including margins */
    readonly width: number;
    readonly height: number;
    /** Walls the ball bounces against; the bottom edge is the reflecting backstop */
    readonly walls: Bounds;
    /** Row index the paddle sits on, below the brick rows */
    readonly paddleRow: number;
    /** Pixel center of a (possibly fractional) grid coordinate */
    cellCenter(this: void, col: number, row: number): Vector2;
    /** Pixel rectangle of a grid cell */
    cellRect(this: void, col: number, row: number): Bounds;
}

export interface GridDimensions {
    readonly columns: number;
    readonly rows: number;
}

const requireDimension = (key: string, value: number): void => {
    if (!Number.isInteger(value) || value < 0) {
        throw new ConfigurationError(`Grid ${key} must be a non-negative integer (received ${value})`);
    }
};

export const createGridLayout = (dimensions: GridDimensions, geometry: EngineConfig['geometry']): GridLayout => {
    requireDimension('columns', dimensions.columns);
    requireDimension('rows', dimensions.rows);

    const { cellSize, cellSpacing, margins } = geometry;
    const block = cellSize + cellSpacing;
    const width = margins.left + dimensions.columns * block + margins.right;
    const height = margins.top + dimensions.rows * block + margins.bottom;

    const cellCenter: GridLayout['cellCenter'] = (col, row) => ({
        x: margins.left + col * block + cellSize / 2,
        y: margins.top + row * block + cellSize / 2,
    });

    const cellRect: GridLayout['cellRect'] = (col, row) => {
        const left = margins.left + col * block;
        const top = margins.top + row * block;
        return { left, top, right: left + cellSize, bottom: top + cellSize };
    };

    return Object.freeze({
        columns: dimensions.columns,
        rows: dimensions.rows,
        cellSize,
        cellSpacing,
        width,
        height,
        walls: Object.freeze({
            left: margins.left,
            top: margins.top,
            right: width - margins.right,
            bottom: height - geometry.backstopInset,
        }),
        paddleRow: dimensions.rows + geometry.paddleRowOffset,
        cellCenter,
        cellRect,
    });
};

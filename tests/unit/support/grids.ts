import type { IntensityGrid } from 'types/grid';

/**
 * Build a grid from per-column level lists: `levels[col][row]`. Counts are three per level.
 */
export const gridFromLevels = (levels: readonly (readonly number[])[], rows = levels[0]?.length ?? 0): IntensityGrid => ({
    columns: levels.length,
    rows,
    cells: levels.map((column) => column.map((level) => ({ level, count: level * 3 }))),
});

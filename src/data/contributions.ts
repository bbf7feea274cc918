import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { EMPTY_CELL, type GridCell, type IntensityGrid } from 'types/grid';

export class ContributionDataError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ContributionDataError';
    }
}

export interface ContributionDay {
    /** ISO date, `YYYY-MM-DD` */
    readonly date: string;
    readonly count: number;
    /** Intensity bucket 0-4 */
    readonly level: number;
}

export interface ContributionWeek {
    readonly days: readonly ContributionDay[];
}

export interface ContributionCalendar {
    readonly username: string;
    readonly totalContributions: number;
    readonly weeks: readonly ContributionWeek[];
    readonly startDate: string;
    readonly endDate: string;
}

const LEVEL_NAMES: Readonly<Record<string, number>> = {
    NONE: 0,
    FIRST_QUARTILE: 1,
    SECOND_QUARTILE: 2,
    THIRD_QUARTILE: 3,
    FOURTH_QUARTILE: 4,
};

/** Map a calendar level name to its bucket; unknown names count as empty */
export const parseContributionLevel = (name: string): number =>
    Object.hasOwn(LEVEL_NAMES, name) ? (LEVEL_NAMES[name] ?? 0) : 0;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/u;

const daySchema = z.object({
    date: z.string().regex(ISO_DATE, 'expected a YYYY-MM-DD date'),
    count: z.number().int().nonnegative(),
    level: z.number().int().min(0).max(4),
});

const documentSchema = z.object({
    username: z.string().min(1),
    total_contributions: z.number().int().nonnegative(),
    start_date: z.string().regex(ISO_DATE, 'expected a YYYY-MM-DD date'),
    end_date: z.string().regex(ISO_DATE, 'expected a YYYY-MM-DD date'),
    weeks: z.array(z.object({ days: z.array(daySchema) })),
});

type CalendarDocument = z.infer<typeof documentSchema>;

export const serializeCalendar = (calendar: ContributionCalendar): string => {
    const document: CalendarDocument = {
        username: calendar.username,
        total_contributions: calendar.totalContributions,
        start_date: calendar.startDate,
        end_date: calendar.endDate,
        weeks: calendar.weeks.map((week) => ({
            days: week.days.map((day) => ({ date: day.date, count: day.count, level: day.level })),
        })),
    };
    return JSON.stringify(document, null, 2);
};

export const parseCalendarDocument = (raw: string): ContributionCalendar => {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch {
        throw new ContributionDataError('Contribution data is not valid JSON');
    }

    const parsed = documentSchema.safeParse(json);
    if (!parsed.success) {
        const [issue] = parsed.error.issues;
        const location = issue && issue.path.length > 0 ? issue.path.join('.') : 'document';
        throw new ContributionDataError(`Invalid contribution data at ${location}: ${issue?.message ?? 'unknown issue'}`);
    }

    const document = parsed.data;
    return {
        username: document.username,
        totalContributions: document.total_contributions,
        startDate: document.start_date,
        endDate: document.end_date,
        weeks: document.weeks,
    };
};

export const saveContributionData = async (path: string, calendar: ContributionCalendar): Promise<void> => {
    await writeFile(path, `${serializeCalendar(calendar)}\n`, 'utf8');
};

export const loadContributionData = async (path: string): Promise<ContributionCalendar> => {
    let raw: string;
    try {
        raw = await readFile(path, 'utf8');
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ContributionDataError(`Failed to read contribution data from ${path}: ${message}`);
    }
    return parseCalendarDocument(raw);
};

/** Day of week for an ISO date, Sunday = 0 */
const weekdayOf = (date: string): number => new Date(`${date}T00:00:00Z`).getUTCDay();

/**
 * Lay the most recent `columns` weeks out as grid columns. Days land on the row of their weekday,
 * so a partial first week keeps its gaps; weeks and days outside the grid are dropped.
 */
export const toIntensityGrid = (
    calendar: ContributionCalendar,
    dimensions: { readonly columns: number; readonly rows: number },
): IntensityGrid => {
    const weeks = calendar.weeks.slice(-dimensions.columns);
    const cells: GridCell[][] = Array.from({ length: dimensions.columns }, () =>
        Array.from({ length: dimensions.rows }, () => EMPTY_CELL),
    );

    weeks.forEach((week, col) => {
        const column = cells[col];
        if (!column) {
            return;
        }
        for (const day of week.days) {
            const row = weekdayOf(day.date);
            if (row < dimensions.rows) {
                column[row] = { level: day.level, count: day.count };
            }
        }
    });

    return { columns: dimensions.columns, rows: dimensions.rows, cells };
};

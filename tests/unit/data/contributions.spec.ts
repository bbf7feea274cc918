import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
    ContributionDataError,
    loadContributionData,
    parseCalendarDocument,
    parseContributionLevel,
    saveContributionData,
    serializeCalendar,
    toIntensityGrid,
    type ContributionCalendar,
} from 'data/contributions';

const calendar: ContributionCalendar = {
    username: 'test-user',
    totalContributions: 31,
    startDate: '2024-12-31',
    endDate: '2025-01-12',
    weeks: [
        { days: [{ date: '2024-12-31', count: 5, level: 2 }] },
        {
            days: [
                { date: '2025-01-05', count: 2, level: 1 },
                { date: '2025-01-07', count: 4, level: 3 },
                { date: '2025-01-11', count: 1, level: 1 },
            ],
        },
        { days: [{ date: '2025-01-12', count: 19, level: 4 }] },
    ],
};

describe('parseContributionLevel', () => {
    it('maps calendar level names to buckets', () => {
        expect(parseContributionLevel('NONE')).toBe(0);
        expect(parseContributionLevel('FIRST_QUARTILE')).toBe(1);
        expect(parseContributionLevel('SECOND_QUARTILE')).toBe(2);
        expect(parseContributionLevel('THIRD_QUARTILE')).toBe(3);
        expect(parseContributionLevel('FOURTH_QUARTILE')).toBe(4);
    });

    it('treats unknown names as empty', () => {
        expect(parseContributionLevel('FIFTH_QUARTILE')).toBe(0);
        expect(parseContributionLevel('toString')).toBe(0);
    });
});

describe('calendar documents', () => {
    it('serializes with snake_case keys', () => {
        const document: unknown = JSON.parse(serializeCalendar(calendar));

        expect(document).toMatchObject({
            username: 'test-user',
            total_contributions: 31,
            start_date: '2024-12-31',
            end_date: '2025-01-12',
        });
    });

    it('reads back what it writes', () => {
        expect(parseCalendarDocument(serializeCalendar(calendar))).toEqual(calendar);
    });

    it('rejects malformed JSON', () => {
        expect(() => parseCalendarDocument('{ weeks: ')).toThrow(
            new ContributionDataError('Contribution data is not valid JSON'),
        );
    });

    it('names the first invalid field', () => {
        const document = JSON.parse(serializeCalendar(calendar));
        document.weeks[1].days[0].level = 7;

        expect(() => parseCalendarDocument(JSON.stringify(document))).toThrow(
            'Invalid contribution data at weeks.1.days.0.level',
        );
    });

    it('requires a username', () => {
        const document = JSON.parse(serializeCalendar(calendar));
        delete document.username;

        expect(() => parseCalendarDocument(JSON.stringify(document))).toThrow('Invalid contribution data at username');
    });
});

describe('contribution files', () => {
    let directory: string;

    beforeEach(async () => {
        directory = await mkdtemp(join(tmpdir(), 'contributions-'));
    });

    afterEach(async () => {
        await rm(directory, { recursive: true, force: true });
    });

    it('saves pretty JSON with a trailing newline and loads it back', async () => {
        const path = join(directory, 'calendar.json');

        await saveContributionData(path, calendar);

        const raw = await readFile(path, 'utf8');
        expect(raw.endsWith('}\n')).toBe(true);
        expect(raw.split('\n')[1]).toBe('  "username": "test-user",');
        await expect(loadContributionData(path)).resolves.toEqual(calendar);
    });

    it('wraps read failures', async () => {
        const path = join(directory, 'missing.json');

        await expect(loadContributionData(path)).rejects.toThrow(
            `Failed to read contribution data from ${path}:`,
        );
        await expect(loadContributionData(path)).rejects.toBeInstanceOf(ContributionDataError);
    });

    it('reports invalid file contents', async () => {
        const path = join(directory, 'broken.json');
        await writeFile(path, 'not json', 'utf8');

        await expect(loadContributionData(path)).rejects.toThrow('Contribution data is not valid JSON');
    });
});

describe('toIntensityGrid', () => {
    it('keeps the most recent weeks and places days on their weekday row', () => {
        const grid = toIntensityGrid(calendar, { columns: 2, rows: 7 });

        expect(grid.columns).toBe(2);
        expect(grid.rows).toBe(7);
        expect(grid.cells[0]).toEqual([
            { level: 1, count: 2 },
            { level: 0, count: 0 },
            { level: 3, count: 4 },
            { level: 0, count: 0 },
            { level: 0, count: 0 },
            { level: 0, count: 0 },
            { level: 1, count: 1 },
        ]);
        expect(grid.cells[1]?.[0]).toEqual({ level: 4, count: 19 });
        expect(grid.cells[1]?.slice(1).every((cell) => cell.level === 0)).toBe(true);
    });

    it('leaves trailing columns empty when there are fewer weeks than columns', () => {
        const grid = toIntensityGrid(calendar, { columns: 5, rows: 7 });

        expect(grid.cells[0]?.[2]).toEqual({ level: 2, count: 5 });
        expect(grid.cells[3]?.every((cell) => cell.level === 0)).toBe(true);
        expect(grid.cells[4]?.every((cell) => cell.level === 0)).toBe(true);
    });

    it('drops days whose weekday falls below the grid', () => {
        const grid = toIntensityGrid(calendar, { columns: 2, rows: 3 });

        expect(grid.cells[0]).toEqual([
            { level: 1, count: 2 },
            { level: 0, count: 0 },
            { level: 3, count: 4 },
        ]);
    });
});

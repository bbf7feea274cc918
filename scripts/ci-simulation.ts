import { runSimulation, type SimulationInput, type SimulationResult } from 'cli/simulate';
import type { ContributionCalendar, ContributionDay, ContributionWeek } from 'data/contributions';
import { POLICY_KINDS } from 'game/policies';
import { createLogger } from 'util/log';
import { mulberry32 } from 'util/random';

const WEEKS = 52;
const FIRST_SUNDAY = Date.UTC(2025, 0, 5);
const DAY_MS = 86_400_000;

const buildCalendar = (seed: number): ContributionCalendar => {
    const random = mulberry32(seed);
    const weeks: ContributionWeek[] = [];
    let total = 0;

    for (let week = 0; week < WEEKS; week += 1) {
        const days: ContributionDay[] = [];
        for (let day = 0; day < 7; day += 1) {
            const level = Math.floor(random() * 5);
            const count = level === 0 ? 0 : level * 3 + Math.floor(random() * 3);
            total += count;
            days.push({
                date: new Date(FIRST_SUNDAY + (week * 7 + day) * DAY_MS).toISOString().slice(0, 10),
                count,
                level,
            });
        }
        weeks.push({ days });
    }

    const lastWeek = weeks[weeks.length - 1];
    return {
        username: 'ci-fixture',
        totalContributions: total,
        weeks,
        startDate: weeks[0]?.days[0]?.date ?? '',
        endDate: lastWeek?.days[lastWeek.days.length - 1]?.date ?? '',
    };
};

const serialize = (value: unknown): string => JSON.stringify(value, null, 2);

const fail = (message: string, details?: { expected?: unknown; actual?: unknown }) => {
    console.error(`[simulate:verify] ${message}`);
    if (details?.expected !== undefined) {
        console.error(`[simulate:verify] expected: ${serialize(details.expected)}`);
    }
    if (details?.actual !== undefined) {
        console.error(`[simulate:verify] actual: ${serialize(details.actual)}`);
    }
    process.exit(1);
};

const main = async (): Promise<void> => {
    const calendar = buildCalendar(17);
    const logger = createLogger('ci', { writer: () => undefined });
    const results: SimulationResult[] = [];

    for (const policy of POLICY_KINDS) {
        const input: SimulationInput = { calendar, policy, seed: 17, telemetry: true, logger };
        const first = await runSimulation(input);
        const second = await runSimulation(input);

        if (serialize(first) !== serialize(second)) {
            fail(`policy ${policy} produced different results across runs for the same input`, {
                expected: first,
                actual: second,
            });
        }

        if (first.frames < 1 || first.bricks.destroyed > first.bricks.total) {
            fail(`policy ${policy} produced an inconsistent summary`, { actual: first });
        }

        results.push(first);
    }

    for (const result of results) {
        console.log(
            `[simulate:verify] ${result.policy}: termination=${result.termination}, ` +
            `destroyed=${result.bricks.destroyed}/${result.bricks.total}, steps=${result.steps}, frames=${result.frames}.`,
        );
    }
    console.log('[simulate:verify] Deterministic simulation confirmed for every policy.');
};

main().catch((error: unknown) => {
    fail(`unexpected error: ${error instanceof Error ? error.message : String(error)}`);
});

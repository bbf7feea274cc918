import { z } from 'zod';
import { rootLogger, type Logger } from 'util/log';
import {
    ContributionDataError,
    parseContributionLevel,
    type ContributionCalendar,
    type ContributionWeek,
} from './contributions';

export const GITHUB_GRAPHQL_ENDPOINT = 'https://api.github.com/graphql';

const DEFAULT_TIMEOUT_MS = 30_000;

const CONTRIBUTIONS_QUERY = `
query($username: String!) {
  user(login: $username) {
    contributionsCollection {
      contributionCalendar {
        totalContributions
        weeks {
          contributionDays {
            contributionCount
            date
            contributionLevel
          }
        }
      }
    }
  }
}
`;

const calendarSchema = z.object({
    totalContributions: z.number().int().nonnegative(),
    weeks: z.array(
        z.object({
            contributionDays: z.array(
                z.object({
                    contributionCount: z.number().int().nonnegative(),
                    date: z.string(),
                    contributionLevel: z.string(),
                }),
            ),
        }),
    ),
});

const responseSchema = z.object({
    data: z
        .object({
            user: z
                .object({
                    contributionsCollection: z.object({ contributionCalendar: calendarSchema }).nullable(),
                })
                .nullable(),
        })
        .nullable()
        .optional(),
    errors: z.array(z.object({ message: z.string() })).optional(),
});

type RemoteCalendar = z.infer<typeof calendarSchema>;

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface ContributionClientOptions {
    /** Falls back to the GITHUB_TOKEN environment variable */
    readonly token?: string;
    readonly fetch?: FetchFn;
    readonly endpoint?: string;
    readonly timeoutMs?: number;
    /** Used when the calendar holds no days at all */
    readonly today?: () => string;
    readonly logger?: Logger;
}

export interface ContributionClient {
    fetchCalendar(this: void, username: string): Promise<ContributionCalendar>;
}

const todayIso = (): string => new Date().toISOString().slice(0, 10);

const toCalendar = (username: string, remote: RemoteCalendar, today: () => string): ContributionCalendar => {
    const weeks: ContributionWeek[] = remote.weeks.map((week) => ({
        days: week.contributionDays.map((day) => ({
            date: day.date,
            count: day.contributionCount,
            level: parseContributionLevel(day.contributionLevel),
        })),
    }));

    // ISO dates sort lexicographically.
    const dates = weeks.flatMap((week) => week.days.map((day) => day.date)).sort();
    const fallback = today();

    return {
        username,
        totalContributions: remote.totalContributions,
        weeks,
        startDate: dates[0] ?? fallback,
        endDate: dates[dates.length - 1] ?? fallback,
    };
};

export const createContributionClient = (options: ContributionClientOptions = {}): ContributionClient => {
    const token = options.token ?? process.env.GITHUB_TOKEN;
    if (!token) {
        throw new ContributionDataError('GitHub token required. Set GITHUB_TOKEN or pass --token.');
    }

    const fetchImpl: FetchFn = options.fetch ?? fetch;
    const endpoint = options.endpoint ?? GITHUB_GRAPHQL_ENDPOINT;
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const today = options.today ?? todayIso;
    const logger = options.logger ?? rootLogger.child('github');

    const fetchCalendar: ContributionClient['fetchCalendar'] = async (username) => {
        logger.debug('Requesting contribution calendar', { username, endpoint });

        let response: Response;
        try {
            response = await fetchImpl(endpoint, {
                method: 'POST',
                headers: {
                    Authorization: `Bearer ${token}`,
                    'Content-Type': 'application/json',
                },
                body: JSON.stringify({ query: CONTRIBUTIONS_QUERY, variables: { username } }),
                signal: AbortSignal.timeout(timeoutMs),
            });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new ContributionDataError(`Failed to fetch GitHub data for user '${username}': ${message}`);
        }

        if (!response.ok) {
            throw new ContributionDataError(
                `Failed to fetch GitHub data for user '${username}': HTTP ${response.status}`,
            );
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch {
            throw new ContributionDataError(`Unexpected GitHub response for user '${username}'`);
        }

        const parsed = responseSchema.safeParse(body);
        if (!parsed.success) {
            throw new ContributionDataError(`Unexpected GitHub response for user '${username}'`);
        }

        const { data, errors } = parsed.data;
        if (errors && errors.length > 0) {
            throw new ContributionDataError(`GitHub API error: ${errors.map((entry) => entry.message).join('; ')}`);
        }

        const user = data?.user;
        if (!user) {
            throw new ContributionDataError(`User '${username}' not found or data unavailable`);
        }

        if (!user.contributionsCollection) {
            throw new ContributionDataError(`Contribution data unavailable for user '${username}'`);
        }

        const calendar = toCalendar(username, user.contributionsCollection.contributionCalendar, today);
        logger.info('Fetched contribution calendar', {
            username,
            weeks: calendar.weeks.length,
            total: calendar.totalContributions,
        });
        return calendar;
    };

    return { fetchCalendar };
};

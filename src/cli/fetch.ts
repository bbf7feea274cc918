import { resolve as resolvePath } from 'node:path';
import { saveContributionData } from 'data/contributions';
import { createContributionClient, type ContributionClient } from 'data/github-client';
import { rootLogger, type Logger } from 'util/log';

export interface FetchInput {
    readonly username: string;
    readonly output: string;
    readonly token?: string;
    readonly client?: ContributionClient;
    readonly logger?: Logger;
}

export interface FetchResult {
    readonly ok: true;
    readonly username: string;
    readonly output: string;
    readonly weeks: number;
    readonly totalContributions: number;
}

export const runFetch = async (input: FetchInput): Promise<FetchResult> => {
    const logger = input.logger ?? rootLogger.child('fetch');
    const client = input.client ?? createContributionClient({ token: input.token, logger: logger.child('github') });

    const calendar = await client.fetchCalendar(input.username);
    const output = resolvePath(process.cwd(), input.output);
    await saveContributionData(output, calendar);

    return {
        ok: true,
        username: calendar.username,
        output,
        weeks: calendar.weeks.length,
        totalContributions: calendar.totalContributions,
    };
};

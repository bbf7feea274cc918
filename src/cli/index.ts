import { runSimulation, type SimulationInput } from './simulate';
import { runFetch, type FetchInput } from './fetch';
import { isPolicyKind, POLICY_KINDS } from 'game/policies';
import { createLogger, isLogLevel, stderrLogWriter, type LogLevel, type Logger } from 'util/log';

export interface CliCommand {
    readonly execute: () => Promise<number>;
}

export interface CliOptions {
    readonly logger?: Logger;
}

export const USAGE = 'Usage: contribution-breakout <simulate|fetch> [options]';

class CliUsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CliUsageError';
    }
}

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

interface ParsedSimulateOptions {
    inputPath?: string;
    username?: string;
    token?: string;
    policy?: SimulationInput['policy'];
    fps?: number;
    seed?: number;
    watermark?: string;
    framesOut?: string;
    rawOutput?: string;
    telemetry?: boolean;
}

const parseInteger = (flag: string, value: string): number => {
    const parsed = Number.parseInt(value, 10);
    if (Number.isNaN(parsed) || String(parsed) !== value.trim()) {
        throw new CliUsageError(`${flag} expects an integer (received "${value}")`);
    }
    return parsed;
};

const requireValue = (args: readonly string[], index: number, flag: string): string => {
    const value = args[index + 1];
    if (value === undefined) {
        throw new CliUsageError(`${flag} expects a value`);
    }
    return value;
};

const parseSimulateArgs = (args: readonly string[]): ParsedSimulateOptions => {
    const options: ParsedSimulateOptions = {};
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--telemetry') {
            options.telemetry = true;
            continue;
        }

        if (arg === undefined || !arg.startsWith('--')) {
            throw new CliUsageError(`Unexpected argument "${arg ?? ''}"`);
        }

        const value = requireValue(args, i, arg);
        i++;

        if (arg === '--input') {
            options.inputPath = value;
        } else if (arg === '--user') {
            options.username = value;
        } else if (arg === '--token') {
            options.token = value;
        } else if (arg === '--policy') {
            if (!isPolicyKind(value)) {
                throw new CliUsageError(`Unknown policy "${value}". Expected one of: ${POLICY_KINDS.join(', ')}`);
            }
            options.policy = value;
        } else if (arg === '--fps') {
            options.fps = parseInteger(arg, value);
        } else if (arg === '--seed') {
            options.seed = parseInteger(arg, value);
        } else if (arg === '--watermark') {
            options.watermark = value;
        } else if (arg === '--frames-out') {
            options.framesOut = value;
        } else if (arg === '--raw-output') {
            options.rawOutput = value;
        } else {
            throw new CliUsageError(`Unknown option "${arg}"`);
        }
    }

    if (!options.inputPath && !options.username) {
        throw new CliUsageError('simulate requires --input <file> or --user <name>');
    }

    return options;
};

const parseFetchArgs = (args: readonly string[]): Omit<FetchInput, 'client' | 'logger'> => {
    let username: string | undefined;
    let output: string | undefined;
    let token: string | undefined;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--output' || arg === '-o') {
            output = requireValue(args, i, arg);
            i++;
        } else if (arg === '--token') {
            token = requireValue(args, i, arg);
            i++;
        } else if (arg !== undefined && !arg.startsWith('-') && username === undefined) {
            username = arg;
        } else {
            throw new CliUsageError(`Unexpected argument "${arg ?? ''}"`);
        }
    }

    if (!username || !output) {
        throw new CliUsageError('fetch requires <user> and --output <file>');
    }

    return { username, output, ...(token ? { token } : {}) };
};

const resolveLogLevel = (value: string | undefined): LogLevel => (value && isLogLevel(value) ? value : 'info');

export function createCli(options: CliOptions = {}): CliCommand {
    const logger = options.logger ?? createLogger('breakout', {
        writer: stderrLogWriter,
        level: resolveLogLevel(process.env.LOG_LEVEL),
    });

    const execute = async (): Promise<number> => {
        const args = process.argv.slice(2);
        if (args.length === 0) {
            console.error(USAGE);
            return 1;
        }

        const command = args[0];
        const restArgs = args.slice(1);

        if (command === 'simulate') {
            let parsed: ParsedSimulateOptions;
            try {
                parsed = parseSimulateArgs(restArgs);
            } catch (error) {
                console.error(describeError(error));
                console.error(USAGE);
                return 1;
            }

            try {
                const result = await runSimulation({ ...parsed, logger: logger.child('simulate') });
                console.log(JSON.stringify(result));
                return 0;
            } catch (error) {
                console.error(`Simulation failed: ${describeError(error)}`);
                return 1;
            }
        }

        if (command === 'fetch') {
            let parsed: Omit<FetchInput, 'client' | 'logger'>;
            try {
                parsed = parseFetchArgs(restArgs);
            } catch (error) {
                console.error(describeError(error));
                console.error(USAGE);
                return 1;
            }

            try {
                const result = await runFetch({ ...parsed, logger: logger.child('fetch') });
                console.log(JSON.stringify(result));
                return 0;
            } catch (error) {
                console.error(`Fetch failed: ${describeError(error)}`);
                return 1;
            }
        }

        console.error(USAGE);
        return 1;
    };

    return {
        execute,
    };
}

import { writeFile } from 'node:fs/promises';
import { resolve as resolvePath } from 'node:path';
import { createEventBus, type EventEnvelope, type SimulationEventName, type TerminationReason } from 'app/events';
import { runFrameDriver, type FrameRecord } from 'app/frame-driver';
import { createSimulationState } from 'app/state';
import { frameDurationMs, resolveEngineConfig } from 'config/game';
import {
    ContributionDataError,
    loadContributionData,
    saveContributionData,
    toIntensityGrid,
    type ContributionCalendar,
} from 'data/contributions';
import { createContributionClient, type ContributionClient } from 'data/github-client';
import { createControlPolicy, type PolicyKind } from 'game/policies';
import { composeFrame } from 'render/frame-composer';
import { rootLogger, type Logger } from 'util/log';

export interface SimulationInput {
    /** Cached calendar file; takes precedence over `username` */
    readonly inputPath?: string;
    readonly username?: string;
    readonly token?: string;
    readonly policy?: PolicyKind;
    readonly fps?: number;
    readonly seed?: number;
    readonly watermark?: string;
    /** Display lists, one JSON line per frame */
    readonly framesOut?: string;
    /** Where to cache a freshly fetched calendar */
    readonly rawOutput?: string;
    readonly telemetry?: boolean;
    readonly calendar?: ContributionCalendar;
    readonly client?: ContributionClient;
    readonly logger?: Logger;
}

export interface SimulationResult {
    readonly ok: true;
    readonly username: string;
    readonly policy: PolicyKind;
    readonly seed: number;
    readonly frames: number;
    readonly steps: number;
    readonly frameDurationMs: number;
    readonly durationMs: number;
    readonly bricks: {
        readonly total: number;
        readonly destroyed: number;
    };
    readonly termination: TerminationReason;
    readonly abandonedTargets: number;
    readonly telemetry?: {
        readonly events: readonly EventEnvelope<SimulationEventName>[];
    };
}

const DEFAULT_POLICY: PolicyKind = 'follow';
const DEFAULT_SEED = 1;

const TELEMETRY_EVENTS: readonly SimulationEventName[] = [
    'WallHit',
    'PaddleHit',
    'BrickHit',
    'BrickBreak',
    'TargetAbandoned',
    'RunCompleted',
];

const resolveCalendar = async (input: SimulationInput, logger: Logger): Promise<ContributionCalendar> => {
    if (input.calendar) {
        return input.calendar;
    }

    if (input.inputPath) {
        const filePath = resolvePath(process.cwd(), input.inputPath);
        logger.info('Loading contribution data', { path: filePath });
        return loadContributionData(filePath);
    }

    if (!input.username) {
        throw new ContributionDataError('Either an input file or a username is required');
    }

    const client = input.client ?? createContributionClient({ token: input.token, logger: logger.child('github') });
    const calendar = await client.fetchCalendar(input.username);

    if (input.rawOutput) {
        const filePath = resolvePath(process.cwd(), input.rawOutput);
        await saveContributionData(filePath, calendar);
        logger.info('Saved contribution data', { path: filePath });
    }

    return calendar;
};

export const runSimulation = async (input: SimulationInput): Promise<SimulationResult> => {
    const logger = input.logger ?? rootLogger.child('simulate');
    const seed = typeof input.seed === 'number' ? input.seed : DEFAULT_SEED;
    const policyKind = input.policy ?? DEFAULT_POLICY;
    const config = resolveEngineConfig(typeof input.fps === 'number' ? { animation: { fps: input.fps } } : {});

    const calendar = await resolveCalendar(input, logger);
    const grid = toIntensityGrid(calendar, config.grid);
    const state = createSimulationState(grid, { config, seed });
    const policy = createControlPolicy(policyKind, state);

    const bus = createEventBus();
    const events: EventEnvelope<SimulationEventName>[] = [];
    if (input.telemetry) {
        for (const type of TELEMETRY_EVENTS) {
            bus.subscribe(type, (event) => {
                events.push(event);
            });
        }
    }

    const frameLines: string[] = [];
    const onFrame = input.framesOut
        ? (frame: FrameRecord) => {
            const commands = composeFrame(frame.scene, {
                maxRadius: config.explosion.maxRadius,
                watermark: input.watermark,
                cellRect: state.layout.cellRect,
            });
            frameLines.push(JSON.stringify({ index: frame.index, phase: frame.phase, commands }));
        }
        : undefined;

    logger.info('Running simulation', { username: calendar.username, policy: policyKind, seed, bricks: state.totalBricks });

    const report = runFrameDriver(state, policy, { onFrame, bus, logger: logger.child('driver') });

    if (input.framesOut) {
        const filePath = resolvePath(process.cwd(), input.framesOut);
        await writeFile(filePath, `${frameLines.join('\n')}\n`, 'utf8');
        logger.info('Wrote frame display lists', { path: filePath, frames: frameLines.length });
    }

    const duration = frameDurationMs(config);

    return {
        ok: true,
        username: calendar.username,
        policy: policyKind,
        seed: state.seed,
        frames: report.frames,
        steps: report.steps,
        frameDurationMs: duration,
        durationMs: report.frames * duration,
        bricks: {
            total: report.total,
            destroyed: report.destroyed,
        },
        termination: report.termination,
        abandonedTargets: report.abandonedTargets,
        telemetry: input.telemetry ? { events } : undefined,
    };
};

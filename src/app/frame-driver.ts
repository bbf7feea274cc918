import { frameDurationMs } from 'config/game';
import type { SceneSnapshot } from 'render/contracts';
import type { ControlPolicy } from 'game/policies';
import { getHitOffset } from 'util/paddle-reflection';
import { rootLogger, type Logger } from 'util/log';
import type { SimulationEventBus, TerminationReason } from './events';
import type { SimulationState, StepEvents } from './state';

export type FramePhase = 'initial' | 'play' | 'force' | 'pause';

export interface FrameRecord {
    /** Position in the emitted sequence, starting at 0 */
    readonly index: number;
    readonly phase: FramePhase;
    /** Step outcome, `null` for frames that did not advance the simulation */
    readonly events: StepEvents | null;
    readonly scene: SceneSnapshot;
}

export interface FrameDriverOptions {
    readonly onFrame?: (frame: FrameRecord) => void;
    readonly bus?: SimulationEventBus;
    readonly logger?: Logger;
}

export interface DriverReport {
    /** Frames handed to `onFrame`, static ones included */
    readonly frames: number;
    /** Simulation steps taken */
    readonly steps: number;
    readonly destroyed: number;
    readonly total: number;
    readonly complete: boolean;
    readonly termination: TerminationReason;
    readonly targets: number;
    readonly abandonedTargets: number;
}

/**
 * Drive a simulation with a control policy until the policy runs dry, then give the ball a
 * bounded number of extra frames to finish the board and append the closing pause.
 *
 * A target the paddle already rests on is held until the ball comes back to the paddle; any
 * other target is driven until the paddle settles. Both waits give up after
 * `watchdog.stuckFrames` frames, and no phase runs past `watchdog.maxFrames` steps.
 */
export const runFrameDriver = (
    state: SimulationState,
    policy: ControlPolicy,
    options: FrameDriverOptions = {},
): DriverReport => {
    const { watchdog, animation } = state.config;
    const logger = options.logger ?? rootLogger.child('driver');
    const bus = options.bus;
    const frameMs = frameDurationMs(state.config);

    let frames = 0;
    let targets = 0;
    let abandonedTargets = 0;
    let hitFrameLimit = false;

    const emit = (phase: FramePhase, events: StepEvents | null): void => {
        const record: FrameRecord = { index: frames, phase, events, scene: state.snapshot() };
        frames += 1;
        options.onFrame?.(record);
    };

    const publishStep = (events: StepEvents): void => {
        if (!bus) {
            return;
        }

        const timestamp = events.frame * frameMs;
        const speed = state.ball.speed();

        if (events.wallHit) {
            bus.publish('WallHit', { frame: events.frame, sides: events.wallSides, speed }, timestamp);
        }

        if (events.paddleHit) {
            bus.publish(
                'PaddleHit',
                {
                    frame: events.frame,
                    impactOffset: getHitOffset(state.ball.x, state.paddle.x, state.paddle.width),
                    speed,
                },
                timestamp,
            );
        }

        const { brick, impactAxis } = events;
        if (brick && impactAxis) {
            bus.publish(
                'BrickHit',
                {
                    frame: events.frame,
                    col: brick.col,
                    row: brick.row,
                    axis: impactAxis,
                    remainingStrength: brick.strength,
                },
                timestamp,
            );

            if (events.brickDestroyed) {
                bus.publish(
                    'BrickBreak',
                    {
                        frame: events.frame,
                        col: brick.col,
                        row: brick.row,
                        maxStrength: brick.maxStrength,
                        count: brick.count,
                        destroyedTotal: state.destroyedCount(),
                    },
                    timestamp,
                );
            }
        }
    };

    const advance = (phase: FramePhase): StepEvents => {
        const events = state.step();
        publishStep(events);
        emit(phase, events);
        return events;
    };

    const limitReached = (): boolean => state.frame() >= watchdog.maxFrames;

    const driveTarget = (target: number): void => {
        state.setPaddleTarget(target);
        const hold = state.paddleReady();
        let waited = 0;

        while (!limitReached()) {
            const events = advance('play');
            waited += 1;

            const settled = hold ? events.paddleHit || state.isComplete() : state.paddleReady();
            if (settled) {
                return;
            }

            if (waited >= watchdog.stuckFrames) {
                abandonedTargets += 1;
                logger.warn('Abandoned paddle target', { target, waited, frame: state.frame() });
                bus?.publish(
                    'TargetAbandoned',
                    { frame: state.frame(), targetX: target, framesWaited: waited },
                    state.frame() * frameMs,
                );
                return;
            }
        }
    };

    emit('initial', null);

    for (;;) {
        if (limitReached()) {
            hitFrameLimit = true;
            break;
        }

        const target = policy.nextTarget();
        if (target === null) {
            break;
        }

        targets += 1;
        driveTarget(target);
    }

    if (!hitFrameLimit && !state.isComplete()) {
        logger.debug('Policy exhausted with bricks remaining', {
            policy: policy.kind,
            remaining: state.totalBricks - state.destroyedCount(),
        });

        let forced = 0;
        while (!state.isComplete() && forced < watchdog.forceCompletionFrames) {
            if (limitReached()) {
                hitFrameLimit = true;
                break;
            }
            advance('force');
            forced += 1;
        }
    }

    const complete = state.isComplete();
    let termination: TerminationReason = 'force-limit';
    if (complete) {
        termination = 'complete';
    } else if (hitFrameLimit) {
        termination = 'frame-limit';
    }

    for (let pause = 0; pause < animation.endPauseFrames; pause += 1) {
        emit('pause', null);
    }
    while (frames < animation.minFrames) {
        emit('pause', null);
    }

    const report: DriverReport = {
        frames,
        steps: state.frame(),
        destroyed: state.destroyedCount(),
        total: state.totalBricks,
        complete,
        termination,
        targets,
        abandonedTargets,
    };

    bus?.publish(
        'RunCompleted',
        { frame: report.steps, termination, destroyed: report.destroyed, total: report.total },
        report.steps * frameMs,
    );

    logger.info('Simulation finished', {
        policy: policy.kind,
        termination,
        steps: report.steps,
        destroyed: report.destroyed,
        total: report.total,
    });

    return report;
};

import { describe, expect, it } from 'vitest';
import {
    ConfigurationError,
    engineConfig,
    engineConfigSchema,
    frameDurationMs,
    resolveEngineConfig,
    validateEngineConfig,
} from 'config/game';

describe('engine configuration', () => {
    it('resolves the defaults when no overrides are given', () => {
        const config = resolveEngineConfig();

        expect(config).toEqual(engineConfig);
        expect(config.grid).toEqual({ columns: 52, rows: 7 });
        expect(config.levels[4]).toEqual({ strength: 4, color: '#39d353' });
    });

    it('merges overrides section by section', () => {
        const config = resolveEngineConfig({
            ball: { speed: 4 },
            geometry: { margins: { top: 20 } },
            watchdog: { maxFrames: 100 },
        });

        expect(config.ball).toEqual({ radius: 4, speed: 4, launchAngle: 15 });
        expect(config.geometry.margins).toEqual({ top: 20, bottom: 120, left: 50, right: 50 });
        expect(config.geometry.cellSize).toBe(14);
        expect(config.watchdog).toEqual({ stuckFrames: 500, maxFrames: 100, forceCompletionFrames: 100 });
    });

    it('replaces the level table as a whole', () => {
        const config = resolveEngineConfig({ levels: { 1: { strength: 2, color: '#123456' } } });

        expect(config.levels).toEqual({ 1: { strength: 2, color: '#123456' } });
    });

    it.each([
        ['zero ball speed', { ball: { speed: 0 } }, 'ball.speed must be a positive number'],
        ['negative paddle width', { paddle: { width: -1 } }, 'paddle.width must be a positive number'],
        ['fractional stuck limit', { watchdog: { stuckFrames: 1.5 } }, 'watchdog.stuckFrames must be a positive integer'],
        ['negative end pause', { animation: { endPauseFrames: -1 } }, 'animation.endPauseFrames must be a non-negative integer'],
        ['negative margin', { geometry: { margins: { left: -5 } } }, 'geometry.margins.left must be zero or greater'],
        ['downward launch', { ball: { launchAngle: 90 } }, 'ball.launchAngle must point upward'],
        ['flat bounce', { paddle: { maxBounceAngle: 90 } }, 'paddle.maxBounceAngle must lie strictly between 0 and 90 degrees'],
        ['zero fps', { animation: { fps: 0 } }, 'animation.fps must be a positive number'],
        ['infinite fps', { animation: { fps: Infinity } }, 'animation.fps must be a positive number'],
        [
            'inverted particle speeds',
            { explosion: { particleSpeed: { min: 2, max: 1 } } },
            'explosion.particleSpeed.min must not exceed max',
        ],
    ])('rejects %s', (_label, overrides, message) => {
        expect(() => resolveEngineConfig(overrides)).toThrow(new ConfigurationError(message));
    });

    it('rejects malformed level tables', () => {
        expect(() => resolveEngineConfig({ levels: {} })).toThrow('levels must define at least one brick level');
        expect(() => resolveEngineConfig({ levels: { 1: { strength: 1, color: 'green' } } })).toThrow(
            'levels.1.color must be a #rrggbb color',
        );
        expect(() => resolveEngineConfig({ levels: { 0: { strength: 1, color: '#000000' } } })).toThrow(
            'levels.0 is not a positive integer level',
        );
        expect(() => resolveEngineConfig({ levels: { 2: { strength: 0, color: '#000000' } } })).toThrow(
            'levels.2.strength must be a positive integer',
        );
    });

    it('accepts the defaults through the schema', () => {
        expect(engineConfigSchema.safeParse(engineConfig).success).toBe(true);
    });

    it('reports configuration errors by name', () => {
        try {
            validateEngineConfig({ ...engineConfig, explosion: { ...engineConfig.explosion, lifetime: 0 } });
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ConfigurationError);
            expect(error).toMatchObject({
                name: 'ConfigurationError',
                message: 'explosion.lifetime must be a positive integer',
            });
        }
    });

    it('derives the frame duration from the frame rate', () => {
        expect(frameDurationMs(engineConfig)).toBe(25);
        expect(frameDurationMs(resolveEngineConfig({ animation: { fps: 30 } }))).toBe(33);
    });
});

import { z } from 'zod';

interface NumericRange {
    readonly min: number;
    readonly max: number;
}

interface Margins {
    readonly top: number;
    readonly bottom: number;
    readonly left: number;
    readonly right: number;
}

export interface LevelStyle {
    /** Hits the brick withstands before it is destroyed */
    readonly strength: number;
    /** Fill color as a CSS hex string */
    readonly color: string;
}

export type LevelTable = Readonly<Record<number, LevelStyle>>;

export interface EngineConfig {
    readonly geometry: {
        readonly cellSize: number;
        readonly cellSpacing: number;
        readonly margins: Margins;
        /** Distance of the reflecting backstop above the bottom edge of the field */
        readonly backstopInset: number;
        /** Paddle row, counted in grid rows below the last brick row */
        readonly paddleRowOffset: number;
    };
    readonly grid: {
        readonly columns: number;
        readonly rows: number;
    };
    readonly ball: {
        readonly radius: number;
        readonly speed: number;
        /** Degrees from vertical, positive leans right */
        readonly launchAngle: number;
    };
    readonly paddle: {
        readonly width: number;
        readonly height: number;
        readonly speed: number;
        /** Degrees from vertical at the paddle edges */
        readonly maxBounceAngle: number;
        readonly settleEpsilon: number;
    };
    readonly levels: LevelTable;
    readonly explosion: {
        readonly lifetime: number;
        readonly particleCount: number;
        readonly maxRadius: number;
        readonly particleSpeed: NumericRange;
        readonly brightness: NumericRange;
    };
    readonly animation: {
        readonly fps: number;
        readonly endPauseFrames: number;
        readonly minFrames: number;
    };
    readonly watchdog: {
        readonly stuckFrames: number;
        readonly maxFrames: number;
        readonly forceCompletionFrames: number;
    };
}

export interface GeometryOverrides extends Partial<Omit<EngineConfig['geometry'], 'margins'>> {
    readonly margins?: Partial<Margins>;
}

export type EngineConfigOverrides = {
    readonly [Section in Exclude<keyof EngineConfig, 'geometry' | 'levels'>]?: Partial<EngineConfig[Section]>;
} & {
    readonly geometry?: GeometryOverrides;
    readonly levels?: LevelTable;
};

export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Tunable engine constants. Values are expressed in pixels and frames; the defaults are tuned for
 * a 40 fps animation of a 52 × 7 contribution calendar.
 */
export const engineConfig = {
    geometry: {
        cellSize: 14,
        cellSpacing: 3,
        margins: { top: 50, bottom: 120, left: 50, right: 50 },
        backstopInset: 10,
        paddleRowOffset: 3,
    },
    grid: { columns: 52, rows: 7 },
    ball: { radius: 4, speed: 3, launchAngle: 15 },
    paddle: { width: 60, height: 10, speed: 5, maxBounceAngle: 60, settleEpsilon: 0.1 },
    levels: {
        1: { strength: 1, color: '#0e4429' },
        2: { strength: 2, color: '#006d32' },
        3: { strength: 3, color: '#26a641' },
        4: { strength: 4, color: '#39d353' },
    },
    explosion: {
        lifetime: 10,
        particleCount: 12,
        maxRadius: 15,
        particleSpeed: { min: 0.5, max: 1.5 },
        brightness: { min: 0.7, max: 1 },
    },
    animation: { fps: 40, endPauseFrames: 60, minFrames: 1 },
    watchdog: { stuckFrames: 500, maxFrames: 5000, forceCompletionFrames: 100 },
} as const satisfies EngineConfig;

const HEX_COLOR = /^#[0-9a-f]{6}$/iu;

const positiveNumber = z.number().finite('must be a positive number').positive('must be a positive number');
const nonNegativeNumber = z.number().finite('must be zero or greater').nonnegative('must be zero or greater');
const positiveInteger = z.number().int('must be a positive integer').positive('must be a positive integer');
const nonNegativeInteger = z
    .number()
    .int('must be a non-negative integer')
    .nonnegative('must be a non-negative integer');

const rangeSchema = z
    .object({ min: positiveNumber, max: positiveNumber })
    .refine((range) => range.min <= range.max, { message: 'must not exceed max', path: ['min'] });

const levelStyleSchema = z.object({
    strength: positiveInteger,
    color: z.string().regex(HEX_COLOR, 'must be a #rrggbb color'),
});

const levelTableSchema = z
    .record(z.string().regex(/^[1-9]\d*$/u, 'is not a positive integer level'), levelStyleSchema)
    .refine((levels) => Object.keys(levels).length > 0, 'must define at least one brick level');

export const engineConfigSchema = z.object({
    geometry: z.object({
        cellSize: positiveNumber,
        cellSpacing: nonNegativeNumber,
        margins: z.object({
            top: nonNegativeNumber,
            bottom: nonNegativeNumber,
            left: nonNegativeNumber,
            right: nonNegativeNumber,
        }),
        backstopInset: nonNegativeNumber,
        paddleRowOffset: positiveInteger,
    }),
    grid: z.object({ columns: nonNegativeInteger, rows: nonNegativeInteger }),
    ball: z.object({
        radius: positiveNumber,
        speed: positiveNumber,
        launchAngle: z
            .number()
            .finite('must point upward')
            .refine((angle) => Math.abs(angle) < 90, 'must point upward'),
    }),
    paddle: z.object({
        width: positiveNumber,
        height: positiveNumber,
        speed: positiveNumber,
        maxBounceAngle: z
            .number()
            .gt(0, 'must lie strictly between 0 and 90 degrees')
            .lt(90, 'must lie strictly between 0 and 90 degrees'),
        settleEpsilon: positiveNumber,
    }),
    levels: levelTableSchema,
    explosion: z.object({
        lifetime: positiveInteger,
        particleCount: nonNegativeInteger,
        maxRadius: positiveNumber,
        particleSpeed: rangeSchema,
        brightness: rangeSchema,
    }),
    animation: z.object({
        fps: positiveNumber,
        endPauseFrames: nonNegativeInteger,
        minFrames: nonNegativeInteger,
    }),
    watchdog: z.object({
        stuckFrames: positiveInteger,
        maxFrames: positiveInteger,
        forceCompletionFrames: nonNegativeInteger,
    }),
});

/** Checks every value and reports the first offending key as `section.key <reason>` */
export const validateEngineConfig = (config: EngineConfig): EngineConfig => {
    const parsed = engineConfigSchema.safeParse(config);
    if (!parsed.success) {
        const [issue] = parsed.error.issues;
        const location = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
        throw new ConfigurationError(`${location} ${issue?.message ?? 'is invalid'}`);
    }
    return config;
};

export const resolveEngineConfig = (overrides: EngineConfigOverrides = {}): EngineConfig => {
    const base: EngineConfig = engineConfig;

    const merged: EngineConfig = {
        geometry: {
            ...base.geometry,
            ...overrides.geometry,
            margins: { ...base.geometry.margins, ...overrides.geometry?.margins },
        },
        grid: { ...base.grid, ...overrides.grid },
        ball: { ...base.ball, ...overrides.ball },
        paddle: { ...base.paddle, ...overrides.paddle },
        levels: overrides.levels ?? base.levels,
        explosion: { ...base.explosion, ...overrides.explosion },
        animation: { ...base.animation, ...overrides.animation },
        watchdog: { ...base.watchdog, ...overrides.watchdog },
    };

    return validateEngineConfig(merged);
};

export const frameDurationMs = (config: EngineConfig): number => Math.floor(1000 / config.animation.fps);

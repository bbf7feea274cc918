import { z } from 'zod';
import {
    ConfigurationError,
    engineConfig,
    validateEngineConfig,
    type EngineConfig,
    type LevelTable,
} from 'config/game';
import type { IntensityGrid } from 'types/grid';
import type { BrickView, SceneSnapshot } from 'render/contracts';
import { Ball, type BallState } from 'physics/ball';
import { Brick, type BrickState } from 'physics/brick';
import { Explosion } from 'physics/explosion';
import { createGridLayout, type GridLayout } from 'physics/layout';
import { Paddle, type PaddleState } from 'physics/paddle';
import {
    resolveBrickCollision,
    resolvePaddleCollision,
    resolveWallCollision,
    type ImpactAxis,
    type WallHitSide,
} from 'physics/collisions';
import { createRandomManager } from 'util/random';
import { degreesToRadians } from 'util/geometry';

/** Outcome of a single frame */
export interface StepEvents {
    /** Frame counter after this step */
    readonly frame: number;
    readonly wallHit: boolean;
    readonly wallSides: readonly WallHitSide[];
    readonly paddleHit: boolean;
    readonly brick: BrickState | null;
    readonly impactAxis: ImpactAxis | null;
    readonly brickDestroyed: boolean;
}

/**
 * What a control policy may observe. Nothing here mutates the simulation.
 */
export interface SimulationView {
    readonly layout: GridLayout;
    readonly ball: BallState;
    readonly paddle: PaddleState;
    readonly bricks: readonly BrickState[];
    isComplete(this: void): boolean;
    activeBricks(this: void): IterableIterator<BrickState>;
}

export interface SimulationState extends SimulationView {
    readonly config: EngineConfig;
    readonly seed: number;
    readonly ball: Ball;
    readonly paddle: Paddle;
    readonly bricks: readonly Brick[];
    readonly totalBricks: number;
    frame(this: void): number;
    destroyedCount(this: void): number;
    explosions(this: void): readonly Explosion[];
    step(this: void): StepEvents;
    setPaddleTarget(this: void, x: number): void;
    paddleReady(this: void): boolean;
    brickAt(this: void, col: number, row: number): Brick | undefined;
    snapshot(this: void): SceneSnapshot;
}

export interface SimulationOptions {
    readonly config?: EngineConfig;
    /** Seed for explosion particles */
    readonly seed?: number;
}

const gridCellSchema = z.object({
    level: z.number().int('has invalid level').nonnegative('has invalid level'),
    count: z.number().finite('has invalid count').nonnegative('has invalid count'),
});

const createGridSchema = (levels: LevelTable) =>
    z
        .object({
            columns: z.number().int().nonnegative(),
            rows: z.number().int().nonnegative(),
            cells: z.array(z.array(gridCellSchema)),
        })
        .superRefine((grid, ctx) => {
            if (grid.cells.length !== grid.columns) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `declares ${grid.columns} columns but has ${grid.cells.length}`,
                });
                return;
            }

            grid.cells.forEach((column, col) => {
                if (column.length !== grid.rows) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        message: `has ${column.length} rows, expected ${grid.rows}`,
                        path: ['cells', col],
                    });
                }
                column.forEach((cell, row) => {
                    if (cell.level > 0 && levels[cell.level] === undefined) {
                        ctx.addIssue({
                            code: z.ZodIssueCode.custom,
                            message: `has level ${cell.level} with no brick style`,
                            path: ['cells', col, row],
                        });
                    }
                });
            });
        });

const describeGridIssue = (issue: z.ZodIssue | undefined): string => {
    if (!issue) {
        return 'Grid is invalid';
    }

    const [field, col, row] = issue.path;
    if (field === 'cells' && typeof col === 'number' && typeof row === 'number') {
        return `Grid cell (${col}, ${row}) ${issue.message}`;
    }
    if (field === 'cells' && typeof col === 'number') {
        return `Grid column ${col} ${issue.message}`;
    }
    if (field === 'columns' || field === 'rows') {
        return `Grid ${field} must be a non-negative integer`;
    }
    return `Grid ${issue.message}`;
};

const validateGrid = (grid: IntensityGrid, config: EngineConfig): void => {
    const parsed = createGridSchema(config.levels).safeParse(grid);
    if (!parsed.success) {
        throw new ConfigurationError(describeGridIssue(parsed.error.issues[0]));
    }
};

// Column-major, matching the collision scan order.
const createBricks = (grid: IntensityGrid, config: EngineConfig): Brick[] => {
    const bricks: Brick[] = [];
    grid.cells.forEach((column, col) => {
        column.forEach((cell, row) => {
            const style = cell.level > 0 ? config.levels[cell.level] : undefined;
            if (!style) {
                return;
            }
            bricks.push(new Brick({ col, row, strength: style.strength, color: style.color, count: cell.count }));
        });
    });
    return bricks;
};

const createBall = (layout: GridLayout, config: EngineConfig): Ball => {
    const start = layout.cellCenter(Math.floor(layout.columns / 2), layout.paddleRow - 1);
    const angle = degreesToRadians(config.ball.launchAngle);
    return new Ball(
        start.x,
        start.y,
        config.ball.speed * Math.sin(angle),
        -config.ball.speed * Math.cos(angle),
        config.ball.radius,
    );
};

const createPaddle = (layout: GridLayout, config: EngineConfig): Paddle => {
    const start = layout.cellCenter(Math.floor(layout.columns / 2), layout.paddleRow);
    return new Paddle(start.x, start.y, {
        width: config.paddle.width,
        height: config.paddle.height,
        speed: config.paddle.speed,
        settleEpsilon: config.paddle.settleEpsilon,
        ballSpeed: config.ball.speed,
        maxBounceAngle: config.paddle.maxBounceAngle,
    });
};

export const createSimulationState = (grid: IntensityGrid, options: SimulationOptions = {}): SimulationState => {
    const config = validateEngineConfig(options.config ?? engineConfig);
    validateGrid(grid, config);

    const layout = createGridLayout({ columns: grid.columns, rows: grid.rows }, config.geometry);
    const random = createRandomManager(options.seed);
    const bricks: readonly Brick[] = Object.freeze(createBricks(grid, config));
    const brickIndex = new Map<string, Brick>(bricks.map((brick) => [`${brick.col}:${brick.row}`, brick]));
    const ball = createBall(layout, config);
    const paddle = createPaddle(layout, config);

    let explosions: readonly Explosion[] = [];
    let frame = 0;
    let destroyed = 0;

    const spawnExplosion = (brick: Brick): Explosion => {
        const center = layout.cellCenter(brick.col, brick.row);
        return new Explosion(center.x, center.y, {
            lifetime: config.explosion.lifetime,
            particleCount: config.explosion.particleCount,
            particleSpeed: config.explosion.particleSpeed,
            brightness: config.explosion.brightness,
            random: random.random,
        });
    };

    const step: SimulationState['step'] = () => {
        paddle.step();
        ball.step();

        const wallSides = resolveWallCollision(ball, layout.walls);
        const paddleHit = resolvePaddleCollision(ball, paddle);
        const contact = resolveBrickCollision(ball, bricks, layout);

        let spawned: Explosion | null = null;
        let brickDestroyed = false;
        if (contact) {
            brickDestroyed = contact.brick.takeDamage(1);
            if (brickDestroyed) {
                destroyed += 1;
                spawned = spawnExplosion(contact.brick);
            }
        }

        // Fresh live list each frame; a new explosion starts counting on the next frame.
        const survivors: Explosion[] = [];
        for (const explosion of explosions) {
            explosion.step();
            if (!explosion.isFinished()) {
                survivors.push(explosion);
            }
        }
        if (spawned) {
            survivors.push(spawned);
        }
        explosions = survivors;

        frame += 1;

        return {
            frame,
            wallHit: wallSides.length > 0,
            wallSides,
            paddleHit,
            brick: contact?.brick ?? null,
            impactAxis: contact?.axis ?? null,
            brickDestroyed,
        };
    };

    const isComplete: SimulationState['isComplete'] = () => bricks.every((brick) => brick.destroyed);

    const activeBricks = function* (): IterableIterator<Brick> {
        for (const brick of bricks) {
            if (!brick.destroyed) {
                yield brick;
            }
        }
    };

    const snapshot: SimulationState['snapshot'] = () => {
        const paddleBox = paddle.bounds();
        const visible: BrickView[] = [];
        for (const brick of activeBricks()) {
            visible.push({
                col: brick.col,
                row: brick.row,
                bounds: layout.cellRect(brick.col, brick.row),
                color: brick.color,
                strength: brick.strength,
                maxStrength: brick.maxStrength,
                integrity: brick.strength / brick.maxStrength,
                count: brick.count,
            });
        }

        return {
            frame,
            width: layout.width,
            height: layout.height,
            columns: layout.columns,
            rows: layout.rows,
            ball: { x: ball.x, y: ball.y, radius: ball.radius },
            paddle: { bounds: paddleBox },
            bricks: visible,
            explosions: explosions.map((explosion) => ({
                x: explosion.x,
                y: explosion.y,
                progress: explosion.progress,
                particles: explosion.particles,
            })),
            destroyed,
            total: bricks.length,
        };
    };

    return {
        config,
        seed: random.seed(),
        layout,
        ball,
        paddle,
        bricks,
        totalBricks: bricks.length,
        frame: () => frame,
        destroyedCount: () => destroyed,
        explosions: () => explosions,
        step,
        setPaddleTarget: (x) => {
            paddle.moveTo(x);
        },
        paddleReady: () => paddle.isStationary(),
        isComplete,
        activeBricks,
        brickAt: (col, row) => brickIndex.get(`${col}:${row}`),
        snapshot,
    };
};

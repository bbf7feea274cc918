/**
 * Turns a scene snapshot into an ordered display list. Painting the list onto pixels and encoding
 * frames into an animation belong to whatever consumes the commands.
 */

import type { Bounds } from 'types/grid';
import type { ExplosionView, SceneSnapshot } from './contracts';
import { DARK_THEME, scaleColor, type SceneTheme } from './theme';

export interface RectCommand {
    readonly kind: 'rect';
    readonly bounds: Bounds;
    readonly fill: string;
}

export interface RoundedRectCommand {
    readonly kind: 'roundedRect';
    readonly bounds: Bounds;
    readonly radius: number;
    readonly fill: string;
}

export interface CircleCommand {
    readonly kind: 'circle';
    readonly x: number;
    readonly y: number;
    readonly radius: number;
    readonly fill: string;
}

export interface TextCommand {
    readonly kind: 'text';
    /** Bottom-right corner of the text box */
    readonly x: number;
    readonly y: number;
    readonly text: string;
    readonly fill: string;
}

export type DrawCommand = RectCommand | RoundedRectCommand | CircleCommand | TextCommand;

export interface ComposeOptions {
    /** Explosion radius at the end of its lifetime */
    readonly maxRadius: number;
    readonly theme?: SceneTheme;
    readonly watermark?: string;
    /** Drawn for every grid position, behind the bricks */
    readonly cellRect?: (col: number, row: number) => Bounds;
}

const PARTICLE_SIZE = 3;
const FLASH_SIZE = 5;
const PADDLE_CORNER_RADIUS = 3;

/** Damaged bricks darken to 70% at zero integrity */
export const brickShade = (color: string, integrity: number): string =>
    integrity >= 1 ? color : scaleColor(color, 0.7 + 0.3 * integrity);

const composeExplosion = (explosion: ExplosionView, maxRadius: number, theme: SceneTheme): DrawCommand[] => {
    const commands: DrawCommand[] = [];
    const { progress } = explosion;
    const radius = maxRadius * progress;

    for (const particle of explosion.particles) {
        const distance = radius * particle.speed;
        commands.push({
            kind: 'circle',
            x: explosion.x + distance * Math.cos(particle.angle),
            y: explosion.y + distance * Math.sin(particle.angle),
            radius: PARTICLE_SIZE,
            fill: scaleColor(theme.explosion, particle.brightness * (1 - progress)),
        });
    }

    if (progress < 0.5) {
        commands.push({
            kind: 'circle',
            x: explosion.x,
            y: explosion.y,
            radius: FLASH_SIZE * (1 - progress * 2),
            fill: theme.flash,
        });
    }

    return commands;
};

export const composeFrame = (scene: SceneSnapshot, options: ComposeOptions): readonly DrawCommand[] => {
    const theme = options.theme ?? DARK_THEME;
    const commands: DrawCommand[] = [
        {
            kind: 'rect',
            bounds: { left: 0, top: 0, right: scene.width, bottom: scene.height },
            fill: theme.background,
        },
    ];

    const { cellRect } = options;
    if (cellRect) {
        for (let col = 0; col < scene.columns; col += 1) {
            for (let row = 0; row < scene.rows; row += 1) {
                commands.push({ kind: 'rect', bounds: cellRect(col, row), fill: theme.gridCell });
            }
        }
    }

    for (const brick of scene.bricks) {
        commands.push({ kind: 'rect', bounds: brick.bounds, fill: brickShade(brick.color, brick.integrity) });
    }

    for (const explosion of scene.explosions) {
        commands.push(...composeExplosion(explosion, options.maxRadius, theme));
    }

    commands.push({
        kind: 'roundedRect',
        bounds: scene.paddle.bounds,
        radius: PADDLE_CORNER_RADIUS,
        fill: theme.paddle,
    });
    commands.push({ kind: 'circle', x: scene.ball.x, y: scene.ball.y, radius: scene.ball.radius, fill: theme.ball });

    if (options.watermark) {
        const x = scene.width - theme.watermark.inset;
        const y = scene.height - theme.watermark.inset;
        commands.push({ kind: 'text', x: x + 1, y: y + 1, text: options.watermark, fill: theme.watermark.shadow });
        commands.push({ kind: 'text', x, y, text: options.watermark, fill: theme.watermark.text });
    }

    return commands;
};

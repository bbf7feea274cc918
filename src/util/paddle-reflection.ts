/**
 * Paddle Reflection Utilities
 *
 * Varies the bounce angle by where the ball meets the paddle: center hits go straight up,
 * edge hits leave at the configured maximum angle from vertical.
 */

import { Vector, type MatterVector } from 'physics/matter';
import { clamp, degreesToRadians } from 'util/geometry';

export interface PaddleReflectionConfig {
    /** Width of the paddle for hit offset calculation */
    readonly paddleWidth: number;
    /** Speed the ball leaves the paddle with */
    readonly speed: number;
    /** Maximum angle from vertical in degrees */
    readonly maxAngle: number;
}

/**
 * Get the normalized hit position on paddle (0 = center, ±1 = edges)
 */
export function getHitOffset(ballX: number, paddleX: number, paddleWidth: number): number {
    const offset = (ballX - paddleX) / (paddleWidth * 0.5);
    return clamp(offset, -1, 1);
}

/**
 * Calculate reflection data without building a velocity
 *
 * @returns Reflection angle in radians and impact offset
 */
export function calculateReflectionData(
    ballX: number,
    paddleX: number,
    config: PaddleReflectionConfig,
): { angle: number; impactOffset: number } {
    const impactOffset = getHitOffset(ballX, paddleX, config.paddleWidth);
    return {
        angle: degreesToRadians(impactOffset * config.maxAngle),
        impactOffset,
    };
}

/**
 * Velocity of a ball leaving the paddle. Always points upward (negative y).
 */
export function reflectionVelocity(ballX: number, paddleX: number, config: PaddleReflectionConfig): MatterVector {
    const { angle } = calculateReflectionData(ballX, paddleX, config);
    return Vector.create(
        config.speed * Math.sin(angle),
        -Math.abs(config.speed * Math.cos(angle)),
    );
}

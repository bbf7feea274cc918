/**
 * Tests for Paddle Reflection Utilities
 */

import { describe, it, expect } from 'vitest';
import { calculateReflectionData, getHitOffset, reflectionVelocity } from 'util/paddle-reflection';

const config = { paddleWidth: 60, speed: 3, maxAngle: 60 };

describe('paddle-reflection', () => {
    describe('getHitOffset', () => {
        it('should be zero at the paddle center', () => {
            expect(getHitOffset(100, 100, 60)).toBe(0);
        });

        it('should scale linearly towards the edges', () => {
            expect(getHitOffset(115, 100, 60)).toBe(0.5);
            expect(getHitOffset(85, 100, 60)).toBe(-0.5);
        });

        it('should clamp hits beyond the paddle edges', () => {
            expect(getHitOffset(200, 100, 60)).toBe(1);
            expect(getHitOffset(0, 100, 60)).toBe(-1);
        });
    });

    describe('calculateReflectionData', () => {
        it('should return zero angle for center hit', () => {
            const data = calculateReflectionData(100, 100, config);
            expect(data.angle).toBeCloseTo(0, 10);
            expect(data.impactOffset).toBe(0);
        });

        it('should reach the maximum angle at the edge', () => {
            const data = calculateReflectionData(130, 100, config);
            expect(data.impactOffset).toBe(1);
            expect(data.angle).toBeCloseTo(Math.PI / 3, 10);
        });
    });

    describe('reflectionVelocity', () => {
        it('should send a center hit straight up at full speed', () => {
            const velocity = reflectionVelocity(100, 100, config);
            expect(velocity.x).toBeCloseTo(0, 10);
            expect(velocity.y).toBeCloseTo(-3, 10);
        });

        it('should lean towards the side that was hit', () => {
            const right = reflectionVelocity(130, 100, config);
            expect(right.x).toBeCloseTo(3 * Math.sin(Math.PI / 3), 10);
            expect(right.y).toBeCloseTo(-1.5, 10);

            const left = reflectionVelocity(70, 100, config);
            expect(left.x).toBeCloseTo(-3 * Math.sin(Math.PI / 3), 10);
            expect(left.y).toBeLessThan(0);
        });

        it('should keep the configured speed for any impact point', () => {
            for (const ballX of [70, 82, 95, 100, 111, 124, 160]) {
                const velocity = reflectionVelocity(ballX, 100, config);
                expect(Math.hypot(velocity.x, velocity.y)).toBeCloseTo(3, 10);
            }
        });
    });
});

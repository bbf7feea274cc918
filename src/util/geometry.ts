/**
 * Geometry Utilities
 *
 * Purpose: Utility functions for 2D geometry operations
 */

import type { Bounds, Vector2 } from 'types/grid';

/**
 * Check if two boxes overlap; touching edges count as overlap
 */
export function boundsOverlap(a: Bounds, b: Bounds): boolean {
    return !(a.right < b.left ||
        a.left > b.right ||
        a.bottom < b.top ||
        a.top > b.bottom);
}

/**
 * Get the center point of a box
 */
export function boundsCenter(bounds: Bounds): Vector2 {
    return {
        x: (bounds.left + bounds.right) / 2,
        y: (bounds.top + bounds.bottom) / 2,
    };
}

/**
 * Clamp a value between min and max
 */
export function clamp(value: number, min: number, max: number): number {
    return Math.min(Math.max(value, min), max);
}

/**
 * Linear interpolation between two values
 */
export function lerp(a: number, b: number, t: number): number {
    return a + (b - a) * t;
}

/**
 * Convert degrees to radians
 */
export function degreesToRadians(degrees: number): number {
    return degrees * (Math.PI / 180);
}

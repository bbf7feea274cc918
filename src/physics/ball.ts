import type { Bounds } from 'types/grid';
import { Vector } from 'physics/matter';

export interface BallState {
    readonly x: number;
    readonly y: number;
    readonly vx: number;
    readonly vy: number;
    readonly radius: number;
}

/**
 * Ball moving a fixed velocity per frame. Bounds are resolved by the collision functions, never here.
 */
export class Ball implements BallState {
    constructor(
        public x: number,
        public y: number,
        public vx: number,
        public vy: number,
        public readonly radius: number,
    ) {}

    step(): void {
        this.x += this.vx;
        this.y += this.vy;
    }

    bounds(): Bounds {
        return {
            left: this.x - this.radius,
            top: this.y - this.radius,
            right: this.x + this.radius,
            bottom: this.y + this.radius,
        };
    }

    speed(): number {
        return Vector.magnitude({ x: this.vx, y: this.vy });
    }
}

import type { Bounds } from 'types/grid';
import type { MatterVector } from 'physics/matter';
import { reflectionVelocity } from 'util/paddle-reflection';

export interface PaddleOptions {
    readonly width: number;
    readonly height: number;
    /** Maximum horizontal travel per frame */
    readonly speed: number;
    /** Distance below which the paddle counts as settled on its target */
    readonly settleEpsilon: number;
    /** Speed the ball leaves the paddle with */
    readonly ballSpeed: number;
    /** Degrees from vertical imparted at the paddle edges */
    readonly maxBounceAngle: number;
}

export interface PaddleState {
    readonly x: number;
    readonly y: number;
    readonly target: number;
    readonly width: number;
    readonly height: number;
}

/**
 * Autonomous paddle. `x` is the horizontal center, `y` the top edge.
 */
export class Paddle implements PaddleState {
    private position: number;

    private targetX: number;

    constructor(
        x: number,
        public readonly y: number,
        private readonly options: PaddleOptions,
    ) {
        this.position = x;
        this.targetX = x;
    }

    get x(): number {
        return this.position;
    }

    get target(): number {
        return this.targetX;
    }

    get width(): number {
        return this.options.width;
    }

    get height(): number {
        return this.options.height;
    }

    get speed(): number {
        return this.options.speed;
    }

    moveTo(target: number): void {
        this.targetX = target;
    }

    step(): void {
        const remaining = this.targetX - this.position;
        if (Math.abs(remaining) > this.options.speed) {
            this.position += Math.sign(remaining) * this.options.speed;
            return;
        }

        // Snap so the paddle never oscillates around its target.
        this.position = this.targetX;
    }

    isStationary(): boolean {
        return Math.abs(this.position - this.targetX) < this.options.settleEpsilon;
    }

    bounds(): Bounds {
        const halfWidth = this.options.width / 2;
        return {
            left: this.position - halfWidth,
            top: this.y,
            right: this.position + halfWidth,
            bottom: this.y + this.options.height,
        };
    }

    bounceVelocity(ballX: number): MatterVector {
        return reflectionVelocity(ballX, this.position, {
            paddleWidth: this.options.width,
            speed: this.options.ballSpeed,
            maxAngle: this.options.maxBounceAngle,
        });
    }
}

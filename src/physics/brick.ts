export interface BrickState {
    readonly col: number;
    readonly row: number;
    readonly strength: number;
    readonly maxStrength: number;
    readonly color: string;
    /** Raw magnitude of the source cell, kept for display */
    readonly count: number;
    readonly destroyed: boolean;
}

export interface BrickInit {
    readonly col: number;
    readonly row: number;
    readonly strength: number;
    readonly color: string;
    readonly count: number;
}

export class Brick implements BrickState {
    readonly col: number;

    readonly row: number;

    readonly maxStrength: number;

    readonly color: string;

    readonly count: number;

    private remaining: number;

    private broken = false;

    constructor(init: BrickInit) {
        this.col = init.col;
        this.row = init.row;
        this.remaining = init.strength;
        this.maxStrength = init.strength;
        this.color = init.color;
        this.count = init.count;
    }

    get strength(): number {
        return this.remaining;
    }

    get destroyed(): boolean {
        return this.broken;
    }

    /**
     * Apply damage and report whether this hit destroyed the brick.
     * Destroyed bricks keep their strength frozen and ignore further damage.
     */
    takeDamage(amount = 1): boolean {
        if (this.broken || !(amount > 0)) {
            return false;
        }

        this.remaining = Math.max(0, this.remaining - amount);
        if (this.remaining === 0) {
            this.broken = true;
            return true;
        }

        return false;
    }
}

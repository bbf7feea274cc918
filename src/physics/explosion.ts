import type { RandomSource } from 'util/random';
import { lerp } from 'util/geometry';

export interface ParticleDescriptor {
    /** Direction in radians */
    readonly angle: number;
    /** Multiplier on the explosion radius */
    readonly speed: number;
    /** Color intensity in [0, 1] */
    readonly brightness: number;
}

export interface ExplosionOptions {
    readonly lifetime: number;
    readonly particleCount: number;
    readonly particleSpeed: { readonly min: number; readonly max: number };
    readonly brightness: { readonly min: number; readonly max: number };
    readonly random: RandomSource;
}

const createParticles = (options: ExplosionOptions): readonly ParticleDescriptor[] => {
    const particles: ParticleDescriptor[] = [];
    for (let index = 0; index < options.particleCount; index += 1) {
        particles.push({
            angle: (index / options.particleCount) * Math.PI * 2,
            speed: lerp(options.particleSpeed.min, options.particleSpeed.max, options.random()),
            brightness: lerp(options.brightness.min, options.brightness.max, options.random()),
        });
    }
    return Object.freeze(particles);
};

export class Explosion {
    readonly lifetime: number;

    readonly particles: readonly ParticleDescriptor[];

    private frames = 0;

    constructor(
        readonly x: number,
        readonly y: number,
        options: ExplosionOptions,
    ) {
        this.lifetime = options.lifetime;
        this.particles = createParticles(options);
    }

    get elapsed(): number {
        return this.frames;
    }

    /** Fraction of the lifetime already played, in [0, 1] */
    get progress(): number {
        return Math.min(1, this.frames / this.lifetime);
    }

    step(): void {
        this.frames += 1;
    }

    isFinished(): boolean {
        return this.frames >= this.lifetime;
    }
}

/**
 * Scene Snapshot Contract
 *
 * Purpose: Read-only view of everything visible in one frame. The simulation builds a fresh
 * snapshot per frame; renderers never see live entities.
 */

import type { Bounds } from 'types/grid';
import type { ParticleDescriptor } from 'physics/explosion';

export interface BallView {
    readonly x: number;
    readonly y: number;
    readonly radius: number;
}

export interface PaddleView {
    readonly bounds: Bounds;
}

export interface BrickView {
    readonly col: number;
    readonly row: number;
    readonly bounds: Bounds;
    readonly color: string;
    readonly strength: number;
    readonly maxStrength: number;
    /** strength / maxStrength */
    readonly integrity: number;
    readonly count: number;
}

export interface ExplosionView {
    readonly x: number;
    readonly y: number;
    /** elapsed / lifetime */
    readonly progress: number;
    readonly particles: readonly ParticleDescriptor[];
}

export interface SceneSnapshot {
    readonly frame: number;
    readonly width: number;
    readonly height: number;
    readonly columns: number;
    readonly rows: number;
    readonly ball: BallView;
    readonly paddle: PaddleView;
    /** Non-destroyed bricks only */
    readonly bricks: readonly BrickView[];
    readonly explosions: readonly ExplosionView[];
    readonly destroyed: number;
    readonly total: number;
}

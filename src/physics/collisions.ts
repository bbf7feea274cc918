/**
 * Collision resolution for one frame. The functions run in a fixed order (walls, paddle, bricks)
 * and each may rewrite the ball's position and velocity in place.
 */

import type { Bounds } from 'types/grid';
import type { Ball } from './ball';
import type { Brick } from './brick';
import type { GridLayout } from './layout';
import type { Paddle } from './paddle';
import { Vector } from 'physics/matter';
import { boundsCenter, boundsOverlap } from 'util/geometry';

export type WallHitSide = 'left' | 'right' | 'top' | 'bottom';

export type ImpactAxis = 'horizontal' | 'vertical';

export interface BrickContact {
    readonly brick: Brick;
    /** Axis whose velocity component was flipped */
    readonly axis: ImpactAxis;
}

/**
 * Reflect the ball off every wall it penetrates. The bottom edge is a backstop that normally sits
 * below the paddle; it reflects so the ball can never leave the field.
 */
export const resolveWallCollision = (ball: Ball, walls: Bounds): readonly WallHitSide[] => {
    const sides: WallHitSide[] = [];

    if (ball.x - ball.radius <= walls.left) {
        ball.x = walls.left + ball.radius;
        ball.vx = Math.abs(ball.vx);
        sides.push('left');
    }

    if (ball.x + ball.radius >= walls.right) {
        ball.x = walls.right - ball.radius;
        ball.vx = -Math.abs(ball.vx);
        sides.push('right');
    }

    if (ball.y - ball.radius <= walls.top) {
        ball.y = walls.top + ball.radius;
        ball.vy = Math.abs(ball.vy);
        sides.push('top');
    }

    if (ball.y + ball.radius >= walls.bottom) {
        ball.y = walls.bottom - ball.radius;
        ball.vy = -Math.abs(ball.vy);
        sides.push('bottom');
    }

    return sides;
};

/**
 * Bounce the ball off the paddle top. Only a descending ball can hit, so a ball that was just
 * reflected cannot trigger again on the next frame.
 */
export const resolvePaddleCollision = (ball: Ball, paddle: Paddle): boolean => {
    if (ball.vy <= 0) {
        return false;
    }

    const ballBox = ball.bounds();
    const paddleBox = paddle.bounds();

    if (ballBox.right < paddleBox.left || ballBox.left > paddleBox.right) {
        return false;
    }

    if (ballBox.bottom < paddleBox.top || ballBox.top >= paddleBox.bottom) {
        return false;
    }

    const velocity = paddle.bounceVelocity(ball.x);
    ball.vx = velocity.x;
    ball.vy = velocity.y;
    ball.y = paddleBox.top - ball.radius;
    return true;
};

const impactAxis = (ball: Ball, brickBox: Bounds): ImpactAxis => {
    const offset = Vector.sub({ x: ball.x, y: ball.y }, boundsCenter(brickBox));
    const halfWidth = (brickBox.right - brickBox.left) / 2;
    const halfHeight = (brickBox.bottom - brickBox.top) / 2;

    return Math.abs(offset.x / halfWidth) > Math.abs(offset.y / halfHeight) ? 'horizontal' : 'vertical';
};

/**
 * Resolve the ball against the first overlapping active brick in enumeration order. This is not
 * the nearest brick along the ball's path: a fast ball in a dense grid can pick a neighbor or
 * pass through a brick. At most one brick is resolved per frame.
 */
export const resolveBrickCollision = (
    ball: Ball,
    bricks: Iterable<Brick>,
    layout: GridLayout,
): BrickContact | null => {
    const ballBox = ball.bounds();

    for (const brick of bricks) {
        if (brick.destroyed) {
            continue;
        }

        const brickBox = layout.cellRect(brick.col, brick.row);
        if (!boundsOverlap(ballBox, brickBox)) {
            continue;
        }

        const axis = impactAxis(ball, brickBox);
        if (axis === 'horizontal') {
            ball.vx = -ball.vx;
        } else {
            ball.vy = -ball.vy;
        }

        return { brick, axis };
    }

    return null;
};

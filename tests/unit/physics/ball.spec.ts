import { describe, expect, it } from 'vitest';
import { Ball } from 'physics/ball';

describe('Ball', () => {
    it('moves by its velocity each step', () => {
        const ball = new Ball(10, 20, 1.5, -3, 4);

        ball.step();
        ball.step();

        expect(ball.x).toBe(13);
        expect(ball.y).toBe(14);
    });

    it('reports an axis-aligned box around its center', () => {
        const ball = new Ball(10, 20, 0, 0, 4);
        expect(ball.bounds()).toEqual({ left: 6, top: 16, right: 14, bottom: 24 });
    });

    it('reports its speed as the velocity magnitude', () => {
        expect(new Ball(0, 0, 3, 4, 1).speed()).toBe(5);
    });
});

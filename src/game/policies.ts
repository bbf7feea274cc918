import type { SimulationView } from 'app/state';
import type { BrickState } from 'physics/brick';

export type PolicyKind = 'follow' | 'column' | 'row';

export const POLICY_KINDS: readonly PolicyKind[] = ['follow', 'column', 'row'];

/**
 * Pull-based target source. The driver asks for the next target only after it has finished
 * driving the paddle to the previous one; `null` ends the sequence.
 */
export interface ControlPolicy {
    readonly kind: PolicyKind;
    nextTarget(this: void): number | null;
}

const columnX = (view: SimulationView, col: number): number => view.layout.cellCenter(col, 0).x;

export const isPolicyKind = (value: string): value is PolicyKind =>
    POLICY_KINDS.some((kind) => kind === value);

/**
 * Chase the ball: every pull samples its current x.
 */
export const createFollowPolicy = (view: SimulationView): ControlPolicy => ({
    kind: 'follow',
    nextTarget: () => (view.isComplete() ? null : view.ball.x),
});

/**
 * Clear columns left to right. Columns are fixed when the policy is created; each column is
 * re-checked on every pull so it is left as soon as its last brick falls.
 */
export const createColumnPolicy = (view: SimulationView): ControlPolicy => {
    const columns = [...new Set(Array.from(view.activeBricks(), (brick) => brick.col))].sort((a, b) => a - b);
    let cursor = 0;

    const columnHasBricks = (col: number): boolean => {
        for (const brick of view.activeBricks()) {
            if (brick.col === col) {
                return true;
            }
        }
        return false;
    };

    const nextTarget = (): number | null => {
        while (cursor < columns.length) {
            const col = columns[cursor];
            if (col !== undefined && columnHasBricks(col)) {
                return columnX(view, col);
            }
            cursor += 1;
        }
        return null;
    };

    return { kind: 'column', nextTarget };
};

/**
 * Sweep rows bottom-up, alternating direction. Each brick gets as many targets as its strength
 * at the moment its row is entered; later destruction does not change the queued count.
 */
export const createRowPolicy = (view: SimulationView): ControlPolicy => {
    let row = view.layout.rows - 1;
    let queue: number[] = [];

    const enterRow = (index: number): number[] => {
        const bricks: BrickState[] = [];
        for (const brick of view.activeBricks()) {
            if (brick.row === index) {
                bricks.push(brick);
            }
        }

        bricks.sort((a, b) => (index % 2 === 0 ? b.col - a.col : a.col - b.col));

        return bricks.flatMap((brick) => Array.from({ length: brick.strength }, () => columnX(view, brick.col)));
    };

    const nextTarget = (): number | null => {
        while (queue.length === 0) {
            if (row < 0) {
                return null;
            }
            queue = enterRow(row);
            row -= 1;
        }
        return queue.shift() ?? null;
    };

    return { kind: 'row', nextTarget };
};

export const createControlPolicy = (kind: PolicyKind, view: SimulationView): ControlPolicy => {
    switch (kind) {
        case 'follow':
            return createFollowPolicy(view);
        case 'column':
            return createColumnPolicy(view);
        case 'row':
            return createRowPolicy(view);
    }
};

import { describe, expect, it } from 'vitest';
import { DARK_THEME, scaleColor } from 'render/theme';

describe('scene theme', () => {
    it('is frozen', () => {
        expect(Object.isFrozen(DARK_THEME)).toBe(true);
        expect(Object.isFrozen(DARK_THEME.watermark)).toBe(true);
    });

    it('scales each channel and truncates', () => {
        expect(scaleColor('#ff6464', 0.5)).toBe('#7f3232');
        expect(scaleColor('#26A641', 0.85)).toBe('#208d37');
    });

    it('clamps channels to the valid range', () => {
        expect(scaleColor('#808080', 2)).toBe('#ffffff');
        expect(scaleColor('#808080', 0)).toBe('#000000');
    });

    it('rejects colors that are not #rrggbb', () => {
        expect(() => scaleColor('green', 1)).toThrow('Unsupported color: green');
        expect(() => scaleColor('#fff', 1)).toThrow('Unsupported color: #fff');
    });
});

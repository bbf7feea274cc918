export interface SceneTheme {
    readonly background: string;
    readonly gridCell: string;
    readonly paddle: string;
    readonly ball: string;
    readonly explosion: string;
    readonly flash: string;
    readonly watermark: {
        readonly text: string;
        readonly shadow: string;
        /** Distance from the bottom-right corner */
        readonly inset: number;
    };
}

const deepFreeze = <T extends object>(value: T): Readonly<T> => {
    Object.values(value).forEach((property: unknown) => {
        if (property !== null && typeof property === 'object' && !Object.isFrozen(property)) {
            deepFreeze(property);
        }
    });
    return Object.freeze(value);
};

export const DARK_THEME: SceneTheme = deepFreeze({
    background: '#0d1117',
    gridCell: '#161b22',
    paddle: '#c9d1d9',
    ball: '#ffdf00',
    explosion: '#ff6464',
    flash: '#ffffff',
    watermark: { text: '#969696', shadow: '#000000', inset: 10 },
});

const HEX_PATTERN = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/iu;

const toChannelHex = (value: number): string => Math.max(0, Math.min(255, value)).toString(16).padStart(2, '0');

/**
 * Multiply each channel of a `#rrggbb` color by `factor`, truncating toward zero.
 */
export const scaleColor = (hex: string, factor: number): string => {
    const match = HEX_PATTERN.exec(hex);
    if (!match) {
        throw new Error(`Unsupported color: ${hex}`);
    }

    const channels = match.slice(1, 4).map((channel) => Math.floor(parseInt(channel, 16) * factor));
    return `#${channels.map(toChannelHex).join('')}`;
};

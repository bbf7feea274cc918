import Matter from 'matter-js';

export const { Vector } = Matter;

export type { Vector as MatterVector } from 'matter-js';

import type { Side } from './types.js';

export type Clock = () => number;

export const now: Clock = () => Date.now();
export const clamp = (v: number, a: number, b: number) => Math.max(a, Math.min(b, v));
export const opponentOf = (side: Side): Side => (side === 'A' ? 'B' : 'A');

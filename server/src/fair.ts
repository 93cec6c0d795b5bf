import { createHash, createHmac, randomBytes } from 'node:crypto';

import type { Side } from './types.js';

const HMAC_PREFIX_BYTES = 13; // 52 bits -> 13 hex chars
const TWO_POW_52 = 2 ** 52;

/** Uniform draws in [0, 1), keyed by label. */
export interface RandomSource {
  draw(label: string): number;
}

export interface MatchSeeds {
  serverSeed: string;
  clientSeed: string;
}

export function sha256(data: string): string {
  return createHash('sha256').update(data).digest('hex');
}

export function hmacHex(key: string, payload: string): string {
  return createHmac('sha256', key).update(payload).digest('hex');
}

export function randomSeed(bytes = 32): string {
  return randomBytes(bytes).toString('hex');
}

export function uniformFromHmac(hmac: string): number {
  const slice = hmac.slice(0, HMAC_PREFIX_BYTES);
  const value = parseInt(slice, 16);
  return value / TWO_POW_52;
}

export function swingLabel(roundNo: number, side: Side, swingNo: number): string {
  return `${roundNo}:${side}:${swingNo}`;
}

export function hmacDraw(seeds: MatchSeeds, label: string): number {
  return uniformFromHmac(hmacHex(seeds.serverSeed, `${seeds.clientSeed}:${label}`));
}

export function createHmacRandomSource(seeds: MatchSeeds): RandomSource {
  return { draw: (label) => hmacDraw(seeds, label) };
}

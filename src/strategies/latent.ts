import { BYTE_SCALE } from '../constants';
import { LatentVector } from '../types';

// Out-of-range components are clamped, never rejected; NaN collapses to 0.
export function clampUnit(value: number): number {
  if (!(value > 0)) return 0;
  return value > 1 ? 1 : value;
}

// floor(t * 255). The epsilon absorbs float error so that b / 255 decodes back to b.
export function toByteValue(value: number): number {
  return Math.min(BYTE_SCALE, Math.floor(clampUnit(value) * BYTE_SCALE + 1e-9));
}

export function toByteValues(latent: LatentVector): number[] {
  return latent.map(toByteValue);
}

export function zeroVector(size: number): LatentVector {
  return new Array<number>(size).fill(0);
}

export function range(start: number, end: number): number[] {
  const out: number[] = [];
  for (let i = start; i < end; i++) out.push(i);
  return out;
}

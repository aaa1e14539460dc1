import {
  BYTE_SCALE,
  DEFAULT_INVALID_VALUE,
  DOS_HEADER_SIZE,
  HEADER_PERTURB_END,
  HEADER_PERTURB_START
} from '../constants';
import { InvalidFormatError } from '../errors';
import { readHeaderPointer } from '../pe/pe-parser';
import { DecodeContext, DecodedSample, LatentVector, ManipulationContext, ManipulationStrategy } from '../types';
import { range, toByteValues } from './latent';

export type InvalidHeaderPolicy = 'fallback' | 'reject';

export interface HeaderStrategyOptions {
  optimizeAllDos?: boolean;
  onInvalidHeader?: InvalidHeaderPolicy;
  invalidValue?: number;
  verbose?: boolean;
}

export function baseHeaderIndexes(): number[] {
  return range(HEADER_PERTURB_START, HEADER_PERTURB_END);
}

// Offsets the DOS-header attack may rewrite. Never includes 0-1 (MZ) or 60-63 (e_lfanew).
export function headerIndexesFor(original: Buffer, optimizeAllDos: boolean): number[] {
  const base = baseHeaderIndexes();
  if (!optimizeAllDos) return base;
  const pointer = readHeaderPointer(original);
  if (pointer === null) throw new InvalidFormatError(`File of ${original.length} bytes has no complete DOS header`);
  if (pointer <= DOS_HEADER_SIZE) return base;
  if (pointer > original.length) {
    throw new InvalidFormatError(`e_lfanew ${pointer} points past end of file (${original.length} bytes)`);
  }
  return base.concat(range(DOS_HEADER_SIZE, pointer));
}

export class HeaderStrategy implements ManipulationStrategy {
  readonly kind = 'header' as const;
  readonly context: ManipulationContext;
  private readonly optimizeAllDos: boolean;
  private readonly onInvalidHeader: InvalidHeaderPolicy;
  private readonly verbose: boolean;

  constructor(options: HeaderStrategyOptions = {}) {
    this.optimizeAllDos = !!options.optimizeAllDos;
    this.onInvalidHeader = options.onInvalidHeader ?? 'fallback';
    this.verbose = !!options.verbose;
    const indexes = baseHeaderIndexes();
    this.context = {
      indexesToPerturb: indexes,
      invalidValue: options.invalidValue ?? DEFAULT_INVALID_VALUE,
      latentSpaceSize: indexes.length
    };
  }

  // Recomputes the perturbable range from the concrete file, then starts from the bytes already there
  initStartingPoint(original: Buffer): LatentVector {
    if (original.length < DOS_HEADER_SIZE) {
      throw new InvalidFormatError(`File of ${original.length} bytes has no complete DOS header`);
    }
    let indexes: number[];
    try {
      indexes = headerIndexesFor(original, this.optimizeAllDos);
    } catch (e) {
      if (!(e instanceof InvalidFormatError) || this.onInvalidHeader === 'reject') throw e;
      if (this.verbose) console.warn(`⚠️  ${e.message}; perturbing the base ${HEADER_PERTURB_END - HEADER_PERTURB_START}-byte range only`);
      indexes = baseHeaderIndexes();
    }
    this.context.indexesToPerturb = indexes;
    this.context.latentSpaceSize = indexes.length;
    return indexes.map(i => original[i] / BYTE_SCALE);
  }

  decode(latent: LatentVector, original: Buffer, _ctx: DecodeContext): DecodedSample {
    const bytes = Buffer.from(original);
    const values = toByteValues(latent);
    this.context.indexesToPerturb.forEach((index, i) => {
      const value = values[i];
      if (value === undefined || value === this.context.invalidValue || index >= bytes.length) return;
      bytes[index] = value;
    });
    return { bytes };
  }
}

import { DEFAULT_INVALID_VALUE } from '../constants';
import { EvasionError } from '../errors';
import { DecodeContext, DecodedSample, LatentVector, ManipulationContext, ManipulationStrategy } from '../types';
import { range, toByteValues, zeroVector } from './latent';

export interface PaddingStrategyOptions {
  paddingBytes: number;
  invalidValue?: number;
}

// Appends latent-driven bytes after the end of the file. Data past EOF never breaks the PE layout.
export class PaddingStrategy implements ManipulationStrategy {
  readonly kind = 'padding' as const;
  readonly context: ManipulationContext;

  constructor(options: PaddingStrategyOptions) {
    if (!Number.isInteger(options.paddingBytes) || options.paddingBytes <= 0) {
      throw new EvasionError('INVALID_OPTIONS', `paddingBytes must be a positive integer, got ${options.paddingBytes}`);
    }
    this.context = {
      indexesToPerturb: range(0, options.paddingBytes),
      invalidValue: options.invalidValue ?? DEFAULT_INVALID_VALUE,
      latentSpaceSize: options.paddingBytes
    };
  }

  initStartingPoint(_original: Buffer): LatentVector {
    return zeroVector(this.context.latentSpaceSize);
  }

  decode(latent: LatentVector, original: Buffer, _ctx: DecodeContext): DecodedSample {
    const values = toByteValues(latent.slice(0, this.context.latentSpaceSize));
    return { bytes: Buffer.concat([original, Buffer.from(values)]) };
  }
}

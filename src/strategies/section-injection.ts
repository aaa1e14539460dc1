import { DEFAULT_INVALID_VALUE, DEFAULT_MAX_SECTION_SIZE, DETERMINISTIC_NAME_PREFIX } from '../constants';
import { CorpusExhaustedError, EvasionError } from '../errors';
import { PEBuilder } from '../pe/pe-builder';
import { parsePe } from '../pe/pe-parser';
import { randomSectionName } from '../rng';
import {
  DecodeContext,
  DecodedSample,
  LatentVector,
  ManipulationContext,
  ManipulationStrategy,
  SectionCorpusEntry
} from '../types';
import { clampUnit, range, zeroVector } from './latent';

export type InjectionMode = 'append' | 'register';

export interface SectionInjectionOptions {
  corpus: readonly SectionCorpusEntry[];
  mode?: InjectionMode;
  howManySections?: number;
  randomNames?: boolean;
  maxSectionSize?: number;
  invalidValue?: number;
}

// Bytes of corpus entry i that a latent component selects: a prefix that only grows with t
export function takeLength(content: Buffer, t: number): number {
  return Math.round(content.length * clampUnit(t));
}

export function deterministicSectionName(index: number): string {
  return `${DETERMINISTIC_NAME_PREFIX}${index.toString(36).padStart(4, '0')}`;
}

export class SectionInjectionStrategy implements ManipulationStrategy {
  readonly kind = 'section-injection' as const;
  readonly context: ManipulationContext;
  readonly mode: InjectionMode;
  private readonly corpus: readonly SectionCorpusEntry[];
  private readonly randomNames: boolean;
  private readonly maxSectionSize: number;

  constructor(options: SectionInjectionOptions) {
    const required = options.howManySections ?? options.corpus.length;
    if (!Number.isInteger(required) || required < 0) {
      throw new EvasionError('INVALID_OPTIONS', `howManySections must be a non-negative integer, got ${required}`);
    }
    if (required === 0 || options.corpus.length < required) {
      throw new CorpusExhaustedError(options.corpus.length, Math.max(required, 1));
    }
    this.corpus = options.corpus.slice(0, required);
    this.mode = options.mode ?? 'register';
    this.randomNames = options.randomNames ?? true;
    this.maxSectionSize = options.maxSectionSize ?? DEFAULT_MAX_SECTION_SIZE;
    this.context = {
      indexesToPerturb: range(0, required),
      invalidValue: options.invalidValue ?? DEFAULT_INVALID_VALUE,
      latentSpaceSize: required
    };
  }

  // Upper bound on the bytes a single candidate can add
  get payloadMaxSize(): number {
    return this.corpus.reduce((acc, e) => acc + e.content.length, 0);
  }

  initStartingPoint(original: Buffer): LatentVector {
    if (this.mode === 'register') parsePe(original);
    return zeroVector(this.context.latentSpaceSize);
  }

  decode(latent: LatentVector, original: Buffer, ctx: DecodeContext): DecodedSample {
    const prefixes = this.corpus.map((entry, i) => entry.content.subarray(0, takeLength(entry.content, latent[i] ?? 0)));
    if (this.mode === 'append') return { bytes: Buffer.concat([original, ...prefixes]) };

    const names = this.pickNames(ctx);
    const builder = new PEBuilder(original, parsePe(original), { maxSectionSize: this.maxSectionSize });
    prefixes.forEach((prefix, i) => {
      if (prefix.length) builder.addSection(names[i], prefix);
    });
    return { bytes: builder.build(), sectionNames: names };
  }

  // Keeps the incumbent's names so that a lineage does not churn section names between generations
  private pickNames(ctx: DecodeContext): string[] {
    const best = ctx.bestSectionNames;
    if (best && best.length === this.corpus.length) return best.slice();
    if (!this.randomNames) return this.corpus.map((_, i) => deterministicSectionName(i));
    return this.corpus.map(() => randomSectionName(ctx.rng));
  }
}

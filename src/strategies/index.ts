import { EvasionError } from '../errors';
import { ManipulationStrategy, SectionCorpusEntry } from '../types';
import { HeaderStrategy, InvalidHeaderPolicy } from './header';
import { PaddingStrategy } from './padding';
import { InjectionMode, SectionInjectionStrategy } from './section-injection';

export { PaddingStrategy } from './padding';
export { HeaderStrategy, headerIndexesFor, baseHeaderIndexes } from './header';
export { SectionInjectionStrategy, takeLength, deterministicSectionName } from './section-injection';
export type { InvalidHeaderPolicy } from './header';
export type { InjectionMode } from './section-injection';

export type StrategyConfig =
  | { kind: 'padding'; paddingBytes: number }
  | { kind: 'header'; optimizeAllDos?: boolean; onInvalidHeader?: InvalidHeaderPolicy }
  | {
      kind: 'section-injection';
      mode?: InjectionMode;
      howManySections?: number;
      randomNames?: boolean;
      maxSectionSize?: number;
    };

export function createStrategy(
  config: StrategyConfig,
  deps: { corpus?: readonly SectionCorpusEntry[]; verbose?: boolean } = {}
): ManipulationStrategy {
  switch (config.kind) {
    case 'padding':
      return new PaddingStrategy(config);
    case 'header':
      return new HeaderStrategy({ ...config, verbose: deps.verbose });
    case 'section-injection':
      if (!deps.corpus) throw new EvasionError('INVALID_OPTIONS', 'section-injection requires a section corpus');
      return new SectionInjectionStrategy({ ...config, corpus: deps.corpus });
  }
}

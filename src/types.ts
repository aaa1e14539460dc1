import type { SeededRandom } from './rng';

export type LatentVector = number[];

// Opaque detector: maps raw bytes to a maliciousness confidence in [0,1].
// Must be side-effect free and idempotent for identical input.
export interface ModelWrapper {
  score(bytes: Buffer): Promise<number>;
}

export interface ManipulationContext {
  indexesToPerturb: number[];
  invalidValue: number;
  latentSpaceSize: number;
}

export interface DecodeContext {
  rng: SeededRandom;
  bestSectionNames?: readonly string[];
}

export interface DecodedSample {
  bytes: Buffer;
  sectionNames?: string[];
}

export type StrategyKind = 'padding' | 'header' | 'section-injection';

export interface ManipulationStrategy {
  readonly kind: StrategyKind;
  readonly context: ManipulationContext;
  initStartingPoint(original: Buffer): LatentVector;
  decode(latent: LatentVector, original: Buffer, ctx: DecodeContext): DecodedSample;
}

export interface SectionCorpusEntry {
  content: Buffer;
  sectionName?: string;
  sourceFile?: string;
}

export type LossKind = 'l1' | 'l2' | 'log';
export type LossFunction = (confidence: number) => number;

export interface Individual {
  latent: LatentVector;
  confidence: number;
  fitness: number;
  size: number;
  sectionNames?: string[];
  adversarial?: Buffer; // dropped once the generation has committed
  failure?: string; // rebuild failure message when the candidate could not be decoded
}

export interface GenerationRecord {
  index: number;
  best: Individual;
  sectionNames: string[][];
  evaluated: number;
  failures: number;
  evaded: boolean;
}

export interface FitnessRecord {
  confidence: number[];
  fitness: number[];
  size: number[];
}

export interface BestSolution {
  latent: LatentVector;
  adversarial: Buffer;
  confidence: number;
  fitness: number;
  size: number;
  generation: number;
  sectionNames?: string[];
}

export interface ExportedResults extends FitnessRecord {
  bestSectionNames?: string[];
}

export type StopReason = 'evaded' | 'budget-exhausted';

export interface EvasionResult extends ExportedResults {
  originalSize: number;
  generations: number;
  stopReason: StopReason;
  best: BestSolution | null;
}

// Variation half of the search; survival selection stays in the engine.
export interface SearchOperator {
  initialize(start: LatentVector, populationSize: number, rng: SeededRandom): LatentVector[];
  propose(population: readonly Individual[], populationSize: number, rng: SeededRandom): LatentVector[];
}

import {
  DEFAULT_CONCURRENCY,
  DEFAULT_ITERATIONS,
  DEFAULT_THRESHOLD,
  HARD_LABEL_SENTINEL,
  LOG_LOSS_EPSILON,
  WORST_FITNESS
} from './constants';
import { mapWithConcurrency } from './concurrency';
import { EvasionError, RebuildError } from './errors';
import { GeneticSearchOperator } from './optimizer/genetic';
import { scoreWithRetry } from './oracle/score';
import { SeededRandom } from './rng';
import { clampUnit } from './strategies/latent';
import {
  BestSolution,
  DecodeContext,
  DecodedSample,
  EvasionResult,
  ExportedResults,
  FitnessRecord,
  GenerationRecord,
  Individual,
  LatentVector,
  LossFunction,
  LossKind,
  ManipulationStrategy,
  ModelWrapper,
  SearchOperator,
  StopReason
} from './types';

export interface EvasionProblemOptions {
  oracle: ModelWrapper;
  strategy: ManipulationStrategy;
  populationSize: number;
  iterations?: number;
  penaltyRegularizer?: number;
  seed?: number;
  debug?: boolean;
  hardLabel?: boolean;
  threshold?: number;
  loss?: LossKind | LossFunction;
  concurrency?: number; // 0 = every candidate of a generation at once
  searchOperator?: SearchOperator;
}

export interface FitnessParameters {
  penaltyRegularizer: number;
  hardLabel: boolean;
  threshold: number;
  loss: LossFunction;
}

export function resolveLoss(loss: LossKind | LossFunction = 'l1'): LossFunction {
  if (typeof loss === 'function') return loss;
  switch (loss) {
    case 'l1':
      return c => Math.abs(c);
    case 'l2':
      return c => c * c;
    case 'log':
      return c => -Math.log(1 - Math.min(c, 1 - LOG_LOSS_EPSILON));
    default:
      throw new EvasionError('INVALID_OPTIONS', `Unknown loss "${String(loss)}"`);
  }
}

// Lower is closer to evasion. Hard-label mode hides the score of still-detected candidates behind a sentinel.
export function computeFitness(confidence: number, sizeGrowth: number, params: FitnessParameters): number {
  if (params.hardLabel && confidence >= params.threshold) return HARD_LABEL_SENTINEL;
  return params.loss(confidence) + params.penaltyRegularizer * sizeGrowth;
}

function withoutBytes(ind: Individual): Individual {
  const { adversarial: _dropped, ...rest } = ind;
  return rest;
}

function argmin(values: readonly number[], from: number): number {
  let index = from;
  for (let i = from + 1; i < values.length; i++) if (values[i] < values[index]) index = i;
  return index;
}

function requirePositiveInt(name: string, value: number, allowZero = false) {
  if (!Number.isInteger(value) || value < 0 || (!allowZero && value === 0)) {
    throw new EvasionError('INVALID_OPTIONS', `${name} must be a ${allowZero ? 'non-negative' : 'positive'} integer, got ${value}`);
  }
}

export class EvasionProblem {
  readonly populationSize: number;
  readonly iterations: number;
  readonly penaltyRegularizer: number;
  readonly hardLabel: boolean;
  readonly threshold: number;
  readonly debug: boolean;
  readonly concurrency: number;
  readonly seed?: number;
  private readonly oracle: ModelWrapper;
  private readonly strategy: ManipulationStrategy;
  private readonly operator: SearchOperator;
  private readonly fitnessParams: FitnessParameters;
  private rng: SeededRandom;
  private original: Buffer | null = null;
  private start: LatentVector | null = null;
  private population: Individual[] = [];
  private history: FitnessRecord = { confidence: [], fitness: [], size: [] };
  private generations: GenerationRecord[] = [];
  private best: BestSolution | null = null;

  constructor(options: EvasionProblemOptions) {
    this.populationSize = options.populationSize;
    this.iterations = options.iterations ?? DEFAULT_ITERATIONS;
    this.penaltyRegularizer = options.penaltyRegularizer ?? 0;
    this.hardLabel = !!options.hardLabel;
    this.threshold = options.threshold ?? DEFAULT_THRESHOLD;
    this.debug = !!options.debug;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.seed = options.seed;
    requirePositiveInt('populationSize', this.populationSize);
    requirePositiveInt('iterations', this.iterations, true);
    requirePositiveInt('concurrency', this.concurrency, true);
    if (!Number.isFinite(this.penaltyRegularizer) || this.penaltyRegularizer < 0) {
      throw new EvasionError('INVALID_OPTIONS', `penaltyRegularizer must be a finite non-negative number, got ${this.penaltyRegularizer}`);
    }
    if (!(this.threshold >= 0 && this.threshold <= 1)) {
      throw new EvasionError('INVALID_OPTIONS', `threshold must lie in [0,1], got ${this.threshold}`);
    }
    this.oracle = options.oracle;
    this.strategy = options.strategy;
    this.operator = options.searchOperator ?? new GeneticSearchOperator();
    this.fitnessParams = {
      penaltyRegularizer: this.penaltyRegularizer,
      hardLabel: this.hardLabel,
      threshold: this.threshold,
      loss: resolveLoss(options.loss)
    };
    this.rng = new SeededRandom(this.seed);
  }

  get latentSpaceSize(): number {
    return this.strategy.context.latentSpaceSize;
  }

  get bestSolution(): BestSolution | null {
    return this.best;
  }

  get generationLog(): readonly GenerationRecord[] {
    return this.generations;
  }

  get currentPopulation(): readonly Individual[] {
    return this.population;
  }

  initStartingPoint(original: Buffer): LatentVector {
    this.rng = new SeededRandom(this.seed);
    this.population = [];
    this.history = { confidence: [], fitness: [], size: [] };
    this.generations = [];
    this.best = null;
    this.start = this.strategy.initStartingPoint(original);
    this.original = original;
    return this.start.slice();
  }

  async evaluate(latents: readonly LatentVector[]): Promise<Individual[]> {
    const original = this.requireOriginal();
    // forks are drawn in candidate order before any work is dispatched
    const contexts: DecodeContext[] = latents.map(() => ({
      rng: this.rng.fork(),
      bestSectionNames: this.best?.sectionNames
    }));
    return mapWithConcurrency(latents, this.concurrency, (latent, i) => this.evaluateOne(latent, original, contexts[i]));
  }

  async step(): Promise<GenerationRecord> {
    if (!this.generations.length) await this.evaluateBaseline();
    const proposals = this.population.length
      ? this.operator.propose(this.population, this.populationSize, this.rng)
      : this.operator.initialize(this.requireStart(), this.populationSize, this.rng);
    const offspring = await this.evaluate(proposals);
    return this.commit(offspring);
  }

  async run(original?: Buffer): Promise<EvasionResult> {
    if (original) this.initStartingPoint(original);
    const source = this.requireOriginal();
    if (this.debug) {
      console.log(`🚀 ${this.strategy.kind} attack: d=${this.latentSpaceSize}, population=${this.populationSize}, iterations=${this.iterations}, seed=${this.rng.seed}`);
    }
    if (!this.generations.length) await this.evaluateBaseline();
    let stopReason: StopReason = 'budget-exhausted';
    for (let i = 0; i < this.iterations; i++) {
      const record = await this.step();
      if (this.threshold > 0 && record.evaded) {
        stopReason = 'evaded';
        break;
      }
    }
    if (this.debug) {
      const summary = this.best ? `best fitness ${this.best.fitness.toFixed(6)} (confidence ${this.best.confidence.toFixed(4)})` : 'no solution';
      console.log(`🏁 stopped after ${this.generations.length - 1} generations (${stopReason}): ${summary}`);
    }
    return {
      ...this.exportResults(),
      originalSize: source.length,
      generations: this.generations.length - 1,
      stopReason,
      best: this.best
    };
  }

  // Section names are snapshotted from the generation that produced the incumbent
  exportResults(): ExportedResults {
    const result: ExportedResults = {
      confidence: this.history.confidence.slice(),
      fitness: this.history.fitness.slice(),
      size: this.history.size.slice()
    };
    if (this.history.fitness.length > 1) {
      const names = this.generations[argmin(this.history.fitness, 1)].best.sectionNames;
      if (names) result.bestSectionNames = names.slice();
    }
    return result;
  }

  private async evaluateOne(latent: LatentVector, original: Buffer, ctx: DecodeContext): Promise<Individual> {
    const clamped = latent.map(clampUnit);
    let decoded: DecodedSample;
    try {
      decoded = this.strategy.decode(clamped, original, ctx);
    } catch (e) {
      if (!(e instanceof RebuildError)) throw e;
      if (this.debug) console.warn(`⚠️  candidate discarded: ${e.message}`);
      return { latent: clamped, confidence: 1, fitness: WORST_FITNESS, size: original.length, failure: e.message };
    }
    const confidence = await scoreWithRetry(this.oracle, decoded.bytes, this.debug);
    const size = decoded.bytes.length;
    return {
      latent: clamped,
      confidence,
      fitness: computeFitness(confidence, size - original.length, this.fitnessParams),
      size,
      sectionNames: decoded.sectionNames,
      adversarial: decoded.bytes
    };
  }

  private async evaluateBaseline(): Promise<GenerationRecord> {
    const [baseline] = await this.evaluate([this.requireStart()]);
    const record: GenerationRecord = {
      index: 0,
      best: withoutBytes(baseline),
      sectionNames: [baseline.sectionNames ?? []],
      evaluated: 1,
      failures: baseline.failure ? 1 : 0,
      evaded: !baseline.failure && baseline.confidence < this.threshold
    };
    this.record(record);
    return record;
  }

  // Single commit point per generation: survivors, history, generation log and incumbent
  private commit(offspring: Individual[]): GenerationRecord {
    const index = this.generations.length;
    // stable: on equal fitness earlier survivors stay ahead of new candidates
    const survivors = [...this.population, ...offspring].sort((a, b) => a.fitness - b.fitness).slice(0, this.populationSize);
    const leader = survivors[0];
    const record: GenerationRecord = {
      index,
      best: withoutBytes(leader),
      sectionNames: offspring.map(o => o.sectionNames ?? []),
      evaluated: offspring.length,
      failures: offspring.filter(o => o.failure).length,
      evaded: offspring.some(o => !o.failure && o.confidence < this.threshold)
    };
    if (leader.adversarial && (!this.best || leader.fitness < this.best.fitness)) {
      this.best = {
        latent: leader.latent.slice(),
        adversarial: leader.adversarial,
        confidence: leader.confidence,
        fitness: leader.fitness,
        size: leader.size,
        generation: index,
        sectionNames: leader.sectionNames?.slice()
      };
    }
    this.population = survivors.map(withoutBytes);
    this.record(record);
    return record;
  }

  private record(record: GenerationRecord) {
    this.history.confidence.push(record.best.confidence);
    this.history.fitness.push(record.best.fitness);
    this.history.size.push(record.best.size);
    this.generations.push(record);
    if (this.debug) {
      const b = record.best;
      console.log(`🧬 generation ${record.index}: fitness=${b.fitness.toFixed(6)} confidence=${b.confidence.toFixed(4)} size=${b.size}${record.failures ? ` failures=${record.failures}` : ''}`);
    }
  }

  private requireOriginal(): Buffer {
    if (!this.original) throw new EvasionError('INVALID_OPTIONS', 'initStartingPoint must be called before evaluating candidates');
    return this.original;
  }

  private requireStart(): LatentVector {
    this.requireOriginal();
    if (!this.start) throw new EvasionError('INVALID_OPTIONS', 'No starting point');
    return this.start;
  }
}

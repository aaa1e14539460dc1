import { DEFAULT_CROSSOVER_RATE, DEFAULT_MUTATION_SCALE } from '../constants';
import { SeededRandom } from '../rng';
import { clampUnit } from '../strategies/latent';
import { Individual, LatentVector, SearchOperator } from '../types';

export interface GeneticOperatorOptions {
  crossoverRate?: number;
  mutationRate?: number; // per-gene probability, defaults to 1/d
  mutationScale?: number;
  tournamentSize?: number;
}

// Tournament selection, uniform crossover and bounded uniform mutation over [0,1]^d.
// Survival is left to the caller.
export class GeneticSearchOperator implements SearchOperator {
  private readonly crossoverRate: number;
  private readonly mutationRate?: number;
  private readonly mutationScale: number;
  private readonly tournamentSize: number;

  constructor(options: GeneticOperatorOptions = {}) {
    this.crossoverRate = options.crossoverRate ?? DEFAULT_CROSSOVER_RATE;
    this.mutationRate = options.mutationRate;
    this.mutationScale = options.mutationScale ?? DEFAULT_MUTATION_SCALE;
    this.tournamentSize = Math.max(1, options.tournamentSize ?? 2);
  }

  // The starting point always takes part, so the first generation is never worse than the baseline
  initialize(start: LatentVector, populationSize: number, rng: SeededRandom): LatentVector[] {
    const out: LatentVector[] = [start.slice()];
    while (out.length < populationSize) out.push(start.map(() => rng.next()));
    return out;
  }

  propose(population: readonly Individual[], populationSize: number, rng: SeededRandom): LatentVector[] {
    if (!population.length) throw new Error('Cannot propose offspring from an empty population');
    const out: LatentVector[] = [];
    while (out.length < populationSize) {
      const a = this.tournament(population, rng).latent;
      const b = this.tournament(population, rng).latent;
      const child = rng.next() < this.crossoverRate ? a.map((gene, i) => (rng.next() < 0.5 ? gene : b[i])) : a.slice();
      out.push(this.mutate(child, rng));
    }
    return out;
  }

  private tournament(population: readonly Individual[], rng: SeededRandom): Individual {
    let winner = population[rng.int(0, population.length - 1)];
    for (let k = 1; k < this.tournamentSize; k++) {
      const challenger = population[rng.int(0, population.length - 1)];
      if (challenger.fitness < winner.fitness) winner = challenger;
    }
    return winner;
  }

  private mutate(child: LatentVector, rng: SeededRandom): LatentVector {
    const rate = this.mutationRate ?? 1 / Math.max(1, child.length);
    return child.map(gene => (rng.next() < rate ? clampUnit(gene + (rng.next() * 2 - 1) * this.mutationScale) : gene));
  }
}

import { HARD_LABEL_SENTINEL, WORST_FITNESS } from '../src/constants';
import { EvasionError, OracleError } from '../src/errors';
import { EvasionProblem, computeFitness, resolveLoss } from '../src/evasion-problem';
import { PaddingStrategy, SectionInjectionStrategy } from '../src/strategies';
import { ModelWrapper } from '../src/types';
import { FakeOracle, tailOracle } from './helpers/fake-oracle';
import { filled, makePe } from './helpers/pe-fixture';

describe('fitness', () => {
  const params = { penaltyRegularizer: 0.01, hardLabel: true, threshold: 0.5, loss: resolveLoss('l1') };

  it('assigns the sentinel to detected candidates in hard-label mode', () => {
    expect(computeFitness(0.9, 10, params)).toBe(HARD_LABEL_SENTINEL);
    expect(computeFitness(0.5, 0, params)).toBe(HARD_LABEL_SENTINEL);
  });

  it('uses the soft-label formula for evasive candidates in hard-label mode', () => {
    expect(computeFitness(0.3, 10, params)).toBeCloseTo(0.4);
  });

  it('combines loss and size penalty in soft-label mode', () => {
    expect(computeFitness(0.9, 10, { ...params, hardLabel: false })).toBeCloseTo(1.0);
    expect(computeFitness(0.9, 10, { ...params, hardLabel: false, penaltyRegularizer: 0 })).toBeCloseTo(0.9);
  });

  it('resolves loss kinds', () => {
    expect(resolveLoss('l2')(0.5)).toBeCloseTo(0.25);
    expect(resolveLoss('log')(0)).toBeCloseTo(0);
    expect(resolveLoss('log')(0.5)).toBeCloseTo(Math.log(2));
    expect(Number.isFinite(resolveLoss('log')(1))).toBe(true);
    const custom = (c: number) => c * 10;
    expect(resolveLoss(custom)).toBe(custom);
  });
});

describe('EvasionProblem', () => {
  const original = makePe();
  const paddingProblem = (extra: Partial<ConstructorParameters<typeof EvasionProblem>[0]> = {}) =>
    new EvasionProblem({
      oracle: tailOracle(original.length),
      strategy: new PaddingStrategy({ paddingBytes: 16 }),
      populationSize: 6,
      iterations: 8,
      seed: 7,
      threshold: 0,
      ...extra
    });

  it('records a baseline plus one entry per generation with a non-increasing best fitness', async () => {
    const result = await paddingProblem().run(original);
    expect(result.generations).toBe(8);
    expect(result.stopReason).toBe('budget-exhausted');
    expect(result.fitness).toHaveLength(9);
    expect(result.confidence).toHaveLength(9);
    expect(result.size).toHaveLength(9);
    expect(result.fitness[0]).toBe(1);
    for (let k = 1; k < result.fitness.length; k++) expect(result.fitness[k]).toBeLessThanOrEqual(result.fitness[k - 1]);
    expect(result.best).not.toBeNull();
    expect(result.best?.generation).toBeGreaterThanOrEqual(1);
    expect(result.best?.fitness).toBe(Math.min(...result.fitness.slice(1)));
    expect(result.best?.adversarial.length).toBe(original.length + 16);
    expect(result.best?.adversarial.subarray(0, original.length).equals(original)).toBe(true);
  });

  it('keeps the earliest generation when later ones only tie', async () => {
    const result = await paddingProblem().run(original);
    const first = result.fitness.indexOf(Math.min(...result.fitness.slice(1)), 1);
    expect(result.best?.generation).toBe(first);
  });

  it('is reproducible under a seed regardless of concurrency', async () => {
    const a = await paddingProblem({ concurrency: 1 }).run(original);
    const b = await paddingProblem({ concurrency: 0 }).run(original);
    expect(b.fitness).toEqual(a.fitness);
    expect(b.best?.latent).toEqual(a.best?.latent);
  });

  it('does not change results in debug mode', async () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    try {
      const quiet = await paddingProblem().run(original);
      const loud = await paddingProblem({ debug: true }).run(original);
      expect(loud.fitness).toEqual(quiet.fitness);
      expect(log).toHaveBeenCalled();
    } finally {
      log.mockRestore();
    }
  });

  it('stops after the first generation holding an evasive candidate', async () => {
    const oracle = new FakeOracle(bytes => (bytes.subarray(original.length).some(b => b !== 0) ? 0.2 : 0.9));
    const problem = paddingProblem({ oracle, threshold: 0.5, iterations: 20 });
    const result = await problem.run(original);
    expect(result.stopReason).toBe('evaded');
    expect(result.generations).toBe(1);
    expect(oracle.calls).toBe(1 + 6);
    expect(problem.generationLog[1].evaded).toBe(true);
    expect(result.best?.confidence).toBe(0.2);
  });

  it('ignores the threshold for early stopping when it is 0', async () => {
    const oracle = new FakeOracle(() => 0.1);
    const result = await paddingProblem({ oracle, iterations: 3 }).run(original);
    expect(result.generations).toBe(3);
    expect(result.stopReason).toBe('budget-exhausted');
  });

  it('retries a failed oracle call once', async () => {
    let calls = 0;
    const oracle: ModelWrapper = {
      score: async () => {
        calls++;
        if (calls === 2) throw new Error('transient');
        return 0.7;
      }
    };
    const result = await paddingProblem({ oracle, iterations: 1 }).run(original);
    expect(result.generations).toBe(1);
    expect(calls).toBe(1 + 6 + 1);
  });

  it('propagates persistent oracle failures without touching committed state', async () => {
    let calls = 0;
    const oracle: ModelWrapper = {
      score: async () => {
        calls++;
        if (calls > 1) throw new Error('detector offline');
        return 0.7;
      }
    };
    const problem = paddingProblem({ oracle, concurrency: 1 });
    const err = await problem.run(original).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(OracleError);
    expect(err instanceof OracleError && err.retryable).toBe(false);
    expect(problem.generationLog).toHaveLength(1);
    expect(problem.bestSolution).toBeNull();
    expect(problem.exportResults().fitness).toEqual([0.7]);
  });

  it('rejects out-of-range oracle scores', async () => {
    const problem = paddingProblem({ oracle: new FakeOracle(() => 1.5) });
    problem.initStartingPoint(original);
    await expect(problem.evaluate([new Array(16).fill(0)])).rejects.toBeInstanceOf(OracleError);
  });

  it('evaluates a generation in parallel up to the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const oracle: ModelWrapper = {
      score: async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise(r => setImmediate(r));
        inFlight--;
        return 0.5;
      }
    };
    const vectors = Array.from({ length: 5 }, () => new Array(16).fill(0.5));
    const all = paddingProblem({ oracle });
    all.initStartingPoint(original);
    await all.evaluate(vectors);
    expect(peak).toBe(5);

    peak = 0;
    const bounded = paddingProblem({ oracle, concurrency: 2 });
    bounded.initStartingPoint(original);
    const individuals = await bounded.evaluate(vectors);
    expect(peak).toBe(2);
    expect(individuals).toHaveLength(5);
    expect(individuals[0].size).toBe(original.length + 16);
  });

  it('clamps latent components before decoding', async () => {
    const problem = paddingProblem();
    problem.initStartingPoint(original);
    const [ind] = await problem.evaluate([[2, -1, ...new Array(14).fill(0)]]);
    expect(ind.latent.slice(0, 2)).toEqual([1, 0]);
    expect(ind.adversarial?.[original.length]).toBe(255);
  });

  it('gives rebuild failures the worst fitness without querying the oracle', async () => {
    const oracle = new FakeOracle(() => 0.5);
    const problem = new EvasionProblem({
      oracle,
      strategy: new SectionInjectionStrategy({ corpus: [{ content: filled(100, 1) }], maxSectionSize: 10 }),
      populationSize: 2,
      threshold: 0
    });
    problem.initStartingPoint(original);
    const [failed, ok] = await problem.evaluate([[1], [0.05]]);
    expect(failed.fitness).toBe(WORST_FITNESS);
    expect(failed.failure).toMatch(/exceeds limit/);
    expect(failed.size).toBe(original.length);
    expect(ok.fitness).toBe(0.5);
    expect(oracle.calls).toBe(1);
  });

  it('reuses the incumbent section names in every later generation', async () => {
    const oracle = new FakeOracle(bytes => Math.max(0, 1 - (bytes.length - original.length) / 8192));
    const problem = new EvasionProblem({
      oracle,
      strategy: new SectionInjectionStrategy({ corpus: [{ content: filled(700, 1) }, { content: filled(300, 2) }] }),
      populationSize: 4,
      iterations: 4,
      seed: 11,
      threshold: 0
    });
    const result = await problem.run(original);
    const log = problem.generationLog;
    const incumbentNames = log[1].best.sectionNames;
    expect(incumbentNames).toHaveLength(2);
    for (const record of log.slice(2)) {
      for (const names of record.sectionNames) expect(names).toEqual(incumbentNames);
    }
    expect(result.bestSectionNames).toEqual(result.best?.sectionNames);
    expect(result.bestSectionNames).toEqual(incumbentNames);
  });

  it('validates its options', () => {
    const strategy = new PaddingStrategy({ paddingBytes: 4 });
    const oracle = new FakeOracle(() => 0);
    expect(() => new EvasionProblem({ oracle, strategy, populationSize: 0 })).toThrow(EvasionError);
    expect(() => new EvasionProblem({ oracle, strategy, populationSize: 2, threshold: 2 })).toThrow(/threshold/);
    expect(() => new EvasionProblem({ oracle, strategy, populationSize: 2, penaltyRegularizer: -1 })).toThrow(/penaltyRegularizer/);
  });

  it('refuses to evaluate before a starting point exists', async () => {
    const problem = paddingProblem();
    await expect(problem.evaluate([[0]])).rejects.toThrow(/initStartingPoint/);
  });
});

import { CorpusExhaustedError, InvalidFormatError, RebuildError } from '../src/errors';
import { parsePe, sectionContent } from '../src/pe/pe-parser';
import { SeededRandom } from '../src/rng';
import { SectionInjectionStrategy, deterministicSectionName, takeLength } from '../src/strategies';
import { filled, makePe } from './helpers/pe-fixture';

describe('SectionInjectionStrategy', () => {
  const corpus = [
    { content: filled(10, 1), sectionName: '.data', sourceFile: 'a.exe' },
    { content: filled(20, 2) },
    { content: filled(7, 3) }
  ];
  const original = makePe();

  it('takes a rounded prefix of each entry', () => {
    expect(takeLength(filled(10, 0), 0.5)).toBe(5);
    expect(takeLength(filled(7, 0), 0.2)).toBe(1);
    expect(takeLength(filled(7, 0), 1.5)).toBe(7);
    expect(takeLength(filled(7, 0), -1)).toBe(0);
  });

  it('appends the concatenated prefixes in raw mode', () => {
    const s = new SectionInjectionStrategy({ corpus, mode: 'append' });
    expect(s.context.latentSpaceSize).toBe(3);
    const { bytes, sectionNames } = s.decode([0.5, 1, 0.2], original, { rng: new SeededRandom(1) });
    expect(bytes.length).toBe(original.length + 5 + 20 + 1);
    expect(bytes.subarray(original.length).equals(Buffer.concat([filled(10, 1).subarray(0, 5), filled(20, 2), filled(7, 3).subarray(0, 1)]))).toBe(true);
    expect(sectionNames).toBeUndefined();
    expect(parsePe(bytes).numberOfSections).toBe(1);
  });

  it('registers one section per non-empty prefix', () => {
    const s = new SectionInjectionStrategy({ corpus });
    s.initStartingPoint(original);
    const { bytes, sectionNames } = s.decode([0.5, 0, 1], original, { rng: new SeededRandom(1) });
    const pe = parsePe(bytes);
    expect(pe.numberOfSections).toBe(3);
    expect(sectionNames).toHaveLength(3);
    expect(pe.sections.slice(1).map(x => x.name)).toEqual([sectionNames?.[0], sectionNames?.[2]]);
    expect(pe.sections.slice(1).map(x => x.virtualSize)).toEqual([5, 7]);
    expect(sectionContent(bytes, pe.sections[2]).subarray(0, 7).equals(filled(7, 3))).toBe(true);
    expect(bytes.length).toBeGreaterThanOrEqual(original.length);
  });

  it('registers sections in a PE32+ image', () => {
    const wide = makePe({ pe64: true });
    const s = new SectionInjectionStrategy({ corpus, randomNames: false });
    s.initStartingPoint(wide);
    const pe = parsePe(s.decode([1, 1, 1], wide, { rng: new SeededRandom(1) }).bytes);
    expect(pe.is64).toBe(true);
    expect(pe.numberOfSections).toBe(4);
    expect(pe.dataDirectories).toHaveLength(16);
    expect(pe.sections.map(x => x.name)).toEqual(['.text', '.pvd0000', '.pvd0001', '.pvd0002']);
  });

  it('draws 8-character alphanumeric names from the candidate generator', () => {
    const s = new SectionInjectionStrategy({ corpus });
    const a = s.decode([1, 1, 1], original, { rng: new SeededRandom(9) }).sectionNames ?? [];
    const b = s.decode([1, 1, 1], original, { rng: new SeededRandom(9) }).sectionNames ?? [];
    expect(a).toEqual(b);
    for (const name of a) expect(name).toMatch(/^[A-Za-z0-9]{8}$/);
  });

  it('reuses the incumbent names once they exist', () => {
    const s = new SectionInjectionStrategy({ corpus });
    const best = ['keep0', 'keep1', 'keep2'];
    const { bytes, sectionNames } = s.decode([1, 1, 1], original, { rng: new SeededRandom(5), bestSectionNames: best });
    expect(sectionNames).toEqual(best);
    expect(parsePe(bytes).sections.slice(1).map(x => x.name)).toEqual(best);
  });

  it('uses deterministic names when random names are disabled', () => {
    const s = new SectionInjectionStrategy({ corpus, randomNames: false });
    const { sectionNames } = s.decode([1, 1, 1], original, { rng: new SeededRandom(5) });
    expect(sectionNames).toEqual(['.pvd0000', '.pvd0001', '.pvd0002']);
    expect(deterministicSectionName(35)).toBe('.pvd000z');
  });

  it('leaves the binary unchanged for the zero vector', () => {
    const s = new SectionInjectionStrategy({ corpus });
    const start = s.initStartingPoint(original);
    expect(start).toEqual([0, 0, 0]);
    expect(s.decode(start, original, { rng: new SeededRandom(5) }).bytes.equals(original)).toBe(true);
  });

  it('fails fast when the corpus is too small', () => {
    expect(() => new SectionInjectionStrategy({ corpus: [] })).toThrow(CorpusExhaustedError);
    expect(() => new SectionInjectionStrategy({ corpus, howManySections: 4 })).toThrow(CorpusExhaustedError);
    expect(new SectionInjectionStrategy({ corpus, howManySections: 2 }).context.latentSpaceSize).toBe(2);
  });

  it('surfaces rebuild failures', () => {
    const s = new SectionInjectionStrategy({ corpus, maxSectionSize: 8 });
    expect(() => s.decode([0, 1, 0], original, { rng: new SeededRandom(5) })).toThrow(RebuildError);
  });

  it('requires a PE input in register mode', () => {
    const s = new SectionInjectionStrategy({ corpus });
    expect(() => s.initStartingPoint(Buffer.from('not a pe at all'))).toThrow(InvalidFormatError);
    expect(() => new SectionInjectionStrategy({ corpus, mode: 'append' }).initStartingPoint(Buffer.from('raw'))).not.toThrow();
  });
});

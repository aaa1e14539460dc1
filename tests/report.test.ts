import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { buildReport, sha256, writeEvasionReport, writeJsonAtomic } from '../src/report';
import { EvasionResult } from '../src/types';

const result = (withBest: boolean): EvasionResult => ({
  confidence: [0.9, 0.4],
  fitness: [0.9, 0.4],
  size: [100, 104],
  bestSectionNames: ['abcdefgh'],
  originalSize: 100,
  generations: 1,
  stopReason: 'evaded',
  best: withBest
    ? { latent: [0.5], adversarial: Buffer.from('adv'), confidence: 0.4, fitness: 0.4, size: 104, generation: 1, sectionNames: ['abcdefgh'] }
    : null
});

describe('evasion report', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pevade-report-'));
  });
  afterEach(async () => {
    await fs.remove(dir);
  });

  it('summarises the incumbent', () => {
    const report = buildReport(result(true), 'x.adv', new Date('2026-01-02T03:04:05.000Z'));
    expect(report.generatedAt).toBe('2026-01-02T03:04:05.000Z');
    expect(report.best).toEqual({ generation: 1, confidence: 0.4, fitness: 0.4, size: 104, sha256: sha256(Buffer.from('adv')), file: 'x.adv', latent: [0.5] });
    expect(report.history.size).toEqual([100, 104]);
    expect(report.bestSectionNames).toEqual(['abcdefgh']);
  });

  it('hashes with sha256', () => {
    expect(sha256(Buffer.from('abc'))).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('writes the adversarial binary and the JSON report', async () => {
    await writeEvasionReport(result(true), path.join(dir, 'out'), 'sample.exe');
    expect((await fs.readFile(path.join(dir, 'out', 'sample.exe.adv'))).toString()).toBe('adv');
    const json = await fs.readJson(path.join(dir, 'out', 'sample.exe.report.json'));
    expect(json.stopReason).toBe('evaded');
    expect(json.best.file).toBe('sample.exe.adv');
  });

  it('writes only the report when there is no incumbent', async () => {
    const report = await writeEvasionReport(result(false), dir, 'sample.exe');
    expect(report.best).toBeNull();
    expect((await fs.readdir(dir)).sort()).toEqual(['sample.exe.report.json']);
  });

  it('replaces JSON files atomically', async () => {
    const file = path.join(dir, 'data.json');
    await writeJsonAtomic(file, { a: 1 });
    await writeJsonAtomic(file, { a: 2 });
    expect(await fs.readJson(file)).toEqual({ a: 2 });
    expect(await fs.readdir(dir)).toEqual(['data.json']);
  });
});

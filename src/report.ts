import * as crypto from 'crypto';
import * as fs from 'fs-extra';
import * as path from 'path';
import { EvasionResult } from './types';

export interface EvasionReport {
  schemaVersion: 1;
  generatedAt: string;
  originalSize: number;
  generations: number;
  stopReason: EvasionResult['stopReason'];
  history: { confidence: number[]; fitness: number[]; size: number[] };
  bestSectionNames?: string[];
  best: null | {
    generation: number;
    confidence: number;
    fitness: number;
    size: number;
    sha256: string;
    file: string;
    latent: number[];
  };
}

// Write to a sibling temp file, then rename over the destination
export async function writeJsonAtomic(file: string, data: unknown): Promise<void> {
  const tmp = `${file}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`;
  await fs.outputJson(tmp, data, { spaces: 2 });
  await fs.move(tmp, file, { overwrite: true });
}

export function sha256(buf: Buffer): string {
  return crypto.createHash('sha256').update(buf).digest('hex');
}

export function buildReport(result: EvasionResult, adversarialFile: string, now: Date = new Date()): EvasionReport {
  const best = result.best;
  return {
    schemaVersion: 1,
    generatedAt: now.toISOString(),
    originalSize: result.originalSize,
    generations: result.generations,
    stopReason: result.stopReason,
    history: { confidence: result.confidence, fitness: result.fitness, size: result.size },
    bestSectionNames: result.bestSectionNames,
    best: best
      ? {
          generation: best.generation,
          confidence: best.confidence,
          fitness: best.fitness,
          size: best.size,
          sha256: sha256(best.adversarial),
          file: adversarialFile,
          latent: best.latent
        }
      : null
  };
}

// Emits <baseName>.adv (best adversarial binary, when one exists) and <baseName>.report.json
export async function writeEvasionReport(result: EvasionResult, outDir: string, baseName: string): Promise<EvasionReport> {
  await fs.ensureDir(outDir);
  const advFile = `${baseName}.adv`;
  if (result.best) await fs.writeFile(path.join(outDir, advFile), result.best.adversarial);
  const report = buildReport(result, advFile);
  await writeJsonAtomic(path.join(outDir, `${baseName}.report.json`), report);
  return report;
}

import * as fs from 'fs-extra';
import * as path from 'path';
import { RunConfig } from './config';
import { harvestSectionCorpus } from './corpus';
import { EvasionError } from './errors';
import { EvasionProblem } from './evasion-problem';
import { CommandOracle } from './oracle/command-oracle';
import { writeEvasionReport } from './report';
import { createStrategy } from './strategies';
import { EvasionResult, ModelWrapper, SearchOperator, SectionCorpusEntry } from './types';

export * from './types';
export * from './errors';
export * from './strategies';
export { EvasionProblem, computeFitness, resolveLoss } from './evasion-problem';
export type { EvasionProblemOptions, FitnessParameters } from './evasion-problem';
export { GeneticSearchOperator } from './optimizer/genetic';
export type { GeneticOperatorOptions } from './optimizer/genetic';
export { PEBuilder } from './pe/pe-builder';
export type { PEBuilderOptions } from './pe/pe-builder';
export { parsePe, tryParsePe, sectionContent, readHeaderPointer, computePeChecksum } from './pe/pe-parser';
export type { ParsedPe, PeSection, DataDirectory } from './pe/pe-parser';
export { SeededRandom, randomSectionName } from './rng';
export { CommandOracle, parseScore } from './oracle/command-oracle';
export { scoreWithRetry } from './oracle/score';
export { harvestSectionCorpus, corpusFromList, readProvenanceCache } from './corpus';
export type { HarvestOptions, HarvestResult, SectionProvenance } from './corpus';
export { loadRunConfig, readRunConfig, validateRunConfig } from './config';
export type { RunConfig, ProblemConfig, CorpusConfig, OracleConfig, ValidationResult } from './config';
export { writeEvasionReport, buildReport } from './report';
export type { EvasionReport } from './report';
export { introspectBinary, introspectBuffer, detectFormat } from './binary-introspect';

export interface RunOverrides {
  oracle?: ModelWrapper;
  corpus?: readonly SectionCorpusEntry[];
  searchOperator?: SearchOperator;
}

// Wires a run end to end: corpus -> strategy -> oracle -> problem -> optional report on disk
export async function runEvasion(binaryPath: string, config: RunConfig, overrides: RunOverrides = {}): Promise<EvasionResult> {
  if (!(await fs.pathExists(binaryPath))) throw new EvasionError('INVALID_OPTIONS', `Binary not found at path: ${binaryPath}`);
  const original = await fs.readFile(binaryPath);
  const verbose = !!config.problem.debug;

  let corpus = overrides.corpus;
  if (!corpus && config.strategy.kind === 'section-injection') {
    if (!config.corpus) throw new EvasionError('INVALID_OPTIONS', 'section-injection requires a corpus configuration');
    corpus = (await harvestSectionCorpus(config.corpus.folder, { ...config.corpus, verbose })).entries;
  }
  const strategy = createStrategy(config.strategy, { corpus, verbose });

  const oracle = overrides.oracle ?? (config.oracle ? new CommandOracle(config.oracle) : undefined);
  if (!oracle) throw new EvasionError('INVALID_OPTIONS', 'No oracle configured');

  const problem = new EvasionProblem({ ...config.problem, oracle, strategy, searchOperator: overrides.searchOperator });
  const result = await problem.run(original);
  if (config.outDir) {
    const report = await writeEvasionReport(result, config.outDir, path.basename(binaryPath));
    if (verbose) console.log(`📝 Report written to ${path.join(config.outDir, `${path.basename(binaryPath)}.report.json`)} (${report.stopReason})`);
  }
  return result;
}

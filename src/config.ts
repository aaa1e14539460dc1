// Run configuration: YAML or JSON on disk, shape-checked before anything is built from it.

import * as fs from 'fs-extra';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { EvasionError, errorMessage } from './errors';
import { StrategyConfig } from './strategies';
import { LossKind } from './types';

export interface CorpusConfig {
  folder: string;
  howMany: number;
  sectionsToExtract?: string[];
  cacheFile?: string;
  sizeLowerBound?: number;
}

export interface OracleConfig {
  command: string;
  args?: string[];
  timeoutMs?: number;
}

export interface ProblemConfig {
  populationSize: number;
  iterations?: number;
  penaltyRegularizer?: number;
  seed?: number;
  hardLabel?: boolean;
  threshold?: number;
  loss?: LossKind;
  concurrency?: number;
  debug?: boolean;
}

export interface RunConfig {
  strategy: StrategyConfig;
  problem: ProblemConfig;
  corpus?: CorpusConfig;
  oracle?: OracleConfig;
  outDir?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

type Doc = Record<string, unknown>;

function isRecord(v: unknown): v is Doc {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

// Field readers record an error and return undefined when the value has the wrong type
class FieldReader {
  readonly errors: string[] = [];

  num(doc: Doc, key: string, where: string, opts: { required?: boolean; integer?: boolean; min?: number; max?: number } = {}): number | undefined {
    const v = doc[key];
    if (v === undefined) {
      if (opts.required) this.errors.push(`${where}.${key} missing`);
      return undefined;
    }
    if (typeof v !== 'number' || !Number.isFinite(v)) return this.fail(`${where}.${key} must be a number`);
    if (opts.integer && !Number.isInteger(v)) return this.fail(`${where}.${key} must be an integer`);
    if (opts.min !== undefined && v < opts.min) return this.fail(`${where}.${key} must be >= ${opts.min}`);
    if (opts.max !== undefined && v > opts.max) return this.fail(`${where}.${key} must be <= ${opts.max}`);
    return v;
  }

  bool(doc: Doc, key: string, where: string): boolean | undefined {
    const v = doc[key];
    if (v === undefined) return undefined;
    if (typeof v !== 'boolean') return this.fail(`${where}.${key} must be a boolean`);
    return v;
  }

  str(doc: Doc, key: string, where: string, required = false): string | undefined {
    const v = doc[key];
    if (v === undefined) {
      if (required) this.errors.push(`${where}.${key} missing`);
      return undefined;
    }
    if (typeof v !== 'string' || !v.length) return this.fail(`${where}.${key} must be a non-empty string`);
    return v;
  }

  oneOf<T extends string>(doc: Doc, key: string, where: string, allowed: readonly T[]): T | undefined {
    const v = doc[key];
    if (v === undefined) return undefined;
    const match = allowed.find(a => a === v);
    if (match === undefined) return this.fail(`${where}.${key} must be one of ${allowed.join(', ')}`);
    return match;
  }

  strList(doc: Doc, key: string, where: string): string[] | undefined {
    const v = doc[key];
    if (v === undefined) return undefined;
    if (!Array.isArray(v) || !v.every((s): s is string => typeof s === 'string')) return this.fail(`${where}.${key} must be a list of strings`);
    return v;
  }

  section(doc: Doc, key: string, required = false): Doc | undefined {
    const v = doc[key];
    if (v === undefined) {
      if (required) this.errors.push(`${key} missing`);
      return undefined;
    }
    if (!isRecord(v)) return this.fail(`${key} must be a mapping`);
    return v;
  }

  private fail(message: string): undefined {
    this.errors.push(message);
    return undefined;
  }
}

function readStrategy(r: FieldReader, doc: Doc): StrategyConfig | undefined {
  const kind = r.oneOf(doc, 'kind', 'strategy', ['padding', 'header', 'section-injection'] as const);
  switch (kind) {
    case 'padding': {
      const paddingBytes = r.num(doc, 'paddingBytes', 'strategy', { required: true, integer: true, min: 1 });
      return paddingBytes === undefined ? undefined : { kind, paddingBytes };
    }
    case 'header':
      return {
        kind,
        optimizeAllDos: r.bool(doc, 'optimizeAllDos', 'strategy'),
        onInvalidHeader: r.oneOf(doc, 'onInvalidHeader', 'strategy', ['fallback', 'reject'] as const)
      };
    case 'section-injection':
      return {
        kind,
        mode: r.oneOf(doc, 'mode', 'strategy', ['append', 'register'] as const),
        howManySections: r.num(doc, 'howManySections', 'strategy', { integer: true, min: 1 }),
        randomNames: r.bool(doc, 'randomNames', 'strategy'),
        maxSectionSize: r.num(doc, 'maxSectionSize', 'strategy', { integer: true, min: 1 })
      };
    default:
      if (doc.kind === undefined) r.errors.push('strategy.kind missing');
      return undefined;
  }
}

function readProblem(r: FieldReader, doc: Doc): ProblemConfig | undefined {
  const populationSize = r.num(doc, 'populationSize', 'problem', { required: true, integer: true, min: 1 });
  const problem: ProblemConfig = {
    populationSize: populationSize ?? 0,
    iterations: r.num(doc, 'iterations', 'problem', { integer: true, min: 0 }),
    penaltyRegularizer: r.num(doc, 'penaltyRegularizer', 'problem', { min: 0 }),
    seed: r.num(doc, 'seed', 'problem', { integer: true, min: 0 }),
    hardLabel: r.bool(doc, 'hardLabel', 'problem'),
    threshold: r.num(doc, 'threshold', 'problem', { min: 0, max: 1 }),
    loss: r.oneOf(doc, 'loss', 'problem', ['l1', 'l2', 'log'] as const),
    concurrency: r.num(doc, 'concurrency', 'problem', { integer: true, min: 0 }),
    debug: r.bool(doc, 'debug', 'problem')
  };
  return populationSize === undefined ? undefined : problem;
}

// Builds a typed config; relative paths resolve against baseDir
export function readRunConfig(doc: unknown, baseDir: string = process.cwd()): { config?: RunConfig; errors: string[] } {
  const r = new FieldReader();
  if (!isRecord(doc)) return { errors: ['Configuration is not a mapping'] };
  const strategyDoc = r.section(doc, 'strategy', true);
  const problemDoc = r.section(doc, 'problem', true);
  const corpusDoc = r.section(doc, 'corpus');
  const oracleDoc = r.section(doc, 'oracle');
  const strategy = strategyDoc ? readStrategy(r, strategyDoc) : undefined;
  const problem = problemDoc ? readProblem(r, problemDoc) : undefined;

  let corpus: CorpusConfig | undefined;
  if (corpusDoc) {
    const folder = r.str(corpusDoc, 'folder', 'corpus', true);
    const howMany = r.num(corpusDoc, 'howMany', 'corpus', { required: true, integer: true, min: 1 });
    const cacheFile = r.str(corpusDoc, 'cacheFile', 'corpus');
    if (folder !== undefined && howMany !== undefined) {
      corpus = {
        folder: path.resolve(baseDir, folder),
        howMany,
        sectionsToExtract: r.strList(corpusDoc, 'sectionsToExtract', 'corpus'),
        cacheFile: cacheFile === undefined ? undefined : path.resolve(baseDir, cacheFile),
        sizeLowerBound: r.num(corpusDoc, 'sizeLowerBound', 'corpus', { integer: true, min: 0 })
      };
    }
  }
  if (strategy?.kind === 'section-injection' && !corpusDoc) r.errors.push('corpus section required for section-injection');

  let oracle: OracleConfig | undefined;
  if (oracleDoc) {
    const command = r.str(oracleDoc, 'command', 'oracle', true);
    const args = r.strList(oracleDoc, 'args', 'oracle');
    const timeoutMs = r.num(oracleDoc, 'timeoutMs', 'oracle', { integer: true, min: 1 });
    if (command !== undefined) oracle = { command, args, timeoutMs };
  }
  const outDir = r.str(doc, 'outDir', 'config');

  if (r.errors.length || !strategy || !problem) return { errors: r.errors };
  return {
    config: { strategy, problem, corpus, oracle, outDir: outDir === undefined ? undefined : path.resolve(baseDir, outDir) },
    errors: []
  };
}

export function validateRunConfig(doc: unknown): ValidationResult {
  const { errors } = readRunConfig(doc);
  return { valid: errors.length === 0, errors };
}

export async function loadRunConfig(configPath: string): Promise<RunConfig> {
  let doc: unknown;
  try {
    doc = yaml.load(await fs.readFile(configPath, 'utf8'));
  } catch (e) {
    throw new EvasionError('INVALID_CONFIG', `Cannot read configuration ${configPath}: ${errorMessage(e)}`, e);
  }
  const { config, errors } = readRunConfig(doc, path.dirname(path.resolve(configPath)));
  if (!config) throw new EvasionError('INVALID_CONFIG', `Invalid configuration ${configPath}: ${errors.join('; ')}`);
  return config;
}

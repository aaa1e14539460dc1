import * as fs from 'fs-extra';
import * as path from 'path';
import { introspectBuffer } from './binary-introspect';
import { DEFAULT_SECTIONS_TO_EXTRACT } from './constants';
import { EvasionError, errorMessage } from './errors';
import { sectionContent } from './pe/pe-parser';
import { writeJsonAtomic } from './report';
import { SectionCorpusEntry } from './types';

// [sectionName, sourceFile] pairs, the on-disk cache format
export type SectionProvenance = [string, string];

export interface HarvestOptions {
  howMany: number;
  sectionsToExtract?: string[];
  cacheFile?: string;
  sizeLowerBound?: number;
  verbose?: boolean;
}

export interface HarvestResult {
  entries: SectionCorpusEntry[];
  provenance: SectionProvenance[];
}

async function readPe(file: string, verbose: boolean) {
  let buf: Buffer;
  try {
    buf = await fs.readFile(file);
  } catch (e) {
    if (verbose) console.warn(`⚠️  Skipping unreadable ${file}: ${errorMessage(e)}`);
    return null;
  }
  const meta = introspectBuffer(buf);
  return meta.pe ? { buf, pe: meta.pe } : null;
}

export async function readProvenanceCache(cacheFile: string): Promise<SectionProvenance[]> {
  const parsed: unknown = await fs.readJson(cacheFile);
  if (!Array.isArray(parsed)) throw new EvasionError('INVALID_CONFIG', `Corpus cache ${cacheFile} is not an array`);
  return parsed.map((entry: unknown, i) => {
    if (!Array.isArray(entry) || entry.length !== 2 || typeof entry[0] !== 'string' || typeof entry[1] !== 'string') {
      throw new EvasionError('INVALID_CONFIG', `Corpus cache ${cacheFile} entry ${i} is not a [section, file] pair`);
    }
    const pair: SectionProvenance = [entry[0], entry[1]];
    return pair;
  });
}

// Collects benign section contents from the PE files of a folder.
// With an existing cache only the files it names are visited; otherwise the cache is written once.
export async function harvestSectionCorpus(folder: string, options: HarvestOptions): Promise<HarvestResult> {
  const wanted = options.sectionsToExtract ?? DEFAULT_SECTIONS_TO_EXTRACT;
  const verbose = !!options.verbose;
  const cached = options.cacheFile ? await fs.pathExists(options.cacheFile) : false;
  let files: string[];
  if (options.cacheFile && cached) {
    files = Array.from(new Set((await readProvenanceCache(options.cacheFile)).map(p => p[1])));
  } else {
    files = (await fs.readdir(folder)).sort();
  }

  const entries: SectionCorpusEntry[] = [];
  const provenance: SectionProvenance[] = [];
  for (const filename of files) {
    if (entries.length >= options.howMany) break;
    const loaded = await readPe(path.join(folder, filename), verbose);
    if (!loaded) continue;
    for (const s of loaded.pe.sections) {
      if (!wanted.includes(s.name)) continue;
      const content = sectionContent(loaded.buf, s);
      if (!content.length) continue;
      if (options.sizeLowerBound && content.length < options.sizeLowerBound) continue;
      entries.push({ content: Buffer.from(content), sectionName: s.name, sourceFile: filename });
      provenance.push([s.name, filename]);
    }
  }

  const result = { entries: entries.slice(0, options.howMany), provenance: provenance.slice(0, options.howMany) };
  if (options.cacheFile && !cached) await writeJsonAtomic(options.cacheFile, result.provenance);
  if (verbose) console.log(`📦 Harvested ${result.entries.length} sections from ${folder}`);
  return result;
}

// Rebuilds a corpus from explicit (section, file) pairs, keeping their order.
// Pairs that no longer resolve are dropped, with a warning when verbose.
export async function corpusFromList(
  folder: string,
  whatFromWho: readonly SectionProvenance[],
  verbose = false
): Promise<SectionCorpusEntry[]> {
  const entries: SectionCorpusEntry[] = [];
  for (const [what, who] of whatFromWho) {
    const loaded = await readPe(path.join(folder, who), false);
    const matches = loaded ? loaded.pe.sections.filter(s => s.name === what) : [];
    if (!loaded || !matches.length) {
      if (verbose) console.warn(`⚠️  Corpus entry ${what} from ${who} ${loaded ? 'has no such section' : 'is missing or not a PE file'}, dropped`);
      continue;
    }
    for (const s of matches) entries.push({ content: Buffer.from(sectionContent(loaded.buf, s)), sectionName: what, sourceFile: who });
  }
  return entries;
}

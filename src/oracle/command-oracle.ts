import * as crypto from 'crypto';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { OracleError } from '../errors';
import { safeExec } from '../safe-exec';
import { ModelWrapper } from '../types';

export interface CommandOracleOptions {
  command: string;
  args?: string[]; // '{file}' is replaced by the sample path, otherwise the path is appended
  timeoutMs?: number;
  workDir?: string;
}

export const FILE_PLACEHOLDER = '{file}';

// Last line of stdout that parses as a number; detectors tend to print banners first
export function parseScore(stdout: string): number | null {
  const lines = stdout.split(/\r?\n/).map(l => l.trim()).filter(Boolean);
  for (let i = lines.length - 1; i >= 0; i--) {
    if (/^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/.test(lines[i])) return parseFloat(lines[i]);
  }
  return null;
}

// Scores samples by running an external detector on a temporary copy of each candidate
export class CommandOracle implements ModelWrapper {
  private readonly command: string;
  private readonly args: string[];
  private readonly timeoutMs?: number;
  private readonly workDir: string;

  constructor(options: CommandOracleOptions) {
    this.command = options.command;
    this.args = options.args ?? [];
    this.timeoutMs = options.timeoutMs;
    this.workDir = options.workDir ?? os.tmpdir();
  }

  buildArgs(samplePath: string): string[] {
    if (!this.args.some(a => a.includes(FILE_PLACEHOLDER))) return [...this.args, samplePath];
    return this.args.map(a => a.split(FILE_PLACEHOLDER).join(samplePath));
  }

  async score(bytes: Buffer): Promise<number> {
    const samplePath = path.join(this.workDir, `pevade-${crypto.randomBytes(8).toString('hex')}.bin`);
    await fs.outputFile(samplePath, bytes);
    try {
      const res = await safeExec(this.command, this.buildArgs(samplePath), this.timeoutMs);
      if (res.failed) throw new OracleError(`Detector command failed: ${res.errorMessage ?? 'unknown'}`, true);
      const value = parseScore(res.stdout);
      if (value === null) throw new OracleError('Detector produced no numeric score', true);
      return value;
    } finally {
      await fs.remove(samplePath);
    }
  }
}

import execa from 'execa';
import { DEFAULT_TOOL_TIMEOUT_MS } from './constants';

export interface SafeExecResult {
  stdout: string;
  stderr: string;
  code: number | null;
  signal: string | null;
  timedOut: boolean;
  failed: boolean;
  durationMs: number;
  start: number;
  errorMessage?: string;
}

export function isToolSkipped(tool: string): boolean {
  const skip = (process.env.PEVADE_SKIP_TOOLS || '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
  return skip.includes(tool);
}

// execa failures carry extra fields (timedOut, exitCode, shortMessage) on a plain Error
function readField(e: unknown, key: string): unknown {
  if (typeof e !== 'object' || e === null) return undefined;
  const value: unknown = Reflect.get(e, key);
  return value;
}

function asText(v: unknown): string {
  return typeof v === 'string' ? v : '';
}

export async function safeExec(cmd: string, args: string[] = [], timeoutMs?: number): Promise<SafeExecResult> {
  const start = Date.now();
  if (isToolSkipped(cmd)) {
    return {
      stdout: '',
      stderr: '',
      code: null,
      signal: null,
      timedOut: false,
      failed: true,
      durationMs: Date.now() - start,
      start,
      errorMessage: 'skipped-by-config'
    };
  }
  try {
    const child = await execa(cmd, args, {
      timeout: timeoutMs || DEFAULT_TOOL_TIMEOUT_MS,
      reject: false // handle failures uniformly
    });
    const timedOut = child.timedOut === true;
    const failed = timedOut || child.exitCode !== 0;
    return {
      stdout: child.stdout || '',
      stderr: child.stderr || '',
      code: child.exitCode ?? null,
      signal: child.signal || null,
      timedOut,
      failed,
      durationMs: Date.now() - start,
      start,
      errorMessage: failed ? (timedOut ? 'timeout' : child.stderr || 'non-zero-exit') : undefined
    };
  } catch (e: unknown) {
    const timedOut = readField(e, 'timedOut') === true;
    const exitCode = readField(e, 'exitCode');
    return {
      stdout: asText(readField(e, 'stdout')),
      stderr: asText(readField(e, 'stderr')),
      code: typeof exitCode === 'number' ? exitCode : null,
      signal: asText(readField(e, 'signal')) || null,
      timedOut,
      failed: true,
      durationMs: Date.now() - start,
      start,
      errorMessage: timedOut ? 'timeout' : asText(readField(e, 'shortMessage')) || asText(readField(e, 'message')) || 'exec-error'
    };
  }
}

// Centralized constants for PE layout offsets, fitness sentinels and environment overrides

function envInt(name: string, fallback: number): number {
  const raw = process.env[name];
  const parsed = raw ? parseInt(raw, 10) : NaN;
  if (!isNaN(parsed) && parsed > 0) return parsed;
  return fallback;
}

// DOS header layout
export const DOS_HEADER_SIZE = 64;
export const DOS_MAGIC = 0x5a4d; // 'MZ'
export const E_LFANEW_OFFSET = 0x3c;
export const HEADER_PERTURB_START = 2; // bytes 0-1 hold the MZ magic
export const HEADER_PERTURB_END = E_LFANEW_OFFSET;

// NT headers
export const PE_SIGNATURE = 0x00004550; // 'PE\0\0'
export const COFF_HEADER_SIZE = 20;
export const SECTION_HEADER_SIZE = 40;
export const SECTION_NAME_LENGTH = 8;
export const OPTIONAL_MAGIC_PE32 = 0x10b;
export const OPTIONAL_MAGIC_PE32_PLUS = 0x20b;
export const MAX_SECTION_COUNT = 0xffff;

// Data directory indexes used when the headers have to grow
export const DIRECTORY_SECURITY = 4;
export const DIRECTORY_DEBUG = 6;
export const DIRECTORY_BOUND_IMPORT = 11;
export const DEBUG_DIRECTORY_ENTRY_SIZE = 28;

export const SCN_CNT_INITIALIZED_DATA = 0x00000040;
export const SCN_MEM_READ = 0x40000000;
export const INJECTED_SECTION_CHARACTERISTICS = SCN_CNT_INITIALIZED_DATA | SCN_MEM_READ;

// Latent decoding
export const DEFAULT_INVALID_VALUE = 256;
export const BYTE_SCALE = 255;

// Fitness. The hard-label sentinel marks candidates that are still detected;
// WORST_FITNESS is reserved for candidates whose binary could not be rebuilt.
export const HARD_LABEL_SENTINEL = 1e9;
export const WORST_FITNESS = Number.MAX_VALUE;
export const DEFAULT_THRESHOLD = 0.5;
export const LOG_LOSS_EPSILON = 1e-12;

// Search defaults
export const DEFAULT_ITERATIONS = 100;
export const DEFAULT_CROSSOVER_RATE = 0.9;
export const DEFAULT_MUTATION_SCALE = 0.2;

export const RANDOM_NAME_LENGTH = 8;
export const RANDOM_NAME_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const DETERMINISTIC_NAME_PREFIX = '.pvd';

export const DEFAULT_SECTIONS_TO_EXTRACT = ['.data'];

// Environment overrides
export const DEFAULT_TOOL_TIMEOUT_MS = envInt('PEVADE_TOOL_TIMEOUT_MS', 30000);
export const DEFAULT_CONCURRENCY = envInt('PEVADE_CONCURRENCY', 0); // 0 = whole generation at once
export const DEFAULT_MAX_SECTION_SIZE = envInt('PEVADE_MAX_SECTION_SIZE', 64 * 1024 * 1024);

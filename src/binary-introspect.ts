// Minimal binary structural introspection: format by magic bytes, section names for PE files.

import * as fs from 'fs-extra';
import { ParsedPe, tryParsePe } from './pe/pe-parser';

export type BinaryFormat = 'elf' | 'pe' | 'macho' | 'unknown';

export interface BinaryIntrospection {
  format: BinaryFormat;
  sections: string[];
  sizeBytes: number;
  pe: ParsedPe | null;
}

export function detectFormat(buf: Buffer): BinaryFormat {
  if (buf.length >= 4) {
    if (buf[0] === 0x7f && buf[1] === 0x45 && buf[2] === 0x4c && buf[3] === 0x46) return 'elf';
    const machoMagics = [0xfeedface, 0xfeedfacf, 0xcafebabe, 0xcefaedfe, 0xcffaedfe];
    if (machoMagics.includes(buf.readUInt32BE(0))) return 'macho';
  }
  if (buf.length >= 2 && buf[0] === 0x4d && buf[1] === 0x5a) return 'pe'; // MZ
  return 'unknown';
}

export function introspectBuffer(buf: Buffer): BinaryIntrospection {
  const format = detectFormat(buf);
  // an MZ stub without a parseable NT header is not treated as PE
  const pe = format === 'pe' ? tryParsePe(buf) : null;
  return {
    format: format === 'pe' && !pe ? 'unknown' : format,
    sections: pe ? pe.sections.map(s => s.name) : [],
    sizeBytes: buf.length,
    pe
  };
}

export async function introspectBinary(binaryPath: string): Promise<BinaryIntrospection> {
  return introspectBuffer(await fs.readFile(binaryPath));
}

import { RebuildError } from '../errors';
import {
  DEBUG_DIRECTORY_ENTRY_SIZE,
  DIRECTORY_BOUND_IMPORT,
  DIRECTORY_DEBUG,
  DIRECTORY_SECURITY,
  INJECTED_SECTION_CHARACTERISTICS,
  MAX_SECTION_COUNT,
  SECTION_HEADER_SIZE,
  SECTION_NAME_LENGTH
} from '../constants';
import {
  ParsedPe,
  OPT_CHECKSUM,
  OPT_SIZE_OF_HEADERS,
  OPT_SIZE_OF_IMAGE,
  alignUp,
  computePeChecksum,
  parsePe,
  rvaToOffset
} from './pe-parser';

export interface PEBuilderOptions {
  maxSectionSize?: number;
}

interface PendingSection {
  name: string;
  content: Buffer;
}

// Registers new sections on a parsed PE and rebuilds a consistent image.
// Existing raw data is carried over untouched; new raw data goes after the end of the file.
export class PEBuilder {
  private readonly original: Buffer;
  private readonly pe: ParsedPe;
  private readonly maxSectionSize?: number;
  private readonly pending: PendingSection[] = [];
  private readonly usedNames: Set<string>;

  constructor(original: Buffer, pe?: ParsedPe, options: PEBuilderOptions = {}) {
    this.original = original;
    this.pe = pe ?? parsePe(original);
    this.maxSectionSize = options.maxSectionSize;
    this.usedNames = new Set(this.pe.sections.map(s => s.name));
  }

  get sectionCount(): number {
    return this.pe.numberOfSections + this.pending.length;
  }

  addSection(name: string, content: Buffer): this {
    const encoded = Buffer.from(name, 'latin1');
    if (!name.length || encoded.length > SECTION_NAME_LENGTH) {
      throw new RebuildError(`Section name "${name}" must be 1-${SECTION_NAME_LENGTH} bytes`);
    }
    if (this.usedNames.has(name)) throw new RebuildError(`Section name "${name}" collides with an existing section`);
    if (!content.length) throw new RebuildError(`Section "${name}" has no content`);
    if (this.maxSectionSize !== undefined && content.length > this.maxSectionSize) {
      throw new RebuildError(`Section "${name}" content (${content.length} bytes) exceeds limit ${this.maxSectionSize}`);
    }
    if (this.sectionCount + 1 > MAX_SECTION_COUNT) throw new RebuildError('Section count limit reached');
    this.usedNames.add(name);
    this.pending.push({ name, content });
    return this;
  }

  build(): Buffer {
    const pe = this.pe;
    if (!this.pending.length) return Buffer.from(this.original);
    const fileAlignment = pe.fileAlignment || 0x200;
    const sectionAlignment = pe.sectionAlignment || 0x1000;

    const oldTableEnd = pe.sectionTableOffset + pe.numberOfSections * SECTION_HEADER_SIZE;
    const newTableEnd = oldTableEnd + this.pending.length * SECTION_HEADER_SIZE;
    const rawStarts = pe.sections.filter(s => s.sizeOfRawData > 0).map(s => s.pointerToRawData);
    const headerLimit = rawStarts.length ? Math.min(...rawStarts) : Math.max(pe.sizeOfHeaders, oldTableEnd);
    const requiredHeaders = alignUp(newTableEnd, fileAlignment);
    const shift = requiredHeaders > headerLimit ? alignUp(requiredHeaders - headerLimit, fileAlignment) : 0;
    const sizeOfHeaders = shift ? headerLimit + shift : Math.max(pe.sizeOfHeaders, requiredHeaders);

    const firstVa = pe.sections.length ? Math.min(...pe.sections.map(s => s.virtualAddress)) : Infinity;
    if (sizeOfHeaders > firstVa) {
      throw new RebuildError(`Headers (${sizeOfHeaders} bytes) would overlap the first section at RVA 0x${firstVa.toString(16)}`);
    }

    const out = shift
      ? Buffer.concat([this.original.subarray(0, headerLimit), Buffer.alloc(shift), this.original.subarray(headerLimit)])
      : Buffer.from(this.original);

    this.clearOverwrittenBoundImports(out, oldTableEnd, newTableEnd);
    if (shift) this.shiftFileOffsets(out, headerLimit, shift);

    let nextVa = alignUp(
      pe.sections.reduce((acc, s) => Math.max(acc, s.virtualAddress + Math.max(s.virtualSize, s.sizeOfRawData)), sizeOfHeaders),
      sectionAlignment
    );
    const rawStart = alignUp(out.length, fileAlignment);
    let nextRaw = rawStart;
    const chunks: Buffer[] = [out, Buffer.alloc(rawStart - out.length)];

    this.pending.forEach((section, i) => {
      const at = oldTableEnd + i * SECTION_HEADER_SIZE;
      const rawSize = alignUp(section.content.length, fileAlignment);
      out.fill(0, at, at + SECTION_HEADER_SIZE);
      out.write(section.name, at, SECTION_NAME_LENGTH, 'latin1');
      out.writeUInt32LE(section.content.length, at + 8);
      out.writeUInt32LE(nextVa, at + 12);
      out.writeUInt32LE(rawSize, at + 16);
      out.writeUInt32LE(nextRaw, at + 20);
      out.writeUInt32LE(INJECTED_SECTION_CHARACTERISTICS, at + 36);
      chunks.push(section.content, Buffer.alloc(rawSize - section.content.length));
      nextVa = alignUp(nextVa + section.content.length, sectionAlignment);
      nextRaw += rawSize;
    });

    out.writeUInt16LE(this.sectionCount, pe.coffOffset + 2);
    out.writeUInt32LE(nextVa, pe.optionalHeaderOffset + OPT_SIZE_OF_IMAGE);
    out.writeUInt32LE(sizeOfHeaders, pe.optionalHeaderOffset + OPT_SIZE_OF_HEADERS);

    const built = Buffer.concat(chunks);
    if (pe.checksum !== 0) {
      const checksumOffset = pe.optionalHeaderOffset + OPT_CHECKSUM;
      built.writeUInt32LE(0, checksumOffset);
      built.writeUInt32LE(computePeChecksum(built, checksumOffset), checksumOffset);
    }
    return built;
  }

  // Bound imports often live in the slack right after the section table; the loader
  // tolerates their absence, not their corruption.
  private clearOverwrittenBoundImports(out: Buffer, from: number, to: number) {
    const dir = this.pe.dataDirectories[DIRECTORY_BOUND_IMPORT];
    if (!dir || !dir.rva) return;
    if (dir.rva < to && dir.rva + dir.size > from) {
      out.fill(0, this.pe.dataDirectoryOffset + DIRECTORY_BOUND_IMPORT * 8, this.pe.dataDirectoryOffset + DIRECTORY_BOUND_IMPORT * 8 + 8);
    }
  }

  // Everything at or after `from` moved by `shift` bytes: patch the fields holding file offsets
  private shiftFileOffsets(out: Buffer, from: number, shift: number) {
    const pe = this.pe;
    const bump = (at: number) => {
      const value = out.readUInt32LE(at);
      if (value >= from) out.writeUInt32LE(value + shift, at);
    };
    for (const s of pe.sections) {
      if (s.sizeOfRawData > 0) bump(s.headerOffset + 20);
    }
    if (pe.pointerToSymbolTable) bump(pe.coffOffset + 8);
    const security = pe.dataDirectories[DIRECTORY_SECURITY];
    if (security && security.rva) bump(pe.dataDirectoryOffset + DIRECTORY_SECURITY * 8);

    const debug = pe.dataDirectories[DIRECTORY_DEBUG];
    if (debug && debug.rva && debug.size) {
      const offset = rvaToOffset(pe, debug.rva);
      if (offset === null) return;
      const base = offset >= from ? offset + shift : offset;
      const entries = Math.floor(debug.size / DEBUG_DIRECTORY_ENTRY_SIZE);
      for (let i = 0; i < entries; i++) {
        const at = base + i * DEBUG_DIRECTORY_ENTRY_SIZE + 24;
        if (at + 4 <= out.length) bump(at);
      }
    }
  }
}

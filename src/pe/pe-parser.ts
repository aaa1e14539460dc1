import { InvalidFormatError } from '../errors';
import {
  COFF_HEADER_SIZE,
  DOS_HEADER_SIZE,
  DOS_MAGIC,
  E_LFANEW_OFFSET,
  OPTIONAL_MAGIC_PE32,
  OPTIONAL_MAGIC_PE32_PLUS,
  PE_SIGNATURE,
  SECTION_HEADER_SIZE,
  SECTION_NAME_LENGTH
} from '../constants';

export interface PeSection {
  name: string;
  virtualSize: number;
  virtualAddress: number;
  sizeOfRawData: number;
  pointerToRawData: number;
  characteristics: number;
  headerOffset: number; // file offset of this entry in the section table
}

export interface DataDirectory {
  rva: number;
  size: number;
}

export interface ParsedPe {
  peOffset: number;
  coffOffset: number;
  optionalHeaderOffset: number;
  is64: boolean;
  numberOfSections: number;
  pointerToSymbolTable: number;
  sizeOfOptionalHeader: number;
  sectionTableOffset: number;
  sectionAlignment: number;
  fileAlignment: number;
  sizeOfImage: number;
  sizeOfHeaders: number;
  checksum: number;
  dataDirectoryOffset: number;
  dataDirectories: DataDirectory[];
  sections: PeSection[];
}

// Optional header field offsets (identical for PE32 and PE32+)
export const OPT_SECTION_ALIGNMENT = 32;
export const OPT_FILE_ALIGNMENT = 36;
export const OPT_SIZE_OF_IMAGE = 56;
export const OPT_SIZE_OF_HEADERS = 60;
export const OPT_CHECKSUM = 64;

// Reads e_lfanew; null when the buffer is too short to hold a DOS header
export function readHeaderPointer(buf: Buffer): number | null {
  if (buf.length < DOS_HEADER_SIZE) return null;
  return buf.readUInt32LE(E_LFANEW_OFFSET);
}

export function hasDosMagic(buf: Buffer): boolean {
  return buf.length >= 2 && buf.readUInt16LE(0) === DOS_MAGIC;
}

export function decodeSectionName(raw: Buffer): string {
  const nul = raw.indexOf(0);
  return raw.subarray(0, nul === -1 ? raw.length : nul).toString('latin1');
}

export function parsePe(buf: Buffer): ParsedPe {
  if (!hasDosMagic(buf)) throw new InvalidFormatError('Missing MZ magic');
  const peOffset = readHeaderPointer(buf);
  if (peOffset === null) throw new InvalidFormatError('Truncated DOS header');
  if (peOffset + 4 + COFF_HEADER_SIZE > buf.length) {
    throw new InvalidFormatError(`e_lfanew ${peOffset} points past end of file (${buf.length} bytes)`);
  }
  if (buf.readUInt32LE(peOffset) !== PE_SIGNATURE) throw new InvalidFormatError('Missing PE signature');

  const coffOffset = peOffset + 4;
  const numberOfSections = buf.readUInt16LE(coffOffset + 2);
  const pointerToSymbolTable = buf.readUInt32LE(coffOffset + 8);
  const sizeOfOptionalHeader = buf.readUInt16LE(coffOffset + 16);
  const optionalHeaderOffset = coffOffset + COFF_HEADER_SIZE;
  if (optionalHeaderOffset + sizeOfOptionalHeader > buf.length || sizeOfOptionalHeader < OPT_CHECKSUM + 4) {
    throw new InvalidFormatError('Optional header truncated');
  }
  const magic = buf.readUInt16LE(optionalHeaderOffset);
  if (magic !== OPTIONAL_MAGIC_PE32 && magic !== OPTIONAL_MAGIC_PE32_PLUS) {
    throw new InvalidFormatError(`Unknown optional header magic 0x${magic.toString(16)}`);
  }
  const is64 = magic === OPTIONAL_MAGIC_PE32_PLUS;

  const rvaCountOffset = optionalHeaderOffset + (is64 ? 108 : 92);
  const dataDirectoryOffset = rvaCountOffset + 4;
  const dataDirectories: DataDirectory[] = [];
  if (rvaCountOffset + 4 <= optionalHeaderOffset + sizeOfOptionalHeader) {
    const declared = buf.readUInt32LE(rvaCountOffset);
    const fit = Math.floor((optionalHeaderOffset + sizeOfOptionalHeader - dataDirectoryOffset) / 8);
    for (let i = 0; i < Math.min(declared, fit); i++) {
      const at = dataDirectoryOffset + i * 8;
      dataDirectories.push({ rva: buf.readUInt32LE(at), size: buf.readUInt32LE(at + 4) });
    }
  }

  const sectionTableOffset = optionalHeaderOffset + sizeOfOptionalHeader;
  if (sectionTableOffset + numberOfSections * SECTION_HEADER_SIZE > buf.length) {
    throw new InvalidFormatError('Section table extends past end of file');
  }
  const sections: PeSection[] = [];
  for (let i = 0; i < numberOfSections; i++) {
    const at = sectionTableOffset + i * SECTION_HEADER_SIZE;
    const section: PeSection = {
      name: decodeSectionName(buf.subarray(at, at + SECTION_NAME_LENGTH)),
      virtualSize: buf.readUInt32LE(at + 8),
      virtualAddress: buf.readUInt32LE(at + 12),
      sizeOfRawData: buf.readUInt32LE(at + 16),
      pointerToRawData: buf.readUInt32LE(at + 20),
      characteristics: buf.readUInt32LE(at + 36),
      headerOffset: at
    };
    if (section.sizeOfRawData > 0 && section.pointerToRawData > buf.length) {
      throw new InvalidFormatError(`Section ${section.name || i} raw data starts past end of file`);
    }
    sections.push(section);
  }

  return {
    peOffset,
    coffOffset,
    optionalHeaderOffset,
    is64,
    numberOfSections,
    pointerToSymbolTable,
    sizeOfOptionalHeader,
    sectionTableOffset,
    sectionAlignment: buf.readUInt32LE(optionalHeaderOffset + OPT_SECTION_ALIGNMENT),
    fileAlignment: buf.readUInt32LE(optionalHeaderOffset + OPT_FILE_ALIGNMENT),
    sizeOfImage: buf.readUInt32LE(optionalHeaderOffset + OPT_SIZE_OF_IMAGE),
    sizeOfHeaders: buf.readUInt32LE(optionalHeaderOffset + OPT_SIZE_OF_HEADERS),
    checksum: buf.readUInt32LE(optionalHeaderOffset + OPT_CHECKSUM),
    dataDirectoryOffset,
    dataDirectories,
    sections
  };
}

export function tryParsePe(buf: Buffer): ParsedPe | null {
  try {
    return parsePe(buf);
  } catch (e) {
    if (e instanceof InvalidFormatError) return null;
    throw e;
  }
}

// Raw bytes of a section, clamped to the file
export function sectionContent(buf: Buffer, section: PeSection): Buffer {
  if (section.sizeOfRawData === 0) return Buffer.alloc(0);
  const end = Math.min(section.pointerToRawData + section.sizeOfRawData, buf.length);
  return buf.subarray(section.pointerToRawData, end);
}

export function rvaToOffset(pe: ParsedPe, rva: number): number | null {
  for (const s of pe.sections) {
    const span = Math.max(s.virtualSize, s.sizeOfRawData);
    if (rva >= s.virtualAddress && rva < s.virtualAddress + span) {
      const delta = rva - s.virtualAddress;
      if (delta >= s.sizeOfRawData) return null; // lives in the zero-filled tail
      return s.pointerToRawData + delta;
    }
  }
  if (rva < pe.sizeOfHeaders) return rva;
  return null;
}

export function alignUp(value: number, alignment: number): number {
  if (alignment <= 1) return value;
  return Math.ceil(value / alignment) * alignment;
}

// Standard PE image checksum: 16-bit one's-complement sum skipping the checksum field, plus file length
export function computePeChecksum(buf: Buffer, checksumOffset: number): number {
  let sum = 0;
  const words = Math.floor(buf.length / 2);
  for (let i = 0; i < words; i++) {
    const at = i * 2;
    if (at === checksumOffset || at === checksumOffset + 2) continue;
    sum += buf.readUInt16LE(at);
    sum = (sum & 0xffff) + (sum >>> 16);
  }
  if (buf.length % 2) {
    sum += buf[buf.length - 1];
    sum = (sum & 0xffff) + (sum >>> 16);
  }
  sum = (sum & 0xffff) + (sum >>> 16);
  return (sum + buf.length) >>> 0;
}

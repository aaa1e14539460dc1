// Synthetic PE images for tests. Layout mirrors what linkers emit:
// DOS header at 0, NT headers at peOffset, section raw data from sizeOfHeaders on.

export interface FixtureSection {
  name: string;
  content: Buffer;
}

export interface FixtureOptions {
  sections?: FixtureSection[];
  peOffset?: number;
  sizeOfHeaders?: number;
  fileAlignment?: number;
  sectionAlignment?: number;
  checksum?: number;
  overlay?: Buffer;
  pe64?: boolean;
}

const align = (v: number, a: number) => Math.ceil(v / a) * a;

export const FIXTURE_PE_OFFSET = 0x80;
export const FIXTURE_SECTION_TABLE = FIXTURE_PE_OFFSET + 4 + 20 + 0xe0; // 0x178 for PE32

export function filled(length: number, seed: number): Buffer {
  const b = Buffer.alloc(length);
  for (let i = 0; i < length; i++) b[i] = (i * 31 + seed) & 0xff;
  return b;
}

export function makePe(options: FixtureOptions = {}): Buffer {
  const sections = options.sections ?? [{ name: '.text', content: filled(0x300, 1) }];
  const peOffset = options.peOffset ?? FIXTURE_PE_OFFSET;
  const sizeOfHeaders = options.sizeOfHeaders ?? 0x400;
  const fileAlignment = options.fileAlignment ?? 0x200;
  const sectionAlignment = options.sectionAlignment ?? 0x1000;
  const sizeOfOptionalHeader = options.pe64 ? 0xf0 : 0xe0;

  const headers = Buffer.alloc(sizeOfHeaders);
  headers.writeUInt16LE(0x5a4d, 0);
  for (let i = 2; i < 60; i++) headers[i] = i;
  headers.writeUInt32LE(peOffset, 0x3c);
  for (let i = 64; i < peOffset; i++) headers[i] = (i * 7) & 0xff;

  headers.writeUInt32LE(0x00004550, peOffset);
  const coff = peOffset + 4;
  headers.writeUInt16LE(options.pe64 ? 0x8664 : 0x14c, coff);
  headers.writeUInt16LE(sections.length, coff + 2);
  headers.writeUInt16LE(sizeOfOptionalHeader, coff + 16);
  headers.writeUInt16LE(0x0102, coff + 18);

  const opt = coff + 20;
  headers.writeUInt16LE(options.pe64 ? 0x20b : 0x10b, opt);
  headers.writeUInt32LE(sectionAlignment, opt + 16); // entry point: start of first section
  headers.writeUInt32LE(sectionAlignment, opt + 32);
  headers.writeUInt32LE(fileAlignment, opt + 36);
  headers.writeUInt32LE(sizeOfHeaders, opt + 60);
  headers.writeUInt32LE(options.checksum ?? 0, opt + 64);
  headers.writeUInt16LE(3, opt + 68);
  headers.writeUInt32LE(16, opt + (options.pe64 ? 108 : 92));

  const table = opt + sizeOfOptionalHeader;
  let va = align(sizeOfHeaders, sectionAlignment);
  let raw = sizeOfHeaders;
  const bodies: Buffer[] = [];
  sections.forEach((s, i) => {
    const at = table + i * 40;
    const rawSize = align(s.content.length, fileAlignment);
    headers.write(s.name, at, 8, 'latin1');
    headers.writeUInt32LE(s.content.length, at + 8);
    headers.writeUInt32LE(va, at + 12);
    headers.writeUInt32LE(rawSize, at + 16);
    headers.writeUInt32LE(raw, at + 20);
    headers.writeUInt32LE(0x40000040, at + 36);
    const body = Buffer.alloc(rawSize);
    s.content.copy(body);
    bodies.push(body);
    va = align(va + s.content.length, sectionAlignment);
    raw += rawSize;
  });
  headers.writeUInt32LE(va, opt + 56);
  return Buffer.concat([headers, ...bodies, options.overlay ?? Buffer.alloc(0)]);
}

/**
 * Lightweight DICOM header reader.
 *
 * Reads only the identifying attributes the catalog needs from a bounded prefix
 * of the file, and stops before pixel data. Handles Part 10 files (preamble,
 * "DICM" magic and file meta group) as well as bare datasets, in implicit VR
 * little endian, explicit VR little endian and explicit VR big endian.
 */

import { open } from 'node:fs/promises';

export interface DicomHeader {
  /** True when the file carries the Part 10 "DICM" magic. */
  isPart10: boolean;
  transferSyntaxUid?: string;
  sopClassUid?: string;
  sopInstanceUid?: string;
  modality?: string;
  patientId?: string;
  studyInstanceUid?: string;
}

type HeaderField = Exclude<keyof DicomHeader, 'isPart10'>;

export const TransferSyntax = {
  IMPLICIT_VR_LITTLE_ENDIAN: '1.2.840.10008.1.2',
  EXPLICIT_VR_LITTLE_ENDIAN: '1.2.840.10008.1.2.1',
  DEFLATED_EXPLICIT_VR_LITTLE_ENDIAN: '1.2.840.10008.1.2.1.99',
  EXPLICIT_VR_BIG_ENDIAN: '1.2.840.10008.1.2.2',
} as const;

const PREAMBLE_LENGTH = 128;
const MAGIC = 'DICM';
const UNDEFINED_LENGTH = 0xffffffff;

const ITEM = 0xe000;
const ITEM_DELIMITATION = 0xe00d;
const SEQUENCE_DELIMITATION = 0xe0dd;

// Explicit VRs with a reserved 2 bytes and a 32-bit length
const LONG_VRS = new Set(['OB', 'OD', 'OF', 'OL', 'OV', 'OW', 'SQ', 'SV', 'UC', 'UN', 'UR', 'UT', 'UV']);

const tagOf = (group: number, element: number) => ((group << 16) | element) >>> 0;

const TRANSFER_SYNTAX_TAG = tagOf(0x0002, 0x0010);
const LAST_WANTED_TAG = tagOf(0x0020, 0x000d);

const WANTED = new Map<number, HeaderField>([
  [tagOf(0x0008, 0x0016), 'sopClassUid'],
  [tagOf(0x0008, 0x0018), 'sopInstanceUid'],
  [tagOf(0x0008, 0x0060), 'modality'],
  [tagOf(0x0010, 0x0020), 'patientId'],
  [tagOf(0x0020, 0x000d), 'studyInstanceUid'],
]);

interface ElementHeader {
  group: number;
  element: number;
  length: number;
  valueOffset: number;
}

interface Encoding {
  explicitVr: boolean;
  littleEndian: boolean;
}

function cleanValue(raw: string): string | undefined {
  const value = raw.replace(/[\0\s]+$/, '').trimStart();
  return value.length > 0 ? value : undefined;
}

class ElementReader {
  constructor(
    private readonly buffer: Buffer,
    private readonly encoding: Encoding,
  ) {}

  private u16(offset: number): number {
    return this.encoding.littleEndian ? this.buffer.readUInt16LE(offset) : this.buffer.readUInt16BE(offset);
  }

  private u32(offset: number): number {
    return this.encoding.littleEndian ? this.buffer.readUInt32LE(offset) : this.buffer.readUInt32BE(offset);
  }

  /** Undefined when the header runs past the end of the buffer. */
  readHeader(offset: number): ElementHeader | undefined {
    if (offset + 8 > this.buffer.length) return undefined;
    const group = this.u16(offset);
    const element = this.u16(offset + 2);

    // Items and delimiters never carry a VR
    if (group === 0xfffe || !this.encoding.explicitVr) {
      return { group, element, length: this.u32(offset + 4), valueOffset: offset + 8 };
    }

    const vr = this.buffer.toString('latin1', offset + 4, offset + 6);
    if (LONG_VRS.has(vr)) {
      if (offset + 12 > this.buffer.length) return undefined;
      return { group, element, length: this.u32(offset + 8), valueOffset: offset + 12 };
    }
    return { group, element, length: this.u16(offset + 6), valueOffset: offset + 8 };
  }

  readString(header: ElementHeader): string | undefined {
    const end = header.valueOffset + header.length;
    if (end > this.buffer.length) return undefined;
    return cleanValue(this.buffer.toString('latin1', header.valueOffset, end));
  }

  /**
   * Skips the value of an undefined-length element starting at `offset`.
   * Returns the offset after the matching delimiter, or undefined when the
   * buffer ends first.
   */
  skipUntil(offset: number, delimiter: number): number | undefined {
    let cursor: number | undefined = offset;
    while (cursor !== undefined) {
      const header = this.readHeader(cursor);
      if (!header) return undefined;
      if (header.group === 0xfffe && header.element === delimiter) {
        return header.valueOffset;
      }
      if (header.length === UNDEFINED_LENGTH) {
        const isItem = header.group === 0xfffe && header.element === ITEM;
        cursor = this.skipUntil(header.valueOffset, isItem ? ITEM_DELIMITATION : SEQUENCE_DELIMITATION);
      } else {
        cursor = header.valueOffset + header.length;
      }
    }
    return undefined;
  }
}

function readMetaGroup(buffer: Buffer, offset: number, header: DicomHeader): number {
  const reader = new ElementReader(buffer, { explicitVr: true, littleEndian: true });
  let cursor = offset;
  for (;;) {
    const element = reader.readHeader(cursor);
    if (!element || element.group !== 0x0002 || element.length === UNDEFINED_LENGTH) return cursor;
    if (tagOf(element.group, element.element) === TRANSFER_SYNTAX_TAG) {
      header.transferSyntaxUid = reader.readString(element);
    }
    cursor = element.valueOffset + element.length;
  }
}

function encodingFor(transferSyntaxUid: string | undefined, buffer: Buffer, offset: number): Encoding | undefined {
  switch (transferSyntaxUid) {
    case TransferSyntax.IMPLICIT_VR_LITTLE_ENDIAN:
      return { explicitVr: false, littleEndian: true };
    case TransferSyntax.EXPLICIT_VR_BIG_ENDIAN:
      return { explicitVr: true, littleEndian: false };
    case TransferSyntax.DEFLATED_EXPLICIT_VR_LITTLE_ENDIAN:
      return undefined;
    case undefined: {
      // No meta group: guess from whether bytes 4-5 look like a VR
      const vr = buffer.toString('latin1', offset + 4, offset + 6);
      return { explicitVr: /^[A-Z]{2}$/.test(vr), littleEndian: true };
    }
    default:
      // Every other transfer syntax (including the compressed ones) encodes the dataset as explicit VR little endian
      return { explicitVr: true, littleEndian: true };
  }
}

export function parseDicomHeader(buffer: Buffer): DicomHeader {
  const header: DicomHeader = { isPart10: false };
  let offset = 0;

  if (buffer.length >= PREAMBLE_LENGTH + 4 && buffer.toString('latin1', PREAMBLE_LENGTH, PREAMBLE_LENGTH + 4) === MAGIC) {
    header.isPart10 = true;
    offset = PREAMBLE_LENGTH + 4;
  }

  if (buffer.length >= offset + 2 && buffer.readUInt16LE(offset) === 0x0002) {
    offset = readMetaGroup(buffer, offset, header);
  }

  const encoding = encodingFor(header.transferSyntaxUid, buffer, offset);
  if (!encoding) return header;

  const reader = new ElementReader(buffer, encoding);
  let cursor: number | undefined = offset;

  while (cursor !== undefined) {
    const element = reader.readHeader(cursor);
    if (!element) break;
    const tag = tagOf(element.group, element.element);
    if (tag > LAST_WANTED_TAG) break;

    if (element.length === UNDEFINED_LENGTH) {
      cursor = reader.skipUntil(element.valueOffset, SEQUENCE_DELIMITATION);
      continue;
    }

    const field = WANTED.get(tag);
    if (field) {
      header[field] = reader.readString(element);
    }
    cursor = element.valueOffset + element.length;
  }

  return header;
}

/** Reads at most `maxBytes` from the start of the file and parses its header. */
export async function readDicomHeader(path: string, maxBytes: number): Promise<DicomHeader> {
  const handle = await open(path, 'r');
  try {
    const buffer = Buffer.alloc(maxBytes);
    const { bytesRead } = await handle.read(buffer, 0, maxBytes, 0);
    return parseDicomHeader(buffer.subarray(0, bytesRead));
  } finally {
    await handle.close();
  }
}

export async function hasDicomMagic(path: string): Promise<boolean> {
  const handle = await open(path, 'r');
  try {
    const buffer = Buffer.alloc(4);
    const { bytesRead } = await handle.read(buffer, 0, 4, PREAMBLE_LENGTH);
    return bytesRead === 4 && buffer.toString('latin1') === MAGIC;
  } finally {
    await handle.close();
  }
}

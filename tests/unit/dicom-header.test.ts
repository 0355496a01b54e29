/**
 * Unit Tests: header parsing across Part 10 and bare datasets.
 */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { hasDicomMagic, parseDicomHeader, readDicomHeader, TransferSyntax } from '../../src/dicom-header.js';
import {
  buildPart10,
  buildRawDataset,
  createTempTree,
  CT_IMAGE_STORAGE,
  explicitElement,
  IMPLICIT_VR_LITTLE_ENDIAN,
  TempTree,
} from '../helpers/fixtures.js';

const FIELDS = {
  sopClassUid: CT_IMAGE_STORAGE,
  sopInstanceUid: '1.2.3.4.5',
  modality: 'CT',
  patientId: 'PAT001',
  studyInstanceUid: '1.2.3.4',
};

describe('parseDicomHeader', () => {
  it('reads a Part 10 explicit VR little endian file', () => {
    const header = parseDicomHeader(buildPart10(FIELDS));

    expect(header).toEqual({
      isPart10: true,
      transferSyntaxUid: TransferSyntax.EXPLICIT_VR_LITTLE_ENDIAN,
      ...FIELDS,
    });
  });

  it('reads a Part 10 implicit VR little endian file', () => {
    const header = parseDicomHeader(buildPart10(FIELDS, IMPLICIT_VR_LITTLE_ENDIAN));

    expect(header.transferSyntaxUid).toBe(IMPLICIT_VR_LITTLE_ENDIAN);
    expect(header.modality).toBe('CT');
    expect(header.patientId).toBe('PAT001');
    expect(header.studyInstanceUid).toBe('1.2.3.4');
  });

  it('strips padding from odd-length values', () => {
    const header = parseDicomHeader(buildPart10({ modality: 'MR', patientId: 'ABC', sopInstanceUid: '1.2.3' }));

    expect(header.patientId).toBe('ABC');
    expect(header.sopInstanceUid).toBe('1.2.3');
  });

  it('reads a bare dataset without preamble', () => {
    const header = parseDicomHeader(buildRawDataset(FIELDS));

    expect(header.isPart10).toBe(false);
    expect(header.transferSyntaxUid).toBeUndefined();
    expect(header.modality).toBe('CT');
    expect(header.sopClassUid).toBe(CT_IMAGE_STORAGE);
  });

  it('leaves dataset fields empty for a deflated transfer syntax', () => {
    const header = parseDicomHeader(buildPart10(FIELDS, TransferSyntax.DEFLATED_EXPLICIT_VR_LITTLE_ENDIAN));

    expect(header).toEqual({
      isPart10: true,
      transferSyntaxUid: TransferSyntax.DEFLATED_EXPLICIT_VR_LITTLE_ENDIAN,
    });
  });

  it('stops at a value that runs past the end of the buffer', () => {
    const full = buildPart10({ modality: 'CT', patientId: 'PATIENT-WITH-LONG-ID' });
    const header = parseDicomHeader(full.subarray(0, full.length - 4));

    expect(header.modality).toBe('CT');
    expect(header.patientId).toBeUndefined();
  });

  it('skips an undefined-length sequence', () => {
    // (0008,1140) SQ with undefined length, one undefined-length item
    const sequence = Buffer.alloc(12);
    sequence.writeUInt16LE(0x0008, 0);
    sequence.writeUInt16LE(0x1140, 2);
    sequence.write('SQ', 4, 'latin1');
    sequence.writeUInt32LE(0xffffffff, 8);

    const delimiter = (element: number, length = 0) => {
      const buf = Buffer.alloc(8);
      buf.writeUInt16LE(0xfffe, 0);
      buf.writeUInt16LE(element, 2);
      buf.writeUInt32LE(length, 4);
      return buf;
    };

    const dataset = Buffer.concat([
      explicitElement(0x0008, 0x0018, 'UI', '9.8.7'),
      sequence,
      delimiter(0xe000, 0xffffffff),
      explicitElement(0x0008, 0x1155, 'UI', '5.6.7'),
      delimiter(0xe00d),
      delimiter(0xe0dd),
      explicitElement(0x0010, 0x0020, 'LO', 'PAT002'),
    ]);

    const header = parseDicomHeader(dataset);
    expect(header.sopInstanceUid).toBe('9.8.7');
    expect(header.patientId).toBe('PAT002');
    expect(header.modality).toBeUndefined();
  });

  it('returns an empty header for an empty buffer', () => {
    expect(parseDicomHeader(Buffer.alloc(0))).toEqual({ isPart10: false });
  });
});

describe('file access', () => {
  let tree: TempTree;

  beforeAll(async () => {
    tree = await createTempTree();
  });

  afterAll(async () => {
    await tree.cleanup();
  });

  it('readDicomHeader parses from a bounded prefix', async () => {
    const path = await tree.write('ct.dcm', buildPart10(FIELDS, undefined, 4096));
    const header = await readDicomHeader(path, 1024);

    expect(header.modality).toBe('CT');
    expect(header.studyInstanceUid).toBe('1.2.3.4');
  });

  it('hasDicomMagic detects the DICM marker', async () => {
    const dicom = await tree.write('noext-dicom', buildPart10(FIELDS));
    const text = await tree.write('noext-text', 'not a dicom file');

    expect(await hasDicomMagic(dicom)).toBe(true);
    expect(await hasDicomMagic(text)).toBe(false);
  });
});

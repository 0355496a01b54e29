/**
 * Test fixtures: load configs, payload descriptors and tiny Part 10 files.
 */
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { LoadConfig, PayloadDescriptor } from '../../src/types.js';

export const TEST_TARGET = {
  host: '127.0.0.1',
  port: 11112,
  calledAeTitle: 'TEST_SCP',
  callingAeTitle: 'TEST_SCU',
};

export function testConfig(overrides: Partial<LoadConfig> = {}): LoadConfig {
  return {
    target: TEST_TARGET,
    targetRate: 10,
    concurrency: 1,
    totalCount: 1,
    timeoutMs: 1000,
    retryCount: 0,
    retryDelayMs: 0,
    maxErrorRate: 0.02,
    maxP95LatencyMs: 2000,
    verifyConnectivity: false,
    ...overrides,
  };
}

export function testPayloads(count: number): PayloadDescriptor[] {
  return Array.from({ length: count }, (_, i) => ({
    path: `/data/img-${i}.dcm`,
    sizeBytes: 1024 * (i + 1),
  }));
}

// ============================================================================
// DICOM element encoding
// ============================================================================

export const EXPLICIT_VR_LITTLE_ENDIAN = '1.2.840.10008.1.2.1';
export const IMPLICIT_VR_LITTLE_ENDIAN = '1.2.840.10008.1.2';
export const CT_IMAGE_STORAGE = '1.2.840.10008.5.1.4.1.1.2';

export interface DatasetFields {
  sopClassUid?: string;
  sopInstanceUid?: string;
  modality?: string;
  patientId?: string;
  studyInstanceUid?: string;
}

function padValue(value: string, vr: string): Buffer {
  const padded = value.length % 2 === 0 ? value : value + (vr === 'UI' ? '\0' : ' ');
  return Buffer.from(padded, 'latin1');
}

function tagBytes(group: number, element: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeUInt16LE(group, 0);
  buf.writeUInt16LE(element, 2);
  return buf;
}

export function explicitElement(group: number, element: number, vr: string, value: string): Buffer {
  const data = padValue(value, vr);
  const header = Buffer.alloc(4);
  header.write(vr, 0, 'latin1');
  header.writeUInt16LE(data.length, 2);
  return Buffer.concat([tagBytes(group, element), header, data]);
}

export function implicitElement(group: number, element: number, vr: string, value: string): Buffer {
  const data = padValue(value, vr);
  const length = Buffer.alloc(4);
  length.writeUInt32LE(data.length, 0);
  return Buffer.concat([tagBytes(group, element), length, data]);
}

type ElementWriter = typeof explicitElement;

function datasetElements(fields: DatasetFields, write: ElementWriter): Buffer[] {
  const elements: Buffer[] = [];
  if (fields.sopClassUid) elements.push(write(0x0008, 0x0016, 'UI', fields.sopClassUid));
  if (fields.sopInstanceUid) elements.push(write(0x0008, 0x0018, 'UI', fields.sopInstanceUid));
  if (fields.modality) elements.push(write(0x0008, 0x0060, 'CS', fields.modality));
  if (fields.patientId) elements.push(write(0x0010, 0x0020, 'LO', fields.patientId));
  if (fields.studyInstanceUid) elements.push(write(0x0020, 0x000d, 'UI', fields.studyInstanceUid));
  return elements;
}

/** A Part 10 file: preamble, DICM, file meta group and the dataset fields. */
export function buildPart10(
  fields: DatasetFields,
  transferSyntaxUid: string = EXPLICIT_VR_LITTLE_ENDIAN,
  padTo = 0,
): Buffer {
  const tsElement = explicitElement(0x0002, 0x0010, 'UI', transferSyntaxUid);
  const groupLength = Buffer.alloc(12);
  tagBytes(0x0002, 0x0000).copy(groupLength, 0);
  groupLength.write('UL', 4, 'latin1');
  groupLength.writeUInt16LE(4, 6);
  groupLength.writeUInt32LE(tsElement.length, 8);

  const write = transferSyntaxUid === IMPLICIT_VR_LITTLE_ENDIAN ? implicitElement : explicitElement;
  const body = Buffer.concat([
    Buffer.alloc(128),
    Buffer.from('DICM', 'latin1'),
    groupLength,
    tsElement,
    ...datasetElements(fields, write),
  ]);
  return body.length >= padTo ? body : Buffer.concat([body, Buffer.alloc(padTo - body.length)]);
}

/** A bare dataset with no preamble or meta group, in explicit VR little endian. */
export function buildRawDataset(fields: DatasetFields): Buffer {
  return Buffer.concat(datasetElements(fields, explicitElement));
}

// ============================================================================
// Temporary dataset trees
// ============================================================================

export interface TempTree {
  root: string;
  write(relativePath: string, contents: Buffer | string): Promise<string>;
  cleanup(): Promise<void>;
}

export async function createTempTree(): Promise<TempTree> {
  const root = await mkdtemp(join(tmpdir(), 'dicom-load-test-'));
  return {
    root,
    async write(relativePath, contents) {
      const path = join(root, relativePath);
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, contents);
      return path;
    },
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}

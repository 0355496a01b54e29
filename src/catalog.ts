import { readdir, stat } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';
import { hasDicomMagic, readDicomHeader } from './dicom-header.js';
import { CatalogError, InsufficientDataError, formatError } from './errors.js';
import { Logger, silentLogger } from './logger.js';
import { PayloadCategory, PayloadDescriptor, SizeBucket } from './types.js';

export interface SizeThresholds {
  /** Largest size, in bytes, still counted as small. */
  smallMaxBytes: number;
  /** Largest size, in bytes, still counted as medium. */
  mediumMaxBytes: number;
}

export interface DatasetCatalogOptions {
  root: string;
  extensions?: string[];
  headerBytes?: number;
  sizeThresholds?: SizeThresholds;
  /** Restrict selection to one size bucket or modality code. */
  category?: PayloadCategory;
  /** Sample this many payloads instead of using all of them. */
  sampleSize?: number;
  seed?: number;
  logger?: Logger;
}

export const DEFAULT_EXTENSIONS = ['.dcm', '.dicom'];
export const DEFAULT_HEADER_BYTES = 64 * 1024;
export const DEFAULT_SIZE_THRESHOLDS: SizeThresholds = {
  smallMaxBytes: 512 * 1024,
  mediumMaxBytes: 10 * 1024 * 1024,
};

// Seeded random for reproducible sampling
export function seededRandom(seed: number): () => number {
  let state = seed & 0x7fffffff;
  return function(): number {
    state = (Math.imul(state, 1103515245) + 12345) & 0x7fffffff;
    return state / 0x7fffffff;
  };
}

export function sizeBucketOf(sizeBytes: number, thresholds: SizeThresholds = DEFAULT_SIZE_THRESHOLDS): SizeBucket {
  if (sizeBytes <= thresholds.smallMaxBytes) return 'small';
  if (sizeBytes <= thresholds.mediumMaxBytes) return 'medium';
  return 'large';
}

async function* walk(dir: string): AsyncGenerator<string> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      yield* walk(path);
    } else if (entry.isFile()) {
      yield path;
    }
  }
}

export class DatasetCatalog {
  readonly root: string;
  private readonly extensions: Set<string>;
  private readonly headerBytes: number;
  private readonly thresholds: SizeThresholds;
  private readonly options: DatasetCatalogOptions;
  private readonly logger: Logger;

  constructor(options: DatasetCatalogOptions) {
    this.options = options;
    this.root = resolve(options.root);
    this.extensions = new Set((options.extensions ?? DEFAULT_EXTENSIONS).map(ext => ext.toLowerCase()));
    this.headerBytes = options.headerBytes ?? DEFAULT_HEADER_BYTES;
    this.thresholds = options.sizeThresholds ?? DEFAULT_SIZE_THRESHOLDS;
    this.logger = options.logger ?? silentLogger;
  }

  /** Recursively finds payload files under `root`, sorted by path. Read-only. */
  async discover(root: string = this.root): Promise<PayloadDescriptor[]> {
    const absoluteRoot = resolve(root);

    try {
      const info = await stat(absoluteRoot);
      if (!info.isDirectory()) {
        throw new CatalogError(`Dataset root is not a directory: ${absoluteRoot}`, absoluteRoot);
      }
    } catch (error) {
      if (error instanceof CatalogError) throw error;
      throw new CatalogError(`Dataset root not found: ${absoluteRoot} (${formatError(error)})`, absoluteRoot);
    }

    const descriptors: PayloadDescriptor[] = [];
    for await (const path of walk(absoluteRoot)) {
      if (!(await this.matches(path))) continue;
      descriptors.push(await this.describe(path));
    }

    if (descriptors.length === 0) {
      throw new CatalogError(`No DICOM files found under ${absoluteRoot}`, absoluteRoot);
    }

    descriptors.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    this.logger.debug(`Discovered ${descriptors.length} payloads under ${absoluteRoot}`);
    return descriptors;
  }

  /**
   * Groups descriptors by size bucket and by modality code. A descriptor
   * appears once in its size bucket and once in its modality bucket.
   */
  classify(descriptors: readonly PayloadDescriptor[]): Map<PayloadCategory, PayloadDescriptor[]> {
    const categories = new Map<PayloadCategory, PayloadDescriptor[]>();
    const add = (category: PayloadCategory, descriptor: PayloadDescriptor) => {
      const bucket = categories.get(category);
      if (bucket) {
        bucket.push(descriptor);
      } else {
        categories.set(category, [descriptor]);
      }
    };

    for (const descriptor of descriptors) {
      add(sizeBucketOf(descriptor.sizeBytes, this.thresholds), descriptor);
      if (descriptor.modality) {
        add(descriptor.modality.toUpperCase(), descriptor);
      }
    }
    return categories;
  }

  /** Deterministic for the same descriptors and seed, whatever their input order. */
  sample(descriptors: readonly PayloadDescriptor[], count: number, seed: number): PayloadDescriptor[] {
    if (!Number.isInteger(count) || count < 0) {
      throw new CatalogError(`Sample size must be a non-negative integer, got ${count}`, this.root);
    }
    if (count > descriptors.length) {
      throw new InsufficientDataError(count, descriptors.length);
    }

    const pool = [...descriptors].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    const random = seededRandom(seed);
    for (let i = pool.length - 1; i > 0; i--) {
      const j = Math.floor(random() * (i + 1));
      [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, count);
  }

  /** The payloads a run should cycle through, per the catalog's category and sampling options. */
  async selectPayloads(): Promise<PayloadDescriptor[]> {
    const { category, sampleSize, seed = 0 } = this.options;
    if (sampleSize !== undefined && sampleSize < 1) {
      throw new CatalogError(`Sample size must be at least 1, got ${sampleSize}`, this.root);
    }
    let pool = await this.discover();

    if (category !== undefined) {
      const key = category === 'small' || category === 'medium' || category === 'large' ? category : category.toUpperCase();
      pool = this.classify(pool).get(key) ?? [];
      if (pool.length === 0) {
        throw new InsufficientDataError(sampleSize ?? 1, 0, `No payloads in category "${category}" under ${this.root}`);
      }
    }

    return sampleSize === undefined ? pool : this.sample(pool, sampleSize, seed);
  }

  private async matches(path: string): Promise<boolean> {
    const extension = extname(path).toLowerCase();
    if (extension === '') {
      return hasDicomMagic(path);
    }
    return this.extensions.has(extension);
  }

  private async describe(path: string): Promise<PayloadDescriptor> {
    const { size } = await stat(path);
    try {
      const header = await readDicomHeader(path, this.headerBytes);
      return Object.freeze({
        path,
        sizeBytes: size,
        modality: header.modality,
        patientId: header.patientId,
        studyInstanceUid: header.studyInstanceUid,
        sopClassUid: header.sopClassUid,
        sopInstanceUid: header.sopInstanceUid,
        transferSyntaxUid: header.transferSyntaxUid,
      });
    } catch (error) {
      this.logger.warn(`Could not read header of ${path}: ${formatError(error)}`);
      return Object.freeze({ path, sizeBytes: size });
    }
  }
}

/**
 * Locator: derives storage keys from filing metadata.
 *
 * Convention:
 * - Key shape: `{segment}/{segment}/.../{fileName}.{ext}`
 * - Segments come from the CollectionSpec partitions, in order
 * - Example: `edinet/99990/2024/edinet_S100TEST_abcd.xbrl`
 *
 * Resolution is pure: the same metadata always yields the same key.
 */

import { LocatorPathResolutionError } from '../core/errors.js';
import type { Filing } from '../filing/Filing.js';

/**
 * Granularity for date-valued partitions (UTC).
 */
export type DatePart = 'year' | 'month' | 'date';

/**
 * Partition taken from a field, with an optional date format.
 */
export interface PartitionRule {
  field: string;
  format?: DatePart;
}

/**
 * Partition computed from the whole filing.
 */
export type PartitionFunction = (filing: Filing) => string | null | undefined;

export type Partition = string | PartitionRule | PartitionFunction;

/**
 * How a collection lays out payloads in Storage.
 */
export interface CollectionSpec {
  /** Ordered partition segments (default: ['source']) */
  partitions?: readonly Partition[];
  /** Field name or function giving the file name (default: 'id') */
  fileName?: string | PartitionFunction;
  /** Extension when neither format nor isZip decides (default: 'xbrl') */
  defaultExtension?: string;
  /** Extension for zip payloads without a format (default: 'zip') */
  zipExtension?: string;
}

const DEFAULT_SPEC: Required<CollectionSpec> = {
  partitions: ['source'],
  fileName: 'id',
  defaultExtension: 'xbrl',
  zipExtension: 'zip',
};

/**
 * `{source}/{id}.{ext}`
 */
export const defaultCollectionSpec: CollectionSpec = Object.freeze({ ...DEFAULT_SPEC });

/**
 * `edinet/{secCode}/{periodEnd year}/{id}.{ext}`
 */
export const edinetCollectionSpec: CollectionSpec = Object.freeze<CollectionSpec>({
  ...DEFAULT_SPEC,
  partitions: ['source', 'secCode', { field: 'periodEnd', format: 'year' }],
});

/**
 * `edgar/{cik}/{filingDate year}/{id}.{ext}`
 */
export const edgarCollectionSpec: CollectionSpec = Object.freeze<CollectionSpec>({
  ...DEFAULT_SPEC,
  partitions: ['source', 'cik', { field: 'filingDate', format: 'year' }],
  defaultExtension: 'htm',
});

/**
 * Named specs selectable from configuration.
 */
export const COLLECTION_SPEC_PRESETS = {
  default: defaultCollectionSpec,
  edinet: edinetCollectionSpec,
  edgar: edgarCollectionSpec,
} as const;

export type CollectionSpecPreset = keyof typeof COLLECTION_SPEC_PRESETS;

function formatDate(value: Date, part: DatePart): string {
  const iso = value.toISOString();
  switch (part) {
    case 'year':
      return iso.slice(0, 4);
    case 'month':
      return iso.slice(0, 7);
    case 'date':
      return iso.slice(0, 10);
  }
}

/**
 * Path separators, and characters Windows rejects in file names.
 */
const UNSAFE_SEGMENT_CHARS = /[/\\:*?"<>|\u0000-\u001f]/g;

/**
 * Make one metadata value safe as a key segment.
 */
function toSegment(value: string): string {
  return value.trim().replace(UNSAFE_SEGMENT_CHARS, '_');
}

export class Locator {
  private readonly spec: Required<CollectionSpec>;

  constructor(spec: CollectionSpec = {}) {
    this.spec = { ...DEFAULT_SPEC, ...spec };
  }

  /**
   * Storage key for a filing.
   *
   * @throws LocatorPathResolutionError when a partition or the file name is missing
   */
  resolve(filing: Filing): string {
    const segments = this.segments(filing);
    const fileName = this.fileName(filing);
    return [...segments, `${fileName}.${this.extension(filing)}`].join('/');
  }

  /**
   * Partition segments for a filing, in order.
   */
  segments(filing: Filing): string[] {
    return this.spec.partitions.map((partition, index) =>
      this.checkSegment(filing, this.partitionValue(filing, partition), describePartition(partition, index))
    );
  }

  /**
   * Extension policy: `format` (leading dots stripped), else the zip
   * extension when `isZip`, else the default extension.
   */
  extension(filing: Filing): string {
    const format = filing.format?.replace(/^\.+/, '').trim();
    if (format) {
      return toSegment(format);
    }
    return filing.isZip ? this.spec.zipExtension : this.spec.defaultExtension;
  }

  private fileName(filing: Filing): string {
    const source = this.spec.fileName;
    const raw =
      typeof source === 'function' ? source(filing) : this.fieldValue(filing, source, undefined);
    return this.checkSegment(filing, raw, typeof source === 'function' ? 'fileName' : source);
  }

  private partitionValue(filing: Filing, partition: Partition): string | null | undefined {
    if (typeof partition === 'function') {
      return partition(filing);
    }
    if (typeof partition === 'string') {
      return this.fieldValue(filing, partition, undefined);
    }
    return this.fieldValue(filing, partition.field, partition.format);
  }

  private fieldValue(filing: Filing, name: string, format: DatePart | undefined): string | null {
    const value = filing.get(name);
    if (value === null || value === undefined) {
      return null;
    }
    if (value instanceof Date) {
      if (Number.isNaN(value.getTime())) {
        throw new LocatorPathResolutionError(filing.id, `field '${name}' holds an invalid date`, [name]);
      }
      return formatDate(value, format ?? 'date');
    }
    if (format !== undefined) {
      throw new LocatorPathResolutionError(
        filing.id,
        `field '${name}' is not a date and cannot be formatted as ${format}`,
        [name]
      );
    }
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      return String(value);
    }
    throw new LocatorPathResolutionError(filing.id, `field '${name}' is not a scalar value`, [name]);
  }

  private checkSegment(filing: Filing, raw: string | null | undefined, label: string): string {
    if (raw === null || raw === undefined) {
      throw new LocatorPathResolutionError(filing.id, `'${label}' has no value`, [label]);
    }
    const segment = toSegment(raw);
    if (segment === '' || segment === '.' || segment === '..') {
      throw new LocatorPathResolutionError(filing.id, `'${label}' yields unusable segment '${raw}'`, [label]);
    }
    return segment;
  }
}

function describePartition(partition: Partition, index: number): string {
  if (typeof partition === 'string') return partition;
  if (typeof partition === 'function') return `partitions[${index}]`;
  return partition.field;
}

/**
 * Create a Locator from a spec or a preset name.
 */
export function createLocator(spec: CollectionSpec | CollectionSpecPreset = 'default'): Locator {
  return new Locator(typeof spec === 'string' ? COLLECTION_SPEC_PRESETS[spec] : spec);
}

/**
 * Multi-valued, provenance-tracked metadata store.
 *
 * Every assertion is kept as an entry in insertion order; the first entry of
 * a key is its primary value. A key is list-valued when one add call stored
 * several entries under it (they share a sequence id) or when it was added
 * with `{ list: true }`. Divergent values of any other key are conflicts.
 */
import { isDeepStrictEqual } from 'node:util';
import { validateMetadataValue } from './validators.js';
import type {
  AddMetadataOptions,
  AddMetadataOutcome,
  MetadataConflict,
  MetadataEntry,
  MetadataInput,
  MetadataReader,
  MetadataScalar,
  MetadataValue,
  RejectedValue,
} from './types.js';

/**
 * Trim strings and drop empty record fields.
 * Returns undefined for values that carry nothing.
 */
export function cleanMetadataValue(value: MetadataValue | null | undefined): MetadataValue | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed ? trimmed : undefined;
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  const record: Record<string, MetadataScalar> = {};
  for (const [field, fieldValue] of Object.entries(value)) {
    const cleaned = cleanMetadataValue(fieldValue);
    if (cleaned !== undefined && typeof cleaned !== 'object') {
      record[field] = cleaned;
    }
  }
  return Object.keys(record).length > 0 ? record : undefined;
}

/**
 * Whether an input would store nothing.
 */
export function isEmptyMetadata(input: MetadataInput): boolean {
  if (isValueList(input)) {
    return input.every((item) => cleanMetadataValue(item) === undefined);
  }
  return cleanMetadataValue(input) === undefined;
}

function isValueList(input: MetadataInput): input is readonly MetadataValue[] {
  return Array.isArray(input);
}

/**
 * Render a value for messages.
 */
export function formatMetadataValue(value: MetadataValue): string {
  return JSON.stringify(value);
}

export class MetadataStore implements MetadataReader {
  private readonly entries = new Map<string, MetadataEntry[]>();
  private readonly listKeys = new Set<string>();
  private sequence = 0;

  /**
   * Append the values of one assertion.
   *
   * Empty values are dropped without trace. Values failing a format check
   * are dropped and returned in `rejected`; the caller reports them.
   */
  add(
    key: string,
    input: MetadataInput,
    source: string,
    path?: string,
    options: AddMetadataOptions = {}
  ): AddMetadataOutcome {
    const candidates = isValueList(input) ? input : [input];
    const values: MetadataValue[] = [];
    const rejected: RejectedValue[] = [];

    for (const candidate of candidates) {
      const cleaned = cleanMetadataValue(candidate);
      if (cleaned === undefined) {
        continue;
      }

      const outcome = validateMetadataValue(key, cleaned);
      if (outcome.ok) {
        values.push(outcome.value);
      } else {
        rejected.push({ value: cleaned, reason: outcome.reason });
      }
    }

    if (values.length === 0) {
      return { stored: 0, rejected };
    }

    const sequence = ++this.sequence;
    let list = this.entries.get(key);
    if (!list) {
      list = [];
      this.entries.set(key, list);
    }

    for (const value of values) {
      list.push(path ? { value, source, path, sequence } : { value, source, sequence });
    }

    if (options.list) {
      this.listKeys.add(key);
    }

    return { stored: values.length, rejected };
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): readonly MetadataEntry[] {
    return this.entries.get(key) ?? [];
  }

  isList(key: string): boolean {
    if (this.listKeys.has(key)) {
      return true;
    }

    const seen = new Set<number>();
    for (const entry of this.get(key)) {
      if (seen.has(entry.sequence)) {
        return true;
      }
      seen.add(entry.sequence);
    }
    return false;
  }

  /**
   * Representative value: the de-duplicated values of a list key, the
   * primary value otherwise.
   */
  value(key: string): MetadataValue | MetadataValue[] | undefined {
    const entries = this.get(key);
    if (entries.length === 0) {
      return undefined;
    }

    if (!this.isList(key)) {
      return entries[0].value;
    }

    const values: MetadataValue[] = [];
    for (const entry of entries) {
      if (!values.some((value) => isDeepStrictEqual(value, entry.value))) {
        values.push(entry.value);
      }
    }
    return values;
  }

  sources(key: string): string[] {
    return [...new Set(this.get(key).map((entry) => entry.source))];
  }

  /**
   * Find scalar keys whose entries disagree.
   */
  findConflicts(): MetadataConflict[] {
    const conflicts: MetadataConflict[] = [];

    for (const [key, entries] of this.entries) {
      if (entries.length < 2 || this.isList(key)) {
        continue;
      }

      const values: MetadataConflict['values'] = [];
      for (const entry of entries) {
        let group = values.find((item) => isDeepStrictEqual(item.value, entry.value));
        if (!group) {
          group = { value: entry.value, sources: [], paths: [] };
          values.push(group);
        }
        if (!group.sources.includes(entry.source)) {
          group.sources.push(entry.source);
        }
        if (entry.path && !group.paths.includes(entry.path)) {
          group.paths.push(entry.path);
        }
      }

      if (values.length > 1) {
        conflicts.push({ key, values });
      }
    }

    return conflicts;
  }

  /**
   * Plain snapshot: one representative value per key.
   */
  toPlain(): Record<string, MetadataValue | MetadataValue[]> {
    const plain: Record<string, MetadataValue | MetadataValue[]> = {};
    for (const key of this.entries.keys()) {
      const value = this.value(key);
      if (value !== undefined) {
        plain[key] = value;
      }
    }
    return plain;
  }

  /**
   * Full snapshot with provenance.
   */
  toRecords(): Record<string, MetadataEntry[]> {
    const records: Record<string, MetadataEntry[]> = {};
    for (const [key, entries] of this.entries) {
      records[key] = entries.map((entry) => ({ ...entry }));
    }
    return records;
  }
}


/**
 * Metadata type definitions.
 */

export type MetadataScalar = string | number | boolean;

/** Flat record, e.g. one citation author. */
export type MetadataRecord = { readonly [field: string]: MetadataScalar };

export type MetadataValue = MetadataScalar | MetadataRecord;

/** What an analyser may pass in one call. Arrays become list entries. */
export type MetadataInput = MetadataValue | readonly MetadataValue[] | null | undefined;

/**
 * One metadata assertion with its provenance.
 */
export interface MetadataEntry {
  value: MetadataValue;
  /** Id of the analyser that asserted the value */
  source: string;
  /** File the value was read from, relative to the repository root */
  path?: string;
  /** Id of the add call; entries of one call share it */
  sequence: number;
}

export interface AddMetadataOptions {
  /** Treat the key as list-valued even for a single value */
  list?: boolean;
}

export interface RejectedValue {
  value: MetadataValue;
  reason: string;
}

export interface AddMetadataOutcome {
  /** Number of entries appended */
  stored: number;
  /** Values dropped by a validator */
  rejected: RejectedValue[];
}

/**
 * Divergent scalar values found for one key.
 */
export interface MetadataConflict {
  key: string;
  values: Array<{
    value: MetadataValue;
    sources: string[];
    paths: string[];
  }>;
}

/**
 * Read-only view handed to analysers and aggregators.
 */
export interface MetadataReader {
  keys(): string[];
  has(key: string): boolean;
  get(key: string): readonly MetadataEntry[];
  isList(key: string): boolean;
  value(key: string): MetadataValue | MetadataValue[] | undefined;
  sources(key: string): string[];
}

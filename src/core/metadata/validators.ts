/**
 * Format checks for well-known metadata keys.
 */
import { z } from 'zod';
import type { MetadataValue } from './types.js';

const DOI_PATTERN = /^10\.\d{4,9}\/\S+$/;
const DOI_PREFIX = /^(?:https?:\/\/(?:dx\.)?doi\.org\/|doi:\s*)/i;
const URL_PATTERN = /^https?:\/\/[^\s/$.?#][^\s]*$/i;

interface KeyValidator {
  /** Applied before validation; the normalized value is what gets stored */
  normalize?: (value: string) => string;
  schema: z.ZodType<string>;
}

const VALIDATORS: Record<string, KeyValidator> = {
  doi: {
    normalize: (value) => value.replace(DOI_PREFIX, ''),
    schema: z.string().regex(DOI_PATTERN, 'not a DOI'),
  },
  repository_code: {
    schema: z.string().regex(URL_PATTERN, 'not an http(s) URL'),
  },
};

export type ValidationOutcome =
  | { ok: true; value: MetadataValue }
  | { ok: false; reason: string };

/**
 * Validate one value for a key. Keys without a validator accept anything.
 */
export function validateMetadataValue(key: string, value: MetadataValue): ValidationOutcome {
  const validator = VALIDATORS[key];
  if (!validator) {
    return { ok: true, value };
  }

  if (typeof value !== 'string') {
    return { ok: false, reason: 'expected a string' };
  }

  const normalized = validator.normalize ? validator.normalize(value) : value;
  const result = validator.schema.safeParse(normalized);
  if (!result.success) {
    return { ok: false, reason: result.error.issues.map((issue) => issue.message).join('; ') };
  }
  return { ok: true, value: result.data };
}


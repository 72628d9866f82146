/**
 * Bundled data files under data/.
 */
import * as path from 'node:path';
import { z } from 'zod';
import { SystemError, ErrorCodes, errorMessage } from '../utils/errors.js';
import { findPackageRoot, readFile } from '../utils/file-system.js';
import { formatZodError } from '../utils/yaml.js';

export function dataPath(name: string): string {
  return path.join(findPackageRoot(import.meta.url), 'data', name);
}

const cache = new Map<string, Promise<unknown>>();

async function readJson<T extends z.ZodType>(name: string, schema: T): Promise<z.infer<T>> {
  const filePath = dataPath(name);
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(filePath));
  } catch (error) {
    throw new SystemError(ErrorCodes.READ_ERROR, `Failed to load data file ${filePath}: ${errorMessage(error)}`, {
      filePath,
    });
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new SystemError(ErrorCodes.PARSE_ERROR, `Invalid data file ${filePath}: ${formatZodError(result.error)}`, {
      filePath,
    });
  }
  return result.data;
}

/**
 * Load and validate a JSON data file once per process.
 */
export function loadJsonData<T extends z.ZodType>(name: string, schema: T): Promise<z.infer<T>> {
  const existing = cache.get(name);
  if (existing) {
    return existing.then((value) => schema.parse(value));
  }
  const loading = readJson(name, schema);
  cache.set(name, loading);
  return loading;
}

/**
 * Package version, read from package.json beside the sources or dist/.
 */
import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { findPackageRoot } from './utils/file-system.js';

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const file = path.join(findPackageRoot(import.meta.url), 'package.json');
  return PackageJsonSchema.parse(JSON.parse(readFileSync(file, 'utf-8'))).version;
}

export const VERSION = readVersion();

/**
 * Scan root resolution.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { InvalidPathError } from '../../utils/errors.js';
import { isDirectory, listDirectory } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('analysis');

/**
 * Resolve a user-supplied path to the effective repository root.
 *
 * While a directory holds exactly one entry and that entry is a directory,
 * descend into it: archives often unpack into a single top-level folder.
 *
 * @throws InvalidPathError when the path is missing or not a directory
 */
export async function resolveRoot(inputPath: string): Promise<string> {
  let root = path.resolve(inputPath);

  if (!fs.existsSync(root)) {
    throw new InvalidPathError(`Path does not exist: ${root}`, { path: root });
  }
  if (!(await isDirectory(root))) {
    throw new InvalidPathError(`Path is not a directory: ${root}`, { path: root });
  }

  for (;;) {
    const entries = await listDirectory(root);
    const only = entries.length === 1 ? entries[0] : undefined;
    if (only === undefined) {
      return root;
    }
    const candidate = path.join(root, only);
    if (!(await isDirectory(candidate))) {
      return root;
    }
    log.debug(`Descending into wrapper directory ${only}/`);
    root = candidate;
  }
}

/**
 * Single top-down traversal of a repository.
 *
 * Every directory entry is checked against the directory include rules
 * before the exclude rules, so a directory can be catalogued and pruned in
 * the same step. Symlinks are followed; a link back to one of the current
 * directory's ancestors is not entered, so cycles end while a second link
 * to an unrelated directory is walked under its own path.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { ErrorCodes, SystemError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { Rule, RuleSet } from '../rules/index.js';
import type { ScanOptions, ScanResult } from './types.js';

const log = logger.child('scanner');

interface PendingDirectory {
  absolutePath: string;
  /** '' for the root */
  relativePath: string;
  /** Real paths from the root down to this directory */
  ancestors: ReadonlySet<string>;
}

interface DirectoryListing {
  directories: string[];
  files: string[];
}

/**
 * Throw when the scan was cancelled.
 */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new SystemError(ErrorCodes.SCAN_ABORTED, 'Scan aborted', {
      reason: signal.reason === undefined ? undefined : errorMessage(signal.reason),
    });
  }
}

function joinRelative(parent: string, name: string): string {
  return parent ? `${parent}/${name}` : name;
}

/**
 * Split a directory's entries into subdirectories and files, following
 * symlinks. Entries that are neither (or dangling links) are left out.
 */
async function listEntries(dirPath: string): Promise<DirectoryListing> {
  const entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const listing: DirectoryListing = { directories: [], files: [] };
  for (const entry of entries) {
    if (entry.isDirectory()) {
      listing.directories.push(entry.name);
    } else if (entry.isFile()) {
      listing.files.push(entry.name);
    } else if (entry.isSymbolicLink()) {
      try {
        const stat = await fs.promises.stat(path.join(dirPath, entry.name));
        if (stat.isDirectory()) {
          listing.directories.push(entry.name);
        } else if (stat.isFile()) {
          listing.files.push(entry.name);
        }
      } catch (error) {
        log.debug(`Skipping dangling link ${path.join(dirPath, entry.name)}: ${errorMessage(error)}`);
      }
    }
  }
  return listing;
}

function record(files: Map<string, string[]>, owners: Set<string>, relativePath: string): void {
  for (const owner of owners) {
    const list = files.get(owner);
    if (list) {
      list.push(relativePath);
    } else {
      files.set(owner, [relativePath]);
    }
  }
}

function matchingOwners(rules: readonly Rule[], relativePath: string, name: string): Set<string> | undefined {
  let owners: Set<string> | undefined;
  for (const rule of rules) {
    if (rule.matchEntry(relativePath, name)) {
      owners ??= new Set();
      for (const owner of rule.owners) {
        owners.add(owner);
      }
    }
  }
  return owners;
}

/**
 * Walk `root` once and group matched paths by analyser id.
 *
 * @param root - Absolute path of an existing directory
 * @throws SystemError SCAN_ABORTED when `options.signal` fires
 */
export async function scan(
  root: string,
  includes: RuleSet,
  excludes: RuleSet,
  options: ScanOptions = {}
): Promise<ScanResult> {
  const { signal } = options;
  const directoryIncludes = includes.directoryRules();
  const fileIncludes = includes.fileRules();
  const excludeRules = [...excludes];

  const result: ScanResult = {
    files: new Map(),
    directories: new Set(),
    stats: { dirCount: 0, dirExcludedCount: 0, fileCount: 0 },
  };

  const pending: PendingDirectory[] = [
    { absolutePath: root, relativePath: '', ancestors: new Set([await fs.promises.realpath(root)]) },
  ];

  while (pending.length > 0) {
    throwIfAborted(signal);
    const current = pending.pop();
    if (!current) {
      break;
    }
    result.stats.dirCount++;

    let listing: DirectoryListing;
    try {
      listing = await listEntries(current.absolutePath);
    } catch (error) {
      log.warn(`Cannot read directory ${current.absolutePath}: ${errorMessage(error)}`);
      continue;
    }

    const descend: PendingDirectory[] = [];
    for (const name of listing.directories) {
      const relativePath = joinRelative(current.relativePath, name);
      const absolutePath = path.join(current.absolutePath, name);

      const owners = matchingOwners(directoryIncludes, relativePath, name);
      if (owners) {
        record(result.files, owners, relativePath);
        result.directories.add(relativePath);
      }

      const excludedBy = excludeRules.find((rule) => rule.matchEntry(relativePath, name));
      if (excludedBy) {
        log.debug(`Excluding ${relativePath}/ (${excludedBy.source})`);
        result.stats.dirExcludedCount++;
        continue;
      }

      const real = await fs.promises.realpath(absolutePath);
      if (current.ancestors.has(real)) {
        log.debug(`Not entering ${relativePath}/ (links back to ${real})`);
        continue;
      }
      descend.push({ absolutePath, relativePath, ancestors: new Set([...current.ancestors, real]) });
    }

    for (const name of listing.files) {
      throwIfAborted(signal);
      const relativePath = joinRelative(current.relativePath, name);
      const owners = matchingOwners(fileIncludes, relativePath, name);
      if (owners) {
        result.stats.fileCount++;
        record(result.files, owners, relativePath);
      }
    }

    // Reversed so that subdirectories are visited in name order
    pending.push(...descend.reverse());
  }

  return result;
}

/**
 * File system operations used by the scanner and the analysers.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory (following symlinks).
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

/**
 * List directory entry names, sorted so traversal order is stable.
 */
export async function listDirectory(dirPath: string): Promise<string[]> {
  const names = await fs.promises.readdir(dirPath);
  return names.sort();
}

/**
 * Find the directory of the nearest package.json above a module URL.
 * Works from both the TypeScript sources and the compiled output.
 */
export function findPackageRoot(moduleUrl: string): string {
  let dir = path.dirname(fileURLToPath(moduleUrl));
  for (;;) {
    if (fs.existsSync(path.join(dir, 'package.json'))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new Error(`No package.json found above ${moduleUrl}`);
    }
    dir = parent;
  }
}

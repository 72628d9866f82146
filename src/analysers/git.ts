/**
 * Git version control analyser.
 *
 * Catalogues `.git/` and prunes it, along with the directories the root
 * `.gitignore` names, from the walk.
 */
import * as path from 'node:path';
import type { AnalysedFile, Analyser, Category } from '../core/registry/types.js';
import type { ReportWriter } from '../core/report/types.js';
import { errorMessage } from '../utils/errors.js';
import { fileExists, readFile } from '../utils/file-system.js';
import { logger } from '../utils/logger.js';

const log = logger.child('git');

export interface GitResult {
  /** URL of the `origin` remote, if configured */
  remote?: string;
}

/**
 * Directory entries of a .gitignore file, as exclude rules.
 * Negations, comments and file patterns are left out.
 */
export function parseGitignoreDirectories(content: string): string[] {
  const patterns: string[] = [];
  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('#') || line.startsWith('!') || line.startsWith('\\')) {
      continue;
    }
    if (!line.endsWith('/')) {
      continue;
    }
    // A bare "/" or "//" has no name left to match
    if (line.replace(/\//g, '') === '') {
      continue;
    }
    patterns.push(line);
  }
  return patterns;
}

/**
 * URL of the `origin` remote in a git config file.
 */
export function parseOriginUrl(config: string): string | undefined {
  let inOrigin = false;
  for (const raw of config.split(/\r?\n/)) {
    const line = raw.trim();
    const section = line.match(/^\[(.+)\]$/);
    if (section) {
      inOrigin = /^remote\s+"origin"$/.test(section[1].trim());
      continue;
    }
    if (!inOrigin) {
      continue;
    }
    const url = line.match(/^url\s*=\s*(\S+)$/);
    if (url) {
      return url[1];
    }
  }
  return undefined;
}

/**
 * Browsable https form of a remote URL; `git@host:org/repo.git` becomes
 * `https://host/org/repo`.
 */
export function toRepositoryUrl(remote: string): string | undefined {
  const scp = remote.match(/^[\w.-]+@([\w.-]+):(.+?)(?:\.git)?\/?$/);
  if (scp) {
    return `https://${scp[1]}/${scp[2]}`;
  }
  const http = remote.match(/^(https?:\/\/)(?:[^@/]+@)?(.+?)(?:\.git)?\/?$/);
  if (http) {
    return `${http[1]}${http[2]}`;
  }
  return undefined;
}

export class GitAnalyser implements Analyser<GitResult> {
  readonly name = 'Git';
  readonly category: Category = 'version_control';

  includes(): readonly string[] {
    return ['/.git/'];
  }

  async excludes(root: string): Promise<readonly string[]> {
    const gitignore = path.join(root, '.gitignore');
    if (!(await fileExists(gitignore))) {
      return ['.git/'];
    }
    let content: string;
    try {
      content = await readFile(gitignore);
    } catch (error) {
      log.warn(`Ignoring unreadable ${gitignore}: ${errorMessage(error)}`);
      return ['.git/'];
    }
    return ['.git/', ...parseGitignoreDirectories(content)];
  }

  async analyseFile(file: AnalysedFile, report: ReportWriter): Promise<GitResult> {
    report.addNotice('Version control exists.', file.path);

    const configPath = path.join(file.absolutePath, 'config');
    if (!(await fileExists(configPath))) {
      return {};
    }

    const remote = parseOriginUrl(await readFile(configPath));
    if (!remote) {
      return {};
    }

    report.addMetadata('repository_code', toRepositoryUrl(remote), `${file.path}/config`);
    return { remote };
  }
}

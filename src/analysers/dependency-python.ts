/**
 * requirements.txt analyser.
 */
import type { AnalysedFile, Analyser, Category } from '../core/registry/types.js';
import type { ReportWriter } from '../core/report/types.js';
import { readFile } from '../utils/file-system.js';
import { requirementName } from './packaging-python.js';

export interface Requirement {
  name: string;
  /** Version specifier, e.g. `==1.2.0` or `>=2,<3`; empty when absent */
  specifier: string;
  line: number;
}

export interface DependencyResult {
  requirements: Requirement[];
}

/**
 * Pinned means exactly one `==` or `===` clause without a wildcard.
 */
export function isPinned(specifier: string): boolean {
  return /^===?\s*[^\s,*]+$/.test(specifier);
}

/**
 * Parse requirement lines. Options (`-r`, `--index-url`, `-e`), URLs and
 * comments are skipped; environment markers and extras are dropped.
 */
export function parseRequirements(content: string): Requirement[] {
  const requirements: Requirement[] = [];
  const lines = content.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].replace(/(^|\s)#.*$/, '').trim();
    if (!line || line.startsWith('-') || /^[a-z][a-z0-9+.-]*:\/\//i.test(line)) {
      continue;
    }

    const name = requirementName(line);
    if (!name) {
      continue;
    }

    const specifier = line
      .slice(name.length)
      .split(';')[0]
      .replace(/^\s*\[[^\]]*\]/, '')
      .replace(/\s+/g, '')
      .replace(/^\((.*)\)$/, '$1');

    // Direct references ("name @ url") carry no version
    requirements.push({ name, specifier: specifier.startsWith('@') ? '' : specifier, line: i + 1 });
  }

  return requirements;
}

export class DependencyPythonAnalyser implements Analyser<DependencyResult> {
  readonly name = 'Python Dependency';
  readonly category: Category = 'dependency';

  includes(): readonly string[] {
    return ['/requirements.txt'];
  }

  async analyseFile(file: AnalysedFile, report: ReportWriter): Promise<DependencyResult> {
    const requirements = parseRequirements(await readFile(file.absolutePath));

    for (const requirement of requirements) {
      if (!requirement.specifier) {
        report.addIssue(`${requirement.name} dependency has no version specifier.`, file.path);
      } else if (!isPinned(requirement.specifier)) {
        report.addIssue(`${requirement.name} dependency version is not pinned.`, file.path);
      }
    }

    report.addMetadata(
      'python_dependencies',
      requirements.map((requirement) => requirement.name),
      file.path,
      { list: true }
    );

    return { requirements };
  }
}

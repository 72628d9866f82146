/**
 * Python packaging analyser: pyproject.toml, setup.cfg, setup.py.
 *
 * Reads PEP 621 `[project]` metadata, falling back to `[tool.poetry]`.
 */
import * as path from 'node:path';
import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';
import type { MetadataRecord } from '../core/metadata/types.js';
import type { AnalysedFile, Analyser, Category } from '../core/registry/types.js';
import type { ReportWriter } from '../core/report/types.js';
import { errorMessage } from '../utils/errors.js';
import { fileExists, readFile } from '../utils/file-system.js';
import { logger } from '../utils/logger.js';

const log = logger.child('packaging');

const PersonSchema = z.object({
  name: z.string().optional(),
  email: z.string().optional(),
});

const ProjectSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
  description: z.string().optional(),
  license: z.union([z.string(), z.object({ text: z.string().optional(), file: z.string().optional() })]).optional(),
  keywords: z.array(z.string()).optional(),
  authors: z.array(PersonSchema).optional(),
  dependencies: z.array(z.string()).optional(),
  urls: z.record(z.string(), z.string()).optional(),
});

const PoetrySchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
  description: z.string().optional(),
  license: z.string().optional(),
  keywords: z.array(z.string()).optional(),
  /** "Name <email>" strings */
  authors: z.array(z.string()).optional(),
  repository: z.string().optional(),
  dependencies: z.record(z.string(), z.unknown()).optional(),
});

const PyprojectSchema = z.object({
  project: ProjectSchema.optional(),
  tool: z.object({ poetry: PoetrySchema.optional() }).optional(),
});

export interface PackagingResult {
  file: 'pyproject.toml' | 'setup.cfg' | 'setup.py';
  /** Table the metadata came from */
  source?: 'project' | 'poetry';
}

/** `[project.urls]` labels that point at the source code. */
const REPOSITORY_LABELS = /^(repository|source|source[\s_-]?code|code|github)$/i;

/**
 * Distribution name of a PEP 508 requirement string.
 */
export function requirementName(requirement: string): string | undefined {
  return requirement.trim().match(/^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)/)?.[1];
}

/**
 * `Jane Doe <jane@example.org>` as a flat record.
 */
export function parsePersonString(value: string): MetadataRecord {
  const match = value.match(/^\s*([^<]*?)\s*(?:<([^>]+)>)?\s*$/);
  const record: Record<string, string> = {};
  if (match?.[1]) {
    record.name = match[1];
  }
  if (match?.[2]) {
    record.email = match[2];
  }
  return record;
}

function personRecord(person: z.infer<typeof PersonSchema>): MetadataRecord {
  const record: Record<string, string> = {};
  if (person.name) {
    record.name = person.name;
  }
  if (person.email) {
    record.email = person.email;
  }
  return record;
}

export class PackagingPythonAnalyser implements Analyser<PackagingResult> {
  readonly name = 'Python Packaging';
  readonly category: Category = 'packaging';

  includes(): readonly string[] {
    return ['/pyproject.toml', '/setup.cfg', '/setup.py'];
  }

  async analyseFile(file: AnalysedFile, report: ReportWriter): Promise<PackagingResult | undefined> {
    const name = path.posix.basename(file.path);
    if (name === 'setup.py' || name === 'setup.cfg') {
      if (!(await fileExists(path.join(file.root, 'pyproject.toml')))) {
        report.addSuggestion('Declare package metadata in a pyproject.toml file.', file.path);
      }
      return { file: name };
    }

    let data: unknown;
    try {
      data = parseToml(await readFile(file.absolutePath));
    } catch (error) {
      log.debug(`${file.path}: ${errorMessage(error)}`);
      report.addIssue('Invalid pyproject.toml file.', file.path);
      return undefined;
    }

    const parsed = PyprojectSchema.safeParse(data);
    if (!parsed.success) {
      report.addIssue('Invalid pyproject.toml file.', file.path);
      return undefined;
    }

    const { project, tool } = parsed.data;
    if (project) {
      this.addProjectMetadata(project, file.path, report);
      return { file: 'pyproject.toml', source: 'project' };
    }
    if (tool?.poetry) {
      this.addPoetryMetadata(tool.poetry, file.path, report);
      return { file: 'pyproject.toml', source: 'poetry' };
    }
    return { file: 'pyproject.toml' };
  }

  private addProjectMetadata(project: z.infer<typeof ProjectSchema>, filePath: string, report: ReportWriter): void {
    report.addMetadata('name', project.name, filePath);
    report.addMetadata('version', project.version, filePath);
    report.addMetadata('description', project.description, filePath);
    report.addMetadata(
      'license',
      typeof project.license === 'string' ? project.license : project.license?.text,
      filePath
    );
    report.addMetadata('keywords', project.keywords, filePath, { list: true });
    report.addMetadata('authors', project.authors?.map(personRecord), filePath, { list: true });
    report.addMetadata(
      'python_dependencies',
      project.dependencies?.map(requirementName).filter((dep): dep is string => dep !== undefined),
      filePath,
      { list: true }
    );

    const repository = Object.entries(project.urls ?? {}).find(([label]) => REPOSITORY_LABELS.test(label.trim()));
    report.addMetadata('repository_code', repository?.[1], filePath);
  }

  private addPoetryMetadata(poetry: z.infer<typeof PoetrySchema>, filePath: string, report: ReportWriter): void {
    report.addMetadata('name', poetry.name, filePath);
    report.addMetadata('version', poetry.version, filePath);
    report.addMetadata('description', poetry.description, filePath);
    report.addMetadata('license', poetry.license, filePath);
    report.addMetadata('keywords', poetry.keywords, filePath, { list: true });
    report.addMetadata('authors', poetry.authors?.map(parsePersonString), filePath, { list: true });
    report.addMetadata(
      'python_dependencies',
      Object.keys(poetry.dependencies ?? {}).filter((dep) => dep.toLowerCase() !== 'python'),
      filePath,
      { list: true }
    );
    report.addMetadata('repository_code', poetry.repository, filePath);
  }
}

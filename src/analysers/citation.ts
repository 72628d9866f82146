/**
 * CITATION.cff analyser.
 */
import { z } from 'zod';
import type { MetadataRecord } from '../core/metadata/types.js';
import type { AnalysedFile, Analyser, Category } from '../core/registry/types.js';
import type { ReportWriter } from '../core/report/types.js';
import { errorMessage } from '../utils/errors.js';
import { readFile } from '../utils/file-system.js';
import { logger } from '../utils/logger.js';
import { parseYaml } from '../utils/yaml.js';

const log = logger.child('citation');

/** Top-level keys of the Citation File Format 1.2. */
export const CFF_ATTRIBUTES = new Set([
  'abstract',
  'authors',
  'cff-version',
  'commit',
  'contact',
  'date-released',
  'doi',
  'identifiers',
  'keywords',
  'license',
  'license-url',
  'message',
  'preferred-citation',
  'references',
  'repository',
  'repository-artifact',
  'repository-code',
  'title',
  'type',
  'url',
  'version',
]);

const Scalar = z.union([z.string(), z.number()]).transform(String);

const AuthorSchema = z.object({
  'given-names': Scalar.optional(),
  'family-names': Scalar.optional(),
  'name-particle': Scalar.optional(),
  name: Scalar.optional(),
  orcid: Scalar.optional(),
  email: Scalar.optional(),
  affiliation: Scalar.optional(),
});

const LicenseSchema = z.union([Scalar, z.array(Scalar)]);

export type CitationResult = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * One author as a flat record: full name plus whatever contact fields
 * are given.
 */
export function authorRecord(author: z.infer<typeof AuthorSchema>): MetadataRecord {
  const fullName = [author['given-names'], author['name-particle'], author['family-names']]
    .filter((part) => part !== undefined && part.trim() !== '')
    .join(' ');

  const record: Record<string, string> = {};
  const name = fullName || author.name;
  if (name) {
    record.name = name;
  }
  if (author.orcid) {
    record.orcid = author.orcid;
  }
  if (author.email) {
    record.email = author.email;
  }
  if (author.affiliation) {
    record.affiliation = author.affiliation;
  }
  return record;
}

export class CitationAnalyser implements Analyser<CitationResult> {
  readonly name = 'Citation';
  readonly category: Category = 'citation';

  includes(): readonly string[] {
    return ['/CITATION.cff'];
  }

  async analyseFile(file: AnalysedFile, report: ReportWriter): Promise<CitationResult | undefined> {
    const content = await readFile(file.absolutePath);

    let data: unknown;
    try {
      data = parseYaml(content);
    } catch (error) {
      log.debug(`${file.path}: ${errorMessage(error)}`);
      report.addIssue('Invalid CITATION.cff file.', file.path);
      return undefined;
    }
    if (!isRecord(data)) {
      report.addIssue('Invalid CITATION.cff file.', file.path);
      return undefined;
    }

    for (const key of Object.keys(data)) {
      if (!CFF_ATTRIBUTES.has(key)) {
        report.addWarning(`Unknown CITATION.cff attribute: ${key}.`, file.path);
      }
    }

    this.addMetadata(data, file.path, report);
    return data;
  }

  private field<T extends z.ZodType>(
    data: Record<string, unknown>,
    key: string,
    schema: T,
    path: string,
    report: ReportWriter
  ): z.infer<T> | undefined {
    const value = data[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      report.addWarning(`Invalid CITATION.cff attribute: ${key}.`, path);
      return undefined;
    }
    return parsed.data;
  }

  private addMetadata(data: Record<string, unknown>, path: string, report: ReportWriter): void {
    report.addMetadata('name', this.field(data, 'title', Scalar, path, report), path);
    report.addMetadata('version', this.field(data, 'version', Scalar, path, report), path);
    // YAML reads an unquoted 1.10 as the number 1.1
    if (typeof data['version'] === 'number') {
      report.addWarning('CITATION.cff version is not a string.', path);
    }
    report.addMetadata('doi', this.field(data, 'doi', Scalar, path, report), path);
    report.addMetadata('description', this.field(data, 'abstract', Scalar, path, report), path);
    report.addMetadata('repository_code', this.field(data, 'repository-code', Scalar, path, report), path);
    report.addMetadata('license', this.field(data, 'license', LicenseSchema, path, report), path);
    report.addMetadata('keywords', this.field(data, 'keywords', z.array(Scalar), path, report), path, {
      list: true,
    });

    const authors = this.field(data, 'authors', z.array(AuthorSchema), path, report);
    if (authors) {
      report.addMetadata('authors', authors.map(authorRecord), path, { list: true });
    }
  }
}

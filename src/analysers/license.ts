/**
 * License analyser.
 *
 * Identifies license texts by key phrases from data/licenses.json. A
 * license matches when enough of its phrases occur in the normalized text;
 * among matches the highest share wins, then the larger phrase count, so a
 * BSD-3-Clause text is not reported as BSD-2-Clause as well.
 */
import { z } from 'zod';
import type { AnalysedFile, Analyser, Category } from '../core/registry/types.js';
import type { ReportWriter } from '../core/report/types.js';
import { readFile } from '../utils/file-system.js';
import { loadJsonData } from './data.js';

const LicenseDefinitionSchema = z.object({
  id: z.string(),
  spdx: z.string(),
  name: z.string(),
  phrases: z.array(z.string()).min(1),
});

const LicenseCatalogSchema = z.array(LicenseDefinitionSchema);

export type LicenseDefinition = z.infer<typeof LicenseDefinitionSchema>;

export interface LicenseResult {
  /** Best matching license ids; empty when nothing matched */
  ids: string[];
  /** Share of the winning licenses' phrases found, 0 to 1 */
  score: number;
}

/** Lowest share of phrases for a license to count as matched. */
export const MIN_SCORE = 0.5;

export const LICENSE_PATTERNS = [
  '/LICENSE',
  '/LICENSE.*',
  '/LICENCE',
  '/LICENCE.*',
  '/COPYING',
  '/COPYING.*',
] as const;

/**
 * Lowercase, drop punctuation, collapse whitespace.
 */
export function normalizeLicenseText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim();
}

export function identifyLicense(text: string, catalog: readonly LicenseDefinition[]): LicenseResult {
  const normalized = ` ${normalizeLicenseText(text)} `;

  let best: { ids: string[]; score: number; matched: number } = { ids: [], score: 0, matched: 0 };
  for (const license of catalog) {
    const matched = license.phrases.filter((phrase) =>
      normalized.includes(` ${normalizeLicenseText(phrase)} `)
    ).length;
    const score = matched / license.phrases.length;
    if (score < MIN_SCORE) {
      continue;
    }
    if (score > best.score || (score === best.score && matched > best.matched)) {
      best = { ids: [license.id], score, matched };
    } else if (score === best.score && matched === best.matched) {
      best.ids.push(license.id);
    }
  }

  return { ids: best.ids, score: Math.round(best.score * 100) / 100 };
}

export function loadLicenseCatalog(): Promise<LicenseDefinition[]> {
  return loadJsonData('licenses.json', LicenseCatalogSchema);
}

export class LicenseAnalyser implements Analyser<LicenseResult> {
  readonly name = 'License';
  readonly category: Category = 'license';

  includes(): readonly string[] {
    return LICENSE_PATTERNS;
  }

  async analyseFile(file: AnalysedFile, report: ReportWriter): Promise<LicenseResult> {
    const [text, catalog] = await Promise.all([readFile(file.absolutePath), loadLicenseCatalog()]);
    const result = identifyLicense(text, catalog);

    report.addMetadata('license_file', file.path, file.path, { list: true });

    const only = result.ids.length === 1 ? catalog.find((license) => license.id === result.ids[0]) : undefined;
    if (only) {
      report.addMetadata('license', only.spdx, file.path);
    }

    return result;
  }

  analyseResults(results: ReadonlyMap<string, LicenseResult | null>, report: ReportWriter): void {
    const paths = [...results.keys()];
    if (paths.length <= 1) {
      return;
    }

    report.addWarning('Multiple license files found.', paths);

    const signatures = new Set<string>();
    for (const result of results.values()) {
      signatures.add(result ? [...result.ids].sort().join(',') : '');
    }
    if (signatures.size > 1) {
      report.addIssue('License files do not match.', paths);
    }
  }
}

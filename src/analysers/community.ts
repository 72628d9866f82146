/**
 * Community health files: code of conduct and contributing guidelines.
 */
import * as path from 'node:path';
import type { AnalysedFile, Analyser, Category } from '../core/registry/types.js';
import type { ReportWriter } from '../core/report/types.js';

export interface CommunityResult {
  kind: 'conduct' | 'contributing';
}

export class CommunityAnalyser implements Analyser<CommunityResult> {
  readonly name = 'Community';
  readonly category: Category = 'community';

  includes(): readonly string[] {
    return [
      '/CONDUCT.*',
      '/CODE_OF_CONDUCT.*',
      '/CONTRIBUTING.*',
      '/.github/CODE_OF_CONDUCT.*',
      '/.github/CONTRIBUTING.*',
    ];
  }

  analyseFile(file: AnalysedFile, report: ReportWriter): CommunityResult | undefined {
    const name = path.posix.basename(file.path);

    if (/CONTRIBUTING/i.test(name)) {
      report.addNotice('Contributing guidelines exist.', file.path);
      report.addMetadata('contributing_file', file.path, file.path, { list: true });
      return { kind: 'contributing' };
    }
    if (/CONDUCT/i.test(name)) {
      report.addNotice('Code of conduct exists.', file.path);
      report.addMetadata('conduct_file', file.path, file.path, { list: true });
      return { kind: 'conduct' };
    }
    return undefined;
  }
}

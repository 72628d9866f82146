/**
 * README and documentation directory.
 */
import type { AnalysedFile, Analyser, Category } from '../core/registry/types.js';
import type { ReportWriter } from '../core/report/types.js';

export interface ReadmeResult {
  kind: 'readme' | 'docs';
}

export class ReadmeAnalyser implements Analyser<ReadmeResult> {
  readonly name = 'README';
  readonly category: Category = 'documentation';

  includes(): readonly string[] {
    return ['/README', '/README.*', '/docs/'];
  }

  analyseFile(file: AnalysedFile, report: ReportWriter): ReadmeResult {
    if (file.isDirectory) {
      report.addNotice('Documentation directory exists.', file.path);
      return { kind: 'docs' };
    }
    report.addNotice('README file exists.', file.path);
    report.addMetadata('readme_file', file.path, file.path, { list: true });
    return { kind: 'readme' };
  }
}

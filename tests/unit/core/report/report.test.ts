/**
 * Tests for the scan report.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { Report, METADATA_SOURCE } from '../../../../src/core/report/report.js';
import { severitiesFrom } from '../../../../src/core/report/severity.js';

describe('Report', () => {
  let report: Report;

  beforeEach(() => {
    report = new Report('/repo', { version: '1.2.3', date: new Date('2026-01-01T00:00:00.000Z') });
  });

  it('always holds a list for every severity', () => {
    expect(Object.keys(report.messages).sort()).toEqual(['info', 'issue', 'notice', 'suggestion', 'warning']);
    expect(report.messages.issue).toEqual([]);
  });

  it('records messages with source and paths', () => {
    report.addIssue('license', 'No license file.');
    report.addNotice('git', 'Version control exists.', '.git');
    report.addWarning('license', 'Multiple license files found.', ['LICENSE', 'COPYING', 'LICENSE', '']);

    expect(report.messages.issue).toEqual([{ text: 'No license file.', source: 'license', paths: [] }]);
    expect(report.messages.notice).toEqual([{ text: 'Version control exists.', source: 'git', paths: ['.git'] }]);
    expect(report.messages.warning[0].paths).toEqual(['LICENSE', 'COPYING']);
  });

  it('binds writers to their source', () => {
    const writer = report.writer('readme');
    writer.addNotice('README file exists.', 'README.md');
    writer.addMetadata('readme_file', 'README.md', 'README.md');

    expect(writer.root).toBe('/repo');
    expect(report.messages.notice[0].source).toBe('readme');
    expect(report.metadata.get('readme_file')[0].source).toBe('readme');
  });

  it('turns rejected metadata into an Issue', () => {
    report.addMetadata('citation', 'doi', 'bogus', 'CITATION.cff');

    expect(report.metadata.has('doi')).toBe(false);
    expect(report.messages.issue).toEqual([
      { text: 'Invalid doi value: "bogus".', source: 'citation', paths: ['CITATION.cff'] },
    ]);
  });

  describe('analyseMetadata', () => {
    it('reports conflicting scalar values once per key', () => {
      report.addMetadata('license', 'license', 'MIT', 'LICENSE');
      report.addMetadata('packaging_python', 'license', 'Apache-2.0', 'pyproject.toml');
      report.analyseMetadata();

      expect(report.messages.issue).toEqual([
        {
          text: 'Multiple values exist for license: "MIT" (license), "Apache-2.0" (packaging_python).',
          source: METADATA_SOURCE,
          paths: ['LICENSE', 'pyproject.toml'],
        },
      ]);
    });

    it('stays silent for agreeing values', () => {
      report.addMetadata('a', 'license', 'MIT');
      report.addMetadata('b', 'license', 'MIT');
      report.analyseMetadata();
      expect(report.messages.issue).toEqual([]);
    });
  });

  describe('getMessages', () => {
    it('returns messages most important first', () => {
      report.addInfo('a', 'info');
      report.addIssue('a', 'issue');
      report.addSuggestion('a', 'suggestion');

      expect(report.getMessages().map((message) => message.severity)).toEqual(['issue', 'suggestion', 'info']);
      expect(report.getMessages('warning').map((message) => message.text)).toEqual(['issue']);
    });
  });

  describe('finalize', () => {
    it('sets end date and duration in seconds', () => {
      report.finalize(new Date('2026-01-01T00:00:02.500Z'));
      expect(report.stats.duration).toBe(2.5);
      expect(report.stats.endDate?.toISOString()).toBe('2026-01-01T00:00:02.500Z');
    });
  });

  describe('asDict', () => {
    beforeEach(() => {
      report.setScanStats({ numDirs: 3, numDirsExcluded: 1, numFiles: 4 });
      report.addIssue('license', 'No license file.');
      report.addInfo('git', 'Detail.');
      report.addMetadata('packaging_python', 'name', 'demo', 'pyproject.toml');
      report.results.set('readme', new Map([['README.md', { kind: 'readme' }], ['docs', null]]));
      report.finalize(new Date('2026-01-01T00:00:01.000Z'));
    });

    it('serializes stats with snake_case keys', () => {
      expect(report.asDict().stats).toEqual({
        path: '/repo',
        date: '2026-01-01T00:00:00.000Z',
        end_date: '2026-01-01T00:00:01.000Z',
        duration: 1,
        version: '1.2.3',
        num_dirs: 3,
        num_dirs_excluded: 1,
        num_files: 4,
      });
    });

    it('filters messages by severity', () => {
      const dict = report.asDict('warning');
      expect(Object.keys(dict.messages)).toEqual(['issue', 'warning']);
      expect(dict.messages.issue).toEqual([{ text: 'No license file.', source: 'license', paths: [] }]);
    });

    it('keeps provenance and raw results by default', () => {
      const dict = report.asDict();
      expect(dict.metadata).toEqual({
        name: [{ value: 'demo', source: 'packaging_python', path: 'pyproject.toml', sequence: 1 }],
      });
      expect(dict.results).toEqual({ readme: { 'README.md': { kind: 'readme' }, docs: null } });
    });

    it('collapses metadata and drops results in plain mode', () => {
      const dict = report.asDict('info', true);
      expect(dict.metadata).toEqual({ name: 'demo' });
      expect(dict.results).toBeUndefined();
    });
  });
});

describe('severitiesFrom', () => {
  it('lists severities at or above the threshold, most important first', () => {
    expect(severitiesFrom('info')).toEqual(['issue', 'warning', 'notice', 'suggestion', 'info']);
    expect(severitiesFrom('notice')).toEqual(['issue', 'warning', 'notice']);
  });
});

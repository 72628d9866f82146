/**
 * Tests for the README, community and notebook analysers.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { CodeJupyterAnalyser } from '../../../src/analysers/code-jupyter.js';
import { CommunityAnalyser } from '../../../src/analysers/community.js';
import { ReadmeAnalyser } from '../../../src/analysers/readme.js';
import { Report } from '../../../src/core/report/report.js';

const entry = (relativePath: string, isDirectory = false) => ({
  root: '/repo',
  path: relativePath,
  absolutePath: `/repo/${relativePath}`,
  isDirectory,
});

describe('ReadmeAnalyser', () => {
  let report: Report;
  const analyser = new ReadmeAnalyser();

  beforeEach(() => {
    report = new Report('/repo', { version: 'test' });
  });

  it('records README files', () => {
    expect(analyser.analyseFile(entry('README.md'), report.writer('readme'))).toEqual({ kind: 'readme' });
    expect(report.messages.notice.map((message) => message.text)).toEqual(['README file exists.']);
    expect(report.metadata.value('readme_file')).toEqual(['README.md']);
  });

  it('records the documentation directory', () => {
    expect(analyser.analyseFile(entry('docs', true), report.writer('readme'))).toEqual({ kind: 'docs' });
    expect(report.messages.notice.map((message) => message.text)).toEqual(['Documentation directory exists.']);
    expect(report.metadata.has('readme_file')).toBe(false);
  });
});

describe('CommunityAnalyser', () => {
  let report: Report;
  const analyser = new CommunityAnalyser();

  beforeEach(() => {
    report = new Report('/repo', { version: 'test' });
  });

  it('tells contributing guidelines from codes of conduct', () => {
    const writer = report.writer('community');
    expect(analyser.analyseFile(entry('CONTRIBUTING.md'), writer)).toEqual({ kind: 'contributing' });
    expect(analyser.analyseFile(entry('.github/CODE_OF_CONDUCT.md'), writer)).toEqual({ kind: 'conduct' });

    expect(report.messages.notice.map((message) => message.text)).toEqual([
      'Contributing guidelines exist.',
      'Code of conduct exists.',
    ]);
    expect(report.metadata.toPlain()).toEqual({
      contributing_file: ['CONTRIBUTING.md'],
      conduct_file: ['.github/CODE_OF_CONDUCT.md'],
    });
  });
});

describe('CodeJupyterAnalyser', () => {
  it('only catalogues notebooks', () => {
    const analyser = new CodeJupyterAnalyser();
    expect(analyser.includes()).toEqual(['*.ipynb']);
    expect(analyser.excludes()).toEqual(['.ipynb_checkpoints/']);
    expect('analyseFile' in analyser).toBe(false);
  });
});

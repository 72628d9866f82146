/**
 * Tests for Python packaging metadata.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  PackagingPythonAnalyser,
  parsePersonString,
  requirementName,
} from '../../../src/analysers/packaging-python.js';
import { Report } from '../../../src/core/report/report.js';

const PEP621 = `[project]
name = "demo"
version = "0.1.0"
description = "A demo package"
license = { text = "MIT" }
keywords = ["audit", "demo"]
authors = [{ name = "Jane Doe", email = "jane@example.org" }]
dependencies = ["requests>=2", "numpy"]

[project.urls]
Homepage = "https://example.org"
Repository = "https://example.org/team/demo"
`;

const POETRY = `[tool.poetry]
name = "poems"
version = "1.0.0"
authors = ["Jane Doe <jane@example.org>"]
repository = "https://example.org/team/poems"

[tool.poetry.dependencies]
python = "^3.10"
requests = "^2.31"
`;

describe('requirementName', () => {
  it('reads the distribution name', () => {
    expect(requirementName('requests[security]>=2')).toBe('requests');
    expect(requirementName('  zope.interface ; os_name == "nt"')).toBe('zope.interface');
    expect(requirementName('>=1.0')).toBeUndefined();
  });
});

describe('parsePersonString', () => {
  it('splits name and email', () => {
    expect(parsePersonString('Jane Doe <jane@example.org>')).toEqual({ name: 'Jane Doe', email: 'jane@example.org' });
    expect(parsePersonString('Jane Doe')).toEqual({ name: 'Jane Doe' });
  });
});

describe('PackagingPythonAnalyser', () => {
  let root: string;
  let report: Report;
  const analyser = new PackagingPythonAnalyser();

  const analyseFile = (name: string) =>
    analyser.analyseFile(
      { root, path: name, absolutePath: path.join(root, name), isDirectory: false },
      report.writer('packaging_python')
    );

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'repoaudit-packaging-'));
    report = new Report(root, { version: 'test' });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('reads the [project] table', async () => {
    fs.writeFileSync(path.join(root, 'pyproject.toml'), PEP621);

    expect(await analyseFile('pyproject.toml')).toEqual({ file: 'pyproject.toml', source: 'project' });
    expect(report.metadata.toPlain()).toEqual({
      name: 'demo',
      version: '0.1.0',
      description: 'A demo package',
      license: 'MIT',
      keywords: ['audit', 'demo'],
      authors: [{ name: 'Jane Doe', email: 'jane@example.org' }],
      python_dependencies: ['requests', 'numpy'],
      repository_code: 'https://example.org/team/demo',
    });
  });

  it('falls back to [tool.poetry]', async () => {
    fs.writeFileSync(path.join(root, 'pyproject.toml'), POETRY);

    expect(await analyseFile('pyproject.toml')).toEqual({ file: 'pyproject.toml', source: 'poetry' });
    expect(report.metadata.toPlain()).toEqual({
      name: 'poems',
      version: '1.0.0',
      authors: [{ name: 'Jane Doe', email: 'jane@example.org' }],
      python_dependencies: ['requests'],
      repository_code: 'https://example.org/team/poems',
    });
  });

  it('reports malformed TOML', async () => {
    fs.writeFileSync(path.join(root, 'pyproject.toml'), 'name = \n');

    expect(await analyseFile('pyproject.toml')).toBeUndefined();
    expect(report.messages.issue).toEqual([
      { text: 'Invalid pyproject.toml file.', source: 'packaging_python', paths: ['pyproject.toml'] },
    ]);
  });

  it('suggests pyproject.toml next to a bare setup.py', async () => {
    fs.writeFileSync(path.join(root, 'setup.py'), 'from setuptools import setup\nsetup()\n');

    expect(await analyseFile('setup.py')).toEqual({ file: 'setup.py' });
    expect(report.messages.suggestion.map((message) => message.text)).toEqual([
      'Declare package metadata in a pyproject.toml file.',
    ]);
  });

  it('stays quiet about setup.cfg when pyproject.toml exists', async () => {
    fs.writeFileSync(path.join(root, 'setup.cfg'), '[metadata]\nname = demo\n');
    fs.writeFileSync(path.join(root, 'pyproject.toml'), '');

    expect(await analyseFile('setup.cfg')).toEqual({ file: 'setup.cfg' });
    expect(report.messages.suggestion).toEqual([]);
  });
});

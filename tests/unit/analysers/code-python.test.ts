/**
 * Tests for Python source analysis.
 */
import { describe, it, expect } from 'vitest';
import {
  CodePythonAnalyser,
  extractImports,
  hasModuleDocstring,
  localModuleNames,
  type PythonFileResult,
} from '../../../src/analysers/code-python.js';
import { Report } from '../../../src/core/report/report.js';

describe('extractImports', () => {
  it('collects top-level modules of absolute imports', () => {
    const source = [
      '"""Doc."""',
      'import os, sys as system',
      'import numpy.linalg',
      'from requests.adapters import HTTPAdapter',
      'from . import sibling',
      'from .pkg import thing',
      'import pandas as pd  # tables',
      '    import json',
    ].join('\n');

    expect(extractImports(source)).toEqual(['json', 'numpy', 'os', 'pandas', 'requests', 'sys']);
  });
});

describe('hasModuleDocstring', () => {
  it.each([
    ['#!/usr/bin/env python\n\n"""Doc."""\n', true],
    ["r'''raw'''\n", true],
    ['import os\n"""Late."""\n', false],
    ['', false],
  ])('%j -> %s', (source, expected) => {
    expect(hasModuleDocstring(source)).toBe(expected);
  });
});

describe('localModuleNames', () => {
  it('collects directories and module names', () => {
    expect([...localModuleNames(['pkg/util.py', 'main.py'])]).toEqual(['pkg', 'util', 'main']);
  });
});

describe('CodePythonAnalyser', () => {
  it('derives third-party dependencies and flags missing docstrings', async () => {
    const report = new Report('/repo', { version: 'test' });
    const results = new Map<string, PythonFileResult | null>([
      ['main.py', { imports: ['os', 'pkg', 'requests'], hasDocstring: false }],
      ['pkg/util.py', { imports: ['numpy'], hasDocstring: true }],
      ['broken.py', null],
    ]);

    await new CodePythonAnalyser().analyseResults(results, report.writer('code_python'));

    expect(report.messages.suggestion).toEqual([
      { text: 'Python module has no docstring.', source: 'code_python', paths: ['main.py'] },
    ]);
    expect(report.metadata.value('python_dependencies')).toEqual(['numpy', 'requests']);
  });
});

/**
 * Python source analyser.
 *
 * Regex-based, line by line: collects imported top-level modules and checks
 * for a module docstring. The post-pass turns the imports of all files into
 * the `python_dependencies` list, leaving out the standard library and the
 * repository's own modules.
 */
import { z } from 'zod';
import type { AnalysedFile, Analyser, Category } from '../core/registry/types.js';
import type { ReportWriter } from '../core/report/types.js';
import { readFile } from '../utils/file-system.js';
import { loadJsonData } from './data.js';

export interface PythonFileResult {
  /** Top-level modules imported with absolute imports, sorted */
  imports: string[];
  hasDocstring: boolean;
}

const StdlibSchema = z.array(z.string());

export async function loadStdlibModules(): Promise<ReadonlySet<string>> {
  return new Set(await loadJsonData('python-stdlib.json', StdlibSchema));
}

/**
 * Top-level module names of every absolute import in a source file.
 */
export function extractImports(content: string): string[] {
  const modules = new Set<string>();

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();

    // import a.b, c as d
    const importMatch = trimmed.match(/^import\s+(.+)$/);
    if (importMatch) {
      for (const item of importMatch[1].split('#')[0].split(',')) {
        const name = item.trim().split(/\s+as\s+/)[0].split('.')[0].trim();
        if (/^[A-Za-z_]\w*$/.test(name)) {
          modules.add(name);
        }
      }
      continue;
    }

    // from a.b import c; relative imports start with a dot
    const fromMatch = trimmed.match(/^from\s+([A-Za-z_][\w.]*)\s+import\b/);
    if (fromMatch) {
      modules.add(fromMatch[1].split('.')[0]);
    }
  }

  return [...modules].sort();
}

/**
 * Whether the first statement of a module is a string literal.
 */
export function hasModuleDocstring(content: string): boolean {
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }
    return /^[rRuUbBfF]{0,2}("""|'''|"|')/.test(trimmed);
  }
  return false;
}

/**
 * Names a local import may use: every directory and module name on the
 * way to each analysed file.
 */
export function localModuleNames(paths: Iterable<string>): Set<string> {
  const names = new Set<string>();
  for (const filePath of paths) {
    for (const segment of filePath.split('/')) {
      names.add(segment.replace(/\.py$/, ''));
    }
  }
  return names;
}

export class CodePythonAnalyser implements Analyser<PythonFileResult> {
  readonly name = 'Python Code';
  readonly category: Category = 'code';

  includes(): readonly string[] {
    return ['*.py'];
  }

  excludes(): readonly string[] {
    return ['__pycache__/', '.venv/', 'venv/'];
  }

  async analyseFile(file: AnalysedFile): Promise<PythonFileResult> {
    const content = await readFile(file.absolutePath);
    return {
      imports: extractImports(content),
      hasDocstring: hasModuleDocstring(content),
    };
  }

  async analyseResults(results: ReadonlyMap<string, PythonFileResult | null>, report: ReportWriter): Promise<void> {
    const stdlib = await loadStdlibModules();
    const local = localModuleNames(results.keys());

    const dependencies = new Set<string>();
    for (const [filePath, result] of results) {
      if (!result) {
        continue;
      }
      for (const module of result.imports) {
        if (!stdlib.has(module) && !local.has(module)) {
          dependencies.add(module);
        }
      }
      if (!result.hasDocstring) {
        report.addSuggestion('Python module has no docstring.', filePath);
      }
    }

    report.addMetadata('python_dependencies', [...dependencies].sort(), undefined, { list: true });
  }
}

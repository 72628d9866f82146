/**
 * Jupyter notebooks. Catalogued only; there is no per-file analysis.
 */
import type { Analyser, Category } from '../core/registry/types.js';

export class CodeJupyterAnalyser implements Analyser {
  readonly name = 'Jupyter Notebook';
  readonly category: Category = 'code';

  includes(): readonly string[] {
    return ['*.ipynb'];
  }

  excludes(): readonly string[] {
    return ['.ipynb_checkpoints/'];
  }
}

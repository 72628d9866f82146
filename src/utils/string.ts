/**
 * String manipulation utilities.
 */

/**
 * Convert a type name to a snake_case identifier.
 *
 * `CodePython` becomes `code_python`, `VersionControl` becomes
 * `version_control`. A run of capitals is one word, so `README` becomes
 * `readme` and `HTMLReport` becomes `html_report`. Spaces and dashes are
 * treated as word breaks.
 */
export function toIdentifier(name: string): string {
  return name
    .trim()
    .replace(/[\s-]+/g, '_')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .toLowerCase();
}


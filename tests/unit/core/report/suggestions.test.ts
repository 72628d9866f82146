/**
 * Tests for message suggestions.
 */
import { describe, it, expect } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { findSuggestion, loadSuggestions, type SuggestionRule } from '../../../../src/core/report/suggestions.js';

describe('findSuggestion', () => {
  const rules: SuggestionRule[] = [
    { name: 'No license file.', suggestion: 'Add a license.' },
    { match: '.+ dependency version is not pinned\\.', suggestion: 'Pin it.' },
  ];

  it('matches exact names', () => {
    expect(findSuggestion('No license file.', rules)).toBe('Add a license.');
    expect(findSuggestion('No license file', rules)).toBeUndefined();
  });

  it('matches patterns at the start of the text', () => {
    expect(findSuggestion('numpy dependency version is not pinned.', rules)).toBe('Pin it.');
    expect(findSuggestion('Note: numpy dependency version is not pinned', rules)).toBeUndefined();
  });
});

describe('loadSuggestions', () => {
  it('loads the bundled suggestions', async () => {
    const rules = await loadSuggestions();
    expect(findSuggestion('No version control.', rules)).toContain('Git');
    expect(findSuggestion('Multiple values exist for license: "MIT" (a), "ISC" (b).', rules)).toBeDefined();
  });

  it('returns the same rules on repeated loads', async () => {
    expect(await loadSuggestions()).toBe(await loadSuggestions());
  });

  it('names only messages the analysers and aggregators emit', async () => {
    const sourceDirs = ['analysers', 'aggregators'].map((dir) =>
      fileURLToPath(new URL(`../../../../src/${dir}`, import.meta.url))
    );
    const sources = sourceDirs
      .flatMap((dir) => fs.readdirSync(dir).map((name) => path.join(dir, name)))
      .map((file) => fs.readFileSync(file, 'utf-8'))
      .join('\n');

    const names = (await loadSuggestions()).flatMap((rule) => (rule.name === undefined ? [] : [rule.name]));
    expect(names.filter((name) => !sources.includes(`'${name}'`))).toEqual([]);
  });
});

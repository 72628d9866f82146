/**
 * Tests for YAML utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { SystemError } from '../../../src/utils/errors.js';
import { loadYamlWithSchema, parseYaml, parseYamlWithSchema, stringifyYaml } from '../../../src/utils/yaml.js';

const Schema = z.object({ name: z.string(), count: z.number().default(1) });

describe('yaml utilities', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'repoaudit-yaml-'));
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it('parses YAML', () => {
    expect(parseYaml('a: 1\nb: [x, y]\n')).toEqual({ a: 1, b: ['x', 'y'] });
  });

  it('throws SystemError on malformed YAML', () => {
    expect(() => parseYaml('a: [1, 2')).toThrow(SystemError);
  });

  it('applies schema defaults', () => {
    expect(parseYamlWithSchema('name: demo\n', Schema)).toEqual({ name: 'demo', count: 1 });
  });

  it('reports schema failures with the field path', () => {
    expect(() => parseYamlWithSchema('name: 3\n', Schema)).toThrow(/YAML validation failed: name:/);
  });

  it('adds the file path to load errors', async () => {
    const file = path.join(tempDir, 'bad.yaml');
    await fs.promises.writeFile(file, 'count: 2\n');
    await expect(loadYamlWithSchema(file, Schema)).rejects.toThrow(`(file: ${file})`);
  });

  it('wraps missing files as read errors', async () => {
    await expect(loadYamlWithSchema(path.join(tempDir, 'missing.yaml'), Schema)).rejects.toMatchObject({
      code: 'S002',
    });
  });

  it('stringifies values', () => {
    expect(stringifyYaml({ name: 'demo', list: [1, 2] })).toBe('name: demo\nlist:\n  - 1\n  - 2\n');
  });
});

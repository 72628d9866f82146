/**
 * Tests for configuration loading.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  DEFAULT_CONFIG_FILE,
  getDefaultConfig,
  loadConfig,
  mergeConfig,
} from '../../../../src/core/config/loader.js';
import { ConfigError, ErrorCodes } from '../../../../src/utils/errors.js';

describe('config loader', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'repoaudit-config-'));
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  describe('getDefaultConfig', () => {
    it('returns the defaults', () => {
      expect(getDefaultConfig()).toEqual({
        skip: [],
        skip_types: [],
        exclude: [],
        min_severity: 'info',
        format: 'human',
        plain: false,
      });
    });
  });

  describe('loadConfig', () => {
    it('falls back to defaults without a config file', async () => {
      expect(await loadConfig(tempDir)).toEqual(getDefaultConfig());
    });

    it('treats an empty file as defaults', async () => {
      await fs.promises.writeFile(path.join(tempDir, DEFAULT_CONFIG_FILE), '');
      expect(await loadConfig(tempDir)).toEqual(getDefaultConfig());
    });

    it('reads the file at the repository root', async () => {
      await fs.promises.writeFile(
        path.join(tempDir, DEFAULT_CONFIG_FILE),
        'skip: [citation]\nexclude: [build/]\nmin_severity: warning\nformat: json\n'
      );

      expect(await loadConfig(tempDir)).toEqual({
        skip: ['citation'],
        skip_types: [],
        exclude: ['build/'],
        min_severity: 'warning',
        format: 'json',
        plain: false,
      });
    });

    it('reads an explicit config path', async () => {
      const configPath = path.join(tempDir, 'custom.yaml');
      await fs.promises.writeFile(configPath, 'plain: true\n');

      const config = await loadConfig(path.join(tempDir, 'elsewhere'), configPath);
      expect(config.plain).toBe(true);
    });

    it('fails on a missing explicit config path', async () => {
      const configPath = path.join(tempDir, 'missing.yaml');
      await expect(loadConfig(tempDir, configPath)).rejects.toThrow(`Config file not found: ${configPath}`);
    });

    it('rejects exclude patterns without directory form', async () => {
      await fs.promises.writeFile(path.join(tempDir, DEFAULT_CONFIG_FILE), 'exclude: [node_modules]\n');

      await expect(loadConfig(tempDir)).rejects.toThrow(ConfigError);
      await expect(loadConfig(tempDir)).rejects.toMatchObject({ code: ErrorCodes.CONFIG_LOAD_ERROR });
    });

    it('rejects unknown severities', async () => {
      await fs.promises.writeFile(path.join(tempDir, DEFAULT_CONFIG_FILE), 'min_severity: fatal\n');
      await expect(loadConfig(tempDir)).rejects.toThrow(/min_severity/);
    });
  });

  describe('mergeConfig', () => {
    it('unions lists and lets overrides win for scalars', () => {
      const base = { ...getDefaultConfig(), skip: ['git'], exclude: ['build/'], format: 'yaml' as const };

      expect(mergeConfig(base, { skip: ['git', 'license'], exclude: ['dist/'], plain: true })).toEqual({
        skip: ['git', 'license'],
        skip_types: [],
        exclude: ['build/', 'dist/'],
        min_severity: 'info',
        format: 'yaml',
        plain: true,
      });
    });
  });
});

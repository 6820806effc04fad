/**
 * Tests for command line parsing
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { isEntryPoint, main, parse, parsePatternList, toCleanupTarget, toScanCommandOptions } from '../index.js';
import { UserError } from './utils/error-handler.js';
import { VERSION } from './version.js';
import { createTempDir, createTestFile, removeTempDir, silenceConsole } from '../test-config/mocks/test-helpers.js';

describe('CLI', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('parsePatternList', () => {
    it('should split and trim comma separated patterns', () => {
      expect(parsePatternList('*.jpg, *.png ,raw/**', 'include')).toEqual(['*.jpg', '*.png', 'raw/**']);
    });

    it('should pass through an absent list', () => {
      expect(parsePatternList(undefined, 'include')).toBeUndefined();
    });

    it('should reject a list with no patterns', () => {
      expect(() => parsePatternList(' , ', 'exclude')).toThrow('exclude patterns cannot be empty');
    });
  });

  describe('toScanCommandOptions', () => {
    it('should build scan options from flags', () => {
      const { path: targetPath, options } = toScanCommandOptions(
        parse(['scan', '/photos', '-r', '--include', '*.jpg,*.png', '--dry-run', '--max-threads', '4', '--json'])
      );

      expect(targetPath).toBe('/photos');
      expect(options).toMatchObject({
        recursive: true,
        include: ['*.jpg', '*.png'],
        dryRun: true,
        maxThreads: 4,
        json: true,
      });
      expect(options.exclude).toBeUndefined();
    });

    it('should default max threads to a positive value', () => {
      const { options } = toScanCommandOptions(parse(['scan', '/photos']));

      expect(options.maxThreads).toBeGreaterThan(0);
      expect(options.maxThreads).toBeLessThanOrEqual(8);
    });

    it.each(['0', '-2', '2.5', 'many', '65'])('should reject --max-threads %s', (value) => {
      expect(() => toScanCommandOptions(parse(['scan', '/photos', `--max-threads=${value}`]))).toThrow(UserError);
    });

    it('should not accept daemon flags', () => {
      expect(() => parse(['scan', '/photos', '--daemon'])).toThrow();
    });

    it('should require a path', () => {
      expect(() => toScanCommandOptions(parse(['scan']))).toThrow(UserError);
    });
  });

  describe('toCleanupTarget', () => {
    it('should map --only-* flags to a target', () => {
      expect(toCleanupTarget({})).toBe('all');
      expect(toCleanupTarget({ 'only-sidecars': true })).toBe('sidecars');
      expect(toCleanupTarget({ 'only-backups': true })).toBe('backups');
      expect(toCleanupTarget({ 'only-thumbnails': true })).toBe('thumbnails');
      expect(toCleanupTarget({ 'only-cache': true })).toBe('cache');
    });
  });

  describe('main', () => {
    it('should print the version', async () => {
      const spies = silenceConsole();

      await main(['--version']);

      expect(spies.log).toHaveBeenCalledWith(`jozin v${VERSION}`);
    });

    it('should reject an unknown command', async () => {
      await expect(main(['frobnicate', '/photos'])).rejects.toThrow('Unknown command "frobnicate"');
    });

    it('should reject unknown flags as user errors', async () => {
      await expect(main(['scan', '/photos', '--bogus'])).rejects.toBeInstanceOf(UserError);
    });

    it('should reject more than one --only-* flag', async () => {
      await expect(main(['cleanup', '/photos', '--only-sidecars', '--only-cache'])).rejects.toBeInstanceOf(UserError);
    });
  });

  describe('isEntryPoint', () => {
    it('should recognise the script when run through a bin symlink', async () => {
      const dir = await createTempDir();
      try {
        const script = await createTestFile(dir, 'dist/index.js', '');
        const link = path.join(dir, 'jozin');
        await fs.promises.symlink(script, link);

        expect(isEntryPoint(link, pathToFileURL(script).href)).toBe(true);
        expect(isEntryPoint(script, pathToFileURL(script).href)).toBe(true);
      } finally {
        await removeTempDir(dir);
      }
    });

    it('should reject another script or no script at all', async () => {
      const dir = await createTempDir();
      try {
        const script = await createTestFile(dir, 'index.js', '');
        const other = await createTestFile(dir, 'other.js', '');

        expect(isEntryPoint(other, pathToFileURL(script).href)).toBe(false);
        expect(isEntryPoint(path.join(dir, 'missing.js'), pathToFileURL(script).href)).toBe(false);
        expect(isEntryPoint(undefined, pathToFileURL(script).href)).toBe(false);
      } finally {
        await removeTempDir(dir);
      }
    });
  });
});

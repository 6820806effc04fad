/**
 * Tests for FileScanner
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { scanFile, scanPath, summarizeScan } from './file-scanner.js';
import { getBackupPath, getSidecarPath, getTempSidecarPath, readSidecar } from './sidecar/sidecar-writer.js';
import { IoError, UserError, ValidationError } from '../utils/error-handler.js';
import {
  createRecordingObserver,
  createTempDir,
  createTestFile,
  fileExists,
  removeTempDir,
  silenceConsole,
} from '../../test-config/mocks/test-helpers.js';

const ABC_SHA256 = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';

const listJsonFiles = async (dir: string): Promise<string[]> =>
  (await fs.promises.readdir(dir, { recursive: true })).filter((name) => name.includes('.json')).sort();

describe('FileScanner', () => {
  let root: string;

  beforeEach(async () => {
    silenceConsole();
    root = await createTempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(root);
  });

  describe('scanFile', () => {
    it('should hash the file and persist its sidecar', async () => {
      const photo = await createTestFile(root, 'a.jpg', 'abc');

      const sidecar = await scanFile(photo, { producerVersion: 'test-producer' });

      expect(sidecar.source.file_path).toBe(photo);
      expect(sidecar.source.file_size_bytes).toBe(3);
      expect(sidecar.source.file_hash).toBe(ABC_SHA256);
      expect(sidecar.producer_version).toBe('test-producer');
      expect(sidecar.created_at).toBe(sidecar.updated_at);
      expect(await readSidecar(photo)).toEqual(sidecar);
    });

    it('should record the modification time of the original', async () => {
      const photo = await createTestFile(root, 'a.jpg', 'abc');
      const mtime = new Date('2023-06-15T08:30:00.000Z');
      await fs.promises.utimes(photo, mtime, mtime);

      const sidecar = await scanFile(photo, { dryRun: true });

      expect(sidecar.source.file_modified_at).toBe('2023-06-15T08:30:00.000Z');
    });

    it('should not write anything on a dry run', async () => {
      const photo = await createTestFile(root, 'a.jpg', 'abc');

      const sidecar = await scanFile(photo, { dryRun: true });

      expect(sidecar.source.file_hash).toBe(ABC_SHA256);
      expect(await fileExists(getSidecarPath(photo))).toBe(false);
    });

    it('should leave the original untouched', async () => {
      const photo = await createTestFile(root, 'a.jpg', 'abc');

      await scanFile(photo);

      expect(await fs.promises.readFile(photo, 'utf8')).toBe('abc');
    });

    it('should throw an IoError for a missing file', async () => {
      await expect(scanFile(path.join(root, 'missing.jpg'))).rejects.toBeInstanceOf(IoError);
    });

    it('should throw a ValidationError for a directory', async () => {
      await fs.promises.mkdir(path.join(root, 'album.jpg'));

      await expect(scanFile(path.join(root, 'album.jpg'))).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('scanPath on a single file', () => {
    it('should scan a supported image', async () => {
      const photo = await createTestFile(root, 'a.jpg', 'abc');

      const result = await scanPath(photo);

      expect(result.totalFiles).toBe(1);
      expect(result.successful).toBe(1);
      expect(result.scannedFiles).toEqual([
        { action: 'written', path: photo, sidecarPath: `${photo}.json`, hash: ABC_SHA256, sizeBytes: 3 },
      ]);
    });

    it('should reject an unsupported file', async () => {
      const notes = await createTestFile(root, 'notes.txt');

      await expect(scanPath(notes)).rejects.toThrow(`Not an image file: ${notes}`);
      await expect(scanPath(notes)).rejects.toBeInstanceOf(ValidationError);
    });

    it('should report a dry run as skipped with its hash', async () => {
      const photo = await createTestFile(root, 'a.jpg', 'abc');

      const result = await scanPath(photo, { dryRun: true });

      expect(result.scannedFiles).toEqual([
        { action: 'skipped', path: photo, reason: 'dry run', hash: ABC_SHA256, sizeBytes: 3 },
      ]);
      expect(result.skipped).toBe(1);
      expect(result.successful).toBe(0);
    });
  });

  describe('scanPath argument checks', () => {
    it('should throw an IoError for a missing path', async () => {
      await expect(scanPath(path.join(root, 'nowhere'))).rejects.toBeInstanceOf(IoError);
    });

    it.each([0, -1, 1.5])('should reject max threads of %s', async (maxThreads) => {
      await expect(scanPath(root, { maxThreads })).rejects.toBeInstanceOf(UserError);
    });

    it('should fail before writing anything when a pattern is invalid', async () => {
      await createTestFile(root, 'a.jpg');

      await expect(scanPath(root, { include: ['[invalid'] })).rejects.toBeInstanceOf(ValidationError);
      expect(await listJsonFiles(root)).toEqual([]);
    });
  });

  describe('scanPath on a directory', () => {
    beforeEach(async () => {
      await createTestFile(root, 'a.jpg', 'abc');
      await createTestFile(root, 'b.png', 'png data');
      await createTestFile(root, 'notes.txt', 'not an image');
      await createTestFile(root, 'sub/c.heic', 'heic data');
    });

    it('should scan direct children only by default', async () => {
      const result = await scanPath(root);

      expect(result.scannedFiles.map((file) => [path.basename(file.path), file.action])).toEqual([
        ['a.jpg', 'written'],
        ['b.png', 'written'],
        ['notes.txt', 'skipped'],
      ]);
      expect(result).toMatchObject({ totalFiles: 3, successful: 2, failed: 0, skipped: 1 });
      expect(await listJsonFiles(root)).toEqual(['a.jpg.json', 'b.png.json']);
    });

    it('should descend into subdirectories when recursive', async () => {
      const result = await scanPath(root, { recursive: true });

      expect(result).toMatchObject({ totalFiles: 4, successful: 3, failed: 0, skipped: 1 });
      expect(await fileExists(path.join(root, 'sub', 'c.heic.json'))).toBe(true);
    });

    it('should record the skip reason of filtered files', async () => {
      const result = await scanPath(root, { recursive: true, exclude: ['sub/**'], include: ['*.jpg', '*.heic'] });

      expect(result.scannedFiles).toEqual([
        expect.objectContaining({ action: 'written', path: path.join(root, 'a.jpg') }),
        { action: 'skipped', path: path.join(root, 'b.png'), reason: 'not included by pattern' },
        { action: 'skipped', path: path.join(root, 'notes.txt'), reason: 'not included by pattern' },
        { action: 'skipped', path: path.join(root, 'sub', 'c.heic'), reason: 'excluded by pattern' },
      ]);
    });

    it('should write nothing on a dry run', async () => {
      const result = await scanPath(root, { recursive: true, dryRun: true });

      expect(result).toMatchObject({ totalFiles: 4, successful: 0, failed: 0, skipped: 4 });
      expect(await listJsonFiles(root)).toEqual([]);
    });

    it('should rotate the previous sidecar on a rescan', async () => {
      await scanPath(root);
      const firstSidecar = await fs.promises.readFile(getSidecarPath(path.join(root, 'a.jpg')), 'utf8');
      const second = await scanPath(root);

      // sidecars from the first run are listed and skipped
      expect(second).toMatchObject({ totalFiles: 5, successful: 2, skipped: 3 });
      expect(await fs.promises.readFile(getBackupPath(path.join(root, 'a.jpg'), 1), 'utf8')).toBe(firstSidecar);
      expect(await fileExists(getTempSidecarPath(path.join(root, 'a.jpg')))).toBe(false);
    });

    it('should report per-file failures and keep going', async () => {
      await createTestFile(root, 'bad.jpg', 'bad');
      await fs.promises.mkdir(getTempSidecarPath(path.join(root, 'bad.jpg')));

      const result = await scanPath(root);

      const bad = result.scannedFiles.find((file) => file.path === path.join(root, 'bad.jpg'));
      expect(bad?.action).toBe('failed');
      expect(bad?.action === 'failed' && bad.error.startsWith('Failed to write')).toBe(true);
      expect(result).toMatchObject({ totalFiles: 4, successful: 2, failed: 1, skipped: 1 });
    });

    it('should return the same result order for any thread count', async () => {
      const sequential = await scanPath(root, { recursive: true, dryRun: true, maxThreads: 1 });
      const parallel = await scanPath(root, { recursive: true, dryRun: true, maxThreads: 4 });

      expect(parallel.scannedFiles.map((file) => file.path)).toEqual(sequential.scannedFiles.map((file) => file.path));
    });

    it('should notify the observer once per scanned file, start before completion', async () => {
      const observer = createRecordingObserver();

      await scanPath(root, { recursive: true, observer, maxThreads: 2 });

      const started = observer.events.filter((event) => event.type === 'fileStarted').map((event) => event.path).sort();
      const completed = observer.events.filter((event) => event.type === 'fileCompleted').map((event) => event.path).sort();
      expect(started).toEqual([path.join(root, 'a.jpg'), path.join(root, 'b.png'), path.join(root, 'sub', 'c.heic')]);
      expect(completed).toEqual(started);
      for (const filePath of started) {
        const startIndex = observer.events.findIndex((event) => event.type === 'fileStarted' && event.path === filePath);
        const endIndex = observer.events.findIndex((event) => event.type === 'fileCompleted' && event.path === filePath);
        expect(startIndex).toBeLessThan(endIndex);
      }
    });

    it('should keep totals consistent', async () => {
      const result = await scanPath(root, { recursive: true });

      expect(result.totalFiles).toBe(result.successful + result.failed + result.skipped);
      expect(result.scannedFiles).toHaveLength(result.totalFiles);
    });
  });

  describe('scanPath properties', () => {
    it('should give identical content the same hash', async () => {
      await createTestFile(root, 'one.jpg', 'same bytes');
      await createTestFile(root, 'two.png', 'same bytes');

      const result = await scanPath(root, { dryRun: true });

      const hashes = result.scannedFiles.map((file) => (file.action === 'skipped' ? file.hash : undefined));
      expect(hashes[0]).toBeDefined();
      expect(hashes[0]).toBe(hashes[1]);
    });

    it('should only scan files matching an include pattern', async () => {
      await createTestFile(root, 'a.jpg');
      await createTestFile(root, 'b.png');

      expect(await scanPath(root, { include: ['*.jpg'] })).toMatchObject({ successful: 1, skipped: 1 });
    });

    it('should leave out a cache directory by exclude pattern', async () => {
      await createTestFile(root, 'a.jpg');
      await createTestFile(root, '.jozin/b.jpg');

      expect(await scanPath(root, { recursive: true, exclude: ['**/.jozin/**'] })).toMatchObject({ successful: 1, skipped: 1 });
    });

    it('should give the same dry run result twice', async () => {
      await createTestFile(root, 'a.jpg', 'abc');

      const first = await scanPath(root, { dryRun: true });
      const second = await scanPath(root, { dryRun: true });

      expect(second).toEqual(first);
    });
  });

  describe('summarizeScan', () => {
    it('should count each action', () => {
      const result = summarizeScan([
        { action: 'written', path: '/p/a.jpg', sidecarPath: '/p/a.jpg.json', hash: 'ab', sizeBytes: 1 },
        { action: 'failed', path: '/p/b.jpg', error: 'boom' },
        { action: 'skipped', path: '/p/c.txt', reason: 'unsupported extension' },
        { action: 'skipped', path: '/p/d.jpg', reason: 'dry run', hash: 'cd', sizeBytes: 2 },
      ]);

      expect(result).toMatchObject({ totalFiles: 4, successful: 1, failed: 1, skipped: 2 });
    });

    it('should treat an empty scan as all zeros', () => {
      expect(summarizeScan([])).toEqual({ scannedFiles: [], totalFiles: 0, successful: 0, failed: 0, skipped: 0 });
    });
  });
});

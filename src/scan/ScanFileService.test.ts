import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_SCAN_CONFIG, type ScanConfig } from '../config/types.js';
import { ScanServiceError } from './errors.js';
import { ScanFileService, decodeUpload } from './ScanFileService.js';

const GOOD = [
  '2025-05-26T14:58:59;10.0;2.0;0.0;1.5',
  'SCAN',
  'X;;1.0;2.0;3.0',
  'Y;;3.0;4.0;5.0',
  '2025-05-26T14:59:30;10.0;2.0;0.0;1.5',
  'SCAN',
  'X;;3.0;4.0;5.0',
  'Y;;5.0;6.0;7.0',
  '',
].join('\n');

const TRUNCATED = '2025-05-26T14:58:59;10.0;2.0;0.0;1.5\nSCAN\n';

describe('ScanFileService', () => {
  let tempDir: string;
  let service: ScanFileService;

  function createService(overrides: Partial<ScanConfig> = {}): ScanFileService {
    return new ScanFileService({ ...DEFAULT_SCAN_CONFIG, tempDir, ...overrides });
  }

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'scan-service-test-'));
    service = createService();
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('processFile', () => {
    it('produces title, tables, preview and plot for one file', async () => {
      const result = await service.processFile({ name: 'scan_2025_05_26_14_58_run_pico3.txt', content: GOOD });
      expect(result.title).toBe('Pico 3 - 2025/05/26 14:58');
      expect(result.blockCount).toBe(2);
      expect(result.metadata.rows.map((row) => row.DateTime)).toEqual(['2025-05-26T14:58:59', '2025-05-26T14:59:30']);
      expect(result.summary.rowCount).toBe(3);
      expect(result.preview[0]).toEqual({
        x_0: 1, y_0: 3, x_1: 3, y_1: 5, mean_x: 2, median_x: 2, mean_y: 4, median_y: 4,
      });
      expect(result.plot.points).toEqual([{ x: 2, y: 4 }, { x: 3, y: 5 }, { x: 4, y: 6 }]);
      expect(result.parserInfo).toMatchObject({ parserId: 'scan_block', parserVersion: '1.0.0' });
    });

    it('limits the preview to previewRows', async () => {
      const result = await createService({ previewRows: 1 }).processFile({ name: 'a.txt', content: GOOD });
      expect(result.preview).toHaveLength(1);
      expect(result.summary.rowCount).toBe(3);
    });

    it('accepts raw bytes', async () => {
      const result = await service.processFile({ name: 'a.txt', content: new TextEncoder().encode(GOOD) });
      expect(result.blockCount).toBe(2);
    });

    it('removes its temp directory after success and failure', async () => {
      await service.processFile({ name: 'a.txt', content: GOOD });
      await expect(service.processFile({ name: 'b.txt', content: TRUNCATED })).rejects.toMatchObject({
        code: 'TRUNCATED_BLOCK',
        line: 1,
      });
      expect(await readdir(tempDir)).toEqual([]);
    });
  });

  describe('processBatch', () => {
    it('reports a failing file without stopping the batch', async () => {
      const entries = await service.processBatch([
        { name: 'first.txt', content: GOOD },
        { name: 'broken.txt', content: TRUNCATED },
        { name: 'third.txt', content: GOOD.replace('X;;1.0;2.0;3.0', 'X;;1.0;two;3.0') },
        { name: 'fourth.txt', content: GOOD },
      ]);
      expect(entries.map((entry) => entry.status)).toEqual(['ok', 'error', 'error', 'ok']);
      expect(entries[1]).toEqual({
        status: 'error',
        fileName: 'broken.txt',
        error: {
          code: 'TRUNCATED_BLOCK',
          message: 'block starting at line 1 ends before its X row',
          line: 1,
        },
      });
      expect(entries[2]).toMatchObject({
        status: 'error',
        error: { code: 'FORMAT_ERROR', message: 'line 3: X row value #1 is not a number: "two"', line: 3 },
      });
      expect(await readdir(tempDir)).toEqual([]);
    });

    it('reports a file that is not valid UTF-8', async () => {
      const bytes = new Uint8Array([0xff, ...new TextEncoder().encode(`DateTime;Height\n${GOOD}`)]);
      const entries = await service.processBatch([
        { name: 'latin1.txt', content: bytes },
        { name: 'good.txt', content: GOOD },
      ]);
      expect(entries[0]).toEqual({
        status: 'error',
        fileName: 'latin1.txt',
        error: { code: 'ENCODING_ERROR', message: 'file is not valid UTF-8' },
      });
      expect(entries[1]?.status).toBe('ok');
      expect(await readdir(tempDir)).toEqual([]);
    });

    it('reports ragged files under the reject policy', async () => {
      const ragged = GOOD.replace('X;;3.0;4.0;5.0', 'X;;3.0;4.0').replace('Y;;5.0;6.0;7.0', 'Y;;5.0;6.0');
      const [entry] = await service.processBatch([{ name: 'ragged.txt', content: ragged }]);
      expect(entry).toMatchObject({ status: 'error', error: { code: 'RAGGED_TABLE' } });
    });
  });

  describe('parseBatchRequest', () => {
    it('decodes base64 content', () => {
      const uploads = service.parseBatchRequest({
        files: [
          { name: 'a.txt', content: Buffer.from(GOOD).toString('base64'), encoding: 'base64' },
          { name: 'b.txt', content: GOOD },
        ],
      });
      expect(uploads).toHaveLength(2);
      const decoded = uploads[0]?.content;
      if (!(decoded instanceof Uint8Array)) throw new Error('expected bytes for a base64 upload');
      expect(new TextDecoder().decode(decoded)).toBe(GOOD);
      expect(uploads[1]?.content).toBe(GOOD);
    });

    it('rejects an empty or malformed body', () => {
      expect(() => service.parseBatchRequest({ files: [] })).toThrow(ScanServiceError);
      expect(() => service.parseBatchRequest({ files: [{ name: 'a.txt' }] })).toThrow(/files\.0\.content/);
      expect(() => service.parseBatchRequest('nope')).toThrow(ScanServiceError);
    });

    it('rejects more files than maxFiles', () => {
      const limited = createService({ maxFiles: 1 });
      expect(() =>
        limited.parseBatchRequest({ files: [{ name: 'a.txt', content: GOOD }, { name: 'b.txt', content: GOOD }] })
      ).toThrow('at most 1 files per request, got 2');
    });
  });

  describe('decodeUpload', () => {
    it('rejects invalid base64', () => {
      expect(() => decodeUpload({ name: 'a.txt', content: 'not base64!', encoding: 'base64' })).toThrow(
        'a.txt: content is not valid base64'
      );
    });
  });
});

import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Readable } from 'stream';
import { StoreInconsistencyError } from '../src/clients/S3Client';
import { TransferFailedError, TransferManager } from '../src/clients/TransferManager';
import { backupObject, createMockLogger, createMockS3Client } from './helpers/mocks';

describe('TransferManager', () => {
  let downloadDir: string;
  let s3Client: ReturnType<typeof createMockS3Client>;
  let logger: ReturnType<typeof createMockLogger>;
  let onProgress: jest.Mock;
  let transfer: TransferManager;

  const object = backupObject('env.x/x.2024-01-15T14-30-45.sql.gz', 10, 11);

  beforeEach(() => {
    downloadDir = mkdtempSync(join(tmpdir(), 'transfer-test-'));
    s3Client = createMockS3Client();
    logger = createMockLogger();
    onProgress = jest.fn();
    transfer = new TransferManager(s3Client, downloadDir, logger, onProgress);
  });

  afterEach(() => {
    rmSync(downloadDir, { recursive: true, force: true });
  });

  describe('download', () => {
    it('should write the body to the local file name in the download directory', async () => {
      s3Client.downloadObject.mockResolvedValue(Readable.from([Buffer.from('hello '), Buffer.from('world')]));

      const result = await transfer.download(object, 'x');

      const filePath = join(downloadDir, 'x.2024-01-15T14-30-45.sql.gz');
      expect(s3Client.downloadObject).toHaveBeenCalledWith('env.x/x.2024-01-15T14-30-45.sql.gz');
      expect(result).toEqual({ database: 'x', key: object.key, filePath, size: 11 });
      expect(readFileSync(filePath, 'utf8')).toBe('hello world');
      expect(readdirSync(downloadDir)).toEqual(['x.2024-01-15T14-30-45.sql.gz']);
    });

    it('should report progress once per chunk', async () => {
      s3Client.downloadObject.mockResolvedValue(Readable.from([Buffer.from('hello '), Buffer.from('world')]));

      await transfer.download(object, 'x');

      expect(onProgress.mock.calls).toEqual([
        [6, 6],
        [11, 5],
      ]);
    });

    it('should log the start and completion of the download', async () => {
      s3Client.downloadObject.mockResolvedValue(Readable.from([Buffer.from('data')]));

      const result = await transfer.download(object, 'x');

      expect(logger.info).toHaveBeenCalledWith('downloading: x.2024-01-15T14-30-45.sql.gz', {
        s3Key: object.key,
        size: 11,
      });
      expect(logger.logDownloadComplete).toHaveBeenCalledWith(object.key, result.filePath, 4, expect.any(Number));
    });

    it('should overwrite an existing file', async () => {
      s3Client.downloadObject.mockResolvedValueOnce(Readable.from([Buffer.from('first version')]));
      await transfer.download(object, 'x');

      s3Client.downloadObject.mockResolvedValueOnce(Readable.from([Buffer.from('second')]));
      const result = await transfer.download(object, 'x');

      expect(readFileSync(result.filePath, 'utf8')).toBe('second');
    });

    it('should remove the partial file and throw TransferFailedError when the stream breaks', async () => {
      async function* broken() {
        yield Buffer.from('partial data');
        throw new Error('connection reset');
      }
      s3Client.downloadObject.mockResolvedValue(Readable.from(broken()));

      const error = await transfer.download(object, 'x').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransferFailedError);
      expect(error).toMatchObject({ key: object.key, operation: 'transfer' });
      expect((error as Error).message).toContain('connection reset');
      expect(readdirSync(downloadDir)).toEqual([]);
      expect(logger.logDownloadComplete).not.toHaveBeenCalled();
    });

    it('should wrap a failed request in TransferFailedError', async () => {
      s3Client.downloadObject.mockRejectedValue(new Error('timeout'));

      await expect(transfer.download(object, 'x')).rejects.toThrow(TransferFailedError);
      expect(existsSync(join(downloadDir, 'x.2024-01-15T14-30-45.sql.gz'))).toBe(false);
    });

    it('should pass StoreInconsistencyError through unchanged', async () => {
      const missing = new StoreInconsistencyError('gone', object.key);
      s3Client.downloadObject.mockRejectedValue(missing);

      await expect(transfer.download(object, 'x')).rejects.toBe(missing);
    });
  });
});

import { createWriteStream } from 'fs';
import { mkdir, rename, unlink } from 'fs/promises';
import { join, resolve } from 'path';
import { Transform, TransformCallback } from 'stream';
import { pipeline } from 'stream/promises';
import { BackupObject } from '../interfaces/BackupCatalog';
import { Logger } from '../interfaces/Logger';
import { S3Client } from '../interfaces/S3Client';
import {
  DownloadResult,
  ProgressCallback,
  TransferManager as ITransferManager,
} from '../interfaces/TransferManager';
import { localFilename } from '../utils/BackupNaming';
import { StoreInconsistencyError } from './S3Client';
import { OperationError } from '../utils/OperationError';
import { formatError, getErrorString, toError } from '../utils/errorUtils';

export class TransferFailedError extends OperationError {
  constructor(
    message: string,
    public readonly key: string,
    cause?: Error
  ) {
    super(message, 'transfer', cause);
    this.name = 'TransferFailedError';
  }
}

const PARTIAL_SUFFIX = '.part';

/**
 * Counts bytes as they pass and reports each chunk
 */
class ProgressStream extends Transform {
  bytesTransferred = 0;

  constructor(private readonly onProgress: ProgressCallback) {
    super();
  }

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.bytesTransferred += chunk.length;
    this.onProgress(this.bytesTransferred, chunk.length);
    callback(null, chunk);
  }
}

/**
 * Streams remote backups to local files.
 *
 * The body is written to `<name>.part` and renamed once complete, so a failed
 * transfer never leaves a file under the final name.
 */
export class TransferManager implements ITransferManager {
  private s3Client: S3Client;
  private downloadDir: string;
  private logger: Logger;
  private onProgress: ProgressCallback;

  constructor(
    s3Client: S3Client,
    downloadDir: string,
    logger: Logger,
    onProgress: ProgressCallback = () => undefined
  ) {
    this.s3Client = s3Client;
    this.downloadDir = resolve(downloadDir);
    this.logger = logger;
    this.onProgress = onProgress;
  }

  async download(object: BackupObject, database: string): Promise<DownloadResult> {
    const startTime = Date.now();
    const filePath = join(this.downloadDir, localFilename(object.key));
    const partialPath = `${filePath}${PARTIAL_SUFFIX}`;

    this.logger.info(`downloading: ${localFilename(object.key)}`, {
      s3Key: object.key,
      size: object.size,
    });

    const progress = new ProgressStream(this.onProgress);
    await mkdir(this.downloadDir, { recursive: true });

    try {
      const body = await this.s3Client.downloadObject(object.key);
      await pipeline(body, progress, createWriteStream(partialPath, { flags: 'w' }));
      await rename(partialPath, filePath);
    } catch (error) {
      await this.removePartialFile(partialPath);

      if (error instanceof StoreInconsistencyError) {
        throw error;
      }

      throw new TransferFailedError(
        `Failed to download ${object.key} to ${filePath}: ${formatError(error)}`,
        object.key,
        toError(error)
      );
    }

    const duration = Date.now() - startTime;
    this.logger.logDownloadComplete(object.key, filePath, progress.bytesTransferred, duration);

    return {
      database,
      key: object.key,
      filePath,
      size: progress.bytesTransferred,
    };
  }

  private async removePartialFile(partialPath: string): Promise<void> {
    try {
      await unlink(partialPath);
    } catch (error) {
      if (getErrorString(error, 'code') !== 'ENOENT') {
        this.logger.warn(`Failed to remove partial download ${partialPath}: ${formatError(error)}`);
      }
    }
  }
}

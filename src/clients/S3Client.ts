import {
  S3Client as AWSS3Client,
  S3ClientConfig,
  PutObjectCommand,
  ListObjectsV2Command,
  GetObjectCommand,
  DeleteObjectCommand,
  HeadBucketCommand,
  CreateBucketCommand,
  PutObjectCommandInput,
  ListObjectsV2CommandInput,
  DeleteObjectCommandInput,
} from '@aws-sdk/client-s3';
import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import { Readable } from 'stream';
import { S3Client as IS3Client, S3Object } from '../interfaces/S3Client';
import { BackupConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { OperationError } from '../utils/OperationError';
import { formatError, getErrorString, getHttpStatusCode, sleep, toError } from '../utils/errorUtils';

/**
 * A store call that failed for good (retries exhausted or non-retryable)
 */
export class S3OperationError extends OperationError {
  constructor(message: string, operation: string, cause?: Error) {
    super(message, operation, cause);
    this.name = 'S3OperationError';
  }
}

/**
 * The store disagreed with its own listing: an object that was listed is gone
 */
export class StoreInconsistencyError extends OperationError {
  constructor(
    message: string,
    public readonly key: string,
    cause?: Error
  ) {
    super(message, 'consistency', cause);
    this.name = 'StoreInconsistencyError';
  }
}

export interface RetryOptions {
  maxRetries?: number;

  /** First backoff delay in ms; doubles on every attempt */
  baseDelay?: number;
}

const NON_RETRYABLE_CODES = [
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'AccessDenied',
  'NoSuchBucket',
  'NoSuchKey',
  'NotFound',
  'InvalidBucketName',
  'BucketNotEmpty',
];

const MISSING_OBJECT_CODES = ['NoSuchKey', 'NotFound'];

/**
 * S3Client implementation using AWS SDK v3
 * Provides upload, paginated listing, streaming download and deletion with retry logic
 */
export class S3Client implements IS3Client {
  private client: AWSS3Client;
  private bucket: string;
  private logger: Logger;
  private maxRetries: number;
  private baseDelay: number;

  constructor(config: BackupConfig, logger: Logger, retry: RetryOptions = {}) {
    const clientConfig: S3ClientConfig = {
      region: config.s3Region,
      credentials: {
        accessKeyId: config.s3AccessKey,
        secretAccessKey: config.s3SecretKey,
      },
    };

    // Use custom endpoint if provided (for S3-compatible services)
    if (config.s3Url) {
      clientConfig.endpoint = config.s3Url;
      clientConfig.forcePathStyle = true; // Required for MinIO and other S3-compatible services
    }

    this.client = new AWSS3Client(clientConfig);
    this.bucket = config.s3Bucket;
    this.logger = logger;
    this.maxRetries = retry.maxRetries ?? 3;
    this.baseDelay = retry.baseDelay ?? 1000; // 1 second
  }

  /**
   * Upload a file to S3 with retry logic
   */
  async uploadFile(filePath: string, key: string): Promise<string> {
    return this.withRetry(async () => {
      // A fresh stream per attempt: a failed attempt may have consumed the previous one
      const fileStats = await stat(filePath);
      const fileStream = createReadStream(filePath);

      const uploadParams: PutObjectCommandInput = {
        Bucket: this.bucket,
        Key: key,
        Body: fileStream,
        ContentLength: fileStats.size,
        ContentType: 'application/gzip',
        ACL: 'private',
      };

      await this.client.send(new PutObjectCommand(uploadParams));

      return `s3://${this.bucket}/${key}`;
    }, `upload file ${filePath} to ${key}`);
  }

  /**
   * List every object under a prefix, following continuation tokens
   */
  async listObjects(prefix: string): Promise<S3Object[]> {
    return this.withRetry(async () => {
      const objects: S3Object[] = [];
      let continuationToken: string | undefined;

      do {
        const listParams: ListObjectsV2CommandInput = {
          Bucket: this.bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
        };

        const response = await this.client.send(new ListObjectsV2Command(listParams));

        for (const obj of response.Contents ?? []) {
          if (!obj.Key || !obj.LastModified) {
            continue;
          }
          objects.push({
            key: obj.Key,
            lastModified: obj.LastModified,
            size: obj.Size ?? 0,
          });
        }

        continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
      } while (continuationToken);

      return objects;
    }, `list objects with prefix ${prefix}`);
  }

  /**
   * Open an object's body as a Node stream
   */
  async downloadObject(key: string): Promise<Readable> {
    try {
      return await this.withRetry(async () => {
        const response = await this.client.send(
          new GetObjectCommand({ Bucket: this.bucket, Key: key })
        );

        if (!(response.Body instanceof Readable)) {
          throw new S3OperationError(`Unexpected response body type for ${key}`, 'download');
        }

        return response.Body;
      }, `download object ${key}`);
    } catch (error) {
      throw this.mapMissingObject(error, key);
    }
  }

  /**
   * Delete an object from S3
   */
  async deleteObject(key: string): Promise<void> {
    try {
      await this.withRetry(async () => {
        const deleteParams: DeleteObjectCommandInput = {
          Bucket: this.bucket,
          Key: key,
        };

        await this.client.send(new DeleteObjectCommand(deleteParams));
      }, `delete object ${key}`);
    } catch (error) {
      throw this.mapMissingObject(error, key);
    }
  }

  /**
   * Create the bucket if HeadBucket reports it missing
   */
  async ensureBucket(): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
    } catch (error) {
      if (!this.isMissing(error) && getErrorString(error, 'name') !== 'NoSuchBucket') {
        throw new S3OperationError(
          `Failed to check bucket ${this.bucket}: ${formatError(error)}`,
          'ensure_bucket',
          toError(error)
        );
      }

      this.logger.info('Bucket not found, creating it', { bucket: this.bucket });
      await this.withRetry(async () => {
        await this.client.send(new CreateBucketCommand({ Bucket: this.bucket }));
      }, `create bucket ${this.bucket}`);
    }
  }

  /**
   * Test S3 connectivity and permissions
   */
  async testConnection(): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
      return true;
    } catch (error) {
      this.logger.error('S3 connection test failed', toError(error), { bucket: this.bucket });
      return false;
    }
  }

  private mapMissingObject(error: unknown, key: string): unknown {
    if (this.isMissing(error)) {
      return new StoreInconsistencyError(
        `Object ${key} is listed but not present in bucket ${this.bucket}`,
        key,
        toError(error)
      );
    }
    return error;
  }

  private isMissing(error: unknown): boolean {
    const name = getErrorString(error, 'name');
    const code = getErrorString(error, 'Code');
    return (
      (name !== undefined && MISSING_OBJECT_CODES.includes(name)) ||
      (code !== undefined && MISSING_OBJECT_CODES.includes(code)) ||
      getHttpStatusCode(error) === 404
    );
  }

  /**
   * Execute an operation with exponential backoff retry logic
   */
  private async withRetry<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        // Don't retry on certain error types
        if (this.isNonRetryableError(error)) {
          throw error;
        }

        if (attempt >= this.maxRetries) {
          throw new S3OperationError(
            `Failed to ${operationName} after ${this.maxRetries} attempts. Last error: ${formatError(error)}`,
            operationName,
            toError(error)
          );
        }

        // Calculate exponential backoff delay
        const delay = this.baseDelay * Math.pow(2, attempt - 1);
        this.logger.warn(
          `Attempt ${attempt} failed for ${operationName}: ${formatError(error)}. Retrying in ${delay}ms...`
        );

        await sleep(delay);
      }
    }
  }

  /**
   * Check if an error should not be retried
   */
  private isNonRetryableError(error: unknown): boolean {
    if (error instanceof OperationError) {
      return true;
    }

    const name = getErrorString(error, 'name');
    const code = getErrorString(error, 'Code');
    const status = getHttpStatusCode(error);

    return (
      (name !== undefined && NON_RETRYABLE_CODES.includes(name)) ||
      (code !== undefined && NON_RETRYABLE_CODES.includes(code)) ||
      (status !== undefined && status >= 400 && status < 500)
    );
  }
}

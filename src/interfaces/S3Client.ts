import { Readable } from 'stream';

/**
 * Represents an S3 object with metadata
 */
export interface S3Object {
  /** S3 object key */
  key: string;

  /** Last modified timestamp */
  lastModified: Date;

  /** Size of the object in bytes */
  size: number;
}

/**
 * Interface for S3 operations
 */
export interface S3Client {
  /** Upload a local file to S3 under the given key */
  uploadFile(filePath: string, key: string): Promise<string>;

  /** List every object under a prefix, following pagination */
  listObjects(prefix: string): Promise<S3Object[]>;

  /** Open the body of an object as a stream */
  downloadObject(key: string): Promise<Readable>;

  /** Delete an object from S3 */
  deleteObject(key: string): Promise<void>;

  /** Create the bucket when it does not exist yet */
  ensureBucket(): Promise<void>;

  /** Test S3 connectivity and permissions */
  testConnection(): Promise<boolean>;
}

import { S3Object } from './S3Client';

/** One stored dump artifact, as listed by the object store */
export type BackupObject = S3Object;

/** Sentinel database name that lists every tracked database */
export const ALL_DATABASES = 'all';

/**
 * Lists remote backups in a stable order
 */
export interface BackupCatalog {
  /**
   * List backups of one database, or of every tracked database for `all`,
   * ordered by lastModified (oldest first)
   * @param print write the indexed listing to the output sink
   */
  list(database: string, print?: boolean): Promise<BackupObject[]>;
}

import { BackupObject } from '../interfaces/BackupCatalog';

const DUMP_EXTENSION = '.sql.gz';
const PRODUCTION_SUFFIX = '_production';
const STAGING_SUFFIX = '_staging';

/**
 * Format a date as YYYY-MM-DDTHH-MM-SS (UTC), hyphens instead of colons so the
 * value is safe inside object keys and file names
 */
export function formatBackupTimestamp(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  const hours = String(date.getUTCHours()).padStart(2, '0');
  const minutes = String(date.getUTCMinutes()).padStart(2, '0');
  const seconds = String(date.getUTCSeconds()).padStart(2, '0');

  return `${year}-${month}-${day}T${hours}-${minutes}-${seconds}`;
}

/**
 * Key prefix shared by every backup of one database in one environment
 */
export function databasePrefix(environment: string, database: string): string {
  return `${environment}.${database}`;
}

/**
 * Name of a dump file: `{database}.{timestamp}.sql.gz`
 */
export function buildDumpFileName(database: string, timestamp: string): string {
  return `${database}.${timestamp}${DUMP_EXTENSION}`;
}

/**
 * Object key of a dump: `{environment}.{database}/{database}.{timestamp}.sql.gz`
 */
export function buildArtifactKey(environment: string, database: string, timestamp: Date | string): string {
  const ts = typeof timestamp === 'string' ? timestamp : formatBackupTimestamp(timestamp);
  return `${databasePrefix(environment, database)}/${buildDumpFileName(database, ts)}`;
}

/**
 * Strip everything up to and including the first `/` of a remote key
 */
export function localFilename(remoteKey: string): string {
  const slash = remoteKey.indexOf('/');
  return slash === -1 ? remoteKey : remoteKey.substring(slash + 1);
}

/**
 * Target database for a clone: the part of the file name before the first `.`,
 * with a trailing `_production` swapped for `_staging`
 */
export function stagingNameFromFilename(filename: string): string {
  const dot = filename.indexOf('.');
  const base = dot === -1 ? filename : filename.substring(0, dot);
  return base.endsWith(PRODUCTION_SUFFIX)
    ? base.slice(0, -PRODUCTION_SUFFIX.length) + STAGING_SUFFIX
    : base;
}

/**
 * Order by lastModified, oldest first; equal timestamps fall back to the key
 */
export function compareBackupObjects(a: BackupObject, b: BackupObject): number {
  const delta = a.lastModified.getTime() - b.lastModified.getTime();
  if (delta !== 0) {
    return delta;
  }
  if (a.key === b.key) {
    return 0;
  }
  return a.key < b.key ? -1 : 1;
}

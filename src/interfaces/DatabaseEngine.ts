import { Readable, Writable } from 'stream';
import { BackupConfig } from './BackupConfig';

/**
 * Adapter around a database's dump and load tooling.
 *
 * Dumps are written gzip-compressed; restore and clone read gzip input.
 */
export interface DatabaseEngine {
  readonly name: string;

  testConnection(): Promise<boolean>;

  /** Write a compressed dump of `database` into `output` */
  dumpDatabase(database: string, output: Writable): Promise<void>;

  /** Load a compressed dump into an existing database, overwriting it */
  restoreDatabase(database: string, input: Readable): Promise<void>;

  /** Drop `targetDatabase` if present, create it, then load the dump */
  cloneDatabase(targetDatabase: string, input: Readable): Promise<void>;
}

export type DatabaseEngineFactory = (config: BackupConfig) => DatabaseEngine;

import { BackupObject } from './BackupCatalog';

/**
 * A backup picked by the user, with the database its token named
 */
export interface ResolvedBackup {
  database: string;
  index: number;
  object: BackupObject;
}

/**
 * Maps `index:database` tokens onto catalog entries
 */
export interface BackupResolver {
  resolve(token: string): Promise<ResolvedBackup>;

  /** Token of the newest backup of a database, re-derived from a fresh listing */
  resolveMostRecent(database: string): Promise<string>;
}

import { BackupCatalog } from '../interfaces/BackupCatalog';
import { BackupResolver as IBackupResolver, ResolvedBackup } from '../interfaces/BackupResolver';
import { OperationError } from '../utils/OperationError';

export class MalformedTokenError extends OperationError {
  constructor(
    message: string,
    public readonly token: string
  ) {
    super(message, 'resolve');
    this.name = 'MalformedTokenError';
  }
}

export class BackupNotFoundError extends OperationError {
  constructor(
    message: string,
    public readonly database: string,
    public readonly index: number
  ) {
    super(message, 'resolve');
    this.name = 'BackupNotFoundError';
  }
}

const INDEX_PATTERN = /^-?\d+$/;

/**
 * Resolves `index:database` tokens against a fresh single-database listing
 */
export class BackupResolver implements IBackupResolver {
  private catalog: BackupCatalog;

  constructor(catalog: BackupCatalog) {
    this.catalog = catalog;
  }

  async resolve(token: string): Promise<ResolvedBackup> {
    const { index, database } = this.parseToken(token);

    const backups = await this.catalog.list(database);
    const object = index >= 0 ? backups[index] : undefined;

    if (!object) {
      throw new BackupNotFoundError(
        `No backup found for database "${database}": requested index: ${index}`,
        database,
        index
      );
    }

    return { database, index, object };
  }

  /**
   * Lists again rather than reusing an earlier listing, so a backup finishing in
   * between can shift what "most recent" means for the caller
   */
  async resolveMostRecent(database: string): Promise<string> {
    const backups = await this.catalog.list(database);
    return `${backups.length - 1}:${database}`;
  }

  private parseToken(token: string): { index: number; database: string } {
    const separator = token.indexOf(':');
    const database = separator === -1 ? '' : token.substring(separator + 1);

    if (!database) {
      throw new MalformedTokenError(
        `You didn't specify a database name: e.g. 1:rails_production (got "${token}")`,
        token
      );
    }

    const rawIndex = token.substring(0, separator).trim();
    if (!INDEX_PATTERN.test(rawIndex)) {
      throw new MalformedTokenError(`Backup index must be an integer (got "${rawIndex}")`, token);
    }

    return { index: parseInt(rawIndex, 10), database };
  }
}

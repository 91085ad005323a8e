import { BackupObject } from './BackupCatalog';

/**
 * Result of a retention cleanup operation
 */
export interface RetentionResult {
  /** Number of backups found across all tracked databases */
  totalCount: number;

  /** Number of newest backups protected by the policy */
  keepCount: number;

  /** Number of backups that were deleted */
  deletedCount: number;

  /** List of deleted backup keys */
  deletedKeys: string[];

  /** Keys whose deletion hit an eventually-consistent store and was treated as done */
  skippedKeys: string[];
}

/**
 * Interface for managing backup retention and cleanup
 */
export interface RetentionManager {
  /** Delete every backup outside the retention window */
  cleanup(): Promise<RetentionResult>;

  /**
   * Backups eligible for deletion, oldest first
   * @param backups the merged listing of every tracked database, sorted
   */
  selectExpiredBackups(backups: BackupObject[]): BackupObject[];
}

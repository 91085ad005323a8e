import { ConfigurationManager, ConfigurationOptions } from './config/ConfigurationManager';
import { Logger } from './clients/Logger';
import { BackupCatalog, OutputWriter } from './clients/BackupCatalog';
import { BackupManager } from './clients/BackupManager';
import { BackupResolver } from './clients/BackupResolver';
import { CronScheduler } from './clients/CronScheduler';
import { RetentionManager } from './clients/RetentionManager';
import { S3Client } from './clients/S3Client';
import { TransferManager } from './clients/TransferManager';
import { EngineRegistry, createDefaultEngineRegistry } from './engines/EngineRegistry';
import { BackupConfig } from './interfaces/BackupConfig';
import { Logger as ILogger, LogLevel } from './interfaces/Logger';
import { ProgressCallback } from './interfaces/TransferManager';
import { toError } from './utils/errorUtils';

export interface ApplicationOptions extends ConfigurationOptions {
  /** Sink for listings; defaults to console.log */
  output?: OutputWriter;

  /** Download progress; defaults to no output */
  onProgress?: ProgressCallback;

  /** Engine registry; defaults to every engine shipped in this package */
  createEngineRegistry?: (logger: ILogger) => EngineRegistry;
}

/**
 * Main application class that initializes and coordinates all components
 */
class DatabaseBackupApplication {
  private logger: Logger;
  private options: ApplicationOptions;
  private config: BackupConfig | null = null;
  private backupManager: BackupManager | null = null;
  private cronScheduler: CronScheduler | null = null;
  private isShuttingDown = false;

  constructor(options: ApplicationOptions = {}) {
    // Reconfigured once the log level is known
    this.logger = Logger.createFromEnvironment();
    this.options = options;
  }

  /**
   * Load configuration and assemble the components. Throws ConfigurationError
   * before any remote call is made when configuration is missing.
   */
  initialize(): BackupManager {
    const config = ConfigurationManager.loadConfiguration(this.options);
    this.logger = new Logger(Object.values(LogLevel).find(level => level === config.logLevel) ?? LogLevel.INFO);
    this.logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));

    const registry = (this.options.createEngineRegistry ?? createDefaultEngineRegistry)(this.logger);
    const engine = registry.create(config);

    const s3Client = new S3Client(config, this.logger);
    const catalog = new BackupCatalog(s3Client, config, this.logger, this.options.output);
    const resolver = new BackupResolver(catalog);
    const transfer = new TransferManager(s3Client, config.downloadDir, this.logger, this.options.onProgress);
    const retention = new RetentionManager(catalog, s3Client, config, this.logger);

    this.config = config;
    this.backupManager = new BackupManager(
      { engine, s3Client, catalog, resolver, transfer, retention, logger: this.logger },
      config
    );
    return this.backupManager;
  }

  /**
   * Validate connectivity, then run backup-all + cleanup on the configured schedule
   */
  async startScheduler(runOnInit: boolean = false): Promise<void> {
    if (!this.backupManager || !this.config) {
      throw new Error('Application not initialized. Call initialize() first.');
    }
    if (!this.config.backupInterval) {
      throw new Error('BACKUP_INTERVAL must be configured to run the scheduler');
    }

    this.logger.info('Validating configuration and testing connections...');
    if (!(await this.backupManager.validateConfiguration())) {
      throw new Error('Configuration validation failed');
    }

    this.cronScheduler = new CronScheduler(
      { cronExpression: this.config.backupInterval, timezone: 'UTC', runOnInit },
      this.backupManager,
      this.logger
    );
    this.cronScheduler.start();

    this.logger.info(
      'Service is now running and will execute backups according to the configured schedule'
    );
  }

  /**
   * Gracefully shutdown the application
   */
  shutdown(): void {
    if (this.isShuttingDown) {
      this.logger.warn('Shutdown already in progress');
      return;
    }

    this.isShuttingDown = true;
    this.logger.info('Initiating graceful shutdown...');

    if (this.cronScheduler && this.cronScheduler.isRunning()) {
      this.cronScheduler.stop();
    }

    this.logger.info('Backup service shutdown completed');
  }

  /**
   * Setup signal handlers for graceful shutdown
   */
  setupSignalHandlers(): void {
    const signals = ['SIGTERM', 'SIGINT', 'SIGUSR2'] as const;

    signals.forEach(signal => {
      process.on(signal, () => {
        this.logger.info(`Received ${signal}, initiating graceful shutdown...`);
        this.shutdown();
        process.exit(0);
      });
    });

    process.on('unhandledRejection', reason => {
      this.logger.error('Unhandled promise rejection', toError(reason) ?? new Error(String(reason)));
      this.shutdown();
      process.exit(1);
    });
  }
}

export { DatabaseBackupApplication };
export { ConfigurationManager, ConfigurationError } from './config/ConfigurationManager';
export { BackupManager } from './clients/BackupManager';
export { BackupCatalog } from './clients/BackupCatalog';
export { BackupResolver, BackupNotFoundError, MalformedTokenError } from './clients/BackupResolver';
export { TransferManager, TransferFailedError } from './clients/TransferManager';
export { RetentionManager } from './clients/RetentionManager';
export { S3Client, S3OperationError, StoreInconsistencyError } from './clients/S3Client';
export { CronScheduler } from './clients/CronScheduler';
export { Logger } from './clients/Logger';
export { EngineRegistry, createDefaultEngineRegistry } from './engines/EngineRegistry';
export { EngineFailureError } from './engines/ProcessRunner';
export { PostgreSQLEngine } from './engines/PostgreSQLEngine';
export { MySQLEngine } from './engines/MySQLEngine';
export * from './utils/BackupNaming';
export type { BackupConfig } from './interfaces/BackupConfig';
export type { BackupObject } from './interfaces/BackupCatalog';
export type { DatabaseEngine, DatabaseEngineFactory } from './interfaces/DatabaseEngine';

#!/usr/bin/env node
/**
 * db-backup: back up databases to S3 and clone them across environments
 *
 *   db-backup backup
 *   db-backup list app_production
 *   db-backup download 3:app_production
 *   db-backup --from prod_br clone app_production
 */
import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { DatabaseBackupApplication } from './index';
import { BackupManager } from './clients/BackupManager';
import { ConfigurationError } from './config/ConfigurationManager';
import { ALL_DATABASES } from './interfaces/BackupCatalog';
import { formatError } from './utils/errorUtils';

interface CommandContext {
  app: DatabaseBackupApplication;
  manager: BackupManager;
}

interface GlobalOptions {
  from?: string;
  config?: string;
  engine?: string;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('db-backup')
    .description('Back up databases to S3 and clone backups across environments')
    .version('1.0.0')
    .option('-f, --from <environment>', 'environment to work against: prod_br, beta, alpha, etc')
    .option('-c, --config <path>', 'use config file')
    .option('-e, --engine <name>', 'database engine: postgresql, mysql');

  const withManager =
    <A extends unknown[]>(action: (context: CommandContext, ...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      const options = program.opts<GlobalOptions>();
      const app = new DatabaseBackupApplication({
        configPath: options.config,
        environment: options.from,
        engine: options.engine,
        onProgress: () => process.stdout.write('.'),
      });
      await action({ app, manager: app.initialize() }, ...args);
    };

  program
    .command('backup')
    .description('dump every tracked database and upload it')
    .action(
      withManager(async ({ manager }) => {
        const result = await manager.backupAll();
        for (const backup of result.backups) {
          console.log(`successful backup: ${backup.fileName}`);
        }
      })
    );

  program
    .command('list')
    .argument('[database]', 'database to list', ALL_DATABASES)
    .description('list backups; indices are valid for the database they were listed for')
    .action(
      withManager(async ({ manager }, database: string) => {
        await manager.list(database, true);
      })
    );

  program
    .command('download')
    .argument('<index>', 'INDEX:DATABASE as printed by list')
    .description('download the backup specified by index')
    .action(
      withManager(async ({ manager }, index: string) => {
        const result = await manager.download(index);
        process.stdout.write('\n');
        console.log(`finished: ${result.filePath}`);
      })
    );

  program
    .command('restore')
    .argument('<index>', 'INDEX:DATABASE as printed by list')
    .description('download and apply the backup. WARNING! overwrites the current database')
    .action(
      withManager(async ({ manager }, index: string) => {
        const result = await manager.restore(index);
        process.stdout.write('\n');
        console.log(`restored ${result.database} from ${result.filePath}`);
      })
    );

  program
    .command('clone')
    .argument('<database>', 'database whose newest backup is cloned into its _staging name')
    .description('clone the newest backup of a database into staging')
    .action(
      withManager(async ({ manager }, database: string) => {
        const result = await manager.clone(database);
        process.stdout.write('\n');
        console.log(`cloned ${result.source} into ${result.targetDatabase}`);
      })
    );

  program
    .command('cleanup')
    .description('delete backups outside the retention window')
    .action(
      withManager(async ({ manager }) => {
        const result = await manager.cleanup();
        console.log(`deleted ${result.deletedCount} of ${result.totalCount} backup(s)`);
      })
    );

  program
    .command('schedule')
    .option('--run-now', 'run a backup immediately on start')
    .description('run backup and cleanup on BACKUP_INTERVAL until stopped')
    .action(
      withManager(async ({ app }, options: { runNow?: boolean }) => {
        app.setupSignalHandlers();
        await app.startScheduler(options.runNow ?? false);
      })
    );

  return program;
}

async function main(argv: string[]): Promise<void> {
  dotenv.config();
  await buildProgram().parseAsync(argv);
}

if (require.main === module) {
  main(process.argv).catch(error => {
    if (error instanceof ConfigurationError) {
      console.error(`Configuration error: ${error.message}`);
    } else {
      console.error(`db-backup failed: ${formatError(error)}`);
    }
    process.exit(1);
  });
}

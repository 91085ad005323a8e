import { Readable, Writable } from 'stream';
import { pipeline } from 'stream/promises';
import { createGzip } from 'zlib';
import { BackupConfig } from '../interfaces/BackupConfig';
import { DatabaseEngine } from '../interfaces/DatabaseEngine';
import { Logger } from '../interfaces/Logger';
import { toError } from '../utils/errorUtils';
import { runProcess, runProcessWithGzipInput } from './ProcessRunner';

export type MySQLConnectionConfig = Pick<BackupConfig, 'dbUser' | 'dbPassword' | 'dbHost' | 'dbPort'>;

function quoteIdentifier(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``;
}

function quoteLiteral(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "''")}'`;
}

/**
 * MySQL adapter driving mysqldump and the mysql client.
 *
 * Dumps use --single-transaction unless the schema holds a MyISAM table, which
 * a consistent snapshot cannot cover.
 */
export class MySQLEngine implements DatabaseEngine {
  readonly name = 'mysql';
  private connection: MySQLConnectionConfig;
  private logger: Logger;

  constructor(connection: MySQLConnectionConfig, logger: Logger) {
    this.connection = connection;
    this.logger = logger;
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.query('SELECT 1', 'connection');
      return true;
    } catch (error) {
      this.logger.error('MySQL connection test failed', toError(error));
      return false;
    }
  }

  async hasMyISAMTables(database: string): Promise<boolean> {
    const output = await this.query(
      `SELECT 1 FROM information_schema.tables WHERE table_schema=${quoteLiteral(database)} AND engine='MyISAM' LIMIT 1;`,
      'dump'
    );
    return output.trim() === '1';
  }

  async dumpDatabase(database: string, output: Writable): Promise<void> {
    const singleTransaction = !(await this.hasMyISAMTables(database));
    const gzip = createGzip();
    this.logger.debug('Executing mysqldump', { database, singleTransaction });

    await Promise.all([
      runProcess('mysqldump', this.dumpArgs(database, singleTransaction), {
        operation: 'dump',
        env: this.processEnv(),
        stdout: gzip,
      }),
      pipeline(gzip, output),
    ]);
  }

  async restoreDatabase(database: string, input: Readable): Promise<void> {
    this.logger.debug('Executing mysql restore', { database });

    await runProcessWithGzipInput(
      'mysql',
      [...this.connectionArgs(), database],
      { operation: 'restore', env: this.processEnv() },
      input
    );
  }

  async cloneDatabase(targetDatabase: string, input: Readable): Promise<void> {
    const identifier = quoteIdentifier(targetDatabase);
    await this.query(`DROP DATABASE IF EXISTS ${identifier}; CREATE DATABASE ${identifier};`, 'clone');
    await this.restoreDatabase(targetDatabase, input);
  }

  dumpArgs(database: string, singleTransaction: boolean): string[] {
    const args = [...this.connectionArgs()];
    if (singleTransaction) {
      args.push('--single-transaction');
    }
    args.push(database);
    return args;
  }

  private query(sql: string, operation: string): Promise<string> {
    return runProcess('mysql', [...this.connectionArgs(), '-N', '-e', sql], {
      operation,
      env: this.processEnv(),
    });
  }

  private connectionArgs(): string[] {
    const args = [`--user=${this.connection.dbUser}`];
    if (this.connection.dbHost) {
      args.push(`--host=${this.connection.dbHost}`);
    }
    if (this.connection.dbPort) {
      args.push(`--port=${this.connection.dbPort}`);
    }
    return args;
  }

  // MYSQL_PWD keeps the password out of the process list
  private processEnv(): Record<string, string> {
    return this.connection.dbPassword ? { MYSQL_PWD: this.connection.dbPassword } : {};
  }
}

import { Client, ClientConfig } from 'pg';
import { Readable, Writable } from 'stream';
import { pipeline } from 'stream/promises';
import { createGzip } from 'zlib';
import { BackupConfig } from '../interfaces/BackupConfig';
import { DatabaseEngine } from '../interfaces/DatabaseEngine';
import { Logger } from '../interfaces/Logger';
import { formatError, toError } from '../utils/errorUtils';
import { EngineFailureError, runProcess, runProcessWithGzipInput } from './ProcessRunner';

export type PostgreSQLConnectionConfig = Pick<BackupConfig, 'dbUser' | 'dbPassword' | 'dbHost' | 'dbPort'>;

const MAINTENANCE_DATABASE = 'postgres';

/**
 * PostgreSQL adapter: pg_dump and psql as subprocesses, gzip in process,
 * DROP/CREATE DATABASE through a pg client on the maintenance database
 */
export class PostgreSQLEngine implements DatabaseEngine {
  readonly name = 'postgresql';
  private connection: PostgreSQLConnectionConfig;
  private logger: Logger;

  constructor(connection: PostgreSQLConnectionConfig, logger: Logger) {
    this.connection = connection;
    this.logger = logger;
  }

  async testConnection(): Promise<boolean> {
    const client = this.createClient();

    try {
      await client.connect();
      await client.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.error('PostgreSQL connection test failed', toError(error));
      return false;
    } finally {
      await client.end().catch(cleanupError => {
        this.logger.warn(`Failed to close database connection during cleanup: ${formatError(cleanupError)}`);
      });
    }
  }

  async dumpDatabase(database: string, output: Writable): Promise<void> {
    const gzip = createGzip();
    this.logger.debug('Executing pg_dump', { database });

    await Promise.all([
      runProcess('pg_dump', this.dumpArgs(database), {
        operation: 'dump',
        env: this.processEnv(),
        stdout: gzip,
      }),
      pipeline(gzip, output),
    ]);
  }

  async restoreDatabase(database: string, input: Readable): Promise<void> {
    this.logger.debug('Executing psql restore', { database });

    await runProcessWithGzipInput(
      'psql',
      this.restoreArgs(database),
      { operation: 'restore', env: this.processEnv() },
      input
    );
  }

  async cloneDatabase(targetDatabase: string, input: Readable): Promise<void> {
    const client = this.createClient();

    try {
      await client.connect();
      const identifier = client.escapeIdentifier(targetDatabase);
      await client.query(`DROP DATABASE IF EXISTS ${identifier}`);
      await client.query(`CREATE DATABASE ${identifier}`);
    } catch (error) {
      throw new EngineFailureError(
        `Failed to recreate database ${targetDatabase}: ${formatError(error)}`,
        'clone',
        undefined,
        toError(error)
      );
    } finally {
      await client.end().catch(cleanupError => {
        this.logger.warn(`Failed to close database connection during cleanup: ${formatError(cleanupError)}`);
      });
    }

    await this.restoreDatabase(targetDatabase, input);
  }

  dumpArgs(database: string): string[] {
    return [
      ...this.connectionArgs(),
      '--no-password',
      '--no-owner',
      '--no-acl',
      '--clean',
      '--if-exists',
      '--format=plain',
      database,
    ];
  }

  restoreArgs(database: string): string[] {
    return [
      ...this.connectionArgs(),
      '--no-password',
      '--quiet',
      '--set',
      'ON_ERROR_STOP=1',
      '--dbname',
      database,
    ];
  }

  private connectionArgs(): string[] {
    const args = ['--username', this.connection.dbUser];
    if (this.connection.dbHost) {
      args.push('--host', this.connection.dbHost);
    }
    if (this.connection.dbPort) {
      args.push('--port', String(this.connection.dbPort));
    }
    return args;
  }

  private processEnv(): Record<string, string> {
    return this.connection.dbPassword ? { PGPASSWORD: this.connection.dbPassword } : {};
  }

  private createClient(): Client {
    const clientConfig: ClientConfig = {
      user: this.connection.dbUser,
      password: this.connection.dbPassword,
      host: this.connection.dbHost,
      port: this.connection.dbPort,
      database: MAINTENANCE_DATABASE,
    };
    return new Client(clientConfig);
  }
}

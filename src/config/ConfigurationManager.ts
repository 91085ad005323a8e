import { createHash } from 'crypto';
import { existsSync, readFileSync } from 'fs';
import { tmpdir } from 'os';
import { validate as validateCron } from 'node-cron';
import { parse as parseYaml } from 'yaml';
import { BackupConfig } from '../interfaces/BackupConfig';
import { LogLevel } from '../interfaces/Logger';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export interface ConfigurationOptions {
  /** Config file given on the command line */
  configPath?: string;

  /** Environment given on the command line (--from) */
  environment?: string;

  /** Engine given on the command line */
  engine?: string;

  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;

  /** Default download directory; defaults to process.cwd() */
  cwd?: string;
}

type RawValues = Record<string, unknown>;

const DEFAULT_ENGINE = 'postgresql';
const DEFAULT_REGION = 'us-east-1';

/**
 * Loads configuration from an optional YAML file and environment variables.
 *
 * Precedence: command-line options, then environment variables, then the file.
 * The file path is `--config`, else BACKUP_CONFIG, else
 * `/etc/.<engine>.backups.yml` when that file exists.
 */
export class ConfigurationManager {
  static loadConfiguration(options: ConfigurationOptions = {}): BackupConfig {
    const env = options.env ?? process.env;
    const explicitPath = options.configPath ?? nonEmpty(env.BACKUP_CONFIG);

    const preliminaryEngine = options.engine ?? nonEmpty(env.DATABASE_ENGINE);
    const file = ConfigurationManager.loadFile(
      explicitPath ?? ConfigurationManager.defaultConfigPath(preliminaryEngine ?? DEFAULT_ENGINE),
      explicitPath !== undefined
    );

    const engine = preliminaryEngine ?? readString(file, 'engine') ?? DEFAULT_ENGINE;
    const s3AccessKey =
      nonEmpty(env.S3_ACCESS_KEY) ?? readString(file, 's3_access_key') ?? readString(file, 'aws_secret_id');
    const s3SecretKey =
      nonEmpty(env.S3_SECRET_KEY) ?? readString(file, 's3_secret_key') ?? readString(file, 'aws_secret_key');
    const environment = options.environment ?? nonEmpty(env.BACKUP_ENVIRONMENT) ?? readString(file, 'env');
    const databases = parseDatabases(nonEmpty(env.BACKUP_DATABASES) ?? file.databases);
    const rawKeep = nonEmpty(env.BACKUP_KEEP) ?? readString(file, 'keep');
    const dbUser = nonEmpty(env.DB_USER) ?? readString(file, 'dbuser');

    const missing: string[] = [];
    if (!s3AccessKey) missing.push('S3_ACCESS_KEY');
    if (!s3SecretKey) missing.push('S3_SECRET_KEY');
    if (!environment) missing.push('BACKUP_ENVIRONMENT');
    if (databases.length === 0) missing.push('BACKUP_DATABASES');
    if (!rawKeep) missing.push('BACKUP_KEEP');
    if (!dbUser) missing.push('DB_USER');

    if (missing.length > 0 || !s3AccessKey || !s3SecretKey || !environment || !rawKeep || !dbUser) {
      throw new ConfigurationError(`Missing required configuration: ${missing.join(', ')}`, missing[0]);
    }

    const keep = parseInteger(rawKeep, 'BACKUP_KEEP', 1);
    const rawPort = nonEmpty(env.DB_PORT) ?? readString(file, 'dbport');
    const backupInterval = nonEmpty(env.BACKUP_INTERVAL) ?? readString(file, 'backup_interval');
    const logLevel = (nonEmpty(env.LOG_LEVEL) ?? readString(file, 'log_level') ?? LogLevel.INFO).toLowerCase();

    if (backupInterval !== undefined && !validateCron(backupInterval)) {
      throw new ConfigurationError(
        `Invalid cron expression: ${backupInterval}. Expected format: "minute hour day month day-of-week"`,
        'BACKUP_INTERVAL'
      );
    }

    if (!Object.values(LogLevel).some(level => level === logLevel)) {
      throw new ConfigurationError(
        `LOG_LEVEL must be one of ${Object.values(LogLevel).join(', ')} (got ${logLevel})`,
        'LOG_LEVEL'
      );
    }

    const config: BackupConfig = {
      environment,
      databases,
      keep,
      engine,
      s3Bucket:
        nonEmpty(env.S3_BUCKET) ?? readString(file, 's3_bucket') ?? ConfigurationManager.deriveBucketName(s3AccessKey),
      s3Region: nonEmpty(env.S3_REGION) ?? readString(file, 's3_region') ?? DEFAULT_REGION,
      s3AccessKey,
      s3SecretKey,
      dbUser,
      tempDir: nonEmpty(env.BACKUP_TEMP_DIR) ?? readString(file, 'temp_dir') ?? tmpdir(),
      downloadDir: nonEmpty(env.BACKUP_DOWNLOAD_DIR) ?? readString(file, 'download_dir') ?? options.cwd ?? process.cwd(),
      logLevel,
    };

    // Add optional properties only if they exist
    const s3Url = nonEmpty(env.S3_URL) ?? readString(file, 's3_url');
    if (s3Url) {
      config.s3Url = s3Url;
    }
    const dbPassword = nonEmpty(env.DB_PASSWORD) ?? readString(file, 'dbpass');
    if (dbPassword) {
      config.dbPassword = dbPassword;
    }
    const dbHost = nonEmpty(env.DB_HOST) ?? readString(file, 'dbhost');
    if (dbHost) {
      config.dbHost = dbHost;
    }
    if (rawPort) {
      config.dbPort = parseInteger(rawPort, 'DB_PORT', 1, 65535);
    }
    if (backupInterval) {
      config.backupInterval = backupInterval;
    }

    return config;
  }

  static defaultConfigPath(engine: string): string {
    return `/etc/.${engine}.backups.yml`;
  }

  /**
   * Bucket used when none is configured: one per access key, as the
   * archives written by earlier versions of the tool expect
   */
  static deriveBucketName(accessKey: string): string {
    return `ey-backup-${createHash('sha1').update(accessKey).digest('hex').substring(0, 12)}`;
  }

  static sanitizeForLogging(config: BackupConfig): Record<string, unknown> {
    return {
      ...config,
      s3AccessKey: '[REDACTED]',
      s3SecretKey: '[REDACTED]',
      ...(config.dbPassword !== undefined && { dbPassword: '[REDACTED]' }),
    };
  }

  private static loadFile(path: string, required: boolean): RawValues {
    if (!existsSync(path)) {
      if (required) {
        throw new ConfigurationError(`You need to have a backup config file at ${path}`, 'BACKUP_CONFIG');
      }
      return {};
    }

    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf8'));
    } catch (error) {
      throw new ConfigurationError(
        `Failed to parse config file ${path}: ${error instanceof Error ? error.message : String(error)}`,
        'BACKUP_CONFIG'
      );
    }

    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new ConfigurationError(`Config file ${path} must contain a mapping`, 'BACKUP_CONFIG');
    }

    // Symbol-style keys (":keep:") parse as ":keep"
    const values: RawValues = {};
    for (const [key, value] of Object.entries(parsed)) {
      values[key.replace(/^:/, '')] = value;
    }
    return values;
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function readString(values: RawValues, key: string): string | undefined {
  const value = values[key];
  if (typeof value === 'number') {
    return String(value);
  }
  return typeof value === 'string' ? nonEmpty(value) : undefined;
}

function parseDatabases(value: unknown): string[] {
  const items = typeof value === 'string' ? value.split(',') : Array.isArray(value) ? value : [];
  return items
    .filter((item): item is string => typeof item === 'string')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

function parseInteger(raw: string, field: string, min: number, max: number = Number.MAX_SAFE_INTEGER): number {
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `between ${min} and ${max}`;
    throw new ConfigurationError(`${field} must be an integer ${range} (got ${raw})`, field);
  }
  return parsed;
}

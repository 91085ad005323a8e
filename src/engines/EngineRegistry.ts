import { BackupConfig } from '../interfaces/BackupConfig';
import { DatabaseEngine, DatabaseEngineFactory } from '../interfaces/DatabaseEngine';
import { Logger } from '../interfaces/Logger';
import { ConfigurationError } from '../config/ConfigurationManager';
import { MySQLEngine } from './MySQLEngine';
import { PostgreSQLEngine } from './PostgreSQLEngine';

/**
 * Engine factories keyed by name, assembled once at start-up
 */
export class EngineRegistry {
  private factories: ReadonlyMap<string, DatabaseEngineFactory>;

  constructor(factories: Record<string, DatabaseEngineFactory>) {
    this.factories = new Map(Object.entries(factories));
  }

  names(): string[] {
    return [...this.factories.keys()];
  }

  create(config: BackupConfig): DatabaseEngine {
    const factory = this.factories.get(config.engine);
    if (!factory) {
      throw new ConfigurationError(
        `Invalid database engine: "${config.engine}". Available engines: ${this.names().join(', ')}`,
        'engine'
      );
    }
    return factory(config);
  }
}

/**
 * Registry with every engine shipped in this package
 */
export function createDefaultEngineRegistry(logger: Logger): EngineRegistry {
  return new EngineRegistry({
    postgresql: config => new PostgreSQLEngine(config, logger),
    mysql: config => new MySQLEngine(config, logger),
  });
}

import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { gunzipSync } from 'zlib';
import { BackupCatalog } from '../src/clients/BackupCatalog';
import { BackupManager } from '../src/clients/BackupManager';
import { BackupNotFoundError, BackupResolver } from '../src/clients/BackupResolver';
import { RetentionManager } from '../src/clients/RetentionManager';
import { TransferManager } from '../src/clients/TransferManager';
import { BackupConfig } from '../src/interfaces/BackupConfig';
import { FakeEngine, InMemoryS3Client, createMockLogger, createTestConfig } from './helpers/mocks';

describe('Backup lifecycle', () => {
  let workDir: string;
  let config: BackupConfig;
  let store: InMemoryS3Client;
  let engine: FakeEngine;
  let output: jest.Mock;
  let manager: BackupManager;
  let runTime: number;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'lifecycle-test-'));
    config = createTestConfig({
      environment: 'prod_br',
      databases: ['app_production', 'events'],
      keep: 2,
      tempDir: join(workDir, 'tmp'),
      downloadDir: join(workDir, 'downloads'),
    });

    let uploads = 0;
    store = new InMemoryS3Client(() => new Date(Date.UTC(2024, 0, 15, 0, 0, uploads++)));
    engine = new FakeEngine();
    output = jest.fn();
    runTime = Date.UTC(2024, 0, 15, 2, 0, 0);

    const logger = createMockLogger();
    const catalog = new BackupCatalog(store, config, logger, output);
    const resolver = new BackupResolver(catalog);
    const transfer = new TransferManager(store, config.downloadDir, logger);
    const retention = new RetentionManager(catalog, store, config, logger);

    manager = new BackupManager(
      { engine, s3Client: store, catalog, resolver, transfer, retention, logger, clock: () => new Date(runTime) },
      config
    );
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  async function runBackups(count: number): Promise<void> {
    for (let i = 0; i < count; i++) {
      await manager.backupAll();
      runTime += 24 * 60 * 60 * 1000;
    }
  }

  it('should store every database of a run under the same timestamp', async () => {
    await runBackups(1);

    expect([...store.objects.keys()]).toEqual([
      'prod_br.app_production/app_production.2024-01-15T02-00-00.sql.gz',
      'prod_br.events/events.2024-01-15T02-00-00.sql.gz',
    ]);
  });

  it('should list what was backed up with resolvable indices', async () => {
    await runBackups(2);

    await manager.list('events', true);
    const downloaded = await manager.download('1:events');

    expect(output.mock.calls.map(call => call[0])).toEqual([
      'Listing database backups for events',
      '2 backup(s) found',
      '0:events events.2024-01-15T02-00-00.sql.gz',
      '1:events events.2024-01-16T02-00-00.sql.gz',
    ]);
    expect(downloaded.filePath).toBe(join(config.downloadDir, 'events.2024-01-16T02-00-00.sql.gz'));
    expect(gunzipSync(readFileSync(downloaded.filePath)).toString()).toBe('-- dump of events\n');
  });

  it('should clone the newest production backup into staging', async () => {
    await runBackups(2);

    const result = await manager.clone('app_production');

    expect(result).toEqual({
      source: '1:app_production',
      targetDatabase: 'app_staging',
      filePath: join(config.downloadDir, 'app_production.2024-01-16T02-00-00.sql.gz'),
    });
    expect(engine.cloned).toEqual([{ database: 'app_staging', content: '-- dump of app_production\n' }]);
  });

  it('should restore a backup over its own database', async () => {
    await runBackups(1);

    await manager.restore('0:app_production');

    expect(engine.restored).toEqual([{ database: 'app_production', content: '-- dump of app_production\n' }]);
  });

  it('should prune everything older than keep runs', async () => {
    await runBackups(3);

    const result = await manager.cleanup();

    expect(result.deletedKeys).toEqual([
      'prod_br.app_production/app_production.2024-01-15T02-00-00.sql.gz',
      'prod_br.events/events.2024-01-15T02-00-00.sql.gz',
    ]);
    expect(await manager.list('all')).toHaveLength(4);
    await expect(manager.cleanup()).resolves.toMatchObject({ deletedCount: 0 });
  });

  it('should report a missing backup', async () => {
    await expect(manager.download('0:app_production')).rejects.toThrow(BackupNotFoundError);
  });
});

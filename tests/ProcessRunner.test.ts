import { Readable, Writable } from 'stream';
import { EngineFailureError, analyzeExitError, analyzeSpawnError, runProcess } from '../src/engines/ProcessRunner';
import { FakeChild, FakeChildOptions, createFakeChild } from './helpers/mocks';

const mockSpawn = jest.fn();

jest.mock('child_process', () => ({
  spawn: (...args: unknown[]) => mockSpawn(...args),
}));

function spawnReturns(options: FakeChildOptions): () => FakeChild | undefined {
  let child: FakeChild | undefined;
  mockSpawn.mockImplementationOnce(() => {
    child = createFakeChild(options);
    return child.process;
  });
  return () => child;
}

function collector(): { stream: Writable; text: () => string } {
  const chunks: Buffer[] = [];
  return {
    stream: new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
    }),
    text: () => Buffer.concat(chunks).toString(),
  };
}

describe('runProcess', () => {
  beforeEach(() => {
    mockSpawn.mockReset();
  });

  it('should return captured stdout on a clean exit', async () => {
    spawnReturns({ stdout: '1\n' });

    await expect(runProcess('mysql', ['-e', 'SELECT 1'], { operation: 'connection' })).resolves.toBe('1\n');
  });

  it('should merge extra variables over the process environment', async () => {
    spawnReturns({});

    await runProcess('pg_dump', ['db'], { operation: 'dump', env: { PGPASSWORD: 'test-secret' } });

    expect(mockSpawn).toHaveBeenCalledWith('pg_dump', ['db'], {
      env: expect.objectContaining({ PGPASSWORD: 'test-secret' }),
    });
  });

  it('should stream stdout into the given writable', async () => {
    spawnReturns({ stdout: '-- dump' });
    const output = collector();

    await expect(runProcess('pg_dump', ['db'], { operation: 'dump', stdout: output.stream })).resolves.toBe('');
    expect(output.text()).toBe('-- dump');
  });

  it('should stream the given readable into stdin', async () => {
    const child = spawnReturns({ waitForStdin: true });

    await runProcess('psql', ['--dbname', 'db'], { operation: 'restore', stdin: Readable.from(['SELECT 1;\n']) });

    expect(child()?.stdinText()).toBe('SELECT 1;\n');
  });

  it('should raise EngineFailureError with the exit code on a non-zero exit', async () => {
    spawnReturns({ exitCode: 2, stderr: 'pg_dump: error: something broke\n' });

    const error = await runProcess('pg_dump', ['db'], { operation: 'dump' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EngineFailureError);
    expect(error).toMatchObject({
      operation: 'dump',
      exitCode: 2,
      message: 'pg_dump failed with exit code 2. Error details: pg_dump: error: something broke',
    });
  });

  it('should explain a missing tool', async () => {
    spawnReturns({ spawnError: new Error('spawn mysqldump ENOENT') });

    await expect(runProcess('mysqldump', ['db'], { operation: 'dump' })).rejects.toThrow(
      'mysqldump command not found. Please ensure the database client tools are installed.'
    );
  });

  it('should fail when a pipe fails', async () => {
    spawnReturns({ waitForStdin: true });
    async function* broken() {
      yield 'SELECT';
      throw new Error('read failed');
    }

    await expect(
      runProcess('psql', ['db'], { operation: 'restore', stdin: Readable.from(broken()) })
    ).rejects.toThrow('psql stream failed: Error: read failed');
  });
});

describe('analyzeExitError', () => {
  it('should recognise authentication failures', () => {
    expect(analyzeExitError('pg_dump', 1, 'FATAL: password authentication failed for user "backup"')).toBe(
      'pg_dump authentication failed (exit code 1). Please check database credentials.'
    );
    expect(analyzeExitError('mysqldump', 2, "Access denied for user 'root'@'localhost'")).toBe(
      'mysqldump authentication failed (exit code 2). Please check database credentials.'
    );
  });

  it('should recognise a missing database', () => {
    expect(analyzeExitError('pg_dump', 1, 'FATAL: database "nope" does not exist')).toBe(
      'pg_dump failed: database does not exist (exit code 1).'
    );
    expect(analyzeExitError('mysqldump', 2, "Got error: 1049: Unknown database 'nope'")).toBe(
      'mysqldump failed: database does not exist (exit code 2).'
    );
  });

  it('should recognise permission and connection problems', () => {
    expect(analyzeExitError('psql', 1, 'ERROR: permission denied for table x')).toBe(
      'psql failed: insufficient permissions (exit code 1).'
    );
    expect(analyzeExitError('psql', 2, 'connection to server failed: Connection refused')).toBe(
      'psql failed: unable to connect to database server (exit code 2). Please check connection settings.'
    );
  });

  it('should say when there is no stderr', () => {
    expect(analyzeExitError('psql', 3, '  ')).toBe(
      'psql failed with exit code 3. Error details: No additional error information available'
    );
  });
});

describe('analyzeSpawnError', () => {
  it('should recognise permission errors', () => {
    expect(analyzeSpawnError('pg_dump', new Error('spawn pg_dump EACCES'))).toBe(
      'Permission denied executing pg_dump. Please check file permissions.'
    );
  });

  it('should fall back to the error message', () => {
    expect(analyzeSpawnError('pg_dump', new Error('boom'))).toBe('Failed to execute pg_dump: boom');
  });
});

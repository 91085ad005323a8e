import { spawn } from 'child_process';
import { Readable, Writable } from 'stream';
import { pipeline } from 'stream/promises';
import { createGunzip } from 'zlib';
import { OperationError } from '../utils/OperationError';
import { formatError, toError } from '../utils/errorUtils';

/**
 * A dump, restore or clone tool exited badly or could not be started
 */
export class EngineFailureError extends OperationError {
  constructor(
    message: string,
    operation: string,
    public readonly exitCode?: number,
    cause?: Error
  ) {
    super(message, operation, cause);
    this.name = 'EngineFailureError';
  }
}

export interface ProcessOptions {
  /** Operation name carried by failures (dump, restore, clone...) */
  operation: string;

  /** Extra environment merged over process.env */
  env?: Record<string, string>;

  /** Streamed into the child's stdin; stdin is closed immediately when absent */
  stdin?: Readable;

  /** Receives the child's stdout; stdout is captured and returned when absent */
  stdout?: Writable;

  /** Kill the child with SIGTERM after this many milliseconds */
  timeoutMs?: number;
}

/**
 * Run a command with its stdio wired to streams.
 *
 * Resolves with captured stdout (empty when `stdout` is given) once the child
 * exited 0 and every pipe drained.
 */
export async function runProcess(command: string, args: string[], options: ProcessOptions): Promise<string> {
  const child = spawn(command, args, {
    env: { ...process.env, ...options.env },
  });

  let stdout = '';
  let stderr = '';
  let timedOut = false;

  child.stderr.on('data', (data: Buffer) => {
    stderr += data.toString();
  });

  const pipes: Promise<void>[] = [];

  if (options.stdout) {
    pipes.push(pipeline(child.stdout, options.stdout));
  } else {
    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
  }

  if (options.stdin) {
    pipes.push(pipeline(options.stdin, child.stdin));
  } else {
    child.stdin.end();
  }

  const exit = new Promise<number>((resolve, reject) => {
    child.once('error', reject);
    child.once('close', code => resolve(code ?? -1));
  });

  const timer = options.timeoutMs
    ? setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
      }, options.timeoutMs)
    : undefined;

  try {
    const [exitResult, ...pipeResults] = await Promise.allSettled([exit, ...pipes]);

    if (exitResult.status === 'rejected') {
      const spawnError = toError(exitResult.reason) ?? new Error(String(exitResult.reason));
      throw new EngineFailureError(
        analyzeSpawnError(command, spawnError),
        options.operation,
        undefined,
        spawnError
      );
    }

    if (timedOut) {
      throw new EngineFailureError(
        `${command} timed out after ${options.timeoutMs}ms`,
        options.operation,
        exitResult.value
      );
    }

    if (exitResult.value !== 0) {
      throw new EngineFailureError(
        analyzeExitError(command, exitResult.value, stderr),
        options.operation,
        exitResult.value
      );
    }

    for (const result of pipeResults) {
      if (result.status === 'rejected') {
        throw new EngineFailureError(
          `${command} stream failed: ${formatError(result.reason)}`,
          options.operation,
          0,
          toError(result.reason)
        );
      }
    }

    return stdout;
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

/**
 * Run a command with a gzip-compressed input decompressed into its stdin.
 *
 * The command's own failure wins over the broken pipe it leaves behind on the
 * input side; input or decompression errors on a clean exit are reported as
 * EngineFailureError too.
 */
export async function runProcessWithGzipInput(
  command: string,
  args: string[],
  options: Omit<ProcessOptions, 'stdin'>,
  input: Readable
): Promise<string> {
  const gunzip = createGunzip();

  const [processResult, inputResult] = await Promise.allSettled([
    runProcess(command, args, { ...options, stdin: gunzip }),
    pipeline(input, gunzip),
  ]);

  if (processResult.status === 'rejected') {
    throw processResult.reason;
  }

  if (inputResult.status === 'rejected') {
    throw new EngineFailureError(
      `${command} input failed: ${formatError(inputResult.reason)}`,
      options.operation,
      0,
      toError(inputResult.reason)
    );
  }

  return processResult.value;
}

/**
 * Analyze a non-zero exit and provide a helpful message
 */
export function analyzeExitError(command: string, exitCode: number, stderr: string): string {
  const lowerStderr = stderr.toLowerCase();

  if (lowerStderr.includes('authentication failed') || lowerStderr.includes('access denied for user')) {
    return `${command} authentication failed (exit code ${exitCode}). Please check database credentials.`;
  }

  if (
    (lowerStderr.includes('database') && lowerStderr.includes('does not exist')) ||
    lowerStderr.includes('unknown database')
  ) {
    return `${command} failed: database does not exist (exit code ${exitCode}).`;
  }

  if (lowerStderr.includes('permission denied')) {
    return `${command} failed: insufficient permissions (exit code ${exitCode}).`;
  }

  if (lowerStderr.includes('connection') && (lowerStderr.includes('refused') || lowerStderr.includes('timeout'))) {
    return `${command} failed: unable to connect to database server (exit code ${exitCode}). Please check connection settings.`;
  }

  if (lowerStderr.includes('no space left on device')) {
    return `${command} failed: insufficient disk space (exit code ${exitCode}).`;
  }

  const errorContext = stderr.trim() || 'No additional error information available';
  return `${command} failed with exit code ${exitCode}. Error details: ${errorContext}`;
}

/**
 * Analyze spawn errors
 */
export function analyzeSpawnError(command: string, error: Error): string {
  const errorMessage = error.message.toLowerCase();

  if (errorMessage.includes('enoent')) {
    return `${command} command not found. Please ensure the database client tools are installed.`;
  }

  if (errorMessage.includes('eacces')) {
    return `Permission denied executing ${command}. Please check file permissions.`;
  }

  return `Failed to execute ${command}: ${error.message}`;
}

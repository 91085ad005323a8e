/**
 * Format error for consistent logging
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Read a string-valued property (code, Code, syscall...) from an unknown error
 */
export function getErrorString(error: unknown, property: string): string | undefined {
  if (typeof error !== 'object' || error === null || !(property in error)) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, property);
  return typeof value === 'string' ? value : undefined;
}

/**
 * HTTP status reported by an AWS SDK v3 error, if any
 */
export function getHttpStatusCode(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('$metadata' in error)) {
    return undefined;
  }
  const metadata: unknown = Reflect.get(error, '$metadata');
  if (typeof metadata !== 'object' || metadata === null || !('httpStatusCode' in metadata)) {
    return undefined;
  }
  const status: unknown = Reflect.get(metadata, 'httpStatusCode');
  return typeof status === 'number' ? status : undefined;
}

export function toError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

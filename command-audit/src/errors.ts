/**
 * A configured input (source or docs file) does not exist or cannot be read
 */
export class InputNotFoundError extends Error {
  constructor(
    public filePath: string,
    public kind: 'source' | 'docs',
    options?: { cause?: unknown }
  ) {
    super(`${kind === 'source' ? 'Source' : 'Docs'} file not found or unreadable: ${filePath}`, options);
    this.name = 'InputNotFoundError';
  }
}

/**
 * The report could not be created or written
 */
export class OutputWriteError extends Error {
  constructor(
    public outputPath: string,
    options?: { cause?: unknown }
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to write report to ${outputPath}${reason}`, options);
    this.name = 'OutputWriteError';
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Input ended before a valid answer was given
 */
export class PromptClosedError extends Error {
  constructor(
    public question: string,
    options?: { cause?: unknown }
  ) {
    super(`Input closed before answering: ${question}`, options);
    this.name = 'PromptClosedError';
  }
}

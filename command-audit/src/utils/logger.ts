import chalk from 'chalk';

type Channel = 'log' | 'warn' | 'error';

export class Logger {
  private debugEnabled = false;
  private silent = false;

  enableDebug(): void {
    this.debugEnabled = true;
  }

  /** Suppress all output (used by tests) */
  setSilent(silent: boolean): void {
    this.silent = silent;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.debugEnabled) {
      this.write('log', chalk.gray(`[DEBUG] ${message}`), args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    this.write('log', chalk.blue(`[INFO] ${message}`), args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', chalk.yellow(`[WARN] ${message}`), args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', chalk.red(`[ERROR] ${message}`), args);
  }

  success(message: string, ...args: unknown[]): void {
    this.write('log', chalk.green(`[SUCCESS] ${message}`), args);
  }

  /**
   * Logs a caught error by its message. In debug mode every `cause` beneath it
   * follows on its own line, e.g. the errno behind an InputNotFoundError.
   */
  failure(message: string, error: unknown): void {
    this.error(message, describeError(error));

    if (this.debugEnabled) {
      for (const cause of causeChain(error)) {
        this.write('error', chalk.gray(`  caused by: ${describeError(cause)}`), []);
      }
    }
  }

  private write(channel: Channel, line: string, args: unknown[]): void {
    if (this.silent) return;
    console[channel](line, ...args);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The errors an error was caused by, nearest first
 */
export function causeChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  const seen = new Set<unknown>([error]);
  let current = error instanceof Error ? error.cause : undefined;

  while (current !== undefined && !seen.has(current)) {
    chain.push(current);
    seen.add(current);
    current = current instanceof Error ? current.cause : undefined;
  }

  return chain;
}

export const logger = new Logger();

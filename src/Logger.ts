/**
 * Console logger gated by the CLI verbosity:
 * 0 = silent, 1 = normal, 2 = verbose.
 */
export class Logger {
  private readonly warned = new Set<string>();

  constructor(readonly verbosity: number = 1) {}

  verbose(...args: unknown[]): void {
    if (this.verbosity > 1) console.log(...args);
  }

  info(...args: unknown[]): void {
    if (this.verbosity > 0) console.log(...args);
  }

  warn(...args: unknown[]): void {
    if (this.verbosity > 0) console.warn("Warning:", ...args);
  }

  /** Warns the first time `key` is seen in this session. */
  warnOnce(key: string, ...args: unknown[]): void {
    if (this.warned.has(key)) return;
    this.warned.add(key);
    this.warn(...args);
  }

  error(...args: unknown[]): void {
    console.error(...args);
  }
}

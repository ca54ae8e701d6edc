import type { Logger } from './types';

/**
 * Logger that writes to console.debug, console.info, console.warn and console.error.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly prefix?: string) {}

  debug(message: string, meta?: unknown): void {
    console.debug(this.format(message), ...metaArgs(meta));
  }

  info(message: string, meta?: unknown): void {
    console.info(this.format(message), ...metaArgs(meta));
  }

  warn(message: string, meta?: unknown): void {
    console.warn(this.format(message), ...metaArgs(meta));
  }

  error(message: string, meta?: unknown): void {
    console.error(this.format(message), ...metaArgs(meta));
  }

  private format(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }
}

function metaArgs(meta: unknown): unknown[] {
  return meta === undefined ? [] : [meta];
}

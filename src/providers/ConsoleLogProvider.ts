/**
 * Log provider that keeps every accepted event in `events` and, when asked,
 * prints it as a single `[LEVEL] message {fields}` line.
 * The default provider of the container; tests read `events` directly.
 */

import { LOG_LEVELS, type ILogProvider, type LogEvent, type LogLevel } from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Print each accepted event with console.log. Default: false. */
  outputToConsole?: boolean;
  /** Lowest level kept; anything below is ignored. Default: 'debug'. */
  minLevel?: LogLevel;
}

export class ConsoleLogProvider implements ILogProvider {
  /** Accepted events, oldest first. */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly minRank: number;

  constructor(options?: ConsoleLogProviderOptions) {
    this.outputToConsole = options?.outputToConsole ?? false;
    this.minRank = LOG_LEVELS.indexOf(options?.minLevel ?? 'debug');
  }

  log(event: LogEvent): void {
    if (LOG_LEVELS.indexOf(event.level) < this.minRank) return;

    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    };
    this.events.push(stamped);

    if (this.outputToConsole) {
      const prefix = `[${stamped.level.toUpperCase()}]`;
      const fieldsStr = stamped.fields ? ` ${JSON.stringify(stamped.fields)}` : '';
      console.log(`${prefix} ${stamped.message}${fieldsStr}`);
    }
  }

  async flush(): Promise<void> {
    // log() prints immediately; nothing is held back.
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }

  /** Empty `events`. */
  clear(): void {
    this.events.length = 0;
  }
}

/**
 * Structured logs go to stderr, one JSON object per line; stdout carries
 * only the CLI's progress lines.
 *
 * @packageDocumentation
 */

/** `debug` entries are emitted only in debug mode. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * One JSON line, e.g.
 * `{"timestamp":"...","level":"info","component":"compile","event":"unit_compiled"}`.
 */
export interface LogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly component: string;
  /** snake_case event name. */
  readonly event: string;
  readonly data?: Record<string, unknown>;
}

export interface LoggerOptions {
  readonly component: string;
  readonly debugMode?: boolean;
  /** Receives each serialized entry, newline included; stderr by default. */
  readonly sink?: (line: string) => void;
}

/**
 * JSON-lines logger. Children share the parent's debug mode and sink and
 * differ only in `component`.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'fetch' });
 * logger.child('compile').info('unit_compiled', { protoDir: 'google/api' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly sink: (line: string) => void;

  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.sink =
      options.sink ??
      ((line: string): void => {
        process.stderr.write(line);
      });
  }

  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode, sink: this.sink });
  }

  debug(event: string, data?: Record<string, unknown>): void {
    if (this.debugMode) {
      this.log('debug', event, data);
    }
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry =
      data === undefined
        ? { timestamp: new Date().toISOString(), level, component: this.component, event }
        : { timestamp: new Date().toISOString(), level, component: this.component, event, data };

    this.sink(serializeEntry(entry) + '\n');
  }
}

// Data JSON.stringify rejects (cycles, BigInt) is dropped for a serializationError field.
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    const { data: _data, ...rest } = entry;
    return JSON.stringify({
      ...rest,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}

/** Root logger of a CLI run, component `protostub`. */
export function createLogger(debugMode = false, sink?: (line: string) => void): Logger {
  return sink === undefined
    ? new Logger({ component: 'protostub', debugMode })
    : new Logger({ component: 'protostub', debugMode, sink });
}

import { interpolate } from '../interpolate';
import { isPromise } from '../is-promise';
import type { HandleLogOptions } from './internal-types';
import { LoggerService } from './logger-service';
import { ArraySink } from './sinks/array';
import { ConsoleSink } from './sinks/console';
import type {
  LogEntry,
  LogOptions,
  LogScope,
  LogSink,
  LogType,
  LoggerOptions,
  SinkErrorHandler,
} from './types';
import { prepareErrorObjectLog } from './utils/error-object';

/**
 * Root logger. Components log through `service()` scopes; the root methods
 * are for entry points such as scripts.
 *
 * Every call builds one LogEntry and hands it to each sink. A failing sink
 * never breaks the caller: the failure goes to `onSinkError`, or to
 * console.error when none is configured.
 */
export class Logger {
  private sinks: LogSink[];
  private readonly onSinkError?: SinkErrorHandler;
  private _closed = false;

  constructor(options: LoggerOptions = {}) {
    this.sinks = [...(options.sinks ?? [])];
    this.onSinkError = options.onSinkError;
  }

  public get closed(): boolean {
    return this._closed;
  }

  public error(message: string, options?: LogOptions): void {
    this.handleLog('error', message, options);
  }

  public errorObject(prefix: string, error: unknown, options?: LogOptions): void {
    this.handleLog('error', prepareErrorObjectLog(prefix, error), {
      ...options,
      error,
    });
  }

  public info(message: string, options?: LogOptions): void {
    this.handleLog('info', message, options);
  }

  public warn(message: string, options?: LogOptions): void {
    this.handleLog('warn', message, options);
  }

  public success(message: string, options?: LogOptions): void {
    this.handleLog('success', message, options);
  }

  public notice(message: string, options?: LogOptions): void {
    this.handleLog('notice', message, options);
  }

  public debug(message: string, options?: LogOptions): void {
    this.handleLog('debug', message, options);
  }

  /**
   * Unformatted output, shown regardless of level
   */
  public raw(message: string, options?: LogOptions): void {
    this.handleLog('raw', message, options);
  }

  public service(serviceName: string): LoggerService {
    return new LoggerService(this.handleLog.bind(this), { serviceName });
  }

  /**
   * Close all sinks. Later log calls are dropped.
   */
  public async close(): Promise<void> {
    this._closed = true;

    const sinks = this.sinks;
    this.sinks = [];

    await Promise.all(
      sinks.map(async (sink) => {
        try {
          await sink.close?.();
        } catch (error) {
          this.handleSinkError(error, 'close', sink);
        }
      }),
    );
  }

  /**
   * Logger writing to an ArraySink, for asserting on entries in tests
   */
  public static createTestOptimizedLogger(options?: {
    includeConsoleSink?: boolean;
    muteConsole?: boolean;
  }): { logger: Logger; arraySink: ArraySink; consoleSink?: ConsoleSink } {
    const arraySink = new ArraySink();
    const consoleSink = options?.includeConsoleSink
      ? new ConsoleSink({ muted: options.muteConsole ?? true })
      : undefined;

    return {
      logger: new Logger({
        sinks: consoleSink ? [arraySink, consoleSink] : [arraySink],
      }),
      arraySink,
      consoleSink,
    };
  }

  protected handleLog(
    type: LogType,
    template: string,
    options?: HandleLogOptions,
  ): void {
    if (this._closed) {
      return;
    }

    const params = options?.params;

    const entry: LogEntry = {
      ...normalizeScope(options?.scope),
      timestamp: Date.now(),
      type,
      template,
      message: params ? interpolate(template, params) : template,
      params,
      error: options?.error,
    };

    for (const sink of this.sinks) {
      try {
        const result = sink.write(entry);

        if (isPromise(result)) {
          result.catch((error: unknown) => {
            this.handleSinkError(error, 'write', sink);
          });
        }
      } catch (error) {
        this.handleSinkError(error, 'write', sink);
      }
    }
  }

  private handleSinkError(
    error: unknown,
    context: 'write' | 'close',
    sink: LogSink,
  ): void {
    const message = error instanceof Error ? error.message : String(error);

    if (!this.onSinkError) {
      // eslint-disable-next-line no-console
      console.error(
        `Error ${context === 'write' ? 'writing to' : 'closing'} sink: ${message}`,
      );
      return;
    }

    try {
      this.onSinkError(error, context, sink);
    } catch {
      // eslint-disable-next-line no-console
      console.error(`Error in onSinkError handler: ${message}`);
    }
  }
}

/**
 * Blank scope fields are left off the entry
 */
function normalizeScope(scope: LogScope | undefined): LogScope {
  return {
    serviceName: scope?.serviceName?.trim() || undefined,
    entityName: scope?.entityName?.trim() || undefined,
    runID: scope?.runID || undefined,
  };
}

export * from './types';
export * from './sinks';
export { LoggerService } from './logger-service';

import { format } from 'date-fns';
import type { LogEntry, LogSink, LogType } from '../types';
import { LogLevel, getLogLevel } from '../types';
import { colorize } from '../utils/color';

const RUN_SUFFIX_LENGTH = 6;

const CONSOLE_METHODS: Record<
  Exclude<LogType, 'raw'>,
  'error' | 'warn' | 'info' | 'log'
> = {
  error: 'error',
  warn: 'warn',
  info: 'info',
  success: 'log',
  notice: 'log',
  debug: 'log',
};

export interface ConsoleSinkOptions {
  colors?: boolean;
  timestamps?: boolean;
  typeLabels?: boolean;
  muted?: boolean;
  minLevel?: LogLevel;
}

/**
 * Writes entries to the console, one line each, routed by type
 */
export class ConsoleSink implements LogSink {
  private colors: boolean;
  private timestamps: boolean;
  private typeLabels: boolean;
  private closed = false;
  private muted: boolean;
  private minLevel: LogLevel;

  constructor(options: ConsoleSinkOptions = {}) {
    this.colors = options.colors ?? true;
    this.timestamps = options.timestamps ?? false;
    this.typeLabels = options.typeLabels ?? false;
    this.muted = options.muted ?? false;
    this.minLevel = options.minLevel ?? LogLevel.INFO;
  }

  public write(entry: LogEntry): void {
    if (this.closed || this.muted) {
      return;
    }

    // Raw - no formatting and always shown
    if (entry.type === 'raw') {
      // eslint-disable-next-line no-console
      console.log(entry.message);
      return;
    }

    if (getLogLevel(entry.type) > this.minLevel) {
      return;
    }

    const line = this.colors
      ? colorize(entry.type, this.formatLine(entry))
      : this.formatLine(entry);

    // eslint-disable-next-line no-console
    console[CONSOLE_METHODS[entry.type]](line);
  }

  /**
   * `[timestamp] [TYPE] [service] [entity #run] message`, each part optional.
   * Runs show the last RUN_SUFFIX_LENGTH characters of their ID.
   */
  public formatLine(entry: LogEntry): string {
    let line = '';

    if (this.timestamps) {
      line += `[${format(entry.timestamp, 'MM-dd-yyyy HH:mm:ss')}] `;
    }

    if (this.typeLabels) {
      line += `[${entry.type.toUpperCase()}] `;
    }

    if (entry.serviceName) {
      line += `[${entry.serviceName}] `;
    }

    const run = entry.runID ? `#${entry.runID.slice(-RUN_SUFFIX_LENGTH)}` : '';
    const entity = [entry.entityName, run].filter(Boolean).join(' ');

    if (entity) {
      line += `[${entity}] `;
    }

    return line + entry.message;
  }

  public setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  public getMinLevel(): LogLevel {
    return this.minLevel;
  }

  public mute(): void {
    this.muted = true;
  }

  public unmute(): void {
    this.muted = false;
  }

  public isMuted(): boolean {
    return this.muted;
  }

  public close(): void {
    this.closed = true;
  }
}

import type { LogEntry, LogSink, LogType } from '../types';

/**
 * Keeps log entries in memory, for tests
 */
export class ArraySink implements LogSink {
  public logs: LogEntry[] = [];
  private closed = false;

  public write(entry: LogEntry): void {
    if (this.closed) {
      return;
    }

    this.logs.push(entry);
  }

  public clear(): void {
    this.logs = [];
  }

  /**
   * Messages of the given type, optionally limited to one entity
   */
  public messagesOfType(type: LogType, entityName?: string): string[] {
    return this.logs
      .filter(
        (log) =>
          log.type === type &&
          (entityName === undefined || log.entityName === entityName),
      )
      .map((log) => log.message);
  }

  /**
   * Messages logged under one rapp run, in order
   */
  public messagesForRun(runID: string): string[] {
    return this.logs
      .filter((log) => log.runID === runID)
      .map((log) => log.message);
  }

  /**
   * `type: message` lines, for asserting ordering across types
   */
  public lines(): string[] {
    return this.logs.map((log) => `${log.type}: ${log.message}`);
  }

  public close(): void {
    this.closed = true;
  }
}

import type { LogOptions, LogScope, LogType } from './types';

/**
 * Options for Logger.handleLog - not part of the public API
 */
export interface HandleLogOptions extends LogOptions {
  scope?: LogScope;
  error?: unknown;
}

export type HandleLog = (
  type: LogType,
  template: string,
  options?: HandleLogOptions,
) => void;

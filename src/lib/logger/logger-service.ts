import type { HandleLog } from './internal-types';
import type { LogOptions, LogScope, LogType } from './types';
import { prepareErrorObjectLog } from './utils/error-object';

/**
 * Logger scoped to a service, and optionally to an entity within it (a rapp,
 * a capability, a remote controller) and a rapp run.
 *
 * ```typescript
 * const logger = rootLogger.service('lifecycle-controller');
 * logger.entity('nav_app').run(runID).info('Stopping rapp');
 * ```
 */
export class LoggerService {
  private readonly handleLog: HandleLog;
  private readonly scope: LogScope & { serviceName: string };

  constructor(handleLog: HandleLog, scope: LogScope & { serviceName: string }) {
    this.handleLog = handleLog;
    this.scope = scope;
  }

  /**
   * Same service, scoped to one entity. Drops any run scope.
   */
  public entity(entityName: string): LoggerService {
    return new LoggerService(this.handleLog, {
      serviceName: this.scope.serviceName,
      entityName,
    });
  }

  /**
   * Same service and entity, tagged with a rapp run ID
   */
  public run(runID: string): LoggerService {
    return new LoggerService(this.handleLog, { ...this.scope, runID });
  }

  public error(message: string, options?: LogOptions): void {
    this.log('error', message, options);
  }

  /**
   * Log an error object with a prefix line
   */
  public errorObject(prefix: string, error: unknown, options?: LogOptions): void {
    this.handleLog('error', prepareErrorObjectLog(prefix, error), {
      ...options,
      scope: this.scope,
      error,
    });
  }

  public info(message: string, options?: LogOptions): void {
    this.log('info', message, options);
  }

  public warn(message: string, options?: LogOptions): void {
    this.log('warn', message, options);
  }

  public success(message: string, options?: LogOptions): void {
    this.log('success', message, options);
  }

  public notice(message: string, options?: LogOptions): void {
    this.log('notice', message, options);
  }

  public debug(message: string, options?: LogOptions): void {
    this.log('debug', message, options);
  }

  private log(type: LogType, message: string, options?: LogOptions): void {
    this.handleLog(type, message, { ...options, scope: this.scope });
  }
}

import type { LoggerService } from '../logger/logger-service';
import { sleep } from '../sleep';
import type { Rapp } from './types';

export interface RappMonitorOptions {
  rapp: Rapp;
  runID: string;

  /**
   * Whether the slot still holds this run and it is in `running` state.
   * The monitor exits without acting as soon as this turns false.
   */
  isBound: () => boolean;

  /** Called once when the rapp is seen to have terminated on its own */
  onTerminated: () => Promise<void> | void;

  pollIntervalMS: number;
  logger: LoggerService;
}

/**
 * Background poller for one rapp run.
 *
 * Polls `rapp.isRunning()` while the run is still bound to the slot, and calls
 * `onTerminated` when the rapp dies on its own. One instance per run.
 */
export class RappMonitor {
  private readonly options: RappMonitorOptions;
  private readonly abortController = new AbortController();
  private loop: Promise<void> | null = null;

  constructor(options: RappMonitorOptions) {
    this.options = options;
  }

  /**
   * Start polling in the background. Calling it again is a no-op.
   */
  public start(): void {
    if (this.loop) {
      return;
    }

    this.loop = this.run().catch((error: unknown) => {
      this.options.logger.errorObject('Rapp monitor loop failed', error);
    });
  }

  /**
   * Stop polling early. The loop ends at its next wake-up.
   */
  public cancel(): void {
    this.abortController.abort();
  }

  public get cancelled(): boolean {
    return this.abortController.signal.aborted;
  }

  /**
   * Resolves once the loop has ended (immediately if it never started)
   */
  public get done(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  private async run(): Promise<void> {
    const { rapp, runID, isBound, pollIntervalMS, logger } = this.options;
    const signal = this.abortController.signal;

    logger.debug('Monitoring rapp run {{runID}}', { params: { runID } });

    while (!signal.aborted && isBound()) {
      if (!this.isAlive(rapp)) {
        // Re-check after the liveness poll: an explicit stop may have taken
        // the slot in the meantime
        if (signal.aborted || !isBound()) {
          break;
        }

        logger.info('Rapp terminated on its own, stopping run {{runID}}', {
          params: { runID },
        });

        await this.options.onTerminated();
        return;
      }

      await sleep(pollIntervalMS, signal);
    }

    logger.debug('Stopped monitoring rapp run {{runID}}', { params: { runID } });
  }

  private isAlive(rapp: Rapp): boolean {
    try {
      return rapp.isRunning();
    } catch (error) {
      this.options.logger.errorObject(
        'Rapp liveness check threw, assuming it is still running',
        error,
      );

      return true;
    }
  }
}

import type { Logger } from '../logger';
import type { LoggerService } from '../logger/logger-service';
import {
  CapabilityServiceUnavailableError,
  MissingCapabilitiesError,
} from './errors';
import type {
  CapabilityIndex,
  CapabilityOperationResult,
  CapabilitySequenceResult,
  CompatibilityResult,
  Rapp,
} from './types';

type CapabilityOperation = 'start' | 'stop';

/**
 * Front for the external capability index.
 *
 * Answers whether a rapp's capabilities can be satisfied, starts and stops
 * capabilities one at a time or as an ordered sequence, and owns the
 * activation state of every capability it has touched. The gate is
 * "unavailable" when no index could be set up; in that case only rapps
 * without required capabilities are runnable.
 */
export class CapabilityGate {
  private readonly index: CapabilityIndex | null;
  private readonly logger: LoggerService;
  private readonly active = new Set<string>();

  constructor(options: { logger: Logger; index: CapabilityIndex | null }) {
    this.index = options.index;
    this.logger = options.logger.service('capability-gate');

    if (!this.index) {
      this.logger.warn(
        'Capability index unavailable, rapps requiring capabilities will not be runnable',
      );
    }
  }

  public isAvailable(): boolean {
    return this.index !== null;
  }

  public isCapabilityActive(name: string): boolean {
    return this.active.has(name);
  }

  public getActiveCapabilities(): string[] {
    return Array.from(this.active);
  }

  /**
   * Check whether every capability the rapp requires is installed
   */
  public checkCompatibility(rapp: Rapp): CompatibilityResult {
    if (rapp.requiredCapabilities.length === 0) {
      return { compatible: true };
    }

    if (!this.index) {
      return {
        compatible: false,
        missingCapabilities: [...rapp.requiredCapabilities],
        reason: 'capabilities are not available',
      };
    }

    try {
      this.index.compatibilityCheck(rapp);
      return { compatible: true };
    } catch (error) {
      if (error instanceof MissingCapabilitiesError) {
        return {
          compatible: false,
          missingCapabilities: error.additionalInfo.missingCapabilities,
          reason: `missing capabilities (${error.additionalInfo.missingCapabilities.join(', ')})`,
        };
      }

      this.logger
        .entity(rapp.name)
        .errorObject('Capability compatibility check failed', error);

      return {
        compatible: false,
        missingCapabilities: [],
        reason: error instanceof Error ? error.message : String(error),
      };
    }
  }

  public startCapability(name: string): Promise<CapabilityOperationResult> {
    return this.runOperation('start', name);
  }

  public stopCapability(name: string): Promise<CapabilityOperationResult> {
    return this.runOperation('stop', name);
  }

  /**
   * Start capabilities in declaration order, stopping at the first failure.
   * Capabilities started earlier in the sequence stay active.
   */
  public startCapabilities(
    names: readonly string[],
  ): Promise<CapabilitySequenceResult> {
    return this.runSequence('start', names);
  }

  /**
   * Stop capabilities in declaration order, stopping at the first failure.
   * Remaining capabilities stay active.
   */
  public stopCapabilities(
    names: readonly string[],
  ): Promise<CapabilitySequenceResult> {
    return this.runSequence('stop', names);
  }

  private async runSequence(
    operation: CapabilityOperation,
    names: readonly string[],
  ): Promise<CapabilitySequenceResult> {
    const completed: string[] = [];

    if (names.length === 0) {
      return { success: true, completed };
    }

    this.logger.info(
      `${operation === 'start' ? 'Starting' : 'Stopping'} required capabilities: {{capabilities}}`,
      { params: { capabilities: names } },
    );

    for (const name of names) {
      const result = await this.runOperation(operation, name);

      if (!result.success) {
        return { success: false, completed, failure: result };
      }

      completed.push(name);
    }

    this.logger.success(
      `All required capabilities have been ${operation === 'start' ? 'started' : 'stopped'}`,
    );

    return { success: true, completed };
  }

  private async runOperation(
    operation: CapabilityOperation,
    name: string,
  ): Promise<CapabilityOperationResult> {
    const logger = this.logger.entity(name);

    if (!this.index) {
      const error = new CapabilityServiceUnavailableError({
        operation,
        capabilityName: name,
      });
      logger.error(error.message);

      return {
        success: false,
        capabilityName: name,
        reason: error.message,
        code: 'capability_service_unavailable',
        error,
      };
    }

    try {
      const ok =
        operation === 'start'
          ? await this.index.startCapability(name)
          : await this.index.stopCapability(name);

      if (!ok) {
        const reason = `${operation === 'start' ? 'Starting' : 'Stopping'} capability '${name}' was not successful`;
        logger.error(reason);

        return {
          success: false,
          capabilityName: name,
          reason,
          code: 'capability_failed',
        };
      }

      if (operation === 'start') {
        this.active.add(name);
      } else {
        this.active.delete(name);
      }

      logger.success(
        `${operation === 'start' ? 'Started' : 'Stopped'} required capability`,
      );

      return { success: true, capabilityName: name };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      const isUnavailable = err instanceof CapabilityServiceUnavailableError;
      const reason = isUnavailable
        ? `Service for ${operation === 'start' ? 'starting' : 'stopping'} capabilities is not available (capability '${name}'): ${err.message}`
        : `Error occurred while trying to ${operation} capability '${name}': ${err.message}`;

      logger.errorObject(reason, err);

      return {
        success: false,
        capabilityName: name,
        reason,
        code: isUnavailable ? 'capability_service_unavailable' : 'capability_error',
        error: err,
      };
    }
  }
}

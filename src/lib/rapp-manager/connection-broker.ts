import type { Logger } from '../logger';
import type { LoggerService } from '../logger/logger-service';
import { ENDPOINT_CATEGORIES } from './endpoints';
import { ConnectionTransportUnavailableError } from './errors';
import type {
  ConnectionKind,
  ConnectionTransport,
  ExposedEndpointSet,
  ExposureResponse,
  ExposureResult,
} from './types';

/**
 * Exposes or withdraws named endpoints to one remote at a time.
 *
 * Transport outages and rejected batches are logged and reported through the
 * result code; they never fail the caller. Anything else the transport throws
 * propagates.
 */
export class ConnectionBroker {
  private readonly transport: ConnectionTransport;
  private readonly logger: LoggerService;

  constructor(options: { logger: Logger; transport: ConnectionTransport }) {
    this.transport = options.transport;
    this.logger = options.logger.service('connection-broker');
  }

  public async expose(
    remote: string,
    names: readonly string[],
    kind: ConnectionKind,
    withdraw: boolean,
  ): Promise<ExposureResult> {
    const unique = [...new Set(names)];
    const action = withdraw ? 'withdraw' : 'expose';

    if (unique.length === 0) {
      return { kind, withdraw, names: unique, code: 'empty' };
    }

    const logger = this.logger.entity(remote);
    let response: ExposureResponse;

    try {
      response = await this.transport.submit({
        rules: unique.map((name) => ({ remote, name, kind })),
        withdraw,
      });
    } catch (error) {
      if (error instanceof ConnectionTransportUnavailableError) {
        logger.warn(
          'Connection transport unavailable, could not {{action}} {{kind}} endpoints (probably shutting down)',
          { params: { action, kind } },
        );

        return {
          kind,
          withdraw,
          names: unique,
          code: 'transport_unavailable',
          reason: error.message,
        };
      }

      throw error;
    }

    if (!response.accepted) {
      const reason = response.errorMessage ?? 'no reason given';
      logger.error('Failed to {{action}} {{kind}} endpoints {{names}}: {{reason}}', {
        params: { action, kind, names: unique, reason },
      });

      return { kind, withdraw, names: unique, code: 'rejected', reason };
    }

    logger.debug('{{action}} {{kind}} endpoints: {{names}}', {
      params: { action: withdraw ? 'Withdrew' : 'Exposed', kind, names: unique },
    });

    return { kind, withdraw, names: unique, code: 'accepted' };
  }

  /**
   * Expose or withdraw all five endpoint categories, in their fixed order
   */
  public async exposeEndpointSet(
    remote: string,
    endpoints: ExposedEndpointSet,
    withdraw: boolean,
  ): Promise<ExposureResult[]> {
    const results: ExposureResult[] = [];

    for (const { key, kind } of ENDPOINT_CATEGORIES) {
      results.push(await this.expose(remote, endpoints[key], kind, withdraw));
    }

    return results;
  }
}

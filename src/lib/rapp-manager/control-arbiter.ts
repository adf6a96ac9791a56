import {
  EventEmitterProtected,
  type ListenerErrorHandler,
} from '../event-emitter';
import type { Logger } from '../logger';
import type { LoggerService } from '../logger/logger-service';
import { DEFAULT_APPLICATION_NAMESPACE } from './config';
import type { ConnectionBroker } from './connection-broker';
import type { ControlArbiterEventMap } from './events';
import type { RappLifecycleController } from './lifecycle-controller';
import type { InviteCode, InviteRequest, InviteResult } from './types';

export interface ControlHandoffArbiterOptions {
  logger: Logger;
  broker: ConnectionBroker;
  lifecycle: RappLifecycleController;

  /** Remotes always granted control. When non-empty, nobody else is. */
  whitelist: readonly string[];

  /** Remotes refused control when the whitelist is empty */
  blacklist: readonly string[];

  /** Names of the start/stop services handed to the controller */
  getControlSurfaceNames: () => string[];

  /** Namespace reported before any invite is accepted */
  applicationNamespace: string;

  onListenerError?: ListenerErrorHandler;
}

/**
 * Decides which remote may command the robot.
 *
 * Owns the remote-controller slot. Granting control exposes the start/stop
 * services (and any running rapp's endpoints) to the new controller;
 * cancelling withdraws them and stops the running rapp. Exposure is always
 * attempted before the slot changes.
 */
export class ControlHandoffArbiter extends EventEmitterProtected<ControlArbiterEventMap> {
  private readonly logger: LoggerService;
  private readonly options: ControlHandoffArbiterOptions;

  private remoteController: string | null = null;
  private applicationNamespace: string;
  private gatewayName: string | null = null;
  private inviteInProgress = false;

  constructor(options: ControlHandoffArbiterOptions) {
    super({ onListenerError: options.onListenerError });
    this.options = options;
    this.logger = options.logger.service('control-arbiter');
    this.applicationNamespace = options.applicationNamespace;
  }

  public getRemoteController(): string | null {
    return this.remoteController;
  }

  public getApplicationNamespace(): string {
    return this.applicationNamespace;
  }

  /**
   * Set the namespace to `<base>/application`, e.g. when the service surface
   * is bound under a new base name
   */
  public resetApplicationNamespace(base: string): void {
    this.applicationNamespace = `${base}/${DEFAULT_APPLICATION_NAMESPACE}`;
  }

  public setGatewayName(name: string | null): void {
    this.gatewayName = name;
  }

  public getGatewayName(): string | null {
    return this.gatewayName;
  }

  /**
   * Whitelisted remotes are always permitted. With an empty whitelist,
   * everyone not blacklisted is.
   */
  public isPermitted(remote: string): boolean {
    const { whitelist, blacklist } = this.options;

    if (whitelist.includes(remote)) {
      return true;
    }

    return whitelist.length === 0 && !blacklist.includes(remote);
  }

  public async invite(request: InviteRequest): Promise<InviteResult> {
    const remote = request.remoteTargetName;

    if (this.inviteInProgress) {
      return this.refuse(
        remote,
        'invite_in_progress',
        'another invitation is still being processed',
      );
    }

    if (!this.isPermitted(remote)) {
      this.logger
        .entity(remote)
        .info('Invitation refused, remote is not permitted to take control');

      return this.refuse(remote, 'not_permitted', 'remote is not permitted');
    }

    this.inviteInProgress = true;

    try {
      return request.cancel
        ? await this.cancelControl(remote)
        : await this.grantControl(remote, request.applicationNamespace);
    } finally {
      this.inviteInProgress = false;
    }
  }

  private async grantControl(
    remote: string,
    namespaceOverride: string | undefined,
  ): Promise<InviteResult> {
    const logger = this.logger.entity(remote);

    if (remote === this.remoteController) {
      logger.warn('Repeat invitation from the current controller, ignoring');
      return { accepted: true, code: 'already_controller' };
    }

    const namespace = this.resolveNamespace(namespaceOverride);
    const previous = this.remoteController;
    const surface = this.options.getControlSurfaceNames();

    if (previous) {
      try {
        await this.options.broker.expose(previous, surface, 'service', true);
        await this.options.lifecycle.exposeRunningEndpoints(previous, true);
      } catch (error) {
        logger.errorObject(
          `Failed to withdraw controls from previous controller "${previous}"`,
          error,
        );

        return this.refuse(
          remote,
          'exposure_failed',
          error instanceof Error ? error.message : String(error),
        );
      }

      this.remoteController = null;
      this.logger.entity(previous).info('Controls handed over to {{remote}}', {
        params: { remote },
      });
      this.emit('controller:released', { remote: previous });
    }

    try {
      await this.options.broker.expose(remote, surface, 'service', false);
    } catch (error) {
      logger.errorObject('Failed to expose controls', error);

      return this.refuse(
        remote,
        'exposure_failed',
        error instanceof Error ? error.message : String(error),
      );
    }

    this.remoteController = remote;
    this.applicationNamespace = namespace;

    try {
      await this.options.lifecycle.exposeRunningEndpoints(remote, false);
    } catch (error) {
      logger.errorObject('Failed to expose the running rapp endpoints', error);
    }

    logger.info('Accepted invitation, relaying controls under {{namespace}}', {
      params: { namespace },
    });
    this.emit('controller:granted', { remote, namespace });

    return { accepted: true, code: 'accepted' };
  }

  private async cancelControl(remote: string): Promise<InviteResult> {
    const logger = this.logger.entity(remote);

    if (remote !== this.remoteController) {
      logger.warn(
        'Ignoring request to cancel controls, remote is not the current controller',
      );

      return this.refuse(
        remote,
        'not_controller',
        'remote is not the current controller',
      );
    }

    try {
      await this.options.broker.expose(
        remote,
        this.options.getControlSurfaceNames(),
        'service',
        true,
      );
    } catch (error) {
      logger.errorObject('Failed to withdraw controls', error);

      return this.refuse(
        remote,
        'exposure_failed',
        error instanceof Error ? error.message : String(error),
      );
    }

    logger.info('Cancelling the relayed controls');

    if (this.options.lifecycle.getCurrentRapp()) {
      const result = await this.options.lifecycle.stopRapp(
        'invitation-cancelled',
      );

      if (!result.stopped) {
        logger.warn('Running rapp was not stopped: {{message}}', {
          params: { message: result.message },
        });
      }
    }

    this.remoteController = null;
    this.emit('controller:released', { remote });

    return { accepted: true, code: 'cancelled' };
  }

  private resolveNamespace(override: string | undefined): string {
    if (override && override.trim() !== '') {
      return override;
    }

    return this.gatewayName
      ? `${this.gatewayName}/${DEFAULT_APPLICATION_NAMESPACE}`
      : DEFAULT_APPLICATION_NAMESPACE;
  }

  private refuse(remote: string, code: InviteCode, reason: string): InviteResult {
    this.emit('invite:refused', { remote, code, reason });
    return { accepted: false, code, reason };
  }
}

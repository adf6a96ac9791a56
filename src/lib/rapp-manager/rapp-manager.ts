import { EventEmitterProtected, type EventCallback } from '../event-emitter';
import { isPromise } from '../is-promise';
import type { Logger } from '../logger';
import type { LoggerService } from '../logger/logger-service';
import { sleep } from '../sleep';
import { CapabilityGate } from './capability-gate';
import {
  DEFAULT_APPLICATION_NAMESPACE,
  NO_REMOTE_CONNECTION,
  resolveRappManagerConfig,
  type RappManagerConfig,
  type RappManagerOptions,
} from './config';
import { ConnectionBroker } from './connection-broker';
import { ControlHandoffArbiter } from './control-arbiter';
import type { RappLifecycleEventMap, RappManagerEventMap } from './events';
import { RappLifecycleController } from './lifecycle-controller';
import { platformTuple } from './platform';
import { RappRegistry } from './rapp-registry';
import type {
  CapabilityIndex,
  ConnectionTransport,
  GatewayInfo,
  GatewayLink,
  InviteRequest,
  InviteResult,
  PlatformInfo,
  PublisherName,
  Rapp,
  RappDescriptor,
  RappList,
  RappListFeed,
  RegistryLoadResult,
  RappManagerStatus,
  ServiceName,
  ServiceSurfaceNames,
  StartRappRequest,
  StartRappResult,
  StopRappResult,
} from './types';

const FORWARDED_LIFECYCLE_EVENTS = [
  'rapp:starting',
  'rapp:started',
  'rapp:start-failed',
  'rapp:stopping',
  'rapp:stopped',
  'rapp:stop-failed',
  'rapp:terminated',
] as const;

export interface RappManagerDependencies {
  /** Root logger instance (required) */
  logger: Logger;

  /** Makes endpoints reachable to remote controllers */
  transport: ConnectionTransport;

  /** Capability index, or null when none could be set up (default: null) */
  capabilityIndex?: CapabilityIndex | null;

  /** Local gateway link polled by waitForGateway() (default: none, standalone) */
  gatewayLink?: GatewayLink | null;
}

/**
 * Service front of the rapp manager.
 *
 * Wires the capability gate, registry, connection broker, lifecycle
 * controller and control arbiter together, serves the request surface and
 * keeps the two latched rapp list feeds current.
 *
 * @example
 * ```typescript
 * const manager = new RappManager({
 *   logger,
 *   transport,
 *   capabilityIndex,
 *   robotName: 'turtlebot',
 *   robotType: 'turtlebot',
 * });
 *
 * manager.loadRapps([new TeleopRapp(logger)]);
 * await manager.waitForGateway();
 *
 * await manager.invite({ remoteTargetName: 'ops-console' });
 * await manager.startRapp({ name: 'teleop' });
 * ```
 */
export class RappManager extends EventEmitterProtected<RappManagerEventMap> {
  public readonly config: RappManagerConfig;

  private readonly logger: LoggerService;
  private readonly gatewayLink: GatewayLink | null;
  private readonly gate: CapabilityGate;
  private readonly registry: RappRegistry;
  private readonly broker: ConnectionBroker;
  private readonly lifecycle: RappLifecycleController;
  private readonly arbiter: ControlHandoffArbiter;

  private serviceNames: ServiceSurfaceNames;
  private bindInProgress = false;
  private surfaceBound = false;

  private latchedLists: Record<RappListFeed, RappList | null> = {
    installed: null,
    runnable: null,
  };

  /**
   * @throws {InvalidConfigError} On invalid options
   */
  constructor(options: RappManagerOptions & RappManagerDependencies) {
    const logger = options.logger.service('rapp-manager');
    const onListenerError = (event: string, error: unknown): void => {
      logger.errorObject(`Error in "${event}" event listener`, error);
    };

    super({ onListenerError });

    this.logger = logger;
    this.config = resolveRappManagerConfig(options);
    this.gatewayLink = options.gatewayLink ?? null;
    this.serviceNames = buildServiceSurfaceNames(this.config.robotName);

    this.gate = new CapabilityGate({
      logger: options.logger,
      index: options.capabilityIndex ?? null,
    });

    this.registry = new RappRegistry({
      logger: options.logger,
      gate: this.gate,
      platformTuple: platformTuple(this.getPlatformInfo()),
    });

    this.broker = new ConnectionBroker({
      logger: options.logger,
      transport: options.transport,
    });

    this.lifecycle = new RappLifecycleController({
      logger: options.logger,
      registry: this.registry,
      gate: this.gate,
      broker: this.broker,
      getRemoteController: () => this.arbiter.getRemoteController(),
      getApplicationNamespace: () => this.arbiter.getApplicationNamespace(),
      settleDelayMS: this.config.settleDelayMS,
      monitorPollIntervalMS: this.config.monitorPollIntervalMS,
      onListenerError,
    });

    this.arbiter = new ControlHandoffArbiter({
      logger: options.logger,
      broker: this.broker,
      lifecycle: this.lifecycle,
      whitelist: this.config.remoteControllerWhitelist,
      blacklist: this.config.remoteControllerBlacklist,
      getControlSurfaceNames: () => [
        this.serviceNames.services.start_app,
        this.serviceNames.services.stop_app,
      ],
      applicationNamespace: `${this.config.robotName}/${DEFAULT_APPLICATION_NAMESPACE}`,
      onListenerError,
    });

    for (const event of FORWARDED_LIFECYCLE_EVENTS) {
      this.forwardLifecycleEvent(event);
    }

    this.arbiter.on('controller:granted', (data) => {
      this.emit('controller:granted', data);
    });
    this.arbiter.on('controller:released', (data) => {
      this.emit('controller:released', data);
    });
    this.arbiter.on('invite:refused', (data) => {
      this.emit('invite:refused', data);
    });

    this.lifecycle.on('rapp:started', () => {
      this.publishRappLists();
    });
    this.lifecycle.on('rapp:stopped', () => {
      this.publishRappLists();
    });
  }

  // ============================================================================
  // Catalog
  // ============================================================================

  /**
   * Replace the rapp catalog and republish both feeds
   */
  public loadRapps(rapps: readonly Rapp[]): RegistryLoadResult {
    const result = this.registry.load(rapps);
    this.publishRappLists();
    return result;
  }

  // ============================================================================
  // Request surface
  // ============================================================================

  public getPlatformInfo(): PlatformInfo {
    return {
      platform: this.config.platform,
      system: this.config.system,
      robot: this.config.robotType,
      name: this.config.robotName,
    };
  }

  public listInstalledRapps(): RappList {
    return {
      availableRapps: this.registry.listInstalled(),
      runningRapps: this.runningRapps(),
    };
  }

  public listRunnableRapps(): RappList {
    return {
      availableRapps: this.registry.listRunnable(),
      runningRapps: this.runningRapps(),
    };
  }

  public getStatus(): RappManagerStatus {
    const run = this.lifecycle.getRunInfo();

    return {
      applicationStatus: run ? 'RUNNING' : 'STOPPED',
      application: run ? run.rapp.toDescriptor() : null,
      remoteController: this.arbiter.getRemoteController() ?? NO_REMOTE_CONNECTION,
      applicationNamespace: this.arbiter.getApplicationNamespace(),
      runID: run?.runID ?? null,
      startedAt: run?.startedAt ?? null,
    };
  }

  public invite(request: InviteRequest): Promise<InviteResult> {
    return this.arbiter.invite(request);
  }

  public startRapp(request: StartRappRequest): Promise<StartRappResult> {
    return this.lifecycle.startRapp(
      request.name,
      request.remappings ?? [],
      this.config.appOutputToScreen,
    );
  }

  public stopRapp(): Promise<StopRappResult> {
    return this.lifecycle.stopRapp('request');
  }

  // ============================================================================
  // Service surface
  // ============================================================================

  public getServiceNames(): ServiceSurfaceNames {
    return {
      services: { ...this.serviceNames.services },
      publishers: { ...this.serviceNames.publishers },
    };
  }

  public isSurfaceBound(): boolean {
    return this.surfaceBound;
  }

  /**
   * (Re)bind the service surface under the gateway name, or the robot name
   * when no gateway is connected. Resets the application namespace to
   * `<base>/application` and republishes both feeds.
   *
   * @returns false when a bind is already in progress
   */
  public bindServiceSurface(): boolean {
    if (this.bindInProgress) {
      return false;
    }

    this.bindInProgress = true;

    try {
      const base = this.arbiter.getGatewayName() ?? this.config.robotName;

      this.serviceNames = buildServiceSurfaceNames(base);
      this.arbiter.resetApplicationNamespace(base);
      this.surfaceBound = true;

      this.logger.info('Service surface bound under /{{base}}', {
        params: { base },
      });

      this.emit('surface:bound', { base, names: this.getServiceNames() });
      this.publishRappLists();

      return true;
    } finally {
      this.bindInProgress = false;
    }
  }

  /**
   * Poll the gateway link until a connected gateway reports its name, then
   * bind the service surface under it. Without a gateway link the surface is
   * bound under the robot name straight away.
   *
   * @returns true once bound under a gateway name, false when running
   * standalone or aborted
   */
  public async waitForGateway(options: { signal?: AbortSignal } = {}): Promise<boolean> {
    const { signal } = options;

    if (!this.gatewayLink) {
      this.logger.notice('No gateway link, running standalone');
      this.bindServiceSurface();
      return false;
    }

    while (!signal?.aborted) {
      let info: GatewayInfo | null;

      try {
        info = await this.gatewayLink.getGatewayInfo();
      } catch (error) {
        this.logger.errorObject('Gateway info query failed', error);
        info = null;
      }

      if (info?.connected && info.name) {
        this.arbiter.setGatewayName(info.name);
        this.logger.info('Gateway connected as {{name}}', {
          params: { name: info.name },
        });

        if (this.bindServiceSurface()) {
          return true;
        }
      }

      await sleep(this.config.gatewayPollIntervalMS, signal);
    }

    return false;
  }

  // ============================================================================
  // Latched feeds
  // ============================================================================

  /**
   * Last value published on a feed, or null before the first publish
   */
  public getLatchedRappList(feed: RappListFeed): RappList | null {
    return this.latchedLists[feed];
  }

  /**
   * Subscribe to a feed. A late subscriber immediately receives the last
   * published value.
   *
   * @returns A function to unsubscribe
   */
  public subscribeRappList(
    feed: RappListFeed,
    callback: EventCallback<RappList>,
  ): () => void {
    const event =
      feed === 'installed' ? 'feed:installed-rapps' : 'feed:runnable-rapps';
    const unsubscribe = this.on(event, callback);
    const latched = this.latchedLists[feed];

    if (latched) {
      try {
        const result = callback(latched);

        if (isPromise(result)) {
          result.catch((error: unknown) => {
            this.logger.errorObject(`Error in "${event}" event listener`, error);
          });
        }
      } catch (error) {
        this.logger.errorObject(`Error in "${event}" event listener`, error);
      }
    }

    return unsubscribe;
  }

  // ============================================================================
  // Shutdown
  // ============================================================================

  /**
   * Stop the running rapp, if any, and wait for its monitor to exit
   */
  public async shutdown(): Promise<StopRappResult | null> {
    let result: StopRappResult | null = null;

    if (this.lifecycle.getCurrentRapp()) {
      result = await this.lifecycle.stopRapp('shutdown');

      if (!result.stopped) {
        this.logger.warn('Running rapp was not stopped on shutdown: {{message}}', {
          params: { message: result.message },
        });
      }
    }

    await this.lifecycle.waitForMonitor();
    this.logger.info('Rapp manager shut down');

    return result;
  }

  private runningRapps(): RappDescriptor[] {
    const rapp = this.lifecycle.getCurrentRapp();
    return rapp ? [rapp.toDescriptor()] : [];
  }

  private publishRappLists(): void {
    this.latchedLists.installed = this.listInstalledRapps();
    this.latchedLists.runnable = this.listRunnableRapps();

    this.emit('feed:installed-rapps', this.latchedLists.installed);
    this.emit('feed:runnable-rapps', this.latchedLists.runnable);
  }

  private forwardLifecycleEvent<K extends keyof RappLifecycleEventMap & string>(
    event: K,
  ): void {
    this.lifecycle.on(event, (data) => {
      this.emit(event, data);
    });
  }
}

/**
 * `/<base>/<name>` for every service and publisher
 */
export function buildServiceSurfaceNames(base: string): ServiceSurfaceNames {
  const under = (name: ServiceName | PublisherName): string => `/${base}/${name}`;

  return {
    services: {
      platform_info: under('platform_info'),
      list_installed_apps: under('list_installed_apps'),
      list_runnable_apps: under('list_runnable_apps'),
      status: under('status'),
      invite: under('invite'),
      start_app: under('start_app'),
      stop_app: under('stop_app'),
    },
    publishers: {
      installed_apps_list: under('installed_apps_list'),
      runnable_apps_list: under('runnable_apps_list'),
    },
  };
}

import {
  EventEmitterProtected,
  type ListenerErrorHandler,
} from '../event-emitter';
import type { Logger } from '../logger';
import type { LoggerService } from '../logger/logger-service';
import { sleep } from '../sleep';
import type { CapabilityGate } from './capability-gate';
import type { ConnectionBroker } from './connection-broker';
import { countEndpoints, emptyEndpointSet } from './endpoints';
import type { RappLifecycleEventMap } from './events';
import { RappMonitor } from './rapp-monitor';
import type { RappRegistry } from './rapp-registry';
import { generateRunID } from './run-id';
import type {
  ExposedEndpointSet,
  LifecycleState,
  Rapp,
  RappRunInfo,
  RappRunResult,
  Remapping,
  StartRappCode,
  StartRappResult,
  StopRappErrorCode,
  StopRappResult,
  StopTrigger,
} from './types';

export interface RappLifecycleControllerOptions {
  logger: Logger;
  registry: RappRegistry;
  gate: CapabilityGate;
  broker: ConnectionBroker;

  /** Current remote controller, or null when nobody holds control */
  getRemoteController: () => string | null;

  /** Namespace a starting rapp is launched under */
  getApplicationNamespace: () => string;

  settleDelayMS: number;
  monitorPollIntervalMS: number;
  onListenerError?: ListenerErrorHandler;
}

/**
 * Owns the current-rapp slot and runs the start/stop transitions.
 *
 * States go `stopped → starting → running → stopping → stopped`. A request
 * arriving mid-transition is refused with `start_in_progress` or
 * `stop_in_progress`, which is also what keeps an explicit stop and the
 * monitor from stopping the same run twice.
 */
export class RappLifecycleController extends EventEmitterProtected<RappLifecycleEventMap> {
  private readonly logger: LoggerService;
  private readonly options: RappLifecycleControllerOptions;

  private state: LifecycleState = 'stopped';
  private current: RappRunInfo | null = null;
  private monitor: RappMonitor | null = null;

  constructor(options: RappLifecycleControllerOptions) {
    super({ onListenerError: options.onListenerError });
    this.options = options;
    this.logger = options.logger.service('lifecycle-controller');
  }

  public getState(): LifecycleState {
    return this.state;
  }

  public isRunning(): boolean {
    return this.state === 'running' && this.current !== null;
  }

  public getCurrentRapp(): Rapp | null {
    return this.current?.rapp ?? null;
  }

  public getRunInfo(): RappRunInfo | null {
    return this.current;
  }

  /**
   * Resolves once the current run's monitor has exited
   */
  public async waitForMonitor(): Promise<void> {
    await this.monitor?.done;
  }

  public async startRapp(
    name: string,
    remappings: Remapping[] = [],
    verbose = false,
  ): Promise<StartRappResult> {
    const namespace = this.options.getApplicationNamespace();
    const logger = this.logger.entity(name);

    logger.info('Request received to start rapp');

    if (this.state === 'starting') {
      return this.refuseStart(
        name,
        namespace,
        'start_in_progress',
        'a rapp is already being started',
      );
    }

    if (this.state === 'stopping') {
      return this.refuseStart(
        name,
        namespace,
        'stop_in_progress',
        'a rapp is currently being stopped',
      );
    }

    if (this.current) {
      return this.refuseStart(
        name,
        namespace,
        'rapp_already_running',
        `an app is already running [${this.current.rapp.name}]`,
      );
    }

    const rapp = this.options.registry.getInstalled(name);

    if (!rapp) {
      return this.refuseStart(
        name,
        namespace,
        'rapp_not_installed',
        `The requested app '${name}' is not installed.`,
      );
    }

    if (!this.options.registry.isRunnable(name)) {
      return this.refuseStart(
        name,
        namespace,
        'rapp_not_runnable',
        `The requested app '${name}' is installed, but cannot be started, because its required capabilities are not available.`,
      );
    }

    this.state = 'starting';
    this.emit('rapp:starting', { name });

    const capabilities = await this.options.gate.startCapabilities(
      rapp.requiredCapabilities,
    );

    if (!capabilities.success) {
      const failure = capabilities.failure;
      this.state = 'stopped';

      return this.refuseStart(
        name,
        namespace,
        failure?.code === 'capability_service_unavailable'
          ? 'capability_service_unavailable'
          : 'capability_start_failed',
        failure?.reason ??
          `Starting capability '${failure?.capabilityName ?? 'unknown'}' was not successful`,
      );
    }

    logger.info('Starting rapp under namespace {{namespace}}', {
      params: { namespace },
    });

    const result = await this.callRapp(rapp, 'start', () =>
      rapp.start({ namespace, remappings, verbose }),
    );

    if (!result.success) {
      this.state = 'stopped';

      return this.refuseStart(
        name,
        namespace,
        'rapp_start_failed',
        result.message || `Failed to start rapp '${name}'`,
      );
    }

    // Let the exposure mechanism catch up with the freshly launched rapp
    await sleep(this.options.settleDelayMS);

    const run: RappRunInfo = {
      runID: generateRunID(),
      rapp,
      startedAt: Date.now(),
      endpoints: result.endpoints,
    };

    this.current = run;

    const remote = this.options.getRemoteController();

    if (remote) {
      await this.exposeLogged(remote, run.endpoints, false);
    }

    this.state = 'running';
    this.launchMonitor(run);

    logger.run(run.runID).success('Rapp started');

    this.emit('rapp:started', { name, runID: run.runID, namespace });

    return { started: true, message: result.message, namespace, code: 'started' };
  }

  public async stopRapp(trigger: StopTrigger = 'request'): Promise<StopRappResult> {
    if (this.state === 'stopping') {
      return {
        stopped: false,
        errorCode: 'stop_in_progress',
        message: 'the running rapp is already being stopped',
      };
    }

    if (this.state === 'starting') {
      return {
        stopped: false,
        errorCode: 'start_in_progress',
        message: 'a rapp is still being started',
      };
    }

    const run = this.current;

    if (!run) {
      this.logger.warn('Received a request to stop a rapp, but no rapp found running');

      return {
        stopped: false,
        errorCode: 'rapp_not_running',
        message: 'tried to stop a rapp, but no rapp found running',
      };
    }

    const { rapp, runID } = run;
    const logger = this.logger.entity(rapp.name).run(runID);

    this.state = 'stopping';
    logger.info('Stopping rapp ({{trigger}})', { params: { trigger } });
    this.emit('rapp:stopping', { name: rapp.name, runID, trigger });

    const result = await this.callRapp(rapp, 'stop', () => rapp.stop());
    const endpoints =
      countEndpoints(result.endpoints) > 0 ? result.endpoints : run.endpoints;

    const remote = this.options.getRemoteController();

    if (remote) {
      await this.exposeLogged(remote, endpoints, true);
    }

    if (!result.success) {
      const message = result.message || `Failed to stop rapp '${rapp.name}'`;

      // The rapp is still in the slot, keep watching it
      this.state = 'running';
      this.launchMonitor(run);

      logger.error('Rapp stop failed: {{message}}', { params: { message } });
      this.emit('rapp:stop-failed', {
        name: rapp.name,
        runID,
        trigger,
        errorCode: 'rapp_stop_failed',
        message,
      });

      return { stopped: false, errorCode: 'rapp_stop_failed', message };
    }

    this.current = null;
    this.monitor?.cancel();
    this.monitor = null;

    const capabilities = await this.options.gate.stopCapabilities(
      rapp.requiredCapabilities,
    );

    this.state = 'stopped';

    let errorCode: StopRappErrorCode = 'ok';
    let message = result.message;

    if (!capabilities.success) {
      const failure = capabilities.failure;
      errorCode =
        failure?.code === 'capability_service_unavailable'
          ? 'capability_service_unavailable'
          : 'capability_stop_failed';
      message =
        failure?.reason ??
        `Stopping capability '${failure?.capabilityName ?? 'unknown'}' was not successful`;
    }

    logger.success('Rapp stopped');
    this.emit('rapp:stopped', { name: rapp.name, runID, trigger, errorCode });

    return { stopped: true, errorCode, message };
  }

  /**
   * Expose (or withdraw) the running rapp's endpoints to a remote, for a
   * controller handoff. Does nothing when no rapp is in the slot.
   *
   * Broker errors propagate.
   */
  public async exposeRunningEndpoints(
    remote: string,
    withdraw: boolean,
  ): Promise<void> {
    if (!this.current) {
      return;
    }

    await this.options.broker.exposeEndpointSet(
      remote,
      this.current.endpoints,
      withdraw,
    );
  }

  private refuseStart(
    name: string,
    namespace: string,
    code: StartRappCode,
    message: string,
  ): StartRappResult {
    this.logger.entity(name).warn(message);
    this.emit('rapp:start-failed', { name, code, message });

    return { started: false, message, namespace, code };
  }

  private async callRapp(
    rapp: Rapp,
    operation: 'start' | 'stop',
    call: () => Promise<RappRunResult>,
  ): Promise<RappRunResult> {
    try {
      return await call();
    } catch (error) {
      this.logger.entity(rapp.name).errorObject(`Rapp ${operation} threw`, error);

      return {
        success: false,
        message: error instanceof Error ? error.message : String(error),
        endpoints:
          this.current?.rapp === rapp
            ? this.current.endpoints
            : emptyEndpointSet(),
      };
    }
  }

  /**
   * Exposure failures never fail a transition
   */
  private async exposeLogged(
    remote: string,
    endpoints: ExposedEndpointSet,
    withdraw: boolean,
  ): Promise<void> {
    try {
      await this.options.broker.exposeEndpointSet(remote, endpoints, withdraw);
    } catch (error) {
      this.logger
        .entity(remote)
        .errorObject(
          `Failed to ${withdraw ? 'withdraw' : 'expose'} rapp endpoints`,
          error,
        );
    }
  }

  private launchMonitor(run: RappRunInfo): void {
    this.monitor?.cancel();

    const monitor = new RappMonitor({
      rapp: run.rapp,
      runID: run.runID,
      isBound: () => this.current === run && this.state === 'running',
      onTerminated: async () => {
        this.emit('rapp:terminated', { name: run.rapp.name, runID: run.runID });
        await this.stopRapp('monitor');
      },
      pollIntervalMS: this.options.monitorPollIntervalMS,
      logger: this.logger.entity(run.rapp.name).run(run.runID),
    });

    this.monitor = monitor;
    monitor.start();
  }
}

/**
 * Test components for RappManager unit and integration tests
 *
 * In-process stand-ins for the collaborators the manager talks to: rapps
 * with scriptable liveness, a capability index, a connection transport and a
 * gateway link. None of them touch processes or the network.
 */

import type { Logger } from '../logger';
import { sleep } from '../sleep';
import { BaseRapp, type RappOptions } from './base-rapp';
import {
  CapabilityServiceUnavailableError,
  MissingCapabilitiesError,
} from './errors';
import type {
  CapabilityIndex,
  ConnectionTransport,
  ExposedEndpointSet,
  ExposureRequest,
  ExposureResponse,
  GatewayInfo,
  GatewayLink,
  Rapp,
  RappRunResult,
  RappStartOptions,
} from './types';

/**
 * Rapp whose launch outcome, stop outcome and liveness are set by the test
 */
export class FakeRapp extends BaseRapp {
  public endpoints: Partial<ExposedEndpointSet>;
  public launchResult: { success: boolean; message: string } = {
    success: true,
    message: 'launched',
  };
  public terminateResult: { success: boolean; message: string } = {
    success: true,
    message: 'terminated',
  };
  public launchError: Error | null = null;
  public terminateError: Error | null = null;
  public launchDelayMS = 0;
  public terminateDelayMS = 0;

  public alive = false;
  public launchCalls: RappStartOptions[] = [];
  public terminateCalls = 0;

  constructor(
    logger: Logger,
    options: RappOptions & { endpoints?: Partial<ExposedEndpointSet> },
  ) {
    super(logger, options);
    this.endpoints = options.endpoints ?? {};
  }

  /** Simulate the rapp process exiting on its own */
  public crash(): void {
    this.alive = false;
  }

  public isRunning(): boolean {
    return this.alive;
  }

  protected async launch(options: RappStartOptions): Promise<RappRunResult> {
    this.launchCalls.push(options);

    if (this.launchDelayMS > 0) {
      await sleep(this.launchDelayMS);
    }

    if (this.launchError) {
      throw this.launchError;
    }

    if (this.launchResult.success) {
      this.alive = true;
    }

    return { ...this.launchResult, endpoints: this.fullEndpoints() };
  }

  protected async terminate(): Promise<RappRunResult> {
    this.terminateCalls++;

    if (this.terminateDelayMS > 0) {
      await sleep(this.terminateDelayMS);
    }

    if (this.terminateError) {
      throw this.terminateError;
    }

    if (this.terminateResult.success) {
      this.alive = false;
    }

    return { ...this.terminateResult, endpoints: this.fullEndpoints() };
  }

  private fullEndpoints(): ExposedEndpointSet {
    return {
      subscribers: this.endpoints.subscribers ?? [],
      publishers: this.endpoints.publishers ?? [],
      services: this.endpoints.services ?? [],
      actionClients: this.endpoints.actionClients ?? [],
      actionServers: this.endpoints.actionServers ?? [],
    };
  }
}

/**
 * Capability index with a fixed set of installed capabilities.
 *
 * Every start/stop is recorded in `calls` as `start:<name>` / `stop:<name>`.
 */
export class FakeCapabilityIndex implements CapabilityIndex {
  public installed: Set<string>;
  public calls: string[] = [];

  /** Capabilities whose start/stop resolves false */
  public refuseStart = new Set<string>();
  public refuseStop = new Set<string>();

  /** When set, every start/stop throws CapabilityServiceUnavailableError */
  public serviceDown = false;

  /** Capabilities whose start throws a plain Error */
  public throwOnStart = new Set<string>();

  constructor(installed: string[] = []) {
    this.installed = new Set(installed);
  }

  public startCapability(name: string): Promise<boolean> {
    this.calls.push(`start:${name}`);

    if (this.serviceDown) {
      return Promise.reject(
        new CapabilityServiceUnavailableError({
          operation: 'start',
          capabilityName: name,
        }),
      );
    }

    if (this.throwOnStart.has(name)) {
      return Promise.reject(new Error(`${name} exploded`));
    }

    return Promise.resolve(!this.refuseStart.has(name));
  }

  public stopCapability(name: string): Promise<boolean> {
    this.calls.push(`stop:${name}`);

    if (this.serviceDown) {
      return Promise.reject(
        new CapabilityServiceUnavailableError({
          operation: 'stop',
          capabilityName: name,
        }),
      );
    }

    return Promise.resolve(!this.refuseStop.has(name));
  }

  public compatibilityCheck(rapp: Rapp): void {
    const missing = rapp.requiredCapabilities.filter(
      (name) => !this.installed.has(name),
    );

    if (missing.length > 0) {
      throw new MissingCapabilitiesError({
        rappName: rapp.name,
        missingCapabilities: missing,
      });
    }
  }
}

/**
 * Connection transport that records every submitted batch
 */
export class FakeConnectionTransport implements ConnectionTransport {
  public requests: ExposureRequest[] = [];

  /** Next submissions throw this error (after being recorded) */
  public failWith: Error | null = null;

  /** Next submissions resolve with accepted: false */
  public rejectWith: string | null = null;

  public submitDelayMS = 0;

  public async submit(request: ExposureRequest): Promise<ExposureResponse> {
    this.requests.push(request);

    if (this.submitDelayMS > 0) {
      await sleep(this.submitDelayMS);
    }

    if (this.failWith) {
      throw this.failWith;
    }

    if (this.rejectWith !== null) {
      return { accepted: false, errorMessage: this.rejectWith };
    }

    return { accepted: true };
  }

  /**
   * Flattened `+remote kind name` / `-remote kind name` lines, in submit order
   */
  public get flips(): string[] {
    return this.requests.flatMap((request) =>
      request.rules.map(
        (rule) =>
          `${request.withdraw ? '-' : '+'}${rule.remote} ${rule.kind} ${rule.name}`,
      ),
    );
  }

  public clear(): void {
    this.requests = [];
  }
}

/**
 * Gateway link that reports `infos` in order, then repeats the last one
 */
export class FakeGatewayLink implements GatewayLink {
  public queries = 0;
  private readonly infos: Array<GatewayInfo | null | Error>;

  constructor(infos: Array<GatewayInfo | null | Error>) {
    this.infos = infos;
  }

  public getGatewayInfo(): Promise<GatewayInfo | null> {
    const index = Math.min(this.queries, this.infos.length - 1);
    const info = this.infos[index] ?? null;
    this.queries++;

    if (info instanceof Error) {
      return Promise.reject(info);
    }

    return Promise.resolve(info);
  }
}

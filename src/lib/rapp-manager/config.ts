import { InvalidConfigError } from './errors';

export const DEFAULT_ROBOT_NAME = 'app_manager';
export const DEFAULT_ROBOT_TYPE = 'robot';
export const DEFAULT_PLATFORM = 'linux';
export const DEFAULT_SYSTEM = 'ros';
export const DEFAULT_SETTLE_DELAY_MS = 500;
export const DEFAULT_MONITOR_POLL_INTERVAL_MS = 100;
export const DEFAULT_GATEWAY_POLL_INTERVAL_MS = 300;

/** Reported as the controller when nobody holds control */
export const NO_REMOTE_CONNECTION = 'none';

/** Namespace used when neither an override nor a gateway name is known */
export const DEFAULT_APPLICATION_NAMESPACE = 'application';

export interface RappManagerOptions {
  /** Name the robot is known by; also the service surface base until a gateway connects (default: 'app_manager') */
  robotName?: string;

  /** Robot type, the third segment of the platform tuple (default: 'robot') */
  robotType?: string;

  /** First segment of the platform tuple (default: 'linux') */
  platform?: string;

  /** Second segment of the platform tuple (default: 'ros') */
  system?: string;

  /** Remotes always granted control. When non-empty, nobody else is. */
  remoteControllerWhitelist?: string[];

  /** Remotes refused control when the whitelist is empty */
  remoteControllerBlacklist?: string[];

  /** Pass verbose=true to rapps so their output goes to the screen (default: false) */
  appOutputToScreen?: boolean;

  /** Delay after a rapp starts before its endpoints are exposed (default: 500) */
  settleDelayMS?: number;

  /** How often the monitor polls a running rapp (default: 100) */
  monitorPollIntervalMS?: number;

  /** How often waitForGateway() polls the gateway link (default: 300) */
  gatewayPollIntervalMS?: number;
}

export interface RappManagerConfig {
  robotName: string;
  robotType: string;
  platform: string;
  system: string;
  remoteControllerWhitelist: string[];
  remoteControllerBlacklist: string[];
  appOutputToScreen: boolean;
  settleDelayMS: number;
  monitorPollIntervalMS: number;
  gatewayPollIntervalMS: number;
}

/**
 * Fill in defaults and validate.
 *
 * @throws {InvalidConfigError} On an empty name, a negative delay, a zero poll
 * interval or a non-string list entry
 */
export function resolveRappManagerConfig(
  options: RappManagerOptions = {},
): RappManagerConfig {
  const config: RappManagerConfig = {
    robotName: options.robotName ?? DEFAULT_ROBOT_NAME,
    robotType: options.robotType ?? DEFAULT_ROBOT_TYPE,
    platform: options.platform ?? DEFAULT_PLATFORM,
    system: options.system ?? DEFAULT_SYSTEM,
    remoteControllerWhitelist: [...(options.remoteControllerWhitelist ?? [])],
    remoteControllerBlacklist: [...(options.remoteControllerBlacklist ?? [])],
    appOutputToScreen: options.appOutputToScreen ?? false,
    settleDelayMS: options.settleDelayMS ?? DEFAULT_SETTLE_DELAY_MS,
    monitorPollIntervalMS:
      options.monitorPollIntervalMS ?? DEFAULT_MONITOR_POLL_INTERVAL_MS,
    gatewayPollIntervalMS:
      options.gatewayPollIntervalMS ?? DEFAULT_GATEWAY_POLL_INTERVAL_MS,
  };

  for (const option of ['robotName', 'robotType', 'platform', 'system'] as const) {
    if (config[option].trim() === '') {
      throw new InvalidConfigError('must not be empty', {
        option,
        value: config[option],
      });
    }
  }

  for (const option of [
    'remoteControllerWhitelist',
    'remoteControllerBlacklist',
  ] as const) {
    const invalid = config[option].find(
      (entry) => typeof entry !== 'string' || entry.trim() === '',
    );

    if (invalid !== undefined) {
      throw new InvalidConfigError('entries must be non-empty strings', {
        option,
        value: invalid,
      });
    }
  }

  if (!Number.isFinite(config.settleDelayMS) || config.settleDelayMS < 0) {
    throw new InvalidConfigError('must be a finite number >= 0', {
      option: 'settleDelayMS',
      value: config.settleDelayMS,
    });
  }

  for (const option of ['monitorPollIntervalMS', 'gatewayPollIntervalMS'] as const) {
    if (!Number.isFinite(config[option]) || config[option] <= 0) {
      throw new InvalidConfigError('must be a finite number > 0', {
        option,
        value: config[option],
      });
    }
  }

  return config;
}

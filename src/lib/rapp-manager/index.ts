/**
 * RappManager - single-rapp lifecycle and remote control handoff
 *
 * Manages one robot application ("rapp") at a time with:
 * - Invitation-based control handoff with whitelist/blacklist
 * - Ordered capability startup and teardown (no rollback)
 * - Endpoint exposure to the current remote controller
 * - Background monitoring of the running rapp
 * - Latched installed/runnable rapp list feeds
 *
 * @module rapp-manager
 */

// Core classes
export { RappManager, buildServiceSurfaceNames } from './rapp-manager';
export type { RappManagerDependencies } from './rapp-manager';
export { BaseRapp, isValidRappName, type RappOptions } from './base-rapp';
export { CapabilityGate } from './capability-gate';
export { RappRegistry } from './rapp-registry';
export { ConnectionBroker } from './connection-broker';
export {
  RappLifecycleController,
  type RappLifecycleControllerOptions,
} from './lifecycle-controller';
export {
  ControlHandoffArbiter,
  type ControlHandoffArbiterOptions,
} from './control-arbiter';
export { RappMonitor, type RappMonitorOptions } from './rapp-monitor';

// Helpers
export { isPlatformCompatible, platformTuple } from './platform';
export {
  ENDPOINT_CATEGORIES,
  countEndpoints,
  emptyEndpointSet,
  normalizeEndpointSet,
} from './endpoints';
export { generateRunID } from './run-id';

// Configuration
export {
  resolveRappManagerConfig,
  type RappManagerOptions,
  type RappManagerConfig,
  DEFAULT_APPLICATION_NAMESPACE,
  DEFAULT_GATEWAY_POLL_INTERVAL_MS,
  DEFAULT_MONITOR_POLL_INTERVAL_MS,
  DEFAULT_PLATFORM,
  DEFAULT_ROBOT_NAME,
  DEFAULT_ROBOT_TYPE,
  DEFAULT_SETTLE_DELAY_MS,
  DEFAULT_SYSTEM,
  NO_REMOTE_CONNECTION,
} from './config';

// Events
export type {
  RappManagerEventMap,
  RappLifecycleEventMap,
  ControlArbiterEventMap,
} from './events';

// Types
export type * from './types';

// Errors
export {
  InvalidRappNameError,
  MissingCapabilitiesError,
  CapabilityServiceUnavailableError,
  ConnectionTransportUnavailableError,
  InvalidConfigError,
  rappManagerErrPrefix,
  rappManagerErrTypes,
  rappManagerErrCodes,
} from './errors';

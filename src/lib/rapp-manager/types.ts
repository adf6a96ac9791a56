/**
 * Kinds of connection a rapp can expose to a remote controller
 */
export type ConnectionKind =
  | 'subscriber'
  | 'publisher'
  | 'service'
  | 'action-client'
  | 'action-server';

/**
 * The five endpoint categories of a rapp, each a list of unique names.
 *
 * Produced by Rapp.start()/stop() and consumed by the ConnectionBroker.
 */
export interface ExposedEndpointSet {
  subscribers: string[];
  publishers: string[];
  services: string[];
  actionClients: string[];
  actionServers: string[];
}

/**
 * Topic/service name remapping applied when a rapp is launched
 */
export interface Remapping {
  remapFrom: string;
  remapTo: string;
}

export type RappRunState = 'stopped' | 'running';

/**
 * Options handed to Rapp.start()
 */
export interface RappStartOptions {
  /** Namespace all rapp connections are pushed under */
  namespace: string;
  remappings: Remapping[];
  /** Send the rapp's own output to the screen */
  verbose: boolean;
}

/**
 * Outcome of a rapp's own start/stop operation
 */
export interface RappRunResult {
  success: boolean;
  message: string;
  endpoints: ExposedEndpointSet;
}

/**
 * Plain description of a rapp for list and status responses
 */
export interface RappDescriptor {
  name: string;
  displayName: string;
  description: string;
  platform: string;
  requiredCapabilities: string[];
  status: RappRunState;
}

/**
 * A launchable robot application.
 *
 * How the rapp's processes are launched and killed is up to the
 * implementation; the manager only relies on this contract.
 */
export interface Rapp {
  readonly name: string;

  /** Dotted compatibility descriptor, e.g. `linux.ros.turtlebot` (`*` = any) */
  readonly platform: string;

  /** Capability names, in the order they must be started */
  readonly requiredCapabilities: readonly string[];

  start(options: RappStartOptions): Promise<RappRunResult>;
  stop(): Promise<RappRunResult>;

  /** Liveness of the launched rapp, polled by the RappMonitor */
  isRunning(): boolean;

  getRunState(): RappRunState;
  toDescriptor(): RappDescriptor;
}

// ============================================================================
// Platform
// ============================================================================

export interface PlatformInfo {
  platform: string;
  system: string;
  robot: string;
  name: string;
}

// ============================================================================
// Capabilities
// ============================================================================

/**
 * External capability index the CapabilityGate wraps.
 *
 * start/stop resolve to false when the capability refused. They should throw
 * CapabilityServiceUnavailableError when the capability service itself is
 * unreachable.
 */
export interface CapabilityIndex {
  startCapability(name: string): Promise<boolean>;
  stopCapability(name: string): Promise<boolean>;

  /** Throws MissingCapabilitiesError when a required capability is not installed */
  compatibilityCheck(rapp: Rapp): void;
}

export type CapabilityFailureCode =
  | 'capability_failed'
  | 'capability_service_unavailable'
  | 'capability_error';

export interface CapabilityOperationResult {
  success: boolean;
  capabilityName: string;
  reason?: string;
  code?: CapabilityFailureCode;
  error?: Error;
}

/**
 * Result of starting/stopping an ordered list of capabilities.
 * Aborts at the first failure; nothing is rolled back.
 */
export interface CapabilitySequenceResult {
  success: boolean;
  /** Capabilities that completed the operation before any failure */
  completed: string[];
  failure?: CapabilityOperationResult;
}

export type CompatibilityResult =
  | { compatible: true }
  | { compatible: false; missingCapabilities: string[]; reason: string };

// ============================================================================
// Connections
// ============================================================================

export interface ConnectionRule {
  remote: string;
  name: string;
  kind: ConnectionKind;
}

/**
 * One batch of exposure (or withdrawal) rules submitted to the transport
 */
export interface ExposureRequest {
  rules: ConnectionRule[];
  withdraw: boolean;
}

export interface ExposureResponse {
  accepted: boolean;
  errorMessage?: string;
}

/**
 * External transport that actually makes connections reachable to a remote.
 *
 * Should throw ConnectionTransportUnavailableError when the transport cannot
 * be reached at all.
 */
export interface ConnectionTransport {
  submit(request: ExposureRequest): Promise<ExposureResponse>;
}

export type ExposureCode =
  | 'empty'
  | 'accepted'
  | 'rejected'
  | 'transport_unavailable';

export interface ExposureResult {
  kind: ConnectionKind;
  withdraw: boolean;
  names: string[];
  code: ExposureCode;
  reason?: string;
}

// ============================================================================
// Gateway
// ============================================================================

export interface GatewayInfo {
  name: string;
  connected: boolean;
}

/**
 * External query for the local gateway's peer link
 */
export interface GatewayLink {
  getGatewayInfo(): Promise<GatewayInfo | null>;
}

// ============================================================================
// Requests and results
// ============================================================================

export interface InviteRequest {
  remoteTargetName: string;
  cancel?: boolean;
  /** Empty or missing means "use the default" */
  applicationNamespace?: string;
}

export type InviteCode =
  | 'accepted'
  | 'already_controller'
  | 'cancelled'
  | 'not_permitted'
  | 'not_controller'
  | 'exposure_failed'
  | 'invite_in_progress';

export interface InviteResult {
  accepted: boolean;
  code: InviteCode;
  reason?: string;
}

export interface StartRappRequest {
  name: string;
  remappings?: Remapping[];
}

export type StartRappCode =
  | 'started'
  | 'start_in_progress'
  | 'stop_in_progress'
  | 'rapp_already_running'
  | 'rapp_not_installed'
  | 'rapp_not_runnable'
  | 'capability_start_failed'
  | 'capability_service_unavailable'
  | 'rapp_start_failed';

export interface StartRappResult {
  started: boolean;
  message: string;
  /** Namespace the rapp's connections live under */
  namespace: string;
  code: StartRappCode;
}

export type StopTrigger =
  | 'request'
  | 'monitor'
  | 'invitation-cancelled'
  | 'shutdown';

export type StopRappErrorCode =
  | 'ok'
  | 'rapp_not_running'
  | 'start_in_progress'
  | 'stop_in_progress'
  | 'rapp_stop_failed'
  | 'capability_stop_failed'
  | 'capability_service_unavailable';

export interface StopRappResult {
  stopped: boolean;
  errorCode: StopRappErrorCode;
  message: string;
}

export type LifecycleState = 'stopped' | 'starting' | 'running' | 'stopping';

export interface RappRunInfo {
  runID: string;
  rapp: Rapp;
  startedAt: number;
  endpoints: ExposedEndpointSet;
}

export interface RappList {
  availableRapps: RappDescriptor[];
  runningRapps: RappDescriptor[];
}

export type RappListFeed = 'installed' | 'runnable';

export type ApplicationStatus = 'RUNNING' | 'STOPPED';

export interface RappManagerStatus {
  applicationStatus: ApplicationStatus;
  application: RappDescriptor | null;
  /** Controller identity, or NO_REMOTE_CONNECTION */
  remoteController: string;
  applicationNamespace: string;
  runID: string | null;
  startedAt: number | null;
}

export interface RegistryLoadResult {
  installed: string[];
  runnable: string[];
  incompatible: string[];
  unrunnable: Array<{ name: string; reason: string }>;
  duplicates: string[];
}

export interface ServiceSurfaceNames {
  services: Record<ServiceName, string>;
  publishers: Record<PublisherName, string>;
}

export type ServiceName =
  | 'platform_info'
  | 'list_installed_apps'
  | 'list_runnable_apps'
  | 'status'
  | 'invite'
  | 'start_app'
  | 'stop_app';

export type PublisherName = 'installed_apps_list' | 'runnable_apps_list';

/**
 * Error thrown when a rapp name isn't a valid resource name
 *
 * Rapp names are one or more segments of letters, digits and underscores,
 * separated by `/`, each starting with a letter.
 *
 * Valid names: 'nav_app', 'turtle_concert/teleop'
 * Invalid names: '', 'nav app', '/nav_app', '9lives'
 */
export class InvalidRappNameError extends Error {
  public errPrefix = 'RappManagerErr';
  public errType = 'Rapp';
  public errCode = 'InvalidName';
  public additionalInfo: { name: string };

  constructor(additionalInfo: { name: string }) {
    super(
      `Invalid rapp name: "${additionalInfo.name}". Rapp names are "/"-separated segments of letters, digits and underscores.`,
    );
    this.name = 'InvalidRappNameError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Thrown by a CapabilityIndex compatibility check when a rapp needs
 * capabilities that are not installed
 */
export class MissingCapabilitiesError extends Error {
  public errPrefix = 'RappManagerErr';
  public errType = 'Capability';
  public errCode = 'MissingCapabilities';
  public additionalInfo: { rappName: string; missingCapabilities: string[] };

  constructor(additionalInfo: {
    rappName: string;
    missingCapabilities: string[];
  }) {
    super(
      `Rapp "${additionalInfo.rappName}" requires capabilities that are not installed: ${additionalInfo.missingCapabilities.join(', ')}`,
    );
    this.name = 'MissingCapabilitiesError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Thrown by a CapabilityIndex when the capability service can't be reached
 */
export class CapabilityServiceUnavailableError extends Error {
  public errPrefix = 'RappManagerErr';
  public errType = 'Capability';
  public errCode = 'ServiceUnavailable';
  public additionalInfo: { operation: 'start' | 'stop'; capabilityName: string };

  constructor(additionalInfo: {
    operation: 'start' | 'stop';
    capabilityName: string;
  }) {
    super(
      `Capability service unavailable while trying to ${additionalInfo.operation} "${additionalInfo.capabilityName}"`,
    );
    this.name = 'CapabilityServiceUnavailableError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Thrown by a ConnectionTransport when it can't be reached, typically because
 * it is shutting down. The ConnectionBroker logs and swallows it.
 */
export class ConnectionTransportUnavailableError extends Error {
  public errPrefix = 'RappManagerErr';
  public errType = 'Connection';
  public errCode = 'TransportUnavailable';
  public additionalInfo: { remote: string };

  constructor(additionalInfo: { remote: string }, cause?: Error) {
    const causeMessage = cause ? `: ${cause.message}` : '';
    super(
      `Connection transport unavailable for remote "${additionalInfo.remote}"${causeMessage}`,
    );
    this.name = 'ConnectionTransportUnavailableError';
    this.additionalInfo = additionalInfo;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Error thrown when manager configuration is invalid
 */
export class InvalidConfigError extends Error {
  public errPrefix = 'RappManagerErr';
  public errType = 'Config';
  public errCode = 'InvalidConfig';
  public additionalInfo: { option: string; value: unknown };

  constructor(message: string, additionalInfo: { option: string; value: unknown }) {
    super(`Invalid rapp manager option "${additionalInfo.option}": ${message}`);
    this.name = 'InvalidConfigError';
    this.additionalInfo = additionalInfo;
  }
}

/**
 * Error prefix constant for all rapp manager errors
 */
export const rappManagerErrPrefix = 'RappManagerErr';

export const rappManagerErrTypes = {
  Rapp: 'Rapp',
  Capability: 'Capability',
  Connection: 'Connection',
  Config: 'Config',
} as const;

export const rappManagerErrCodes = {
  InvalidName: 'InvalidName',
  MissingCapabilities: 'MissingCapabilities',
  ServiceUnavailable: 'ServiceUnavailable',
  TransportUnavailable: 'TransportUnavailable',
  InvalidConfig: 'InvalidConfig',
} as const;

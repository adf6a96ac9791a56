import type { Logger } from '../logger';
import type { LoggerService } from '../logger/logger-service';
import { emptyEndpointSet, normalizeEndpointSet } from './endpoints';
import { InvalidRappNameError } from './errors';
import type {
  ExposedEndpointSet,
  Rapp,
  RappDescriptor,
  RappRunResult,
  RappRunState,
  RappStartOptions,
} from './types';

/**
 * Options passed to the BaseRapp constructor
 */
export interface RappOptions {
  /** Resource name, e.g. 'nav_app' or 'turtle_concert/teleop' */
  name: string;

  /** Human readable name (default: name) */
  displayName?: string;

  description?: string;

  /** Dotted compatibility descriptor (default: '*.*.*') */
  platform?: string;

  /** Capabilities to start before the rapp, in order (default: []) */
  requiredCapabilities?: string[];
}

const RAPP_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_]*(\/[A-Za-z][A-Za-z0-9_]*)*$/;

export function isValidRappName(name: string): boolean {
  return RAPP_NAME_PATTERN.test(name);
}

/**
 * Abstract base class for rapps.
 *
 * Subclasses implement launch(), terminate() and isRunning(); the base class
 * tracks the run state and turns thrown errors into failed results, so the
 * manager always gets an endpoint set back.
 *
 * @example
 * ```typescript
 * class LaunchFileRapp extends BaseRapp {
 *   private child?: ChildProcess;
 *
 *   protected async launch(options: RappStartOptions) {
 *     this.child = spawnLaunchFile(this.launchFile, options);
 *     return { success: true, message: 'launched', endpoints: this.interfaces };
 *   }
 *
 *   protected async terminate() {
 *     this.child?.kill('SIGINT');
 *     return { success: true, message: 'stopped', endpoints: this.interfaces };
 *   }
 *
 *   public isRunning() {
 *     return this.child?.exitCode === null;
 *   }
 * }
 * ```
 */
export abstract class BaseRapp implements Rapp {
  public readonly name: string;
  public readonly displayName: string;
  public readonly description: string;
  public readonly platform: string;
  public readonly requiredCapabilities: readonly string[];

  /** Rapp logger (service 'rapp', entity = rapp name) */
  protected logger: LoggerService;

  private runState: RappRunState = 'stopped';
  private lastEndpoints: ExposedEndpointSet = emptyEndpointSet();

  /**
   * @throws {InvalidRappNameError} If the name isn't a valid resource name
   */
  constructor(rootLogger: Logger, options: RappOptions) {
    if (!isValidRappName(options.name)) {
      throw new InvalidRappNameError({ name: options.name });
    }

    this.name = options.name;
    this.displayName = options.displayName ?? options.name;
    this.description = options.description ?? '';
    this.platform = options.platform ?? '*.*.*';
    this.requiredCapabilities = [...(options.requiredCapabilities ?? [])];
    this.logger = rootLogger.service('rapp').entity(this.name);
  }

  /**
   * Launch the rapp. Resolve with success false (or throw) on failure.
   */
  protected abstract launch(
    options: RappStartOptions,
  ): Promise<RappRunResult> | RappRunResult;

  /**
   * Tear the rapp down. Resolve with success false (or throw) on failure.
   */
  protected abstract terminate(): Promise<RappRunResult> | RappRunResult;

  /**
   * Whether the launched rapp is still alive
   */
  public abstract isRunning(): boolean;

  public async start(options: RappStartOptions): Promise<RappRunResult> {
    if (this.runState === 'running') {
      return {
        success: false,
        message: `Rapp '${this.name}' is already running`,
        endpoints: emptyEndpointSet(),
      };
    }

    try {
      const result = await this.launch(options);
      const endpoints = normalizeEndpointSet(result.endpoints);

      if (result.success) {
        this.runState = 'running';
        this.lastEndpoints = endpoints;
      }

      return { ...result, endpoints };
    } catch (error) {
      this.logger.errorObject('Rapp launch threw', error);

      return {
        success: false,
        message: error instanceof Error ? error.message : String(error),
        endpoints: emptyEndpointSet(),
      };
    }
  }

  public async stop(): Promise<RappRunResult> {
    if (this.runState === 'stopped') {
      return {
        success: false,
        message: `Rapp '${this.name}' is not running`,
        endpoints: emptyEndpointSet(),
      };
    }

    try {
      const result = await this.terminate();

      // The endpoints in use are the ones reported at launch, unless
      // terminate() reports its own
      const endpoints = normalizeEndpointSet(
        hasEndpoints(result.endpoints) ? result.endpoints : this.lastEndpoints,
      );

      if (result.success) {
        this.runState = 'stopped';
        this.lastEndpoints = emptyEndpointSet();
      }

      return { ...result, endpoints };
    } catch (error) {
      this.logger.errorObject('Rapp terminate threw', error);

      return {
        success: false,
        message: error instanceof Error ? error.message : String(error),
        endpoints: normalizeEndpointSet(this.lastEndpoints),
      };
    }
  }

  public getRunState(): RappRunState {
    return this.runState;
  }

  public toDescriptor(): RappDescriptor {
    return {
      name: this.name,
      displayName: this.displayName,
      description: this.description,
      platform: this.platform,
      requiredCapabilities: [...this.requiredCapabilities],
      status: this.runState,
    };
  }
}

function hasEndpoints(endpoints: Partial<ExposedEndpointSet> | undefined): boolean {
  return (
    !!endpoints &&
    Object.values(endpoints).some((names) => Array.isArray(names) && names.length > 0)
  );
}

import type { Logger } from '../logger';
import type { LoggerService } from '../logger/logger-service';
import type { CapabilityGate } from './capability-gate';
import { isPlatformCompatible } from './platform';
import type { Rapp, RappDescriptor, RegistryLoadResult } from './types';

/**
 * Catalog of installed rapps and the runnable subset.
 *
 * `load()` replaces the catalog. Installed rapps are those compatible with
 * the robot's platform tuple; runnable rapps are installed rapps whose
 * required capabilities the gate can satisfy. Read-only between loads.
 */
export class RappRegistry {
  private readonly logger: LoggerService;
  private readonly gate: CapabilityGate;
  private readonly platformTuple: string;

  private installed = new Map<string, Rapp>();
  private runnable = new Map<string, Rapp>();

  constructor(options: {
    logger: Logger;
    gate: CapabilityGate;
    platformTuple: string;
  }) {
    this.logger = options.logger.service('rapp-registry');
    this.gate = options.gate;
    this.platformTuple = options.platformTuple;
  }

  public load(rapps: readonly Rapp[]): RegistryLoadResult {
    const result: RegistryLoadResult = {
      installed: [],
      runnable: [],
      incompatible: [],
      unrunnable: [],
      duplicates: [],
    };

    const installed = new Map<string, Rapp>();
    const runnable = new Map<string, Rapp>();

    for (const rapp of rapps) {
      if (installed.has(rapp.name)) {
        this.logger
          .entity(rapp.name)
          .warn('Duplicate rapp name, keeping the first one loaded');
        result.duplicates.push(rapp.name);
        continue;
      }

      if (!isPlatformCompatible(this.platformTuple, rapp.platform)) {
        this.logger
          .entity(rapp.name)
          .debug('Rapp platform {{rappPlatform}} does not match {{robotPlatform}}', {
            params: {
              rappPlatform: rapp.platform,
              robotPlatform: this.platformTuple,
            },
          });
        result.incompatible.push(rapp.name);
        continue;
      }

      installed.set(rapp.name, rapp);
      result.installed.push(rapp.name);

      const compatibility = this.gate.checkCompatibility(rapp);

      if (compatibility.compatible) {
        runnable.set(rapp.name, rapp);
        result.runnable.push(rapp.name);
      } else {
        this.logger
          .entity(rapp.name)
          .info('Rapp cannot be run: {{reason}}', {
            params: { reason: compatibility.reason },
          });
        result.unrunnable.push({ name: rapp.name, reason: compatibility.reason });
      }
    }

    this.installed = installed;
    this.runnable = runnable;

    this.logger.info(
      'Loaded {{installed}} installed rapp(s), {{runnable}} runnable',
      {
        params: {
          installed: result.installed.length,
          runnable: result.runnable.length,
        },
      },
    );

    return result;
  }

  public getInstalled(name: string): Rapp | undefined {
    return this.installed.get(name);
  }

  public getRunnable(name: string): Rapp | undefined {
    return this.runnable.get(name);
  }

  public isInstalled(name: string): boolean {
    return this.installed.has(name);
  }

  public isRunnable(name: string): boolean {
    return this.runnable.has(name);
  }

  public listInstalled(): RappDescriptor[] {
    return Array.from(this.installed.values(), (rapp) => rapp.toDescriptor());
  }

  public listRunnable(): RappDescriptor[] {
    return Array.from(this.runnable.values(), (rapp) => rapp.toDescriptor());
  }
}

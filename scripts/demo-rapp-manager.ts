/**
 * Demo script walking a RappManager through a typical session
 *
 * A remote console is invited, starts a rapp, the rapp dies on its own and
 * the monitor cleans up, then a second console takes over.
 *
 * Run with: npm run demo
 */

import { ConsoleSink, Logger } from '../src/lib/logger';
import {
  BaseRapp,
  MissingCapabilitiesError,
  RappManager,
  type CapabilityIndex,
  type ConnectionTransport,
  type ExposureRequest,
  type ExposureResponse,
  type Rapp,
  type RappRunResult,
} from '../src/lib/rapp-manager';
import { sleep } from '../src/lib/sleep';

class DemoRapp extends BaseRapp {
  private alive = false;

  public crash(): void {
    this.alive = false;
  }

  public isRunning(): boolean {
    return this.alive;
  }

  protected launch(): RappRunResult {
    this.alive = true;
    return {
      success: true,
      message: 'launched',
      endpoints: {
        subscribers: ['/cmd_vel'],
        publishers: ['/odom'],
        services: [],
        actionClients: [],
        actionServers: [],
      },
    };
  }

  protected terminate(): RappRunResult {
    this.alive = false;
    return {
      success: true,
      message: 'stopped',
      endpoints: {
        subscribers: [],
        publishers: [],
        services: [],
        actionClients: [],
        actionServers: [],
      },
    };
  }
}

class DemoCapabilities implements CapabilityIndex {
  private readonly installed = new Set(['base_driver']);

  public startCapability(): Promise<boolean> {
    return Promise.resolve(true);
  }

  public stopCapability(): Promise<boolean> {
    return Promise.resolve(true);
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

class DemoTransport implements ConnectionTransport {
  public submit(request: ExposureRequest): Promise<ExposureResponse> {
    for (const rule of request.rules) {
      console.log(
        `  [transport] ${request.withdraw ? 'withdraw' : 'expose'} ${rule.kind} ${rule.name} -> ${rule.remote}`,
      );
    }

    return Promise.resolve({ accepted: true });
  }
}

async function main(): Promise<void> {
  const logger = new Logger({
    sinks: [new ConsoleSink({ colors: true, timestamps: true })],
  });

  const teleop = new DemoRapp(logger, {
    name: 'teleop',
    displayName: 'Teleoperation',
    requiredCapabilities: ['base_driver'],
  });

  const mapper = new DemoRapp(logger, {
    name: 'mapper',
    requiredCapabilities: ['slam_engine'],
  });

  const manager = new RappManager({
    logger,
    transport: new DemoTransport(),
    capabilityIndex: new DemoCapabilities(),
    robotName: 'demo_bot',
    robotType: 'turtlebot',
    settleDelayMS: 100,
    monitorPollIntervalMS: 50,
  });

  manager.on('rapp:stopped', ({ name, trigger }) => {
    console.log(`  [event] ${name} stopped (${trigger})`);
  });

  manager.loadRapps([teleop, mapper]);
  await manager.waitForGateway();

  console.log('\nPlatform:', manager.getPlatformInfo());
  console.log(
    'Runnable:',
    manager.listRunnableRapps().availableRapps.map((rapp) => rapp.name),
  );

  console.log('\n--- ops-console takes control ---');
  await manager.invite({ remoteTargetName: 'ops-console' });

  console.log('\n--- start teleop ---');
  console.log(await manager.startRapp({ name: 'teleop' }));

  console.log('\n--- start mapper (missing capability) ---');
  console.log(await manager.startRapp({ name: 'mapper' }));

  console.log('\n--- teleop exits on its own ---');
  const stopped = new Promise<void>((resolve) => {
    manager.once('rapp:stopped', () => resolve());
  });
  teleop.crash();
  await stopped;
  console.log('Status:', manager.getStatus());

  console.log('\n--- backup-console takes over ---');
  await manager.startRapp({ name: 'teleop' });
  await manager.invite({ remoteTargetName: 'backup-console' });
  await sleep(100);

  console.log('\n--- shutdown ---');
  await manager.shutdown();
  await logger.close();
}

main().catch((error: unknown) => {
  console.error('Demo failed:', error);
  process.exitCode = 1;
});

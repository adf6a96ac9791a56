import { beforeEach, describe, expect, test } from 'vitest';
import { Logger } from '../logger';
import type { ArraySink } from '../logger/sinks/array';
import { CapabilityGate } from './capability-gate';
import { ConnectionBroker } from './connection-broker';
import { ControlHandoffArbiter } from './control-arbiter';
import { RappLifecycleController } from './lifecycle-controller';
import { RappRegistry } from './rapp-registry';
import { FakeConnectionTransport, FakeRapp } from './test-components';

const SURFACE = ['/tb01/start_app', '/tb01/stop_app'];

describe('ControlHandoffArbiter', () => {
  let logger: Logger;
  let arraySink: ArraySink;
  let transport: FakeConnectionTransport;
  let lifecycle: RappLifecycleController;
  let talker: FakeRapp;
  let arbiter: ControlHandoffArbiter | undefined;
  let events: string[];

  beforeEach(() => {
    ({ logger, arraySink } = Logger.createTestOptimizedLogger());
    transport = new FakeConnectionTransport();
    events = [];

    const gate = new CapabilityGate({ logger, index: null });
    const registry = new RappRegistry({
      logger,
      gate,
      platformTuple: 'linux.ros.turtlebot',
    });

    talker = new FakeRapp(logger, {
      name: 'talker',
      endpoints: { publishers: ['/chatter'] },
    });
    registry.load([talker]);

    lifecycle = new RappLifecycleController({
      logger,
      registry,
      gate,
      broker: new ConnectionBroker({ logger, transport }),
      getRemoteController: () => arbiter?.getRemoteController() ?? null,
      getApplicationNamespace: () =>
        arbiter?.getApplicationNamespace() ?? 'application',
      settleDelayMS: 0,
      monitorPollIntervalMS: 5,
    });

    arbiter = undefined;
  });

  const createArbiter = (
    whitelist: string[] = [],
    blacklist: string[] = [],
  ): ControlHandoffArbiter => {
    const created = new ControlHandoffArbiter({
      logger,
      broker: new ConnectionBroker({ logger, transport }),
      lifecycle,
      whitelist,
      blacklist,
      getControlSurfaceNames: () => [...SURFACE],
      applicationNamespace: 'tb01/application',
    });

    created.on('controller:granted', ({ remote }) => {
      events.push(`granted:${remote}`);
    });
    created.on('controller:released', ({ remote }) => {
      events.push(`released:${remote}`);
    });
    created.on('invite:refused', ({ remote, code }) => {
      events.push(`refused:${remote}:${code}`);
    });

    arbiter = created;
    return created;
  };

  describe('policy', () => {
    test('whitelisted remotes only, when a whitelist is set', async () => {
      const control = createArbiter(['ops-console']);

      expect(await control.invite({ remoteTargetName: 'ops-console' })).toEqual({
        accepted: true,
        code: 'accepted',
      });
      expect(control.getRemoteController()).toBe('ops-console');

      expect(await control.invite({ remoteTargetName: 'intruder' })).toEqual({
        accepted: false,
        code: 'not_permitted',
        reason: 'remote is not permitted',
      });
      expect(control.getRemoteController()).toBe('ops-console');
      expect(arraySink.messagesOfType('info', 'intruder')).toEqual([
        'Invitation refused, remote is not permitted to take control',
      ]);
    });

    test('anyone but the blacklisted, when the whitelist is empty', async () => {
      const control = createArbiter([], ['banned']);

      expect((await control.invite({ remoteTargetName: 'anyone' })).accepted).toBe(
        true,
      );
      expect((await control.invite({ remoteTargetName: 'banned' })).accepted).toBe(
        false,
      );
      expect(control.getRemoteController()).toBe('anyone');
    });

    test('the whitelist wins over the blacklist', () => {
      const control = createArbiter(['ops-console'], ['ops-console', 'banned']);

      expect(control.isPermitted('ops-console')).toBe(true);
      expect(control.isPermitted('anyone')).toBe(false);
    });
  });

  describe('granting control', () => {
    test('exposes the control surface before adopting the controller', async () => {
      const control = createArbiter();

      await control.invite({ remoteTargetName: 'ops-console' });

      expect(transport.flips).toEqual([
        '+ops-console service /tb01/start_app',
        '+ops-console service /tb01/stop_app',
      ]);
      expect(events).toEqual(['granted:ops-console']);
    });

    test('a repeat invite from the controller is a benign no-op', async () => {
      const control = createArbiter();

      await control.invite({ remoteTargetName: 'ops-console' });
      transport.clear();

      expect(await control.invite({ remoteTargetName: 'ops-console' })).toEqual({
        accepted: true,
        code: 'already_controller',
      });
      expect(transport.requests).toEqual([]);
      expect(arraySink.messagesOfType('warn', 'ops-console')).toEqual([
        'Repeat invitation from the current controller, ignoring',
      ]);
    });

    test('namespace: explicit override', async () => {
      const control = createArbiter();

      await control.invite({
        remoteTargetName: 'ops-console',
        applicationNamespace: 'fleet/tb01',
      });

      expect(control.getApplicationNamespace()).toBe('fleet/tb01');
    });

    test('namespace: derived from the gateway name', async () => {
      const control = createArbiter();
      control.setGatewayName('tb01_gw');

      await control.invite({ remoteTargetName: 'ops-console', applicationNamespace: '' });

      expect(control.getApplicationNamespace()).toBe('tb01_gw/application');
    });

    test('namespace: fixed default without a gateway', async () => {
      const control = createArbiter();

      expect(control.getApplicationNamespace()).toBe('tb01/application');
      await control.invite({ remoteTargetName: 'ops-console' });

      expect(control.getApplicationNamespace()).toBe('application');
    });

    test('resetApplicationNamespace uses the given base', () => {
      const control = createArbiter();

      control.resetApplicationNamespace('tb01_gw');

      expect(control.getApplicationNamespace()).toBe('tb01_gw/application');
    });

    test('a throwing broker refuses the invite', async () => {
      const control = createArbiter();
      transport.failWith = new Error('transport exploded');

      expect(await control.invite({ remoteTargetName: 'ops-console' })).toEqual({
        accepted: false,
        code: 'exposure_failed',
        reason: 'transport exploded',
      });
      expect(control.getRemoteController()).toBeNull();
      expect(control.getApplicationNamespace()).toBe('tb01/application');
    });

    test('a rejected exposure batch does not refuse the invite', async () => {
      const control = createArbiter();
      transport.rejectWith = 'remote unknown';

      expect((await control.invite({ remoteTargetName: 'ops-console' })).accepted).toBe(
        true,
      );
    });

    test('a running rapp is exposed to a new controller', async () => {
      const control = createArbiter();
      await lifecycle.startRapp('talker');

      await control.invite({ remoteTargetName: 'ops-console' });

      expect(transport.flips).toEqual([
        '+ops-console service /tb01/start_app',
        '+ops-console service /tb01/stop_app',
        '+ops-console publisher /chatter',
      ]);

      await lifecycle.stopRapp();
    });

    test('hands control over from the previous controller', async () => {
      const control = createArbiter();
      await control.invite({ remoteTargetName: 'console-a' });
      await lifecycle.startRapp('talker');
      transport.clear();

      expect((await control.invite({ remoteTargetName: 'console-b' })).accepted).toBe(
        true,
      );

      expect(transport.flips).toEqual([
        '-console-a service /tb01/start_app',
        '-console-a service /tb01/stop_app',
        '-console-a publisher /chatter',
        '+console-b service /tb01/start_app',
        '+console-b service /tb01/stop_app',
        '+console-b publisher /chatter',
      ]);
      expect(control.getRemoteController()).toBe('console-b');
      expect(events).toEqual([
        'granted:console-a',
        'released:console-a',
        'granted:console-b',
      ]);

      await lifecycle.stopRapp();
    });

    test('a failed withdrawal from the previous controller changes nothing', async () => {
      const control = createArbiter();
      await control.invite({ remoteTargetName: 'console-a' });
      transport.failWith = new Error('transport exploded');

      const result = await control.invite({ remoteTargetName: 'console-b' });

      expect(result.code).toBe('exposure_failed');
      expect(control.getRemoteController()).toBe('console-a');
    });

    test('a second invite while one is processed is refused', async () => {
      const control = createArbiter();
      transport.submitDelayMS = 20;

      const first = control.invite({ remoteTargetName: 'console-a' });
      const second = await control.invite({ remoteTargetName: 'console-b' });

      expect(second).toEqual({
        accepted: false,
        code: 'invite_in_progress',
        reason: 'another invitation is still being processed',
      });
      expect((await first).accepted).toBe(true);
      expect(control.getRemoteController()).toBe('console-a');
    });
  });

  describe('cancelling control', () => {
    test('only the controller can cancel', async () => {
      const control = createArbiter();
      await control.invite({ remoteTargetName: 'ops-console' });

      expect(
        await control.invite({ remoteTargetName: 'intruder', cancel: true }),
      ).toEqual({
        accepted: false,
        code: 'not_controller',
        reason: 'remote is not the current controller',
      });
      expect(control.getRemoteController()).toBe('ops-console');
    });

    test('withdraws the surface, stops the running rapp and clears the slot', async () => {
      const control = createArbiter();
      await control.invite({ remoteTargetName: 'ops-console' });
      await lifecycle.startRapp('talker');
      transport.clear();

      expect(
        await control.invite({ remoteTargetName: 'ops-console', cancel: true }),
      ).toEqual({ accepted: true, code: 'cancelled' });

      expect(transport.flips).toEqual([
        '-ops-console service /tb01/start_app',
        '-ops-console service /tb01/stop_app',
        '-ops-console publisher /chatter',
      ]);
      expect(lifecycle.getCurrentRapp()).toBeNull();
      expect(control.getRemoteController()).toBeNull();
      expect(events).toEqual(['granted:ops-console', 'released:ops-console']);
    });

    test('cancelling with nothing running just releases control', async () => {
      const control = createArbiter();
      await control.invite({ remoteTargetName: 'ops-console' });

      await control.invite({ remoteTargetName: 'ops-console', cancel: true });

      expect(talker.terminateCalls).toBe(0);
      expect(control.getRemoteController()).toBeNull();
    });
  });
});

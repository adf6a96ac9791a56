import { beforeEach, describe, expect, test } from 'vitest';
import { Logger } from '../logger';
import type { ArraySink } from '../logger/sinks/array';
import { CapabilityGate } from './capability-gate';
import { CapabilityServiceUnavailableError } from './errors';
import { FakeCapabilityIndex, FakeRapp } from './test-components';

describe('CapabilityGate', () => {
  let logger: Logger;
  let arraySink: ArraySink;
  let index: FakeCapabilityIndex;
  let gate: CapabilityGate;

  beforeEach(() => {
    ({ logger, arraySink } = Logger.createTestOptimizedLogger());
    index = new FakeCapabilityIndex(['lidar_driver', 'base_driver', 'camera']);
    gate = new CapabilityGate({ logger, index });
  });

  describe('checkCompatibility', () => {
    test('rapps without capabilities are always compatible', () => {
      const noIndex = new CapabilityGate({ logger, index: null });
      const rapp = new FakeRapp(logger, { name: 'talker' });

      expect(noIndex.checkCompatibility(rapp)).toEqual({ compatible: true });
    });

    test('reports missing capabilities', () => {
      const rapp = new FakeRapp(logger, {
        name: 'nav_app',
        requiredCapabilities: ['lidar_driver', 'gps', 'imu'],
      });

      expect(gate.checkCompatibility(rapp)).toEqual({
        compatible: false,
        missingCapabilities: ['gps', 'imu'],
        reason: 'missing capabilities (gps, imu)',
      });
    });

    test('without an index, rapps needing capabilities are incompatible', () => {
      const noIndex = new CapabilityGate({ logger, index: null });
      const rapp = new FakeRapp(logger, {
        name: 'nav_app',
        requiredCapabilities: ['lidar_driver'],
      });

      expect(noIndex.isAvailable()).toBe(false);
      expect(noIndex.checkCompatibility(rapp)).toEqual({
        compatible: false,
        missingCapabilities: ['lidar_driver'],
        reason: 'capabilities are not available',
      });
      expect(arraySink.messagesOfType('warn')).toEqual([
        'Capability index unavailable, rapps requiring capabilities will not be runnable',
      ]);
    });
  });

  describe('single operations', () => {
    test('start and stop track activation', async () => {
      expect(await gate.startCapability('camera')).toEqual({
        success: true,
        capabilityName: 'camera',
      });
      expect(gate.isCapabilityActive('camera')).toBe(true);

      await gate.stopCapability('camera');
      expect(gate.isCapabilityActive('camera')).toBe(false);
    });

    test('a refused start is capability_failed', async () => {
      index.refuseStart.add('camera');

      expect(await gate.startCapability('camera')).toEqual({
        success: false,
        capabilityName: 'camera',
        reason: "Starting capability 'camera' was not successful",
        code: 'capability_failed',
      });
      expect(gate.isCapabilityActive('camera')).toBe(false);
    });

    test('an unreachable service is capability_service_unavailable', async () => {
      index.serviceDown = true;

      const result = await gate.startCapability('camera');

      expect(result.success).toBe(false);
      expect(result.code).toBe('capability_service_unavailable');
      expect(result.error).toBeInstanceOf(CapabilityServiceUnavailableError);
      expect(result.reason).toBe(
        "Service for starting capabilities is not available (capability 'camera'): Capability service unavailable while trying to start \"camera\"",
      );
    });

    test('other thrown errors are capability_error', async () => {
      index.throwOnStart.add('camera');

      const result = await gate.startCapability('camera');

      expect(result.code).toBe('capability_error');
      expect(result.reason).toBe(
        "Error occurred while trying to start capability 'camera': camera exploded",
      );
    });

    test('without an index every operation is capability_service_unavailable', async () => {
      const noIndex = new CapabilityGate({ logger, index: null });

      const result = await noIndex.stopCapability('camera');

      expect(result.code).toBe('capability_service_unavailable');
      expect(result.reason).toBe(
        'Capability service unavailable while trying to stop "camera"',
      );
    });
  });

  describe('sequences', () => {
    test('start in declaration order', async () => {
      const result = await gate.startCapabilities(['base_driver', 'lidar_driver']);

      expect(result).toEqual({
        success: true,
        completed: ['base_driver', 'lidar_driver'],
      });
      expect(index.calls).toEqual(['start:base_driver', 'start:lidar_driver']);
    });

    test('abort on the first failure without rollback', async () => {
      index.refuseStart.add('lidar_driver');

      const result = await gate.startCapabilities([
        'base_driver',
        'lidar_driver',
        'camera',
      ]);

      expect(result.success).toBe(false);
      expect(result.completed).toEqual(['base_driver']);
      expect(result.failure?.capabilityName).toBe('lidar_driver');
      expect(index.calls).toEqual(['start:base_driver', 'start:lidar_driver']);
      expect(gate.getActiveCapabilities()).toEqual(['base_driver']);
    });

    test('stop aborts on the first failure and leaves the rest active', async () => {
      await gate.startCapabilities(['base_driver', 'lidar_driver']);
      index.calls = [];
      index.refuseStop.add('base_driver');

      const result = await gate.stopCapabilities(['base_driver', 'lidar_driver']);

      expect(result.success).toBe(false);
      expect(result.failure?.reason).toBe(
        "Stopping capability 'base_driver' was not successful",
      );
      expect(index.calls).toEqual(['stop:base_driver']);
      expect(gate.getActiveCapabilities()).toEqual(['base_driver', 'lidar_driver']);
    });

    test('an empty sequence succeeds without touching the index', async () => {
      expect(await gate.startCapabilities([])).toEqual({
        success: true,
        completed: [],
      });
      expect(index.calls).toEqual([]);
    });
  });
});

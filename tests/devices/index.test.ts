import { describe, it, expect } from 'vitest';
import { DEVICE_PLUGINS, KNOWN_DEVICE_TYPES, createPlugin } from '../../src/devices/index.js';
import { QardioArmPlugin } from '../../src/devices/qardio-arm.js';
import { QardioCorePlugin } from '../../src/devices/qardio-core.js';
import { ConnectionManager } from '../../src/engine/connection.js';
import {
  ARM_ADDRESS,
  createFakeLink,
  createFakeTransport,
  deviceDescriptor,
} from '../helpers/fake-ble.js';

const connections = new ConnectionManager(
  createFakeTransport({ address: ARM_ADDRESS, makeLink: () => createFakeLink([]) }),
);

describe('device plugin registry', () => {
  it('registers the cuff and the ECG strap', () => {
    expect(KNOWN_DEVICE_TYPES).toEqual(['arm', 'core']);
    expect(Object.keys(DEVICE_PLUGINS)).toEqual(KNOWN_DEVICE_TYPES);
  });

  it('creates the plugin matching the descriptor type', () => {
    const arm = createPlugin({ device: deviceDescriptor({ type: 'arm' }), connections });
    const core = createPlugin({ device: deviceDescriptor({ type: 'core' }), connections });
    expect(arm).toBeInstanceOf(QardioArmPlugin);
    expect(arm.type).toBe('arm');
    expect(core).toBeInstanceOf(QardioCorePlugin);
  });

  it('names the known types when the type is unknown', () => {
    expect(() =>
      createPlugin({ device: deviceDescriptor({ type: 'thermometer' }), connections }),
    ).toThrow("Unknown device type 'thermometer'. Known types: arm, core");
  });

  it('does not resolve inherited object keys as device types', () => {
    expect(() =>
      createPlugin({ device: deviceDescriptor({ type: 'toString' }), connections }),
    ).toThrow("Unknown device type 'toString'");
  });
});

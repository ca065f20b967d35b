import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  CONFIG_FILENAME,
  defaultConfigPaths,
  findConfigFile,
  loadConfigFile,
  parseConfig,
  resolveDevice,
  toDeviceDescriptor,
} from '../../src/config/load.js';

vi.spyOn(console, 'log').mockImplementation(() => {});
vi.spyOn(console, 'error').mockImplementation(() => {});

const YAML = `
version: 1
devices:
  arm:
    address: "AA:BB:CC:DD:EE:01"
    name: Living room cuff
    timeout: 90
    scan_timeout: 12.5
    poll_interval: 30
    retry:
      count: 1
      backoff_ms: 250
  bedroom:
    type: arm
    address: "AA:BB:CC:DD:EE:03"
    adapter: hci1
`;

describe('parseConfig()', () => {
  it('parses and validates YAML', () => {
    const config = parseConfig(YAML);
    expect(Object.keys(config.devices)).toEqual(['arm', 'bedroom']);
    expect(config.devices.bedroom.queue_limit).toBe(64);
  });

  it('throws on malformed YAML', () => {
    expect(() => parseConfig('devices: [unclosed', 'broken.yaml')).toThrow(
      /^Invalid YAML in broken\.yaml: /,
    );
  });

  it('throws the formatted schema error', () => {
    expect(() => parseConfig('version: 1\ndevices: {}\n', 'empty.yaml')).toThrow(
      'Configuration error in empty.yaml:',
    );
  });
});

describe('toDeviceDescriptor()', () => {
  const config = parseConfig(YAML);

  it('converts seconds to milliseconds and names the device after its key', () => {
    expect(toDeviceDescriptor('bedroom', config.devices.bedroom, {})).toEqual({
      type: 'arm',
      address: 'AA:BB:CC:DD:EE:03',
      adapter: 'hci1',
      name: 'bedroom',
      scanTimeoutMs: 10_000,
      timeoutMs: 60_000,
      pollIntervalMs: 0,
      retry: { count: 2, backoffMs: 1000 },
      queueLimit: 64,
    });
  });

  it('defaults the plugin type to the key', () => {
    const descriptor = toDeviceDescriptor('arm', config.devices.arm, {});
    expect(descriptor).toMatchObject({
      type: 'arm',
      name: 'Living room cuff',
      scanTimeoutMs: 12_500,
      timeoutMs: 90_000,
      pollIntervalMs: 30_000,
      retry: { count: 1, backoffMs: 250 },
    });
    expect(descriptor.adapter).toBeUndefined();
  });

  it('lets DEVICE_ADDRESS and BLE_ADAPTER override the entry', () => {
    const descriptor = toDeviceDescriptor('bedroom', config.devices.bedroom, {
      DEVICE_ADDRESS: ' 11:22:33:44:55:66 ',
      BLE_ADAPTER: 'hci0',
    });
    expect(descriptor.address).toBe('11:22:33:44:55:66');
    expect(descriptor.adapter).toBe('hci0');
  });

  it('ignores blank overrides', () => {
    const descriptor = toDeviceDescriptor('bedroom', config.devices.bedroom, {
      DEVICE_ADDRESS: '',
      BLE_ADAPTER: '  ',
    });
    expect(descriptor.address).toBe('AA:BB:CC:DD:EE:03');
    expect(descriptor.adapter).toBe('hci1');
  });

  it('rejects a malformed DEVICE_ADDRESS', () => {
    expect(() =>
      toDeviceDescriptor('arm', config.devices.arm, { DEVICE_ADDRESS: 'cuff' }),
    ).toThrow(
      "DEVICE_ADDRESS must be a MAC address (XX:XX:XX:XX:XX:XX) or CoreBluetooth UUID (macOS), got 'cuff'",
    );
  });

  it('rejects a malformed BLE_ADAPTER', () => {
    expect(() => toDeviceDescriptor('arm', config.devices.arm, { BLE_ADAPTER: 'usb0' })).toThrow(
      "BLE_ADAPTER must look like 'hci0', got 'usb0'",
    );
  });
});

describe('resolveDevice()', () => {
  const config = parseConfig(YAML);

  it('resolves a configured key', () => {
    expect(resolveDevice(config, 'bedroom', {}).address).toBe('AA:BB:CC:DD:EE:03');
  });

  it('lists the configured keys for an unknown one', () => {
    expect(() => resolveDevice(config, 'kitchen', {})).toThrow(
      "Unknown device 'kitchen'. Configured devices: arm, bedroom",
    );
  });

  it('does not resolve inherited object keys', () => {
    expect(() => resolveDevice(config, 'constructor', {})).toThrow(
      "Unknown device 'constructor'",
    );
  });
});

describe('config file lookup', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'cardio-ble-'));
    writeFileSync(join(dir, CONFIG_FILENAME), YAML);
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('looks in the working directory, then the user config directory', () => {
    expect(defaultConfigPaths('/work', '/home/me')).toEqual([
      join('/work', 'cardio-ble.yaml'),
      join('/home/me', '.config', 'cardio-ble', 'config.yaml'),
    ]);
  });

  it('returns the first candidate that exists', () => {
    const missing = join(dir, 'missing.yaml');
    const present = join(dir, CONFIG_FILENAME);
    expect(findConfigFile(undefined, [missing, present])).toBe(present);
  });

  it('fails when no candidate exists', () => {
    const missing = join(dir, 'missing.yaml');
    expect(() => findConfigFile(undefined, [missing])).toThrow(
      `No config file found. Looked in: ${missing}`,
    );
  });

  it('fails when an explicit path does not exist', () => {
    const missing = join(dir, 'nope.yaml');
    expect(() => findConfigFile(missing)).toThrow(`Config file not found: ${missing}`);
  });

  it('loads an explicit path', () => {
    const path = join(dir, CONFIG_FILENAME);
    const loaded = loadConfigFile(path);
    expect(loaded.path).toBe(path);
    expect(loaded.config.devices.arm.name).toBe('Living room cuff');
  });
});

import NodeBle from 'node-ble';
import type { BleChar, BleLink, BlePeripheral, BleService, BleTransport } from './shared.js';
import { toCharProperties } from './shared.js';
import {
  bleLog,
  normalizeUuid,
  formatMac,
  sleep,
  errMsg,
  SCAN_POLL_MS,
  POST_DISCOVERY_QUIESCE_MS,
} from './types.js';

type Device = NodeBle.Device;
type Adapter = NodeBle.Adapter;
type GattCharacteristic = NodeBle.GattCharacteristic;

// ─── Discovery helpers ────────────────────────────────────────────────────────

/**
 * Start BlueZ discovery, tolerating a session already owned by another D-Bus client.
 * Returns true if discovery is active.
 */
async function startDiscoverySafe(btAdapter: Adapter): Promise<boolean> {
  try {
    await btAdapter.startDiscovery();
    bleLog.debug('Discovery started');
    return true;
  } catch (e) {
    bleLog.debug(`startDiscovery failed: ${errMsg(e)}`);
  }

  if (await btAdapter.isDiscovering()) {
    bleLog.debug('Discovery already active (owned by another client), continuing');
    return true;
  }

  bleLog.warn(
    'Could not start active discovery. ' +
      'Proceeding with passive scanning (device may take longer to appear).',
  );
  return false;
}

async function stopDiscoverySafe(btAdapter: Adapter): Promise<void> {
  try {
    await btAdapter.stopDiscovery();
    bleLog.debug('Discovery stopped');
  } catch (e) {
    bleLog.debug(`stopDiscovery failed (may already be stopped): ${errMsg(e)}`);
  }
}

// ─── BLE abstraction wrappers ─────────────────────────────────────────────────

async function wrapChar(char: GattCharacteristic, uuid: string): Promise<BleChar> {
  const properties = toCharProperties(await char.getFlags());
  return {
    uuid: normalizeUuid(uuid),
    properties,
    subscribe: async (onData) => {
      char.on('valuechanged', onData);
      await char.startNotifications();
      return async () => {
        char.removeListener('valuechanged', onData);
        await char.stopNotifications();
      };
    },
    write: async (data, withResponse) => {
      if (withResponse) {
        await char.writeValue(data);
      } else {
        await char.writeValueWithoutResponse(data);
      }
    },
    read: () => char.readValue(),
  };
}

async function discoverServices(gatt: NodeBle.GattServer): Promise<BleService[]> {
  const services: BleService[] = [];
  const serviceUuids = await gatt.services();

  for (const svcUuid of serviceUuids) {
    const service = await gatt.getPrimaryService(svcUuid);
    const charUuids = await service.characteristics();
    bleLog.debug(`  Service ${svcUuid}: chars=[${charUuids.join(', ')}]`);

    const characteristics: BleChar[] = [];
    for (const charUuid of charUuids) {
      characteristics.push(await wrapChar(await service.getCharacteristic(charUuid), charUuid));
    }
    services.push({ uuid: normalizeUuid(svcUuid), characteristics });
  }

  return services;
}

function wrapDevice(device: Device): BleLink {
  return {
    discover: async () => discoverServices(await device.gatt()),
    onDisconnect: (callback) => {
      device.on('disconnect', () => callback());
    },
    disconnect: () => device.disconnect(),
  };
}

// ─── Transport ────────────────────────────────────────────────────────────────

/**
 * BlueZ D-Bus transport. Honours the configured adapter name (e.g. `hci1`),
 * falling back to the default adapter when it does not exist.
 */
export async function createNodeBleTransport(adapterName?: string): Promise<BleTransport> {
  const { bluetooth, destroy } = NodeBle.createBluetooth();

  let btAdapter: Adapter;
  if (adapterName) {
    const available = await bluetooth.adapters();
    if (available.includes(adapterName)) {
      btAdapter = await bluetooth.getAdapter(adapterName);
    } else {
      bleLog.warn(
        `Adapter '${adapterName}' not found (available: ${available.join(', ') || 'none'}). ` +
          'Using default adapter.',
      );
      btAdapter = await bluetooth.defaultAdapter();
    }
  } else {
    btAdapter = await bluetooth.defaultAdapter();
  }

  if (!(await btAdapter.isPowered())) {
    destroy();
    throw new Error(
      'Bluetooth adapter is not powered on. ' +
        'Ensure bluetoothd is running: sudo systemctl start bluetooth',
    );
  }

  const findPeripheral = async (
    address: string,
    timeoutMs: number,
  ): Promise<BlePeripheral | null> => {
    const mac = formatMac(address);
    await startDiscoverySafe(btAdapter);
    bleLog.info(`Scanning for ${mac}...`);

    const deadline = Date.now() + timeoutMs;
    try {
      while (Date.now() < deadline) {
        const addresses = await btAdapter.devices();
        if (addresses.map(formatMac).includes(mac)) {
          const device = await btAdapter.getDevice(mac);
          const name = await device.getName().catch(() => '');
          bleLog.debug(`Found device: ${name || '(no name)'} [${mac}]`);
          return {
            address: mac,
            name,
            connect: async () => {
              await device.connect();
              return wrapDevice(device);
            },
          };
        }
        await sleep(SCAN_POLL_MS);
      }
      return null;
    } finally {
      // BlueZ on low-power hosts often aborts connections while discovery is active.
      await stopDiscoverySafe(btAdapter);
      await sleep(POST_DISCOVERY_QUIESCE_MS);
    }
  };

  return {
    name: 'node-ble (BlueZ D-Bus)',
    findPeripheral,
    destroy: async () => destroy(),
  };
}

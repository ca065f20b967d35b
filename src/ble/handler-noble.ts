import noble from '@abandonware/noble';
import type { Peripheral, Characteristic } from '@abandonware/noble';
import type { BleChar, BleLink, BlePeripheral, BleService, BleTransport } from './shared.js';
import { toCharProperties } from './shared.js';
import { bleLog, normalizeUuid, errMsg, sameAddress } from './types.js';

// ─── Noble state management ───────────────────────────────────────────────────

/** Wait for the Bluetooth adapter to reach 'poweredOn' state. */
function waitForPoweredOn(): Promise<void> {
  if (noble._state === 'poweredOn') return Promise.resolve();
  return new Promise<void>((resolve, reject) => {
    const timeout = setTimeout(() => {
      noble.removeListener('stateChange', onState);
      reject(new Error(`Bluetooth adapter state: '${noble._state}' (expected 'poweredOn')`));
    }, 10_000);

    const onState = (state: string): void => {
      if (state === 'poweredOn') {
        clearTimeout(timeout);
        noble.removeListener('stateChange', onState);
        resolve();
      }
    };
    noble.on('stateChange', onState);
  });
}

/** Get a stable device address: MAC on Windows/Linux, peripheral.id on macOS. */
function peripheralAddress(peripheral: Peripheral): string {
  // On macOS, peripheral.address is often empty or '<unknown>'.
  // peripheral.id is the CoreBluetooth UUID and is always available.
  if (peripheral.address && !['', 'unknown', '<unknown>'].includes(peripheral.address)) {
    return peripheral.address.toUpperCase();
  }
  return peripheral.id;
}

/** Check whether a peripheral matches a target identifier (MAC or CoreBluetooth UUID). */
function matchesTarget(peripheral: Peripheral, target: string): boolean {
  return (
    sameAddress(peripheral.address ?? '', target) || sameAddress(peripheral.id ?? '', target)
  );
}

// ─── BLE abstraction wrappers ─────────────────────────────────────────────────

function wrapChar(char: Characteristic): BleChar {
  return {
    uuid: normalizeUuid(char.uuid),
    properties: toCharProperties(char.properties),
    subscribe: async (onData) => {
      const listener = (data: Buffer) => onData(data);
      char.on('data', listener);
      await char.subscribeAsync();
      return async () => {
        char.removeListener('data', listener);
        await char.unsubscribeAsync();
      };
    },
    write: (data, withResponse) => char.writeAsync(data, !withResponse),
    read: () => char.readAsync(),
  };
}

function wrapPeripheral(peripheral: Peripheral): BleLink {
  return {
    discover: async () => {
      const { services } = await peripheral.discoverAllServicesAndCharacteristicsAsync();
      return services.map(
        (svc): BleService => ({
          uuid: normalizeUuid(svc.uuid),
          characteristics: (svc.characteristics ?? []).map(wrapChar),
        }),
      );
    },
    onDisconnect: (callback) => {
      peripheral.once('disconnect', () => callback());
    },
    disconnect: () => peripheral.disconnectAsync(),
  };
}

// ─── Discovery helpers ────────────────────────────────────────────────────────

/** Scan until the target peripheral advertises or `timeoutMs` elapses (resolves null). */
function discoverPeripheral(address: string, timeoutMs: number): Promise<Peripheral | null> {
  return new Promise((resolve, reject) => {
    const timeout = setTimeout(() => {
      cleanup();
      resolve(null);
    }, timeoutMs);

    const cleanup = () => {
      clearTimeout(timeout);
      noble.removeListener('discover', onDiscover);
      noble.stopScanningAsync().catch((e: unknown) => {
        bleLog.debug(`stopScanning failed: ${errMsg(e)}`);
      });
    };

    const onDiscover = (peripheral: Peripheral): void => {
      const name = peripheral.advertisement?.localName ?? '';
      bleLog.debug(`Discovered: ${name || '(no name)'} [${peripheralAddress(peripheral)}]`);
      if (!matchesTarget(peripheral, address)) return;
      cleanup();
      resolve(peripheral);
    };

    noble.on('discover', onDiscover);

    // allowDuplicates=true so we keep receiving advertisements
    noble.startScanningAsync([], true).catch((err: unknown) => {
      cleanup();
      reject(new Error(`Failed to start scanning: ${errMsg(err)}`));
    });
  });
}

// ─── Transport ────────────────────────────────────────────────────────────────

/**
 * noble transport (Windows, macOS, or any platform with NOBLE_DRIVER set).
 * noble selects its HCI device through NOBLE_HCI_DEVICE_ID, which the
 * transport factory sets before this module loads.
 */
export async function createNobleTransport(): Promise<BleTransport> {
  await waitForPoweredOn();

  return {
    name: 'noble (@abandonware/noble)',
    findPeripheral: async (address, timeoutMs) => {
      bleLog.info(`Scanning for ${address}...`);
      const peripheral = await discoverPeripheral(address, timeoutMs);
      if (!peripheral) return null;
      const found: BlePeripheral = {
        address: peripheralAddress(peripheral),
        name: peripheral.advertisement?.localName ?? '',
        connect: async () => {
          await peripheral.connectAsync();
          return wrapPeripheral(peripheral);
        },
      };
      return found;
    },
    destroy: async () => {
      await noble.stopScanningAsync();
    },
  };
}

import type { BleTransport } from './shared.js';
import { bleLog } from './types.js';

export type {
  BleChar,
  BleLink,
  BlePeripheral,
  BleService,
  BleTransport,
  CharProperty,
} from './shared.js';

type NobleDriver = 'abandonware';

/** Resolve NOBLE_DRIVER env var to a specific noble driver, or null for OS default. */
function resolveNobleDriver(): NobleDriver | null {
  const driver = process.env.NOBLE_DRIVER?.toLowerCase();
  if (driver === 'abandonware') return 'abandonware';
  return null;
}

/** noble addresses HCI devices by index; translate `hciN` into NOBLE_HCI_DEVICE_ID. */
function applyNobleAdapter(adapterName?: string): void {
  if (!adapterName) return;
  const match = /^hci(\d+)$/.exec(adapterName);
  if (!match) {
    bleLog.warn(`Adapter '${adapterName}' is not an hciN name; noble will use its default.`);
    return;
  }
  process.env.NOBLE_HCI_DEVICE_ID = match[1];
}

/**
 * Open the BLE transport for this platform.
 *
 * - Linux → node-ble (BlueZ D-Bus)
 * - Windows / macOS → @abandonware/noble
 *
 * Override with NOBLE_DRIVER=abandonware on any platform.
 * Dynamic import() ensures the unused library is never loaded.
 */
export async function createTransport(adapterName?: string): Promise<BleTransport> {
  const useNoble = resolveNobleDriver() !== null || process.platform !== 'linux';

  if (useNoble) {
    applyNobleAdapter(adapterName);
    const { createNobleTransport } = await import('./handler-noble.js');
    const transport = await createNobleTransport();
    bleLog.debug(`BLE handler: ${transport.name}`);
    return transport;
  }

  const { createNodeBleTransport } = await import('./handler-node-ble.js');
  const transport = await createNodeBleTransport(adapterName);
  bleLog.debug(`BLE handler: ${transport.name}`);
  return transport;
}

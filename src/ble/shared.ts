// ─── Thin abstractions over BLE library objects ───────────────────────────────
//
// Both transports (node-ble on Linux, noble elsewhere) are wrapped into these
// shapes so the engine never touches a library object directly.

export type CharProperty = 'read' | 'write' | 'writeWithoutResponse' | 'notify' | 'indicate';

const PROPERTY_ALIASES: Record<string, CharProperty> = {
  read: 'read',
  write: 'write',
  writewithoutresponse: 'writeWithoutResponse',
  'write-without-response': 'writeWithoutResponse',
  notify: 'notify',
  indicate: 'indicate',
};

/**
 * Map library-specific property/flag names (noble's `writeWithoutResponse`,
 * BlueZ's `write-without-response`, ...) onto the engine's property set.
 * Flags outside the set (broadcast, authenticated-signed-writes, ...) are dropped.
 */
export function toCharProperties(flags: readonly string[]): CharProperty[] {
  const props: CharProperty[] = [];
  for (const flag of flags) {
    const prop = PROPERTY_ALIASES[flag.toLowerCase()];
    if (prop && !props.includes(prop)) props.push(prop);
  }
  return props;
}

export interface BleChar {
  /** Normalized (32-char, lowercase) UUID. */
  readonly uuid: string;
  readonly properties: readonly CharProperty[];
  /**
   * Enable notifications/indications and forward values to `onData`.
   * Resolves with a function that removes the listener and stops notifications.
   */
  subscribe(onData: (data: Buffer) => void): Promise<() => Promise<void>>;
  write(data: Buffer, withResponse: boolean): Promise<void>;
  read(): Promise<Buffer>;
}

export interface BleService {
  /** Normalized (32-char, lowercase) UUID. */
  readonly uuid: string;
  readonly characteristics: readonly BleChar[];
}

/** An established GATT client connection. */
export interface BleLink {
  discover(): Promise<BleService[]>;
  onDisconnect(callback: () => void): void;
  disconnect(): Promise<void>;
}

/** A device observed during scanning, not yet connected. */
export interface BlePeripheral {
  readonly address: string;
  readonly name: string;
  connect(): Promise<BleLink>;
}

export interface BleTransport {
  readonly name: string;
  /**
   * Scan for `address` for up to `timeoutMs`.
   * Resolves null when the scan finished without observing the device.
   */
  findPeripheral(address: string, timeoutMs: number): Promise<BlePeripheral | null>;
  /** Release library resources (D-Bus connection, scanning state). */
  destroy(): Promise<void>;
}

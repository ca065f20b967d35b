import { createLogger } from '../logger.js';
export { errMsg } from '../utils/error.js';

// ─── Constants ────────────────────────────────────────────────────────────────

export const BT_BASE_UUID_SUFFIX = '00001000800000805f9b34fb';
export const CONNECT_TIMEOUT_MS = 30_000;
export const SCAN_POLL_MS = 500;

/** Extra time granted to a transport's scan call beyond the scan budget itself. */
export const SCAN_GRACE_MS = 2_000;

/** Timeout for GATT service/characteristic enumeration after connecting. */
export const GATT_DISCOVERY_TIMEOUT_MS = 30_000;

/** Delay after stopping BlueZ discovery to let the radio quiesce before connecting. */
export const POST_DISCOVERY_QUIESCE_MS = 500;

// ─── Pure utilities ───────────────────────────────────────────────────────────

export const bleLog = createLogger('BLE');

/** Normalize a UUID to lowercase 32-char (no dashes) form for comparison. */
export function normalizeUuid(uuid: string): string {
  const stripped = uuid.replace(/-/g, '').toLowerCase();
  if (stripped.length === 4) {
    return `0000${stripped}${BT_BASE_UUID_SUFFIX}`;
  }
  return stripped;
}

/** Full normalized form of a 16-bit SIG-assigned UUID. */
export function uuid16(code: number): string {
  return `0000${code.toString(16).padStart(4, '0')}${BT_BASE_UUID_SUFFIX}`;
}

/** Canonical dashed form (8-4-4-4-12) of any UUID, for display. */
export function formatUuid(uuid: string): string {
  const n = normalizeUuid(uuid);
  if (n.length !== 32) return n;
  return `${n.slice(0, 8)}-${n.slice(8, 12)}-${n.slice(12, 16)}-${n.slice(16, 20)}-${n.slice(20)}`;
}

/** Format MAC address for BlueZ D-Bus (uppercase with colons). */
export function formatMac(mac: string): string {
  const clean = mac.replace(/[:-]/g, '').toUpperCase();
  const pairs = clean.match(/.{2}/g);
  return pairs ? pairs.join(':') : clean;
}

/** Compare two device addresses ignoring case and separators. */
export function sameAddress(a: string, b: string): boolean {
  return a.replace(/[:-]/g, '').toUpperCase() === b.replace(/[:-]/g, '').toUpperCase();
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

/**
 * Race a promise against a timer. `onTimeout` is either the message of a plain
 * Error or a factory for a typed one.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: string | (() => Error),
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(
      () => reject(typeof onTimeout === 'string' ? new Error(onTimeout) : onTimeout()),
      ms,
    );
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

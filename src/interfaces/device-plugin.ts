import type { MeasurementCondition, MeasurementValues } from '../engine/codec.js';
import type { GattCatalog } from '../engine/gatt-registry.js';
import type { AbortReason, ProgressCallback } from '../engine/measurement.js';
import type { ConnectionManager } from '../engine/connection.js';

export interface RetryPolicy {
  /** Extra connection attempts after the first one fails. */
  count: number;
  /** Delay before retry n is `backoffMs * n`. */
  backoffMs: number;
}

/** A configured device. Identity is address + adapter. */
export interface DeviceDescriptor {
  /** Plugin id, e.g. 'arm'. */
  type: string;
  /** MAC address, or CoreBluetooth UUID on macOS. */
  address: string;
  /** HCI adapter name (e.g. 'hci0'); undefined means the platform default. */
  adapter?: string;
  name: string;
  scanTimeoutMs: number;
  /** Measurement inactivity timeout. */
  timeoutMs: number;
  /** Keep-alive poll interval; 0 disables keep-alive. */
  pollIntervalMs: number;
  retry: RetryPolicy;
  queueLimit: number;
}

export interface DeviceIdentity {
  address: string;
  adapter: string | null;
  name: string;
}

export type MeasurementOutcomeStatus =
  | { status: 'Completed' }
  | { status: 'Aborted'; reason: AbortReason; detail?: string };

/** Outcome of one measurement attempt, handed to the caller for persistence. */
export interface MeasurementRecord {
  device: DeviceIdentity;
  values: MeasurementValues | null;
  conditions: MeasurementCondition[];
  /** Battery percentage read after completion; null when aborted or unreadable. */
  battery: number | null;
  capturedAt: Date;
  outcome: MeasurementOutcomeStatus;
}

export type FeatureMap = Record<string, unknown>;

export interface PluginContext {
  device: DeviceDescriptor;
  connections: ConnectionManager;
  /** Clock used to stamp records. */
  now?: () => Date;
}

/**
 * Operations every device module exposes. The engine underneath is shared;
 * a module only contributes UUIDs, annotations and frame decoding.
 */
export interface DevicePlugin {
  readonly type: string;
  readonly name: string;
  /** Connect if needed and return the freshly discovered GATT catalog. */
  discover(): Promise<GattCatalog>;
  read(uuid: string): Promise<Buffer>;
  write(uuid: string, data: Buffer | number[], withResponse?: boolean): Promise<void>;
  measure(onProgress?: ProgressCallback, signal?: AbortSignal): Promise<MeasurementRecord>;
  getBattery(): Promise<number>;
  getDeviceInfo(): Promise<Record<string, string>>;
  getFeatures(): Promise<FeatureMap>;
  /** Tear down the session; safe to call more than once. */
  close(): Promise<void>;
}

export type PluginFactory = (ctx: PluginContext) => DevicePlugin;

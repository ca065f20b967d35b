import type {
  DeviceIdentity,
  DevicePlugin,
  FeatureMap,
  MeasurementRecord,
  PluginContext,
} from '../interfaces/device-plugin.js';
import type { Session } from '../engine/connection.js';
import type { GattCatalog } from '../engine/gatt-registry.js';
import type { MeasurementProfile, ProgressCallback } from '../engine/measurement.js';
import { MeasurementStateMachine } from '../engine/measurement.js';
import { assembleRecord } from '../engine/assembler.js';
import { decodeBatteryLevel, decodeDeviceInfoValue } from '../engine/codec.js';
import { normalizeUuid, uuid16 } from '../ble/types.js';
import { CatalogError, UnsupportedOperationError, WriteRejectedError } from '../errors.js';
import { createLogger } from '../logger.js';
import { errMsg } from '../utils/error.js';

const log = createLogger('Device');

export const BATTERY_LEVEL_UUID = uuid16(0x2a19);

/** Device Information Service fields, keyed the way getDeviceInfo() reports them. */
export const DEVICE_INFO_FIELDS: ReadonlyArray<readonly [key: string, uuid: string]> = [
  ['manufacturer', uuid16(0x2a29)],
  ['model', uuid16(0x2a24)],
  ['serial', uuid16(0x2a25)],
  ['firmware', uuid16(0x2a26)],
  ['software', uuid16(0x2a28)],
  ['hardware', uuid16(0x2a27)],
  ['systemId', uuid16(0x2a23)],
  ['pnpId', uuid16(0x2a50)],
];

/**
 * Everything a GATT device module shares: session handling, raw read/write,
 * battery, device information and the measurement run. Subclasses provide
 * annotations, an optional measurement profile and their feature map.
 */
export abstract class GattDevicePlugin implements DevicePlugin {
  abstract readonly type: string;
  /** Vendor UUID → label, merged over the standard names. */
  protected abstract readonly annotations: Record<string, string>;

  private session: Session | null = null;

  constructor(protected readonly ctx: PluginContext) {}

  get name(): string {
    return this.ctx.device.name;
  }

  /** null when the device has no blood-pressure style measurement cycle. */
  protected abstract measurementProfile(): MeasurementProfile | null;

  abstract getFeatures(): Promise<FeatureMap>;

  protected get identity(): DeviceIdentity {
    const { address, adapter, name } = this.ctx.device;
    return { address, adapter: adapter ?? null, name };
  }

  protected async ensureSession(): Promise<Session> {
    if (this.session?.status === 'open') return this.session;

    const { device, connections } = this.ctx;
    const session = await connections.connectWithRetry(device, device.retry, this.annotations);
    this.session = session;

    if (device.pollIntervalMs > 0 && session.registry.has(BATTERY_LEVEL_UUID)) {
      connections.keepAlive(session, device.pollIntervalMs, BATTERY_LEVEL_UUID);
    }
    return session;
  }

  async discover(): Promise<GattCatalog> {
    const session = await this.ensureSession();
    const { catalog } = session;
    if (!catalog) {
      throw new CatalogError('NotDiscovered', 'Session is open but holds no catalog');
    }
    return catalog;
  }

  async read(uuid: string): Promise<Buffer> {
    const session = await this.ensureSession();
    return session.registry.resolve(uuid).read();
  }

  async write(uuid: string, data: Buffer | number[], withResponse = true): Promise<void> {
    const session = await this.ensureSession();
    const char = session.registry.resolve(uuid);
    const payload = Buffer.isBuffer(data) ? data : Buffer.from(data);
    try {
      await char.write(payload, withResponse);
    } catch (e) {
      throw new WriteRejectedError(normalizeUuid(uuid), { cause: e });
    }
    log.debug(`Wrote ${payload.toString('hex')} to ${uuid}`);
  }

  async getBattery(): Promise<number> {
    return decodeBatteryLevel(await this.read(BATTERY_LEVEL_UUID));
  }

  /** Reads every Device Information field the device exposes; unreadable ones are skipped. */
  async getDeviceInfo(): Promise<Record<string, string>> {
    const session = await this.ensureSession();
    const info: Record<string, string> = {};
    for (const [key, uuid] of DEVICE_INFO_FIELDS) {
      if (!session.registry.has(uuid)) continue;
      try {
        const raw = await session.registry.resolve(uuid).read();
        info[key] = decodeDeviceInfoValue(uuid, raw);
      } catch (e) {
        log.warn(`Could not read ${key}: ${errMsg(e)}`);
      }
    }
    return info;
  }

  async measure(onProgress?: ProgressCallback, signal?: AbortSignal): Promise<MeasurementRecord> {
    const profile = this.measurementProfile();
    if (!profile) throw new UnsupportedOperationError(this.type, 'measure');

    const session = await this.ensureSession();
    const release = session.claimMeasurement();
    const machine = new MeasurementStateMachine(session.registry, session.dispatcher, profile, {
      timeoutMs: this.ctx.device.timeoutMs,
      onProgress,
      signal,
    });
    const stopWatching = session.onLinkLost((err) => machine.abort('link-lost', err.message));

    try {
      const outcome = await machine.run();
      return await assembleRecord(outcome, {
        device: this.identity,
        registry: session.registry,
        batteryUuid: BATTERY_LEVEL_UUID,
        now: this.ctx.now ?? (() => new Date()),
      });
    } finally {
      stopWatching();
      release();
    }
  }

  async close(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (session) await this.ctx.connections.disconnect(session);
  }
}

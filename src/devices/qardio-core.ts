import type { FeatureMap } from '../interfaces/device-plugin.js';
import { GattDevicePlugin } from './gatt-device.js';

/**
 * QardioCore ECG strap. Its ECG stream is undocumented, so only the generic
 * operations (discover, read/write, battery, device info) are offered.
 */
export class QardioCorePlugin extends GattDevicePlugin {
  readonly type = 'core';
  protected readonly annotations: Record<string, string> = {};

  protected measurementProfile(): null {
    return null;
  }

  /** Lists the services the strap exposes, by name where one is known. */
  async getFeatures(): Promise<FeatureMap> {
    const catalog = await this.discover();
    return {
      services: catalog.services.map((svc) => svc.annotation ?? svc.uuid),
    };
  }
}

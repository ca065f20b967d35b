import type { FeatureMap } from '../interfaces/device-plugin.js';
import type { MeasurementProfile } from '../engine/measurement.js';
import {
  ACTIVATION_COMMAND,
  decodeBloodPressureFeature,
  decodeBloodPressureMeasurement,
  decodeVendorFrame,
} from '../engine/codec.js';
import { normalizeUuid, uuid16 } from '../ble/types.js';
import { GattDevicePlugin } from './gatt-device.js';

// Standard BT SIG characteristic UUIDs
export const BP_MEASUREMENT_UUID = uuid16(0x2a35);
export const BP_FEATURE_UUID = uuid16(0x2a49);

/** Vendor control point: activation writes and measurement phase notifications. */
export const QARDIO_CONTROL_UUID = normalizeUuid('583cb5b3-875d-40ed-9098-c39eb0c1983d');

/**
 * The cuff reports arm movement on 2A35 with a `04 FF` frame instead of a
 * control point abort.
 */
export function detectArmMovement(data: Buffer): string | null {
  return data.length >= 5 && data[0] === 0x04 && data[1] === 0xff ? 'arm movement' : null;
}

export const ARM_PROFILE: MeasurementProfile = {
  measurementUuid: BP_MEASUREMENT_UUID,
  controlUuid: QARDIO_CONTROL_UUID,
  activationCommand: ACTIVATION_COMMAND,
  decodeMeasurement: (data) => decodeBloodPressureMeasurement(data),
  decodeControl: (data) => decodeVendorFrame(data),
  detectAbort: detectArmMovement,
};

/**
 * QardioArm blood-pressure cuff.
 *
 * Protocol:
 *   1. Subscribe to Blood Pressure Measurement (2A35) and the vendor control point
 *   2. Write [0xF1, 0x01] to the control point to start inflating
 *   3. Control point notifies [0xF2, phase] as the cycle progresses
 *   4. 2A35 streams cuff pressure, then the final reading with the status field set;
 *      a `04 FF` frame there means the cuff gave up because the arm moved
 */
export class QardioArmPlugin extends GattDevicePlugin {
  readonly type = 'arm';
  protected readonly annotations: Record<string, string> = {
    [QARDIO_CONTROL_UUID]: 'Qardio Control Point',
  };

  protected measurementProfile(): MeasurementProfile {
    return ARM_PROFILE;
  }

  async getFeatures(): Promise<FeatureMap> {
    const { bitmask, supported } = decodeBloodPressureFeature(await this.read(BP_FEATURE_UUID));
    return { bitmask, supported };
  }
}

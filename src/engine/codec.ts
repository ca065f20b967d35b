import { DecodeError } from '../errors.js';
import { uuid16 } from '../ble/types.js';

// ─── SFLOAT ───────────────────────────────────────────────────────────────────

export type SfloatSpecial = 'NaN' | 'NotAtThisTime' | '+Infinity' | '-Infinity';
export type SfloatValue = number | SfloatSpecial;

/** Reserved raw 16-bit values (exponent 0) and what they stand for. */
const SFLOAT_SPECIALS: ReadonlyMap<number, SfloatSpecial> = new Map([
  [0x07ff, 'NaN'],
  [0x0800, 'NotAtThisTime'],
  [0x07fe, '+Infinity'],
  [0x0802, '-Infinity'],
  // Reserved for future use.
  [0x0801, 'NaN'],
]);

export function isSfloatNumber(value: SfloatValue | undefined): value is number {
  return typeof value === 'number';
}

/**
 * Decode an IEEE-11073 16-bit SFLOAT (little-endian).
 *
 * High nibble: signed exponent. Low 12 bits: signed mantissa.
 */
export function decodeSfloat(data: Uint8Array, offset = 0): SfloatValue {
  if (offset + 2 > data.length) {
    throw new DecodeError(
      'TruncatedPayload',
      `SFLOAT needs 2 bytes at offset ${offset}, got ${Math.max(0, data.length - offset)}`,
    );
  }
  const raw = data[offset] | (data[offset + 1] << 8);

  const special = SFLOAT_SPECIALS.get(raw);
  if (special) return special;

  let mantissa = raw & 0x0fff;
  if (mantissa >= 0x0800) mantissa -= 0x1000;
  let exponent = (raw >> 12) & 0x0f;
  if (exponent >= 0x08) exponent -= 0x10;

  // Dividing keeps decimal fractions exact (1205 / 10, not 1205 * 0.1).
  return exponent < 0 ? mantissa / 10 ** -exponent : mantissa * 10 ** exponent;
}

// ─── Blood Pressure Measurement (0x2A35) ─────────────────────────────────────

export const BPM_FLAG_KPA = 0x01;
export const BPM_FLAG_TIMESTAMP = 0x02;
export const BPM_FLAG_PULSE = 0x04;
export const BPM_FLAG_USER_ID = 0x08;
export const BPM_FLAG_STATUS = 0x10;

export type PressureUnit = 'mmHg' | 'kPa';

/** Bluetooth SIG Date Time (0x2A08). Zero fields mean "not known". */
export interface BleDateTime {
  year: number;
  month: number;
  day: number;
  hours: number;
  minutes: number;
  seconds: number;
}

export interface MeasurementValues {
  unit: PressureUnit;
  systolic: SfloatValue;
  diastolic: SfloatValue;
  meanArterialPressure: SfloatValue;
  pulseRate?: SfloatValue;
  timestamp?: BleDateTime;
  userId?: number;
  measurementStatus?: number;
  /** Raw flags byte; tells which optional fields were present. */
  flags: number;
}

export function hasMeasurementStatus(values: MeasurementValues): boolean {
  return (values.flags & BPM_FLAG_STATUS) !== 0;
}

function decodeDateTime(data: Uint8Array, offset: number): BleDateTime {
  return {
    year: data[offset] | (data[offset + 1] << 8),
    month: data[offset + 2],
    day: data[offset + 3],
    hours: data[offset + 4],
    minutes: data[offset + 5],
    seconds: data[offset + 6],
  };
}

/** Length a Blood Pressure Measurement payload must have for the given flags. */
export function expectedMeasurementLength(flags: number): number {
  let length = 1 + 6;
  if (flags & BPM_FLAG_TIMESTAMP) length += 7;
  if (flags & BPM_FLAG_PULSE) length += 2;
  if (flags & BPM_FLAG_USER_ID) length += 1;
  if (flags & BPM_FLAG_STATUS) length += 2;
  return length;
}

/**
 * Parse a BT SIG Blood Pressure Measurement notification.
 *
 * Layout:
 *   Byte 0     : flags
 *   Bytes 1-6  : systolic, diastolic, MAP (SFLOAT each)
 *   [7 bytes]  : timestamp           (flag 0x02)
 *   [2 bytes]  : pulse rate, SFLOAT  (flag 0x04)
 *   [1 byte]   : user id             (flag 0x08)
 *   [2 bytes]  : measurement status  (flag 0x10)
 */
export function decodeBloodPressureMeasurement(data: Uint8Array): MeasurementValues {
  if (data.length === 0) {
    throw new DecodeError('TruncatedPayload', 'Blood pressure measurement is empty');
  }
  const flags = data[0];
  const expected = expectedMeasurementLength(flags);
  if (data.length < expected) {
    throw new DecodeError(
      'TruncatedPayload',
      `Blood pressure measurement with flags 0x${flags.toString(16).padStart(2, '0')} ` +
        `needs ${expected} bytes, got ${data.length}`,
    );
  }

  let offset = 1;
  const values: MeasurementValues = {
    unit: flags & BPM_FLAG_KPA ? 'kPa' : 'mmHg',
    systolic: decodeSfloat(data, offset),
    diastolic: decodeSfloat(data, offset + 2),
    meanArterialPressure: decodeSfloat(data, offset + 4),
    flags,
  };
  offset += 6;

  if (flags & BPM_FLAG_TIMESTAMP) {
    values.timestamp = decodeDateTime(data, offset);
    offset += 7;
  }
  if (flags & BPM_FLAG_PULSE) {
    values.pulseRate = decodeSfloat(data, offset);
    offset += 2;
  }
  if (flags & BPM_FLAG_USER_ID) {
    values.userId = data[offset];
    offset += 1;
  }
  if (flags & BPM_FLAG_STATUS) {
    values.measurementStatus = data[offset] | (data[offset + 1] << 8);
  }

  return values;
}

export type MeasurementCondition =
  | 'body-movement'
  | 'cuff-too-loose'
  | 'irregular-pulse'
  | 'pulse-rate-exceeds-upper-limit'
  | 'pulse-rate-below-lower-limit'
  | 'improper-position';

/** Decode the Measurement Status bitfield into the conditions it reports. */
export function decodeMeasurementStatus(status: number): MeasurementCondition[] {
  const conditions: MeasurementCondition[] = [];
  if (status & 0x0001) conditions.push('body-movement');
  if (status & 0x0002) conditions.push('cuff-too-loose');
  if (status & 0x0004) conditions.push('irregular-pulse');
  // Bits 3-4: pulse rate range (0 = within range, 3 = reserved)
  const range = (status >> 3) & 0x03;
  if (range === 1) conditions.push('pulse-rate-exceeds-upper-limit');
  if (range === 2) conditions.push('pulse-rate-below-lower-limit');
  if (status & 0x0020) conditions.push('improper-position');
  return conditions;
}

// ─── Blood Pressure Feature (0x2A49) ─────────────────────────────────────────

const FEATURE_NAMES: readonly string[] = [
  'Body Movement Detection',
  'Cuff Fit Detection',
  'Irregular Pulse Detection',
  'Pulse Rate Range Detection',
  'Measurement Position Detection',
  'Multiple Bond',
];

export interface BloodPressureFeatures {
  bitmask: number;
  supported: string[];
}

export function decodeBloodPressureFeature(data: Uint8Array): BloodPressureFeatures {
  if (data.length < 2) {
    throw new DecodeError(
      'TruncatedPayload',
      `Blood pressure feature needs 2 bytes, got ${data.length}`,
    );
  }
  const bitmask = data[0] | (data[1] << 8);
  const supported = FEATURE_NAMES.filter((_name, bit) => bitmask & (1 << bit));
  return { bitmask, supported };
}

// ─── Vendor control point frames ──────────────────────────────────────────────

export const ACTIVATION_COMMAND: readonly number[] = [0xf1, 0x01];
export const VENDOR_PHASE_PREFIX = 0xf2;

export type VendorPhase = 'inflating' | 'measuring' | 'deflating' | 'aborted' | 'completed' | 'error';

const VENDOR_PHASES: readonly VendorPhase[] = [
  'inflating',
  'measuring',
  'deflating',
  'aborted',
  'completed',
  'error',
];

export type VendorEvent =
  | { kind: 'phase'; phase: VendorPhase }
  | { kind: 'unknown'; raw: Buffer };

/**
 * Decode a vendor Control Point notification.
 *
 * `F2 pp` is a phase change; every other discriminator (command echoes and
 * anything not yet reverse-engineered) comes back as `unknown` with its bytes.
 */
export function decodeVendorFrame(data: Uint8Array): VendorEvent {
  if (data.length === 0) {
    throw new DecodeError('TruncatedPayload', 'Vendor frame is empty');
  }
  if (data[0] !== VENDOR_PHASE_PREFIX) {
    return { kind: 'unknown', raw: Buffer.from(data) };
  }
  if (data.length < 2) {
    throw new DecodeError('TruncatedPayload', 'Vendor phase frame is missing its phase byte');
  }
  const phase = VENDOR_PHASES[data[1]];
  if (phase === undefined) {
    throw new DecodeError(
      'UnrecognizedFrame',
      `Unknown vendor phase 0x${data[1].toString(16).padStart(2, '0')}`,
    );
  }
  return { kind: 'phase', phase };
}

// ─── Battery & Device Information ─────────────────────────────────────────────

export function decodeBatteryLevel(data: Uint8Array): number {
  if (data.length < 1) {
    throw new DecodeError('TruncatedPayload', 'Battery level is empty');
  }
  return data[0];
}

const BINARY_INFO_UUIDS = new Set([uuid16(0x2a23), uuid16(0x2a50)]);

/**
 * Render a Device Information value as text. System ID and PnP ID are binary
 * records and come back as hex; string characteristics are UTF-8 with
 * trailing NULs removed.
 */
export function decodeDeviceInfoValue(normalizedUuid: string, data: Uint8Array): string {
  const buf = Buffer.from(data);
  if (BINARY_INFO_UUIDS.has(normalizedUuid)) return buf.toString('hex');
  return buf.toString('utf8').replace(/\0+$/, '').trim();
}

import type { DeviceIdentity, MeasurementRecord } from '../interfaces/device-plugin.js';
import type { MeasurementOutcome } from './measurement.js';
import type { GattRegistry } from './gatt-registry.js';
import { decodeBatteryLevel, decodeMeasurementStatus } from './codec.js';
import type { MeasurementCondition } from './codec.js';
import { createLogger } from '../logger.js';
import { errMsg } from '../utils/error.js';

const log = createLogger('Assemble');

export interface AssembleContext {
  device: DeviceIdentity;
  registry: GattRegistry;
  /** Battery Level characteristic; read once after a completed measurement. */
  batteryUuid: string;
  now: () => Date;
}

/**
 * Build the record handed to the caller. A Completed outcome carries the
 * reading that completed the run, as the device profile decoded it; an
 * Aborted one carries no values and skips the battery read.
 */
export async function assembleRecord(
  outcome: MeasurementOutcome,
  ctx: AssembleContext,
): Promise<MeasurementRecord> {
  const capturedAt = ctx.now();
  const { phase } = outcome;

  if (phase.kind === 'Aborted') {
    return {
      device: ctx.device,
      values: null,
      conditions: [],
      battery: null,
      capturedAt,
      outcome: { status: 'Aborted', reason: phase.reason, detail: phase.detail },
    };
  }

  const { values } = phase;

  let conditions: MeasurementCondition[] = [];
  if (values.measurementStatus !== undefined) {
    conditions = decodeMeasurementStatus(values.measurementStatus);
  }

  return {
    device: ctx.device,
    values,
    conditions,
    battery: await readBattery(ctx),
    capturedAt,
    outcome: { status: 'Completed' },
  };
}

async function readBattery(ctx: AssembleContext): Promise<number | null> {
  try {
    const raw = await ctx.registry.resolve(ctx.batteryUuid).read();
    return decodeBatteryLevel(raw);
  } catch (e) {
    log.warn(`Battery read after measurement failed: ${errMsg(e)}`);
    return null;
  }
}

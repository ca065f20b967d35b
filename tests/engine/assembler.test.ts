import { describe, it, expect, vi, beforeEach } from 'vitest';
import { assembleRecord } from '../../src/engine/assembler.js';
import type { AssembleContext } from '../../src/engine/assembler.js';
import { GattRegistry } from '../../src/engine/gatt-registry.js';
import type { MeasurementValues } from '../../src/engine/codec.js';
import { uuid16 } from '../../src/ble/types.js';
import { ARM_ADDRESS, armServices, createArmChars, createFakeLink } from '../helpers/fake-ble.js';
import type { ArmChars } from '../helpers/fake-ble.js';

vi.spyOn(console, 'log').mockImplementation(() => {});
const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

const CAPTURED_AT = new Date('2026-10-19T08:30:00Z');
const DEVICE = { address: ARM_ADDRESS, adapter: null, name: 'Living room cuff' };

const FULL_VALUES: MeasurementValues = {
  unit: 'mmHg',
  systolic: 120,
  diastolic: 80,
  meanArterialPressure: 93,
  pulseRate: 72,
  measurementStatus: 5,
  flags: 0x14,
};

const PLAIN_VALUES: MeasurementValues = {
  unit: 'mmHg',
  systolic: 120,
  diastolic: 80,
  meanArterialPressure: 93,
  measurementStatus: 0,
  flags: 0x10,
};

describe('assembleRecord', () => {
  let chars: ArmChars;
  let ctx: AssembleContext;

  beforeEach(async () => {
    chars = createArmChars();
    const registry = new GattRegistry();
    await registry.discover(createFakeLink(armServices(chars)));
    ctx = { device: DEVICE, registry, batteryUuid: uuid16(0x2a19), now: () => CAPTURED_AT };
    warnSpy.mockClear();
  });

  it('carries the completing reading with its conditions and the battery level', async () => {
    const record = await assembleRecord(
      { phase: { kind: 'Completed', values: FULL_VALUES } },
      ctx,
    );

    expect(record).toEqual({
      device: DEVICE,
      values: FULL_VALUES,
      conditions: ['body-movement', 'irregular-pulse'],
      battery: 69,
      capturedAt: CAPTURED_AT,
      outcome: { status: 'Completed' },
    });
  });

  it('reports no conditions for a clean status', async () => {
    const record = await assembleRecord({ phase: { kind: 'Completed', values: PLAIN_VALUES } }, ctx);
    expect(record.values).toBe(PLAIN_VALUES);
    expect(record.conditions).toEqual([]);
  });

  it('keeps the record when the battery cannot be read', async () => {
    chars.battery.readError = new Error('Read not permitted');
    const record = await assembleRecord(
      { phase: { kind: 'Completed', values: PLAIN_VALUES } },
      ctx,
    );

    expect(record.battery).toBeNull();
    expect(record.outcome).toEqual({ status: 'Completed' });
    expect(warnSpy).toHaveBeenCalledWith(
      expect.stringContaining('Battery read after measurement failed: Read not permitted'),
    );
  });

  it('reports an aborted run without values and without touching the device', async () => {
    const record = await assembleRecord(
      {
        phase: { kind: 'Aborted', reason: 'timeout', detail: 'No notification received within 60000ms' },
      },
      ctx,
    );

    expect(record).toEqual({
      device: DEVICE,
      values: null,
      conditions: [],
      battery: null,
      capturedAt: CAPTURED_AT,
      outcome: {
        status: 'Aborted',
        reason: 'timeout',
        detail: 'No notification received within 60000ms',
      },
    });
    expect(chars.battery.reads).toBe(0);
  });
});

import { describe, it, expect, vi, beforeAll, beforeEach } from 'vitest';
import chalk from 'chalk';
import { runCommand } from '../../src/cli/commands.js';
import type { CommandOutput } from '../../src/cli/commands.js';
import { describeCatalog } from '../../src/engine/gatt-registry.js';
import type { GattCatalog } from '../../src/engine/gatt-registry.js';
import type { ProgressCallback } from '../../src/engine/measurement.js';
import type {
  DevicePlugin,
  FeatureMap,
  MeasurementRecord,
} from '../../src/interfaces/device-plugin.js';
import { uuid16 } from '../../src/ble/types.js';

const CAPTURED_AT = new Date('2026-10-19T08:30:00Z');
const DEVICE = { address: 'AA:BB:CC:DD:EE:01', adapter: null, name: 'Living room cuff' };

const COMPLETED: MeasurementRecord = {
  device: DEVICE,
  values: {
    unit: 'mmHg',
    systolic: 120,
    diastolic: 80,
    meanArterialPressure: 93,
    pulseRate: 72,
    measurementStatus: 4,
    flags: 0x14,
  },
  conditions: ['irregular-pulse'],
  battery: 69,
  capturedAt: CAPTURED_AT,
  outcome: { status: 'Completed' },
};

const TIMED_OUT: MeasurementRecord = {
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
};

const CATALOG: GattCatalog = {
  generation: 1,
  services: [
    {
      uuid: uuid16(0x180f),
      annotation: 'Battery',
      characteristics: [
        {
          uuid: uuid16(0x2a19),
          handle: 1,
          properties: ['read', 'notify'],
          serviceUuid: uuid16(0x180f),
          annotation: 'Battery Level',
        },
      ],
    },
  ],
};

class FakePlugin implements DevicePlugin {
  readonly type = 'arm';
  readonly name = 'Living room cuff';
  record: MeasurementRecord = COMPLETED;
  info: Record<string, string> = { manufacturer: 'Qardio', model: 'A100' };
  features: FeatureMap = { bitmask: 5, supported: ['Body Movement Detection'] };

  discover = vi.fn(async (): Promise<GattCatalog> => CATALOG);
  read = vi.fn(async (_uuid: string): Promise<Buffer> => Buffer.from([0x45]));
  write = vi.fn(
    async (_uuid: string, _data: Buffer | number[], _withResponse?: boolean): Promise<void> => {},
  );
  getBattery = vi.fn(async (): Promise<number> => 69);
  close = vi.fn(async (): Promise<void> => {});

  measure = vi.fn(
    async (onProgress?: ProgressCallback, _signal?: AbortSignal): Promise<MeasurementRecord> => {
      onProgress?.({ type: 'phase', phase: 'Inflating' });
      onProgress?.({
        type: 'reading',
        values: { unit: 'mmHg', systolic: 150, diastolic: 0, meanArterialPressure: 0, flags: 0 },
      });
      onProgress?.({ type: 'phase', phase: this.record.outcome.status });
      return this.record;
    },
  );

  async getDeviceInfo(): Promise<Record<string, string>> {
    return this.info;
  }

  async getFeatures(): Promise<FeatureMap> {
    return this.features;
  }
}

function createOutput(): CommandOutput & { lines: string[] } {
  const lines: string[] = [];
  return { lines, print: (line) => lines.push(line) };
}

describe('runCommand()', () => {
  let plugin: FakePlugin;
  let out: ReturnType<typeof createOutput>;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    plugin = new FakePlugin();
    out = createOutput();
  });

  it('discover prints the catalog tree', async () => {
    expect(await runCommand(plugin, { name: 'discover' }, out)).toBe(0);
    expect(out.lines).toEqual(describeCatalog(CATALOG));
    expect(out.lines[0]).toBe('Service 0000180f-0000-1000-8000-00805f9b34fb (Battery):');
  });

  it('read prints the value as hex', async () => {
    expect(await runCommand(plugin, { name: 'read', uuid: '2a19' }, out)).toBe(0);
    expect(plugin.read).toHaveBeenCalledWith('2a19');
    expect(out.lines).toEqual(['00002a19-0000-1000-8000-00805f9b34fb: 45']);
  });

  it('write forwards payload and response mode', async () => {
    const data = Buffer.from([0xf1, 0x01]);
    const code = await runCommand(
      plugin,
      { name: 'write', uuid: '2a35', data, withResponse: false },
      out,
    );
    expect(code).toBe(0);
    expect(plugin.write).toHaveBeenCalledWith('2a35', data, false);
    expect(out.lines).toEqual(['✔  Wrote f101 to 00002a35-0000-1000-8000-00805f9b34fb']);
  });

  it('measure streams progress and prints a summary', async () => {
    const ac = new AbortController();
    const code = await runCommand(plugin, { name: 'measure' }, out, { signal: ac.signal });

    expect(code).toBe(0);
    expect(plugin.measure).toHaveBeenCalledWith(expect.any(Function), ac.signal);
    expect(out.lines).toEqual([
      'ℹ  Inflating cuff...',
      '  Cuff: 150 mmHg',
      '✔  Measurement complete',
      '✔  120/80 mmHg (MAP 93)',
      '  Pulse: 72 bpm',
      '  Conditions: irregular-pulse',
      '  Battery: 69%',
    ]);
  });

  it('measure prints the record as JSON when asked', async () => {
    await runCommand(plugin, { name: 'measure' }, out, { json: true });
    expect(JSON.parse(out.lines[out.lines.length - 1])).toEqual({
      ...COMPLETED,
      capturedAt: '2026-10-19T08:30:00.000Z',
    });
  });

  it('measure exits 1 for an aborted run', async () => {
    plugin.record = TIMED_OUT;
    expect(await runCommand(plugin, { name: 'measure' }, out)).toBe(1);
    expect(out.lines.slice(-2)).toEqual([
      '✘  Measurement aborted',
      '✘  Aborted: timeout (No notification received within 60000ms)',
    ]);
  });

  it('battery prints a percentage', async () => {
    await runCommand(plugin, { name: 'battery' }, out);
    expect(out.lines).toEqual(['Battery: 69%']);
  });

  it('info prints one line per field', async () => {
    await runCommand(plugin, { name: 'info' }, out);
    expect(out.lines).toEqual(['manufacturer: Qardio', 'model: A100']);
  });

  it('info says so when the device exposes nothing', async () => {
    plugin.info = {};
    await runCommand(plugin, { name: 'info' }, out);
    expect(out.lines).toEqual(['No Device Information fields exposed']);
  });

  it('features prints lists joined and empty lists as none', async () => {
    plugin.features = { bitmask: 0, supported: [] };
    await runCommand(plugin, { name: 'features' }, out);
    expect(out.lines).toEqual(['bitmask: 0', 'supported: none']);
  });

  it('propagates plugin errors', async () => {
    plugin.getBattery.mockRejectedValueOnce(new Error('Link to AA:BB:CC:DD:EE:01 lost'));
    await expect(runCommand(plugin, { name: 'battery' }, out)).rejects.toThrow(
      'Link to AA:BB:CC:DD:EE:01 lost',
    );
  });
});

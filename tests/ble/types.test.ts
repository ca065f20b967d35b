import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  formatMac,
  formatUuid,
  normalizeUuid,
  sameAddress,
  uuid16,
  withTimeout,
} from '../../src/ble/types.js';

describe('UUID helpers', () => {
  it('expands a 16-bit UUID onto the Bluetooth base UUID', () => {
    expect(normalizeUuid('2A35')).toBe('00002a3500001000800000805f9b34fb');
  });

  it('strips dashes and lowercases a 128-bit UUID', () => {
    expect(normalizeUuid('583CB5B3-875D-40ED-9098-C39EB0C1983D')).toBe(
      '583cb5b3875d40ed9098c39eb0c1983d',
    );
  });

  it('builds the same form from a numeric SIG code', () => {
    expect(uuid16(0x2a19)).toBe(normalizeUuid('2a19'));
    expect(uuid16(0x180)).toBe('0000018000001000800000805f9b34fb');
  });

  it('formats any UUID in dashed 8-4-4-4-12 form', () => {
    expect(formatUuid('2a35')).toBe('00002a35-0000-1000-8000-00805f9b34fb');
    expect(formatUuid('583cb5b3875d40ed9098c39eb0c1983d')).toBe(
      '583cb5b3-875d-40ed-9098-c39eb0c1983d',
    );
  });

  it('leaves malformed UUIDs undashed', () => {
    expect(formatUuid('abc')).toBe('abc');
  });
});

describe('address helpers', () => {
  it('formats a MAC address in upper case with colons', () => {
    expect(formatMac('aa-bb-cc-dd-ee-01')).toBe('AA:BB:CC:DD:EE:01');
    expect(formatMac('aabbccddee01')).toBe('AA:BB:CC:DD:EE:01');
  });

  it('compares addresses ignoring case and separators', () => {
    expect(sameAddress('aa:bb:cc:dd:ee:01', 'AA-BB-CC-DD-EE-01')).toBe(true);
    expect(sameAddress('AA:BB:CC:DD:EE:01', 'AA:BB:CC:DD:EE:02')).toBe(false);
  });
});

describe('withTimeout()', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the value when the promise wins', async () => {
    await expect(withTimeout(Promise.resolve(7), 1000, 'too slow')).resolves.toBe(7);
  });

  it('rejects with a plain Error carrying the message on timeout', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    const pending = withTimeout(new Promise<number>(() => {}), 50, 'too slow');
    vi.advanceTimersByTime(50);
    await expect(pending).rejects.toThrow('too slow');
  });

  it('rejects with the error built by the factory on timeout', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    const pending = withTimeout(new Promise<number>(() => {}), 50, () => new RangeError('late'));
    vi.advanceTimersByTime(50);
    await expect(pending).rejects.toBeInstanceOf(RangeError);
  });

  it('passes through the rejection of the raced promise', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 1000, 'too slow')).rejects.toThrow(
      'boom',
    );
  });
});

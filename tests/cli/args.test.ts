import { describe, it, expect } from 'vitest';
import { parseArgs, parseHex, USAGE } from '../../src/cli/args.js';

describe('parseHex()', () => {
  it.each([
    ['f101', [0xf1, 0x01]],
    ['F1 01', [0xf1, 0x01]],
    ['f1:01', [0xf1, 0x01]],
    ['0xf101', [0xf1, 0x01]],
    ['00', [0x00]],
  ])('parses %j', (raw, bytes) => {
    expect(parseHex(raw)).toEqual(Buffer.from(bytes));
  });

  it.each(['', 'f1 0', 'zz', '0x'])('rejects %j', (raw) => {
    expect(() => parseHex(raw)).toThrow(`Invalid hex payload '${raw}'`);
  });
});

describe('parseArgs()', () => {
  it('parses device and command', () => {
    expect(parseArgs(['arm', 'measure'])).toEqual({
      help: false,
      debug: false,
      json: false,
      device: 'arm',
      command: { name: 'measure' },
    });
  });

  it('parses options anywhere on the line', () => {
    const args = parseArgs(['--debug', 'arm', '-c', './my.yaml', 'measure', '--json']);
    expect(args).toMatchObject({
      debug: true,
      json: true,
      configPath: './my.yaml',
      device: 'arm',
      command: { name: 'measure' },
    });
  });

  it('parses read with its UUID', () => {
    expect(parseArgs(['arm', 'read', '2a19']).command).toEqual({ name: 'read', uuid: '2a19' });
  });

  it('parses write with payload, acknowledged by default', () => {
    expect(parseArgs(['arm', 'write', '2a35', 'f1:01']).command).toEqual({
      name: 'write',
      uuid: '2a35',
      data: Buffer.from([0xf1, 0x01]),
      withResponse: true,
    });
  });

  it('honours --no-response for write', () => {
    const command = parseArgs(['arm', 'write', '--no-response', '2a35', 'f101']).command;
    expect(command).toMatchObject({ name: 'write', withResponse: false });
  });

  it('leaves the command out when only a device is given', () => {
    const args = parseArgs(['core']);
    expect(args.device).toBe('core');
    expect(args.command).toBeUndefined();
  });

  it('stops at --help without validating the rest', () => {
    expect(parseArgs(['arm', 'bogus', '--help'])).toEqual({
      help: true,
      debug: false,
      json: false,
    });
  });

  it('rejects an unknown command', () => {
    expect(() => parseArgs(['arm', 'inflate'])).toThrow(
      "Unknown command 'inflate'. Run with --help for the list of commands.",
    );
  });

  it('rejects an unknown option', () => {
    expect(() => parseArgs(['--verbose', 'arm', 'battery'])).toThrow("Unknown option '--verbose'");
  });

  it('requires the operands of read and write', () => {
    expect(() => parseArgs(['arm', 'read'])).toThrow("'read' needs a characteristic UUID");
    expect(() => parseArgs(['arm', 'write', '2a35'])).toThrow("'write' needs a hex payload");
  });

  it('requires a path after --config', () => {
    expect(() => parseArgs(['arm', 'battery', '--config'])).toThrow('--config needs a file path');
  });

  it('documents every command in the usage text', () => {
    for (const name of ['discover', 'read', 'write', 'measure', 'battery', 'info', 'features']) {
      expect(USAGE).toContain(`  ${name} `);
    }
  });
});

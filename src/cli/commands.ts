import type { DevicePlugin } from '../interfaces/device-plugin.js';
import { describeCatalog } from '../engine/gatt-registry.js';
import { formatUuid } from '../ble/types.js';
import type { Command } from './args.js';
import { formatFeatures, formatProgress, formatRecord, success } from './ui.js';

export interface CommandOutput {
  print(line: string): void;
}

export interface RunOptions {
  json?: boolean;
  /** Cancels a running measurement. */
  signal?: AbortSignal;
}

/** Run one command against a plugin. Resolves to the process exit code. */
export async function runCommand(
  plugin: DevicePlugin,
  command: Command,
  out: CommandOutput,
  opts: RunOptions = {},
): Promise<number> {
  switch (command.name) {
    case 'discover': {
      const catalog = await plugin.discover();
      for (const line of describeCatalog(catalog)) out.print(line);
      return 0;
    }

    case 'read': {
      const data = await plugin.read(command.uuid);
      out.print(`${formatUuid(command.uuid)}: ${data.toString('hex')}`);
      return 0;
    }

    case 'write':
      await plugin.write(command.uuid, command.data, command.withResponse);
      out.print(success(`Wrote ${command.data.toString('hex')} to ${formatUuid(command.uuid)}`));
      return 0;

    case 'measure': {
      const record = await plugin.measure((event) => out.print(formatProgress(event)), opts.signal);
      if (opts.json) {
        out.print(JSON.stringify(record, null, 2));
      } else {
        for (const line of formatRecord(record)) out.print(line);
      }
      return record.outcome.status === 'Completed' ? 0 : 1;
    }

    case 'battery':
      out.print(`Battery: ${await plugin.getBattery()}%`);
      return 0;

    case 'info': {
      const info = await plugin.getDeviceInfo();
      const entries = Object.entries(info);
      if (entries.length === 0) out.print('No Device Information fields exposed');
      for (const [key, value] of entries) out.print(`${key}: ${value}`);
      return 0;
    }

    case 'features':
      for (const line of formatFeatures(await plugin.getFeatures())) out.print(line);
      return 0;
  }
}

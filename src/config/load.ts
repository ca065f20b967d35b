import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { DeviceDescriptor } from '../interfaces/device-plugin.js';
import { AppConfigSchema, formatConfigError, isAdapterName, isDeviceAddress } from './schema.js';
import type { AppConfig, DeviceConfig } from './schema.js';
import { createLogger } from '../logger.js';
import { errMsg } from '../utils/error.js';

const log = createLogger('Config');

export const CONFIG_FILENAME = 'cardio-ble.yaml';

function fail(msg: string): never {
  log.error(msg);
  throw new Error(msg);
}

/** Lookup order when no path is given: working directory, then the user config dir. */
export function defaultConfigPaths(cwd: string = process.cwd(), home: string = homedir()): string[] {
  return [join(cwd, CONFIG_FILENAME), join(home, '.config', 'cardio-ble', 'config.yaml')];
}

export function findConfigFile(
  explicitPath?: string,
  candidates: string[] = defaultConfigPaths(),
): string {
  if (explicitPath) {
    const path = resolve(explicitPath);
    if (!existsSync(path)) fail(`Config file not found: ${path}`);
    return path;
  }
  const found = candidates.find((p) => existsSync(p));
  if (!found) {
    fail(`No config file found. Looked in: ${candidates.join(', ')}`);
  }
  return found;
}

/** Parse and validate YAML text. `source` only labels error messages. */
export function parseConfig(raw: string, source = 'config.yaml'): AppConfig {
  let doc: unknown;
  try {
    doc = parseYaml(raw);
  } catch (err) {
    fail(`Invalid YAML in ${source}: ${errMsg(err)}`);
  }
  const result = AppConfigSchema.safeParse(doc);
  if (!result.success) {
    const msg = formatConfigError(result.error, source);
    log.error(msg);
    throw new Error(msg, { cause: result.error });
  }
  return result.data;
}

export function loadConfigFile(explicitPath?: string): { path: string; config: AppConfig } {
  const path = findConfigFile(explicitPath);
  log.debug(`Loading ${path}`);
  return { path, config: parseConfig(readFileSync(path, 'utf8'), path) };
}

/**
 * Turn one `devices.<key>` entry into the engine's descriptor: seconds become
 * milliseconds, and DEVICE_ADDRESS / BLE_ADAPTER from the environment replace
 * the configured address and adapter.
 */
export function toDeviceDescriptor(
  key: string,
  entry: DeviceConfig,
  env: NodeJS.ProcessEnv = process.env,
): DeviceDescriptor {
  const envAddress = env.DEVICE_ADDRESS?.trim();
  if (envAddress && !isDeviceAddress(envAddress)) {
    fail(
      `DEVICE_ADDRESS must be a MAC address (XX:XX:XX:XX:XX:XX) ` +
        `or CoreBluetooth UUID (macOS), got '${envAddress}'`,
    );
  }
  const envAdapter = env.BLE_ADAPTER?.trim();
  if (envAdapter && !isAdapterName(envAdapter)) {
    fail(`BLE_ADAPTER must look like 'hci0', got '${envAdapter}'`);
  }

  return {
    type: entry.type ?? key,
    address: envAddress || entry.address,
    adapter: envAdapter || entry.adapter || undefined,
    name: entry.name ?? key,
    scanTimeoutMs: Math.round(entry.scan_timeout * 1000),
    timeoutMs: Math.round(entry.timeout * 1000),
    pollIntervalMs: Math.round(entry.poll_interval * 1000),
    retry: { count: entry.retry.count, backoffMs: entry.retry.backoff_ms },
    queueLimit: entry.queue_limit,
  };
}

export function resolveDevice(
  config: AppConfig,
  key: string,
  env: NodeJS.ProcessEnv = process.env,
): DeviceDescriptor {
  const entry = Object.hasOwn(config.devices, key) ? config.devices[key] : undefined;
  if (!entry) {
    fail(`Unknown device '${key}'. Configured devices: ${Object.keys(config.devices).join(', ')}`);
  }
  return toDeviceDescriptor(key, entry, env);
}

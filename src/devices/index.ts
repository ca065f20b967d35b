import type { DevicePlugin, PluginContext, PluginFactory } from '../interfaces/device-plugin.js';
import { QardioArmPlugin } from './qardio-arm.js';
import { QardioCorePlugin } from './qardio-core.js';

export const DEVICE_PLUGINS: Readonly<Record<string, PluginFactory>> = {
  arm: (ctx) => new QardioArmPlugin(ctx),
  core: (ctx) => new QardioCorePlugin(ctx),
};

export const KNOWN_DEVICE_TYPES: readonly string[] = Object.keys(DEVICE_PLUGINS);

export function createPlugin(ctx: PluginContext): DevicePlugin {
  const type = ctx.device.type;
  const factory = Object.hasOwn(DEVICE_PLUGINS, type) ? DEVICE_PLUGINS[type] : undefined;
  if (!factory) {
    throw new Error(`Unknown device type '${type}'. Known types: ${KNOWN_DEVICE_TYPES.join(', ')}`);
  }
  return factory(ctx);
}

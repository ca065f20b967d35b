import { z } from 'zod';

// --- Regex patterns ---

const MAC_REGEX = /^([0-9A-Fa-f]{2}:){5}[0-9A-Fa-f]{2}$/;
/** CoreBluetooth UUID format used on macOS (e.g. 12345678-1234-1234-1234-123456789ABC). */
const CB_UUID_REGEX =
  /^[0-9A-Fa-f]{8}-[0-9A-Fa-f]{4}-[0-9A-Fa-f]{4}-[0-9A-Fa-f]{4}-[0-9A-Fa-f]{12}$/;
const ADAPTER_REGEX = /^hci\d+$/;

export function isDeviceAddress(value: string): boolean {
  return MAC_REGEX.test(value) || CB_UUID_REGEX.test(value);
}

export function isAdapterName(value: string): boolean {
  return ADAPTER_REGEX.test(value);
}

// --- Sub-schemas ---

export const AddressSchema = z.string().refine(isDeviceAddress, {
  message: 'Must be a MAC address (XX:XX:XX:XX:XX:XX) or CoreBluetooth UUID',
});

export const RetrySchema = z.object({
  count: z.number().int().min(0).max(10).default(2),
  backoff_ms: z.number().int().min(0).max(60_000).default(1000),
});

export const DeviceSchema = z.object({
  /** Plugin id; defaults to the entry's key. */
  type: z.string().min(1, 'Device type must not be empty').optional(),
  address: AddressSchema,
  adapter: z
    .string()
    .refine(isAdapterName, { message: "Must be an HCI adapter name such as 'hci0'" })
    .optional()
    .nullable(),
  name: z.string().min(1).optional(),
  /** Seconds without a notification before a measurement aborts. */
  timeout: z.number().positive('Must be a positive number of seconds').max(600).default(60),
  scan_timeout: z.number().positive('Must be a positive number of seconds').max(300).default(10),
  /** Keep-alive period in seconds; 0 disables it. */
  poll_interval: z.number().min(0).max(3600).default(0),
  retry: RetrySchema.default({ count: 2, backoff_ms: 1000 }),
  queue_limit: z.number().int().min(1).max(4096).default(64),
});

export const RuntimeSchema = z.object({
  debug: z.boolean().default(false),
});

export const AppConfigSchema = z.object({
  version: z.literal(1),
  devices: z
    .record(z.string(), DeviceSchema)
    .refine((devices) => Object.keys(devices).length > 0, {
      message: 'At least one device is required',
    }),
  runtime: RuntimeSchema.optional(),
});

// --- Inferred types ---

export type RetryConfig = z.infer<typeof RetrySchema>;
export type DeviceConfig = z.infer<typeof DeviceSchema>;
export type RuntimeConfig = z.infer<typeof RuntimeSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

// --- Error formatting ---

export function formatConfigError(error: z.ZodError, source = 'config.yaml'): string {
  const lines = [`Configuration error in ${source}:`, ''];

  for (const issue of error.issues) {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    lines.push(`  ${path}`);
    lines.push(`    ${issue.message}`);
    lines.push('');
  }

  lines.push('See config.yaml.example for a complete, commented configuration.');

  return lines.join('\n');
}

import { readdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse } from 'yaml';
import type { BleChar, BleLink, CharProperty } from '../ble/shared.js';
import {
  normalizeUuid,
  formatUuid,
  uuid16,
  withTimeout,
  GATT_DISCOVERY_TIMEOUT_MS,
} from '../ble/types.js';
import { CatalogError } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('GATT');

const __dirname: string = dirname(fileURLToPath(import.meta.url));

/** Assigned-number tables, found from both src/engine and dist/engine. */
const STANDARD_UUID_DIR: string = join(__dirname, '..', '..', 'resources', 'uuids');

// ─── Annotation tables ────────────────────────────────────────────────────────

/** Turn `0x2A35`, `2a35`, 10805 or a full UUID into the normalized 32-char form. */
function uuidFromEntry(raw: unknown): string | null {
  if (typeof raw === 'number' && Number.isInteger(raw)) return uuid16(raw);
  if (typeof raw !== 'string' || raw.trim() === '') return null;
  const s = raw.trim().toLowerCase();
  if (s.startsWith('0x')) {
    const code = Number.parseInt(s.slice(2), 16);
    return Number.isNaN(code) ? null : uuid16(code);
  }
  return normalizeUuid(s.length < 4 ? s.padStart(4, '0') : s);
}

/**
 * Load every `*.yaml` file in `dir` and build a UUID → name map from its
 * `uuids: [{uuid, name}]` list. A missing directory yields an empty table.
 */
export function loadStandardUuids(dir: string = STANDARD_UUID_DIR): Map<string, string> {
  const table = new Map<string, string>();
  let files: string[];
  try {
    files = readdirSync(dir).filter((f) => f.endsWith('.yaml'));
  } catch (e) {
    log.warn(`No UUID annotation tables at ${dir}`);
    log.debug(String(e));
    return table;
  }

  for (const file of files.sort()) {
    const doc: unknown = parse(readFileSync(join(dir, file), 'utf8'));
    if (!doc || typeof doc !== 'object' || !('uuids' in doc) || !Array.isArray(doc.uuids)) {
      log.warn(`${file}: expected a top-level 'uuids' list, skipping`);
      continue;
    }
    for (const entry of doc.uuids) {
      if (!entry || typeof entry !== 'object') continue;
      const uuid = uuidFromEntry('uuid' in entry ? entry.uuid : undefined);
      const name = 'name' in entry && typeof entry.name === 'string' ? entry.name.trim() : '';
      if (uuid && name) table.set(uuid, name);
    }
  }
  return table;
}

let standardTable: Map<string, string> | null = null;

function standardUuids(): Map<string, string> {
  standardTable ??= loadStandardUuids();
  return standardTable;
}

// ─── Catalog ──────────────────────────────────────────────────────────────────

export interface CharacteristicInfo {
  readonly uuid: string;
  /** Discovery ordinal (1-based); neither transport exposes ATT handles. */
  readonly handle: number;
  readonly properties: readonly CharProperty[];
  readonly serviceUuid: string;
  readonly annotation?: string;
}

export interface ServiceInfo {
  readonly uuid: string;
  readonly annotation?: string;
  readonly characteristics: readonly CharacteristicInfo[];
}

export interface GattCatalog {
  /** Incremented on every discover(); identifies which connection built it. */
  readonly generation: number;
  readonly services: readonly ServiceInfo[];
}

/**
 * Catalog of the services and characteristics of the current connection.
 *
 * Rebuilt by every discover() and dropped by invalidate(); lookups against a
 * dropped catalog fail instead of reaching characteristics of a previous link.
 */
export class GattRegistry {
  private readonly vendorAnnotations: Map<string, string>;
  private readonly standard: Map<string, string>;
  private current: GattCatalog | null = null;
  private chars = new Map<string, { char: BleChar; info: CharacteristicInfo }>();
  private generation = 0;

  constructor(vendorAnnotations: Record<string, string> = {}, standard?: Map<string, string>) {
    this.standard = standard ?? standardUuids();
    this.vendorAnnotations = new Map(
      Object.entries(vendorAnnotations).map(([uuid, name]) => [normalizeUuid(uuid), name]),
    );
  }

  /** Vendor label first, then the SIG name; undefined when neither knows the UUID. */
  annotate(uuid: string): string | undefined {
    const key = normalizeUuid(uuid);
    return this.vendorAnnotations.get(key) ?? this.standard.get(key);
  }

  async discover(link: BleLink): Promise<GattCatalog> {
    this.invalidate();
    const services = await withTimeout(
      link.discover(),
      GATT_DISCOVERY_TIMEOUT_MS,
      'GATT service discovery timed out',
    );

    const chars = new Map<string, { char: BleChar; info: CharacteristicInfo }>();
    let handle = 0;
    const serviceInfos: ServiceInfo[] = services.map((svc) => {
      const characteristics = svc.characteristics.map((char) => {
        const info: CharacteristicInfo = {
          uuid: char.uuid,
          handle: ++handle,
          properties: [...char.properties],
          serviceUuid: svc.uuid,
          annotation: this.annotate(char.uuid),
        };
        // First occurrence wins when a UUID appears in two services.
        if (!chars.has(char.uuid)) chars.set(char.uuid, { char, info });
        return info;
      });
      return { uuid: svc.uuid, annotation: this.annotate(svc.uuid), characteristics };
    });

    this.generation++;
    this.chars = chars;
    this.current = { generation: this.generation, services: serviceInfos };
    log.debug(
      `Catalog #${this.generation}: ${serviceInfos.length} services, ${chars.size} characteristics`,
    );
    return this.current;
  }

  get catalog(): GattCatalog | null {
    return this.current;
  }

  invalidate(): void {
    this.current = null;
    this.chars = new Map();
  }

  has(uuid: string): boolean {
    return this.chars.has(normalizeUuid(uuid));
  }

  info(uuid: string): CharacteristicInfo {
    return this.lookup(uuid).info;
  }

  resolve(uuid: string): BleChar {
    return this.lookup(uuid).char;
  }

  private lookup(uuid: string): { char: BleChar; info: CharacteristicInfo } {
    if (!this.current) {
      throw new CatalogError(
        'NotDiscovered',
        'GATT catalog not available; connect and discover first',
      );
    }
    const entry = this.chars.get(normalizeUuid(uuid));
    if (!entry) {
      throw new CatalogError(
        'UnknownCharacteristic',
        `Characteristic ${formatUuid(uuid)} not found. ` +
          `Discovered: [${[...this.chars.keys()].join(', ')}]`,
      );
    }
    return entry;
  }
}

/**
 * Printable listing of a catalog:
 *
 *   Service 0000180f-0000-1000-8000-00805f9b34fb (Battery):
 *     └─ 00002a19-0000-1000-8000-00805f9b34fb  [read,notify] ........ (Battery Level)
 */
export function describeCatalog(catalog: GattCatalog): string[] {
  const lines: string[] = [];
  for (const svc of catalog.services) {
    const svcLabel = formatUuid(svc.uuid) + (svc.annotation ? ` (${svc.annotation})` : '');
    lines.push(`Service ${svcLabel}:`);
    for (const char of svc.characteristics) {
      const props = char.properties.join(',');
      const spacer = ' ' + '.'.repeat(Math.max(2, 30 - props.length - 2)) + ' ';
      const desc = char.annotation ? `(${char.annotation})` : '';
      lines.push(`  └─ ${formatUuid(char.uuid)}  [${props}]${spacer}${desc}`.trimEnd());
    }
  }
  return lines;
}

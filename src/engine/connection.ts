import type { BleLink, BleTransport } from '../ble/shared.js';
import type { DeviceDescriptor, RetryPolicy } from '../interfaces/device-plugin.js';
import { GattRegistry } from './gatt-registry.js';
import type { GattCatalog } from './gatt-registry.js';
import { NotificationDispatcher } from './dispatcher.js';
import {
  formatMac,
  withTimeout,
  CONNECT_TIMEOUT_MS,
  SCAN_GRACE_MS,
} from '../ble/types.js';
import { ConnectError, LinkLostError, MeasurementInProgressError } from '../errors.js';
import { createLogger } from '../logger.js';
import { errMsg } from '../utils/error.js';
import { withRetry } from '../utils/retry.js';

const log = createLogger('Conn');

export type SessionStatus = 'connecting' | 'open' | 'closing' | 'closed' | 'lost';

export type LinkLostListener = (error: LinkLostError) => void;

/** One GATT client connection to one device, owned by a ConnectionManager. */
export interface Session {
  readonly device: DeviceDescriptor;
  readonly registry: GattRegistry;
  readonly dispatcher: NotificationDispatcher;
  readonly status: SessionStatus;
  /** Current catalog; null once the session is torn down. */
  readonly catalog: GattCatalog | null;
  /** Aborted when the session is torn down, by disconnect() or by link loss. */
  readonly signal: AbortSignal;
  onLinkLost(listener: LinkLostListener): () => void;
  /**
   * Reserve the session for a measurement. Returns the release function.
   * Throws MeasurementInProgressError when another measurement holds it.
   */
  claimMeasurement(): () => void;
}

class ManagedSession implements Session {
  status: SessionStatus = 'connecting';
  readonly teardown = new AbortController();
  readonly linkLostListeners = new Set<LinkLostListener>();
  keepAliveRunning = false;
  closing: Promise<void> | null = null;
  private measuring = false;

  constructor(
    readonly key: string,
    readonly device: DeviceDescriptor,
    readonly link: BleLink,
    readonly registry: GattRegistry,
    readonly dispatcher: NotificationDispatcher,
  ) {}

  get catalog(): GattCatalog | null {
    return this.registry.catalog;
  }

  get signal(): AbortSignal {
    return this.teardown.signal;
  }

  onLinkLost(listener: LinkLostListener): () => void {
    this.linkLostListeners.add(listener);
    return () => {
      this.linkLostListeners.delete(listener);
    };
  }

  claimMeasurement(): () => void {
    if (this.measuring) throw new MeasurementInProgressError(this.device.address);
    this.measuring = true;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.measuring = false;
    };
  }
}

export function identityKey(device: Pick<DeviceDescriptor, 'address' | 'adapter'>): string {
  return `${formatMac(device.address)}@${device.adapter ?? 'default'}`;
}

/**
 * Owns scan / connect / disconnect for the devices it is asked about, and the
 * status of every session it hands out. At most one session per device
 * identity. Retrying is the caller's choice (connectWithRetry); connect()
 * itself tries exactly once.
 */
export class ConnectionManager {
  private readonly sessions = new Map<string, ManagedSession>();
  private readonly pending = new Map<string, Promise<Session>>();

  constructor(
    private readonly transport: BleTransport,
    private readonly standardUuids?: Map<string, string>,
  ) {}

  /**
   * Scan for the device within `timeoutMs`, connect and discover its GATT table.
   * An open session for the same device is returned as is.
   */
  async connect(
    device: DeviceDescriptor,
    timeoutMs: number = device.scanTimeoutMs,
    annotations: Record<string, string> = {},
  ): Promise<Session> {
    const key = identityKey(device);
    const existing = this.sessions.get(key);
    if (existing?.status === 'open') return existing;

    const inFlight = this.pending.get(key);
    if (inFlight) return inFlight;

    const attempt = this.open(key, device, timeoutMs, annotations);
    this.pending.set(key, attempt);
    try {
      return await attempt;
    } finally {
      this.pending.delete(key);
    }
  }

  /** connect() wrapped in the caller's retry policy. Only ConnectErrors are retried. */
  connectWithRetry(
    device: DeviceDescriptor,
    policy: RetryPolicy = device.retry,
    annotations: Record<string, string> = {},
  ): Promise<Session> {
    return withRetry(() => this.connect(device, device.scanTimeoutMs, annotations), {
      maxRetries: policy.count,
      backoffMs: policy.backoffMs,
      log,
      label: `connect to ${device.address}`,
      shouldRetry: (e) => e instanceof ConnectError,
    });
  }

  /**
   * Read `readUuid` every `intervalMs` until the session is torn down, so the
   * platform stack does not drop an idle link. Overlapping reads are skipped.
   */
  keepAlive(session: Session, intervalMs: number, readUuid: string): void {
    const managed = this.own(session);
    if (managed.status !== 'open') {
      throw new Error(`Cannot keep alive a ${managed.status} session`);
    }
    if (!(intervalMs > 0)) {
      throw new RangeError(`Keep-alive interval must be positive, got ${intervalMs}`);
    }
    if (managed.keepAliveRunning) {
      log.debug('Keep-alive already running');
      return;
    }
    managed.keepAliveRunning = true;

    let inFlight = false;
    const tick = async (): Promise<void> => {
      if (inFlight || managed.status !== 'open') return;
      inFlight = true;
      try {
        await managed.registry.resolve(readUuid).read();
        log.debug('Keep-alive read OK');
      } catch (e) {
        log.warn(`Keep-alive error: ${errMsg(e)}`);
      } finally {
        inFlight = false;
      }
    };

    const timer = setInterval(() => void tick(), intervalMs);
    managed.signal.addEventListener(
      'abort',
      () => {
        clearInterval(timer);
        managed.keepAliveRunning = false;
        log.debug('Keep-alive stopped');
      },
      { once: true },
    );
    log.debug(`Keep-alive every ${intervalMs}ms on ${readUuid}`);
  }

  /** Release the link. Calling it on a closed or lost session is a no-op. */
  disconnect(session: Session): Promise<void> {
    const managed = this.own(session);
    if (managed.closing) return managed.closing;
    if (managed.status !== 'open' && managed.status !== 'connecting') return Promise.resolve();

    managed.closing = this.close(managed);
    return managed.closing;
  }

  async disconnectAll(): Promise<void> {
    await Promise.all([...this.sessions.values()].map((s) => this.disconnect(s)));
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private own(session: Session): ManagedSession {
    if (!(session instanceof ManagedSession)) {
      throw new Error('Session was not created by a ConnectionManager');
    }
    return session;
  }

  private async open(
    key: string,
    device: DeviceDescriptor,
    timeoutMs: number,
    annotations: Record<string, string>,
  ): Promise<Session> {
    const { address } = device;

    let peripheral;
    try {
      peripheral = await withTimeout(
        this.transport.findPeripheral(address, timeoutMs),
        timeoutMs + SCAN_GRACE_MS,
        () => new ConnectError('Timeout', `Scan for ${address} exceeded ${timeoutMs}ms`),
      );
    } catch (e) {
      if (e instanceof ConnectError) throw e;
      throw new ConnectError('LinkError', `Scan for ${address} failed: ${errMsg(e)}`, {
        cause: e,
      });
    }
    if (!peripheral) {
      throw new ConnectError('NotFound', `Device ${address} not found within ${timeoutMs}ms`);
    }

    let link: BleLink;
    try {
      link = await withTimeout(peripheral.connect(), CONNECT_TIMEOUT_MS, 'Connection timed out');
    } catch (e) {
      throw new ConnectError('LinkError', `Connection to ${address} failed: ${errMsg(e)}`, {
        cause: e,
      });
    }

    const registry = new GattRegistry(annotations, this.standardUuids);
    const session = new ManagedSession(
      key,
      device,
      link,
      registry,
      new NotificationDispatcher(registry, device.queueLimit),
    );
    link.onDisconnect(() => this.onLinkDropped(session));

    try {
      await registry.discover(link);
    } catch (e) {
      session.status = 'closed';
      session.teardown.abort();
      await this.releaseLink(session);
      throw new ConnectError('LinkError', `GATT discovery on ${address} failed: ${errMsg(e)}`, {
        cause: e,
      });
    }

    session.status = 'open';
    this.sessions.set(key, session);
    log.info(
      `Connected to ${peripheral.name || address} [${address}] ` +
        `(${registry.catalog?.services.length ?? 0} services)`,
    );
    return session;
  }

  private async close(session: ManagedSession): Promise<void> {
    session.status = 'closing';
    session.teardown.abort();
    await session.dispatcher.unsubscribeAll();
    session.registry.invalidate();
    await this.releaseLink(session);
    session.status = 'closed';
    if (this.sessions.get(session.key) === session) this.sessions.delete(session.key);
    log.info(`Disconnected from ${session.device.address}`);
  }

  private async releaseLink(session: ManagedSession): Promise<void> {
    try {
      await session.link.disconnect();
    } catch (e) {
      log.warn(`Disconnect from ${session.device.address} failed: ${errMsg(e)}`);
    }
  }

  private onLinkDropped(session: ManagedSession): void {
    if (session.status !== 'open') return;

    const error = new LinkLostError(session.device.address);
    session.status = 'lost';
    if (this.sessions.get(session.key) === session) this.sessions.delete(session.key);
    session.dispatcher.reset();
    session.registry.invalidate();
    session.teardown.abort(error);
    log.warn(error.message);

    for (const listener of session.linkLostListeners) {
      try {
        listener(error);
      } catch (e) {
        log.error(`Link-lost listener failed: ${errMsg(e)}`);
      }
    }
  }
}

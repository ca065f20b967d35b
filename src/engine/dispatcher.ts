import type { GattRegistry } from './gatt-registry.js';
import { SubscriptionError } from '../errors.js';
import { createLogger } from '../logger.js';
import { normalizeUuid } from '../ble/types.js';
import { errMsg, toError } from '../utils/error.js';

const log = createLogger('Dispatch');

export const DEFAULT_QUEUE_LIMIT = 64;

export interface NotificationFrame {
  readonly charUuid: string;
  readonly data: Buffer;
  /** Per-characteristic arrival number, strictly increasing for the connection. */
  readonly seq: number;
}

export type FrameListener = (frame: NotificationFrame) => void | Promise<void>;

export interface SubscribeOptions {
  /** Called when a frame is dropped because the subscriber's queue is full. */
  onOverrun?: (error: SubscriptionError) => void;
  /** Called when the listener throws or rejects. */
  onError?: (error: Error, frame: NotificationFrame) => void;
}

export interface SubscriptionHandle {
  readonly id: number;
  readonly charUuid: string;
}

interface Subscription {
  readonly handle: SubscriptionHandle;
  readonly listener: FrameListener;
  readonly options: SubscribeOptions;
  readonly queue: NotificationFrame[];
  active: boolean;
  draining: boolean;
  stop?: () => Promise<void>;
}

/**
 * Routes characteristic notifications to the single subscriber of each
 * characteristic.
 *
 * The transport callback only stamps and enqueues the frame; delivery happens
 * from a per-subscription drain loop, so a slow listener never stalls the
 * transport. Each queue is bounded by `queueLimit`.
 */
export class NotificationDispatcher {
  private readonly subscriptions = new Map<string, Subscription>();
  private readonly sequences = new Map<string, number>();
  private nextId = 1;

  constructor(
    private readonly registry: GattRegistry,
    private readonly queueLimit: number = DEFAULT_QUEUE_LIMIT,
  ) {
    if (!Number.isInteger(queueLimit) || queueLimit < 1) {
      throw new RangeError(`queueLimit must be a positive integer, got ${queueLimit}`);
    }
  }

  async subscribe(
    uuid: string,
    listener: FrameListener,
    options: SubscribeOptions = {},
  ): Promise<SubscriptionHandle> {
    const charUuid = normalizeUuid(uuid);
    const info = this.registry.info(charUuid);

    if (!info.properties.includes('notify') && !info.properties.includes('indicate')) {
      throw new SubscriptionError(
        'NotNotifiable',
        charUuid,
        `Characteristic ${charUuid} supports neither notify nor indicate ` +
          `(props=[${info.properties.join(',')}])`,
      );
    }
    if (this.subscriptions.has(charUuid)) {
      throw new SubscriptionError(
        'AlreadySubscribed',
        charUuid,
        `Characteristic ${charUuid} already has a subscriber`,
      );
    }

    const sub: Subscription = {
      handle: { id: this.nextId++, charUuid },
      listener,
      options,
      queue: [],
      active: true,
      draining: false,
    };
    // Claim the slot before awaiting so a concurrent subscribe fails fast.
    this.subscriptions.set(charUuid, sub);

    try {
      sub.stop = await this.registry.resolve(charUuid).subscribe((data) => this.accept(sub, data));
    } catch (e) {
      this.subscriptions.delete(charUuid);
      sub.active = false;
      throw e;
    }

    // Unsubscribed while the transport was still enabling notifications:
    // the handle is already inert, only the transport side is left to stop.
    if (!sub.active) {
      await sub.stop();
      return sub.handle;
    }

    log.debug(`Subscribed #${sub.handle.id} to ${charUuid}`);
    return sub.handle;
  }

  /** Stop delivery and notifications for `handle`. Unknown or stale handles are a no-op. */
  async unsubscribe(handle: SubscriptionHandle): Promise<void> {
    const sub = this.subscriptions.get(handle.charUuid);
    if (!sub || sub.handle.id !== handle.id) return;

    this.subscriptions.delete(handle.charUuid);
    sub.active = false;
    const dropped = sub.queue.length;
    sub.queue.length = 0;
    if (dropped > 0) log.debug(`Dropped ${dropped} undelivered frame(s) for ${handle.charUuid}`);

    if (sub.stop) {
      await sub.stop();
      log.debug(`Unsubscribed #${handle.id} from ${handle.charUuid}`);
    }
  }

  /** Unsubscribe everything, attempting every subscription even when some fail. */
  async unsubscribeAll(): Promise<void> {
    const handles = [...this.subscriptions.values()].map((s) => s.handle);
    const results = await Promise.allSettled(handles.map((h) => this.unsubscribe(h)));
    for (const [i, result] of results.entries()) {
      if (result.status === 'rejected') {
        log.warn(`Unsubscribe from ${handles[i].charUuid} failed: ${errMsg(result.reason)}`);
      }
    }
  }

  /**
   * Forget every subscription and sequence counter without touching the
   * transport. Used after the link is gone, when notifications cannot be stopped.
   */
  reset(): void {
    for (const sub of this.subscriptions.values()) {
      sub.active = false;
      sub.queue.length = 0;
    }
    this.subscriptions.clear();
    this.sequences.clear();
  }

  isSubscribed(uuid: string): boolean {
    return this.subscriptions.has(normalizeUuid(uuid));
  }

  /** Frames waiting for delivery on `uuid`. */
  pending(uuid: string): number {
    return this.subscriptions.get(normalizeUuid(uuid))?.queue.length ?? 0;
  }

  // ─── Transport side ─────────────────────────────────────────────────────────

  private accept(sub: Subscription, data: Buffer): void {
    if (!sub.active) return;
    const charUuid = sub.handle.charUuid;
    const seq = (this.sequences.get(charUuid) ?? 0) + 1;
    this.sequences.set(charUuid, seq);

    const frame: NotificationFrame = Object.freeze({ charUuid, data: Buffer.from(data), seq });

    if (sub.queue.length >= this.queueLimit) {
      const error = new SubscriptionError(
        'Overrun',
        charUuid,
        `Subscriber queue for ${charUuid} is full (${this.queueLimit}); dropped frame #${seq}`,
      );
      log.warn(error.message);
      sub.options.onOverrun?.(error);
      return;
    }

    sub.queue.push(frame);
    if (!sub.draining) {
      sub.draining = true;
      queueMicrotask(() => void this.drain(sub));
    }
  }

  private async drain(sub: Subscription): Promise<void> {
    try {
      let frame = sub.queue.shift();
      while (frame && sub.active) {
        try {
          await sub.listener(frame);
        } catch (e) {
          const error = toError(e);
          log.error(`Listener for ${frame.charUuid} failed on frame #${frame.seq}: ${error.message}`);
          sub.options.onError?.(error, frame);
        }
        frame = sub.queue.shift();
      }
    } finally {
      sub.draining = false;
    }
  }
}

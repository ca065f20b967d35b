import type {
  NotificationDispatcher,
  NotificationFrame,
  SubscriptionHandle,
} from './dispatcher.js';
import type { GattRegistry } from './gatt-registry.js';
import type { MeasurementValues, VendorEvent } from './codec.js';
import { hasMeasurementStatus } from './codec.js';
import {
  DecodeError,
  MeasurementTimeoutError,
  SubscriptionError,
  WriteRejectedError,
} from '../errors.js';
import { createLogger } from '../logger.js';
import { errMsg } from '../utils/error.js';

const log = createLogger('Measure');

// ─── Phases ───────────────────────────────────────────────────────────────────

export type AbortReason =
  | 'vendor-signaled'
  | 'timeout'
  | 'decode-error'
  | 'cancelled'
  | 'link-lost';

export type Phase =
  | { kind: 'Idle' }
  | { kind: 'Inflating' }
  | { kind: 'Measuring' }
  | { kind: 'Deflating' }
  | { kind: 'Completed'; values: MeasurementValues }
  | { kind: 'Aborted'; reason: AbortReason; detail?: string };

export type PhaseKind = Phase['kind'];
export type TerminalPhase = Extract<Phase, { kind: 'Completed' | 'Aborted' }>;

export type MachineEvent =
  | { type: 'start' }
  | { type: 'vendor'; event: VendorEvent }
  | { type: 'measurement'; values: MeasurementValues }
  | { type: 'abort'; reason: AbortReason; detail?: string };

export function isTerminal(phase: Phase): phase is TerminalPhase {
  return phase.kind === 'Completed' || phase.kind === 'Aborted';
}

function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

/**
 * Pure transition function of the measurement cycle.
 *
 *   Idle ─start→ Inflating ─measuring→ Measuring ─deflating→ Deflating ─final reading→ Completed
 *
 * Any non-terminal phase moves to Aborted on a vendor abort/error frame or an
 * explicit abort event. Events that do not apply leave the phase unchanged;
 * terminal phases absorb everything.
 */
export function transition(phase: Phase, event: MachineEvent): Phase {
  if (isTerminal(phase)) return phase;

  switch (event.type) {
    case 'abort':
      return { kind: 'Aborted', reason: event.reason, detail: event.detail };

    case 'start':
      return phase.kind === 'Idle' ? { kind: 'Inflating' } : phase;

    case 'vendor': {
      if (event.event.kind === 'unknown') return phase;
      switch (event.event.phase) {
        case 'aborted':
        case 'error':
          return {
            kind: 'Aborted',
            reason: 'vendor-signaled',
            detail: `device reported ${event.event.phase}`,
          };
        case 'measuring':
          return phase.kind === 'Inflating' ? { kind: 'Measuring' } : phase;
        case 'deflating':
          return phase.kind === 'Measuring' ? { kind: 'Deflating' } : phase;
        case 'inflating':
        case 'completed':
          // Completion needs the final reading, which arrives on the measurement characteristic.
          return phase;
        default:
          return assertNever(event.event.phase);
      }
    }

    case 'measurement':
      return phase.kind === 'Deflating' && hasMeasurementStatus(event.values)
        ? { kind: 'Completed', values: event.values }
        : phase;

    default:
      return assertNever(event);
  }
}

// ─── Runner ───────────────────────────────────────────────────────────────────

export type ProgressEvent =
  | { type: 'phase'; phase: PhaseKind }
  | { type: 'reading'; values: MeasurementValues };

export type ProgressCallback = (event: ProgressEvent) => void;

/** The device-specific half of a measurement: which characteristics, which bytes. */
export interface MeasurementProfile {
  readonly measurementUuid: string;
  readonly controlUuid: string;
  readonly activationCommand: readonly number[];
  decodeMeasurement(data: Buffer): MeasurementValues;
  decodeControl(data: Buffer): VendorEvent;
  /**
   * Recognize a device abort sent on the measurement characteristic instead of
   * the control point. Returns the abort detail, or null for a regular frame.
   */
  detectAbort?(data: Buffer): string | null;
}

export interface MeasurementOptions {
  /** Abort when no frame of any subscribed kind arrives for this long. */
  timeoutMs: number;
  onProgress?: ProgressCallback;
  /** User-initiated cancellation. */
  signal?: AbortSignal;
}

export interface MeasurementOutcome {
  phase: TerminalPhase;
}

/**
 * Drives one measurement cycle over the dispatcher. Single use: run() may be
 * called once, and resolves (never rejects) once the machine is terminal,
 * except for subscription or activation-write failures before Inflating.
 * The inactivity timer runs from the first subscribe, so a stalled arming
 * step still ends in Aborted.
 */
export class MeasurementStateMachine {
  private current: Phase = { kind: 'Idle' };
  private started = false;
  private handles: SubscriptionHandle[] = [];
  private timer: ReturnType<typeof setTimeout> | null = null;
  /** Most recent dispatcher overrun; named in a later timeout. */
  private overrun: SubscriptionError | null = null;
  /** A final reading that arrived before the device reported deflating. */
  private heldFinal: MeasurementValues | null = null;
  private settle: ((outcome: MeasurementOutcome) => void) | null = null;

  constructor(
    private readonly registry: GattRegistry,
    private readonly dispatcher: NotificationDispatcher,
    private readonly profile: MeasurementProfile,
    private readonly options: MeasurementOptions,
  ) {}

  get phase(): Phase {
    return this.current;
  }

  async run(): Promise<MeasurementOutcome> {
    if (this.started) throw new Error('Measurement state machine can only run once');
    this.started = true;

    const finished = new Promise<MeasurementOutcome>((resolve) => {
      this.settle = resolve;
    });

    const { signal } = this.options;
    const onAbort = () => this.abort('cancelled', 'cancelled by user');
    if (signal?.aborted) {
      this.abort('cancelled', 'cancelled by user');
      return finished;
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    this.restartTimer();
    const armed = this.arm().then(
      () => undefined,
      (e: unknown) => {
        if (!isTerminal(this.current)) throw e;
        log.debug(`Arming failed after the run ended: ${errMsg(e)}`);
      },
    );
    try {
      // Cancellation or a timeout settles run() even while a subscribe or the
      // activation write is still pending.
      await Promise.race([armed, finished]);
    } catch (e) {
      signal?.removeEventListener('abort', onAbort);
      this.clearTimer();
      await this.releaseSubscriptions();
      throw e;
    }

    const outcome = await finished;
    signal?.removeEventListener('abort', onAbort);
    // An abort that landed while arm() was still subscribing leaves late handles behind.
    await this.releaseSubscriptions();
    return outcome;
  }

  /** Drive the machine to Aborted. No effect once terminal. */
  abort(reason: AbortReason = 'cancelled', detail?: string): void {
    this.apply({ type: 'abort', reason, detail });
  }

  private async arm(): Promise<void> {
    const { measurementUuid, controlUuid, activationCommand } = this.profile;

    if (!(await this.subscribe(measurementUuid, (f) => this.onMeasurementFrame(f)))) return;
    if (!(await this.subscribe(controlUuid, (f) => this.onControlFrame(f)))) return;

    try {
      await this.registry.resolve(controlUuid).write(Buffer.from(activationCommand), true);
    } catch (e) {
      throw new WriteRejectedError(controlUuid, { cause: e });
    }
    if (isTerminal(this.current)) return;
    log.debug('Activation command written');

    this.apply({ type: 'start' });
    if (!isTerminal(this.current)) this.restartTimer();
  }

  /** Subscribe while arming. Returns false when the run ended meanwhile. */
  private async subscribe(
    uuid: string,
    listener: (frame: NotificationFrame) => void,
  ): Promise<boolean> {
    const handle = await this.dispatcher.subscribe(uuid, listener, {
      onOverrun: (error) => {
        this.overrun = error;
      },
    });
    this.handles.push(handle);
    if (!isTerminal(this.current)) return true;
    await this.releaseSubscriptions();
    return false;
  }

  private onMeasurementFrame(frame: NotificationFrame): void {
    if (isTerminal(this.current)) return;
    this.restartTimer();

    const abortDetail = this.profile.detectAbort?.(frame.data) ?? null;
    if (abortDetail !== null) {
      this.apply({ type: 'abort', reason: 'vendor-signaled', detail: abortDetail });
      return;
    }

    let values: MeasurementValues;
    try {
      values = this.profile.decodeMeasurement(frame.data);
    } catch (e) {
      this.abortOnDecode(e, frame);
      return;
    }
    this.emit({ type: 'reading', values });

    if (hasMeasurementStatus(values) && this.current.kind !== 'Deflating') {
      log.debug(`Final reading arrived during ${this.current.kind}; holding it`);
      this.heldFinal = values;
      return;
    }
    this.apply({ type: 'measurement', values });
  }

  private onControlFrame(frame: NotificationFrame): void {
    if (isTerminal(this.current)) return;
    this.restartTimer();

    let event: VendorEvent;
    try {
      event = this.profile.decodeControl(frame.data);
    } catch (e) {
      this.abortOnDecode(e, frame);
      return;
    }
    if (event.kind === 'unknown') {
      log.debug(`Control frame #${frame.seq}: ${event.raw.toString('hex')}`);
      return;
    }
    this.apply({ type: 'vendor', event });

    if (this.current.kind === 'Deflating' && this.heldFinal) {
      const held = this.heldFinal;
      this.heldFinal = null;
      this.apply({ type: 'measurement', values: held });
    }
  }

  private abortOnDecode(e: unknown, frame: NotificationFrame): void {
    if (!(e instanceof DecodeError)) throw e;
    log.warn(`Frame #${frame.seq} on ${frame.charUuid}: ${e.message}`);
    this.apply({ type: 'abort', reason: 'decode-error', detail: e.message });
  }

  private apply(event: MachineEvent): void {
    const before = this.current;
    const after = transition(before, event);
    if (after === before) return;

    this.current = after;
    log.debug(`${before.kind} → ${after.kind}`);
    this.emit({ type: 'phase', phase: after.kind });

    if (isTerminal(after)) void this.finish(after);
  }

  private async finish(phase: TerminalPhase): Promise<void> {
    this.clearTimer();
    await this.releaseSubscriptions();
    if (phase.kind === 'Aborted') {
      log.info(`Measurement aborted (${phase.reason}${phase.detail ? `: ${phase.detail}` : ''})`);
    }
    this.settle?.({ phase });
  }

  /** Unsubscribe every handle; one failure never prevents the others. */
  private async releaseSubscriptions(): Promise<void> {
    const handles = this.handles;
    this.handles = [];
    const results = await Promise.allSettled(handles.map((h) => this.dispatcher.unsubscribe(h)));
    for (const [i, result] of results.entries()) {
      if (result.status === 'rejected') {
        log.warn(`Unsubscribe from ${handles[i].charUuid} failed: ${errMsg(result.reason)}`);
      }
    }
  }

  private restartTimer(): void {
    this.clearTimer();
    const { timeoutMs } = this.options;
    this.timer = setTimeout(() => {
      this.timer = null;
      const error = new MeasurementTimeoutError(timeoutMs);
      const detail = this.overrun ? `${error.message} (${this.overrun.message})` : error.message;
      this.apply({ type: 'abort', reason: 'timeout', detail });
    }, timeoutMs);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /** Progress callbacks run on a microtask so they never hold up frame delivery. */
  private emit(event: ProgressEvent): void {
    const cb = this.options.onProgress;
    if (!cb) return;
    queueMicrotask(() => {
      try {
        cb(event);
      } catch (e) {
        log.warn(`Progress callback failed: ${errMsg(e)}`);
      }
    });
  }
}

/**
 * Error taxonomy shared by the engine and device plugins.
 *
 * Each family carries a `kind` discriminant so callers can branch without
 * parsing messages.
 */

export class CardioError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CardioError';
  }
}

export type ConnectErrorKind = 'NotFound' | 'Timeout' | 'LinkError';

export class ConnectError extends CardioError {
  constructor(
    readonly kind: ConnectErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConnectError';
  }
}

/** The link dropped after a session was established. */
export class LinkLostError extends CardioError {
  constructor(readonly address: string) {
    super(`Link to ${address} lost`);
    this.name = 'LinkLostError';
  }
}

export type SubscriptionErrorKind = 'AlreadySubscribed' | 'NotNotifiable' | 'Overrun';

export class SubscriptionError extends CardioError {
  constructor(
    readonly kind: SubscriptionErrorKind,
    readonly charUuid: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SubscriptionError';
  }
}

/** The device answered a GATT write with an error. */
export class WriteRejectedError extends CardioError {
  constructor(
    readonly charUuid: string,
    options?: { cause?: unknown },
  ) {
    super(`Write to ${charUuid} rejected`, options);
    this.name = 'WriteRejectedError';
  }
}

export type DecodeErrorKind = 'TruncatedPayload' | 'UnrecognizedFrame';

export class DecodeError extends CardioError {
  constructor(
    readonly kind: DecodeErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'DecodeError';
  }
}

export class MeasurementTimeoutError extends CardioError {
  constructor(readonly timeoutMs: number) {
    super(`No notification received within ${timeoutMs}ms`);
    this.name = 'MeasurementTimeoutError';
  }
}

export type CatalogErrorKind = 'NotDiscovered' | 'UnknownCharacteristic';

export class CatalogError extends CardioError {
  constructor(
    readonly kind: CatalogErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'CatalogError';
  }
}

export class MeasurementInProgressError extends CardioError {
  constructor(address: string) {
    super(`A measurement is already running on ${address}`);
    this.name = 'MeasurementInProgressError';
  }
}

export class UnsupportedOperationError extends CardioError {
  constructor(device: string, operation: string) {
    super(`${device} does not support '${operation}'`);
    this.name = 'UnsupportedOperationError';
  }
}

/** Base class so boundaries can tell our failures from programming errors. */
export class IpoAlertError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A raw upstream row lacks a required field; the row is skipped. */
export class MalformedRecordError extends IpoAlertError {
  readonly missing: string[];

  constructor(missing: string[], options?: { cause?: unknown }) {
    super(`record is missing required field(s): ${missing.join(", ")}`, options);
    this.missing = missing;
  }
}

/** Network, timeout or HTTP status failure inside one acquisition attempt. */
export class TransportError extends IpoAlertError {
  readonly status?: number;

  constructor(
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, options);
    this.status = options?.status;
  }
}

/** Body was not JSON, or had no `data` collection. */
export class DecodeError extends IpoAlertError {}

export class CapabilityUnavailableError extends IpoAlertError {}

export class DeliveryError extends IpoAlertError {}

/** Persistent store could not be opened or written. Fatal. */
export class StoreError extends IpoAlertError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

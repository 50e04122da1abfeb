/**
 * Error categories surfaced by the engine client.
 */

/**
 * The channel is unreachable, dropped mid-call, or rejected the call.
 * Never retried inside a single call.
 */
export class TransportError extends Error {
  readonly code?: number;

  constructor(message: string, options?: { code?: number; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "TransportError";
    if (options?.code !== undefined) {
      this.code = options.code;
    }
  }
}

/**
 * The round-trip succeeded but the engine reported a negative error code.
 */
export class RemoteExecutionError extends Error {
  readonly code: number;

  constructor(code: number) {
    super("Remote execution error");
    this.name = "RemoteExecutionError";
    this.code = code;
  }
}

/**
 * A call was made in a state that does not allow it
 * (duplicate tag, unknown tag, bad option value).
 */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

/**
 * An object reference in a result could not be turned into a proxy.
 */
export class MarshalError extends PreconditionError {
  constructor(message: string) {
    super(message);
    this.name = "MarshalError";
  }
}

/**
 * The session gave up connecting after its establish timeout.
 */
export class ConnectionUnavailableError extends Error {
  constructor(
    message = "Unable to establish a connection to the engine",
    options?: { cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ConnectionUnavailableError";
  }
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

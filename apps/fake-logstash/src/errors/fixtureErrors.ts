import type { LogRecord } from "../records/recordTypes.js";

export type FixtureErrorCode =
  | "BIND_FAILED"
  | "CONNECTION_DECODE_FAILED"
  | "SHUTDOWN_TIMEOUT"
  | "INVALID_LIFECYCLE_STATE"
  | "LOG_ASSERTION_FAILED"
  | "UNKNOWN_LEVEL"
  | "RECORD_WAIT_TIMEOUT";

/**
 * Base class of every error the fixture raises; `code` is stable, `message` is for humans.
 */
export class FixtureError extends Error {
  readonly code: FixtureErrorCode;

  constructor(code: FixtureErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The requested port could not be bound.
 */
export class BindError extends FixtureError {
  readonly port: number;

  constructor(port: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("BIND_FAILED", `Failed binding port ${port}: ${reason}`, { cause });
    this.port = port;
  }
}

/**
 * A frame was not valid text in the configured encoding, not valid JSON, or not a JSON object.
 */
export class ConnectionDecodeError extends FixtureError {
  readonly frame: Buffer;

  constructor(frame: Buffer, reason: string, cause?: unknown) {
    super("CONNECTION_DECODE_FAILED", `Failed decoding frame: ${reason}`, { cause });
    this.frame = frame;
  }
}

export class ShutdownTimeoutError extends FixtureError {
  readonly timeoutMs: number;

  constructor(serviceName: string, timeoutMs: number) {
    super("SHUTDOWN_TIMEOUT", `Failed stopping ${serviceName} within ${timeoutMs}ms.`);
    this.timeoutMs = timeoutMs;
  }
}

export class LifecycleError extends FixtureError {
  constructor(message: string) {
    super("INVALID_LIFECYCLE_STATE", message);
  }
}

/**
 * Raised by the record assertions; `record` is set when a record violated an "assert none" check.
 */
export class LogAssertionError extends FixtureError {
  readonly threshold: number;
  readonly record: LogRecord | null;

  constructor(message: string, threshold: number, record: LogRecord | null = null) {
    super("LOG_ASSERTION_FAILED", message);
    this.threshold = threshold;
    this.record = record;
  }
}

export class UnknownLevelError extends FixtureError {
  constructor(level: string) {
    super("UNKNOWN_LEVEL", `Unknown log level: ${level}`);
  }
}

export class RecordWaitTimeoutError extends FixtureError {
  constructor(expected: number, received: number, timeoutMs: number) {
    super(
      "RECORD_WAIT_TIMEOUT",
      `Expected at least ${expected} records within ${timeoutMs}ms, received ${received}.`
    );
  }
}

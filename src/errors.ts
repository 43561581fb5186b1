export type GatewayErrorKind =
  | "ProtocolError"
  | "SequenceError"
  | "AudioFormatError"
  | "BufferOverflowError"
  | "BackendTimeoutError"
  | "BackendUnavailableError"
  | "SessionNotFoundError"
  | "StateTransitionError";

/**
 * Base for every error the engine raises on purpose.
 *
 * `fatal` errors close the session with a final `error` message; the rest are
 * reported and the session carries on.
 */
export abstract class GatewayError extends Error {
  abstract readonly kind: GatewayErrorKind;
  abstract readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or unknown client message. */
export class ProtocolError extends GatewayError {
  readonly kind = "ProtocolError";
  readonly fatal = true;
}

/** Inbound frame out of order. Sequencing cannot be repaired; the client reconnects. */
export class SequenceError extends GatewayError {
  readonly kind = "SequenceError";
  readonly fatal = true;
  readonly expected: number;
  readonly received: number;

  constructor(expected: number, received: number) {
    super(`Expected sequence number ${expected}, received ${received}`);
    this.expected = expected;
    this.received = received;
  }
}

/** Frame is not 16kHz / 16-bit / mono / one frame long. The frame is dropped. */
export class AudioFormatError extends GatewayError {
  readonly kind = "AudioFormatError";
  readonly fatal = false;
}

/** Inbound buffer reached capacity and dropped its oldest frames. */
export class BufferOverflowError extends GatewayError {
  readonly kind = "BufferOverflowError";
  readonly fatal = false;
  readonly evicted: number;

  constructor(capacity: number, evicted: number) {
    super(`Audio buffer full (capacity ${capacity}); evicted ${evicted} oldest frame(s)`);
    this.evicted = evicted;
  }
}

export class BackendTimeoutError extends GatewayError {
  readonly kind = "BackendTimeoutError";
  readonly fatal = false;
}

export class BackendUnavailableError extends GatewayError {
  readonly kind = "BackendUnavailableError";
  readonly fatal = false;
}

export class SessionNotFoundError extends GatewayError {
  readonly kind = "SessionNotFoundError";
  readonly fatal = false;

  constructor(sessionId: string) {
    super(`Session ${sessionId} not found`);
  }
}

export class StateTransitionError extends GatewayError {
  readonly kind = "StateTransitionError";
  readonly fatal = true;

  constructor(from: string, to: string) {
    super(`Illegal session transition ${from} → ${to}`);
  }
}

/** Invalid configuration. Raised at startup, never on a session. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid voice gateway config:\n  - ${issues.join("\n  - ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** Normalize anything thrown into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

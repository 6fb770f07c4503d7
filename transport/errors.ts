/**
 * Base class for every failure the harness surfaces to callers. The `code`
 * is stable and safe to switch on; the message is for humans.
 */
export abstract class LatencyError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Bind or connect failure. Always raised at construction time.
 */
export class ConnectivityError extends LatencyError {
  readonly code = 'CONNECTIVITY';
}

/**
 * A datagram arrived from an address other than the socket's peer.
 */
export class PeerMismatchError extends LatencyError {
  readonly code = 'PEER_MISMATCH';
  readonly expected: string;
  readonly received: string;

  constructor(expected: string, received: string) {
    super(`datagram from ${received} does not match peer ${expected}`);
    this.expected = expected;
    this.received = received;
  }
}

/**
 * The socket does not know its peer yet, so there is nowhere to send to.
 */
export class NotConnectedError extends LatencyError {
  readonly code = 'NOT_CONNECTED';
}

export class HandshakeTimeoutError extends LatencyError {
  readonly code = 'HANDSHAKE_TIMEOUT';
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`handshake did not complete within ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Send or receive failed after setup. Never retried.
 */
export class TransportIOError extends LatencyError {
  readonly code = 'TRANSPORT_IO';
}

export class UnsupportedProtocolError extends LatencyError {
  readonly code = 'UNSUPPORTED_PROTOCOL';
}

export function coerceErrorString(err: unknown): string {
  if (err instanceof Error) {
    return err.message || 'unknown reason';
  }

  return `[coerced to error] ${String(err)}`;
}

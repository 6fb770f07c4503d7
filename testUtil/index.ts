import { BinaryCodec } from '../codec/binary';
import { ControlMessageAdapter } from '../codec/adapter';
import { PeerAddress, ProbeTransport } from '../probe/transport';
import { Connection } from '../transport/connection';
import { TransportIOError } from '../transport/errors';
import { ControlMessage } from '../transport/message';
import {
  ControlServerOptions,
  defaultControlServerOptions,
} from '../transport/options';

/**
 * Options small enough that timer-driven tests stay readable.
 */
export function testingSessionOptions(
  overrides?: Partial<ControlServerOptions>,
): ControlServerOptions {
  return {
    ...defaultControlServerOptions,
    handshakeTimeoutMs: 500,
    handshakeRetryIntervalMs: 100,
    idleTimeoutMs: 2_000,
    probeIntervalMs: 100,
    packetSizeBytes: 32,
    ...overrides,
  };
}

/**
 * Lets pending I/O callbacks, next ticks and microtasks run. Relies on
 * setImmediate not being faked.
 */
export async function flushIo(rounds = 2) {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

const testCodec = new ControlMessageAdapter(BinaryCodec);

export function encodeControl(msg: ControlMessage): Uint8Array {
  const res = testCodec.toBuffer(msg);
  if (!res.ok) {
    throw new Error(res.reason);
  }

  return res.value;
}

export function decodeControl(buf: Uint8Array): ControlMessage {
  const res = testCodec.fromBuffer(buf);
  if (!res.ok) {
    throw new Error(res.reason);
  }

  return res.value;
}

/**
 * In-memory control channel. What the session sends is recorded in
 * {@link sent}; {@link receive} plays the part of the peer.
 */
export class MockConnection extends Connection {
  readonly peerHost: string | undefined;
  readonly sent: Array<Uint8Array> = [];
  closed = false;
  /** When set, every frame sent is delivered back on a later microtask. */
  echo: boolean;

  constructor({
    peerHost = '127.0.0.1',
    echo = false,
  }: { peerHost?: string; echo?: boolean } = {}) {
    super();
    this.peerHost = peerHost;
    this.echo = echo;
  }

  get sentMessages(): Array<ControlMessage> {
    return this.sent.map(decodeControl);
  }

  send(msg: Uint8Array): boolean {
    if (this.closed) {
      return false;
    }

    this.sent.push(msg);
    if (this.echo) {
      const copy = Uint8Array.from(msg);
      queueMicrotask(() => {
        if (!this.closed) {
          this.dispatchData(copy);
        }
      });
    }

    return true;
  }

  receive(msg: Uint8Array) {
    this.dispatchData(msg);
  }

  fail(err: Error) {
    this.dispatchError(err);
    this.close();
  }

  close() {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.dispatchClose();
  }
}

interface PendingReceive {
  buf: Uint8Array;
  resolve: (len: number) => void;
  reject: (err: Error) => void;
}

/**
 * In-memory {@link ProbeTransport}. Frames handed to {@link deliver} are
 * returned by `receive`; frames sent are recorded in {@link sent}.
 */
export class MemoryProbeTransport implements ProbeTransport {
  peer: PeerAddress | undefined;
  readonly sent: Array<Uint8Array> = [];
  closed = false;
  /** When set, every frame sent is delivered straight back. */
  reflect: boolean;
  /** When set, every send rejects with this error. */
  sendFailure?: Error;

  private inbox: Array<Uint8Array> = [];
  private pending?: PendingReceive;
  private failure?: Error;

  constructor({
    peer,
    reflect = false,
  }: { peer?: PeerAddress; reflect?: boolean } = {}) {
    this.peer = peer;
    this.reflect = reflect;
  }

  async send(buf: Uint8Array): Promise<number> {
    if (this.closed) {
      throw new TransportIOError('memory transport closed');
    }

    if (this.sendFailure) {
      throw this.sendFailure;
    }

    const copy = Uint8Array.from(buf);
    this.sent.push(copy);
    if (this.reflect) {
      this.deliver(copy);
    }

    return buf.byteLength;
  }

  receive(buf: Uint8Array): Promise<number> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    if (this.closed) {
      return Promise.reject(new TransportIOError('memory transport closed'));
    }

    const next = this.inbox.shift();
    if (next) {
      return Promise.resolve(copyInto(buf, next));
    }

    return new Promise((resolve, reject) => {
      this.pending = { buf, resolve, reject };
    });
  }

  /**
   * Hands a frame to the transport as if it came from `from`. The first
   * sender becomes the peer if none was set.
   */
  deliver(frame: Uint8Array, from?: PeerAddress) {
    if (!this.peer && from) {
      this.peer = from;
    }

    const pending = this.pending;
    if (pending) {
      this.pending = undefined;
      pending.resolve(copyInto(pending.buf, frame));
      return;
    }

    this.inbox.push(frame);
  }

  /**
   * Fails the pending and every later receive.
   */
  fail(err: Error) {
    this.failure = err;
    const pending = this.pending;
    this.pending = undefined;
    pending?.reject(err);
  }

  close() {
    if (this.closed) {
      return;
    }

    this.closed = true;
    const pending = this.pending;
    this.pending = undefined;
    pending?.reject(new TransportIOError('memory transport closed'));
  }
}

function copyInto(buf: Uint8Array, frame: Uint8Array): number {
  const len = Math.min(buf.byteLength, frame.byteLength);
  buf.set(frame.subarray(0, len));
  return len;
}

import dgram from 'node:dgram';
import { lookup } from 'node:dns/promises';
import { isIP } from 'node:net';
import { Logger, MessageMetadata } from '../logging';
import {
  ConnectivityError,
  NotConnectedError,
  PeerMismatchError,
  TransportIOError,
  coerceErrorString,
} from '../transport/errors';
import {
  AddressLike,
  PeerAddress,
  ProbeTransport,
  formatAddress,
  parseAddress,
  sameAddress,
} from './transport';

/**
 * What to do with a datagram whose source is not the socket's peer.
 * `reject` fails the pending receive with {@link PeerMismatchError};
 * `drop` discards the datagram and keeps waiting.
 */
export type PeerMismatchPolicy = 'reject' | 'drop';

export interface DatagramSocketOptions {
  onPeerMismatch: PeerMismatchPolicy;
  /**
   * Datagrams held while nobody is receiving. Further arrivals are dropped,
   * the same as a full kernel buffer would.
   */
  maxQueuedDatagrams: number;
  log?: Logger;
}

export type ProvidedDatagramSocketOptions = Partial<DatagramSocketOptions>;

const defaultDatagramSocketOptions: DatagramSocketOptions = {
  onPeerMismatch: 'reject',
  maxQueuedDatagrams: 64,
};

interface Datagram {
  payload: Buffer;
  source: PeerAddress;
}

interface PendingReceive {
  resolve: (datagram: Datagram) => void;
  reject: (err: Error) => void;
}

function socketTypeFor(host: string): dgram.SocketType {
  return isIP(host) === 6 ? 'udp6' : 'udp4';
}

async function bindSocket(
  type: dgram.SocketType,
  local: PeerAddress,
): Promise<dgram.Socket> {
  const sock = dgram.createSocket(type);
  try {
    await new Promise<void>((resolve, reject) => {
      sock.once('error', reject);
      sock.bind(local.port, local.host, () => {
        sock.off('error', reject);
        resolve();
      });
    });
  } catch (err) {
    sock.close();
    throw new ConnectivityError(
      `failed to bind udp socket on ${formatAddress(local)}: ${coerceErrorString(err)}`,
      { cause: err },
    );
  }

  return sock;
}

/**
 * Shared plumbing for both datagram roles. Subclasses decide where sends go
 * and which sources are acceptable; everything else is identical.
 */
abstract class DatagramSocket implements ProbeTransport {
  protected readonly sock: dgram.Socket;
  protected readonly options: DatagramSocketOptions;
  readonly localAddress: PeerAddress;

  private inbox: Array<Datagram> = [];
  private pending: Array<PendingReceive> = [];
  private failure?: Error;
  private closed = false;

  abstract get peer(): PeerAddress | undefined;

  // where outgoing datagrams go, throws if there is nowhere yet
  protected abstract sendTarget(): PeerAddress;

  // called for each datagram before it is handed to the receiver
  protected abstract admit(source: PeerAddress): boolean;

  protected constructor(sock: dgram.Socket, options: DatagramSocketOptions) {
    this.sock = sock;
    this.options = options;
    const local = sock.address();
    this.localAddress = { host: local.address, port: local.port };

    this.sock.on('message', this.onMessage);
    this.sock.on('error', this.onError);
    this.sock.on('close', this.onClose);
  }

  get loggingMetadata(): MessageMetadata {
    const metadata: MessageMetadata = {
      localAddress: formatAddress(this.localAddress),
    };
    const peer = this.peer;
    if (peer) {
      metadata.peer = formatAddress(peer);
    }

    return metadata;
  }

  private onMessage = (payload: Buffer, rinfo: dgram.RemoteInfo) => {
    const datagram: Datagram = {
      payload,
      source: { host: rinfo.address, port: rinfo.port },
    };

    const waiter = this.pending.shift();
    if (waiter) {
      waiter.resolve(datagram);
      return;
    }

    if (this.inbox.length >= this.options.maxQueuedDatagrams) {
      this.options.log?.debug(
        `inbox full, dropping datagram from ${formatAddress(datagram.source)}`,
        this.loggingMetadata,
      );
      return;
    }

    this.inbox.push(datagram);
  };

  private onError = (err: Error) => {
    this.failure = new TransportIOError(
      `udp socket error: ${coerceErrorString(err)}`,
      { cause: err },
    );
    this.rejectPending(this.failure);
  };

  private onClose = () => {
    this.closed = true;
    this.rejectPending(this.failure ?? new TransportIOError('udp socket closed'));
  };

  private rejectPending(err: Error) {
    const pending = this.pending;
    this.pending = [];
    for (const waiter of pending) {
      waiter.reject(err);
    }
  }

  private nextDatagram(): Promise<Datagram> {
    const queued = this.inbox.shift();
    if (queued) {
      return Promise.resolve(queued);
    }

    if (this.failure) {
      return Promise.reject(this.failure);
    }

    if (this.closed) {
      return Promise.reject(new TransportIOError('udp socket closed'));
    }

    return new Promise((resolve, reject) => {
      this.pending.push({ resolve, reject });
    });
  }

  async receive(buf: Uint8Array): Promise<number> {
    for (;;) {
      const { payload, source } = await this.nextDatagram();
      if (this.admit(source)) {
        const len = Math.min(payload.byteLength, buf.byteLength);
        buf.set(payload.subarray(0, len));
        return len;
      }

      const expected = this.peer ? formatAddress(this.peer) : 'unknown';
      const err = new PeerMismatchError(expected, formatAddress(source));
      if (this.options.onPeerMismatch === 'reject') {
        throw err;
      }

      this.options.log?.warn(
        `dropping datagram: ${err.message}`,
        this.loggingMetadata,
      );
    }
  }

  async send(buf: Uint8Array): Promise<number> {
    if (this.closed) {
      throw new TransportIOError('udp socket closed');
    }

    const target = this.sendTarget();
    return new Promise((resolve, reject) => {
      this.sock.send(buf, target.port, target.host, (err, bytes) => {
        if (err) {
          reject(
            new TransportIOError(
              `failed to send to ${formatAddress(target)}: ${coerceErrorString(err)}`,
              { cause: err },
            ),
          );
          return;
        }

        resolve(bytes);
      });
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.sock.close();
  }
}

/**
 * Reflecting end of a probe flow. Binds a local address and learns its peer
 * from the first datagram it receives; any other source is refused for the
 * rest of the socket's life.
 */
export class ReflectorSocket extends DatagramSocket {
  private learnedPeer?: PeerAddress;

  private constructor(sock: dgram.Socket, options: DatagramSocketOptions) {
    super(sock, options);
  }

  /**
   * @throws {ConnectivityError} if the address is malformed or cannot be bound.
   */
  static async bind(
    local: AddressLike,
    providedOptions?: ProvidedDatagramSocketOptions,
  ): Promise<ReflectorSocket> {
    const options = { ...defaultDatagramSocketOptions, ...providedOptions };
    const addr = parseAddress(local);
    const sock = await bindSocket(socketTypeFor(addr.host), addr);
    const reflector = new ReflectorSocket(sock, options);
    options.log?.info(
      `reflector bound on ${formatAddress(reflector.localAddress)}`,
      reflector.loggingMetadata,
    );

    return reflector;
  }

  get peer(): PeerAddress | undefined {
    return this.learnedPeer;
  }

  protected sendTarget(): PeerAddress {
    if (!this.learnedPeer) {
      throw new NotConnectedError(
        `reflector on ${formatAddress(this.localAddress)} has not heard from a peer yet`,
      );
    }

    return this.learnedPeer;
  }

  protected admit(source: PeerAddress): boolean {
    if (!this.learnedPeer) {
      this.learnedPeer = source;
      this.options.log?.info(
        `reflector learned peer ${formatAddress(source)}`,
        this.loggingMetadata,
      );

      return true;
    }

    return sameAddress(this.learnedPeer, source);
  }
}

/**
 * Originating end of a probe flow. The remote is fixed at construction and
 * is the only address it ever sends to or accepts from.
 */
export class InitiatorSocket extends DatagramSocket {
  readonly remote: PeerAddress;

  private constructor(
    sock: dgram.Socket,
    remote: PeerAddress,
    options: DatagramSocketOptions,
  ) {
    super(sock, options);
    this.remote = remote;
  }

  /**
   * Binds an ephemeral local port and fixes the remote. Host names are
   * resolved once here so source checks compare addresses.
   * @throws {ConnectivityError} if the remote cannot be resolved or the bind fails.
   */
  static async connect(
    remote: AddressLike,
    providedOptions?: ProvidedDatagramSocketOptions & { local?: AddressLike },
  ): Promise<InitiatorSocket> {
    const options = { ...defaultDatagramSocketOptions, ...providedOptions };
    const parsed = parseAddress(remote);
    if (parsed.port === 0) {
      throw new ConnectivityError(
        `cannot probe ${formatAddress(parsed)}: remote port must be set`,
      );
    }

    let resolved: PeerAddress;
    try {
      const { address } = await lookup(parsed.host);
      resolved = { host: address, port: parsed.port };
    } catch (err) {
      throw new ConnectivityError(
        `failed to resolve ${parsed.host}: ${coerceErrorString(err)}`,
        { cause: err },
      );
    }

    const type = socketTypeFor(resolved.host);
    const local = providedOptions?.local
      ? parseAddress(providedOptions.local)
      : { host: type === 'udp6' ? '::' : '0.0.0.0', port: 0 };
    const sock = await bindSocket(type, local);
    const initiator = new InitiatorSocket(sock, resolved, options);
    options.log?.info(
      `initiator bound on ${formatAddress(initiator.localAddress)}`,
      initiator.loggingMetadata,
    );

    return initiator;
  }

  get peer(): PeerAddress {
    return this.remote;
  }

  protected sendTarget(): PeerAddress {
    return this.remote;
  }

  protected admit(source: PeerAddress): boolean {
    return sameAddress(this.remote, source);
  }
}

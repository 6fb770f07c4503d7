import { Socket, connect } from 'node:net';
import stream from 'node:stream';
import {
  MessageFramer,
  Uint32LengthPrefixFraming,
} from '../../transforms/messageFraming';
import { Connection } from '../../connection';
import { ConnectivityError, coerceErrorString } from '../../errors';
import { AddressLike, formatAddress, parseAddress } from '../../../probe/transport';

/**
 * Control channel over a byte-stream socket. Messages are delimited with a
 * uint32 length prefix since one write does not map to one read.
 */
export class TcpConnection extends Connection {
  sock: Socket;
  input: stream.Readable;
  framer: Uint32LengthPrefixFraming;

  constructor(sock: Socket) {
    super();
    this.framer = MessageFramer.createFramedStream();
    this.sock = sock;
    this.input = sock.pipe(this.framer);

    this.sock.on('close', () => {
      this.dispatchClose();
    });

    this.sock.on('error', (err) => {
      if (err instanceof Error && 'code' in err && err.code === 'EPIPE') {
        // the close listener reports this
        return;
      }

      this.dispatchError(err);
    });

    this.framer.on('error', (err) => {
      // oversized frame, nothing after it can be trusted
      this.dispatchError(err);
      this.sock.destroy();
    });

    this.input.on('data', (msg: Uint8Array) => {
      this.dispatchData(msg);
    });
  }

  get peerHost(): string | undefined {
    return this.sock.remoteAddress;
  }

  send(payload: Uint8Array) {
    if (this.framer.destroyed || !this.sock.writable || this.sock.closed) {
      return false;
    }

    this.sock.write(MessageFramer.write(payload));
    return true;
  }

  close() {
    this.sock.destroy();
    this.framer.destroy();
  }
}

/**
 * Dials a control server.
 * @throws {ConnectivityError} if the connection cannot be established.
 */
export async function connectTcp(address: AddressLike): Promise<TcpConnection> {
  const addr = parseAddress(address);
  const sock = await new Promise<Socket>((resolve, reject) => {
    const sock = connect({ host: addr.host, port: addr.port });
    sock.once('connect', () => {
      sock.off('error', reject);
      resolve(sock);
    });
    sock.once('error', reject);
  }).catch((err: unknown) => {
    throw new ConnectivityError(
      `failed to connect to ${formatAddress(addr)}: ${coerceErrorString(err)}`,
      { cause: err },
    );
  });

  return new TcpConnection(sock);
}

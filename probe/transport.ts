import { isIP } from 'node:net';
import { ConnectivityError } from '../transport/errors';

export interface PeerAddress {
  host: string;
  port: number;
}

export type AddressLike = string | PeerAddress;

/**
 * What a probe flow needs from a data-plane transport: exchange payloads
 * with one established peer. Implemented by the datagram sockets today and
 * meant to be implemented by a stream transport later.
 */
export interface ProbeTransport {
  /**
   * The peer this transport exchanges payloads with, if known yet.
   */
  readonly peer: PeerAddress | undefined;
  /**
   * Sends `buf` to the peer.
   * @returns the number of bytes sent.
   */
  send(buf: Uint8Array): Promise<number>;
  /**
   * Waits for the next payload from the peer and copies it into `buf`.
   * @returns the number of bytes copied.
   */
  receive(buf: Uint8Array): Promise<number>;
  close(): void;
}

export function formatAddress(addr: PeerAddress): string {
  return isIP(addr.host) === 6
    ? `[${addr.host}]:${addr.port}`
    : `${addr.host}:${addr.port}`;
}

export function sameAddress(a: PeerAddress, b: PeerAddress): boolean {
  return a.port === b.port && unmapHost(a.host) === unmapHost(b.host);
}

/**
 * Dual-stack sockets report ipv4 peers as `::ffff:a.b.c.d`; this returns
 * the plain ipv4 form for those and a lowercased host otherwise.
 */
export function unmapHost(host: string): string {
  const lower = host.toLowerCase();
  return lower.startsWith('::ffff:') && isIP(lower.slice(7)) === 4
    ? lower.slice(7)
    : lower;
}

/**
 * Parses `host:port`, `[v6]:port` or an address object.
 * @throws {ConnectivityError} if the address is malformed.
 */
export function parseAddress(addr: AddressLike): PeerAddress {
  if (typeof addr !== 'string') {
    return checkPort(addr);
  }

  const bracketed = /^\[([^\]]+)\]:(\d+)$/.exec(addr);
  if (bracketed) {
    return checkPort({ host: bracketed[1], port: Number(bracketed[2]) });
  }

  const sep = addr.lastIndexOf(':');
  if (
    sep <= 0 ||
    addr.indexOf(':') !== sep ||
    !/^\d+$/.test(addr.slice(sep + 1))
  ) {
    throw new ConnectivityError(`malformed address: ${addr}`);
  }

  return checkPort({
    host: addr.slice(0, sep),
    port: Number(addr.slice(sep + 1)),
  });
}

function checkPort(addr: PeerAddress): PeerAddress {
  if (!Number.isInteger(addr.port) || addr.port < 0 || addr.port > 65_535) {
    throw new ConnectivityError(
      `invalid port in address ${addr.host}:${addr.port}`,
    );
  }

  if (addr.host.length === 0) {
    throw new ConnectivityError(`missing host in address :${addr.port}`);
  }

  return { host: addr.host, port: addr.port };
}

import { Logger } from '../logging';
import { InitiatorSocket, ProvidedDatagramSocketOptions } from '../probe/udp';
import { ProbeTransport, unmapHost } from '../probe/transport';
import { ConnectivityError, UnsupportedProtocolError } from './errors';
import { ProbeProtocol } from './message';

export interface FlowRequest {
  sessionId: bigint;
  protocol: ProbeProtocol;
  /** Host of the control peer, when the control channel knows it. */
  peerHost: string | undefined;
  log?: Logger;
}

/**
 * Opens the data-plane transports a session probes over once its handshake
 * has completed. Each returned transport gets its own runner and context.
 */
export type FlowFactory = (request: FlowRequest) => Promise<Array<ProbeTransport>>;

export const noFlows: FlowFactory = async () => [];

/**
 * Opens one {@link InitiatorSocket} per port toward the control peer's host,
 * where the measurement client is expected to run reflectors.
 */
export function initiatorFlows({
  ports,
  host,
  socketOptions,
}: {
  ports: Array<number>;
  /** Overrides the control peer's host. */
  host?: string;
  socketOptions?: ProvidedDatagramSocketOptions;
}): FlowFactory {
  return async ({ protocol, peerHost, log }) => {
    if (protocol !== ProbeProtocol.Udp) {
      throw new UnsupportedProtocolError(
        `no flow implementation for protocol ${ProbeProtocol[protocol]}`,
      );
    }

    const target = host ?? (peerHost ? unmapHost(peerHost) : undefined);
    if (!target) {
      throw new ConnectivityError(
        `control peer has no host to probe and none was configured`,
      );
    }

    const opened: Array<ProbeTransport> = [];
    try {
      for (const port of ports) {
        opened.push(
          await InitiatorSocket.connect(
            { host: target, port },
            { log, ...socketOptions },
          ),
        );
      }
    } catch (err) {
      for (const transport of opened) {
        transport.close();
      }

      throw err;
    }

    return opened;
  };
}

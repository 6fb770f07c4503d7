import { afterEach, describe, test, expect, vi } from 'vitest';
import { InitiatorSocket, ReflectorSocket } from '../probe/udp';
import { ProbeTransport } from '../probe/transport';
import { ConnectivityError, UnsupportedProtocolError } from './errors';
import { initiatorFlows, noFlows } from './flows';
import { ProbeProtocol } from './message';

const opened: Array<ProbeTransport> = [];
function track<T extends ProbeTransport>(transports: Array<T>): Array<T> {
  opened.push(...transports);
  return transports;
}

afterEach(() => {
  for (const transport of opened.splice(0)) {
    transport.close();
  }

  vi.restoreAllMocks();
});

describe('noFlows', () => {
  test('opens nothing', async () => {
    await expect(
      noFlows({ sessionId: 1n, protocol: ProbeProtocol.Udp, peerHost: '127.0.0.1' }),
    ).resolves.toStrictEqual([]);
  });
});

describe('initiatorFlows', () => {
  test('opens one initiator per port toward the control peer', async () => {
    const reflectors = track([
      await ReflectorSocket.bind('127.0.0.1:0'),
      await ReflectorSocket.bind('127.0.0.1:0'),
    ]);
    const ports = reflectors.map((r) => r.localAddress.port);

    const flows = track(
      await initiatorFlows({ ports })({
        sessionId: 5n,
        protocol: ProbeProtocol.Udp,
        peerHost: '::ffff:127.0.0.1',
      }),
    );

    expect(flows).toHaveLength(2);
    expect(flows.map((flow) => flow.peer)).toStrictEqual([
      { host: '127.0.0.1', port: ports[0] },
      { host: '127.0.0.1', port: ports[1] },
    ]);
    for (const flow of flows) {
      expect(flow).toBeInstanceOf(InitiatorSocket);
    }
  });

  test('a configured host overrides the control peer', async () => {
    const [reflector] = track([await ReflectorSocket.bind('127.0.0.1:0')]);

    const flows = track(
      await initiatorFlows({
        ports: [reflector.localAddress.port],
        host: '127.0.0.1',
      })({ sessionId: 5n, protocol: ProbeProtocol.Udp, peerHost: undefined }),
    );

    expect(flows.map((flow) => flow.peer)).toStrictEqual([
      { host: '127.0.0.1', port: reflector.localAddress.port },
    ]);
  });

  test('rejects the stream protocol', async () => {
    await expect(
      initiatorFlows({ ports: [9] })({
        sessionId: 5n,
        protocol: ProbeProtocol.Tcp,
        peerHost: '127.0.0.1',
      }),
    ).rejects.toBeInstanceOf(UnsupportedProtocolError);
  });

  test('needs a host to probe', async () => {
    await expect(
      initiatorFlows({ ports: [9] })({
        sessionId: 5n,
        protocol: ProbeProtocol.Udp,
        peerHost: undefined,
      }),
    ).rejects.toBeInstanceOf(ConnectivityError);
  });

  test('closes the flows it opened when a later one fails', async () => {
    const [reflector] = track([await ReflectorSocket.bind('127.0.0.1:0')]);
    const close = vi.spyOn(InitiatorSocket.prototype, 'close');

    await expect(
      initiatorFlows({ ports: [reflector.localAddress.port, 0] })({
        sessionId: 5n,
        protocol: ProbeProtocol.Udp,
        peerHost: '127.0.0.1',
      }),
    ).rejects.toThrow('remote port must be set');
    expect(close).toHaveBeenCalledTimes(1);
  });
});

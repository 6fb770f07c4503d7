import { afterEach, beforeEach, describe, test, expect, vi } from 'vitest';
import { ProbeCodec } from '../codec';
import { oneshot, OneShotSender } from '../probe/oneshot';
import { ConnectionRunner, RunnerExit } from '../probe/runner';
import {
  MemoryProbeTransport,
  MockConnection,
  encodeControl,
  flushIo,
  testingSessionOptions,
} from '../testUtil';
import { HandshakeTimeoutError, UnsupportedProtocolError } from './errors';
import { EventDispatcher, EventTypes, ProtocolError } from './events';
import { initiatorFlows } from './flows';
import { ProbeProtocol, handshakeMessage } from './message';
import { SessionOptions } from './options';
import { Session } from './session';
import { SessionState } from './sessionStateMachine';

const START = 1_700_000_000_000;

function createSession(
  overrides?: Partial<SessionOptions>,
  conn = new MockConnection({ echo: true }),
) {
  const [stop, stopped] = oneshot();
  const events = new EventDispatcher<EventTypes>();
  const session = new Session({
    conn,
    stop: stopped,
    events,
    options: testingSessionOptions(overrides),
  });

  return { session, conn, stop, events };
}

function memoryFlows(count: number, reflect = false) {
  return Array.from(
    { length: count },
    (_, i) =>
      new MemoryProbeTransport({
        peer: { host: '127.0.0.1', port: 7001 + i },
        reflect,
      }),
  );
}

beforeEach(() => {
  vi.useFakeTimers({
    toFake: ['setTimeout', 'clearTimeout', 'setInterval', 'clearInterval', 'Date'],
  });
  vi.setSystemTime(START);
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe('handshake', () => {
  test('completes once the peer echoes the handshake', async () => {
    const { session, conn, events } = createSession();
    const transitions = vi.fn();
    events.addEventListener('sessionTransition', ({ state }) =>
      transitions(state),
    );

    void session.run();
    expect(session.state).toBe(SessionState.Handshaking);
    expect(conn.sentMessages).toEqual([
      { type: 'HANDSHAKE', id: session.id, protocol: ProbeProtocol.Udp },
    ]);

    await flushIo();
    expect(session.state).toBe(SessionState.SteadyState);
    expect(transitions.mock.calls).toEqual([
      [SessionState.Handshaking],
      [SessionState.SteadyState],
    ]);
  });

  test('retransmits until the timeout, then terminates', async () => {
    const conn = new MockConnection();
    const { session } = createSession({}, conn);

    const exit = session.run();
    expect(conn.sent).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(450);
    expect(conn.sent).toHaveLength(5);
    expect(session.state).toBe(SessionState.Handshaking);

    await vi.advanceTimersByTimeAsync(50);
    const result = await exit;
    expect(result.reason).toBe('handshake_timeout');
    expect(result.error).toBeInstanceOf(HandshakeTimeoutError);
    expect(result.error?.message).toBe('handshake did not complete within 500ms');
    expect(conn.sent).toHaveLength(5);
    expect(conn.closed).toBe(true);
    expect(session.state).toBe(SessionState.Terminating);
  });

  test('a mismatched echo is reported and the handshake keeps waiting', async () => {
    const conn = new MockConnection();
    const { session, events } = createSession({}, conn);
    const protocolErrors = vi.fn();
    events.addEventListener('protocolError', protocolErrors);

    void session.run();
    conn.receive(encodeControl(handshakeMessage(session.id ^ 1n, ProbeProtocol.Udp)));
    conn.receive(encodeControl(handshakeMessage(session.id, ProbeProtocol.Tcp)));

    expect(protocolErrors).toHaveBeenCalledTimes(2);
    expect(protocolErrors.mock.calls[0][0]).toMatchObject({
      type: ProtocolError.HandshakeFailed,
      sessionId: session.id,
    });
    expect(session.state).toBe(SessionState.Handshaking);

    conn.receive(encodeControl(handshakeMessage(session.id, ProbeProtocol.Udp)));
    expect(session.state).toBe(SessionState.SteadyState);
  });

  test('stop during the handshake terminates without reaching SteadyState', async () => {
    const conn = new MockConnection();
    const { session, stop } = createSession({}, conn);

    const exit = session.run();
    stop.send();

    expect(await exit).toEqual({ reason: 'stopped' });
    expect(conn.closed).toBe(true);

    // a late echo has nothing left to complete
    await vi.advanceTimersByTimeAsync(1_000);
    expect(conn.sent).toHaveLength(1);
  });

  test('control channel closure during the handshake terminates', async () => {
    const conn = new MockConnection();
    const { session } = createSession({}, conn);

    const exit = session.run();
    conn.close();

    expect(await exit).toEqual({ reason: 'control_closed' });
  });
});

describe('steady state', () => {
  test('one tick writes the same probe to every connected flow', async () => {
    const transports = memoryFlows(3);
    const { session, stop } = createSession({
      flows: async () => transports,
    });

    void session.run();
    await flushIo();
    expect(session.flowCount).toBe(3);

    await vi.advanceTimersByTimeAsync(100);
    await flushIo();

    const payloads = transports.map((t) => {
      expect(t.sent).toHaveLength(1);
      return Buffer.from(t.sent[0]);
    });
    expect(payloads[0].byteLength).toBe(32);
    expect(payloads[1].equals(payloads[0])).toBe(true);
    expect(payloads[2].equals(payloads[0])).toBe(true);
    expect(ProbeCodec.decode(payloads[0])).toEqual({
      id: session.id,
      seq: 1n,
      timestamp: BigInt(START + 100),
    });

    stop.send();
  });

  test('sequence numbers increase by one per tick', async () => {
    const [transport] = memoryFlows(1);
    const { session, stop } = createSession({
      flows: async () => [transport],
    });

    void session.run();
    await flushIo();
    for (let i = 0; i < 3; i++) {
      await vi.advanceTimersByTimeAsync(100);
      await flushIo();
    }

    expect(
      transport.sent.map((frame) => ProbeCodec.decode(frame)?.seq),
    ).toEqual([1n, 2n, 3n]);

    stop.send();
  });

  test('a slow flow delays the fan-out instead of missing probes', async () => {
    class HeldTransport extends MemoryProbeTransport {
      private held: Array<() => void> = [];
      holding = true;

      async send(buf: Uint8Array): Promise<number> {
        if (this.holding) {
          await new Promise<void>((resolve) => this.held.push(resolve));
        }

        return super.send(buf);
      }

      release() {
        this.holding = false;
        for (const resume of this.held.splice(0)) {
          resume();
        }
      }
    }

    const slow = new HeldTransport({ peer: { host: '127.0.0.1', port: 7001 } });
    const [fast] = memoryFlows(1);
    const { session, stop } = createSession({
      pipeCapacity: 1,
      flows: async () => [slow, fast],
    });
    const seqs = (transport: MemoryProbeTransport) =>
      transport.sent.map((frame) => ProbeCodec.decode(frame)?.seq);
    const contiguous = (values: Array<bigint | undefined>) =>
      values.every((seq, i) => seq === BigInt(i + 1));

    void session.run();
    await flushIo();
    await vi.advanceTimersByTimeAsync(500);
    await flushIo();

    expect(slow.sent).toHaveLength(0);
    expect(fast.sent.length).toBeGreaterThan(0);
    expect(fast.sent.length).toBeLessThan(5);

    slow.release();
    await flushIo(4);
    for (let i = 0; i < 5; i++) {
      await vi.advanceTimersByTimeAsync(100);
      await flushIo(4);
    }

    expect(fast.sent.length).toBeGreaterThanOrEqual(5);
    expect(contiguous(seqs(fast))).toBe(true);
    expect(contiguous(seqs(slow))).toBe(true);
    expect(seqs(slow)).toEqual(seqs(fast));

    stop.send();
  });

  test('echoed probes are reported with their round trip time', async () => {
    const transports = memoryFlows(2, true);
    const { session, events, stop } = createSession({
      flows: async () => transports,
    });
    const echoes = vi.fn();
    events.addEventListener('probeEcho', echoes);

    void session.run();
    await flushIo();
    await vi.advanceTimersByTimeAsync(100);
    await flushIo();

    expect(echoes).toHaveBeenCalledTimes(2);
    for (const [echo] of echoes.mock.calls) {
      expect(echo).toMatchObject({ sessionId: session.id, seq: 1n, rttMs: 0 });
    }

    const flowIds = echoes.mock.calls.map(([echo]) => echo.flowId);
    expect(new Set(flowIds).size).toBe(2);

    stop.send();
  });

  test('probes carrying another session id are not reported', async () => {
    const [transport] = memoryFlows(1);
    const { session, events, stop } = createSession({
      flows: async () => [transport],
    });
    const echoes = vi.fn();
    events.addEventListener('probeEcho', echoes);

    void session.run();
    await flushIo();
    transport.deliver(
      ProbeCodec.encode({ id: session.id ^ 1n, seq: 1n, timestamp: BigInt(START) }),
    );
    transport.deliver(Buffer.from('short'));
    await flushIo();

    expect(echoes).not.toHaveBeenCalled();
    stop.send();
  });

  test('stop cancels every flow exactly once and every runner exits', async () => {
    const sendSpy = vi.spyOn(OneShotSender.prototype, 'send');
    const runSpy = vi.spyOn(ConnectionRunner.prototype, 'run');
    const transports = memoryFlows(3);
    const { session, stop } = createSession({
      flows: async () => transports,
    });

    const exit = session.run();
    await flushIo();
    expect(runSpy).toHaveBeenCalledTimes(3);

    stop.send();
    expect(await exit).toEqual({ reason: 'stopped' });

    // one for the session itself, one per flow
    expect(sendSpy).toHaveBeenCalledTimes(4);
    const runnerExits = await Promise.all(
      runSpy.mock.results.map((res): Promise<RunnerExit> => res.value),
    );
    expect(runnerExits).toEqual([
      { reason: 'cancelled' },
      { reason: 'cancelled' },
      { reason: 'cancelled' },
    ]);
    expect(await session.tasks.drain(1_000)).toBe(true);
    expect(session.tasks.size).toBe(0);
    expect(transports.every((t) => t.closed)).toBe(true);
  });

  test('idle timeout is absolute by default', async () => {
    const transports = memoryFlows(2);
    const { session, conn } = createSession({
      flows: async () => transports,
    });

    const exit = session.run();
    await flushIo();

    await vi.advanceTimersByTimeAsync(1_500);
    conn.receive(encodeControl(handshakeMessage(session.id, ProbeProtocol.Udp)));
    await vi.advanceTimersByTimeAsync(500);

    expect(await exit).toEqual({ reason: 'idle_timeout' });
    expect(conn.closed).toBe(true);
    await flushIo();
    expect(transports.every((t) => t.closed)).toBe(true);
  });

  test('idle timeout counts from session start, not from the handshake', async () => {
    const { session, conn } = createSession(
      { handshakeTimeoutMs: 5_000, idleTimeoutMs: 1_000 },
      new MockConnection(),
    );

    let exited = false;
    const exit = session.run().then((res) => {
      exited = true;
      return res;
    });

    await vi.advanceTimersByTimeAsync(900);
    conn.receive(encodeControl(handshakeMessage(session.id, ProbeProtocol.Udp)));
    expect(session.state).toBe(SessionState.SteadyState);

    await vi.advanceTimersByTimeAsync(99);
    expect(exited).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    expect(await exit).toEqual({ reason: 'idle_timeout' });
  });

  test('idle timeout restarts on control traffic when configured', async () => {
    const { session, conn } = createSession({
      idleTimeoutResetOnActivity: true,
    });

    let exited = false;
    const exit = session.run().then((res) => {
      exited = true;
      return res;
    });
    await flushIo();

    await vi.advanceTimersByTimeAsync(1_500);
    conn.receive(encodeControl(handshakeMessage(session.id, ProbeProtocol.Udp)));
    await vi.advanceTimersByTimeAsync(500);
    expect(exited).toBe(false);
    expect(session.state).toBe(SessionState.SteadyState);

    await vi.advanceTimersByTimeAsync(1_500);
    expect(await exit).toEqual({ reason: 'idle_timeout' });
  });

  test('malformed control frames are reported and ignored', async () => {
    const { session, conn, events, stop } = createSession();
    const protocolErrors = vi.fn();
    events.addEventListener('protocolError', protocolErrors);

    void session.run();
    await flushIo();
    conn.receive(Uint8Array.from([0xc1]));

    expect(protocolErrors).toHaveBeenCalledTimes(1);
    expect(protocolErrors.mock.calls[0][0]).toMatchObject({
      type: ProtocolError.InvalidControlMessage,
      sessionId: session.id,
    });
    expect(session.state).toBe(SessionState.SteadyState);
    stop.send();
  });

  test('a failing flow is dropped and the others keep probing', async () => {
    const transports = memoryFlows(3);
    const { session, stop } = createSession({
      flows: async () => transports,
    });

    void session.run();
    await flushIo();

    transports[0].fail(new Error('host unreachable'));
    await flushIo();
    expect(session.flowCount).toBe(2);

    await vi.advanceTimersByTimeAsync(100);
    await flushIo();
    expect(transports.map((t) => t.sent.length)).toEqual([0, 1, 1]);
    expect(session.state).toBe(SessionState.SteadyState);

    stop.send();
  });

  test('a flow that cannot be opened ends the session', async () => {
    const { session } = createSession({
      protocol: ProbeProtocol.Tcp,
      flows: initiatorFlows({ ports: [9] }),
    });

    const result = await session.run();
    expect(result.reason).toBe('flow_error');
    expect(result.error).toBeInstanceOf(UnsupportedProtocolError);
  });

  test('transports attached after termination are closed', async () => {
    const { session, stop } = createSession();

    const exit = session.run();
    stop.send();
    await exit;

    const late = new MemoryProbeTransport();
    expect(session.attach(late)).toBe(false);
    expect(late.closed).toBe(true);
  });

  test('run is idempotent', async () => {
    const { session, stop } = createSession();

    const first = session.run();
    expect(session.run()).toBe(first);
    stop.send();
    expect(await first).toEqual({ reason: 'stopped' });
  });
});

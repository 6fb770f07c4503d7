import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { BinaryCodec } from '../codec/binary';
import { Codec } from '../codec/types';
import { MAX_PROBE_BYTES, PROBE_HEADER_BYTES } from '../codec/probe';
import { DEFAULT_PIPE_CAPACITY } from '../probe/pipe';
import { FlowFactory, noFlows } from './flows';
import { ProbeProtocol, ProbeProtocolSchema } from './message';

export interface SessionOptions {
  /**
   * Overall bound on the handshake, measured from the first handshake sent.
   */
  handshakeTimeoutMs: number;
  /**
   * Interval between handshake retransmissions.
   */
  handshakeRetryIntervalMs: number;
  /**
   * Lifetime of a session, measured from its start.
   */
  idleTimeoutMs: number;
  /**
   * If `true`, every inbound control message restarts the idle timeout
   * (keep-alive semantics). Defaults to `false`: the timeout is absolute.
   */
  idleTimeoutResetOnActivity: boolean;
  /**
   * Interval between probe fan-outs.
   */
  probeIntervalMs: number;
  /**
   * Size of every probe payload, header included.
   */
  packetSizeBytes: number;
  /**
   * Transport the session declares in its handshake.
   */
  protocol: ProbeProtocol;
  /**
   * Frames each session/runner pipe buffers before its writer stalls.
   */
  pipeCapacity: number;
  /**
   * Opens the data-plane transports once the handshake completes.
   */
  flows: FlowFactory;
  /**
   * The codec to use for encoding/decoding control messages over the wire
   */
  codec: Codec;
}

export type ProvidedSessionOptions = Partial<SessionOptions>;

export const defaultSessionOptions: SessionOptions = {
  handshakeTimeoutMs: 5_000,
  handshakeRetryIntervalMs: 500,
  idleTimeoutMs: 60_000,
  idleTimeoutResetOnActivity: false,
  probeIntervalMs: 1_000,
  packetSizeBytes: 64,
  protocol: ProbeProtocol.Udp,
  pipeCapacity: DEFAULT_PIPE_CAPACITY,
  flows: noFlows,
  codec: BinaryCodec,
};

export type ControlServerOptions = SessionOptions & {
  /**
   * How long shutdown waits for sessions and runners to finish. `0` makes
   * shutdown best-effort: stop is broadcast and nothing is awaited.
   */
  shutdownGraceMs: number;
};

export type ProvidedControlServerOptions = Partial<ControlServerOptions>;

export const defaultControlServerOptions: ControlServerOptions = {
  ...defaultSessionOptions,
  shutdownGraceMs: 0,
};

const PositiveMs = Type.Integer({ minimum: 1 });

const TimingOptionsSchema = Type.Object({
  handshakeTimeoutMs: PositiveMs,
  handshakeRetryIntervalMs: PositiveMs,
  idleTimeoutMs: PositiveMs,
  idleTimeoutResetOnActivity: Type.Boolean(),
  probeIntervalMs: PositiveMs,
  packetSizeBytes: Type.Integer({
    minimum: PROBE_HEADER_BYTES,
    maximum: MAX_PROBE_BYTES,
  }),
  protocol: ProbeProtocolSchema,
  pipeCapacity: Type.Integer({ minimum: 1 }),
});

/**
 * @throws {RangeError} listing every option outside its allowed range.
 */
export function validateSessionOptions(options: SessionOptions): SessionOptions {
  const { flows: _flows, codec: _codec, ...timing } = options;
  if (!Value.Check(TimingOptionsSchema, timing)) {
    const problems = [...Value.Errors(TimingOptionsSchema, timing)].map(
      (err) => `${err.path}: ${err.message}`,
    );
    throw new RangeError(`invalid session options: ${problems.join(', ')}`);
  }

  return options;
}

/**
 * Wire payload used for RTT computation. All fields are unsigned 64-bit.
 */
export interface ProbeMessage {
  /** Session that sent the probe. */
  id: bigint;
  /** Strictly increasing per session, starting at 1. */
  seq: bigint;
  /** Sender-side send time in milliseconds since the Unix epoch. */
  timestamp: bigint;
}

export const PROBE_HEADER_BYTES = 24;
/** Largest UDP payload over IPv4. */
export const MAX_PROBE_BYTES = 65_507;

const U64_MAX = 0xffff_ffff_ffff_ffffn;

function assertU64(name: string, value: bigint) {
  if (value < 0n || value > U64_MAX) {
    throw new RangeError(`${name} ${value} is not an unsigned 64-bit integer`);
  }
}

/**
 * Fixed big-endian layout shared by the originating and reflecting ends:
 *
 * ```plaintext
 *  0        8        16       24             packetSize
 *  ┌────────┬────────┬────────┬─────── ... ──┐
 *  │   id   │  seq   │  ts    │  zero padding │
 *  └────────┴────────┴────────┴─────── ... ──┘
 * ```
 */
export const ProbeCodec = {
  encode(msg: ProbeMessage, packetSizeBytes = PROBE_HEADER_BYTES): Buffer {
    if (
      !Number.isInteger(packetSizeBytes) ||
      packetSizeBytes < PROBE_HEADER_BYTES ||
      packetSizeBytes > MAX_PROBE_BYTES
    ) {
      throw new RangeError(
        `packet size must be between ${PROBE_HEADER_BYTES} and ${MAX_PROBE_BYTES} bytes, got ${packetSizeBytes}`,
      );
    }

    assertU64('id', msg.id);
    assertU64('seq', msg.seq);
    assertU64('timestamp', msg.timestamp);

    const buf = Buffer.alloc(packetSizeBytes);
    buf.writeBigUInt64BE(msg.id, 0);
    buf.writeBigUInt64BE(msg.seq, 8);
    buf.writeBigUInt64BE(msg.timestamp, 16);
    return buf;
  },
  /**
   * @returns the header, or undefined if the frame is too short to hold one.
   */
  decode(frame: Uint8Array): ProbeMessage | undefined {
    if (frame.byteLength < PROBE_HEADER_BYTES) {
      return undefined;
    }

    const buf = Buffer.from(frame.buffer, frame.byteOffset, frame.byteLength);
    return {
      id: buf.readBigUInt64BE(0),
      seq: buf.readBigUInt64BE(8),
      timestamp: buf.readBigUInt64BE(16),
    };
  },
};

/**
 * Round-trip time of an echoed probe, clamped at zero so a clock step
 * backwards never yields a negative sample.
 */
export function roundTripMs(msg: ProbeMessage, receivedAtMs: number): number {
  const rtt = receivedAtMs - Number(msg.timestamp);
  return rtt < 0 ? 0 : rtt;
}

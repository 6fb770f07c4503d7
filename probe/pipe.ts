import { Duplex } from 'node:stream';

const kCallback = Symbol('Callback');
const kInitOtherSide = Symbol('InitOtherSide');

/** Frames a pipe end buffers before its writer sees backpressure. */
export const DEFAULT_PIPE_CAPACITY = 16;

/**
 * One end of an in-process frame pipe. Each write arrives at the other end
 * as exactly one chunk; frames are never merged or split. A write's callback
 * only fires once the other end has pulled it, so at most one frame per
 * direction is in flight beyond the reader's buffer.
 */
export class PipeEnd extends Duplex {
  private otherSide: PipeEnd | null;
  private [kCallback]: ((error?: Error | null) => void) | null;

  constructor(capacity: number) {
    super({
      objectMode: true,
      highWaterMark: capacity,
      allowHalfOpen: false,
    });
    this[kCallback] = null;
    this.otherSide = null;
  }

  [kInitOtherSide](otherSide: PipeEnd) {
    if (this.otherSide === null) {
      this.otherSide = otherSide;
    }
  }

  _read() {
    const callback = this[kCallback];
    if (callback) {
      this[kCallback] = null;
      callback();
    }
  }

  _write(
    chunk: Uint8Array,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ) {
    const otherSide = this.otherSide;
    if (otherSide === null || otherSide.destroyed) {
      callback(new Error('pipe peer is closed'));
      return;
    }

    if (chunk.byteLength === 0) {
      process.nextTick(callback);
      return;
    }

    if (otherSide.push(chunk)) {
      callback();
    } else {
      otherSide[kCallback] = callback;
    }
  }

  _final(callback: (error?: Error | null) => void) {
    const otherSide = this.otherSide;
    if (otherSide === null || otherSide.destroyed) {
      callback();
      return;
    }

    otherSide.push(null);
    callback();
  }

  _destroy(error: Error | null, callback: (error: Error | null) => void) {
    // a writer parked on our capacity will never be pulled now
    const parked = this[kCallback];
    if (parked) {
      this[kCallback] = null;
      parked(new Error('pipe peer is closed'));
    }

    const otherSide = this.otherSide;
    if (otherSide !== null && !otherSide.destroyed) {
      otherSide.push(null);
    }

    callback(error);
  }
}

/**
 * Creates the two connected ends of a bounded frame pipe. One end is handed
 * to the session, the other to the runner that owns the transport.
 */
export function framePipe(
  capacity: number = DEFAULT_PIPE_CAPACITY,
): [PipeEnd, PipeEnd] {
  const side0 = new PipeEnd(capacity);
  const side1 = new PipeEnd(capacity);
  side0[kInitOtherSide](side1);
  side1[kInitOtherSide](side0);

  return [side0, side1];
}

/**
 * Writes one frame and resolves once the other end has accepted it.
 */
export function writeFrame(end: PipeEnd, frame: Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    if (end.destroyed || !end.writable) {
      reject(new Error('pipe end is closed'));
      return;
    }

    end.write(frame, (err) => {
      if (err) {
        reject(err);
        return;
      }

      resolve();
    });
  });
}

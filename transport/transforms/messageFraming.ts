import { Transform, TransformCallback, TransformOptions } from 'node:stream';

const LENGTH_PREFIX_BYTES = 4;
export const DEFAULT_MAX_BUFFER_BYTES = 1024 * 1024; // control messages are tiny

export interface LengthEncodedOptions extends TransformOptions {
  /** Maximum in-memory buffer size before we error */
  maxBufferSizeBytes: number;
}

/**
 * A transform stream that emits one chunk per message framed with a
 * network/BigEndian uint32 length prefix, however the bytes were split or
 * merged on the way.
 * @extends Transform
 */
export class Uint32LengthPrefixFraming extends Transform {
  receivedBuffer: Buffer;
  maxBufferSizeBytes: number;

  constructor({ maxBufferSizeBytes, ...options }: LengthEncodedOptions) {
    super(options);
    this.maxBufferSizeBytes = maxBufferSizeBytes;
    this.receivedBuffer = Buffer.alloc(0);
  }

  _transform(chunk: Buffer, _encoding: BufferEncoding, cb: TransformCallback) {
    if (
      this.receivedBuffer.byteLength + chunk.byteLength >
      this.maxBufferSizeBytes
    ) {
      cb(
        new Error(
          `buffer overflow: ${this.receivedBuffer.byteLength + chunk.byteLength}B > ${this.maxBufferSizeBytes}B`,
        ),
      );
      return;
    }

    this.receivedBuffer = Buffer.concat([this.receivedBuffer, chunk]);

    // ensure there's enough for a length prefix
    while (this.receivedBuffer.length >= LENGTH_PREFIX_BYTES) {
      const frameLength =
        this.receivedBuffer.readUInt32BE(0) + LENGTH_PREFIX_BYTES;
      if (this.receivedBuffer.length < frameLength) {
        // wait for the rest of the message
        break;
      }

      this.push(this.receivedBuffer.subarray(LENGTH_PREFIX_BYTES, frameLength));
      this.receivedBuffer = this.receivedBuffer.subarray(frameLength);
    }

    cb();
  }

  _flush(cb: TransformCallback) {
    this.receivedBuffer = Buffer.alloc(0);
    cb();
  }

  _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    this.receivedBuffer = Buffer.alloc(0);
    super._destroy(error, callback);
  }
}

function createLengthEncodedStream(options?: Partial<LengthEncodedOptions>) {
  return new Uint32LengthPrefixFraming({
    maxBufferSizeBytes: options?.maxBufferSizeBytes ?? DEFAULT_MAX_BUFFER_BYTES,
  });
}

export const MessageFramer = {
  createFramedStream: createLengthEncodedStream,
  write: (buf: Uint8Array) => {
    const lengthPrefix = Buffer.alloc(LENGTH_PREFIX_BYTES);
    lengthPrefix.writeUInt32BE(buf.byteLength, 0);
    return Buffer.concat([lengthPrefix, buf]);
  },
};

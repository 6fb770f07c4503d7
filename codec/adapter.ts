import { Value } from '@sinclair/typebox/value';
import { Codec } from './types';
import { ControlMessage, ControlMessageSchema } from '../transport/message';
import { DecodeResult, EncodeResult } from '../transport/results';
import { coerceErrorString } from '../transport/errors';

/**
 * Wraps a {@link Codec} so control messages are schema-checked on the way in
 * and failures come back as results instead of exceptions.
 */
export class ControlMessageAdapter {
  constructor(private readonly codec: Codec) {}

  toBuffer(msg: ControlMessage): EncodeResult {
    try {
      return {
        ok: true,
        value: this.codec.toBuffer(msg),
      };
    } catch (e) {
      return {
        ok: false,
        reason: `encode error: ${coerceErrorString(e)}`,
      };
    }
  }

  fromBuffer(buf: Uint8Array): DecodeResult {
    let parsed: unknown;
    try {
      parsed = this.codec.fromBuffer(buf);
    } catch (e) {
      return {
        ok: false,
        reason: `decode error: ${coerceErrorString(e)}`,
      };
    }

    if (!Value.Check(ControlMessageSchema, parsed)) {
      return {
        ok: false,
        reason: 'control message schema mismatch',
        validationErrors: [...Value.Errors(ControlMessageSchema, parsed)],
      };
    }

    return {
      ok: true,
      value: parsed,
    };
  }
}

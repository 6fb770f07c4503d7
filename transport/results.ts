import { ValueError } from '@sinclair/typebox/value';
import { ControlMessage } from './message';

// internal use only, not to be used in public API
type ApiResult<T> =
  | {
      ok: true;
      value: T;
    }
  | {
      ok: false;
      reason: string;
    };

export type SendResult = ApiResult<undefined>;
export type EncodeResult = ApiResult<Uint8Array>;
export type DecodeResult =
  | {
      ok: true;
      value: ControlMessage;
    }
  | {
      ok: false;
      reason: string;
      validationErrors?: Array<ValueError>;
    };

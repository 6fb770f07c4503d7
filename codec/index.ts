export { BinaryCodec } from './binary';
export { ControlMessageAdapter } from './adapter';
export {
  ProbeCodec,
  roundTripMs,
  PROBE_HEADER_BYTES,
  MAX_PROBE_BYTES,
} from './probe';
export type { ProbeMessage } from './probe';
export type { Codec } from './types';

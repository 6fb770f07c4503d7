export { SessionState } from './common';
export type { CommonSessionProps } from './common';
export { SessionStateGraph } from './transitions';
export { SessionHandshaking } from './SessionHandshaking';
export type { SessionHandshakingListeners } from './SessionHandshaking';
export { SessionSteadyState } from './SessionSteadyState';
export type {
  SessionSteadyStateListeners,
  SteadyStateProbeEcho,
} from './SessionSteadyState';

export { ControlServer, listen } from './server';
export { ControlClient, defaultControlClientOptions } from './client';
export type {
  ControlClientOptions,
  ProvidedControlClientOptions,
} from './client';
export { Session } from './session';
export type { SessionExit, SessionExitReason, SessionProps } from './session';
export {
  defaultSessionOptions,
  defaultControlServerOptions,
  validateSessionOptions,
} from './options';
export type {
  SessionOptions,
  ProvidedSessionOptions,
  ControlServerOptions,
  ProvidedControlServerOptions,
} from './options';
export {
  SessionState,
  SessionHandshaking,
  SessionSteadyState,
} from './sessionStateMachine';
export { Connection } from './connection';
export { TcpConnection, connectTcp } from './impls/tcp/connection';
export { noFlows, initiatorFlows } from './flows';
export type { FlowFactory, FlowRequest } from './flows';
export {
  ProbeProtocol,
  ControlMessageSchema,
  ControlMessageHandshakeSchema,
  handshakeMessage,
  isHandshake,
} from './message';
export type {
  ControlMessage,
  ControlMessageType,
  HandshakeMessage,
} from './message';
export { EventDispatcher, ProtocolError } from './events';
export type {
  EventMap,
  EventTypes,
  EventHandler,
  ProbeEcho,
  ProtocolErrorType,
  ServerStatus,
} from './events';
export {
  LatencyError,
  ConnectivityError,
  PeerMismatchError,
  NotConnectedError,
  HandshakeTimeoutError,
  TransportIOError,
  UnsupportedProtocolError,
  coerceErrorString,
} from './errors';

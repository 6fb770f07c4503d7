export {
  ControlServer,
  ControlClient,
  Session,
  SessionState,
  Connection,
  TcpConnection,
  connectTcp,
  listen,
  noFlows,
  initiatorFlows,
  defaultSessionOptions,
  defaultControlServerOptions,
  defaultControlClientOptions,
  validateSessionOptions,
  ProbeProtocol,
  ControlMessageSchema,
  handshakeMessage,
  EventDispatcher,
  ProtocolError,
  LatencyError,
  ConnectivityError,
  PeerMismatchError,
  NotConnectedError,
  HandshakeTimeoutError,
  TransportIOError,
  UnsupportedProtocolError,
  coerceErrorString,
} from './transport';
export type {
  SessionExit,
  SessionExitReason,
  SessionOptions,
  ProvidedSessionOptions,
  ControlServerOptions,
  ProvidedControlServerOptions,
  ControlClientOptions,
  ProvidedControlClientOptions,
  FlowFactory,
  FlowRequest,
  ControlMessage,
  HandshakeMessage,
  EventMap,
  EventTypes,
  EventHandler,
  ProbeEcho,
  ProtocolErrorType,
} from './transport';

export { ReflectorSocket, InitiatorSocket } from './probe/udp';
export type {
  PeerMismatchPolicy,
  DatagramSocketOptions,
  ProvidedDatagramSocketOptions,
} from './probe/udp';
export { parseAddress, formatAddress, sameAddress } from './probe/transport';
export type {
  AddressLike,
  PeerAddress,
  ProbeTransport,
} from './probe/transport';
export { ConnectionRunner, MAX_FRAME_BYTES } from './probe/runner';
export type { RunnerExit } from './probe/runner';
export {
  ConnectedContext,
  DisconnectedContext,
  ContextState,
  ContextStateGraph,
  openConnection,
} from './probe/context';
export type { ConnectionContext } from './probe/context';
export { ProbeReflector } from './probe/reflector';
export { framePipe, writeFrame, DEFAULT_PIPE_CAPACITY } from './probe/pipe';
export type { PipeEnd } from './probe/pipe';
export { oneshot, OneShotSender, OneShotReceiver } from './probe/oneshot';

export {
  BinaryCodec,
  ControlMessageAdapter,
  ProbeCodec,
  roundTripMs,
  PROBE_HEADER_BYTES,
  MAX_PROBE_BYTES,
} from './codec';
export type { Codec, ProbeMessage } from './codec';

export {
  BaseLogger,
  stringLogger,
  coloredStringLogger,
  jsonLogger,
  createLogger,
} from './logging';
export type { LogFn, Logger, LoggingLevel, MessageMetadata } from './logging';

export { TaskSet } from './util/taskSet';

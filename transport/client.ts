import { ControlMessageAdapter } from '../codec';
import { BinaryCodec } from '../codec/binary';
import { Codec } from '../codec/types';
import { Logger, MessageMetadata } from '../logging';
import { ProbeReflector } from '../probe/reflector';
import { AddressLike } from '../probe/transport';
import { ProvidedDatagramSocketOptions, ReflectorSocket } from '../probe/udp';
import { TaskSet } from '../util/taskSet';
import { Connection } from './connection';
import { coerceErrorString } from './errors';
import {
  EventDispatcher,
  EventHandler,
  ProtocolError,
} from './events';
import { connectTcp } from './impls/tcp/connection';
import { isHandshake } from './message';

type ClientEventTypes = 'handshake' | 'protocolError';

export interface ControlClientOptions {
  /**
   * Local ports to run a probe reflector on, one reflector per port.
   */
  reflectPorts: Array<number>;
  /**
   * Local host the reflectors bind to.
   */
  reflectHost: string;
  reflectorSocketOptions: ProvidedDatagramSocketOptions;
  codec: Codec;
}

export type ProvidedControlClientOptions = Partial<ControlClientOptions>;

export const defaultControlClientOptions: ControlClientOptions = {
  reflectPorts: [],
  reflectHost: '0.0.0.0',
  reflectorSocketOptions: {},
  codec: BinaryCodec,
};

/**
 * Measurement-client end of the control channel. Completes each session
 * handshake by echoing it and reflects the probes the server sends.
 */
export class ControlClient {
  readonly conn: Connection;
  readonly reflectors: Array<ProbeReflector<ReflectorSocket>>;
  readonly tasks: TaskSet;
  /**
   * Resolves once the control connection has closed.
   */
  readonly closed: Promise<void>;
  /**
   * Id of the session the server last handshook with.
   */
  sessionId?: bigint;
  log?: Logger;

  private readonly codec: ControlMessageAdapter;
  private readonly eventDispatcher = new EventDispatcher<ClientEventTypes>();

  private constructor(
    conn: Connection,
    reflectors: Array<ProbeReflector<ReflectorSocket>>,
    tasks: TaskSet,
    options: ControlClientOptions,
    log?: Logger,
  ) {
    this.conn = conn;
    this.reflectors = reflectors;
    this.tasks = tasks;
    this.codec = new ControlMessageAdapter(options.codec);
    this.log = log;

    this.closed = new Promise((resolve) => {
      this.conn.addCloseListener(() => {
        this.log?.info(`control connection closed`, this.loggingMetadata);
        resolve();
      });
    });
    this.conn.addErrorListener((err) => {
      this.log?.warn(
        `control connection errored: ${coerceErrorString(err)}`,
        this.loggingMetadata,
      );
    });
    this.conn.addDataListener(this.onControlData);
  }

  /**
   * Binds the configured reflectors, then dials the control server.
   * @throws {ConnectivityError} if a reflector cannot bind or the server
   * cannot be reached.
   */
  static async connect(
    address: AddressLike,
    providedOptions?: ProvidedControlClientOptions,
    log?: Logger,
  ): Promise<ControlClient> {
    const options = { ...defaultControlClientOptions, ...providedOptions };
    const tasks = new TaskSet();
    const reflectors: Array<ProbeReflector<ReflectorSocket>> = [];

    let conn: Connection;
    try {
      for (const port of options.reflectPorts) {
        const sock = await ReflectorSocket.bind(
          { host: options.reflectHost, port },
          { log, ...options.reflectorSocketOptions },
        );
        reflectors.push(new ProbeReflector(sock, tasks, log));
      }

      conn = await connectTcp(address);
    } catch (err) {
      for (const reflector of reflectors) {
        reflector.close();
      }

      throw err;
    }

    return new ControlClient(conn, reflectors, tasks, options, log);
  }

  get loggingMetadata(): MessageMetadata {
    const metadata = this.conn.loggingMetadata;
    if (this.sessionId !== undefined) {
      metadata.sessionId = this.sessionId.toString();
    }

    return metadata;
  }

  addEventListener<K extends ClientEventTypes>(
    type: K,
    handler: EventHandler<K>,
  ) {
    this.eventDispatcher.addEventListener(type, handler);
  }

  removeEventListener<K extends ClientEventTypes>(
    type: K,
    handler: EventHandler<K>,
  ) {
    this.eventDispatcher.removeEventListener(type, handler);
  }

  private onControlData = (buf: Uint8Array) => {
    const parsed = this.codec.fromBuffer(buf);
    if (!parsed.ok) {
      this.log?.warn(`received malformed control message`, {
        ...this.loggingMetadata,
        validationErrors: parsed.validationErrors,
        tags: ['invalid-control-message'],
      });
      this.eventDispatcher.dispatchEvent('protocolError', {
        type: ProtocolError.InvalidControlMessage,
        message: parsed.reason,
      });
      return;
    }

    const msg = parsed.value;
    if (!isHandshake(msg)) {
      return;
    }

    // echoing the handshake back is what completes it on the server
    const echo = this.codec.toBuffer(msg);
    if (!echo.ok) {
      this.log?.error(`failed to encode handshake echo: ${echo.reason}`, {
        ...this.loggingMetadata,
        tags: ['invariant-violation'],
      });
      return;
    }

    if (!this.conn.send(echo.value)) {
      this.log?.warn(`failed to echo handshake`, this.loggingMetadata);
      return;
    }

    if (this.sessionId === msg.id) {
      return;
    }

    this.sessionId = msg.id;
    this.log?.info(`handshake with session ${msg.id}`, this.loggingMetadata);
    this.eventDispatcher.dispatchEvent('handshake', {
      sessionId: msg.id,
      protocol: msg.protocol,
    });
  };

  /**
   * Closes the control connection and stops every reflector.
   */
  close() {
    this.conn.close();
    for (const reflector of this.reflectors) {
      reflector.close();
    }
  }
}

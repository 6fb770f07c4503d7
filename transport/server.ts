import { Tracer } from '@opentelemetry/api';
import { Server, Socket } from 'node:net';
import { Server as TlsServer } from 'node:tls';
import {
  BaseLogger,
  LogFn,
  Logger,
  LoggingLevel,
  createLogProxy,
} from '../logging';
import { getTracer } from '../tracing';
import { OneShotSender, oneshot } from '../probe/oneshot';
import {
  AddressLike,
  PeerAddress,
  formatAddress,
  parseAddress,
} from '../probe/transport';
import { TaskSet } from '../util/taskSet';
import { Connection } from './connection';
import { ConnectivityError, coerceErrorString } from './errors';
import { EventDispatcher, EventHandler, EventTypes } from './events';
import { TcpConnection } from './impls/tcp/connection';
import {
  ControlServerOptions,
  ProvidedControlServerOptions,
  defaultControlServerOptions,
  validateSessionOptions,
} from './options';
import { Session, SessionExit } from './session';

interface TrackedSession {
  stop: OneShotSender<void>;
  session: Session;
  task: Promise<SessionExit>;
}

/**
 * Accepts control connections and supervises one {@link Session} per
 * connection until shutdown.
 */
export class ControlServer {
  readonly server: Server;
  readonly options: ControlServerOptions;
  /**
   * Sessions that have not exited yet, by session id.
   */
  readonly sessions = new Map<bigint, TrackedSession>();
  /**
   * Every session and runner spawned by this server.
   */
  readonly tasks = new TaskSet();
  log?: Logger;

  private readonly tracer: Tracer;
  private readonly eventDispatcher = new EventDispatcher<EventTypes>();
  private readonly connectionEvent: 'connection' | 'secureConnection';
  private status: 'idle' | 'running' | 'closed' = 'idle';

  constructor(
    server: Server,
    providedOptions?: ProvidedControlServerOptions,
    tracer?: Tracer,
  ) {
    this.server = server;
    this.options = validateControlServerOptions({
      ...defaultControlServerOptions,
      ...providedOptions,
    });
    this.tracer = tracer ?? getTracer();
    // tls servers hand out the raw socket on 'connection'
    this.connectionEvent =
      server instanceof TlsServer ? 'secureConnection' : 'connection';
  }

  bindLogger(fn: LogFn | Logger, level?: LoggingLevel) {
    // construct logger from fn
    if (typeof fn === 'function') {
      this.log = createLogProxy(new BaseLogger(fn, level));
      return;
    }

    // object case, just assign
    this.log = createLogProxy(fn);
  }

  addEventListener<K extends EventTypes>(type: K, handler: EventHandler<K>) {
    this.eventDispatcher.addEventListener(type, handler);
  }

  removeEventListener<K extends EventTypes>(
    type: K,
    handler: EventHandler<K>,
  ) {
    this.eventDispatcher.removeEventListener(type, handler);
  }

  connectionHandler = (sock: Socket) => {
    if (this.status !== 'running') {
      sock.destroy();
      return;
    }

    this.handleConnection(new TcpConnection(sock));
  };

  /**
   * Creates and starts the session for an accepted control connection.
   */
  handleConnection(conn: Connection): Session {
    const [stop, stopped] = oneshot();
    const session = new Session({
      conn,
      stop: stopped,
      options: this.options,
      tasks: this.tasks,
      events: this.eventDispatcher,
      tracer: this.tracer,
      log: this.log,
    });

    this.log?.info(`accepted control connection`, session.loggingMetadata);

    const task = this.tasks.spawn(session.run()).then((exit) => {
      this.sessions.delete(session.id);
      return exit;
    });
    this.sessions.set(session.id, { stop, session, task });

    return session;
  }

  /**
   * Serves sessions until `shutdown` aborts, then stops every session. With
   * a non-zero `shutdownGraceMs` this also waits, up to that bound, for
   * sessions and their runners to finish.
   */
  async run(shutdown: AbortSignal): Promise<void> {
    if (this.status !== 'idle') {
      throw new Error(`control server is already ${this.status}`);
    }

    this.status = 'running';
    this.server.on(this.connectionEvent, this.connectionHandler);
    this.log?.info(`control server running`);
    this.eventDispatcher.dispatchEvent('serverStatus', { status: 'listening' });

    await new Promise<void>((resolve) => {
      if (shutdown.aborted) {
        resolve();
        return;
      }

      shutdown.addEventListener('abort', () => resolve(), { once: true });
    });

    this.status = 'closed';
    this.eventDispatcher.dispatchEvent('serverStatus', {
      status: 'shutting_down',
    });
    this.server.off(this.connectionEvent, this.connectionHandler);
    this.server.close((err) => {
      if (err) {
        this.log?.debug(`server close: ${coerceErrorString(err)}`);
      }
    });

    this.log?.info(`shutting down, stopping ${this.sessions.size} session(s)`);
    for (const { stop } of this.sessions.values()) {
      stop.send();
    }

    if (this.options.shutdownGraceMs > 0) {
      const drained = await this.tasks.drain(this.options.shutdownGraceMs);
      if (!drained) {
        this.log?.warn(
          `${this.tasks.size} task(s) still running after ${this.options.shutdownGraceMs}ms grace period`,
        );
      }
    }

    this.eventDispatcher.dispatchEvent('serverStatus', { status: 'closed' });
    this.log?.info(`control server closed`);
  }
}

function validateControlServerOptions(
  options: ControlServerOptions,
): ControlServerOptions {
  validateSessionOptions(options);
  if (!Number.isInteger(options.shutdownGraceMs) || options.shutdownGraceMs < 0) {
    throw new RangeError(
      `invalid server options: shutdownGraceMs must be a non-negative integer, got ${options.shutdownGraceMs}`,
    );
  }

  return options;
}

/**
 * Binds `server` to `address`. Port 0 picks a free port.
 * @returns the address actually bound.
 * @throws {ConnectivityError} if the address is malformed or cannot be bound.
 */
export async function listen(
  server: Server,
  address: AddressLike,
): Promise<PeerAddress> {
  const addr = parseAddress(address);
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(addr.port, addr.host, () => {
      server.off('error', reject);
      resolve();
    });
  }).catch((err: unknown) => {
    throw new ConnectivityError(
      `failed to listen on ${formatAddress(addr)}: ${coerceErrorString(err)}`,
      { cause: err },
    );
  });

  const bound = server.address();
  if (!bound || typeof bound === 'string') {
    throw new ConnectivityError(
      `server bound to ${formatAddress(addr)} reports no network address`,
    );
  }

  return { host: bound.address, port: bound.port };
}

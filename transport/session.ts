import { Tracer } from '@opentelemetry/api';
import { ControlMessageAdapter } from '../codec';
import { Logger, MessageMetadata } from '../logging';
import {
  TelemetryInfo,
  createConnectionTelemetryInfo,
  createSessionTelemetryInfo,
  getTracer,
  recordLatencyError,
} from '../tracing';
import { openConnection } from '../probe/context';
import { OneShotReceiver } from '../probe/oneshot';
import { ProbeTransport } from '../probe/transport';
import { TaskSet } from '../util/taskSet';
import { Connection } from './connection';
import {
  HandshakeTimeoutError,
  LatencyError,
  coerceErrorString,
} from './errors';
import { EventDispatcher, EventTypes, ProtocolError } from './events';
import { generateSessionId } from './id';
import { ProbeProtocol } from './message';
import { SessionOptions } from './options';
import {
  SessionHandshaking,
  SessionState,
  SessionStateGraph,
  SessionSteadyState,
} from './sessionStateMachine';

export type SessionExitReason =
  | 'stopped'
  | 'idle_timeout'
  | 'control_closed'
  | 'handshake_timeout'
  | 'flow_error';

export interface SessionExit {
  reason: SessionExitReason;
  error?: Error;
}

export interface SessionProps {
  conn: Connection;
  /** Resolving this ends the session with `stopped`. */
  stop: OneShotReceiver<void>;
  options: SessionOptions;
  /** Where probe runners are spawned. Shared with the owning server. */
  tasks?: TaskSet;
  events?: EventDispatcher<EventTypes>;
  tracer?: Tracer;
  id?: bigint;
  log?: Logger;
}

/**
 * Per-client actor driving one control connection through
 * Handshaking → SteadyState → Terminating.
 *
 * ```plaintext
 *  Handshaking ──(echo)──► SteadyState ──┐
 *       │                                │
 *       └──(timeout/stop/close)──────────┴──► Terminating
 * ```
 *
 * Runners are never awaited here; they live in {@link tasks} and stop on
 * their own once their context is cancelled.
 */
export class Session {
  readonly id: bigint;
  readonly conn: Connection;
  readonly options: SessionOptions;
  readonly tasks: TaskSet;
  readonly telemetry: TelemetryInfo;
  private readonly stop: OneShotReceiver<void>;
  private readonly events: EventDispatcher<EventTypes>;
  private readonly tracer: Tracer;
  private readonly codec: ControlMessageAdapter;
  log?: Logger;

  private current?: SessionHandshaking | SessionSteadyState;
  private exit?: SessionExit;
  private exitPromise?: Promise<SessionExit>;
  private resolveExit: (exit: SessionExit) => void = () => undefined;

  constructor({
    conn,
    stop,
    options,
    tasks,
    events,
    tracer,
    id,
    log,
  }: SessionProps) {
    this.id = id ?? generateSessionId();
    this.conn = conn;
    this.stop = stop;
    this.options = options;
    this.tasks = tasks ?? new TaskSet();
    this.events = events ?? new EventDispatcher();
    this.tracer = tracer ?? getTracer();
    this.codec = new ControlMessageAdapter(options.codec);
    this.log = log;

    this.telemetry = createSessionTelemetryInfo(
      this.tracer,
      this.id.toString(),
      conn.peerHost ?? 'unknown',
    );
    conn.telemetry ??= createConnectionTelemetryInfo(
      this.tracer,
      conn.id,
      'control',
      this.telemetry,
    );
  }

  get state(): SessionState {
    if (this.exit || !this.current) {
      return this.exit ? SessionState.Terminating : SessionState.Handshaking;
    }

    return this.current.state;
  }

  get loggingMetadata(): MessageMetadata {
    return {
      ...this.conn.loggingMetadata,
      sessionId: this.id.toString(),
    };
  }

  /**
   * Number of probe flows currently tracked by the session.
   */
  get flowCount(): number {
    if (this.current?.state !== SessionState.SteadyState) {
      return 0;
    }

    return this.current.contexts.size;
  }

  /**
   * Starts the handshake. Resolves once the session has terminated; calling
   * it again returns the same exit.
   */
  run(): Promise<SessionExit> {
    if (this.exitPromise) {
      return this.exitPromise;
    }

    this.exitPromise = new Promise<SessionExit>((resolve) => {
      this.resolveExit = resolve;
    });

    const startedAt = Date.now();
    this.events.dispatchEvent('sessionStatus', {
      status: 'connect',
      session: this,
    });

    void this.stop.recv().then(() => {
      this.terminate({ reason: 'stopped' });
    });

    const handshaking = SessionStateGraph.entrypoints.Handshaking(
      {
        id: this.id,
        conn: this.conn,
        options: this.options,
        codec: this.codec,
        telemetry: this.telemetry,
        startedAt,
        log: this.log,
      },
      {
        onHandshakeComplete: () => {
          this.onHandshakeComplete(handshaking);
        },
        onHandshakeMismatch: (msg) => {
          const message = `handshake echo does not match: got id ${msg.id} over ${ProbeProtocol[msg.protocol]}`;
          this.log?.warn(message, {
            ...this.loggingMetadata,
            controlMessage: msg,
          });
          this.events.dispatchEvent('protocolError', {
            type: ProtocolError.HandshakeFailed,
            message,
            sessionId: this.id,
          });
        },
        onHandshakeTimeout: () => {
          this.terminate({
            reason: 'handshake_timeout',
            error: new HandshakeTimeoutError(this.options.handshakeTimeoutMs),
          });
        },
        onConnectionClosed: this.onConnectionClosed,
        onConnectionErrored: this.onConnectionErrored,
        onInvalidMessage: this.onInvalidMessage,
      },
    );

    this.current = handshaking;
    this.dispatchTransition();

    return this.exitPromise;
  }

  /**
   * Starts a probe flow over `transport`. Only possible in SteadyState;
   * otherwise the transport is closed and `false` is returned.
   */
  attach(transport: ProbeTransport): boolean {
    const steady = this.current;
    if (this.exit || steady?.state !== SessionState.SteadyState) {
      this.log?.debug(
        `session is ${this.state}, closing transport instead of attaching`,
        this.loggingMetadata,
      );
      transport.close();
      return false;
    }

    const opened = openConnection({
      transport,
      tasks: this.tasks,
      pipeCapacity: this.options.pipeCapacity,
      tracer: this.tracer,
      telemetry: this.telemetry,
      log: this.log,
      onPeerLearned: (context, peer) => {
        if (this.exit || steady._isConsumed) {
          return;
        }

        steady.connectContext(context, peer);
      },
      onRunnerExit: (flowId, exit) => {
        if (this.exit || steady._isConsumed) {
          return;
        }

        steady.dropContext(
          flowId,
          exit.reason === 'transport_error' ? exit.error : exit.reason,
        );
      },
    });

    // the peer may already be known, in which case the context has moved on
    if (!opened.context._isConsumed) {
      steady.addContext(opened.context);
    }

    return true;
  }

  private onHandshakeComplete(handshaking: SessionHandshaking) {
    const steady = SessionStateGraph.transition.HandshakingToSteadyState(
      handshaking,
      {
        onProbeEcho: (echo) => {
          this.events.dispatchEvent('probeEcho', {
            sessionId: this.id,
            ...echo,
          });
        },
        onContextWriteFailed: (flowId, err) => {
          if (this.exit || steady._isConsumed) {
            return;
          }

          steady.dropContext(flowId, err);
        },
        onIdleTimeout: () => {
          this.terminate({ reason: 'idle_timeout' });
        },
        onConnectionClosed: this.onConnectionClosed,
        onConnectionErrored: this.onConnectionErrored,
        onInvalidMessage: this.onInvalidMessage,
      },
    );

    this.current = steady;
    this.dispatchTransition();
    void this.tasks.spawn(this.openFlows());
  }

  private async openFlows() {
    let transports: Array<ProbeTransport>;
    try {
      transports = await this.options.flows({
        sessionId: this.id,
        protocol: this.options.protocol,
        peerHost: this.conn.peerHost,
        log: this.log,
      });
    } catch (err) {
      this.log?.error(`failed to open probe flows: ${coerceErrorString(err)}`, {
        ...this.loggingMetadata,
        tags: ['flow-error'],
      });
      this.terminate({
        reason: 'flow_error',
        error: err instanceof Error ? err : new Error(coerceErrorString(err)),
      });
      return;
    }

    for (const transport of transports) {
      this.attach(transport);
    }
  }

  private onConnectionClosed = () => {
    this.log?.info(`control connection closed`, this.loggingMetadata);
    this.terminate({ reason: 'control_closed' });
  };

  private onConnectionErrored = (err: Error) => {
    // cleanup happens in the close listener
    this.log?.warn(
      `control connection errored: ${coerceErrorString(err)}`,
      this.loggingMetadata,
    );
  };

  private onInvalidMessage = (reason: string) => {
    this.events.dispatchEvent('protocolError', {
      type: ProtocolError.InvalidControlMessage,
      message: reason,
      sessionId: this.id,
    });
  };

  private dispatchTransition() {
    this.events.dispatchEvent('sessionTransition', {
      state: this.state,
      session: this,
    });
  }

  /**
   * Tears the session down. Idempotent: only the first exit is kept.
   */
  private terminate(exit: SessionExit) {
    if (this.exit) {
      return;
    }

    this.exit = exit;
    const current = this.current;
    this.current = undefined;

    if (current) {
      if (current.state === SessionState.SteadyState) {
        const cancelled = current.cancelAll();
        this.log?.debug(`cancelled ${cancelled} flow(s)`, this.loggingMetadata);
      }

      current._handleConsume();
    }

    this.conn.close();

    if (exit.error) {
      const code =
        exit.error instanceof LatencyError ? exit.error.code : 'UNKNOWN';
      recordLatencyError(this.telemetry.span, code, exit.error.message);
      this.log?.warn(
        `session terminated: ${exit.reason}: ${exit.error.message}`,
        this.loggingMetadata,
      );
    } else {
      this.log?.info(`session terminated: ${exit.reason}`, {
        ...this.loggingMetadata,
        tags: ['state-transition'],
      });
    }

    this.telemetry.span.end();
    this.dispatchTransition();
    this.events.dispatchEvent('sessionStatus', {
      status: 'disconnect',
      session: this,
      exit,
    });
    this.resolveExit(exit);
  }
}

import { ProbeCodec, roundTripMs } from '../../codec';
import {
  ConnectedContext,
  ConnectionContext,
  ContextState,
  ContextStateGraph,
  DisconnectedContext,
} from '../../probe/context';
import { PeerAddress } from '../../probe/transport';
import { coerceErrorString } from '../errors';
import { ControlMessage, ControlMessageType } from '../message';
import {
  CommonSession,
  CommonSessionListeners,
  CommonSessionProps,
  SessionState,
} from './common';

export interface SteadyStateProbeEcho {
  flowId: string;
  seq: bigint;
  rttMs: number;
}

export interface SessionSteadyStateListeners extends CommonSessionListeners {
  onProbeEcho: (echo: SteadyStateProbeEcho) => void;
  onContextWriteFailed: (flowId: string, err: unknown) => void;

  // timeout related
  onIdleTimeout: () => void;
}

export interface SessionSteadyStateProps extends CommonSessionProps {
  listeners: SessionSteadyStateListeners;
}

type ControlHandlers = {
  [K in ControlMessageType]: (
    msg: Extract<ControlMessage, { type: K }>,
  ) => void;
};

/*
 * A session whose peer has completed the handshake. It fans a probe out
 * to every connected flow each tick, reports echoes and services control
 * messages until the idle timeout or a termination signal.
 * See transitions.ts for valid transitions.
 */
export class SessionSteadyState extends CommonSession {
  readonly state = SessionState.SteadyState as const;
  listeners: SessionSteadyStateListeners;
  contexts = new Map<string, ConnectionContext>();
  seq = 0n;

  private probeTimer?: ReturnType<typeof setTimeout>;
  private idleTimeout?: ReturnType<typeof setTimeout>;

  private readonly controlHandlers: ControlHandlers = {
    HANDSHAKE: (msg) => {
      this.log?.debug(`ignoring duplicate handshake echo`, {
        ...this.loggingMetadata,
        controlMessage: msg,
      });
    },
  };

  constructor(props: SessionSteadyStateProps) {
    super(props);
    this.listeners = props.listeners;

    this.conn.addDataListener(this.onControlData);
    this.conn.addErrorListener(this.listeners.onConnectionErrored);
    this.conn.addCloseListener(this.listeners.onConnectionClosed);

    // the first deadline counts from session start, not from here
    const elapsed = Date.now() - this.startedAt;
    this.armIdleTimeout(Math.max(0, this.options.idleTimeoutMs - elapsed));
    this.scheduleProbe();
  }

  // the next tick is armed once every write of this one has settled,
  // a full pipe stalls the fan-out
  private scheduleProbe() {
    this.probeTimer = setTimeout(() => {
      this.probeTimer = undefined;
      void this.tick().then(() => {
        if (!this._isConsumed) {
          this.scheduleProbe();
        }
      });
    }, this.options.probeIntervalMs);
  }

  private armIdleTimeout(timeoutMs: number = this.options.idleTimeoutMs) {
    clearTimeout(this.idleTimeout);
    this.idleTimeout = setTimeout(() => {
      this.listeners.onIdleTimeout();
    }, timeoutMs);
  }

  onControlData = (buf: Uint8Array) => {
    const parsed = this.codec.fromBuffer(buf);
    if (!parsed.ok) {
      this.log?.warn(`received malformed control message`, {
        ...this.loggingMetadata,
        validationErrors: parsed.validationErrors,
        tags: ['invalid-control-message'],
      });
      this.listeners.onInvalidMessage(parsed.reason);
      return;
    }

    if (this.options.idleTimeoutResetOnActivity) {
      this.armIdleTimeout();
    }

    const msg = parsed.value;
    this.controlHandlers[msg.type](msg);
  };

  /**
   * Tracks a freshly opened flow. Contexts that are already connected are
   * started right away.
   */
  addContext(context: ConnectionContext) {
    this.contexts.set(context.id, context);
    if (context.state === ContextState.Connected) {
      this.listenForEchoes(context);
    }
  }

  /**
   * Moves a tracked flow to Connected. Flows that were dropped in the
   * meantime are ignored.
   */
  connectContext(
    context: DisconnectedContext,
    peer: PeerAddress,
  ): ConnectedContext | undefined {
    if (context._isConsumed) {
      return undefined;
    }

    const connected = ContextStateGraph.transition.DisconnectedToConnected(
      context,
      peer,
    );
    this.addContext(connected);

    return connected;
  }

  private listenForEchoes(context: ConnectedContext) {
    const flowId = context.id;
    const onProbeEcho = this.listeners.onProbeEcho;
    const sessionId = this.id;

    context.setFrameListener((frame) => {
      const msg = ProbeCodec.decode(frame);
      if (!msg || msg.id !== sessionId) {
        return;
      }

      onProbeEcho({ flowId, seq: msg.seq, rttMs: roundTripMs(msg, Date.now()) });
    });
  }

  /**
   * Composes one probe and writes the same bytes to every connected flow,
   * resolving once each write has been accepted by its pipe or has failed.
   * @returns the number of flows written to.
   */
  async tick(): Promise<number> {
    this.seq++;
    const payload = ProbeCodec.encode(
      { id: this.id, seq: this.seq, timestamp: BigInt(Date.now()) },
      this.options.packetSizeBytes,
    );

    const onWriteFailed = this.listeners.onContextWriteFailed;
    const writes: Array<Promise<void>> = [];
    for (const context of this.contexts.values()) {
      if (context.state !== ContextState.Connected) {
        continue;
      }

      const flowId = context.id;
      writes.push(
        context.write(payload).catch((err: unknown) => {
          onWriteFailed(flowId, err);
        }),
      );
    }

    await Promise.all(writes);
    return writes.length;
  }

  /**
   * Cancels and forgets one flow, leaving the others running.
   */
  dropContext(flowId: string, reason?: unknown) {
    const context = this.contexts.get(flowId);
    if (!context) {
      return;
    }

    this.contexts.delete(flowId);
    if (context._isConsumed) {
      return;
    }

    this.log?.warn(
      reason === undefined
        ? `dropping flow ${flowId}`
        : `dropping flow ${flowId}: ${coerceErrorString(reason)}`,
      { ...this.loggingMetadata, flowId, tags: ['flow-error'] },
    );
    context.cancel();
  }

  /**
   * Sends stop to every flow's runner exactly once.
   * @returns the number of flows cancelled.
   */
  cancelAll(): number {
    let cancelled = 0;
    for (const context of this.contexts.values()) {
      if (!context._isConsumed) {
        context.cancel();
        cancelled++;
      }
    }

    this.contexts.clear();

    return cancelled;
  }

  _handleConsume(): void {
    this.conn.removeDataListener(this.onControlData);
    this.conn.removeErrorListener(this.listeners.onConnectionErrored);
    this.conn.removeCloseListener(this.listeners.onConnectionClosed);

    clearTimeout(this.probeTimer);
    this.probeTimer = undefined;
    clearTimeout(this.idleTimeout);
    this.idleTimeout = undefined;
  }
}

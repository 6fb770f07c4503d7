import { SpanStatusCode } from '@opentelemetry/api';
import { Logger, MessageMetadata } from '../logging';
import { TelemetryInfo } from '../tracing';
import { TransportIOError, coerceErrorString } from '../transport/errors';
import { OneShotReceiver } from './oneshot';
import { PipeEnd, writeFrame } from './pipe';
import { PeerAddress, ProbeTransport, formatAddress } from './transport';

/** Largest frame moved by a single forward in either direction. */
export const MAX_FRAME_BYTES = 65_535;

export type RunnerExit =
  | { reason: 'cancelled' }
  | { reason: 'pipe_closed' }
  | { reason: 'transport_error'; error: TransportIOError };

export interface ConnectionRunnerListeners {
  /** Fires once, the first time the transport reports a peer. */
  onPeerLearned: (peer: PeerAddress) => void;
}

export interface ConnectionRunnerProps<T extends ProbeTransport> {
  id: string;
  transport: T;
  pipe: PipeEnd;
  cancel: OneShotReceiver<void>;
  listeners?: Partial<ConnectionRunnerListeners>;
  telemetry?: TelemetryInfo;
  log?: Logger;
}

type PumpEvent =
  | { kind: 'outbound'; frame: IteratorResult<unknown> }
  | { kind: 'inbound'; len: number }
  | { kind: 'cancelled' };

/**
 * Relays frames between one pipe end and one transport until cancelled.
 *
 * ```plaintext
 *   session ◄──► pipe ◄──► ConnectionRunner ◄──► ProbeTransport ◄──► network
 * ```
 *
 * The runner is the only reader and writer of both its pipe end and its
 * transport. It holds one pending read per side across iterations so a
 * frame is never lost to a losing branch of the race.
 */
export class ConnectionRunner<T extends ProbeTransport> {
  readonly id: string;
  readonly transport: T;
  private readonly pipe: PipeEnd;
  private readonly cancel: OneShotReceiver<void>;
  private readonly listeners: Partial<ConnectionRunnerListeners>;
  private readonly telemetry?: TelemetryInfo;
  private readonly log?: Logger;
  private peerAnnounced = false;

  constructor(props: ConnectionRunnerProps<T>) {
    this.id = props.id;
    this.transport = props.transport;
    this.pipe = props.pipe;
    this.cancel = props.cancel;
    this.listeners = props.listeners ?? {};
    this.telemetry = props.telemetry;
    this.log = props.log;

    // write failures surface through writeFrame, this keeps the
    // stream from treating them as unhandled
    this.pipe.on('error', (err) => {
      this.log?.debug(
        `runner pipe errored: ${coerceErrorString(err)}`,
        this.loggingMetadata,
      );
    });
  }

  get loggingMetadata(): MessageMetadata {
    const metadata: MessageMetadata = { flowId: this.id };
    const peer = this.transport.peer;
    if (peer) {
      metadata.peer = formatAddress(peer);
    }

    if (this.telemetry?.span.isRecording()) {
      const spanContext = this.telemetry.span.spanContext();
      metadata.telemetry = {
        traceId: spanContext.traceId,
        spanId: spanContext.spanId,
      };
    }

    return metadata;
  }

  private announcePeer() {
    if (this.peerAnnounced) return;
    const peer = this.transport.peer;
    if (!peer) return;

    this.peerAnnounced = true;
    this.listeners.onPeerLearned?.(peer);
  }

  async run(): Promise<RunnerExit> {
    try {
      const exit = await this.pump();
      if (exit.reason === 'transport_error') {
        this.log?.error(
          `runner stopped on transport error: ${exit.error.message}`,
          this.loggingMetadata,
        );
        this.telemetry?.span.setStatus({
          code: SpanStatusCode.ERROR,
          message: exit.error.message,
        });
      } else {
        this.log?.info(`runner stopped: ${exit.reason}`, this.loggingMetadata);
      }

      return exit;
    } catch (err) {
      this.log?.error(`runner failed: ${coerceErrorString(err)}`, {
        ...this.loggingMetadata,
        tags: ['invariant-violation'],
      });
      this.telemetry?.span.setStatus({
        code: SpanStatusCode.ERROR,
        message: coerceErrorString(err),
      });

      throw err;
    } finally {
      this.transport.close();
      this.pipe.destroy();
      this.telemetry?.span.end();
    }
  }

  private async pump(): Promise<RunnerExit> {
    // a transport that already knows its peer is connected from the start
    this.announcePeer();

    const outbound = this.pipe[Symbol.asyncIterator]();
    const recvBuf = new Uint8Array(MAX_FRAME_BYTES);

    const cancelled = this.cancel
      .recv()
      .then((): PumpEvent => ({ kind: 'cancelled' }));
    const readPipe = () =>
      outbound.next().then((frame): PumpEvent => ({ kind: 'outbound', frame }));
    const readTransport = () =>
      this.transport
        .receive(recvBuf)
        .then((len): PumpEvent => ({ kind: 'inbound', len }));

    let pendingPipe = readPipe();
    let pendingTransport = readTransport();

    for (;;) {
      let event: PumpEvent;
      try {
        event = await Promise.race([cancelled, pendingPipe, pendingTransport]);
      } catch (err) {
        if (this.cancel.isResolved) {
          return { reason: 'cancelled' };
        }

        return { reason: 'transport_error', error: asTransportError(err) };
      }

      switch (event.kind) {
        case 'cancelled':
          return { reason: 'cancelled' };
        case 'outbound': {
          if (event.frame.done) {
            return { reason: 'pipe_closed' };
          }

          const frame = event.frame.value;
          if (!(frame instanceof Uint8Array)) {
            this.log?.error(`dropping non-binary frame from pipe`, {
              ...this.loggingMetadata,
              tags: ['invariant-violation'],
            });
            pendingPipe = readPipe();
            break;
          }

          try {
            await this.transport.send(frame.subarray(0, MAX_FRAME_BYTES));
          } catch (err) {
            return { reason: 'transport_error', error: asTransportError(err) };
          }

          pendingPipe = readPipe();
          break;
        }
        case 'inbound': {
          this.announcePeer();
          // copy out, recvBuf is reused by the next receive
          const frame = Buffer.from(recvBuf.subarray(0, event.len));
          try {
            await writeFrame(this.pipe, frame);
          } catch (err) {
            this.log?.debug(
              `pipe refused inbound frame: ${coerceErrorString(err)}`,
              this.loggingMetadata,
            );

            return this.cancel.isResolved
              ? { reason: 'cancelled' }
              : { reason: 'pipe_closed' };
          }

          pendingTransport = readTransport();
          break;
        }
      }
    }
  }
}

function asTransportError(err: unknown): TransportIOError {
  if (err instanceof TransportIOError) {
    return err;
  }

  return new TransportIOError(coerceErrorString(err), { cause: err });
}

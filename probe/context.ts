import { Tracer } from '@opentelemetry/api';
import { Logger, MessageMetadata } from '../logging';
import { TelemetryInfo, createConnectionTelemetryInfo } from '../tracing';
import { generateId } from '../transport/id';
import { coerceErrorString } from '../transport/errors';
import { TaskSet } from '../util/taskSet';
import { Consumable } from '../util/consumable';
import { OneShotSender, oneshot } from './oneshot';
import { PipeEnd, framePipe, writeFrame } from './pipe';
import { ConnectionRunner, RunnerExit } from './runner';
import { PeerAddress, ProbeTransport, formatAddress } from './transport';

export const enum ContextState {
  Disconnected = 'Disconnected',
  Connected = 'Connected',
}

interface ConnectionContextProps {
  id: string;
  pipe: PipeEnd;
  stop: OneShotSender<void>;
  log?: Logger;
}

/**
 * Session-facing half of a probe flow: one pipe end plus the only handle
 * able to stop the paired runner. Both states are consumed by moving into
 * the next state or by {@link cancel}.
 */
abstract class ConnectionContextBase extends Consumable {
  abstract readonly state: ContextState;
  readonly id: string;
  protected pipe: PipeEnd;
  protected stop: OneShotSender<void>;
  log?: Logger;

  constructor({ id, pipe, stop, log }: ConnectionContextProps) {
    super();
    this.id = id;
    this.pipe = pipe;
    this.stop = stop;
    this.log = log;
  }

  get loggingMetadata(): MessageMetadata {
    return { flowId: this.id };
  }

  /**
   * Stops the paired runner without waiting for it to finish. Consumes
   * this context.
   */
  cancel(): void {
    this.log?.debug(`cancelling flow`, this.loggingMetadata);
    this.stop.send();
    this._handleConsume();
  }

  _handleConsume(): void {
    // noop
  }

  // used by transitions to carry the pipe and sender into the next state
  _moveOut(): ConnectionContextProps {
    const props = {
      id: this.id,
      pipe: this.pipe,
      stop: this.stop,
      log: this.log,
    };
    this._handleConsume();

    return props;
  }
}

/**
 * The paired transport has no peer yet. Nothing may be written.
 */
export class DisconnectedContext extends ConnectionContextBase {
  readonly state = ContextState.Disconnected as const;
}

export type FrameListener = (frame: Uint8Array) => void;

/**
 * The paired transport knows its peer; frames written here go out on the wire
 * and frames the peer sends back can be observed.
 */
export class ConnectedContext extends ConnectionContextBase {
  readonly state = ContextState.Connected as const;
  readonly peer: PeerAddress;
  private frameListener?: FrameListener;

  constructor(props: ConnectionContextProps & { peer: PeerAddress }) {
    super(props);
    this.peer = props.peer;
  }

  get loggingMetadata(): MessageMetadata {
    return { flowId: this.id, peer: formatAddress(this.peer) };
  }

  write(frame: Uint8Array): Promise<void> {
    return writeFrame(this.pipe, frame);
  }

  setFrameListener(cb: FrameListener) {
    this.removeFrameListener();
    this.frameListener = cb;
    this.pipe.on('data', cb);
  }

  removeFrameListener() {
    if (this.frameListener) {
      this.pipe.off('data', this.frameListener);
      this.frameListener = undefined;
    }
  }

  cancel(): void {
    this.removeFrameListener();
    super.cancel();
  }

  _moveOut(): ConnectionContextProps {
    this.removeFrameListener();
    return super._moveOut();
  }
}

export type ConnectionContext = DisconnectedContext | ConnectedContext;

export const ContextStateGraph = {
  transition: {
    // the old context is consumed, any further use of it throws
    DisconnectedToConnected: (
      oldContext: DisconnectedContext,
      peer: PeerAddress,
    ): ConnectedContext => {
      const carried = oldContext._moveOut();
      const context = new ConnectedContext({ ...carried, peer });
      context.log?.info(
        `flow connected to ${formatAddress(peer)}`,
        context.loggingMetadata,
      );

      return context;
    },
  },
};

export interface OpenConnectionProps<T extends ProbeTransport> {
  transport: T;
  tasks: TaskSet;
  onPeerLearned: (context: DisconnectedContext, peer: PeerAddress) => void;
  onRunnerExit?: (id: string, exit: RunnerExit) => void;
  pipeCapacity?: number;
  tracer?: Tracer;
  telemetry?: TelemetryInfo;
  log?: Logger;
}

export interface OpenedConnection<T extends ProbeTransport> {
  context: DisconnectedContext;
  runner: ConnectionRunner<T>;
  done: Promise<RunnerExit>;
}

/**
 * Pairs a transport with a fresh pipe, spawns its runner into `tasks` and
 * returns the session-facing context in the Disconnected state. The runner
 * reports the peer through `onPeerLearned`, at which point the owner should
 * transition the context to Connected.
 */
export function openConnection<T extends ProbeTransport>({
  transport,
  tasks,
  onPeerLearned,
  onRunnerExit,
  pipeCapacity,
  tracer,
  telemetry,
  log,
}: OpenConnectionProps<T>): OpenedConnection<T> {
  const id = `flow-${generateId()}`;
  const [sessionEnd, runnerEnd] = framePipe(pipeCapacity);
  const [stop, stopped] = oneshot();

  sessionEnd.on('error', (err) => {
    log?.debug(`flow pipe errored: ${coerceErrorString(err)}`, { flowId: id });
  });

  const context = new DisconnectedContext({
    id,
    pipe: sessionEnd,
    stop,
    log,
  });

  const runner = new ConnectionRunner({
    id,
    transport,
    pipe: runnerEnd,
    cancel: stopped,
    listeners: {
      onPeerLearned: (peer) => {
        onPeerLearned(context, peer);
      },
    },
    telemetry:
      tracer && telemetry
        ? createConnectionTelemetryInfo(tracer, id, 'probe', telemetry)
        : undefined,
    log,
  });

  const done = tasks.spawn(runner.run()).then((exit) => {
    onRunnerExit?.(id, exit);
    return exit;
  });

  return { context, runner, done };
}

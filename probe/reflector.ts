import { Logger, MessageMetadata } from '../logging';
import { coerceErrorString } from '../transport/errors';
import { TaskSet } from '../util/taskSet';
import {
  ConnectedContext,
  ConnectionContext,
  ContextStateGraph,
  openConnection,
} from './context';
import { RunnerExit } from './runner';
import { ProbeTransport } from './transport';

/**
 * Echoes every frame its transport receives straight back to the peer.
 * This is the reflecting end of a probe flow; payloads are never inspected.
 */
export class ProbeReflector<T extends ProbeTransport = ProbeTransport> {
  readonly transport: T;
  readonly done: Promise<RunnerExit>;
  private context: ConnectionContext | undefined;
  private readonly log?: Logger;
  private echoed = 0;

  constructor(transport: T, tasks: TaskSet = new TaskSet(), log?: Logger) {
    this.transport = transport;
    this.log = log;

    const opened = openConnection({
      transport,
      tasks,
      log,
      onPeerLearned: (context, peer) => {
        // closed before the first datagram was handled
        if (context._isConsumed) return;
        const connected = ContextStateGraph.transition.DisconnectedToConnected(
          context,
          peer,
        );
        this.context = connected;
        this.startEchoing(connected);
      },
    });

    // a transport that already knows its peer connects synchronously
    this.context ??= opened.context;
    this.done = opened.done;
  }

  get loggingMetadata(): MessageMetadata {
    if (!this.context || this.context._isConsumed) return {};
    return this.context.loggingMetadata;
  }

  /** Number of frames sent back so far. */
  get echoCount(): number {
    return this.echoed;
  }

  private startEchoing(context: ConnectedContext) {
    context.setFrameListener((frame) => {
      void context.write(frame).then(
        () => {
          this.echoed++;
        },
        (err: unknown) => {
          this.log?.warn(
            `failed to echo frame: ${coerceErrorString(err)}`,
            this.loggingMetadata,
          );
        },
      );
    });
  }

  close(): void {
    if (!this.context || this.context._isConsumed) return;
    this.context.cancel();
  }
}

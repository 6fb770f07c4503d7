import { TelemetryInfo } from '../tracing';
import { MessageMetadata } from '../logging';
import { generateId } from './id';

/**
 * A connection is the raw control channel between the server and one
 * measurement client. It carries whole, already-delimited messages.
 * It's tied to the lifecycle of the underlying socket: once the socket
 * closes, this connection is done.
 */
export abstract class Connection {
  id: string;
  telemetry?: TelemetryInfo;

  /**
   * Host of the remote end, if the underlying channel has one. Probe flows
   * toward the client are opened against this host.
   */
  abstract readonly peerHost: string | undefined;

  protected dataListeners = new Set<(msg: Uint8Array) => void>();
  protected closeListeners = new Set<() => void>();
  protected errorListeners = new Set<(err: Error) => void>();

  constructor() {
    this.id = `conn-${generateId()}`; // for debugging, no collision safety needed
  }

  get loggingMetadata(): MessageMetadata {
    const metadata: MessageMetadata = { connId: this.id };
    if (this.peerHost) {
      metadata.peer = this.peerHost;
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

  /**
   * Add a callback for when a message is received.
   * @param cb The message handler callback.
   */
  addDataListener(cb: (msg: Uint8Array) => void) {
    this.dataListeners.add(cb);
  }

  removeDataListener(cb: (msg: Uint8Array) => void) {
    this.dataListeners.delete(cb);
  }

  /**
   * Add a callback for when the connection is closed.
   * This should also be called if an error happens and after notifying the error listeners.
   * @param cb The callback to call when the connection is closed.
   */
  addCloseListener(cb: () => void): void {
    this.closeListeners.add(cb);
  }

  removeCloseListener(cb: () => void): void {
    this.closeListeners.delete(cb);
  }

  /**
   * Add a callback for when an error is received.
   * This should only be used for logging errors, all cleanup
   * should be delegated to addCloseListener.
   *
   * @param cb The callback to call when an error is received.
   */
  addErrorListener(cb: (err: Error) => void): void {
    this.errorListeners.add(cb);
  }

  removeErrorListener(cb: (err: Error) => void): void {
    this.errorListeners.delete(cb);
  }

  protected dispatchData(msg: Uint8Array) {
    for (const cb of [...this.dataListeners]) {
      cb(msg);
    }
  }

  protected dispatchClose() {
    for (const cb of [...this.closeListeners]) {
      cb();
    }

    this.telemetry?.span.end();
  }

  protected dispatchError(err: Error) {
    for (const cb of [...this.errorListeners]) {
      cb(err);
    }
  }

  /**
   * Sends a message over the connection.
   * @param msg The message to send.
   * @returns true if the message was sent, false otherwise.
   */
  abstract send(msg: Uint8Array): boolean;

  /**
   * Closes the connection.
   */
  abstract close(): void;
}
